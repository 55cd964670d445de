// SPDX-License-Identifier: MIT
// Declaration analysis - functions, type definitions, module variables and visibility

import { DiagnosticCodes } from "../diagnostics.js";
import { exhaustive } from "../errors.js";
import { hasFlag, typeSymbol } from "../types.js";
import type {
	FunctionDecl,
	Position,
	SymbolInfo,
	TopLevelNode,
	Type,
	TypeDefinition,
	VariableDecl,
} from "../zod-schemas.js";
import type { AnalysisContext, RunState } from "./context.js";
import { analyzeExpr } from "./expressions.js";
import { analyzeFunction } from "./statements.js";

//==============================================================================
// Visibility
//==============================================================================

function isPublic(symbol: SymbolInfo | undefined): boolean {
	return hasFlag(symbol, "public");
}

/** Named types reachable from `t` without going through a named type. */
function exposedSymbols(t: Type, out: SymbolInfo[] = []): SymbolInfo[] {
	const symbol = typeSymbol(t);
	if (symbol !== undefined) {
		if (!out.includes(symbol)) out.push(symbol);
		return out;
	}
	switch (t.kind) {
	case "union":
	case "tuple":
		for (const m of t.members) exposedSymbols(m, out);
		break;
	case "array":
	case "map":
	case "future":
	case "stream":
		exposedSymbols(t.of, out);
		break;
	default:
		break;
	}
	return out;
}

/** A public declaration cannot mention a non-public named type. */
function checkExposedType(t: Type, position: Position, run: RunState): void {
	for (const symbol of exposedSymbols(t)) {
		if (!isPublic(symbol)) {
			run.log.report(position, DiagnosticCodes.AttemptExposeNonPublicSymbol, symbol.name);
		}
	}
}

//==============================================================================
// Variables
//==============================================================================

export type VariableScope = "global" | "local";

export function analyzeVariable(
	variable: VariableDecl,
	scope: VariableScope,
	ctx: AnalysisContext,
	run: RunState,
): void {
	if (variable.expr !== undefined) analyzeExpr(variable.expr, ctx, run, [variable]);
	if (scope === "local" || variable.symbol === undefined) return;

	if (!isPublic(variable.symbol)) {
		if (variable.expr === undefined && hasFlag(variable.symbol, "listener")) {
			run.log.report(variable.position, DiagnosticCodes.UninitializedVariable, variable.name);
		}
		return;
	}
	checkExposedType(variable.type, variable.position, run);
	if (variable.expr === undefined) {
		run.log.report(variable.position, DiagnosticCodes.UninitializedVariable, variable.name);
	}
}

//==============================================================================
// Functions and Types
//==============================================================================

function analyzeFunctionDecl(fn: FunctionDecl, run: RunState, owner?: TypeDefinition): void {
	if (run.options.verbose) {
		const qualified = owner === undefined ? fn.name : owner.name + "." + fn.name;
		console.warn(`[CodeAnalyzer] Analyzing function ${qualified}`);
	}
	if (owner === undefined && fn.name === run.options.mainFunctionName && !isPublic(fn.symbol)) {
		run.log.report(fn.position, DiagnosticCodes.MainShouldBePublic, fn.name);
	}
	if (isPublic(fn.symbol) && (owner === undefined || isPublic(owner.symbol))) {
		checkExposedType(fn.returnType, fn.position, run);
		for (const param of fn.params) checkExposedType(param.type, param.position, run);
	}
	analyzeFunction(fn, "function", run);
}

function analyzeTypeDefinition(def: TypeDefinition, ctx: AnalysisContext, run: RunState): void {
	const publicType = isPublic(def.symbol);
	for (const field of def.fields ?? []) {
		if (field.expr !== undefined) analyzeExpr(field.expr, ctx, run, [field]);
		if (publicType && isPublic(field.symbol)) checkExposedType(field.type, field.position, run);
	}

	const methods = def.methods ?? [];
	if (hasFlag(def.symbol, "client") && !methods.some(m => hasFlag(m.symbol, "remote"))) {
		run.log.report(def.position, DiagnosticCodes.ClientHasNoRemoteFunction);
	}
	for (const method of methods) analyzeFunctionDecl(method, run, def);
}

/**
 * Analyze one top-level declaration. Module-level initializers run in the
 * shared module context `moduleCtx`.
 */
export function analyzeTopLevel(node: TopLevelNode, moduleCtx: AnalysisContext, run: RunState): void {
	switch (node.kind) {
	case "function":
		analyzeFunctionDecl(node, run);
		break;
	case "typeDefinition":
		analyzeTypeDefinition(node, moduleCtx, run);
		break;
	case "variable":
		analyzeVariable(node, "global", moduleCtx, run);
		break;
	default:
		exhaustive(node);
	}
}
