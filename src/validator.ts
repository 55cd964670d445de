// SPDX-License-Identifier: MIT
// Corvid Input Validator
// Two-phase validation: Zod safeParse for structural, then semantic checks.

import { z } from "zod/v4";
import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import {
	ProgramSchema,
	type FunctionDecl,
	type Program,
	type Statement,
} from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Validation State (for semantic checks)
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	path: string[];
	defaultWorkerName: string;
}

function pushPath(state: ValidationState, segment: string): void {
	state.path.push(segment);
}

function popPath(state: ValidationState): void {
	state.path.pop();
}

function currentPath(state: ValidationState): string {
	return state.path.length > 0 ? state.path.join(".") : "$";
}

function addError(
	state: ValidationState,
	message: string,
	value?: unknown,
): void {
	state.errors.push({
		path: currentPath(state),
		message,
		value,
	});
}

//==============================================================================
// Semantic Checks
//==============================================================================

function checkUniqueDeclarations(state: ValidationState, program: Program): void {
	const seen = new Set<string>();
	program.declarations.forEach((decl, i) => {
		if (decl.kind === "variable") return;
		pushPath(state, "declarations." + String(i));
		if (seen.has(decl.name)) {
			addError(state, "Duplicate declaration: " + decl.name, decl.name);
		}
		seen.add(decl.name);
		popPath(state);
	});
}

/** Worker names must be unique per invokable and never shadow the default worker. */
function checkWorkerNames(state: ValidationState, fn: FunctionDecl): void {
	if (fn.body === undefined) return;
	const names = new Set<string>();
	const visit = (stmts: Statement[], path: string): void => {
		stmts.forEach((stmt, i) => {
			const here = path + "." + String(i);
			if (stmt.kind === "worker") {
				pushPath(state, here);
				if (stmt.name === state.defaultWorkerName) {
					addError(state, "Worker name is reserved: " + stmt.name, stmt.name);
				} else if (names.has(stmt.name)) {
					addError(state, "Duplicate worker: " + stmt.name, stmt.name);
				}
				names.add(stmt.name);
				popPath(state);
			} else if (stmt.kind === "fork") {
				visit(stmt.workers, here + ".workers");
			} else if (stmt.kind === "block") {
				visit(stmt.statements, here + ".statements");
			}
		});
	};
	visit(fn.body.statements, "body.statements");
}

function semanticValidateProgram(
	program: Program,
	defaultWorkerName: string,
): ValidationResult<Program> {
	const state: ValidationState = { errors: [], path: [], defaultWorkerName };
	checkUniqueDeclarations(state, program);
	program.declarations.forEach((decl, i) => {
		const functions = decl.kind === "function"
			? [decl]
			: decl.kind === "typeDefinition" ? decl.methods ?? [] : [];
		pushPath(state, "declarations." + String(i));
		for (const fn of functions) checkWorkerNames(state, fn);
		popPath(state);
	});
	if (state.errors.length > 0) {
		return invalidResult<Program>(state.errors);
	}
	return validResult(program);
}

//==============================================================================
// Public API
//==============================================================================

export interface ParseOptions {
	defaultWorkerName?: string;
}

/**
 * Validate a typed AST read from JSON.
 */
export function parseProgram(
	doc: unknown,
	options: ParseOptions = {},
): ValidationResult<Program> {
	// Phase 1: Structural validation via Zod
	const parsed = ProgramSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<Program>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Semantic validation on typed data
	return semanticValidateProgram(parsed.data, options.defaultWorkerName ?? "default");
}

//==============================================================================
// Analyzer Configuration
//==============================================================================

export const AnalyzerConfigSchema = z.strictObject({
	defaultWorkerName: z.string().min(1).default("default"),
	mainFunctionName: z.string().min(1).default("main"),
	warningsAsErrors: z.boolean().default(false),
	verbose: z.boolean().default(false),
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;

/**
 * Validate analyzer configuration read from JSON, filling in defaults.
 */
export function parseAnalyzerConfig(doc: unknown): ValidationResult<AnalyzerConfig> {
	const parsed = AnalyzerConfigSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<AnalyzerConfig>(zodToValidationErrors(parsed.error));
	}
	return validResult(parsed.data);
}
