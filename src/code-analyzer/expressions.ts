// SPDX-License-Identifier: MIT
// Expression analysis - one visit per expression kind

import { DiagnosticCodes } from "../diagnostics.js";
import { exhaustive } from "../errors.js";
import { analyzeMatchExpression } from "../match-analyzer.js";
import { containsErrorType, flattenMembers, hasFlag, typeSymbol, typeToString } from "../types.js";
import type {
	BinaryExpr,
	Expression,
	IndexAccessExpr,
	InvocationExpr,
	RecordLiteralExpr,
	SymbolInfo,
	TypeTestExpr,
} from "../zod-schemas.js";
import { addReturnType, type AnalysisContext, type AncestorNode, type RunState } from "./context.js";
import { analyzeLambda } from "./statements.js";
import { analyzeWorkerFlush, analyzeWorkerReceive, analyzeWorkerSyncSend } from "./workers.js";

//==============================================================================
// Dispatch
//==============================================================================

/**
 * Analyze an expression. `ancestors` lists the enclosing statements and
 * expressions, nearest last.
 */
export function analyzeExpr(
	expr: Expression,
	ctx: AnalysisContext,
	run: RunState,
	ancestors: readonly AncestorNode[],
): void {
	const inner: readonly AncestorNode[] = [...ancestors, expr];
	const visit = (e: Expression): void => { analyzeExpr(e, ctx, run, inner); };

	switch (expr.kind) {
	case "literal":
	case "varRef":
		break;
	case "fieldAccess":
	case "unary":
	case "trap":
	case "wait":
	case "typeConversion":
	case "namedArg":
		visit(expr.expr);
		break;
	case "indexAccess":
		visit(expr.expr);
		visit(expr.index);
		checkIndexRange(expr, run);
		break;
	case "invocation":
		analyzeInvocation(expr, run, ancestors, visit);
		break;
	case "recordLiteral":
		analyzeRecordLiteral(expr, run, visit);
		break;
	case "listLiteral":
	case "tupleLiteral":
		expr.members.forEach(visit);
		break;
	case "binary":
		analyzeBinary(expr, run, ancestors, visit);
		break;
	case "ternary":
		visit(expr.condition);
		visit(expr.then);
		visit(expr.else);
		break;
	case "elvis":
		visit(expr.lhs);
		visit(expr.rhs);
		break;
	case "lambda":
		analyzeLambda(expr.function, run);
		break;
	case "typeTest":
		visit(expr.expr);
		checkTypeTest(expr, run);
		break;
	case "checked":
		visit(expr.expr);
		if (ctx.returnType.kind !== "semanticError" && !containsErrorType(ctx.returnType)) {
			run.log.report(expr.expr.position, DiagnosticCodes.CheckedExprNoErrorReturn);
		}
		for (const member of flattenMembers(expr.expr.type)) {
			if (member.kind === "error") addReturnType(ctx, member, run.relations);
		}
		break;
	case "waitForAll":
		expr.entries.forEach(visit);
		break;
	case "workerReceive":
		analyzeWorkerReceive(expr, ctx, run, ancestors);
		break;
	case "workerSyncSend":
		analyzeWorkerSyncSend(expr, ctx, run, ancestors);
		break;
	case "workerFlush":
		analyzeWorkerFlush(expr, ctx, run);
		break;
	case "typeInit": {
		const parent = ancestors[ancestors.length - 1];
		if (expr.type.kind === "stream" && parent?.kind !== "assignment" && parent?.kind !== "variable") {
			run.log.report(expr.position, DiagnosticCodes.StreamInitNotAllowedHere);
			return;
		}
		expr.args.forEach(visit);
		break;
	}
	case "stringTemplate":
		expr.exprs.forEach(visit);
		break;
	case "matchExpression": {
		visit(expr.expr);
		const analysis = analyzeMatchExpression(expr.expr.type, expr.clauses, expr.type, {
			relations: run.relations,
			position: expr.position,
			log: run.log,
		});
		for (const verdict of analysis.verdicts) {
			run.annotations.matchExprClauses.set(verdict.clause, verdict);
		}
		for (const clause of expr.clauses) visit(clause.expr);
		break;
	}
	default:
		exhaustive(expr);
	}

	checkAccess(expr, run);
}

//==============================================================================
// Symbol Access
//==============================================================================

function referencedSymbols(expr: Expression): SymbolInfo[] {
	const symbols: SymbolInfo[] = [];
	const fromType = typeSymbol(expr.type);
	if (fromType !== undefined) symbols.push(fromType);
	if ((expr.kind === "invocation" || expr.kind === "varRef") && expr.symbol !== undefined) {
		symbols.push(expr.symbol);
	}
	return symbols;
}

/** Non-public symbols of other modules cannot be referenced. */
function checkAccess(expr: Expression, run: RunState): void {
	const hidden = referencedSymbols(expr).find(s => s.module !== run.module && !hasFlag(s, "public"));
	if (hidden !== undefined) {
		run.log.report(expr.position, DiagnosticCodes.AttemptReferNonAccessibleSymbol, hidden.name);
	}
}

//==============================================================================
// Invocations
//==============================================================================

function analyzeInvocation(
	expr: InvocationExpr,
	run: RunState,
	ancestors: readonly AncestorNode[],
	visit: (e: Expression) => void,
): void {
	if (expr.expr !== undefined) visit(expr.expr);
	expr.args.forEach(visit);

	const seen = new Set<string>();
	for (const named of expr.namedArgs ?? []) {
		if (seen.has(named.name)) {
			run.log.report(named.position, DiagnosticCodes.DuplicateNamedArgs, named.name);
		}
		seen.add(named.name);
		visit(named);
	}
	(expr.restArgs ?? []).forEach(visit);

	if (hasFlag(expr.symbol, "deprecated")) {
		run.log.report(expr.position, DiagnosticCodes.DeprecatedFunctionUsage, expr.name);
	}
	if (expr.actionInvocation) checkActionInvocation(expr, ancestors, run);
}

function isActionInvocation(expr: Expression): boolean {
	return expr.kind === "invocation" && expr.actionInvocation === true;
}

/**
 * A remote action is invoked on a client variable (or a field of `self`)
 * and its result may only flow straight into a statement.
 */
function checkActionInvocation(expr: InvocationExpr, ancestors: readonly AncestorNode[], run: RunState): void {
	const client = expr.expr;
	const clientOk = client?.kind === "varRef"
		|| (client?.kind === "fieldAccess" && client.expr.kind === "varRef" && client.expr.name === "self");
	if (!clientOk) {
		run.log.report(expr.position, DiagnosticCodes.InvalidActionInvocationAsExpr);
		return;
	}

	for (let i = ancestors.length - 1; i >= 0; i--) {
		const parent = ancestors[i];
		if (parent === undefined) break;
		switch (parent.kind) {
		case "assignment":
		case "expressionStmt":
		case "return":
		case "variable":
			return;
		case "destructure":
			if (parent.pattern === "tuple") return;
			break;
		case "checked":
		case "matchExpression":
		case "trap":
			continue;
		case "elvis":
			if (isActionInvocation(parent.lhs)) continue;
			break;
		default:
			break;
		}
		break;
	}
	run.log.report(expr.position, DiagnosticCodes.InvalidActionInvocationAsExpr);
}

//==============================================================================
// Literals and Access
//==============================================================================

function literalKey(key: Expression): string | undefined {
	if (key.kind === "varRef") return key.name;
	if (key.kind === "literal" && key.value !== null) return String(key.value);
	return undefined;
}

function analyzeRecordLiteral(expr: RecordLiteralExpr, run: RunState, visit: (e: Expression) => void): void {
	const seen = new Set<string>();
	for (const entry of expr.entries) {
		const key = literalKey(entry.key);
		if (key === undefined) {
			visit(entry.key);
		} else if (seen.has(key)) {
			run.log.report(entry.key.position, DiagnosticCodes.DuplicateKeyInRecordLiteral, expr.type.kind, key);
		} else {
			seen.add(key);
		}
		visit(entry.value);
	}
}

function checkIndexRange(expr: IndexAccessExpr, run: RunState): void {
	const arrayType = expr.expr.type;
	if (arrayType.kind !== "array" || !arrayType.sealed || arrayType.size === undefined) return;
	if (expr.index.kind !== "literal" || typeof expr.index.value !== "number") return;
	if (expr.index.value >= arrayType.size) {
		run.log.report(expr.index.position, DiagnosticCodes.ArrayIndexOutOfRange, expr.index.value, arrayType.size);
	}
}

//==============================================================================
// Operators
//==============================================================================

/**
 * Futures only combine with `|` as the operand of `wait`; the outermost
 * binary of such a chain reports the misuse.
 */
function analyzeBinary(
	expr: BinaryExpr,
	run: RunState,
	ancestors: readonly AncestorNode[],
	visit: (e: Expression) => void,
): void {
	if (expr.lhs.type.kind !== "future" && expr.rhs.type.kind !== "future") {
		visit(expr.lhs);
		visit(expr.rhs);
		return;
	}
	const parent = ancestors[ancestors.length - 1];
	let outer: AncestorNode | undefined;
	for (let i = ancestors.length - 1; i >= 0; i--) {
		outer = ancestors[i];
		if (outer?.kind !== "binary") break;
	}
	if (outer?.kind !== "wait" && parent?.kind !== "binary" && expr.op === "|") {
		run.log.report(expr.position, DiagnosticCodes.OperatorNotSupported, expr.op, "future");
		return;
	}
	visit(expr.lhs);
	visit(expr.rhs);
}

function checkTypeTest(expr: TypeTestExpr, run: RunState): void {
	const exprType = expr.expr.type;
	if (expr.testType.kind === "semanticError" || exprType.kind === "semanticError") return;
	if (run.relations.isAssignable(exprType, expr.testType)) {
		run.log.report(expr.position, DiagnosticCodes.UnnecessaryCondition);
	} else if (!run.relations.isAssignable(expr.testType, exprType)) {
		run.log.report(
			expr.position,
			DiagnosticCodes.IncompatibleTypeCheck,
			typeToString(exprType),
			typeToString(expr.testType),
		);
	}
}
