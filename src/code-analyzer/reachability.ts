// SPDX-License-Identifier: MIT
// Reachability tracker - unreachable statements and mandatory returns

import { DiagnosticCodes, type DiagnosticLog } from "../diagnostics.js";
import type { Position } from "../zod-schemas.js";
import type { AnalysisContext } from "./context.js";

/**
 * Report the first statement of an unreachable run, then treat the rest of
 * the run as reachable so it is not reported again.
 */
export function checkReachable(ctx: AnalysisContext, position: Position, log: DiagnosticLog): void {
	if (ctx.reachable) return;
	log.report(position, DiagnosticCodes.UnreachableCode);
	ctx.reachable = true;
}

/** After `return` or `panic`. */
export function markReturns(ctx: AnalysisContext): void {
	ctx.returns = true;
	ctx.reachable = false;
}

/** After `break`, `continue`, `abort`, `retry` or `forever`. */
export function markTerminates(ctx: AnalysisContext): void {
	ctx.reachable = false;
}

/**
 * Run a nested body as a branch. Returns whether the branch definitely
 * returned; the context's own `returns` flag is left as it was.
 */
export function analyzeBranch(ctx: AnalysisContext, body: () => void): boolean {
	const before = ctx.returns;
	ctx.returns = false;
	ctx.reachable = true;
	body();
	const branchReturns = ctx.returns;
	ctx.returns = before;
	return branchReturns;
}

/**
 * Complete a compound statement: it returns when `returns` says so, and
 * code after it is reachable otherwise.
 */
export function completeStatement(ctx: AnalysisContext, returns: boolean): void {
	ctx.returns = ctx.returns || returns;
	ctx.reachable = !returns;
}

/** A body-carrying invokable with a non-nil return type must return. */
export function checkMustReturn(ctx: AnalysisContext, position: Position, log: DiagnosticLog): void {
	if (ctx.returnType.kind === "nil" || ctx.returnType.kind === "semanticError") return;
	if (!ctx.returns) {
		log.report(position, DiagnosticCodes.MustReturn, ctx.invokableKind);
	}
}
