// SPDX-License-Identifier: MIT
// Exit-legality guard - which exits may leave loops, transactions and invokables

import { DiagnosticCodes, type DiagnosticLog } from "../diagnostics.js";
import { AnalyzerError } from "../errors.js";
import type { Position } from "../zod-schemas.js";
import type { AnalysisContext, ExitScope, ExitScopeKind } from "./context.js";

//==============================================================================
// Scope Stack
//==============================================================================

export function enterLoop(ctx: AnalysisContext): void {
	ctx.exitScopes.push({ kind: "loop" });
	ctx.loopDepth++;
}

export function leaveLoop(ctx: AnalysisContext): void {
	popScope(ctx, "loop");
	ctx.loopDepth--;
}

/**
 * Push a transaction scope. Returns false when the transaction is nested in
 * another one, after reporting it.
 */
export function enterTransaction(ctx: AnalysisContext, position: Position, log: DiagnosticLog): boolean {
	const nested = ctx.transactionDepth > 0;
	if (nested) log.report(position, DiagnosticCodes.NestedTransactionsInvalid);
	ctx.exitScopes.push({ kind: "transaction" });
	ctx.transactionDepth++;
	return !nested;
}

export function leaveTransaction(ctx: AnalysisContext): void {
	popScope(ctx, "transaction");
	ctx.transactionDepth--;
}

function popScope(ctx: AnalysisContext, kind: ExitScopeKind): void {
	const top = ctx.exitScopes[ctx.exitScopes.length - 1];
	if (top === undefined || ctx.exitScopes.length === 1) {
		throw AnalyzerError.invariant("cannot leave the function scope of " + ctx.invokableKind);
	}
	if (top.kind !== kind) {
		throw AnalyzerError.invariant("expected to leave a " + kind + " scope, found " + top.kind);
	}
	ctx.exitScopes.pop();
}

/** Innermost scope of one of the given kinds. */
function nearest(ctx: AnalysisContext, kinds: readonly ExitScopeKind[]): ExitScope | undefined {
	for (let i = ctx.exitScopes.length - 1; i >= 0; i--) {
		const scope = ctx.exitScopes[i];
		if (scope !== undefined && kinds.includes(scope.kind)) return scope;
	}
	return undefined;
}

//==============================================================================
// Exit Checks
//==============================================================================

/**
 * `break`/`continue` need an enclosing loop that is not outside the
 * innermost transaction.
 */
export function checkBreakOrContinue(
	ctx: AnalysisContext,
	statement: "break" | "continue",
	position: Position,
	log: DiagnosticLog,
): boolean {
	const scope = nearest(ctx, ["loop", "transaction"]);
	if (scope?.kind === "transaction") {
		log.report(position, DiagnosticCodes.BreakContinueCrossesTransaction, statement);
		return false;
	}
	if (scope === undefined) {
		log.report(position, DiagnosticCodes.LoopExitOutsideLoop, statement);
		return false;
	}
	return true;
}

/** Loops are transparent to `return`; transactions are not. */
export function checkReturn(ctx: AnalysisContext, position: Position, log: DiagnosticLog): boolean {
	if (nearest(ctx, ["function", "transaction"])?.kind === "transaction") {
		log.report(position, DiagnosticCodes.ReturnCrossesTransaction);
		return false;
	}
	return true;
}

export function checkAbortOrRetry(
	ctx: AnalysisContext,
	statement: "abort" | "retry",
	position: Position,
	log: DiagnosticLog,
): boolean {
	if (ctx.transactionDepth === 0) {
		log.report(position, DiagnosticCodes.AbortRetryOutsideTransaction, statement);
		return false;
	}
	return true;
}
