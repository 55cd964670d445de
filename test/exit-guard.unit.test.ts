// SPDX-License-Identifier: MIT
// Corvid Exit-Legality Guard - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { analyzeProgram } from "../src/code-analyzer.js";
import { type AnalysisContext, createContext } from "../src/code-analyzer/context.js";
import {
	checkAbortOrRetry,
	checkBreakOrContinue,
	checkReturn,
	enterLoop,
	enterTransaction,
	leaveLoop,
	leaveTransaction,
} from "../src/code-analyzer/exit-guard.js";
import { DiagnosticLog } from "../src/diagnostics.js";
import { AnalyzerError, ErrorCodes } from "../src/errors.js";
import { nilType } from "../src/types.js";
import { WorkerActionSystem } from "../src/worker-validator.js";
import type { Statement } from "../src/zod-schemas.js";
import {
	at,
	block,
	brk,
	call,
	exprStmt,
	fn,
	programOf,
	ret,
	summarize,
	transaction,
	whileStmt,
} from "./helper.js";

function freshContext(): AnalysisContext {
	return createContext(fn("f", nilType, block()), "function", new WorkerActionSystem());
}

const here = at(7);

describe("Exit Guard - Unit Tests", () => {

	//==========================================================================
	// Scope stack
	//==========================================================================

	describe("scope stack", () => {
		it("rejects break and continue outside any loop", () => {
			const ctx = freshContext();
			const log = new DiagnosticLog();
			assert.equal(checkBreakOrContinue(ctx, "continue", here, log), false);
			assert.equal(log.diagnostics[0]?.code, "LoopExitOutsideLoop");
			assert.deepStrictEqual(log.diagnostics[0]?.args, ["continue"]);
		});

		it("allows break inside a loop and tracks loop depth", () => {
			const ctx = freshContext();
			const log = new DiagnosticLog();
			enterLoop(ctx);
			assert.equal(ctx.loopDepth, 1);
			assert.equal(checkBreakOrContinue(ctx, "break", here, log), true);
			leaveLoop(ctx);
			assert.equal(ctx.loopDepth, 0);
			assert.equal(log.diagnostics.length, 0);
		});

		it("rejects break that would leave a transaction", () => {
			const ctx = freshContext();
			const log = new DiagnosticLog();
			enterLoop(ctx);
			enterTransaction(ctx, here, log);
			assert.equal(checkBreakOrContinue(ctx, "break", here, log), false);
			assert.equal(log.diagnostics[0]?.code, "BreakContinueCrossesTransaction");
		});

		it("allows return through loops but not through transactions", () => {
			const ctx = freshContext();
			const log = new DiagnosticLog();
			enterLoop(ctx);
			assert.equal(checkReturn(ctx, here, log), true);
			enterTransaction(ctx, here, log);
			enterLoop(ctx);
			assert.equal(checkReturn(ctx, here, log), false);
			assert.deepStrictEqual(log.diagnostics.map(d => d.code), ["ReturnCrossesTransaction"]);
		});

		it("requires a transaction for abort and retry", () => {
			const ctx = freshContext();
			const log = new DiagnosticLog();
			assert.equal(checkAbortOrRetry(ctx, "retry", here, log), false);
			assert.deepStrictEqual(log.diagnostics[0]?.args, ["retry"]);
			enterTransaction(ctx, here, log);
			assert.equal(checkAbortOrRetry(ctx, "abort", here, log), true);
			leaveTransaction(ctx);
			assert.equal(ctx.transactionDepth, 0);
		});

		it("reports nested transactions once per inner transaction", () => {
			const ctx = freshContext();
			const log = new DiagnosticLog();
			assert.equal(enterTransaction(ctx, here, log), true);
			assert.equal(enterTransaction(ctx, here, log), false);
			assert.deepStrictEqual(log.diagnostics.map(d => d.code), ["NestedTransactionsInvalid"]);
		});

		it("throws when leaving a scope of the wrong kind", () => {
			const ctx = freshContext();
			enterTransaction(ctx, here, new DiagnosticLog());
			assert.throws(() => { leaveLoop(ctx); }, (e: unknown) =>
				e instanceof AnalyzerError && e.code === ErrorCodes.InvariantViolation);
		});

		it("throws when popping the function scope", () => {
			const ctx = freshContext();
			assert.throws(() => { leaveTransaction(ctx); }, AnalyzerError);
		});
	});

	//==========================================================================
	// Through the analyzer
	//==========================================================================

	describe("through the analyzer", () => {
		it("reports one nested transaction", () => {
			const p = programOf(transaction(block(transaction(block(), 2)), 1));
			assert.deepStrictEqual(summarize(analyzeProgram(p).diagnostics), ["NestedTransactionsInvalid@2"]);
		});

		it("reports break directly inside a transaction", () => {
			const p = programOf(transaction(block(brk(2)), 1));
			assert.deepStrictEqual(summarize(analyzeProgram(p).diagnostics), ["BreakContinueCrossesTransaction@2"]);
		});

		it("accepts break in a loop inside a transaction", () => {
			const p = programOf(transaction(block(whileStmt(block(brk(3)), 2)), 1));
			assert.deepStrictEqual(analyzeProgram(p).diagnostics, []);
		});

		it("leaves code after a rejected return reachable", () => {
			const p = programOf(transaction(block(ret(undefined, 2), exprStmt(call("g", nilType, 3), 3)), 1));
			assert.deepStrictEqual(summarize(analyzeProgram(p).diagnostics), ["ReturnCrossesTransaction@2"]);
		});

		it("rejects a transaction inside a handler without analyzing it", () => {
			const p = programOf(transaction(block(), 1, {
				aborted: block(transaction(block(transaction(block(), 4)), 3)),
			}));
			assert.deepStrictEqual(summarize(analyzeProgram(p).diagnostics), ["TransactionInsideHandler@3"]);
		});

		it("rejects abort outside a transaction", () => {
			const abort: Statement = { kind: "abort", position: at(1) };
			const { diagnostics } = analyzeProgram(programOf(abort));
			assert.deepStrictEqual(summarize(diagnostics), ["AbortRetryOutsideTransaction@1"]);
			assert.deepStrictEqual(diagnostics[0]?.args, ["abort"]);
		});

		it("treats handlers as outside the transaction", () => {
			const retry: Statement = { kind: "retry", position: at(2) };
			const p = programOf(transaction(block(), 1, { onRetry: block(retry) }));
			assert.deepStrictEqual(summarize(analyzeProgram(p).diagnostics), ["AbortRetryOutsideTransaction@2"]);
		});
	});
});
