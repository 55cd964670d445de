// SPDX-License-Identifier: MIT
// Statement analysis - reachability, exits, transactions and match statements

import { DiagnosticCodes } from "../diagnostics.js";
import { exhaustive } from "../errors.js";
import { analyzeMatch } from "../match-analyzer.js";
import { hasFlag, nilType } from "../types.js";
import { type InvokableNode, WorkerActionSystem } from "../worker-validator.js";
import type {
	BlockStmt,
	Expression,
	ExpressionStmt,
	FunctionDecl,
	MatchStmt,
	Statement,
	TransactionStmt,
	VariableDefStmt,
	WorkerDecl,
} from "../zod-schemas.js";
import {
	addReturnType,
	type AnalysisContext,
	type AncestorNode,
	createContext,
	type HandlerKind,
	type InvokableKind,
	type RunState,
} from "./context.js";
import { analyzeVariable } from "./declarations.js";
import {
	checkAbortOrRetry,
	checkBreakOrContinue,
	checkReturn,
	enterLoop,
	enterTransaction,
	leaveLoop,
	leaveTransaction,
} from "./exit-guard.js";
import { analyzeExpr } from "./expressions.js";
import {
	analyzeBranch,
	checkMustReturn,
	checkReachable,
	completeStatement,
	markReturns,
	markTerminates,
} from "./reachability.js";
import { analyzeWorkerSend, declareWorkers, finishSystem } from "./workers.js";

//==============================================================================
// Invokables
//==============================================================================

/**
 * Walk the body of a function, lambda or worker in a fresh context that
 * records into `system`, then check that it returns.
 */
export function analyzeInvokableBody(
	invokable: InvokableNode,
	kind: InvokableKind,
	system: WorkerActionSystem,
	run: RunState,
): AnalysisContext {
	const ctx = createContext(invokable, kind, system);
	const { body } = invokable;
	if (body === undefined) return ctx;

	declareWorkers(body, system);
	analyzeBlock(body, ctx, run);
	checkMustReturn(ctx, invokable.position, run.log);
	return ctx;
}

/**
 * Analyze a function or lambda with its own worker system, whose default
 * machine is the body itself.
 */
export function analyzeFunction(fn: FunctionDecl, kind: "function" | "lambda", run: RunState): void {
	const system = new WorkerActionSystem();
	system.start(run.options.defaultWorkerName, fn.position, fn);
	if (!hasFlag(fn.symbol, "native")) {
		analyzeInvokableBody(fn, kind, system, run);
	}
	system.end();
	finishSystem(system, kind + " " + fn.name, run);
}

export function analyzeLambda(fn: FunctionDecl, run: RunState): void {
	analyzeFunction(fn, "lambda", run);
}

function analyzeWorker(worker: WorkerDecl, ctx: AnalysisContext, run: RunState): void {
	ctx.system.start(worker.name, worker.position, worker);
	analyzeInvokableBody(worker, "worker", ctx.system, run);
	ctx.system.end();
}

//==============================================================================
// Blocks
//==============================================================================

export function analyzeBlock(block: BlockStmt, ctx: AnalysisContext, run: RunState): void {
	const saved = ctx.currentBlock;
	ctx.currentBlock = block;
	for (const stmt of block.statements) {
		analyzeStatement(stmt, ctx, run);
	}
	ctx.currentBlock = saved;
}

/** Analyze a nested block as a branch; see analyzeBranch. */
function branch(block: BlockStmt, ctx: AnalysisContext, run: RunState): boolean {
	return analyzeBranch(ctx, () => { analyzeBlock(block, ctx, run); });
}

//==============================================================================
// Statement Dispatch
//==============================================================================

export function analyzeStatement(stmt: Statement, ctx: AnalysisContext, run: RunState): void {
	const { log } = run;
	const here: readonly AncestorNode[] = [stmt];
	const visit = (e: Expression): void => { analyzeExpr(e, ctx, run, here); };

	checkReachable(ctx, stmt.position, log);

	switch (stmt.kind) {
	case "block":
		completeStatement(ctx, branch(stmt, ctx, run));
		break;
	case "variableDef":
		checkEndpointDeclaration(stmt, ctx, run);
		analyzeVariable(stmt.variable, "local", ctx, run);
		break;
	case "assignment":
	case "compoundAssignment":
	case "destructure":
		visit(stmt.target);
		visit(stmt.expr);
		break;
	case "expressionStmt":
		visit(stmt.expr);
		checkExpressionStatement(stmt, run);
		break;
	case "if": {
		visit(stmt.condition);
		const thenReturns = branch(stmt.then, ctx, run);
		const elseBranch = stmt.else;
		let elseReturns = false;
		if (elseBranch?.kind === "block") {
			elseReturns = branch(elseBranch, ctx, run);
		} else if (elseBranch !== undefined) {
			elseReturns = analyzeBranch(ctx, () => { analyzeStatement(elseBranch, ctx, run); });
		}
		completeStatement(ctx, thenReturns && elseReturns);
		break;
	}
	case "while":
		visit(stmt.condition);
		analyzeLoopBody(stmt.body, ctx, run);
		break;
	case "foreach":
		visit(stmt.collection);
		analyzeLoopBody(stmt.body, ctx, run);
		break;
	case "return":
		if (!checkReturn(ctx, stmt.position, log)) break;
		if (stmt.expr !== undefined) visit(stmt.expr);
		addReturnType(ctx, stmt.expr?.type ?? nilType, run.relations);
		markReturns(ctx);
		break;
	case "break":
	case "continue":
		if (checkBreakOrContinue(ctx, stmt.kind, stmt.position, log)) markTerminates(ctx);
		break;
	case "abort":
	case "retry":
		if (checkAbortOrRetry(ctx, stmt.kind, stmt.position, log)) markTerminates(ctx);
		break;
	case "panic":
		visit(stmt.expr);
		markReturns(ctx);
		break;
	case "forever":
		markTerminates(ctx);
		break;
	case "transaction":
		analyzeTransaction(stmt, ctx, run);
		break;
	case "lock":
		// The lock body shares the enclosing block's statement list.
		for (const inner of stmt.body.statements) analyzeStatement(inner, ctx, run);
		break;
	case "match":
		analyzeMatchStatement(stmt, ctx, run);
		break;
	case "workerSend":
		analyzeWorkerSend(stmt, ctx, run);
		break;
	case "worker":
		analyzeWorker(stmt, ctx, run);
		break;
	case "fork":
		for (const worker of stmt.workers) analyzeWorker(worker, ctx, run);
		break;
	default:
		exhaustive(stmt);
	}
}

//==============================================================================
// Compound Statements
//==============================================================================

/** Loop bodies may run zero times, so a loop never returns. */
function analyzeLoopBody(body: BlockStmt, ctx: AnalysisContext, run: RunState): void {
	enterLoop(ctx);
	branch(body, ctx, run);
	leaveLoop(ctx);
	completeStatement(ctx, false);
}

function analyzeTransaction(stmt: TransactionStmt, ctx: AnalysisContext, run: RunState): void {
	if (ctx.handler !== undefined) {
		run.log.report(stmt.position, DiagnosticCodes.TransactionInsideHandler);
		return;
	}
	if (stmt.retryCount !== undefined) analyzeExpr(stmt.retryCount, ctx, run, [stmt]);

	enterTransaction(ctx, stmt.position, run.log);
	const bodyReturns = branch(stmt.body, ctx, run);
	leaveTransaction(ctx);

	const handlers: [HandlerKind, BlockStmt | undefined][] = [
		["onRetry", stmt.onRetry],
		["aborted", stmt.aborted],
		["committed", stmt.committed],
	];
	for (const [kind, block] of handlers) {
		if (block === undefined) continue;
		const saved: HandlerKind | undefined = ctx.handler;
		ctx.handler = kind;
		branch(block, ctx, run);
		ctx.handler = saved;
	}
	completeStatement(ctx, bodyReturns);
}

function analyzeMatchStatement(stmt: MatchStmt, ctx: AnalysisContext, run: RunState): void {
	analyzeExpr(stmt.expr, ctx, run, [stmt]);
	const analysis = analyzeMatch(stmt.expr.type, stmt.clauses, {
		relations: run.relations,
		position: stmt.position,
		implicitDefaultType: stmt.implicitDefaultType,
		log: run.log,
	});

	let allReturn = stmt.clauses.length > 0;
	for (const verdict of analysis.verdicts) {
		run.annotations.matchClauses.set(verdict.clause, verdict);
		const { clause } = verdict;
		if (clause.kind === "structuredClause" && clause.guard !== undefined) {
			analyzeExpr(clause.guard, ctx, run, [stmt]);
		}
		const clauseReturns = branch(clause.body, ctx, run);
		if (verdict.reachable && !clauseReturns) allReturn = false;
	}
	completeStatement(ctx, analysis.exhaustive && allReturn);
}

//==============================================================================
// Statement Checks
//==============================================================================

const STATEMENT_EXPRESSION_KINDS: ReadonlySet<Expression["kind"]> = new Set([
	"invocation",
	"wait",
	"workerReceive",
	"workerSyncSend",
	"workerFlush",
]);

function checkExpressionStatement(stmt: ExpressionStmt, run: RunState): void {
	let expr = stmt.expr;
	while (expr.kind === "checked" || expr.kind === "matchExpression") {
		expr = expr.expr;
	}
	if (STATEMENT_EXPRESSION_KINDS.has(expr.kind)) return;
	if (expr.type.kind === "nil") {
		run.log.report(stmt.position, DiagnosticCodes.InvalidExpressionStatement);
	}
}

/**
 * Endpoints are declared at the start of a function body, before any other
 * statement.
 */
function checkEndpointDeclaration(stmt: VariableDefStmt, ctx: AnalysisContext, run: RunState): void {
	if (!hasFlag(stmt.variable.symbol, "endpoint")) return;
	const block = ctx.currentBlock;
	if (ctx.invokableKind !== "function" || block === undefined || block !== ctx.body) {
		run.log.report(stmt.position, DiagnosticCodes.InvalidEndpointDeclaration);
		return;
	}
	for (const sibling of block.statements) {
		if (sibling === stmt) return;
		if (sibling.kind !== "variableDef" || !hasFlag(sibling.variable.symbol, "endpoint")) {
			run.log.report(stmt.position, DiagnosticCodes.InvalidEndpointDeclaration);
			return;
		}
	}
}
