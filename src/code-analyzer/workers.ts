// SPDX-License-Identifier: MIT
// Worker actions - recording sends, receives and flushes into the worker system

import { DiagnosticCodes } from "../diagnostics.js";
import { isErrorType, nilType, typeToString, unionType } from "../types.js";
import { validateWorkerInteractions, type WorkerActionSystem } from "../worker-validator.js";
import type {
	BlockStmt,
	Position,
	Statement,
	Type,
	WorkerFlushExpr,
	WorkerReceiveExpr,
	WorkerSendStmt,
	WorkerSyncSendExpr,
} from "../zod-schemas.js";
import type { AnalysisContext, AncestorNode, RunState } from "./context.js";
import { analyzeExpr } from "./expressions.js";

//==============================================================================
// Worker Declarations
//==============================================================================

/** Child blocks of a statement that can hold worker declarations. */
function nestedBlocks(stmt: Statement): BlockStmt[] {
	switch (stmt.kind) {
	case "block":
		return [stmt];
	case "if": {
		const blocks = [stmt.then];
		if (stmt.else?.kind === "block") blocks.push(stmt.else);
		else if (stmt.else !== undefined) blocks.push(...nestedBlocks(stmt.else));
		return blocks;
	}
	case "while":
	case "foreach":
	case "lock":
		return [stmt.body];
	case "transaction":
		return [stmt.body, stmt.onRetry, stmt.aborted, stmt.committed].filter((b): b is BlockStmt => b !== undefined);
	case "match":
		return stmt.clauses.map(c => c.body);
	default:
		return [];
	}
}

/**
 * Declare every worker of an invokable body before the body is walked, so
 * that a send may name a worker declared after it.
 */
export function declareWorkers(block: BlockStmt, system: WorkerActionSystem): void {
	for (const stmt of block.statements) {
		if (stmt.kind === "worker") {
			system.declare(stmt.name);
		} else if (stmt.kind === "fork") {
			for (const w of stmt.workers) system.declare(w.name);
		} else {
			for (const nested of nestedBlocks(stmt)) declareWorkers(nested, system);
		}
	}
}

/** Run the pairing simulation of a completed system and store its results. */
export function finishSystem(system: WorkerActionSystem, label: string, run: RunState): void {
	if (system.erroneous) {
		if (run.options.verbose) {
			console.warn(`[CodeAnalyzer] Skipping worker validation of ${label}: erroneous worker actions`);
		}
		return;
	}
	const result = validateWorkerInteractions(system, run.relations, run.log, { verbose: run.options.verbose });
	for (const [owner, names] of result.channels) {
		const existing = run.annotations.channels.get(owner);
		if (existing === undefined) run.annotations.channels.set(owner, names);
		else existing.push(...names.filter(n => !existing.includes(n)));
	}
	for (const [receive, t] of result.receiveTypes) {
		run.annotations.receiveTypes.set(receive, t);
	}
}

//==============================================================================
// Position and Existence
//==============================================================================

/** The statement being walked sits directly in the invokable's body. */
function isTopLevel(ctx: AnalysisContext): boolean {
	return ctx.body !== undefined && ctx.currentBlock === ctx.body;
}

function actionAllowedHere(ctx: AnalysisContext, peer: string, run: RunState): boolean {
	const toDefault = peer === run.options.defaultWorkerName && ctx.invokableKind === "worker";
	return toDefault || isTopLevel(ctx);
}

function workerExists(ctx: AnalysisContext, peer: string, workerType: Type | undefined, run: RunState): boolean {
	if (peer === run.options.defaultWorkerName && ctx.invokableKind === "worker") return true;
	if (workerType !== undefined) {
		if (workerType.kind === "semanticError") return false;
		return workerType.kind === "future" && workerType.workerDerivative === true;
	}
	return ctx.system.isDeclared(peer);
}

/**
 * Sync sends and receives may only appear as the whole right-hand side of a
 * statement, optionally wrapped in `check`, `trap`, a match expression or a
 * braced tuple. An elvis is passed through only when its left side is an
 * action invocation.
 */
function checkActionContext(ancestors: readonly AncestorNode[], position: Position, run: RunState): void {
	for (let i = ancestors.length - 1; i >= 0; i--) {
		const parent = ancestors[i];
		if (parent === undefined) break;
		switch (parent.kind) {
		case "assignment":
		case "expressionStmt":
		case "destructure":
		case "variable":
			return;
		case "checked":
		case "trap":
		case "tupleLiteral":
		case "matchExpression":
			continue;
		case "elvis":
			if (parent.lhs.kind === "invocation" && parent.lhs.actionInvocation === true) continue;
			break;
		default:
			break;
		}
		break;
	}
	run.log.report(position, DiagnosticCodes.InvalidActionInvocationAsExpr);
}

/** Split the accumulated return types into error returns and the rest. */
function partitionReturns(ctx: AnalysisContext): { errors: Type[]; others: Type[] } {
	const errors: Type[] = [];
	const others: Type[] = [];
	for (const t of ctx.returnTypes) {
		(isErrorType(t) ? errors : others).push(t);
	}
	return { errors, others };
}

//==============================================================================
// Actions
//==============================================================================

export function analyzeWorkerSend(stmt: WorkerSendStmt, ctx: AnalysisContext, run: RunState): void {
	const { log, relations } = run;
	const ancestors: AncestorNode[] = [stmt];
	if (stmt.isChannel) {
		analyzeExpr(stmt.expr, ctx, run, ancestors);
		if (stmt.key !== undefined) analyzeExpr(stmt.key, ctx, run, ancestors);
		return;
	}

	const valueType = stmt.expr.type;
	if (valueType.kind === "semanticError") {
		ctx.system.markErroneous();
	} else if (!relations.isAssignable(valueType, { kind: "anydata" })) {
		log.report(stmt.expr.position, DiagnosticCodes.InvalidTypeForSend, typeToString(valueType));
	}
	if (!actionAllowedHere(ctx, stmt.target, run)) {
		log.report(stmt.position, DiagnosticCodes.InvalidWorkerSendPosition);
		ctx.system.markErroneous();
	}
	if (!workerExists(ctx, stmt.target, stmt.workerType, run)) {
		log.report(stmt.position, DiagnosticCodes.UndefinedWorker, stmt.target);
		ctx.system.markErroneous();
	}

	const { errors, others } = partitionReturns(ctx);
	for (const t of others) {
		log.report(stmt.position, DiagnosticCodes.WorkerSendAfterReturn, typeToString(t));
	}
	const sendType = errors.length > 0 ? unionType([...errors, valueType]) : valueType;
	ctx.system.addAction({ kind: "send", target: stmt.target, valueType: sendType, node: stmt });
	run.annotations.sendTypes.set(stmt, sendType);
	analyzeExpr(stmt.expr, ctx, run, ancestors);
}

export function analyzeWorkerSyncSend(
	expr: WorkerSyncSendExpr,
	ctx: AnalysisContext,
	run: RunState,
	ancestors: readonly AncestorNode[],
): void {
	checkActionContext(ancestors, expr.position, run);
	if (!actionAllowedHere(ctx, expr.target, run)) {
		run.log.report(expr.position, DiagnosticCodes.InvalidWorkerSendPosition);
		ctx.system.markErroneous();
	}
	if (!workerExists(ctx, expr.target, expr.workerType, run)) {
		run.log.report(expr.position, DiagnosticCodes.UndefinedWorker, expr.target);
		ctx.system.markErroneous();
	}
	ctx.system.addAction({ kind: "syncSend", target: expr.target, valueType: expr.expr.type, node: expr });
	analyzeExpr(expr.expr, ctx, run, [...ancestors, expr]);
}

export function analyzeWorkerReceive(
	expr: WorkerReceiveExpr,
	ctx: AnalysisContext,
	run: RunState,
	ancestors: readonly AncestorNode[],
): void {
	checkActionContext(ancestors, expr.position, run);
	if (expr.isChannel) {
		if (expr.key !== undefined) analyzeExpr(expr.key, ctx, run, [...ancestors, expr]);
		return;
	}
	if (!actionAllowedHere(ctx, expr.source, run)) {
		run.log.report(expr.position, DiagnosticCodes.InvalidWorkerReceivePosition);
		ctx.system.markErroneous();
	}
	if (!workerExists(ctx, expr.source, expr.workerType, run)) {
		run.log.report(expr.position, DiagnosticCodes.UndefinedWorker, expr.source);
		ctx.system.markErroneous();
	}

	const { errors, others } = partitionReturns(ctx);
	for (const t of others) {
		run.log.report(expr.position, DiagnosticCodes.WorkerReceiveAfterReturn, typeToString(t));
	}
	const matchingSendsError = errors.length > 0 ? unionType([...errors, nilType], true) : nilType;
	run.annotations.receiveErrorTypes.set(expr, matchingSendsError);
	ctx.system.addAction({
		kind: "receive",
		source: expr.source,
		expectedType: expr.type,
		matchingSendsError,
		node: expr,
	});
}

export function analyzeWorkerFlush(expr: WorkerFlushExpr, ctx: AnalysisContext, run: RunState): void {
	const machine = ctx.system.current();
	const sends = machine.actions
		.filter(a => a.kind === "send" || a.kind === "syncSend")
		.filter(a => expr.target === undefined || a.target === expr.target)
		.map(a => a.node);
	if (sends.length === 0) {
		run.log.report(expr.position, DiagnosticCodes.InvalidWorkerFlush, expr.target ?? "*", machine.id);
		return;
	}
	run.annotations.flushSends.set(expr, sends);
}
