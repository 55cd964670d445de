// SPDX-License-Identifier: MIT
// Analysis context - per-invokable traversal state and per-run shared state

import type { DiagnosticLog } from "../diagnostics.js";
import type { ClauseVerdict } from "../match-analyzer.js";
import type { TypeRelations } from "../type-relations.js";
import type {
	BlockStmt,
	Expression,
	MatchClause,
	MatchExprClause,
	Statement,
	Type,
	VariableDecl,
	WorkerFlushExpr,
	WorkerReceiveExpr,
	WorkerSendStmt,
	WorkerSyncSendExpr,
} from "../zod-schemas.js";
import type { InvokableNode, WorkerActionSystem } from "../worker-validator.js";

//==============================================================================
// Exit Scopes
//==============================================================================

export type ExitScopeKind = "function" | "loop" | "transaction";

export interface ExitScope {
	kind: ExitScopeKind;
}

export type HandlerKind = "onRetry" | "aborted" | "committed";

export type InvokableKind = "function" | "worker" | "lambda";

//==============================================================================
// Analysis Context
//==============================================================================

/**
 * Mutable state of one function, lambda or worker body. Nested bodies get a
 * fresh context; workers share the enclosing invokable's worker system.
 */
export interface AnalysisContext {
	invokable: InvokableNode;
	invokableKind: InvokableKind;
	returnType: Type;
	/** Top-level body block of the invokable. */
	body: BlockStmt | undefined;
	/** Block whose statement list is being walked. */
	currentBlock: BlockStmt | undefined;
	loopDepth: number;
	transactionDepth: number;
	/** Whether the next statement can execute. */
	reachable: boolean;
	/** Whether the invokable definitely returned on every path so far. */
	returns: boolean;
	exitScopes: ExitScope[];
	/** Types returned so far, insertion-ordered and deduplicated. */
	returnTypes: Type[];
	handler: HandlerKind | undefined;
	system: WorkerActionSystem;
}

export function createContext(
	invokable: InvokableNode,
	invokableKind: InvokableKind,
	system: WorkerActionSystem,
): AnalysisContext {
	return {
		invokable,
		invokableKind,
		returnType: invokable.returnType,
		body: invokable.body,
		currentBlock: undefined,
		loopDepth: 0,
		transactionDepth: 0,
		reachable: true,
		returns: false,
		exitScopes: [{ kind: "function" }],
		returnTypes: [],
		handler: undefined,
		system,
	};
}

export function addReturnType(ctx: AnalysisContext, t: Type, relations: TypeRelations): void {
	if (!ctx.returnTypes.some(existing => relations.isSameType(existing, t))) {
		ctx.returnTypes.push(t);
	}
}

//==============================================================================
// Per-run State
//==============================================================================

/** Node types a visited expression can have as ancestors. */
export type AncestorNode = Statement | Expression | VariableDecl;

/** Side tables written during analysis; the AST itself is never mutated. */
export interface AnalysisAnnotations {
	/** Accumulated type of each async send. */
	sendTypes: Map<WorkerSendStmt, Type>;
	/** Error returns accumulated at each receive, unioned with nil. */
	receiveErrorTypes: Map<WorkerReceiveExpr, Type>;
	/** Implicit type of each paired receive. */
	receiveTypes: Map<WorkerReceiveExpr, Type>;
	/** Channel names each invokable takes part in. */
	channels: Map<InvokableNode, string[]>;
	/** Sends each flush waits for. */
	flushSends: Map<WorkerFlushExpr, (WorkerSendStmt | WorkerSyncSendExpr)[]>;
	matchClauses: Map<MatchClause, ClauseVerdict<MatchClause>>;
	matchExprClauses: Map<MatchExprClause, ClauseVerdict<MatchExprClause>>;
}

export function emptyAnnotations(): AnalysisAnnotations {
	return {
		sendTypes: new Map(),
		receiveErrorTypes: new Map(),
		receiveTypes: new Map(),
		channels: new Map(),
		flushSends: new Map(),
		matchClauses: new Map(),
		matchExprClauses: new Map(),
	};
}

export interface ResolvedOptions {
	defaultWorkerName: string;
	mainFunctionName: string;
	verbose: boolean;
}

/** State shared by every context of one analyzer run. */
export interface RunState {
	module: string;
	log: DiagnosticLog;
	relations: TypeRelations;
	options: ResolvedOptions;
	annotations: AnalysisAnnotations;
}
