// SPDX-License-Identifier: MIT
// Corvid Worker Interaction Validator
// Pairs worker sends with receives across the workers of one invokable

import { type Diagnostic, DiagnosticCodes, DiagnosticLog } from "./diagnostics.js";
import { AnalyzerError } from "./errors.js";
import type { TypeRelations } from "./type-relations.js";
import { typeToString } from "./types.js";
import type {
	FunctionDecl,
	Position,
	Type,
	WorkerDecl,
	WorkerReceiveExpr,
	WorkerSendStmt,
	WorkerSyncSendExpr,
} from "./zod-schemas.js";

//==============================================================================
// Worker Actions
//==============================================================================

/** Function, method, lambda or worker whose body a machine records. */
export type InvokableNode = FunctionDecl | WorkerDecl;

export interface SendAction {
	kind: "send";
	target: string;
	/** Sent value unioned with the error returns accumulated at the send. */
	valueType: Type;
	node: WorkerSendStmt;
}

export interface SyncSendAction {
	kind: "syncSend";
	target: string;
	valueType: Type;
	node: WorkerSyncSendExpr;
}

export interface ReceiveAction {
	kind: "receive";
	source: string;
	expectedType: Type;
	/** Error returns accumulated at the receive, unioned with nil. */
	matchingSendsError: Type;
	node: WorkerReceiveExpr;
}

export type WorkerAction = SendAction | SyncSendAction | ReceiveAction;

export function describeAction(action: WorkerAction): string {
	switch (action.kind) {
	case "send":
		return typeToString(action.valueType) + " -> " + action.target;
	case "syncSend":
		return typeToString(action.valueType) + " ->> " + action.target;
	case "receive":
		return typeToString(action.expectedType) + " <- " + action.source;
	}
}

//==============================================================================
// Worker Machine
//==============================================================================

/**
 * Ordered send/receive actions of one worker body, with a cursor used by
 * the pairing simulation.
 */
export class WorkerMachine {
	readonly actions: WorkerAction[] = [];
	cursor = 0;
	erroneous = false;

	constructor(
		readonly id: string,
		readonly position: Position,
		readonly owner: InvokableNode,
	) {}

	done(): boolean {
		return this.cursor === this.actions.length;
	}

	current(): WorkerAction | undefined {
		return this.actions[this.cursor];
	}

	currentIsReceive(sourceId: string): ReceiveAction | undefined {
		const action = this.current();
		if (action?.kind === "receive" && action.source === sourceId) return action;
		return undefined;
	}

	next(): void {
		if (this.done()) throw AnalyzerError.invariant("worker " + this.id + " advanced past its last action");
		this.cursor++;
	}

	describe(): string {
		const action = this.current();
		return action === undefined ? "FINISHED" : describeAction(action);
	}
}

//==============================================================================
// Worker Action System
//==============================================================================

/**
 * Machines of one invokable. Machines are started when the traversal enters
 * a worker body and finished when it leaves it; only finished machines take
 * part in validation.
 */
export class WorkerActionSystem {
	readonly finished: WorkerMachine[] = [];
	private readonly inProgress: WorkerMachine[] = [];
	private readonly declared = new Set<string>();
	erroneous = false;

	start(id: string, position: Position, owner: InvokableNode): WorkerMachine {
		const machine = new WorkerMachine(id, position, owner);
		this.inProgress.push(machine);
		return machine;
	}

	end(): WorkerMachine {
		const machine = this.inProgress.pop();
		if (machine === undefined) throw AnalyzerError.invariant("no worker machine to finish");
		this.finished.push(machine);
		return machine;
	}

	current(): WorkerMachine {
		const machine = this.inProgress[this.inProgress.length - 1];
		if (machine === undefined) throw AnalyzerError.invariant("no worker machine in progress");
		return machine;
	}

	addAction(action: WorkerAction): void {
		this.current().actions.push(action);
	}

	/** Mark the current machine, and with it the whole system, erroneous. */
	markErroneous(): void {
		this.current().erroneous = true;
		this.erroneous = true;
	}

	declare(name: string): void {
		this.declared.add(name);
	}

	isDeclared(name: string): boolean {
		return this.declared.has(name);
	}

	find(id: string): WorkerMachine | undefined {
		return this.finished.find(m => m.id === id);
	}

	/** Look up a finished machine that must exist. */
	get(id: string): WorkerMachine {
		const machine = this.find(id);
		if (machine === undefined) throw AnalyzerError.unknownWorker(id);
		return machine;
	}

	everyoneDone(): boolean {
		return this.finished.every(m => m.done());
	}

	rootPosition(): Position | undefined {
		return this.finished[0]?.position;
	}

	/** Pending actions of every unfinished machine, as `id: action`. */
	pendingSummary(): string {
		return this.finished
			.filter(m => !m.done())
			.map(m => m.id + ": " + m.describe())
			.join(", ");
	}
}

//==============================================================================
// Validation
//==============================================================================

export interface WorkerValidationOptions {
	verbose?: boolean;
}

export interface WorkerValidationResult {
	diagnostics: Diagnostic[];
	/** Channel names per owning invokable, in pairing order. */
	channels: Map<InvokableNode, string[]>;
	/** Implicit type of each paired receive. */
	receiveTypes: Map<WorkerReceiveExpr, Type>;
	/** True when every machine consumed all of its actions. */
	finished: boolean;
	/** True when the system was erroneous and the simulation did not run. */
	skipped: boolean;
}

export function channelName(source: string, target: string): string {
	return source + "->" + target;
}

function addChannel(channels: Map<InvokableNode, string[]>, owner: InvokableNode, name: string): void {
	const list = channels.get(owner);
	if (list === undefined) {
		channels.set(owner, [name]);
	} else if (!list.includes(name)) {
		list.push(name);
	}
}

function checkSendPair(
	send: SendAction,
	receive: ReceiveAction,
	relations: TypeRelations,
	log: DiagnosticLog,
): void {
	if (!relations.isAssignable(send.valueType, receive.expectedType)) {
		log.report(
			receive.node.position,
			DiagnosticCodes.IncompatibleWorkerTypes,
			typeToString(receive.expectedType),
			typeToString(send.valueType),
		);
	}
}

function checkSyncSendPair(
	send: SyncSendAction,
	receive: ReceiveAction,
	relations: TypeRelations,
	log: DiagnosticLog,
): void {
	if (!relations.isAssignable(send.valueType, receive.expectedType)) {
		log.report(
			send.node.expr.position,
			DiagnosticCodes.IncompatibleWorkerTypes,
			typeToString(receive.expectedType),
			typeToString(send.valueType),
		);
	}
	if (!relations.isAssignable(receive.matchingSendsError, send.node.type)) {
		log.report(
			send.node.position,
			DiagnosticCodes.IncompatibleWorkerTypes,
			typeToString(send.node.type),
			typeToString(receive.matchingSendsError),
		);
	}
}

/**
 * Run the pairing simulation over the finished machines of a system.
 * Each full scan either advances at least one pair of cursors or ends the
 * loop; a system that stalls with unfinished machines gets exactly one
 * InvalidWorkerInteraction.
 */
export function validateWorkerInteractions(
	system: WorkerActionSystem,
	relations: TypeRelations,
	log: DiagnosticLog = new DiagnosticLog(),
	options: WorkerValidationOptions = {},
): WorkerValidationResult {
	const channels = new Map<InvokableNode, string[]>();
	const receiveTypes = new Map<WorkerReceiveExpr, Type>();
	if (system.erroneous) {
		return { diagnostics: [], channels, receiveTypes, finished: false, skipped: true };
	}
	const firstEntry = log.diagnostics.length;

	let progressed: boolean;
	do {
		progressed = false;
		for (const worker of system.finished) {
			const action = worker.current();
			if (action === undefined || action.kind === "receive") continue;
			const other = system.find(action.target);
			const receive = other?.currentIsReceive(worker.id);
			if (other === undefined || receive === undefined) continue;

			if (action.kind === "syncSend") {
				checkSyncSendPair(action, receive, relations, log);
			} else {
				checkSendPair(action, receive, relations, log);
			}
			if (receive.expectedType.kind !== "semanticError") {
				receiveTypes.set(receive.node, action.valueType);
			}
			other.next();
			worker.next();
			progressed = true;

			const name = channelName(worker.id, other.id);
			addChannel(channels, other.owner, name);
			addChannel(channels, worker.owner, name);
		}
	} while (progressed);

	const finished = system.everyoneDone();
	const root = system.rootPosition();
	if (!finished && root !== undefined) {
		const pending = system.pendingSummary();
		if (options.verbose) {
			console.warn(`[WorkerValidator] Worker system stalled: ${pending}`);
		}
		log.report(root, DiagnosticCodes.InvalidWorkerInteraction, pending);
	}

	return {
		diagnostics: log.diagnostics.slice(firstEntry),
		channels,
		receiveTypes,
		finished,
		skipped: false,
	};
}
