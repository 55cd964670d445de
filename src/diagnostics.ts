// SPDX-License-Identifier: MIT
// Corvid Diagnostics
// Diagnostic codes, severities and the log the analyzer reports into

import { formatDiagnosticMessage } from "./validation/error-messages.js";
import type { Position } from "./zod-schemas.js";

//==============================================================================
// Diagnostic Codes
//==============================================================================

export const DiagnosticCodes = {
	// Reachability
	UnreachableCode: "UnreachableCode",
	MustReturn: "MustReturn",
	InvalidExpressionStatement: "InvalidExpressionStatement",

	// Exit legality
	LoopExitOutsideLoop: "LoopExitOutsideLoop",
	BreakContinueCrossesTransaction: "BreakContinueCrossesTransaction",
	ReturnCrossesTransaction: "ReturnCrossesTransaction",
	AbortRetryOutsideTransaction: "AbortRetryOutsideTransaction",
	NestedTransactionsInvalid: "NestedTransactionsInvalid",
	TransactionInsideHandler: "TransactionInsideHandler",

	// Worker interaction
	UndefinedWorker: "UndefinedWorker",
	InvalidWorkerSendPosition: "InvalidWorkerSendPosition",
	InvalidWorkerReceivePosition: "InvalidWorkerReceivePosition",
	InvalidWorkerFlush: "InvalidWorkerFlush",
	InvalidWorkerInteraction: "InvalidWorkerInteraction",
	WorkerSendAfterReturn: "WorkerSendAfterReturn",
	WorkerReceiveAfterReturn: "WorkerReceiveAfterReturn",
	InvalidTypeForSend: "InvalidTypeForSend",
	IncompatibleWorkerTypes: "IncompatibleWorkerTypes",
	InvalidActionInvocationAsExpr: "InvalidActionInvocationAsExpr",

	// Match analysis
	NoMatchingPattern: "NoMatchingPattern",
	DuplicateDefaultPattern: "DuplicateDefaultPattern",
	UnreachableMatchPattern: "UnreachableMatchPattern",
	PatternAlwaysMatches: "PatternAlwaysMatches",
	UnmatchedPattern: "UnmatchedPattern",

	// Visibility and miscellaneous
	AttemptExposeNonPublicSymbol: "AttemptExposeNonPublicSymbol",
	AttemptReferNonAccessibleSymbol: "AttemptReferNonAccessibleSymbol",
	UninitializedVariable: "UninitializedVariable",
	DuplicateKeyInRecordLiteral: "DuplicateKeyInRecordLiteral",
	DuplicateNamedArgs: "DuplicateNamedArgs",
	ArrayIndexOutOfRange: "ArrayIndexOutOfRange",
	MainShouldBePublic: "MainShouldBePublic",
	ClientHasNoRemoteFunction: "ClientHasNoRemoteFunction",
	DeprecatedFunctionUsage: "DeprecatedFunctionUsage",
	CheckedExprNoErrorReturn: "CheckedExprNoErrorReturn",
	UnnecessaryCondition: "UnnecessaryCondition",
	IncompatibleTypeCheck: "IncompatibleTypeCheck",
	OperatorNotSupported: "OperatorNotSupported",
	StreamInitNotAllowedHere: "StreamInitNotAllowedHere",
	InvalidEndpointDeclaration: "InvalidEndpointDeclaration",
} as const;

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes];

export type Severity = "error" | "warning";

const WARNING_CODES: ReadonlySet<DiagnosticCode> = new Set([
	DiagnosticCodes.PatternAlwaysMatches,
	DiagnosticCodes.DeprecatedFunctionUsage,
]);

export function defaultSeverity(code: DiagnosticCode): Severity {
	return WARNING_CODES.has(code) ? "warning" : "error";
}

//==============================================================================
// Diagnostic Records
//==============================================================================

export type DiagnosticArg = string | number;

export interface Diagnostic {
	position: Position;
	code: DiagnosticCode;
	severity: Severity;
	args: DiagnosticArg[];
	message: string;
}

/** External consumer of diagnostics, e.g. a compiler driver's log. */
export interface DiagnosticSink {
	add(diagnostic: Diagnostic): void;
}

export interface DiagnosticLogOptions {
	warningsAsErrors?: boolean;
	sink?: DiagnosticSink | undefined;
}

//==============================================================================
// Diagnostic Log
//==============================================================================

/**
 * Ordered, append-only diagnostic list. Every entry is forwarded to the
 * optional external sink as it is recorded.
 */
export class DiagnosticLog implements DiagnosticSink {
	private readonly entries: Diagnostic[] = [];
	private readonly warningsAsErrors: boolean;
	private readonly sink: DiagnosticSink | undefined;

	constructor(options: DiagnosticLogOptions = {}) {
		this.warningsAsErrors = options.warningsAsErrors ?? false;
		this.sink = options.sink;
	}

	/** Record a diagnostic with the default severity of its code. */
	report(position: Position, code: DiagnosticCode, ...args: DiagnosticArg[]): void {
		let severity = defaultSeverity(code);
		if (severity === "warning" && this.warningsAsErrors) severity = "error";
		this.add({
			position,
			code,
			severity,
			args,
			message: formatDiagnosticMessage(code, args),
		});
	}

	add(diagnostic: Diagnostic): void {
		this.entries.push(diagnostic);
		this.sink?.add(diagnostic);
	}

	get diagnostics(): readonly Diagnostic[] {
		return this.entries;
	}

	get errorCount(): number {
		return this.entries.filter(d => d.severity === "error").length;
	}

	get warningCount(): number {
		return this.entries.filter(d => d.severity === "warning").length;
	}

	hasErrors(): boolean {
		return this.errorCount > 0;
	}
}
