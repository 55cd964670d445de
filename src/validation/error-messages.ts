// SPDX-License-Identifier: MIT
// Diagnostic Message Formatting
//
// Renders diagnostic codes and their arguments into readable messages and
// single-line reports for terminals and editors.

import type { Diagnostic, DiagnosticArg, DiagnosticCode } from "../diagnostics.js";
import type { ValidationError } from "../errors.js";

type MessageTemplate = (arg: (index: number) => string) => string;

//==============================================================================
// Message Templates
//==============================================================================

const MESSAGES: Record<DiagnosticCode, MessageTemplate> = {
	UnreachableCode: () => "unreachable code",
	MustReturn: a => `this ${a(0)} must return a result`,
	InvalidExpressionStatement: () => "expression is not allowed as a statement",

	LoopExitOutsideLoop: a => `${a(0)} cannot be used outside of a loop`,
	BreakContinueCrossesTransaction: a => `${a(0)} cannot be used to exit a transaction`,
	ReturnCrossesTransaction: () => "return cannot be used to exit a transaction",
	AbortRetryOutsideTransaction: a => `${a(0)} cannot be used outside of a transaction block`,
	NestedTransactionsInvalid: () => "transactions cannot be nested",
	TransactionInsideHandler: () => "transaction statement cannot be used within a transaction handler",

	UndefinedWorker: a => `undefined worker '${a(0)}'`,
	InvalidWorkerSendPosition: () => "invalid worker send position, must be a top level statement of the worker",
	InvalidWorkerReceivePosition: () => "invalid worker receive position, must be a top level statement of the worker",
	InvalidWorkerFlush: a => a(0) === "*"
		? `invalid flush: worker '${a(1)}' does not send any message`
		: `invalid flush: worker '${a(1)}' does not send any message to '${a(0)}'`,
	InvalidWorkerInteraction: a => `invalid worker interaction, pending actions: ${a(0)}`,
	WorkerSendAfterReturn: () => "worker send cannot follow a return of a non-error value",
	WorkerReceiveAfterReturn: () => "worker receive cannot follow a return of a non-error value",
	InvalidTypeForSend: a => `invalid type for worker send '${a(0)}', expected anydata`,
	IncompatibleWorkerTypes: a => `incompatible types: expected '${a(0)}', found '${a(1)}'`,
	InvalidActionInvocationAsExpr: () => "action invocation as an expression is not allowed here",

	NoMatchingPattern: a => `no matching pattern for type '${a(0)}'`,
	DuplicateDefaultPattern: () => "match statement has more than one default pattern",
	UnreachableMatchPattern: () => "unreachable pattern",
	PatternAlwaysMatches: () => "pattern will always be matched",
	UnmatchedPattern: () => "pattern will not be matched",

	AttemptExposeNonPublicSymbol: a => `attempt to expose non-public symbol '${a(0)}'`,
	AttemptReferNonAccessibleSymbol: a => `attempt to refer to non-accessible symbol '${a(0)}'`,
	UninitializedVariable: a => `variable '${a(0)}' is not initialized`,
	DuplicateKeyInRecordLiteral: a => `invalid usage of ${a(0)} literal: duplicate key '${a(1)}'`,
	DuplicateNamedArgs: a => `redeclared argument '${a(0)}'`,
	ArrayIndexOutOfRange: a => `array index out of range: index '${a(0)}', size '${a(1)}'`,
	MainShouldBePublic: a => `the '${a(0)}' function should be public`,
	ClientHasNoRemoteFunction: () => "a client object requires at least one remote function",
	DeprecatedFunctionUsage: a => `usage of deprecated function '${a(0)}'`,
	CheckedExprNoErrorReturn: () => "invalid usage of 'check': the enclosing invokable has no error return type",
	UnnecessaryCondition: () => "unnecessary condition: expression will always evaluate to 'true'",
	IncompatibleTypeCheck: a => `incompatible types: '${a(0)}' will not be matched to '${a(1)}'`,
	OperatorNotSupported: a => `operator '${a(0)}' not defined for '${a(1)}'`,
	StreamInitNotAllowedHere: () => "stream initialization is only allowed in a variable definition or an assignment",
	InvalidEndpointDeclaration: () => "endpoint declarations are only allowed at the start of a function body",
};

//==============================================================================
// Formatting
//==============================================================================

/**
 * Render the message of a diagnostic code. Missing arguments render as `?`.
 */
export function formatDiagnosticMessage(
	code: DiagnosticCode,
	args: readonly DiagnosticArg[],
): string {
	const arg = (index: number): string => {
		const value = args[index];
		return value === undefined ? "?" : String(value);
	};
	return MESSAGES[code](arg);
}

/**
 * Format a diagnostic as `file:line:col: severity [Code] message`.
 */
export function formatDiagnostic(diagnostic: Diagnostic, file?: string): string {
	const { position } = diagnostic;
	const location = file ?? position.source ?? "<input>";
	return `${location}:${String(position.line)}:${String(position.column)}: ` +
		`${diagnostic.severity} [${diagnostic.code}] ${diagnostic.message}`;
}

/**
 * Format an input validation error, optionally prefixed with its file.
 */
export function formatValidationError(error: ValidationError, file?: string): string {
	const prefix = file !== undefined ? file + ": " : "";
	return `${prefix}invalid input at ${error.path}: ${error.message}`;
}
