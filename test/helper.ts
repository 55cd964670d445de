// SPDX-License-Identifier: MIT
// Corvid typed-AST builders for tests

import type { Diagnostic } from "../src/diagnostics.js";
import { booleanType, intType, nilType } from "../src/types.js";
import type {
	BindingPattern,
	BlockStmt,
	Expression,
	FunctionDecl,
	InvocationExpr,
	LiteralValue,
	MatchClause,
	Position,
	Program,
	Statement,
	StaticMatchClause,
	StructuredMatchClause,
	SymbolFlag,
	SymbolInfo,
	TopLevelNode,
	Type,
	VariableDecl,
	WorkerDecl,
	WorkerReceiveExpr,
	WorkerSendStmt,
} from "../src/zod-schemas.js";

export const MODULE = "app";

export const at = (line: number, column = 1): Position => ({ line, column });

export const sym = (name: string, flags: SymbolFlag[] = [], module = MODULE): SymbolInfo => ({ name, module, flags });

//==============================================================================
// Expressions
//==============================================================================

export const lit = (value: LiteralValue, type: Type = intType, line = 1): Expression => ({
	kind: "literal", position: at(line), type, value,
});

export const ref = (name: string, type: Type = intType, line = 1): Expression => ({
	kind: "varRef", position: at(line), type, name,
});

export const cond = (line = 1): Expression => ref("c", booleanType, line);

export const call = (
	name: string,
	type: Type = nilType,
	line = 1,
	extra: Partial<Omit<InvocationExpr, "kind" | "name" | "type" | "position">> = {},
): Expression => ({
	kind: "invocation", position: at(line), type, name, args: [], ...extra,
});

export const receive = (source: string, type: Type = intType, line = 1): WorkerReceiveExpr => ({
	kind: "workerReceive", position: at(line), type, source,
});

//==============================================================================
// Statements
//==============================================================================

export const block = (...statements: Statement[]): BlockStmt => ({
	kind: "block", position: at(statements[0]?.position.line ?? 1), statements,
});

export const ret = (expr?: Expression, line = 1): Statement => ({
	kind: "return", position: at(line), ...(expr !== undefined ? { expr } : {}),
});

export const exprStmt = (expr: Expression, line = 1): Statement => ({
	kind: "expressionStmt", position: at(line), expr,
});

export const variable = (name: string, type: Type, expr?: Expression, line = 1, symbol?: SymbolInfo): VariableDecl => ({
	kind: "variable",
	position: at(line),
	name,
	type,
	...(expr !== undefined ? { expr } : {}),
	...(symbol !== undefined ? { symbol } : {}),
});

export const varDef = (name: string, type: Type, expr?: Expression, line = 1): Statement => ({
	kind: "variableDef", position: at(line), variable: variable(name, type, expr, line),
});

export const assign = (target: Expression, expr: Expression, line = 1): Statement => ({
	kind: "assignment", position: at(line), target, expr,
});

export const ifStmt = (condition: Expression, then: BlockStmt, otherwise?: BlockStmt, line = 1): Statement => ({
	kind: "if", position: at(line), condition, then, ...(otherwise !== undefined ? { else: otherwise } : {}),
});

export const whileStmt = (body: BlockStmt, line = 1): Statement => ({
	kind: "while", position: at(line), condition: cond(line), body,
});

export const brk = (line = 1): Statement => ({ kind: "break", position: at(line) });

export const cont = (line = 1): Statement => ({ kind: "continue", position: at(line) });

export const transaction = (body: BlockStmt, line = 1, handlers: { onRetry?: BlockStmt; aborted?: BlockStmt; committed?: BlockStmt } = {}): Statement => ({
	kind: "transaction", position: at(line), body, ...handlers,
});

export const send = (expr: Expression, target: string, line = 1): WorkerSendStmt => ({
	kind: "workerSend", position: at(line), target, expr,
});

export const worker = (name: string, body: BlockStmt, line = 1, returnType: Type = nilType): WorkerDecl => ({
	kind: "worker", position: at(line), name, returnType, body,
});

export const match = (expr: Expression, clauses: MatchClause[], line = 1): Statement => ({
	kind: "match", position: at(line), expr, clauses,
});

export const staticClause = (pattern: Expression, body: BlockStmt = block()): StaticMatchClause => ({
	kind: "staticClause", position: pattern.position, pattern, body,
});

export const varBinding = (name: string, type: Type, line = 1): BindingPattern => ({
	kind: "variableBinding", position: at(line), name, type,
});

export const structuredClause = (binding: BindingPattern, body: BlockStmt = block(), guard?: Expression): StructuredMatchClause => ({
	kind: "structuredClause",
	position: binding.position,
	binding,
	body,
	...(guard !== undefined ? { guard } : {}),
});

//==============================================================================
// Declarations
//==============================================================================

export interface FnOptions {
	params?: VariableDecl[];
	flags?: SymbolFlag[];
	line?: number;
	bodyless?: boolean;
}

export const fn = (name: string, returnType: Type, body: BlockStmt, options: FnOptions = {}): FunctionDecl => ({
	kind: "function",
	position: at(options.line ?? 1),
	name,
	params: options.params ?? [],
	returnType,
	...(options.bodyless ? {} : { body }),
	symbol: sym(name, options.flags ?? []),
});

export const program = (...declarations: TopLevelNode[]): Program => ({
	version: "1.0.0",
	module: MODULE,
	declarations,
});

/** A program holding one nil-returning function `f` with the given body. */
export const programOf = (...statements: Statement[]): Program =>
	program(fn("f", nilType, block(...statements)));

//==============================================================================
// Assertion Helpers
//==============================================================================

/** `code@line` for each diagnostic, in report order. */
export function summarize(diagnostics: readonly Diagnostic[]): string[] {
	return diagnostics.map(d => `${d.code}@${String(d.position.line)}`);
}
