// SPDX-License-Identifier: MIT
// Corvid Zod Schemas
// Single source of truth for the typed AST handed over by the type checker.
//
// Type interfaces are defined manually (not via z.infer) because the AST is
// recursive: z.union typed as z.ZodType erases inferred types to `unknown`.
// We define the types explicitly and annotate recursive schemas with
// z.ZodType<ExplicitType>.

import { z } from "zod/v4";

//==============================================================================
// Positions and Symbols
//==============================================================================

export interface Position {
	line: number;
	column: number;
	source?: string | undefined;
}

export type SymbolFlag =
	| "public" | "native" | "deprecated" | "listener"
	| "endpoint" | "client" | "remote";

/** Resolved symbol, as recorded by the symbol table. */
export interface SymbolInfo {
	name: string;
	module: string;
	flags?: SymbolFlag[] | undefined;
}

//==============================================================================
// Type Domain - Manual Interfaces
//==============================================================================

export interface NilType { kind: "nil" }
export interface BooleanType { kind: "boolean" }
export interface IntType { kind: "int" }
export interface ByteType { kind: "byte" }
export interface FloatType { kind: "float" }
export interface DecimalType { kind: "decimal" }
export interface StringType { kind: "string" }
export interface AnyType { kind: "any" }
export interface AnydataType { kind: "anydata" }
export interface JsonType { kind: "json" }
/** Type of the `_` wildcard pattern. */
export interface NoneType { kind: "none" }
/** Sentinel for nodes the type checker already reported. */
export interface SemanticErrorType { kind: "semanticError" }
export interface ErrorType { kind: "error"; name?: string | undefined; symbol?: SymbolInfo | undefined }
export interface UnionType { kind: "union"; members: Type[]; nullable?: boolean | undefined }
export interface TupleType { kind: "tuple"; members: Type[] }
export interface ArrayType { kind: "array"; of: Type; size?: number | undefined; sealed?: boolean | undefined }
export interface MapType { kind: "map"; of: Type }
export interface RecordField { name: string; type: Type; optional?: boolean | undefined }
export interface RecordType {
	kind: "record";
	name?: string | undefined;
	fields: RecordField[];
	sealed: boolean;
	rest?: Type | undefined;
	symbol?: SymbolInfo | undefined;
}
export interface ObjectType {
	kind: "object";
	name: string;
	fields?: RecordField[] | undefined;
	symbol?: SymbolInfo | undefined;
}
export interface FutureType { kind: "future"; of: Type; workerDerivative?: boolean | undefined }
export type FiniteValue = string | number | boolean | null;
export interface FiniteType { kind: "finite"; values: FiniteValue[]; symbol?: SymbolInfo | undefined }
export interface StreamType { kind: "stream"; of: Type }
export interface FunctionType { kind: "function"; params: Type[]; returns: Type }

export type Type =
	| NilType | BooleanType | IntType | ByteType | FloatType | DecimalType
	| StringType | AnyType | AnydataType | JsonType | NoneType | SemanticErrorType
	| ErrorType | UnionType | TupleType | ArrayType | MapType | RecordType
	| ObjectType | FutureType | FiniteType | StreamType | FunctionType;

//==============================================================================
// Expression Domain - Manual Interfaces
//==============================================================================

export type LiteralValue = string | number | boolean | null;

interface ExprBase { position: Position; type: Type }

export interface LiteralExpr extends ExprBase { kind: "literal"; value: LiteralValue }
export interface VarRefExpr extends ExprBase { kind: "varRef"; name: string; symbol?: SymbolInfo | undefined }
export interface FieldAccessExpr extends ExprBase { kind: "fieldAccess"; expr: Expression; field: string }
export interface IndexAccessExpr extends ExprBase { kind: "indexAccess"; expr: Expression; index: Expression }
export interface NamedArgExpr extends ExprBase { kind: "namedArg"; name: string; expr: Expression }
export interface InvocationExpr extends ExprBase {
	kind: "invocation";
	name: string;
	expr?: Expression | undefined;
	args: Expression[];
	namedArgs?: NamedArgExpr[] | undefined;
	restArgs?: Expression[] | undefined;
	symbol?: SymbolInfo | undefined;
	actionInvocation?: boolean | undefined;
}
export interface RecordEntry { key: Expression; value: Expression }
export interface RecordLiteralExpr extends ExprBase { kind: "recordLiteral"; entries: RecordEntry[] }
export interface ListLiteralExpr extends ExprBase { kind: "listLiteral"; members: Expression[] }
export interface TupleLiteralExpr extends ExprBase { kind: "tupleLiteral"; members: Expression[] }
export interface BinaryExpr extends ExprBase { kind: "binary"; op: string; lhs: Expression; rhs: Expression }
export interface UnaryExpr extends ExprBase { kind: "unary"; op: string; expr: Expression }
export interface TernaryExpr extends ExprBase { kind: "ternary"; condition: Expression; then: Expression; else: Expression }
export interface ElvisExpr extends ExprBase { kind: "elvis"; lhs: Expression; rhs: Expression }
export interface LambdaExpr extends ExprBase { kind: "lambda"; function: FunctionDecl }
export interface TypeTestExpr extends ExprBase { kind: "typeTest"; expr: Expression; testType: Type }
export interface CheckedExpr extends ExprBase { kind: "checked"; expr: Expression }
export interface TrapExpr extends ExprBase { kind: "trap"; expr: Expression }
export interface WaitExpr extends ExprBase { kind: "wait"; expr: Expression }
export interface WaitForAllExpr extends ExprBase { kind: "waitForAll"; entries: Expression[] }
export interface WorkerReceiveExpr extends ExprBase {
	kind: "workerReceive";
	source: string;
	workerType?: Type | undefined;
	isChannel?: boolean | undefined;
	key?: Expression | undefined;
}
export interface WorkerSyncSendExpr extends ExprBase {
	kind: "workerSyncSend";
	target: string;
	expr: Expression;
	workerType?: Type | undefined;
}
export interface WorkerFlushExpr extends ExprBase { kind: "workerFlush"; target?: string | undefined }
export interface TypeInitExpr extends ExprBase { kind: "typeInit"; args: Expression[] }
export interface StringTemplateExpr extends ExprBase { kind: "stringTemplate"; exprs: Expression[] }
export interface TypeConversionExpr extends ExprBase { kind: "typeConversion"; expr: Expression }
export interface MatchExprClause { position: Position; variable: VariableDecl; expr: Expression }
export interface MatchExpression extends ExprBase { kind: "matchExpression"; expr: Expression; clauses: MatchExprClause[] }

export type Expression =
	| LiteralExpr | VarRefExpr | FieldAccessExpr | IndexAccessExpr | NamedArgExpr
	| InvocationExpr | RecordLiteralExpr | ListLiteralExpr | TupleLiteralExpr
	| BinaryExpr | UnaryExpr | TernaryExpr | ElvisExpr | LambdaExpr | TypeTestExpr
	| CheckedExpr | TrapExpr | WaitExpr | WaitForAllExpr | WorkerReceiveExpr
	| WorkerSyncSendExpr | WorkerFlushExpr | TypeInitExpr | StringTemplateExpr
	| TypeConversionExpr | MatchExpression;

//==============================================================================
// Match Patterns
//==============================================================================

export interface VariableBinding { kind: "variableBinding"; position: Position; name: string; type: Type }
export interface RecordBindingField { key: string; binding: BindingPattern }
export interface RecordBinding {
	kind: "recordBinding";
	position: Position;
	type: Type;
	fields: RecordBindingField[];
	closed: boolean;
}
export interface TupleBinding { kind: "tupleBinding"; position: Position; type: Type; members: BindingPattern[] }

export type BindingPattern = VariableBinding | RecordBinding | TupleBinding;

export interface StaticMatchClause { kind: "staticClause"; position: Position; pattern: Expression; body: BlockStmt }
export interface StructuredMatchClause {
	kind: "structuredClause";
	position: Position;
	binding: BindingPattern;
	guard?: Expression | undefined;
	body: BlockStmt;
}

export type MatchClause = StaticMatchClause | StructuredMatchClause;

//==============================================================================
// Statement Domain - Manual Interfaces
//==============================================================================

export interface BlockStmt { kind: "block"; position: Position; statements: Statement[] }
export interface VariableDefStmt { kind: "variableDef"; position: Position; variable: VariableDecl }
export interface AssignmentStmt { kind: "assignment"; position: Position; target: Expression; expr: Expression }
export interface CompoundAssignmentStmt {
	kind: "compoundAssignment";
	position: Position;
	op: string;
	target: Expression;
	expr: Expression;
}
export interface DestructureStmt {
	kind: "destructure";
	position: Position;
	pattern: "tuple" | "record" | "error";
	target: Expression;
	expr: Expression;
}
export interface ExpressionStmt { kind: "expressionStmt"; position: Position; expr: Expression }
export interface IfStmt {
	kind: "if";
	position: Position;
	condition: Expression;
	then: BlockStmt;
	else?: BlockStmt | IfStmt | undefined;
}
export interface WhileStmt { kind: "while"; position: Position; condition: Expression; body: BlockStmt }
export interface ForeachStmt {
	kind: "foreach";
	position: Position;
	variable: VariableDecl;
	collection: Expression;
	body: BlockStmt;
}
export interface ReturnStmt { kind: "return"; position: Position; expr?: Expression | undefined }
export interface BreakStmt { kind: "break"; position: Position }
export interface ContinueStmt { kind: "continue"; position: Position }
export interface PanicStmt { kind: "panic"; position: Position; expr: Expression }
export interface AbortStmt { kind: "abort"; position: Position }
export interface RetryStmt { kind: "retry"; position: Position }
export interface TransactionStmt {
	kind: "transaction";
	position: Position;
	body: BlockStmt;
	onRetry?: BlockStmt | undefined;
	aborted?: BlockStmt | undefined;
	committed?: BlockStmt | undefined;
	retryCount?: Expression | undefined;
}
export interface LockStmt { kind: "lock"; position: Position; body: BlockStmt }
export interface MatchStmt {
	kind: "match";
	position: Position;
	expr: Expression;
	clauses: MatchClause[];
	/** Type absorbed by the compiler-inserted default branch, if any. */
	implicitDefaultType?: Type | undefined;
}
export interface WorkerSendStmt {
	kind: "workerSend";
	position: Position;
	target: string;
	expr: Expression;
	workerType?: Type | undefined;
	isChannel?: boolean | undefined;
	key?: Expression | undefined;
}
export interface WorkerDecl {
	kind: "worker";
	position: Position;
	name: string;
	returnType: Type;
	body: BlockStmt;
}
export interface ForkJoinStmt { kind: "fork"; position: Position; workers: WorkerDecl[] }
export interface ForeverStmt { kind: "forever"; position: Position }

export type Statement =
	| BlockStmt | VariableDefStmt | AssignmentStmt | CompoundAssignmentStmt
	| DestructureStmt | ExpressionStmt | IfStmt | WhileStmt | ForeachStmt
	| ReturnStmt | BreakStmt | ContinueStmt | PanicStmt | AbortStmt | RetryStmt
	| TransactionStmt | LockStmt | MatchStmt | WorkerSendStmt | WorkerDecl
	| ForkJoinStmt | ForeverStmt;

//==============================================================================
// Declarations and Program
//==============================================================================

export interface VariableDecl {
	kind: "variable";
	position: Position;
	name: string;
	type: Type;
	expr?: Expression | undefined;
	symbol?: SymbolInfo | undefined;
}

export interface FunctionDecl {
	kind: "function";
	position: Position;
	name: string;
	params: VariableDecl[];
	returnType: Type;
	body?: BlockStmt | undefined;
	symbol?: SymbolInfo | undefined;
}

export interface TypeDefinition {
	kind: "typeDefinition";
	position: Position;
	name: string;
	type: Type;
	fields?: VariableDecl[] | undefined;
	methods?: FunctionDecl[] | undefined;
	symbol?: SymbolInfo | undefined;
}

export type TopLevelNode = FunctionDecl | TypeDefinition | VariableDecl;

export interface Program {
	version: string;
	module: string;
	declarations: TopLevelNode[];
}

//==============================================================================
// Zod Schemas - Positions and Symbols
//==============================================================================

/** Semantic version pattern */
const SemVer = z.string().regex(/^\d+\.\d+\.\d+(-[a-zA-Z0-9.]+)?$/);

export const PositionSchema: z.ZodType<Position> = z.object({
	line: z.number().int().nonnegative(),
	column: z.number().int().nonnegative(),
	source: z.string().optional(),
}).meta({ id: "Position", title: "Source Position", description: "Line and column of a node in its source file" });

export const SymbolFlagSchema = z.enum([
	"public", "native", "deprecated", "listener", "endpoint", "client", "remote",
]);

export const SymbolInfoSchema: z.ZodType<SymbolInfo> = z.object({
	name: z.string(),
	module: z.string(),
	flags: z.array(SymbolFlagSchema).optional(),
}).meta({ id: "SymbolInfo", title: "Symbol", description: "Resolved symbol with its owning module and flags" });

const FiniteValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

//==============================================================================
// Zod Schemas - Type Domain
//==============================================================================

const simpleType = <K extends string>(kind: K) => z.object({ kind: z.literal(kind) });

export const NilTypeSchema: z.ZodType<NilType> = simpleType("nil");
export const BooleanTypeSchema: z.ZodType<BooleanType> = simpleType("boolean");
export const IntTypeSchema: z.ZodType<IntType> = simpleType("int");
export const ByteTypeSchema: z.ZodType<ByteType> = simpleType("byte");
export const FloatTypeSchema: z.ZodType<FloatType> = simpleType("float");
export const DecimalTypeSchema: z.ZodType<DecimalType> = simpleType("decimal");
export const StringTypeSchema: z.ZodType<StringType> = simpleType("string");
export const AnyTypeSchema: z.ZodType<AnyType> = simpleType("any");
export const AnydataTypeSchema: z.ZodType<AnydataType> = simpleType("anydata");
export const JsonTypeSchema: z.ZodType<JsonType> = simpleType("json");
export const NoneTypeSchema: z.ZodType<NoneType> = simpleType("none");
export const SemanticErrorTypeSchema: z.ZodType<SemanticErrorType> = simpleType("semanticError");

export const ErrorTypeSchema: z.ZodType<ErrorType> = z.object({
	kind: z.literal("error"),
	name: z.string().optional(),
	symbol: SymbolInfoSchema.optional(),
});

export const UnionTypeSchema: z.ZodType<UnionType> = z.object({
	kind: z.literal("union"),
	get members() { return z.array(TypeSchema); },
	nullable: z.boolean().optional(),
}).meta({ id: "UnionType", title: "Union Type", description: "Value of any one of the member types" });

export const TupleTypeSchema: z.ZodType<TupleType> = z.object({
	kind: z.literal("tuple"),
	get members() { return z.array(TypeSchema); },
});

export const ArrayTypeSchema: z.ZodType<ArrayType> = z.object({
	kind: z.literal("array"),
	get of() { return TypeSchema; },
	size: z.number().int().nonnegative().optional(),
	sealed: z.boolean().optional(),
});

export const MapTypeSchema: z.ZodType<MapType> = z.object({
	kind: z.literal("map"),
	get of() { return TypeSchema; },
});

export const RecordFieldSchema: z.ZodType<RecordField> = z.object({
	name: z.string(),
	get type() { return TypeSchema; },
	optional: z.boolean().optional(),
});

export const RecordTypeSchema: z.ZodType<RecordType> = z.object({
	kind: z.literal("record"),
	name: z.string().optional(),
	get fields() { return z.array(RecordFieldSchema); },
	sealed: z.boolean(),
	get rest() { return TypeSchema.optional(); },
	symbol: SymbolInfoSchema.optional(),
}).meta({ id: "RecordType", title: "Record Type", description: "Open or sealed record with named fields" });

export const ObjectTypeSchema: z.ZodType<ObjectType> = z.object({
	kind: z.literal("object"),
	name: z.string(),
	get fields() { return z.array(RecordFieldSchema).optional(); },
	symbol: SymbolInfoSchema.optional(),
});

export const FutureTypeSchema: z.ZodType<FutureType> = z.object({
	kind: z.literal("future"),
	get of() { return TypeSchema; },
	workerDerivative: z.boolean().optional(),
});

export const FiniteTypeSchema: z.ZodType<FiniteType> = z.object({
	kind: z.literal("finite"),
	values: z.array(FiniteValueSchema),
	symbol: SymbolInfoSchema.optional(),
});

export const StreamTypeSchema: z.ZodType<StreamType> = z.object({
	kind: z.literal("stream"),
	get of() { return TypeSchema; },
});

export const FunctionTypeSchema: z.ZodType<FunctionType> = z.object({
	kind: z.literal("function"),
	get params() { return z.array(TypeSchema); },
	get returns() { return TypeSchema; },
});

/** Union of all type variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const TypeSchema: z.ZodType<Type> = z.union([
	NilTypeSchema, BooleanTypeSchema, IntTypeSchema, ByteTypeSchema,
	FloatTypeSchema, DecimalTypeSchema, StringTypeSchema, AnyTypeSchema,
	AnydataTypeSchema, JsonTypeSchema, NoneTypeSchema, SemanticErrorTypeSchema,
	ErrorTypeSchema, UnionTypeSchema, TupleTypeSchema, ArrayTypeSchema,
	MapTypeSchema, RecordTypeSchema, ObjectTypeSchema, FutureTypeSchema,
	FiniteTypeSchema, StreamTypeSchema, FunctionTypeSchema,
]);

//==============================================================================
// Zod Schemas - Expression Domain
//==============================================================================

const exprBase = {
	position: PositionSchema,
	get type() { return TypeSchema; },
};

export const LiteralExprSchema: z.ZodType<LiteralExpr> = z.object({
	...exprBase,
	kind: z.literal("literal"),
	value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
});

export const VarRefExprSchema: z.ZodType<VarRefExpr> = z.object({
	...exprBase,
	kind: z.literal("varRef"),
	name: z.string(),
	symbol: SymbolInfoSchema.optional(),
});

export const FieldAccessExprSchema: z.ZodType<FieldAccessExpr> = z.object({
	...exprBase,
	kind: z.literal("fieldAccess"),
	get expr() { return ExpressionSchema; },
	field: z.string(),
});

export const IndexAccessExprSchema: z.ZodType<IndexAccessExpr> = z.object({
	...exprBase,
	kind: z.literal("indexAccess"),
	get expr() { return ExpressionSchema; },
	get index() { return ExpressionSchema; },
});

export const NamedArgExprSchema: z.ZodType<NamedArgExpr> = z.object({
	...exprBase,
	kind: z.literal("namedArg"),
	name: z.string(),
	get expr() { return ExpressionSchema; },
});

export const InvocationExprSchema: z.ZodType<InvocationExpr> = z.object({
	...exprBase,
	kind: z.literal("invocation"),
	name: z.string(),
	get expr() { return ExpressionSchema.optional(); },
	get args() { return z.array(ExpressionSchema); },
	get namedArgs() { return z.array(NamedArgExprSchema).optional(); },
	get restArgs() { return z.array(ExpressionSchema).optional(); },
	symbol: SymbolInfoSchema.optional(),
	actionInvocation: z.boolean().optional(),
});

export const RecordEntrySchema: z.ZodType<RecordEntry> = z.object({
	get key() { return ExpressionSchema; },
	get value() { return ExpressionSchema; },
});

export const RecordLiteralExprSchema: z.ZodType<RecordLiteralExpr> = z.object({
	...exprBase,
	kind: z.literal("recordLiteral"),
	get entries() { return z.array(RecordEntrySchema); },
});

export const ListLiteralExprSchema: z.ZodType<ListLiteralExpr> = z.object({
	...exprBase,
	kind: z.literal("listLiteral"),
	get members() { return z.array(ExpressionSchema); },
});

export const TupleLiteralExprSchema: z.ZodType<TupleLiteralExpr> = z.object({
	...exprBase,
	kind: z.literal("tupleLiteral"),
	get members() { return z.array(ExpressionSchema); },
});

export const BinaryExprSchema: z.ZodType<BinaryExpr> = z.object({
	...exprBase,
	kind: z.literal("binary"),
	op: z.string(),
	get lhs() { return ExpressionSchema; },
	get rhs() { return ExpressionSchema; },
});

export const UnaryExprSchema: z.ZodType<UnaryExpr> = z.object({
	...exprBase,
	kind: z.literal("unary"),
	op: z.string(),
	get expr() { return ExpressionSchema; },
});

export const TernaryExprSchema: z.ZodType<TernaryExpr> = z.object({
	...exprBase,
	kind: z.literal("ternary"),
	get condition() { return ExpressionSchema; },
	get then() { return ExpressionSchema; },
	get else() { return ExpressionSchema; },
});

export const ElvisExprSchema: z.ZodType<ElvisExpr> = z.object({
	...exprBase,
	kind: z.literal("elvis"),
	get lhs() { return ExpressionSchema; },
	get rhs() { return ExpressionSchema; },
});

export const LambdaExprSchema: z.ZodType<LambdaExpr> = z.object({
	...exprBase,
	kind: z.literal("lambda"),
	get function() { return FunctionDeclSchema; },
});

export const TypeTestExprSchema: z.ZodType<TypeTestExpr> = z.object({
	...exprBase,
	kind: z.literal("typeTest"),
	get expr() { return ExpressionSchema; },
	get testType() { return TypeSchema; },
});

export const CheckedExprSchema: z.ZodType<CheckedExpr> = z.object({
	...exprBase,
	kind: z.literal("checked"),
	get expr() { return ExpressionSchema; },
});

export const TrapExprSchema: z.ZodType<TrapExpr> = z.object({
	...exprBase,
	kind: z.literal("trap"),
	get expr() { return ExpressionSchema; },
});

export const WaitExprSchema: z.ZodType<WaitExpr> = z.object({
	...exprBase,
	kind: z.literal("wait"),
	get expr() { return ExpressionSchema; },
});

export const WaitForAllExprSchema: z.ZodType<WaitForAllExpr> = z.object({
	...exprBase,
	kind: z.literal("waitForAll"),
	get entries() { return z.array(ExpressionSchema); },
});

export const WorkerReceiveExprSchema: z.ZodType<WorkerReceiveExpr> = z.object({
	...exprBase,
	kind: z.literal("workerReceive"),
	source: z.string(),
	get workerType() { return TypeSchema.optional(); },
	isChannel: z.boolean().optional(),
	get key() { return ExpressionSchema.optional(); },
}).meta({ id: "WorkerReceive", title: "Worker Receive", description: "Receive a value sent by another worker" });

export const WorkerSyncSendExprSchema: z.ZodType<WorkerSyncSendExpr> = z.object({
	...exprBase,
	kind: z.literal("workerSyncSend"),
	target: z.string(),
	get expr() { return ExpressionSchema; },
	get workerType() { return TypeSchema.optional(); },
}).meta({ id: "WorkerSyncSend", title: "Worker Synchronous Send", description: "Send that waits for the receiving worker" });

export const WorkerFlushExprSchema: z.ZodType<WorkerFlushExpr> = z.object({
	...exprBase,
	kind: z.literal("workerFlush"),
	target: z.string().optional(),
});

export const TypeInitExprSchema: z.ZodType<TypeInitExpr> = z.object({
	...exprBase,
	kind: z.literal("typeInit"),
	get args() { return z.array(ExpressionSchema); },
});

export const StringTemplateExprSchema: z.ZodType<StringTemplateExpr> = z.object({
	...exprBase,
	kind: z.literal("stringTemplate"),
	get exprs() { return z.array(ExpressionSchema); },
});

export const TypeConversionExprSchema: z.ZodType<TypeConversionExpr> = z.object({
	...exprBase,
	kind: z.literal("typeConversion"),
	get expr() { return ExpressionSchema; },
});

export const MatchExprClauseSchema: z.ZodType<MatchExprClause> = z.object({
	position: PositionSchema,
	get variable() { return VariableDeclSchema; },
	get expr() { return ExpressionSchema; },
});

export const MatchExpressionSchema: z.ZodType<MatchExpression> = z.object({
	...exprBase,
	kind: z.literal("matchExpression"),
	get expr() { return ExpressionSchema; },
	get clauses() { return z.array(MatchExprClauseSchema); },
});

export const ExpressionSchema: z.ZodType<Expression> = z.union([
	LiteralExprSchema, VarRefExprSchema, FieldAccessExprSchema, IndexAccessExprSchema,
	NamedArgExprSchema, InvocationExprSchema, RecordLiteralExprSchema,
	ListLiteralExprSchema, TupleLiteralExprSchema, BinaryExprSchema, UnaryExprSchema,
	TernaryExprSchema, ElvisExprSchema, LambdaExprSchema, TypeTestExprSchema,
	CheckedExprSchema, TrapExprSchema, WaitExprSchema, WaitForAllExprSchema,
	WorkerReceiveExprSchema, WorkerSyncSendExprSchema, WorkerFlushExprSchema,
	TypeInitExprSchema, StringTemplateExprSchema, TypeConversionExprSchema,
	MatchExpressionSchema,
]);

//==============================================================================
// Zod Schemas - Match Patterns
//==============================================================================

export const VariableBindingSchema: z.ZodType<VariableBinding> = z.object({
	kind: z.literal("variableBinding"),
	position: PositionSchema,
	name: z.string(),
	get type() { return TypeSchema; },
});

export const RecordBindingFieldSchema: z.ZodType<RecordBindingField> = z.object({
	key: z.string(),
	get binding() { return BindingPatternSchema; },
});

export const RecordBindingSchema: z.ZodType<RecordBinding> = z.object({
	kind: z.literal("recordBinding"),
	position: PositionSchema,
	get type() { return TypeSchema; },
	get fields() { return z.array(RecordBindingFieldSchema); },
	closed: z.boolean(),
});

export const TupleBindingSchema: z.ZodType<TupleBinding> = z.object({
	kind: z.literal("tupleBinding"),
	position: PositionSchema,
	get type() { return TypeSchema; },
	get members() { return z.array(BindingPatternSchema); },
});

export const BindingPatternSchema: z.ZodType<BindingPattern> = z.union([
	VariableBindingSchema, RecordBindingSchema, TupleBindingSchema,
]);

export const StaticMatchClauseSchema: z.ZodType<StaticMatchClause> = z.object({
	kind: z.literal("staticClause"),
	position: PositionSchema,
	get pattern() { return ExpressionSchema; },
	get body() { return BlockStmtSchema; },
});

export const StructuredMatchClauseSchema: z.ZodType<StructuredMatchClause> = z.object({
	kind: z.literal("structuredClause"),
	position: PositionSchema,
	get binding() { return BindingPatternSchema; },
	get guard() { return ExpressionSchema.optional(); },
	get body() { return BlockStmtSchema; },
});

export const MatchClauseSchema: z.ZodType<MatchClause> = z.union([
	StaticMatchClauseSchema, StructuredMatchClauseSchema,
]);

//==============================================================================
// Zod Schemas - Statement Domain
//==============================================================================

const positioned = <K extends string>(kind: K) => z.object({
	kind: z.literal(kind),
	position: PositionSchema,
});

export const BlockStmtSchema: z.ZodType<BlockStmt> = z.object({
	kind: z.literal("block"),
	position: PositionSchema,
	get statements() { return z.array(StatementSchema); },
});

export const VariableDefStmtSchema: z.ZodType<VariableDefStmt> = z.object({
	kind: z.literal("variableDef"),
	position: PositionSchema,
	get variable() { return VariableDeclSchema; },
});

export const AssignmentStmtSchema: z.ZodType<AssignmentStmt> = z.object({
	kind: z.literal("assignment"),
	position: PositionSchema,
	get target() { return ExpressionSchema; },
	get expr() { return ExpressionSchema; },
});

export const CompoundAssignmentStmtSchema: z.ZodType<CompoundAssignmentStmt> = z.object({
	kind: z.literal("compoundAssignment"),
	position: PositionSchema,
	op: z.string(),
	get target() { return ExpressionSchema; },
	get expr() { return ExpressionSchema; },
});

export const DestructureStmtSchema: z.ZodType<DestructureStmt> = z.object({
	kind: z.literal("destructure"),
	position: PositionSchema,
	pattern: z.enum(["tuple", "record", "error"]),
	get target() { return ExpressionSchema; },
	get expr() { return ExpressionSchema; },
});

export const ExpressionStmtSchema: z.ZodType<ExpressionStmt> = z.object({
	kind: z.literal("expressionStmt"),
	position: PositionSchema,
	get expr() { return ExpressionSchema; },
});

export const IfStmtSchema: z.ZodType<IfStmt> = z.object({
	kind: z.literal("if"),
	position: PositionSchema,
	get condition() { return ExpressionSchema; },
	get then() { return BlockStmtSchema; },
	get else() { return z.union([BlockStmtSchema, IfStmtSchema]).optional(); },
});

export const WhileStmtSchema: z.ZodType<WhileStmt> = z.object({
	kind: z.literal("while"),
	position: PositionSchema,
	get condition() { return ExpressionSchema; },
	get body() { return BlockStmtSchema; },
});

export const ForeachStmtSchema: z.ZodType<ForeachStmt> = z.object({
	kind: z.literal("foreach"),
	position: PositionSchema,
	get variable() { return VariableDeclSchema; },
	get collection() { return ExpressionSchema; },
	get body() { return BlockStmtSchema; },
});

export const ReturnStmtSchema: z.ZodType<ReturnStmt> = z.object({
	kind: z.literal("return"),
	position: PositionSchema,
	get expr() { return ExpressionSchema.optional(); },
});

export const BreakStmtSchema: z.ZodType<BreakStmt> = positioned("break");
export const ContinueStmtSchema: z.ZodType<ContinueStmt> = positioned("continue");
export const AbortStmtSchema: z.ZodType<AbortStmt> = positioned("abort");
export const RetryStmtSchema: z.ZodType<RetryStmt> = positioned("retry");
export const ForeverStmtSchema: z.ZodType<ForeverStmt> = positioned("forever");

export const PanicStmtSchema: z.ZodType<PanicStmt> = z.object({
	kind: z.literal("panic"),
	position: PositionSchema,
	get expr() { return ExpressionSchema; },
});

export const TransactionStmtSchema: z.ZodType<TransactionStmt> = z.object({
	kind: z.literal("transaction"),
	position: PositionSchema,
	get body() { return BlockStmtSchema; },
	get onRetry() { return BlockStmtSchema.optional(); },
	get aborted() { return BlockStmtSchema.optional(); },
	get committed() { return BlockStmtSchema.optional(); },
	get retryCount() { return ExpressionSchema.optional(); },
}).meta({ id: "TransactionStmt", title: "Transaction", description: "Transaction block with optional retry, aborted and committed handlers" });

export const LockStmtSchema: z.ZodType<LockStmt> = z.object({
	kind: z.literal("lock"),
	position: PositionSchema,
	get body() { return BlockStmtSchema; },
});

export const MatchStmtSchema: z.ZodType<MatchStmt> = z.object({
	kind: z.literal("match"),
	position: PositionSchema,
	get expr() { return ExpressionSchema; },
	get clauses() { return z.array(MatchClauseSchema); },
	get implicitDefaultType() { return TypeSchema.optional(); },
}).meta({ id: "MatchStmt", title: "Match Statement", description: "Match over static and structured pattern clauses" });

export const WorkerSendStmtSchema: z.ZodType<WorkerSendStmt> = z.object({
	kind: z.literal("workerSend"),
	position: PositionSchema,
	target: z.string(),
	get expr() { return ExpressionSchema; },
	get workerType() { return TypeSchema.optional(); },
	isChannel: z.boolean().optional(),
	get key() { return ExpressionSchema.optional(); },
}).meta({ id: "WorkerSend", title: "Worker Send", description: "Asynchronous send to another worker" });

export const WorkerDeclSchema: z.ZodType<WorkerDecl> = z.object({
	kind: z.literal("worker"),
	position: PositionSchema,
	name: z.string(),
	get returnType() { return TypeSchema; },
	get body() { return BlockStmtSchema; },
}).meta({ id: "WorkerDecl", title: "Worker", description: "Named worker declared inside an invokable" });

export const ForkJoinStmtSchema: z.ZodType<ForkJoinStmt> = z.object({
	kind: z.literal("fork"),
	position: PositionSchema,
	get workers() { return z.array(WorkerDeclSchema); },
});

export const StatementSchema: z.ZodType<Statement> = z.union([
	BlockStmtSchema, VariableDefStmtSchema, AssignmentStmtSchema,
	CompoundAssignmentStmtSchema, DestructureStmtSchema, ExpressionStmtSchema,
	IfStmtSchema, WhileStmtSchema, ForeachStmtSchema, ReturnStmtSchema,
	BreakStmtSchema, ContinueStmtSchema, PanicStmtSchema, AbortStmtSchema,
	RetryStmtSchema, TransactionStmtSchema, LockStmtSchema, MatchStmtSchema,
	WorkerSendStmtSchema, WorkerDeclSchema, ForkJoinStmtSchema, ForeverStmtSchema,
]);

//==============================================================================
// Zod Schemas - Declarations and Program
//==============================================================================

export const VariableDeclSchema: z.ZodType<VariableDecl> = z.object({
	kind: z.literal("variable"),
	position: PositionSchema,
	name: z.string(),
	get type() { return TypeSchema; },
	get expr() { return ExpressionSchema.optional(); },
	symbol: SymbolInfoSchema.optional(),
});

export const FunctionDeclSchema: z.ZodType<FunctionDecl> = z.object({
	kind: z.literal("function"),
	position: PositionSchema,
	name: z.string(),
	get params() { return z.array(VariableDeclSchema); },
	get returnType() { return TypeSchema; },
	get body() { return BlockStmtSchema.optional(); },
	symbol: SymbolInfoSchema.optional(),
}).meta({ id: "FunctionDecl", title: "Function", description: "Function, method or lambda body" });

export const TypeDefinitionSchema: z.ZodType<TypeDefinition> = z.object({
	kind: z.literal("typeDefinition"),
	position: PositionSchema,
	name: z.string(),
	get type() { return TypeSchema; },
	get fields() { return z.array(VariableDeclSchema).optional(); },
	get methods() { return z.array(FunctionDeclSchema).optional(); },
	symbol: SymbolInfoSchema.optional(),
});

export const TopLevelNodeSchema: z.ZodType<TopLevelNode> = z.union([
	FunctionDeclSchema, TypeDefinitionSchema, VariableDeclSchema,
]);

export const ProgramSchema: z.ZodType<Program> = z.object({
	version: SemVer,
	module: z.string(),
	declarations: z.array(TopLevelNodeSchema),
}).meta({ id: "Program", title: "Typed Program", description: "Type-resolved declarations of one module" });
