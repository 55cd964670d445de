// SPDX-License-Identifier: MIT
// Corvid Code Analyzer
// Main exports

//==============================================================================
// Typed AST
//==============================================================================

export type {
	Position, SymbolFlag, SymbolInfo,
	Type, RecordField, FiniteValue,
	Expression, Statement, BindingPattern,
	MatchClause, StaticMatchClause, StructuredMatchClause, MatchExprClause,
	BlockStmt, WorkerDecl, WorkerSendStmt, WorkerReceiveExpr, WorkerSyncSendExpr, WorkerFlushExpr,
	FunctionDecl, TypeDefinition, VariableDecl, TopLevelNode, Program,
} from "./zod-schemas.js";

export {
	TypeSchema, ExpressionSchema, StatementSchema, ProgramSchema,
} from "./zod-schemas.js";

//==============================================================================
// Type Constructors and Helpers
//==============================================================================

export {
	nilType, booleanType, intType, byteType, floatType, decimalType, stringType,
	anyType, anydataType, jsonType, noneType, semanticErrorType,
	errorType, tupleType, arrayType, mapType, recordType, futureType, finiteType, unionType,
	flattenMembers, isSemanticError, isNil, isErrorType, containsErrorType,
	typeSymbol, hasFlag, typeToString,
} from "./types.js";

export { typeEqual } from "./type-equality.js";

export { StructuralTypeRelations, type TypeRelations } from "./type-relations.js";

//==============================================================================
// Errors and Diagnostics
//==============================================================================

export { ErrorCodes, AnalyzerError, exhaustive, validResult, invalidResult } from "./errors.js";
export type { ErrorCode, ValidationError, ValidationResult } from "./errors.js";

export { DiagnosticCodes, DiagnosticLog, defaultSeverity } from "./diagnostics.js";
export type {
	Diagnostic, DiagnosticArg, DiagnosticCode, DiagnosticLogOptions, DiagnosticSink, Severity,
} from "./diagnostics.js";

export {
	formatDiagnostic, formatDiagnosticMessage, formatValidationError,
} from "./validation/error-messages.js";

//==============================================================================
// Validation
//==============================================================================

export {
	parseProgram, parseAnalyzerConfig, AnalyzerConfigSchema,
	type AnalyzerConfig, type ParseOptions,
} from "./validator.js";

//==============================================================================
// Analysis
//==============================================================================

export {
	CodeAnalyzer, analyzeProgram, DEFAULT_ANALYZER_OPTIONS,
	type AnalyzerOptions, type AnalysisResult,
} from "./code-analyzer.js";

export type { AnalysisAnnotations } from "./code-analyzer/context.js";

export {
	analyzeMatch, analyzeMatchExpression,
	type ClauseVerdict, type MatchAnalysis, type MatchExpressionAnalysis, type MatchOptions,
} from "./match-analyzer.js";

export {
	WorkerActionSystem, WorkerMachine, validateWorkerInteractions, channelName, describeAction,
	type InvokableNode, type WorkerAction, type WorkerValidationResult,
} from "./worker-validator.js";
