// SPDX-License-Identifier: MIT
// Corvid Code Analyzer
// Post-type-checking validation: reachability, exits, worker interactions, match patterns

import { analyzeTopLevel } from "./code-analyzer/declarations.js";
import {
	type AnalysisAnnotations,
	createContext,
	emptyAnnotations,
	type RunState,
} from "./code-analyzer/context.js";
import { finishSystem } from "./code-analyzer/workers.js";
import { type Diagnostic, DiagnosticLog, type DiagnosticSink } from "./diagnostics.js";
import { StructuralTypeRelations, type TypeRelations } from "./type-relations.js";
import { errorType, nilType, unionType } from "./types.js";
import { WorkerActionSystem } from "./worker-validator.js";
import type { FunctionDecl, Program } from "./zod-schemas.js";

//==============================================================================
// Analyzer Options
//==============================================================================

export interface AnalyzerOptions {
	/** Name of the implicit worker of every function body. */
	defaultWorkerName?: string;

	/** Entry-point function that must be public. */
	mainFunctionName?: string;

	/** Report every warning as an error. */
	warningsAsErrors?: boolean;

	/** Type-compatibility oracle; structural by default. */
	relations?: TypeRelations;

	/** Receives every diagnostic as it is recorded. */
	sink?: DiagnosticSink;

	/** Log per-declaration progress and worker stalls to the console. */
	verbose?: boolean;
}

export const DEFAULT_ANALYZER_OPTIONS = {
	defaultWorkerName: "default",
	mainFunctionName: "main",
	warningsAsErrors: false,
	verbose: false,
} as const;

export interface AnalysisResult {
	diagnostics: Diagnostic[];
	annotations: AnalysisAnnotations;
	errorCount: number;
	warningCount: number;
}

//==============================================================================
// Code Analyzer
//==============================================================================

/**
 * Walks a typed program once and reports semantic errors that type checking
 * cannot see. Every call to `analyze` starts from fresh state, so the same
 * analyzer (and the same program) can be analyzed repeatedly.
 */
export class CodeAnalyzer {
	private readonly _options: Required<Omit<AnalyzerOptions, "sink">> & Pick<AnalyzerOptions, "sink">;

	constructor(options: AnalyzerOptions = {}) {
		this._options = {
			...DEFAULT_ANALYZER_OPTIONS,
			relations: new StructuralTypeRelations(),
			...options,
		};
	}

	analyze(program: Program): AnalysisResult {
		const { relations, verbose, sink } = this._options;
		const log = new DiagnosticLog({ warningsAsErrors: this._options.warningsAsErrors, sink });
		const run: RunState = {
			module: program.module,
			log,
			relations,
			options: {
				defaultWorkerName: this._options.defaultWorkerName,
				mainFunctionName: this._options.mainFunctionName,
				verbose,
			},
			annotations: emptyAnnotations(),
		};

		// Module-level initializers behave as the body of an implicit
		// `init` function that may return an error.
		const init: FunctionDecl = {
			kind: "function",
			position: { line: 1, column: 1 },
			name: "init",
			params: [],
			returnType: unionType([errorType(), nilType]),
		};
		const moduleSystem = new WorkerActionSystem();
		moduleSystem.start(run.options.defaultWorkerName, init.position, init);
		const moduleCtx = createContext(init, "function", moduleSystem);

		for (const node of program.declarations) {
			analyzeTopLevel(node, moduleCtx, run);
		}

		moduleSystem.end();
		finishSystem(moduleSystem, "module " + program.module, run);

		if (verbose) {
			console.warn(
				`[CodeAnalyzer] ${program.module}: ${log.errorCount} errors, ${log.warningCount} warnings`,
			);
		}

		return {
			diagnostics: [...log.diagnostics],
			annotations: run.annotations,
			errorCount: log.errorCount,
			warningCount: log.warningCount,
		};
	}
}

/**
 * Analyze a program with the given options.
 */
export function analyzeProgram(program: Program, options?: AnalyzerOptions): AnalysisResult {
	return new CodeAnalyzer(options).analyze(program);
}
