#!/usr/bin/env node
// SPDX-License-Identifier: MIT
// Corvid Code Analyzer CLI

import { expandPatterns, loadConfig, parseArgs, readJsonFile } from "./cli-utils.js";
import { analyzeProgram } from "./code-analyzer.js";
import type { Diagnostic } from "./diagnostics.js";
import { formatDiagnostic, formatValidationError } from "./validation/error-messages.js";
import { parseProgram } from "./validator.js";

const USAGE = `Usage: corvid-analyze [options] <file-or-glob...>

Analyze typed-AST JSON files and print diagnostics.

Options:
  --config <path>  Read analyzer options from a JSON file
  --json           Print diagnostics as JSON
  --validate       Only check the input files against the AST schema
  -v, --verbose    Log analysis progress to stderr
  -h, --help       Show this help`;

interface FileReport {
	file: string;
	diagnostics: Diagnostic[];
}

async function main(argv: string[]): Promise<number> {
	const { patterns, options, errors } = parseArgs(argv);
	if (options.help) {
		console.log(USAGE);
		return 0;
	}
	if (errors.length > 0 || patterns.length === 0) {
		for (const error of errors) console.error(`corvid-analyze: ${error}`);
		console.error(USAGE);
		return 2;
	}

	const config = await loadConfig(options.config);
	if (!config.valid || config.value === undefined) {
		for (const error of config.errors) console.error(formatValidationError(error, options.config));
		return 2;
	}
	const analyzerOptions = { ...config.value, verbose: config.value.verbose || options.verbose };

	let failed = false;
	const reports: FileReport[] = [];
	for (const file of expandPatterns(patterns)) {
		const read = await readJsonFile(file);
		if (!read.ok) {
			console.error(read.error);
			failed = true;
			continue;
		}
		const parsed = parseProgram(read.value, { defaultWorkerName: analyzerOptions.defaultWorkerName });
		if (!parsed.valid || parsed.value === undefined) {
			for (const error of parsed.errors) console.error(formatValidationError(error, file));
			failed = true;
			continue;
		}
		if (options.validate) {
			if (options.verbose) console.error(`${file}: valid`);
			continue;
		}

		const result = analyzeProgram(parsed.value, analyzerOptions);
		if (result.errorCount > 0) failed = true;
		if (options.json) {
			reports.push({ file, diagnostics: result.diagnostics });
		} else {
			for (const diagnostic of result.diagnostics) console.log(formatDiagnostic(diagnostic, file));
		}
	}

	if (options.json && !options.validate) {
		console.log(JSON.stringify(reports, null, 2));
	}
	return failed ? 1 : 0;
}

main(process.argv.slice(2)).then(
	code => { process.exitCode = code; },
	(error: unknown) => {
		console.error(error instanceof Error ? error.stack ?? error.message : String(error));
		process.exitCode = 1;
	},
);
