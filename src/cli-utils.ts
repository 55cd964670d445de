// SPDX-License-Identifier: MIT
// Corvid CLI Utilities
// Argument parsing and input loading, kept apart from cli.ts for testability

import { readFile } from "node:fs/promises";
import { globSync } from "glob";

import { invalidResult, type ValidationResult } from "./errors.js";
import { type AnalyzerConfig, parseAnalyzerConfig } from "./validator.js";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	validate: boolean;
	help: boolean;
	json: boolean;
	config?: string;
}

export interface ParsedArgs {
	patterns: string[];
	options: Options;
	/** Usage problems, such as an unknown flag or a missing option value. */
	errors: string[];
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--validate": options.validate = true; return true;
	case "--help": case "-h": options.help = true; return true;
	case "--json": options.json = true; return true;
	default: return false;
	}
}

function consumeNextArg(args: string[], i: number): string | undefined {
	const nextArg = args[i + 1];
	if (nextArg !== undefined && !nextArg.startsWith("-")) return nextArg;
	return undefined;
}

/**
 * Parse command-line arguments
 *
 * Supports:
 *   - Positional file paths or glob patterns
 *   - Flags: --verbose/-v, --help/-h, --validate, --json
 *   - Options with values: --config <path>
 */
export function parseArgs(args: string[]): ParsedArgs {
	const options: Options = { verbose: false, validate: false, help: false, json: false };
	const patterns: string[] = [];
	const errors: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		if (processFlag(options, arg)) continue;
		if (arg === "--config") {
			const value = consumeNextArg(args, i);
			if (value === undefined) {
				errors.push("--config requires a path");
			} else {
				options.config = value;
				i++;
			}
			continue;
		}
		if (arg.startsWith("-")) {
			errors.push(`unknown option: ${arg}`);
			continue;
		}
		patterns.push(arg);
	}

	return { patterns, options, errors };
}

/**
 * Expand file paths and glob patterns into a sorted, de-duplicated file
 * list. A pattern that matches nothing is kept as a literal path so the
 * caller reports it as unreadable.
 */
export function expandPatterns(patterns: string[], cwd: string = process.cwd()): string[] {
	const files = new Set<string>();
	for (const pattern of patterns) {
		const matches = globSync(pattern, { cwd, nodir: true });
		if (matches.length === 0) files.add(pattern);
		for (const match of matches.sort()) files.add(match);
	}
	return [...files];
}

/**
 * Read and parse a JSON file. Read and syntax failures come back as the
 * error message.
 */
export async function readJsonFile(filePath: string): Promise<{ ok: true; value: unknown } | { ok: false; error: string }> {
	let content: string;
	try {
		content = await readFile(filePath, "utf-8");
	} catch (e) {
		return { ok: false, error: `cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
	}
	try {
		const value: unknown = JSON.parse(content);
		return { ok: true, value };
	} catch (e) {
		return { ok: false, error: `invalid JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
	}
}

/**
 * Load analyzer configuration from a JSON file, or the defaults when no
 * file is given.
 */
export async function loadConfig(filePath: string | undefined): Promise<ValidationResult<AnalyzerConfig>> {
	if (filePath === undefined) return parseAnalyzerConfig({});
	const read = await readJsonFile(filePath);
	if (!read.ok) {
		return invalidResult<AnalyzerConfig>([{ path: filePath, message: read.error }]);
	}
	return parseAnalyzerConfig(read.value);
}
