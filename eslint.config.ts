import eslint from "@eslint/js";
import jsonc from "eslint-plugin-jsonc";
import tseslint from "typescript-eslint";
import type { ConfigArray } from "typescript-eslint";

const style = {
	indent: ["error", "tab"],
	quotes: ["error", "double", { avoidEscape: true }],
} as const;

export default [
	{
		ignores: ["dist/**", "node_modules/**", "*.config.ts"],
	},

	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// Sources: strict type-aware rules, no type assertions
	...tseslint.configs.strictTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	...tseslint.configs.stylisticTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	{
		files: ["src/**/*.ts"],
		linterOptions: {
			noInlineConfig: true,
		},
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			...style,
			"@typescript-eslint/restrict-template-expressions": ["error", { allowNumber: true }],
			"@typescript-eslint/restrict-plus-operands": ["error", { allowNumberAndString: true }],
			"@typescript-eslint/no-non-null-assertion": "error",
			"@typescript-eslint/consistent-type-assertions": ["error", { assertionStyle: "never" }],
			"max-lines": ["warn", { max: 300, skipBlankLines: true, skipComments: true }],
			"max-depth": ["warn", { max: 4 }],
		},
	},

	// Pattern and traversal modules switch over every node kind
	{
		files: [
			"src/zod-schemas.ts",
			"src/match-analyzer.ts",
			"src/code-analyzer/statements.ts",
			"src/code-analyzer/expressions.ts",
		],
		rules: {
			"max-lines": "off",
		},
	},

	// Tests: syntactic rules only
	...tseslint.configs.recommended.map((config) => ({
		...config,
		files: ["test/**/*.ts"],
	})),
	{
		files: ["test/**/*.ts"],
		rules: {
			...style,
			"@typescript-eslint/ban-ts-comment": "error",
		},
	},

	// JSON: tabs, double quotes, sorted keys outside package.json
	...jsonc.configs["flat/recommended-with-json"].map((config) => ({
		...config,
		files: ["**/*.json"],
	})),
	{
		files: ["**/*.json"],
		rules: {
			"jsonc/indent": ["error", "tab"],
			"jsonc/quotes": ["error", "double"],
			"jsonc/sort-keys": ["error", { pathPattern: ".*", order: { type: "asc" } }],
		},
	},
	{
		files: ["package.json"],
		plugins: { jsonc },
		rules: {
			"jsonc/sort-keys": ["error",
				{
					pathPattern: "^$",
					order: [
						"name",
						"version",
						"private",
						"description",
						"license",
						"type",
						"main",
						"types",
						"bin",
						"scripts",
						"dependencies",
						"devDependencies",
						"engines",
					],
				},
				{
					pathPattern: ".",
					order: { type: "asc" },
				},
			],
		},
	},
] satisfies ConfigArray;
