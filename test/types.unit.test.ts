// SPDX-License-Identifier: MIT
// Corvid Type Helpers - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { typeEqual } from "../src/type-equality.js";
import {
	arrayType,
	containsErrorType,
	errorType,
	finiteType,
	flattenMembers,
	futureType,
	hasFlag,
	intType,
	isErrorType,
	mapType,
	nilType,
	recordType,
	stringType,
	tupleType,
	typeSymbol,
	typeToString,
	unionType,
} from "../src/types.js";
import type { Type } from "../src/zod-schemas.js";
import { sym } from "./helper.js";

describe("Type Helpers - Unit Tests", () => {

	//==========================================================================
	// Unions
	//==========================================================================

	describe("unionType", () => {
		it("flattens nested unions and drops duplicates", () => {
			const inner = unionType([intType, stringType]);
			assert.deepStrictEqual(unionType([inner, intType, nilType]), {
				kind: "union",
				members: [intType, stringType, nilType],
			});
		});

		it("collapses a single member", () => {
			assert.deepStrictEqual(unionType([intType, intType]), intType);
		});

		it("keeps a single member when nullable", () => {
			assert.deepStrictEqual(unionType([errorType()], true), {
				kind: "union",
				members: [{ kind: "error" }],
				nullable: true,
			});
		});

		it("lists members of nested unions in order", () => {
			const t: Type = { kind: "union", members: [intType, { kind: "union", members: [stringType, nilType] }] };
			assert.deepStrictEqual(flattenMembers(t), [intType, stringType, nilType]);
		});
	});

	//==========================================================================
	// Predicates
	//==========================================================================

	describe("predicates", () => {
		it("recognizes error types and error-only unions", () => {
			assert.equal(isErrorType(errorType("IoError")), true);
			assert.equal(isErrorType(unionType([errorType("A"), errorType("B")])), true);
			assert.equal(isErrorType(unionType([errorType(), nilType])), false);
			assert.equal(containsErrorType(unionType([errorType(), nilType])), true);
			assert.equal(containsErrorType(intType), false);
		});

		it("reads symbols and flags", () => {
			const symbol = sym("Point", ["public"]);
			const point: Type = { ...recordType([], true), symbol };
			assert.equal(typeSymbol(point), symbol);
			assert.equal(typeSymbol(intType), undefined);
			assert.equal(hasFlag(symbol, "public"), true);
			assert.equal(hasFlag(symbol, "native"), false);
			assert.equal(hasFlag(undefined, "public"), false);
		});
	});

	//==========================================================================
	// Rendering
	//==========================================================================

	describe("typeToString", () => {
		const cases: [Type, string][] = [
			[nilType, "()"],
			[unionType([intType, nilType]), "int|()"],
			[tupleType([intType, stringType]), "[int,string]"],
			[arrayType(intType, 3, true), "int[3]"],
			[arrayType(stringType), "string[]"],
			[mapType(intType), "map<int>"],
			[futureType(intType), "future<int>"],
			[errorType("IoError"), "IoError"],
			[finiteType(["a", 1]), "\"a\"|1"],
			[recordType([{ name: "x", type: intType }], true), "record {int x}"],
			[{ kind: "function", params: [intType], returns: nilType }, "function (int) returns (())"],
			[{ kind: "semanticError" }, "<error>"],
		];
		for (const [type, expected] of cases) {
			it(`renders ${expected}`, () => {
				assert.equal(typeToString(type), expected);
			});
		}
	});

	//==========================================================================
	// Equality
	//==========================================================================

	describe("typeEqual", () => {
		it("ignores union member order", () => {
			assert.equal(typeEqual(unionType([intType, stringType]), unionType([stringType, intType])), true);
		});

		it("distinguishes nullable unions", () => {
			assert.equal(typeEqual(unionType([intType, nilType]), unionType([intType, nilType], true)), false);
		});

		it("compares errors by name", () => {
			assert.equal(typeEqual(errorType("A"), errorType("A")), true);
			assert.equal(typeEqual(errorType("A"), errorType("B")), false);
		});

		it("compares wrapped types", () => {
			assert.equal(typeEqual(arrayType(intType), arrayType(intType)), true);
			assert.equal(typeEqual(mapType(intType), mapType(stringType)), false);
		});
	});
});
