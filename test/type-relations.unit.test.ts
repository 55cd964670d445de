// SPDX-License-Identifier: MIT
// Corvid Type Relations - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { StructuralTypeRelations } from "../src/type-relations.js";
import {
	anyType,
	anydataType,
	arrayType,
	byteType,
	errorType,
	finiteType,
	floatType,
	intType,
	jsonType,
	mapType,
	nilType,
	noneType,
	recordType,
	semanticErrorType,
	stringType,
	tupleType,
	unionType,
} from "../src/types.js";
import type { Type } from "../src/zod-schemas.js";

const relations = new StructuralTypeRelations();
const assignable = (from: Type, to: Type): boolean => relations.isAssignable(from, to);

describe("Type Relations - Unit Tests", () => {

	//==========================================================================
	// Basic Types
	//==========================================================================

	describe("basic types", () => {
		it("widens byte to int but not int to byte", () => {
			assert.equal(assignable(byteType, intType), true);
			assert.equal(assignable(intType, byteType), false);
		});

		it("never rejects erroneous or never-matching types", () => {
			assert.equal(assignable(semanticErrorType, intType), true);
			assert.equal(assignable(stringType, semanticErrorType), true);
			assert.equal(assignable(noneType, stringType), true);
		});

		it("keeps errors out of any", () => {
			assert.equal(assignable(intType, anyType), true);
			assert.equal(assignable(unionType([intType, errorType()]), anyType), false);
		});

		it("matches errors by name when the target is named", () => {
			assert.equal(assignable(errorType("IoError"), errorType()), true);
			assert.equal(assignable(errorType(), errorType("IoError")), false);
		});
	});

	//==========================================================================
	// Unions and Finite Types
	//==========================================================================

	describe("unions and finite types", () => {
		it("requires every source member to fit", () => {
			assert.equal(assignable(unionType([intType, nilType]), unionType([intType, stringType, nilType])), true);
			assert.equal(assignable(unionType([intType, floatType]), intType), false);
		});

		it("accepts nil into a nullable union", () => {
			assert.equal(assignable(nilType, unionType([intType], true)), true);
		});

		it("checks each finite value against the target", () => {
			assert.equal(assignable(finiteType(["a", "b"]), stringType), true);
			assert.equal(assignable(finiteType(["a", 1]), stringType), false);
			assert.equal(assignable(finiteType(["a"]), finiteType(["a", "b"])), true);
		});
	});

	//==========================================================================
	// Structured Types
	//==========================================================================

	describe("structured types", () => {
		it("assigns tuples to arrays of a common member type", () => {
			assert.equal(assignable(tupleType([intType, byteType]), arrayType(intType)), true);
			assert.equal(assignable(tupleType([intType]), arrayType(intType, 2, true)), false);
		});

		it("respects sealed array sizes", () => {
			assert.equal(assignable(arrayType(intType, 2, true), arrayType(intType, 2, true)), true);
			assert.equal(assignable(arrayType(intType), arrayType(intType, 2, true)), false);
		});

		it("assigns records with the required fields", () => {
			const point = recordType([{ name: "x", type: intType }, { name: "y", type: intType }], true);
			const hasX = recordType([{ name: "x", type: intType }], false);
			assert.equal(assignable(point, hasX), true);
			assert.equal(assignable(hasX, point), false);
		});

		it("rejects extra fields into a sealed record", () => {
			const point = recordType([{ name: "x", type: intType }, { name: "y", type: intType }], true);
			const onlyX = recordType([{ name: "x", type: intType }], true);
			assert.equal(assignable(point, onlyX), false);
		});

		it("assigns records to maps of their field types", () => {
			const point = recordType([{ name: "x", type: intType }], true);
			assert.equal(assignable(point, mapType(intType)), true);
			assert.equal(assignable(point, mapType(stringType)), false);
		});
	});

	//==========================================================================
	// Data Types
	//==========================================================================

	describe("anydata and json", () => {
		it("accepts plain data as anydata", () => {
			assert.equal(assignable(mapType(unionType([intType, stringType])), anydataType), true);
			assert.equal(assignable({ kind: "object", name: "Conn" }, anydataType), false);
			assert.equal(assignable(errorType(), anydataType), false);
		});

		it("requires open records to carry a json rest type", () => {
			assert.equal(assignable(recordType([{ name: "x", type: intType }], true), jsonType), true);
			assert.equal(assignable(recordType([{ name: "x", type: intType }], false), jsonType), false);
			assert.equal(assignable(recordType([], false, stringType), jsonType), true);
		});
	});

	//==========================================================================
	// Identity
	//==========================================================================

	it("reports identity through structural equality", () => {
		assert.equal(relations.isSameType(tupleType([intType]), tupleType([intType])), true);
		assert.equal(relations.isSameType(intType, byteType), false);
	});
});
