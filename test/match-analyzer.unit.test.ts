// SPDX-License-Identifier: MIT
// Corvid Match Analyzer - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { analyzeMatch, analyzeMatchExpression, type MatchOptions } from "../src/match-analyzer.js";
import { StructuralTypeRelations } from "../src/type-relations.js";
import {
	anydataType,
	booleanType,
	errorType,
	finiteType,
	intType,
	mapType,
	nilType,
	recordType,
	semanticErrorType,
	stringType,
	tupleType,
	typeToString,
	unionType,
} from "../src/types.js";
import type { BindingPattern, Expression, MatchExprClause, Type } from "../src/zod-schemas.js";
import {
	at,
	lit,
	ref,
	staticClause,
	structuredClause,
	summarize,
	varBinding,
	variable,
} from "./helper.js";

const options: MatchOptions = {
	relations: new StructuralTypeRelations(),
	position: at(1),
};

const intOrString = unionType([intType, stringType]);

const typeTest = (name: string, type: Type, testType: Type, line: number): Expression => ({
	kind: "typeTest",
	position: at(line),
	type: { kind: "boolean" },
	expr: ref(name, type, line),
	testType,
});

const tupleLit = (members: Expression[], type: Type, line: number): Expression => ({
	kind: "tupleLiteral", position: at(line), type, members,
});

const recordLit = (entries: Record<string, Expression>, line: number): Expression => ({
	kind: "recordLiteral",
	position: at(line),
	type: mapType(anydataType),
	entries: Object.entries(entries).map(([key, value]) => ({ key: ref(key, stringType, line), value })),
});

const tupleBinding = (members: BindingPattern[], type: Type, line: number): BindingPattern => ({
	kind: "tupleBinding", position: at(line), type, members,
});

const recordBinding = (fields: Record<string, BindingPattern>, type: Type, closed: boolean, line: number): BindingPattern => ({
	kind: "recordBinding",
	position: at(line),
	type,
	closed,
	fields: Object.entries(fields).map(([key, binding]) => ({ key, binding })),
});

const pair = tupleType([intType, stringType]);
const point = recordType([{ name: "x", type: intType }, { name: "y", type: intType }], true);

const exprClause = (type: Type, line: number): MatchExprClause => ({
	position: at(line),
	variable: variable("e", type, undefined, line),
	expr: ref("fallback", intType, line),
});

describe("Match Analyzer - Unit Tests", () => {

	//==========================================================================
	// Exhaustiveness
	//==========================================================================

	describe("exhaustiveness", () => {
		it("treats a trailing variable pattern as the default", () => {
			const result = analyzeMatch(intOrString, [
				staticClause(lit(5, intType, 2)),
				staticClause(lit("x", stringType, 3)),
				staticClause(ref("other", intOrString, 4)),
			], options);

			assert.deepStrictEqual(result.diagnostics, []);
			assert.equal(result.exhaustive, true);
			assert.deepStrictEqual(result.verdicts.map(v => v.isLastPattern), [false, false, true]);
			assert.deepStrictEqual(result.verdicts[2]?.matchedTypesDirect, [intType, stringType]);
		});

		it("reports each member type no literal pattern covers", () => {
			const result = analyzeMatch(intOrString, [
				staticClause(lit(5, intType, 2)),
				staticClause(lit("x", stringType, 3)),
			], options);

			assert.equal(result.exhaustive, false);
			assert.deepStrictEqual(result.diagnostics.map(d => d.args), [["int"], ["string"]]);
			assert.deepStrictEqual(summarize(result.diagnostics), ["NoMatchingPattern@1", "NoMatchingPattern@1"]);
		});

		it("covers every value of a finite type with one literal per value", () => {
			const flag = finiteType(["on"]);
			const result = analyzeMatch(flag, [staticClause(lit("on", stringType, 2))], options);
			assert.equal(result.exhaustive, true);
		});

		it("covers a multi-valued finite type with one literal per value", () => {
			const result = analyzeMatch(finiteType(["on", "off"]), [
				staticClause(lit("on", stringType, 2)),
				staticClause(lit("off", stringType, 3)),
			], options);

			assert.deepStrictEqual(result.diagnostics, []);
			assert.equal(result.exhaustive, true);
			assert.deepStrictEqual(result.verdicts[1]?.matchedTypesDirect, [finiteType(["off"])]);
		});

		it("covers boolean with true and false literals", () => {
			const result = analyzeMatch(booleanType, [
				staticClause(lit(true, booleanType, 2)),
				staticClause(lit(false, booleanType, 3)),
			], options);

			assert.deepStrictEqual(result.diagnostics, []);
			assert.equal(result.exhaustive, true);
		});

		it("reports the boolean value no literal covers", () => {
			const result = analyzeMatch(booleanType, [staticClause(lit(true, booleanType, 2))], options);

			assert.equal(result.exhaustive, false);
			assert.deepStrictEqual(summarize(result.diagnostics), ["NoMatchingPattern@1"]);
			assert.deepStrictEqual(result.diagnostics[0]?.args, ["false"]);
		});

		it("lets the implicit default absorb uncovered members", () => {
			const result = analyzeMatch(unionType([intType, nilType]), [
				staticClause(lit(1, intType, 2)),
			], { ...options, implicitDefaultType: nilType });

			assert.deepStrictEqual(result.diagnostics.map(d => d.args), [["int"]]);
		});

		it("counts a guarded binding as an indirect match only", () => {
			const binding = varBinding("n", intType, 2);
			const result = analyzeMatch(intType, [
				structuredClause(binding, undefined, typeTest("n", intType, intType, 2)),
			], options);

			assert.equal(result.exhaustive, false);
			assert.deepStrictEqual(result.verdicts[0]?.matchedTypesIndirect, [intType]);
			assert.deepStrictEqual(result.diagnostics, []);
		});

		it("skips a scrutinee that is already in error", () => {
			const result = analyzeMatch(semanticErrorType, [staticClause(lit(1, intType, 2))], options);
			assert.equal(result.skipped, true);
			assert.deepStrictEqual(result.diagnostics, []);
		});
	});

	//==========================================================================
	// Clause Reachability
	//==========================================================================

	describe("clause reachability", () => {
		it("reports a clause after a catch-all and the catch-all itself", () => {
			const result = analyzeMatch(intType, [
				staticClause(ref("x", intType, 2)),
				staticClause(ref("y", intType, 3)),
			], options);

			assert.deepStrictEqual(
				summarize(result.diagnostics),
				["UnreachableMatchPattern@3", "PatternAlwaysMatches@2"],
			);
			assert.deepStrictEqual(result.verdicts.map(v => v.reachable), [true, false]);
			assert.equal(result.verdicts[0]?.isLastPattern, true);
			assert.equal(result.diagnostics[1]?.severity, "warning");
		});

		it("reports a repeated literal", () => {
			const result = analyzeMatch(intType, [
				staticClause(lit(1, intType, 2)),
				staticClause(lit(1, intType, 3)),
				staticClause(ref("rest", intType, 4)),
			], options);
			assert.deepStrictEqual(summarize(result.diagnostics), ["UnreachableMatchPattern@3"]);
		});

		it("reports a literal that no member type can produce", () => {
			const result = analyzeMatch(intType, [
				staticClause(lit("x", stringType, 2)),
				staticClause(ref("rest", intType, 3)),
			], options);

			assert.deepStrictEqual(summarize(result.diagnostics), ["UnmatchedPattern@2", "PatternAlwaysMatches@3"]);
			assert.equal(result.verdicts[0]?.reachable, false);
		});

		it("reports a second default across static and structured clauses", () => {
			const result = analyzeMatch(intOrString, [
				staticClause(ref("x", intOrString, 2)),
				structuredClause(varBinding("y", intOrString, 3)),
			], options);
			assert.deepStrictEqual(summarize(result.diagnostics), ["DuplicateDefaultPattern@1"]);
		});

		it("drops a binding subsumed by an earlier binding of a wider type", () => {
			const result = analyzeMatch(intOrString, [
				structuredClause(varBinding("a", intOrString, 2)),
				structuredClause(varBinding("b", intType, 3)),
			], options);
			assert.deepStrictEqual(
				summarize(result.diagnostics),
				["UnreachableMatchPattern@3", "PatternAlwaysMatches@2"],
			);
		});

		it("keeps guarded bindings that test different types", () => {
			const result = analyzeMatch(intOrString, [
				structuredClause(varBinding("a", intOrString, 2), undefined, typeTest("a", intOrString, intType, 2)),
				structuredClause(varBinding("b", intOrString, 3), undefined, typeTest("b", intOrString, stringType, 3)),
			], options);
			assert.deepStrictEqual(result.verdicts.map(v => v.reachable), [true, true]);
		});
	});

	//==========================================================================
	// Static Tuple and Record Patterns
	//==========================================================================

	describe("static tuple and record patterns", () => {
		it("covers a tuple with a pattern of equal arity", () => {
			const result = analyzeMatch(pair, [
				staticClause(tupleLit([lit(1, intType, 2)], tupleType([intType]), 2)),
				staticClause(tupleLit([lit(1, intType, 3), ref("s", stringType, 3)], pair, 3)),
				staticClause(tupleLit([ref("a", intType, 4), ref("b", stringType, 4)], pair, 4)),
			], options);

			assert.deepStrictEqual(summarize(result.diagnostics), ["UnmatchedPattern@2"]);
			assert.equal(result.exhaustive, true);
			assert.deepStrictEqual(result.verdicts[1]?.matchedTypesDirect, []);
			assert.deepStrictEqual(result.verdicts[2]?.matchedTypesDirect, [pair]);
		});

		it("drops a tuple pattern after one binding every component", () => {
			const result = analyzeMatch(pair, [
				staticClause(tupleLit([ref("a", intType, 2), ref("b", stringType, 2)], pair, 2)),
				staticClause(tupleLit([lit(1, intType, 3), ref("s", stringType, 3)], pair, 3)),
			], options);
			assert.deepStrictEqual(
				summarize(result.diagnostics),
				["UnreachableMatchPattern@3", "PatternAlwaysMatches@2"],
			);
		});

		it("covers extra keys with the rest type of an open record", () => {
			const open = recordType([{ name: "id", type: intType }], false);
			const result = analyzeMatch(open, [
				staticClause(recordLit({ id: ref("i", intType, 2), tag: ref("t", stringType, 2) }, 2)),
			], options);

			assert.deepStrictEqual(summarize(result.diagnostics), ["PatternAlwaysMatches@2"]);
			assert.equal(result.exhaustive, true);
		});

		it("rejects extra keys against a sealed record", () => {
			const sealed = recordType([{ name: "id", type: intType }], true);
			const result = analyzeMatch(sealed, [
				staticClause(recordLit({ id: ref("i", intType, 2), tag: ref("t", stringType, 2) }, 2)),
			], options);

			assert.deepStrictEqual(summarize(result.diagnostics), ["UnmatchedPattern@2", "NoMatchingPattern@1"]);
			assert.deepStrictEqual(result.diagnostics[1]?.args, ["record {int id}"]);
		});

		it("drops a record pattern whose keys an earlier pattern already binds", () => {
			const open = recordType([{ name: "id", type: intType }], false);
			const result = analyzeMatch(open, [
				staticClause(recordLit({ id: ref("i", intType, 2) }, 2)),
				staticClause(recordLit({ id: lit(1, intType, 3), tag: ref("t", stringType, 3) }, 3)),
			], options);
			assert.deepStrictEqual(
				summarize(result.diagnostics),
				["UnreachableMatchPattern@3", "PatternAlwaysMatches@2"],
			);
		});

		it("checks map pattern values against the constraint", () => {
			const result = analyzeMatch(mapType(intType), [
				staticClause(recordLit({ a: lit("x", stringType, 2) }, 2)),
				staticClause(ref("rest", mapType(intType), 3)),
			], options);
			assert.deepStrictEqual(summarize(result.diagnostics), ["UnmatchedPattern@2", "PatternAlwaysMatches@3"]);
		});
	});

	//==========================================================================
	// Tuple and Record Bindings
	//==========================================================================

	describe("tuple and record bindings", () => {
		it("covers a tuple with a binding of equal arity and drops a repeat", () => {
			const result = analyzeMatch(pair, [
				structuredClause(tupleBinding([varBinding("a", intType, 2), varBinding("s", stringType, 2)], pair, 2)),
				structuredClause(tupleBinding([varBinding("x", intType, 3), varBinding("y", stringType, 3)], pair, 3)),
			], options);

			assert.deepStrictEqual(
				summarize(result.diagnostics),
				["UnreachableMatchPattern@3", "PatternAlwaysMatches@2"],
			);
			assert.equal(result.exhaustive, true);
		});

		it("does not cover a tuple with a binding of another arity", () => {
			const result = analyzeMatch(pair, [
				structuredClause(tupleBinding([varBinding("a", intType, 2)], tupleType([intType]), 2)),
			], options);

			assert.equal(result.exhaustive, false);
			assert.deepStrictEqual(summarize(result.diagnostics), ["NoMatchingPattern@1"]);
			assert.deepStrictEqual(result.diagnostics[0]?.args, ["[int,string]"]);
		});

		it("keeps an open record binding after a closed one", () => {
			const result = analyzeMatch(point, [
				structuredClause(recordBinding({ x: varBinding("a", intType, 2), y: varBinding("b", intType, 2) }, point, true, 2)),
				structuredClause(recordBinding({ x: varBinding("c", intType, 3), y: varBinding("d", intType, 3) }, point, false, 3)),
			], options);

			assert.deepStrictEqual(result.diagnostics, []);
			assert.deepStrictEqual(result.verdicts.map(v => v.reachable), [true, true]);
			assert.deepStrictEqual(result.verdicts[0]?.matchedTypesDirect, [point]);
		});

		it("drops a closed record binding after an open one", () => {
			const result = analyzeMatch(point, [
				structuredClause(recordBinding({ x: varBinding("a", intType, 2), y: varBinding("b", intType, 2) }, point, false, 2)),
				structuredClause(recordBinding({ x: varBinding("c", intType, 3), y: varBinding("d", intType, 3) }, point, true, 3)),
			], options);
			assert.deepStrictEqual(
				summarize(result.diagnostics),
				["UnreachableMatchPattern@3", "PatternAlwaysMatches@2"],
			);
		});

		it("keeps record bindings with different field counts", () => {
			const result = analyzeMatch(point, [
				structuredClause(recordBinding({ x: varBinding("a", intType, 2) }, point, false, 2)),
				structuredClause(recordBinding({ x: varBinding("c", intType, 3), y: varBinding("d", intType, 3) }, point, false, 3)),
			], options);

			assert.deepStrictEqual(result.diagnostics, []);
			assert.deepStrictEqual(result.verdicts.map(v => v.reachable), [true, true]);
		});

		it("does not let a closed binding cover a record with more fields", () => {
			const result = analyzeMatch(point, [
				structuredClause(recordBinding({ x: varBinding("a", intType, 2) }, point, true, 2)),
			], options);
			assert.deepStrictEqual(summarize(result.diagnostics), ["NoMatchingPattern@1"]);
		});
	});

	//==========================================================================
	// Match Expressions
	//==========================================================================

	describe("match expressions", () => {
		it("accepts clauses that handle every member not assignable to the result", () => {
			const result = analyzeMatchExpression(
				unionType([intType, errorType()]),
				[exprClause(errorType(), 2)],
				intType,
				options,
			);
			assert.deepStrictEqual(result.diagnostics, []);
			assert.deepStrictEqual(result.unmatchedTypes, []);
			assert.deepStrictEqual(result.verdicts[0]?.matchedTypesDirect, [errorType()]);
		});

		it("reports unhandled members together", () => {
			const result = analyzeMatchExpression(
				unionType([intType, stringType, errorType()]),
				[exprClause(errorType(), 2)],
				intType,
				options,
			);
			assert.deepStrictEqual(summarize(result.diagnostics), ["NoMatchingPattern@1"]);
			assert.deepStrictEqual(result.diagnostics[0]?.args, ["string"]);
		});

		it("reports an unused clause before a used one as unmatched", () => {
			const result = analyzeMatchExpression(
				unionType([intType, errorType()]),
				[exprClause(stringType, 2), exprClause(errorType(), 3)],
				intType,
				options,
			);
			assert.deepStrictEqual(summarize(result.diagnostics), ["UnmatchedPattern@2"]);
		});

		it("reports an unused trailing clause as unreachable", () => {
			const result = analyzeMatchExpression(
				unionType([intType, errorType()]),
				[exprClause(errorType(), 2), exprClause(stringType, 3)],
				intType,
				options,
			);
			assert.deepStrictEqual(summarize(result.diagnostics), ["UnreachableMatchPattern@3"]);
		});

		it("skips clauses bound to an erroneous type", () => {
			const result = analyzeMatchExpression(intType, [exprClause(semanticErrorType, 2)], nilType, options);
			assert.equal(result.skipped, true);
		});
	});

	it("renders a nullable error union with a trailing question mark", () => {
		assert.equal(typeToString(unionType([errorType(), nilType], true)), "error|()?");
	});
});
