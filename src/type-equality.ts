// SPDX-License-Identifier: MIT
// Corvid Type Equality
// Structural equality over the type domain

import type { RecordField, Type } from "./zod-schemas.js";

function listEqual(aTypes: Type[], bTypes: Type[]): boolean {
	if (aTypes.length !== bTypes.length) return false;
	for (let i = 0; i < aTypes.length; i++) {
		const typeA = aTypes[i];
		const typeB = bTypes[i];
		if (typeA === undefined || typeB === undefined) return false;
		if (!typeEqual(typeA, typeB)) return false;
	}
	return true;
}

/** Order-insensitive member comparison, used for unions. */
function setEqual(aTypes: Type[], bTypes: Type[]): boolean {
	if (aTypes.length !== bTypes.length) return false;
	return aTypes.every(a => bTypes.some(b => typeEqual(a, b)))
		&& bTypes.every(b => aTypes.some(a => typeEqual(a, b)));
}

function getOfField(t: Type): Type | undefined {
	if ("of" in t) return t.of;
	return undefined;
}

function wrapperEqual(a: Type, b: Type): boolean {
	const aOf = getOfField(a);
	const bOf = getOfField(b);
	if (aOf === undefined || bOf === undefined) return false;
	return typeEqual(aOf, bOf);
}

function fieldsEqual(aFields: RecordField[], bFields: RecordField[]): boolean {
	if (aFields.length !== bFields.length) return false;
	return aFields.every(fa => {
		const fb = bFields.find(f => f.name === fa.name);
		return fb !== undefined && (fa.optional ?? false) === (fb.optional ?? false) && typeEqual(fa.type, fb.type);
	});
}

function optionalEqual(a: Type | undefined, b: Type | undefined): boolean {
	if (a === undefined || b === undefined) return a === b;
	return typeEqual(a, b);
}

function errorEqual(a: Type, b: Type): boolean {
	if (a.kind !== "error" || b.kind !== "error") return false;
	return a.name === b.name;
}

function unionEqual(a: Type, b: Type): boolean {
	if (a.kind !== "union" || b.kind !== "union") return false;
	return (a.nullable ?? false) === (b.nullable ?? false) && setEqual(a.members, b.members);
}

function tupleEqual(a: Type, b: Type): boolean {
	if (a.kind !== "tuple" || b.kind !== "tuple") return false;
	return listEqual(a.members, b.members);
}

function arrayEqual(a: Type, b: Type): boolean {
	if (a.kind !== "array" || b.kind !== "array") return false;
	return a.size === b.size && (a.sealed ?? false) === (b.sealed ?? false) && typeEqual(a.of, b.of);
}

function recordEqual(a: Type, b: Type): boolean {
	if (a.kind !== "record" || b.kind !== "record") return false;
	if (a.name !== undefined || b.name !== undefined) return a.name === b.name;
	return a.sealed === b.sealed && optionalEqual(a.rest, b.rest) && fieldsEqual(a.fields, b.fields);
}

function objectEqual(a: Type, b: Type): boolean {
	if (a.kind !== "object" || b.kind !== "object") return false;
	return a.name === b.name;
}

function finiteEqual(a: Type, b: Type): boolean {
	if (a.kind !== "finite" || b.kind !== "finite") return false;
	return a.values.length === b.values.length && a.values.every(v => b.values.includes(v));
}

function fnEqual(a: Type, b: Type): boolean {
	if (a.kind !== "function" || b.kind !== "function") return false;
	return listEqual(a.params, b.params) && typeEqual(a.returns, b.returns);
}

const PRIMITIVE_KINDS: ReadonlySet<string> = new Set([
	"nil", "boolean", "int", "byte", "float", "decimal", "string",
	"any", "anydata", "json", "none", "semanticError",
]);

const WRAPPER_KINDS: ReadonlySet<string> = new Set([
	"map", "future", "stream",
]);

const COMPOUND_CHECKERS: Record<string, (a: Type, b: Type) => boolean> = {
	error: errorEqual,
	union: unionEqual,
	tuple: tupleEqual,
	array: arrayEqual,
	record: recordEqual,
	object: objectEqual,
	finite: finiteEqual,
	function: fnEqual,
};

export function typeEqual(a: Type, b: Type): boolean {
	if (a.kind !== b.kind) return false;
	if (PRIMITIVE_KINDS.has(a.kind)) return true;
	if (WRAPPER_KINDS.has(a.kind)) return wrapperEqual(a, b);
	const checker = COMPOUND_CHECKERS[a.kind];
	if (checker) return checker(a, b);
	return false;
}
