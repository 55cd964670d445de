// SPDX-License-Identifier: MIT
// Corvid Type Relations
// Type-compatibility oracle consumed by the analyzer

import { typeEqual } from "./type-equality.js";
import { anydataType, flattenMembers } from "./types.js";
import type { FiniteValue, RecordType, Type } from "./zod-schemas.js";

//==============================================================================
// Oracle Interface
//==============================================================================

/**
 * Assignability and identity queries. The analyzer never decides type
 * compatibility itself; a compiler driver can plug in its own checker.
 */
export interface TypeRelations {
	isAssignable(from: Type, to: Type): boolean;
	isSameType(a: Type, b: Type): boolean;
}

//==============================================================================
// Structural Relations
//==============================================================================

const SIMPLE_ANYDATA: ReadonlySet<string> = new Set([
	"nil", "boolean", "int", "byte", "float", "decimal", "string", "anydata", "json", "none",
]);

const SIMPLE_JSON: ReadonlySet<string> = new Set([
	"nil", "boolean", "int", "byte", "float", "decimal", "string", "json", "none",
]);

function finiteValueType(v: FiniteValue): Type {
	if (v === null) return { kind: "nil" };
	if (typeof v === "string") return { kind: "string" };
	if (typeof v === "boolean") return { kind: "boolean" };
	return Number.isInteger(v) ? { kind: "int" } : { kind: "float" };
}

/** Rest type of a record; open records without one take `anydata`. */
export function restTypeOf(record: RecordType): Type | undefined {
	if (record.sealed) return undefined;
	return record.rest ?? anydataType;
}

/**
 * Default oracle: structural subtyping over the type domain. Objects and
 * errors with a name compare nominally.
 */
export class StructuralTypeRelations implements TypeRelations {
	isSameType(a: Type, b: Type): boolean {
		return typeEqual(a, b);
	}

	isAssignable(from: Type, to: Type): boolean {
		if (from.kind === "semanticError" || to.kind === "semanticError") return true;
		if (from.kind === "none") return true;
		if (typeEqual(from, to)) return true;

		if (from.kind === "union") {
			if (from.nullable && !this.isAssignable({ kind: "nil" }, to)) return false;
			return from.members.every(m => this.isAssignable(m, to));
		}
		if (to.kind === "union") {
			if (to.nullable && from.kind === "nil") return true;
			return to.members.some(m => this.isAssignable(from, m));
		}
		if (from.kind === "finite") {
			if (to.kind === "finite") return from.values.every(v => to.values.includes(v));
			return from.values.every(v => this.isAssignable(finiteValueType(v), to));
		}

		switch (to.kind) {
		case "any":
			return !flattenMembers(from).some(m => m.kind === "error");
		case "anydata":
			return this.isAnydata(from);
		case "json":
			return this.isJson(from);
		case "int":
			return from.kind === "byte";
		case "error":
			return from.kind === "error" && (to.name === undefined || to.name === from.name);
		case "tuple":
			return from.kind === "tuple"
				&& from.members.length === to.members.length
				&& from.members.every((m, i) => {
					const target = to.members[i];
					return target !== undefined && this.isAssignable(m, target);
				});
		case "array":
			if (from.kind === "tuple") {
				if (to.sealed && to.size !== from.members.length) return false;
				return from.members.every(m => this.isAssignable(m, to.of));
			}
			if (from.kind !== "array") return false;
			if (to.sealed && (!from.sealed || from.size !== to.size)) return false;
			return this.isAssignable(from.of, to.of);
		case "map":
			if (from.kind === "map") return this.isAssignable(from.of, to.of);
			if (from.kind === "record") {
				const rest = restTypeOf(from);
				return from.fields.every(f => this.isAssignable(f.type, to.of))
					&& (rest === undefined || this.isAssignable(rest, to.of));
			}
			return false;
		case "record":
			return from.kind === "record" && this.isRecordAssignable(from, to);
		case "future":
			return from.kind === "future" && this.isAssignable(from.of, to.of);
		case "stream":
			return from.kind === "stream" && typeEqual(from.of, to.of);
		case "function":
			return from.kind === "function"
				&& from.params.length === to.params.length
				&& to.params.every((p, i) => {
					const param = from.params[i];
					return param !== undefined && this.isAssignable(p, param);
				})
				&& this.isAssignable(from.returns, to.returns);
		default:
			return false;
		}
	}

	private isRecordAssignable(from: RecordType, to: RecordType): boolean {
		for (const target of to.fields) {
			const source = from.fields.find(f => f.name === target.name);
			if (source === undefined) {
				if (!target.optional) return false;
				continue;
			}
			if (source.optional && !target.optional) return false;
			if (!this.isAssignable(source.type, target.type)) return false;
		}
		const toRest = restTypeOf(to);
		const fromRest = restTypeOf(from);
		const extra = from.fields.filter(f => !to.fields.some(t => t.name === f.name));
		if (toRest === undefined) {
			return extra.length === 0 && fromRest === undefined;
		}
		return extra.every(f => this.isAssignable(f.type, toRest))
			&& (fromRest === undefined || this.isAssignable(fromRest, toRest));
	}

	private isAnydata(t: Type): boolean {
		if (SIMPLE_ANYDATA.has(t.kind)) return true;
		switch (t.kind) {
		case "finite":
			return true;
		case "union":
			return t.members.every(m => this.isAnydata(m));
		case "tuple":
			return t.members.every(m => this.isAnydata(m));
		case "array":
		case "map":
			return this.isAnydata(t.of);
		case "record": {
			const rest = restTypeOf(t);
			return t.fields.every(f => this.isAnydata(f.type))
				&& (rest === undefined || this.isAnydata(rest));
		}
		default:
			return false;
		}
	}

	private isJson(t: Type): boolean {
		if (SIMPLE_JSON.has(t.kind)) return true;
		switch (t.kind) {
		case "finite":
			return true;
		case "union":
			return t.members.every(m => this.isJson(m));
		case "tuple":
			return t.members.every(m => this.isJson(m));
		case "array":
		case "map":
			return this.isJson(t.of);
		case "record":
			return t.fields.every(f => this.isJson(f.type))
				&& (t.sealed || (t.rest !== undefined && this.isJson(t.rest)));
		default:
			return false;
		}
	}
}
