// SPDX-License-Identifier: MIT
// Corvid Type Definitions
// Re-exports the typed AST domains and provides type constructors and helpers

import { typeEqual } from "./type-equality.js";
import type {
	ArrayType,
	ErrorType,
	FiniteType,
	FiniteValue,
	FutureType,
	MapType,
	NilType,
	RecordField,
	RecordType,
	SymbolFlag,
	SymbolInfo,
	TupleType,
	Type,
	UnionType,
} from "./zod-schemas.js";

export type * from "./zod-schemas.js";

//==============================================================================
// Type Constructors
//==============================================================================

export const nilType: NilType = { kind: "nil" };
export const booleanType: Type = { kind: "boolean" };
export const intType: Type = { kind: "int" };
export const byteType: Type = { kind: "byte" };
export const floatType: Type = { kind: "float" };
export const decimalType: Type = { kind: "decimal" };
export const stringType: Type = { kind: "string" };
export const anyType: Type = { kind: "any" };
export const anydataType: Type = { kind: "anydata" };
export const jsonType: Type = { kind: "json" };
export const noneType: Type = { kind: "none" };
export const semanticErrorType: Type = { kind: "semanticError" };

export const errorType = (name?: string): ErrorType =>
	name === undefined ? { kind: "error" } : { kind: "error", name };
export const tupleType = (members: Type[]): TupleType => ({ kind: "tuple", members });
export const arrayType = (of: Type, size?: number, sealed?: boolean): ArrayType => ({
	kind: "array",
	of,
	...(size !== undefined ? { size } : {}),
	...(sealed !== undefined ? { sealed } : {}),
});
export const mapType = (of: Type): MapType => ({ kind: "map", of });
export const recordType = (
	fields: RecordField[],
	sealed: boolean,
	rest?: Type,
): RecordType => ({
	kind: "record",
	fields,
	sealed,
	...(rest !== undefined ? { rest } : {}),
});
export const futureType = (of: Type, workerDerivative = false): FutureType => ({
	kind: "future",
	of,
	workerDerivative,
});
export const finiteType = (values: FiniteValue[]): FiniteType => ({ kind: "finite", values });

/**
 * Build a union, flattening nested unions and dropping duplicates.
 * A single remaining member is returned as-is unless the union is nullable.
 */
export function unionType(members: Type[], nullable = false): Type {
	const flat: Type[] = [];
	for (const member of members) {
		for (const m of flattenMembers(member)) {
			if (!flat.some(existing => typeEqual(existing, m))) flat.push(m);
		}
	}
	if (nullable) {
		const result: UnionType = { kind: "union", members: flat, nullable: true };
		return result;
	}
	const [first] = flat;
	if (flat.length === 1 && first !== undefined) return first;
	return { kind: "union", members: flat };
}

//==============================================================================
// Type Helpers
//==============================================================================

/** Member types of a union (recursively flattened), or the type itself. */
export function flattenMembers(t: Type): Type[] {
	if (t.kind !== "union") return [t];
	return t.members.flatMap(flattenMembers);
}

export function isSemanticError(t: Type): boolean {
	return t.kind === "semanticError";
}

export function isNil(t: Type): boolean {
	return t.kind === "nil";
}

/** True for `error` types and unions made only of them. */
export function isErrorType(t: Type): boolean {
	if (t.kind === "error") return true;
	if (t.kind === "union") return t.members.length > 0 && t.members.every(isErrorType);
	return false;
}

/** True when some member of the (possibly union) type is an error. */
export function containsErrorType(t: Type): boolean {
	return flattenMembers(t).some(m => m.kind === "error");
}

/** Symbol carried by a named type, if any. */
export function typeSymbol(t: Type): SymbolInfo | undefined {
	switch (t.kind) {
	case "error":
	case "record":
	case "object":
	case "finite":
		return t.symbol;
	default:
		return undefined;
	}
}

export function hasFlag(symbol: SymbolInfo | undefined, flag: SymbolFlag): boolean {
	return symbol?.flags?.includes(flag) ?? false;
}

/** Readable rendering of a type, used in diagnostic arguments. */
export function typeToString(t: Type): string {
	switch (t.kind) {
	case "nil":
		return "()";
	case "semanticError":
		return "<error>";
	case "error":
		return t.name ?? "error";
	case "union": {
		const body = t.members.map(typeToString).join("|");
		return t.nullable ? body + "?" : body;
	}
	case "tuple":
		return "[" + t.members.map(typeToString).join(",") + "]";
	case "array":
		return typeToString(t.of) + "[" + (t.size !== undefined ? String(t.size) : "") + "]";
	case "map":
		return "map<" + typeToString(t.of) + ">";
	case "record":
		return t.name ?? "record {" + t.fields.map(f => typeToString(f.type) + " " + f.name).join("; ") + "}";
	case "object":
		return t.name;
	case "future":
		return "future<" + typeToString(t.of) + ">";
	case "finite":
		return t.symbol?.name ?? t.values.map(v => JSON.stringify(v)).join("|");
	case "stream":
		return "stream<" + typeToString(t.of) + ">";
	case "function":
		return "function (" + t.params.map(typeToString).join(",") + ") returns (" + typeToString(t.returns) + ")";
	default:
		return t.kind;
	}
}
