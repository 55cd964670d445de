// SPDX-License-Identifier: MIT
// Corvid Match Analyzer
// Pattern reachability and exhaustiveness for match statements and expressions

import { type Diagnostic, DiagnosticCodes, DiagnosticLog } from "./diagnostics.js";
import { restTypeOf, type TypeRelations } from "./type-relations.js";
import { finiteType, flattenMembers, typeToString } from "./types.js";
import type {
	BindingPattern,
	Expression,
	LiteralValue,
	MatchClause,
	MatchExprClause,
	Position,
	RecordLiteralExpr,
	StaticMatchClause,
	StructuredMatchClause,
	Type,
} from "./zod-schemas.js";

//==============================================================================
// Result Types
//==============================================================================

export interface ClauseVerdict<C> {
	clause: C;
	matchedTypesDirect: Type[];
	matchedTypesIndirect: Type[];
	/** False for clauses that can never fire. */
	reachable: boolean;
	/** True for the catch-all default clause of its group. */
	isLastPattern: boolean;
}

export interface MatchAnalysis {
	/** One verdict per clause, in source order. */
	verdicts: ClauseVerdict<MatchClause>[];
	exhaustive: boolean;
	diagnostics: Diagnostic[];
	/** True when the scrutinee was already in error and nothing was checked. */
	skipped: boolean;
}

export interface MatchExpressionAnalysis {
	verdicts: ClauseVerdict<MatchExprClause>[];
	unmatchedTypes: Type[];
	diagnostics: Diagnostic[];
	skipped: boolean;
}

export interface MatchOptions {
	relations: TypeRelations;
	/** Position of the match construct, anchor of match-wide diagnostics. */
	position: Position;
	/** Type absorbed by the compiler-inserted default branch. */
	implicitDefaultType?: Type | undefined;
	log?: DiagnosticLog;
}

function unionMembersOf(t: Type): Type[] {
	const members = flattenMembers(t);
	const hasNil = members.some(m => m.kind === "nil" || (m.kind === "finite" && m.values.includes(null)));
	if (t.kind === "union" && t.nullable && !hasNil) {
		return [...members, { kind: "nil" }];
	}
	return members;
}

/** One single-valued finite member per value, so literals can cover them. */
function valueMembersOf(t: Type): Type[] {
	if (t.kind === "boolean") return [finiteType([true]), finiteType([false])];
	if (t.kind === "finite" && t.values.length > 1) return t.values.map(v => finiteType([v]));
	return [t];
}

/**
 * Decompose the scrutinee type into the member types to cover: union
 * members, with `boolean` and multi-valued finite types split per value.
 */
export function memberTypesOf(t: Type): Type[] {
	return unionMembersOf(t).flatMap(valueMembersOf);
}

//==============================================================================
// Static Patterns
//==============================================================================

function recordKeyName(key: Expression): string | undefined {
	if (key.kind === "varRef") return key.name;
	if (key.kind === "literal" && typeof key.value === "string") return key.value;
	return undefined;
}

function recordEntries(pattern: RecordLiteralExpr): Map<string, Expression> | undefined {
	const entries = new Map<string, Expression>();
	for (const entry of pattern.entries) {
		const name = recordKeyName(entry.key);
		if (name === undefined) return undefined;
		entries.set(name, entry.value);
	}
	return entries;
}

function isTupleLike(e: Expression): e is Extract<Expression, { kind: "tupleLiteral" | "listLiteral" }> {
	return e.kind === "tupleLiteral" || e.kind === "listLiteral";
}

function literalMatchesFinite(values: LiteralValue[], value: LiteralValue): boolean {
	return values.includes(value);
}

/**
 * Whether a static pattern can match some value of type `t`.
 */
export function staticPatternCanMatch(t: Type, pattern: Expression, relations: TypeRelations): boolean {
	if (pattern.kind === "varRef") return true;
	if (pattern.type.kind === "none" || pattern.type.kind === "any") return true;
	if (relations.isSameType(pattern.type, t)) return true;

	switch (t.kind) {
	case "any":
	case "anydata":
	case "json":
		return true;
	case "union":
		return memberTypesOf(t).some(m => staticPatternCanMatch(m, pattern, relations));
	case "tuple": {
		if (!isTupleLike(pattern) || pattern.members.length !== t.members.length) return false;
		return pattern.members.every((member, i) => {
			const component = t.members[i];
			return component !== undefined && staticPatternCanMatch(component, member, relations);
		});
	}
	case "map":
		if (pattern.kind !== "recordLiteral") return false;
		return pattern.entries.every(e => staticPatternCanMatch(t.of, e.value, relations));
	case "record": {
		if (pattern.kind !== "recordLiteral") return false;
		const entries = recordEntries(pattern);
		if (entries === undefined) return false;
		const rest = restTypeOf(t);
		for (const [name, value] of entries) {
			const field = t.fields.find(f => f.name === name);
			const fieldType = field?.type ?? rest;
			if (fieldType === undefined || !staticPatternCanMatch(fieldType, value, relations)) return false;
		}
		return true;
	}
	case "byte":
		return pattern.type.kind === "int";
	case "finite":
		return pattern.kind === "literal" && literalMatchesFinite(t.values, pattern.value);
	default:
		return false;
	}
}

/**
 * Whether a static pattern matches every value of type `t`.
 */
export function staticPatternCovers(t: Type, pattern: Expression, relations: TypeRelations): boolean {
	if (pattern.kind === "varRef") return true;
	switch (t.kind) {
	case "nil":
		return pattern.kind === "literal" && pattern.value === null;
	case "finite": {
		const [only] = t.values;
		return t.values.length === 1 && pattern.kind === "literal" && pattern.value === only;
	}
	case "tuple":
		if (!isTupleLike(pattern) || pattern.members.length !== t.members.length) return false;
		return pattern.members.every((member, i) => {
			const component = t.members[i];
			return component !== undefined && staticPatternCovers(component, member, relations);
		});
	case "record": {
		if (pattern.kind !== "recordLiteral") return false;
		const entries = recordEntries(pattern);
		if (entries === undefined) return false;
		const rest = restTypeOf(t);
		for (const [name, value] of entries) {
			const field = t.fields.find(f => f.name === name);
			if (field !== undefined) {
				if (field.optional || !staticPatternCovers(field.type, value, relations)) return false;
			} else if (rest === undefined || !staticPatternCovers(rest, value, relations)) {
				return false;
			}
		}
		return true;
	}
	default:
		return false;
	}
}

function sameLiteral(a: Expression, b: Expression): boolean {
	return a.kind === "literal" && b.kind === "literal"
		&& a.value === b.value && a.type.kind === b.type.kind;
}

/**
 * Whether every value `later` matches is already matched by `earlier`.
 */
export function staticPatternSubsumes(earlier: Expression, later: Expression): boolean {
	if (earlier.kind === "varRef") return true;
	if (earlier.kind === "recordLiteral" && later.kind === "recordLiteral") {
		const laterEntries = recordEntries(later);
		const earlierEntries = recordEntries(earlier);
		if (laterEntries === undefined || earlierEntries === undefined) return false;
		for (const [name, value] of earlierEntries) {
			const other = laterEntries.get(name);
			if (other === undefined || !staticPatternSubsumes(value, other)) return false;
		}
		return true;
	}
	if (isTupleLike(earlier) && isTupleLike(later)) {
		if (earlier.members.length !== later.members.length) return false;
		return earlier.members.every((member, i) => {
			const other = later.members[i];
			return other !== undefined && staticPatternSubsumes(member, other);
		});
	}
	return sameLiteral(earlier, later);
}

//==============================================================================
// Structured Patterns
//==============================================================================

/**
 * Whether an unguarded binding pattern matches every value of type `t`.
 */
export function bindingCovers(t: Type, binding: BindingPattern, relations: TypeRelations): boolean {
	switch (binding.kind) {
	case "variableBinding":
		return relations.isAssignable(t, binding.type);
	case "tupleBinding":
		if (t.kind !== "tuple" || t.members.length !== binding.members.length) return false;
		return binding.members.every((member, i) => {
			const component = t.members[i];
			return component !== undefined && bindingCovers(component, member, relations);
		});
	case "recordBinding": {
		if (t.kind !== "record") return false;
		for (const { key, binding: sub } of binding.fields) {
			const field = t.fields.find(f => f.name === key);
			if (field === undefined || field.optional || !bindingCovers(field.type, sub, relations)) return false;
		}
		if (binding.closed) {
			return t.sealed && t.fields.every(f => binding.fields.some(b => b.key === f.name));
		}
		return true;
	}
	}
}

/**
 * Whether `earlier` binds every value `later` binds.
 */
export function bindingSubsumes(
	earlier: BindingPattern,
	later: BindingPattern,
	relations: TypeRelations,
): boolean {
	if (earlier.type.kind === "semanticError" || later.type.kind === "semanticError") return false;
	if (earlier.kind === "recordBinding" && later.kind === "recordBinding") {
		if (earlier.fields.length !== later.fields.length) return false;
		for (const { key, binding } of earlier.fields) {
			const other = later.fields.find(f => f.key === key);
			if (other === undefined || !bindingSubsumes(binding, other.binding, relations)) return false;
		}
		return !earlier.closed || later.closed;
	}
	if (earlier.kind === "tupleBinding" && later.kind === "tupleBinding") {
		if (earlier.members.length !== later.members.length) return false;
		return earlier.members.every((member, i) => {
			const other = later.members[i];
			return other !== undefined && bindingSubsumes(member, other, relations);
		});
	}
	if (earlier.kind === "variableBinding") {
		return relations.isAssignable(later.type, earlier.type);
	}
	return false;
}

/**
 * Whether the earlier guard lets through everything the later one does:
 * no earlier guard, or both test the same variable against the same type.
 */
export function guardSubsumes(
	earlier: Expression | undefined,
	later: Expression | undefined,
	relations: TypeRelations,
): boolean {
	if (earlier === undefined) return true;
	if (later === undefined) return false;
	if (earlier.kind !== "typeTest" || later.kind !== "typeTest") return false;
	if (earlier.expr.kind !== "varRef" || later.expr.kind !== "varRef") return false;
	return earlier.expr.name === later.expr.name && relations.isSameType(earlier.testType, later.testType);
}

//==============================================================================
// Match Statement Analysis
//==============================================================================

type Verdict = ClauseVerdict<MatchClause>;

function isCatchAll(clause: MatchClause): boolean {
	if (clause.kind === "staticClause") return clause.pattern.kind === "varRef";
	return clause.binding.kind === "variableBinding" && clause.guard === undefined;
}

function clauseCovers(t: Type, clause: MatchClause, relations: TypeRelations): boolean {
	if (clause.kind === "staticClause") return staticPatternCovers(t, clause.pattern, relations);
	return clause.guard === undefined && bindingCovers(t, clause.binding, relations);
}

function patternType(clause: MatchClause): Type {
	return clause.kind === "staticClause" ? clause.pattern.type : clause.binding.type;
}

function clauseContains(t: Type, clause: MatchClause, relations: TypeRelations): boolean {
	switch (t.kind) {
	case "any":
	case "anydata":
	case "json":
		return clause.kind === "staticClause"
			? staticPatternCanMatch(t, clause.pattern, relations)
			: true;
	case "record":
	case "object":
		return relations.isAssignable(patternType(clause), t);
	case "byte":
		return patternType(clause).kind === "int";
	default:
		// a guarded binding that would otherwise cover the type
		return clause.kind === "structuredClause"
			&& clause.guard !== undefined
			&& bindingCovers(t, clause.binding, relations);
	}
}

function recordCoverage(members: Type[], verdicts: Verdict[], relations: TypeRelations): Type[] {
	const uncovered: Type[] = [];
	for (const t of members) {
		const direct = verdicts.find(v => clauseCovers(t, v.clause, relations));
		if (direct !== undefined) {
			direct.matchedTypesDirect.push(t);
			continue;
		}
		let indirect = false;
		for (const v of verdicts) {
			if (clauseContains(t, v.clause, relations)) {
				v.matchedTypesIndirect.push(t);
				indirect = true;
			}
		}
		if (!indirect) uncovered.push(t);
	}
	return uncovered;
}

function clauseSubsumes(earlier: MatchClause, later: MatchClause, relations: TypeRelations): boolean {
	if (earlier.kind === "staticClause" && later.kind === "staticClause") {
		return staticPatternSubsumes(earlier.pattern, later.pattern);
	}
	if (earlier.kind === "structuredClause" && later.kind === "structuredClause") {
		return bindingSubsumes(earlier.binding, later.binding, relations)
			&& guardSubsumes(earlier.guard, later.guard, relations);
	}
	return false;
}

function clauseAnchor(clause: MatchClause): Position {
	return clause.kind === "staticClause" ? clause.pattern.position : clause.binding.position;
}

/** Drop clauses subsumed by an earlier one; returns the remaining clauses. */
function dropUnreachable(group: Verdict[], relations: TypeRelations, log: DiagnosticLog): Verdict[] {
	const remaining = [...group];
	for (let i = 0; i < remaining.length; i++) {
		const earlier = remaining[i];
		if (earlier === undefined) continue;
		for (let j = i + 1; j < remaining.length; j++) {
			const later = remaining[j];
			if (later === undefined) continue;
			if (clauseSubsumes(earlier.clause, later.clause, relations)) {
				log.report(clauseAnchor(later.clause), DiagnosticCodes.UnreachableMatchPattern);
				later.reachable = false;
				remaining.splice(j--, 1);
			}
		}
	}
	return remaining;
}

function markDefault(group: Verdict[]): boolean {
	const last = group[group.length - 1];
	if (last === undefined || !isCatchAll(last.clause)) return false;
	last.isLastPattern = true;
	return true;
}

/**
 * Analyze the clauses of a match statement against its scrutinee type.
 */
export function analyzeMatch(
	scrutineeType: Type,
	clauses: MatchClause[],
	options: MatchOptions,
): MatchAnalysis {
	const { relations } = options;
	const log = options.log ?? new DiagnosticLog();
	const firstEntry = log.diagnostics.length;
	const verdicts: Verdict[] = clauses.map(clause => ({
		clause,
		matchedTypesDirect: [],
		matchedTypesIndirect: [],
		reachable: true,
		isLastPattern: false,
	}));
	if (scrutineeType.kind === "semanticError") {
		return { verdicts, exhaustive: false, diagnostics: [], skipped: true };
	}
	const members = memberTypesOf(scrutineeType);

	// Static patterns that can match no member type take no further part.
	const candidates: Verdict[] = [];
	for (const v of verdicts) {
		const { clause } = v;
		if (clause.kind === "staticClause" && !members.some(t => staticPatternCanMatch(t, clause.pattern, relations))) {
			log.report(clause.pattern.position, DiagnosticCodes.UnmatchedPattern);
			v.reachable = false;
			continue;
		}
		candidates.push(v);
	}

	const uncovered = recordCoverage(members, candidates, relations);
	const { implicitDefaultType } = options;
	for (const t of uncovered) {
		if (implicitDefaultType !== undefined && relations.isAssignable(t, implicitDefaultType)) continue;
		log.report(options.position, DiagnosticCodes.NoMatchingPattern, typeToString(t));
	}

	const staticGroup = dropUnreachable(
		candidates.filter(v => v.clause.kind === "staticClause"), relations, log);
	const structuredGroup = dropUnreachable(
		candidates.filter(v => v.clause.kind === "structuredClause"), relations, log);

	const staticDefault = markDefault(staticGroup);
	const structuredDefault = markDefault(structuredGroup);
	if (staticDefault && structuredDefault) {
		log.report(options.position, DiagnosticCodes.DuplicateDefaultPattern);
	}

	const allDirect = members.every(t => candidates.some(v => v.matchedTypesDirect.includes(t)));
	const exhaustive = staticDefault || structuredDefault || allDirect;

	const remaining = [...staticGroup, ...structuredGroup];
	const [only] = remaining;
	if (remaining.length === 1 && only !== undefined
		&& members.every(t => clauseCovers(t, only.clause, relations))) {
		log.report(clauseAnchor(only.clause), DiagnosticCodes.PatternAlwaysMatches);
	}

	return {
		verdicts,
		exhaustive,
		diagnostics: log.diagnostics.slice(firstEntry),
		skipped: false,
	};
}

//==============================================================================
// Match Expression Analysis
//==============================================================================

/**
 * Analyze a match expression (`expr but { T x => ... }`). Members not
 * matched by any clause and not assignable to the expression's own type
 * are reported together.
 */
export function analyzeMatchExpression(
	scrutineeType: Type,
	clauses: MatchExprClause[],
	resultType: Type,
	options: MatchOptions,
): MatchExpressionAnalysis {
	const { relations } = options;
	const log = options.log ?? new DiagnosticLog();
	const firstEntry = log.diagnostics.length;
	const verdicts: ClauseVerdict<MatchExprClause>[] = clauses.map(clause => ({
		clause,
		matchedTypesDirect: [],
		matchedTypesIndirect: [],
		reachable: true,
		isLastPattern: false,
	}));
	const members = unionMembersOf(scrutineeType);
	const inError = members.some(t => t.kind === "semanticError")
		|| clauses.some(c => c.variable.type.kind === "semanticError");
	if (inError) {
		return { verdicts, unmatchedTypes: [], diagnostics: [], skipped: true };
	}

	const unmatchedTypes: Type[] = [];
	for (const t of members) {
		let matched = false;
		for (const v of verdicts) {
			const clauseType = v.clause.variable.type;
			if (relations.isAssignable(t, clauseType) || (t.kind === "byte" && clauseType.kind === "int")) {
				v.matchedTypesDirect.push(t);
				matched = true;
				break;
			}
			const indirect = t.kind === "any"
				|| ((t.kind === "json" || t.kind === "record" || t.kind === "object")
					&& relations.isAssignable(clauseType, t));
			if (indirect) v.matchedTypesIndirect.push(t);
		}
		if (!matched && !relations.isAssignable(t, resultType)) unmatchedTypes.push(t);
	}

	if (unmatchedTypes.length > 0) {
		log.report(options.position, DiagnosticCodes.NoMatchingPattern, unmatchedTypes.map(typeToString).join(", "));
	}

	let laterMatched = false;
	for (let i = verdicts.length - 1; i >= 0; i--) {
		const v = verdicts[i];
		if (v === undefined) continue;
		if (v.matchedTypesDirect.length === 0 && v.matchedTypesIndirect.length === 0) {
			v.reachable = false;
			log.report(
				v.clause.position,
				laterMatched ? DiagnosticCodes.UnmatchedPattern : DiagnosticCodes.UnreachableMatchPattern,
			);
		} else {
			laterMatched = true;
		}
	}

	return {
		verdicts,
		unmatchedTypes,
		diagnostics: log.diagnostics.slice(firstEntry),
		skipped: false,
	};
}
