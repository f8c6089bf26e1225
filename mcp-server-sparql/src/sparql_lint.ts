/**
 * SPARQL Safety Linter
 *
 * Deterministic checks that run before a query is allowed near an endpoint:
 * - Only SELECT / ASK query forms
 * - LIMIT injected when missing, capped when too high
 * - FROM / FROM NAMED / GRAPH blocked
 * - Unbounded property paths (`*` / `+`) blocked
 * - Only SERVICE wikibase:label allowed
 * - Mandatory grounding of wd:Q… / wdt:P… identifiers
 * - Triple-pattern count warning
 *
 * This is a structural gate, not a grammar. Only string literals and
 * comments are masked; IRIs are checked as written. Known false positives:
 * arithmetic such as `?a*2` or `1+1`, and a `*` or `+` inside an IRI such as
 * `<http://x.org/a+b>`, read as a path modifier. Known false
 * negatives: a path modifier hidden behind whitespace (`wdt:P279 *`) or a
 * prefix/property reached through a variable is not detected.
 */

import { DEFAULTS, type GroundingPolicy, type GroundingSets } from "./config.js"
import { SparqlQuery } from "./sparql_query.js"

// ============================================================================
// Types
// ============================================================================

export interface LintResult {
	/** False when any error was found; the query must not be executed */
	ok: boolean

	/** Query text after LIMIT injection / capping */
	query: string

	/** Non-blocking notes */
	warnings: string[]

	/** Blocking rule violations */
	errors: string[]
}

export interface LintOptions {
	/** Identifiers already resolved by the grounding tools */
	grounding?: GroundingSets

	/** Which identifier kinds must be grounded (default: none) */
	groundingPolicy?: GroundingPolicy

	limitCap?: number
	maxTriples?: number

	/** Warn when the label service is combined with a LIMIT above this */
	labelServiceLimit?: number
}

// ============================================================================
// Patterns (all applied to masked text)
// ============================================================================

const QUERY_FORM_RE = /\b(CONSTRUCT|DESCRIBE)\b/i

// Keywords only: a variable such as ?from or ?graph is not a clause
const BLOCKED_SCOPE_RE =
	/(?<![?$\w])(?:FROM\s+NAMED\b|FROM\s*<|FROM\s+[A-Za-z][\w-]*:|GRAPH\s*[?$<]|GRAPH\s+[A-Za-z][\w-]*:)/i

// `*` or `+` right after a word char, `>` or `)` is how a path modifier
// looks (wdt:P279*, <iri>+, (a|b)*). COUNT(*) does not match: `*` follows `(`.
const UNBOUNDED_PATH_RE = /[\w>)][*+]/

const SERVICE_RE = /\bSERVICE\b/gi
const LABEL_SERVICE_RE = /\bSERVICE\s+wikibase:label\b/gi

const ENTITY_ID_RE = /\bwd:(Q\d+)\b/g
const PROPERTY_ID_RE = /\b(?:wdt|p|ps|pq):(P\d+)\b/g

const TRIPLE_PATTERN_RE = /\?\w+\s+\S+\s+\S+/g

// ============================================================================
// Helpers
// ============================================================================

function collectIds(masked: string, re: RegExp): Set<string> {
	const ids = new Set<string>()
	for (const m of masked.matchAll(re)) {
		ids.add(m[1])
	}
	return ids
}

function countMatches(masked: string, re: RegExp): number {
	return Array.from(masked.matchAll(re)).length
}

function sortedList(ids: Iterable<string>): string {
	return Array.from(ids)
		.sort((a, b) => a.localeCompare(b, "en", { numeric: true }))
		.join(", ")
}

function checkGrounding(
	used: Set<string>,
	allowed: ReadonlySet<string>,
	kind: { noun: string; listName: string; tool: string },
): string | null {
	if (used.size === 0) return null

	if (allowed.size === 0) {
		return (
			`Query references ${kind.noun} IDs (${sortedList(used)}) ` +
			`but no ${kind.listName} list was provided. ` +
			`Call ${kind.tool} first and pass the results.`
		)
	}

	const bad = Array.from(used).filter((id) => !allowed.has(id))
	if (bad.length > 0) {
		return `${kind.noun[0].toUpperCase()}${kind.noun.slice(1)} IDs not from grounding tools: ${sortedList(bad)}. Call ${kind.tool} first.`
	}
	return null
}

// ============================================================================
// Linter
// ============================================================================

/**
 * Check a SPARQL query against the safety rules.
 *
 * Rules run in a fixed order; each may add a warning or an error. The
 * returned `query` carries the LIMIT rewrite even when blocked.
 */
export function lintSparql(query: string, options: LintOptions = {}): LintResult {
	const limitCap = options.limitCap ?? DEFAULTS.limitCap
	const maxTriples = options.maxTriples ?? DEFAULTS.maxTriples
	const labelServiceLimit = options.labelServiceLimit ?? DEFAULTS.labelServiceLimit
	const policy = options.groundingPolicy ?? { entities: false, properties: false }
	const grounding = options.grounding

	const warnings: string[] = []
	const errors: string[] = []

	let q = SparqlQuery.parse(query)

	// ---- Query form ----
	if (QUERY_FORM_RE.test(q.masked)) {
		errors.push("Only SELECT or ASK queries are supported (CONSTRUCT / DESCRIBE are blocked).")
	}

	// ---- LIMIT enforcement ----
	if (!q.limit) {
		q = q.withLimit(limitCap)
		warnings.push(`Injected LIMIT ${limitCap} (was missing).`)
	} else if (q.limit.value > limitCap) {
		const current = q.limit.value
		q = q.withLimit(limitCap)
		warnings.push(`Capped LIMIT from ${current} to ${limitCap}.`)
	}

	const masked = q.masked

	// ---- Blocked scope (FROM / GRAPH) ----
	if (BLOCKED_SCOPE_RE.test(masked)) {
		errors.push("Query uses FROM, FROM NAMED or GRAPH. Dataset and graph selection are blocked.")
	}

	// ---- Unbounded property paths ----
	if (UNBOUNDED_PATH_RE.test(masked)) {
		errors.push(
			"Unbounded property path (* or +) detected. " +
				"Use a fixed-length path instead (e.g. wdt:P31/wdt:P279 instead of wdt:P279*).",
		)
	}

	// ---- SERVICE allow-list ----
	const labelServices = countMatches(masked, LABEL_SERVICE_RE)
	if (countMatches(masked, SERVICE_RE) > labelServices) {
		errors.push("Only SERVICE wikibase:label is allowed. Other SERVICE clauses are blocked.")
	}

	const effectiveLimit = q.limit?.value ?? limitCap
	if (labelServices > 0 && effectiveLimit > labelServiceLimit) {
		warnings.push(
			`SERVICE wikibase:label with LIMIT ${effectiveLimit} may cause timeouts. ` +
				`Consider removing it or reducing LIMIT to ${labelServiceLimit} or less.`,
		)
	}

	// ---- Mandatory grounding ----
	if (policy.entities) {
		const problem = checkGrounding(collectIds(masked, ENTITY_ID_RE), grounding?.entityIds ?? new Set<string>(), {
			noun: "entity",
			listName: "allowed_entities",
			tool: "search_entity",
		})
		if (problem) errors.push(problem)
	}
	if (policy.properties) {
		const problem = checkGrounding(collectIds(masked, PROPERTY_ID_RE), grounding?.propertyIds ?? new Set<string>(), {
			noun: "property",
			listName: "allowed_properties",
			tool: "search_property",
		})
		if (problem) errors.push(problem)
	}

	// ---- Triple-pattern count ----
	const tripleCount = countMatches(masked, TRIPLE_PATTERN_RE)
	if (tripleCount > maxTriples) {
		warnings.push(
			`Query has ~${tripleCount} triple patterns (soft limit ${maxTriples}). Consider simplifying if it times out.`,
		)
	}

	return {
		ok: errors.length === 0,
		query: q.text,
		warnings,
		errors,
	}
}
