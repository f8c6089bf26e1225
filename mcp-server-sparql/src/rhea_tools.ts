/**
 * Rhea Query Templates
 *
 * Parameterized queries for the Rhea biochemical reaction database. The
 * template text is trusted (caller input only reaches it escaped or
 * format-checked), so these skip the linter and go straight to the
 * transport, through the throttle only when one is given.
 * `childrenOfReaction` relies on rdfs:subClassOf+, which the linter would
 * block in caller-written text.
 */

import { clampLimit, escapeSparqlString, type ErrorCode, type ResultRow } from "./config.js"
import type { RateThrottle } from "./rate_throttle.js"
import { classifyTransportFailure } from "./repair_orchestrator.js"
import { bindingsToRows, type SparqlExecutor } from "./sparql_transport.js"

const PREFIXES = `PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>
PREFIX rh:   <http://rdf.rhea-db.org/>`

const EC_NUMBER_RE = /^\d+\.\d+\.\d+\.\d+$/
const RHEA_ID_RE = /^RHEA:(\d+)$/i

export type TemplateResult =
	| { ok: true; rows: ResultRow[]; rowCount: number; query: string }
	| { ok: false; error: string; errorCode?: ErrorCode; hint?: string }

export type TemplateQuery = { ok: true; query: string } | { ok: false; error: string }

// ============================================================================
// Query builders
// ============================================================================

/**
 * Approved reactions converting a substrate (by name) into a product (by
 * name). Direction follows rh:transformableTo (left → right).
 */
export function buildSubstrateProductQuery(substrateName: string, productName: string, limit?: number): TemplateQuery {
	const s = escapeSparqlString((substrateName ?? "").trim().toLowerCase())
	const p = escapeSparqlString((productName ?? "").trim().toLowerCase())
	if (!s || !p) return { ok: false, error: "Provide both substrate_name and product_name" }
	const lim = clampLimit(limit, 200)

	return {
		ok: true,
		query: `${PREFIXES}

SELECT DISTINCT ?reaction ?equation WHERE {
  ?reaction rdfs:subClassOf rh:Reaction ;
            rh:status rh:Approved ;
            rh:equation ?equation ;
            rh:side ?left, ?right .
  ?left  rh:transformableTo ?right .

  ?left  rh:contains ?p1 .
  ?p1    rh:compound ?c1 .
  ?c1    rh:name ?n1 .
  FILTER(CONTAINS(LCASE(STR(?n1)), "${s}"))

  ?right rh:contains ?p2 .
  ?p2    rh:compound ?c2 .
  ?c2    rh:name ?n2 .
  FILTER(CONTAINS(LCASE(STR(?n2)), "${p}"))
}
ORDER BY ?reaction
LIMIT ${lim}`,
	}
}

export function buildEcQuery(ecNumber: string, limit?: number): TemplateQuery {
	const num = (ecNumber ?? "").trim()
	if (!EC_NUMBER_RE.test(num)) return { ok: false, error: "Invalid EC number format (expected a.b.c.d)" }
	const lim = clampLimit(limit, 200)

	return {
		ok: true,
		query: `${PREFIXES}
PREFIX ec:   <http://purl.uniprot.org/enzyme/>

SELECT ?reaction ?equation WHERE {
  ?reaction rdfs:subClassOf rh:Reaction ;
            rh:status rh:Approved ;
            rh:equation ?equation ;
            rh:ec ec:${num} .
}
ORDER BY ?reaction
LIMIT ${lim}`,
	}
}

export function buildEquationTextQuery(containsText: string, limit?: number): TemplateQuery {
	const text = escapeSparqlString((containsText ?? "").trim().toLowerCase())
	if (!text) return { ok: false, error: "Provide contains_text" }
	const lim = clampLimit(limit, 50)

	return {
		ok: true,
		query: `${PREFIXES}

SELECT ?reaction ?accession ?equation WHERE {
  ?reaction rdfs:subClassOf rh:Reaction ;
            rh:accession ?accession ;
            rh:equation  ?equation .
  FILTER(CONTAINS(LCASE(STR(?equation)), "${text}"))
}
LIMIT ${lim}`,
	}
}

export function buildChildrenQuery(parentRheaId: string, limit?: number): TemplateQuery {
	const m = RHEA_ID_RE.exec((parentRheaId ?? "").trim())
	if (!m) return { ok: false, error: "Provide parent_rhea_id like 'RHEA:12345'" }
	const lim = clampLimit(limit, 500)

	return {
		ok: true,
		query: `${PREFIXES}

SELECT ?child ?childEq WHERE {
  VALUES (?parent) { (rh:${m[1]}) }
  ?child rdfs:subClassOf+ ?parent ;
         rh:equation ?childEq .
}
ORDER BY ?child
LIMIT ${lim}`,
	}
}

// ============================================================================
// Runner
// ============================================================================

export class RheaTemplates {
	constructor(
		private readonly deps: {
			sparqlUrl: string
			transport: SparqlExecutor
			throttle?: RateThrottle
			timeoutMs: number
		},
	) {}

	reactionsBySubstrateAndProduct(substrateName: string, productName: string, limit?: number): Promise<TemplateResult> {
		return this.run(buildSubstrateProductQuery(substrateName, productName, limit))
	}

	reactionsByEc(ecNumber: string, limit?: number): Promise<TemplateResult> {
		return this.run(buildEcQuery(ecNumber, limit))
	}

	reactionsByEquationText(containsText: string, limit?: number): Promise<TemplateResult> {
		return this.run(buildEquationTextQuery(containsText, limit))
	}

	childrenOfReaction(parentRheaId: string, limit?: number): Promise<TemplateResult> {
		return this.run(buildChildrenQuery(parentRheaId, limit))
	}

	private async run(built: TemplateQuery): Promise<TemplateResult> {
		if (!built.ok) return built

		const { throttle } = this.deps
		await throttle?.beforeCall("rhea")
		const outcome = await this.deps.transport.execute(this.deps.sparqlUrl, built.query, this.deps.timeoutMs)
		throttle?.onResult("rhea", !outcome.ok && outcome.rateLimited)

		if (!outcome.ok) {
			const classified = classifyTransportFailure(outcome)
			return { ok: false, error: outcome.body.slice(0, 500), errorCode: classified.code, hint: classified.hint }
		}
		const rows = bindingsToRows(outcome.body)
		return { ok: true, rows, rowCount: rows.length, query: built.query }
	}
}
