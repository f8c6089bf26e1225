import { describe, it, expect } from "vitest"
import { ManualClock } from "./clock.js"
import { RateThrottle } from "./rate_throttle.js"
import {
	RheaTemplates,
	buildChildrenQuery,
	buildEcQuery,
	buildEquationTextQuery,
	buildSubstrateProductQuery,
	type TemplateQuery,
} from "./rhea_tools.js"
import { REQUEST_SHAPES, type SparqlExecutor, type TransportResult } from "./sparql_transport.js"

const RHEA = "https://rhea.example.org/sparql"

function queryOf(built: TemplateQuery): string {
	if (!built.ok) throw new Error(built.error)
	return built.query
}

describe("Rhea query builders", () => {
	it("should build the substrate → product query with escaped, lower-cased names", () => {
		const q = queryOf(buildSubstrateProductQuery('L-Glu"tamine', " Ammonia "))
		expect(q).toContain('FILTER(CONTAINS(LCASE(STR(?n1)), "l-glu\\"tamine"))')
		expect(q).toContain('FILTER(CONTAINS(LCASE(STR(?n2)), "ammonia"))')
		expect(q).toContain("?left  rh:transformableTo ?right .")
		expect(q.endsWith("ORDER BY ?reaction\nLIMIT 200")).toBe(true)
	})

	it("should require both names", () => {
		expect(buildSubstrateProductQuery("glucose", "  ")).toEqual({
			ok: false,
			error: "Provide both substrate_name and product_name",
		})
	})

	it("should clamp template limits", () => {
		expect(queryOf(buildSubstrateProductQuery("a", "b", 5000)).endsWith("LIMIT 2000")).toBe(true)
		expect(queryOf(buildSubstrateProductQuery("a", "b", 0)).endsWith("LIMIT 1")).toBe(true)
	})

	it("should build the EC query and validate the number", () => {
		const q = queryOf(buildEcQuery("1.1.1.1", 10))
		expect(q).toContain("PREFIX ec:   <http://purl.uniprot.org/enzyme/>")
		expect(q).toContain("rh:ec ec:1.1.1.1 .")
		expect(q.endsWith("LIMIT 10")).toBe(true)
		expect(buildEcQuery("1.1.1")).toEqual({ ok: false, error: "Invalid EC number format (expected a.b.c.d)" })
		expect(buildEcQuery("1.1.1.x")).toEqual({ ok: false, error: "Invalid EC number format (expected a.b.c.d)" })
	})

	it("should build the equation-text query with a default limit of 50", () => {
		const q = queryOf(buildEquationTextQuery("NADH"))
		expect(q).toContain('FILTER(CONTAINS(LCASE(STR(?equation)), "nadh"))')
		expect(q.endsWith("LIMIT 50")).toBe(true)
		expect(buildEquationTextQuery("")).toEqual({ ok: false, error: "Provide contains_text" })
	})

	it("should build the children query from a RHEA accession", () => {
		const q = queryOf(buildChildrenQuery("rhea:12345"))
		expect(q).toContain("VALUES (?parent) { (rh:12345) }")
		expect(q).toContain("?child rdfs:subClassOf+ ?parent ;")
		expect(q.endsWith("LIMIT 500")).toBe(true)
		expect(buildChildrenQuery("12345")).toEqual({ ok: false, error: "Provide parent_rhea_id like 'RHEA:12345'" })
	})
})

describe("RheaTemplates", () => {
	function setup(outcome: TransportResult) {
		const clock = new ManualClock()
		const throttle = new RateThrottle({ minIntervalMs: 0 }, clock)
		const calls: Array<{ endpoint: string; query: string; timeoutMs: number }> = []
		const transport: SparqlExecutor = {
			execute: async (endpoint, query, timeoutMs) => {
				calls.push({ endpoint, query, timeoutMs })
				return outcome
			},
		}
		const templates = new RheaTemplates({ sparqlUrl: RHEA, transport, throttle, timeoutMs: 60000 })
		return { templates, calls, throttle }
	}

	it("should run a template and return rows", async () => {
		const { templates, calls } = setup({
			ok: true,
			body: {
				results: {
					bindings: [
						{
							reaction: { type: "uri", value: "http://rdf.rhea-db.org/10000" },
							equation: { type: "literal", value: "A + B = C" },
						},
					],
				},
			},
			shape: REQUEST_SHAPES[0],
		})

		const result = await templates.reactionsByEc("1.1.1.1")

		expect(calls).toHaveLength(1)
		expect(calls[0].endpoint).toBe(RHEA)
		expect(calls[0].timeoutMs).toBe(60000)
		expect(result).toEqual({
			ok: true,
			rows: [{ reaction: "http://rdf.rhea-db.org/10000", equation: "A + B = C" }],
			rowCount: 1,
			query: calls[0].query,
		})
	})

	it("should not call the endpoint for invalid input", async () => {
		const { templates, calls } = setup({ ok: true, body: { boolean: true }, shape: REQUEST_SHAPES[0] })

		const result = await templates.childrenOfReaction("not-an-id")

		expect(result).toEqual({ ok: false, error: "Provide parent_rhea_id like 'RHEA:12345'" })
		expect(calls).toHaveLength(0)
	})

	it("should run without a throttle", async () => {
		const calls: string[] = []
		const transport: SparqlExecutor = {
			execute: async (endpoint) => {
				calls.push(endpoint)
				return { ok: true, body: { results: { bindings: [] } }, shape: REQUEST_SHAPES[0] }
			},
		}
		const templates = new RheaTemplates({ sparqlUrl: RHEA, transport, timeoutMs: 60000 })

		await templates.reactionsByEc("1.1.1.1")
		await templates.reactionsByEc("2.7.1.1")

		expect(calls).toEqual([RHEA, RHEA])
	})

	it("should classify failures and record 429s on the throttle", async () => {
		const { templates, throttle } = setup({
			ok: false,
			statusCode: 599,
			body: "All SPARQL request attempts failed. POST: HTTP 429: slow down",
			rateLimited: true,
			lastStatus: 429,
		})

		const result = await templates.reactionsByEquationText("atp")

		expect(result).toEqual({
			ok: false,
			error: "All SPARQL request attempts failed. POST: HTTP 429: slow down",
			errorCode: "RATE_LIMIT",
			hint: "Wait a moment before retrying.",
		})
		expect(throttle.snapshot("rhea").consecutiveRateLimitHits).toBe(1)
	})
})
