import { describe, it, expect } from "vitest"
import { groundingFromLists, type GroundingPolicy } from "./config.js"
import { lintSparql } from "./sparql_lint.js"

const WIKIDATA: GroundingPolicy = { entities: true, properties: true }

const UNBOUNDED = /Unbounded property path/

describe("lintSparql", () => {
	describe("LIMIT enforcement", () => {
		it("should inject LIMIT when missing", () => {
			const result = lintSparql("SELECT ?x WHERE { ?x a <T> }", { limitCap: 200 })
			expect(result.ok).toBe(true)
			expect(result.query).toBe("SELECT ?x WHERE { ?x a <T> }\nLIMIT 200")
			expect(result.warnings).toEqual(["Injected LIMIT 200 (was missing)."])
		})

		it("should add exactly one LIMIT clause", () => {
			const result = lintSparql('SELECT ?x WHERE { ?x rdfs:label "LIMIT 5" }', { limitCap: 50 })
			expect(result.query.match(/LIMIT \d+/g)).toEqual(["LIMIT 5", "LIMIT 50"])
			expect(result.query.endsWith("\nLIMIT 50")).toBe(true)
		})

		it("should cap a LIMIT above the cap", () => {
			const result = lintSparql("SELECT ?x WHERE { ?x ?p ?o } LIMIT 1000", { limitCap: 200 })
			expect(result.query).toBe("SELECT ?x WHERE { ?x ?p ?o } LIMIT 200")
			expect(result.warnings).toEqual(["Capped LIMIT from 1000 to 200."])
		})

		it("should leave all other text byte-identical when capping", () => {
			const query = 'SELECT ?x # LIMIT 9999\nWHERE { ?x rdfs:label "LIMIT 8000" } LIMIT 900'
			const result = lintSparql(query, { limitCap: 200 })
			expect(result.query).toBe('SELECT ?x # LIMIT 9999\nWHERE { ?x rdfs:label "LIMIT 8000" } LIMIT 200')
		})

		it("should keep a LIMIT at or below the cap", () => {
			const result = lintSparql("SELECT ?x WHERE { ?x ?p ?o } LIMIT 20", { limitCap: 200 })
			expect(result.query).toBe("SELECT ?x WHERE { ?x ?p ?o } LIMIT 20")
			expect(result.warnings).toEqual([])
		})

		it("should be idempotent on an already-linted query", () => {
			const first = lintSparql("SELECT ?x WHERE { ?x a <T> }", { limitCap: 200 })
			const second = lintSparql(first.query, { limitCap: 200 })
			expect(second.ok).toBe(true)
			expect(second.query).toBe(first.query)
			expect(second.warnings).toEqual([])
		})
	})

	describe("query form", () => {
		it("should block CONSTRUCT", () => {
			const result = lintSparql("CONSTRUCT { ?s ?p ?o } WHERE { ?s ?p ?o } LIMIT 5")
			expect(result.ok).toBe(false)
			expect(result.errors).toEqual(["Only SELECT or ASK queries are supported (CONSTRUCT / DESCRIBE are blocked)."])
		})

		it("should block DESCRIBE", () => {
			expect(lintSparql("DESCRIBE <http://example.org/x>").ok).toBe(false)
		})

		it("should allow ASK", () => {
			expect(lintSparql("ASK { ?s ?p ?o }").ok).toBe(true)
		})
	})

	describe("unbounded paths", () => {
		it("should block wdt:P279*", () => {
			const result = lintSparql("SELECT ?c WHERE { ?c wdt:P279* ?root } LIMIT 10")
			expect(result.ok).toBe(false)
			expect(result.errors).toHaveLength(1)
			expect(result.errors[0]).toMatch(UNBOUNDED)
		})

		it("should block + after an IRI and after a group", () => {
			expect(lintSparql("SELECT ?c WHERE { ?c <http://example.org/p>+ ?d } LIMIT 10").errors[0]).toMatch(UNBOUNDED)
			expect(lintSparql("SELECT ?c WHERE { ?c (ex:a|ex:b)* ?d } LIMIT 10").errors[0]).toMatch(UNBOUNDED)
		})

		it("should not block a marker inside a string literal", () => {
			const result = lintSparql('SELECT ?x WHERE { ?x rdfs:label "wdt:P279*" } LIMIT 10')
			expect(result.ok).toBe(true)
		})

		it("should not block a marker inside a comment", () => {
			expect(lintSparql("SELECT ?x WHERE { ?x ?p ?o } # try wdt:P279+\nLIMIT 10").ok).toBe(true)
		})

		it("should not block COUNT(*)", () => {
			expect(lintSparql("SELECT (COUNT(*) AS ?n) WHERE { ?s ?p ?o } LIMIT 1").ok).toBe(true)
		})

		// Structural check, not a grammar: these are known limitations
		it("flags arithmetic that looks like a path modifier (known false positive)", () => {
			expect(lintSparql("SELECT ?a WHERE { ?s ex:n ?a FILTER(?a*2 > 3) } LIMIT 5").ok).toBe(false)
		})

		it("flags a plus sign inside an IRI (known false positive)", () => {
			expect(lintSparql("SELECT ?y WHERE { ?x <http://x.org/a+b> ?y } LIMIT 5").ok).toBe(false)
		})

		it("misses a modifier separated by whitespace (known false negative)", () => {
			expect(lintSparql("SELECT ?x WHERE { ?x wdt:P279 * ?y } LIMIT 5").ok).toBe(true)
		})
	})

	describe("blocked scope", () => {
		const SCOPE_ERROR = "Query uses FROM, FROM NAMED or GRAPH. Dataset and graph selection are blocked."

		it("should block FROM <iri>", () => {
			const result = lintSparql("SELECT ?s FROM <http://example.org/g> WHERE { ?s ?p ?o } LIMIT 5")
			expect(result.errors).toEqual([SCOPE_ERROR])
		})

		it("should block FROM NAMED and GRAPH", () => {
			expect(lintSparql("SELECT ?s FROM NAMED ex:g WHERE { ?s ?p ?o } LIMIT 5").errors).toEqual([SCOPE_ERROR])
			expect(lintSparql("SELECT ?s WHERE { GRAPH ?g { ?s ?p ?o } } LIMIT 5").errors).toEqual([SCOPE_ERROR])
		})

		it("should not block variables named ?from or ?graph", () => {
			expect(lintSparql("SELECT ?from WHERE { ?from ex:p ?graph } LIMIT 5").ok).toBe(true)
		})
	})

	describe("SERVICE allow-list", () => {
		const labelQuery =
			'SELECT ?item ?itemLabel WHERE { ?item ex:p ?o . SERVICE wikibase:label { bd:serviceParam wikibase:language "en". } } LIMIT 100'

		it("should block a non-label SERVICE", () => {
			const result = lintSparql("SELECT ?s WHERE { SERVICE <http://other.example.org/sparql> { ?s ?p ?o } } LIMIT 5")
			expect(result.errors).toEqual(["Only SERVICE wikibase:label is allowed. Other SERVICE clauses are blocked."])
		})

		it("should allow the label service and warn about a large LIMIT", () => {
			const result = lintSparql(labelQuery)
			expect(result.ok).toBe(true)
			expect(result.warnings).toEqual([
				"SERVICE wikibase:label with LIMIT 100 may cause timeouts. Consider removing it or reducing LIMIT to 50 or less.",
			])
		})

		it("should not warn at or below the label-service limit", () => {
			const result = lintSparql(labelQuery.replace("LIMIT 100", "LIMIT 50"))
			expect(result.warnings).toEqual([])
		})
	})

	describe("mandatory grounding", () => {
		it("should block wd:Q42 with an empty grounding set", () => {
			const result = lintSparql("SELECT ?p WHERE { wd:Q42 ?p ?o } LIMIT 5", { groundingPolicy: WIKIDATA })
			expect(result.ok).toBe(false)
			expect(result.errors).toEqual([
				"Query references entity IDs (Q42) but no allowed_entities list was provided. Call search_entity first and pass the results.",
			])
		})

		it("should pass when the grounding set is a superset", () => {
			const result = lintSparql("SELECT ?p WHERE { wd:Q42 ?p ?o } LIMIT 5", {
				groundingPolicy: WIKIDATA,
				grounding: groundingFromLists(["Q42", "Q5"]),
			})
			expect(result.ok).toBe(true)
		})

		it("should name the ungrounded entities in numeric order", () => {
			const result = lintSparql("SELECT ?x WHERE { VALUES ?x { wd:Q100 wd:Q42 wd:Q7 wd:Q1 } } LIMIT 5", {
				groundingPolicy: WIKIDATA,
				grounding: groundingFromLists(["Q1"]),
			})
			expect(result.errors).toEqual(["Entity IDs not from grounding tools: Q7, Q42, Q100. Call search_entity first."])
		})

		it("should check every relation prefix", () => {
			const result = lintSparql("SELECT ?o WHERE { ?s wdt:P31 ?o . ?s p:P569 ?st . ?st ps:P569 ?d . ?st pq:P580 ?q } LIMIT 5", {
				groundingPolicy: WIKIDATA,
				grounding: groundingFromLists([], ["P31"]),
			})
			expect(result.errors).toEqual(["Property IDs not from grounding tools: P569, P580. Call search_property first."])
		})

		it("should report a missing property list", () => {
			const result = lintSparql("SELECT ?o WHERE { ?s wdt:P31 ?o } LIMIT 5", { groundingPolicy: WIKIDATA })
			expect(result.errors).toEqual([
				"Query references property IDs (P31) but no allowed_properties list was provided. Call search_property first and pass the results.",
			])
		})

		it("should ignore identifiers inside literals and full IRIs", () => {
			const result = lintSparql(
				'SELECT ?x WHERE { ?x rdfs:comment "see wd:Q42" . ?x ex:p <http://www.wikidata.org/entity/Q42> } LIMIT 5',
				{ groundingPolicy: WIKIDATA },
			)
			expect(result.ok).toBe(true)
		})

		it("should skip grounding when the policy does not require it", () => {
			expect(lintSparql("SELECT ?p WHERE { wd:Q42 wdt:P31 ?o } LIMIT 5").ok).toBe(true)
		})

		it("should enforce each kind independently", () => {
			const result = lintSparql("SELECT ?o WHERE { wd:Q42 wdt:P31 ?o } LIMIT 5", {
				groundingPolicy: { entities: true, properties: false },
				grounding: groundingFromLists(["Q42"]),
			})
			expect(result.ok).toBe(true)
		})
	})

	describe("complexity", () => {
		it("should warn above the triple-pattern soft limit", () => {
			const query = "SELECT ?s WHERE {\n  ?s ex:p ?a .\n  ?s ex:p ?b .\n  ?s ex:p ?c .\n} LIMIT 10"
			const result = lintSparql(query, { maxTriples: 3 })
			expect(result.ok).toBe(true)
			expect(result.warnings).toEqual(["Query has ~4 triple patterns (soft limit 3). Consider simplifying if it times out."])
		})
	})
})
