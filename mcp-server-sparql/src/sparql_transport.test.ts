import { describe, it, expect } from "vitest"
import { classifySparqlError } from "./error_classifier.js"
import { SparqlTransport, bindingsToRows, type FetchLike, type SparqlResults } from "./sparql_transport.js"

const ENDPOINT = "https://sparql.example.org/sparql"
const QUERY = "ASK {}"

interface RecordedCall {
	url: string
	init: RequestInit
}

/** Fake fetch answering each call from `respond`, recording the requests */
function fakeFetch(respond: (call: RecordedCall, index: number) => Response | Error) {
	const calls: RecordedCall[] = []
	const fetchImpl: FetchLike = async (url, init) => {
		const call = { url, init }
		calls.push(call)
		const outcome = respond(call, calls.length - 1)
		if (outcome instanceof Error) throw outcome
		return outcome
	}
	return { calls, fetchImpl }
}

function json(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/sparql-results+json" } })
}

function abortError(): Error {
	return Object.assign(new Error("This operation was aborted"), { name: "AbortError" })
}

const SELECT_BODY: SparqlResults = {
	head: { vars: ["x", "label"] },
	results: {
		bindings: [
			{ x: { type: "uri", value: "http://example.org/a" }, label: { type: "literal", value: "A" } },
			{ x: { type: "uri", value: "http://example.org/b" } },
		],
	},
}

describe("SparqlTransport", () => {
	it("should succeed on the first shape with a form-encoded POST", async () => {
		const { calls, fetchImpl } = fakeFetch(() => json(SELECT_BODY))
		const transport = new SparqlTransport({ userAgent: "test-agent", fetchImpl })

		const result = await transport.execute(ENDPOINT, QUERY, 1000)

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.shape).toEqual({ method: "POST", withFormat: false })
		expect(calls).toHaveLength(1)
		expect(calls[0].url).toBe(ENDPOINT)
		expect(calls[0].init.method).toBe("POST")
		expect(calls[0].init.body).toBe("query=ASK+%7B%7D")
		const headers = new Headers(calls[0].init.headers)
		expect(headers.get("User-Agent")).toBe("test-agent")
		expect(headers.get("Accept")).toBe("application/sparql-results+json")
		expect(headers.get("Content-Type")).toBe("application/x-www-form-urlencoded")
	})

	it("should try the shapes in order until one succeeds", async () => {
		const { calls, fetchImpl } = fakeFetch((_call, index) =>
			index < 2 ? new Response("Method Not Allowed", { status: 405 }) : json({ boolean: true }),
		)
		const transport = new SparqlTransport({ userAgent: "test-agent", fetchImpl })

		const result = await transport.execute(ENDPOINT, QUERY, 1000)

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.shape).toEqual({ method: "GET", withFormat: false })
		expect(calls.map((c) => c.init.method)).toEqual(["POST", "POST", "GET"])
		expect(calls[1].init.body).toBe("query=ASK+%7B%7D&format=json")
		expect(calls[2].url).toBe(`${ENDPOINT}?query=ASK+%7B%7D`)
	})

	it("should append GET parameters to an endpoint that already has a query string", async () => {
		const { calls, fetchImpl } = fakeFetch((_call, index) =>
			index < 3 ? new Response("nope", { status: 400 }) : json({ boolean: false }),
		)
		const transport = new SparqlTransport({ userAgent: "test-agent", fetchImpl })

		const result = await transport.execute("https://sparql.example.org/sparql?default=1", QUERY, 1000)

		expect(result.ok).toBe(true)
		expect(calls[3].url).toBe("https://sparql.example.org/sparql?default=1&query=ASK+%7B%7D&format=json")
	})

	it("should report every shape's diagnostic and the 429 flag when all fail", async () => {
		const { calls, fetchImpl } = fakeFetch(() => new Response("slow down", { status: 429 }))
		const transport = new SparqlTransport({ userAgent: "test-agent", fetchImpl })

		const result = await transport.execute(ENDPOINT, QUERY, 1000)

		expect(calls).toHaveLength(4)
		expect(result).toEqual({
			ok: false,
			statusCode: 599,
			body:
				"All SPARQL request attempts failed. POST: HTTP 429: slow down | POST+format: HTTP 429: slow down | " +
				"GET: HTTP 429: slow down | GET+format: HTTP 429: slow down",
			rateLimited: true,
			lastStatus: 429,
		})
	})

	it("should keep a timeout visible to the classifier", async () => {
		const { fetchImpl } = fakeFetch(() => abortError())
		const transport = new SparqlTransport({ userAgent: "test-agent", fetchImpl })

		const result = await transport.execute(ENDPOINT, QUERY, 1000)

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.rateLimited).toBe(false)
		expect(result.lastStatus).toBeUndefined()
		expect(result.body).toBe(
			"All SPARQL request attempts failed. POST: POST request timed out after 1000ms | " +
				"POST+format: POST request timed out after 1000ms | GET: GET request timed out after 1000ms | " +
				"GET+format: GET request timed out after 1000ms",
		)
		expect(classifySparqlError(result.body).code).toBe("TIMEOUT")
	})

	it("should report connection failures", async () => {
		const { fetchImpl } = fakeFetch(() => new TypeError("fetch failed"))
		const transport = new SparqlTransport({ userAgent: "test-agent", fetchImpl })

		const result = await transport.execute(ENDPOINT, QUERY, 1000)

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.body.startsWith(`All SPARQL request attempts failed. POST: Cannot connect to ${ENDPOINT}: fetch failed | `)).toBe(true)
	})

	it("should reject non-JSON and unexpected JSON bodies", async () => {
		const { fetchImpl } = fakeFetch((_call, index) =>
			index % 2 === 0 ? new Response("<html>ok</html>", { status: 200 }) : json({ unexpected: true }),
		)
		const transport = new SparqlTransport({ userAgent: "test-agent", fetchImpl })

		const result = await transport.execute(ENDPOINT, QUERY, 1000)

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.lastStatus).toBe(200)
		expect(result.body).toBe(
			"All SPARQL request attempts failed. POST: Non-JSON response body (HTTP 200) | " +
				"POST+format: Unexpected JSON result shape (HTTP 200) | GET: Non-JSON response body (HTTP 200) | " +
				"GET+format: Unexpected JSON result shape (HTTP 200)",
		)
	})

	it("should truncate the combined diagnostic", async () => {
		const { fetchImpl } = fakeFetch(() => new Response("e".repeat(1000), { status: 500 }))
		const transport = new SparqlTransport({ userAgent: "test-agent", fetchImpl, maxErrorBody: 120 })

		const result = await transport.execute(ENDPOINT, QUERY, 1000)

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.body).toHaveLength(120)
		expect(result.lastStatus).toBe(500)
	})
})

describe("bindingsToRows", () => {
	it("should map bindings to variable → value rows", () => {
		expect(bindingsToRows(SELECT_BODY)).toEqual([
			{ x: "http://example.org/a", label: "A" },
			{ x: "http://example.org/b" },
		])
	})

	it("should turn an ASK result into one row", () => {
		expect(bindingsToRows({ boolean: true })).toEqual([{ ask: "true" }])
	})
})
