/**
 * SPARQL HTTP Transport
 *
 * Issues one query against one endpoint. Public endpoints disagree on which
 * request shape they accept, so up to four are tried in order:
 *   1) POST (no format param)
 *   2) POST (format=json)
 *   3) GET  (no format param)
 *   4) GET  (format=json)
 * The first well-formed JSON result with status < 400 wins. Each shape has
 * its own timeout; a timeout or connection failure moves on to the next.
 * When all fail, the error body lists each shape's diagnostic so the
 * classifier sees every failure, not only the last.
 *
 * No throttle bookkeeping happens here. Callers read `rateLimited` and
 * report it to the RateThrottle.
 */

import { z } from "zod"
import { DEFAULTS } from "./config.js"

/** Status marker for "every request shape failed" (not a real HTTP code) */
export const ALL_ATTEMPTS_FAILED_STATUS = 599

export const SPARQL_RESULTS_ACCEPT = "application/sparql-results+json"

const bindingValueSchema = z.object({
	type: z.string().optional(),
	value: z.string(),
})

export const sparqlResultsSchema = z.union([
	z.object({
		head: z.object({ vars: z.array(z.string()).optional() }).optional(),
		results: z.object({
			bindings: z.array(z.record(bindingValueSchema)),
		}),
	}),
	z.object({
		boolean: z.boolean(),
	}),
])

export type SparqlResults = z.infer<typeof sparqlResultsSchema>

export type TransportResult =
	| { ok: true; body: SparqlResults; shape: RequestShape }
	| {
			ok: false
			statusCode: number
			/** Diagnostic text, truncated */
			body: string
			/** True when any shape saw HTTP 429 */
			rateLimited: boolean
			/** Last real HTTP status seen, if any shape got a response */
			lastStatus?: number
	  }

export interface RequestShape {
	method: "POST" | "GET"
	withFormat: boolean
}

export const REQUEST_SHAPES: readonly RequestShape[] = [
	{ method: "POST", withFormat: false },
	{ method: "POST", withFormat: true },
	{ method: "GET", withFormat: false },
	{ method: "GET", withFormat: true },
]

/** Per-shape share of the combined diagnostic */
const SHAPE_DIAGNOSTIC_CHARS = 400

export function describeShape(shape: RequestShape): string {
	return shape.withFormat ? `${shape.method}+format` : shape.method
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

/** What the runner and the templates need from a transport */
export type SparqlExecutor = Pick<SparqlTransport, "execute">

export interface SparqlTransportOptions {
	userAgent: string
	fetchImpl?: FetchLike
	/** Max characters of an error body kept for diagnostics */
	maxErrorBody?: number
}

type ShapeOutcome =
	| { ok: true; body: SparqlResults }
	| { ok: false; status?: number; diagnostic: string }

/**
 * Rows as plain `variable → value` maps. ASK results become one row with
 * `ask: "true" | "false"`.
 */
export function bindingsToRows(body: SparqlResults): Array<Record<string, string>> {
	if ("boolean" in body) {
		return [{ ask: String(body.boolean) }]
	}
	return body.results.bindings.map((binding) => {
		const row: Record<string, string> = {}
		for (const [variable, cell] of Object.entries(binding)) {
			row[variable] = cell.value
		}
		return row
	})
}

export class SparqlTransport {
	private readonly userAgent: string
	private readonly fetchImpl: FetchLike
	private readonly maxErrorBody: number

	constructor(options: SparqlTransportOptions) {
		this.userAgent = options.userAgent
		this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
		this.maxErrorBody = options.maxErrorBody ?? DEFAULTS.errorBodyChars
	}

	/**
	 * Execute a SELECT / ASK query and return parsed JSON results or a
	 * classified-ready transport error. Never throws for network faults.
	 */
	async execute(endpoint: string, query: string, timeoutMs: number): Promise<TransportResult> {
		let rateLimited = false
		let lastStatus: number | undefined
		const diagnostics: string[] = []

		for (const shape of REQUEST_SHAPES) {
			const outcome = await this.tryShape(endpoint, query, timeoutMs, shape)
			if (outcome.ok) {
				return { ok: true, body: outcome.body, shape }
			}
			if (outcome.status !== undefined) {
				lastStatus = outcome.status
				if (outcome.status === 429) rateLimited = true
			}
			diagnostics.push(`${describeShape(shape)}: ${outcome.diagnostic.slice(0, SHAPE_DIAGNOSTIC_CHARS)}`)
		}

		return {
			ok: false,
			statusCode: ALL_ATTEMPTS_FAILED_STATUS,
			body: `All SPARQL request attempts failed. ${diagnostics.join(" | ")}`.slice(0, this.maxErrorBody),
			rateLimited,
			lastStatus,
		}
	}

	private buildRequest(endpoint: string, query: string, shape: RequestShape): { url: string; init: RequestInit } {
		const params = new URLSearchParams({ query })
		if (shape.withFormat) params.set("format", "json")

		if (shape.method === "POST") {
			return {
				url: endpoint,
				init: {
					method: "POST",
					headers: {
						"Accept": SPARQL_RESULTS_ACCEPT,
						"User-Agent": this.userAgent,
						"Content-Type": "application/x-www-form-urlencoded",
					},
					body: params.toString(),
				},
			}
		}

		const separator = endpoint.includes("?") ? "&" : "?"
		return {
			url: `${endpoint}${separator}${params.toString()}`,
			init: {
				method: "GET",
				headers: {
					"Accept": SPARQL_RESULTS_ACCEPT,
					"User-Agent": this.userAgent,
				},
			},
		}
	}

	private async tryShape(endpoint: string, query: string, timeoutMs: number, shape: RequestShape): Promise<ShapeOutcome> {
		const { url, init } = this.buildRequest(endpoint, query, shape)
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

		try {
			const response = await this.fetchImpl(url, { ...init, signal: controller.signal })
			const text = await response.text()

			if (response.status >= 400) {
				return {
					ok: false,
					status: response.status,
					diagnostic: `HTTP ${response.status}: ${text}`.slice(0, this.maxErrorBody),
				}
			}

			let json: unknown
			try {
				json = JSON.parse(text)
			} catch {
				return { ok: false, status: response.status, diagnostic: `Non-JSON response body (HTTP ${response.status})` }
			}

			const parsed = sparqlResultsSchema.safeParse(json)
			if (!parsed.success) {
				return { ok: false, status: response.status, diagnostic: `Unexpected JSON result shape (HTTP ${response.status})` }
			}
			return { ok: true, body: parsed.data }
		} catch (error) {
			// Handle timeout
			if (error instanceof Error && error.name === "AbortError") {
				return { ok: false, diagnostic: `${shape.method} request timed out after ${timeoutMs}ms` }
			}
			// Network errors surface from fetch as TypeError
			const message = error instanceof Error ? error.message : String(error)
			return { ok: false, diagnostic: `Cannot connect to ${endpoint}: ${message}`.slice(0, 500) }
		} finally {
			clearTimeout(timeoutId)
		}
	}
}
