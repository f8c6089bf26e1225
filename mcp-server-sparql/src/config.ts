/**
 * Types and constants for the SPARQL MCP Server
 *
 * Includes:
 * - Endpoint classes and their grounding policies
 * - Error codes and the execution result shape returned to MCP clients
 * - Repair loop constants
 * - Structured error type for configuration and programmer faults
 */

/**
 * Endpoint classes served by this process. Throttle state and result
 * caching are partitioned by class, not by URL.
 */
export type EndpointClass = "wikidata" | "rhea"

/**
 * Which identifier kinds must be grounded before a query may run.
 */
export interface GroundingPolicy {
	entities: boolean
	properties: boolean
}

export interface EndpointProfile {
	endpointClass: EndpointClass
	sparqlUrl: string
	grounding: GroundingPolicy
	/** Calls go through the shared RateThrottle */
	throttled: boolean
}

/**
 * Identifiers the caller has already resolved through search_entity /
 * search_property.
 */
export interface GroundingSets {
	entityIds: ReadonlySet<string>
	propertyIds: ReadonlySet<string>
}

export const EMPTY_GROUNDING: GroundingSets = {
	entityIds: new Set<string>(),
	propertyIds: new Set<string>(),
}

export function groundingFromLists(entityIds?: readonly string[], propertyIds?: readonly string[]): GroundingSets {
	return {
		entityIds: new Set(entityIds ?? []),
		propertyIds: new Set(propertyIds ?? []),
	}
}

/**
 * Stable error codes. The calling agent reads these to decide how to
 * change its query.
 */
export type ErrorCode =
	| "SYNTAX"
	| "TIMEOUT"
	| "RATE_LIMIT"
	| "EMPTY"
	| "ENDPOINT_ERROR"
	| "LINTER_BLOCK"
	| "UNKNOWN"

export const ERROR_CODES: Record<ErrorCode, string> = {
	SYNTAX: "Query has a syntax error",
	TIMEOUT: "Query execution timed out",
	RATE_LIMIT: "Endpoint rate-limited the request (HTTP 429)",
	EMPTY: "Query returned zero results",
	ENDPOINT_ERROR: "Endpoint returned an HTTP error",
	LINTER_BLOCK: "Query was blocked by the safety linter",
	UNKNOWN: "Unclassified error",
}

export interface ClassifiedError {
	code: ErrorCode
	hint: string
}

export type ResultRow = Record<string, string>

/**
 * Final response to the MCP client.
 *
 * `ok` with `errorCode: "EMPTY"` is a zero-row success, not a failure.
 */
export interface ExecutionResult {
	ok: boolean
	rows: ResultRow[]
	rowCount: number
	errorCode: ErrorCode | null
	errorMessage?: string
	hint?: string

	/** Auto-repairs attempted, in order */
	repairsApplied: string[]

	/** Lint warnings plus advisory notes */
	warnings: string[]

	/** Rule violations when the linter blocked the query */
	lintErrors?: string[]

	/** The query text that produced `rows` (after lint and repairs) */
	executedQuery?: string

	fromCache?: boolean

	stats: {
		elapsedMs: number
		/** Execution-phase calls; the dry-run is not counted */
		attempts: number
	}
}

/**
 * Repair loop configuration
 */
export const REPAIR_CONFIG = {
	maxRepairs: 2,
	dryRunTimeoutMs: 15000,
	rateLimitBackoffCapMs: 16000,
}

/**
 * Clamp ranges applied to caller-supplied arguments
 */
export const DEFAULTS = {
	timeoutMs: 30000,
	minTimeoutMs: 5000,
	maxTimeoutMs: 60000,
	limitCap: 200,
	maxLimitCap: 500,
	maxTriples: 12,
	labelServiceLimit: 50,
	errorBodyChars: 2000,
}

/**
 * Error types for structured error handling.
 *
 * Only raised for configuration faults and misuse; query and network
 * failures always become an ExecutionResult.
 */
export class SparqlMCPError extends Error {
	constructor(
		public type: "config" | "validation" | "transport",
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "SparqlMCPError"
	}
}

/**
 * Escape backslashes and double quotes for a SPARQL string literal.
 */
export function escapeSparqlString(s: string): string {
	return s.replace(/\\/g, "\\\\").replace(/"/g, '\\"')
}

/**
 * Clamp a caller-supplied LIMIT to [1 .. maximum], falling back to
 * `fallback` when absent or not a finite number.
 */
export function clampLimit(limit: number | undefined, fallback: number = 200, maximum: number = 2000): number {
	if (limit === undefined || !Number.isFinite(limit)) return fallback
	return Math.max(1, Math.min(Math.trunc(limit), maximum))
}

export function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(value, max))
}
