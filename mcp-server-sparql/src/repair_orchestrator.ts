/**
 * SPARQL Auto-Repair Orchestrator
 *
 * Runs one caller query through the safety pipeline:
 *   LINT → CACHE_CHECK → DRY_RUN → EXECUTE (bounded repair) → SUCCESS | FAILED
 *
 * Every path ends in a well-formed ExecutionResult; nothing here throws for
 * query or network failures.
 *
 * Repairs inside EXECUTE:
 *   TIMEOUT    → strip SERVICE wikibase:label, else halve LIMIT (minimum 1),
 *                else give up when there is no LIMIT
 *   RATE_LIMIT → back off, then retry the same query
 *   other      → not auto-repairable, return immediately
 */

import { v4 as uuidv4 } from "uuid"
import {
	DEFAULTS,
	EMPTY_GROUNDING,
	REPAIR_CONFIG,
	clamp,
	groundingFromLists,
	type ClassifiedError,
	type EndpointClass,
	type EndpointProfile,
	type ExecutionResult,
	type GroundingSets,
} from "./config.js"
import type { Clock } from "./clock.js"
import { classifySparqlError, isAutoRepairable } from "./error_classifier.js"
import type { Logger } from "./logger.js"
import type { RateThrottle } from "./rate_throttle.js"
import { lintSparql } from "./sparql_lint.js"
import { SparqlQuery, normalizeSparqlForCache } from "./sparql_query.js"
import { bindingsToRows, type SparqlExecutor, type TransportResult } from "./sparql_transport.js"
import { TTLCache } from "./ttl_cache.js"

// ============================================================================
// Types
// ============================================================================

export interface RunRequest {
	endpointClass: EndpointClass
	query: string
	grounding?: GroundingSets
	timeoutMs?: number
	limitCap?: number
}

export interface RepairOptions {
	maxRepairs: number
	dryRunTimeoutMs: number
	rateLimitBackoffCapMs: number
	maxTriples: number
	labelServiceLimit: number
}

export interface SparqlRunnerDeps {
	profiles: Record<EndpointClass, EndpointProfile>
	transport: SparqlExecutor
	throttle: RateThrottle
	cache: TTLCache<ExecutionResult>
	clock: Clock
	logger: Logger
	options?: Partial<RepairOptions>
}

const DEFAULT_REPAIR_OPTIONS: RepairOptions = {
	maxRepairs: REPAIR_CONFIG.maxRepairs,
	dryRunTimeoutMs: REPAIR_CONFIG.dryRunTimeoutMs,
	rateLimitBackoffCapMs: REPAIR_CONFIG.rateLimitBackoffCapMs,
	maxTriples: DEFAULTS.maxTriples,
	labelServiceLimit: DEFAULTS.labelServiceLimit,
}

const EMPTY_RESULT_WARNING = "Query returned zero results. Check entity/property IDs or try broadening the query."

/** Data carried by every non-terminal state after LINT */
interface Prepared {
	linted: SparqlQuery
	warnings: string[]
	cacheKey: string
}

type RunState =
	| { phase: "LINT" }
	| ({ phase: "CACHE_CHECK" } & Prepared)
	| ({ phase: "DRY_RUN" } & Prepared)
	| ({
			phase: "EXECUTE"
			/** Execution attempts already made */
			attempt: number
			current: SparqlQuery
			repairs: readonly string[]
	  } & Prepared)
	| { phase: "SUCCESS"; result: ExecutionResult }
	| { phase: "FAILED"; result: ExecutionResult }

type TerminalState = Extract<RunState, { phase: "SUCCESS" | "FAILED" }>

interface RunContext {
	queryId: string
	startedAt: number
	request: Required<Omit<RunRequest, "grounding">> & { grounding: GroundingSets }
	profile: EndpointProfile
}

/**
 * Transport failure → stable code. A 429 seen on any request shape wins
 * over whatever the combined diagnostic says.
 */
export function classifyTransportFailure(result: Extract<TransportResult, { ok: false }>): ClassifiedError {
	if (result.rateLimited) {
		return classifySparqlError("HTTP 429 Too Many Requests")
	}
	return classifySparqlError(result.body)
}

function isTerminal(state: RunState): state is TerminalState {
	return state.phase === "SUCCESS" || state.phase === "FAILED"
}

// ============================================================================
// Runner
// ============================================================================

export class SparqlRunner {
	private readonly options: RepairOptions

	constructor(private readonly deps: SparqlRunnerDeps) {
		this.options = { ...DEFAULT_REPAIR_OPTIONS, ...deps.options }
	}

	/** Total execution attempts allowed (initial + repairs) */
	get maxAttempts(): number {
		return 1 + this.options.maxRepairs
	}

	async run(request: RunRequest): Promise<ExecutionResult> {
		const ctx: RunContext = {
			queryId: uuidv4(),
			startedAt: this.deps.clock.now(),
			request: {
				endpointClass: request.endpointClass,
				query: request.query,
				grounding: request.grounding ?? EMPTY_GROUNDING,
				timeoutMs: request.timeoutMs ?? DEFAULTS.timeoutMs,
				limitCap: request.limitCap ?? DEFAULTS.limitCap,
			},
			profile: this.deps.profiles[request.endpointClass],
		}

		this.deps.logger.info("SPARQL query received", {
			query_id: ctx.queryId,
			endpoint_class: ctx.request.endpointClass,
			limit_cap: ctx.request.limitCap,
			timeout_ms: ctx.request.timeoutMs,
		})

		let state: RunState = { phase: "LINT" }
		while (!isTerminal(state)) {
			const next: RunState = await this.step(state, ctx)
			this.deps.logger.debug("SPARQL state transition", {
				query_id: ctx.queryId,
				from: state.phase,
				to: next.phase,
			})
			state = next
		}

		const { result } = state
		this.deps.logger.info(result.ok ? "SPARQL query succeeded" : "SPARQL query failed", {
			query_id: ctx.queryId,
			error_code: result.errorCode,
			row_count: result.rowCount,
			attempts: result.stats.attempts,
			repairs: result.repairsApplied.length,
			from_cache: result.fromCache === true,
			elapsed_ms: result.stats.elapsedMs,
		})
		return result
	}

	private step(state: Exclude<RunState, TerminalState>, ctx: RunContext): Promise<RunState> | RunState {
		switch (state.phase) {
			case "LINT":
				return this.lint(ctx)
			case "CACHE_CHECK":
				return this.checkCache(state, ctx)
			case "DRY_RUN":
				return this.dryRun(state, ctx)
			case "EXECUTE":
				return this.execute(state, ctx)
		}
	}

	// ---- LINT ----

	private lint(ctx: RunContext): RunState {
		const lint = lintSparql(ctx.request.query, {
			grounding: ctx.request.grounding,
			groundingPolicy: ctx.profile.grounding,
			limitCap: ctx.request.limitCap,
			maxTriples: this.options.maxTriples,
			labelServiceLimit: this.options.labelServiceLimit,
		})

		if (!lint.ok) {
			return {
				phase: "FAILED",
				result: this.failure(ctx, {
					errorCode: "LINTER_BLOCK",
					errorMessage: lint.errors.join("; "),
					hint: "Fix the listed rule violations; the query was not sent to the endpoint.",
					lintErrors: lint.errors,
					warnings: lint.warnings,
					attempts: 0,
				}),
			}
		}

		const linted = SparqlQuery.parse(lint.query)
		return {
			phase: "CACHE_CHECK",
			linted,
			warnings: lint.warnings,
			cacheKey: TTLCache.makeKey(ctx.request.endpointClass, normalizeSparqlForCache(linted.text)),
		}
	}

	// ---- CACHE_CHECK ----

	private checkCache(state: Prepared, ctx: RunContext): RunState {
		const cached = this.deps.cache.get(state.cacheKey)
		if (cached === undefined) {
			return { phase: "DRY_RUN", ...pickPrepared(state) }
		}
		return {
			phase: "SUCCESS",
			result: {
				...structuredClone(cached),
				fromCache: true,
				stats: { elapsedMs: this.elapsed(ctx), attempts: 0 },
			},
		}
	}

	// ---- DRY_RUN ----

	private async dryRun(state: Prepared, ctx: RunContext): Promise<RunState> {
		const probe = state.linted.withLimit(1)
		const timeoutMs = Math.min(ctx.request.timeoutMs, this.options.dryRunTimeoutMs)
		const outcome = await this.call(ctx, probe.text, timeoutMs)

		if (!outcome.ok) {
			// A broken query does not become valid by retrying
			const classified = classifyTransportFailure(outcome)
			return {
				phase: "FAILED",
				result: this.failure(ctx, {
					errorCode: classified.code,
					errorMessage: `Dry-run failed: ${outcome.body.slice(0, 300)}`,
					hint: classified.hint,
					warnings: state.warnings,
					attempts: 0,
				}),
			}
		}

		return { phase: "EXECUTE", ...pickPrepared(state), attempt: 0, current: state.linted, repairs: [] }
	}

	// ---- EXECUTE ----

	private async execute(state: Extract<RunState, { phase: "EXECUTE" }>, ctx: RunContext): Promise<RunState> {
		const attemptNo = state.attempt + 1
		const outcome = await this.call(ctx, state.current.text, ctx.request.timeoutMs)

		if (outcome.ok) {
			const rows = bindingsToRows(outcome.body)
			const result: ExecutionResult = {
				ok: true,
				rows,
				rowCount: rows.length,
				errorCode: rows.length === 0 ? "EMPTY" : null,
				repairsApplied: [...state.repairs],
				warnings: rows.length === 0 ? [...state.warnings, EMPTY_RESULT_WARNING] : [...state.warnings],
				executedQuery: state.current.text,
				stats: { elapsedMs: this.elapsed(ctx), attempts: attemptNo },
			}
			// Keyed by the pre-repair query so the next identical request hits
			this.deps.cache.set(state.cacheKey, structuredClone(result))
			return { phase: "SUCCESS", result }
		}

		const classified = classifyTransportFailure(outcome)
		const fail = (): RunState => ({
			phase: "FAILED",
			result: this.failure(ctx, {
				errorCode: classified.code,
				errorMessage: outcome.body.slice(0, 500),
				hint: classified.hint,
				warnings: state.warnings,
				repairsApplied: [...state.repairs],
				attempts: attemptNo,
			}),
		})

		if (attemptNo >= this.maxAttempts || !isAutoRepairable(classified.code)) {
			return fail()
		}

		const retry = (current: SparqlQuery, action: string): RunState => ({
			...state,
			attempt: attemptNo,
			current,
			repairs: [...state.repairs, `Attempt ${attemptNo}: ${classified.code}, ${action}`],
		})

		if (classified.code === "TIMEOUT") {
			if (state.current.hasLabelService) {
				const stripped = state.current.withoutLabelService()
				if (stripped.text !== state.current.text) {
					return retry(stripped, "removed SERVICE wikibase:label")
				}
			}
			const halved = state.current.withHalvedLimit()
			if (halved && halved.limit) {
				return retry(halved, `halved LIMIT to ${halved.limit.value}`)
			}
			return fail()
		}

		// RATE_LIMIT: same query after a bounded wait
		const waitMs = Math.min(2 ** attemptNo * 1000, this.options.rateLimitBackoffCapMs)
		this.deps.logger.warn("SPARQL rate-limited, backing off", {
			query_id: ctx.queryId,
			attempt: attemptNo,
			wait_ms: waitMs,
		})
		await this.deps.clock.sleep(waitMs)
		return retry(state.current, `waited ${waitMs}ms before retry`)
	}

	// ---- helpers ----

	/** One transport call, with throttle bookkeeping when the profile asks for it */
	private async call(ctx: RunContext, query: string, timeoutMs: number): Promise<TransportResult> {
		const cls = ctx.request.endpointClass
		if (ctx.profile.throttled) await this.deps.throttle.beforeCall(cls)
		const outcome = await this.deps.transport.execute(ctx.profile.sparqlUrl, query, timeoutMs)
		if (ctx.profile.throttled) this.deps.throttle.onResult(cls, !outcome.ok && outcome.rateLimited)
		return outcome
	}

	private elapsed(ctx: RunContext): number {
		return Math.max(0, Math.round(this.deps.clock.now() - ctx.startedAt))
	}

	private failure(
		ctx: RunContext,
		f: {
			errorCode: ExecutionResult["errorCode"]
			errorMessage: string
			hint: string
			warnings: readonly string[]
			attempts: number
			lintErrors?: string[]
			repairsApplied?: string[]
		},
	): ExecutionResult {
		return {
			ok: false,
			rows: [],
			rowCount: 0,
			errorCode: f.errorCode,
			errorMessage: f.errorMessage,
			hint: f.hint,
			repairsApplied: f.repairsApplied ?? [],
			warnings: [...f.warnings],
			...(f.lintErrors ? { lintErrors: f.lintErrors } : {}),
			stats: { elapsedMs: this.elapsed(ctx), attempts: f.attempts },
		}
	}
}

function pickPrepared(state: Prepared): Prepared {
	return { linted: state.linted, warnings: state.warnings, cacheKey: state.cacheKey }
}

// ============================================================================
// Public operation
// ============================================================================

/**
 * Caller-facing entry point: clamps arguments to safe ranges and rejects
 * empty text before handing off to the runner.
 */
export async function executeQuery(
	runner: SparqlRunner,
	endpointClass: EndpointClass,
	queryText: string,
	timeoutMs: number = DEFAULTS.timeoutMs,
	limitCap: number = DEFAULTS.limitCap,
	groundingEntityIds: readonly string[] = [],
	groundingPropertyIds: readonly string[] = [],
): Promise<ExecutionResult> {
	const query = (queryText ?? "").trim()
	if (!query) {
		return {
			ok: false,
			rows: [],
			rowCount: 0,
			errorCode: "SYNTAX",
			errorMessage: "Empty query.",
			hint: "Provide a SPARQL SELECT or ASK query.",
			repairsApplied: [],
			warnings: [],
			stats: { elapsedMs: 0, attempts: 0 },
		}
	}

	return runner.run({
		endpointClass,
		query,
		grounding: groundingFromLists(groundingEntityIds, groundingPropertyIds),
		timeoutMs: clamp(Number.isFinite(timeoutMs) ? timeoutMs : DEFAULTS.timeoutMs, DEFAULTS.minTimeoutMs, DEFAULTS.maxTimeoutMs),
		limitCap: clamp(Number.isFinite(limitCap) ? Math.trunc(limitCap) : DEFAULTS.limitCap, 1, DEFAULTS.maxLimitCap),
	})
}
