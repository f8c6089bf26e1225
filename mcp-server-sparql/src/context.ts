/**
 * Server context
 *
 * Owns the shared mutable state (throttle, caches) and the collaborators
 * built from configuration. One context per server instance; tests build
 * their own with a manual clock and a fake fetch.
 */

import { type EndpointClass, type EndpointProfile, type ExecutionResult } from "./config.js"
import type { SparqlConfig } from "./config/loadConfig.js"
import { systemClock, type Clock } from "./clock.js"
import {
	WikidataGroundingProvider,
	type GroundingSearchResult,
	type SchemaContextResult,
} from "./grounding_provider.js"
import { createLogger, type Logger } from "./logger.js"
import { RateThrottle } from "./rate_throttle.js"
import { SparqlRunner } from "./repair_orchestrator.js"
import { RheaTemplates } from "./rhea_tools.js"
import { SparqlTransport, type FetchLike } from "./sparql_transport.js"
import { CachePools, TTLCache } from "./ttl_cache.js"

export type SparqlCaches = CachePools<GroundingSearchResult, GroundingSearchResult, SchemaContextResult, ExecutionResult>

export interface SparqlContext {
	config: SparqlConfig
	logger: Logger
	clock: Clock
	profiles: Record<EndpointClass, EndpointProfile>
	throttle: RateThrottle
	caches: SparqlCaches
	transport: SparqlTransport
	runner: SparqlRunner
	grounding: WikidataGroundingProvider
	rhea: RheaTemplates
}

export interface ContextOverrides {
	logger?: Logger
	clock?: Clock
	fetchImpl?: FetchLike
}

export function buildProfiles(config: SparqlConfig): Record<EndpointClass, EndpointProfile> {
	return {
		wikidata: {
			endpointClass: "wikidata",
			sparqlUrl: config.endpoints.wikidata.sparql_url,
			grounding: config.endpoints.wikidata.grounding,
			throttled: config.endpoints.wikidata.throttled,
		},
		rhea: {
			endpointClass: "rhea",
			sparqlUrl: config.endpoints.rhea.sparql_url,
			grounding: config.endpoints.rhea.grounding,
			throttled: config.endpoints.rhea.throttled,
		},
	}
}

export function createSparqlContext(config: SparqlConfig, overrides: ContextOverrides = {}): SparqlContext {
	const logger = overrides.logger ?? createLogger(config.logging.level)
	const clock = overrides.clock ?? systemClock
	const profiles = buildProfiles(config)

	const throttle = new RateThrottle(
		{
			minIntervalMs: config.throttle.min_interval_ms,
			maxBackoffMs: config.throttle.max_backoff_ms,
			maxHits: config.throttle.max_hits,
		},
		clock,
	)

	const caches: SparqlCaches = new CachePools(
		{
			entityTtlS: config.cache.entity_ttl_s,
			propertyTtlS: config.cache.property_ttl_s,
			schemaTtlS: config.cache.schema_ttl_s,
			queryTtlS: config.cache.query_ttl_s,
		},
		clock,
	)

	const transport = new SparqlTransport({
		userAgent: config.http.user_agent,
		fetchImpl: overrides.fetchImpl,
	})

	const runner = new SparqlRunner({
		profiles,
		transport,
		throttle,
		cache: caches.query,
		clock,
		logger,
		options: {
			maxRepairs: config.repair.max_repairs,
			dryRunTimeoutMs: config.repair.dry_run_timeout_ms,
			rateLimitBackoffCapMs: config.repair.rate_limit_backoff_cap_ms,
			maxTriples: config.lint.max_triples,
			labelServiceLimit: config.lint.label_service_limit,
		},
	})

	const grounding = new WikidataGroundingProvider({
		apiUrl: config.endpoints.wikidata.api_url,
		userAgent: config.http.user_agent,
		timeoutMs: config.http.api_timeout_ms,
		fetchImpl: overrides.fetchImpl,
		caches: { entity: caches.entity, property: caches.property, schema: caches.schema },
		makeKey: TTLCache.makeKey,
	})

	const rhea = new RheaTemplates({
		sparqlUrl: profiles.rhea.sparqlUrl,
		transport,
		throttle: profiles.rhea.throttled ? throttle : undefined,
		timeoutMs: 60000,
	})

	return { config, logger, clock, profiles, throttle, caches, transport, runner, grounding, rhea }
}
