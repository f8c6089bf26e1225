/**
 * SPARQL MCP Server
 *
 * Registers the grounding, execution and Rhea template tools on an
 * McpServer. Every tool answers with one JSON text block; failures are
 * reported inside that JSON, never as thrown errors.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { DEFAULTS, type EndpointClass } from "./config.js"
import { getConfig, type SparqlConfig } from "./config/loadConfig.js"
import { createSparqlContext, type ContextOverrides, type SparqlContext } from "./context.js"
import { classifySparqlError, describeErrorCode } from "./error_classifier.js"
import type { Logger } from "./logger.js"
import { classifyTransportFailure, executeQuery } from "./repair_orchestrator.js"

export const SERVER_NAME = "mcp-server-sparql"
export const SERVER_VERSION = "0.1.0"

export const PING_QUERY = "SELECT (1 AS ?x) WHERE {} LIMIT 1"
const PING_TIMEOUT_MS = 10000

// ============================================================================
// Tool handlers
// ============================================================================

export interface PingResult {
	endpoint: string
	ok: boolean
	detail: string
	errorCode?: string
	hint?: string
}

/**
 * Plain async handlers behind each tool, so they can be called without
 * the MCP framework.
 */
export function createToolHandlers(ctx: SparqlContext) {
	const defaultLimitCap = ctx.config.lint.limit_cap

	const ping = async (endpointClass: EndpointClass): Promise<PingResult> => {
		const profile = ctx.profiles[endpointClass]
		const endpoint = profile.sparqlUrl
		if (profile.throttled) await ctx.throttle.beforeCall(endpointClass)
		const outcome = await ctx.transport.execute(endpoint, PING_QUERY, PING_TIMEOUT_MS)
		if (profile.throttled) ctx.throttle.onResult(endpointClass, !outcome.ok && outcome.rateLimited)

		if (outcome.ok) {
			return { endpoint, ok: true, detail: "Connected successfully." }
		}
		const classified = classifyTransportFailure(outcome)
		return { endpoint, ok: false, detail: outcome.body, errorCode: classified.code, hint: classified.hint }
	}

	return {
		searchEntity: (args: { text: string; k?: number }) => ctx.grounding.searchEntities(args.text, args.k ?? 5),

		searchProperty: (args: { text: string; k?: number }) => ctx.grounding.searchProperties(args.text, args.k ?? 5),

		getSchemaContext: (args: { entity_ids?: string[]; property_ids?: string[]; budget_tokens?: number }) =>
			ctx.grounding.getSchemaContext(args.entity_ids ?? [], args.property_ids ?? [], args.budget_tokens ?? 2000),

		runSparqlWikidata: (args: {
			query: string
			timeout_ms?: number
			limit_cap?: number
			allowed_entities?: string[]
			allowed_properties?: string[]
		}) =>
			executeQuery(
				ctx.runner,
				"wikidata",
				args.query,
				args.timeout_ms ?? DEFAULTS.timeoutMs,
				args.limit_cap ?? defaultLimitCap,
				args.allowed_entities ?? [],
				args.allowed_properties ?? [],
			),

		executeSparqlRhea: (args: { query_string: string; timeout_ms?: number; limit_cap?: number }) =>
			executeQuery(
				ctx.runner,
				"rhea",
				args.query_string,
				args.timeout_ms ?? DEFAULTS.maxTimeoutMs,
				args.limit_cap ?? defaultLimitCap,
			),

		normalizeSparqlError: async (args: { error_message: string }) => {
			const classified = classifySparqlError(args.error_message ?? "")
			return { ...classified, description: describeErrorCode(classified.code) }
		},

		debugPingWikidata: () => ping("wikidata"),

		debugPingRhea: () => ping("rhea"),

		reactionsBySubstrateAndProduct: (args: { substrate_name: string; product_name: string; limit?: number }) =>
			ctx.rhea.reactionsBySubstrateAndProduct(args.substrate_name, args.product_name, args.limit),

		reactionsByEc: (args: { ec_number: string; limit?: number }) => ctx.rhea.reactionsByEc(args.ec_number, args.limit),

		reactionsByEquationText: (args: { contains_text: string; limit?: number }) =>
			ctx.rhea.reactionsByEquationText(args.contains_text, args.limit),

		childrenOfReaction: (args: { parent_rhea_id: string; limit?: number }) =>
			ctx.rhea.childrenOfReaction(args.parent_rhea_id, args.limit),
	}
}

// ============================================================================
// Server
// ============================================================================

function jsonContent(value: unknown) {
	return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] }
}

/**
 * Runs a handler and turns anything it throws into an `{ error }` payload
 */
function wrap<A>(name: string, logger: Logger, handler: (args: A) => Promise<unknown>) {
	return async (args: A) => {
		try {
			return jsonContent(await handler(args))
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			logger.error(`Tool ${name} failed`, { error: message })
			return jsonContent({ error: message })
		}
	}
}

const limitArg = z.number().int().optional().describe("Optional row limit")

export interface CreateServerOptions {
	config?: SparqlConfig
	logger?: Logger
	overrides?: Omit<ContextOverrides, "logger">
}

export default function createServer({ config, logger, overrides }: CreateServerOptions = {}): McpServer {
	const resolvedConfig = config ?? getConfig()
	const ctx = createSparqlContext(resolvedConfig, { ...overrides, logger })
	const log = ctx.logger
	const handlers = createToolHandlers(ctx)

	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	// ---- Grounding ----

	server.tool(
		"search_entity",
		"Search Wikidata for entities matching a text string. Call this before writing SPARQL that uses wd:Q… IDs " +
			"and pass the returned IDs as allowed_entities. Returns candidates with id, label, description, concepturi.",
		{
			text: z.string().describe("Search string, e.g. 'Douglas Adams'"),
			k: z.number().int().optional().describe("Max results (default 5, max 20)"),
		},
		wrap("search_entity", log, handlers.searchEntity),
	)

	server.tool(
		"search_property",
		"Search Wikidata for properties matching a text string. Call this before writing SPARQL that uses " +
			"wdt:/p:/ps:/pq: P… IDs and pass the returned IDs as allowed_properties.",
		{
			text: z.string().describe("Search string, e.g. 'date of birth'"),
			k: z.number().int().optional().describe("Max results (default 5, max 20)"),
		},
		wrap("search_property", log, handlers.searchProperty),
	)

	server.tool(
		"get_schema_context",
		"Fetch labels, descriptions, property datatypes and instance-of types for Wikidata IDs, " +
			"trimmed to an approximate token budget.",
		{
			entity_ids: z.array(z.string()).optional().describe("QIDs, e.g. ['Q42', 'Q5']"),
			property_ids: z.array(z.string()).optional().describe("PIDs, e.g. ['P31', 'P569']"),
			budget_tokens: z.number().int().optional().describe("Approximate token budget (default 2000)"),
		},
		wrap("get_schema_context", log, handlers.getSchemaContext),
	)

	// ---- Execution ----

	server.tool(
		"run_sparql_wikidata",
		"Execute a SPARQL SELECT or ASK query against the Wikidata Query Service. The query is linted " +
			"(LIMIT, blocked constructs, grounding IDs), dry-run with LIMIT 1, then executed with bounded " +
			"auto-repair: TIMEOUT strips SERVICE wikibase:label or halves LIMIT, RATE_LIMIT backs off. " +
			"Every wd:Q… ID must appear in allowed_entities and every P… ID in allowed_properties.",
		{
			query: z.string().describe("SPARQL SELECT or ASK query"),
			timeout_ms: z.number().int().optional().describe("Execution timeout in ms (default 30000, 5000-60000)"),
			limit_cap: z.number().int().optional().describe("Maximum LIMIT allowed (default 200, max 500)"),
			allowed_entities: z.array(z.string()).optional().describe("QIDs returned by search_entity"),
			allowed_properties: z.array(z.string()).optional().describe("PIDs returned by search_property"),
		},
		wrap("run_sparql_wikidata", log, handlers.runSparqlWikidata),
	)

	server.tool(
		"execute_sparql_rhea",
		"Run a SELECT/ASK SPARQL query against the Rhea reaction database through the same lint, " +
			"dry-run and repair pipeline (no grounding requirement). Prefixes: rh: <http://rdf.rhea-db.org/>, " +
			"rdfs:, ec: <http://purl.uniprot.org/enzyme/>. Reactions: ?r rdfs:subClassOf rh:Reaction ; " +
			"rh:accession ?acc ; rh:equation ?eq .",
		{
			query_string: z.string().describe("SPARQL SELECT or ASK query"),
			timeout_ms: z.number().int().optional().describe("Execution timeout in ms (default 60000)"),
			limit_cap: z.number().int().optional().describe("Maximum LIMIT allowed (default 200, max 500)"),
		},
		wrap("execute_sparql_rhea", log, handlers.executeSparqlRhea),
	)

	server.tool(
		"normalize_sparql_error",
		"Classify a raw SPARQL error message into a stable code (SYNTAX, TIMEOUT, RATE_LIMIT, " +
			"ENDPOINT_ERROR, UNKNOWN) with a repair hint.",
		{
			error_message: z.string().describe("Raw error text from a failed execution"),
		},
		wrap("normalize_sparql_error", log, handlers.normalizeSparqlError),
	)

	server.tool(
		"debug_ping_wikidata",
		"Test connectivity to the Wikidata Query Service.",
		wrap("debug_ping_wikidata", log, handlers.debugPingWikidata),
	)

	// ---- Rhea templates ----

	server.tool(
		"reactions_producing_product_from_substrate_names",
		"Find approved Rhea reactions converting a substrate name into a product name " +
			"(case-insensitive contains match, direction via rh:transformableTo).",
		{
			substrate_name: z.string().describe("e.g. 'L-glutamine'"),
			product_name: z.string().describe("e.g. 'ammonia'"),
			limit: limitArg,
		},
		wrap("reactions_producing_product_from_substrate_names", log, handlers.reactionsBySubstrateAndProduct),
	)

	server.tool(
		"reactions_by_ec",
		"List approved Rhea reactions annotated with an EC number (format a.b.c.d).",
		{
			ec_number: z.string().describe("e.g. '1.1.1.1'"),
			limit: limitArg,
		},
		wrap("reactions_by_ec", log, handlers.reactionsByEc),
	)

	server.tool(
		"find_reaction_by_equation_text",
		"Find Rhea reactions whose equation contains the given text (case-insensitive).",
		{
			contains_text: z.string().describe("Text fragment of the equation"),
			limit: limitArg,
		},
		wrap("find_reaction_by_equation_text", log, handlers.reactionsByEquationText),
	)

	server.tool(
		"children_of_reaction",
		"List descendant reactions of a Rhea reaction (rdfs:subClassOf+).",
		{
			parent_rhea_id: z.string().describe("e.g. 'RHEA:12345'"),
			limit: limitArg,
		},
		wrap("children_of_reaction", log, handlers.childrenOfReaction),
	)

	server.tool("debug_ping_rhea", "Test connectivity to the Rhea SPARQL endpoint.", wrap("debug_ping_rhea", log, handlers.debugPingRhea))

	return server
}
