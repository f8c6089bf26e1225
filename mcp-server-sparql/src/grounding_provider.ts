/**
 * Wikidata Grounding Provider
 *
 * Resolves text to entity / property IDs and fetches compact schema notes
 * through the MediaWiki API (wbsearchentities, wbgetentities). Callers pass
 * the returned IDs back as allowed_entities / allowed_properties so the
 * linter can reject invented identifiers.
 *
 * Failures come back as `{ error }` objects, never as thrown errors.
 */

import { z } from "zod"
import type { FetchLike } from "./sparql_transport.js"
import type { TTLCache } from "./ttl_cache.js"

// ============================================================================
// Types
// ============================================================================

export interface GroundingCandidate {
	id: string
	label: string
	description: string
	concepturi?: string
}

export interface GroundingSearchResult {
	candidates: GroundingCandidate[]
	query: string
}

export interface SchemaContextResult {
	schema: string
	entityCount: number
	propertyCount: number
}

export interface GroundingFailure {
	error: string
	statusCode?: number
}

export type SearchResponse = GroundingSearchResult | GroundingFailure
export type SchemaContextResponse = SchemaContextResult | GroundingFailure

export function isGroundingFailure(value: object): value is GroundingFailure {
	return "error" in value
}

export interface GroundingProviderOptions {
	apiUrl: string
	userAgent: string
	timeoutMs: number
	fetchImpl?: FetchLike
	caches: {
		entity: TTLCache<GroundingSearchResult>
		property: TTLCache<GroundingSearchResult>
		schema: TTLCache<SchemaContextResult>
	}
	makeKey: (...parts: Array<string | number>) => string
}

// ============================================================================
// Response schemas
// ============================================================================

const searchResponseSchema = z.object({
	search: z
		.array(
			z.object({
				id: z.string(),
				label: z.string().optional(),
				description: z.string().optional(),
				concepturi: z.string().optional(),
			}),
		)
		.default([]),
})

const languageValueSchema = z.object({ en: z.object({ value: z.string() }).optional() }).optional()

const claimSchema = z.object({
	mainsnak: z
		.object({
			datavalue: z.object({ value: z.unknown() }).optional(),
		})
		.optional(),
})

const entitySchema = z.object({
	labels: languageValueSchema,
	descriptions: languageValueSchema,
	datatype: z.string().optional(),
	claims: z.record(z.array(claimSchema)).optional(),
})

const getEntitiesResponseSchema = z.object({
	entities: z.record(entitySchema).default({}),
})

const entityIdValueSchema = z.object({ id: z.string() })

type WikidataEntity = z.infer<typeof entitySchema>

/** wbgetentities accepts at most this many IDs per call */
const GET_ENTITIES_CHUNK = 50
const MAX_K = 20
/** Rough characters-per-token ratio for the schema budget */
const CHARS_PER_TOKEN = 4

// ============================================================================
// Provider
// ============================================================================

export class WikidataGroundingProvider {
	private readonly fetchImpl: FetchLike

	constructor(private readonly options: GroundingProviderOptions) {
		this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
	}

	searchEntities(text: string, k: number = 5): Promise<SearchResponse> {
		return this.search("item", text, k)
	}

	searchProperties(text: string, k: number = 5): Promise<SearchResponse> {
		return this.search("property", text, k)
	}

	private async search(type: "item" | "property", rawText: string, rawK: number): Promise<SearchResponse> {
		const text = (rawText ?? "").trim()
		if (!text) return { error: "Provide search text." }
		const k = Math.max(1, Math.min(Number.isFinite(rawK) ? Math.trunc(rawK) : 5, MAX_K))

		const cache = type === "item" ? this.options.caches.entity : this.options.caches.property
		const cacheKey = this.options.makeKey(type === "item" ? "wd_ent" : "wd_prop", text.toLowerCase(), k)
		const cached = cache.get(cacheKey)
		if (cached !== undefined) return cached

		const raw = await this.callApi({
			action: "wbsearchentities",
			format: "json",
			language: "en",
			search: text,
			limit: String(k),
			type,
		})
		if (isGroundingFailure(raw)) return raw

		const parsed = searchResponseSchema.safeParse(raw.json)
		if (!parsed.success) {
			return { error: "Unexpected response shape from wbsearchentities." }
		}

		const candidates = parsed.data.search.map((item) => {
			const candidate: GroundingCandidate = {
				id: item.id,
				label: item.label ?? "",
				description: item.description ?? "",
			}
			if (type === "item") candidate.concepturi = item.concepturi ?? ""
			return candidate
		})

		const response: GroundingSearchResult = { candidates, query: text }
		cache.set(cacheKey, response)
		return response
	}

	/**
	 * Labels, descriptions, property datatypes and up to three
	 * instance-of (P31) types per entity, trimmed to a token budget.
	 */
	async getSchemaContext(
		entityIds: readonly string[] = [],
		propertyIds: readonly string[] = [],
		budgetTokens: number = 2000,
	): Promise<SchemaContextResponse> {
		const allIds = [...entityIds, ...propertyIds]
		if (allIds.length === 0) {
			return { error: "Provide at least one entity_id or property_id." }
		}

		const cacheKey = this.options.makeKey("wd_schema", [...allIds].sort().join("|"), budgetTokens)
		const cached = this.options.caches.schema.get(cacheKey)
		if (cached !== undefined) return cached

		const entities = new Map<string, WikidataEntity>()
		for (let i = 0; i < allIds.length; i += GET_ENTITIES_CHUNK) {
			const chunk = allIds.slice(i, i + GET_ENTITIES_CHUNK)
			const raw = await this.callApi({
				action: "wbgetentities",
				format: "json",
				ids: chunk.join("|"),
				props: "labels|descriptions|datatype|claims",
				languages: "en",
			})
			// A failed chunk leaves its IDs without metadata ("?" labels)
			if (isGroundingFailure(raw)) continue
			const parsed = getEntitiesResponseSchema.safeParse(raw.json)
			if (!parsed.success) continue
			for (const [id, entity] of Object.entries(parsed.data.entities)) {
				entities.set(id, entity)
			}
		}

		let charBudget = budgetTokens * CHARS_PER_TOKEN
		const lines: string[] = []

		for (const id of entityIds) {
			if (charBudget <= 0) break
			const line = formatEntityLine(id, entities.get(id))
			lines.push(line)
			charBudget -= line.length
		}
		for (const id of propertyIds) {
			if (charBudget <= 0) break
			const line = formatPropertyLine(id, entities.get(id))
			lines.push(line)
			charBudget -= line.length
		}

		const response: SchemaContextResult = {
			schema: lines.join("\n"),
			entityCount: entityIds.length,
			propertyCount: propertyIds.length,
		}
		this.options.caches.schema.set(cacheKey, response)
		return response
	}

	private async callApi(params: Record<string, string>): Promise<{ json: unknown } | GroundingFailure> {
		const url = `${this.options.apiUrl}?${new URLSearchParams(params).toString()}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs)

		try {
			const response = await this.fetchImpl(url, {
				method: "GET",
				headers: {
					"Accept": "application/json",
					"User-Agent": this.options.userAgent,
				},
				signal: controller.signal,
			})
			const text = await response.text()
			if (!response.ok) {
				return { error: text.slice(0, 2000) || `HTTP ${response.status}`, statusCode: response.status }
			}
			return { json: JSON.parse(text) }
		} catch (error) {
			if (error instanceof Error && error.name === "AbortError") {
				return { error: `Wikidata API request timed out after ${this.options.timeoutMs}ms`, statusCode: 0 }
			}
			const message = error instanceof Error ? error.message : String(error)
			return { error: message.slice(0, 500), statusCode: 0 }
		} finally {
			clearTimeout(timeoutId)
		}
	}
}

function instanceOfTypes(entity: WikidataEntity | undefined): string[] {
	const claims = entity?.claims?.P31 ?? []
	const ids: string[] = []
	for (const claim of claims.slice(0, 3)) {
		const value = entityIdValueSchema.safeParse(claim.mainsnak?.datavalue?.value)
		if (value.success && value.data.id) ids.push(value.data.id)
	}
	return ids
}

function formatEntityLine(id: string, entity: WikidataEntity | undefined): string {
	const label = entity?.labels?.en?.value ?? "?"
	const desc = entity?.descriptions?.en?.value ?? ""
	const types = instanceOfTypes(entity)

	let line = `  ${id}: ${label}`
	if (desc) line += ` - ${desc.slice(0, 120)}`
	if (types.length > 0) line += `  [instance of: ${types.join(", ")}]`
	return line
}

function formatPropertyLine(id: string, entity: WikidataEntity | undefined): string {
	const label = entity?.labels?.en?.value ?? "?"
	const desc = entity?.descriptions?.en?.value ?? ""
	const datatype = entity?.datatype ?? ""

	let line = `  ${id}: ${label}`
	if (datatype) line += `  (datatype: ${datatype})`
	if (desc) line += ` - ${desc.slice(0, 120)}`
	return line
}
