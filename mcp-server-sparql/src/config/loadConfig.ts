/**
 * Unified config loader for the SPARQL MCP server.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > schema defaults
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { SparqlMCPError } from "../config.js"

// ── Schema ───────────────────────────────────────────────────────────

const groundingSchema = z.object({
	entities: z.boolean(),
	properties: z.boolean(),
})

export const sparqlConfigSchema = z.object({
	endpoints: z
		.object({
			wikidata: z
				.object({
					sparql_url: z.string().url().default("https://query.wikidata.org/sparql"),
					api_url: z.string().url().default("https://www.wikidata.org/w/api.php"),
					grounding: groundingSchema.default({ entities: true, properties: true }),
					throttled: z.boolean().default(true),
				})
				.default({}),
			rhea: z
				.object({
					sparql_url: z.string().url().default("https://sparql.rhea-db.org/sparql"),
					grounding: groundingSchema.default({ entities: false, properties: false }),
					throttled: z.boolean().default(false),
				})
				.default({}),
		})
		.default({}),
	http: z
		.object({
			user_agent: z.string().min(1).default("sparql-guard/0.1 (MCP SPARQL gateway)"),
			api_timeout_ms: z.number().int().positive().default(15000),
		})
		.default({}),
	throttle: z
		.object({
			min_interval_ms: z.number().int().nonnegative().default(1000),
			max_backoff_ms: z.number().int().positive().default(32000),
			max_hits: z.number().int().positive().default(6),
		})
		.default({}),
	cache: z
		.object({
			entity_ttl_s: z.number().positive().default(600),
			property_ttl_s: z.number().positive().default(600),
			schema_ttl_s: z.number().positive().default(900),
			query_ttl_s: z.number().positive().default(300),
		})
		.default({}),
	lint: z
		.object({
			limit_cap: z.number().int().positive().default(200),
			max_triples: z.number().int().positive().default(12),
			label_service_limit: z.number().int().positive().default(50),
		})
		.default({}),
	repair: z
		.object({
			max_repairs: z.number().int().nonnegative().default(2),
			dry_run_timeout_ms: z.number().int().positive().default(15000),
			rate_limit_backoff_cap_ms: z.number().int().positive().default(16000),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(["debug", "info", "warn", "error"]).default("info"),
		})
		.default({}),
})

export type SparqlConfig = z.infer<typeof sparqlConfigSchema>

type RawConfig = Record<string, unknown>

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(startDir: string): string | null {
	// Walk up looking for config/config.yaml
	let dir = startDir
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function isRecord(value: unknown): value is RawConfig {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function loadYaml(filePath: string): RawConfig {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	if (parsed === undefined || parsed === null) return {}
	if (!isRecord(parsed)) {
		throw new SparqlMCPError("config", `Config file ${filePath} must contain a mapping`, false, { filePath })
	}
	return parsed
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: RawConfig, b: RawConfig): RawConfig {
	const result: RawConfig = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(right) && isRecord(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	return process.env[name]
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}

/** Return the nested section, creating it when absent. */
function section(cfg: RawConfig, ...keys: string[]): RawConfig {
	let node = cfg
	for (const key of keys) {
		const next = node[key]
		if (isRecord(next)) {
			node = next
		} else {
			const created: RawConfig = {}
			node[key] = created
			node = created
		}
	}
	return node
}

function overlay(target: RawConfig, key: string, value: string | number | undefined): void {
	if (value !== undefined) target[key] = value
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: RawConfig): void {
	const wd = section(cfg, "endpoints", "wikidata")
	overlay(wd, "sparql_url", env("WIKIDATA_SPARQL_URL"))
	overlay(wd, "api_url", env("WIKIDATA_API_URL"))

	const rhea = section(cfg, "endpoints", "rhea")
	overlay(rhea, "sparql_url", env("RHEA_SPARQL_URL"))

	const http = section(cfg, "http")
	overlay(http, "user_agent", env("SPARQL_USER_AGENT"))
	overlay(http, "api_timeout_ms", envInt("WIKIDATA_API_TIMEOUT_MS"))

	const t = section(cfg, "throttle")
	overlay(t, "min_interval_ms", envInt("THROTTLE_MIN_INTERVAL_MS"))
	overlay(t, "max_backoff_ms", envInt("THROTTLE_MAX_BACKOFF_MS"))

	const c = section(cfg, "cache")
	overlay(c, "query_ttl_s", envInt("QUERY_CACHE_TTL_S"))

	const l = section(cfg, "lint")
	overlay(l, "limit_cap", envInt("SPARQL_LIMIT_CAP"))
	overlay(l, "max_triples", envInt("SPARQL_MAX_TRIPLES"))

	const r = section(cfg, "repair")
	overlay(r, "max_repairs", envInt("MAX_REPAIRS"))

	const log = section(cfg, "logging")
	overlay(log, "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

export interface LoadConfigOptions {
	/** Directory to start searching for config/config.yaml (default: cwd) */
	searchFrom?: string
}

let _config: SparqlConfig | null = null

export function parseConfig(raw: unknown): SparqlConfig {
	const parsed = sparqlConfigSchema.safeParse(raw)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
		throw new SparqlMCPError("config", `Invalid configuration: ${issues.join("; ")}`, false, { issues })
	}
	return parsed.data
}

export function loadConfig(options: LoadConfigOptions = {}): SparqlConfig {
	if (_config) return _config

	const configDir = findConfigDir(options.searchFrom ?? process.cwd())
	let merged: RawConfig = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = parseConfig(merged)
	return _config
}

export function getConfig(): SparqlConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
