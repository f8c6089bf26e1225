#!/usr/bin/env node
/**
 * Stdio entry point for the SPARQL MCP Server
 *
 * Config priority (highest first):
 *   1. Environment variables (WIKIDATA_SPARQL_URL, RHEA_SPARQL_URL, LOG_LEVEL, ...)
 *   2. config/config.local.yaml
 *   3. config/config.yaml
 *
 * Usage:
 *   node stdio.js
 *   LOG_LEVEL=debug node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { loadConfig } from "./config/loadConfig.js"
import { createLogger } from "./logger.js"
import createServer from "./server.js"

// Bootstrap logger until the configured level is known (stdout is reserved for MCP protocol)
const bootLogger = createLogger("info")

async function main() {
	const config = loadConfig()
	const logger = createLogger(config.logging.level)

	logger.info("Starting SPARQL MCP Server with stdio transport")
	logger.info("Endpoints", {
		wikidata: config.endpoints.wikidata.sparql_url,
		rhea: config.endpoints.rhea.sparql_url,
	})

	const server = createServer({ config, logger })

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("SPARQL MCP Server running via stdio")

	const shutdown = (signal: string) => {
		logger.info("Shutting down...", { signal })
		server
			.close()
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logger.error("Error during shutdown", { error: error instanceof Error ? error.message : String(error) })
				process.exit(1)
			})
	}

	process.on("SIGINT", () => shutdown("SIGINT"))
	process.on("SIGTERM", () => shutdown("SIGTERM"))
}

main().catch((error: unknown) => {
	bootLogger.error("Fatal error", { error: error instanceof Error ? error.message : String(error) })
	process.exit(1)
})
