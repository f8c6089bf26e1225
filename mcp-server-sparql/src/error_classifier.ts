/**
 * Error Classifier
 *
 * Maps a raw endpoint / transport diagnostic to a stable ErrorCode plus a
 * short repair hint. Pure keyword matching over the lower-cased message;
 * always returns a code.
 */

import { ERROR_CODES, type ClassifiedError, type ErrorCode } from "./config.js"

const SYNTAX_KEYWORDS = ["parse error", "syntax", "malformed", "lexical error", "encountered \""]
const TIMEOUT_KEYWORDS = ["timeout", "timed out", "deadline", "too long"]
const RATE_LIMIT_KEYWORDS = ["rate limit", "rate-limit", "ratelimit", "too many requests", "throttl"]
const ENDPOINT_KEYWORDS = ["internal server error", "bad gateway", "service unavailable"]

const RATE_LIMIT_STATUS_RE = /\b429\b/
const SERVER_ERROR_STATUS_RE = /\b50[0234]\b/

const HINTS: Record<Exclude<ErrorCode, "UNKNOWN" | "EMPTY" | "LINTER_BLOCK">, string> = {
	SYNTAX: "Fix the SPARQL syntax and retry.",
	TIMEOUT: "Simplify the query or reduce LIMIT.",
	RATE_LIMIT: "Wait a moment before retrying.",
	ENDPOINT_ERROR: "The endpoint may be down; retry later.",
}

function containsAny(msg: string, keywords: readonly string[]): boolean {
	return keywords.some((kw) => msg.includes(kw))
}

/**
 * Classify a raw error message.
 *
 * Checked in order: syntax, timeout, rate limit, 5xx. WDQS reports query
 * timeouts as HTTP 500 with a TimeoutException body, so timeout wording
 * wins over the status code.
 */
export function classifySparqlError(rawMessage: string | null | undefined): ClassifiedError {
	const raw = rawMessage ?? ""
	const msg = raw.toLowerCase()

	if (containsAny(msg, SYNTAX_KEYWORDS)) {
		return { code: "SYNTAX", hint: HINTS.SYNTAX }
	}
	if (containsAny(msg, TIMEOUT_KEYWORDS)) {
		return { code: "TIMEOUT", hint: HINTS.TIMEOUT }
	}
	if (RATE_LIMIT_STATUS_RE.test(msg) || containsAny(msg, RATE_LIMIT_KEYWORDS)) {
		return { code: "RATE_LIMIT", hint: HINTS.RATE_LIMIT }
	}
	if (SERVER_ERROR_STATUS_RE.test(msg) || containsAny(msg, ENDPOINT_KEYWORDS)) {
		return { code: "ENDPOINT_ERROR", hint: HINTS.ENDPOINT_ERROR }
	}
	return { code: "UNKNOWN", hint: `Unexpected error: ${raw.slice(0, 200)}` }
}

export function describeErrorCode(code: ErrorCode): string {
	return ERROR_CODES[code]
}

/**
 * Whether the execution loop may retry this code on its own.
 */
export function isAutoRepairable(code: ErrorCode): boolean {
	return code === "TIMEOUT" || code === "RATE_LIMIT"
}
