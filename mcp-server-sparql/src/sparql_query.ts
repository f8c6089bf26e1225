/**
 * SPARQL Query Text Model
 *
 * Immutable view over query text used by the linter and the repair loop.
 * Holds a masked copy of the text in which string literal contents and
 * comments are blanked with spaces of equal length (IRIs are kept), so regex checks never
 * see literal characters and every match offset is valid in the real text.
 *
 * Rewrites (`withLimit`, `withoutLabelService`) return a new instance and
 * re-derive all spans from the rewritten text.
 */

// ============================================================================
// Tokenizer
// ============================================================================

enum TokenType {
	NORMAL = "NORMAL",
	STRING = "STRING",
	LONG_STRING = "LONG_STRING",
	IRI = "IRI",
	COMMENT = "COMMENT",
}

interface Token {
	type: TokenType
	value: string
	start: number
	end: number
}

/** Characters that may not appear inside an IRIREF */
const IRI_FORBIDDEN = /[<>"{}|^`\\\u0000- ]/

function scanIri(q: string, start: number): number {
	// Returns end offset (exclusive) of an IRIREF starting at `start`, or -1
	let i = start + 1
	while (i < q.length) {
		const ch = q[i]
		if (ch === ">") return i + 1
		if (IRI_FORBIDDEN.test(ch)) return -1
		i++
	}
	return -1
}

function scanShortString(q: string, start: number, quote: string): number {
	let i = start + 1
	while (i < q.length) {
		const ch = q[i]
		if (ch === "\\") {
			i += 2
			continue
		}
		if (ch === quote) return i + 1
		// Short strings cannot span lines
		if (ch === "\n") return i
		i++
	}
	return q.length
}

function scanLongString(q: string, start: number, delim: string): number {
	let i = start + 3
	while (i < q.length) {
		if (q[i] === "\\") {
			i += 2
			continue
		}
		if (q.startsWith(delim, i)) return i + 3
		i++
	}
	return q.length
}

function tokenizeSparql(q: string): Token[] {
	const tokens: Token[] = []
	const len = q.length
	let i = 0
	let normalStart = 0

	const flushNormal = (end: number) => {
		if (end > normalStart) {
			tokens.push({ type: TokenType.NORMAL, value: q.substring(normalStart, end), start: normalStart, end })
		}
	}

	while (i < len) {
		const ch = q[i]
		let type: TokenType | null = null
		let end = -1

		if (ch === "#") {
			type = TokenType.COMMENT
			const nl = q.indexOf("\n", i)
			end = nl === -1 ? len : nl
		} else if ((ch === '"' || ch === "'") && q.startsWith(ch.repeat(3), i)) {
			type = TokenType.LONG_STRING
			end = scanLongString(q, i, ch.repeat(3))
		} else if (ch === '"' || ch === "'") {
			type = TokenType.STRING
			end = scanShortString(q, i, ch)
		} else if (ch === "<") {
			const iriEnd = scanIri(q, i)
			if (iriEnd !== -1) {
				type = TokenType.IRI
				end = iriEnd
			}
		}

		if (type === null) {
			i++
			continue
		}

		flushNormal(i)
		tokens.push({ type, value: q.substring(i, end), start: i, end })
		i = end
		normalStart = end
	}
	flushNormal(len)

	return tokens
}

function blank(s: string): string {
	return s.replace(/[^\n]/g, " ")
}

/**
 * Blank string literal contents (delimiters kept) and comments.
 *
 * e.g.  FILTER(?x = "10*2")  →  FILTER(?x = "    ")
 */
export function maskSparql(q: string): string {
	return tokenizeSparql(q)
		.map((t) => {
			switch (t.type) {
				case TokenType.STRING:
					return t.value.length >= 2 && t.value.endsWith(t.value[0])
						? t.value[0] + blank(t.value.slice(1, -1)) + t.value[0]
						: t.value[0] + blank(t.value.slice(1))
				case TokenType.LONG_STRING:
					return t.value.length >= 6 && t.value.endsWith(t.value.slice(0, 3))
						? t.value.slice(0, 3) + blank(t.value.slice(3, -3)) + t.value.slice(-3)
						: t.value.slice(0, 3) + blank(t.value.slice(3))
				case TokenType.COMMENT:
					return blank(t.value)
				default:
					return t.value
			}
		})
		.join("")
}

// ============================================================================
// Query model
// ============================================================================

export interface LimitClause {
	value: number
	/** Span of the digits, in `text` offsets */
	start: number
	end: number
}

const LIMIT_RE = /\bLIMIT\s+(\d+)/i
const LABEL_SERVICE_RE = /\bSERVICE\s+wikibase:label\b/i
const LABEL_SERVICE_BLOCK_RE = /SERVICE\s+wikibase:label\s*\{[^}]*\}\s*\.?/gi

export class SparqlQuery {
	readonly masked: string
	readonly limit: LimitClause | null
	readonly hasLabelService: boolean

	private constructor(readonly text: string) {
		this.masked = maskSparql(text)
		this.limit = locateLimit(this.masked)
		this.hasLabelService = LABEL_SERVICE_RE.test(this.masked)
	}

	static parse(text: string): SparqlQuery {
		return new SparqlQuery(text)
	}

	/**
	 * Set the LIMIT value, rewriting the first numeric LIMIT in place or
	 * appending `LIMIT n` on a new line (trailing `;` removed) when absent.
	 */
	withLimit(value: number): SparqlQuery {
		if (this.limit) {
			if (this.limit.value === value) return this
			return new SparqlQuery(this.text.slice(0, this.limit.start) + String(value) + this.text.slice(this.limit.end))
		}
		return new SparqlQuery(this.text.replace(/[\s;]+$/, "") + `\nLIMIT ${value}`)
	}

	/**
	 * Halve the LIMIT (minimum 1). Returns null when there is no LIMIT.
	 */
	withHalvedLimit(): SparqlQuery | null {
		if (!this.limit) return null
		return this.withLimit(Math.max(1, Math.floor(this.limit.value / 2)))
	}

	/** Remove every `SERVICE wikibase:label { ... }` block. */
	withoutLabelService(): SparqlQuery {
		if (!this.hasLabelService) return this
		const spans: Array<[number, number]> = []
		for (const m of this.masked.matchAll(LABEL_SERVICE_BLOCK_RE)) {
			if (m.index !== undefined) spans.push([m.index, m.index + m[0].length])
		}
		let text = this.text
		for (const [start, end] of spans.reverse()) {
			text = text.slice(0, start) + text.slice(end)
		}
		return new SparqlQuery(text.trim())
	}
}

function locateLimit(masked: string): LimitClause | null {
	const m = LIMIT_RE.exec(masked)
	if (!m) return null
	const digits = m[1]
	const end = m.index + m[0].length
	return { value: parseInt(digits, 10), start: end - digits.length, end }
}

/**
 * Collapse whitespace so semantically identical queries share a cache key.
 */
export function normalizeSparqlForCache(query: string): string {
	return query.trim().replace(/\s+/g, " ")
}
