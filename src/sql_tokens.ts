/**
 * Quote- and comment-aware SQL segmentation
 *
 * Not a parser: it only separates code from string literals, quoted
 * identifiers and comments, so that structural scans (semicolons,
 * parenthesis depth, keywords) never look inside a literal.
 */

export type SegmentType =
	| "code"
	| "single_quote"
	| "double_quote"
	| "dollar_quote"
	| "line_comment"
	| "block_comment"

export interface SqlSegment {
	type: SegmentType
	value: string
	start: number
	end: number
}

const DOLLAR_TAG = /^\$[A-Za-z_]*\$/

function scanQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean = false): number {
	let i = start + 1
	while (i < sql.length) {
		if (backslashEscapes && sql[i] === "\\") {
			i += 2
			continue
		}
		if (sql[i] === quote) {
			// doubled quote is an escape
			if (sql[i + 1] === quote) {
				i += 2
				continue
			}
			return i + 1
		}
		i++
	}
	return sql.length
}

export function tokenizeSQL(sql: string): SqlSegment[] {
	const segments: SqlSegment[] = []
	const len = sql.length
	let codeStart = 0
	let i = 0

	const flushCode = (end: number) => {
		if (end > codeStart) {
			segments.push({ type: "code", value: sql.substring(codeStart, end), start: codeStart, end })
		}
	}
	const push = (type: SegmentType, start: number, end: number) => {
		flushCode(start)
		segments.push({ type, value: sql.substring(start, end), start, end })
		codeStart = end
		i = end
	}

	while (i < len) {
		const char = sql[i]
		const next = sql[i + 1]

		if (char === "-" && next === "-") {
			let end = i + 2
			while (end < len && sql[end] !== "\n") end++
			push("line_comment", i, end)
			continue
		}

		if (char === "/" && next === "*") {
			const close = sql.indexOf("*/", i + 2)
			push("block_comment", i, close === -1 ? len : close + 2)
			continue
		}

		if (char === "'") {
			// E'...' takes C-style backslash escapes; the E belongs to the literal
			const escaped = i > codeStart && /[Ee]/.test(sql[i - 1]) && !/[\w$]/.test(sql[i - 2] ?? "")
			const start = escaped ? i - 1 : i
			push("single_quote", start, scanQuoted(sql, i, "'", escaped))
			continue
		}

		if (char === '"') {
			push("double_quote", i, scanQuoted(sql, i, '"'))
			continue
		}

		if (char === "$") {
			const tag = DOLLAR_TAG.exec(sql.substring(i))
			if (tag) {
				const close = sql.indexOf(tag[0], i + tag[0].length)
				push("dollar_quote", i, close === -1 ? len : close + tag[0].length)
				continue
			}
		}

		i++
	}

	flushCode(len)
	return segments
}

export function isComment(segment: SqlSegment): boolean {
	return segment.type === "line_comment" || segment.type === "block_comment"
}

/**
 * Remove comments and collapse whitespace runs in code to single spaces.
 * Literal contents are left untouched.
 */
export function stripComments(sql: string): string {
	const withoutComments = tokenizeSQL(sql)
		.map((s) => (isComment(s) ? " " : s.value))
		.join("")
	return mapCode(withoutComments, (code) => code.replace(/\s+/g, " ")).trim()
}

/**
 * Same-length copy of `sql` in which every character outside code segments
 * is replaced by a space. Index-based scans on the mask map 1:1 back to
 * the original string.
 */
export function codeMask(sql: string): string {
	return tokenizeSQL(sql)
		.map((s) => (s.type === "code" ? s.value : " ".repeat(s.value.length)))
		.join("")
}

/**
 * Like codeMask, but double-quoted identifiers stay visible as bare names so
 * table scans see `"invoices"` as invoices. Quotes become padding and any
 * non-word character in the name becomes an underscore.
 */
export function identifierMask(sql: string): string {
	return tokenizeSQL(sql)
		.map((s) => {
			if (s.type === "code") return s.value
			if (s.type !== "double_quote") return " ".repeat(s.value.length)
			const name = s.value
				.replace(/^"|"$/g, "")
				.replace(/""/g, "_")
				.replace(/\W/g, "_")
			const padding = s.value.length - name.length
			// keep qualified names (schema."table", "schema".table) contiguous
			if (sql[s.end] === ".") return " ".repeat(padding) + name
			if (sql[s.start - 1] === ".") return name + " ".repeat(padding)
			return " " + name + " ".repeat(padding - 1)
		})
		.join("")
}

/** Apply `fn` to code segments only. */
export function mapCode(sql: string, fn: (code: string) => string): string {
	return tokenizeSQL(sql)
		.map((s) => (s.type === "code" ? fn(s.value) : s.value))
		.join("")
}

/**
 * Match a balanced parenthesized expression starting at `startIdx`.
 * Returns the content inside the parens and the index after the closing one.
 */
export function extractParenExpr(sql: string, startIdx: number): { content: string; endIdx: number } | null {
	if (sql[startIdx] !== "(") return null
	const mask = codeMask(sql)
	let depth = 1
	let i = startIdx + 1
	while (i < mask.length && depth > 0) {
		if (mask[i] === "(") depth++
		else if (mask[i] === ")") depth--
		i++
	}
	if (depth !== 0) return null
	return {
		content: sql.substring(startIdx + 1, i - 1),
		endIdx: i,
	}
}

/**
 * Positions of a keyword (or keyword phrase) at parenthesis depth zero,
 * outside literals and comments.
 */
export function findTopLevelKeyword(sql: string, keyword: string, fromIndex: number = 0): number[] {
	const mask = codeMask(sql)
	const phrase = keyword.trim().split(/\s+/).join("\\s+")
	const regex = new RegExp(`\\b${phrase}\\b`, "gi")
	const depthAt = parenDepths(mask)
	const hits: number[] = []
	let match: RegExpExecArray | null
	regex.lastIndex = fromIndex
	while ((match = regex.exec(mask)) !== null) {
		if (depthAt[match.index] === 0) hits.push(match.index)
	}
	return hits
}

/** Parenthesis depth before each character of a code mask. */
export function parenDepths(mask: string): number[] {
	const depths: number[] = new Array(mask.length)
	let depth = 0
	for (let i = 0; i < mask.length; i++) {
		depths[i] = depth
		if (mask[i] === "(") depth++
		else if (mask[i] === ")") depth = Math.max(0, depth - 1)
	}
	return depths
}
