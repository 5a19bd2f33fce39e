/**
 * PostgreSQL Dialect Rewrites
 *
 * Deterministic rewrites of constructs that completion models emit but
 * PostgreSQL rejects or evaluates differently. Every transform operates on
 * code segments only (never inside literals or comments) and is idempotent:
 * applying it to its own output changes nothing.
 */

import { codeMask, extractParenExpr, mapCode, parenDepths } from "./sql_tokens.js"

// ============================================================================
// Types
// ============================================================================

export interface RewriteResult {
	/** Rewritten SQL */
	sql: string
	/** Names of the transforms that changed something */
	applied: string[]
	changed: boolean
}

type Transform = (sql: string) => { sql: string; applied: string[] }

// ============================================================================
// Transform Definitions
// ============================================================================

/**
 * Split `content` at its last comma at parenthesis depth zero.
 * Returns null when there is no such comma.
 */
function splitLastTopLevelComma(content: string): [string, string] | null {
	const mask = codeMask(content)
	const depths = parenDepths(mask)
	for (let i = mask.length - 1; i >= 0; i--) {
		if (mask[i] === "," && depths[i] === 0) {
			return [content.substring(0, i), content.substring(i + 1)]
		}
	}
	return null
}

function isNumericCast(expr: string): boolean {
	return /^CAST\s*\(/i.test(expr) || /::\s*numeric$/i.test(expr)
}

/**
 * ROUND(expr, n) → ROUND(CAST(expr AS numeric), n)
 *
 * PostgreSQL only has the two-argument ROUND for numeric, so AVG() and
 * float expressions need the cast. Arguments already cast are left alone.
 */
function transformRoundCast(sql: string): { sql: string; applied: string[] } {
	const applied: string[] = []
	const regex = /\bROUND\s*\(/gi
	const mask = codeMask(sql)
	const starts: number[] = []
	let match: RegExpExecArray | null
	while ((match = regex.exec(mask)) !== null) {
		starts.push(match.index + match[0].length - 1)
	}

	// Right to left, so nested calls are rewritten before the call holding them
	// and earlier offsets stay valid.
	for (const openParenIdx of starts.reverse()) {
		const paren = extractParenExpr(sql, openParenIdx)
		if (!paren) continue

		const args = splitLastTopLevelComma(paren.content)
		if (!args) continue
		const expr = args[0].trim()
		const places = args[1].trim()
		if (!/^\d+$/.test(places) || expr.length === 0 || isNumericCast(expr)) continue

		const replacement = `(CAST(${expr} AS numeric), ${places})`
		sql = sql.substring(0, openParenIdx) + replacement + sql.substring(paren.endIdx)
		if (!applied.includes("ROUND_NUMERIC_CAST")) applied.push("ROUND_NUMERIC_CAST")
	}

	return { sql, applied }
}

/**
 * to_vector(:param) → '[:param]'::vector
 */
function transformToVector(sql: string): { sql: string; applied: string[] } {
	const applied: string[] = []
	const rewritten = mapCode(sql, (code) =>
		code.replace(/\bto_vector\s*\(\s*:(\w+)\s*\)/gi, (_m: string, param: string) => {
			applied.push(param)
			return `'[:${param}]'::vector`
		}),
	)
	return { sql: rewritten, applied: applied.length > 0 ? ["TO_VECTOR_LITERAL"] : [] }
}

/**
 * description_embedding → description_embedding::vector, and the bare
 * `embedding` column when invoice_embeddings is queried.
 */
function transformEmbeddingCast(sql: string): { sql: string; applied: string[] } {
	const applied: string[] = []
	const columns = /\binvoice_embeddings\b/i.test(codeMask(sql))
		? /\b(description_embedding|embedding)\b(?!\s*::\s*vector)/g
		: /\b(description_embedding)\b(?!\s*::\s*vector)/g

	const rewritten = mapCode(sql, (code) =>
		code.replace(columns, (column: string) => {
			applied.push(column)
			return `${column}::vector`
		}),
	)

	return { sql: rewritten, applied: applied.length > 0 ? ["EMBEDDING_VECTOR_CAST"] : [] }
}

/**
 * IFNULL(a, b) / NVL(a, b) → COALESCE(a, b)
 */
function transformCoalesce(sql: string): { sql: string; applied: string[] } {
	const applied: string[] = []

	for (const func of ["IFNULL", "NVL"]) {
		let hit = false
		sql = mapCode(sql, (code) =>
			code.replace(new RegExp(`\\b${func}\\s*\\(`, "gi"), () => {
				hit = true
				return "COALESCE("
			}),
		)
		if (hit) applied.push(`${func}_TO_COALESCE`)
	}

	return { sql, applied }
}

/**
 * MySQL LIMIT offset, count → LIMIT count OFFSET offset
 */
function transformLimitOffset(sql: string): { sql: string; applied: string[] } {
	let hit = false
	const rewritten = mapCode(sql, (code) =>
		code.replace(/\bLIMIT\s+(\d+)\s*,\s*(\d+)\b/gi, (_m: string, offset: string, limit: string) => {
			hit = true
			return `LIMIT ${limit} OFFSET ${offset}`
		}),
	)
	return { sql: rewritten, applied: hit ? ["MYSQL_LIMIT_OFFSET"] : [] }
}

/**
 * Remove backtick identifiers (MySQL style)
 */
function transformBackticks(sql: string): { sql: string; applied: string[] } {
	let hit = false
	const rewritten = mapCode(sql, (code) => {
		if (!code.includes("`")) return code
		hit = true
		return code.replace(/`/g, "")
	})
	return { sql: rewritten, applied: hit ? ["REMOVE_BACKTICKS"] : [] }
}

// ============================================================================
// Main Function
// ============================================================================

const TRANSFORMS: Transform[] = [
	transformBackticks,
	transformCoalesce,
	transformLimitOffset,
	transformRoundCast,
	transformToVector,
	transformEmbeddingCast,
]

/**
 * Apply all dialect rewrites in order.
 * Already-valid PostgreSQL passes through unchanged.
 */
export function applyDialectRewrites(sql: string): RewriteResult {
	if (!sql || !sql.trim()) {
		return { sql, applied: [], changed: false }
	}

	const allApplied: string[] = []
	let currentSQL = sql

	for (const transform of TRANSFORMS) {
		const result = transform(currentSQL)
		if (result.applied.length > 0) {
			currentSQL = result.sql
			allApplied.push(...result.applied)
		}
	}

	return {
		sql: currentSQL,
		applied: allApplied,
		changed: currentSQL !== sql,
	}
}

export {
	transformRoundCast,
	transformToVector,
	transformEmbeddingCast,
	transformCoalesce,
	transformLimitOffset,
	transformBackticks,
}
