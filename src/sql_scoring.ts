/**
 * Confidence and Complexity Heuristics
 *
 * Deterministic scores over a finished statement. Neither looks at the
 * database; both are surface checks on the SQL text.
 */

import type { QueryComplexity } from "./conversation_state.js"

// ============================================================================
// Configuration
// ============================================================================

export interface ConfidenceWeights {
	/** Starting confidence for any non-empty statement */
	baseline: number
	/** SELECT and FROM both present */
	select_from_bonus: number
	/** WHERE present (only with SELECT/FROM) */
	where_bonus: number
	/** JOIN present (only with SELECT/FROM) */
	join_bonus: number
	/** Per distinct query term found in the SQL */
	term_bonus: number
	/** Statements shorter than this many characters lose short_penalty */
	short_length: number
	short_penalty: number
	/** Statements longer than this many characters lose long_penalty */
	long_length: number
	long_penalty: number
}

export const CONFIDENCE_WEIGHTS: ConfidenceWeights = {
	baseline: 0.7,
	select_from_bonus: 0.1,
	where_bonus: 0.05,
	join_bonus: 0.05,
	term_bonus: 0.02,
	short_length: 20,
	short_penalty: 0.1,
	long_length: 500,
	long_penalty: 0.1,
}

const STOPWORDS = new Set(["what", "who", "where", "when", "how", "and", "the", "is", "are", "was"])

/** Upper bounds (inclusive) of the simple and moderate bands */
export const COMPLEXITY_THRESHOLDS = { simple: 2, moderate: 6 } as const

// ============================================================================
// Confidence
// ============================================================================

function hasWord(sql: string, word: string): boolean {
	return new RegExp(`\\b${word}\\b`, "i").test(sql)
}

/**
 * Confidence in [0, 1] that `sql` answers `queryText`.
 * Query terms are whitespace-separated, lowercased and deduplicated; a term
 * counts when it occurs anywhere in the lowercased SQL.
 */
export function computeConfidence(
	sql: string,
	queryText: string,
	weights: ConfidenceWeights = CONFIDENCE_WEIGHTS,
): number {
	if (!sql) return 0

	let confidence = weights.baseline
	const sqlLower = sql.toLowerCase()

	if (hasWord(sql, "select") && hasWord(sql, "from")) {
		confidence += weights.select_from_bonus
		if (hasWord(sql, "where")) confidence += weights.where_bonus
		if (hasWord(sql, "join")) confidence += weights.join_bonus
	}

	const terms = new Set(queryText.toLowerCase().split(/\s+/).filter((t) => t.length > 0))
	for (const term of terms) {
		if (STOPWORDS.has(term)) continue
		if (sqlLower.includes(term)) confidence += weights.term_bonus
	}

	if (sql.length < weights.short_length) confidence -= weights.short_penalty
	if (sql.length > weights.long_length) confidence -= weights.long_penalty

	const clamped = Math.max(0, Math.min(1, confidence))
	return Math.round(clamped * 10000) / 10000
}

// ============================================================================
// Complexity
// ============================================================================

/** Raw additive complexity score, before banding. */
export function complexityScore(sql: string): number {
	const sqlLower = sql.toLowerCase()
	let score = 0

	if (/\bjoin\b/.test(sqlLower)) score += 2
	if (/\bwhere\b/.test(sqlLower)) score += 1
	if (/\bgroup\s+by\b/.test(sqlLower)) score += 2
	if (/\bhaving\b/.test(sqlLower)) score += 2
	if (/\border\s+by\b/.test(sqlLower)) score += 1
	if (/\blimit\b/.test(sqlLower)) score += 1

	score += (sqlLower.match(/\(\s*select\b/g) ?? []).length * 3

	if (/\bover\s*\(/.test(sqlLower) && /\b(partition|order)\s+by\b/.test(sqlLower)) score += 3

	score += (sqlLower.match(/\b(count|sum|avg|min|max)\s*\(/g) ?? []).length

	return score
}

export function classifyComplexity(sql: string): QueryComplexity {
	const score = complexityScore(sql)
	if (score <= COMPLEXITY_THRESHOLDS.simple) return "simple"
	if (score <= COMPLEXITY_THRESHOLDS.moderate) return "moderate"
	return "complex"
}
