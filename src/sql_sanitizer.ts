/**
 * SQL Sanitizer
 *
 * Turns a completion model's SQL proposal into a single, tenant-scoped
 * statement or refuses it. Stages, in order:
 *
 *   1. extractSQL (compiler only, on the full completion text)
 *   2. comment stripping and whitespace collapse
 *   3. statement isolation
 *   4. deny-list
 *   5. dialect rewrites
 *   6. tenant isolation
 *
 * Surface syntax only: no SQL grammar is parsed. Structural scans run on a
 * code mask from sql_tokens so literals and comments never count as
 * structure.
 */

import type { ExtractionMethod, SecurityLevel } from "./conversation_state.js"
import { UnsafeStatementError } from "./errors.js"
import type { Logger } from "./logger.js"
import { applyDialectRewrites } from "./sql_rewrites.js"
import {
	codeMask,
	findTopLevelKeyword,
	identifierMask,
	isComment,
	parenDepths,
	stripComments,
	tokenizeSQL,
} from "./sql_tokens.js"

// ============================================================================
// Types
// ============================================================================

export interface SanitizeOptions {
	/** Column holding the tenant key on tenant-scoped tables (default user_id) */
	tenantColumn?: string
	/** Name of the bound placeholder, without the colon (default tenant_id) */
	tenantParam?: string
	/** Reject anything that is not a read (default false) */
	readOnly?: boolean
	/** Tenant-agnostic reference tables */
	lookupTables?: string[]
	/** Tables whose rows belong to a tenant */
	tenantTables?: string[]
	logger?: Logger
}

export interface SanitizedStatement {
	sql: string
	securityLevel: SecurityLevel
	/** Dialect rewrites and structural edits applied, in order */
	rewrites: string[]
	/** Tables named after FROM / JOIN, lowercased, schema stripped */
	tablesReferenced: string[]
}

export interface ExtractedSQL {
	sql: string
	method: ExtractionMethod
}

interface TableRef {
	table: string
	alias: string | null
}

/** A table reference and the offset of the FROM or JOIN that introduced it */
interface FromItem extends TableRef {
	at: number
}

export interface IsolatedStatement {
	sql: string
	truncated: boolean
	/** What ended the first statement, when something was cut */
	cutAt: "semicolon" | "select" | null
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_LOOKUP_TABLES = ["categories", "statuses", "settings"]

export const DEFAULT_TENANT_TABLES = [
	"invoices",
	"users",
	"clients",
	"products",
	"items",
	"media",
	"conversations",
	"messages",
	"invoice_embeddings",
]

/** Tables keyed by something other than the tenant column */
const TENANT_KEY_BY_TABLE = new Map<string, string>([["users", "id"]])

const EXTRACTION_KEYWORDS = ["SELECT", "INSERT", "UPDATE", "DELETE", "WITH"]

interface DenyRule {
	pattern: string
	regex: RegExp
}

const DENY_RULES: DenyRule[] = [
	{ pattern: "DROP", regex: /\bDROP\b/i },
	{ pattern: "TRUNCATE", regex: /\bTRUNCATE\b/i },
	{ pattern: "ALTER", regex: /\bALTER\b/i },
	{ pattern: "DELETE without FROM", regex: /\bDELETE\b(?!\s+FROM\b)/i },
	{ pattern: "GRANT", regex: /\bGRANT\b/i },
	{ pattern: "REVOKE", regex: /\bREVOKE\b/i },
	{ pattern: "EXEC", regex: /\bEXEC\b/i },
]

const WRITE_RULES: DenyRule[] = [
	{ pattern: "INSERT", regex: /\bINSERT\b/i },
	{ pattern: "UPDATE", regex: /\bUPDATE\b/i },
	{ pattern: "DELETE", regex: /\bDELETE\b/i },
]

/** Leading keywords of statements that are not plain reads */
const NON_READ_STATEMENTS = new Set([
	"INSERT", "UPDATE", "DELETE", "MERGE", "UPSERT", "REPLACE",
	"CREATE", "COPY", "CALL", "DO", "EXECUTE", "PREPARE", "DEALLOCATE",
	"SET", "RESET", "LOCK", "VACUUM", "ANALYZE", "CLUSTER", "REINDEX",
	"REFRESH", "COMMENT", "IMPORT", "LISTEN", "NOTIFY", "UNLISTEN",
	"DISCARD", "BEGIN", "START", "COMMIT", "END", "ROLLBACK", "SAVEPOINT",
	"RELEASE", "SECURITY", "LOAD",
])

/** Words that can follow a table name but are never its alias */
const NOT_AN_ALIAS = new Set([
	"where", "join", "inner", "left", "right", "full", "cross", "natural", "outer",
	"on", "using", "group", "order", "limit", "offset", "having", "window",
	"union", "intersect", "except", "for", "fetch", "lateral", "tablesample",
])

/** Clauses that end a WHERE / FROM clause at the top level */
const CLAUSE_TERMINATORS = [
	"GROUP BY", "HAVING", "WINDOW", "ORDER BY", "LIMIT", "OFFSET", "FETCH",
	"FOR", "UNION", "INTERSECT", "EXCEPT",
]

// ============================================================================
// 1. Extraction
// ============================================================================

/**
 * Pull the SQL statement out of a completion response.
 *
 * Tries, in order: a ```sql fence, a bare fence opening with a statement
 * keyword, then the first `<KEYWORD> ... ;` run per keyword. Falls back to
 * the trimmed response.
 */
export function extractSQL(response: string): ExtractedSQL {
	const fenced = /```sql\s*([\s\S]*?)\s*```/i.exec(response)
	if (fenced) {
		return { sql: fenced[1].trim(), method: "fenced_sql" }
	}

	const bare = /```\s*((?:SELECT|INSERT|UPDATE|DELETE|WITH)\b[\s\S]*?)```/i.exec(response)
	if (bare) {
		return { sql: bare[1].trim().replace(/^`+|`+$/g, "").trim(), method: "fenced_keyword" }
	}

	for (const keyword of EXTRACTION_KEYWORDS) {
		const match = new RegExp(`(\\b${keyword}\\s+[\\s\\S]*?)(;|$)`, "i").exec(response)
		if (match) {
			return { sql: match[1].trim(), method: "keyword_match" }
		}
	}

	return { sql: response.trim(), method: "raw" }
}

// ============================================================================
// 3. Statement isolation
// ============================================================================

/**
 * Keep only the first statement.
 *
 * With a top-level semicolon the text before it wins. Otherwise a SELECT at
 * parenthesis depth zero that follows other text is treated as the start of
 * a second statement. That rule also cuts `... UNION SELECT ...` and a CTE's
 * main query, so sanitizeSQL downgrades a cut at SELECT to
 * requires_verification.
 */
export function isolateStatement(sql: string): IsolatedStatement {
	const mask = codeMask(sql)

	const semicolon = mask.indexOf(";")
	if (semicolon !== -1) {
		const first = sql.substring(0, semicolon).trim()
		const rest = sql.substring(semicolon + 1).trim()
		const truncated = rest.length > 0
		return { sql: first, truncated, cutAt: truncated ? "semicolon" : null }
	}

	for (const idx of findTopLevelKeyword(sql, "SELECT")) {
		if (sql.substring(0, idx).trim().length > 0) {
			return { sql: sql.substring(0, idx).trim(), truncated: true, cutAt: "select" }
		}
	}

	return { sql: sql.trim(), truncated: false, cutAt: null }
}

// ============================================================================
// 4. Deny-list
// ============================================================================

/**
 * Throw UnsafeStatementError when the statement matches the deny-list.
 * Literal contents are scanned too.
 */
export function checkDenyList(sql: string, readOnly: boolean = false): void {
	for (const rule of DENY_RULES) {
		if (rule.regex.test(sql)) {
			throw new UnsafeStatementError(rule.pattern, sql)
		}
	}

	if (!readOnly) return

	const leading = /^\s*\(*\s*([A-Za-z]+)/.exec(codeMask(sql))
	if (leading && NON_READ_STATEMENTS.has(leading[1].toUpperCase())) {
		throw new UnsafeStatementError(`read-only: ${leading[1].toUpperCase()}`, sql)
	}
	for (const rule of WRITE_RULES) {
		if (rule.regex.test(sql)) {
			throw new UnsafeStatementError(`read-only: ${rule.pattern}`, sql)
		}
	}
}

// ============================================================================
// 6. Tenant isolation
// ============================================================================

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

const TABLE_ITEM = String.raw`\s*([A-Za-z_][\w$]*(?:\.[A-Za-z_][\w$]*)?)(?:\s+(?:AS\s+)?([A-Za-z_][\w$]*))?`

function toTableRef(match: RegExpExecArray): TableRef {
	const qualified = match[1].toLowerCase()
	const table = qualified.includes(".") ? qualified.substring(qualified.lastIndexOf(".") + 1) : qualified
	const aliasCandidate = match[2]
	const alias = aliasCandidate && !NOT_AN_ALIAS.has(aliasCandidate.toLowerCase()) ? aliasCandidate : null
	return { table, alias }
}

/**
 * Read the comma-separated table list that starts at `start`, right after a
 * FROM or JOIN keyword. `plain` is false as soon as an item is not a bare
 * table name (subquery, function call, LATERAL, column alias list).
 */
function readTableList(mask: string, start: number): { refs: TableRef[]; plain: boolean } {
	const refs: TableRef[] = []
	const item = new RegExp(TABLE_ITEM, "iy")
	let pos = start
	for (;;) {
		item.lastIndex = pos
		const match = item.exec(mask)
		if (!match || NOT_AN_ALIAS.has(match[1].toLowerCase())) return { refs, plain: false }

		const ref = toTableRef(match)
		refs.push(ref)
		pos = ref.alias ? item.lastIndex : match.index + match[0].indexOf(match[1]) + match[1].length

		const rest = mask.substring(pos)
		if (/^\s*\(/.test(rest)) return { refs, plain: false }
		const comma = /^\s*,/.exec(rest)
		if (!comma) return { refs, plain: true }
		pos += comma[0].length
	}
}

/** Every FROM / JOIN item, with quoted identifiers read as names. */
function scanFromItems(sql: string): { items: FromItem[]; plain: boolean } {
	const mask = identifierMask(sql)
	const keyword = /\b(?:FROM|JOIN)\b/gi
	const items: FromItem[] = []
	let plain = true
	let match: RegExpExecArray | null
	while ((match = keyword.exec(mask)) !== null) {
		const list = readTableList(mask, match.index + match[0].length)
		const at = match.index
		items.push(...list.refs.map((ref) => ({ ...ref, at })))
		plain = plain && list.plain
	}
	return { items, plain }
}

/** Tables and aliases named after FROM or JOIN, comma lists included. */
export function tableReferences(sql: string): TableRef[] {
	return scanFromItems(sql).items.map(({ table, alias }) => ({ table, alias }))
}

function uniqueTables(refs: TableRef[]): string[] {
	return [...new Set(refs.map((r) => r.table))]
}

function lookupSet(options: SanitizeOptions): Set<string> {
	return new Set((options.lookupTables ?? DEFAULT_LOOKUP_TABLES).map((t) => t.toLowerCase()))
}

/**
 * True when the top-level WHERE clause carries an equality filter binding the
 * tenant key to the tenant placeholder or to the tenant's literal id.
 *
 * The comparison must be a conjunct of that clause: it sits at parenthesis
 * depth zero in code, is preceded by WHERE or AND, is followed by AND or the
 * end of the clause, and the clause has no top-level OR. Anything else
 * (a filter in a subquery, a select-list expression, `user_id = 7 + 1`)
 * does not count.
 */
export function hasTenantFilter(sql: string, tenantId: string, options: SanitizeOptions = {}): boolean {
	const column = options.tenantColumn ?? "user_id"
	const param = options.tenantParam ?? "tenant_id"

	const whereIdx = findTopLevelKeyword(sql, "WHERE")[0]
	if (whereIdx === undefined) return false
	const whereEnd = nextTopLevelClause(sql, whereIdx)

	const mask = codeMask(sql)
	const depths = parenDepths(mask)
	const or = /\bOR\b/gi
	or.lastIndex = whereIdx
	let orMatch: RegExpExecArray | null
	while ((orMatch = or.exec(mask)) !== null && orMatch.index < whereEnd) {
		if (depths[orMatch.index] === 0) return false
	}

	const userAliases = tableReferences(sql)
		.filter((r) => r.table === "users" && r.alias)
		.map((r) => escapeRegExp(r.alias ?? ""))
	const userQualifiers = ["users", "u", ...userAliases].join("|")

	const bareColumn = `(?:\\b[A-Za-z_][\\w$]*\\.)?\\b${escapeRegExp(column)}\\b|\\b(?:${userQualifiers})\\.id\\b`
	const columnExpr = `(?:CAST\\s*\\(\\s*(?:${bareColumn})\\s+AS\\s+\\w+\\s*\\)|(?:${bareColumn}))(?:\\s*::\\s*\\w+)?`

	const values = [`:${escapeRegExp(param)}\\b`]
	if (tenantId) {
		const id = escapeRegExp(tenantId)
		values.push(`'${id}'`)
		if (/^\d+$/.test(tenantId)) values.push(`\\b${id}\\b`)
	}
	const bareValue = `(?:${values.join("|")})`
	const valueExpr = `(?:CAST\\s*\\(\\s*${bareValue}\\s+AS\\s+\\w+\\s*\\)|${bareValue})(?:\\s*::\\s*\\w+)?`

	const patterns = [
		new RegExp(`(?:${columnExpr})\\s*=\\s*${valueExpr}`, "gi"),
		new RegExp(`${valueExpr}\\s*=\\s*(?:${columnExpr})`, "gi"),
	]
	for (const regex of patterns) {
		let match: RegExpExecArray | null
		while ((match = regex.exec(sql)) !== null) {
			const start = match.index
			const end = start + match[0].length
			const eq = start + (regex === patterns[0] ? match[0].indexOf("=") : match[0].lastIndexOf("="))
			regex.lastIndex = start + 1
			if (mask[eq] !== "=" || depths[eq] !== 0 || eq < whereIdx || end > whereEnd) continue
			if (!/(?:^WHERE|\bAND)\s*$/i.test(mask.substring(whereIdx, start))) continue
			if (!/^\s*(?:AND\b|$)/i.test(mask.substring(end, whereEnd))) continue
			return true
		}
	}
	return false
}

/**
 * Every FROM item is a plain lookup table and no tenant table is named
 * anywhere, quoted or not.
 */
function isLookupOnly(sql: string, options: SanitizeOptions): boolean {
	const lookup = lookupSet(options)
	const tenantTables = options.tenantTables ?? DEFAULT_TENANT_TABLES
	const { items, plain } = scanFromItems(sql)
	if (!plain || items.length === 0 || !items.every((item) => lookup.has(item.table))) return false

	const mask = identifierMask(sql)
	return !tenantTables.some((t) => new RegExp(`\\b${escapeRegExp(t)}\\b`, "i").test(mask))
}

/** First top-level occurrence of any clause keyword at or after `from`. */
function nextTopLevelClause(sql: string, from: number): number {
	let earliest = sql.length
	for (const clause of CLAUSE_TERMINATORS) {
		const hit = findTopLevelKeyword(sql, clause, from).find((idx) => idx >= from)
		if (hit !== undefined && hit < earliest) earliest = hit
	}
	return earliest
}

/** Whether the FROM clause joins several tables at the top level. */
function fromClauseJoins(sql: string, fromIdx: number, clauseEnd: number): boolean {
	if (findTopLevelKeyword(sql, "JOIN", fromIdx).some((idx) => idx < clauseEnd)) return true
	const mask = codeMask(sql)
	const depths = parenDepths(mask)
	for (let i = fromIdx; i < clauseEnd; i++) {
		if (mask[i] === "," && depths[i] === 0) return true
	}
	return false
}

/**
 * Ensure the statement is tenant-scoped, injecting a filter when it is not.
 */
export function enforceTenantIsolation(
	sql: string,
	tenantId: string,
	options: SanitizeOptions = {},
): { sql: string; securityLevel: SecurityLevel; injected: boolean } {
	if (hasTenantFilter(sql, tenantId, options)) {
		return { sql, securityLevel: "secure", injected: false }
	}

	if (isLookupOnly(sql, options)) {
		return { sql, securityLevel: "secure", injected: false }
	}

	const selectIdx = findTopLevelKeyword(sql, "SELECT")[0]
	const fromIdx = selectIdx === undefined ? undefined : findTopLevelKeyword(sql, "FROM", selectIdx)[0]
	if (selectIdx === undefined || fromIdx === undefined) {
		return { sql, securityLevel: "requires_verification", injected: false }
	}

	const whereIdx = findTopLevelKeyword(sql, "WHERE", fromIdx)[0]
	const fromEnd = nextTopLevelClause(sql, fromIdx)
	const clauseEnd = whereIdx === undefined ? fromEnd : nextTopLevelClause(sql, whereIdx)

	// filter the first top-level table that is not a lookup table
	const depths = parenDepths(codeMask(sql))
	const fromListEnd = whereIdx ?? fromEnd
	const topLevel = scanFromItems(sql).items.filter((i) => i.at >= fromIdx && i.at < fromListEnd && depths[i.at] === 0)
	const lookup = lookupSet(options)
	const target = topLevel.find((i) => !lookup.has(i.table)) ?? topLevel.find((i) => i.at === fromIdx)

	const keyColumn = (target ? TENANT_KEY_BY_TABLE.get(target.table) : undefined) ?? options.tenantColumn ?? "user_id"
	const joins = fromClauseJoins(sql, fromIdx, fromListEnd)
	const needsQualifier = joins || keyColumn !== (options.tenantColumn ?? "user_id")
	const qualifier = needsQualifier && target ? `${target.alias ?? target.table}.` : ""
	const filter = `${qualifier}${keyColumn} = :${options.tenantParam ?? "tenant_id"}`

	const tail = sql.substring(clauseEnd).trim()
	let scoped: string
	if (whereIdx !== undefined) {
		const condition = sql.substring(whereIdx + "WHERE".length, clauseEnd).trim()
		scoped = `${sql.substring(0, whereIdx)}WHERE (${condition}) AND ${filter}`
	} else {
		scoped = `${sql.substring(0, clauseEnd).trimEnd()} WHERE ${filter}`
	}
	if (tail) scoped = `${scoped} ${tail}`

	return { sql: scoped, securityLevel: "secure_after_modification", injected: true }
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Sanitize an extracted SQL candidate for one tenant.
 *
 * @throws UnsafeStatementError when the isolated statement hits the deny-list
 */
export function sanitizeSQL(candidate: string, tenantId: string, options: SanitizeOptions = {}): SanitizedStatement {
	const logger = options.logger
	const rewrites: string[] = []

	const stripped = stripComments(candidate)
	if (tokenizeSQL(candidate).some(isComment)) rewrites.push("STRIP_COMMENTS")

	const isolated = isolateStatement(stripped)
	if (isolated.truncated) {
		rewrites.push("ISOLATE_FIRST_STATEMENT")
		logger?.warn("SQL contained multiple statements, keeping only the first", { sql: isolated.sql })
	}

	if (!isolated.sql) {
		return { sql: "", securityLevel: "requires_verification", rewrites, tablesReferenced: [] }
	}

	try {
		checkDenyList(isolated.sql, options.readOnly ?? false)
	} catch (error) {
		if (error instanceof UnsafeStatementError) {
			logger?.error("SQL rejected by deny-list", { pattern: error.pattern })
		}
		throw error
	}

	const dialect = applyDialectRewrites(isolated.sql)
	rewrites.push(...dialect.applied)

	const scoped = enforceTenantIsolation(dialect.sql, tenantId, options)
	if (scoped.injected) {
		rewrites.push("INJECT_TENANT_FILTER")
		logger?.debug("Injected tenant filter", { sql: scoped.sql })
	} else if (scoped.securityLevel === "requires_verification") {
		logger?.warn("No SELECT ... FROM shape found, tenant isolation not verified")
	}

	// a cut at SELECT may have split a UNION or a CTE, so the result is not trusted
	let securityLevel = scoped.securityLevel
	if (isolated.cutAt === "select" && securityLevel !== "requires_verification") {
		securityLevel = "requires_verification"
		logger?.warn("Statement was cut at a top-level SELECT, tenant isolation not verified", { sql: scoped.sql })
	}

	return {
		sql: scoped.sql,
		securityLevel,
		rewrites,
		tablesReferenced: uniqueTables(tableReferences(scoped.sql)),
	}
}
