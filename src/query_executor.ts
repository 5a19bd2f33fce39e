/**
 * PostgreSQL Query Executor
 *
 * Runs a sanitized statement for one tenant inside a read-only transaction
 * that is always rolled back.
 */

import type { QueryResult } from "./conversation_state.js"
import type { SqlClient, SqlPool } from "./db.js"
import { AssistantError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"
import { silentLogger } from "./logger.js"
import { mapCode } from "./sql_tokens.js"
import type { QueryExecutor } from "./workflow_nodes.js"

export interface PgQueryExecutorOptions {
	statementTimeoutMs: number
	tenantParam?: string
	logger?: Logger
}

/**
 * Replace every `:tenant_id` placeholder in code with `$1`.
 * Casts (`::text`) and text inside literals are left alone.
 */
export function bindTenantParam(sql: string, param: string = "tenant_id"): { text: string; bound: boolean } {
	let bound = false
	const text = mapCode(sql, (code) =>
		code.replace(new RegExp(`(?<!:):${param}\\b`, "g"), () => {
			bound = true
			return "$1"
		}),
	)
	return { text, bound }
}

export class PgQueryExecutor implements QueryExecutor {
	private pool: SqlPool
	private statementTimeoutMs: number
	private tenantParam: string
	private logger: Logger

	constructor(pool: SqlPool, options: PgQueryExecutorOptions) {
		this.pool = pool
		this.statementTimeoutMs = options.statementTimeoutMs
		this.tenantParam = options.tenantParam ?? "tenant_id"
		this.logger = options.logger ?? silentLogger
	}

	async execute(sql: string, tenantId: string): Promise<QueryResult> {
		const { text, bound } = bindTenantParam(sql, this.tenantParam)
		const started = Date.now()

		let client: SqlClient
		try {
			client = await this.pool.connect()
		} catch (error) {
			throw new AssistantError("execution", `Database connection failed: ${errorMessage(error)}`, true)
		}

		try {
			await client.query("BEGIN READ ONLY")
			await client.query(`SET LOCAL statement_timeout = ${Math.floor(this.statementTimeoutMs)}`)
			const result = await client.query(text, bound ? [tenantId] : undefined)
			const executionTimeMs = Date.now() - started

			this.logger.info("Query executed", { rows_returned: result.rows.length, execution_time_ms: executionTimeMs })
			return {
				rows: result.rows,
				rowCount: result.rowCount ?? result.rows.length,
				executionTimeMs,
			}
		} catch (error) {
			throw new AssistantError("execution", `Database error: ${errorMessage(error)}`, false, { sql: text })
		} finally {
			try {
				await client.query("ROLLBACK")
			} catch (error) {
				this.logger.warn("Rollback failed", { error: errorMessage(error) })
			}
			client.release()
		}
	}
}
