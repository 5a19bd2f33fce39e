/**
 * PostgreSQL access shared by the history store and the query executor.
 *
 * Both depend on the narrow interfaces below rather than on pg directly,
 * so tests can hand them an in-process stand-in.
 */

import { Pool } from "pg"
import type { AssistantConfig } from "./config/loadConfig.js"

export interface SqlResult {
	rows: Record<string, unknown>[]
	rowCount: number | null
}

export interface SqlQueryable {
	query(text: string, values?: unknown[]): Promise<SqlResult>
}

export interface SqlClient extends SqlQueryable {
	release(): void
}

export interface SqlPool extends SqlQueryable {
	connect(): Promise<SqlClient>
}

/** Pool built from the database section (DATABASE_URL wins over the parts). */
export function createPool(config: AssistantConfig["database"]): Pool {
	if (config.url) {
		return new Pool({ connectionString: config.url })
	}
	return new Pool({
		host: config.host,
		port: config.port,
		database: config.name,
		user: config.user,
		password: config.password,
	})
}
