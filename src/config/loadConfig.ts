/**
 * Unified config loader for the invoice assistant core.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged tree is validated with zod, which also fills defaults, so a
 * missing config directory still yields a complete configuration.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { AssistantError } from "../errors.js"

// ── Schema ───────────────────────────────────────────────────────────

const configSchema = z.object({
	database: z
		.object({
			url: z.string().default(""),
			host: z.string().default("localhost"),
			port: z.number().int().positive().default(5432),
			name: z.string().default("invoices"),
			user: z.string().default("postgres"),
			password: z.string().default(""),
		})
		.default({}),
	model: z
		.object({
			provider: z.literal("ollama").default("ollama"),
			llm: z.string().default("llama3.1:8b"),
			ollama_url: z.string().default("http://localhost:11434"),
			timeout_ms: z.number().int().positive().default(60000),
			temperature: z.number().min(0).max(2).default(0.2),
			max_tokens: z.number().int().positive().default(1000),
		})
		.default({}),
	sql: z
		.object({
			tenant_column: z.string().regex(/^[a-z_][a-z0-9_]*$/i).default("user_id"),
			tenant_param: z.string().regex(/^[a-z_][a-z0-9_]*$/i).default("tenant_id"),
			read_only: z.boolean().default(true),
			statement_timeout_ms: z.number().int().positive().default(10000),
			schema_file: z.string().default("schema.txt"),
			semantic_search: z.boolean().default(false),
			lookup_tables: z.array(z.string()).default(["categories", "statuses", "settings"]),
			tenant_tables: z
				.array(z.string())
				.default([
					"invoices",
					"users",
					"clients",
					"products",
					"items",
					"media",
					"conversations",
					"messages",
					"invoice_embeddings",
				]),
		})
		.default({}),
	history: z
		.object({
			window: z.number().int().nonnegative().default(10),
			max_messages: z.number().int().positive().default(50),
			max_age_ms: z.number().int().positive().default(3600000),
		})
		.default({}),
	workflow: z
		.object({
			strict: z.boolean().default(false),
		})
		.default({}),
	logging: z
		.object({
			level: z.string().default("info"),
		})
		.default({}),
})

export type AssistantConfig = z.infer<typeof configSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

type ConfigTree = Record<string, unknown>

function isPlainObject(value: unknown): value is ConfigTree {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

/** Walk up from cwd looking for config/config.yaml. */
export function findConfigDir(): string | null {
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): ConfigTree {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	return isPlainObject(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: ConfigTree, b: ConfigTree): ConfigTree {
	const result: ConfigTree = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(right) && isPlainObject(left)) {
			result[key] = deepMerge(left, right)
		} else if (right !== null && right !== undefined) {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(tree: ConfigTree, key: string): ConfigTree {
	const existing = tree[key]
	if (isPlainObject(existing)) return existing
	const created: ConfigTree = {}
	tree[key] = created
	return created
}

function set(target: ConfigTree, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

function applyEnvOverrides(cfg: ConfigTree): void {
	const db = section(cfg, "database")
	set(db, "url", env("DATABASE_URL"))
	set(db, "host", env("DB_HOST"))
	set(db, "port", envInt("DB_PORT"))
	set(db, "name", env("DB_NAME"))
	set(db, "user", env("DB_USER"))
	set(db, "password", env("DB_PASSWORD"))

	const m = section(cfg, "model")
	set(m, "llm", env("LLM_MODEL"))
	set(m, "ollama_url", env("OLLAMA_BASE_URL"))
	set(m, "timeout_ms", envInt("LLM_TIMEOUT_MS"))
	set(m, "temperature", envFloat("LLM_TEMPERATURE"))

	const s = section(cfg, "sql")
	set(s, "tenant_column", env("SQL_TENANT_COLUMN"))
	set(s, "semantic_search", envBool("SQL_SEMANTIC_SEARCH"))
	set(s, "read_only", envBool("SQL_READ_ONLY"))
	set(s, "statement_timeout_ms", envInt("SQL_STATEMENT_TIMEOUT_MS"))

	const h = section(cfg, "history")
	set(h, "window", envInt("HISTORY_WINDOW"))
	set(h, "max_messages", envInt("HISTORY_MAX_MESSAGES"))
	set(h, "max_age_ms", envInt("HISTORY_MAX_AGE_MS"))

	const w = section(cfg, "workflow")
	set(w, "strict", envBool("WORKFLOW_STRICT"))

	const l = section(cfg, "logging")
	set(l, "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: AssistantConfig | null = null

export function loadConfig(): AssistantConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: ConfigTree = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)

	const parsed = configSchema.safeParse(merged)
	if (!parsed.success) {
		const first = parsed.error.issues[0]
		const where = first ? first.path.join(".") : "config"
		throw new AssistantError(
			"validation",
			`Invalid configuration at ${where}: ${first ? first.message : "unknown issue"}`,
			false,
			{ configDir },
		)
	}

	_config = parsed.data
	return _config
}

export function getConfig(): AssistantConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}

/**
 * Read the schema description handed to the SQL compiler.
 * Returns an empty string when no config directory or schema file exists.
 */
export function loadSchemaDescription(config: AssistantConfig = getConfig()): string {
	const configDir = findConfigDir()
	if (!configDir) return ""
	const schemaPath = path.join(configDir, config.sql.schema_file)
	if (!fs.existsSync(schemaPath)) return ""
	return fs.readFileSync(schemaPath, "utf-8").trim()
}
