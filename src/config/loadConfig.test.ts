import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as path from "path"
import * as os from "os"
import { AssistantError } from "../errors.js"
import { getConfig, loadConfig, loadSchemaDescription, resetConfig } from "./loadConfig.js"

/**
 * Tests for the unified config loader.
 *
 * Strategy: create a temp directory with config/config.yaml (and optionally
 * config.local.yaml), chdir into it, and verify loadConfig() reads the right
 * values. Env-var overrides are tested by setting process.env before loading.
 */

let tmpDir: string
let originalCwd: string
const savedEnv: Record<string, string | undefined> = {}

// Env vars that the loader reads; saved and restored around every test
const ENV_VARS = [
	"DATABASE_URL", "DB_HOST", "DB_PORT", "DB_NAME", "DB_USER", "DB_PASSWORD",
	"LLM_MODEL", "OLLAMA_BASE_URL", "LLM_TIMEOUT_MS", "LLM_TEMPERATURE",
	"SQL_TENANT_COLUMN", "SQL_SEMANTIC_SEARCH", "SQL_READ_ONLY", "SQL_STATEMENT_TIMEOUT_MS",
	"HISTORY_WINDOW", "HISTORY_MAX_MESSAGES", "HISTORY_MAX_AGE_MS",
	"WORKFLOW_STRICT", "LOG_LEVEL",
]

function writeConfigFile(dir: string, filename: string, content: string) {
	const configDir = path.join(dir, "config")
	fs.mkdirSync(configDir, { recursive: true })
	fs.writeFileSync(path.join(configDir, filename), content)
}

beforeEach(() => {
	resetConfig()
	for (const v of ENV_VARS) {
		savedEnv[v] = process.env[v]
		delete process.env[v]
	}
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "assistant-config-test-"))
	originalCwd = process.cwd()
	process.chdir(tmpDir)
})

afterEach(() => {
	process.chdir(originalCwd)
	fs.rmSync(tmpDir, { recursive: true, force: true })
	for (const v of ENV_VARS) {
		if (savedEnv[v] === undefined) {
			delete process.env[v]
		} else {
			process.env[v] = savedEnv[v]
		}
	}
	resetConfig()
})

// ── Basic Loading ─────────────────────────────────────────────────────

describe("loadConfig: basic YAML loading", () => {
	it("loads values from config/config.yaml", () => {
		writeConfigFile(tmpDir, "config.yaml", `
database:
  host: myhost
  port: 5433
  name: testdb
  user: testuser
  password: test-secret
model:
  llm: "qwen2.5:7b"
  ollama_url: "http://ollama:11434"
  timeout_ms: 30000
  temperature: 0.1
sql:
  tenant_column: owner_id
  read_only: false
  semantic_search: true
  lookup_tables: [countries]
history:
  window: 4
workflow:
  strict: true
logging:
  level: debug
`)
		const cfg = loadConfig()

		expect(cfg.database.host).toBe("myhost")
		expect(cfg.database.port).toBe(5433)
		expect(cfg.database.password).toBe("test-secret")
		expect(cfg.model.llm).toBe("qwen2.5:7b")
		expect(cfg.model.ollama_url).toBe("http://ollama:11434")
		expect(cfg.model.timeout_ms).toBe(30000)
		expect(cfg.model.temperature).toBe(0.1)
		expect(cfg.sql.tenant_column).toBe("owner_id")
		expect(cfg.sql.read_only).toBe(false)
		expect(cfg.sql.semantic_search).toBe(true)
		expect(cfg.sql.lookup_tables).toEqual(["countries"])
		expect(cfg.history.window).toBe(4)
		expect(cfg.workflow.strict).toBe(true)
		expect(cfg.logging.level).toBe("debug")
	})

	it("fills defaults when no config directory exists", () => {
		const cfg = loadConfig()
		expect(cfg.database.host).toBe("localhost")
		expect(cfg.model.provider).toBe("ollama")
		expect(cfg.sql.tenant_column).toBe("user_id")
		expect(cfg.sql.tenant_param).toBe("tenant_id")
		expect(cfg.sql.read_only).toBe(true)
		expect(cfg.sql.semantic_search).toBe(false)
		expect(cfg.history).toEqual({ window: 10, max_messages: 50, max_age_ms: 3600000 })
		expect(cfg.workflow.strict).toBe(false)
	})

	it("is a singleton, second call returns same object", () => {
		writeConfigFile(tmpDir, "config.yaml", "database:\n  host: host1\n")
		expect(loadConfig()).toBe(loadConfig())
	})

	it("resetConfig clears the singleton", () => {
		writeConfigFile(tmpDir, "config.yaml", "database:\n  host: host1\n")
		const a = loadConfig()
		resetConfig()
		writeConfigFile(tmpDir, "config.yaml", "database:\n  host: host2\n")
		const b = loadConfig()
		expect(a.database.host).toBe("host1")
		expect(b.database.host).toBe("host2")
	})

	it("getConfig() auto-loads if not loaded", () => {
		writeConfigFile(tmpDir, "config.yaml", "database:\n  host: autoload\n")
		expect(getConfig().database.host).toBe("autoload")
	})

	it("finds config/ in a parent directory", () => {
		writeConfigFile(tmpDir, "config.yaml", "database:\n  host: parent\n")
		const nested = path.join(tmpDir, "a", "b")
		fs.mkdirSync(nested, { recursive: true })
		process.chdir(nested)
		expect(loadConfig().database.host).toBe("parent")
	})
})

// ── Deep Merge (config.local.yaml overrides) ──────────────────────────

describe("loadConfig: config.local.yaml overlay", () => {
	it("local YAML overrides base YAML values without clobbering siblings", () => {
		writeConfigFile(tmpDir, "config.yaml", `
database:
  host: basehost
  port: 5432
sql:
  read_only: true
  statement_timeout_ms: 5000
`)
		writeConfigFile(tmpDir, "config.local.yaml", `
database:
  host: localhost
sql:
  statement_timeout_ms: 2000
`)
		const cfg = loadConfig()
		expect(cfg.database.host).toBe("localhost")
		expect(cfg.database.port).toBe(5432)
		expect(cfg.sql.read_only).toBe(true)
		expect(cfg.sql.statement_timeout_ms).toBe(2000)
	})

	it("null in the local file keeps the base value", () => {
		writeConfigFile(tmpDir, "config.yaml", "model:\n  llm: base-model\n")
		writeConfigFile(tmpDir, "config.local.yaml", "model:\n  llm: null\n")
		expect(loadConfig().model.llm).toBe("base-model")
	})
})

// ── Env-Var Overrides ─────────────────────────────────────────────────

describe("loadConfig: env-var overrides", () => {
	it("env vars override YAML values", () => {
		writeConfigFile(tmpDir, "config.yaml", `
database:
  host: yamlhost
  password: yamlpass
model:
  llm: "yaml-model"
`)
		process.env.DB_HOST = "envhost"
		process.env.DB_PASSWORD = "envpass"
		process.env.LLM_MODEL = "env-model"

		const cfg = loadConfig()
		expect(cfg.database.host).toBe("envhost")
		expect(cfg.database.password).toBe("envpass")
		expect(cfg.model.llm).toBe("env-model")
	})

	it("numeric and boolean env vars are parsed", () => {
		process.env.DB_PORT = "5555"
		process.env.LLM_TIMEOUT_MS = "120000"
		process.env.LLM_TEMPERATURE = "0.7"
		process.env.HISTORY_WINDOW = "3"
		process.env.SQL_SEMANTIC_SEARCH = "1"
		process.env.SQL_READ_ONLY = "false"
		process.env.WORKFLOW_STRICT = "true"

		const cfg = loadConfig()
		expect(cfg.database.port).toBe(5555)
		expect(cfg.model.timeout_ms).toBe(120000)
		expect(cfg.model.temperature).toBe(0.7)
		expect(cfg.history.window).toBe(3)
		expect(cfg.sql.semantic_search).toBe(true)
		expect(cfg.sql.read_only).toBe(false)
		expect(cfg.workflow.strict).toBe(true)
	})

	it("ignores unparseable numbers", () => {
		writeConfigFile(tmpDir, "config.yaml", "database:\n  port: 6543\n")
		process.env.DB_PORT = "not-a-port"
		expect(loadConfig().database.port).toBe(6543)
	})
})

// ── Validation ────────────────────────────────────────────────────────

describe("loadConfig: validation", () => {
	it("rejects an unsafe tenant column name", () => {
		writeConfigFile(tmpDir, "config.yaml", "sql:\n  tenant_column: \"user_id; --\"\n")
		expect(() => loadConfig()).toThrow(AssistantError)
		resetConfig()
		expect(() => loadConfig()).toThrow(/^Invalid configuration at sql\.tenant_column/)
	})

	it("rejects values of the wrong type", () => {
		writeConfigFile(tmpDir, "config.yaml", "history:\n  window: lots\n")
		expect(() => loadConfig()).toThrow(/^Invalid configuration at history\.window/)
	})
})

// ── Schema description ────────────────────────────────────────────────

describe("loadSchemaDescription", () => {
	it("reads the configured schema file", () => {
		writeConfigFile(tmpDir, "config.yaml", "sql:\n  schema_file: tables.txt\n")
		writeConfigFile(tmpDir, "tables.txt", "CREATE TABLE invoices (id int);\n")
		expect(loadSchemaDescription(loadConfig())).toBe("CREATE TABLE invoices (id int);")
	})

	it("returns an empty string when the file is missing", () => {
		writeConfigFile(tmpDir, "config.yaml", "sql:\n  schema_file: missing.txt\n")
		expect(loadSchemaDescription(loadConfig())).toBe("")
	})
})
