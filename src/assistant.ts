/**
 * Assistant turn runner.
 *
 * Loads history, builds the per-turn state, runs the workflow and writes
 * both sides of the exchange back to the history store.
 */

import { v4 as uuidv4 } from "uuid"
import type { AssistantConfig } from "./config/loadConfig.js"
import { getConfig, loadSchemaDescription } from "./config/loadConfig.js"
import type { CompletionService } from "./completion_client.js"
import { OllamaCompletionClient } from "./completion_client.js"
import type { AgentResponse, HistoryMessage, InputDescriptor } from "./conversation_state.js"
import { createConversationState, textInput } from "./conversation_state.js"
import type { SqlPool } from "./db.js"
import { errorMessage } from "./errors.js"
import type { ConversationHistoryStore } from "./history_store.js"
import { InMemoryHistoryStore, PgHistoryStore } from "./history_store.js"
import type { Logger } from "./logger.js"
import { createLogger, parseLogLevel } from "./logger.js"
import { PgQueryExecutor } from "./query_executor.js"
import { SqlCompiler } from "./sql_compiler.js"
import { WorkflowEngine } from "./workflow_engine.js"
import type { DocumentExtractor, FileInspector, QueryExecutor } from "./workflow_nodes.js"

export interface TurnInput {
	tenantId: string
	/** Generated when absent */
	conversationId?: string
	/** Plain text or a file descriptor */
	input: InputDescriptor | string
}

export interface TurnResult extends AgentResponse {
	conversationId: string
}

export interface AssistantDeps {
	engine: WorkflowEngine
	historyStore: ConversationHistoryStore
	logger: Logger
	now?: () => Date
}

function describeInput(input: InputDescriptor): string {
	if (input.kind === "text") return input.text
	return `[file] ${input.fileName ?? input.path}`
}

export async function processTurn(turn: TurnInput, deps: AssistantDeps): Promise<TurnResult> {
	const { engine, historyStore, logger } = deps
	const now = deps.now ?? (() => new Date())
	const conversationId = turn.conversationId ?? uuidv4()
	const input = typeof turn.input === "string" ? textInput(turn.input) : turn.input

	let history: HistoryMessage[] = []
	try {
		history = await historyStore.load(conversationId, turn.tenantId)
	} catch (error) {
		logger.warn("Could not load conversation history, continuing without it", {
			conversation_id: conversationId,
			error: errorMessage(error),
		})
	}

	const initial = createConversationState({ tenantId: turn.tenantId, conversationId, input, history })
	const final = await engine.run(initial)

	const response: AgentResponse = final.response ?? { content: "", metadata: {}, confidence: 0 }
	if (final.errors.length > 0) {
		logger.warn("Turn completed with errors", { conversation_id: conversationId, errors: final.errors })
	}

	const exchange: HistoryMessage[] = [
		{ role: "user", content: describeInput(input), timestamp: now().toISOString() },
		{ role: "assistant", content: response.content, timestamp: now().toISOString() },
	]
	for (const message of exchange) {
		try {
			await historyStore.append(conversationId, turn.tenantId, message)
		} catch (error) {
			logger.error("Could not store conversation message", {
				conversation_id: conversationId,
				role: message.role,
				error: errorMessage(error),
			})
		}
	}

	return { ...response, conversationId }
}

// ============================================================================
// Wiring
// ============================================================================

export interface AssistantOverrides {
	completion?: CompletionService
	historyStore?: ConversationHistoryStore
	/** Enables the PostgreSQL history store and query executor */
	pool?: SqlPool
	queryExecutor?: QueryExecutor
	fileInspector?: FileInspector
	documentExtractor?: DocumentExtractor
	schemaDescription?: string
	logger?: Logger
}

/** Build the default dependency set from configuration. */
export function createAssistantDeps(config: AssistantConfig = getConfig(), overrides: AssistantOverrides = {}): AssistantDeps {
	const logger = overrides.logger ?? createLogger(parseLogLevel(config.logging.level), "assistant")

	const completion =
		overrides.completion ??
		new OllamaCompletionClient({
			baseUrl: config.model.ollama_url,
			model: config.model.llm,
			timeoutMs: config.model.timeout_ms,
			temperature: config.model.temperature,
			maxTokens: config.model.max_tokens,
			logger,
		})

	const compiler = new SqlCompiler(completion, {
		sanitize: {
			tenantColumn: config.sql.tenant_column,
			tenantParam: config.sql.tenant_param,
			readOnly: config.sql.read_only,
			lookupTables: config.sql.lookup_tables,
			tenantTables: config.sql.tenant_tables,
		},
		historyWindow: config.history.window,
		logger,
	})

	const pool = overrides.pool
	const historyStore =
		overrides.historyStore ??
		(pool
			? new PgHistoryStore(pool, { window: config.history.window })
			: new InMemoryHistoryStore({ maxMessages: config.history.max_messages, maxAgeMs: config.history.max_age_ms }))

	const queryExecutor =
		overrides.queryExecutor ??
		(pool
			? new PgQueryExecutor(pool, {
					statementTimeoutMs: config.sql.statement_timeout_ms,
					tenantParam: config.sql.tenant_param,
					logger,
				})
			: undefined)

	const engine = new WorkflowEngine(
		{
			completion,
			compiler,
			schemaDescription: overrides.schemaDescription ?? loadSchemaDescription(config),
			historyWindow: config.history.window,
			semanticSearch: config.sql.semantic_search,
			fileInspector: overrides.fileInspector,
			documentExtractor: overrides.documentExtractor,
			queryExecutor,
			logger,
		},
		{ strict: config.workflow.strict },
	)

	return { engine, historyStore, logger }
}
