export { processTurn, createAssistantDeps } from "./assistant.js"
export type { AssistantDeps, AssistantOverrides, TurnInput, TurnResult } from "./assistant.js"
export { OllamaCompletionClient } from "./completion_client.js"
export type { CompletionService, OllamaClientOptions } from "./completion_client.js"
export { getConfig, loadConfig, resetConfig, loadSchemaDescription } from "./config/loadConfig.js"
export type { AssistantConfig } from "./config/loadConfig.js"
export * from "./conversation_state.js"
export { createPool } from "./db.js"
export type { SqlPool, SqlClient, SqlQueryable, SqlResult } from "./db.js"
export { AssistantError, RoutingInvariantViolation, UnsafeStatementError } from "./errors.js"
export type { AssistantErrorType } from "./errors.js"
export { InMemoryHistoryStore, PgHistoryStore } from "./history_store.js"
export type { ConversationHistoryStore } from "./history_store.js"
export { createLogger, parseLogLevel, silentLogger } from "./logger.js"
export type { Logger, LogLevel } from "./logger.js"
export { PgQueryExecutor, bindTenantParam } from "./query_executor.js"
export { SqlCompiler } from "./sql_compiler.js"
export type { CompilationResult, CompileRequest } from "./sql_compiler.js"
export { applyDialectRewrites } from "./sql_rewrites.js"
export { extractSQL, sanitizeSQL } from "./sql_sanitizer.js"
export type { SanitizeOptions, SanitizedStatement } from "./sql_sanitizer.js"
export { classifyComplexity, computeConfidence } from "./sql_scoring.js"
export { WorkflowEngine, EDGES, ENTRY_NODE, MAX_STEPS } from "./workflow_engine.js"
export type { DocumentExtractor, FileInspector, QueryExecutor, WorkflowNode } from "./workflow_nodes.js"
