/**
 * SQL Compiler
 *
 * One compilation attempt: prompt the completion service, then run the
 * reply through extraction, the sanitizer and the scorers. The network
 * half (requestCompletion) and the pure half (transformCompletion) are
 * separate so the latter can be tested without a service.
 *
 * No retries. On any failure the caller gets an error result and never a
 * partially sanitized statement.
 */

import type { CompletionService } from "./completion_client.js"
import type { HistoryMessage, QueryArtifact, QueryFailure } from "./conversation_state.js"
import { recentHistory } from "./conversation_state.js"
import { AssistantError, UnsafeStatementError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"
import { silentLogger } from "./logger.js"
import { buildSqlPrompt } from "./prompts.js"
import type { SanitizeOptions, SanitizedStatement } from "./sql_sanitizer.js"
import { extractSQL, sanitizeSQL } from "./sql_sanitizer.js"
import { classifyComplexity, computeConfidence } from "./sql_scoring.js"

// ============================================================================
// Types
// ============================================================================

export interface CompileRequest {
	queryText: string
	tenantId: string
	schemaDescription: string
	history?: HistoryMessage[]
	entityHints?: Record<string, unknown> | null
	isSummaryQuery?: boolean
	isSemanticSearch?: boolean
}

export type CompilationResult =
	| { status: "success"; artifact: QueryArtifact }
	| { status: "error"; error: QueryFailure }

export interface SqlCompilerOptions {
	sanitize?: Omit<SanitizeOptions, "logger">
	/** History messages included in the prompt */
	historyWindow?: number
	/** Upper bound on confidence when the reply held no recognizable SQL */
	rawConfidenceCap?: number
	logger?: Logger
}

export const RAW_CONFIDENCE_CAP = 0.1

// ============================================================================
// Compiler
// ============================================================================

export class SqlCompiler {
	private completion: CompletionService
	private options: SqlCompilerOptions
	private logger: Logger

	constructor(completion: CompletionService, options: SqlCompilerOptions = {}) {
		this.completion = completion
		this.options = options
		this.logger = options.logger ?? silentLogger
	}

	/**
	 * Build the compilation context and await the completion service.
	 * @throws AssistantError("validation") without a tenant id
	 */
	async requestCompletion(request: CompileRequest): Promise<string> {
		if (!request.tenantId.trim()) {
			throw new AssistantError("validation", "No tenant id provided for SQL compilation")
		}

		const prompt = buildSqlPrompt({
			queryText: request.queryText,
			tenantId: request.tenantId,
			schemaDescription: request.schemaDescription,
			history: recentHistory(request.history ?? [], this.options.historyWindow ?? 10),
			entityHints: request.entityHints,
			isSummaryQuery: request.isSummaryQuery,
			isSemanticSearch: request.isSemanticSearch,
			tenantColumn: this.options.sanitize?.tenantColumn,
			tenantParam: this.options.sanitize?.tenantParam,
		})

		this.logger.debug("Requesting SQL completion", {
			summary: request.isSummaryQuery ?? false,
			semantic: request.isSemanticSearch ?? false,
		})
		return this.completion.complete(prompt)
	}

	/** Turn a completion reply into an artifact. Synchronous and side-effect free. */
	transformCompletion(request: CompileRequest, response: string): CompilationResult {
		if (!request.tenantId.trim()) {
			return { status: "error", error: { kind: "missing_tenant", message: "No tenant id provided for SQL compilation" } }
		}

		const extracted = extractSQL(response)
		if (extracted.method === "raw") {
			this.logger.warn("Could not locate SQL in completion, using the raw reply")
		}

		let sanitized: SanitizedStatement
		try {
			sanitized = sanitizeSQL(extracted.sql, request.tenantId, { ...this.options.sanitize, logger: this.logger })
		} catch (error) {
			if (error instanceof UnsafeStatementError) {
				return {
					status: "error",
					error: { kind: "unsafe_statement", message: error.message, pattern: error.pattern },
				}
			}
			throw error
		}

		if (!sanitized.sql) {
			return {
				status: "error",
				error: { kind: "completion_failed", message: "Completion contained no SQL statement" },
			}
		}

		let confidence = computeConfidence(sanitized.sql, request.queryText)
		if (extracted.method === "raw") {
			confidence = Math.min(confidence, this.options.rawConfidenceCap ?? RAW_CONFIDENCE_CAP)
		}

		const artifact: QueryArtifact = {
			sql: sanitized.sql,
			rawSql: response,
			securityLevel: sanitized.securityLevel,
			complexity: classifyComplexity(sanitized.sql),
			confidence,
			extractionMethod: extracted.method,
			rewrites: sanitized.rewrites,
		}

		this.logger.info("SQL compiled", {
			security_level: artifact.securityLevel,
			complexity: artifact.complexity,
			confidence: artifact.confidence,
			rewrites: artifact.rewrites,
		})
		return { status: "success", artifact }
	}

	async compile(request: CompileRequest): Promise<CompilationResult> {
		if (!request.tenantId.trim()) {
			this.logger.error("SQL compilation refused: no tenant id")
			return { status: "error", error: { kind: "missing_tenant", message: "No tenant id provided for SQL compilation" } }
		}

		let response: string
		try {
			response = await this.requestCompletion(request)
		} catch (error) {
			this.logger.error("SQL completion failed", { error: errorMessage(error) })
			return { status: "error", error: { kind: "completion_failed", message: errorMessage(error) } }
		}

		return this.transformCompletion(request, response)
	}
}
