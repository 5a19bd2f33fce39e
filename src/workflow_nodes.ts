/**
 * Workflow Nodes
 *
 * The seven processing steps the engine routes between. A node reads the
 * state, calls at most its own collaborators and returns a partial update
 * limited to the fields it declares in `writes`. When `run` throws, the
 * engine records the error and merges `fallback` instead.
 */

import * as path from "path"
import type { CompletionService } from "./completion_client.js"
import type {
	ConversationState,
	FileInput,
	InputDescriptor,
	InputType,
	InvoiceRecord,
	NodeName,
	ProcessingStage,
	QueryResult,
	StateUpdate,
	WritableField,
} from "./conversation_state.js"
import { recentHistory } from "./conversation_state.js"
import { AssistantError, errorMessage } from "./errors.js"
import { parseIntentReply } from "./intent_parser.js"
import type { Logger } from "./logger.js"
import { CREATION_MESSAGES, FILE_MESSAGES, GENERAL_MESSAGES, INTENT_MESSAGES, QUERY_MESSAGES } from "./messages.js"
import { extractJsonObject, hasInvoiceContent, parseFileValidation, parseInvoiceRecord } from "./payload_schemas.js"
import { buildEntityPrompt, buildIntentPrompt } from "./prompts.js"
import type { SqlCompiler } from "./sql_compiler.js"

// ============================================================================
// Collaborators
// ============================================================================

/** Decides whether an uploaded file is an invoice; returns a FileValidation-shaped payload */
export interface FileInspector {
	inspect(file: FileInput, inputType: InputType): Promise<unknown>
}

/** OCR / parsing of an uploaded document; returns an invoice-shaped payload */
export interface DocumentExtractor {
	extract(file: FileInput, inputType: InputType): Promise<unknown>
}

export interface QueryExecutor {
	execute(sql: string, tenantId: string): Promise<QueryResult>
}

export interface NodeContext {
	completion: CompletionService
	compiler: SqlCompiler
	schemaDescription: string
	/** History messages handed to prompts */
	historyWindow: number
	semanticSearch?: boolean
	fileInspector?: FileInspector
	documentExtractor?: DocumentExtractor
	queryExecutor?: QueryExecutor
	logger: Logger
}

export interface NodeOutcome {
	update: StateUpdate
	/** Soft failures to append to state.errors */
	errors?: string[]
}

export interface WorkflowNode {
	name: NodeName
	writes: readonly WritableField[]
	/** Stage recorded after a successful run */
	stage: ProcessingStage
	run(state: ConversationState, ctx: NodeContext): Promise<NodeOutcome>
	fallback(state: ConversationState, error: unknown): StateUpdate
}

// ============================================================================
// Input type detection
// ============================================================================

const EXTENSION_TYPES = new Map<string, InputType>([
	[".jpg", "image"],
	[".jpeg", "image"],
	[".png", "image"],
	[".gif", "image"],
	[".bmp", "image"],
	[".webp", "image"],
	[".pdf", "pdf"],
	[".xlsx", "excel"],
	[".xls", "excel"],
	[".csv", "csv"],
])

const MIME_TYPES = new Map<string, InputType>([
	["image/jpeg", "image"],
	["image/png", "image"],
	["image/gif", "image"],
	["image/bmp", "image"],
	["image/webp", "image"],
	["application/pdf", "pdf"],
	["application/vnd.ms-excel", "excel"],
	["application/vnd.openxmlformats-officedocument.spreadsheetml.sheet", "excel"],
	["text/csv", "csv"],
	["application/csv", "csv"],
])

export function detectInputType(input: InputDescriptor): InputType {
	if (input.kind === "text") return "text"
	if (input.declaredType !== "unknown") return input.declaredType

	const fromExtension = EXTENSION_TYPES.get(path.extname(input.fileName ?? input.path).toLowerCase())
	if (fromExtension) return fromExtension

	const mime = (input.mimeType ?? "").split(";")[0].trim().toLowerCase()
	return MIME_TYPES.get(mime) ?? "unknown"
}

function messageText(state: ConversationState): string {
	return state.inputDescriptor.kind === "text" ? state.inputDescriptor.text : ""
}

// ============================================================================
// Nodes
// ============================================================================

export const inputClassifier: WorkflowNode = {
	name: "input_classifier",
	writes: ["detectedInputType"],
	stage: "input_classified",
	async run(state, ctx) {
		const detectedInputType = detectInputType(state.inputDescriptor)
		ctx.logger.debug("Input classified", { input_type: detectedInputType })
		return { update: { detectedInputType } }
	},
	fallback(state) {
		return { detectedInputType: state.inputDescriptor.kind === "text" ? "text" : "unknown" }
	},
}

export const intentClassifier: WorkflowNode = {
	name: "intent_classifier",
	writes: ["intent", "intentConfidence"],
	stage: "intent_determined",
	async run(state, ctx) {
		const prompt = buildIntentPrompt(messageText(state), recentHistory(state.conversationHistory, ctx.historyWindow))
		const reply = await ctx.completion.complete(prompt)
		const parsed = parseIntentReply(reply)
		ctx.logger.info("Intent classified", { intent: parsed.intent, confidence: parsed.confidence, source: parsed.source })

		const update: StateUpdate = { intent: parsed.intent, intentConfidence: parsed.confidence }
		if (parsed.source === "unparsed") {
			return { update, errors: ["could not parse intent reply"] }
		}
		return { update }
	},
	fallback() {
		return { intent: "unknown", intentConfidence: 0 }
	},
}

export const fileValidator: WorkflowNode = {
	name: "file_validator",
	writes: ["fileValidation"],
	stage: "file_validated",
	async run(state, ctx) {
		const input = state.inputDescriptor
		if (input.kind !== "file") {
			return { update: { fileValidation: { isValid: false, confidence: 0, reason: "Plain text is not a valid invoice file" } } }
		}

		const inputType = state.detectedInputType ?? "unknown"
		if (inputType === "unknown" || inputType === "text") {
			return { update: { fileValidation: { isValid: false, confidence: 0, reason: "Unsupported file type" } } }
		}

		if (!ctx.fileInspector) {
			throw new AssistantError("validation", "No file inspector configured")
		}

		const fileValidation = parseFileValidation(await ctx.fileInspector.inspect(input, inputType))
		ctx.logger.info("File validated", { is_valid: fileValidation.isValid, confidence: fileValidation.confidence })
		return { update: { fileValidation } }
	},
	fallback(_state, error) {
		return { fileValidation: { isValid: false, confidence: 0, reason: errorMessage(error) } }
	},
}

export const entityExtractor: WorkflowNode = {
	name: "entity_extractor",
	writes: ["extractedEntities"],
	stage: "entities_extracted",
	async run(state, ctx) {
		const prompt = buildEntityPrompt(messageText(state), recentHistory(state.conversationHistory, ctx.historyWindow))
		const reply = await ctx.completion.complete(prompt)
		const extractedEntities = parseInvoiceRecord(extractJsonObject(reply))
		ctx.logger.info("Invoice entities extracted", { vendor: extractedEntities.vendor ?? null })
		return { update: { extractedEntities } }
	},
	fallback() {
		return {}
	},
}

export const dataExtractor: WorkflowNode = {
	name: "data_extractor",
	writes: ["extractedDocumentData"],
	stage: "data_extracted",
	async run(state, ctx) {
		const input = state.inputDescriptor
		if (input.kind !== "file") {
			throw new AssistantError("validation", "Document extraction needs a file input")
		}
		if (!ctx.documentExtractor) {
			throw new AssistantError("validation", "No document extractor configured")
		}

		const raw = await ctx.documentExtractor.extract(input, state.detectedInputType ?? "unknown")
		const extractedDocumentData = parseInvoiceRecord(raw)
		ctx.logger.info("Document data extracted", { vendor: extractedDocumentData.vendor ?? null })
		return { update: { extractedDocumentData } }
	},
	fallback() {
		return {}
	},
}

/** Questions that ask for totals, averages or breakdowns */
const SUMMARY_PATTERN = /\b(total|totals|sum|summary|summari[sz]e|average|breakdown|how much|spent|spending|per (?:month|vendor|category)|by (?:month|vendor|category))\b/i

export const EXECUTION_FAILED = "query execution failed"

export const sqlGenerator: WorkflowNode = {
	name: "sql_generator",
	writes: ["queryArtifact", "queryFailure", "queryResult"],
	stage: "sql_conversion_complete",
	async run(state, ctx) {
		const queryText = messageText(state)
		const result = await ctx.compiler.compile({
			queryText,
			tenantId: state.tenantId,
			schemaDescription: ctx.schemaDescription,
			history: state.conversationHistory,
			entityHints: state.extractedEntities ? { ...state.extractedEntities } : null,
			isSummaryQuery: SUMMARY_PATTERN.test(queryText),
			isSemanticSearch: ctx.semanticSearch ?? false,
		})

		if (result.status === "error") {
			return {
				update: { queryArtifact: null, queryFailure: result.error },
				errors: [`SQL compilation failed (${result.error.kind}): ${result.error.message}`],
			}
		}

		const artifact = result.artifact
		if (!ctx.queryExecutor || artifact.securityLevel === "requires_verification") {
			return { update: { queryArtifact: artifact, queryFailure: null } }
		}

		try {
			const queryResult = await ctx.queryExecutor.execute(artifact.sql, state.tenantId)
			return { update: { queryArtifact: artifact, queryFailure: null, queryResult } }
		} catch (error) {
			ctx.logger.error("Query execution failed", { error: errorMessage(error) })
			return {
				update: { queryArtifact: artifact, queryFailure: null, queryResult: null },
				errors: [`${EXECUTION_FAILED}: ${errorMessage(error)}`],
			}
		}
	},
	fallback(_state, error) {
		return { queryArtifact: null, queryFailure: { kind: "completion_failed", message: errorMessage(error) } }
	},
}

// ============================================================================
// Response formatting
// ============================================================================

function formatAmount(value: number | undefined, currency: string | undefined): string | null {
	if (value === undefined) return null
	return currency ? `${value} ${currency}` : String(value)
}

export function formatInvoice(record: InvoiceRecord): string {
	const lines: string[] = []
	if (record.vendor) lines.push(`Vendor: ${record.vendor}`)
	if (record.date) lines.push(`Date: ${record.date}`)
	if (record.invoiceNumber) lines.push(`Invoice number: ${record.invoiceNumber}`)
	if (record.customer) lines.push(`Customer: ${record.customer}`)
	for (const item of record.items ?? []) {
		const qty = item.quantity !== undefined ? `${item.quantity} x ` : ""
		const price = item.totalPrice ?? item.unitPrice
		lines.push(`- ${qty}${item.description ?? "item"}${price !== undefined ? `: ${price}` : ""}`)
	}
	const tax = formatAmount(record.taxAmount, record.currency)
	if (tax) lines.push(`Tax: ${tax}`)
	const total = formatAmount(record.totalAmount, record.currency)
	if (total) lines.push(`Total: ${total}`)
	return lines.join("\n")
}

const MAX_ROWS_SHOWN = 10

function formatValue(value: unknown): string {
	if (value === null || value === undefined) return "null"
	if (value instanceof Date) return value.toISOString().substring(0, 10)
	if (typeof value === "object") return JSON.stringify(value)
	return String(value)
}

export function formatRows(rows: Record<string, unknown>[]): string {
	const shown = rows.slice(0, MAX_ROWS_SHOWN).map((row) =>
		"- " + Object.entries(row).map(([k, v]) => `${k}: ${formatValue(v)}`).join(", "),
	)
	if (rows.length > MAX_ROWS_SHOWN) shown.push(`...and ${rows.length - MAX_ROWS_SHOWN} more`)
	return shown.join("\n")
}

interface Reply {
	content: string
	confidence: number
	metadata?: Record<string, unknown>
}

function fileReply(state: ConversationState): Reply {
	const validation = state.fileValidation
	if (!validation || !validation.isValid) {
		const unsupported = state.detectedInputType === "unknown"
		return {
			content: unsupported ? FILE_MESSAGES.unsupported_format : FILE_MESSAGES.invalid_file,
			confidence: validation?.confidence ?? 0,
			metadata: { reason: validation?.reason ?? null },
		}
	}

	if (!state.extractedDocumentData || !hasInvoiceContent(state.extractedDocumentData)) {
		return { content: FILE_MESSAGES.extraction_failed, confidence: 0 }
	}
	return {
		content: `${FILE_MESSAGES.extracted}\n${formatInvoice(state.extractedDocumentData)}`,
		confidence: validation.confidence,
	}
}

function queryReply(state: ConversationState): Reply {
	const failure = state.queryFailure
	if (failure) {
		return {
			content: QUERY_MESSAGES.sql_conversion_failed,
			confidence: 0,
			metadata: { failure: failure.kind, pattern: failure.pattern ?? null },
		}
	}

	const artifact = state.queryArtifact
	if (!artifact || artifact.securityLevel === "requires_verification") {
		return {
			content: QUERY_MESSAGES.sql_conversion_failed,
			confidence: artifact?.confidence ?? 0,
			metadata: artifact ? { securityLevel: artifact.securityLevel } : {},
		}
	}

	const metadata = {
		sql: artifact.sql,
		securityLevel: artifact.securityLevel,
		complexity: artifact.complexity,
	}

	if (state.queryResult) {
		if (state.queryResult.rowCount === 0) {
			return { content: QUERY_MESSAGES.no_results, confidence: artifact.confidence, metadata: { ...metadata, rowCount: 0 } }
		}
		return {
			content: `${QUERY_MESSAGES.results}\n${formatRows(state.queryResult.rows)}`,
			confidence: artifact.confidence,
			metadata: { ...metadata, rowCount: state.queryResult.rowCount },
		}
	}

	if (state.errors.some((e) => e.includes(EXECUTION_FAILED))) {
		return { content: QUERY_MESSAGES.query_error, confidence: 0, metadata }
	}

	return {
		content: `${QUERY_MESSAGES.prepared}\n\`\`\`sql\n${artifact.sql}\n\`\`\``,
		confidence: artifact.confidence,
		metadata,
	}
}

function creationReply(state: ConversationState): Reply {
	const confidence = state.intentConfidence ?? 0
	if (!state.extractedEntities || !hasInvoiceContent(state.extractedEntities)) {
		return { content: CREATION_MESSAGES.missing_info, confidence }
	}
	return { content: `${CREATION_MESSAGES.summary}\n${formatInvoice(state.extractedEntities)}`, confidence }
}

export function composeReply(state: ConversationState): Reply {
	if (state.inputDescriptor.kind === "file") return fileReply(state)

	switch (state.intent) {
		case "invoice_query":
			return queryReply(state)
		case "invoice_creator":
			return creationReply(state)
		case "greeting":
		case "general":
			return { content: INTENT_MESSAGES[state.intent], confidence: state.intentConfidence ?? 0 }
		default:
			return { content: INTENT_MESSAGES.unknown, confidence: state.intentConfidence ?? 0 }
	}
}

export const responseFormatter: WorkflowNode = {
	name: "response_formatter",
	writes: ["response"],
	stage: "completed",
	async run(state) {
		const reply = composeReply(state)
		return {
			update: {
				response: {
					content: reply.content,
					confidence: reply.confidence,
					metadata: {
						intent: state.intent,
						inputType: state.detectedInputType,
						path: [...state.visitedNodes],
						errorCount: state.errors.length,
						...reply.metadata,
					},
				},
			},
		}
	},
	fallback() {
		return { response: { content: GENERAL_MESSAGES.error, metadata: {}, confidence: 0 } }
	},
}

export const DEFAULT_NODES: Record<NodeName, WorkflowNode> = {
	input_classifier: inputClassifier,
	intent_classifier: intentClassifier,
	file_validator: fileValidator,
	entity_extractor: entityExtractor,
	data_extractor: dataExtractor,
	sql_generator: sqlGenerator,
	response_formatter: responseFormatter,
}
