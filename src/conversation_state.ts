/**
 * Conversation State
 *
 * The per-turn record threaded through the workflow engine. One state is
 * created per user turn, seeded with prior history, mutated node by node
 * and discarded once the caller has read `response`.
 */

// ============================================================================
// Enumerations
// ============================================================================

export type InputType = "text" | "image" | "pdf" | "excel" | "csv" | "unknown"

export type IntentType = "greeting" | "general" | "invoice_query" | "invoice_creator" | "unknown"

export const INTENT_TYPES: readonly IntentType[] = [
	"greeting",
	"general",
	"invoice_query",
	"invoice_creator",
	"unknown",
]

/** How a generated statement achieved tenant isolation */
export type SecurityLevel = "secure" | "secure_after_modification" | "requires_verification"

export type QueryComplexity = "simple" | "moderate" | "complex"

/** Informational only; routing never reads it */
export type ProcessingStage =
	| "initial"
	| "input_classified"
	| "intent_determined"
	| "file_validated"
	| "entities_extracted"
	| "data_extracted"
	| "sql_conversion_complete"
	| "completed"
	| "error"

export type NodeName =
	| "input_classifier"
	| "intent_classifier"
	| "file_validator"
	| "entity_extractor"
	| "data_extractor"
	| "sql_generator"
	| "response_formatter"

// ============================================================================
// Payloads
// ============================================================================

export type InputDescriptor =
	| { kind: "text"; text: string }
	| {
			kind: "file"
			path: string
			/** Type the caller already knows; "unknown" lets the classifier decide */
			declaredType: InputType
			rawBytes: Uint8Array
			fileName?: string
			mimeType?: string
	  }

export type FileInput = Extract<InputDescriptor, { kind: "file" }>

export interface FileValidation {
	isValid: boolean
	confidence: number
	reason: string
}

export interface InvoiceLineItem {
	description?: string
	quantity?: number
	unitPrice?: number
	totalPrice?: number
	category?: string
}

/** Invoice-shaped record produced by the entity and document extractors */
export interface InvoiceRecord {
	vendor?: string
	date?: string
	totalAmount?: number
	currency?: string
	invoiceNumber?: string
	items?: InvoiceLineItem[]
	customer?: string
	paymentMethod?: string
	taxAmount?: number
	subtotal?: number
	additionalFields: Record<string, unknown>
}

export type ExtractionMethod = "fenced_sql" | "fenced_keyword" | "keyword_match" | "raw"

export interface QueryArtifact {
	/** Sanitized, tenant-scoped statement */
	sql: string
	/** Completion-service response before extraction */
	rawSql: string
	securityLevel: SecurityLevel
	complexity: QueryComplexity
	confidence: number
	extractionMethod: ExtractionMethod
	rewrites: string[]
}

export type QueryFailureKind = "missing_tenant" | "completion_failed" | "unsafe_statement"

export interface QueryFailure {
	kind: QueryFailureKind
	message: string
	pattern?: string
}

export interface QueryResult {
	rows: Record<string, unknown>[]
	rowCount: number
	executionTimeMs: number
}

export type MessageRole = "user" | "assistant" | "system"

export interface HistoryMessage {
	role: MessageRole
	content: string
	timestamp: string
}

export interface AgentResponse {
	content: string
	metadata: Record<string, unknown>
	confidence: number
}

// ============================================================================
// State
// ============================================================================

export interface ConversationState {
	readonly tenantId: string
	readonly conversationId: string
	readonly inputDescriptor: InputDescriptor

	detectedInputType: InputType | null
	intent: IntentType | null
	intentConfidence: number | null
	fileValidation: FileValidation | null
	extractedEntities: InvoiceRecord | null
	extractedDocumentData: InvoiceRecord | null
	queryArtifact: QueryArtifact | null
	queryFailure: QueryFailure | null
	queryResult: QueryResult | null
	conversationHistory: HistoryMessage[]
	errors: string[]
	stage: ProcessingStage
	visitedNodes: NodeName[]
	response: AgentResponse | null
}

/** Fields a node may write through its update */
export type WritableField =
	| "detectedInputType"
	| "intent"
	| "intentConfidence"
	| "fileValidation"
	| "extractedEntities"
	| "extractedDocumentData"
	| "queryArtifact"
	| "queryFailure"
	| "queryResult"
	| "response"

export type StateUpdate = Partial<Pick<ConversationState, WritableField>>

export interface NewStateParams {
	tenantId: string
	conversationId: string
	input: InputDescriptor
	history?: HistoryMessage[]
}

export function createConversationState(params: NewStateParams): ConversationState {
	return {
		tenantId: params.tenantId,
		conversationId: params.conversationId,
		inputDescriptor: params.input,
		detectedInputType: null,
		intent: null,
		intentConfidence: null,
		fileValidation: null,
		extractedEntities: null,
		extractedDocumentData: null,
		queryArtifact: null,
		queryFailure: null,
		queryResult: null,
		conversationHistory: params.history ? [...params.history] : [],
		errors: [],
		stage: "initial",
		visitedNodes: [],
		response: null,
	}
}

export function textInput(text: string): InputDescriptor {
	return { kind: "text", text }
}

/** Last `window` messages, oldest first. */
export function recentHistory(history: HistoryMessage[], window: number): HistoryMessage[] {
	if (window <= 0) return []
	return history.slice(-window)
}

export function formatHistory(history: HistoryMessage[]): string {
	return history.map((m) => `${m.role}: ${m.content}`).join("\n")
}
