/**
 * Prompt construction for the completion service.
 *
 * Every builder returns a PromptContext; none of them talks to the service.
 */

import type { HistoryMessage } from "./conversation_state.js"
import { formatHistory } from "./conversation_state.js"

export interface PromptContext {
	system: string
	prompt: string
	/** Ask the service for a JSON-only reply */
	format?: "json"
	temperature?: number
	maxTokens?: number
}

// ============================================================================
// SQL compilation
// ============================================================================

export interface SqlPromptParams {
	queryText: string
	tenantId: string
	schemaDescription: string
	history?: HistoryMessage[]
	entityHints?: Record<string, unknown> | null
	isSummaryQuery?: boolean
	isSemanticSearch?: boolean
	tenantColumn?: string
	tenantParam?: string
}

const SQL_SYSTEM_PROMPT = `You convert questions about invoices into a single PostgreSQL SELECT statement.

Rules:
1. Always filter tenant-owned tables with "{tenant_column} = :{tenant_param}".
2. Use named parameters (:name) for every value supplied at run time.
3. Return exactly one statement. Never modify data or schema.
4. Cast to numeric before ROUND: ROUND(CAST(expr AS numeric), 2).
5. Return only the columns needed to answer the question.
6. Reply with the SQL inside a \`\`\`sql fenced block and nothing else.

Schema:
{schema}`

const SUMMARY_GUIDANCE = `This looks like a summary question. Aggregate with SUM/COUNT/AVG, GROUP BY the dimension the user asks about (vendor, category, month) and ORDER BY the aggregate descending.`

const SEMANTIC_GUIDANCE = `Semantic search is enabled. items.description_embedding is a vector column; rank with l2_distance(description_embedding::vector, '[:query_embedding]'::vector) and never call to_vector().`

export function buildSqlPrompt(params: SqlPromptParams): PromptContext {
	const system = SQL_SYSTEM_PROMPT
		.replace("{tenant_column}", () => params.tenantColumn ?? "user_id")
		.replace("{tenant_param}", () => params.tenantParam ?? "tenant_id")
		.replace("{schema}", () => params.schemaDescription || "(schema unavailable)")

	const sections: string[] = []
	if (params.history && params.history.length > 0) {
		sections.push(`Conversation so far:\n${formatHistory(params.history)}`)
	}
	if (params.entityHints && Object.keys(params.entityHints).length > 0) {
		sections.push(`Extracted entities: ${JSON.stringify(params.entityHints)}`)
	}
	if (params.isSummaryQuery) sections.push(SUMMARY_GUIDANCE)
	if (params.isSemanticSearch) sections.push(SEMANTIC_GUIDANCE)
	sections.push(`Tenant: ${params.tenantId}`)
	sections.push(`Question: ${params.queryText}`)

	return { system, prompt: sections.join("\n\n") }
}

// ============================================================================
// Intent classification
// ============================================================================

const INTENT_SYSTEM_PROMPT = `Classify the user's latest message into one intent:

- greeting: hello, thanks, small talk
- general: questions about what the assistant can do
- invoice_query: questions about existing invoices, spending or vendors
- invoice_creator: requests to create or record a new invoice
- unknown: anything else

Reply with JSON only: {"intent": "<intent>", "confidence": <0.0-1.0>}`

export function buildIntentPrompt(message: string, history: HistoryMessage[] = []): PromptContext {
	const prompt = history.length > 0
		? `Conversation so far:\n${formatHistory(history)}\n\nLatest message: ${message}`
		: `Latest message: ${message}`
	return { system: INTENT_SYSTEM_PROMPT, prompt, format: "json" }
}

// ============================================================================
// Entity extraction
// ============================================================================

const ENTITY_SYSTEM_PROMPT = `Extract invoice details from the user's message.

Reply with one JSON object using these keys (omit what is not mentioned):
vendor, date (YYYY-MM-DD), totalAmount, currency, invoiceNumber, customer,
paymentMethod, taxAmount, subtotal, items (array of {description, quantity,
unitPrice, totalPrice, category}). Put anything else under additionalFields.`

export function buildEntityPrompt(message: string, history: HistoryMessage[] = []): PromptContext {
	const prompt = history.length > 0
		? `Conversation so far:\n${formatHistory(history)}\n\nMessage: ${message}`
		: `Message: ${message}`
	return { system: ENTITY_SYSTEM_PROMPT, prompt, format: "json" }
}
