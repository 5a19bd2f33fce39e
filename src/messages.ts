/**
 * Reply catalog for the response formatter.
 *
 * Every deterministic reply the assistant can give lives here so wording
 * changes never touch routing code.
 */

import type { IntentType } from "./conversation_state.js"

export const GENERAL_MESSAGES = {
	default:
		"I'm your invoice assistant. I can record invoices, read invoice images and documents, and answer questions about your spending. What would you like to do?",
	error: "Sorry, something went wrong while handling your message. Please try again.",
	no_response: "I wasn't able to put together a reply. Could you ask in a different way?",
	timeout: "That took too long to answer. Please try again with a simpler question.",
} as const

export const INTENT_MESSAGES: Record<IntentType, string> = {
	greeting: "Hello! I'm your invoice assistant. Ask me about your expenses or send me an invoice to record.",
	general: [
		"I can help you:",
		"- read receipts and invoices you upload",
		"- record new invoices from a description",
		"- answer questions about what you spent and where",
		"",
		'Try "How much did I spend on office supplies last month?" or upload an invoice to get started.',
	].join("\n"),
	invoice_query: "Let me look that up in your invoices.",
	invoice_creator: "Let's record that invoice.",
	unknown: "I'm not sure what you're asking for. Try rephrasing, or ask what I can do.",
}

export const FILE_MESSAGES = {
	invalid_file:
		"That file doesn't look like an invoice or receipt. Please upload a clear image or document of the invoice.",
	unsupported_format: "Sorry, that file type isn't supported. Please upload a PDF, an image (JPG, PNG), an Excel sheet or a CSV file.",
	extraction_failed: "I couldn't read the invoice details from that file. Please try a clearer copy.",
	extracted: "I read the following from your invoice:",
} as const

export const QUERY_MESSAGES = {
	no_results: "I couldn't find any invoices matching that. You may not have uploaded any yet, or try different search terms.",
	query_error: "Something went wrong while searching your invoices. Please try a simpler question.",
	sql_conversion_failed: "I couldn't turn that question into a database query. Please try rephrasing it.",
	results: "Here is what I found:",
	prepared: "I prepared this query for your invoices:",
} as const

export const CREATION_MESSAGES = {
	missing_info: "I need a bit more to record an invoice. Please include the vendor, the date and the amounts.",
	summary: "Here is the invoice I recorded:",
} as const
