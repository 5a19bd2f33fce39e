/**
 * Parse a completion reply into an intent.
 *
 * Accepted shapes, tried in order:
 *   - JSON: {"intent": "...", "confidence": 0.8}
 *   - a bare label: "InvoiceQuery", "invoice query", "Greeting"
 *   - "intent: ..." and "confidence: ..." lines
 *
 * Anything else is a soft failure: intent "unknown" with confidence 0.1.
 */

import { z } from "zod"
import type { IntentType } from "./conversation_state.js"

export interface ParsedIntent {
	intent: IntentType
	confidence: number
	/** How the reply was read; "unparsed" marks a soft failure */
	source: "json" | "label" | "lines" | "unparsed"
}

const LABEL_CONFIDENCE = 0.9
const LINE_DEFAULT_CONFIDENCE = 0.5
const UNPARSED_CONFIDENCE = 0.1

const LABELS = new Map<string, IntentType>([
	["greeting", "greeting"],
	["general", "general"],
	["invoicequery", "invoice_query"],
	["invoice_query", "invoice_query"],
	["invoicecreator", "invoice_creator"],
	["invoice_creator", "invoice_creator"],
	["unknown", "unknown"],
])

const intentReplySchema = z.object({
	intent: z.string(),
	confidence: z.coerce.number(),
})

function toIntent(value: string): IntentType | null {
	const normalized = value.trim().toLowerCase().replace(/[\s-]+/g, "")
	return LABELS.get(normalized) ?? null
}

function clampConfidence(value: number): number {
	return Number.isFinite(value) && value >= 0 && value <= 1 ? value : LINE_DEFAULT_CONFIDENCE
}

function tryJson(reply: string): ParsedIntent | null {
	const body = reply.trim().replace(/^```(?:json)?\s*|\s*```$/g, "")
	let data: unknown
	try {
		data = JSON.parse(body)
	} catch {
		return null
	}
	const parsed = intentReplySchema.safeParse(data)
	if (!parsed.success) return null
	return {
		intent: toIntent(parsed.data.intent) ?? "unknown",
		confidence: clampConfidence(parsed.data.confidence),
		source: "json",
	}
}

function tryLines(reply: string): ParsedIntent | null {
	const lines = reply.split("\n")
	const intentLine = lines.find((l) => /intent\s*:/i.test(l))
	const confidenceLine = lines.find((l) => /confidence\s*:/i.test(l))
	if (!intentLine || !confidenceLine) return null

	const intentText = intentLine.substring(intentLine.indexOf(":") + 1)
	const confidenceText = confidenceLine.substring(confidenceLine.indexOf(":") + 1).trim()
	const confidence = confidenceText === "" ? NaN : Number(confidenceText)

	return {
		intent: toIntent(intentText) ?? "unknown",
		confidence: clampConfidence(confidence),
		source: "lines",
	}
}

export function parseIntentReply(reply: string): ParsedIntent {
	const json = tryJson(reply)
	if (json) return json

	const label = toIntent(reply)
	if (label && label !== "unknown") {
		return { intent: label, confidence: LABEL_CONFIDENCE, source: "label" }
	}

	const lines = tryLines(reply)
	if (lines) return lines

	return { intent: "unknown", confidence: UNPARSED_CONFIDENCE, source: "unparsed" }
}
