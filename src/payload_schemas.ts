/**
 * Payload validation at node boundaries.
 *
 * Collaborators (completion service, file inspector, document extractor)
 * hand back untyped data. Each parser here either returns a typed value or
 * throws AssistantError("parse") naming the first offending field.
 */

import { z } from "zod"
import type { FileValidation, InvoiceRecord } from "./conversation_state.js"
import { AssistantError } from "./errors.js"

// ============================================================================
// Primitives
// ============================================================================

function blankToUndefined(value: unknown): unknown {
	return value === null || value === "" ? undefined : value
}

/** Numbers, or strings such as "$1,234.50" */
const amount = z.preprocess((value) => {
	const v = blankToUndefined(value)
	if (typeof v !== "string") return v
	const cleaned = v.replace(/[^0-9.-]/g, "")
	return cleaned === "" ? undefined : Number(cleaned)
}, z.number().finite().optional())

const text = z.preprocess((value) => {
	const v = blankToUndefined(value)
	return typeof v === "number" ? String(v) : v
}, z.string().optional())

// ============================================================================
// File validation
// ============================================================================

const fileValidationSchema = z.union([
	z.object({
		isValid: z.boolean(),
		confidence: z.number().min(0).max(1),
		reason: z.string().default(""),
	}),
	// snake_case shape returned by vision models prompted for is_valid_invoice
	z
		.object({
			is_valid_invoice: z.boolean(),
			confidence_score: z.number().min(0).max(1),
			reasons: z.string().default(""),
		})
		.transform((v) => ({ isValid: v.is_valid_invoice, confidence: v.confidence_score, reason: v.reasons })),
])

// ============================================================================
// Invoice records
// ============================================================================

const lineItemSchema = z.object({
	description: text,
	quantity: amount,
	unitPrice: amount,
	totalPrice: amount,
	category: text,
})

const invoiceFieldsSchema = z.object({
	vendor: text,
	date: text,
	totalAmount: amount,
	currency: text,
	invoiceNumber: text,
	items: z.preprocess(blankToUndefined, z.array(lineItemSchema).optional()),
	customer: text,
	paymentMethod: text,
	taxAmount: amount,
	subtotal: amount,
	additionalFields: z.preprocess(blankToUndefined, z.record(z.unknown()).optional()),
})

const KNOWN_FIELDS = new Set(Object.keys(invoiceFieldsSchema.shape))

function camelCase(key: string): string {
	return key.replace(/_([a-z])/g, (_m: string, c: string) => c.toUpperCase())
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

/** snake_case keys to camelCase, one level deep plus line items. */
function normalizeKeys(raw: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {}
	for (const [key, value] of Object.entries(raw)) {
		const name = camelCase(key)
		if (name === "items" && Array.isArray(value)) {
			out[name] = value.map((item) => (isRecord(item) ? normalizeKeys(item) : item))
		} else {
			out[name] = value
		}
	}
	return out
}

// ============================================================================
// Parsers
// ============================================================================

function fail(what: string, error: z.ZodError): never {
	const first = error.issues[0]
	const where = first && first.path.length > 0 ? `${what}.${first.path.join(".")}` : what
	throw new AssistantError("parse", `Invalid ${where}: ${first ? first.message : "unknown issue"}`, false, {
		issues: error.issues.map((i) => i.message),
	})
}

export function parseFileValidation(value: unknown): FileValidation {
	const result = fileValidationSchema.safeParse(value)
	if (!result.success) fail("fileValidation", result.error)
	return result.data
}

/**
 * Validate an invoice-shaped object. Keys outside the known fields are
 * kept under additionalFields.
 */
export function parseInvoiceRecord(value: unknown): InvoiceRecord {
	if (!isRecord(value)) {
		throw new AssistantError("parse", "Invalid invoice: expected an object")
	}

	const normalized = normalizeKeys(value)
	const result = invoiceFieldsSchema.safeParse(normalized)
	if (!result.success) fail("invoice", result.error)

	const extras: Record<string, unknown> = { ...(result.data.additionalFields ?? {}) }
	for (const [key, v] of Object.entries(normalized)) {
		if (!KNOWN_FIELDS.has(key)) extras[key] = v
	}

	const { additionalFields: _ignored, ...fields } = result.data
	return { ...fields, additionalFields: extras }
}

/** True when a record carries at least a vendor, a total or line items. */
export function hasInvoiceContent(record: InvoiceRecord | null): boolean {
	if (!record) return false
	return Boolean(record.vendor) || record.totalAmount !== undefined || (record.items?.length ?? 0) > 0
}

/**
 * Pull a JSON object out of a completion reply (fenced or bare) and parse it.
 * @throws AssistantError("parse") when no object can be read
 */
export function extractJsonObject(reply: string): unknown {
	const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/i.exec(reply)
	const candidate = fenced ? fenced[1] : reply
	const start = candidate.indexOf("{")
	const end = candidate.lastIndexOf("}")
	if (start === -1 || end <= start) {
		throw new AssistantError("parse", "Completion reply contained no JSON object")
	}
	try {
		const parsed: unknown = JSON.parse(candidate.substring(start, end + 1))
		return parsed
	} catch (error) {
		throw new AssistantError("parse", `Completion reply is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
	}
}
