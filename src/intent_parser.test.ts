import { describe, it, expect } from "vitest"
import { parseIntentReply } from "./intent_parser.js"

describe("parseIntentReply", () => {
	describe("JSON replies", () => {
		it("reads intent and confidence", () => {
			expect(parseIntentReply('{"intent": "invoice_query", "confidence": 0.82}')).toEqual({
				intent: "invoice_query",
				confidence: 0.82,
				source: "json",
			})
		})

		it("accepts fenced JSON, label spellings and string confidences", () => {
			expect(parseIntentReply('```json\n{"intent": "InvoiceCreator", "confidence": "0.7"}\n```')).toEqual({
				intent: "invoice_creator",
				confidence: 0.7,
				source: "json",
			})
		})

		it("maps unrecognized labels to unknown", () => {
			expect(parseIntentReply('{"intent": "weather", "confidence": 0.9}')).toEqual({
				intent: "unknown",
				confidence: 0.9,
				source: "json",
			})
		})

		it("falls back to 0.5 for an out-of-range confidence", () => {
			expect(parseIntentReply('{"intent": "greeting", "confidence": 3}').confidence).toBe(0.5)
		})
	})

	describe("bare labels", () => {
		it.each([
			["Greeting", "greeting"],
			["invoice query", "invoice_query"],
			["Invoice-Creator", "invoice_creator"],
			["  general\n", "general"],
		])("reads %j", (reply, intent) => {
			expect(parseIntentReply(reply)).toEqual({ intent, confidence: 0.9, source: "label" })
		})
	})

	describe("line replies", () => {
		it("reads intent and confidence lines", () => {
			expect(parseIntentReply("intent: invoice_query\nconfidence: 0.75")).toEqual({
				intent: "invoice_query",
				confidence: 0.75,
				source: "lines",
			})
		})

		it("falls back to 0.5 for an unusable confidence", () => {
			expect(parseIntentReply("intent: greeting\nconfidence: 1.7").confidence).toBe(0.5)
			expect(parseIntentReply("Intent: greeting\nConfidence: high").confidence).toBe(0.5)
		})
	})

	describe("soft failures", () => {
		it("returns unknown with low confidence", () => {
			expect(parseIntentReply("I think the user wants to chat")).toEqual({
				intent: "unknown",
				confidence: 0.1,
				source: "unparsed",
			})
		})

		it("treats a bare unknown label as unparsed", () => {
			expect(parseIntentReply("unknown").source).toBe("unparsed")
		})
	})
})
