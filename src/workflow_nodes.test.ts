import { describe, it, expect } from "vitest"
import type { CompletionService } from "./completion_client.js"
import type { ConversationState, QueryArtifact, QueryResult } from "./conversation_state.js"
import { createConversationState, textInput } from "./conversation_state.js"
import { AssistantError } from "./errors.js"
import { silentLogger } from "./logger.js"
import { CREATION_MESSAGES, QUERY_MESSAGES } from "./messages.js"
import type { PromptContext } from "./prompts.js"
import { SqlCompiler } from "./sql_compiler.js"
import type { NodeContext, QueryExecutor } from "./workflow_nodes.js"
import { composeReply, detectInputType, fileValidator, formatInvoice, formatRows, sqlGenerator } from "./workflow_nodes.js"

class FixedCompletion implements CompletionService {
	prompts: PromptContext[] = []
	constructor(private reply: string) {}
	async complete(prompt: PromptContext): Promise<string> {
		this.prompts.push(prompt)
		return this.reply
	}
}

class FakeExecutor implements QueryExecutor {
	calls: Array<[string, string]> = []
	constructor(private outcome: QueryResult | Error) {}
	async execute(sql: string, tenantId: string): Promise<QueryResult> {
		this.calls.push([sql, tenantId])
		if (this.outcome instanceof Error) throw this.outcome
		return this.outcome
	}
}

function context(completion: CompletionService, extra: Partial<NodeContext> = {}): NodeContext {
	return {
		completion,
		compiler: new SqlCompiler(completion),
		schemaDescription: "CREATE TABLE invoices (id int, user_id int, vendor text, total numeric)",
		historyWindow: 10,
		logger: silentLogger,
		...extra,
	}
}

function queryState(text: string, patch: Partial<ConversationState> = {}): ConversationState {
	return {
		...createConversationState({ tenantId: "7", conversationId: "c1", input: textInput(text) }),
		detectedInputType: "text",
		intent: "invoice_query",
		intentConfidence: 0.8,
		...patch,
	}
}

const ARTIFACT: QueryArtifact = {
	sql: "SELECT vendor FROM invoices WHERE user_id = :tenant_id",
	rawSql: "",
	securityLevel: "secure",
	complexity: "simple",
	confidence: 0.8,
	extractionMethod: "fenced_sql",
	rewrites: [],
}

const SCOPED = "SELECT vendor, total FROM invoices WHERE user_id = :tenant_id"
const FENCED = "```sql\nSELECT vendor, total FROM invoices\n```"

describe("detectInputType", () => {
	const file = { kind: "file" as const, path: "/uploads/upload", declaredType: "unknown" as const, rawBytes: new Uint8Array() }

	it("prefers the declared type", () => {
		expect(detectInputType({ ...file, declaredType: "pdf", fileName: "scan.png" })).toBe("pdf")
	})

	it("falls back to the extension, file name first", () => {
		expect(detectInputType({ ...file, fileName: "scan.JPG" })).toBe("image")
		expect(detectInputType({ ...file, path: "/uploads/data.csv" })).toBe("csv")
		expect(detectInputType({ ...file, path: "/uploads/book.xlsx" })).toBe("excel")
	})

	it("then to the MIME type", () => {
		expect(detectInputType({ ...file, mimeType: "application/pdf; charset=binary" })).toBe("pdf")
		expect(detectInputType(file)).toBe("unknown")
	})

	it("reports text input as text", () => {
		expect(detectInputType(textInput("hello"))).toBe("text")
	})
})

describe("sqlGenerator", () => {
	it("executes a scoped statement for the tenant", async () => {
		const result: QueryResult = { rows: [{ vendor: "Acme", total: 120 }], rowCount: 1, executionTimeMs: 3 }
		const executor = new FakeExecutor(result)
		const outcome = await sqlGenerator.run(queryState("list vendor totals"), context(new FixedCompletion(FENCED), { queryExecutor: executor }))

		expect(executor.calls).toEqual([[SCOPED, "7"]])
		expect(outcome.update.queryResult).toEqual(result)
		expect(outcome.update.queryArtifact?.sql).toBe(SCOPED)
		expect(outcome.errors).toBeUndefined()
	})

	it("reports execution failures as soft errors", async () => {
		const executor = new FakeExecutor(new AssistantError("execution", "Database error: connection refused"))
		const outcome = await sqlGenerator.run(queryState("list vendors"), context(new FixedCompletion(FENCED), { queryExecutor: executor }))

		expect(outcome.update.queryResult).toBeNull()
		expect(outcome.update.queryArtifact?.sql).toBe(SCOPED)
		expect(outcome.errors).toEqual(["query execution failed: Database error: connection refused"])
	})

	it("never executes an unverified statement", async () => {
		const executor = new FakeExecutor(new Error("should not run"))
		const outcome = await sqlGenerator.run(
			queryState("show all invoices"),
			context(new FixedCompletion("Show all invoices"), { queryExecutor: executor }),
		)

		expect(executor.calls).toEqual([])
		expect(outcome.update.queryArtifact?.securityLevel).toBe("requires_verification")
	})

	it("flags summary questions and semantic search in the prompt", async () => {
		const completion = new FixedCompletion(FENCED)
		await sqlGenerator.run(queryState("How much did I spend per vendor?"), context(completion, { semanticSearch: true }))

		expect(completion.prompts[0].prompt).toContain("This looks like a summary question.")
		expect(completion.prompts[0].prompt).toContain("Semantic search is enabled.")
	})

	it("passes extracted entities as hints", async () => {
		const completion = new FixedCompletion(FENCED)
		await sqlGenerator.run(
			queryState("invoices from Acme", { extractedEntities: { vendor: "Acme", additionalFields: {} } }),
			context(completion),
		)
		expect(completion.prompts[0].prompt).toContain('Extracted entities: {"vendor":"Acme","additionalFields":{}}')
	})
})

describe("fileValidator", () => {
	it("rejects plain text input", async () => {
		const outcome = await fileValidator.run(queryState("hi"), context(new FixedCompletion("")))
		expect(outcome.update.fileValidation).toEqual({ isValid: false, confidence: 0, reason: "Plain text is not a valid invoice file" })
	})

	it("throws without an inspector and falls back to an invalid result", async () => {
		const state = createConversationState({
			tenantId: "7",
			conversationId: "c1",
			input: { kind: "file", path: "/uploads/a.png", declaredType: "image", rawBytes: new Uint8Array() },
		})
		state.detectedInputType = "image"

		const run = fileValidator.run(state, context(new FixedCompletion("")))
		await expect(run).rejects.toThrow("No file inspector configured")
		expect(fileValidator.fallback(state, new Error("inspector offline"))).toEqual({
			fileValidation: { isValid: false, confidence: 0, reason: "inspector offline" },
		})
	})
})

describe("composeReply", () => {
	it("lists result rows", () => {
		const reply = composeReply(
			queryState("q", {
				queryArtifact: ARTIFACT,
				queryResult: {
					rows: [{ vendor: "Acme", total: 120, issued: new Date("2024-03-01T00:00:00Z") }],
					rowCount: 1,
					executionTimeMs: 2,
				},
			}),
		)
		expect(reply.content).toBe("Here is what I found:\n- vendor: Acme, total: 120, issued: 2024-03-01")
		expect(reply.confidence).toBe(0.8)
		expect(reply.metadata).toEqual({ sql: ARTIFACT.sql, securityLevel: "secure", complexity: "simple", rowCount: 1 })
	})

	it("says so when nothing matched", () => {
		const reply = composeReply(queryState("q", { queryArtifact: ARTIFACT, queryResult: { rows: [], rowCount: 0, executionTimeMs: 1 } }))
		expect(reply.content).toBe(QUERY_MESSAGES.no_results)
	})

	it("reports an execution failure", () => {
		const reply = composeReply(
			queryState("q", { queryArtifact: ARTIFACT, errors: ["sql_generator: query execution failed: timeout"] }),
		)
		expect(reply.content).toBe(QUERY_MESSAGES.query_error)
		expect(reply.confidence).toBe(0)
	})

	it("reports a failed compilation", () => {
		const reply = composeReply(queryState("q", { queryFailure: { kind: "missing_tenant", message: "no tenant" } }))
		expect(reply.content).toBe(QUERY_MESSAGES.sql_conversion_failed)
		expect(reply.metadata).toEqual({ failure: "missing_tenant", pattern: null })
	})

	it("asks for more when an invoice has no content", () => {
		const reply = composeReply(
			queryState("q", { intent: "invoice_creator", intentConfidence: 0.7, extractedEntities: { additionalFields: {} } }),
		)
		expect(reply).toEqual({ content: CREATION_MESSAGES.missing_info, confidence: 0.7 })
	})
})

describe("formatting helpers", () => {
	it("formats an invoice with items and tax", () => {
		expect(
			formatInvoice({
				vendor: "Acme",
				items: [{ description: "Paper", quantity: 2, unitPrice: 3.5 }, { totalPrice: 10 }],
				taxAmount: 1.5,
				totalAmount: 18.5,
				currency: "EUR",
				additionalFields: {},
			}),
		).toBe("Vendor: Acme\n- 2 x Paper: 3.5\n- item: 10\nTax: 1.5 EUR\nTotal: 18.5 EUR")
	})

	it("caps the number of rows shown", () => {
		const rows = Array.from({ length: 12 }, (_, i) => ({ n: i }))
		const lines = formatRows(rows).split("\n")
		expect(lines).toHaveLength(11)
		expect(lines[9]).toBe("- n: 9")
		expect(lines[10]).toBe("...and 2 more")
	})

	it("prints null and nested values", () => {
		expect(formatRows([{ a: null, b: { c: 1 } }])).toBe('- a: null, b: {"c":1}')
	})
})
