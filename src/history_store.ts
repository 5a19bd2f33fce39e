/**
 * Conversation history stores.
 *
 * The assistant loads history at the start of a turn and appends the user
 * message and the reply at the end. Messages are scoped by tenant as well as
 * conversation id so one tenant can never read another's thread.
 */

import { z } from "zod"
import type { HistoryMessage } from "./conversation_state.js"
import type { SqlQueryable } from "./db.js"
import { AssistantError, errorMessage } from "./errors.js"

export interface ConversationHistoryStore {
	/** Messages of a conversation, oldest first */
	load(conversationId: string, tenantId: string): Promise<HistoryMessage[]>
	append(conversationId: string, tenantId: string, message: HistoryMessage): Promise<void>
}

// ============================================================================
// In-memory
// ============================================================================

export interface InMemoryHistoryOptions {
	/** Messages kept per conversation; older ones are dropped on append */
	maxMessages: number
	/** Messages older than this are not returned */
	maxAgeMs: number
	/** Clock override for tests */
	now?: () => number
}

export class InMemoryHistoryStore implements ConversationHistoryStore {
	private conversations = new Map<string, HistoryMessage[]>()
	private maxMessages: number
	private maxAgeMs: number
	private now: () => number

	constructor(options: InMemoryHistoryOptions) {
		this.maxMessages = options.maxMessages
		this.maxAgeMs = options.maxAgeMs
		this.now = options.now ?? Date.now
	}

	async load(conversationId: string, tenantId: string): Promise<HistoryMessage[]> {
		const messages = this.conversations.get(key(conversationId, tenantId)) ?? []
		const cutoff = this.now() - this.maxAgeMs
		return messages.filter((m) => Date.parse(m.timestamp) >= cutoff).map((m) => ({ ...m }))
	}

	async append(conversationId: string, tenantId: string, message: HistoryMessage): Promise<void> {
		const k = key(conversationId, tenantId)
		const messages = this.conversations.get(k) ?? []
		messages.push({ ...message })
		if (messages.length > this.maxMessages) {
			messages.splice(0, messages.length - this.maxMessages)
		}
		this.conversations.set(k, messages)
	}

	/** Drop every conversation (tests, shutdown). */
	clear(): void {
		this.conversations.clear()
	}
}

function key(conversationId: string, tenantId: string): string {
	return `${tenantId}\u0000${conversationId}`
}

// ============================================================================
// PostgreSQL
// ============================================================================

const messageRowSchema = z.object({
	role: z.enum(["user", "assistant", "system"]),
	content: z.string(),
	created_at: z.union([z.date(), z.string()]),
})

export interface PgHistoryOptions {
	/** Messages returned by load */
	window: number
}

/**
 * History in the `messages` table:
 * (conversation_id, user_id, role, content, created_at)
 */
export class PgHistoryStore implements ConversationHistoryStore {
	private db: SqlQueryable
	private window: number

	constructor(db: SqlQueryable, options: PgHistoryOptions) {
		this.db = db
		this.window = options.window
	}

	async load(conversationId: string, tenantId: string): Promise<HistoryMessage[]> {
		let rows: Record<string, unknown>[]
		try {
			const result = await this.db.query(
				`SELECT role, content, created_at FROM messages
				 WHERE conversation_id = $1 AND user_id = $2
				 ORDER BY created_at DESC
				 LIMIT $3`,
				[conversationId, tenantId, this.window],
			)
			rows = result.rows
		} catch (error) {
			throw new AssistantError("execution", `Failed to load history: ${errorMessage(error)}`, true, { conversationId })
		}

		const messages: HistoryMessage[] = []
		for (const row of rows) {
			const parsed = messageRowSchema.safeParse(row)
			if (!parsed.success) {
				throw new AssistantError("parse", `Malformed history row: ${parsed.error.issues[0]?.message ?? "unknown issue"}`, false, {
					conversationId,
				})
			}
			const createdAt = parsed.data.created_at
			messages.push({
				role: parsed.data.role,
				content: parsed.data.content,
				timestamp: createdAt instanceof Date ? createdAt.toISOString() : createdAt,
			})
		}
		return messages.reverse()
	}

	async append(conversationId: string, tenantId: string, message: HistoryMessage): Promise<void> {
		try {
			await this.db.query(
				`INSERT INTO messages (conversation_id, user_id, role, content, created_at)
				 VALUES ($1, $2, $3, $4, $5)`,
				[conversationId, tenantId, message.role, message.content, message.timestamp],
			)
		} catch (error) {
			throw new AssistantError("execution", `Failed to store message: ${errorMessage(error)}`, true, { conversationId })
		}
	}
}
