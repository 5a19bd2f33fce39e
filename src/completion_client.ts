/**
 * Completion Service Client
 *
 * The core only depends on CompletionService. OllamaCompletionClient is the
 * shipped adapter: one non-streaming POST to /api/generate per call, no
 * retries, aborted after the configured timeout.
 */

import { z } from "zod"
import { AssistantError } from "./errors.js"
import type { Logger } from "./logger.js"
import { silentLogger } from "./logger.js"
import type { PromptContext } from "./prompts.js"

export interface CompletionService {
	complete(prompt: PromptContext): Promise<string>
}

export interface OllamaClientOptions {
	baseUrl: string
	model: string
	timeoutMs: number
	temperature?: number
	maxTokens?: number
	logger?: Logger
	/** Injected for tests; defaults to the global fetch */
	fetchImpl?: typeof fetch
}

const generateResponseSchema = z.object({
	response: z.string(),
	done: z.boolean().optional(),
	eval_count: z.number().optional(),
	prompt_eval_count: z.number().optional(),
})

export class OllamaCompletionClient implements CompletionService {
	private baseUrl: string
	private model: string
	private timeout: number
	private temperature: number
	private maxTokens: number
	private logger: Logger
	private fetchImpl: typeof fetch

	constructor(options: OllamaClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.model = options.model
		this.timeout = options.timeoutMs
		this.temperature = options.temperature ?? 0.2
		this.maxTokens = options.maxTokens ?? 1000
		this.logger = options.logger ?? silentLogger
		this.fetchImpl = options.fetchImpl ?? fetch
	}

	async complete(prompt: PromptContext): Promise<string> {
		const url = `${this.baseUrl}/api/generate`
		const startTime = Date.now()

		const body = {
			model: this.model,
			system: prompt.system,
			prompt: prompt.prompt,
			stream: false,
			...(prompt.format ? { format: prompt.format } : {}),
			options: {
				temperature: prompt.temperature ?? this.temperature,
				num_predict: prompt.maxTokens ?? this.maxTokens,
			},
		}

		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeout)

		try {
			const response = await this.fetchImpl(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new AssistantError(
					"completion",
					`Completion service returned error: ${response.status} ${errorText}`,
					response.status >= 500,
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			const parsed = generateResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new AssistantError("parse", "Completion service returned an unexpected payload", false, {
					issues: parsed.error.issues.map((i) => i.message),
				})
			}

			this.logger.debug("Completion received", {
				model: this.model,
				latency_ms: Date.now() - startTime,
				eval_count: parsed.data.eval_count,
			})
			return parsed.data.response
		} catch (error) {
			if (error instanceof AssistantError) {
				throw error
			}

			if (error instanceof Error && error.name === "AbortError") {
				throw new AssistantError(
					"timeout",
					`Completion request timed out after ${this.timeout}ms`,
					true,
					{ timeout: this.timeout, url },
				)
			}

			if (error instanceof TypeError) {
				throw new AssistantError(
					"completion",
					`Cannot connect to completion service at ${this.baseUrl}`,
					true,
					{ baseUrl: this.baseUrl, originalError: error.message },
				)
			}

			throw new AssistantError(
				"completion",
				`Unexpected error communicating with completion service: ${String(error)}`,
				false,
				{ originalError: String(error) },
			)
		} finally {
			clearTimeout(timeoutId)
		}
	}
}
