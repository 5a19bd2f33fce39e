/**
 * Error types shared across the assistant core.
 *
 * - AssistantError: external-service, parse, validation and execution failures
 * - UnsafeStatementError: the SQL sanitizer refused a statement (deny-list hit)
 * - RoutingInvariantViolation: a workflow bug (bad edge, contract breach, runaway walk)
 */

export type AssistantErrorType = "completion" | "validation" | "execution" | "timeout" | "parse"

export class AssistantError extends Error {
	constructor(
		public type: AssistantErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "AssistantError"
	}
}

/**
 * Raised by the sanitizer when a statement matches the deny-list.
 * Never downgraded: the compiler turns it into a failed compilation.
 */
export class UnsafeStatementError extends Error {
	constructor(
		public pattern: string,
		public statement: string,
	) {
		super(`Unsafe SQL pattern detected: ${pattern}`)
		this.name = "UnsafeStatementError"
	}
}

export class RoutingInvariantViolation extends Error {
	constructor(
		message: string,
		public node?: string,
	) {
		super(message)
		this.name = "RoutingInvariantViolation"
	}
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
