/**
 * Workflow Engine
 *
 * Static edge table plus a dispatcher that walks it. One run per user turn;
 * the engine keeps nothing between runs.
 *
 *   input_classifier ──text──▶ intent_classifier ──invoice_query──▶ sql_generator ──┐
 *          │                        ├──invoice_creator──▶ entity_extractor ─────────┤
 *          │                        └──otherwise────────────────────────────────────┤
 *          └──file──▶ file_validator ──valid──▶ data_extractor ─────────────────────┤
 *                           └──invalid──────────────────────────────────────────────┤
 *                                                                     response_formatter
 */

import type { ConversationState, NodeName, StateUpdate } from "./conversation_state.js"
import { RoutingInvariantViolation, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"
import type { NodeContext, WorkflowNode } from "./workflow_nodes.js"
import { DEFAULT_NODES } from "./workflow_nodes.js"

// ============================================================================
// Edge table
// ============================================================================

export interface Edge {
	to: NodeName
	/** Absent guard: always taken */
	when?: (state: ConversationState) => boolean
}

export const ENTRY_NODE: NodeName = "input_classifier"

/** Guards are tried in order; the first one that holds wins. */
export const EDGES: Record<NodeName, Edge[]> = {
	input_classifier: [
		{ to: "intent_classifier", when: (s) => s.detectedInputType === "text" },
		{ to: "file_validator" },
	],
	intent_classifier: [
		{ to: "sql_generator", when: (s) => s.intent === "invoice_query" },
		{ to: "entity_extractor", when: (s) => s.intent === "invoice_creator" },
		{ to: "response_formatter" },
	],
	file_validator: [
		{ to: "data_extractor", when: (s) => s.fileValidation?.isValid === true },
		{ to: "response_formatter" },
	],
	entity_extractor: [{ to: "response_formatter" }],
	data_extractor: [{ to: "response_formatter" }],
	sql_generator: [{ to: "response_formatter" }],
	response_formatter: [],
}

/** Longest legal walk is four nodes; anything past this is a cycle. */
export const MAX_STEPS = 5

// ============================================================================
// Engine
// ============================================================================

export interface WorkflowEngineOptions {
	/** Throw on contract breaches instead of logging them */
	strict?: boolean
	maxSteps?: number
	/** Replace individual nodes (tests, alternative collaborators) */
	nodes?: Partial<Record<NodeName, WorkflowNode>>
	edges?: Record<NodeName, Edge[]>
}

export class WorkflowEngine {
	private ctx: NodeContext
	private logger: Logger
	private strict: boolean
	private maxSteps: number
	private nodes: Record<NodeName, WorkflowNode>
	private edges: Record<NodeName, Edge[]>

	constructor(ctx: NodeContext, options: WorkflowEngineOptions = {}) {
		this.ctx = ctx
		this.logger = ctx.logger
		this.strict = options.strict ?? false
		this.maxSteps = options.maxSteps ?? MAX_STEPS
		this.nodes = { ...DEFAULT_NODES, ...options.nodes }
		this.edges = options.edges ?? EDGES
	}

	/**
	 * Walk the graph from the entry node to the terminal node.
	 * The input state is copied; the returned state is the final one.
	 *
	 * @throws RoutingInvariantViolation on a runaway walk, an unknown node,
	 *         or (strict mode) a node breaking its contract
	 */
	async run(initial: ConversationState): Promise<ConversationState> {
		const state: ConversationState = {
			...initial,
			conversationHistory: [...initial.conversationHistory],
			errors: [...initial.errors],
			visitedNodes: [...initial.visitedNodes],
		}

		let current: NodeName | null = ENTRY_NODE
		let steps = 0
		let lockedInputType = state.detectedInputType

		while (current !== null) {
			steps++
			if (steps > this.maxSteps) {
				throw new RoutingInvariantViolation(`Workflow exceeded ${this.maxSteps} steps`, current)
			}

			const node = this.resolve(current)
			state.visitedNodes.push(node.name)
			await this.execute(node, state)

			if (lockedInputType !== null && state.detectedInputType !== lockedInputType) {
				this.breach(node.name, `detectedInputType changed from ${lockedInputType} to ${String(state.detectedInputType)}`)
				state.detectedInputType = lockedInputType
			}
			lockedInputType = state.detectedInputType
			this.checkContract(node.name, state)

			current = this.next(node.name, state)
		}

		return state
	}

	/** Next node for `from`, or null at the terminal node. */
	next(from: NodeName, state: ConversationState): NodeName | null {
		const edges = this.edges[from]
		if (!edges) {
			throw new RoutingInvariantViolation(`No edges declared for node "${from}"`, from)
		}
		if (edges.length === 0) return null

		const edge = edges.find((e) => !e.when || e.when(state))
		if (!edge) {
			throw new RoutingInvariantViolation(`No edge out of "${from}" matched`, from)
		}
		return edge.to
	}

	private resolve(name: NodeName): WorkflowNode {
		const node = Object.prototype.hasOwnProperty.call(this.nodes, name) ? this.nodes[name] : undefined
		if (!node) {
			throw new RoutingInvariantViolation(`Unknown node "${name}"`, name)
		}
		return node
	}

	private async execute(node: WorkflowNode, state: ConversationState): Promise<void> {
		const started = Date.now()
		try {
			const outcome = await node.run(state, this.ctx)
			this.merge(node, state, outcome.update)
			for (const message of outcome.errors ?? []) {
				state.errors.push(`${node.name}: ${message}`)
			}
			state.stage = node.stage
			this.logger.debug("Node completed", { node: node.name, ms: Date.now() - started })
		} catch (error) {
			if (error instanceof RoutingInvariantViolation) throw error

			const message = errorMessage(error)
			this.logger.error("Node failed, using fallback", { node: node.name, error: message })
			state.errors.push(`${node.name}: ${message}`)
			state.stage = "error"
			this.merge(node, state, node.fallback(state, error))
		}
	}

	/** Merge a node's update, dropping fields it did not declare. */
	private merge(node: WorkflowNode, state: ConversationState, update: StateUpdate): void {
		const allowed = new Set<string>(node.writes)
		const undeclared = Object.keys(update).filter((key) => !allowed.has(key))

		if (undeclared.length === 0) {
			Object.assign(state, update)
			return
		}

		this.breach(node.name, `wrote undeclared fields: ${undeclared.join(", ")}`)
		const accepted: StateUpdate = { ...update }
		for (const key of undeclared) Reflect.deleteProperty(accepted, key)
		Object.assign(state, accepted)
	}

	private checkContract(name: NodeName, state: ConversationState): void {
		if (name === "intent_classifier" && state.intent === null) {
			this.breach(name, "intent not set")
		}
		if (name === "file_validator" && state.fileValidation === null) {
			this.breach(name, "fileValidation not set")
		}
		if (state.queryArtifact !== null && state.intent !== "invoice_query") {
			this.breach(name, `queryArtifact present with intent ${String(state.intent)}`)
		}
	}

	private breach(node: NodeName, message: string): void {
		if (this.strict) {
			throw new RoutingInvariantViolation(`${node}: ${message}`, node)
		}
		this.logger.warn("Node contract breach", { node, message })
	}
}
