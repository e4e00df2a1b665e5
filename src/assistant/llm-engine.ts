import { PromptBuilder } from '../llm/prompt-builder.js'
import type { ChatMessage, LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import type { ToolExecutor } from '../tools/executor.js'
import type { ToolRegistry } from '../tools/registry.js'
import type { ReasoningEngine, ReasoningRequest } from './types.js'

export interface LLMReasoningEngineOptions {
    maxRounds: number
    promptBudget: number
    displayName: () => string
}

const DEFAULT_OPTIONS: LLMReasoningEngineOptions = {
    maxRounds: 8,
    promptBudget: 4000,
    displayName: () => 'Sir',
}

const OUT_OF_ROUNDS = 'I could not finish that request within the allowed number of steps.'

function persona(displayName: string): string {
    return `You are a personal assistant with persistent memory and access to local and remote tools.
Address the user as "${displayName}". Be concise, polite and action-focused.
Use the available tools to do what the user asks; chain them when a request needs several steps.
When a remote tool fails, say so plainly and suggest an alternative.
Consider earlier conversation when it is relevant and keep ongoing tasks consistent.`
}

function capabilityList(capabilities: Record<string, string>): string {
    const names = Object.keys(capabilities)
    if (names.length === 0) return ''
    const lines = names.map((name) => `- ${name}: ${capabilities[name] ?? ''}`)
    return `## Available Tools (${names.length} total):\n${lines.join('\n')}`
}

/**
 * Reasoning engine backed by an OpenAI-compatible chat model. Tool calls are
 * executed through the shared tool registry until the model answers in text.
 */
export class LLMReasoningEngine implements ReasoningEngine {
    private options: LLMReasoningEngineOptions

    constructor(
        private llmClient: LLMClient,
        private toolRegistry: ToolRegistry,
        private toolExecutor: ToolExecutor,
        private logger: Logger,
        options: Partial<LLMReasoningEngineOptions> = {}
    ) {
        this.options = { ...DEFAULT_OPTIONS, ...options }
    }

    buildSystemPrompt(request: ReasoningRequest): string {
        return new PromptBuilder()
            .add('Persona', persona(this.options.displayName()), 100)
            .add('Tools', capabilityList(request.capabilities), 80)
            .add('Recent', request.contextSummary, 60)
            .add('Relevant', request.relevantContext, 40)
            .build(this.options.promptBudget)
    }

    async respond(request: ReasoningRequest): Promise<string> {
        const tools = this.toolRegistry.getToolDefinitions()
        const messages: ChatMessage[] = [
            { role: 'system', content: this.buildSystemPrompt(request) },
            { role: 'user', content: request.userInput },
        ]

        let lastContent: string | null = null
        for (let round = 0; round < this.options.maxRounds; round++) {
            const response = await this.llmClient.chat({
                messages,
                tools: tools.length > 0 ? tools : undefined,
            })
            lastContent = response.content

            if (response.finishReason === 'stop' || response.toolCalls.length === 0) {
                return response.content ?? ''
            }

            messages.push({ role: 'assistant', content: response.content, tool_calls: response.toolCalls })

            for (const call of response.toolCalls) {
                let args: unknown
                try {
                    args = JSON.parse(call.function.arguments || '{}')
                } catch {
                    args = {}
                }

                const result = await this.toolExecutor.executeSafe(call.function.name, args)
                this.logger.debug({ tool: call.function.name, ok: result.ok, round }, 'engine:tool')
                messages.push({
                    role: 'tool',
                    tool_call_id: call.id,
                    content: result.ok ? result.value : `ERROR: ${result.error}`,
                })
            }
        }

        this.logger.warn({ maxRounds: this.options.maxRounds }, 'Reasoning engine ran out of tool rounds')
        return lastContent ?? OUT_OF_ROUNDS
    }
}
