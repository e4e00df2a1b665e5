import type { CapabilityRegistry } from '../capabilities/registry.js'
import { errorMessage } from '../core/errors.js'
import type { AssistantState, TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { ContextStore } from '../memory/context-store.js'
import type { ToolRegistry } from '../tools/registry.js'
import { syncRemoteTools } from '../tools/setup.js'
import type { AssistantReply, ReasoningEngine, ToolStatusReport } from './types.js'

const STATUS_PHRASES = ['tool status', 'check tools', 'list tools']
const REFRESH_PHRASES = ['refresh tools', 'reconnect tools', 'retry remote']

export const EMPTY_INPUT_REPLY = "I didn't catch that. Could you repeat it?"

function matchesAny(input: string, phrases: string[]): boolean {
    const lower = input.toLowerCase()
    return phrases.some((phrase) => lower.includes(phrase))
}

export function formatToolStatus(report: ToolStatusReport): string {
    return [
        'Tool status report:',
        `Local tools: ${report.localTools} available`,
        `Remote tools: ${report.remoteTools} available`,
        `Server status: ${report.serverConnected ? 'connected' : 'disconnected'}`,
        `Total tools: ${report.totalTools}`,
        '',
        `Status: ${report.serverConnected ? 'All systems operational' : 'Limited mode (remote server disconnected)'}`,
    ].join('\n')
}

/**
 * Turns one user input into one reply: gathers context and capabilities,
 * consults the reasoning engine and records the exchange.
 */
export class Assistant {
    constructor(
        private contextStore: ContextStore,
        private capabilities: CapabilityRegistry,
        private toolRegistry: ToolRegistry,
        private engine: ReasoningEngine,
        private eventBus: TypedEventEmitter,
        private logger: Logger
    ) {}

    async handle(rawInput: string): Promise<AssistantReply> {
        const input = rawInput.trim()
        if (!input) return { text: EMPTY_INPUT_REPLY, source: 'system' }

        if (matchesAny(input, STATUS_PHRASES)) {
            return { text: formatToolStatus(await this.toolStatus()), source: 'system' }
        }
        if (matchesAny(input, REFRESH_PHRASES)) {
            return { text: await this.refreshTools(), source: 'system' }
        }

        this.setState('processing')
        try {
            const text = await this.engine.respond({
                contextSummary: this.contextStore.contextSummary(),
                relevantContext: this.contextStore.relevantContext(input),
                capabilities: this.capabilityDescriptions(),
                userInput: input,
            })
            await this.contextStore.recordTurn(input, text)
            this.setState('speaking')
            return { text, source: 'engine' }
        } catch (error) {
            this.logger.error({ error: errorMessage(error) }, 'Reasoning engine failed')
            const text = `Sorry, I encountered an error: ${errorMessage(error)}`
            // failed exchanges are remembered too
            await this.contextStore.recordTurn(input, text, 'error')
            return { text, source: 'error' }
        } finally {
            this.setState('idle')
        }
    }

    /** Probes the remote server, so the reported state is current. */
    async toolStatus(): Promise<ToolStatusReport> {
        const serverConnected = await this.capabilities.healthCheck()
        const localTools = this.toolRegistry.list('local').length
        const remoteTools = this.toolRegistry.list('remote').length
        return { localTools, remoteTools, serverConnected, totalTools: localTools + remoteTools }
    }

    async refreshTools(): Promise<string> {
        const result = await this.capabilities.refresh()
        const available = syncRemoteTools(this.toolRegistry, this.capabilities, this.logger)
        if (result.ok) {
            return `Remote tools refreshed: ${available} available.`
        }
        const kept = available > 0 ? ` Keeping ${available} previously discovered remote tools.` : ' Local tools remain available.'
        return `Failed to refresh remote tools: ${result.error.message}.${kept}`
    }

    capabilityDescriptions(): Record<string, string> {
        const descriptions: Record<string, string> = {}
        for (const tool of this.toolRegistry.list()) descriptions[tool.name] = tool.description
        return descriptions
    }

    private setState(state: AssistantState): void {
        this.eventBus.emit('assistant:state', { state })
    }
}
