import { z } from 'zod'
import type { ContextStore } from '../../memory/context-store.js'
import type { ContextStats } from '../../memory/types.js'
import type { Tool } from '../types.js'

const ContextStatsInput = z.object({})

type ContextStatsInput = z.infer<typeof ContextStatsInput>

export function formatContextStats(stats: ContextStats): string {
    return [
        'Context statistics:',
        `- Session turns: ${stats.turnCount}`,
        `- Stored turns: ${stats.totalTurns}`,
        `- Session ID: ${stats.sessionId}`,
        `- User: ${stats.displayName}`,
        `- Frequent commands: ${stats.frequentCommands.length > 0 ? stats.frequentCommands.join(', ') : 'none yet'}`,
        `- Last interaction: ${stats.lastInteraction ?? 'never'}`,
    ].join('\n')
}

export function contextStatsTool(context: ContextStore): Tool<ContextStatsInput> {
    return {
        name: 'get_context_stats',
        description: 'Get statistics about the current context and memory',
        parameters: ContextStatsInput,
        source: 'local',
        async execute() {
            return formatContextStats(context.stats())
        },
    }
}
