import { z } from 'zod'
import type { ContextStore } from '../../memory/context-store.js'
import type { Tool } from '../types.js'

const ClearContextInput = z.object({})

type ClearContextInput = z.infer<typeof ClearContextInput>

export function clearContextTool(context: ContextStore): Tool<ClearContextInput> {
    return {
        name: 'clear_context',
        description: 'Clear the current conversation context and start a new session',
        parameters: ClearContextInput,
        source: 'local',
        async execute() {
            context.clearSession()
            return 'Context cleared successfully.'
        },
    }
}
