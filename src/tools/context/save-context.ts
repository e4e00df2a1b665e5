import { z } from 'zod'
import type { ContextStore } from '../../memory/context-store.js'
import type { Tool } from '../types.js'

const SaveContextInput = z.object({})

type SaveContextInput = z.infer<typeof SaveContextInput>

export function saveContextTool(context: ContextStore): Tool<SaveContextInput> {
    return {
        name: 'save_context',
        description: 'Save the current conversation context to memory',
        parameters: SaveContextInput,
        source: 'local',
        async execute() {
            return (await context.save()) ? 'Context saved successfully.' : 'Could not save the context to disk.'
        },
    }
}
