import { z } from 'zod'
import type { CapabilityRegistry } from '../../capabilities/registry.js'
import type { ToolRegistry } from '../registry.js'
import type { Tool } from '../types.js'

const ListToolsInput = z.object({})

type ListToolsInput = z.infer<typeof ListToolsInput>

export function listToolsTool(tools: ToolRegistry, capabilities: CapabilityRegistry): Tool<ListToolsInput> {
    return {
        name: 'list_available_tools',
        description: 'List all available local and remote tools with their descriptions',
        parameters: ListToolsInput,
        source: 'local',
        async execute() {
            const local = tools.list('local')
            const remote = tools.list('remote')

            let text = 'Available tools:\n\nLOCAL TOOLS:\n'
            for (const tool of local) text += `  - ${tool.name}: ${tool.description}\n`

            if (remote.length > 0) {
                text += '\nREMOTE TOOLS:\n'
                for (const tool of remote) text += `  - ${tool.name}: ${tool.description}\n`
            } else {
                text += `\nREMOTE TOOLS: none available (server ${capabilities.getState()})\n`
            }

            text += `\nTotal tools: ${local.length + remote.length}`
            return text
        },
    }
}
