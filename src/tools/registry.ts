import { zodToJsonSchema } from 'zod-to-json-schema'
import type { ToolDefinition } from '../llm/types.js'
import type { AnyTool, ToolSource } from './types.js'

export class ToolRegistry {
    private tools = new Map<string, AnyTool>()
    private definitionCache: ToolDefinition[] | null = null

    register(tool: AnyTool): void {
        this.tools.set(tool.name, tool)
        this.definitionCache = null
    }

    /**
     * Swaps every tool of `source` for `tools`. A remote tool never shadows a
     * local one of the same name.
     */
    replaceSource(source: ToolSource, tools: AnyTool[]): string[] {
        for (const [name, tool] of this.tools) {
            if (tool.source === source) this.tools.delete(name)
        }
        const shadowed: string[] = []
        for (const tool of tools) {
            const existing = this.tools.get(tool.name)
            if (existing && existing.source !== source) {
                shadowed.push(tool.name)
                continue
            }
            this.tools.set(tool.name, tool)
        }
        this.definitionCache = null
        return shadowed
    }

    get(name: string): AnyTool | undefined {
        return this.tools.get(name)
    }

    list(source?: ToolSource): AnyTool[] {
        const all = [...this.tools.values()]
        return source ? all.filter((t) => t.source === source) : all
    }

    getToolDefinitions(): ToolDefinition[] {
        if (this.definitionCache) return this.definitionCache

        this.definitionCache = this.list().map((tool) => ({
            type: 'function' as const,
            function: {
                name: tool.name,
                description: tool.description,
                parameters: zodToJsonSchema(tool.parameters) as Record<string, unknown>,
            },
        }))
        return this.definitionCache
    }
}
