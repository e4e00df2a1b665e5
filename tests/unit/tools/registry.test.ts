import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { ToolRegistry } from '../../../src/tools/registry.js'
import type { AnyTool, ToolSource } from '../../../src/tools/types.js'

function makeTool(name: string, source: ToolSource = 'local'): AnyTool {
    return {
        name,
        description: `Tool ${name}`,
        parameters: z.object({ input: z.string().optional() }),
        source,
        execute: async () => 'done',
    }
}

describe('ToolRegistry', () => {
    it('lists tools by source', () => {
        const registry = new ToolRegistry()
        registry.register(makeTool('a'))
        registry.register(makeTool('b', 'remote'))

        expect(registry.list().map((t) => t.name)).toEqual(['a', 'b'])
        expect(registry.list('local').map((t) => t.name)).toEqual(['a'])
        expect(registry.list('remote').map((t) => t.name)).toEqual(['b'])
    })

    it('replaces every tool of a source', () => {
        const registry = new ToolRegistry()
        registry.register(makeTool('local_one'))
        registry.replaceSource('remote', [makeTool('old', 'remote')])
        registry.replaceSource('remote', [makeTool('new', 'remote')])

        expect(registry.list().map((t) => t.name)).toEqual(['local_one', 'new'])
        expect(registry.get('old')).toBeUndefined()
    })

    it('never lets a remote tool shadow a local one', () => {
        const registry = new ToolRegistry()
        const local = makeTool('get_current_time')
        registry.register(local)

        const shadowed = registry.replaceSource('remote', [makeTool('get_current_time', 'remote'), makeTool('weather', 'remote')])

        expect(shadowed).toEqual(['get_current_time'])
        expect(registry.get('get_current_time')).toBe(local)
        expect(registry.list('remote').map((t) => t.name)).toEqual(['weather'])
    })
})

describe('ToolRegistry definition cache', () => {
    it('returns cached definitions on second call', () => {
        const registry = new ToolRegistry()
        registry.register(makeTool('glob'))

        const first = registry.getToolDefinitions()
        const second = registry.getToolDefinitions()

        expect(first).toBe(second)
    })

    it('invalidates on register()', () => {
        const registry = new ToolRegistry()
        registry.register(makeTool('glob'))
        const before = registry.getToolDefinitions()

        registry.register(makeTool('grep'))

        const after = registry.getToolDefinitions()
        expect(before).not.toBe(after)
        expect(after).toHaveLength(2)
    })

    it('invalidates on replaceSource()', () => {
        const registry = new ToolRegistry()
        registry.register(makeTool('glob'))
        const before = registry.getToolDefinitions()

        registry.replaceSource('remote', [makeTool('weather', 'remote')])

        expect(registry.getToolDefinitions()).not.toBe(before)
        expect(registry.getToolDefinitions().map((d) => d.function.name)).toEqual(['glob', 'weather'])
    })

    it('describes parameters as JSON schema', () => {
        const registry = new ToolRegistry()
        registry.register(makeTool('glob'))

        const [definition] = registry.getToolDefinitions()
        expect(definition?.type).toBe('function')
        expect(definition?.function.description).toBe('Tool glob')
        expect(definition?.function.parameters).toMatchObject({
            type: 'object',
            properties: { input: { type: 'string' } },
        })
    })

    it('returns empty array when nothing is registered', () => {
        expect(new ToolRegistry().getToolDefinitions()).toEqual([])
    })
})
