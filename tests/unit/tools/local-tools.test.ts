import pino from 'pino'
import { describe, expect, it } from 'vitest'
import { CapabilityRegistry } from '../../../src/capabilities/registry.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { ContextStore } from '../../../src/memory/context-store.js'
import { ReminderService } from '../../../src/reminders/service.js'
import { ReminderStore } from '../../../src/reminders/store.js'
import { ToolExecutor } from '../../../src/tools/executor.js'
import { createToolRegistry } from '../../../src/tools/setup.js'

const logger = pino({ level: 'silent' })
const NOW = new Date(2025, 5, 1, 9, 5, 7)

function setup() {
    const fs = new MockFileSystem()
    const now = () => NOW
    const contextStore = new ContextStore(
        { file: '/data/context.json', maxHistory: 100, sessionWindow: 10, autosaveEvery: 5, displayName: 'Sir' },
        fs,
        logger,
        undefined,
        now
    )
    const reminders = new ReminderService(new ReminderStore('/data/reminders.json', fs, logger), logger, now)
    const capabilities = new CapabilityRegistry(
        { baseURL: 'http://tools.test', discoveryPath: '/tools/list', healthTimeoutMs: 100, discoveryTimeoutMs: 100, invokeTimeoutMs: 100 },
        logger
    )
    const registry = createToolRegistry({ contextStore, reminders, capabilities, workspace: { fs, baseDir: '/work' }, now })
    const executor = new ToolExecutor(registry, logger)

    const run = async (name: string, args: Record<string, unknown> = {}): Promise<string> => {
        const result = await executor.executeSafe(name, args)
        if (!result.ok) throw new Error(result.error)
        return result.value
    }
    return { fs, contextStore, registry, run }
}

describe('local tools', () => {
    it('registers the built-in tool set', () => {
        const { registry } = setup()
        expect(registry.list('local').map((t) => t.name)).toEqual([
            'get_current_time',
            'create_reminder',
            'list_reminders',
            'complete_reminder',
            'save_context',
            'clear_context',
            'get_context_stats',
            'create_folder',
            'create_file',
            'write_file',
            'read_file',
            'list_directory',
            'list_available_tools',
        ])
    })

    it('reports the current local time', async () => {
        const { run } = setup()
        expect(await run('get_current_time')).toBe('Current time: 2025-06-01 09:05:07')
    })

    it('creates, lists and completes reminders', async () => {
        const { run } = setup()

        expect(await run('list_reminders')).toBe('No active reminders found.')
        expect(await run('create_reminder', { task: 'Call mom', datetime: 'tomorrow 08:00' })).toBe(
            "Reminder 1 created: 'Call mom' at 2025-06-02 08:00"
        )
        expect(await run('create_reminder', { task: 'Stretch', datetime: 'today 17:30', description: 'legs' })).toBe(
            "Reminder 2 created: 'Stretch' at 2025-06-01 17:30"
        )
        expect(await run('list_reminders')).toBe(
            'Active reminders:\n  1. Call mom - 2025-06-02 08:00\n  2. Stretch - 2025-06-01 17:30'
        )

        expect(await run('complete_reminder', { id: '1' })).toBe("Reminder 1 marked as done: 'Call mom'")
        expect(await run('list_reminders')).toBe('Active reminders:\n  2. Stretch - 2025-06-01 17:30')
        expect(await run('complete_reminder', { id: 9 })).toBe('Reminder 9 not found')
    })

    it('answers with the parse error for an unknown time', async () => {
        const { run } = setup()
        expect(await run('create_reminder', { task: 'x', datetime: 'whenever' })).toBe(
            'Could not parse the time for the reminder: "whenever"'
        )
    })

    it('saves the context and reports write failures', async () => {
        const { run, fs } = setup()

        expect(await run('save_context')).toBe('Context saved successfully.')
        expect(fs.getFiles().has('/data/context.json')).toBe(true)

        fs.setWriteFailure(new Error('read-only'))
        expect(await run('save_context')).toBe('Could not save the context to disk.')
    })

    it('clears the session', async () => {
        const { run, contextStore } = setup()
        await contextStore.recordTurn('hello', 'hi')

        expect(await run('clear_context')).toBe('Context cleared successfully.')
        expect(contextStore.getSessionTurns()).toEqual([])
    })

    it('formats context statistics', async () => {
        const { run, contextStore } = setup()
        expect(await run('get_context_stats')).toBe(
            [
                'Context statistics:',
                '- Session turns: 0',
                '- Stored turns: 0',
                '- Session ID: 20250601_090507',
                '- User: Sir',
                '- Frequent commands: none yet',
                '- Last interaction: never',
            ].join('\n')
        )

        await contextStore.recordTurn('please remind me to stretch', 'Done.')
        const stats = await run('get_context_stats')
        expect(stats).toContain('- Session turns: 1')
        expect(stats).toContain('- Frequent commands: remind')
        expect(stats).toContain(`- Last interaction: ${NOW.toISOString()}`)
    })

    it('lists tools with the remote server state when none are bridged', async () => {
        const { run } = setup()
        const text = await run('list_available_tools')

        expect(text.startsWith('Available tools:\n\nLOCAL TOOLS:\n  - get_current_time: Get the current local date and time\n')).toBe(true)
        expect(text).toContain('\nREMOTE TOOLS: none available (server uninitialized)\n')
        expect(text.endsWith('\nTotal tools: 13')).toBe(true)
    })
    it('creates folders and files relative to the working directory', async () => {
        const { run, fs } = setup()

        expect(await run('create_folder', { path: 'notes/daily' })).toBe("Folder 'notes/daily' created.")
        expect(await fs.exists('/work/notes/daily')).toBe(true)

        expect(await run('create_file', { path: 'notes/todo.txt' })).toBe("File 'notes/todo.txt' created.")
        expect(fs.getFiles().get('/work/notes/todo.txt')).toBe('')

        expect(await run('write_file', { path: '/tmp/out.txt', content: 'hello' })).toBe("Wrote to '/tmp/out.txt'.")
        expect(fs.getFiles().get('/tmp/out.txt')).toBe('hello')
    })

    it('reads files and reports missing ones', async () => {
        const { run, fs } = setup()
        fs.setFile('/work/readme.md', '# Title\nbody')

        expect(await run('read_file', { path: 'readme.md' })).toBe("Content of 'readme.md':\n# Title\nbody")
        expect(await run('read_file', { path: 'nope.txt' })).toBe("File 'nope.txt' not found.")
    })

    it('lists a directory with folders marked and names sorted', async () => {
        const { run, fs } = setup()
        fs.setFile('/work/b.txt', 'b')
        fs.setFile('/work/src/main.ts', 'x')
        fs.setFile('/work/a.txt', 'a')
        await fs.mkdir('/work/empty')

        expect(await run('list_directory')).toBe("Contents of '.':\n  a.txt\n  b.txt\n  empty/\n  src/")
        expect(await run('list_directory', { path: 'empty' })).toBe("Directory 'empty' is empty.")
        expect(await run('list_directory', { path: 'missing' })).toBe("Directory 'missing' not found.")
    })

    it('reports a failed write through the executor', async () => {
        const { registry, fs } = setup()
        fs.setWriteFailure(new Error('EACCES'))
        const executor = new ToolExecutor(registry, logger)

        expect(await executor.executeSafe('write_file', { path: 'x.txt', content: 'x' })).toEqual({
            ok: false,
            error: "Tool 'write_file' failed: EACCES",
        })
    })
})
