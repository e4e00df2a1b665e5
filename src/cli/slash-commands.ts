import { formatToolStatus } from '../assistant/assistant.js'
import type { Container } from '../core/container.js'
import { formatReminderTime } from '../reminders/service.js'
import { formatContextStats } from '../tools/context/context-stats.js'
import { colors } from './ui.js'

interface SlashCommand {
    name: string
    description: string
    handler: (container: Container, args: string) => Promise<string>
}

export const EXIT_COMMANDS = ['/exit', '/quit']

const commands: SlashCommand[] = [
    {
        name: '/help',
        description: 'Show available commands',
        handler: async () => {
            const lines = commands.map((c) => `  ${colors.bold(c.name.padEnd(12))} ${c.description}`)
            return `Available commands:\n${lines.join('\n')}\n\nSay "tool status" or "refresh tools" at any time.`
        },
    },
    {
        name: '/status',
        description: 'Show remote server and tool status',
        handler: async (container) => formatToolStatus(await container.assistant.toolStatus()),
    },
    {
        name: '/tools',
        description: 'List local and remote tools',
        handler: async (container) => {
            const tools = container.toolRegistry.list()
            const lines = tools.map((t) => `  ${colors.tool(t.name.padEnd(24))} ${colors.dim(`[${t.source}]`)} ${t.description}`)
            return `Tools (${tools.length}):\n${lines.join('\n')}`
        },
    },
    {
        name: '/refresh',
        description: 'Reconnect to the remote tools server',
        handler: async (container) => container.assistant.refreshTools(),
    },
    {
        name: '/stats',
        description: 'Show context memory statistics',
        handler: async (container) => formatContextStats(container.contextStore.stats()),
    },
    {
        name: '/save',
        description: 'Save conversation context now',
        handler: async (container) => ((await container.contextStore.save()) ? 'Context saved.' : 'Could not save context.'),
    },
    {
        name: '/clear',
        description: 'Clear the conversation and start a new session',
        handler: async (container) => {
            container.contextStore.clearSession()
            return `Context cleared. New session ${container.contextStore.getSessionId()}.`
        },
    },
    {
        name: '/reminders',
        description: 'List active reminders',
        handler: async (container) => {
            const result = await container.reminders.listActive()
            if (!result.ok) return result.error
            if (result.value.length === 0) return 'No active reminders.'
            const lines = result.value.map((r) => `  ${String(r.id).padStart(3)}. ${r.task} ${colors.dim(formatReminderTime(r.fire_at))}`)
            return `Active reminders:\n${lines.join('\n')}`
        },
    },
    {
        name: '/exit',
        description: 'Save context and quit',
        handler: async () => 'Goodbye!',
    },
]

export function getSlashCommands(): SlashCommand[] {
    return commands
}

export async function handleSlashCommand(input: string, container: Container): Promise<string | null> {
    const [cmdName, ...rest] = input.trim().split(' ')
    const args = rest.join(' ')

    const cmd = commands.find((c) => c.name === cmdName)
    if (!cmd) return null

    return cmd.handler(container, args)
}
