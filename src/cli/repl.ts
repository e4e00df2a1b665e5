import * as clack from '@clack/prompts'
import type { AssistantReply } from '../assistant/types.js'
import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import type { EventMap } from '../core/events.js'
import { createLineReader } from './line-reader.js'
import { createProgressTracker } from './progress.js'
import { EXIT_COMMANDS, getSlashCommands, handleSlashCommand } from './slash-commands.js'
import { banner, colors, formatError, formatReminderAlert, formatReply } from './ui.js'

const EXIT_WORDS = ['exit', 'quit', ...EXIT_COMMANDS]

async function ask(container: Container, text: string): Promise<AssistantReply> {
    const spinner = clack.spinner()
    spinner.start('Thinking...')
    const progress = createProgressTracker(container.eventBus, spinner)
    try {
        const reply = await container.assistant.handle(text)
        spinner.stop(reply.source === 'error' ? colors.error('Failed') : colors.dim('Done'))
        return reply
    } catch (error) {
        spinner.stop(colors.error('Failed'))
        throw error
    } finally {
        progress.dispose()
    }
}

export async function startREPL(container: Container, version: string): Promise<void> {
    const status = container.capabilities.status()
    const stats = container.contextStore.stats()

    console.log(banner(version))
    if (stats.totalTurns > 0) console.log(colors.dim(`Loaded ${stats.totalTurns} previous conversation turns`))
    if (status.state === 'ready') {
        console.log(colors.success(`Remote tools ready: ${status.count} from ${status.baseURL}`))
    } else {
        console.log(colors.warn('Remote tools unavailable, running with local tools only (try /refresh)'))
    }
    console.log(colors.dim('Type /help for commands, /exit to quit\n'))

    const input = createLineReader(getSlashCommands().map((c) => c.name))
    const onDue = (data: EventMap['reminder:due']) => {
        input.print(formatReminderAlert(data.reminder, new Date(data.firedAt)))
    }
    container.eventBus.on('reminder:due', onDue)

    try {
        while (true) {
            const line = await input.read()
            if (line === null) break

            const text = line.trim()
            if (!text) continue
            if (EXIT_WORDS.includes(text.toLowerCase())) break

            try {
                if (text.startsWith('/')) {
                    const result = await handleSlashCommand(text, container)
                    console.log(result ?? formatError(`Unknown command: ${text}`))
                    continue
                }

                const reply = await ask(container, text)
                console.log(`${formatReply(reply)}\n`)
            } catch (error) {
                console.log(formatError(errorMessage(error)))
            }
        }
    } finally {
        container.eventBus.off('reminder:due', onDue)
        input.close()
    }

    console.log(colors.dim("Goodbye! I'll remember our conversation."))
}
