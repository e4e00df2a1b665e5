import type { Container } from '../../core/container.js'
import { formatContextStats } from '../../tools/context/context-stats.js'
import { confirmAction } from '../prompts.js'
import { colors, formatError } from '../ui.js'

export async function contextStatsCommand(container: Container): Promise<boolean> {
    console.log(formatContextStats(container.contextStore.stats()))
    return true
}

export async function contextClearCommand(container: Container): Promise<boolean> {
    container.contextStore.clearSession()
    if (!(await container.contextStore.save())) {
        console.error(formatError(`Could not write ${container.config.context.file}`))
        return false
    }
    console.log(colors.success('Conversation history cleared; profile kept.'))
    return true
}

export async function contextResetCommand(container: Container, options: { yes?: boolean }): Promise<boolean> {
    if (!options.yes && !(await confirmAction('Erase all conversation memory and the user profile?'))) {
        console.log(colors.dim('Cancelled.'))
        return true
    }
    if (!(await container.contextStore.resetAll())) {
        console.error(formatError(`Could not write ${container.config.context.file}`))
        return false
    }
    console.log(colors.success('Context memory wiped.'))
    return true
}
