import type { Container } from '../../core/container.js'
import { formatReminderTime } from '../../reminders/service.js'
import { colors, formatError } from '../ui.js'

export interface AddReminderOptions {
    at: string
    description?: string
}

export async function addReminderCommand(container: Container, task: string, options: AddReminderOptions): Promise<boolean> {
    const result = await container.reminders.create({ task, when: options.at, description: options.description })
    if (!result.ok) {
        console.error(formatError(result.error))
        return false
    }
    console.log(colors.success(`Reminder ${result.value.id} set for ${formatReminderTime(result.value.fire_at)}: ${result.value.task}`))
    return true
}

export async function listRemindersCommand(container: Container): Promise<boolean> {
    const result = await container.reminders.listActive()
    if (!result.ok) {
        console.error(formatError(result.error))
        return false
    }
    if (result.value.length === 0) {
        console.log(colors.dim('No active reminders.'))
        return true
    }
    for (const r of result.value) {
        const state = r.notified ? colors.dim(' (notified)') : ''
        console.log(`  ${String(r.id).padStart(3)}  ${formatReminderTime(r.fire_at)}  ${r.task}${state}`)
        if (r.description) console.log(colors.dim(`       ${r.description}`))
    }
    return true
}

export async function completeReminderCommand(container: Container, rawId: string): Promise<boolean> {
    const id = Number(rawId)
    if (!Number.isInteger(id) || id <= 0) {
        console.error(formatError(`Invalid reminder id: ${rawId}`))
        return false
    }
    const result = await container.reminders.complete(id)
    if (!result.ok) {
        console.error(formatError(result.error))
        return false
    }
    console.log(colors.success(`Reminder ${id} marked as done.`))
    return true
}
