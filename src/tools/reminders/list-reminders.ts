import { z } from 'zod'
import type { ReminderService } from '../../reminders/service.js'
import { formatReminderTime } from '../../reminders/service.js'
import type { Tool } from '../types.js'

const ListRemindersInput = z.object({})

type ListRemindersInput = z.infer<typeof ListRemindersInput>

export function listRemindersTool(reminders: ReminderService): Tool<ListRemindersInput> {
    return {
        name: 'list_reminders',
        description: 'List all reminders that are not completed yet',
        parameters: ListRemindersInput,
        source: 'local',
        async execute() {
            const result = await reminders.listActive()
            if (!result.ok) return result.error
            if (result.value.length === 0) return 'No active reminders found.'

            const lines = result.value.map((r) => `  ${r.id}. ${r.task} - ${formatReminderTime(r.fire_at)}${r.notified ? ' (notified)' : ''}`)
            return `Active reminders:\n${lines.join('\n')}`
        },
    }
}
