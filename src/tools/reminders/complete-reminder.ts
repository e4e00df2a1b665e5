import { z } from 'zod'
import type { ReminderService } from '../../reminders/service.js'
import type { Tool } from '../types.js'

const CompleteReminderInput = z.object({
    id: z.coerce.number().int().positive().describe('Id of the reminder, as shown by list_reminders'),
})

type CompleteReminderInput = z.infer<typeof CompleteReminderInput>

export function completeReminderTool(reminders: ReminderService): Tool<CompleteReminderInput> {
    return {
        name: 'complete_reminder',
        description: 'Mark a reminder as done so it no longer shows up or fires',
        parameters: CompleteReminderInput,
        source: 'local',
        async execute(input) {
            const result = await reminders.complete(input.id)
            return result.ok ? `Reminder ${result.value.id} marked as done: '${result.value.task}'` : result.error
        },
    }
}
