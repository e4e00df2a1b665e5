import { z } from 'zod'
import type { ReminderService } from '../../reminders/service.js'
import { formatReminderTime } from '../../reminders/service.js'
import type { Tool } from '../types.js'

const CreateReminderInput = z.object({
    task: z.string().describe('What to be reminded about'),
    datetime: z
        .string()
        .describe('When to fire: "in N seconds|minutes|hours", "today HH:MM", "tomorrow HH:MM" or "YYYY-MM-DD HH:MM"'),
    description: z.string().optional().describe('Optional longer note shown with the reminder'),
})

type CreateReminderInput = z.infer<typeof CreateReminderInput>

export function createReminderTool(reminders: ReminderService): Tool<CreateReminderInput> {
    return {
        name: 'create_reminder',
        description: 'Create a reminder that fires a notification at the given time',
        parameters: CreateReminderInput,
        source: 'local',
        async execute(input) {
            const result = await reminders.create({ task: input.task, when: input.datetime, description: input.description })
            if (!result.ok) return result.error
            const reminder = result.value
            return `Reminder ${reminder.id} created: '${reminder.task}' at ${formatReminderTime(reminder.fire_at)}`
        },
    }
}
