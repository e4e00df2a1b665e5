import { errorMessage } from '../core/errors.js'
import { err, ok, type Result } from '../core/result.js'
import { formatLocalDateTime } from '../core/time.js'
import type { Logger } from '../logger/index.js'
import type { ReminderStore } from './store.js'
import { parseReminderTime } from './time-parser.js'
import type { NewReminder, Obligation } from './types.js'

/** User-facing reminder operations; failures come back as messages, never throws. */
export class ReminderService {
    constructor(
        private store: ReminderStore,
        private logger: Logger,
        private now: () => Date = () => new Date()
    ) {}

    async create(input: NewReminder): Promise<Result<Obligation>> {
        const task = input.task.trim()
        if (!task) return err('A reminder needs a task')

        const now = this.now()
        const fireAt = parseReminderTime(input.when, now)
        if (!fireAt.ok) return fireAt

        try {
            const reminder = await this.store.create({ task, description: input.description?.trim() ?? '', fireAt: fireAt.value }, now)
            this.logger.info({ id: reminder.id, fireAt: reminder.fire_at }, 'Reminder created')
            return ok(reminder)
        } catch (error) {
            this.logger.warn({ error }, 'Failed to store reminder')
            return err(`Could not save the reminder: ${errorMessage(error)}`)
        }
    }

    async listActive(): Promise<Result<Obligation[]>> {
        try {
            const all = await this.store.list()
            return ok(all.filter((r) => !r.completed))
        } catch (error) {
            return err(`Could not read reminders: ${errorMessage(error)}`)
        }
    }

    async complete(id: number): Promise<Result<Obligation>> {
        try {
            const reminder = await this.store.complete(id)
            if (!reminder) return err(`Reminder ${id} not found`)
            return ok(reminder)
        } catch (error) {
            return err(`Could not update reminder ${id}: ${errorMessage(error)}`)
        }
    }
}

/** Local `YYYY-MM-DD HH:MM`, the shape users type reminders in. */
export function formatReminderTime(iso: string): string {
    const date = new Date(iso)
    return Number.isNaN(date.getTime()) ? iso : formatLocalDateTime(date)
}
