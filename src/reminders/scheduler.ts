import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { ReminderStore } from './store.js'
import type { Obligation, SchedulerOptions } from './types.js'

/**
 * Background watcher for due reminders. Each cycle rereads the store, since
 * other sessions may have changed it, and fires a reminder only while
 * `0 <= now - fire_at <= firingWindowMs`. A reminder whose window passed while
 * nothing was running stays unnotified and is never fired.
 */
export class ReminderScheduler {
    private timer: NodeJS.Timeout | null = null
    private active = false
    private ticking = false
    private generation = 0

    constructor(
        private store: ReminderStore,
        private eventBus: TypedEventEmitter,
        private logger: Logger,
        private options: SchedulerOptions,
        private now: () => Date = () => new Date()
    ) {}

    /** Runs one cycle right away, then every `intervalMs`. Calling it again is a no-op. */
    start(): void {
        if (this.active) return
        this.active = true
        this.generation++
        this.logger.debug({ intervalMs: this.options.intervalMs }, 'Reminder scheduler started')
        void this.cycle(this.generation)
    }

    /** Cancels the pending cycle; a cycle already running finishes its scan. */
    stop(): void {
        if (!this.active) return
        this.active = false
        if (this.timer) {
            clearTimeout(this.timer)
            this.timer = null
        }
        this.logger.debug('Reminder scheduler stopped')
    }

    isRunning(): boolean {
        return this.active
    }

    /** Fires every reminder inside its window; returns the ones fired by this call. */
    async tick(): Promise<Obligation[]> {
        if (this.ticking) return []
        this.ticking = true

        try {
            const reminders = await this.store.list()
            const now = this.now()
            const fired: Obligation[] = []

            for (const reminder of reminders) {
                if (reminder.completed || reminder.notified) continue

                const due = Date.parse(reminder.fire_at)
                if (Number.isNaN(due)) {
                    this.logger.warn({ id: reminder.id, fireAt: reminder.fire_at }, 'Reminder has an invalid fire time')
                    continue
                }

                const elapsed = now.getTime() - due
                if (elapsed < 0 || elapsed > this.options.firingWindowMs) continue

                // persisted before announcing: a crash here loses a notification, never repeats one
                if (!(await this.store.markNotified(reminder.id))) continue

                const notified = { ...reminder, notified: true }
                fired.push(notified)
                this.logger.info({ id: reminder.id, task: reminder.task }, 'Reminder due')
                this.eventBus.emit('reminder:due', { reminder: notified, firedAt: now.toISOString() })
            }

            return fired
        } finally {
            this.ticking = false
        }
    }

    private async cycle(generation: number): Promise<void> {
        let delay = this.options.intervalMs
        try {
            await this.tick()
        } catch (error) {
            delay = this.options.backoffMs
            this.logger.error({ error: errorMessage(error) }, 'Reminder scheduler cycle failed, backing off')
        }

        // a stop() followed by start() during the await begins a new chain
        if (!this.active || generation !== this.generation) return
        this.timer = setTimeout(() => {
            void this.cycle(generation)
        }, delay)
        this.timer.unref()
    }
}
