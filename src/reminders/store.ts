import { z } from 'zod'
import { ReminderStoreError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { AsyncMutex } from '../core/mutex.js'
import type { Logger } from '../logger/index.js'
import type { Obligation } from './types.js'

const ObligationSchema = z.object({
    id: z.number().int().positive(),
    task: z.string(),
    description: z.string().default(''),
    fire_at: z.string(),
    created_at: z.string(),
    completed: z.boolean().default(false),
    notified: z.boolean().default(false),
})

const ObligationListSchema = z.array(ObligationSchema)

/**
 * JSON-array reminder file. Every mutation is a read-modify-write under one
 * mutex, so the scheduler's check-then-mark and a user completion of the same
 * reminder cannot interleave within this process. Reads always go to disk.
 */
export class ReminderStore {
    private lock = new AsyncMutex()

    constructor(
        private file: string,
        private fs: FileSystem,
        private logger: Logger
    ) {}

    /** Throws ReminderStoreError when the file exists but cannot be read or parsed. */
    async list(): Promise<Obligation[]> {
        if (!(await this.fs.exists(this.file))) return []

        let raw: unknown
        try {
            raw = await this.fs.readJSON(this.file)
        } catch (error) {
            throw new ReminderStoreError(`Reminder file ${this.file} is unreadable: ${errorMessage(error)}`, { cause: error })
        }

        const parsed = ObligationListSchema.safeParse(raw)
        if (!parsed.success) {
            throw new ReminderStoreError(`Reminder file ${this.file} is malformed: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
        }
        return parsed.data
    }

    async get(id: number): Promise<Obligation | undefined> {
        return (await this.list()).find((r) => r.id === id)
    }

    async create(input: { task: string; description: string; fireAt: Date }, now: Date): Promise<Obligation> {
        return this.transact((items) => {
            const nextId = items.reduce((max, r) => Math.max(max, r.id), 0) + 1
            const reminder: Obligation = {
                id: nextId,
                task: input.task,
                description: input.description,
                fire_at: input.fireAt.toISOString(),
                created_at: now.toISOString(),
                completed: false,
                notified: false,
            }
            items.push(reminder)
            return { result: reminder, changed: true }
        })
    }

    /**
     * Flips `notified` for a reminder that is still pending. Returns false when
     * it is gone, completed or was already notified by someone else.
     */
    async markNotified(id: number): Promise<boolean> {
        return this.transact((items) => {
            const reminder = items.find((r) => r.id === id)
            if (!reminder || reminder.completed || reminder.notified) return { result: false, changed: false }
            reminder.notified = true
            return { result: true, changed: true }
        })
    }

    async complete(id: number): Promise<Obligation | undefined> {
        return this.transact((items) => {
            const reminder = items.find((r) => r.id === id)
            if (!reminder) return { result: undefined, changed: false }
            if (reminder.completed) return { result: { ...reminder }, changed: false }
            reminder.completed = true
            return { result: { ...reminder }, changed: true }
        })
    }

    private async transact<T>(fn: (items: Obligation[]) => { result: T; changed: boolean }): Promise<T> {
        return this.lock.runExclusive(async () => {
            const items = await this.list()
            const { result, changed } = fn(items)
            if (changed) {
                await this.fs.writeJSON(this.file, items)
                this.logger.debug({ count: items.length }, 'Reminders saved')
            }
            return result
        })
    }
}
