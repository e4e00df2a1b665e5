import pino from 'pino'
import { describe, expect, it } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { ReminderService, formatReminderTime } from '../../../src/reminders/service.js'
import { ReminderStore } from '../../../src/reminders/store.js'

const logger = pino({ level: 'silent' })
const FILE = '/data/reminders.json'
const NOW = new Date(2025, 5, 1, 10, 0, 0)

function createService() {
    const fs = new MockFileSystem()
    const store = new ReminderStore(FILE, fs, logger)
    return { service: new ReminderService(store, logger, () => NOW), store, fs }
}

describe('ReminderService', () => {
    it('creates a reminder from a natural time expression', async () => {
        const { service } = createService()
        const result = await service.create({ task: '  Call mom ', when: 'in 5 minutes', description: ' weekly ' })

        expect(result.ok).toBe(true)
        if (!result.ok) return
        expect(result.value).toMatchObject({ id: 1, task: 'Call mom', description: 'weekly', completed: false, notified: false })
        expect(Date.parse(result.value.fire_at)).toBe(NOW.getTime() + 300_000)
    })

    it('rejects a blank task', async () => {
        const { service } = createService()
        expect(await service.create({ task: '   ', when: 'in 5 minutes' })).toEqual({ ok: false, error: 'A reminder needs a task' })
    })

    it('rejects an unparseable time without storing anything', async () => {
        const { service, fs } = createService()
        const result = await service.create({ task: 'x', when: 'someday' })

        expect(result).toEqual({ ok: false, error: 'Could not parse the time for the reminder: "someday"' })
        expect(fs.getFiles().size).toBe(0)
    })

    it('reports storage failures as a message', async () => {
        const { service, fs } = createService()
        fs.setWriteFailure(new Error('disk full'))

        expect(await service.create({ task: 'x', when: 'in 1 hour' })).toEqual({
            ok: false,
            error: 'Could not save the reminder: disk full',
        })
    })

    it('lists only reminders that are not completed', async () => {
        const { service } = createService()
        await service.create({ task: 'first', when: 'in 1 hour' })
        await service.create({ task: 'second', when: 'in 2 hours' })
        await service.complete(1)

        const result = await service.listActive()
        expect(result.ok && result.value.map((r) => r.task)).toEqual(['second'])
    })

    it('reports an unreadable store when listing', async () => {
        const { service, fs } = createService()
        fs.setFile(FILE, 'nope')

        const result = await service.listActive()
        expect(result.ok).toBe(false)
        if (result.ok) return
        expect(result.error).toMatch(/^Could not read reminders: Reminder file \/data\/reminders.json is unreadable/)
    })

    it('completes a reminder and reports unknown ids', async () => {
        const { service } = createService()
        await service.create({ task: 'first', when: 'in 1 hour' })

        const done = await service.complete(1)
        expect(done.ok && done.value.completed).toBe(true)
        expect(await service.complete(9)).toEqual({ ok: false, error: 'Reminder 9 not found' })
    })
})

describe('formatReminderTime', () => {
    it('renders an instant as local date and minutes', () => {
        expect(formatReminderTime(new Date(2025, 11, 24, 18, 5, 30).toISOString())).toBe('2025-12-24 18:05')
    })

    it('passes through text that is not a date', () => {
        expect(formatReminderTime('whenever')).toBe('whenever')
    })
})
