import { describe, expect, it, vi } from 'vitest'
import { createProgressTracker, toolLabel } from '../../../src/cli/progress.js'
import { TypedEventEmitter } from '../../../src/core/events.js'

describe('toolLabel', () => {
    it('uses a friendly label for built-in tools', () => {
        expect(toolLabel('create_reminder', 'local')).toBe('Scheduling reminder...')
    })

    it('falls back to the tool name', () => {
        expect(toolLabel('get_weather', 'remote')).toBe('Calling remote get_weather...')
        expect(toolLabel('custom', 'local')).toBe('Running custom...')
    })
})

describe('createProgressTracker', () => {
    it('updates the spinner until disposed', () => {
        const bus = new TypedEventEmitter()
        const spinner = { message: vi.fn() }
        const tracker = createProgressTracker(bus, spinner)

        bus.emit('tool:before', { toolName: 'list_reminders', source: 'local' })
        expect(spinner.message).toHaveBeenCalledWith('Checking reminders...')

        tracker.dispose()
        bus.emit('tool:before', { toolName: 'get_weather', source: 'remote' })
        expect(spinner.message).toHaveBeenCalledTimes(1)
        expect(bus.listenerCount('tool:before')).toBe(0)
    })
})
