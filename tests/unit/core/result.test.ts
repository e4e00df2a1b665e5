import { describe, expect, it } from 'vitest'
import { parseCapabilityListing } from '../../../src/capabilities/descriptor.js'
import type { DiscoveryResult } from '../../../src/capabilities/registry.js'
import { err, ok, type Result } from '../../../src/core/result.js'
import { parseReminderTime } from '../../../src/reminders/time-parser.js'

describe('Result', () => {
    it('ok and err build the two variants', () => {
        expect(ok(42)).toEqual({ ok: true, value: 42 })
        expect(err('something failed')).toEqual({ ok: false, error: 'something failed' })
    })

    it('defaults the error to a message string', () => {
        const result: Result<Date> = parseReminderTime('someday', new Date(2025, 0, 1))
        if (result.ok) throw new Error('expected a failure')
        const message: string = result.error
        expect(message).toBe('Could not parse the time for the reminder: "someday"')
    })

    it('narrows a structured error by its kind', () => {
        const results: DiscoveryResult[] = [
            ok({ registered: 2, skipped: [] }),
            err({ kind: 'timeout', message: 'timed out after 5s' }),
            err({ kind: 'http', message: 'HTTP 503' }),
        ]
        const described = results.map((r) => (r.ok ? `found ${r.value.registered}` : `${r.error.kind}: ${r.error.message}`))
        expect(described).toEqual(['found 2', 'timeout: timed out after 5s', 'http: HTTP 503'])
    })

    it('carries partial success in the value', () => {
        const result = parseCapabilityListing({
            tools: [{ name: 'ok_tool', description: 'x', endpoint: '/ok', method: 'GET' }, { description: 'no name' }],
        })
        expect(result.ok).toBe(true)
        if (result.ok) {
            expect(result.value.descriptors.map((d) => d.name)).toEqual(['ok_tool'])
            expect(result.value.skipped).toHaveLength(1)
        }
    })
})
