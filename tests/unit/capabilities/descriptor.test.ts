import { describe, expect, it } from 'vitest'
import { invocationStyle, parseCapabilityListing } from '../../../src/capabilities/descriptor.js'

describe('parseCapabilityListing', () => {
    it('parses valid entries and normalizes the method', () => {
        const result = parseCapabilityListing({
            tools: [
                { name: 'get_weather', description: 'Weather by city', endpoint: '/weather', method: 'get' },
                { name: ' add_note ', endpoint: '/notes', method: 'Post' },
            ],
        })

        expect(result.ok).toBe(true)
        if (!result.ok) return
        expect(result.value.skipped).toEqual([])
        expect(result.value.descriptors).toEqual([
            { name: 'get_weather', description: 'Weather by city', endpoint: '/weather', method: 'GET' },
            { name: 'add_note', description: '', endpoint: '/notes', method: 'POST' },
        ])
    })

    it('skips invalid entries and reports why', () => {
        const result = parseCapabilityListing({
            tools: [
                { name: 'ok', endpoint: '/ok', method: 'GET' },
                { name: '', endpoint: '/x', method: 'GET' },
                { name: 'bad_endpoint', endpoint: 'x', method: 'GET' },
                { name: 'bad_method', endpoint: '/x', method: 'TRACE' },
                'not an object',
            ],
        })

        expect(result.ok).toBe(true)
        if (!result.ok) return
        expect(result.value.descriptors.map((d) => d.name)).toEqual(['ok'])
        expect(result.value.skipped.map((s) => [s.index, s.name])).toEqual([
            [1, undefined],
            [2, 'bad_endpoint'],
            [3, 'bad_method'],
            [4, undefined],
        ])
        expect(result.value.skipped[1]?.reason).toBe('endpoint: endpoint must be a path starting with "/"')
    })

    it('keeps the first of duplicate names', () => {
        const result = parseCapabilityListing({
            tools: [
                { name: 'dup', endpoint: '/a', method: 'GET' },
                { name: 'dup', endpoint: '/b', method: 'POST' },
            ],
        })

        expect(result.ok).toBe(true)
        if (!result.ok) return
        expect(result.value.descriptors).toHaveLength(1)
        expect(result.value.descriptors[0]?.endpoint).toBe('/a')
        expect(result.value.skipped).toEqual([{ index: 1, name: 'dup', reason: 'duplicate name' }])
    })

    it('rejects bodies without a tools list', () => {
        expect(parseCapabilityListing([])).toEqual({ ok: false, error: 'discovery response is not a JSON object' })
        expect(parseCapabilityListing({ tools: 'nope' })).toEqual({ ok: false, error: 'discovery response has no "tools" list' })
    })

    it('returns frozen descriptors', () => {
        const result = parseCapabilityListing({ tools: [{ name: 'a', endpoint: '/a', method: 'GET' }] })
        if (!result.ok) throw new Error(result.error)
        expect(Object.isFrozen(result.value.descriptors[0])).toBe(true)
    })
})

describe('invocationStyle', () => {
    it('sends GET and DELETE arguments as query parameters', () => {
        expect(invocationStyle('GET')).toBe('read')
        expect(invocationStyle('DELETE')).toBe('read')
    })

    it('sends POST, PUT and PATCH arguments as a JSON body', () => {
        expect(invocationStyle('POST')).toBe('write')
        expect(invocationStyle('PUT')).toBe('write')
        expect(invocationStyle('PATCH')).toBe('write')
    })
})
