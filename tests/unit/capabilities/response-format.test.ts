import { describe, expect, it } from 'vitest'
import { formatInvocationResponse } from '../../../src/capabilities/response-format.js'

describe('formatInvocationResponse', () => {
    it('frames a success envelope with message and data', () => {
        expect(formatInvocationResponse('get_weather', { success: true, message: 'Found it', data: { temp: 21 } })).toEqual({
            status: 'success',
            text: 'get_weather completed successfully\nMessage: Found it\nData: {\n  "temp": 21\n}',
        })
    })

    it('omits empty message and data', () => {
        expect(formatInvocationResponse('ping', { success: true, message: '', data: [] })).toEqual({
            status: 'success',
            text: 'ping completed successfully',
        })
    })

    it('reports a failed envelope', () => {
        expect(formatInvocationResponse('add_note', { success: false, error: 'Quota exceeded' })).toEqual({
            status: 'application_error',
            text: 'add_note failed: Quota exceeded',
        })
        expect(formatInvocationResponse('add_note', { success: false })).toEqual({
            status: 'application_error',
            text: 'add_note failed: Unknown error',
        })
    })

    it('reports a bare error object', () => {
        expect(formatInvocationResponse('lookup', { error: 'Not allowed' })).toEqual({
            status: 'application_error',
            text: 'lookup error: Not allowed',
        })
    })

    it('lists the fields of any other object', () => {
        expect(formatInvocationResponse('lookup', { city: 'Oslo', tags: ['cold'] })).toEqual({
            status: 'success',
            text: 'lookup response:\ncity: Oslo\ntags: [\n  "cold"\n]',
        })
    })

    it('frames scalar results', () => {
        expect(formatInvocationResponse('count', 42)).toEqual({ status: 'success', text: 'count result: 42' })
        expect(formatInvocationResponse('echo', 'hi')).toEqual({ status: 'success', text: 'echo result: hi' })
    })
})
