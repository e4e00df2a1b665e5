import { isRecord } from '../core/guards.js'
import type { InvocationStatus } from './types.js'

export interface FormattedResponse {
    status: InvocationStatus
    text: string
}

function isPresent(value: unknown): boolean {
    if (value === undefined || value === null || value === '') return false
    if (Array.isArray(value)) return value.length > 0
    if (isRecord(value)) return Object.keys(value).length > 0
    return true
}

function render(value: unknown): string {
    if (typeof value === 'string') return value
    if (typeof value === 'object' && value !== null) return JSON.stringify(value, null, 2)
    return String(value)
}

/** Frames a parsed 2xx JSON body as text the reasoning engine can relay. */
export function formatInvocationResponse(name: string, body: unknown): FormattedResponse {
    if (!isRecord(body)) {
        return { status: 'success', text: `${name} result: ${render(body)}` }
    }

    if ('success' in body) {
        if (body.success === true) {
            let text = `${name} completed successfully`
            if (isPresent(body.message)) text += `\nMessage: ${render(body.message)}`
            if (isPresent(body.data)) text += `\nData: ${render(body.data)}`
            return { status: 'success', text }
        }
        const error = isPresent(body.error) ? render(body.error) : 'Unknown error'
        return { status: 'application_error', text: `${name} failed: ${error}` }
    }

    if ('error' in body) {
        return { status: 'application_error', text: `${name} error: ${render(body.error)}` }
    }

    const lines = Object.entries(body).map(([key, value]) => `${key}: ${render(value)}`)
    return { status: 'success', text: [`${name} response:`, ...lines].join('\n') }
}
