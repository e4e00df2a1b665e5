export type ErrorKind = 'transient' | 'permanent'

export class ConciergeError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ConciergeError'
        this.kind = kind
    }
}

export class TransientError extends ConciergeError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends ConciergeError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

/** Unrecoverable startup problem, e.g. a missing remote base URL. */
export class ConfigurationError extends PermanentError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ConfigurationError'
    }
}

export class ReminderStoreError extends TransientError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ReminderStoreError'
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

/** `AbortSignal.timeout()` rejects fetch with a DOMException named TimeoutError. */
export function isTimeoutError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'TimeoutError') return true
    if (error instanceof Error && error.name === 'TimeoutError') return true
    return false
}

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN'])

function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined
    return typeof error.code === 'string' ? error.code : undefined
}

export function isConnectionError(error: unknown): boolean {
    if (!(error instanceof Error)) return false
    const code = errorCode(error) ?? errorCode(error.cause)
    if (code && CONNECTION_CODES.has(code)) return true
    // undici reports every network-level failure as `TypeError: fetch failed`
    return error instanceof TypeError && error.message.includes('fetch')
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof ConciergeError) return error.kind
    if (isTimeoutError(error) || isConnectionError(error)) return 'transient'
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return classifyHttpError(error.status)
    }
    return 'permanent'
}
