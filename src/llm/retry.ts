import { classifyError } from '../core/errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
    onRetry?: (attempt: number, error: unknown, delay: number) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 1000,
    maxDelay: 30000,
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Retries transient failures with jittered exponential backoff; permanent ones rethrow at once. */
export async function withRetry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
    const opts = { ...DEFAULT_RETRY_OPTIONS, ...options }
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (classifyError(error) === 'permanent' || attempt >= opts.maxRetries) {
                throw error
            }
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            const jittered = delay + delay * 0.1 * Math.random()
            opts.onRetry?.(attempt + 1, error, jittered)
            await sleep(jittered)
        }
    }
}

type CircuitState = 'closed' | 'open' | 'half_open'

export class CircuitBreaker {
    private state: CircuitState = 'closed'
    private failures = 0
    private lastFailure = 0

    constructor(
        private threshold: number = 5,
        private cooldownMs: number = 30000
    ) {}

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (this.state === 'open') {
            if (Date.now() - this.lastFailure > this.cooldownMs) {
                this.state = 'half_open'
            } else {
                throw new Error('Circuit breaker is open')
            }
        }

        try {
            const result = await fn()
            this.onSuccess()
            return result
        } catch (error) {
            this.onFailure()
            throw error
        }
    }

    private onSuccess(): void {
        this.failures = 0
        this.state = 'closed'
    }

    private onFailure(): void {
        this.failures++
        this.lastFailure = Date.now()
        // a failed probe while half open re-opens immediately
        if (this.state === 'half_open' || this.failures >= this.threshold) {
            this.state = 'open'
        }
    }

    getState(): CircuitState {
        return this.state
    }
}
