import { errorMessage, isConnectionError, isTimeoutError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { err, ok, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import { invocationStyle, type ParsedListing, parseCapabilityListing } from './descriptor.js'
import { formatInvocationResponse } from './response-format.js'
import type {
    CapabilityDescriptor,
    CapabilityRegistryOptions,
    CapabilityRegistryState,
    CapabilityStatus,
    DiscoveryFailure,
    DiscoverySummary,
    InvocationOutcome,
} from './types.js'

export type DiscoveryResult = Result<DiscoverySummary, DiscoveryFailure>

function appendQuery(url: URL, args: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(args)) {
        if (value === undefined || value === null) continue
        const values = Array.isArray(value) ? value : [value]
        for (const v of values) {
            url.searchParams.append(key, typeof v === 'object' && v !== null ? JSON.stringify(v) : String(v))
        }
    }
}

function seconds(ms: number): number {
    return Math.round(ms / 1000)
}

/**
 * Remote capabilities declared by a tools server. The descriptor set only
 * changes on a successful discovery and is swapped in one assignment; every
 * network call is bounded by its own timeout.
 */
export class CapabilityRegistry {
    private descriptors = new Map<string, CapabilityDescriptor>()
    private state: CapabilityRegistryState = 'uninitialized'
    private inflight: Promise<DiscoveryResult> | null = null

    constructor(
        private options: CapabilityRegistryOptions,
        private logger: Logger,
        private eventBus?: TypedEventEmitter
    ) {}

    async healthCheck(): Promise<boolean> {
        let alive = false
        try {
            const response = await fetch(`${this.options.baseURL}/health`, {
                signal: AbortSignal.timeout(this.options.healthTimeoutMs),
            })
            alive = response.status === 200
        } catch (error) {
            this.logger.debug({ error: errorMessage(error) }, 'Health check failed')
        }

        if (this.state === 'ready' || this.state === 'unavailable') {
            this.setState(alive ? 'ready' : 'unavailable')
        }
        return alive
    }

    /** Concurrent callers share one in-flight discovery. */
    discover(): Promise<DiscoveryResult> {
        if (!this.inflight) {
            this.inflight = this.runDiscovery().finally(() => {
                this.inflight = null
            })
        }
        return this.inflight
    }

    /** Health probe first, then discovery only when the server answers. */
    async refresh(): Promise<DiscoveryResult> {
        const alive = await this.healthCheck()
        if (!alive) {
            this.setState('unavailable')
            return err({ kind: 'connection', message: `Remote capability server at ${this.options.baseURL} is not reachable` })
        }
        return this.discover()
    }

    async invoke(name: string, args: Record<string, unknown> = {}): Promise<InvocationOutcome> {
        const descriptor = this.descriptors.get(name)
        if (!descriptor) {
            return { name, status: 'not_found', text: `Capability '${name}' not found` }
        }

        const started = Date.now()
        const outcome = await this.request(descriptor, args)
        this.logger.debug({ name, status: outcome.status }, 'capability:invoked')
        this.eventBus?.emit('capability:invoked', { name, status: outcome.status, duration: Date.now() - started })
        return outcome
    }

    listDescriptors(): Record<string, string> {
        const listing: Record<string, string> = {}
        for (const d of this.descriptors.values()) listing[d.name] = d.description
        return listing
    }

    list(): CapabilityDescriptor[] {
        return [...this.descriptors.values()]
    }

    get(name: string): CapabilityDescriptor | undefined {
        return this.descriptors.get(name)
    }

    getState(): CapabilityRegistryState {
        return this.state
    }

    status(): CapabilityStatus {
        return { state: this.state, count: this.descriptors.size, baseURL: this.options.baseURL }
    }

    private async runDiscovery(): Promise<DiscoveryResult> {
        this.setState('discovering')
        const result = await this.fetchListing()

        if (!result.ok) {
            this.logger.warn({ kind: result.error.kind }, `Capability discovery failed: ${result.error.message}`)
            this.setState('unavailable')
            return result
        }

        const { descriptors, skipped } = result.value
        for (const entry of skipped) {
            this.logger.warn({ index: entry.index, name: entry.name }, `Skipping capability entry: ${entry.reason}`)
        }

        if (descriptors.length === 0) {
            this.setState('unavailable')
            return err({ kind: 'empty', message: 'Discovery returned no valid capabilities' })
        }

        this.descriptors = new Map(descriptors.map((d) => [d.name, d]))
        this.setState('ready')
        this.logger.info({ count: descriptors.length, skipped: skipped.length }, 'Remote capabilities registered')
        return ok({ registered: descriptors.length, skipped })
    }

    private async fetchListing(): Promise<Result<ParsedListing, DiscoveryFailure>> {
        const url = `${this.options.baseURL}${this.options.discoveryPath}`
        let response: Response
        try {
            response = await fetch(url, { signal: AbortSignal.timeout(this.options.discoveryTimeoutMs) })
        } catch (error) {
            if (isTimeoutError(error)) {
                return err({ kind: 'timeout', message: `Timed out after ${seconds(this.options.discoveryTimeoutMs)} seconds` })
            }
            if (isConnectionError(error)) {
                return err({ kind: 'connection', message: `Could not connect to ${this.options.baseURL}` })
            }
            return err({ kind: 'connection', message: errorMessage(error) })
        }

        if (response.status !== 200) {
            return err({ kind: 'http', message: `HTTP ${response.status}` })
        }

        let body: unknown
        try {
            body = await response.json()
        } catch (error) {
            if (isTimeoutError(error)) {
                return err({ kind: 'timeout', message: `Timed out after ${seconds(this.options.discoveryTimeoutMs)} seconds` })
            }
            return err({ kind: 'malformed', message: 'Discovery response is not valid JSON' })
        }

        const listing = parseCapabilityListing(body)
        if (!listing.ok) return err({ kind: 'malformed', message: listing.error })
        return listing
    }

    private async request(descriptor: CapabilityDescriptor, args: Record<string, unknown>): Promise<InvocationOutcome> {
        const { name } = descriptor
        const url = new URL(`${this.options.baseURL}${descriptor.endpoint}`)
        const init: RequestInit = {
            method: descriptor.method,
            signal: AbortSignal.timeout(this.options.invokeTimeoutMs),
        }

        if (invocationStyle(descriptor.method) === 'read') {
            appendQuery(url, args)
        } else {
            init.headers = { 'Content-Type': 'application/json' }
            init.body = JSON.stringify(args)
        }

        try {
            const response = await fetch(url, init)
            const text = await response.text()

            if (!response.ok) {
                return {
                    name,
                    status: 'http_error',
                    text: `${name} failed with HTTP ${response.status}: ${text}`,
                    httpStatus: response.status,
                }
            }

            let body: unknown
            try {
                body = JSON.parse(text)
            } catch {
                return { name, status: 'success', text: `${name} completed successfully:\n${text}`, httpStatus: response.status }
            }
            return { name, ...formatInvocationResponse(name, body), httpStatus: response.status }
        } catch (error) {
            if (isTimeoutError(error)) {
                return { name, status: 'timeout', text: `${name} timed out after ${seconds(this.options.invokeTimeoutMs)} seconds` }
            }
            if (isConnectionError(error)) {
                return { name, status: 'connection_error', text: `Could not connect to remote service for ${name}` }
            }
            return { name, status: 'error', text: `Error invoking ${name}: ${errorMessage(error)}` }
        }
    }

    private setState(next: CapabilityRegistryState): void {
        if (next === this.state) return
        this.state = next
        this.eventBus?.emit('capabilities:status', { state: next, count: this.descriptors.size })
    }
}
