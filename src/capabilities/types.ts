export const READ_METHODS = ['GET', 'DELETE'] as const
export const WRITE_METHODS = ['POST', 'PUT', 'PATCH'] as const

export type CapabilityMethod = (typeof READ_METHODS)[number] | (typeof WRITE_METHODS)[number]

/** Read-style calls carry arguments as query parameters, write-style as a JSON body. */
export type InvocationStyle = 'read' | 'write'

export interface CapabilityDescriptor {
    readonly name: string
    readonly description: string
    readonly endpoint: string
    readonly method: CapabilityMethod
}

export type CapabilityRegistryState = 'uninitialized' | 'discovering' | 'ready' | 'unavailable'

export type DiscoveryFailureKind = 'timeout' | 'connection' | 'http' | 'malformed' | 'empty'

export interface DiscoveryFailure {
    kind: DiscoveryFailureKind
    message: string
}

export interface SkippedEntry {
    index: number
    name?: string
    reason: string
}

export interface DiscoverySummary {
    registered: number
    skipped: SkippedEntry[]
}

export type InvocationStatus =
    | 'success'
    | 'not_found'
    | 'application_error'
    | 'http_error'
    | 'timeout'
    | 'connection_error'
    | 'error'

export interface InvocationOutcome {
    name: string
    status: InvocationStatus
    text: string
    httpStatus?: number
}

export interface CapabilityRegistryOptions {
    baseURL: string
    discoveryPath: string
    healthTimeoutMs: number
    discoveryTimeoutMs: number
    invokeTimeoutMs: number
}

export interface CapabilityStatus {
    state: CapabilityRegistryState
    count: number
    baseURL: string
}
