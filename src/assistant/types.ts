/** Everything the core hands a reasoning engine for one user input. */
export interface ReasoningRequest {
    contextSummary: string
    relevantContext: string
    /** Invocable capability name to description, local and remote together. */
    capabilities: Record<string, string>
    userInput: string
}

/**
 * Pluggable natural-language back end. The core never looks inside; it only
 * supplies context and receives the reply text.
 */
export interface ReasoningEngine {
    respond(request: ReasoningRequest): Promise<string>
}

export interface ToolStatusReport {
    localTools: number
    remoteTools: number
    serverConnected: boolean
    totalTools: number
}

export type ReplySource = 'system' | 'engine' | 'error'

export interface AssistantReply {
    text: string
    source: ReplySource
}
