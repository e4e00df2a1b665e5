import type { CapabilityRegistryState } from '../capabilities/types.js'
import type { Obligation } from '../reminders/types.js'
import type { ToolSource } from '../tools/types.js'

export type AssistantState = 'idle' | 'listening' | 'processing' | 'speaking'

export type EventMap = {
    'assistant:state': { state: AssistantState }
    'reminder:due': { reminder: Obligation; firedAt: string }
    'capabilities:status': { state: CapabilityRegistryState; count: number }
    'capability:invoked': { name: string; status: string; duration: number }
    'tool:before': { toolName: string; source: ToolSource }
    'context:saved': { turns: number; path: string }
}

type EventHandler<T> = (data: T) => void

export type ListenerErrorHandler = (event: keyof EventMap, error: unknown) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<unknown>>>()

    constructor(private onListenerError?: ListenerErrorHandler) {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler as EventHandler<unknown>)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler as EventHandler<unknown>)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch (error) {
                // a failing listener must not break the emitter's caller
                this.onListenerError?.(event, error)
            }
        }
    }

    listenerCount(event: keyof EventMap): number {
        return this.handlers.get(event)?.size ?? 0
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
