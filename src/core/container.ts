import { LLMReasoningEngine } from '../assistant/llm-engine.js'
import { Assistant } from '../assistant/assistant.js'
import type { ReasoningEngine } from '../assistant/types.js'
import { CapabilityRegistry } from '../capabilities/registry.js'
import type { ResolvedConfig } from '../config/schema.js'
import { createLLMClient } from '../llm/client.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { ContextStore } from '../memory/context-store.js'
import { ReminderScheduler } from '../reminders/scheduler.js'
import { ReminderService } from '../reminders/service.js'
import { ReminderStore } from '../reminders/store.js'
import { ToolExecutor } from '../tools/executor.js'
import type { ToolRegistry } from '../tools/registry.js'
import { createToolRegistry, syncRemoteTools } from '../tools/setup.js'
import { errorMessage } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    contextStore: ContextStore
    capabilities: CapabilityRegistry
    reminderStore: ReminderStore
    reminders: ReminderService
    scheduler: ReminderScheduler
    toolRegistry: ToolRegistry
    toolExecutor: ToolExecutor
    engine: ReasoningEngine
    assistant: Assistant
    initialize(options?: InitializeOptions): Promise<void>
    shutdown(options?: ShutdownOptions): Promise<void>
}

export interface ShutdownOptions {
    /** Persist context memory before tearing down. */
    save?: boolean
}

export interface InitializeOptions {
    /** Wipe persisted context before loading it. */
    fresh?: boolean
    /** Probe and discover remote capabilities. */
    discover?: boolean
    /** Start the background reminder watcher. */
    scheduler?: boolean
}

export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    llmClient?: LLMClient
    engine?: ReasoningEngine
    now?: () => Date
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const now = overrides.now ?? (() => new Date())
    const eventBus = new TypedEventEmitter((event, error) => {
        logger.warn({ event, error: errorMessage(error) }, 'Event listener failed')
    })
    const fs = overrides.fs ?? new NodeFileSystem()

    const contextStore = new ContextStore(
        {
            file: config.context.file,
            maxHistory: config.context.maxHistory,
            sessionWindow: config.context.sessionWindow,
            autosaveEvery: config.context.autosaveEvery,
            displayName: config.displayName,
        },
        fs,
        logger,
        eventBus,
        now
    )
    const capabilities = new CapabilityRegistry(config.remote, logger, eventBus)
    const reminderStore = new ReminderStore(config.reminders.file, fs, logger)
    const reminders = new ReminderService(reminderStore, logger, now)
    const scheduler = new ReminderScheduler(
        reminderStore,
        eventBus,
        logger,
        {
            intervalMs: config.reminders.intervalMs,
            backoffMs: config.reminders.backoffMs,
            firingWindowMs: config.reminders.firingWindowMs,
        },
        now
    )
    const toolRegistry = createToolRegistry({
        contextStore,
        reminders,
        capabilities,
        workspace: { fs, baseDir: config.projectDir },
        now,
    })
    const toolExecutor = new ToolExecutor(toolRegistry, logger, eventBus)
    const engine =
        overrides.engine ??
        new LLMReasoningEngine(overrides.llmClient ?? createLLMClient(config, logger), toolRegistry, toolExecutor, logger, {
            displayName: () => contextStore.getProfile().display_name,
        })
    const assistant = new Assistant(contextStore, capabilities, toolRegistry, engine, eventBus, logger)

    return {
        config,
        logger,
        eventBus,
        fs,
        contextStore,
        capabilities,
        reminderStore,
        reminders,
        scheduler,
        toolRegistry,
        toolExecutor,
        engine,
        assistant,

        async initialize(options: InitializeOptions = {}) {
            if (options.fresh) await contextStore.resetAll()
            await contextStore.load()
            if (config.displayNameExplicit) contextStore.setDisplayName(config.displayName)

            if (options.discover ?? true) {
                const result = await capabilities.refresh()
                const count = syncRemoteTools(toolRegistry, capabilities, logger)
                if (!result.ok) {
                    logger.info({ kind: result.error.kind }, 'Remote capabilities unavailable, running with local tools only')
                } else {
                    logger.debug({ count }, 'Remote tools bridged')
                }
            }

            if (options.scheduler ?? true) scheduler.start()
        },

        async shutdown(options: ShutdownOptions = {}) {
            scheduler.stop()
            if (options.save ?? true) {
                const saved = await contextStore.save()
                if (!saved) logger.warn('Context could not be saved during shutdown')
            }
            eventBus.removeAll()
        },
    }
}
