import type { CapabilityRegistry } from '../capabilities/registry.js'
import { createCapabilityTool } from '../capabilities/tool-bridge.js'
import type { Logger } from '../logger/index.js'
import type { ContextStore } from '../memory/context-store.js'
import type { ReminderService } from '../reminders/service.js'
import { clearContextTool } from './context/clear-context.js'
import { contextStatsTool } from './context/context-stats.js'
import { saveContextTool } from './context/save-context.js'
import { createFileTool } from './filesystem/create-file.js'
import { createFolderTool } from './filesystem/create-folder.js'
import { listDirectoryTool } from './filesystem/list-directory.js'
import { readFileTool } from './filesystem/read-file.js'
import type { Workspace } from './filesystem/workspace.js'
import { writeFileTool } from './filesystem/write-file.js'
import { ToolRegistry } from './registry.js'
import { completeReminderTool } from './reminders/complete-reminder.js'
import { createReminderTool } from './reminders/create-reminder.js'
import { listRemindersTool } from './reminders/list-reminders.js'
import { currentTimeTool } from './system/current-time.js'
import { listToolsTool } from './system/list-tools.js'

export interface ToolDependencies {
    contextStore: ContextStore
    reminders: ReminderService
    capabilities: CapabilityRegistry
    workspace: Workspace
    now?: () => Date
}

export function createToolRegistry(deps: ToolDependencies): ToolRegistry {
    const registry = new ToolRegistry()

    registry.register(currentTimeTool(deps.now))
    registry.register(createReminderTool(deps.reminders))
    registry.register(listRemindersTool(deps.reminders))
    registry.register(completeReminderTool(deps.reminders))
    registry.register(saveContextTool(deps.contextStore))
    registry.register(clearContextTool(deps.contextStore))
    registry.register(contextStatsTool(deps.contextStore))
    registry.register(createFolderTool(deps.workspace))
    registry.register(createFileTool(deps.workspace))
    registry.register(writeFileTool(deps.workspace))
    registry.register(readFileTool(deps.workspace))
    registry.register(listDirectoryTool(deps.workspace))
    registry.register(listToolsTool(registry, deps.capabilities))

    return registry
}

/** Mirrors the capability registry's current descriptor set into the tool registry. */
export function syncRemoteTools(registry: ToolRegistry, capabilities: CapabilityRegistry, logger: Logger): number {
    const bridged = capabilities.list().map((d) => createCapabilityTool(capabilities, d))
    const shadowed = registry.replaceSource('remote', bridged)
    for (const name of shadowed) {
        logger.warn({ name }, 'Remote capability shadowed by a local tool of the same name')
    }
    return bridged.length - shadowed.length
}
