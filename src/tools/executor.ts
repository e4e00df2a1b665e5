import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { err, ok } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import type { ToolRegistry } from './registry.js'
import type { ToolResult } from './types.js'

export class ToolExecutor {
    constructor(
        private registry: ToolRegistry,
        private logger: Logger,
        private eventBus?: TypedEventEmitter
    ) {}

    async executeSafe(name: string, args: unknown): Promise<ToolResult> {
        const tool = this.registry.get(name)
        if (!tool) {
            return err(`Tool '${name}' not found`)
        }

        const parsed = tool.parameters.safeParse(args)
        if (!parsed.success) {
            return err(`Invalid params for ${name}: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
        }

        this.eventBus?.emit('tool:before', { toolName: name, source: tool.source })
        try {
            const result = await tool.execute(parsed.data)
            this.logger.debug({ tool: name, source: tool.source }, 'tool:executed')
            return ok(result)
        } catch (error) {
            this.logger.warn({ tool: name, error: errorMessage(error) }, 'tool:failed')
            return err(`Tool '${name}' failed: ${errorMessage(error)}`)
        }
    }
}
