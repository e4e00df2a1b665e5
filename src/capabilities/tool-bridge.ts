import { z } from 'zod'
import type { Tool } from '../tools/types.js'
import type { CapabilityRegistry } from './registry.js'
import type { CapabilityDescriptor } from './types.js'

const RemoteArgs = z.record(z.unknown())

type RemoteArgs = z.infer<typeof RemoteArgs>

/** Every remote capability goes through the registry's one generic invoker. */
export function createCapabilityTool(capabilities: CapabilityRegistry, descriptor: CapabilityDescriptor): Tool<RemoteArgs> {
    return {
        name: descriptor.name,
        description: `[remote] ${descriptor.description || `${descriptor.method} ${descriptor.endpoint}`}`,
        parameters: RemoteArgs,
        source: 'remote',
        async execute(input) {
            const outcome = await capabilities.invoke(descriptor.name, input)
            return outcome.text
        },
    }
}
