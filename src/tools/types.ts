import type { ZodSchema } from 'zod'
import type { Result } from '../core/result.js'

/** Local tools run in-process; remote tools are bridged capability descriptors. */
export type ToolSource = 'local' | 'remote'

export interface Tool<TInput = unknown> {
    name: string
    description: string
    parameters: ZodSchema<TInput>
    source: ToolSource
    execute(input: TInput): Promise<string>
}

export type ToolResult = Result<string, string>

export type AnyTool = Tool<unknown>
