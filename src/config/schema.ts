import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const RemoteConfigSchema = z.object({
    baseURL: z.string().optional(),
    discoveryPath: z.string().startsWith('/').optional(),
    healthTimeoutMs: z.number().int().positive().optional(),
    discoveryTimeoutMs: z.number().int().positive().optional(),
    invokeTimeoutMs: z.number().int().positive().optional(),
})

export const ContextConfigSchema = z.object({
    file: z.string().min(1).optional(),
    maxHistory: z.number().int().positive().optional(),
    sessionWindow: z.number().int().positive().optional(),
    autosaveEvery: z.number().int().positive().optional(),
})

export const ReminderConfigSchema = z.object({
    file: z.string().min(1).optional(),
    intervalMs: z.number().int().positive().optional(),
    backoffMs: z.number().int().positive().optional(),
    firingWindowMs: z.number().int().positive().optional(),
})

export const LLMConfigSchema = z.object({
    apiKey: z.string().optional(),
    model: z.string().optional(),
    baseURL: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().positive().optional(),
})

export const ConfigSchema = z.object({
    logLevel: LogLevelSchema.optional(),
    displayName: z.string().min(1).optional(),
    remote: RemoteConfigSchema.optional(),
    context: ContextConfigSchema.optional(),
    reminders: ReminderConfigSchema.optional(),
    llm: LLMConfigSchema.optional(),
})

export type Config = z.infer<typeof ConfigSchema>
export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ResolvedConfig {
    logLevel: LogLevel
    displayName: string
    /** True when a config file, env var or CLI flag named the user; the stored profile name then yields. */
    displayNameExplicit: boolean
    remote: {
        baseURL: string
        discoveryPath: string
        healthTimeoutMs: number
        discoveryTimeoutMs: number
        invokeTimeoutMs: number
    }
    context: {
        file: string
        maxHistory: number
        sessionWindow: number
        autosaveEvery: number
    }
    reminders: {
        file: string
        intervalMs: number
        backoffMs: number
        firingWindowMs: number
    }
    llm: {
        apiKey: string
        model: string
        baseURL: string
        temperature: number
        maxTokens: number
    }
    projectDir: string
    configDir: string
}
