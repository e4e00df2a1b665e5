import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir' | 'displayNameExplicit'> = {
    logLevel: 'warn',
    displayName: 'Sir',
    remote: {
        baseURL: 'http://localhost:8000',
        discoveryPath: '/tools/list',
        healthTimeoutMs: 5_000,
        discoveryTimeoutMs: 10_000,
        invokeTimeoutMs: 30_000,
    },
    context: {
        file: '.concierge/context_memory.json',
        maxHistory: 100,
        sessionWindow: 5,
        autosaveEvery: 5,
    },
    reminders: {
        file: '.concierge/reminders.json',
        intervalMs: 30_000,
        backoffMs: 60_000,
        firingWindowMs: 60_000,
    },
    llm: {
        apiKey: '',
        model: 'gpt-4o-mini',
        baseURL: 'https://api.openai.com/v1',
        temperature: 0,
        maxTokens: 1024,
    },
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/concierge`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.concierge'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
