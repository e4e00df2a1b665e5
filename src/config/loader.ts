import path from 'node:path'
import { ConfigurationError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Config
    projectDir?: string
    logger?: Logger
}

async function loadJsonConfig(fs: FileSystem, filePath: string, logger?: Logger): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}
    try {
        const raw = await fs.readJSON(filePath)
        const parsed = ConfigSchema.safeParse(raw)
        if (parsed.success) return parsed.data
        logger?.warn({ filePath, issues: parsed.error.issues }, 'Ignoring invalid config file')
    } catch (error) {
        logger?.warn({ filePath, error }, 'Ignoring unreadable config file')
    }
    return {}
}

function defined<T extends object>(value: T | undefined): Partial<T> {
    const out: Partial<T> = {}
    if (!value) return out
    for (const key in value) {
        if (value[key] !== undefined) out[key] = value[key]
    }
    return out
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        if (cfg.logLevel !== undefined) merged.logLevel = cfg.logLevel
        if (cfg.displayName !== undefined) merged.displayName = cfg.displayName
        if (cfg.remote) merged.remote = { ...merged.remote, ...defined(cfg.remote) }
        if (cfg.context) merged.context = { ...merged.context, ...defined(cfg.context) }
        if (cfg.reminders) merged.reminders = { ...merged.reminders, ...defined(cfg.reminders) }
        if (cfg.llm) merged.llm = { ...merged.llm, ...defined(cfg.llm) }
    }
    return merged
}

function envConfig(): Config {
    const env: Config = {}
    const { CONCIERGE_REMOTE_URL, CONCIERGE_API_KEY, CONCIERGE_MODEL, CONCIERGE_BASE_URL, CONCIERGE_LOG_LEVEL } = process.env
    if (CONCIERGE_REMOTE_URL !== undefined) env.remote = { baseURL: CONCIERGE_REMOTE_URL }
    if (CONCIERGE_API_KEY || CONCIERGE_MODEL || CONCIERGE_BASE_URL) {
        env.llm = { apiKey: CONCIERGE_API_KEY, model: CONCIERGE_MODEL, baseURL: CONCIERGE_BASE_URL }
    }
    const level = LogLevelSchema.safeParse(CONCIERGE_LOG_LEVEL)
    if (level.success) env.logLevel = level.data
    return env
}

export function normalizeBaseURL(raw: string): string {
    const trimmed = raw.trim()
    if (!trimmed) {
        throw new ConfigurationError('Remote capability base URL is not configured (set remote.baseURL or CONCIERGE_REMOTE_URL)')
    }
    let url: URL
    try {
        url = new URL(trimmed)
    } catch (error) {
        throw new ConfigurationError(`Remote capability base URL is not a valid URL: ${trimmed}`, { cause: error })
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigurationError(`Remote capability base URL must use http or https: ${trimmed}`)
    }
    return trimmed.replace(/\/+$/, '')
}

/**
 * Priority: CLI flags > env vars > local config > global config > defaults.
 * Throws ConfigurationError for settings the assistant cannot start without.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), logger } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE, logger)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE), logger)

    const merged = mergeConfigs(globalConfig, localConfig, envConfig(), cliFlags)

    const remote = { ...DEFAULT_CONFIG.remote, ...merged.remote }
    const context = { ...DEFAULT_CONFIG.context, ...merged.context }
    const reminders = { ...DEFAULT_CONFIG.reminders, ...merged.reminders }

    return {
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        displayName: merged.displayName ?? DEFAULT_CONFIG.displayName,
        displayNameExplicit: merged.displayName !== undefined,
        remote: { ...remote, baseURL: normalizeBaseURL(remote.baseURL) },
        context: { ...context, file: path.resolve(projectDir, context.file) },
        reminders: { ...reminders, file: path.resolve(projectDir, reminders.file) },
        llm: { ...DEFAULT_CONFIG.llm, ...merged.llm },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
