import { z } from 'zod'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { isRecord, truncate } from '../core/guards.js'
import { AsyncMutex } from '../core/mutex.js'
import { formatCompactTimestamp } from '../core/time.js'
import type { Logger } from '../logger/index.js'
import { MAX_FREQUENT_COMMANDS, learnCommands } from './preferences.js'
import { SessionWindow } from './session-window.js'
import type { ContextStats, ContextStoreOptions, ConversationTurn, UserProfile } from './types.js'

export const NO_CONTEXT = 'No previous conversation context available.'

const SUMMARY_TURNS = 5
const SUMMARY_COMMANDS = 5
const SUMMARY_PREVIEW = 100
const RELEVANT_LIMIT = 3
const RELEVANT_PREVIEW = 150

const ConversationTurnSchema = z.object({
    timestamp: z.string(),
    user_input: z.string(),
    assistant_response: z.string(),
    session_id: z.string().min(1),
    context_type: z.string().default('general'),
})

const UserProfileSchema = z.object({
    display_name: z.string().optional(),
    preferences: z.record(z.unknown()).default({}),
    frequently_used_commands: z.array(z.string()).default([]),
    last_interaction: z.string().nullable().default(null),
})

const ContextFileSchema = z.object({
    user_profile: UserProfileSchema.optional(),
    conversations: z.array(ConversationTurnSchema).default([]),
})

function tokenize(text: string): string[] {
    return text.toLowerCase().split(/\s+/).filter((t) => t.length > 0)
}

/**
 * Conversation memory in two tiers: a bounded session window that feeds the
 * default prompt context, and the full history searched by relevance. Both are
 * persisted to one JSON file together with the user profile.
 */
export class ContextStore {
    private window: SessionWindow<ConversationTurn>
    private history: ConversationTurn[] = []
    private profile: UserProfile
    private sessionId: string
    private turnsSinceSave = 0
    private sessionSeq = 0
    private writeLock = new AsyncMutex()

    constructor(
        private options: ContextStoreOptions,
        private fs: FileSystem,
        private logger: Logger,
        private eventBus?: TypedEventEmitter,
        private now: () => Date = () => new Date()
    ) {
        this.window = new SessionWindow(options.sessionWindow)
        this.profile = this.defaultProfile()
        this.sessionId = this.nextSessionId()
    }

    /** Missing or invalid backing files leave the store empty; this never throws. */
    async load(): Promise<void> {
        this.history = []
        this.window.clear()
        this.profile = this.defaultProfile()

        try {
            if (!(await this.fs.exists(this.options.file))) return
            const parsed = ContextFileSchema.parse(await this.fs.readJSON(this.options.file))
            const stored = parsed.user_profile
            if (stored) {
                this.profile = {
                    display_name: stored.display_name ?? this.options.displayName,
                    preferences: stored.preferences,
                    frequently_used_commands: stored.frequently_used_commands.slice(-MAX_FREQUENT_COMMANDS),
                    last_interaction: stored.last_interaction,
                }
            }
            this.history = parsed.conversations
            this.window.seed(this.history)
            this.logger.debug({ turns: this.history.length }, 'Context loaded')
        } catch (error) {
            this.history = []
            this.window.clear()
            this.profile = this.defaultProfile()
            this.logger.warn({ error, file: this.options.file }, 'Failed to load context memory, starting fresh')
        }
    }

    async recordTurn(userInput: string, assistantResponse: string, contextType = 'general'): Promise<ConversationTurn> {
        const turn: ConversationTurn = Object.freeze({
            timestamp: this.now().toISOString(),
            user_input: userInput,
            assistant_response: assistantResponse,
            session_id: this.sessionId,
            context_type: contextType,
        })

        this.window.push(turn)
        this.history.push(turn)
        this.profile.last_interaction = turn.timestamp
        this.profile.frequently_used_commands = learnCommands(this.profile.frequently_used_commands, userInput)

        this.turnsSinceSave++
        if (this.turnsSinceSave >= this.options.autosaveEvery) {
            this.turnsSinceSave = 0
            await this.save()
        }

        return turn
    }

    contextSummary(): string {
        if (this.window.size === 0) return NO_CONTEXT

        let summary = '## Recent Conversation Context:\n'
        for (const turn of this.window.recent(SUMMARY_TURNS)) {
            summary += `User: ${turn.user_input}\nAssistant: ${truncate(turn.assistant_response, SUMMARY_PREVIEW)}\n---\n`
        }

        const commands = this.profile.frequently_used_commands
        if (commands.length > 0) {
            summary += `\n## User frequently uses: ${commands.slice(-SUMMARY_COMMANDS).join(', ')}\n`
        }
        return summary
    }

    /** Up to three turns sharing a word with `query`, oldest first, responses previewed. */
    relevantTurns(query: string): ConversationTurn[] {
        const wanted = new Set(tokenize(query))
        if (wanted.size === 0) return []

        const matches: ConversationTurn[] = []
        for (let i = this.history.length - 1; i >= 0 && matches.length < RELEVANT_LIMIT; i--) {
            const turn = this.history[i]
            if (!turn) continue
            if (tokenize(turn.user_input).some((token) => wanted.has(token))) {
                matches.push({ ...turn, assistant_response: truncate(turn.assistant_response, RELEVANT_PREVIEW) })
            }
        }
        return matches.reverse()
    }

    relevantContext(query: string): string {
        const turns = this.relevantTurns(query)
        if (turns.length === 0) return ''

        let context = '## Relevant Previous Context:\n'
        for (const turn of turns) {
            context += `Previously - User: ${turn.user_input}\nAssistant: ${turn.assistant_response}\n---\n`
        }
        return context
    }

    /**
     * Persists profile and the retained tail of the history, keeping any other
     * keys already present in the file. Returns false when the write failed.
     */
    async save(): Promise<boolean> {
        return this.writeLock.runExclusive(async () => {
            try {
                const existing = await this.readExisting()
                const storedProfile = isRecord(existing.user_profile) ? existing.user_profile : {}
                const conversations = this.history.slice(-this.options.maxHistory)
                await this.fs.writeJSON(this.options.file, {
                    ...existing,
                    user_profile: { ...storedProfile, ...this.profile },
                    conversations,
                })
                this.logger.debug({ turns: conversations.length }, 'Context saved')
                this.eventBus?.emit('context:saved', { turns: conversations.length, path: this.options.file })
                return true
            } catch (error) {
                this.logger.warn({ error, file: this.options.file }, 'Failed to save context memory')
                return false
            }
        })
    }

    clearSession(): void {
        this.window.clear()
        this.history = []
        this.turnsSinceSave = 0
        this.sessionId = this.nextSessionId()
    }

    /** Cold start: empties the backing file and forgets the profile. */
    async resetAll(): Promise<boolean> {
        this.clearSession()
        this.profile = this.defaultProfile()
        return this.writeLock.runExclusive(async () => {
            try {
                await this.fs.writeJSON(this.options.file, {})
                return true
            } catch (error) {
                this.logger.warn({ error, file: this.options.file }, 'Failed to wipe context memory')
                return false
            }
        })
    }

    stats(): ContextStats {
        return {
            turnCount: this.window.size,
            totalTurns: this.history.length,
            sessionId: this.sessionId,
            displayName: this.profile.display_name,
            frequentCommands: this.profile.frequently_used_commands.slice(-SUMMARY_COMMANDS),
            lastInteraction: this.profile.last_interaction,
        }
    }

    getProfile(): UserProfile {
        return {
            ...this.profile,
            preferences: { ...this.profile.preferences },
            frequently_used_commands: [...this.profile.frequently_used_commands],
        }
    }

    getPreference(key: string): unknown {
        return this.profile.preferences[key]
    }

    setPreference(key: string, value: unknown): void {
        this.profile.preferences[key] = value
    }

    setDisplayName(name: string): void {
        const trimmed = name.trim()
        if (trimmed) this.profile.display_name = trimmed
    }

    getSessionTurns(): ConversationTurn[] {
        return this.window.toArray()
    }

    getHistory(): ConversationTurn[] {
        return [...this.history]
    }

    getSessionId(): string {
        return this.sessionId
    }

    private async readExisting(): Promise<Record<string, unknown>> {
        if (!(await this.fs.exists(this.options.file))) return {}
        try {
            const raw = await this.fs.readJSON(this.options.file)
            if (isRecord(raw)) return raw
        } catch (error) {
            this.logger.warn({ error, file: this.options.file }, 'Existing context file is unreadable, overwriting')
        }
        return {}
    }

    private defaultProfile(): UserProfile {
        return {
            display_name: this.options.displayName,
            preferences: {},
            frequently_used_commands: [],
            last_interaction: null,
        }
    }

    private nextSessionId(): string {
        const base = formatCompactTimestamp(this.now())
        if (this.sessionId === undefined || !this.sessionId.startsWith(base)) {
            this.sessionSeq = 0
            return base
        }
        this.sessionSeq++
        return `${base}_${this.sessionSeq}`
    }
}
