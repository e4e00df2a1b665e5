export const COMMAND_KEYWORDS = ['create', 'write', 'read', 'execute', 'remind', 'list'] as const

export const MAX_FREQUENT_COMMANDS = 10

/**
 * Keyword match is a plain substring test on the lower-cased input, so
 * "reminder" counts as "remind". Known keywords keep their first-use position.
 */
export function learnCommands(current: readonly string[], userInput: string): string[] {
    const lower = userInput.toLowerCase()
    const commands = [...current]
    for (const keyword of COMMAND_KEYWORDS) {
        if (lower.includes(keyword) && !commands.includes(keyword)) {
            commands.push(keyword)
        }
    }
    return commands.slice(-MAX_FREQUENT_COMMANDS)
}
