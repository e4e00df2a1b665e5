import pc from 'picocolors'
import type { AssistantReply } from '../assistant/types.js'
import { formatLocalDateTime } from '../core/time.js'
import type { Obligation } from '../reminders/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    tool: (name: string) => pc.blue(name),
}

const RULE = '='.repeat(60)

export function banner(version: string): string {
    return `${colors.brand('concierge')} ${colors.dim(`v${version}`)} - personal assistant`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatReply(reply: AssistantReply): string {
    if (reply.source === 'error') return colors.error(reply.text)
    if (reply.source === 'system') return colors.dim(reply.text)
    return reply.text
}

export function formatReminderAlert(reminder: Obligation, firedAt: Date): string {
    const lines = [
        RULE,
        colors.warn(colors.bold('REMINDER ALERT')),
        RULE,
        `TIME: ${formatLocalDateTime(firedAt, true)}`,
        `TASK: ${reminder.task}`,
    ]
    if (reminder.description) lines.push(`DESCRIPTION: ${reminder.description}`)
    lines.push(RULE)
    return lines.join('\n')
}
