import { err, ok, type Result } from '../core/result.js'

const UNIT_MS = {
    second: 1_000,
    minute: 60_000,
    hour: 3_600_000,
} as const

const RELATIVE = /^in\s+(\d+)\s+(second|minute|hour)s?\s*$/i
const DAY_SHORTHAND = /^(today|tomorrow)\s+(\d{1,2}):(\d{2})\s*$/i
const ABSOLUTE = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{1,2}):(\d{2})\s*$/

function isUnit(value: string): value is keyof typeof UNIT_MS {
    return value in UNIT_MS
}

function validClock(hour: number, minute: number): boolean {
    return hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59
}

/**
 * Accepts `in N seconds|minutes|hours`, `today HH:MM`, `tomorrow HH:MM` and
 * `YYYY-MM-DD HH:MM`, all in local time. A `today` time that has already
 * passed rolls over to tomorrow.
 */
export function parseReminderTime(input: string, now: Date): Result<Date> {
    const text = input.trim()
    const failure = err(`Could not parse the time for the reminder: "${input}"`)

    const relative = RELATIVE.exec(text)
    if (relative) {
        const amount = Number(relative[1])
        const unit = relative[2]?.toLowerCase() ?? ''
        if (!isUnit(unit) || !Number.isSafeInteger(amount)) return failure
        const at = new Date(now.getTime() + amount * UNIT_MS[unit])
        if (Number.isNaN(at.getTime())) return failure
        return ok(at)
    }

    const shorthand = DAY_SHORTHAND.exec(text)
    if (shorthand) {
        const day = shorthand[1]?.toLowerCase()
        const hour = Number(shorthand[2])
        const minute = Number(shorthand[3])
        if (!validClock(hour, minute)) return failure

        const at = new Date(now)
        at.setHours(hour, minute, 0, 0)
        if (day === 'tomorrow' || at.getTime() <= now.getTime()) {
            at.setDate(at.getDate() + 1)
        }
        return ok(at)
    }

    const absolute = ABSOLUTE.exec(text)
    if (absolute) {
        const [year, month, day, hour, minute] = absolute.slice(1).map(Number)
        if (year === undefined || month === undefined || day === undefined || hour === undefined || minute === undefined) {
            return failure
        }
        if (!validClock(hour, minute)) return failure

        const at = new Date(year, month - 1, day, hour, minute, 0, 0)
        // Date rolls Feb 30 into March; reject instead
        if (at.getFullYear() !== year || at.getMonth() !== month - 1 || at.getDate() !== day) return failure
        return ok(at)
    }

    return failure
}
