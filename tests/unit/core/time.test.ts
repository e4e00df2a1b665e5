import { describe, expect, it } from 'vitest'
import { formatCompactTimestamp, formatLocalDateTime } from '../../../src/core/time.js'

describe('time formatting', () => {
    const date = new Date(2025, 0, 5, 7, 3, 9)

    it('formats local date and time', () => {
        expect(formatLocalDateTime(date)).toBe('2025-01-05 07:03')
        expect(formatLocalDateTime(date, true)).toBe('2025-01-05 07:03:09')
    })

    it('formats compact session timestamps', () => {
        expect(formatCompactTimestamp(date)).toBe('20250105_070309')
    })
})
