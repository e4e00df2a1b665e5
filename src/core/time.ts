function pad(value: number): string {
    return String(value).padStart(2, '0')
}

/** Local `YYYY-MM-DD HH:MM`, or `YYYY-MM-DD HH:MM:SS` with seconds. */
export function formatLocalDateTime(date: Date, withSeconds = false): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`
    return withSeconds ? `${day} ${time}:${pad(date.getSeconds())}` : `${day} ${time}`
}

/** Local `YYYYMMDD_HHMMSS`. */
export function formatCompactTimestamp(date: Date): string {
    return formatLocalDateTime(date, true).replace(/[-:]/g, '').replace(' ', '_')
}
