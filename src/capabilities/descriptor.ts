import { z } from 'zod'
import { isRecord } from '../core/guards.js'
import { err, ok, type Result } from '../core/result.js'
import {
    type CapabilityDescriptor,
    type CapabilityMethod,
    type InvocationStyle,
    READ_METHODS,
    type SkippedEntry,
    WRITE_METHODS,
} from './types.js'

const CapabilityEntrySchema = z.object({
    name: z.string().trim().min(1, 'name must be a non-empty string'),
    description: z.string().default(''),
    endpoint: z.string().startsWith('/', 'endpoint must be a path starting with "/"'),
    method: z
        .string()
        .transform((m) => m.trim().toUpperCase())
        .pipe(z.enum([...READ_METHODS, ...WRITE_METHODS])),
})

export interface ParsedListing {
    descriptors: CapabilityDescriptor[]
    skipped: SkippedEntry[]
}

export function invocationStyle(method: CapabilityMethod): InvocationStyle {
    return method === 'GET' || method === 'DELETE' ? 'read' : 'write'
}

function entryName(entry: unknown): string | undefined {
    if (isRecord(entry) && typeof entry.name === 'string' && entry.name.trim()) return entry.name.trim()
    return undefined
}

/**
 * Validates a discovery response body. Only the envelope shape is fatal; each
 * bad or duplicate entry is reported in `skipped` and the rest are kept.
 */
export function parseCapabilityListing(body: unknown): Result<ParsedListing> {
    if (!isRecord(body)) return err('discovery response is not a JSON object')
    if (!Array.isArray(body.tools)) return err('discovery response has no "tools" list')

    const descriptors: CapabilityDescriptor[] = []
    const skipped: SkippedEntry[] = []
    const seen = new Set<string>()

    body.tools.forEach((entry: unknown, index: number) => {
        const parsed = CapabilityEntrySchema.safeParse(entry)
        if (!parsed.success) {
            const reason = parsed.error.issues.map((i) => `${i.path.join('.') || 'entry'}: ${i.message}`).join('; ')
            skipped.push({ index, name: entryName(entry), reason })
            return
        }
        if (seen.has(parsed.data.name)) {
            skipped.push({ index, name: parsed.data.name, reason: 'duplicate name' })
            return
        }
        seen.add(parsed.data.name)
        descriptors.push(Object.freeze({ ...parsed.data }))
    })

    return ok({ descriptors, skipped })
}
