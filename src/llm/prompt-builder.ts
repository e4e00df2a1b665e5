import { estimateTokens } from './token-counter.js'

interface PromptSection {
    label: string
    content: string
    priority: number // higher = more important
}

export interface PromptManifest {
    sections: { label: string; tokens: number; included: boolean }[]
    totalTokens: number
    budget: number
}

/**
 * Assembles a system prompt from labelled sections. When the token budget is
 * tight the lowest-priority sections are dropped; survivors keep insertion order.
 */
export class PromptBuilder {
    private sections: PromptSection[] = []

    add(label: string, content: string, priority = 50): this {
        if (content.trim()) this.sections.push({ label, content: content.trim(), priority })
        return this
    }

    build(hardCap: number): string {
        return this.buildWithManifest(hardCap).prompt
    }

    buildWithManifest(hardCap: number): { prompt: string; manifest: PromptManifest } {
        const sorted = [...this.sections].sort((a, b) => b.priority - a.priority)

        let totalTokens = 0
        const included = new Set<PromptSection>()
        for (const section of sorted) {
            const tokens = estimateTokens(section.content)
            if (totalTokens + tokens <= hardCap) {
                included.add(section)
                totalTokens += tokens
            }
        }

        const kept = this.sections.filter((s) => included.has(s))
        return {
            prompt: kept.map((s) => s.content).join('\n\n'),
            manifest: {
                sections: this.sections.map((s) => ({
                    label: s.label,
                    tokens: estimateTokens(s.content),
                    included: included.has(s),
                })),
                totalTokens,
                budget: hardCap,
            },
        }
    }
}
