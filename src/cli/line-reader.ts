import { createInterface } from 'node:readline'
import { colors } from './ui.js'

export interface LineReader {
    /** Resolves with the next line, or null once input ends. */
    read(): Promise<string | null>
    /** Prints above the prompt without losing what the user is typing. */
    print(text: string): void
    close(): void
}

export function createLineReader(completions: string[], prompt = '> '): LineReader {
    const rl = createInterface({
        input: process.stdin,
        output: process.stdout,
        terminal: process.stdin.isTTY === true,
        completer: (line: string): [string[], string] => {
            if (!line.startsWith('/')) return [[], line]
            const hits = completions.filter((c) => c.startsWith(line))
            return [hits.length > 0 ? hits : completions, line]
        },
    })

    const queued: string[] = []
    let waiting: ((line: string | null) => void) | null = null
    let closed = false

    rl.on('line', (line) => {
        if (waiting) {
            const resolve = waiting
            waiting = null
            resolve(line)
        } else {
            queued.push(line)
        }
    })

    // Ctrl+C ends the session like Ctrl+D
    rl.on('SIGINT', () => rl.close())

    rl.on('close', () => {
        closed = true
        if (waiting) {
            const resolve = waiting
            waiting = null
            resolve(null)
        }
    })

    rl.setPrompt(colors.dim(prompt))

    return {
        read() {
            const next = queued.shift()
            if (next !== undefined) return Promise.resolve(next)
            if (closed) return Promise.resolve(null)
            rl.prompt()
            return new Promise((resolve) => {
                waiting = resolve
            })
        },

        print(text: string) {
            process.stdout.write(`\n${text}\n`)
            if (waiting) rl.prompt(true)
        },

        close() {
            rl.close()
        },
    }
}
