import * as clack from '@clack/prompts'
import { colors } from './ui.js'

export async function confirmAction(message: string): Promise<boolean> {
    const result = await clack.confirm({ message, initialValue: false })
    if (clack.isCancel(result)) return false
    return result
}

export function showWelcome(title: string): void {
    clack.intro(colors.brand(title))
}

export function showOutro(message: string): void {
    clack.outro(message)
}

/** Runs `task` behind a spinner and stops it with the label `done` returns. */
export async function withSpinner<T>(message: string, task: () => Promise<T>, done: (value: T) => string): Promise<T> {
    const spinner = clack.spinner()
    spinner.start(message)
    try {
        const value = await task()
        spinner.stop(done(value))
        return value
    } catch (error) {
        spinner.stop(colors.error('Failed'))
        throw error
    }
}
