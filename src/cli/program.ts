import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { type Container, createContainer, type InitializeOptions } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { contextClearCommand, contextResetCommand, contextStatsCommand } from './commands/context.js'
import { addReminderCommand, completeReminderCommand, listRemindersCommand } from './commands/reminders.js'
import { toolsCommand } from './commands/tools.js'
import { startREPL } from './repl.js'
import { formatError, formatReply } from './ui.js'

export const VERSION = '0.1.0'

interface RootOptions {
    prompt?: string
    fresh?: boolean
    remote?: string
    model?: string
    key?: string
    name?: string
    debug?: boolean
}

export function toConfigFlags(options: RootOptions): Config {
    const flags: Config = {}
    if (options.debug) flags.logLevel = 'debug'
    if (options.name) flags.displayName = options.name
    if (options.remote) flags.remote = { baseURL: options.remote }
    if (options.model || options.key) flags.llm = { model: options.model, apiKey: options.key }
    return flags
}

interface RunOptions extends InitializeOptions {
    saveOnExit: boolean
}

async function withContainer(options: RootOptions, run: RunOptions, task: (container: Container) => Promise<boolean>): Promise<void> {
    try {
        const fs = new NodeFileSystem()
        const config = await loadConfig({ fs, cliFlags: toConfigFlags(options) })
        const container = createContainer(config, { fs })
        let succeeded = false
        try {
            await container.initialize(run)
            succeeded = await task(container)
        } finally {
            await container.shutdown({ save: run.saveOnExit })
        }
        if (!succeeded) process.exitCode = 1
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
    }
}

const OFFLINE: RunOptions = { discover: false, scheduler: false, saveOnExit: false }

export function createProgram(): Command {
    const program = new Command()
    const rootOptions = () => program.opts<RootOptions>()

    program
        .name('concierge')
        .description('Personal assistant with persistent memory, remote tools and reminders')
        .version(VERSION)
        .option('-p, --prompt <text>', 'Answer a single prompt and exit')
        .option('--fresh', 'Start with empty context memory')
        .option('-r, --remote <url>', 'Remote tools server base URL')
        .option('-m, --model <model>', 'Chat model to use')
        .option('-k, --key <key>', 'API key for the chat model')
        .option('-n, --name <name>', 'How the assistant addresses you')
        .option('--debug', 'Enable debug logging')
        .action(async () => {
            const options = rootOptions()
            const oneShot = options.prompt !== undefined
            await withContainer(options, { fresh: options.fresh, scheduler: !oneShot, saveOnExit: true }, async (container) => {
                if (options.prompt !== undefined) {
                    const reply = await container.assistant.handle(options.prompt)
                    console.log(formatReply(reply))
                    return reply.source !== 'error'
                }
                await startREPL(container, VERSION)
                return true
            })
        })

    const reminders = program.command('reminders').description('Manage reminders')

    reminders
        .command('add <task>')
        .description('Create a reminder')
        .requiredOption('-a, --at <when>', 'When: "in 10 minutes", "today 18:30", "tomorrow 09:00" or "2025-01-31 14:00"')
        .option('-d, --description <text>', 'Longer note shown with the reminder')
        .action(async (task: string, opts: { at: string; description?: string }) => {
            await withContainer(rootOptions(), OFFLINE, (container) => addReminderCommand(container, task, opts))
        })

    reminders
        .command('list')
        .description('List active reminders')
        .action(async () => {
            await withContainer(rootOptions(), OFFLINE, (container) => listRemindersCommand(container))
        })

    reminders
        .command('done <id>')
        .description('Mark a reminder as completed')
        .action(async (id: string) => {
            await withContainer(rootOptions(), OFFLINE, (container) => completeReminderCommand(container, id))
        })

    program
        .command('tools')
        .description('Discover and list remote tools')
        .action(async () => {
            await withContainer(rootOptions(), OFFLINE, (container) => toolsCommand(container))
        })

    const context = program.command('context').description('Inspect or clear conversation memory')

    context
        .command('stats')
        .description('Show context memory statistics')
        .action(async () => {
            await withContainer(rootOptions(), OFFLINE, (container) => contextStatsCommand(container))
        })

    context
        .command('clear')
        .description('Forget conversation history but keep the profile')
        .action(async () => {
            await withContainer(rootOptions(), OFFLINE, (container) => contextClearCommand(container))
        })

    context
        .command('reset')
        .description('Erase all context memory, profile included')
        .option('-y, --yes', 'Skip confirmation')
        .action(async (opts: { yes?: boolean }) => {
            await withContainer(rootOptions(), OFFLINE, (container) => contextResetCommand(container, opts))
        })

    return program
}
