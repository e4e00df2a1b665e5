import type { EventMap, TypedEventEmitter } from '../core/events.js'

const TOOL_LABELS: Record<string, string> = {
    get_current_time: 'Checking the clock...',
    create_reminder: 'Scheduling reminder...',
    list_reminders: 'Checking reminders...',
    complete_reminder: 'Updating reminder...',
    save_context: 'Saving memory...',
    clear_context: 'Clearing context...',
    get_context_stats: 'Reading memory stats...',
    create_folder: 'Creating folder...',
    create_file: 'Creating file...',
    write_file: 'Writing file...',
    read_file: 'Reading file...',
    list_directory: 'Listing directory...',
    list_available_tools: 'Listing tools...',
}

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    dispose(): void
}

export function toolLabel(toolName: string, source: EventMap['tool:before']['source']): string {
    return TOOL_LABELS[toolName] ?? (source === 'remote' ? `Calling remote ${toolName}...` : `Running ${toolName}...`)
}

/** Mirrors tool activity into the spinner text while a request is processed. */
export function createProgressTracker(eventBus: TypedEventEmitter, spinner: Spinner): ProgressTracker {
    const onTool = (data: EventMap['tool:before']) => {
        spinner.message(toolLabel(data.toolName, data.source))
    }

    eventBus.on('tool:before', onTool)

    return {
        dispose() {
            eventBus.off('tool:before', onTool)
        },
    }
}
