import { z } from 'zod'
import { formatLocalDateTime } from '../../core/time.js'
import type { Tool } from '../types.js'

const CurrentTimeInput = z.object({})

type CurrentTimeInput = z.infer<typeof CurrentTimeInput>

export function currentTimeTool(now: () => Date = () => new Date()): Tool<CurrentTimeInput> {
    return {
        name: 'get_current_time',
        description: 'Get the current local date and time',
        parameters: CurrentTimeInput,
        source: 'local',
        async execute() {
            return `Current time: ${formatLocalDateTime(now(), true)}`
        },
    }
}
