import { z } from 'zod'
import type { Tool } from '../types.js'
import { resolvePath, type Workspace } from './workspace.js'

const WriteFileInput = z.object({
    path: z.string().min(1).describe('File to write'),
    content: z.string().describe('Full content of the file'),
})

type WriteFileInput = z.infer<typeof WriteFileInput>

export function writeFileTool(workspace: Workspace): Tool<WriteFileInput> {
    return {
        name: 'write_file',
        description: 'Write text to a file, creating it if needed',
        parameters: WriteFileInput,
        source: 'local',
        async execute(input) {
            await workspace.fs.writeText(resolvePath(workspace, input.path), input.content)
            return `Wrote to '${input.path}'.`
        },
    }
}
