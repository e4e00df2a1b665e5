import { z } from 'zod'
import type { Tool } from '../types.js'
import { resolvePath, type Workspace } from './workspace.js'

const ReadFileInput = z.object({
    path: z.string().min(1).describe('File to read'),
})

type ReadFileInput = z.infer<typeof ReadFileInput>

export function readFileTool(workspace: Workspace): Tool<ReadFileInput> {
    return {
        name: 'read_file',
        description: 'Read the text content of a file',
        parameters: ReadFileInput,
        source: 'local',
        async execute(input) {
            const filePath = resolvePath(workspace, input.path)
            if (!(await workspace.fs.exists(filePath))) return `File '${input.path}' not found.`
            const content = await workspace.fs.readText(filePath)
            return `Content of '${input.path}':\n${content}`
        },
    }
}
