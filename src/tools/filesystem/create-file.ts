import { z } from 'zod'
import type { Tool } from '../types.js'
import { resolvePath, type Workspace } from './workspace.js'

const CreateFileInput = z.object({
    path: z.string().min(1).describe('File to create'),
})

type CreateFileInput = z.infer<typeof CreateFileInput>

export function createFileTool(workspace: Workspace): Tool<CreateFileInput> {
    return {
        name: 'create_file',
        description: 'Create an empty file, replacing any existing content',
        parameters: CreateFileInput,
        source: 'local',
        async execute(input) {
            await workspace.fs.writeText(resolvePath(workspace, input.path), '')
            return `File '${input.path}' created.`
        },
    }
}
