import { z } from 'zod'
import type { Tool } from '../types.js'
import { resolvePath, type Workspace } from './workspace.js'

const CreateFolderInput = z.object({
    path: z.string().min(1).describe('Folder to create, parents included'),
})

type CreateFolderInput = z.infer<typeof CreateFolderInput>

export function createFolderTool(workspace: Workspace): Tool<CreateFolderInput> {
    return {
        name: 'create_folder',
        description: 'Create a folder (and any missing parent folders)',
        parameters: CreateFolderInput,
        source: 'local',
        async execute(input) {
            await workspace.fs.mkdir(resolvePath(workspace, input.path))
            return `Folder '${input.path}' created.`
        },
    }
}
