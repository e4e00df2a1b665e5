import { z } from 'zod'
import type { Tool } from '../types.js'
import { resolvePath, type Workspace } from './workspace.js'

const ListDirectoryInput = z.object({
    path: z.string().min(1).optional().describe('Directory to list (defaults to the working directory)'),
})

type ListDirectoryInput = z.infer<typeof ListDirectoryInput>

export function listDirectoryTool(workspace: Workspace): Tool<ListDirectoryInput> {
    return {
        name: 'list_directory',
        description: 'List the files and folders inside a directory',
        parameters: ListDirectoryInput,
        source: 'local',
        async execute(input) {
            const target = input.path ?? '.'
            const dirPath = resolvePath(workspace, target)
            if (!(await workspace.fs.exists(dirPath))) return `Directory '${target}' not found.`

            const entries = await workspace.fs.list(dirPath)
            if (entries.length === 0) return `Directory '${target}' is empty.`

            const lines = entries
                .map((e) => (e.isDirectory ? `${e.name}/` : e.name))
                .sort()
                .map((name) => `  ${name}`)
            return `Contents of '${target}':\n${lines.join('\n')}`
        },
    }
}
