import path from 'node:path'
import type { FileSystem } from '../../core/fs.js'

/** File tools act on `fs`; relative paths resolve against `baseDir`. */
export interface Workspace {
    fs: FileSystem
    baseDir: string
}

export function resolvePath(workspace: Workspace, target: string): string {
    return path.resolve(workspace.baseDir, target)
}
