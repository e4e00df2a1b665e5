import { randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface DirEntry {
  name: string;
  isDirectory: boolean;
}

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON(path: string): Promise<unknown>;
  writeText(path: string, content: string): Promise<void>;
  writeJSON(path: string, data: unknown): Promise<void>;
  exists(path: string): Promise<boolean>;
  mkdir(path: string): Promise<void>;
  list(path: string): Promise<DirEntry[]>;
}

/**
 * Writes go to a sibling temp file first and are renamed into place, so a
 * reader never observes a half-written store.
 */
export class NodeFileSystem implements FileSystem {
  async readText(filePath: string): Promise<string> {
    return readFile(filePath, 'utf-8');
  }

  async readJSON(filePath: string): Promise<unknown> {
    return JSON.parse(await this.readText(filePath));
  }

  async writeText(filePath: string, content: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.${randomUUID().slice(0, 8)}.tmp`;
    try {
      await writeFile(tmp, content, 'utf-8');
      await rename(tmp, filePath);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    await this.writeText(filePath, `${JSON.stringify(data, null, 2)}\n`);
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await stat(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
  }

  async list(dirPath: string): Promise<DirEntry[]> {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }));
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private dirs = new Set<string>();
  private failWrites: Error | null = null;

  async readText(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return content;
  }

  async readJSON(filePath: string): Promise<unknown> {
    return JSON.parse(await this.readText(filePath));
  }

  async writeText(filePath: string, content: string): Promise<void> {
    if (this.failWrites) throw this.failWrites;
    this.addDir(path.posix.dirname(filePath));
    this.files.set(filePath, content);
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    await this.writeText(filePath, JSON.stringify(data, null, 2));
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath) || this.dirs.has(filePath);
  }

  async mkdir(dirPath: string): Promise<void> {
    if (this.failWrites) throw this.failWrites;
    this.addDir(dirPath);
  }

  async list(dirPath: string): Promise<DirEntry[]> {
    if (!this.dirs.has(dirPath)) throw new Error(`ENOENT: ${dirPath}`);
    const prefix = dirPath.endsWith('/') ? dirPath : `${dirPath}/`;
    const entries = new Map<string, boolean>();
    for (const dir of this.dirs) {
      if (dir.startsWith(prefix)) entries.set(dir.slice(prefix.length).split('/')[0] ?? '', true);
    }
    for (const file of this.files.keys()) {
      if (!file.startsWith(prefix)) continue;
      const [name = '', ...rest] = file.slice(prefix.length).split('/');
      if (!entries.has(name)) entries.set(name, rest.length > 0);
    }
    return [...entries].map(([name, isDirectory]) => ({ name, isDirectory }));
  }

  setFile(filePath: string, content: string): void {
    this.addDir(path.posix.dirname(filePath));
    this.files.set(filePath, content);
  }

  private addDir(dirPath: string): void {
    let current = dirPath;
    while (!this.dirs.has(current)) {
      this.dirs.add(current);
      const parent = path.posix.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }

  getFiles(): Map<string, string> {
    return new Map(this.files);
  }

  /** Makes every subsequent write reject with `error`; pass null to restore. */
  setWriteFailure(error: Error | null): void {
    this.failWrites = error;
  }
}
