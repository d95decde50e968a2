import crypto from 'node:crypto';
import type { Dirent } from 'node:fs';
import { mkdir, readdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { InvalidTargetError, type ChatFile, type ChatFileStore } from '@chatdrive/session-core';

const SAFE_ID_RE = /^[a-zA-Z0-9_-]+$/;
const TEMP_SUFFIX = '.chatdrive-tmp';
const TEMP_NAME_RE = /^\..+\.[0-9a-f]{8}\.chatdrive-tmp$/;

/** Hidden sibling a write goes through before it is renamed into place. */
export function tempFileName(name: string): string {
  return `.${name}.${crypto.randomBytes(4).toString('hex')}${TEMP_SUFFIX}`;
}

export function isTempFileName(name: string): boolean {
  return TEMP_NAME_RE.test(name);
}

/** Directory name for a chat scope; ids outside the safe alphabet are hashed. */
export function scopeDirName(scope: string): string {
  if (SAFE_ID_RE.test(scope)) return scope;
  return `s_${crypto.createHash('sha256').update(scope).digest('hex').slice(0, 24)}`;
}

function checkSegments(folder: string, name: string): void {
  if (name.includes('/')) {
    throw new InvalidTargetError(`Invalid chat file name: ${name}`);
  }
  const segments = [...folder.split('/').filter((s) => s.length > 0), name];
  for (const segment of segments) {
    if (segment === '.' || segment === '..' || segment.includes('\\') || segment.length === 0) {
      throw new InvalidTargetError(`Invalid chat file path: ${folder}/${name}`);
    }
  }
}

/**
 * Chat file areas kept on local disk, one directory per scope. Chat platform
 * adapters drop group files here; restores write into it.
 */
export class DirectoryChatFileStore implements ChatFileStore {
  public constructor(private readonly rootDir: string) {}

  public async listFiles(scope: string): Promise<readonly ChatFile[]> {
    const base = this.scopeDir(scope);
    const files: ChatFile[] = [];
    const walk = async (dir: string, folder: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
        throw err;
      }
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      for (const entry of entries) {
        if (isTempFileName(entry.name)) continue;
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full, folder.length > 0 ? `${folder}/${entry.name}` : entry.name);
        } else if (entry.isFile()) {
          const info = await stat(full);
          files.push({ name: entry.name, folder, size: info.size, read: async () => readFile(full) });
        }
      }
    };
    await walk(base, '');
    return files;
  }

  public async exists(scope: string, folder: string, name: string): Promise<boolean> {
    checkSegments(folder, name);
    try {
      return (await stat(this.filePath(scope, folder, name))).isFile();
    } catch {
      return false;
    }
  }

  public async putFile(scope: string, folder: string, name: string, content: Uint8Array): Promise<void> {
    checkSegments(folder, name);
    const target = this.filePath(scope, folder, name);
    await mkdir(path.dirname(target), { recursive: true });
    const tmpPath = path.join(path.dirname(target), tempFileName(name));
    await writeFile(tmpPath, content);
    await rename(tmpPath, target);
  }

  private scopeDir(scope: string): string {
    return path.join(this.rootDir, scopeDirName(scope));
  }

  private filePath(scope: string, folder: string, name: string): string {
    return path.join(this.scopeDir(scope), ...folder.split('/').filter((s) => s.length > 0), name);
  }
}
