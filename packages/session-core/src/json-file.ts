import fs from 'node:fs';
import path from 'node:path';

export interface WriteJsonOptions {
  /** Copy the previous file to `<file>.bak` before replacing it. */
  readonly backup?: boolean;
}

/** Parsed file content, or null when the file is missing or not JSON. */
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch {
    return null;
  }
}

/** Writes through a temp file in the same directory and renames it into place. */
export function writeJsonFileAtomic(filePath: string, data: unknown, options: WriteJsonOptions = {}): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode: 0o600 });
  if (options.backup && fs.existsSync(filePath)) {
    fs.copyFileSync(filePath, `${filePath}.bak`);
  }
  fs.renameSync(tmpPath, filePath);
}
