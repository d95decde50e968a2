import path from 'node:path';

/** Absolute POSIX path, no trailing slash except for the root. */
export function normalizeRemotePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return '/';
  const normalized = path.posix.normalize(trimmed.startsWith('/') ? trimmed : `/${trimmed}`);
  if (normalized.length > 1 && normalized.endsWith('/')) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

/** Resolves `target` against `base` unless it is already absolute. */
export function resolveRemotePath(base: string, target: string): string {
  const trimmed = target.trim();
  if (trimmed.startsWith('/')) return normalizeRemotePath(trimmed);
  return normalizeRemotePath(path.posix.join(normalizeRemotePath(base), trimmed));
}

export function joinRemotePath(...segments: readonly string[]): string {
  return normalizeRemotePath(path.posix.join('/', ...segments.filter((s) => s.length > 0)));
}

export function parentRemotePath(raw: string): string {
  const normalized = normalizeRemotePath(raw);
  if (normalized === '/') return '/';
  return normalizeRemotePath(path.posix.dirname(normalized));
}

export function remoteBaseName(raw: string): string {
  return path.posix.basename(normalizeRemotePath(raw));
}

/** True when `candidate` equals `ancestor` or lies below it. */
export function isSameOrDescendant(candidate: string, ancestor: string): boolean {
  const c = normalizeRemotePath(candidate);
  const a = normalizeRemotePath(ancestor);
  if (a === '/') return true;
  return c === a || c.startsWith(`${a}/`);
}

export function fileExtension(name: string): string {
  return path.posix.extname(name).toLowerCase();
}
