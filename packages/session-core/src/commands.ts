import { InvalidCommandError } from './errors.js';
import type { EntryTarget } from './navigation-controller.js';

export type ConfigAction = 'show' | 'setup' | 'test' | 'clear_cache';

export type Command =
  | { readonly kind: 'ls'; readonly target?: EntryTarget | undefined }
  | { readonly kind: 'next' }
  | { readonly kind: 'prev' }
  | { readonly kind: 'quit' }
  | { readonly kind: 'search'; readonly term: string; readonly path?: string | undefined }
  | { readonly kind: 'info'; readonly path: string }
  | { readonly kind: 'download'; readonly target: EntryTarget }
  | { readonly kind: 'upload'; readonly cancel: boolean }
  | {
      readonly kind: 'backup';
      readonly scope?: string | undefined;
      readonly path?: string | undefined;
      readonly force: boolean;
    }
  | {
      readonly kind: 'autobackup';
      readonly enabled: boolean;
      readonly scope?: string | undefined;
      readonly path?: string | undefined;
    }
  | { readonly kind: 'restore'; readonly path: string; readonly scope?: string | undefined; readonly force: boolean }
  | { readonly kind: 'rm'; readonly target: EntryTarget }
  | { readonly kind: 'mkdir'; readonly path: string }
  | { readonly kind: 'jobs'; readonly jobId?: string | undefined }
  | { readonly kind: 'jobs_cancel'; readonly jobId: string }
  | { readonly kind: 'config'; readonly action: ConfigAction }
  | { readonly kind: 'config_set'; readonly key: string; readonly value: string }
  | { readonly kind: 'help' };

export type CommandKind = Command['kind'];

export interface ParseOptions {
  /** Leading word that introduces commands in chat, e.g. `drive` in `/drive ls`. */
  readonly prefix?: string;
}

/** Splits on whitespace; single or double quotes group words, backslash escapes the next character. */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let started = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '\\' && i + 1 < text.length) {
      current += text.charAt(i + 1);
      started = true;
      i++;
      continue;
    }
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      started = true;
      continue;
    }
    if (/\s/.test(ch)) {
      if (started) {
        tokens.push(current);
        current = '';
        started = false;
      }
      continue;
    }
    current += ch;
    started = true;
  }
  if (quote) throw new InvalidCommandError('Unterminated quote');
  if (started) tokens.push(current);
  return tokens;
}

export function parseTarget(token: string): EntryTarget {
  return /^\d+$/.test(token) ? Number.parseInt(token, 10) : token;
}

interface ScopedArgs {
  scope: string | undefined;
  path: string | undefined;
  force: boolean;
}

function scopedArgs(command: string, args: readonly string[], allowForce: boolean): ScopedArgs {
  const result: ScopedArgs = { scope: undefined, path: undefined, force: false };
  for (const arg of args) {
    if (arg === '--force' && allowForce) {
      result.force = true;
    } else if (arg.startsWith('@') && arg.length > 1) {
      if (result.scope !== undefined) throw new InvalidCommandError(`${command}: more than one @scope given`);
      result.scope = arg.slice(1);
    } else if (arg.startsWith('--')) {
      throw new InvalidCommandError(`${command}: unknown option ${arg}`);
    } else {
      if (result.path !== undefined) throw new InvalidCommandError(`${command}: more than one path given`);
      result.path = arg;
    }
  }
  return result;
}

function expectArgs(command: string, args: readonly string[], min: number, max: number): void {
  if (args.length < min) throw new InvalidCommandError(`${command}: missing argument`);
  if (args.length > max) throw new InvalidCommandError(`${command}: too many arguments`);
}

function requireArg(command: string, args: readonly string[], index: number): string {
  const value = args[index];
  if (value === undefined || value.length === 0) throw new InvalidCommandError(`${command}: missing argument`);
  return value;
}

/** Parses one chat line into a command. Throws InvalidCommandError for anything unrecognised. */
export function parseCommand(text: string, options: ParseOptions = {}): Command {
  const tokens = tokenize(text.trim().replace(/^\//, ''));
  if (options.prefix && tokens[0]?.toLowerCase() === options.prefix.toLowerCase()) {
    tokens.shift();
  }
  const head = tokens.shift();
  if (head === undefined) throw new InvalidCommandError('Empty command');
  const name = head.toLowerCase();
  const args = tokens;

  switch (name) {
    case 'ls':
    case 'cd': {
      expectArgs(name, args, 0, 1);
      const target = args[0];
      return { kind: 'ls', target: target === undefined ? undefined : parseTarget(target) };
    }
    case 'next':
    case 'prev':
    case 'quit':
    case 'help':
      expectArgs(name, args, 0, 0);
      return { kind: name };
    case 'search':
      expectArgs(name, args, 1, 2);
      return { kind: 'search', term: requireArg(name, args, 0), path: args[1] };
    case 'info':
      expectArgs(name, args, 1, 1);
      return { kind: 'info', path: requireArg(name, args, 0) };
    case 'download':
      expectArgs(name, args, 1, 1);
      return { kind: 'download', target: parseTarget(requireArg(name, args, 0)) };
    case 'upload': {
      expectArgs(name, args, 0, 1);
      const sub = args[0];
      if (sub !== undefined && sub.toLowerCase() !== 'cancel') {
        throw new InvalidCommandError(`upload: unknown action ${sub}`);
      }
      return { kind: 'upload', cancel: sub !== undefined };
    }
    case 'backup': {
      const parsed = scopedArgs(name, args, true);
      return { kind: 'backup', scope: parsed.scope, path: parsed.path, force: parsed.force };
    }
    case 'autobackup': {
      const action = requireArg(name, args, 0).toLowerCase();
      if (action !== 'enable' && action !== 'disable') {
        throw new InvalidCommandError('autobackup: expected enable or disable');
      }
      const parsed = scopedArgs(name, args.slice(1), false);
      return { kind: 'autobackup', enabled: action === 'enable', scope: parsed.scope, path: parsed.path };
    }
    case 'restore': {
      const parsed = scopedArgs(name, args, true);
      if (parsed.path === undefined) throw new InvalidCommandError('restore: missing path');
      return { kind: 'restore', path: parsed.path, scope: parsed.scope, force: parsed.force };
    }
    case 'rm':
      expectArgs(name, args, 1, 1);
      return { kind: 'rm', target: parseTarget(requireArg(name, args, 0)) };
    case 'mkdir':
      expectArgs(name, args, 1, 1);
      return { kind: 'mkdir', path: requireArg(name, args, 0) };
    case 'jobs': {
      expectArgs(name, args, 0, 2);
      if (args[0]?.toLowerCase() === 'cancel') {
        return { kind: 'jobs_cancel', jobId: requireArg(name, args, 1) };
      }
      expectArgs(name, args, 0, 1);
      return { kind: 'jobs', jobId: args[0] };
    }
    case 'config': {
      const action = (args[0] ?? 'show').toLowerCase();
      if (action === 'set') {
        expectArgs(name, args, 3, 3);
        return { kind: 'config_set', key: requireArg(name, args, 1), value: requireArg(name, args, 2) };
      }
      if (action === 'show' || action === 'setup' || action === 'test' || action === 'clear_cache') {
        expectArgs(name, args, 0, 1);
        return { kind: 'config', action };
      }
      throw new InvalidCommandError(`config: unknown action ${action}`);
    }
    default:
      throw new InvalidCommandError(`Unknown command: ${head}`);
  }
}

export const COMMAND_HELP: readonly { readonly usage: string; readonly summary: string }[] = [
  { usage: 'ls [index|path]', summary: 'List the current directory, open an entry, or fetch a file' },
  { usage: 'next / prev', summary: 'Page through the current listing' },
  { usage: 'quit', summary: 'Return to the previous directory' },
  { usage: 'search <term> [path]', summary: 'Search below a path (default: current directory)' },
  { usage: 'info <path>', summary: 'Show metadata and a link for a path' },
  { usage: 'download <index|path>', summary: 'Get a link or the file itself' },
  { usage: 'upload [cancel]', summary: 'Upload the next file you send into the current directory' },
  { usage: 'backup [@scope] [path] [--force]', summary: 'Copy the chat files to the remote' },
  { usage: 'autobackup enable|disable [@scope] [path]', summary: 'Toggle periodic backup for a chat' },
  { usage: 'restore <path> [@scope] [--force]', summary: 'Copy remote files into the chat' },
  { usage: 'rm <index|path>', summary: 'Delete a remote file or directory' },
  { usage: 'mkdir <path>', summary: 'Create a remote directory' },
  { usage: 'jobs [id] | jobs cancel <id>', summary: 'Show or cancel transfer jobs' },
  { usage: 'config show|setup|test|clear_cache|set <key> <value>', summary: 'Manage your connection' },
  { usage: 'help', summary: 'Show this list' },
];
