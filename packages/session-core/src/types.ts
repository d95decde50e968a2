export type EntryKind = 'directory' | 'file';

export interface Entry {
  readonly name: string;
  readonly kind: EntryKind;
  /** Bytes; directories may report an aggregate size or 0. */
  readonly size: number;
  readonly modifiedAt: string;
  /** Absolute remote path of the entry. */
  readonly path: string;
}

export interface EntryDetail extends Entry {
  readonly provider?: string | undefined;
  readonly sign?: string | undefined;
  readonly rawUrl?: string | undefined;
}

export interface RemoteCredentials {
  readonly serverUrl: string;
  readonly username: string;
  readonly password: string;
  readonly token: string;
  /** Host used when building links handed to chat users. */
  readonly publicUrl: string;
  /** Storage prefix prepended to paths inside download links. */
  readonly baseDirectory: string;
}

/**
 * Capability surface of the remote file-listing service. Implementations raise
 * ConnectionError, AuthError, NotFoundError or RemoteServiceError.
 */
export interface RemoteFileService {
  list(path: string, credentials: RemoteCredentials): Promise<readonly Entry[]>;
  info(path: string, credentials: RemoteCredentials): Promise<EntryDetail>;
  link(path: string, credentials: RemoteCredentials): Promise<string>;
  search(term: string, path: string, credentials: RemoteCredentials): Promise<readonly Entry[]>;
  upload(
    directory: string,
    name: string,
    content: Uint8Array,
    credentials: RemoteCredentials
  ): Promise<void>;
  read(path: string, credentials: RemoteCredentials): Promise<Uint8Array>;
  delete(path: string, credentials: RemoteCredentials): Promise<void>;
  mkdir(path: string, credentials: RemoteCredentials): Promise<void>;
}

export interface ChatFile {
  readonly name: string;
  /** Folder inside the chat scope, '' for the scope root. */
  readonly folder: string;
  readonly size: number;
  read(): Promise<Uint8Array>;
}

/** The chat platform's per-scope file area (group files). */
export interface ChatFileStore {
  listFiles(scope: string): Promise<readonly ChatFile[]>;
  exists(scope: string, folder: string, name: string): Promise<boolean>;
  putFile(scope: string, folder: string, name: string, content: Uint8Array): Promise<void>;
}

export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export const noopLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
