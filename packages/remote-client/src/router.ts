import {
  ConnectionError,
  type Entry,
  type EntryDetail,
  type RemoteCredentials,
  type RemoteFileService,
} from '@chatdrive/session-core';
import { OpenListClient, type OpenListClientOptions } from './openlist-client.js';
import { SftpFileService, type SftpFileServiceOptions } from './sftp-file-service.js';

export interface RemoteBackends {
  /** Serves http:// and https:// server URLs. */
  readonly http: RemoteFileService;
  /** Serves sftp:// server URLs. */
  readonly sftp: RemoteFileService;
}

export interface RoutingFileService extends RemoteFileService {
  close(): void;
}

export function backendFor(backends: RemoteBackends, serverUrl: string): RemoteFileService {
  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(serverUrl)?.[1]?.toLowerCase();
  if (scheme === 'http' || scheme === 'https') return backends.http;
  if (scheme === 'sftp') return backends.sftp;
  throw new ConnectionError(`Unsupported server URL: ${serverUrl}`);
}

/** Picks the backend from each call's server URL scheme. */
export function routeByScheme(backends: RemoteBackends, onClose: () => void = () => undefined): RoutingFileService {
  const pick = (credentials: RemoteCredentials): RemoteFileService => backendFor(backends, credentials.serverUrl);
  return {
    list: (path, credentials): Promise<readonly Entry[]> => pick(credentials).list(path, credentials),
    info: (path, credentials): Promise<EntryDetail> => pick(credentials).info(path, credentials),
    link: (path, credentials) => pick(credentials).link(path, credentials),
    search: (term, path, credentials) => pick(credentials).search(term, path, credentials),
    upload: (directory, name, content, credentials) =>
      pick(credentials).upload(directory, name, content, credentials),
    read: (path, credentials) => pick(credentials).read(path, credentials),
    delete: (path, credentials) => pick(credentials).delete(path, credentials),
    mkdir: (path, credentials) => pick(credentials).mkdir(path, credentials),
    close: onClose,
  };
}

export interface RemoteFileServiceOptions {
  readonly openList?: OpenListClientOptions;
  readonly sftp?: SftpFileServiceOptions;
}

export function createRemoteFileService(options: RemoteFileServiceOptions = {}): RoutingFileService {
  const sftp = new SftpFileService(options.sftp);
  return routeByScheme({ http: new OpenListClient(options.openList), sftp }, () => sftp.closeAll());
}
