export type ChatDriveErrorCode =
  | 'connection_error'
  | 'auth_error'
  | 'not_configured'
  | 'index_out_of_range'
  | 'no_parent'
  | 'size_limit_exceeded'
  | 'extension_not_allowed'
  | 'partial_failure'
  | 'not_found'
  | 'remote_error'
  | 'invalid_target'
  | 'no_active_listing'
  | 'not_in_upload_mode'
  | 'job_in_progress'
  | 'job_not_found'
  | 'invalid_command'
  | 'invalid_setting';

export class ChatDriveError extends Error {
  public readonly code: ChatDriveErrorCode;
  public readonly details: unknown;

  public constructor(code: ChatDriveErrorCode, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ChatDriveError';
    this.code = code;
    this.details = options?.details;
  }
}

/** Remote service unreachable or the request did not complete. */
export class ConnectionError extends ChatDriveError {
  public constructor(message: string, cause?: unknown) {
    super('connection_error', message, { cause });
    this.name = 'ConnectionError';
  }
}

/** The remote service rejected the session's credentials. */
export class AuthError extends ChatDriveError {
  public constructor(message: string, cause?: unknown) {
    super('auth_error', message, { cause });
    this.name = 'AuthError';
  }
}

export class NotConfiguredError extends ChatDriveError {
  public constructor(message = 'No remote server is configured for this user') {
    super('not_configured', message);
    this.name = 'NotConfiguredError';
  }
}

export class IndexOutOfRangeError extends ChatDriveError {
  public readonly index: number;
  public readonly pageCount: number;

  public constructor(index: number, pageCount: number) {
    super('index_out_of_range', `Index ${index} is not on the current page (1-${pageCount})`, {
      details: { index, pageCount },
    });
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.pageCount = pageCount;
  }
}

export class NoParentError extends ChatDriveError {
  public constructor() {
    super('no_parent', 'Already at the traversal root');
    this.name = 'NoParentError';
  }
}

export class SizeLimitExceededError extends ChatDriveError {
  public readonly size: number;
  public readonly limit: number;

  public constructor(name: string, size: number, limit: number) {
    super('size_limit_exceeded', `${name} is ${size} bytes, limit is ${limit} bytes`, {
      details: { name, size, limit },
    });
    this.name = 'SizeLimitExceededError';
    this.size = size;
    this.limit = limit;
  }
}

export class ExtensionNotAllowedError extends ChatDriveError {
  public readonly extension: string;

  public constructor(name: string, extension: string) {
    super('extension_not_allowed', `Extension "${extension || '(none)'}" of ${name} is not allowed`, {
      details: { name, extension },
    });
    this.name = 'ExtensionNotAllowedError';
    this.extension = extension;
  }
}

export interface PartialFailureItem {
  readonly name: string;
  readonly source: string;
  readonly reason: string;
}

/** Job-level outcome: the job finished but some items failed. */
export class PartialFailureError extends ChatDriveError {
  public readonly jobId: string;
  public readonly failures: readonly PartialFailureItem[];

  public constructor(jobId: string, total: number, failures: readonly PartialFailureItem[]) {
    super('partial_failure', `${failures.length} of ${total} item(s) failed in job ${jobId}`, {
      details: { jobId, total, failures },
    });
    this.name = 'PartialFailureError';
    this.jobId = jobId;
    this.failures = failures;
  }
}

export class NotFoundError extends ChatDriveError {
  public constructor(path: string) {
    super('not_found', `Not found: ${path}`, { details: { path } });
    this.name = 'NotFoundError';
  }
}

/** The remote answered, but with an error that is neither auth nor not-found. */
export class RemoteServiceError extends ChatDriveError {
  public readonly remoteCode: number | null;

  public constructor(message: string, remoteCode: number | null) {
    super('remote_error', message, { details: { remoteCode } });
    this.name = 'RemoteServiceError';
    this.remoteCode = remoteCode;
  }
}

export class InvalidTargetError extends ChatDriveError {
  public constructor(message: string) {
    super('invalid_target', message);
    this.name = 'InvalidTargetError';
  }
}

export class NoActiveListingError extends ChatDriveError {
  public constructor() {
    super('no_active_listing', 'Nothing is listed yet, run ls first');
    this.name = 'NoActiveListingError';
  }
}

export class NotInUploadModeError extends ChatDriveError {
  public constructor() {
    super('not_in_upload_mode', 'Upload mode is not active');
    this.name = 'NotInUploadModeError';
  }
}

export class JobInProgressError extends ChatDriveError {
  public readonly jobId: string;

  public constructor(jobId: string) {
    super('job_in_progress', `Job ${jobId} is still running`, { details: { jobId } });
    this.name = 'JobInProgressError';
    this.jobId = jobId;
  }
}

export class JobNotFoundError extends ChatDriveError {
  public constructor(jobId: string) {
    super('job_not_found', `Unknown job: ${jobId}`, { details: { jobId } });
    this.name = 'JobNotFoundError';
  }
}

export class InvalidCommandError extends ChatDriveError {
  public constructor(message: string) {
    super('invalid_command', message);
    this.name = 'InvalidCommandError';
  }
}

export class InvalidSettingError extends ChatDriveError {
  public constructor(message: string) {
    super('invalid_setting', message);
    this.name = 'InvalidSettingError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
