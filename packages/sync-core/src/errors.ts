export type ListSyncErrorKind =
  | 'not_found'
  | 'permission_denied'
  | 'decode_failed'
  | 'remote_unavailable';

export abstract class ListSyncError extends Error {
  abstract readonly kind: ListSyncErrorKind;

  constructor(
    message: string,
    readonly path: string | undefined,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FileNotFoundError extends ListSyncError {
  readonly kind = 'not_found' as const;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`File not found: ${path}`, path, options);
  }
}

/**
 * Raised before any write is attempted on a read-only target.
 */
export class PermissionDeniedError extends ListSyncError {
  readonly kind = 'permission_denied' as const;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`File is read-only: ${path}`, path, options);
  }
}

export class DocumentDecodeError extends ListSyncError {
  readonly kind = 'decode_failed' as const;

  constructor(
    readonly reason: string,
    path?: string,
    options?: { cause?: unknown },
  ) {
    super(
      path
        ? `Failed to decode list document at ${path}: ${reason}`
        : `Failed to decode list document: ${reason}`,
      path,
      options,
    );
  }

  /**
   * Copy of this error attributed to a file path.
   */
  withPath(path: string): DocumentDecodeError {
    return new DocumentDecodeError(this.reason, path, { cause: this.cause });
  }
}

export class RemoteUnavailableError extends ListSyncError {
  readonly kind = 'remote_unavailable' as const;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Remote content unavailable for ${path}: ${reason}`, path, options);
  }
}

export function isListSyncError(err: unknown, kind?: ListSyncErrorKind): err is ListSyncError {
  return err instanceof ListSyncError && (kind === undefined || err.kind === kind);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Maps Node file-system errors onto the sync error taxonomy. Errors without a
 * matching code are returned unchanged.
 */
export function mapFsError(err: unknown, path: string): unknown {
  if (err instanceof ListSyncError) {
    return err;
  }
  const code = errnoCode(err);
  if (code === 'ENOENT') {
    return new FileNotFoundError(path, { cause: err });
  }
  if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
    return new PermissionDeniedError(path, { cause: err });
  }
  return err;
}
