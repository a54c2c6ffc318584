/**
 * Mapping from errno-style failures raised by Node and protocol libraries
 * to the FsError taxonomy.
 */

import {
  AlreadyExistsError,
  BrokenLinkError,
  DisconnectedError,
  FsError,
  IOFailureError,
  NotAFileError,
  NotAFolderError,
  NotFoundError,
  PermissionDeniedError,
  UnsupportedOperationError,
} from './FsError.js';
import type { FsErrorKind } from './FsError.js';

export type ErrorCodeTable = ReadonlyMap<string | number, FsErrorKind>;

export const ERRNO_KINDS: ErrorCodeTable = new Map<string | number, FsErrorKind>([
  ['ENOENT', 'NotFound'],
  ['EEXIST', 'AlreadyExists'],
  ['EACCES', 'PermissionDenied'],
  ['EPERM', 'PermissionDenied'],
  ['ENOTDIR', 'NotAFolder'],
  ['EISDIR', 'NotAFile'],
  ['ELOOP', 'BrokenLink'],
  ['ENOTSUP', 'UnsupportedOperation'],
  ['EOPNOTSUPP', 'UnsupportedOperation'],
  ['ENOSYS', 'UnsupportedOperation'],
  ['ECONNRESET', 'Disconnected'],
  ['ECONNREFUSED', 'Disconnected'],
  ['ECONNABORTED', 'Disconnected'],
  ['EPIPE', 'Disconnected'],
  ['ETIMEDOUT', 'Disconnected'],
  ['ESHUTDOWN', 'Disconnected'],
  ['EHOSTUNREACH', 'Disconnected'],
  ['ENETUNREACH', 'Disconnected'],
]);

/** The `code` property of a library or system error, if it has one. */
export function errorCode(error: unknown): string | number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' || typeof code === 'number') {
      return code;
    }
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the FsError of the given kind for a failure at `path`.
 */
export function errorOfKind(kind: FsErrorKind, path: string, cause: unknown): FsError {
  const options = { cause };
  switch (kind) {
    case 'NotFound':
      return new NotFoundError(path, options);
    case 'AlreadyExists':
      return new AlreadyExistsError(path, options);
    case 'PermissionDenied':
      return new PermissionDeniedError(path, options);
    case 'BrokenLink':
      return new BrokenLinkError(path, options);
    case 'NotAFolder':
      return new NotAFolderError(path, options);
    case 'NotAFile':
      return new NotAFileError(path, options);
    case 'UnsupportedOperation':
      return new UnsupportedOperationError('backend', errorMessage(cause), { path, cause });
    case 'Disconnected':
      return new DisconnectedError(`Connection lost while accessing ${path}: ${errorMessage(cause)}`, {
        path,
        cause,
      });
    default:
      return new IOFailureError(`I/O failure on ${path}: ${errorMessage(cause)}`, { path, cause });
  }
}

/**
 * Translate any thrown value into an FsError. FsErrors pass through
 * unchanged; backend-specific codes in `extra` take precedence over the
 * errno table.
 */
export function translateError(error: unknown, path: string, extra?: ErrorCodeTable): FsError {
  if (error instanceof FsError) {
    return error;
  }
  const code = errorCode(error);
  if (code !== undefined) {
    const kind = extra?.get(code) ?? ERRNO_KINDS.get(code);
    if (kind) {
      return errorOfKind(kind, path, error);
    }
  }
  return new IOFailureError(`I/O failure on ${path}: ${errorMessage(error)}`, { path, cause: error });
}

/** Default disconnection predicate. */
export function isDisconnection(error: unknown): boolean {
  return error instanceof DisconnectedError;
}
