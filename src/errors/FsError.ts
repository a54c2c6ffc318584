/**
 * Filesystem error taxonomy.
 *
 * Every failure surfaced by a backend or a derived operation is an FsError
 * subclass, so callers can tell "does not exist" from "exists but this
 * backend cannot do that" from "connection lost and already retried".
 */

export type FsErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'UnsupportedOperation'
  | 'PermissionDenied'
  | 'BrokenLink'
  | 'Disconnected'
  | 'IOFailure'
  | 'NotAFolder'
  | 'NotAFile'
  | 'PathTraversal';

export interface FsErrorOptions {
  /** Native path string of the node involved, when known */
  path?: string;
  cause?: unknown;
}

export class FsError extends Error {
  readonly path?: string;

  constructor(
    readonly kind: FsErrorKind,
    message: string,
    options: FsErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FsError';
    this.path = options.path;
  }
}

export class NotFoundError extends FsError {
  constructor(path: string, options: Omit<FsErrorOptions, 'path'> & { message?: string } = {}) {
    super('NotFound', options.message ?? `No such file or folder: ${path}`, { ...options, path });
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends FsError {
  constructor(path: string, options: Omit<FsErrorOptions, 'path'> = {}) {
    super('AlreadyExists', `Already exists: ${path}`, { ...options, path });
    this.name = 'AlreadyExistsError';
  }
}

export class UnsupportedOperationError extends FsError {
  constructor(
    readonly capability: string,
    readonly operation: string,
    options: FsErrorOptions = {}
  ) {
    const where = options.path ? ` (${options.path})` : '';
    super('UnsupportedOperation', `${capability}.${operation} is not supported by this backend${where}`, options);
    this.name = 'UnsupportedOperationError';
  }
}

export class PermissionDeniedError extends FsError {
  constructor(path: string, options: Omit<FsErrorOptions, 'path'> = {}) {
    super('PermissionDenied', `Permission denied: ${path}`, { ...options, path });
    this.name = 'PermissionDeniedError';
  }
}

export class BrokenLinkError extends FsError {
  constructor(path: string, options: Omit<FsErrorOptions, 'path'> = {}) {
    super('BrokenLink', `Link target cannot be resolved: ${path}`, { ...options, path });
    this.name = 'BrokenLinkError';
  }
}

export interface DisconnectedErrorOptions extends FsErrorOptions {
  /** Set once the reconnecting proxy has rebuilt the backend and the retry failed too */
  reconnectAttempted?: boolean;
}

export class DisconnectedError extends FsError {
  readonly reconnectAttempted: boolean;

  constructor(message: string, options: DisconnectedErrorOptions = {}) {
    super('Disconnected', message, options);
    this.name = 'DisconnectedError';
    this.reconnectAttempted = options.reconnectAttempted ?? false;
  }
}

export class IOFailureError extends FsError {
  constructor(message: string, options: FsErrorOptions = {}) {
    super('IOFailure', message, options);
    this.name = 'IOFailureError';
  }
}

export class NotAFolderError extends FsError {
  constructor(path: string, options: Omit<FsErrorOptions, 'path'> = {}) {
    super('NotAFolder', `Does not exist or is not a folder: ${path}`, { ...options, path });
    this.name = 'NotAFolderError';
  }
}

export class NotAFileError extends FsError {
  constructor(path: string, options: Omit<FsErrorOptions, 'path'> = {}) {
    super('NotAFile', `Does not exist or is not a file: ${path}`, { ...options, path });
    this.name = 'NotAFileError';
  }
}

/** Raised by safeChild when the joined names would leave the parent's subtree. */
export class PathTraversalError extends FsError {
  constructor(
    readonly base: string,
    readonly names: readonly string[]
  ) {
    super('PathTraversal', `Path ${JSON.stringify(names.join('/'))} escapes ${base}`, { path: base });
    this.name = 'PathTraversalError';
  }
}
