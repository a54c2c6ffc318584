/**
 * Backend primitives, one interface per capability.
 *
 * A backend is whatever subset of these it implements: the FileSystem
 * exposes a BackendPrimitives record, and a Node's capability set is the
 * set of entries present in it. Every primitive is keyed by FsPath so the
 * same record serves every node of the filesystem (and so the reconnecting
 * proxy can replay a call against a fresh backend).
 */

import { UnsupportedOperationError } from '../errors/FsError.js';
import type { FsPath } from '../path/FsPath.js';
import type { Hierarchy } from '../path/hierarchies.js';
import type { ReadOptions, ReadStream, WriteDelivery, WriteOptions, WriteStream } from '../streams/types.js';

export type Capability =
  | 'hierarchy'
  | 'xattrs'
  | 'listable'
  | 'readable'
  | 'sizable'
  | 'workingDirectory'
  | 'writable';

export const CAPABILITIES: readonly Capability[] = [
  'hierarchy',
  'xattrs',
  'listable',
  'readable',
  'sizable',
  'workingDirectory',
  'writable',
];

export interface ReadablePrimitives {
  /** Whether openForReading honors ReadOptions.start */
  readonly seekable: boolean;
  /** True for a file, following links */
  isFile(path: FsPath): Promise<boolean>;
  /** True for a folder, following links */
  isFolder(path: FsPath): Promise<boolean>;
  /** True if anything (including a broken link) is present, without following links */
  exists(path: FsPath): Promise<boolean>;
  /** Raw target of a link, or null if the node is not a link */
  linkTarget(path: FsPath): Promise<string | null>;
  openForReading(path: FsPath, options?: ReadOptions): Promise<ReadStream>;
}

export interface ListablePrimitives {
  /** Sorted child names, or null when the node is not a folder */
  childNames(path: FsPath): Promise<string[] | null>;
}

export interface SizablePrimitives {
  size(path: FsPath): Promise<number>;
}

export interface WritablePrimitives {
  readonly writeDelivery: WriteDelivery;
  openForWriting(path: FsPath, options?: WriteOptions): Promise<WriteStream>;
  /** Create a single folder; the parent must exist */
  createFolder(path: FsPath): Promise<void>;
  /** Create a link at `path` whose raw target is `target` */
  linkTo(path: FsPath, target: string): Promise<void>;
  /** Remove a file, a link or an empty folder */
  deleteJustThisThing(path: FsPath): Promise<void>;
  /** Native rename within this filesystem, where the backend has one */
  rename?(from: FsPath, to: FsPath): Promise<void>;
}

export interface ExtendedAttributePrimitives {
  /** @throws NotFoundError when the attribute is absent */
  getXattr(path: FsPath, name: string): Promise<Buffer>;
  setXattr(path: FsPath, name: string, value: Buffer): Promise<void>;
  deleteXattr(path: FsPath, name: string): Promise<void>;
  listXattrs(path: FsPath): Promise<string[]>;
}

export interface WorkingDirectoryPrimitives {
  changeTo(path: FsPath): Promise<void>;
  currentPath(): Promise<FsPath>;
}

export interface BackendPrimitives {
  readonly hierarchy: Hierarchy;
  readonly readable?: ReadablePrimitives;
  readonly listable?: ListablePrimitives;
  readonly sizable?: SizablePrimitives;
  readonly writable?: WritablePrimitives;
  readonly xattrs?: ExtendedAttributePrimitives;
  readonly workingDirectory?: WorkingDirectoryPrimitives;
}

export function capabilitiesOf(primitives: BackendPrimitives): Capability[] {
  return CAPABILITIES.filter((capability) => primitives[capability] !== undefined);
}

/**
 * Check a backend's primitive record for capabilities whose derived
 * operations depend on another one: Listable and Writable both need Readable.
 * @throws Error naming the missing dependency
 */
export function definePrimitives<P extends BackendPrimitives>(primitives: P): P {
  if (primitives.listable && !primitives.readable) {
    throw new Error('A listable backend must also be readable');
  }
  if (primitives.writable && !primitives.readable) {
    throw new Error('A writable backend must also be readable');
  }
  return primitives;
}

/**
 * The primitives of one capability, or UnsupportedOperationError when the
 * backend does not implement it.
 */
export function requireCapability<T>(capability: Capability, primitives: T | undefined, path?: string): T {
  if (primitives === undefined) {
    throw new UnsupportedOperationError(capability, 'access', { path });
  }
  return primitives;
}
