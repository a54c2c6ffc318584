/**
 * capfs
 *
 * A capability-based virtual filesystem: one node API over local disks,
 * memory, SFTP, FTP and HTTP, with a reconnecting proxy for remote
 * backends.
 */

export { FsPath } from './path/FsPath.js';
export { PosixHierarchy, WindowsHierarchy, UrlHierarchy } from './path/hierarchies.js';
export type { Hierarchy } from './path/hierarchies.js';

export * from './errors/index.js';

export { CAPABILITIES, capabilitiesOf, definePrimitives, requireCapability } from './capabilities/primitives.js';
export type {
  BackendPrimitives,
  Capability,
  ExtendedAttributePrimitives,
  ListablePrimitives,
  ReadablePrimitives,
  SizablePrimitives,
  WorkingDirectoryPrimitives,
  WritablePrimitives,
} from './capabilities/primitives.js';
export { Readable, MAX_LINK_DEPTH } from './capabilities/Readable.js';
export type { CopyOptions } from './capabilities/Readable.js';
export { Writable } from './capabilities/Writable.js';
export type { CreateFolderOptions, DeleteOptions } from './capabilities/Writable.js';
export { Listable } from './capabilities/Listable.js';
export type { RecurseDecision, RecurseFilter, RecurseOptions } from './capabilities/Listable.js';
export { Sizable } from './capabilities/Sizable.js';
export { ExtendedAttributes } from './capabilities/ExtendedAttributes.js';
export { WorkingDirectory } from './capabilities/WorkingDirectory.js';
export { NodeSequence } from './capabilities/NodeSequence.js';
export { globToRegex, hasMagic, matchesSegment } from './capabilities/glob.js';

export { FsNode } from './node/FsNode.js';
export { FileSystem } from './filesystem/FileSystem.js';
export { MountPoint, makeUsage } from './filesystem/MountPoint.js';
export type { DiskUsage, Usage } from './filesystem/MountPoint.js';

export { withStream, skipBytes } from './streams/types.js';
export type { ReadOptions, ReadStream, WriteDelivery, WriteOptions, WriteStream } from './streams/types.js';
export { NodeReadStream, NodeWriteStream } from './streams/NodeStreams.js';

export { getFsConfig, resetFsConfig } from './config/FsConfig.js';
export type { FsConfiguration } from './config/FsConfig.js';

export * from './logging/index.js';
export * from './backends/index.js';
export * from './reconnect/index.js';
