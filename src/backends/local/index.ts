export { LocalFileSystem, getLocalFileSystem, parseMountTable } from './LocalFileSystem.js';
export type { LocalFileSystemOptions, MountTableEntry } from './LocalFileSystem.js';
