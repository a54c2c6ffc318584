export { MemoryFileSystem, BufferReadStream } from './MemoryFileSystem.js';
export type { MemoryFileSystemOptions } from './MemoryFileSystem.js';
export { MemoryStore } from './MemoryStore.js';
export type { MemoryEntry, MemoryFile, MemoryFolder, MemoryLink } from './MemoryStore.js';
