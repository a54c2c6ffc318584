export { wrap, ReconnectingFileSystem } from './ReconnectingFileSystem.js';
export type { Connection, ConnectionState, FileSystemFactory, WrapOptions } from './ReconnectingFileSystem.js';
export { ReconnectingReadStream, ReconnectingWriteStream } from './ReconnectingStreams.js';
