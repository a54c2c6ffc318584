export { FileScheme, createFileSystem, fileSystemFactory } from './factory.js';
export type { HttpSchemeProperties, SchemeProperties } from './factory.js';
export * from './local/index.js';
export * from './memory/index.js';
export * from './sftp/index.js';
export * from './ftp/index.js';
export * from './url/index.js';
