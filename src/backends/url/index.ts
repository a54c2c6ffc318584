export { UrlFileSystem, URL_ERROR_KINDS, statusError } from './UrlFileSystem.js';
export type { UrlFileSystemOptions } from './UrlFileSystem.js';
