/**
 * Backend selection by scheme.
 *
 * createFileSystem() builds (and, for remote schemes, connects) one backend
 * instance. fileSystemFactory() returns a function that does the same on
 * every call, which is what wrap() needs to rebuild a lost connection.
 */

import type { FileSystem } from '../filesystem/FileSystem.js';
import type { FileSystemFactory } from '../reconnect/ReconnectingFileSystem.js';
import { connectFtp } from './ftp/FtpFileSystem.js';
import type { FtpSchemeProperties } from './ftp/FtpSchemeProperties.js';
import { LocalFileSystem, getLocalFileSystem } from './local/LocalFileSystem.js';
import type { LocalFileSystemOptions } from './local/LocalFileSystem.js';
import { MemoryFileSystem } from './memory/MemoryFileSystem.js';
import type { MemoryFileSystemOptions } from './memory/MemoryFileSystem.js';
import { connectSftp } from './sftp/SftpFileSystem.js';
import type { SftpSchemeProperties } from './sftp/SftpSchemeProperties.js';
import { UrlFileSystem } from './url/UrlFileSystem.js';
import type { UrlFileSystemOptions } from './url/UrlFileSystem.js';

export enum FileScheme {
  FILE = 'FILE',
  MEMORY = 'MEMORY',
  SFTP = 'SFTP',
  FTP = 'FTP',
  HTTP = 'HTTP',
}

export interface HttpSchemeProperties extends UrlFileSystemOptions {
  /** Origin (or any URL on it) the filesystem serves */
  origin: string;
}

/** Properties accepted by each scheme. */
export interface SchemeProperties {
  [FileScheme.FILE]: LocalFileSystemOptions;
  [FileScheme.MEMORY]: MemoryFileSystemOptions;
  [FileScheme.SFTP]: Partial<SftpSchemeProperties>;
  [FileScheme.FTP]: Partial<FtpSchemeProperties>;
  [FileScheme.HTTP]: HttpSchemeProperties;
}

const CREATORS: { [S in FileScheme]: (properties: SchemeProperties[S]) => Promise<FileSystem> } = {
  [FileScheme.FILE]: async (properties) =>
    Object.keys(properties).length === 0 ? getLocalFileSystem() : new LocalFileSystem(properties),
  [FileScheme.MEMORY]: async (properties) => new MemoryFileSystem(properties),
  [FileScheme.SFTP]: (properties) => connectSftp(properties),
  [FileScheme.FTP]: (properties) => connectFtp(properties),
  [FileScheme.HTTP]: async ({ origin, ...options }) => new UrlFileSystem(origin, options),
};

/**
 * Create a FileSystem for the given scheme and properties.
 *
 * @returns a connected FileSystem; FILE without properties returns the shared local instance
 */
export function createFileSystem<S extends FileScheme>(scheme: S, properties: SchemeProperties[S]): Promise<FileSystem> {
  const create: (properties: SchemeProperties[S]) => Promise<FileSystem> = CREATORS[scheme];
  if (!create) {
    return Promise.reject(new Error(`Unknown file scheme: ${String(scheme)}`));
  }
  return create(properties);
}

/**
 * A factory building a fresh FileSystem per call, for wrap().
 */
export function fileSystemFactory<S extends FileScheme>(scheme: S, properties: SchemeProperties[S]): FileSystemFactory {
  return () => createFileSystem(scheme, properties);
}
