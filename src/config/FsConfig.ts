/**
 * Filesystem Configuration
 *
 * Library-wide settings derived from environment variables. Individual
 * calls can still override them (e.g. readBlocks(blockSize)).
 */

import os from 'os';

export interface FsConfiguration {
  /** Default block size for readBlocks/hash/copy (CAPFS_BLOCK_SIZE, default 16384) */
  blockSize: number;
  /** Default digest for Readable.hash (CAPFS_HASH_ALGORITHM, default 'md5') */
  hashAlgorithm: string;
  /** Connect timeout for remote backends in ms (CAPFS_CONNECT_TIMEOUT, default 10000) */
  connectTimeout: number;
  /** Name attempts made by createTemporaryFolder (CAPFS_TEMP_ATTEMPTS, default 20) */
  temporaryFolderAttempts: number;
  /** Local folder where staged FTP transfers are kept (CAPFS_STAGING_DIR, default os.tmpdir()) */
  stagingDir: string;
}

let cachedConfig: FsConfiguration | null = null;

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

/**
 * Get the current configuration.
 * The configuration is cached after first call; use resetFsConfig() in tests.
 */
export function getFsConfig(): FsConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    blockSize: parseNumber(process.env['CAPFS_BLOCK_SIZE'], 16384),
    hashAlgorithm: process.env['CAPFS_HASH_ALGORITHM'] || 'md5',
    connectTimeout: parseNumber(process.env['CAPFS_CONNECT_TIMEOUT'], 10000),
    temporaryFolderAttempts: parseNumber(process.env['CAPFS_TEMP_ATTEMPTS'], 20),
    stagingDir: process.env['CAPFS_STAGING_DIR'] || os.tmpdir(),
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetFsConfig(): void {
  cachedConfig = null;
}
