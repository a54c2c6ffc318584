/**
 * SFTP backend using ssh2-sftp-client.
 *
 * Capabilities: hierarchy, readable, listable, sizable, writable (without
 * links) and a working directory kept per session. The remote side does
 * the work; this class maps FsPath to remote paths and SFTP status codes
 * to FsErrors.
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import type { Readable, Writable } from 'stream';
import SftpClient from 'ssh2-sftp-client';
import type {
  BackendPrimitives,
  ListablePrimitives,
  ReadablePrimitives,
  SizablePrimitives,
  WorkingDirectoryPrimitives,
  WritablePrimitives,
} from '../../capabilities/primitives.js';
import { definePrimitives } from '../../capabilities/primitives.js';
import { getFsConfig } from '../../config/FsConfig.js';
import {
  BrokenLinkError,
  NotAFileError,
  NotAFolderError,
  NotFoundError,
  UnsupportedOperationError,
} from '../../errors/FsError.js';
import type { FsErrorKind } from '../../errors/FsError.js';
import { translateError } from '../../errors/translate.js';
import type { ErrorCodeTable } from '../../errors/translate.js';
import { FileSystem } from '../../filesystem/FileSystem.js';
import { getLogger, registerComponent } from '../../logging/index.js';
import { FsPath } from '../../path/FsPath.js';
import { PosixHierarchy } from '../../path/hierarchies.js';
import { NodeReadStream, NodeWriteStream } from '../../streams/NodeStreams.js';
import {
  getDefaultSftpSchemeProperties,
  sftpIdentity,
  validateSftpSchemeProperties,
} from './SftpSchemeProperties.js';
import type { SftpSchemeProperties } from './SftpSchemeProperties.js';

registerComponent('sftp-fs', 'SFTP backend');
const logger = getLogger('sftp-fs');

/** SFTP status codes (draft-ietf-secsh-filexfer) and ssh2-sftp-client's own codes. */
export const SFTP_ERROR_KINDS: ErrorCodeTable = new Map<string | number, FsErrorKind>([
  [2, 'NotFound'],
  [3, 'PermissionDenied'],
  [6, 'Disconnected'],
  [7, 'Disconnected'],
  [8, 'UnsupportedOperation'],
  ['ERR_BAD_PATH', 'NotFound'],
  ['ERR_NOT_CONNECTED', 'Disconnected'],
]);

/**
 * The part of ssh2-sftp-client this backend calls. Tests supply an
 * in-process implementation.
 */
export interface SftpSession {
  exists(path: string): Promise<false | 'd' | '-' | 'l'>;
  stat(path: string): Promise<{ size: number; isDirectory: boolean; isFile: boolean }>;
  realPath(path: string): Promise<string>;
  list(path: string): Promise<Array<{ name: string }>>;
  cwd(): Promise<string>;
  mkdir(path: string, recursive?: boolean): Promise<string>;
  rmdir(path: string, recursive?: boolean): Promise<string>;
  delete(path: string, notFoundOK?: boolean): Promise<string>;
  rename(from: string, to: string): Promise<string>;
  createReadStream(path: string, options?: { start?: number }): Readable;
  createWriteStream(path: string, options?: { flags?: string }): Writable;
  end(): Promise<unknown>;
}

export class SftpFileSystem extends FileSystem {
  override readonly primitives: BackendPrimitives;

  private readonly hierarchy = new PosixHierarchy();
  private cwd: FsPath;

  constructor(
    private readonly session: SftpSession,
    override readonly identity: string,
    cwd: string = '/'
  ) {
    super();
    this.cwd = this.hierarchy.parse(cwd, FsPath.root('/'));
    this.primitives = definePrimitives({
      hierarchy: this.hierarchy,
      readable: this.readablePrimitives(),
      listable: this.listablePrimitives(),
      sizable: this.sizablePrimitives(),
      writable: this.writablePrimitives(),
      workingDirectory: this.workingDirectoryPrimitives(),
    });
  }

  /** Wrap an already connected session, starting in its remote working folder. */
  static async open(session: SftpSession, identity: string): Promise<SftpFileSystem> {
    let cwd: string;
    try {
      cwd = await session.cwd();
    } catch (error) {
      throw translateError(error, '.', SFTP_ERROR_KINDS);
    }
    return new SftpFileSystem(session, identity, cwd);
  }

  protected override async rootPaths(): Promise<FsPath[]> {
    return [FsPath.root('/')];
  }

  override async close(): Promise<void> {
    logger.debug(`Closing ${this.identity}`);
    await this.call(FsPath.root('/'), () => this.session.end());
  }

  private format(path: FsPath): string {
    return this.hierarchy.format(path);
  }

  private async call<T>(path: FsPath, operation: (remote: string) => Promise<T>): Promise<T> {
    const remote = this.format(path);
    try {
      return await operation(remote);
    } catch (error) {
      throw translateError(error, remote, SFTP_ERROR_KINDS);
    }
  }

  private translator(remote: string): (error: unknown) => Error {
    return (error) => translateError(error, remote, SFTP_ERROR_KINDS);
  }

  /** stat (following links), or null when nothing resolvable is there. */
  private async statOrNull(path: FsPath): Promise<{ size: number; isDirectory: boolean; isFile: boolean } | null> {
    try {
      return await this.call(path, (remote) => this.session.stat(remote));
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private async sizeOf(path: FsPath): Promise<number> {
    const stats = await this.statOrNull(path);
    if (!stats) return 0;
    if (!stats.isDirectory) {
      return stats.isFile ? stats.size : 0;
    }
    let total = 0;
    for (const name of await this.names(path)) {
      total += await this.sizeOf(path.join(name));
    }
    return total;
  }

  private async names(path: FsPath): Promise<string[]> {
    const entries = await this.call(path, (remote) => this.session.list(remote));
    return entries
      .map((entry) => entry.name)
      .filter((name) => name !== '.' && name !== '..')
      .sort();
  }

  private readablePrimitives(): ReadablePrimitives {
    return {
      seekable: true,
      isFile: async (path) => (await this.statOrNull(path))?.isFile ?? false,
      isFolder: async (path) => (await this.statOrNull(path))?.isDirectory ?? false,
      exists: async (path) => (await this.call(path, (remote) => this.session.exists(remote))) !== false,
      linkTarget: async (path) => {
        const type = await this.call(path, (remote) => this.session.exists(remote));
        if (type !== 'l') return null;
        // SFTP exposes no readlink here; the resolved path stands in for the raw target.
        try {
          return await this.call(path, (remote) => this.session.realPath(remote));
        } catch (error) {
          if (error instanceof NotFoundError) {
            throw new BrokenLinkError(this.format(path), { cause: error });
          }
          throw error;
        }
      },
      openForReading: async (path, options) => {
        const stats = await this.statOrNull(path);
        const remote = this.format(path);
        if (!stats) throw new NotFoundError(remote);
        if (!stats.isFile) throw new NotAFileError(remote);
        const source = await this.call(path, async (target) =>
          this.session.createReadStream(target, { start: options?.start ?? 0 })
        );
        return new NodeReadStream(source, this.translator(remote));
      },
    };
  }

  private listablePrimitives(): ListablePrimitives {
    return {
      childNames: async (path) => {
        const stats = await this.statOrNull(path);
        return stats?.isDirectory ? this.names(path) : null;
      },
    };
  }

  private sizablePrimitives(): SizablePrimitives {
    return {
      size: (path) => this.sizeOf(path),
    };
  }

  private writablePrimitives(): WritablePrimitives {
    return {
      writeDelivery: 'at-least-once',
      openForWriting: async (path, options) => {
        const remote = this.format(path);
        const sink = await this.call(path, async (target) =>
          this.session.createWriteStream(target, { flags: options?.append ? 'a' : 'w' })
        );
        return new NodeWriteStream(sink, this.translator(remote));
      },
      createFolder: (path) =>
        this.call(path, async (remote) => {
          await this.session.mkdir(remote, false);
        }),
      linkTo: async (path) => {
        throw new UnsupportedOperationError('writable', 'linkTo', { path: this.format(path) });
      },
      deleteJustThisThing: (path) =>
        this.call(path, async (remote) => {
          const type = await this.session.exists(remote);
          if (type === false) {
            throw new NotFoundError(remote);
          }
          if (type === 'd') {
            await this.session.rmdir(remote, false);
          } else {
            await this.session.delete(remote);
          }
        }),
      rename: (from, to) =>
        this.call(from, async (remote) => {
          await this.session.rename(remote, this.format(to));
        }),
    };
  }

  private workingDirectoryPrimitives(): WorkingDirectoryPrimitives {
    return {
      changeTo: async (path) => {
        const stats = await this.statOrNull(path);
        if (!stats?.isDirectory) {
          throw new NotAFolderError(this.format(path));
        }
        this.cwd = path;
      },
      currentPath: async () => this.cwd,
    };
  }
}

/**
 * Build the ssh2-sftp-client connect options for a set of properties.
 */
export function buildConnectOptions(props: SftpSchemeProperties): SftpClient.ConnectOptions {
  const connectConfig: SftpClient.ConnectOptions = {
    host: props.host,
    port: props.port,
    username: props.username,
    readyTimeout: props.timeout ?? getFsConfig().connectTimeout,
    retries: 1,
    retry_minTimeout: 2000,
  };

  if (props.keyAuth && props.keyFile) {
    try {
      connectConfig.privateKey = fs.readFileSync(props.keyFile);
    } catch (error) {
      throw new Error(
        `Failed to read private key file: ${props.keyFile} - ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    if (props.passPhrase) {
      connectConfig.passphrase = props.passPhrase;
    }
  }

  if (props.passwordAuth && props.password) {
    connectConfig.password = props.password;
  }

  connectConfig.hostVerifier = hostKeyVerifier(props);

  return connectConfig;
}

/** OpenSSH-style SHA256 fingerprint of a raw host key. */
export function hostKeyFingerprint(key: Buffer): string {
  return `SHA256:${createHash('sha256').update(key).digest('base64').replace(/=+$/, '')}`;
}

/**
 * Host key check for ssh2: anything goes with checking off, otherwise the
 * key must match the configured fingerprint.
 */
export function hostKeyVerifier(
  props: Pick<SftpSchemeProperties, 'host' | 'hostKeyChecking' | 'hostKeyFingerprint'>
): (key: Buffer) => boolean {
  if (props.hostKeyChecking === 'no') {
    return () => true;
  }
  const expected = `SHA256:${props.hostKeyFingerprint.trim().replace(/^SHA256:/i, '').replace(/=+$/, '')}`;
  return (key) => {
    const actual = hostKeyFingerprint(key);
    if (actual === expected) {
      return true;
    }
    logger.warn(`Host key ${actual} of ${props.host} does not match ${expected}`);
    return false;
  };
}

/**
 * Connect to an SFTP server and wrap the session.
 */
export async function connectSftp(properties: Partial<SftpSchemeProperties>): Promise<SftpFileSystem> {
  const props: SftpSchemeProperties = { ...getDefaultSftpSchemeProperties(), ...properties };
  validateSftpSchemeProperties(props);

  const identity = sftpIdentity(props);
  const client = new SftpClient();
  try {
    await client.connect(buildConnectOptions(props));
  } catch (error) {
    throw translateError(error, identity, SFTP_ERROR_KINDS);
  }
  logger.debug(`Connected to ${identity}`);
  return SftpFileSystem.open(client, identity);
}
