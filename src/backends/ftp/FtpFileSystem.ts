/**
 * FTP/FTPS backend using the 'basic-ftp' library.
 *
 * basic-ftp drives a single control connection, so every command goes
 * through a ControlChannelLock. File content is staged in local temporary
 * files: reads download the whole file first, writes upload on close
 * (writeDelivery 'staged').
 */

import { Client } from 'basic-ftp';
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
  DisconnectedError,
  NotAFileError,
  NotAFolderError,
  NotFoundError,
  UnsupportedOperationError,
} from '../../errors/FsError.js';
import type { FsErrorKind } from '../../errors/FsError.js';
import { errorCode, errorMessage, translateError } from '../../errors/translate.js';
import type { ErrorCodeTable } from '../../errors/translate.js';
import { FileSystem } from '../../filesystem/FileSystem.js';
import { getLogger, registerComponent } from '../../logging/index.js';
import { FsPath } from '../../path/FsPath.js';
import { PosixHierarchy } from '../../path/hierarchies.js';
import { ControlChannelLock } from './ControlChannelLock.js';
import {
  ftpIdentity,
  getDefaultFtpSchemeProperties,
  validateFtpSchemeProperties,
} from './FtpSchemeProperties.js';
import type { FtpSchemeProperties } from './FtpSchemeProperties.js';
import { StagedReadStream, StagedWriteStream, removeStaged, stagingPath } from './StagedStreams.js';

registerComponent('ftp-fs', 'FTP backend');
const logger = getLogger('ftp-fs');

/** FTP reply codes (RFC 959) with a matching error kind. */
export const FTP_ERROR_KINDS: ErrorCodeTable = new Map<string | number, FsErrorKind>([
  [421, 'Disconnected'],
  [425, 'Disconnected'],
  [426, 'Disconnected'],
  [530, 'PermissionDenied'],
  [532, 'PermissionDenied'],
  [550, 'NotFound'],
]);

/** basic-ftp FileType.SymbolicLink / FileType.Directory */
const TYPE_DIRECTORY = 2;
const TYPE_SYMBOLIC_LINK = 3;

export interface FtpListEntry {
  name: string;
  type: number;
  link?: string;
}

/**
 * The part of basic-ftp's Client this backend calls. Tests supply an
 * in-process implementation.
 */
export interface FtpSession {
  readonly closed: boolean;
  cd(path: string): Promise<unknown>;
  pwd(): Promise<string>;
  list(path?: string): Promise<FtpListEntry[]>;
  size(path: string): Promise<number>;
  downloadTo(destination: string, fromRemotePath: string, startAt?: number): Promise<unknown>;
  uploadFrom(source: string, toRemotePath: string): Promise<unknown>;
  appendFrom(source: string, toRemotePath: string): Promise<unknown>;
  remove(path: string): Promise<unknown>;
  removeEmptyDir(path: string): Promise<unknown>;
  rename(from: string, to: string): Promise<unknown>;
  send(command: string): Promise<unknown>;
  close(): void;
}

export class FtpFileSystem extends FileSystem {
  override readonly primitives: BackendPrimitives;

  private readonly hierarchy = new PosixHierarchy();
  private readonly lock = new ControlChannelLock();
  private cwd: FsPath;

  constructor(
    private readonly session: FtpSession,
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

  protected override async rootPaths(): Promise<FsPath[]> {
    return [FsPath.root('/')];
  }

  override async close(): Promise<void> {
    logger.debug(`Closing ${this.identity}`);
    this.session.close();
  }

  private format(path: FsPath): string {
    return this.hierarchy.format(path);
  }

  /**
   * Run one command sequence with the control connection to ourselves,
   * translating failures.
   */
  private async command<T>(path: FsPath, operation: (remote: string) => Promise<T>): Promise<T> {
    const remote = this.format(path);
    return this.lock.run(async () => {
      if (this.session.closed) {
        throw new DisconnectedError(`FTP connection to ${this.identity} is closed`, { path: remote });
      }
      try {
        return await operation(remote);
      } catch (error) {
        throw this.translate(error, remote);
      }
    });
  }

  private translate(error: unknown, remote: string): Error {
    if (errorCode(error) === undefined && /client is closed/i.test(errorMessage(error))) {
      return new DisconnectedError(`FTP connection to ${this.identity} was closed: ${errorMessage(error)}`, {
        path: remote,
        cause: error,
      });
    }
    return translateError(error, remote, FTP_ERROR_KINDS);
  }

  /** Run a probe command; a 550 reply means "no". */
  private async probe(path: FsPath, operation: (remote: string) => Promise<unknown>): Promise<boolean> {
    try {
      await this.command(path, operation);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) return false;
      throw error;
    }
  }

  private isFolder(path: FsPath): Promise<boolean> {
    if (path.isRoot) return Promise.resolve(true);
    return this.probe(path, (remote) => this.session.cd(remote));
  }

  private isFile(path: FsPath): Promise<boolean> {
    return this.probe(path, (remote) => this.session.size(remote));
  }

  /** The listing entry for `path` in its parent folder. */
  private async entry(path: FsPath): Promise<FtpListEntry | undefined> {
    const parent = path.parent();
    if (!parent) return undefined;
    const entries = await this.listOrNull(parent);
    return entries?.find((candidate) => candidate.name === path.name);
  }

  private async listOrNull(path: FsPath): Promise<FtpListEntry[] | null> {
    try {
      return await this.command(path, (remote) => this.session.list(remote));
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private async names(path: FsPath): Promise<string[] | null> {
    if (!(await this.isFolder(path))) return null;
    const entries = (await this.listOrNull(path)) ?? [];
    return entries
      .map((candidate) => candidate.name)
      .filter((name) => name !== '.' && name !== '..')
      .sort();
  }

  private async sizeOf(path: FsPath): Promise<number> {
    const names = await this.names(path);
    if (names) {
      let total = 0;
      for (const name of names) {
        total += await this.sizeOf(path.join(name));
      }
      return total;
    }
    try {
      return await this.command(path, (remote) => this.session.size(remote));
    } catch (error) {
      if (error instanceof NotFoundError) return 0;
      throw error;
    }
  }

  private readablePrimitives(): ReadablePrimitives {
    return {
      // Staged downloads start at any offset via REST.
      seekable: true,
      isFile: (path) => this.isFile(path),
      isFolder: (path) => this.isFolder(path),
      exists: async (path) => path.isRoot || (await this.entry(path)) !== undefined,
      linkTarget: async (path) => {
        const found = await this.entry(path);
        return found?.type === TYPE_SYMBOLIC_LINK && found.link ? found.link : null;
      },
      openForReading: async (path, options) => {
        if (!(await this.isFile(path))) {
          const remote = this.format(path);
          throw (await this.isFolder(path)) ? new NotAFileError(remote) : new NotFoundError(remote);
        }
        const localPath = stagingPath();
        try {
          await this.command(path, (remote) => this.session.downloadTo(localPath, remote, options?.start ?? 0));
        } catch (error) {
          await removeStaged(localPath);
          throw error;
        }
        logger.trace(`Staged ${this.format(path)} in ${localPath}`);
        return StagedReadStream.open(localPath);
      },
    };
  }

  private listablePrimitives(): ListablePrimitives {
    return {
      childNames: (path) => this.names(path),
    };
  }

  private sizablePrimitives(): SizablePrimitives {
    return {
      size: (path) => this.sizeOf(path),
    };
  }

  private writablePrimitives(): WritablePrimitives {
    return {
      writeDelivery: 'staged',
      openForWriting: (path, options) =>
        StagedWriteStream.create(stagingPath(), async (localPath) => {
          await this.command(path, (remote) =>
            options?.append ? this.session.appendFrom(localPath, remote) : this.session.uploadFrom(localPath, remote)
          );
        }),
      createFolder: async (path) => {
        await this.command(path, (remote) => this.session.send(`MKD ${remote}`));
      },
      linkTo: async (path) => {
        throw new UnsupportedOperationError('writable', 'linkTo', { path: this.format(path) });
      },
      deleteJustThisThing: async (path) => {
        const found = await this.entry(path);
        if (!found) {
          throw new NotFoundError(this.format(path));
        }
        await this.command(path, (remote) =>
          found.type === TYPE_DIRECTORY ? this.session.removeEmptyDir(remote) : this.session.remove(remote)
        );
      },
      rename: async (from, to) => {
        await this.command(from, (remote) => this.session.rename(remote, this.format(to)));
      },
    };
  }

  private workingDirectoryPrimitives(): WorkingDirectoryPrimitives {
    return {
      changeTo: async (path) => {
        if (!(await this.isFolder(path))) {
          throw new NotAFolderError(this.format(path));
        }
        this.cwd = path;
      },
      currentPath: async () => this.cwd,
    };
  }
}

/**
 * Connect and log in to an FTP server, then run the configured initial
 * commands.
 */
export async function connectFtp(properties: Partial<FtpSchemeProperties>): Promise<FtpFileSystem> {
  const props: FtpSchemeProperties = { ...getDefaultFtpSchemeProperties(), ...properties };
  validateFtpSchemeProperties(props);

  const identity = ftpIdentity(props);
  const client = new Client(props.timeout ?? getFsConfig().connectTimeout);
  let cwd: string;
  try {
    await client.access({
      host: props.host,
      port: props.port,
      user: props.username,
      password: props.password,
      secure: props.secure,
    });
    for (const command of props.initialCommands) {
      await client.send(command);
    }
    cwd = await client.pwd();
  } catch (error) {
    client.close();
    throw translateError(error, identity, FTP_ERROR_KINDS);
  }
  logger.debug(`Connected to ${identity}`);
  return new FtpFileSystem(client, identity, cwd);
}
