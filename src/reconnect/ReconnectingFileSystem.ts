/**
 * Reconnecting proxy
 *
 * Wraps a factory that builds a FileSystem and presents a FileSystem of its
 * own whose primitives run against the current backend instance. When a
 * call fails with an error the backend classifies as a disconnection, the
 * proxy builds a replacement through the factory and re-issues the call
 * once. Nodes of the proxy are plain FsNodes keyed by path, so they carry
 * over to the replacement untouched.
 *
 * State machine: connected -> (disconnection) -> reconnecting -> connected,
 * and closed from either. At most one rebuild runs at a time; callers that
 * fail on the same backend generation share it. The working folder last set
 * through the proxy is re-applied to each replacement.
 */

import type {
  BackendPrimitives,
  ExtendedAttributePrimitives,
  ListablePrimitives,
  ReadablePrimitives,
  SizablePrimitives,
  WorkingDirectoryPrimitives,
  WritablePrimitives,
} from '../capabilities/primitives.js';
import { requireCapability as required } from '../capabilities/primitives.js';
import { DisconnectedError, FsError, IOFailureError, UnsupportedOperationError } from '../errors/FsError.js';
import { errorMessage } from '../errors/translate.js';
import { FileSystem } from '../filesystem/FileSystem.js';
import { MountPoint } from '../filesystem/MountPoint.js';
import type { DiskUsage } from '../filesystem/MountPoint.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { FsNode } from '../node/FsNode.js';
import type { FsPath } from '../path/FsPath.js';
import type { Hierarchy } from '../path/hierarchies.js';
import type { WriteDelivery } from '../streams/types.js';
import { ReconnectingReadStream, ReconnectingWriteStream } from './ReconnectingStreams.js';

registerComponent('reconnect-proxy', 'Reconnecting filesystem proxy');
const logger = getLogger('reconnect-proxy');

export type FileSystemFactory = () => Promise<FileSystem> | FileSystem;

export type ConnectionState = 'connected' | 'reconnecting' | 'closed';

export interface WrapOptions {
  /** Called after each successful rebuild with the new backend */
  onReconnect?: (backend: FileSystem, reconnects: number) => void;
}

/** A backend instance and the generation it was installed at. */
export interface Connection {
  readonly backend: FileSystem;
  readonly generation: number;
}

/**
 * Build the first backend and wrap it.
 */
export async function wrap(factory: FileSystemFactory, options: WrapOptions = {}): Promise<ReconnectingFileSystem> {
  const backend = await factory();
  return new ReconnectingFileSystem(factory, backend, options);
}

export class ReconnectingFileSystem extends FileSystem {
  override readonly identity: string;
  override readonly speculativeNodes: boolean;
  override readonly primitives: BackendPrimitives;

  private connection: Connection;
  private pending: Promise<Connection> | null = null;
  private reconnectCount = 0;
  private closed = false;
  /** Last folder changed to through the proxy */
  private workingPath: FsPath | null = null;

  constructor(
    private readonly factory: FileSystemFactory,
    initial: FileSystem,
    private readonly options: WrapOptions = {}
  ) {
    super();
    this.connection = { backend: initial, generation: 0 };
    this.identity = initial.identity;
    this.speculativeNodes = initial.speculativeNodes;
    this.primitives = this.proxyPrimitives(initial.primitives);
  }

  get state(): ConnectionState {
    if (this.closed) return 'closed';
    return this.pending ? 'reconnecting' : 'connected';
  }

  /** Number of completed rebuilds. */
  get reconnects(): number {
    return this.reconnectCount;
  }

  /** The backend instance calls currently go to. */
  get backend(): FileSystem {
    return this.connection.backend;
  }

  /** Current connection, waiting out a rebuild in progress. */
  async acquire(): Promise<Connection> {
    if (this.closed) {
      throw this.closedError();
    }
    if (!this.pending) {
      return this.connection;
    }
    try {
      return await this.pending;
    } catch (error) {
      throw this.stillDisconnected(error, 'reconnecting');
    }
  }

  /**
   * Run `operation` against the live backend. A disconnection triggers one
   * rebuild and one retry; any other failure propagates as is.
   */
  async invoke<T>(operation: (backend: FileSystem) => Promise<T>): Promise<T> {
    const connection = await this.acquire();
    try {
      return await operation(connection.backend);
    } catch (error) {
      if (!connection.backend.isDisconnection(error)) {
        throw error;
      }
      return this.retry(connection, error, (fresh) => operation(fresh.backend));
    }
  }

  /**
   * Recover from a disconnection seen on `failed`, then run `operation` once
   * on the replacement.
   * @throws DisconnectedError with reconnectAttempted set when the rebuild or
   *   the retry fails with another disconnection
   */
  async retry<T>(failed: Connection, cause: unknown, operation: (fresh: Connection) => Promise<T>): Promise<T> {
    if (this.closed) {
      throw this.closedError();
    }
    let fresh: Connection;
    try {
      fresh = await this.reconnect(failed, cause);
    } catch (error) {
      throw this.stillDisconnected(error, 'reconnecting');
    }
    try {
      return await operation(fresh);
    } catch (error) {
      if (fresh.backend.isDisconnection(error)) {
        throw this.stillDisconnected(error, 'retrying');
      }
      throw error;
    }
  }

  /**
   * Replace the backend installed at `failed.generation`. When another
   * caller already started or finished that replacement, joins it instead.
   */
  private reconnect(failed: Connection, cause: unknown): Promise<Connection> {
    if (this.pending) {
      return this.pending;
    }
    if (this.connection.generation !== failed.generation) {
      return Promise.resolve(this.connection);
    }
    logger.info(`Connection to ${this.identity} lost, reconnecting: ${errorMessage(cause)}`);
    this.pending = this.rebuild(failed).finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  private async rebuild(failed: Connection): Promise<Connection> {
    const backend = await this.factory();
    await this.restoreWorkingFolder(backend);
    this.connection = { backend, generation: failed.generation + 1 };
    this.reconnectCount++;
    logger.info(`Reconnected to ${this.identity} (reconnect #${this.reconnectCount})`);

    try {
      await failed.backend.close();
    } catch (error) {
      logger.warn(`Failed to close superseded connection to ${this.identity}`, error);
    }
    this.options.onReconnect?.(backend, this.reconnectCount);
    return this.connection;
  }

  private async restoreWorkingFolder(backend: FileSystem): Promise<void> {
    const workingDirectory = backend.primitives.workingDirectory;
    if (!this.workingPath || !workingDirectory) {
      return;
    }
    try {
      await workingDirectory.changeTo(this.workingPath);
    } catch (error) {
      await backend.close().catch((closeError: unknown) => {
        logger.warn(`Failed to close unused connection to ${this.identity}`, closeError);
      });
      throw error;
    }
  }

  private closedError(): IOFailureError {
    return new IOFailureError(`Filesystem ${this.identity} is closed`);
  }

  private stillDisconnected(error: unknown, phase: 'reconnecting' | 'retrying'): DisconnectedError {
    return new DisconnectedError(`Disconnected from ${this.identity} again after ${phase}: ${errorMessage(error)}`, {
      reconnectAttempted: true,
      path: error instanceof FsError ? error.path : undefined,
      cause: error,
    });
  }

  // -- FileSystem --

  protected override async rootPaths(): Promise<FsPath[]> {
    const roots = await this.invoke((backend) => backend.roots());
    return roots.map((root) => root.path);
  }

  override async mountpoints(): Promise<MountPoint[]> {
    const mountpoints = await this.invoke((backend) => backend.mountpoints());
    return mountpoints.map(
      (mountpoint) =>
        new MountPoint(
          this.node(mountpoint.location.path),
          mountpoint.device ? this.node(mountpoint.device.path) : null,
          this
        )
    );
  }

  override diskUsage(location: FsPath): Promise<DiskUsage | null> {
    return this.invoke((backend) => backend.diskUsage(location));
  }

  override async temporaryDirectory(): Promise<FsNode | null> {
    const folder = await this.invoke((backend) => backend.temporaryDirectory());
    return folder ? this.node(folder.path) : null;
  }

  override isDisconnection(error: unknown): boolean {
    return this.connection.backend.isDisconnection(error);
  }

  /** Close the live backend. Every later call fails instead of reconnecting. */
  override async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    const connection = await this.acquire().catch((error: unknown) => {
      logger.debug(`Closing ${this.identity} after a failed reconnect: ${errorMessage(error)}`);
      return this.connection;
    });
    this.closed = true;
    await connection.backend.close();
  }

  // -- primitives --

  private proxyPrimitives(initial: BackendPrimitives): BackendPrimitives {
    return {
      hierarchy: new LiveHierarchy(() => this.connection.backend.primitives.hierarchy),
      readable: initial.readable && this.readablePrimitives(),
      listable: initial.listable && this.listablePrimitives(),
      sizable: initial.sizable && this.sizablePrimitives(),
      writable: initial.writable && this.writablePrimitives(initial.writable),
      xattrs: initial.xattrs && this.xattrPrimitives(),
      workingDirectory: initial.workingDirectory && this.workingDirectoryPrimitives(),
    };
  }

  private readablePrimitives(): ReadablePrimitives {
    const live = (): ReadablePrimitives => required('readable', this.connection.backend.primitives.readable);
    const call = <T>(operation: (primitives: ReadablePrimitives) => Promise<T>): Promise<T> =>
      this.invoke((backend) => operation(required('readable', backend.primitives.readable)));
    return {
      get seekable(): boolean {
        return live().seekable;
      },
      isFile: (path) => call((p) => p.isFile(path)),
      isFolder: (path) => call((p) => p.isFolder(path)),
      exists: (path) => call((p) => p.exists(path)),
      linkTarget: (path) => call((p) => p.linkTarget(path)),
      openForReading: (path, options) => ReconnectingReadStream.open(this, path, options),
    };
  }

  private listablePrimitives(): ListablePrimitives {
    return {
      childNames: (path) =>
        this.invoke((backend) => required('listable', backend.primitives.listable).childNames(path)),
    };
  }

  private sizablePrimitives(): SizablePrimitives {
    return {
      size: (path) => this.invoke((backend) => required('sizable', backend.primitives.sizable).size(path)),
    };
  }

  private writablePrimitives(initial: WritablePrimitives): WritablePrimitives {
    const live = (): WritablePrimitives => required('writable', this.connection.backend.primitives.writable);
    const call = <T>(operation: (primitives: WritablePrimitives) => Promise<T>): Promise<T> =>
      this.invoke((backend) => operation(required('writable', backend.primitives.writable)));
    return {
      get writeDelivery(): WriteDelivery {
        return live().writeDelivery;
      },
      openForWriting: (path, options) => ReconnectingWriteStream.open(this, path, options),
      createFolder: (path) => call((p) => p.createFolder(path)),
      linkTo: (path, target) => call((p) => p.linkTo(path, target)),
      deleteJustThisThing: (path) => call((p) => p.deleteJustThisThing(path)),
      rename: initial.rename
        ? (from, to) =>
            call((p) => {
              if (!p.rename) {
                throw new UnsupportedOperationError('writable', 'rename', { path: from.toString() });
              }
              return p.rename(from, to);
            })
        : undefined,
    };
  }

  private xattrPrimitives(): ExtendedAttributePrimitives {
    const call = <T>(operation: (primitives: ExtendedAttributePrimitives) => Promise<T>): Promise<T> =>
      this.invoke((backend) => operation(required('xattrs', backend.primitives.xattrs)));
    return {
      getXattr: (path, name) => call((p) => p.getXattr(path, name)),
      setXattr: (path, name, value) => call((p) => p.setXattr(path, name, value)),
      deleteXattr: (path, name) => call((p) => p.deleteXattr(path, name)),
      listXattrs: (path) => call((p) => p.listXattrs(path)),
    };
  }

  private workingDirectoryPrimitives(): WorkingDirectoryPrimitives {
    const call = <T>(operation: (primitives: WorkingDirectoryPrimitives) => Promise<T>): Promise<T> =>
      this.invoke((backend) => operation(required('workingDirectory', backend.primitives.workingDirectory)));
    return {
      changeTo: async (path) => {
        await call((p) => p.changeTo(path));
        this.workingPath = path;
      },
      currentPath: () => call((p) => p.currentPath()),
    };
  }
}

/** Hierarchy that always defers to the current backend's. Path syntax never touches the connection. */
class LiveHierarchy implements Hierarchy {
  constructor(private readonly current: () => Hierarchy) {}

  get separator(): string {
    return this.current().separator;
  }

  child(path: FsPath, names: readonly string[]): FsPath {
    return this.current().child(path, names);
  }

  parse(text: string, base: FsPath): FsPath {
    return this.current().parse(text, base);
  }

  format(path: FsPath): string {
    return this.current().format(path);
  }

  getPathComponents(path: FsPath, relativeTo?: FsPath): string[] {
    return this.current().getPathComponents(path, relativeTo);
  }
}
