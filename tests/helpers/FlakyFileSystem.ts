/**
 * Fault injection for the reconnecting proxy.
 *
 * A FaultPlan hands out FlakyFileSystem "connections" to a shared
 * MemoryStore. Tests arm one-shot failures at named points, or sever every
 * connection opened so far; a severed connection fails every call with
 * DisconnectedError, while connections opened later work normally.
 */

import type {
  BackendPrimitives,
  ReadablePrimitives,
  WritablePrimitives,
} from '../../src/capabilities/primitives.js';
import { requireCapability } from '../../src/capabilities/primitives.js';
import { DisconnectedError, UnsupportedOperationError } from '../../src/errors/FsError.js';
import { FileSystem } from '../../src/filesystem/FileSystem.js';
import { MemoryFileSystem } from '../../src/backends/memory/MemoryFileSystem.js';
import type { MemoryStore } from '../../src/backends/memory/MemoryStore.js';
import type { FsPath } from '../../src/path/FsPath.js';
import type { ReadStream, WriteDelivery, WriteOptions, WriteStream } from '../../src/streams/types.js';

export type FaultPoint =
  | 'connect'
  | 'roots'
  | 'isFile'
  | 'isFolder'
  | 'exists'
  | 'linkTarget'
  | 'open'
  | 'read'
  | 'closeRead'
  | 'childNames'
  | 'size'
  | 'openWrite'
  | 'write'
  | 'closeWrite'
  | 'createFolder'
  | 'linkTo'
  | 'delete'
  | 'rename';

export interface FaultOptions {
  /** Calls to let through before failing. Default 0 */
  after?: number;
  /** Consecutive calls to fail. Default 1 */
  times?: number;
  /** Carry out the call before throwing, as when only the acknowledgement is lost */
  landed?: boolean;
  /** Error to throw; DisconnectedError by default */
  error?: () => Error;
}

interface Fault {
  after: number;
  times: number;
  landed: boolean;
  error: () => Error;
}

export interface FlakyOptions {
  seekable?: boolean;
  writeDelivery?: WriteDelivery;
}

export class FaultPlan {
  /** Connections opened so far; also the id of the latest one */
  connections = 0;
  /** Points where a fault fired, in order */
  readonly injected: FaultPoint[] = [];

  private readonly faults = new Map<FaultPoint, Fault>();
  private severedUpTo = 0;

  failNext(point: FaultPoint, options: FaultOptions = {}): this {
    this.faults.set(point, {
      after: options.after ?? 0,
      times: options.times ?? 1,
      landed: options.landed ?? false,
      error: options.error ?? (() => new DisconnectedError(`Connection reset during ${point}`)),
    });
    return this;
  }

  /** Drop every connection opened so far. */
  sever(): void {
    this.severedUpTo = this.connections;
  }

  isSevered(connection: number): boolean {
    return connection <= this.severedUpTo;
  }

  take(point: FaultPoint): Fault | undefined {
    const fault = this.faults.get(point);
    if (!fault) return undefined;
    if (fault.after > 0) {
      fault.after--;
      return undefined;
    }
    fault.times--;
    if (fault.times <= 0) {
      this.faults.delete(point);
    }
    this.injected.push(point);
    return fault;
  }

  /** Factory for wrap(): every call opens a new connection to `store`. */
  factory(store: MemoryStore, options: FlakyOptions = {}): () => FlakyFileSystem {
    return () => {
      const fault = this.take('connect');
      if (fault) {
        throw fault.error();
      }
      this.connections++;
      return new FlakyFileSystem(new MemoryFileSystem({ store }), this, this.connections, options);
    };
  }
}

export class FlakyFileSystem extends FileSystem {
  override readonly identity: string;
  override readonly primitives: BackendPrimitives;
  closed = false;

  constructor(
    readonly inner: MemoryFileSystem,
    private readonly plan: FaultPlan,
    readonly connection: number,
    options: FlakyOptions = {}
  ) {
    super();
    this.identity = inner.identity;
    this.primitives = {
      hierarchy: inner.primitives.hierarchy,
      readable: this.readablePrimitives(options.seekable ?? true),
      listable: {
        childNames: (path) =>
          this.guarded('childNames', () => requireCapability('listable', inner.primitives.listable).childNames(path)),
      },
      sizable: {
        size: (path) => this.guarded('size', () => requireCapability('sizable', inner.primitives.sizable).size(path)),
      },
      writable: this.writablePrimitives(options.writeDelivery ?? 'at-least-once'),
      workingDirectory: inner.primitives.workingDirectory,
    };
  }

  protected override async rootPaths(): Promise<FsPath[]> {
    const roots = await this.guarded('roots', () => this.inner.roots());
    return roots.map((root) => root.path);
  }

  override async close(): Promise<void> {
    if (this.plan.isSevered(this.connection)) {
      throw new DisconnectedError(`Connection #${this.connection} to ${this.identity} is already gone`);
    }
    this.closed = true;
  }

  async guarded<T>(point: FaultPoint, run: () => Promise<T>): Promise<T> {
    if (this.closed || this.plan.isSevered(this.connection)) {
      throw new DisconnectedError(`Connection #${this.connection} to ${this.identity} is gone`);
    }
    const fault = this.plan.take(point);
    if (!fault) {
      return run();
    }
    if (fault.landed) {
      await run();
    }
    throw fault.error();
  }

  private readablePrimitives(seekable: boolean): ReadablePrimitives {
    const inner = requireCapability('readable', this.inner.primitives.readable);
    return {
      seekable,
      isFile: (path) => this.guarded('isFile', () => inner.isFile(path)),
      isFolder: (path) => this.guarded('isFolder', () => inner.isFolder(path)),
      exists: (path) => this.guarded('exists', () => inner.exists(path)),
      linkTarget: (path) => this.guarded('linkTarget', () => inner.linkTarget(path)),
      openForReading: (path, options) =>
        this.guarded('open', async () => new FlakyReadStream(this, await inner.openForReading(path, seekable ? options : undefined))),
    };
  }

  private writablePrimitives(writeDelivery: WriteDelivery): WritablePrimitives {
    const inner = requireCapability('writable', this.inner.primitives.writable);
    return {
      writeDelivery,
      openForWriting: (path, options) =>
        this.guarded('openWrite', async () =>
          writeDelivery === 'staged'
            ? new StagedFlakyWriteStream(this, inner, path, options)
            : new FlakyWriteStream(this, await inner.openForWriting(path, options))
        ),
      createFolder: (path) => this.guarded('createFolder', () => inner.createFolder(path)),
      linkTo: (path, target) => this.guarded('linkTo', () => inner.linkTo(path, target)),
      deleteJustThisThing: (path) => this.guarded('delete', () => inner.deleteJustThisThing(path)),
      rename: (from, to) =>
        this.guarded('rename', async () => {
          if (!inner.rename) {
            throw new UnsupportedOperationError('writable', 'rename');
          }
          await inner.rename(from, to);
        }),
    };
  }
}

class FlakyReadStream implements ReadStream {
  constructor(
    private readonly owner: FlakyFileSystem,
    private readonly stream: ReadStream
  ) {}

  read(size: number): Promise<Buffer | null> {
    return this.owner.guarded('read', () => this.stream.read(size));
  }

  close(): Promise<void> {
    return this.owner.guarded('closeRead', () => this.stream.close());
  }
}

class FlakyWriteStream implements WriteStream {
  constructor(
    private readonly owner: FlakyFileSystem,
    private readonly stream: WriteStream
  ) {}

  write(chunk: Buffer): Promise<void> {
    return this.owner.guarded('write', () => this.stream.write(chunk));
  }

  close(): Promise<void> {
    return this.owner.guarded('closeWrite', () => this.stream.close());
  }
}

/** Keeps chunks locally and transfers them all when closed. */
class StagedFlakyWriteStream implements WriteStream {
  private readonly chunks: Buffer[] = [];

  constructor(
    private readonly owner: FlakyFileSystem,
    private readonly inner: WritablePrimitives,
    private readonly path: FsPath,
    private readonly options: WriteOptions | undefined
  ) {}

  async write(chunk: Buffer): Promise<void> {
    this.chunks.push(chunk);
  }

  close(): Promise<void> {
    return this.owner.guarded('closeWrite', async () => {
      const out = await this.inner.openForWriting(this.path, this.options);
      for (const chunk of this.chunks) {
        await out.write(chunk);
      }
      await out.close();
    });
  }
}
