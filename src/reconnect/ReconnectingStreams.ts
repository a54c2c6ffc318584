/**
 * Streams handed out by the reconnecting proxy.
 *
 * A read stream counts the bytes it has delivered; after a reconnect it
 * reopens the file and continues from that offset, so the caller sees one
 * uninterrupted byte sequence. A write stream reopens in append mode and
 * then applies the backend's declared WriteDelivery to the chunk that was
 * in flight.
 */

import { getFsConfig } from '../config/FsConfig.js';
import { DisconnectedError, IOFailureError } from '../errors/FsError.js';
import { getLogger } from '../logging/index.js';
import type { FsPath } from '../path/FsPath.js';
import { skipBytes } from '../streams/types.js';
import type { ReadOptions, ReadStream, WriteDelivery, WriteOptions, WriteStream } from '../streams/types.js';
import { requireCapability as required } from '../capabilities/primitives.js';
import type { Connection, ReconnectingFileSystem } from './ReconnectingFileSystem.js';

const logger = getLogger('reconnect-proxy').child('stream');

/** Close a stream whose connection is already gone. Failures are expected here. */
async function discard(stream: ReadStream | WriteStream, path: FsPath): Promise<void> {
  try {
    await stream.close();
  } catch (error) {
    logger.debug(`Ignoring close failure on severed stream for ${path.toString()}`, { error: String(error) });
  }
}

export class ReconnectingReadStream implements ReadStream {
  private consumed = 0;
  private closed = false;

  private constructor(
    private readonly proxy: ReconnectingFileSystem,
    private readonly path: FsPath,
    private readonly start: number,
    private connection: Connection,
    private stream: ReadStream
  ) {}

  static async open(proxy: ReconnectingFileSystem, path: FsPath, options?: ReadOptions): Promise<ReconnectingReadStream> {
    const start = options?.start ?? 0;
    const open = async (connection: Connection): Promise<ReconnectingReadStream> => {
      const stream = await required('readable', connection.backend.primitives.readable).openForReading(path, options);
      return new ReconnectingReadStream(proxy, path, start, connection, stream);
    };
    const connection = await proxy.acquire();
    try {
      return await open(connection);
    } catch (error) {
      if (!connection.backend.isDisconnection(error)) throw error;
      return proxy.retry(connection, error, open);
    }
  }

  /** Absolute offset of the next byte. */
  get position(): number {
    return this.start + this.consumed;
  }

  async read(size: number): Promise<Buffer | null> {
    if (this.closed) {
      throw new IOFailureError('Read from a closed stream');
    }
    const connection = this.connection;
    try {
      return this.advance(await this.stream.read(size));
    } catch (error) {
      if (!connection.backend.isDisconnection(error)) throw error;
      await discard(this.stream, this.path);
      return this.proxy.retry(connection, error, async (fresh) => {
        await this.reopen(fresh);
        return this.advance(await this.stream.read(size));
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.stream.close();
  }

  private advance(chunk: Buffer | null): Buffer | null {
    if (chunk !== null) {
      this.consumed += chunk.length;
    }
    return chunk;
  }

  /** Open on `fresh` and position at the current offset. */
  private async reopen(fresh: Connection): Promise<void> {
    const readable = required('readable', fresh.backend.primitives.readable);
    let stream: ReadStream;
    if (readable.seekable) {
      stream = await readable.openForReading(this.path, { start: this.position });
    } else {
      stream = await readable.openForReading(this.path, this.start > 0 ? { start: this.start } : undefined);
      const skipped = await skipBytes(stream, this.consumed, getFsConfig().blockSize);
      if (skipped < this.consumed) {
        await stream.close();
        throw new IOFailureError(
          `${this.path.toString()} is shorter than the ${this.consumed} bytes already read before reconnecting`
        );
      }
    }
    logger.debug(`Resumed reading ${this.path.toString()} at offset ${this.position}`);
    this.stream = stream;
    this.connection = fresh;
  }
}

export class ReconnectingWriteStream implements WriteStream {
  private written = 0;
  private lost = 0;
  private closed = false;

  private constructor(
    private readonly proxy: ReconnectingFileSystem,
    private readonly path: FsPath,
    private connection: Connection,
    private stream: WriteStream
  ) {}

  static async open(
    proxy: ReconnectingFileSystem,
    path: FsPath,
    options?: WriteOptions
  ): Promise<ReconnectingWriteStream> {
    const open = async (connection: Connection): Promise<ReconnectingWriteStream> => {
      const stream = await required('writable', connection.backend.primitives.writable).openForWriting(path, options);
      return new ReconnectingWriteStream(proxy, path, connection, stream);
    };
    const connection = await proxy.acquire();
    try {
      return await open(connection);
    } catch (error) {
      if (!connection.backend.isDisconnection(error)) throw error;
      return proxy.retry(connection, error, open);
    }
  }

  /** Bytes accepted by the backend so far. */
  get bytesWritten(): number {
    return this.written;
  }

  /** Bytes dropped by 'at-most-once' recovery. */
  get lostBytes(): number {
    return this.lost;
  }

  async write(chunk: Buffer): Promise<void> {
    if (this.closed) {
      throw new IOFailureError('Write to a closed stream');
    }
    const connection = this.connection;
    try {
      await this.stream.write(chunk);
      this.written += chunk.length;
    } catch (error) {
      if (!connection.backend.isDisconnection(error)) throw error;
      const delivery = this.delivery(connection);
      await discard(this.stream, this.path);
      if (delivery === 'staged') {
        await this.proxy.retry(connection, error, async () => undefined);
        throw this.stagedContentLost();
      }
      await this.proxy.retry(connection, error, async (fresh) => {
        await this.reopen(fresh);
        if (delivery === 'at-most-once') {
          this.lost += chunk.length;
          logger.warn(`Dropped ${chunk.length} bytes in flight to ${this.path.toString()} when the connection was lost`);
          return;
        }
        await this.stream.write(chunk);
        this.written += chunk.length;
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const connection = this.connection;
    try {
      await this.stream.close();
    } catch (error) {
      if (!connection.backend.isDisconnection(error)) throw error;
      // Every chunk was acknowledged before close; only a staged upload is lost.
      await this.proxy.retry(connection, error, async () => undefined);
      if (this.delivery(connection) === 'staged') {
        throw this.stagedContentLost();
      }
    }
  }

  private delivery(connection: Connection): WriteDelivery {
    return required('writable', connection.backend.primitives.writable).writeDelivery;
  }

  private stagedContentLost(): DisconnectedError {
    return new DisconnectedError(
      `Connection lost before the staged content of ${this.path.toString()} was transferred; write it again`,
      { reconnectAttempted: true, path: this.path.toString() }
    );
  }

  private async reopen(fresh: Connection): Promise<void> {
    const writable = required('writable', fresh.backend.primitives.writable);
    this.stream = await writable.openForWriting(this.path, { append: true });
    this.connection = fresh;
    logger.debug(`Reopened ${this.path.toString()} for appending after ${this.written} bytes`);
  }
}
