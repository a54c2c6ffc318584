/**
 * Adapters from Node's push-based stream.Readable / stream.Writable to the
 * pull-based ReadStream / WriteStream used by the capability layer.
 *
 * Used by backends whose client libraries hand out Node streams
 * (ssh2-sftp-client, axios response bodies).
 */

import type { Readable, Writable } from 'stream';
import { IOFailureError } from '../errors/FsError.js';
import type { ReadStream, WriteStream } from './types.js';

export type ErrorTranslator = (error: unknown) => Error;

export class NodeReadStream implements ReadStream {
  private failure: unknown = null;
  private closed = false;

  constructor(
    private readonly source: Readable,
    private readonly translate: ErrorTranslator
  ) {
    source.on('error', (error: unknown) => {
      this.failure = error;
    });
  }

  async read(size: number): Promise<Buffer | null> {
    for (;;) {
      if (this.failure !== null) {
        throw this.translate(this.failure);
      }
      if (this.closed) {
        throw new IOFailureError('Read from a closed stream');
      }
      const chunk: unknown = this.source.read(size);
      if (chunk !== null) {
        return Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      }
      if (this.source.readableEnded) {
        return null;
      }
      if (this.source.destroyed) {
        throw this.translate(this.source.errored ?? new IOFailureError('Stream closed before its end'));
      }
      await this.nextEvent();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.source.destroy();
  }

  private nextEvent(): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        this.source.off('readable', done);
        this.source.off('end', done);
        this.source.off('error', done);
        this.source.off('close', done);
        resolve();
      };
      this.source.on('readable', done);
      this.source.on('end', done);
      this.source.on('error', done);
      this.source.on('close', done);
    });
  }
}

export class NodeWriteStream implements WriteStream {
  private failure: unknown = null;
  private closed = false;

  constructor(
    private readonly sink: Writable,
    private readonly translate: ErrorTranslator
  ) {
    sink.on('error', (error: unknown) => {
      this.failure = error;
    });
  }

  write(chunk: Buffer): Promise<void> {
    if (this.failure !== null) {
      return Promise.reject(this.translate(this.failure));
    }
    if (this.closed) {
      return Promise.reject(new IOFailureError('Write to a closed stream'));
    }
    return new Promise((resolve, reject) => {
      this.sink.write(chunk, (error) => {
        if (error) {
          reject(this.translate(error));
        } else {
          resolve();
        }
      });
    });
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    if (this.failure !== null) {
      this.sink.destroy();
      return Promise.reject(this.translate(this.failure));
    }
    return new Promise((resolve, reject) => {
      this.sink.end((error?: Error | null) => {
        if (error) {
          reject(this.translate(error));
        } else {
          resolve();
        }
      });
    });
  }
}
