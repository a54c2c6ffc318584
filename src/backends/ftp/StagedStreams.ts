/**
 * Streams over a local staging file.
 *
 * The FTP backend downloads a file completely before handing out a read
 * stream, and uploads written content only when the write stream closes,
 * so the control connection is never held while a caller reads or writes
 * at its own pace. The staging file is removed when the stream closes.
 */

import * as fsp from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { getFsConfig } from '../../config/FsConfig.js';
import { IOFailureError } from '../../errors/FsError.js';
import { translateError } from '../../errors/translate.js';
import type { ReadStream, WriteStream } from '../../streams/types.js';

/** Fresh path in the staging directory. */
export function stagingPath(): string {
  return path.join(getFsConfig().stagingDir, `capfs-ftp-${uuidv4()}`);
}

export async function removeStaged(localPath: string): Promise<void> {
  await fsp.rm(localPath, { force: true });
}

export class StagedReadStream implements ReadStream {
  private position = 0;
  private closed = false;

  private constructor(
    private readonly handle: fsp.FileHandle,
    readonly localPath: string
  ) {}

  static async open(localPath: string): Promise<StagedReadStream> {
    try {
      return new StagedReadStream(await fsp.open(localPath, 'r'), localPath);
    } catch (error) {
      await removeStaged(localPath);
      throw translateError(error, localPath);
    }
  }

  async read(size: number): Promise<Buffer | null> {
    if (this.closed) {
      throw new IOFailureError('Read from a closed stream');
    }
    const buffer = Buffer.alloc(size);
    let bytesRead: number;
    try {
      ({ bytesRead } = await this.handle.read(buffer, 0, size, this.position));
    } catch (error) {
      throw translateError(error, this.localPath);
    }
    if (bytesRead === 0) {
      return null;
    }
    this.position += bytesRead;
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.handle.close();
    } finally {
      await removeStaged(this.localPath);
    }
  }
}

export class StagedWriteStream implements WriteStream {
  private closed = false;

  private constructor(
    private readonly handle: fsp.FileHandle,
    readonly localPath: string,
    private readonly transfer: (localPath: string) => Promise<void>
  ) {}

  /**
   * @param transfer uploads the staged file; called once, from close()
   */
  static async create(localPath: string, transfer: (localPath: string) => Promise<void>): Promise<StagedWriteStream> {
    try {
      return new StagedWriteStream(await fsp.open(localPath, 'w'), localPath, transfer);
    } catch (error) {
      throw translateError(error, localPath);
    }
  }

  async write(chunk: Buffer): Promise<void> {
    if (this.closed) {
      throw new IOFailureError('Write to a closed stream');
    }
    try {
      await this.handle.write(chunk);
    } catch (error) {
      throw translateError(error, this.localPath);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.handle.close();
      await this.transfer(this.localPath);
    } finally {
      await removeStaged(this.localPath);
    }
  }
}
