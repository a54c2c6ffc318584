/**
 * Byte streams handed out by Readable.openForReading and
 * Writable.openForWriting.
 *
 * A stream is owned by whoever opened it and must be closed on every exit
 * path; withStream() does that for a callback. close() may be called more
 * than once.
 */

export interface ReadStream {
  /** Up to `size` bytes, or null once the end has been reached. */
  read(size: number): Promise<Buffer | null>;
  close(): Promise<void>;
}

export interface WriteStream {
  /** Resolves once the backend has accepted the chunk. */
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
}

export interface ReadOptions {
  /** Byte offset to start at. Honored natively only by seekable backends. */
  start?: number;
}

export interface WriteOptions {
  /** Keep existing content and write after it */
  append?: boolean;
}

/**
 * How a backend's write stream behaves when the connection drops with a
 * chunk in flight.
 *
 * - 'at-least-once': write() resolves after the backend acknowledged the
 *   chunk, so an interrupted chunk may or may not have landed. Resending it
 *   can duplicate bytes.
 * - 'at-most-once': an interrupted chunk is never resent and may be lost.
 * - 'staged': bytes are staged locally and only transferred by close(); a
 *   disconnect during close() loses the staged bytes.
 */
export type WriteDelivery = 'at-least-once' | 'at-most-once' | 'staged';

/**
 * Run `fn` with `stream` and close the stream afterwards, whether `fn`
 * resolved or threw.
 */
export async function withStream<S extends { close(): Promise<void> }, T>(
  stream: S,
  fn: (stream: S) => Promise<T>
): Promise<T> {
  try {
    return await fn(stream);
  } finally {
    await stream.close();
  }
}

/** Read and discard `count` bytes. Returns the number actually skipped. */
export async function skipBytes(stream: ReadStream, count: number, blockSize: number): Promise<number> {
  let skipped = 0;
  while (skipped < count) {
    const chunk = await stream.read(Math.min(blockSize, count - skipped));
    if (chunk === null) break;
    skipped += chunk.length;
  }
  return skipped;
}
