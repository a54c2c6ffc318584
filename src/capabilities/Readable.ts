/**
 * Readable capability: type predicates, link resolution and content access.
 *
 * Primitives: isFile, isFolder, exists, linkTarget, openForReading.
 * Everything else here is derived from them (and, for copyTo, from the
 * destination's Writable and this node's Listable).
 */

import { createHash } from 'crypto';
import { getFsConfig } from '../config/FsConfig.js';
import {
  AlreadyExistsError,
  BrokenLinkError,
  NotAFileError,
  NotAFolderError,
  NotFoundError,
} from '../errors/FsError.js';
import type { FsNode } from '../node/FsNode.js';
import { withStream } from '../streams/types.js';
import type { ReadOptions, ReadStream } from '../streams/types.js';
import type { ReadablePrimitives } from './primitives.js';

/** Longest chain of links dereference(true) follows */
export const MAX_LINK_DEPTH = 40;

export interface CopyOptions {
  /** Replace an existing destination instead of failing with AlreadyExistsError */
  overwrite?: boolean;
  /** Copy what links point to (default) rather than re-creating the links */
  dereferenceLinks?: boolean;
  /** Copy extended attributes when both sides support them. Default true */
  copyXattrs?: boolean;
}

export class Readable {
  constructor(
    private readonly node: FsNode,
    private readonly primitives: ReadablePrimitives
  ) {}

  isFile(): Promise<boolean> {
    return this.primitives.isFile(this.node.path);
  }

  isFolder(): Promise<boolean> {
    return this.primitives.isFolder(this.node.path);
  }

  isDirectory(): Promise<boolean> {
    return this.isFolder();
  }

  exists(): Promise<boolean> {
    return this.primitives.exists(this.node.path);
  }

  linkTarget(): Promise<string | null> {
    return this.primitives.linkTarget(this.node.path);
  }

  async isLink(): Promise<boolean> {
    return (await this.linkTarget()) !== null;
  }

  /**
   * The node a link points to, resolved against the link's parent. With
   * `recursive`, follows the chain until a non-link. Returns this node when
   * it is not a link.
   * @throws BrokenLinkError when the chain has more than MAX_LINK_DEPTH links
   */
  async dereference(recursive = false): Promise<FsNode> {
    let current = this.node;
    for (let hops = 0; ; hops++) {
      const target = await current.readable.linkTarget();
      if (target === null) {
        return current;
      }
      if (hops === MAX_LINK_DEPTH) {
        throw new BrokenLinkError(this.node.getPath(), { cause: new Error('Too many levels of links') });
      }
      current = (current.parent ?? current).child(target);
      if (!recursive) {
        return current;
      }
    }
  }

  /** A link whose final target does not exist. */
  async isBroken(): Promise<boolean> {
    try {
      if (!(await this.isLink())) {
        return false;
      }
      const target = await this.dereference(true);
      return !(await target.readable.exists());
    } catch (error) {
      if (error instanceof BrokenLinkError) {
        return true;
      }
      throw error;
    }
  }

  /** Exists, and is not a broken link. */
  async valid(): Promise<boolean> {
    if (!(await this.exists())) {
      return false;
    }
    return !(await this.isBroken());
  }

  /**
   * @throws NotFoundError if nothing exists here, NotAFileError if something else does
   */
  async checkFile(): Promise<void> {
    if (await this.isFile()) return;
    if (await this.exists()) {
      throw new NotAFileError(this.node.getPath());
    }
    throw new NotFoundError(this.node.getPath());
  }

  /**
   * @throws NotFoundError if nothing exists here, NotAFolderError if something else does
   */
  async checkFolder(): Promise<void> {
    if (await this.isFolder()) return;
    if (await this.exists()) {
      throw new NotAFolderError(this.node.getPath());
    }
    throw new NotFoundError(this.node.getPath());
  }

  /**
   * Open a stream on the content. The caller owns the stream and must
   * close it; read(), readBlocks() and hash() do that themselves.
   */
  open(options?: ReadOptions): Promise<ReadStream> {
    return this.primitives.openForReading(this.node.path, options);
  }

  /**
   * Successive blocks of at most `blockSize` bytes. The underlying stream
   * is closed when iteration finishes, fails or is abandoned.
   * @throws RangeError unless blockSize is a positive integer
   */
  async *readBlocks(blockSize: number = getFsConfig().blockSize): AsyncGenerator<Buffer, void, undefined> {
    if (!Number.isInteger(blockSize) || blockSize < 1) {
      throw new RangeError(`Block size must be a positive integer, got ${blockSize}`);
    }
    const stream = await this.open();
    try {
      for (;;) {
        const block = await stream.read(blockSize);
        if (block === null) return;
        if (block.length > 0) yield block;
      }
    } finally {
      await stream.close();
    }
  }

  /** Whole content in memory. */
  async read(): Promise<Buffer> {
    const blocks: Buffer[] = [];
    for await (const block of this.readBlocks()) {
      blocks.push(block);
    }
    return Buffer.concat(blocks);
  }

  async readText(encoding: BufferEncoding = 'utf8'): Promise<string> {
    return (await this.read()).toString(encoding);
  }

  /**
   * Hex digest of the content, streamed block by block.
   * @param algorithm any digest name node:crypto accepts
   */
  async hash(algorithm: string = getFsConfig().hashAlgorithm): Promise<string> {
    const hasher = createHash(algorithm);
    for await (const block of this.readBlocks()) {
      hasher.update(block);
    }
    return hasher.digest('hex');
  }

  /**
   * Copy this file, folder or link to `destination`.
   *
   * Files are streamed block by block. Folders are created at the
   * destination and each child is copied into it. With dereferenceLinks
   * off, links are re-created with the same raw target.
   */
  async copyTo(destination: FsNode, options: CopyOptions = {}): Promise<void> {
    const { overwrite = false, dereferenceLinks = true, copyXattrs = true } = options;
    const writable = destination.writable;

    const source = dereferenceLinks ? await this.dereference(true) : this.node;
    const copyLink = !dereferenceLinks && (await this.isLink());
    if (!copyLink && !(await source.readable.exists())) {
      throw new NotFoundError(source.getPath());
    }

    if (await destination.readable.exists()) {
      if (!overwrite) {
        throw new AlreadyExistsError(destination.getPath());
      }
      await writable.delete();
    }

    if (copyLink) {
      const target = await this.linkTarget();
      if (target !== null) {
        await writable.linkTo(target);
      }
    } else if (await source.readable.isFolder()) {
      await writable.createFolder();
      for await (const child of source.listable.children()) {
        await child.readable.copyInto(destination, { ...options, overwrite: false });
      }
    } else {
      await withStream(await writable.open(), async (out) => {
        for await (const block of source.readable.readBlocks()) {
          await out.write(block);
        }
      });
    }

    if (copyXattrs && source.supports('xattrs') && destination.supports('xattrs')) {
      await source.xattrs.copyTo(destination);
    }
  }

  /**
   * Copy this node to an identically named child of `folder`.
   * @returns the new node
   */
  async copyInto(folder: FsNode, options: CopyOptions = {}): Promise<FsNode> {
    const target = folder.child(this.node.name);
    await this.copyTo(target, options);
    return target;
  }
}
