/**
 * Writable capability.
 *
 * Primitives: openForWriting, createFolder, linkTo, deleteJustThisThing
 * (and an optional native rename). Derived: write, append, recursive
 * delete, folder creation helpers, temporary folders and renameTo.
 */

import { v4 as uuidv4 } from 'uuid';
import { getFsConfig } from '../config/FsConfig.js';
import { AlreadyExistsError, IOFailureError, NotAFolderError, NotFoundError } from '../errors/FsError.js';
import type { FsNode } from '../node/FsNode.js';
import { withStream } from '../streams/types.js';
import type { WriteDelivery, WriteOptions, WriteStream } from '../streams/types.js';
import type { WritablePrimitives } from './primitives.js';

export interface CreateFolderOptions {
  /** Succeed silently when the folder already exists */
  ignoreExisting?: boolean;
  /** Create missing ancestors too */
  recursive?: boolean;
}

export interface DeleteOptions {
  /** Succeed silently when nothing exists here */
  ignoreMissing?: boolean;
}

export class Writable {
  constructor(
    private readonly node: FsNode,
    private readonly primitives: WritablePrimitives
  ) {}

  get writeDelivery(): WriteDelivery {
    return this.primitives.writeDelivery;
  }

  /**
   * Open a stream for writing. Without `append` the content is truncated
   * first. The caller owns the stream and must close it.
   */
  open(options?: WriteOptions): Promise<WriteStream> {
    return this.primitives.openForWriting(this.node.path, options);
  }

  /** Replace the content with `data`. */
  async write(data: Buffer | string): Promise<void> {
    await withStream(await this.open(), (out) => out.write(toBuffer(data)));
  }

  async append(data: Buffer | string): Promise<void> {
    await withStream(await this.open({ append: true }), (out) => out.write(toBuffer(data)));
  }

  /** Create this node as a link whose raw target is `target`. */
  linkTo(target: string | FsNode): Promise<void> {
    const raw = typeof target === 'string' ? target : target.getPath();
    return this.primitives.linkTo(this.node.path, raw);
  }

  /**
   * Create this folder.
   * @throws AlreadyExistsError if something exists here (unless ignoreExisting and it is a folder)
   */
  async createFolder(options: CreateFolderOptions = {}): Promise<void> {
    const readable = this.node.readable;
    if (await readable.exists()) {
      if (options.ignoreExisting && (await readable.isFolder())) {
        return;
      }
      throw new AlreadyExistsError(this.node.getPath());
    }
    const parent = this.node.parent;
    if (options.recursive && parent && !(await parent.readable.exists())) {
      await parent.writable.createFolder({ ignoreExisting: true, recursive: true });
    }
    await this.primitives.createFolder(this.node.path);
  }

  mkdir(ignoreExisting = false): Promise<void> {
    return this.createFolder({ ignoreExisting });
  }

  mkdirs(ignoreExisting = false): Promise<void> {
    return this.createFolder({ ignoreExisting, recursive: true });
  }

  /**
   * Delete this node. Folders are emptied child by child first; links are
   * removed, never followed. The first failure stops the walk and
   * propagates, leaving whatever was not yet deleted in place.
   */
  async delete(options: DeleteOptions = {}): Promise<void> {
    const readable = this.node.readable;
    if (!(await readable.exists())) {
      if (options.ignoreMissing) return;
      throw new NotFoundError(this.node.getPath());
    }
    if (!(await readable.isLink()) && (await readable.isFolder())) {
      for await (const child of this.node.listable.children()) {
        await child.writable.delete();
      }
    }
    await this.primitives.deleteJustThisThing(this.node.path);
  }

  /**
   * Create a uniquely named empty folder inside this folder.
   * @returns the new folder
   */
  async createTemporaryFolder(prefix = 'tmp'): Promise<FsNode> {
    await this.node.readable.checkFolder();
    const attempts = getFsConfig().temporaryFolderAttempts;
    for (let i = 0; i < attempts; i++) {
      const candidate = this.node.child(`${prefix}${uuidv4().replace(/-/g, '').slice(0, 12)}`);
      try {
        await candidate.writable.createFolder();
        return candidate;
      } catch (error) {
        if (!(error instanceof AlreadyExistsError)) {
          throw error;
        }
      }
    }
    throw new IOFailureError(`No free temporary folder name in ${this.node.getPath()} after ${attempts} attempts`, {
      path: this.node.getPath(),
    });
  }

  /**
   * Move this node to `other`. Uses the backend's rename when both nodes
   * share a filesystem, otherwise copies then deletes (not atomic).
   */
  async renameTo(other: FsNode): Promise<void> {
    if (other.filesystem === this.node.filesystem && this.primitives.rename) {
      await this.primitives.rename(this.node.path, other.path);
      return;
    }
    const parent = other.parent;
    if (parent && !(await parent.readable.isFolder())) {
      throw new NotAFolderError(parent.getPath());
    }
    await this.node.readable.copyTo(other, { dereferenceLinks: false });
    await this.delete();
  }
}

function toBuffer(data: Buffer | string): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
}
