/**
 * In-memory backend.
 *
 * Implements all seven capabilities over a MemoryStore tree. Several
 * MemoryFileSystem instances may share one store, which is how tests model
 * "a fresh connection to the same endpoint". Each instance keeps its own
 * working folder, like a session.
 */

import type {
  BackendPrimitives,
  ExtendedAttributePrimitives,
  ListablePrimitives,
  ReadablePrimitives,
  SizablePrimitives,
  WorkingDirectoryPrimitives,
  WritablePrimitives,
} from '../../capabilities/primitives.js';
import { definePrimitives } from '../../capabilities/primitives.js';
import {
  AlreadyExistsError,
  IOFailureError,
  NotAFileError,
  NotAFolderError,
  NotFoundError,
} from '../../errors/FsError.js';
import { FileSystem } from '../../filesystem/FileSystem.js';
import { MountPoint } from '../../filesystem/MountPoint.js';
import { getLogger, registerComponent } from '../../logging/index.js';
import { FsPath } from '../../path/FsPath.js';
import { PosixHierarchy } from '../../path/hierarchies.js';
import type { Hierarchy } from '../../path/hierarchies.js';
import type { ReadOptions, ReadStream, WriteOptions, WriteStream } from '../../streams/types.js';
import { MemoryStore } from './MemoryStore.js';
import type { MemoryEntry, MemoryFile, MemoryFolder, MemoryLink } from './MemoryStore.js';

registerComponent('memory-fs', 'In-memory filesystem backend');
const logger = getLogger('memory-fs');

const MAX_LINK_DEPTH = 40;

export interface MemoryFileSystemOptions {
  /** Tree to operate on; a fresh single-root store by default */
  store?: MemoryStore;
  /** Path syntax; POSIX by default. Must agree with the store's root markers */
  hierarchy?: Hierarchy;
  /** Extra mount locations, as native path strings */
  mountpoints?: string[];
  /** See FileSystem.speculativeNodes. Default true */
  speculativeNodes?: boolean;
}

export class MemoryFileSystem extends FileSystem {
  override readonly identity: string;
  readonly store: MemoryStore;
  override readonly speculativeNodes: boolean;

  private readonly hierarchy: Hierarchy;
  private readonly extraMounts: string[];
  private cwd: FsPath;

  override readonly primitives: BackendPrimitives;

  constructor(options: MemoryFileSystemOptions = {}) {
    super();
    this.store = options.store ?? new MemoryStore();
    this.hierarchy = options.hierarchy ?? new PosixHierarchy();
    this.extraMounts = options.mountpoints ?? [];
    this.speculativeNodes = options.speculativeNodes ?? true;
    this.identity = `memory://${this.store.id}`;
    this.cwd = FsPath.root(this.store.rootMarkers()[0] ?? '/');
    this.primitives = definePrimitives({
      hierarchy: this.hierarchy,
      readable: this.readablePrimitives(),
      listable: this.listablePrimitives(),
      sizable: this.sizablePrimitives(),
      writable: this.writablePrimitives(),
      xattrs: this.xattrPrimitives(),
      workingDirectory: this.workingDirectoryPrimitives(),
    });
  }

  protected override async rootPaths(): Promise<FsPath[]> {
    return this.store.rootMarkers().map((marker) => FsPath.root(marker));
  }

  override async mountpoints(): Promise<MountPoint[]> {
    const result = await super.mountpoints();
    for (const location of this.extraMounts) {
      const path = this.hierarchy.parse(location, FsPath.root(this.cwd.root));
      result.push(new MountPoint(this.node(path), null, this));
    }
    return result;
  }

  // -- tree navigation --

  private format(path: FsPath): string {
    return this.hierarchy.format(path);
  }

  /** Entry at `path`; with `follow`, a final link is replaced by its target. */
  private lookup(path: FsPath, follow: boolean, depth = 0): MemoryEntry | undefined {
    if (depth > MAX_LINK_DEPTH) return undefined;
    const root = this.store.root(path.root);
    if (!root) return undefined;

    let entry: MemoryEntry = root;
    let at = FsPath.root(path.root);
    for (const part of path.components()) {
      const folder = this.asFolder(entry, at, depth);
      const next = folder?.children.get(part);
      if (!next) return undefined;
      entry = next;
      at = at.join(part);
    }
    if (follow && entry.type === 'link') {
      return this.lookup(this.linkDestination(at, entry), true, depth + 1);
    }
    return entry;
  }

  private asFolder(entry: MemoryEntry, at: FsPath, depth: number): MemoryFolder | undefined {
    const resolved = entry.type === 'link' ? this.lookup(this.linkDestination(at, entry), true, depth + 1) : entry;
    return resolved?.type === 'folder' ? resolved : undefined;
  }

  private linkDestination(at: FsPath, link: MemoryLink): FsPath {
    return this.hierarchy.child(at.parent() ?? at, [link.target]);
  }

  /** Path after following every final link. */
  private realPath(path: FsPath): FsPath {
    let current = path;
    for (let depth = 0; depth < MAX_LINK_DEPTH; depth++) {
      const entry = this.lookup(current, false);
      if (entry?.type !== 'link') return current;
      current = this.linkDestination(current, entry);
    }
    return current;
  }

  /** Folder that holds `path`, with the final component's name. */
  private container(path: FsPath): { folder: MemoryFolder; name: string } {
    const parent = path.parent();
    if (!parent) {
      throw new AlreadyExistsError(this.format(path));
    }
    const entry = this.lookup(parent, true);
    if (!entry) {
      throw new NotFoundError(this.format(parent));
    }
    if (entry.type !== 'folder') {
      throw new NotAFolderError(this.format(parent));
    }
    return { folder: entry, name: path.name };
  }

  private existing(path: FsPath, follow: boolean): MemoryEntry {
    const entry = this.lookup(path, follow);
    if (!entry) {
      throw new NotFoundError(this.format(path));
    }
    return entry;
  }

  private sizeOf(entry: MemoryEntry | undefined): number {
    if (!entry) return 0;
    switch (entry.type) {
      case 'file':
        return entry.data.length;
      case 'folder': {
        let total = 0;
        for (const child of entry.children.values()) {
          total += this.sizeOf(child);
        }
        return total;
      }
      case 'link':
        return 0;
    }
  }

  // -- primitives --

  private readablePrimitives(): ReadablePrimitives {
    return {
      seekable: true,
      isFile: async (path) => this.lookup(path, true)?.type === 'file',
      isFolder: async (path) => this.lookup(path, true)?.type === 'folder',
      exists: async (path) => this.lookup(path, false) !== undefined,
      linkTarget: async (path) => {
        const entry = this.lookup(path, false);
        return entry?.type === 'link' ? entry.target : null;
      },
      openForReading: async (path, options?: ReadOptions) => {
        const entry = this.existing(path, true);
        if (entry.type !== 'file') {
          throw new NotAFileError(this.format(path));
        }
        return new BufferReadStream(entry.data, options?.start ?? 0);
      },
    };
  }

  private listablePrimitives(): ListablePrimitives {
    return {
      childNames: async (path) => {
        const entry = this.lookup(path, true);
        return entry?.type === 'folder' ? [...entry.children.keys()].sort() : null;
      },
    };
  }

  private sizablePrimitives(): SizablePrimitives {
    return {
      size: async (path) => this.sizeOf(this.lookup(path, true)),
    };
  }

  private writablePrimitives(): WritablePrimitives {
    return {
      writeDelivery: 'at-least-once',
      openForWriting: async (path, options?: WriteOptions) => {
        const target = this.realPath(path);
        const { folder, name } = this.container(target);
        const existing = folder.children.get(name);
        if (existing && existing.type !== 'file') {
          throw new NotAFileError(this.format(target));
        }
        const file: MemoryFile = existing ?? MemoryStore.file();
        if (!options?.append) {
          file.data = Buffer.alloc(0);
        }
        folder.children.set(name, file);
        return new MemoryWriteStream(file);
      },
      createFolder: async (path) => {
        const { folder, name } = this.container(path);
        if (folder.children.has(name)) {
          throw new AlreadyExistsError(this.format(path));
        }
        folder.children.set(name, MemoryStore.folder());
      },
      linkTo: async (path, target) => {
        const { folder, name } = this.container(path);
        if (folder.children.has(name)) {
          throw new AlreadyExistsError(this.format(path));
        }
        folder.children.set(name, MemoryStore.link(target));
      },
      deleteJustThisThing: async (path) => {
        const { folder, name } = this.container(path);
        const entry = folder.children.get(name);
        if (!entry) {
          throw new NotFoundError(this.format(path));
        }
        if (entry.type === 'folder' && entry.children.size > 0) {
          throw new IOFailureError(`Folder not empty: ${this.format(path)}`, { path: this.format(path) });
        }
        folder.children.delete(name);
        logger.trace(`Deleted ${this.format(path)}`);
      },
      rename: async (from, to) => {
        const source = this.container(from);
        const entry = source.folder.children.get(source.name);
        if (!entry) {
          throw new NotFoundError(this.format(from));
        }
        const destination = this.container(to);
        if (entry.type === 'folder' && contains(entry, destination.folder)) {
          throw new IOFailureError(`Cannot move ${this.format(from)} into itself: ${this.format(to)}`, {
            path: this.format(from),
          });
        }
        if (destination.folder.children.has(destination.name)) {
          throw new AlreadyExistsError(this.format(to));
        }
        source.folder.children.delete(source.name);
        destination.folder.children.set(destination.name, entry);
      },
    };
  }

  private xattrPrimitives(): ExtendedAttributePrimitives {
    return {
      getXattr: async (path, name) => {
        const value = this.existing(path, true).xattrs.get(name);
        if (!value) {
          throw new NotFoundError(this.format(path), {
            message: `No extended attribute '${name}' on ${this.format(path)}`,
          });
        }
        return Buffer.from(value);
      },
      setXattr: async (path, name, value) => {
        this.existing(path, true).xattrs.set(name, Buffer.from(value));
      },
      deleteXattr: async (path, name) => {
        if (!this.existing(path, true).xattrs.delete(name)) {
          throw new NotFoundError(this.format(path), {
            message: `No extended attribute '${name}' on ${this.format(path)}`,
          });
        }
      },
      listXattrs: async (path) => [...this.existing(path, true).xattrs.keys()].sort(),
    };
  }

  private workingDirectoryPrimitives(): WorkingDirectoryPrimitives {
    return {
      changeTo: async (path) => {
        const entry = this.existing(path, true);
        if (entry.type !== 'folder') {
          throw new NotAFolderError(this.format(path));
        }
        this.cwd = path;
      },
      currentPath: async () => this.cwd,
    };
  }
}

/** Whether `folder` is `ancestor` or lies somewhere below it. */
function contains(ancestor: MemoryFolder, folder: MemoryFolder): boolean {
  if (ancestor === folder) return true;
  for (const child of ancestor.children.values()) {
    if (child.type === 'folder' && contains(child, folder)) return true;
  }
  return false;
}

/** Read stream over a snapshot of a file's bytes. */
export class BufferReadStream implements ReadStream {
  private closed = false;

  constructor(
    private readonly data: Buffer,
    private offset = 0
  ) {}

  async read(size: number): Promise<Buffer | null> {
    if (this.closed) {
      throw new IOFailureError('Read from a closed stream');
    }
    if (this.offset >= this.data.length) {
      return null;
    }
    const chunk = Buffer.from(this.data.subarray(this.offset, this.offset + size));
    this.offset += chunk.length;
    return chunk;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class MemoryWriteStream implements WriteStream {
  private closed = false;

  constructor(private readonly file: MemoryFile) {}

  async write(chunk: Buffer): Promise<void> {
    if (this.closed) {
      throw new IOFailureError('Write to a closed stream');
    }
    this.file.data = Buffer.concat([this.file.data, chunk]);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
