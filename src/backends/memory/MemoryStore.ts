/**
 * Storage behind MemoryFileSystem: one folder tree per root marker.
 */

export interface MemoryFile {
  type: 'file';
  data: Buffer;
  xattrs: Map<string, Buffer>;
}

export interface MemoryFolder {
  type: 'folder';
  children: Map<string, MemoryEntry>;
  xattrs: Map<string, Buffer>;
}

export interface MemoryLink {
  type: 'link';
  /** Raw target, resolved against the link's parent folder */
  target: string;
  xattrs: Map<string, Buffer>;
}

export type MemoryEntry = MemoryFile | MemoryFolder | MemoryLink;

let nextStoreId = 1;

export class MemoryStore {
  /** Distinguishes stores in FileSystem.identity */
  readonly id: string;
  private readonly roots = new Map<string, MemoryFolder>();

  constructor(rootMarkers: readonly string[] = ['/']) {
    if (rootMarkers.length === 0) {
      throw new Error('A memory store needs at least one root');
    }
    this.id = `store-${nextStoreId++}`;
    for (const marker of rootMarkers) {
      this.roots.set(marker, MemoryStore.folder());
    }
  }

  rootMarkers(): string[] {
    return [...this.roots.keys()];
  }

  root(marker: string): MemoryFolder | undefined {
    return this.roots.get(marker);
  }

  static file(data: Buffer = Buffer.alloc(0)): MemoryFile {
    return { type: 'file', data, xattrs: new Map() };
  }

  static folder(): MemoryFolder {
    return { type: 'folder', children: new Map(), xattrs: new Map() };
  }

  static link(target: string): MemoryLink {
    return { type: 'link', target, xattrs: new Map() };
  }
}
