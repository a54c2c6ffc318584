import type { FsNode } from '../node/FsNode.js';
import type { FileSystem } from './FileSystem.js';

/** Space or inode accounting for one mounted hierarchy. */
export interface Usage {
  total: number;
  used: number;
  /** What an unprivileged caller can still use */
  available: number;
  /** total - used; can exceed `available` where blocks are reserved */
  free: number;
}

export interface DiskUsage {
  space: Usage;
  /** Null where the backend does not track inodes */
  inodes: Usage | null;
}

export function makeUsage(total: number, used: number, available: number): Usage {
  return { total, used, available, free: total - used };
}

/**
 * A mounted hierarchy: where it is rooted and, where the platform says,
 * which device backs it.
 */
export class MountPoint {
  constructor(
    readonly location: FsNode,
    readonly device: FsNode | null,
    readonly filesystem: FileSystem
  ) {}

  /** Space and inode usage, or null if the backend cannot report it. */
  usage(): Promise<DiskUsage | null> {
    return this.filesystem.diskUsage(this.location.path);
  }

  toString(): string {
    return this.device ? `${this.device.getPath()} on ${this.location.getPath()}` : this.location.getPath();
  }
}
