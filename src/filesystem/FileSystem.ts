/**
 * FileSystem
 *
 * The authority for one backend: it enumerates roots and mountpoints,
 * resolves paths to nodes and carries the primitive implementations every
 * node of the backend uses. Subclasses supply identity, primitives and
 * rootPaths(); everything else has a generic default.
 */

import type { BackendPrimitives } from '../capabilities/primitives.js';
import { IOFailureError, NotFoundError, UnsupportedOperationError } from '../errors/FsError.js';
import { isDisconnection } from '../errors/translate.js';
import { FsNode } from '../node/FsNode.js';
import { FsPath } from '../path/FsPath.js';
import { MountPoint } from './MountPoint.js';
import type { DiskUsage } from './MountPoint.js';

export abstract class FileSystem {
  /**
   * Names the endpoint this filesystem talks to ('local', 'sftp://user@host:22').
   * Nodes of two instances with the same identity are sameAs() each other.
   */
  abstract readonly identity: string;

  abstract readonly primitives: BackendPrimitives;

  /**
   * Whether resolve() may hand out nodes for paths that do not exist. When
   * false, resolve() checks each component against its parent's listing.
   */
  readonly speculativeNodes: boolean = true;

  /** One root path per distinct top-level hierarchy. */
  protected abstract rootPaths(): Promise<FsPath[]>;

  node(path: FsPath): FsNode {
    return new FsNode(this, path);
  }

  async roots(): Promise<FsNode[]> {
    return (await this.rootPaths()).map((path) => this.node(path));
  }

  /** The first root; the only one on single-root backends. */
  async root(): Promise<FsNode> {
    const [first] = await this.roots();
    if (!first) {
      throw new IOFailureError(`${this.identity} exposes no roots`);
    }
    return first;
  }

  /**
   * Parse a native path string. Relative text is taken relative to the
   * working folder where the backend has one, otherwise to the first root.
   */
  async parsePath(text: string): Promise<FsPath> {
    const workingDirectory = this.primitives.workingDirectory;
    const base = workingDirectory ? await workingDirectory.currentPath() : (await this.root()).path;
    return this.primitives.hierarchy.parse(text, base);
  }

  /**
   * The node for `path`, built from its root by child navigation.
   * @throws NotFoundError for an unknown root, or, on non-speculative
   *   backends, for the first component that does not exist
   */
  async resolve(path: FsPath | string): Promise<FsNode> {
    const target = typeof path === 'string' ? await this.parsePath(path) : path;
    const roots = await this.rootPaths();
    if (!roots.some((root) => root.root === target.root)) {
      throw new NotFoundError(this.primitives.hierarchy.format(target));
    }

    let current = this.node(FsPath.root(target.root));
    for (const component of target.components()) {
      if (!this.speculativeNodes) {
        const names = await current.listable.childNames();
        if (!names || !names.includes(component)) {
          throw new NotFoundError(this.primitives.hierarchy.format(target));
        }
      }
      current = this.node(current.path.join(component));
    }
    return current;
  }

  /** Default: one mountpoint per root, with no device. */
  async mountpoints(): Promise<MountPoint[]> {
    return (await this.roots()).map((root) => new MountPoint(root, null, this));
  }

  /**
   * The mountpoint of `node`: walks the node and its ancestors, nearest
   * first, until one sits exactly at a mountpoint location.
   */
  async mountpointOf(node: FsNode): Promise<MountPoint> {
    const byLocation = new Map<string, MountPoint>();
    for (const mountpoint of await this.mountpoints()) {
      byLocation.set(mountpoint.location.path.key, mountpoint);
    }
    for (const candidate of node.getAncestors(true)) {
      const match = byLocation.get(candidate.path.key);
      if (match) {
        return match;
      }
    }
    throw new IOFailureError(`No mountpoint found for ${node.getPath()}`, { path: node.getPath() });
  }

  /** Usage of the hierarchy mounted at `location`; null when unknown. */
  async diskUsage(_location: FsPath): Promise<DiskUsage | null> {
    return null;
  }

  /** Folder for temporary files on this backend, if it has a conventional one. */
  async temporaryDirectory(): Promise<FsNode | null> {
    return null;
  }

  /** The current working folder. */
  async workingNode(): Promise<FsNode> {
    const workingDirectory = this.primitives.workingDirectory;
    if (!workingDirectory) {
      throw new UnsupportedOperationError('workingDirectory', 'currentPath');
    }
    return this.node(await workingDirectory.currentPath());
  }

  /** Classification predicate the reconnecting proxy consults. */
  isDisconnection(error: unknown): boolean {
    return isDisconnection(error);
  }

  /** Release connections held by this backend. */
  async close(): Promise<void> {}

  toString(): string {
    return this.identity;
  }
}
