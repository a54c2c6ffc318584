/**
 * FsNode
 *
 * One addressable location in a FileSystem. A node is just (filesystem,
 * path): it caches nothing about what exists there, so it can be created
 * for paths that do not exist yet and stays valid when the backend behind
 * a reconnecting filesystem is replaced.
 *
 * Hierarchy navigation lives on the node itself. The other capabilities
 * are reached through accessors (node.readable, node.writable, ...) that
 * throw UnsupportedOperationError when the backend lacks them; use
 * supports() to ask first.
 */

import { ExtendedAttributes } from '../capabilities/ExtendedAttributes.js';
import { Listable } from '../capabilities/Listable.js';
import { Readable } from '../capabilities/Readable.js';
import { Sizable } from '../capabilities/Sizable.js';
import { WorkingDirectory } from '../capabilities/WorkingDirectory.js';
import { Writable } from '../capabilities/Writable.js';
import { capabilitiesOf, requireCapability } from '../capabilities/primitives.js';
import type { BackendPrimitives, Capability } from '../capabilities/primitives.js';
import { NotFoundError, PathTraversalError } from '../errors/FsError.js';
import type { FsPath } from '../path/FsPath.js';
import type { Hierarchy } from '../path/hierarchies.js';
import type { FileSystem } from '../filesystem/FileSystem.js';
import type { MountPoint } from '../filesystem/MountPoint.js';

export class FsNode {
  constructor(
    readonly filesystem: FileSystem,
    readonly path: FsPath
  ) {}

  private get primitives(): BackendPrimitives {
    return this.filesystem.primitives;
  }

  private get hierarchy(): Hierarchy {
    return this.primitives.hierarchy;
  }

  // -- capabilities --

  supports(capability: Capability): boolean {
    return this.primitives[capability] !== undefined;
  }

  capabilities(): Capability[] {
    return capabilitiesOf(this.primitives);
  }

  get readable(): Readable {
    return new Readable(this, this.require('readable', this.primitives.readable));
  }

  get listable(): Listable {
    return new Listable(this, this.require('listable', this.primitives.listable));
  }

  get sizable(): Sizable {
    return new Sizable(this, this.require('sizable', this.primitives.sizable));
  }

  get writable(): Writable {
    return new Writable(this, this.require('writable', this.primitives.writable));
  }

  get xattrs(): ExtendedAttributes {
    return new ExtendedAttributes(this, this.require('xattrs', this.primitives.xattrs));
  }

  get workingDirectory(): WorkingDirectory {
    return new WorkingDirectory(this, this.require('workingDirectory', this.primitives.workingDirectory));
  }

  private require<T>(capability: Capability, primitives: T | undefined): T {
    return requireCapability(capability, primitives, this.getPath());
  }

  // -- hierarchy --

  /** Null exactly when this node is one of its filesystem's roots. */
  get parent(): FsNode | null {
    const parentPath = this.path.parent();
    return parentPath ? this.filesystem.node(parentPath) : null;
  }

  /**
   * Navigate by name. Names may contain separators and '..'; an absolute
   * name discards everything before it. With no names, returns this node.
   */
  child(...names: string[]): FsNode {
    if (names.length === 0) return this;
    return this.filesystem.node(this.hierarchy.child(this.path, names));
  }

  /**
   * Like child(), but only for results strictly below this node. Use it to
   * join untrusted names.
   * @throws PathTraversalError when the names would leave this subtree
   */
  safeChild(...names: string[]): FsNode {
    const result = this.child(...names);
    if (!this.path.isAncestorOf(result.path)) {
      throw new PathTraversalError(this.getPath(), names);
    }
    return result;
  }

  /**
   * @throws NotFoundError on a root, which has no siblings
   */
  sibling(...names: string[]): FsNode {
    const parent = this.parent;
    if (!parent) {
      throw new NotFoundError(this.getPath(), { message: `Root ${this.getPath()} has no parent` });
    }
    return parent.child(...names);
  }

  /** Ancestors nearest first, optionally starting with this node. */
  getAncestors(includingSelf = false): FsNode[] {
    const result: FsNode[] = [];
    let current: FsNode | null = includingSelf ? this : this.parent;
    while (current) {
      result.push(current);
      current = current.parent;
    }
    return result;
  }

  get ancestors(): FsNode[] {
    return this.getAncestors();
  }

  descendantOf(other: FsNode, includingSelf = false): boolean {
    return this.getAncestors(includingSelf).some((ancestor) => other.sameAs(ancestor));
  }

  ancestorOf(other: FsNode, includingSelf = false): boolean {
    return other.descendantOf(this, includingSelf);
  }

  getPathComponents(relativeTo?: FsNode): string[] {
    return this.hierarchy.getPathComponents(this.path, relativeTo?.path);
  }

  get pathComponents(): string[] {
    return this.getPathComponents();
  }

  /**
   * Native path string. With `relativeTo`, the relative route from that
   * node joined with `separator` (default: the backend's separator).
   */
  getPath(relativeTo?: FsNode, separator?: string): string {
    if (!relativeTo) {
      return this.hierarchy.format(this.path);
    }
    return this.getPathComponents(relativeTo).join(separator ?? this.hierarchy.separator);
  }

  /** Last path component; '' for a root. */
  get name(): string {
    return this.path.name;
  }

  /**
   * Same path on a filesystem with the same identity, even if it is a
   * different instance (e.g. two connections to one host).
   */
  sameAs(other: FsNode): boolean {
    return this.filesystem.identity === other.filesystem.identity && this.path.equals(other.path);
  }

  /** Same path on the very same filesystem instance. */
  equals(other: FsNode): boolean {
    return this.filesystem === other.filesystem && this.path.equals(other.path);
  }

  /** The mountpoint whose location is the nearest ancestor-or-self. */
  mountpoint(): Promise<MountPoint> {
    return this.filesystem.mountpointOf(this);
  }

  /** Whether a mountpoint is located exactly here. */
  async isMount(): Promise<boolean> {
    return (await this.mountpoint()).location.equals(this);
  }

  toString(): string {
    return this.getPath();
  }
}
