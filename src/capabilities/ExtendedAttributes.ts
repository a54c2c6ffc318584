/**
 * Extended attributes: named binary values attached to a node.
 */

import { NotFoundError } from '../errors/FsError.js';
import type { FsNode } from '../node/FsNode.js';
import type { ExtendedAttributePrimitives } from './primitives.js';

export class ExtendedAttributes {
  constructor(
    private readonly node: FsNode,
    private readonly primitives: ExtendedAttributePrimitives
  ) {}

  /** @throws NotFoundError when the attribute is absent */
  get(name: string): Promise<Buffer> {
    return this.primitives.getXattr(this.node.path, name);
  }

  set(name: string, value: Buffer | string): Promise<void> {
    return this.primitives.setXattr(this.node.path, name, typeof value === 'string' ? Buffer.from(value) : value);
  }

  delete(name: string): Promise<void> {
    return this.primitives.deleteXattr(this.node.path, name);
  }

  list(): Promise<string[]> {
    return this.primitives.listXattrs(this.node.path);
  }

  async has(name: string): Promise<boolean> {
    return (await this.list()).includes(name);
  }

  /** @throws NotFoundError when the attribute is absent */
  async check(name: string): Promise<void> {
    if (!(await this.has(name))) {
      throw new NotFoundError(this.node.getPath(), {
        message: `No extended attribute '${name}' on ${this.node.getPath()}`,
      });
    }
  }

  /**
   * Make `other`'s attributes an exact copy of this node's: attributes
   * missing here are removed there.
   */
  async copyTo(other: FsNode): Promise<void> {
    const target = other.xattrs;
    const names = await this.list();
    for (const stale of await target.list()) {
      if (!names.includes(stale)) {
        await target.delete(stale);
      }
    }
    for (const name of names) {
      await target.set(name, await this.get(name));
    }
  }
}
