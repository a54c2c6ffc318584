import type { FsNode } from '../node/FsNode.js';
import type { SizablePrimitives } from './primitives.js';

/**
 * Sizable capability. A single primitive; what a folder's size means is
 * up to the backend.
 */
export class Sizable {
  constructor(
    private readonly node: FsNode,
    private readonly primitives: SizablePrimitives
  ) {}

  size(): Promise<number> {
    return this.primitives.size(this.node.path);
  }
}
