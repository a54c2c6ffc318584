/**
 * WorkingDirectory capability: the process- or session-scoped current
 * folder of a filesystem.
 */

import type { FsNode } from '../node/FsNode.js';
import type { WorkingDirectoryPrimitives } from './primitives.js';

export class WorkingDirectory {
  constructor(
    private readonly node: FsNode,
    private readonly primitives: WorkingDirectoryPrimitives
  ) {}

  /** Make this node the current folder. */
  changeTo(): Promise<void> {
    return this.primitives.changeTo(this.node.path);
  }

  cd(): Promise<void> {
    return this.changeTo();
  }

  /**
   * Run `fn` with this node as the current folder, then switch back to the
   * previous one whether `fn` resolved or threw.
   */
  async asWorking<T>(fn: (folder: FsNode) => Promise<T>): Promise<T> {
    const previous = await this.primitives.currentPath();
    await this.changeTo();
    try {
      return await fn(this.node);
    } finally {
      await this.primitives.changeTo(previous);
    }
  }
}
