import type { FsNode } from '../node/FsNode.js';

/**
 * Lazy sequence of nodes returned by children(), glob() and recurse().
 *
 * Nothing is listed until the sequence is iterated, and nodes are produced
 * one at a time. Each iteration starts over from the backend, so a
 * sequence can be consumed more than once.
 */
export class NodeSequence implements AsyncIterable<FsNode> {
  constructor(private readonly produce: () => AsyncGenerator<FsNode, void, undefined>) {}

  [Symbol.asyncIterator](): AsyncIterator<FsNode> {
    return this.produce();
  }

  async toArray(): Promise<FsNode[]> {
    const nodes: FsNode[] = [];
    for await (const node of this) {
      nodes.push(node);
    }
    return nodes;
  }

  /** Names of the produced nodes, in order. */
  async names(): Promise<string[]> {
    return (await this.toArray()).map((node) => node.name);
  }
}
