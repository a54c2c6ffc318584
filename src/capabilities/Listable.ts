/**
 * Listable capability: enumerating a folder's children.
 *
 * Primitive: childNames. Derived: children, glob and recurse, all returned
 * as lazy NodeSequences.
 */

import type { FsNode } from '../node/FsNode.js';
import type { ListablePrimitives } from './primitives.js';
import { NodeSequence } from './NodeSequence.js';
import { hasMagic, matchesSegment } from './glob.js';

/**
 * What recurse() does with a node, as returned by a RecurseFilter:
 *
 *                      | don't yield | yield   |
 *   don't recurse into | 'skip'      | 'yield' |
 *   recurse into       | 'recurse'   | true    |
 *
 * `false` behaves like 'recurse' when recurseSkipped is set, 'skip' otherwise.
 */
export type RecurseDecision = boolean | 'skip' | 'yield' | 'recurse';

export type RecurseFilter = (node: FsNode) => RecurseDecision | Promise<RecurseDecision>;

export interface RecurseOptions {
  /** Yield the starting node too (subject to the filter). Default true */
  includeSelf?: boolean;
  /** Descend into nodes the filter returned false for. Default true */
  recurseSkipped?: boolean;
}

export class Listable {
  constructor(
    private readonly node: FsNode,
    private readonly primitives: ListablePrimitives
  ) {}

  /** Sorted child names, or null if this node is not a folder. */
  childNames(): Promise<string[] | null> {
    return this.primitives.childNames(this.node.path);
  }

  /** Children of this folder; empty for anything that is not a folder. */
  children(): NodeSequence {
    const node = this.node;
    const primitives = this.primitives;
    return new NodeSequence(async function* () {
      const names = await primitives.childNames(node.path);
      for (const name of names ?? []) {
        yield node.filesystem.node(node.path.join(name));
      }
    });
  }

  /**
   * Nodes below this one matching `pattern`, matched one component at a
   * time. `**` matches any number of folders (including none).
   */
  glob(pattern: string): NodeSequence {
    const node = this.node;
    const segments = pattern.split(/[\\/]+/).filter((s) => s !== '' && s !== '.');
    return new NodeSequence(async function* () {
      const seen = new Set<string>();
      for await (const match of globFrom(node, segments, 0)) {
        if (!seen.has(match.path.key)) {
          seen.add(match.path.key);
          yield match;
        }
      }
    });
  }

  /**
   * Depth-first, pre-order walk of this node and everything below it.
   * Links to folders are followed, so a cyclic hierarchy never ends.
   */
  recurse(filter?: RecurseFilter, options: RecurseOptions = {}): NodeSequence {
    const node = this.node;
    const includeSelf = options.includeSelf ?? true;
    const recurseSkipped = options.recurseSkipped ?? true;
    return new NodeSequence(() => walk(node, filter, includeSelf, recurseSkipped));
  }
}

async function* walk(
  node: FsNode,
  filter: RecurseFilter | undefined,
  includeSelf: boolean,
  recurseSkipped: boolean
): AsyncGenerator<FsNode, void, undefined> {
  const decision = filter ? await filter(node) : true;
  if (includeSelf && (decision === true || decision === 'yield')) {
    yield node;
  }
  const descend = decision === true || decision === 'recurse' || (decision === false && recurseSkipped);
  if (!descend) return;
  for await (const child of node.listable.children()) {
    yield* walk(child, filter, true, recurseSkipped);
  }
}

async function* globFrom(
  node: FsNode,
  segments: readonly string[],
  index: number
): AsyncGenerator<FsNode, void, undefined> {
  const segment = segments[index];
  if (segment === undefined) {
    yield node;
    return;
  }

  if (segment === '**') {
    yield* globFrom(node, segments, index + 1);
    for await (const child of node.listable.children()) {
      if (!child.name.startsWith('.') && (await child.readable.isFolder())) {
        yield* globFrom(child, segments, index);
      }
    }
    return;
  }

  if (!hasMagic(segment)) {
    const child = node.child(segment);
    if (await child.readable.exists()) {
      yield* globFrom(child, segments, index + 1);
    }
    return;
  }

  const names = await node.listable.childNames();
  for (const name of names ?? []) {
    if (matchesSegment(name, segment)) {
      yield* globFrom(node.filesystem.node(node.path.join(name)), segments, index + 1);
    }
  }
}
