/**
 * Build and inspect small trees through the public node API.
 */

import type { FsNode } from '../../src/node/FsNode.js';

export interface LinkSpec {
  link: string;
}

export interface TreeSpec {
  [name: string]: string | LinkSpec | TreeSpec;
}

function isLink(value: LinkSpec | TreeSpec): value is LinkSpec {
  return typeof value['link'] === 'string';
}

/** Create `spec` below `folder`: strings are file contents, objects folders, {link} links. */
export async function buildTree(folder: FsNode, spec: TreeSpec): Promise<void> {
  for (const [name, value] of Object.entries(spec)) {
    const node = folder.child(name);
    if (typeof value === 'string') {
      await node.writable.write(value);
    } else if (isLink(value)) {
      await node.writable.linkTo(value.link);
    } else {
      await node.writable.createFolder();
      await buildTree(node, value);
    }
  }
}

/** Paths of everything below `folder` relative to it, in walk order. */
export async function listTree(folder: FsNode): Promise<string[]> {
  const nodes = await folder.listable.recurse(undefined, { includeSelf: false }).toArray();
  return nodes.map((node) => node.getPath(folder));
}
