import { describe, it, expect, beforeEach } from '@jest/globals';
import type { RecurseDecision } from '../../../src/capabilities/Listable.js';
import { MemoryFileSystem } from '../../../src/backends/memory/MemoryFileSystem.js';
import type { FsNode } from '../../../src/node/FsNode.js';
import { buildTree } from '../../helpers/trees.js';

describe('Listable', () => {
  let root: FsNode;

  beforeEach(async () => {
    root = await new MemoryFileSystem().root();
    await buildTree(root, {
      'b.txt': 'b',
      'a.txt': 'a',
      '.hidden': 'h',
      src: {
        'main.ts': 'main',
        lib: { 'util.ts': 'util', 'notes.md': 'notes' },
      },
      docs: { 'readme.md': 'readme' },
    });
  });

  describe('children', () => {
    it('should list children in sorted order', async () => {
      expect(await root.listable.children().names()).toEqual(['.hidden', 'a.txt', 'b.txt', 'docs', 'src']);
    });

    it('should be empty for a file', async () => {
      expect(await root.child('a.txt').listable.children().toArray()).toEqual([]);
      expect(await root.child('a.txt').listable.childNames()).toBeNull();
    });

    it('should restart from the backend on every iteration', async () => {
      const sequence = root.child('docs').listable.children();
      expect(await sequence.names()).toEqual(['readme.md']);
      await root.child('docs', 'guide.md').writable.write('guide');
      expect(await sequence.names()).toEqual(['guide.md', 'readme.md']);
    });

    it('should produce nodes of the same filesystem', async () => {
      const [first] = await root.listable.children().toArray();
      expect(first?.filesystem).toBe(root.filesystem);
      expect(first?.getPath()).toBe('/.hidden');
    });
  });

  describe('glob', () => {
    it('should match one component at a time', async () => {
      const matches = await root.listable.glob('*.txt').toArray();
      expect(matches.map((node) => node.getPath())).toEqual(['/a.txt', '/b.txt']);
    });

    it('should span folders with **', async () => {
      const matches = await root.listable.glob('**/*.md').toArray();
      expect(matches.map((node) => node.getPath())).toEqual(['/docs/readme.md', '/src/lib/notes.md']);
    });

    it('should follow literal components without listing', async () => {
      const matches = await root.listable.glob('src/lib/*.ts').toArray();
      expect(matches.map((node) => node.getPath())).toEqual(['/src/lib/util.ts']);
    });

    it('should yield nothing for a missing literal component', async () => {
      expect(await root.listable.glob('nope/*.ts').toArray()).toEqual([]);
    });

    it('should skip dot files unless matched explicitly', async () => {
      expect(await root.listable.glob('*').names()).toEqual(['a.txt', 'b.txt', 'docs', 'src']);
      expect(await root.listable.glob('.*').names()).toEqual(['.hidden']);
    });
  });

  describe('recurse', () => {
    it('should walk depth-first in pre-order', async () => {
      const nodes = await root.child('src').listable.recurse().toArray();
      expect(nodes.map((node) => node.getPath())).toEqual([
        '/src',
        '/src/lib',
        '/src/lib/notes.md',
        '/src/lib/util.ts',
        '/src/main.ts',
      ]);
    });

    it('should leave out the start node when asked', async () => {
      const names = await root.child('docs').listable.recurse(undefined, { includeSelf: false }).names();
      expect(names).toEqual(['readme.md']);
    });

    it('should honor the decision table', async () => {
      const decide = (node: FsNode): RecurseDecision => {
        if (node.name === 'lib') return 'skip';
        if (node.name === 'docs') return 'yield';
        if (node.name === 'src') return 'recurse';
        return node.name.endsWith('.txt');
      };
      const names = await root.listable.recurse(decide, { includeSelf: false }).names();
      expect(names).toEqual(['a.txt', 'b.txt', 'docs']);
    });

    it('should not descend into false nodes when recurseSkipped is off', async () => {
      const decide = (node: FsNode): RecurseDecision => node.name === '' || node.name.endsWith('.ts');
      const descending = await root.listable.recurse(decide, { includeSelf: false }).names();
      const shallow = await root.listable
        .recurse(decide, { includeSelf: false, recurseSkipped: false })
        .names();
      expect(descending).toEqual(['util.ts', 'main.ts']);
      expect(shallow).toEqual([]);
    });

    it('should accept an async filter', async () => {
      const names = await root
        .child('src')
        .listable.recurse(async (node) => (await node.readable.isFile()) || 'recurse')
        .names();
      expect(names).toEqual(['notes.md', 'util.ts', 'main.ts']);
    });
  });
});
