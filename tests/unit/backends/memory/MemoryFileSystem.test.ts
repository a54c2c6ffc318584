import { describe, it, expect, beforeEach } from '@jest/globals';
import { BufferReadStream, MemoryFileSystem } from '../../../../src/backends/memory/MemoryFileSystem.js';
import { MemoryStore } from '../../../../src/backends/memory/MemoryStore.js';
import { requireCapability } from '../../../../src/capabilities/primitives.js';
import {
  AlreadyExistsError,
  IOFailureError,
  NotAFileError,
  NotFoundError,
} from '../../../../src/errors/FsError.js';
import type { FsNode } from '../../../../src/node/FsNode.js';
import { buildTree } from '../../../helpers/trees.js';

describe('MemoryFileSystem', () => {
  let fs: MemoryFileSystem;
  let root: FsNode;

  beforeEach(async () => {
    fs = new MemoryFileSystem();
    root = await fs.root();
  });

  describe('stores', () => {
    it('should refuse a store without roots', () => {
      expect(() => new MemoryStore([])).toThrow('A memory store needs at least one root');
    });

    it('should share a tree between instances on one store', async () => {
      const other = new MemoryFileSystem({ store: fs.store });
      await root.child('shared.txt').writable.write('both');
      const seen = (await other.root()).child('shared.txt');

      expect(other.identity).toBe(fs.identity);
      expect(await seen.readable.readText()).toBe('both');
      expect(seen.sameAs(root.child('shared.txt'))).toBe(true);
      expect(seen.equals(root.child('shared.txt'))).toBe(false);
    });

    it('should give separate stores separate identities', () => {
      expect(new MemoryFileSystem().identity).not.toBe(fs.identity);
    });

    it('should keep a working folder per instance', async () => {
      const other = new MemoryFileSystem({ store: fs.store });
      await root.child('work').writable.createFolder();
      await root.child('work').workingDirectory.changeTo();

      expect((await fs.workingNode()).path.toString()).toBe('/|work');
      expect((await other.workingNode()).path.toString()).toBe('/|');
    });
  });

  describe('links', () => {
    beforeEach(async () => {
      await buildTree(root, {
        docs: { 'a.txt': 'alpha' },
        shortcut: { link: 'docs/a.txt' },
        loop1: { link: 'loop2' },
        loop2: { link: 'loop1' },
      });
    });

    it('should resolve link targets against the link folder', async () => {
      const shortcut = root.child('shortcut');
      expect(await shortcut.readable.linkTarget()).toBe('docs/a.txt');
      expect(await shortcut.readable.readText()).toBe('alpha');
    });

    it('should write through a link to its target', async () => {
      await root.child('shortcut').writable.write('beta');
      expect(await root.child('docs', 'a.txt').readable.readText()).toBe('beta');
      expect(await root.child('shortcut').readable.linkTarget()).toBe('docs/a.txt');
    });

    it('should treat a link cycle as existing but neither file nor folder', async () => {
      const loop = root.child('loop1');
      expect(await loop.readable.exists()).toBe(true);
      expect(await loop.readable.isFile()).toBe(false);
      expect(await loop.readable.isFolder()).toBe(false);
    });

    it('should not count links in folder sizes', async () => {
      await root.child('docs', 'b.txt').writable.write('be');
      expect(await root.sizable.size()).toBe(7);
    });
  });

  describe('primitives', () => {
    it('should refuse to delete a folder with children', async () => {
      await buildTree(root, { dir: { f: 'x' } });
      const writable = requireCapability('writable', fs.primitives.writable);
      await expect(writable.deleteJustThisThing(root.child('dir').path)).rejects.toThrow(
        new IOFailureError('Folder not empty: /dir')
      );
    });

    it('should refuse to rename onto an existing node', async () => {
      await buildTree(root, { a: 'one', b: 'two' });
      const writable = requireCapability('writable', fs.primitives.writable);
      await expect(writable.rename?.(root.child('a').path, root.child('b').path)).rejects.toBeInstanceOf(
        AlreadyExistsError
      );
    });

    it('should refuse to move a folder below itself', async () => {
      await buildTree(root, { a: { b: { c: 'x' } } });
      const writable = requireCapability('writable', fs.primitives.writable);

      await expect(writable.rename?.(root.child('a').path, root.child('a', 'b', 'd').path)).rejects.toThrow(
        new IOFailureError('Cannot move /a into itself: /a/b/d')
      );
      expect(await root.listable.childNames()).toEqual(['a']);
      expect(await root.child('a', 'b', 'c').readable.readText()).toBe('x');
    });

    it('should refuse to move a folder below a link into itself', async () => {
      await buildTree(root, { a: { b: {} }, 'to-b': { link: 'a/b' } });
      const writable = requireCapability('writable', fs.primitives.writable);

      await expect(writable.rename?.(root.child('a').path, root.child('to-b', 'a').path)).rejects.toBeInstanceOf(
        IOFailureError
      );
      expect(await root.child('a', 'b').readable.isFolder()).toBe(true);
    });

    it('should refuse to open a folder for writing', async () => {
      await root.child('dir').writable.createFolder();
      await expect(root.child('dir').writable.write('x')).rejects.toBeInstanceOf(NotAFileError);
    });

    it('should name the missing extended attribute', async () => {
      await root.child('f').writable.write('x');
      const xattrs = requireCapability('xattrs', fs.primitives.xattrs);
      await expect(xattrs.getXattr(root.child('f').path, 'user.tag')).rejects.toThrow(
        "No extended attribute 'user.tag' on /f"
      );
      await expect(xattrs.getXattr(root.child('f').path, 'user.tag')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should return copies of attribute values', async () => {
      await root.child('f').writable.write('x');
      const xattrs = requireCapability('xattrs', fs.primitives.xattrs);
      await xattrs.setXattr(root.child('f').path, 'user.tag', Buffer.from('red'));
      const value = await xattrs.getXattr(root.child('f').path, 'user.tag');
      value.write('blu');
      expect((await xattrs.getXattr(root.child('f').path, 'user.tag')).toString()).toBe('red');
    });
  });

  describe('mountpoints', () => {
    it('should add configured mount locations after the roots', async () => {
      const mounted = new MemoryFileSystem({ mountpoints: ['/mnt/usb'] });
      const locations = (await mounted.mountpoints()).map((mountpoint) => mountpoint.location.path.toString());
      expect(locations).toEqual(['/|', '/|mnt|usb']);
    });

    it('should report mounts only at their locations', async () => {
      const mounted = new MemoryFileSystem({ mountpoints: ['/mnt/usb'] });
      const root = await mounted.root();

      expect(await root.isMount()).toBe(true);
      expect(await root.child('mnt', 'usb').isMount()).toBe(true);
      expect(await root.child('mnt').isMount()).toBe(false);
      expect(await root.child('mnt', 'usb', 'backup').isMount()).toBe(false);
    });
  });

  describe('BufferReadStream', () => {
    it('should read from the start offset in blocks', async () => {
      const stream = new BufferReadStream(Buffer.from('abcdef'), 2);
      expect((await stream.read(3))?.toString()).toBe('cde');
      expect((await stream.read(3))?.toString()).toBe('f');
      expect(await stream.read(3)).toBeNull();
    });

    it('should refuse reads after close', async () => {
      const stream = new BufferReadStream(Buffer.from('abc'));
      await stream.close();
      await expect(stream.read(1)).rejects.toThrow('Read from a closed stream');
    });
  });
});
