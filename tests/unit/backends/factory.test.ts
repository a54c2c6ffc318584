import { describe, it, expect } from '@jest/globals';
import { FileScheme, createFileSystem, fileSystemFactory } from '../../../src/backends/factory.js';
import { LocalFileSystem, getLocalFileSystem } from '../../../src/backends/local/LocalFileSystem.js';
import { MemoryFileSystem } from '../../../src/backends/memory/MemoryFileSystem.js';
import { MemoryStore } from '../../../src/backends/memory/MemoryStore.js';
import { UrlFileSystem } from '../../../src/backends/url/UrlFileSystem.js';
import { wrap } from '../../../src/reconnect/ReconnectingFileSystem.js';

describe('factory', () => {
  describe('createFileSystem', () => {
    it('should return the shared local filesystem without options', async () => {
      expect(await createFileSystem(FileScheme.FILE, {})).toBe(getLocalFileSystem());
    });

    it('should build a dedicated local filesystem with options', async () => {
      const fs = await createFileSystem(FileScheme.FILE, { mountTable: '/nonexistent/mounts' });
      expect(fs).toBeInstanceOf(LocalFileSystem);
      expect(fs).not.toBe(getLocalFileSystem());
    });

    it('should build a memory filesystem on the given store', async () => {
      const store = new MemoryStore();
      const fs = await createFileSystem(FileScheme.MEMORY, { store });
      expect(fs).toBeInstanceOf(MemoryFileSystem);
      expect(fs.identity).toBe(`memory://${store.id}`);
    });

    it('should build a URL filesystem for the origin', async () => {
      const fs = await createFileSystem(FileScheme.HTTP, { origin: 'https://files.test/docs/' });
      expect(fs).toBeInstanceOf(UrlFileSystem);
      expect(fs.identity).toBe('https://files.test');
    });

    it('should reject invalid remote properties before connecting', async () => {
      await expect(createFileSystem(FileScheme.SFTP, {})).rejects.toThrow('SFTP host is required');
      await expect(createFileSystem(FileScheme.FTP, {})).rejects.toThrow('FTP host is required');
    });
  });

  describe('fileSystemFactory', () => {
    it('should build a fresh instance per call for the same endpoint', async () => {
      const store = new MemoryStore();
      const factory = fileSystemFactory(FileScheme.MEMORY, { store });
      const first = await factory();
      const second = await factory();
      expect(first).not.toBe(second);
      expect(first.identity).toBe(second.identity);
    });

    it('should feed the reconnecting proxy', async () => {
      const store = new MemoryStore();
      const proxy = await wrap(fileSystemFactory(FileScheme.MEMORY, { store }));
      await (await proxy.root()).child('note.txt').writable.write('kept');
      const direct = new MemoryFileSystem({ store });
      expect(await (await direct.root()).child('note.txt').readable.readText()).toBe('kept');
    });
  });
});
