import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { MemoryFileSystem } from '../../../src/backends/memory/MemoryFileSystem.js';
import { MemoryStore } from '../../../src/backends/memory/MemoryStore.js';
import { DisconnectedError, IOFailureError, PermissionDeniedError } from '../../../src/errors/FsError.js';
import { Logger } from '../../../src/logging/Logger.js';
import type { FsNode } from '../../../src/node/FsNode.js';
import { ReconnectingFileSystem, wrap } from '../../../src/reconnect/ReconnectingFileSystem.js';
import { FaultPlan, FlakyFileSystem } from '../../helpers/FlakyFileSystem.js';

describe('ReconnectingFileSystem', () => {
  let store: MemoryStore;
  let plan: FaultPlan;
  let reconnectsSeen: number[];
  let proxy: ReconnectingFileSystem;
  let file: FsNode;

  beforeEach(async () => {
    store = new MemoryStore();
    const seed = await new MemoryFileSystem({ store }).root();
    await seed.child('data.bin').writable.write('0123456789');
    plan = new FaultPlan();
    reconnectsSeen = [];
    proxy = await wrap(plan.factory(store), {
      onReconnect: (_backend, reconnects) => reconnectsSeen.push(reconnects),
    });
    file = await proxy.resolve('/data.bin');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass calls through to the backend', async () => {
    expect(proxy.identity).toBe(`memory://${store.id}`);
    expect(await file.readable.readText()).toBe('0123456789');
    expect(proxy.reconnects).toBe(0);
    expect(proxy.state).toBe('connected');
    expect(plan.connections).toBe(1);
  });

  it('should mirror the capabilities of the backend', async () => {
    const root = await proxy.root();
    expect(root.supports('writable')).toBe(true);
    expect(root.supports('xattrs')).toBe(false);
    expect(root.writable.writeDelivery).toBe('at-least-once');
  });

  it('should reconnect and retry once after a disconnection', async () => {
    const first = proxy.backend;
    plan.failNext('isFile');

    expect(await file.readable.isFile()).toBe(true);
    expect(plan.injected).toEqual(['isFile']);
    expect(proxy.reconnects).toBe(1);
    expect(plan.connections).toBe(2);
    expect(reconnectsSeen).toEqual([1]);
    expect(proxy.backend).not.toBe(first);
    expect(first instanceof FlakyFileSystem && first.closed).toBe(true);
  });

  it('should keep nodes usable across a reconnect', async () => {
    plan.sever();
    expect(await file.readable.readText()).toBe('0123456789');
    expect(await (await proxy.root()).listable.childNames()).toEqual(['data.bin']);
    expect(proxy.reconnects).toBe(1);
  });

  it('should not retry other failures', async () => {
    plan.failNext('isFile', { error: () => new PermissionDeniedError('/data.bin') });
    await expect(file.readable.isFile()).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(proxy.reconnects).toBe(0);
  });

  it('should give up when the retry is cut as well', async () => {
    plan.failNext('exists', { times: 2 });
    const attempt = file.readable.exists();
    await expect(attempt).rejects.toBeInstanceOf(DisconnectedError);
    await expect(attempt).rejects.toMatchObject({
      reconnectAttempted: true,
      message: `Disconnected from ${proxy.identity} again after retrying: Connection reset during exists`,
    });
    expect(proxy.reconnects).toBe(1);
  });

  it('should give up when the replacement cannot be built', async () => {
    plan.failNext('exists').failNext('connect');
    const attempt = file.readable.exists();
    await expect(attempt).rejects.toMatchObject({
      reconnectAttempted: true,
      message: `Disconnected from ${proxy.identity} again after reconnecting: Connection reset during connect`,
    });
    expect(proxy.reconnects).toBe(0);
    expect(proxy.state).toBe('connected');
    expect(await file.readable.exists()).toBe(true);
    expect(plan.connections).toBe(1);
  });

  it('should share one rebuild between concurrent callers', async () => {
    plan.sever();
    const results = await Promise.all([
      file.readable.exists(),
      file.readable.isFile(),
      file.sizable.size(),
    ]);
    expect(results).toEqual([true, true, 10]);
    expect(proxy.reconnects).toBe(1);
    expect(plan.connections).toBe(2);
  });

  it('should log a superseded connection that fails to close', async () => {
    const warn = jest.spyOn(Logger.prototype, 'warn');
    plan.sever();
    await file.readable.exists();
    expect(warn).toHaveBeenCalledWith(
      `Failed to close superseded connection to ${proxy.identity}`,
      expect.any(DisconnectedError)
    );
  });

  it('should hand out mountpoints that belong to the proxy', async () => {
    const [mountpoint] = await proxy.mountpoints();
    expect(mountpoint?.filesystem).toBe(proxy);
    expect(mountpoint?.location.filesystem).toBe(proxy);
    expect(mountpoint?.location.getPath()).toBe('/');
  });

  it('should use the working folder of the live backend', async () => {
    await (await proxy.root()).child('work').writable.createFolder();
    await (await proxy.resolve('/work')).workingDirectory.changeTo();
    expect((await proxy.workingNode()).getPath()).toBe('/work');
    expect((await proxy.resolve('note.txt')).getPath()).toBe('/work/note.txt');
  });

  it('should keep the working folder across a reconnect', async () => {
    await (await proxy.root()).child('work').writable.createFolder();
    await (await proxy.resolve('/work')).workingDirectory.changeTo();
    plan.sever();

    expect(await file.readable.exists()).toBe(true);
    expect(proxy.reconnects).toBe(1);
    expect((await proxy.workingNode()).getPath()).toBe('/work');
    expect((await proxy.resolve('note.txt')).getPath()).toBe('/work/note.txt');
  });

  it('should fail the reconnect when the working folder is gone', async () => {
    await (await proxy.root()).child('work').writable.createFolder();
    await (await proxy.resolve('/work')).workingDirectory.changeTo();
    await (await new MemoryFileSystem({ store }).resolve('/work')).writable.delete();
    plan.sever();

    await expect(file.readable.exists()).rejects.toMatchObject({
      reconnectAttempted: true,
      message: `Disconnected from ${proxy.identity} again after reconnecting: No such file or folder: /work`,
    });
    expect(proxy.reconnects).toBe(0);
    expect(plan.connections).toBe(2);
  });

  it('should close the live backend', async () => {
    await proxy.close();
    const backend = proxy.backend;
    expect(backend instanceof FlakyFileSystem && backend.closed).toBe(true);
    expect(proxy.state).toBe('closed');
  });

  it('should refuse calls after close instead of reconnecting', async () => {
    await proxy.close();
    const attempt = file.readable.exists();
    await expect(attempt).rejects.toBeInstanceOf(IOFailureError);
    await expect(attempt).rejects.toThrow(`Filesystem ${proxy.identity} is closed`);
    expect(proxy.reconnects).toBe(0);
    expect(plan.connections).toBe(1);
  });

  it('should allow closing twice', async () => {
    await proxy.close();
    await expect(proxy.close()).resolves.toBeUndefined();
  });
});
