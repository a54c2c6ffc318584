import { describe, it, expect } from '@jest/globals';
import { PassThrough, Readable, Writable } from 'stream';
import { DisconnectedError, IOFailureError } from '../../../src/errors/FsError.js';
import { translateError } from '../../../src/errors/translate.js';
import { NodeReadStream, NodeWriteStream } from '../../../src/streams/NodeStreams.js';

const translate = (error: unknown): Error => translateError(error, '/remote/file');

describe('NodeReadStream', () => {
  it('should pull a Node stream in bounded chunks', async () => {
    const stream = new NodeReadStream(Readable.from([Buffer.from('abcdef')], { objectMode: false }), translate);
    expect((await stream.read(4))?.toString()).toBe('abcd');
    expect((await stream.read(4))?.toString()).toBe('ef');
    expect(await stream.read(4)).toBeNull();
    await stream.close();
  });

  it('should wait for data that arrives later', async () => {
    const source = new PassThrough();
    const stream = new NodeReadStream(source, translate);
    const pending = stream.read(3);
    setImmediate(() => {
      source.write(Buffer.from('xyz'));
      source.end();
    });
    expect((await pending)?.toString()).toBe('xyz');
    expect(await stream.read(3)).toBeNull();
  });

  it('should translate a stream error', async () => {
    const source = new PassThrough();
    const stream = new NodeReadStream(source, translate);
    source.destroy(Object.assign(new Error('reset'), { code: 'ECONNRESET' }));
    await expect(stream.read(10)).rejects.toBeInstanceOf(DisconnectedError);
  });

  it('should refuse reads after close', async () => {
    const stream = new NodeReadStream(Readable.from([Buffer.from('a')], { objectMode: false }), translate);
    await stream.close();
    await stream.close();
    await expect(stream.read(1)).rejects.toBeInstanceOf(IOFailureError);
  });
});

describe('NodeWriteStream', () => {
  function collector(): { sink: Writable; chunks: Buffer[] } {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });
    return { sink, chunks };
  }

  it('should resolve each write once the sink accepted it', async () => {
    const { sink, chunks } = collector();
    const stream = new NodeWriteStream(sink, translate);
    await stream.write(Buffer.from('ab'));
    await stream.write(Buffer.from('cd'));
    await stream.close();
    expect(Buffer.concat(chunks).toString()).toBe('abcd');
    expect(sink.writableFinished).toBe(true);
  });

  it('should translate a failed write', async () => {
    const sink = new Writable({
      write(_chunk, _encoding, callback) {
        callback(Object.assign(new Error('denied'), { code: 'EACCES' }));
      },
    });
    sink.on('error', () => undefined);
    const stream = new NodeWriteStream(sink, translate);
    await expect(stream.write(Buffer.from('x'))).rejects.toMatchObject({ kind: 'PermissionDenied', path: '/remote/file' });
  });

  it('should refuse writes after close', async () => {
    const { sink } = collector();
    const stream = new NodeWriteStream(sink, translate);
    await stream.close();
    await expect(stream.write(Buffer.from('x'))).rejects.toBeInstanceOf(IOFailureError);
  });
});
