/**
 * Local disk backend on node:fs.
 *
 * Supports every capability except extended attributes, which node:fs has
 * no API for. Paths are POSIX on every platform but win32, where roots are
 * the drive letters that currently exist.
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as os from 'os';
import type {
  BackendPrimitives,
  ListablePrimitives,
  ReadablePrimitives,
  SizablePrimitives,
  WorkingDirectoryPrimitives,
  WritablePrimitives,
} from '../../capabilities/primitives.js';
import { definePrimitives } from '../../capabilities/primitives.js';
import { NotAFileError } from '../../errors/FsError.js';
import { errorCode, translateError } from '../../errors/translate.js';
import { FileSystem } from '../../filesystem/FileSystem.js';
import { MountPoint, makeUsage } from '../../filesystem/MountPoint.js';
import type { DiskUsage } from '../../filesystem/MountPoint.js';
import type { FsNode } from '../../node/FsNode.js';
import { getLogger, registerComponent } from '../../logging/index.js';
import { FsPath } from '../../path/FsPath.js';
import { PosixHierarchy, WindowsHierarchy } from '../../path/hierarchies.js';
import type { Hierarchy } from '../../path/hierarchies.js';
import { NodeReadStream, NodeWriteStream } from '../../streams/NodeStreams.js';

registerComponent('local-fs', 'Local disk backend');
const logger = getLogger('local-fs');

const MOUNT_TABLE = '/proc/self/mounts';

/** Codes meaning "nothing usable at this path" for the type predicates. */
const ABSENT_CODES = new Set(['ENOENT', 'ENOTDIR', 'ELOOP']);

export interface LocalFileSystemOptions {
  /** Mount table to parse; /proc/self/mounts by default */
  mountTable?: string;
}

export class LocalFileSystem extends FileSystem {
  override readonly identity = 'local';
  override readonly primitives: BackendPrimitives;

  private readonly hierarchy: Hierarchy;
  private readonly mountTable: string;

  constructor(options: LocalFileSystemOptions = {}) {
    super();
    this.mountTable = options.mountTable ?? MOUNT_TABLE;
    this.hierarchy = process.platform === 'win32' ? new WindowsHierarchy() : new PosixHierarchy();
    this.primitives = definePrimitives({
      hierarchy: this.hierarchy,
      readable: this.readablePrimitives(),
      listable: this.listablePrimitives(),
      sizable: this.sizablePrimitives(),
      writable: this.writablePrimitives(),
      workingDirectory: this.workingDirectoryPrimitives(),
    });
  }

  protected override async rootPaths(): Promise<FsPath[]> {
    if (process.platform !== 'win32') {
      return [FsPath.root('/')];
    }
    const drives: FsPath[] = [];
    for (let code = 'A'.charCodeAt(0); code <= 'Z'.charCodeAt(0); code++) {
      const letter = String.fromCharCode(code);
      try {
        await fsp.access(`${letter}:\\`);
        drives.push(FsPath.root(`${letter}:`));
      } catch (error) {
        logger.trace(`Drive ${letter}: unavailable (${String(errorCode(error) ?? 'unknown')})`);
      }
    }
    return drives;
  }

  /**
   * One mountpoint per entry of the mount table. Falls back to one per root
   * where the table cannot be read (non-Linux platforms).
   */
  override async mountpoints(): Promise<MountPoint[]> {
    let table: string;
    try {
      table = await fsp.readFile(this.mountTable, 'utf8');
    } catch (error) {
      logger.debug(`Mount table ${this.mountTable} unavailable, using roots`, { code: errorCode(error) });
      return super.mountpoints();
    }
    const base = FsPath.root('/');
    const result: MountPoint[] = [];
    for (const entry of parseMountTable(table)) {
      const location = this.node(this.hierarchy.parse(entry.location, base));
      const device = entry.device.startsWith('/') ? this.node(this.hierarchy.parse(entry.device, base)) : null;
      result.push(new MountPoint(location, device, this));
    }
    return result.length > 0 ? result : super.mountpoints();
  }

  override async diskUsage(location: FsPath): Promise<DiskUsage | null> {
    const stats = await this.call(location, (native) => fsp.statfs(native));
    const space = makeUsage(stats.blocks * stats.bsize, (stats.blocks - stats.bfree) * stats.bsize, stats.bavail * stats.bsize);
    const inodes = stats.files > 0 ? makeUsage(stats.files, stats.files - stats.ffree, stats.ffree) : null;
    return { space, inodes };
  }

  override async temporaryDirectory(): Promise<FsNode | null> {
    return this.node(this.hierarchy.parse(os.tmpdir(), FsPath.root('/')));
  }

  private format(path: FsPath): string {
    return this.hierarchy.format(path);
  }

  /** Run a node:fs call on the native form of `path`, translating failures. */
  private async call<T>(path: FsPath, operation: (native: string) => Promise<T>): Promise<T> {
    const native = this.format(path);
    try {
      return await operation(native);
    } catch (error) {
      throw translateError(error, native);
    }
  }

  /** stat or lstat, with null for a path that has nothing behind it. */
  private async statOrNull(path: FsPath, follow: boolean): Promise<fs.Stats | null> {
    const native = this.format(path);
    try {
      return follow ? await fsp.stat(native) : await fsp.lstat(native);
    } catch (error) {
      const code = errorCode(error);
      if (typeof code === 'string' && ABSENT_CODES.has(code)) {
        return null;
      }
      throw translateError(error, native);
    }
  }

  private async sizeOf(path: FsPath): Promise<number> {
    const stats = await this.statOrNull(path, true);
    if (!stats) return 0;
    if (!stats.isDirectory()) {
      return stats.isFile() ? stats.size : 0;
    }
    let total = 0;
    for (const name of await this.call(path, (native) => fsp.readdir(native))) {
      total += await this.sizeOf(path.join(name));
    }
    return total;
  }

  private readablePrimitives(): ReadablePrimitives {
    return {
      seekable: true,
      isFile: async (path) => (await this.statOrNull(path, true))?.isFile() ?? false,
      isFolder: async (path) => (await this.statOrNull(path, true))?.isDirectory() ?? false,
      exists: async (path) => (await this.statOrNull(path, false)) !== null,
      linkTarget: async (path) => {
        const stats = await this.statOrNull(path, false);
        if (!stats?.isSymbolicLink()) return null;
        return this.call(path, (native) => fsp.readlink(native));
      },
      openForReading: (path, options) =>
        this.call(path, async (native) => {
          const handle = await fsp.open(native, 'r');
          try {
            if ((await handle.stat()).isDirectory()) {
              throw new NotAFileError(native);
            }
          } catch (error) {
            await handle.close();
            throw error;
          }
          const source = handle.createReadStream({ start: options?.start ?? 0 });
          return new NodeReadStream(source, (error) => translateError(error, native));
        }),
    };
  }

  private listablePrimitives(): ListablePrimitives {
    return {
      childNames: async (path) => {
        const stats = await this.statOrNull(path, true);
        if (!stats?.isDirectory()) return null;
        const names = await this.call(path, (native) => fsp.readdir(native));
        return names.sort();
      },
    };
  }

  private sizablePrimitives(): SizablePrimitives {
    return {
      size: (path) => this.sizeOf(path),
    };
  }

  private writablePrimitives(): WritablePrimitives {
    return {
      writeDelivery: 'at-least-once',
      openForWriting: (path, options) =>
        this.call(path, async (native) => {
          const handle = await fsp.open(native, options?.append ? 'a' : 'w');
          return new NodeWriteStream(handle.createWriteStream(), (error) => translateError(error, native));
        }),
      createFolder: (path) => this.call(path, (native) => fsp.mkdir(native)),
      linkTo: (path, target) => this.call(path, (native) => fsp.symlink(target, native)),
      deleteJustThisThing: (path) =>
        this.call(path, async (native) => {
          const stats = await fsp.lstat(native);
          if (stats.isDirectory()) {
            await fsp.rmdir(native);
          } else {
            await fsp.unlink(native);
          }
        }),
      rename: (from, to) => this.call(from, (native) => fsp.rename(native, this.format(to))),
    };
  }

  private workingDirectoryPrimitives(): WorkingDirectoryPrimitives {
    return {
      changeTo: (path) =>
        this.call(path, async (native) => {
          process.chdir(native);
        }),
      currentPath: async () => this.hierarchy.parse(process.cwd(), FsPath.root('/')),
    };
  }
}

export interface MountTableEntry {
  device: string;
  location: string;
  type: string;
}

/**
 * Parse /proc/mounts syntax. Fields are space separated; spaces, tabs,
 * newlines and backslashes inside a field appear as octal escapes.
 */
export function parseMountTable(text: string): MountTableEntry[] {
  const entries: MountTableEntry[] = [];
  for (const line of text.split('\n')) {
    const [device, location, type] = line.trim().split(/\s+/);
    if (!device || !location || !type) continue;
    entries.push({
      device: unescapeMountField(device),
      location: unescapeMountField(location),
      type,
    });
  }
  return entries;
}

function unescapeMountField(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_match, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

let shared: LocalFileSystem | null = null;

/** Process-wide LocalFileSystem. */
export function getLocalFileSystem(): LocalFileSystem {
  if (!shared) {
    shared = new LocalFileSystem();
  }
  return shared;
}
