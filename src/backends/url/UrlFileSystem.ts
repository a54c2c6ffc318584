/**
 * Read-only HTTP(S) backend using axios.
 *
 * One UrlFileSystem serves one origin; its single root is the origin and
 * paths are the URL path segments below it. A HEAD request without
 * redirects decides what is at a path: 2xx is a file, a redirect is a link
 * to its Location and 404/410 means nothing is there. Redirects are only
 * followed within the origin, so credentials configured for this origin are
 * never sent elsewhere.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { Readable } from 'stream';
import type {
  BackendPrimitives,
  ReadablePrimitives,
  SizablePrimitives,
} from '../../capabilities/primitives.js';
import { definePrimitives } from '../../capabilities/primitives.js';
import { getFsConfig } from '../../config/FsConfig.js';
import {
  BrokenLinkError,
  FsError,
  IOFailureError,
  NotFoundError,
  PermissionDeniedError,
  UnsupportedOperationError,
} from '../../errors/FsError.js';
import type { FsErrorKind } from '../../errors/FsError.js';
import { translateError } from '../../errors/translate.js';
import type { ErrorCodeTable } from '../../errors/translate.js';
import { FileSystem } from '../../filesystem/FileSystem.js';
import { getLogger, registerComponent } from '../../logging/index.js';
import type { FsNode } from '../../node/FsNode.js';
import { FsPath } from '../../path/FsPath.js';
import { UrlHierarchy } from '../../path/hierarchies.js';
import { NodeReadStream } from '../../streams/NodeStreams.js';
import { skipBytes } from '../../streams/types.js';
import type { ReadStream } from '../../streams/types.js';

registerComponent('url-fs', 'HTTP(S) backend');
const logger = getLogger('url-fs');

/** axios and DNS failure codes not covered by the errno table */
export const URL_ERROR_KINDS: ErrorCodeTable = new Map<string | number, FsErrorKind>([
  ['ERR_NETWORK', 'Disconnected'],
  ['ENOTFOUND', 'Disconnected'],
  ['EAI_AGAIN', 'Disconnected'],
]);

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MISSING_STATUSES = new Set([404, 410]);

/** Longest redirect chain followed within the origin */
const MAX_REDIRECTS = 20;

export interface UrlFileSystemOptions {
  /** Headers sent with every request, e.g. Authorization */
  headers?: Record<string, string>;
  /** Request timeout in ms; defaults to CAPFS_CONNECT_TIMEOUT */
  timeout?: number;
  /** axios adapter override */
  adapter?: AxiosRequestConfig['adapter'];
}

/**
 * The FsError for an HTTP status, or null for success and redirects.
 */
export function statusError(status: number, url: string): FsError | null {
  if (status < 400) return null;
  if (MISSING_STATUSES.has(status)) return new NotFoundError(url);
  if (status === 401 || status === 403) return new PermissionDeniedError(url);
  return new IOFailureError(`HTTP ${status} from ${url}`, { path: url });
}

function headerValue(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export class UrlFileSystem extends FileSystem {
  override readonly identity: string;
  override readonly primitives: BackendPrimitives;

  private readonly hierarchy: UrlHierarchy;
  private readonly http: AxiosInstance;

  constructor(origin: string, options: UrlFileSystemOptions = {}) {
    super();
    const normalized = new URL(origin).origin;
    this.identity = normalized;
    this.hierarchy = new UrlHierarchy(normalized);
    this.http = axios.create({
      timeout: options.timeout ?? getFsConfig().connectTimeout,
      headers: options.headers,
      adapter: options.adapter,
      maxRedirects: 0,
      validateStatus: () => true,
    });
    this.primitives = definePrimitives({
      hierarchy: this.hierarchy,
      readable: this.readablePrimitives(),
      sizable: this.sizablePrimitives(),
    });
  }

  /** Node for an absolute URL on a fresh filesystem for its origin. */
  static forUrl(url: string, options: UrlFileSystemOptions = {}): FsNode {
    const filesystem = new UrlFileSystem(url, options);
    return filesystem.node(filesystem.hierarchy.parse(url, FsPath.root(filesystem.identity)));
  }

  protected override async rootPaths(): Promise<FsPath[]> {
    return [FsPath.root(this.identity)];
  }

  private format(path: FsPath): string {
    return this.hierarchy.format(path);
  }

  private async request<T>(url: string, send: (url: string) => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await send(url);
    } catch (error) {
      throw translateError(error, url, URL_ERROR_KINDS);
    }
  }

  private head(path: FsPath): Promise<AxiosResponse> {
    return this.request(this.format(path), (url) => this.http.head(url));
  }

  /** HEAD status, with statuses other than success, redirect and missing raised as errors. */
  private async probe(path: FsPath): Promise<AxiosResponse> {
    const response = await this.head(path);
    if (MISSING_STATUSES.has(response.status)) return response;
    const failure = statusError(response.status, this.format(path));
    if (failure) throw failure;
    return response;
  }

  private location(response: AxiosResponse): string | null {
    return REDIRECT_STATUSES.has(response.status) ? (headerValue(response, 'location') ?? null) : null;
  }

  /**
   * Follow redirects within the origin to the final resource.
   * @returns its path and HEAD response, or null when the chain ends at a missing resource
   * @throws BrokenLinkError for a redirect loop or a redirect off the origin
   */
  private async resolveFinal(path: FsPath): Promise<{ path: FsPath; response: AxiosResponse } | null> {
    let current = path;
    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.probe(current);
      if (MISSING_STATUSES.has(response.status)) return null;
      const target = this.location(response);
      if (target === null) {
        return { path: current, response };
      }
      try {
        current = this.hierarchy.child(current.parent() ?? current, [target]);
      } catch (error) {
        if (error instanceof UnsupportedOperationError) {
          throw new BrokenLinkError(this.format(path), { cause: error });
        }
        throw error;
      }
    }
    throw new BrokenLinkError(this.format(path), { cause: new Error(`More than ${MAX_REDIRECTS} redirects`) });
  }

  private async isFile(path: FsPath): Promise<boolean> {
    try {
      return (await this.resolveFinal(path)) !== null;
    } catch (error) {
      if (error instanceof BrokenLinkError) return false;
      throw error;
    }
  }

  private async get(path: FsPath, start: number): Promise<ReadStream> {
    const url = this.format(path);
    const response = await this.request(url, (target) =>
      this.http.get<Readable>(target, {
        responseType: 'stream',
        headers: start > 0 ? { Range: `bytes=${start}-` } : undefined,
      })
    );
    const translate = (error: unknown): Error => translateError(error, url, URL_ERROR_KINDS);
    if (response.status === 416) {
      response.data.destroy();
      return new NodeReadStream(Readable.from([]), translate);
    }
    const failure = statusError(response.status, url);
    if (failure) {
      response.data.destroy();
      throw failure;
    }
    const stream = new NodeReadStream(response.data, translate);
    if (start > 0 && response.status === 200) {
      logger.debug(`${url} ignored the Range header, skipping ${start} bytes locally`);
      try {
        await skipBytes(stream, start, getFsConfig().blockSize);
      } catch (error) {
        await stream.close();
        throw error;
      }
    }
    return stream;
  }

  private readablePrimitives(): ReadablePrimitives {
    return {
      seekable: true,
      isFile: (path) => this.isFile(path),
      isFolder: async () => false,
      exists: async (path) => !MISSING_STATUSES.has((await this.probe(path)).status),
      linkTarget: async (path) => this.location(await this.probe(path)),
      openForReading: async (path, options) => {
        const final = await this.resolveFinal(path);
        if (!final) {
          throw new NotFoundError(this.format(path));
        }
        return this.get(final.path, options?.start ?? 0);
      },
    };
  }

  private sizablePrimitives(): SizablePrimitives {
    return {
      size: async (path) => {
        const final = await this.resolveFinal(path);
        if (!final) return 0;
        const length = Number.parseInt(headerValue(final.response, 'content-length') ?? '', 10);
        if (Number.isFinite(length) && length >= 0) {
          return length;
        }
        // No Content-Length: count the body.
        const stream = await this.get(final.path, 0);
        let total = 0;
        try {
          for (;;) {
            const block = await stream.read(getFsConfig().blockSize);
            if (block === null) break;
            total += block.length;
          }
        } finally {
          await stream.close();
        }
        return total;
      },
    };
  }
}
