/**
 * Hierarchy strategies: how a backend spells paths.
 *
 * A Hierarchy supplies the primitive half of the Hierarchy capability:
 * applying child names to a path, rendering a path in its native form and
 * decomposing it back into components. Navigation follows the usual join
 * rules: an absolute name discards everything before it, '.' and empty
 * segments are ignored and '..' climbs one level (never above the root).
 */

import { UnsupportedOperationError } from '../errors/FsError.js';
import { FsPath } from './FsPath.js';

export interface Hierarchy {
  /** Separator used by format() and the default for FsNode.getPath() */
  readonly separator: string;

  child(path: FsPath, names: readonly string[]): FsPath;

  /** Parse native text; relative text is resolved against `base`. */
  parse(text: string, base: FsPath): FsPath;

  format(path: FsPath): string;

  /**
   * Components of `path`, or of the relative route from `relativeTo` to it.
   * @throws Error when the two paths do not share a root
   */
  getPathComponents(path: FsPath, relativeTo?: FsPath): string[];
}

interface AbsoluteName {
  root: string;
  rest: string;
}

abstract class SegmentedHierarchy implements Hierarchy {
  abstract readonly separator: string;

  protected abstract readonly segmentPattern: RegExp;

  /** Root and remainder of an absolute name, or null for a relative one. */
  protected abstract splitAbsolute(name: string, current: FsPath): AbsoluteName | null;

  abstract format(path: FsPath): string;

  child(path: FsPath, names: readonly string[]): FsPath {
    let root = path.root;
    let parts = path.components();
    for (const name of names) {
      let text = name;
      const absolute = this.splitAbsolute(name, FsPath.of(root, parts));
      if (absolute) {
        root = absolute.root;
        parts = [];
        text = absolute.rest;
      }
      for (const segment of text.split(this.segmentPattern)) {
        if (segment === '' || segment === '.') continue;
        if (segment === '..') {
          parts.pop();
        } else {
          parts.push(segment);
        }
      }
    }
    return FsPath.of(root, parts);
  }

  parse(text: string, base: FsPath): FsPath {
    return this.child(base, [text]);
  }

  getPathComponents(path: FsPath, relativeTo?: FsPath): string[] {
    if (!relativeTo) {
      return path.components();
    }
    const relative = path.relativeTo(relativeTo);
    if (relative === null) {
      throw new Error(`${this.format(path)} and ${this.format(relativeTo)} do not share a root`);
    }
    return relative;
  }
}

export class PosixHierarchy extends SegmentedHierarchy {
  readonly separator = '/';
  protected readonly segmentPattern = /\/+/;

  protected splitAbsolute(name: string): AbsoluteName | null {
    return name.startsWith('/') ? { root: '/', rest: name } : null;
  }

  format(path: FsPath): string {
    return '/' + path.components().join('/');
  }
}

/**
 * Drive-letter paths. Roots are 'C:' style markers, always upper-cased;
 * either slash is accepted as a separator.
 */
export class WindowsHierarchy extends SegmentedHierarchy {
  readonly separator = '\\';
  protected readonly segmentPattern = /[\\/]+/;

  protected splitAbsolute(name: string, current: FsPath): AbsoluteName | null {
    const drive = /^([A-Za-z]):(.*)$/s.exec(name);
    if (drive) {
      return { root: `${(drive[1] ?? '').toUpperCase()}:`, rest: drive[2] ?? '' };
    }
    if (name.startsWith('\\') || name.startsWith('/')) {
      return { root: current.root, rest: name };
    }
    return null;
  }

  format(path: FsPath): string {
    return `${path.root}\\${path.components().join('\\')}`;
  }
}

/**
 * Paths below a single URL origin. Absolute URLs are accepted only when they
 * stay on the same origin; query strings are not interpreted.
 */
export class UrlHierarchy extends SegmentedHierarchy {
  readonly separator = '/';
  protected readonly segmentPattern = /\/+/;

  constructor(readonly origin: string) {
    super();
  }

  protected splitAbsolute(name: string): AbsoluteName | null {
    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(name)) {
      let url: URL;
      try {
        url = new URL(name);
      } catch (error) {
        throw new UnsupportedOperationError('Hierarchy', 'child', { path: `${name} (malformed URL)`, cause: error });
      }
      if (url.origin !== this.origin) {
        throw new UnsupportedOperationError('Hierarchy', 'child', {
          path: `${name} (outside ${this.origin})`,
        });
      }
      return { root: this.origin, rest: url.pathname };
    }
    return name.startsWith('/') ? { root: this.origin, rest: name } : null;
  }

  format(path: FsPath): string {
    return `${path.root}/${path.components().join('/')}`;
  }
}
