/**
 * FsPath
 *
 * Immutable location of a node within one filesystem: a root marker plus an
 * ordered list of components. No I/O happens here; turning strings into
 * paths is the job of a Hierarchy (see hierarchies.ts).
 *
 * The empty component list denotes a root. Root markers are backend-defined:
 * '/' for POSIX trees, 'C:' for a drive, 'https://host' for a URL origin.
 */

const RESERVED_COMPONENTS = new Set(['', '.', '..']);

export class FsPath {
  private readonly parts: readonly string[];

  private constructor(
    readonly root: string,
    parts: readonly string[]
  ) {
    this.parts = Object.freeze([...parts]);
  }

  /** The root path for the given marker. */
  static root(marker: string): FsPath {
    return new FsPath(marker, []);
  }

  /**
   * Build a path from a root marker and already-normalized components.
   * @throws Error if any component is empty, '.' or '..'
   */
  static of(root: string, components: readonly string[]): FsPath {
    for (const component of components) {
      assertComponent(component);
    }
    return new FsPath(root, components);
  }

  /** Copy of the component list, outermost first. */
  components(): string[] {
    return [...this.parts];
  }

  get depth(): number {
    return this.parts.length;
  }

  get isRoot(): boolean {
    return this.parts.length === 0;
  }

  /** Last component, or '' for a root. */
  get name(): string {
    return this.parts[this.parts.length - 1] ?? '';
  }

  join(component: string): FsPath {
    assertComponent(component);
    return new FsPath(this.root, [...this.parts, component]);
  }

  parent(): FsPath | null {
    if (this.isRoot) return null;
    return new FsPath(this.root, this.parts.slice(0, -1));
  }

  /** True iff this path is a strict prefix of `other` under the same root. */
  isAncestorOf(other: FsPath): boolean {
    if (other.root !== this.root || other.parts.length <= this.parts.length) {
      return false;
    }
    return this.parts.every((part, i) => other.parts[i] === part);
  }

  equals(other: FsPath): boolean {
    return (
      other.root === this.root &&
      other.parts.length === this.parts.length &&
      this.parts.every((part, i) => other.parts[i] === part)
    );
  }

  /**
   * Components leading from `base` to this path, using '..' to climb.
   * Returns null when the two paths live under different roots.
   */
  relativeTo(base: FsPath): string[] | null {
    if (base.root !== this.root) return null;
    let common = 0;
    while (
      common < base.parts.length &&
      common < this.parts.length &&
      base.parts[common] === this.parts[common]
    ) {
      common++;
    }
    const up: string[] = new Array<string>(base.parts.length - common).fill('..');
    return [...up, ...this.parts.slice(common)];
  }

  /** Key for Map/Set lookups; equal paths share a key. */
  get key(): string {
    return JSON.stringify([this.root, ...this.parts]);
  }

  toString(): string {
    return `${this.root}|${this.parts.join('|')}`;
  }
}

function assertComponent(component: string): void {
  if (RESERVED_COMPONENTS.has(component)) {
    throw new Error(`Invalid path component: '${component}'`);
  }
}
