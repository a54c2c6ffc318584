/**
 * Shell-style wildcard matching for a single path component.
 *
 * Supports `*`, `?` and bracket classes (`[abc]`, `[a-z]`, `[!abc]`).
 * Matching is case-sensitive; a leading dot must be matched literally.
 */

const MAGIC = /[*?[]/;

export function hasMagic(segment: string): boolean {
  return MAGIC.test(segment);
}

/**
 * Convert one glob component to an anchored regex.
 */
export function globToRegex(glob: string): RegExp {
  let source = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob.charAt(i);
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const close = glob.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = glob.slice(i + 1, close);
      const negated = body.startsWith('!') || body.startsWith('^');
      if (negated) body = body.slice(1);
      source += `[${negated ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
      i = close;
    } else {
      source += ch.replace(/[.+^${}()|[\]\\/]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 's');
}

/**
 * Whether `name` matches the glob component `segment`.
 */
export function matchesSegment(name: string, segment: string): boolean {
  if (name.startsWith('.') && !segment.startsWith('.')) {
    return false;
  }
  return globToRegex(segment).test(name);
}
