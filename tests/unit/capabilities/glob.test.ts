import { describe, it, expect } from '@jest/globals';
import { globToRegex, hasMagic, matchesSegment } from '../../../src/capabilities/glob.js';

describe('glob', () => {
  it('should detect wildcard characters', () => {
    expect(hasMagic('*.txt')).toBe(true);
    expect(hasMagic('file?.log')).toBe(true);
    expect(hasMagic('[ab].md')).toBe(true);
    expect(hasMagic('plain.txt')).toBe(false);
  });

  it('should match * and ? within one component', () => {
    expect(matchesSegment('report.txt', '*.txt')).toBe(true);
    expect(matchesSegment('report.txt.bak', '*.txt')).toBe(false);
    expect(matchesSegment('a1', 'a?')).toBe(true);
    expect(matchesSegment('a12', 'a?')).toBe(false);
  });

  it('should support bracket classes, ranges and negation', () => {
    expect(matchesSegment('b.md', '[abc].md')).toBe(true);
    expect(matchesSegment('d.md', '[abc].md')).toBe(false);
    expect(matchesSegment('7', '[0-9]')).toBe(true);
    expect(matchesSegment('x', '[!0-9]')).toBe(true);
    expect(matchesSegment('5', '[!0-9]')).toBe(false);
  });

  it('should only match a leading dot explicitly', () => {
    expect(matchesSegment('.hidden', '*')).toBe(false);
    expect(matchesSegment('.hidden', '.*')).toBe(true);
  });

  it('should escape regex metacharacters', () => {
    expect(matchesSegment('a+b(1).txt', 'a+b(1).txt')).toBe(true);
    expect(matchesSegment('aab(1)xtxt', 'a+b(1).txt')).toBe(false);
  });

  it('should treat an unclosed bracket literally', () => {
    expect(globToRegex('[abc').test('[abc')).toBe(true);
  });
});
