/**
 * Path Iteration Tests
 */

import { describe, expect, it } from 'vitest';
import { PathError } from '../src/error-classes.js';
import {
  pathExtension,
  pathExtensionEqual,
  pathFirst,
  pathLast,
  pathNext,
  pathPrev,
  pathSegments,
  pathSegmentsEqual,
  segmentText,
  type PathSegment,
} from '../src/path.js';

function texts(path: string): string[] {
  return [...pathSegments(path)].map(segmentText);
}

/** Walk backwards from the last segment */
function reversed(path: string): string[] {
  const out: string[] = [];
  for (let segment = pathLast(path); segment; segment = pathPrev(segment)) {
    out.push(segmentText(segment));
  }
  return out;
}

describe('path iteration', () => {
  it('yields a root segment for absolute paths', () => {
    expect(texts('/usr/lib/')).toEqual(['', 'usr', 'lib']);
  });

  it('walks relative paths with either separator', () => {
    expect(texts('a/b')).toEqual(['a', 'b']);
    expect(texts('C:\\dir\\file.txt')).toEqual(['C:', 'dir', 'file.txt']);
  });

  it('collapses repeated separators', () => {
    expect(texts('a//b')).toEqual(['a', 'b']);
  });

  it('returns null for an empty path', () => {
    expect(pathFirst('')).toBeNull();
    expect(pathLast('')).toBeNull();
  });

  it('walks backwards to the root', () => {
    expect(reversed('/usr/lib/')).toEqual(['lib', 'usr', '']);
    expect(reversed('a/b')).toEqual(['b', 'a']);
    expect(reversed('/')).toEqual(['']);
  });

  it('reports segment offsets', () => {
    const last = pathLast('/usr/lib');
    expect(last).toEqual({ path: '/usr/lib', offset: 5, length: 3 });
  });

  it('returns null past the last segment', () => {
    const only = pathFirst('file');
    expect(only).not.toBeNull();
    if (only) {
      expect(pathNext(only)).toBeNull();
    }
  });

  it('throws TEXT-P001 for a segment outside its path', () => {
    const bogus: PathSegment = { path: 'ab', offset: 1, length: 5 };
    expect(() => pathNext(bogus)).toThrow(PathError);
    expect(() => pathPrev(bogus)).toThrow('Segment 1+5 lies outside the path');
  });

  it('compares segment text', () => {
    const a = pathFirst('abc/x');
    const b = pathFirst('abc/y');
    const c = pathFirst('ab/x');
    expect(a && b && pathSegmentsEqual(a, b)).toBe(true);
    expect(a && c && pathSegmentsEqual(a, c)).toBe(false);
  });
});

describe('path extensions', () => {
  it.each([
    ['dir.d/file.TXT', 'TXT'],
    ['dir.d/file', ''],
    ['archive.tar.gz', 'gz'],
    ['.bashrc', 'bashrc'],
    ['C:\\notes.md', 'md'],
  ])('%s has extension %s', (path, ext) => {
    expect(pathExtension(path)).toBe(ext);
  });

  it('compares extensions ignoring case', () => {
    expect(pathExtensionEqual('a/b.TXT', 'txt')).toBe(true);
    expect(pathExtensionEqual('a/b.txt', 'md')).toBe(false);
  });
});
