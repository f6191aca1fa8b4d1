/**
 * Path Iteration
 * Walks the segments of a '/' or '\' separated path in either direction.
 * An absolute path starts with a zero-length root segment.
 */

import { stricmp } from './ascii.js';
import { PathError } from './error-classes.js';

export interface PathSegment {
  readonly path: string;
  readonly offset: number;
  readonly length: number;
}

function isSeparator(char: string): boolean {
  return char === '/' || char === '\\';
}

function assertSegment(segment: PathSegment): void {
  const { path, offset, length } = segment;
  if (offset < 0 || length < 0 || offset + length > path.length) {
    throw new PathError('TEXT-P001', { offset, length });
  }
}

/** Segment text */
export function segmentText(segment: PathSegment): string {
  return segment.path.slice(segment.offset, segment.offset + segment.length);
}

// ============================================================
// ITERATION
// ============================================================

/** Segment starting at `offset`, which must not be a separator */
function segmentAt(path: string, offset: number): PathSegment {
  let end = offset;
  while (end < path.length && !isSeparator(path.charAt(end))) {
    end++;
  }
  return { path, offset, length: end - offset };
}

/** First segment, or null for an empty path */
export function pathFirst(path: string): PathSegment | null {
  if (path.length === 0) {
    return null;
  }
  return segmentAt(path, 0);
}

/**
 * Segment after `segment`, or null at the end.
 *
 * @throws PathError (TEXT-P001) when the segment lies outside its path
 */
export function pathNext(segment: PathSegment): PathSegment | null {
  assertSegment(segment);
  const { path } = segment;
  let offset = segment.offset + segment.length;
  while (offset < path.length && isSeparator(path.charAt(offset))) {
    offset++;
  }
  if (offset >= path.length) {
    return null;
  }
  return segmentAt(path, offset);
}

/**
 * Segment before `segment`, or null at the start.
 * Stepping back past leading separators yields the root segment.
 *
 * @throws PathError (TEXT-P001) when the segment lies outside its path
 */
export function pathPrev(segment: PathSegment): PathSegment | null {
  assertSegment(segment);
  const { path } = segment;
  if (segment.offset === 0) {
    return null;
  }

  let end = segment.offset;
  while (end > 0 && isSeparator(path.charAt(end - 1))) {
    end--;
  }
  if (end === 0) {
    return { path, offset: 0, length: 0 };
  }

  let start = end;
  while (start > 0 && !isSeparator(path.charAt(start - 1))) {
    start--;
  }
  return { path, offset: start, length: end - start };
}

/** Last segment; trailing separators are skipped */
export function pathLast(path: string): PathSegment | null {
  if (path.length === 0) {
    return null;
  }
  return pathPrev({ path, offset: path.length, length: 0 });
}

/**
 * Iterate segments front to back.
 *
 * @example
 * [...pathSegments('/usr/lib/')].map(segmentText) // ['', 'usr', 'lib']
 */
export function* pathSegments(path: string): Generator<PathSegment> {
  for (let segment = pathFirst(path); segment; segment = pathNext(segment)) {
    yield segment;
  }
}

/** Case-sensitive comparison of segment text */
export function pathSegmentsEqual(a: PathSegment, b: PathSegment): boolean {
  return segmentText(a) === segmentText(b);
}

// ============================================================
// EXTENSIONS
// ============================================================

/** Text after the last '.' of the final segment, or '' */
export function pathExtension(path: string): string {
  let dot = -1;
  let separator = -1;
  for (let i = 0; i < path.length; i++) {
    const char = path.charAt(i);
    if (char === '.') {
      dot = i;
    } else if (isSeparator(char)) {
      separator = i;
    }
  }
  return dot > separator ? path.slice(dot + 1) : '';
}

/** Compare the extension ignoring ASCII case; `ext` has no leading dot */
export function pathExtensionEqual(path: string, ext: string): boolean {
  return stricmp(pathExtension(path), ext) === 0;
}
