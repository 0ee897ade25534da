/**
 * Segment-by-segment glob resolution against a directory tree.
 *
 * Patterns use `/` as separator whatever the host. Within one segment `*`
 * matches any run of characters, `?` a single character and `[...]` /
 * `[!...]` a character class; a `**` segment spans zero or more directories.
 * Wildcards never match a leading `.` unless the segment itself starts with
 * one, which keeps staging and sidecar files out of every match.
 */

import { Dirent } from 'fs';
import { lstat, readdir, stat } from 'fs/promises';
import { join } from 'path';
import fg from 'fast-glob';
import { errnoCode } from './logger.js';

const WILDCARD = /[*?[]/;

export function hasWildcard(segment: string): boolean {
  return WILDCARD.test(segment);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.+^${}()|[\]\\-]/g, '\\$&');
}

export function segmentToRegExp(segment: string): RegExp {
  let source = '';
  let i = 0;

  while (i < segment.length) {
    const char = segment[i];

    if (char === '*') {
      source += '.*';
      i++;
      continue;
    }
    if (char === '?') {
      source += '.';
      i++;
      continue;
    }
    if (char === '[') {
      const close = segment.indexOf(']', i + 2);
      if (close !== -1) {
        let body = segment.slice(i + 1, close);
        let negate = false;
        if (body.startsWith('!')) {
          negate = true;
          body = body.slice(1);
        }
        const escapedBody = body.replace(/[\\^\]]/g, '\\$&');
        source += `[${negate ? '^' : ''}${escapedBody}]`;
        i = close + 1;
        continue;
      }
    }

    source += escapeRegExp(char);
    i++;
  }

  return new RegExp(`^${source}$`, 's');
}

export function matchesSegment(name: string, segment: string): boolean {
  if (name.startsWith('.') && !segment.startsWith('.')) {
    return false;
  }
  return segmentToRegExp(segment).test(name);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return false;
    throw error;
  }
}

async function listDirectory(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return [];
    throw error;
  }
}

async function expandRecursive(dir: string): Promise<string[]> {
  const nested = await fg('**', {
    cwd: dir,
    onlyDirectories: true,
    dot: false,
    followSymbolicLinks: false,
    absolute: false
  });
  return [dir, ...nested.map(relative => join(dir, ...relative.split('/')))];
}

/**
 * Absolute paths under `root` matching `pattern`, in directory enumeration
 * order. Files and directories both match; intermediate segments only
 * descend into directories.
 */
export async function matchPattern(root: string, pattern: string): Promise<string[]> {
  const segments = pattern.split('/').filter(segment => segment.length > 0);
  if (segments.length === 0) return [];

  let current: string[] = [root];

  for (let index = 0; index < segments.length; index++) {
    const segment = segments[index];
    const isLast = index === segments.length - 1;
    const next: string[] = [];

    for (const dir of current) {
      if (segment === '**') {
        next.push(...(await expandRecursive(dir)));
        continue;
      }

      if (!hasWildcard(segment)) {
        const candidate = join(dir, segment);
        if (isLast ? await exists(candidate) : await isDirectory(candidate)) {
          next.push(candidate);
        }
        continue;
      }

      for (const entry of await listDirectory(dir)) {
        if (!matchesSegment(entry.name, segment)) continue;
        const candidate = join(dir, entry.name);
        if (isLast || entry.isDirectory() || (entry.isSymbolicLink() && (await isDirectory(candidate)))) {
          next.push(candidate);
        }
      }
    }

    current = [...new Set(next)];
    if (current.length === 0) break;
  }

  return current.filter(path => path !== root);
}
