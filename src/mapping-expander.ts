/**
 * Expands `{ from, to }` rearrange mappings into concrete moves
 */

import { basename, join } from 'path';
import { AmbiguousMappingError, RearrangeConfigError } from './errors.js';
import { matchPattern } from './glob-matcher.js';
import { logger } from './logger.js';
import { ExpandedMove, RearrangeMapping } from './types.js';

function stripLeadingSlash(value: string): string {
  return value.startsWith('/') ? value.slice(1) : value;
}

function assertInsideRoot(value: string, field: 'from' | 'to', original: string): void {
  if (value.startsWith('/')) {
    throw new RearrangeConfigError(`'${field}' must be relative to the volume root: ${original}`, {
      [field]: original
    });
  }
  if (value.split('/').includes('..')) {
    throw new RearrangeConfigError(`'${field}' must not contain '..' segments: ${original}`, {
      [field]: original
    });
  }
}

/**
 * Resolve each mapping against `root`. A `to` ending in `/` receives every
 * match under its own basename; any other `to` names exactly one file.
 * Mappings that match nothing are skipped. Nothing is touched on disk.
 */
export async function expandRearrangeMappings(
  root: string,
  mappings: readonly RearrangeMapping[]
): Promise<ExpandedMove[]> {
  const moves: ExpandedMove[] = [];

  for (const mapping of mappings) {
    const fromPattern = stripLeadingSlash(mapping.from);
    const toPattern = stripLeadingSlash(mapping.to);
    assertInsideRoot(fromPattern, 'from', mapping.from);
    assertInsideRoot(toPattern, 'to', mapping.to);

    const matches = await matchPattern(root, fromPattern);
    if (matches.length === 0) {
      logger.debug(`No matches for ${fromPattern}`, { root }, 'MappingExpander');
      continue;
    }

    const isDirectory = mapping.to.endsWith('/');
    if (!isDirectory && matches.length > 1) {
      throw new AmbiguousMappingError(fromPattern, matches.length, mapping.to);
    }

    const toBase = toPattern.replace(/\/+$/, '');
    for (const source of matches) {
      const destination = isDirectory
        ? join(root, toBase, basename(source))
        : join(root, toBase);
      moves.push({ source, destination });
    }

    logger.debug(`Expanded ${fromPattern} -> ${mapping.to}`, { matches: matches.length }, 'MappingExpander');
  }

  return moves;
}
