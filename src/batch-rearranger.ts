/**
 * Two-phase batch move: validate every move, then perform them in order.
 *
 * Validation touches nothing, so a missing source, an occupied destination or
 * two overlapping moves abort the whole batch before the first rename. The tree can still change
 * between the two phases; moves are not rolled back if a later one fails.
 */

import { cp, lstat, mkdir, rename, rm } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { DestinationConflictError, SourceConflictError, SourceNotFoundError } from './errors.js';
import { errnoCode, logger } from './logger.js';
import { MetadataTagger, TAG_KEYS } from './metadata-tagger.js';
import { ExpandedMove, RearrangeResult } from './types.js';

export interface RearrangeOptions {
  /** Carries ProDOS tags along with each moved file */
  tagger?: MetadataTagger;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return false;
    throw error;
  }
}

function isInside(path: string, directory: string): boolean {
  const rel = relative(directory, path);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

function checkSourceOverlaps(moves: readonly ExpandedMove[]): void {
  const sources = moves.map(move => resolve(move.source));
  const seen = new Set<string>();

  moves.forEach((move, index) => {
    const source = sources[index];
    if (seen.has(source)) {
      throw new SourceConflictError(move.source, 'Source claimed by more than one mapping');
    }
    seen.add(source);

    const container = sources.find(other => isInside(source, other));
    if (container !== undefined) {
      throw new SourceConflictError(move.source, `Source lies inside ${container}, which is also moved`);
    }
    if (isInside(resolve(move.destination), source)) {
      throw new SourceConflictError(move.destination, `Cannot move ${move.source} inside itself`);
    }
  });
}

async function validateMoves(moves: readonly ExpandedMove[]): Promise<void> {
  for (const move of moves) {
    if (!(await pathExists(move.source))) {
      throw new SourceNotFoundError(move.source);
    }
  }

  checkSourceOverlaps(moves);

  const claimed = new Set<string>();
  for (const move of moves) {
    if (await pathExists(move.destination)) {
      throw new DestinationConflictError(move.destination);
    }
    const key = resolve(move.destination);
    if (claimed.has(key)) {
      throw new DestinationConflictError(move.destination, 'Destination targeted more than once');
    }
    claimed.add(key);
  }
}

/**
 * Copy-then-remove for moves that `rename` cannot do across filesystems.
 * Tags are copied key by key since the copy does not keep extended attributes.
 */
export async function moveAcrossDevices(
  source: string,
  destination: string,
  tagger?: MetadataTagger
): Promise<void> {
  await cp(source, destination, {
    recursive: true,
    errorOnExist: true,
    force: false,
    preserveTimestamps: true
  });

  if (tagger) {
    for (const key of TAG_KEYS) {
      const value = await tagger.getTag(source, key);
      if (value !== undefined) {
        await tagger.setTag(destination, key, value);
      }
    }
  }

  await rm(source, { recursive: true });

  if (tagger) {
    await tagger.discard(source);
  }
}

async function moveOne(move: ExpandedMove, tagger?: MetadataTagger): Promise<void> {
  await mkdir(dirname(move.destination), { recursive: true });

  try {
    await rename(move.source, move.destination);
  } catch (error) {
    if (errnoCode(error) !== 'EXDEV') throw error;
    logger.debug('Cross-device move, copying instead', { source: move.source }, 'BatchRearranger');
    await moveAcrossDevices(move.source, move.destination, tagger);
    return;
  }

  if (tagger) {
    await tagger.transfer(move.source, move.destination);
  }
}

/**
 * Apply `moves` under `root` all-or-nothing at validation time.
 */
export async function rearrangeFiles(
  root: string,
  moves: readonly ExpandedMove[],
  options: RearrangeOptions = {}
): Promise<RearrangeResult> {
  await validateMoves(moves);

  const applied: ExpandedMove[] = [];
  for (const move of moves) {
    await moveOne(move, options.tagger);
    applied.push({ ...move });
    logger.debug(`Moved ${move.source} -> ${move.destination}`, undefined, 'BatchRearranger');
  }

  logger.debug(`Rearranged ${applied.length} file(s)`, { root }, 'BatchRearranger');
  return { root, applied };
}
