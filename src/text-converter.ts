/**
 * In-place conversion of a host text file to a tagged ProDOS TEXT file.
 *
 * The converted bytes are written to a staging file in the same directory,
 * tagged, and renamed over the original. Tags stored beside the file move
 * into place just before that rename and are put back if it fails. The
 * original is never opened for writing, so a failure leaves it as it was.
 */

import { randomBytes } from 'crypto';
import { chmod, open, readFile, rename, rm, stat } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { DEFAULT_ACCESS } from './access-byte.js';
import { toProdosText } from './byte-transform.js';
import { getMetadataBackend } from './config.js';
import { EncodingError } from './errors.js';
import { errorMessage, logger } from './logger.js';
import { MetadataTagger, applyTagSet, createTagger } from './metadata-tagger.js';
import { AsciiMode, ProdosTagSet } from './types.js';

const CONTEXT = 'TextConverter';

export const PRODOS_TEXT_FILE_TYPE = '04';
export const SEEDLING_STORAGE_TYPE = '01';

export interface ConvertOptions {
  /** Defaults to `strict`. */
  mode?: AsciiMode;
  access?: string;
  tagger?: MetadataTagger;
}

export interface ConvertResult {
  path: string;
  bytesIn: number;
  bytesOut: number;
  tags: ProdosTagSet;
}

export function textTagSet(access: string = DEFAULT_ACCESS): ProdosTagSet {
  return {
    fileType: PRODOS_TEXT_FILE_TYPE,
    auxType: '0000',
    storageType: SEEDLING_STORAGE_TYPE,
    access
  };
}

function stagingPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);
}

async function writeStagingFile(staging: string, data: Buffer, onCreated: () => void): Promise<void> {
  const handle = await open(staging, 'wx', 0o600);
  onCreated();
  try {
    await handle.writeFile(data);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function cleanUp(description: string, staging: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (cleanupError) {
    logger.warn(description, { staging, error: errorMessage(cleanupError) }, CONTEXT);
  }
}

export async function convertFileInPlace(path: string, options: ConvertOptions = {}): Promise<ConvertResult> {
  const mode = options.mode ?? 'strict';
  const tags = textTagSet(options.access);
  const tagger = options.tagger ?? createTagger(getMetadataBackend());

  const original = await readFile(path);
  const permissions = (await stat(path)).mode & 0o7777;

  let converted: Buffer;
  try {
    converted = toProdosText(original, mode);
  } catch (error) {
    if (error instanceof EncodingError) {
      throw new EncodingError(error.offset, error.byte, path);
    }
    throw error;
  }

  const staging = stagingPathFor(path);
  // Tags already on `path` wait here until the new content is in place.
  const parked = `${staging}.orig`;
  let created = false;
  let tagsParked = false;
  let tagsInstalled = false;

  try {
    await writeStagingFile(staging, converted, () => {
      created = true;
    });
    // Tag before restoring permissions: a read-only mode would refuse the xattr write.
    await applyTagSet(tagger, staging, tags);
    await chmod(staging, permissions);
    await tagger.transfer(path, parked);
    tagsParked = true;
    await tagger.transfer(staging, path);
    tagsInstalled = true;
    await rename(staging, path);
  } catch (error) {
    if (tagsInstalled) {
      await cleanUp('Failed to withdraw new tags', staging, () => tagger.transfer(path, staging));
    }
    if (tagsParked) {
      await cleanUp('Failed to restore original tags', staging, () => tagger.transfer(parked, path));
    }
    if (created) {
      await cleanUp('Failed to remove staging artifacts', staging, async () => {
        await tagger.discard(staging);
        await rm(staging, { force: true });
      });
    }
    throw error;
  }

  await cleanUp('Failed to remove replaced tags', staging, () => tagger.discard(parked));

  logger.debug(
    `Converted ${path}`,
    { mode, bytesIn: original.length, bytesOut: converted.length },
    CONTEXT
  );

  return { path, bytesIn: original.length, bytesOut: converted.length, tags };
}
