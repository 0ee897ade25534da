/**
 * Locating the ProDOS system program (type $FF) inside an extracted volume
 */

import { open } from 'fs/promises';
import { join } from 'path';
import fg from 'fast-glob';
import { SystemFileError } from './errors.js';
import { errorMessage, logger } from './logger.js';
import { MetadataTagger, isSidecarName } from './metadata-tagger.js';

export const SYSTEM_FILE_TYPE = 'ff';

const SYSTEM_NAME = /\.(system|sys)$/i;

/**
 * True when the file holds at least one byte. ProDOS loads a system file at
 * $2000 and jumps there, so any non-empty file qualifies.
 * Missing or unreadable files reject.
 */
export async function validateSystemFile(path: string): Promise<boolean> {
  const handle = await open(path, 'r');
  try {
    const { bytesRead } = await handle.read(Buffer.alloc(1), 0, 1, 0);
    return bytesRead > 0;
  } finally {
    await handle.close();
  }
}

async function isUsableSystemFile(path: string): Promise<boolean> {
  try {
    return await validateSystemFile(path);
  } catch (error) {
    logger.debug(`Skipping unreadable candidate ${path}`, { reason: errorMessage(error) }, 'SystemDiscovery');
    return false;
  }
}

async function listFiles(volumeDir: string): Promise<string[]> {
  const entries = await fg('**/*', {
    cwd: volumeDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false
  });
  return entries
    .sort()
    .filter(relative => !isSidecarName(relative.split('/').pop() ?? relative))
    .map(relative => join(volumeDir, ...relative.split('/')));
}

/**
 * Find the one system file under `volumeDir`: names ending in `.SYSTEM` or
 * `.SYS` first, then files tagged with file type `ff`.
 */
export async function discoverSystemFile(volumeDir: string, tagger: MetadataTagger): Promise<string> {
  const files = await listFiles(volumeDir);
  const candidates: string[] = [];

  for (const file of files) {
    if (SYSTEM_NAME.test(file) && (await isUsableSystemFile(file))) {
      candidates.push(file);
    }
  }

  if (candidates.length === 0) {
    for (const file of files) {
      let fileType: string | undefined;
      try {
        fileType = await tagger.getTag(file, 'file_type');
      } catch (error) {
        logger.debug(`No readable type tag on ${file}`, { reason: errorMessage(error) }, 'SystemDiscovery');
        continue;
      }
      if (fileType?.trim().toLowerCase() === SYSTEM_FILE_TYPE && (await isUsableSystemFile(file))) {
        candidates.push(file);
      }
    }
  }

  if (candidates.length === 0) {
    throw new SystemFileError(
      `No system file found in ${volumeDir}. Expected .SYSTEM/.SYS file or file with type $FF.`
    );
  }

  if (candidates.length > 1) {
    throw new SystemFileError(
      'Ambiguous system file discovery: multiple candidates found:\n' +
        candidates.map(candidate => `  - ${candidate}`).join('\n'),
      candidates
    );
  }

  logger.debug(`Discovered system file ${candidates[0]}`, undefined, 'SystemDiscovery');
  return candidates[0];
}
