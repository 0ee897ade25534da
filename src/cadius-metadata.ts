/**
 * Cadius filename metadata.
 *
 * Cadius extracts ProDOS files with their type in the host name, as
 * `NAME#TTAAAA` (file type byte, aux type word, in hex). These helpers move
 * that pair between the filename and the file's ProDOS tags.
 */

import { Stats } from 'fs';
import { lstat, realpath, rename } from 'fs/promises';
import { basename, dirname, join, sep } from 'path';
import fg from 'fast-glob';
import { errnoCode, errorMessage, logger } from './logger.js';
import { MetadataTagger, formatHexByte, formatHexWord, isSidecarName } from './metadata-tagger.js';

const CADIUS_SUFFIX = /^(.*)#([0-9A-Fa-f]{2})([0-9A-Fa-f]{4})$/s;

export interface ParsedCadiusName {
  stem: string;
  fileType: number;
  auxType: number;
}

export function parseCadiusSuffix(name: string): ParsedCadiusName | null {
  const match = CADIUS_SUFFIX.exec(name);
  if (!match) return null;
  return {
    stem: match[1],
    fileType: parseInt(match[2], 16),
    auxType: parseInt(match[3], 16)
  };
}

export function formatCadiusSuffix(fileType: number, auxType: number, uppercase = true): string {
  const suffix = `#${formatHexByte(fileType)}${formatHexWord(auxType)}`;
  return uppercase ? suffix.toUpperCase() : suffix;
}

export type CadiusAction = 'tag' | 'rename' | 'skip' | 'fail';

export interface CadiusActionRecord {
  action: CadiusAction;
  path: string;
  detail: string;
}

export interface CadiusReport {
  dryRun: boolean;
  records: CadiusActionRecord[];
  failures: number;
}

interface WalkOptions {
  recursive?: boolean;
  followSymlinks?: boolean;
}

export interface CadiusToTagsOptions extends WalkOptions {
  tagger: MetadataTagger;
  /** Leave the `#TTAAAA` suffix in place after tagging */
  keepName?: boolean;
  dryRun?: boolean;
}

export interface TagsToCadiusOptions extends WalkOptions {
  tagger: MetadataTagger;
  /** Replace an existing suffix instead of skipping the file */
  overwrite?: boolean;
  /** Count files without both type tags as failures */
  requireTags?: boolean;
  includeDirs?: boolean;
  uppercase?: boolean;
  dryRun?: boolean;
}

class Report {
  readonly records: CadiusActionRecord[] = [];
  failures = 0;

  constructor(private readonly dryRun: boolean) {}

  add(action: CadiusAction, path: string, detail: string): void {
    this.records.push({ action, path, detail });
    if (action === 'fail') {
      this.failures++;
      logger.debug(`${path}: ${detail}`, undefined, 'CadiusMetadata');
    }
  }

  toJSON(): CadiusReport {
    return { dryRun: this.dryRun, records: this.records, failures: this.failures };
  }
}

async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await lstat(path);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return null;
    throw error;
  }
}

function depth(path: string): number {
  return path.split(sep).length;
}

/**
 * Inputs plus, with `recursive`, everything beneath directory inputs.
 * Deeper paths come first so renaming a directory never strands its children.
 */
async function collectPaths(inputs: readonly string[], recursive: boolean): Promise<string[]> {
  const collected: string[] = [];

  for (const input of inputs) {
    const stats = await lstatOrNull(input);
    if (recursive && stats?.isDirectory()) {
      const nested = await fg('**/*', {
        cwd: input,
        dot: true,
        onlyFiles: false,
        followSymbolicLinks: false,
        absolute: false
      });
      const children = nested
        .filter(relative => !isSidecarName(basename(relative)))
        .map(relative => join(input, ...relative.split('/')))
        .sort((a, b) => depth(b) - depth(a));
      collected.push(...children);
    }
    collected.push(input);
  }

  return collected;
}

/**
 * Resolve the path to act on, or null when the entry should be passed over.
 */
async function resolveEntry(path: string, followSymlinks: boolean, report: Report): Promise<string | null> {
  const stats = await lstatOrNull(path);
  if (!stats) {
    report.add('fail', path, 'missing');
    return null;
  }
  if (stats.isSymbolicLink()) {
    if (!followSymlinks) {
      report.add('skip', path, 'symlink');
      return null;
    }
    return realpath(path);
  }
  return path;
}

async function safeRename(
  from: string,
  to: string,
  tagger: MetadataTagger,
  dryRun: boolean,
  report: Report
): Promise<void> {
  if (from === to) return;
  if (await lstatOrNull(to)) {
    throw new Error(`target exists: ${to}`);
  }
  if (!dryRun) {
    await rename(from, to);
    await tagger.transfer(from, to);
  }
  report.add('rename', from, to);
}

/**
 * Tag every `NAME#TTAAAA` path with its file and aux type, then strip the
 * suffix unless `keepName` is set. Paths without a suffix are left alone.
 */
export async function cadiusToTags(paths: readonly string[], options: CadiusToTagsOptions): Promise<CadiusReport> {
  const dryRun = options.dryRun ?? false;
  const report = new Report(dryRun);

  for (const candidate of await collectPaths(paths, options.recursive ?? false)) {
    const path = await resolveEntry(candidate, options.followSymlinks ?? false, report);
    if (!path) continue;

    const parsed = parseCadiusSuffix(basename(path));
    if (!parsed) continue;

    try {
      const fileType = formatHexByte(parsed.fileType);
      const auxType = formatHexWord(parsed.auxType);

      if (!dryRun) {
        await options.tagger.setTag(path, 'file_type', fileType);
        await options.tagger.setTag(path, 'aux_type', auxType);
      }
      report.add('tag', path, `file_type=${fileType} aux_type=${auxType}`);

      if (!options.keepName) {
        await safeRename(path, join(dirname(path), parsed.stem), options.tagger, dryRun, report);
      }
    } catch (error) {
      report.add('fail', path, errorMessage(error));
    }
  }

  return report.toJSON();
}

/**
 * Append `#TTAAAA` from the file and aux type tags of every tagged path.
 */
export async function tagsToCadius(paths: readonly string[], options: TagsToCadiusOptions): Promise<CadiusReport> {
  const dryRun = options.dryRun ?? false;
  const report = new Report(dryRun);

  for (const candidate of await collectPaths(paths, options.recursive ?? false)) {
    const stats = await lstatOrNull(candidate);
    if (stats?.isDirectory() && !options.includeDirs) continue;

    const path = await resolveEntry(candidate, options.followSymlinks ?? false, report);
    if (!path) continue;

    try {
      const fileType = await options.tagger.getTag(path, 'file_type');
      const auxType = await options.tagger.getTag(path, 'aux_type');
      if (fileType === undefined || auxType === undefined) {
        if (options.requireTags) {
          report.add('fail', path, 'missing type tags');
        }
        continue;
      }

      if (!/^[0-9a-fA-F]{2}$/.test(fileType) || !/^[0-9a-fA-F]{4}$/.test(auxType)) {
        report.add('fail', path, `invalid tag format: file_type='${fileType}' aux_type='${auxType}'`);
        continue;
      }

      let stem = basename(path);
      const existing = parseCadiusSuffix(stem);
      if (existing) {
        if (!options.overwrite) {
          report.add('skip', path, 'already has a type suffix');
          continue;
        }
        stem = existing.stem;
      }

      const suffix = formatCadiusSuffix(parseInt(fileType, 16), parseInt(auxType, 16), options.uppercase ?? true);
      await safeRename(path, join(dirname(path), stem + suffix), options.tagger, dryRun, report);
    } catch (error) {
      report.add('fail', path, errorMessage(error));
    }
  }

  return report.toJSON();
}
