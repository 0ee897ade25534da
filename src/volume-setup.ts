/**
 * Preparing a host directory as a ProDOS volume and launching the emulator on it.
 *
 * Order of work: extract the disk image, turn Cadius name suffixes into tags,
 * rearrange the extracted files, import host text files, find the system
 * file, run. Each step stops the run on failure.
 */

import { copyFile, mkdir, stat } from 'fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve } from 'path';
import { rearrangeFiles } from './batch-rearranger.js';
import { cadiusToTags } from './cadius-metadata.js';
import { SystemFileError } from './errors.js';
import {
  CommandRunner,
  extractDiskImage,
  resolveCadius,
  runEmulator,
  spawnCommand,
  validateDiskImageExtension
} from './external-tools.js';
import { AppError, errnoCode, errorMessage, logger } from './logger.js';
import { expandRearrangeMappings } from './mapping-expander.js';
import { MetadataTagger } from './metadata-tagger.js';
import { loadRearrangeConfig } from './rearrange-config.js';
import { discoverSystemFile, validateSystemFile } from './system-discovery.js';
import { convertFileInPlace } from './text-converter.js';
import { TextMapping } from './types.js';

const CONTEXT = 'VolumeSetup';

/**
 * Parse `SRC[:DEST]`. Without a destination the file keeps its basename.
 */
export function parseTextMapping(value: string): TextMapping {
  if (!value || value === ':') {
    throw new AppError('Invalid text mapping: empty source', 'INVALID_TEXT_MAPPING');
  }
  if (value.startsWith(':')) {
    throw new AppError('Invalid text mapping: missing source', 'INVALID_TEXT_MAPPING');
  }

  const colon = value.indexOf(':');
  if (colon === -1) {
    return { source: value, destination: basename(value) };
  }

  const source = value.slice(0, colon);
  const destination = value.slice(colon + 1);
  if (!destination) {
    throw new AppError('Invalid text mapping: empty destination', 'INVALID_TEXT_MAPPING');
  }
  return { source, destination };
}

function resolveInsideVolume(volumeDir: string, destination: string): string {
  const target = resolve(volumeDir, destination);
  const offset = relative(resolve(volumeDir), target);
  if (!offset || offset.startsWith('..') || isAbsolute(offset)) {
    throw new AppError(`Text destination escapes the volume: ${destination}`, 'INVALID_TEXT_MAPPING', 1, {
      destination
    });
  }
  return target;
}

export interface ImportOptions {
  tagger: MetadataTagger;
  lossy?: boolean;
  access?: string;
}

/**
 * Copy each source into the volume and convert the copy in place.
 * Returns the destination paths in order.
 */
export async function importTextFiles(
  mappings: readonly TextMapping[],
  volumeDir: string,
  options: ImportOptions
): Promise<string[]> {
  const imported: string[] = [];

  for (const mapping of mappings) {
    const destination = resolveInsideVolume(volumeDir, mapping.destination);
    await mkdir(dirname(destination), { recursive: true });

    try {
      await copyFile(mapping.source, destination);
    } catch (error) {
      throw new AppError(
        `Failed to copy ${mapping.source} to ${destination}: ${errorMessage(error)}`,
        'TEXT_IMPORT_FAILED',
        1,
        { source: mapping.source, destination }
      );
    }

    try {
      await convertFileInPlace(destination, {
        mode: options.lossy ? 'lossy' : 'strict',
        access: options.access,
        tagger: options.tagger
      });
    } catch (error) {
      // Encoding and metadata failures already name the file
      if (error instanceof AppError) throw error;
      throw new AppError(`Failed to convert ${destination}: ${errorMessage(error)}`, 'TEXT_IMPORT_FAILED', 1, {
        destination
      });
    }

    logger.debug(`Imported ${mapping.source}`, { destination }, CONTEXT);
    imported.push(destination);
  }

  return imported;
}

export interface VolumeSetupOptions {
  workDir: string;
  rom: string;
  diskImage?: string;
  skipExtract?: boolean;
  cadius: string;
  extractCommand?: string;
  /** Defaults to `<workDir>/volumes` */
  volumeRoot?: string;
  volumeName: string;
  /** Relative to the volume directory */
  systemFile?: string;
  texts?: readonly TextMapping[];
  lossyText?: boolean;
  access?: string;
  rearrangeConfig?: string;
  run?: boolean;
  runner: string;
  maxInstructions?: number;
  debug?: boolean;
}

export interface VolumeSetupDeps {
  tagger: MetadataTagger;
  runCommand?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  /** Progress lines for the user */
  print?: (line: string) => void;
}

export interface VolumeSetupResult {
  volumeRoot: string;
  volumeDir: string;
  systemFile: string;
  rearranged: number;
  imported: string[];
  ran: boolean;
}

async function resolveExplicitSystemFile(volumeDir: string, systemFile: string): Promise<string> {
  const path = join(volumeDir, systemFile);
  try {
    await stat(path);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new SystemFileError(`System file not found: ${path}`, [path]);
    }
    throw error;
  }

  let valid: boolean;
  try {
    valid = await validateSystemFile(path);
  } catch {
    valid = false;
  }
  if (!valid) {
    throw new SystemFileError(`Invalid system file (empty or unreadable): ${path}`, [path]);
  }
  return path;
}

export async function runVolumeSetup(options: VolumeSetupOptions, deps: VolumeSetupDeps): Promise<VolumeSetupResult> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const runCommand = deps.runCommand ?? spawnCommand;
  const { tagger } = deps;

  let cadius = options.cadius;
  if (!options.skipExtract) {
    if (!options.diskImage) {
      throw new AppError('--disk-image required unless --skip-extract specified', 'MISSING_ARGUMENT');
    }
    validateDiskImageExtension(options.diskImage);
    cadius = await resolveCadius(options.cadius, deps.env);
  }

  const volumeRoot = options.volumeRoot ?? join(options.workDir, 'volumes');
  const volumeDir = join(volumeRoot, options.volumeName);

  await mkdir(options.workDir, { recursive: true });
  await mkdir(volumeRoot, { recursive: true });

  let rearranged = 0;
  if (!options.skipExtract && options.diskImage) {
    print(`📀 Extracting ${options.diskImage} to ${volumeDir}...`);
    await extractDiskImage(
      { cadius, image: options.diskImage, outputDir: volumeDir, template: options.extractCommand },
      runCommand
    );

    print('🏷️  Converting Cadius names to ProDOS tags...');
    const report = await cadiusToTags([volumeDir], { tagger, recursive: true });
    if (report.failures > 0) {
      const failed = report.records.filter(record => record.action === 'fail');
      throw new AppError(
        `Metadata conversion failed:\n${failed.map(record => `${record.path}: ${record.detail}`).join('\n')}`,
        'METADATA_CONVERSION_FAILED'
      );
    }

    if (options.rearrangeConfig) {
      print('📂 Rearranging files...');
      const mappings = await loadRearrangeConfig(options.rearrangeConfig);
      const moves = await expandRearrangeMappings(volumeDir, mappings);
      const result = await rearrangeFiles(volumeDir, moves, { tagger });
      rearranged = result.applied.length;
    }
  }

  let imported: string[] = [];
  if (options.texts && options.texts.length > 0) {
    print('📝 Importing text files...');
    imported = await importTextFiles(options.texts, volumeDir, {
      tagger,
      lossy: options.lossyText,
      access: options.access
    });
    options.texts.forEach((mapping, index) => print(`   ${mapping.source} -> ${imported[index]}`));
  }

  let systemFile: string;
  if (options.systemFile) {
    systemFile = await resolveExplicitSystemFile(volumeDir, options.systemFile);
  } else {
    print('🔍 Discovering system file...');
    systemFile = await discoverSystemFile(volumeDir, tagger);
  }
  print(`System file: ${systemFile}`);

  const shouldRun = options.run ?? true;
  if (shouldRun) {
    print(`🚀 Running ${options.runner}`);
    runEmulator(
      {
        runner: options.runner,
        rom: options.rom,
        systemFile,
        volumeRoot,
        debug: options.debug,
        maxInstructions: options.maxInstructions
      },
      runCommand
    );
  } else {
    print('Setup complete (--no-run specified)');
  }

  logger.debug('Volume ready', { volumeDir, rearranged, imported: imported.length }, CONTEXT);

  return { volumeRoot, volumeDir, systemFile, rearranged, imported, ran: shouldRun };
}
