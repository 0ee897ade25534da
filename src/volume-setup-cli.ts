#!/usr/bin/env node
/**
 * Volume setup and emulator launch
 *
 * Examples:
 *   volume-setup --work-dir work --disk-image EDASM.2mg --rom apple2e.rom
 *   volume-setup --work-dir work --rom apple2e.rom --skip-extract
 *   volume-setup --work-dir work --disk-image EDASM.2mg --rom apple2e.rom \
 *     --text main.asm --text lib.asm:LIB/LIB.S --no-run
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { getMetadataBackend, loadSettings } from './config.js';
import { errorMessage, logger } from './logger.js';
import { createTagger, isMetadataBackend } from './metadata-tagger.js';
import { assertSafePath } from './path-safety.js';
import { MetadataBackend, TextMapping } from './types.js';
import { VolumeSetupOptions, parseTextMapping, runVolumeSetup } from './volume-setup.js';

config({ override: false });

export interface SetupCliOptions {
  workDir: string;
  rom: string;
  diskImage?: string;
  skipExtract: boolean;
  cadius?: string;
  extractCommand?: string;
  volumeRoot?: string;
  volumeName?: string;
  systemFile?: string;
  texts: TextMapping[];
  lossyText: boolean;
  rearrangeConfig?: string;
  run: boolean;
  runner?: string;
  maxInstructions?: number;
  debug: boolean;
  backend?: MetadataBackend;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: string[]): SetupCliOptions {
  let workDir: string | undefined;
  let rom: string | undefined;
  const options: Omit<SetupCliOptions, 'workDir' | 'rom'> = {
    skipExtract: false,
    texts: [],
    lossyText: false,
    run: true,
    debug: false
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--work-dir':
        workDir = requireValue(argv, ++i, arg);
        continue;
      case '--rom':
        rom = requireValue(argv, ++i, arg);
        continue;
      case '--disk-image':
        options.diskImage = requireValue(argv, ++i, arg);
        continue;
      case '--skip-extract':
        options.skipExtract = true;
        continue;
      case '--cadius':
        options.cadius = requireValue(argv, ++i, arg);
        continue;
      case '--extract-cmd':
        options.extractCommand = requireValue(argv, ++i, arg);
        continue;
      case '--volume-root':
        options.volumeRoot = requireValue(argv, ++i, arg);
        continue;
      case '--volume-name':
        options.volumeName = requireValue(argv, ++i, arg);
        continue;
      case '--system-file':
        options.systemFile = requireValue(argv, ++i, arg);
        continue;
      case '--text':
        options.texts.push(parseTextMapping(requireValue(argv, ++i, arg)));
        continue;
      case '--lossy-text':
        options.lossyText = true;
        continue;
      case '--rearrange-config':
        options.rearrangeConfig = requireValue(argv, ++i, arg);
        continue;
      case '--no-run':
        options.run = false;
        continue;
      case '--runner':
        options.runner = requireValue(argv, ++i, arg);
        continue;
      case '--max-instructions': {
        const value = requireValue(argv, ++i, arg);
        if (!/^\d+$/.test(value)) {
          throw new Error(`Invalid --max-instructions value: ${value}`);
        }
        options.maxInstructions = Number(value);
        continue;
      }
      case '--debug':
        options.debug = true;
        continue;
      case '--metadata': {
        const value = requireValue(argv, ++i, arg);
        if (!isMetadataBackend(value)) {
          throw new Error(`Invalid --metadata value: ${value}`);
        }
        options.backend = value;
        continue;
      }
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  if (!workDir) {
    throw new Error('Missing required argument: --work-dir');
  }
  if (!rom) {
    throw new Error('Missing required argument: --rom');
  }

  return { workDir, rom, ...options };
}

/**
 * Fill in configured defaults for anything the command line left out.
 */
export function toSetupOptions(cli: SetupCliOptions): VolumeSetupOptions {
  const settings = loadSettings();
  const extractCommand = cli.extractCommand ?? settings.tools.extractCommand;

  return {
    workDir: cli.workDir,
    rom: cli.rom,
    diskImage: cli.diskImage,
    skipExtract: cli.skipExtract,
    cadius: cli.cadius ?? settings.tools.cadius,
    ...(extractCommand !== undefined ? { extractCommand } : {}),
    volumeRoot: cli.volumeRoot,
    volumeName: cli.volumeName ?? settings.volume.name,
    systemFile: cli.systemFile,
    texts: cli.texts,
    lossyText: cli.lossyText || settings.text.lossy,
    access: settings.metadata.defaultAccess,
    rearrangeConfig: cli.rearrangeConfig,
    run: cli.run,
    runner: cli.runner ?? settings.tools.runner,
    maxInstructions: cli.maxInstructions,
    debug: cli.debug
  };
}

async function main() {
  const cli = parseArgs(process.argv.slice(2));
  const options = toSetupOptions(cli);

  assertSafePath(options.workDir, 'work directory');
  if (options.volumeName.includes('/')) {
    throw new Error(`Invalid volume name: ${options.volumeName}`);
  }

  const tagger = createTagger(cli.backend ?? getMetadataBackend());
  const result = await runVolumeSetup(options, { tagger });

  if (!result.ran) {
    logger.success(`Volume ready at ${result.volumeDir}`);
  }
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedScriptPath = process.argv[1] ? resolve(process.argv[1]) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  main().catch(error => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
}
