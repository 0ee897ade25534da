#!/usr/bin/env node
/**
 * Convert host text files in place to tagged ProDOS TEXT files
 *
 * Usage: prodos-text FILE... [--lossy] [--access STR] [--metadata xattr|sidecar]
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { isValidAccess } from './access-byte.js';
import { getMetadataBackend, loadSettings } from './config.js';
import { errorMessage, logger } from './logger.js';
import { createTagger, isMetadataBackend } from './metadata-tagger.js';
import { convertFileInPlace } from './text-converter.js';
import { MetadataBackend } from './types.js';

config({ override: false });

const USAGE = 'Usage: prodos-text FILE... [--lossy] [--access STR] [--metadata xattr|sidecar]';

export interface TextCliOptions {
  files: string[];
  lossy?: boolean;
  access?: string;
  backend?: MetadataBackend;
  help: boolean;
}

export function parseArgs(argv: string[]): TextCliOptions {
  const options: TextCliOptions = { files: [], help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }

    if (arg === '--lossy') {
      options.lossy = true;
      continue;
    }

    if (arg === '--access') {
      const value = argv[++i];
      if (value === undefined || !isValidAccess(value)) {
        throw new Error(`Invalid --access value: ${value ?? '(missing)'}`);
      }
      options.access = value;
      continue;
    }

    if (arg === '--metadata') {
      const value = argv[++i];
      if (!isMetadataBackend(value)) {
        throw new Error(`Invalid --metadata value: ${value ?? '(missing)'}`);
      }
      options.backend = value;
      continue;
    }

    if (arg.startsWith('--')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    options.files.push(arg);
  }

  if (!options.help && options.files.length === 0) {
    throw new Error(`No input files\n${USAGE}`);
  }

  return options;
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const settings = loadSettings();
  const tagger = createTagger(options.backend ?? getMetadataBackend());
  const mode = (options.lossy ?? settings.text.lossy) ? 'lossy' : 'strict';
  const access = options.access ?? settings.metadata.defaultAccess;

  for (const file of options.files) {
    const result = await convertFileInPlace(resolve(file), { mode, access, tagger });
    logger.success(`${file} (${result.bytesIn} -> ${result.bytesOut} bytes)`);
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
