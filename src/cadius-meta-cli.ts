#!/usr/bin/env node
/**
 * Move ProDOS file/aux types between Cadius `NAME#TTAAAA` filenames and tags
 *
 * Usage:
 *   cadius-meta cadius-to-tags PATH... [--recursive] [--keep-name] [--dry-run] [--follow-symlinks]
 *   cadius-meta tags-to-cadius PATH... [--recursive] [--overwrite] [--require-tags]
 *                                      [--include-dirs] [--uppercase|--lowercase] [--dry-run] [--follow-symlinks]
 *   Both accept --metadata xattr|sidecar.
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { CadiusReport, cadiusToTags, tagsToCadius } from './cadius-metadata.js';
import { getMetadataBackend, loadSettings } from './config.js';
import { errorMessage } from './logger.js';
import { createTagger, isMetadataBackend } from './metadata-tagger.js';
import { MetadataBackend } from './types.js';

config({ override: false });

type Command = 'cadius-to-tags' | 'tags-to-cadius';

export interface CadiusCliOptions {
  command: Command;
  paths: string[];
  recursive: boolean;
  dryRun: boolean;
  followSymlinks: boolean;
  keepName: boolean;
  overwrite: boolean;
  requireTags: boolean;
  includeDirs: boolean;
  uppercase: boolean;
  backend?: MetadataBackend;
}

const SHARED_FLAGS = new Set(['--recursive', '--dry-run', '--follow-symlinks']);
const COMMAND_FLAGS: Record<Command, Set<string>> = {
  'cadius-to-tags': new Set(['--keep-name']),
  'tags-to-cadius': new Set(['--overwrite', '--require-tags', '--include-dirs', '--uppercase', '--lowercase'])
};

export function parseArgs(argv: string[]): CadiusCliOptions {
  const [command, ...rest] = argv;
  if (command !== 'cadius-to-tags' && command !== 'tags-to-cadius') {
    throw new Error(`Unknown command: ${command ?? '(none)'} (expected cadius-to-tags or tags-to-cadius)`);
  }

  const options: CadiusCliOptions = {
    command,
    paths: [],
    recursive: false,
    dryRun: false,
    followSymlinks: false,
    keepName: false,
    overwrite: false,
    requireTags: false,
    includeDirs: false,
    uppercase: true
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '--metadata') {
      const value = rest[++i];
      if (!isMetadataBackend(value)) {
        throw new Error(`Invalid --metadata value: ${value ?? '(missing)'}`);
      }
      options.backend = value;
      continue;
    }

    if (!arg.startsWith('--')) {
      options.paths.push(arg);
      continue;
    }

    if (!SHARED_FLAGS.has(arg) && !COMMAND_FLAGS[command].has(arg)) {
      throw new Error(`Unknown argument for ${command}: ${arg}`);
    }

    switch (arg) {
      case '--recursive':
        options.recursive = true;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--follow-symlinks':
        options.followSymlinks = true;
        break;
      case '--keep-name':
        options.keepName = true;
        break;
      case '--overwrite':
        options.overwrite = true;
        break;
      case '--require-tags':
        options.requireTags = true;
        break;
      case '--include-dirs':
        options.includeDirs = true;
        break;
      case '--uppercase':
        options.uppercase = true;
        break;
      case '--lowercase':
        options.uppercase = false;
        break;
    }
  }

  if (options.paths.length === 0) {
    throw new Error(`${command} needs at least one path`);
  }

  return options;
}

function printReport(report: CadiusReport): void {
  const prefix = report.dryRun ? '[dry run] ' : '';
  for (const record of report.records) {
    switch (record.action) {
      case 'tag':
        console.log(`${prefix}TAG    ${record.path} ${record.detail}`);
        break;
      case 'rename':
        console.log(`${prefix}RENAME ${record.path} -> ${record.detail}`);
        break;
      case 'fail':
        console.error(`error: ${record.path}: ${record.detail}`);
        break;
      case 'skip':
        break;
    }
  }
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  loadSettings();
  const tagger = createTagger(options.backend ?? getMetadataBackend());

  const report =
    options.command === 'cadius-to-tags'
      ? await cadiusToTags(options.paths, {
          tagger,
          recursive: options.recursive,
          keepName: options.keepName,
          dryRun: options.dryRun,
          followSymlinks: options.followSymlinks
        })
      : await tagsToCadius(options.paths, {
          tagger,
          recursive: options.recursive,
          overwrite: options.overwrite,
          requireTags: options.requireTags,
          includeDirs: options.includeDirs,
          uppercase: options.uppercase,
          dryRun: options.dryRun,
          followSymlinks: options.followSymlinks
        });

  printReport(report);

  if (report.failures > 0) {
    console.error(`⚠️  ${report.failures} path(s) failed`);
    process.exitCode = 1;
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
