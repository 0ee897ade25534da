/**
 * External programs: cadius for disk image extraction and the emulator runner.
 *
 * Every invocation goes through a CommandRunner, which spawns the program
 * directly with an argument vector. No shell is involved.
 */

import { spawnSync } from 'child_process';
import { constants } from 'fs';
import { access, mkdir, readdir, stat } from 'fs/promises';
import { delimiter, join, sep } from 'path';
import { ExternalToolError } from './errors.js';
import { AppError, errnoCode, errorMessage, logger } from './logger.js';
import { assertSafePath } from './path-safety.js';

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the program could not be started at all */
  error?: Error;
}

export interface CommandOptions {
  /** Share the terminal with the child instead of capturing its output */
  inheritStdio?: boolean;
}

export type CommandRunner = (command: string, args: readonly string[], options?: CommandOptions) => CommandResult;

export const spawnCommand: CommandRunner = (command, args, options = {}) => {
  const result = spawnSync(command, [...args], {
    encoding: 'utf8',
    stdio: options.inheritStdio ? 'inherit' : 'pipe',
    windowsHide: true
  });
  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    ...(result.error ? { error: result.error } : {})
  };
};

export function validateDiskImageExtension(path: string): void {
  if (!path.toLowerCase().endsWith('.2mg')) {
    throw new AppError(
      `Unsupported disk image extension. Currently only .2mg format is supported. Got: ${path}`,
      'UNSUPPORTED_DISK_IMAGE'
    );
  }
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    if (!(await stat(path)).isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT' || code === 'EACCES' || code === 'ENOTDIR') return false;
    throw error;
  }
}

/**
 * Resolve `cadius` to an executable: a value containing a path separator must
 * name an executable file, anything else is looked up on `PATH`.
 */
export async function resolveCadius(cadius: string, env: NodeJS.ProcessEnv = process.env): Promise<string> {
  assertSafePath(cadius, '--cadius');

  if (cadius.includes(sep) || cadius.includes('/')) {
    if (await isExecutableFile(cadius)) return cadius;
    throw new ExternalToolError(`cadius executable not found or not executable: ${cadius}`, { cadius });
  }

  for (const dir of (env.PATH ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, cadius);
    if (await isExecutableFile(candidate)) {
      logger.debug(`Resolved ${cadius} to ${candidate}`, undefined, 'ExternalTools');
      return candidate;
    }
  }

  throw new ExternalToolError(
    `cadius command not found: ${cadius}\nPlease install cadius or pass --cadius with the executable path.`,
    { cadius }
  );
}

/**
 * Split a command template into arguments the way a POSIX shell would,
 * honouring single quotes, double quotes and backslash escapes. Nothing is
 * expanded.
 */
export function splitCommandTemplate(template: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < template.length; i++) {
    const char = template[i];

    if (quote === "'") {
      if (char === "'") quote = null;
      else current += char;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else if (char === '\\' && i + 1 < template.length && '"\\$`'.includes(template[i + 1])) {
        current += template[++i];
      } else {
        current += char;
      }
      continue;
    }

    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    inToken = true;
    if (char === "'" || char === '"') {
      quote = char;
    } else if (char === '\\' && i + 1 < template.length) {
      current += template[++i];
    } else {
      current += char;
    }
  }

  if (quote) {
    throw new ExternalToolError(`Unterminated quote in command template: ${template}`);
  }
  if (inToken) tokens.push(current);
  return tokens;
}

/**
 * Substitute `{name}` placeholders in one template token.
 */
export function fillPlaceholders(token: string, values: Readonly<Record<string, string>>): string {
  return token.replace(/\{(\w*)\}/g, (placeholder, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new ExternalToolError(`Unknown placeholder ${placeholder} in command template`);
    }
    return value;
  });
}

export interface ExtractOptions {
  cadius: string;
  image: string;
  outputDir: string;
  /** Argument template using `{cadius}`, `{image}` and `{out}` */
  template?: string;
}

async function hasEntries(dir: string): Promise<boolean> {
  try {
    return (await readdir(dir)).length > 0;
  } catch (error) {
    throw new ExternalToolError(`Unable to read output directory '${dir}': ${errorMessage(error)}`, { dir });
  }
}

/**
 * Unpack a disk image into `outputDir`. Without a template the known cadius
 * invocations are tried in turn until one exits cleanly and leaves files.
 */
export async function extractDiskImage(options: ExtractOptions, run: CommandRunner = spawnCommand): Promise<void> {
  assertSafePath(options.image, '--disk-image');
  assertSafePath(options.outputDir, 'work directory');

  await mkdir(options.outputDir, { recursive: true });

  if (options.template) {
    const values = { cadius: options.cadius, image: options.image, out: options.outputDir };
    const [command, ...args] = splitCommandTemplate(options.template).map(token => fillPlaceholders(token, values));
    if (!command) {
      throw new ExternalToolError('Extract command template is empty');
    }

    const result = run(command, args);
    if (result.error || result.status !== 0) {
      throw new ExternalToolError(
        `Disk image extraction failed:\nCommand: ${[command, ...args].join(' ')}\n` +
          `Error: ${result.error ? result.error.message : result.stderr}`,
        { command, status: result.status }
      );
    }
    return;
  }

  const patterns: string[][] = [
    ['EXTRACTVOLUME', options.image, options.outputDir],
    ['EXTRACT', options.image, '/', options.outputDir]
  ];

  let lastError = '';
  for (const args of patterns) {
    const result = run(options.cadius, args);
    if (result.error) {
      lastError = result.error.message;
      continue;
    }
    if (result.status === 0 && (await hasEntries(options.outputDir))) {
      logger.debug(`Extracted with cadius ${args[0]}`, { image: options.image }, 'ExternalTools');
      return;
    }
    lastError = result.stderr;
  }

  throw new ExternalToolError(
    'Failed to extract disk image with any known cadius command pattern.\n' +
      `Last error: ${lastError}\n` +
      'Try providing --extract-cmd with a custom template.',
    { image: options.image }
  );
}

export interface EmulatorOptions {
  runner: string;
  rom: string;
  systemFile: string;
  volumeRoot: string;
  debug?: boolean;
  maxInstructions?: number;
}

export function emulatorCommand(options: EmulatorOptions): string[] {
  const command = [options.runner, '--volume-root', options.volumeRoot];
  if (options.debug) {
    command.push('--debug');
  }
  if (options.maxInstructions !== undefined) {
    command.push('--max-instructions', String(options.maxInstructions));
  }
  command.push(options.rom, options.systemFile);
  return command;
}

/**
 * Run the emulator in the foreground and fail unless it exits with 0.
 */
export function runEmulator(options: EmulatorOptions, run: CommandRunner = spawnCommand): void {
  const [command, ...args] = emulatorCommand(options);
  const result = run(command, args, { inheritStdio: true });

  if (result.error) {
    throw new ExternalToolError(`Failed to start ${command}: ${result.error.message}`, { command });
  }
  if (result.status !== 0) {
    throw new ExternalToolError(`Emulator exited with code ${result.status}`, { status: result.status });
  }
}
