import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { chmodSync, existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CommandResult,
  CommandRunner,
  emulatorCommand,
  extractDiskImage,
  fillPlaceholders,
  resolveCadius,
  runEmulator,
  splitCommandTemplate,
  validateDiskImageExtension
} from './external-tools.js';
import { ExternalToolError, UnsafePathError } from './errors.js';

const ok = (stdout = ''): CommandResult => ({ status: 0, stdout, stderr: '' });
const failed = (stderr: string, status = 1): CommandResult => ({ status, stdout: '', stderr });

describe('validateDiskImageExtension', () => {
  it('accepts .2mg in any case', () => {
    expect(() => validateDiskImageExtension('EDASM.2mg')).not.toThrow();
    expect(() => validateDiskImageExtension('/images/EDASM.2MG')).not.toThrow();
  });

  it('rejects other formats', () => {
    expect(() => validateDiskImageExtension('EDASM.po')).toThrow(
      'Unsupported disk image extension. Currently only .2mg format is supported. Got: EDASM.po'
    );
  });
});

describe('splitCommandTemplate', () => {
  it('splits on whitespace', () => {
    expect(splitCommandTemplate('{cadius}  EXTRACTVOLUME {image}\t{out}')).toEqual([
      '{cadius}',
      'EXTRACTVOLUME',
      '{image}',
      '{out}'
    ]);
  });

  it('keeps quoted runs together', () => {
    expect(splitCommandTemplate(`tool "two words" 'single $quoted' mid"dle"x`)).toEqual([
      'tool',
      'two words',
      'single $quoted',
      'middlex'
    ]);
  });

  it('handles backslash escapes', () => {
    expect(splitCommandTemplate('a\\ b "c\\"d"')).toEqual(['a b', 'c"d']);
  });

  it('keeps empty quoted arguments', () => {
    expect(splitCommandTemplate(`run ''`)).toEqual(['run', '']);
  });

  it('rejects an unterminated quote', () => {
    expect(() => splitCommandTemplate('run "oops')).toThrow(ExternalToolError);
  });
});

describe('fillPlaceholders', () => {
  it('substitutes known names', () => {
    expect(fillPlaceholders('--out={out}', { out: '/tmp/vol' })).toBe('--out=/tmp/vol');
  });

  it('rejects unknown names', () => {
    expect(() => fillPlaceholders('{disk}', { image: 'x' })).toThrow('Unknown placeholder {disk} in command template');
  });
});

describe('resolveCadius', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'prodos-tools-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('accepts an explicit executable path', async () => {
    const tool = join(dir, 'cadius');
    writeFileSync(tool, '#!/bin/sh\n');
    chmodSync(tool, 0o755);

    expect(await resolveCadius(tool)).toBe(tool);
  });

  it('rejects an explicit path that is not executable', async () => {
    const tool = join(dir, 'cadius');
    writeFileSync(tool, 'data');
    chmodSync(tool, 0o644);

    await expect(resolveCadius(tool)).rejects.toThrow(`cadius executable not found or not executable: ${tool}`);
  });

  it('looks the command up on PATH', async () => {
    const bin = join(dir, 'bin');
    mkdirSync(bin);
    writeFileSync(join(bin, 'cadius'), '#!/bin/sh\n');
    chmodSync(join(bin, 'cadius'), 0o755);

    expect(await resolveCadius('cadius', { PATH: `${join(dir, 'missing')}:${bin}` })).toBe(join(bin, 'cadius'));
  });

  it('reports a command missing from PATH', async () => {
    await expect(resolveCadius('cadius', { PATH: dir })).rejects.toThrow('cadius command not found: cadius');
  });

  it('rejects shell metacharacters', async () => {
    await expect(resolveCadius('cadius;rm')).rejects.toThrow(UnsafePathError);
  });
});

describe('extractDiskImage', () => {
  let dir: string;
  let out: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'prodos-extract-'));
    out = join(dir, 'volumes', 'EDASM');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('runs a template with placeholders filled in', async () => {
    const run = vi.fn<CommandRunner>(() => ok());

    await extractDiskImage({ cadius: '/opt/cadius', image: 'disk.2mg', outputDir: out, template: '{cadius} X {image} {out}' }, run);

    expect(run).toHaveBeenCalledWith('/opt/cadius', ['X', 'disk.2mg', out]);
    expect(existsSync(out)).toBe(true);
  });

  it('reports a failing template command', async () => {
    const run = vi.fn<CommandRunner>(() => failed('bad image'));

    await expect(
      extractDiskImage({ cadius: 'cadius', image: 'disk.2mg', outputDir: out, template: '{cadius} X {image}' }, run)
    ).rejects.toThrow('Disk image extraction failed:\nCommand: cadius X disk.2mg\nError: bad image');
  });

  it('falls back to EXTRACT when EXTRACTVOLUME fails', async () => {
    const run = vi.fn<CommandRunner>((_command, args) => {
      if (args[0] === 'EXTRACTVOLUME') return failed('unknown command');
      writeFileSync(join(out, 'EDASM.SYSTEM#FF2000'), 'x');
      return ok();
    });

    await extractDiskImage({ cadius: 'cadius', image: 'disk.2mg', outputDir: out }, run);

    expect(run.mock.calls.map(call => call[1])).toEqual([
      ['EXTRACTVOLUME', 'disk.2mg', out],
      ['EXTRACT', 'disk.2mg', '/', out]
    ]);
  });

  it('treats a clean exit with no files as a failure', async () => {
    const run = vi.fn<CommandRunner>(() => ok());

    await expect(extractDiskImage({ cadius: 'cadius', image: 'disk.2mg', outputDir: out }, run)).rejects.toThrow(
      'Failed to extract disk image with any known cadius command pattern.\nLast error: \n'
    );
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('carries the last spawn error', async () => {
    const run = vi.fn<CommandRunner>(() => ({ status: null, stdout: '', stderr: '', error: new Error('spawn cadius ENOENT') }));

    await expect(extractDiskImage({ cadius: 'cadius', image: 'disk.2mg', outputDir: out }, run)).rejects.toThrow(
      'Last error: spawn cadius ENOENT'
    );
  });

  it('refuses unsafe paths before running anything', async () => {
    const run = vi.fn<CommandRunner>(() => ok());

    await expect(extractDiskImage({ cadius: 'cadius', image: 'a$(b).2mg', outputDir: out }, run)).rejects.toThrow(
      "--disk-image contains shell metacharacter '$' which is not allowed"
    );
    expect(run).not.toHaveBeenCalled();
  });
});

describe('runEmulator', () => {
  const options = {
    runner: 'build/prodos8emu_run',
    rom: 'apple2e.rom',
    systemFile: 'work/volumes/EDASM/EDASM.SYSTEM',
    volumeRoot: 'work/volumes'
  };

  it('builds the runner command line', () => {
    expect(emulatorCommand({ ...options, debug: true, maxInstructions: 5000 })).toEqual([
      'build/prodos8emu_run',
      '--volume-root',
      'work/volumes',
      '--debug',
      '--max-instructions',
      '5000',
      'apple2e.rom',
      'work/volumes/EDASM/EDASM.SYSTEM'
    ]);
  });

  it('runs in the foreground', () => {
    const run = vi.fn<CommandRunner>(() => ok());

    runEmulator(options, run);

    expect(run).toHaveBeenCalledWith(
      'build/prodos8emu_run',
      ['--volume-root', 'work/volumes', 'apple2e.rom', 'work/volumes/EDASM/EDASM.SYSTEM'],
      { inheritStdio: true }
    );
  });

  it('fails on a non-zero exit', () => {
    expect(() => runEmulator(options, () => failed('', 3))).toThrow('Emulator exited with code 3');
  });

  it('fails when the runner cannot start', () => {
    const run: CommandRunner = () => ({ status: null, stdout: '', stderr: '', error: new Error('ENOENT') });
    expect(() => runEmulator(options, run)).toThrow('Failed to start build/prodos8emu_run: ENOENT');
  });
});
