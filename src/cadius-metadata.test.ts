import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { cadiusToTags, formatCadiusSuffix, parseCadiusSuffix, tagsToCadius } from './cadius-metadata.js';
import { MemoryTagger } from '../tests/helpers/memory-tagger.js';

describe('parseCadiusSuffix', () => {
  it('splits the stem from file and aux type', () => {
    expect(parseCadiusSuffix('EDASM.SYSTEM#FF2000')).toEqual({ stem: 'EDASM.SYSTEM', fileType: 0xff, auxType: 0x2000 });
    expect(parseCadiusSuffix('notes#04000a')).toEqual({ stem: 'notes', fileType: 0x04, auxType: 0x000a });
  });

  it('uses the last suffix only', () => {
    expect(parseCadiusSuffix('A#040000#060800')).toEqual({ stem: 'A#040000', fileType: 0x06, auxType: 0x0800 });
  });

  it('returns null without a well-formed suffix', () => {
    expect(parseCadiusSuffix('PLAIN')).toBeNull();
    expect(parseCadiusSuffix('SHORT#0400')).toBeNull();
    expect(parseCadiusSuffix('BAD#GG0000')).toBeNull();
    expect(parseCadiusSuffix('LONG#04000000')).toBeNull();
  });
});

describe('formatCadiusSuffix', () => {
  it('formats uppercase by default', () => {
    expect(formatCadiusSuffix(0xfc, 0x0801)).toBe('#FC0801');
    expect(formatCadiusSuffix(0xfc, 0x0801, false)).toBe('#fc0801');
  });

  it('rejects out-of-range values', () => {
    expect(() => formatCadiusSuffix(0x100, 0)).toThrow('byte out of range: 256');
  });
});

describe('cadiusToTags', () => {
  let root: string;
  let tagger: MemoryTagger;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'prodos-cadius-'));
    tagger = new MemoryTagger();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('tags a file and strips the suffix', async () => {
    writeFileSync(join(root, 'EDASM.SYSTEM#FF2000'), 'x');

    const report = await cadiusToTags([join(root, 'EDASM.SYSTEM#FF2000')], { tagger });

    expect(report.failures).toBe(0);
    expect(readdirSync(root)).toEqual(['EDASM.SYSTEM']);
    expect(await tagger.getTag(join(root, 'EDASM.SYSTEM'), 'file_type')).toBe('ff');
    expect(await tagger.getTag(join(root, 'EDASM.SYSTEM'), 'aux_type')).toBe('2000');
  });

  it('keeps the name when asked', async () => {
    const path = join(root, 'README#040000');
    writeFileSync(path, 'x');

    await cadiusToTags([path], { tagger, keepName: true });

    expect(readdirSync(root)).toEqual(['README#040000']);
    expect(await tagger.getTag(path, 'file_type')).toBe('04');
  });

  it('walks directories recursively and renames children before parents', async () => {
    mkdirSync(join(root, 'SUB#0F0000'));
    writeFileSync(join(root, 'SUB#0F0000', 'PROG#062000'), 'x');
    writeFileSync(join(root, 'PLAIN'), 'x');

    const report = await cadiusToTags([root], { tagger, recursive: true });

    expect(report.failures).toBe(0);
    expect(readdirSync(root).sort()).toEqual(['PLAIN', 'SUB']);
    expect(readdirSync(join(root, 'SUB'))).toEqual(['PROG']);
    expect(await tagger.getTag(join(root, 'SUB', 'PROG'), 'file_type')).toBe('06');
    expect(await tagger.getTag(join(root, 'SUB'), 'file_type')).toBe('0f');
  });

  it('counts a rename onto an existing file as a failure', async () => {
    writeFileSync(join(root, 'DUP#040000'), 'new');
    writeFileSync(join(root, 'DUP'), 'old');

    const report = await cadiusToTags([join(root, 'DUP#040000')], { tagger });

    expect(report.failures).toBe(1);
    expect(report.records.at(-1)).toEqual({
      action: 'fail',
      path: join(root, 'DUP#040000'),
      detail: `target exists: ${join(root, 'DUP')}`
    });
    expect(readdirSync(root).sort()).toEqual(['DUP', 'DUP#040000']);
  });

  it('changes nothing in a dry run', async () => {
    const path = join(root, 'A#040000');
    writeFileSync(path, 'x');

    const report = await cadiusToTags([path], { tagger, dryRun: true });

    expect(report.records.map(record => record.action)).toEqual(['tag', 'rename']);
    expect(existsSync(path)).toBe(true);
    expect(tagger.tags.size).toBe(0);
  });

  it('counts missing inputs and skips symlinks', async () => {
    writeFileSync(join(root, 'TARGET#040000'), 'x');
    symlinkSync(join(root, 'TARGET#040000'), join(root, 'LINK#040000'));

    const report = await cadiusToTags([join(root, 'NOPE#040000'), join(root, 'LINK#040000')], { tagger });

    expect(report.failures).toBe(1);
    expect(report.records).toEqual([
      { action: 'fail', path: join(root, 'NOPE#040000'), detail: 'missing' },
      { action: 'skip', path: join(root, 'LINK#040000'), detail: 'symlink' }
    ]);
  });
});

describe('tagsToCadius', () => {
  let root: string;
  let tagger: MemoryTagger;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'prodos-cadius-'));
    tagger = new MemoryTagger();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('appends the suffix from the type tags', async () => {
    const path = join(root, 'EDASM.SYSTEM');
    writeFileSync(path, 'x');
    await tagger.setTag(path, 'file_type', 'ff');
    await tagger.setTag(path, 'aux_type', '2000');

    const report = await tagsToCadius([path], { tagger });

    expect(report.failures).toBe(0);
    expect(readdirSync(root)).toEqual(['EDASM.SYSTEM#FF2000']);
    expect(await tagger.getTag(join(root, 'EDASM.SYSTEM#FF2000'), 'file_type')).toBe('ff');
  });

  it('writes lowercase hex when asked', async () => {
    const path = join(root, 'DATA');
    writeFileSync(path, 'x');
    await tagger.setTag(path, 'file_type', '06');
    await tagger.setTag(path, 'aux_type', 'a000');

    await tagsToCadius([path], { tagger, uppercase: false });

    expect(readdirSync(root)).toEqual(['DATA#06a000']);
  });

  it('skips or replaces an existing suffix', async () => {
    const path = join(root, 'OLD#040000');
    writeFileSync(path, 'x');
    await tagger.setTag(path, 'file_type', '06');
    await tagger.setTag(path, 'aux_type', '0800');

    await tagsToCadius([path], { tagger });
    expect(readdirSync(root)).toEqual(['OLD#040000']);

    await tagsToCadius([path], { tagger, overwrite: true });
    expect(readdirSync(root)).toEqual(['OLD#060800']);
  });

  it('passes over untagged files unless tags are required', async () => {
    const path = join(root, 'BARE');
    writeFileSync(path, 'x');

    expect((await tagsToCadius([path], { tagger })).failures).toBe(0);
    expect((await tagsToCadius([path], { tagger, requireTags: true })).failures).toBe(1);
    expect(readdirSync(root)).toEqual(['BARE']);
  });

  it('reports malformed tag values', async () => {
    const path = join(root, 'ODD');
    writeFileSync(path, 'x');
    await tagger.setTag(path, 'file_type', 'xyz');
    await tagger.setTag(path, 'aux_type', '0000');

    const report = await tagsToCadius([path], { tagger });

    expect(report.records).toEqual([
      { action: 'fail', path, detail: "invalid tag format: file_type='xyz' aux_type='0000'" }
    ]);
  });

  it('leaves directories alone unless included', async () => {
    const dir = join(root, 'SUBDIR');
    mkdirSync(dir);
    await tagger.setTag(dir, 'file_type', '0f');
    await tagger.setTag(dir, 'aux_type', '0000');

    await tagsToCadius([dir], { tagger });
    expect(readdirSync(root)).toEqual(['SUBDIR']);

    await tagsToCadius([dir], { tagger, includeDirs: true });
    expect(readdirSync(root)).toEqual(['SUBDIR#0F0000']);
  });
});
