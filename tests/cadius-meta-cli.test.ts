import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runCli } from './helpers/cli.js';

describe('cadius-meta CLI', () => {
  let tmpDir: string;

  const sidecar = (name: string): unknown =>
    JSON.parse(fs.readFileSync(path.join(tmpDir, `.${name}.prodos8.json`), 'utf-8'));

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cadius-meta-cli-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('turns name suffixes into tags and back', () => {
    fs.writeFileSync(path.join(tmpDir, 'PROG#062000'), 'x');

    const toTags = runCli('cadius-meta-cli.ts', ['cadius-to-tags', '--recursive', tmpDir]);

    expect(toTags.status).toBe(0);
    expect(toTags.stdout).toContain(`TAG    ${path.join(tmpDir, 'PROG#062000')} file_type=06 aux_type=2000`);
    expect(toTags.stdout).toContain(`RENAME ${path.join(tmpDir, 'PROG#062000')} -> ${path.join(tmpDir, 'PROG')}`);
    expect(fs.readdirSync(tmpDir).sort()).toEqual(['.PROG.prodos8.json', 'PROG']);
    expect(sidecar('PROG')).toEqual({ file_type: '06', aux_type: '2000' });

    const toNames = runCli('cadius-meta-cli.ts', ['tags-to-cadius', '--lowercase', path.join(tmpDir, 'PROG')]);

    expect(toNames.status).toBe(0);
    expect(fs.readdirSync(tmpDir).sort()).toEqual(['.PROG#062000.prodos8.json', 'PROG#062000']);
  });

  it('changes nothing in a dry run', () => {
    fs.writeFileSync(path.join(tmpDir, 'A#040000'), 'x');

    const result = runCli('cadius-meta-cli.ts', ['cadius-to-tags', '--dry-run', path.join(tmpDir, 'A#040000')]);

    expect(result.status).toBe(0);
    expect(result.stdout).toContain(`[dry run] RENAME ${path.join(tmpDir, 'A#040000')} -> ${path.join(tmpDir, 'A')}`);
    expect(fs.readdirSync(tmpDir)).toEqual(['A#040000']);
  });

  it('exits 1 when any path fails', () => {
    const missing = path.join(tmpDir, 'GONE#040000');

    const result = runCli('cadius-meta-cli.ts', ['cadius-to-tags', missing]);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain(`error: ${missing}: missing`);
  });

  it('rejects flags that belong to the other command', () => {
    const result = runCli('cadius-meta-cli.ts', ['cadius-to-tags', '--overwrite', tmpDir]);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain('Error: Unknown argument for cadius-to-tags: --overwrite');
  });
});
