import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runCli } from './helpers/cli.js';

describe('prodos-text CLI', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prodos-text-cli-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('converts files in place and writes sidecar tags', () => {
    const file = path.join(tmpDir, 'HELLO');
    fs.writeFileSync(file, 'a\nb\r\n');

    const result = runCli('prodos-text-cli.ts', [file]);

    expect(result.status).toBe(0);
    expect(result.stdout).toContain(`✅ ${file} (5 -> 4 bytes)`);
    expect(fs.readFileSync(file, 'latin1')).toBe('a\rb\r');
    expect(JSON.parse(fs.readFileSync(path.join(tmpDir, '.HELLO.prodos8.json'), 'utf-8'))).toEqual({
      file_type: '04',
      aux_type: '0000',
      storage_type: '01',
      access: 'dn-..-wr'
    });
  });

  it('honours --lossy and --access', () => {
    const file = path.join(tmpDir, 'LOSSY');
    fs.writeFileSync(file, Buffer.from([0x48, 0xe9, 0x0a]));

    const result = runCli('prodos-text-cli.ts', [file, '--lossy', '--access', 'dnb..-wr']);

    expect(result.status).toBe(0);
    expect(fs.readFileSync(file, 'latin1')).toBe('H?\r');
    expect(JSON.parse(fs.readFileSync(path.join(tmpDir, '.LOSSY.prodos8.json'), 'utf-8')).access).toBe('dnb..-wr');
  });

  it('fails without touching a file that is not ASCII', () => {
    const file = path.join(tmpDir, 'STRICT');
    fs.writeFileSync(file, Buffer.from([0x48, 0xe9, 0x0a]));

    const result = runCli('prodos-text-cli.ts', [file]);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain(`Error: Input contains non-ASCII bytes (>= 0x80) in ${file}: 0xe9 at offset 1`);
    expect([...fs.readFileSync(file)]).toEqual([0x48, 0xe9, 0x0a]);
    expect(fs.readdirSync(tmpDir)).toEqual(['STRICT']);
  });

  it('refuses to run with an invalid configuration file', () => {
    const file = path.join(tmpDir, 'HELLO');
    fs.writeFileSync(file, 'a\n');
    const configPath = path.join(tmpDir, 'prodos-tools.yaml');
    fs.writeFileSync(configPath, 'metadata:\n  defaultAccess: rw\n');

    const result = runCli('prodos-text-cli.ts', [file], { PRODOS_TOOLS_CONFIG: configPath });

    expect(result.status).toBe(1);
    expect(result.stderr).toContain(`Error: Invalid configuration in ${configPath}:`);
    expect(result.stderr).toContain('  - Invalid metadata.defaultAccess: rw');
    expect(fs.readFileSync(file, 'latin1')).toBe('a\n');
  });

  it('rejects unknown flags', () => {
    const result = runCli('prodos-text-cli.ts', ['--shout', 'x']);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain('Error: Unknown argument: --shout');
  });
});
