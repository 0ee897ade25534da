/**
 * ProDOS metadata stored alongside host files.
 *
 * Two backends implement the same interface: native extended attributes in
 * the `user.prodos8.` namespace, and a hidden JSON sidecar for filesystems
 * that cannot hold user xattrs. The backend is picked once at startup.
 */

import { readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { getAttribute, removeAttribute, setAttribute } from 'fs-xattr';
import { isValidAccess } from './access-byte.js';
import { MetadataError } from './errors.js';
import { errnoCode, errorMessage, logger } from './logger.js';
import { MetadataBackend, ProdosTagSet, TagKey } from './types.js';

export const XATTR_PREFIX = 'user.prodos8.';

export const TAG_KEYS: readonly TagKey[] = ['file_type', 'aux_type', 'storage_type', 'access'];

const TAG_FIELDS: Record<TagKey, keyof ProdosTagSet> = {
  file_type: 'fileType',
  aux_type: 'auxType',
  storage_type: 'storageType',
  access: 'access'
};

const HEX_FORMATS: Partial<Record<TagKey, RegExp>> = {
  file_type: /^[0-9a-f]{2}$/,
  aux_type: /^[0-9a-f]{4}$/,
  storage_type: /^[0-9a-f]{2}$/
};

const MISSING_ATTRIBUTE_CODES = new Set(['ENODATA', 'ENOATTR']);

export interface MetadataTagger {
  readonly kind: MetadataBackend;
  setTag(path: string, key: TagKey, value: string): Promise<void>;
  /** Resolves to undefined when the file carries no such tag. */
  getTag(path: string, key: TagKey): Promise<string | undefined>;
  /** Carry tags from `from` to `to` after the file itself has been renamed. */
  transfer(from: string, to: string): Promise<void>;
  /** Drop any tag storage that belongs to `path`. */
  discard(path: string): Promise<void>;
}

function describeFailure(error: unknown): string {
  const code = errnoCode(error);
  if (code === 'ENOTSUP' || code === 'EOPNOTSUPP') {
    return `extended attributes not supported (${code})`;
  }
  return errorMessage(error);
}

export class XattrTagger implements MetadataTagger {
  readonly kind = 'xattr' as const;

  async setTag(path: string, key: TagKey, value: string): Promise<void> {
    try {
      await setAttribute(path, XATTR_PREFIX + key, value);
    } catch (error) {
      throw new MetadataError(path, 'set', describeFailure(error), key);
    }
  }

  async getTag(path: string, key: TagKey): Promise<string | undefined> {
    try {
      const raw = await getAttribute(path, XATTR_PREFIX + key);
      return raw.toString('utf8');
    } catch (error) {
      if (MISSING_ATTRIBUTE_CODES.has(errnoCode(error) ?? '')) {
        return undefined;
      }
      throw new MetadataError(path, 'get', describeFailure(error), key);
    }
  }

  async transfer(): Promise<void> {
    // xattrs belong to the inode and move with rename
  }

  async discard(): Promise<void> {
    // removed together with the file
  }

  async removeTag(path: string, key: TagKey): Promise<void> {
    try {
      await removeAttribute(path, XATTR_PREFIX + key);
    } catch (error) {
      if (MISSING_ATTRIBUTE_CODES.has(errnoCode(error) ?? '')) return;
      throw new MetadataError(path, 'remove', describeFailure(error), key);
    }
  }
}

type SidecarRecord = Partial<Record<TagKey, string>>;

function isSidecarRecord(value: unknown): value is SidecarRecord {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false;
  return Object.entries(value).every(
    ([key, entry]) => (TAG_KEYS as readonly string[]).includes(key) && typeof entry === 'string'
  );
}

export const SIDECAR_SUFFIX = '.prodos8.json';

export function sidecarPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}${SIDECAR_SUFFIX}`);
}

export function isSidecarName(name: string): boolean {
  return name.startsWith('.') && name.endsWith(SIDECAR_SUFFIX);
}

export class SidecarTagger implements MetadataTagger {
  readonly kind = 'sidecar' as const;

  private async readRecord(path: string): Promise<SidecarRecord> {
    const sidecar = sidecarPathFor(path);
    let content: string;
    try {
      content = await readFile(sidecar, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return {};
      throw new MetadataError(path, 'read', describeFailure(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new MetadataError(path, 'read', `corrupt sidecar ${sidecar}: ${errorMessage(error)}`);
    }
    if (!isSidecarRecord(parsed)) {
      throw new MetadataError(path, 'read', `unexpected sidecar contents in ${sidecar}`);
    }
    return parsed;
  }

  async setTag(path: string, key: TagKey, value: string): Promise<void> {
    try {
      await stat(path);
    } catch (error) {
      throw new MetadataError(path, 'set', describeFailure(error), key);
    }

    const record = await this.readRecord(path);
    record[key] = value;
    try {
      await writeFile(sidecarPathFor(path), JSON.stringify(record, null, 2) + '\n');
    } catch (error) {
      throw new MetadataError(path, 'set', describeFailure(error), key);
    }
  }

  async getTag(path: string, key: TagKey): Promise<string | undefined> {
    const record = await this.readRecord(path);
    return record[key];
  }

  async transfer(from: string, to: string): Promise<void> {
    try {
      await rename(sidecarPathFor(from), sidecarPathFor(to));
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return;
      throw new MetadataError(to, 'transfer', describeFailure(error));
    }
  }

  async discard(path: string): Promise<void> {
    await rm(sidecarPathFor(path), { force: true });
  }
}

export function createTagger(kind: MetadataBackend): MetadataTagger {
  logger.debug(`Using ${kind} metadata backend`, undefined, 'MetadataTagger');
  return kind === 'sidecar' ? new SidecarTagger() : new XattrTagger();
}

export function isMetadataBackend(value: unknown): value is MetadataBackend {
  return value === 'xattr' || value === 'sidecar';
}

export function formatHexByte(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`byte out of range: ${value}`);
  }
  return value.toString(16).padStart(2, '0');
}

export function formatHexWord(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new RangeError(`word out of range: ${value}`);
  }
  return value.toString(16).padStart(4, '0');
}

export function validateTagValue(path: string, key: TagKey, value: string): void {
  const format = HEX_FORMATS[key];
  const valid = format ? format.test(value) : isValidAccess(value);
  if (!valid) {
    throw new MetadataError(path, 'validate', `invalid value ${JSON.stringify(value)}`, key);
  }
}

/**
 * Attach a complete tag set. Values are validated before the first write.
 */
export async function applyTagSet(tagger: MetadataTagger, path: string, tags: ProdosTagSet): Promise<void> {
  for (const key of TAG_KEYS) {
    validateTagValue(path, key, tags[TAG_FIELDS[key]]);
  }
  for (const key of TAG_KEYS) {
    await tagger.setTag(path, key, tags[TAG_FIELDS[key]]);
  }
  logger.debug('Tagged file', { path, ...tags }, 'MetadataTagger');
}

export async function readTagSet(tagger: MetadataTagger, path: string): Promise<Partial<ProdosTagSet>> {
  const result: Partial<ProdosTagSet> = {};
  for (const key of TAG_KEYS) {
    const value = await tagger.getTag(path, key);
    if (value !== undefined) {
      result[TAG_FIELDS[key]] = value;
    }
  }
  return result;
}
