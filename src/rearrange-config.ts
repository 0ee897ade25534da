/**
 * Loading and validation of `{ "rearrange": [{ from, to }, ...] }` documents
 */

import { readFile } from 'fs/promises';
import YAML from 'js-yaml';
import { RearrangeConfigError } from './errors.js';
import { errorMessage, logger } from './logger.js';
import { RearrangeMapping } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the document shape and return its mappings in order.
 */
export function validateRearrangeConfig(config: unknown): RearrangeMapping[] {
  if (!isRecord(config)) {
    throw new RearrangeConfigError('Configuration must be an object');
  }
  if (!('rearrange' in config)) {
    throw new RearrangeConfigError("Configuration must contain 'rearrange' key");
  }

  const entries = config.rearrange;
  if (!Array.isArray(entries)) {
    throw new RearrangeConfigError("'rearrange' must be a list");
  }

  return entries.map((entry: unknown, index): RearrangeMapping => {
    if (!isRecord(entry)) {
      throw new RearrangeConfigError(`Mapping at index ${index} must be an object`, { index });
    }

    for (const key of ['from', 'to'] as const) {
      if (!(key in entry)) {
        throw new RearrangeConfigError(`Mapping at index ${index} missing '${key}' key`, { index });
      }
    }

    const { from, to } = entry;
    if (typeof from !== 'string') {
      throw new RearrangeConfigError(`Mapping at index ${index}: 'from' must be a string`, { index });
    }
    if (typeof to !== 'string') {
      throw new RearrangeConfigError(`Mapping at index ${index}: 'to' must be a string`, { index });
    }
    if (!from) {
      throw new RearrangeConfigError(`Mapping at index ${index}: 'from' must not be empty`, { index });
    }
    if (!to) {
      throw new RearrangeConfigError(`Mapping at index ${index}: 'to' must not be empty`, { index });
    }

    return { from, to };
  });
}

/**
 * Read a rearrange document from `.json`, `.yaml` or `.yml`.
 */
export async function loadRearrangeConfig(path: string): Promise<RearrangeMapping[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new RearrangeConfigError(`Cannot read rearrange config ${path}: ${errorMessage(error)}`, { path });
  }

  let parsed: unknown;
  try {
    parsed = /\.ya?ml$/i.test(path) ? YAML.load(content) : JSON.parse(content);
  } catch (error) {
    throw new RearrangeConfigError(`Invalid rearrange config ${path}: ${errorMessage(error)}`, { path });
  }

  const mappings = validateRearrangeConfig(parsed);
  logger.debug(`Loaded ${mappings.length} mapping(s)`, { path }, 'RearrangeConfig');
  return mappings;
}
