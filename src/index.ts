/**
 * Public API for preparing ProDOS 8 volumes on a host filesystem
 */

export * from './types.js';
export * from './errors.js';
export { AppError, Logger, logger, handleError } from './logger.js';
export type { LogLevel, LogEntry } from './logger.js';
export { ConfigManager, DEFAULT_CONFIG, getConfig, getMetadataBackend } from './config.js';
export type { AppConfig } from './config.js';

export { normalizeLineEndings, convertToAscii, toProdosText, findNonAscii } from './byte-transform.js';
export { DEFAULT_ACCESS, formatAccessByte, parseAccessByte, isValidAccess } from './access-byte.js';
export {
  XattrTagger,
  SidecarTagger,
  createTagger,
  applyTagSet,
  readTagSet,
  sidecarPathFor
} from './metadata-tagger.js';
export type { MetadataTagger } from './metadata-tagger.js';
export { convertFileInPlace, textTagSet } from './text-converter.js';
export type { ConvertOptions, ConvertResult } from './text-converter.js';

export { matchPattern } from './glob-matcher.js';
export { expandRearrangeMappings } from './mapping-expander.js';
export { rearrangeFiles } from './batch-rearranger.js';
export type { RearrangeOptions } from './batch-rearranger.js';
export { loadRearrangeConfig, validateRearrangeConfig } from './rearrange-config.js';

export { parseCadiusSuffix, formatCadiusSuffix, cadiusToTags, tagsToCadius } from './cadius-metadata.js';
export type { CadiusReport, CadiusActionRecord } from './cadius-metadata.js';
export { assertSafePath } from './path-safety.js';
export { discoverSystemFile, validateSystemFile } from './system-discovery.js';
export {
  validateDiskImageExtension,
  resolveCadius,
  extractDiskImage,
  runEmulator,
  spawnCommand
} from './external-tools.js';
export type { CommandRunner, CommandResult } from './external-tools.js';
export { parseTextMapping, importTextFiles, runVolumeSetup } from './volume-setup.js';
export type { VolumeSetupOptions, VolumeSetupResult } from './volume-setup.js';
