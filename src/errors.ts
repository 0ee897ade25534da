import { AppError } from './logger.js';

export class RearrangeConfigError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'REARRANGE_CONFIG_INVALID', 1, context);
    this.name = 'RearrangeConfigError';
  }
}

/**
 * A glob matched several sources while the destination names one file.
 */
export class AmbiguousMappingError extends AppError {
  constructor(
    public readonly pattern: string,
    public readonly matchCount: number,
    public readonly destination: string
  ) {
    super(
      `Glob pattern '${pattern}' matches ${matchCount} files but destination '${destination}' ` +
        'is not a directory (does not end with /). Cannot map multiple files to a single filename.',
      'AMBIGUOUS_MAPPING',
      1,
      { pattern, matchCount, destination }
    );
    this.name = 'AmbiguousMappingError';
  }
}

export class DestinationConflictError extends AppError {
  constructor(public readonly path: string, reason = 'Destination already exists') {
    super(`${reason}: ${path}`, 'DESTINATION_CONFLICT', 1, { path });
    this.name = 'DestinationConflictError';
  }
}

/**
 * Two moves in one batch overlap: the same source twice, a source inside
 * another moved directory, or a directory moved into itself.
 */
export class SourceConflictError extends AppError {
  constructor(public readonly path: string, reason: string) {
    super(`${reason}: ${path}`, 'SOURCE_CONFLICT', 1, { path });
    this.name = 'SourceConflictError';
  }
}

export class SourceNotFoundError extends AppError {
  constructor(public readonly path: string) {
    super(`Source file does not exist: ${path}`, 'SOURCE_NOT_FOUND', 1, { path });
    this.name = 'SourceNotFoundError';
  }
}

export class EncodingError extends AppError {
  constructor(public readonly offset: number, public readonly byte: number, path?: string) {
    const where = path ? ` in ${path}` : '';
    super(
      `Input contains non-ASCII bytes (>= 0x80)${where}: 0x${byte.toString(16).padStart(2, '0')} at offset ${offset}`,
      'NON_ASCII_INPUT',
      1,
      { offset, byte, path }
    );
    this.name = 'EncodingError';
  }
}

export class MetadataError extends AppError {
  constructor(
    public readonly path: string,
    public readonly operation: string,
    public readonly reason: string,
    public readonly key?: string
  ) {
    const keyPart = key ? ` ${key}` : '';
    super(`Metadata ${operation}${keyPart} failed for ${path}: ${reason}`, 'METADATA_IO', 1, {
      path,
      operation,
      key
    });
    this.name = 'MetadataError';
  }
}

export class UnsafePathError extends AppError {
  constructor(public readonly label: string, public readonly character: string) {
    super(
      `${label} contains shell metacharacter '${JSON.stringify(character).slice(1, -1)}' which is not allowed`,
      'UNSAFE_PATH',
      1,
      { label }
    );
    this.name = 'UnsafePathError';
  }
}

export class SystemFileError extends AppError {
  constructor(message: string, public readonly candidates: string[] = []) {
    super(message, 'SYSTEM_FILE', 1, { candidates });
    this.name = 'SystemFileError';
  }
}

export class ExternalToolError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EXTERNAL_TOOL', 1, context);
    this.name = 'ExternalToolError';
  }
}
