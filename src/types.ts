/**
 * Shared types for the volume preparation tools
 */

/**
 * A user-authored `{ from, to }` pair from the rearrange configuration.
 * `from` is a glob relative to the volume root; `to` names a directory
 * when it ends with `/`, otherwise an explicit file.
 */
export interface RearrangeMapping {
  readonly from: string;
  readonly to: string;
}

/** A concrete move produced by expanding a mapping against a tree. */
export interface ExpandedMove {
  source: string;
  destination: string;
}

/**
 * `strict` rejects any byte >= 0x80; `lossy` replaces it with `?`.
 */
export type AsciiMode = 'strict' | 'lossy';

/**
 * The four ProDOS attributes carried out-of-band on a host file.
 */
export interface ProdosTagSet {
  /** file_type: two lowercase hex characters, e.g. `04` for TXT */
  fileType: string;
  /** aux_type: four lowercase hex characters */
  auxType: string;
  /** storage_type: two lowercase hex characters, `01` for a seedling file */
  storageType: string;
  /** access: eight-character access string such as `dn-..-wr` */
  access: string;
}

export type TagKey = 'file_type' | 'aux_type' | 'storage_type' | 'access';

export type MetadataBackend = 'xattr' | 'sidecar';

export interface RearrangeResult {
  root: string;
  applied: ExpandedMove[];
}

export interface TextMapping {
  source: string;
  destination: string;
}
