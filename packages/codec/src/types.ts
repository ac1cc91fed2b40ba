/**
 * Values the canonical encoder accepts.
 *
 * Numbers that are safe integers encode as CBOR integers; every other
 * number encodes as the narrowest IEEE-754 float that round-trips.
 * Plain objects are string-keyed maps; `Map` allows any key type.
 */
export type CanonicalValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | readonly CanonicalValue[]
  | CanonicalMap
  | ReadonlyMap<CanonicalValue, CanonicalValue>;

export interface CanonicalMap {
  readonly [key: string]: CanonicalValue;
}

/**
 * Encoded bytes plus both content hashes over those bytes.
 */
export interface CanonicalDigest {
  readonly bytes: Uint8Array;

  /** 0x-prefixed SHA-256 of `bytes` */
  readonly sha256: `0x${string}`;

  /** 0x-prefixed Keccak-256 of `bytes` */
  readonly keccak256: `0x${string}`;
}
