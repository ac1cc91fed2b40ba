/**
 * Intent Types
 *
 * An Intent is one signable robotic command: which executor should run
 * which action, with which parameters, inside which time window and
 * resource envelope.
 *
 * Intents are:
 * - Immutable once built (frozen, every field a primitive, no reference
 *   to the builder)
 * - Content-committed (actionId and envelopeHash bind name and params)
 * - Bounded (validity window, max duration, max energy)
 */

/**
 * 0x-prefixed lowercase hex string.
 */
export type Hex = `0x${string}`;

/**
 * 20-byte account address, 0x-prefixed.
 */
export type Address = Hex;

/**
 * A built intent, as signed by the planner and checked by verifiers.
 */
export interface Intent {
  /** Executor that should run the action (u64, > 0) */
  readonly executorId: bigint;

  /** SHA-256 of the UTF-8 action name */
  readonly actionId: Hex;

  /** Encoded parameter payload (`name:value;...` UTF-8), as 0x hex */
  readonly params: Hex;

  /** Commitment over executor, action and params */
  readonly envelopeHash: Hex;

  /** Pre-execution state root (all zero until state roots are wired in) */
  readonly preStateRoot: Hex;

  /** Unix seconds before which the intent must not execute */
  readonly notBefore: bigint;

  /** Unix seconds after which the intent is expired */
  readonly notAfter: bigint;

  /** Execution time budget (u32, > 0) */
  readonly maxDurationMs: number;

  /** Energy budget in joules (u32, > 0) */
  readonly maxEnergyJ: number;

  /** Planner address */
  readonly planner: Address;

  readonly nonce: bigint;
}

/**
 * Text form of an Intent: integers as decimal strings, bytes as 0x hex.
 */
export interface IntentWire {
  readonly executorId: string;
  readonly actionId: Hex;
  readonly params: Hex;
  readonly envelopeHash: Hex;
  readonly preStateRoot: Hex;
  readonly notBefore: string;
  readonly notAfter: string;
  readonly maxDurationMs: number;
  readonly maxEnergyJ: number;
  readonly planner: Address;
  readonly nonce: string;
}

/**
 * EIP-712 signing domain.
 */
export interface SigningDomain {
  readonly name: string;
  readonly version: string;
  readonly chainId: bigint;
  readonly verifyingContract: Address;
}
