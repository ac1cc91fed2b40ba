/**
 * Clocks and nonce sources.
 *
 * Both are injected into the builder so tests can pin time, and so one
 * process can share a single nonce sequence across many builders.
 */

/**
 * Returns the current time in whole unix seconds.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface NonceSource {
  /** Next nonce for an intent built at `now` (unix seconds). */
  next(now: bigint): bigint;
}

/**
 * Wall-clock nonces that never repeat.
 *
 * Two intents built in the same second would share a timestamp, so the
 * second one is bumped to `last + 1`. The sequence is strictly increasing
 * for the lifetime of the instance.
 */
export class MonotonicNonceSource implements NonceSource {
  private last = -1n;

  next(now: bigint): bigint {
    const nonce = now > this.last ? now : this.last + 1n;
    this.last = nonce;
    return nonce;
  }
}

/**
 * Process-wide sequence used when a builder is given no nonce source.
 */
export const defaultNonceSource: NonceSource = new MonotonicNonceSource();
