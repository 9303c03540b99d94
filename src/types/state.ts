/**
 * A CSRF state token bound to one login attempt.
 */
export interface StateToken {
  /** Opaque random value embedded in the authorization redirect */
  value: string;
  /** Creation time (epoch milliseconds) */
  issuedAt: number;
  /** `issuedAt` plus the configured validity window (epoch milliseconds) */
  expiresAt: number;
  /** Set exactly once, by the first successful validation */
  consumed: boolean;
}

/**
 * Why a state value was rejected.
 */
export type StateRejectionReason = 'not_found' | 'expired' | 'already_consumed';

/**
 * Result of validating a state value returned on the callback.
 */
export type StateValidationResult =
  | { valid: true }
  | { valid: false; reason: StateRejectionReason };

/**
 * Registry holding issued state tokens.
 *
 * `consume` must run its lookup, expiry check, consumed check and the
 * consumed-flag write as one atomic unit: two concurrent calls for the same
 * value can never both return `{ valid: true }`.
 */
export interface StateTokenStore {
  /**
   * Record a freshly issued token.
   * @param token - The token to store
   * @param retainMs - How long the entry should be kept after it expires
   */
  insert(token: StateToken, retainMs: number): Promise<void>;

  /**
   * Atomically validate and consume a state value.
   * @param value - The state value from the callback
   * @param now - Current time (epoch milliseconds)
   */
  consume(value: string, now: number): Promise<StateValidationResult>;

  /**
   * Remove entries whose retention window has passed.
   * Stores whose backend evicts entries by TTL may omit this.
   * @returns Number of removed entries
   */
  purgeExpired?(now: number): Promise<number>;

  /**
   * Drop every entry.
   */
  clear(): Promise<void>;
}
