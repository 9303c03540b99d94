/**
 * Store type definitions.
 */

/**
 * A Keyv instance as seen by this package: only its backend is read.
 * The state-token registry and the Express session store each open their own
 * namespace over that backend.
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import KeyvRedis from '@keyv/redis';
 *
 * const inMemory = new Keyv();
 * const withRedis = new Keyv({ store: new KeyvRedis('redis://localhost:6379') });
 * ```
 */
export interface KeyvLike {
  opts: {
    /** The backend behind the Keyv instance */
    store?: unknown;
  };
}
