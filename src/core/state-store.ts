import { Keyv } from 'keyv';
import { z } from 'zod';
import type { StateToken, StateTokenStore, StateValidationResult } from '../types/state.js';
import type { KeyvLike } from '../types/store.js';
import { STORAGE_NAMESPACES } from './config.js';

interface MemoryEntry {
  token: StateToken;
  /** Time after which the entry may be purged */
  purgeAfter: number;
}

/**
 * Check a stored token against the current time and mark it consumed.
 * Mutates `token` only when validation succeeds.
 */
function checkAndConsume(token: StateToken | undefined, now: number): StateValidationResult {
  if (!token) {
    return { valid: false, reason: 'not_found' };
  }
  if (now >= token.expiresAt) {
    return { valid: false, reason: 'expired' };
  }
  if (token.consumed) {
    return { valid: false, reason: 'already_consumed' };
  }
  token.consumed = true;
  return { valid: true };
}

/**
 * Create an in-memory state token registry.
 *
 * All reads and writes happen synchronously inside each call, so a
 * validation's check-and-set can never interleave with another one.
 */
export function createMemoryStateTokenStore(): StateTokenStore {
  const entries = new Map<string, MemoryEntry>();

  return {
    async insert(token: StateToken, retainMs: number): Promise<void> {
      entries.set(token.value, { token: { ...token }, purgeAfter: token.expiresAt + retainMs });
    },

    async consume(value: string, now: number): Promise<StateValidationResult> {
      return checkAndConsume(entries.get(value)?.token, now);
    },

    async purgeExpired(now: number): Promise<number> {
      let removed = 0;
      for (const [value, entry] of entries) {
        if (now >= entry.purgeAfter) {
          entries.delete(value);
          removed++;
        }
      }
      return removed;
    },

    async clear(): Promise<void> {
      entries.clear();
    },
  };
}

const StoredStateTokenSchema = z.object({
  value: z.string(),
  issuedAt: z.number(),
  expiresAt: z.number(),
  consumed: z.boolean(),
  retainUntil: z.number(),
});

type StoredStateToken = z.infer<typeof StoredStateTokenSchema>;

/**
 * Serializes async work per key within this process.
 */
class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

/**
 * One lock per Keyv backend, so every registry created over the same backend
 * in this process serializes validation of a value through the same queue.
 */
const backendLocks = new WeakMap<object, KeyedLock>();

function lockFor(backend: object): KeyedLock {
  let lock = backendLocks.get(backend);
  if (!lock) {
    lock = new KeyedLock();
    backendLocks.set(backend, lock);
  }
  return lock;
}

/**
 * Create a state token registry on top of a Keyv instance.
 *
 * Entries live in the `state-tokens` namespace of the Keyv backend and carry a
 * TTL of validity plus retention, so the backend evicts them on its own.
 * Validation of one value is serialized by an in-process lock shared by all
 * registries on the same backend; processes that share a backend do not
 * coordinate with each other.
 *
 * @param store - Any Keyv instance; its underlying store is reused
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import KeyvRedis from '@keyv/redis';
 *
 * const stateStore = createKeyvStateTokenStore(
 *   new Keyv({ store: new KeyvRedis('redis://localhost:6379') })
 * );
 * ```
 */
export function createKeyvStateTokenStore(store: KeyvLike): StateTokenStore {
  const backend = store.opts.store;
  const keyv = new Keyv({ store: backend, namespace: STORAGE_NAMESPACES.STATE_TOKENS });
  const lock = lockFor(typeof backend === 'object' && backend !== null ? backend : store);

  const read = async (value: string): Promise<StoredStateToken | undefined> => {
    const raw: unknown = await keyv.get(value);
    const parsed = StoredStateTokenSchema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  };

  return {
    async insert(token: StateToken, retainMs: number): Promise<void> {
      const record: StoredStateToken = { ...token, retainUntil: token.expiresAt + retainMs };
      await keyv.set(token.value, record, record.retainUntil - token.issuedAt);
    },

    consume(value: string, now: number): Promise<StateValidationResult> {
      return lock.run(value, async () => {
        const token = await read(value);
        const result = checkAndConsume(token, now);
        if (result.valid && token) {
          // The consumed marker is written back with the remaining retention
          await keyv.set(value, token, Math.max(token.retainUntil - now, 1));
        }
        return result;
      });
    },

    async clear(): Promise<void> {
      await keyv.clear();
    },
  };
}
