import { randomBytes } from 'node:crypto';
import type { StateToken, StateTokenStore, StateValidationResult } from '../types/state.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';
import { createMemoryStateTokenStore } from './state-store.js';
import {
  DEFAULT_MAX_STATE_VALIDITY_MINUTES,
  DEFAULT_STATE_PURGE_INTERVAL_MS,
  DEFAULT_STATE_RETENTION_MS,
  STATE_TOKEN_BYTES,
} from './config.js';

/**
 * Options for the state token manager.
 */
export interface StateTokenManagerOptions {
  /** Validity window of issued tokens, in minutes (default: 10) */
  maxValidityMinutes?: number;
  /** Registry backend (default: in-memory) */
  store?: StateTokenStore;
  /** How long expired entries are retained before purging, in ms (default: 10 minutes) */
  retentionMs?: number;
  /** Interval of the background purge, in ms (default: 1 minute) */
  purgeIntervalMs?: number;
  /** Logger instance */
  logger?: Logger;
}

/**
 * Issues CSRF state tokens and validates them exactly once.
 *
 * The registry is owned by the instance: call {@link start} when the login
 * flow is activated and {@link close} when it is shut down.
 *
 * @example
 * ```typescript
 * const stateTokens = new StateTokenManager({ maxValidityMinutes: 5 });
 * stateTokens.start();
 *
 * const token = await stateTokens.issue();
 * // ... later, on the callback
 * const result = await stateTokens.validate(token.value);
 * ```
 */
export class StateTokenManager {
  private readonly store: StateTokenStore;
  private readonly ownsStore: boolean;
  private readonly validityMs: number;
  private readonly retentionMs: number;
  private readonly purgeIntervalMs: number;
  private readonly logger: Logger;
  private purgeTimer: NodeJS.Timeout | null = null;

  constructor(options: StateTokenManagerOptions = {}) {
    this.store = options.store ?? createMemoryStateTokenStore();
    this.ownsStore = options.store === undefined;
    this.validityMs =
      (options.maxValidityMinutes ?? DEFAULT_MAX_STATE_VALIDITY_MINUTES) * 60 * 1000;
    this.retentionMs = options.retentionMs ?? DEFAULT_STATE_RETENTION_MS;
    this.purgeIntervalMs = options.purgeIntervalMs ?? DEFAULT_STATE_PURGE_INTERVAL_MS;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /**
   * Issue a new state token and record it in the registry.
   */
  async issue(): Promise<StateToken> {
    const issuedAt = Date.now();
    const token: StateToken = {
      value: randomBytes(STATE_TOKEN_BYTES).toString('base64url'),
      issuedAt,
      expiresAt: issuedAt + this.validityMs,
      consumed: false,
    };

    await this.store.insert(token, this.retentionMs);
    this.logger.debug('State token issued', { expiresAt: new Date(token.expiresAt).toISOString() });

    return { ...token };
  }

  /**
   * Validate a state value returned on the callback.
   * Succeeds at most once per issued token.
   */
  async validate(value: string): Promise<StateValidationResult> {
    const result = await this.store.consume(value, Date.now());
    if (!result.valid) {
      this.logger.warn('State token rejected', { reason: result.reason });
    }
    return result;
  }

  /**
   * Remove registry entries whose retention window has passed.
   * @returns Number of removed entries (0 when the store evicts by TTL)
   */
  async purgeExpired(): Promise<number> {
    if (!this.store.purgeExpired) {
      return 0;
    }
    const removed = await this.store.purgeExpired(Date.now());
    if (removed > 0) {
      this.logger.debug('Purged expired state tokens', { removed });
    }
    return removed;
  }

  /**
   * Start the background purge. Calling it twice has no effect.
   * The timer does not keep the process alive.
   */
  start(): void {
    if (this.purgeTimer || !this.store.purgeExpired) {
      return;
    }
    this.purgeTimer = setInterval(() => {
      this.purgeExpired().catch((error: unknown) => {
        this.logger.error('State token purge failed', error);
      });
    }, this.purgeIntervalMs);
    this.purgeTimer.unref();
  }

  /**
   * Stop the background purge. A registry created by the manager itself is
   * dropped; a store passed in through the options is left to its owner.
   */
  async close(): Promise<void> {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = null;
    }
    if (this.ownsStore) {
      await this.store.clear();
    }
  }
}
