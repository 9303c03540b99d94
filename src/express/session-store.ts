import { Store, type SessionData } from 'express-session';
import { Keyv } from 'keyv';
import { z } from 'zod';
import type { KeyvLike } from '../types/store.js';
import { STORAGE_NAMESPACES } from '../core/config.js';
import { noopLogger, type Logger } from '../utils/logger.js';

/**
 * Options for {@link IdentitySessionStore}.
 */
export interface IdentitySessionStoreOptions {
  /** Keyv instance whose backend holds the sessions */
  store: KeyvLike;

  /** Entry lifetime for sessions whose cookie carries no max age, in milliseconds */
  maxAgeMs: number;

  /** Logger instance (default: silent) */
  logger?: Logger;
}

const SessionIdentitySchema = z.object({
  username: z.string().min(1),
  groups: z.array(z.string()),
});

type SessionCallback = (err?: Error | null, session?: SessionData | null) => void;

/**
 * express-session store for logged-in identities, kept in the
 * `express-sessions` namespace of a Keyv backend.
 *
 * An entry whose identity does not have the shape written by the login
 * callback is dropped and read as no session.
 *
 * @example
 * ```typescript
 * app.use(session({
 *   store: new IdentitySessionStore({ store: new Keyv(), maxAgeMs: 8 * 60 * 60 * 1000 }),
 *   secret: process.env.SESSION_SECRET ?? '',
 *   resave: false,
 *   saveUninitialized: false,
 * }));
 * ```
 */
export class IdentitySessionStore extends Store {
  private readonly sessions: Keyv<SessionData>;
  private readonly maxAgeMs: number;
  private readonly logger: Logger;

  constructor(options: IdentitySessionStoreOptions) {
    super();
    this.sessions = new Keyv<SessionData>({
      store: options.store.opts.store,
      namespace: STORAGE_NAMESPACES.EXPRESS_SESSIONS,
    });
    this.maxAgeMs = options.maxAgeMs;
    this.logger = options.logger ?? noopLogger;
  }

  override get(sid: string, callback: SessionCallback): void {
    void this.read(sid).then(
      (session) => callback(null, session),
      (err: unknown) => callback(toError(err))
    );
  }

  /**
   * Store a session until its cookie expires.
   */
  override set(sid: string, session: SessionData, callback?: (err?: Error) => void): void {
    const ttl = session.cookie.maxAge ?? this.maxAgeMs;
    void this.sessions.set(sid, session, ttl).then(
      () => callback?.(),
      (err: unknown) => callback?.(toError(err))
    );
  }

  override destroy(sid: string, callback?: (err?: Error) => void): void {
    void this.sessions.delete(sid).then(
      () => callback?.(),
      (err: unknown) => callback?.(toError(err))
    );
  }

  /**
   * Reset the lifetime of a session.
   */
  override touch(sid: string, session: SessionData, callback?: (err?: Error) => void): void {
    this.set(sid, session, callback);
  }

  private async read(sid: string): Promise<SessionData | null> {
    const session = await this.sessions.get(sid);
    if (!session) {
      return null;
    }
    const identity = SessionIdentitySchema.optional().safeParse(session.identity);
    if (!identity.success) {
      this.logger.warn('Dropping session with a malformed identity');
      await this.sessions.delete(sid);
      return null;
    }
    return session;
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
