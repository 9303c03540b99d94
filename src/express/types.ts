import type { IdentityAssertion } from '../types/identity.js';

/**
 * Identity as stored in the Express session (JSON-serializable).
 */
export interface SessionIdentity {
  username: string;
  /** Group names, sorted */
  groups: string[];
}

declare module 'express-session' {
  interface SessionData {
    identity?: SessionIdentity;
  }
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /**
       * Identity of the logged-in user, attached by requireIdentity.
       */
      identity?: SessionIdentity;
    }
  }
}

/**
 * Convert an identity assertion into its session form.
 */
export function toSessionIdentity(identity: IdentityAssertion): SessionIdentity {
  return {
    username: identity.username,
    groups: Array.from(identity.groups).sort(),
  };
}
