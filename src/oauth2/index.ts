export { OAuth2Client, createClientConfiguration } from './client.js';
export { withDeadlines } from './deadline-fetch.js';
export type { OAuth2ClientConfig } from './client.js';
export { getClaimAsString, getClaimAsStringSet } from './claims.js';
