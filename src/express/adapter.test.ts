import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import express, { type Application } from 'express';
import session from 'express-session';
import request from 'supertest';
import { createExpressLoginRoutes, type ExpressLoginRoutesOptions } from './adapter.js';
import { requireIdentity } from './middleware.js';
import { createOAuth2Login, type OAuth2Login } from '../core/login.js';
import { createTestConfig } from '../test/helpers/config.js';
import { createMockLogger, type MockLogger } from '../test/helpers/mock-logger.js';
import { createMockOAuth2Client } from '../test/helpers/mock-oauth2-client.js';
import {
  TEST_AUTH_CODE,
  TEST_AUTHORIZATION_ENDPOINT,
  TEST_SESSION_SECRET,
} from '../test/constants.js';

function stateFrom(location: string): string {
  const state = new URL(location).searchParams.get('state');
  if (!state) {
    throw new Error(`No state in ${location}`);
  }
  return state;
}

describe('createExpressLoginRoutes', () => {
  let logger: MockLogger;
  let login: OAuth2Login;

  const createApp = (
    options: Omit<ExpressLoginRoutesOptions, 'logger'> = {},
    withSession = true
  ): Application => {
    const app = express();
    if (withSession) {
      app.use(session({ secret: TEST_SESSION_SECRET, resave: false, saveUninitialized: false }));
    }
    app.use('/oauth', createExpressLoginRoutes(login, { ...options, logger }));
    app.get('/me', requireIdentity(), (req, res) => {
      res.json(req.identity);
    });
    return app;
  };

  beforeEach(() => {
    logger = createMockLogger();
    login = createOAuth2Login(createTestConfig({ logger }), { client: createMockOAuth2Client() });
  });

  afterEach(async () => {
    await login.close();
  });

  describe('GET /login', () => {
    it('should redirect to the identity provider', async () => {
      const res = await request(createApp()).get('/oauth/login');

      expect(res.status).toBe(302);
      expect(res.get('Location').startsWith(`${TEST_AUTHORIZATION_ENDPOINT}?`)).toBe(true);
      expect(stateFrom(res.get('Location'))).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });

    it('should answer 500 when no state can be issued', async () => {
      vi.spyOn(login, 'beginLogin').mockRejectedValueOnce(new Error('store down'));

      const res = await request(createApp()).get('/oauth/login');

      expect(res.status).toBe(500);
      expect(res.text).toBe('Internal server error');
      expect(logger.error).toHaveBeenCalledWith('Login redirect error', expect.any(Error));
    });

    it('should serve a custom path', async () => {
      const res = await request(createApp({ loginPath: '/start' })).get('/oauth/start');

      expect(res.status).toBe(302);
    });
  });

  describe('GET /callback', () => {
    it('should open a session for the authenticated user', async () => {
      const agent = request.agent(createApp());
      const state = stateFrom((await agent.get('/oauth/login')).get('Location'));

      const res = await agent.get('/oauth/callback').query({ state, code: TEST_AUTH_CODE });

      expect(res.status).toBe(302);
      expect(res.get('Location')).toBe('/');
      const me = await agent.get('/me');
      expect(me.status).toBe(200);
      expect(me.body).toEqual({ username: 'alice', groups: ['g1', 'g2'] });
    });

    it('should redirect to the configured page after login', async () => {
      const agent = request.agent(createApp({ successRedirect: '/app' }));
      const state = stateFrom((await agent.get('/oauth/login')).get('Location'));

      const res = await agent.get('/oauth/callback').query({ state, code: TEST_AUTH_CODE });

      expect(res.get('Location')).toBe('/app');
    });

    it('should answer 401 for an unknown state', async () => {
      const agent = request.agent(createApp());

      const res = await agent.get('/oauth/callback').query({ state: 'forged', code: TEST_AUTH_CODE });

      expect(res.status).toBe(401);
      expect(res.text).toBe('Authentication failed');
      expect((await agent.get('/me')).status).toBe(401);
    });

    it('should answer 401 for a replayed callback', async () => {
      const app = createApp();
      const state = stateFrom((await request(app).get('/oauth/login')).get('Location'));
      await request(app).get('/oauth/callback').query({ state, code: TEST_AUTH_CODE }).expect(302);

      const res = await request(app).get('/oauth/callback').query({ state, code: TEST_AUTH_CODE });

      expect(res.status).toBe(401);
    });

    it('should answer 401 when the state is repeated', async () => {
      const app = createApp();
      const state = stateFrom((await request(app).get('/oauth/login')).get('Location'));

      const res = await request(app).get(
        `/oauth/callback?state=${state}&state=${state}&code=${TEST_AUTH_CODE}`
      );

      expect(res.status).toBe(401);
    });

    it('should hand the identity to a custom handler', async () => {
      const app = createApp({
        onAuthenticated: (identity, _req, res) => {
          res.json({ user: identity.username, groups: [...identity.groups] });
        },
      });
      const state = stateFrom((await request(app).get('/oauth/login')).get('Location'));

      const res = await request(app).get('/oauth/callback').query({ state, code: TEST_AUTH_CODE });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ user: 'alice', groups: ['g1', 'g2'] });
    });

    it('should answer 500 when no session middleware is installed', async () => {
      const app = createApp({}, false);
      const state = stateFrom((await request(app).get('/oauth/login')).get('Location'));

      const res = await request(app).get('/oauth/callback').query({ state, code: TEST_AUTH_CODE });

      expect(res.status).toBe(500);
      expect(logger.error).toHaveBeenCalledWith(
        'Session middleware is not installed; cannot store the identity'
      );
    });

    it('should answer 500 on unexpected errors', async () => {
      vi.spyOn(login, 'completeLogin').mockRejectedValueOnce(new Error('unexpected'));

      const res = await request(createApp()).get('/oauth/callback').query({ state: 'x', code: 'y' });

      expect(res.status).toBe(500);
      expect(logger.error).toHaveBeenCalledWith('Login callback error', expect.any(Error));
    });
  });
});
