import { describe, it, expect } from 'vitest';
import express, { type Application } from 'express';
import session from 'express-session';
import request from 'supertest';
import { requireIdentity, type RequireIdentityOptions } from './middleware.js';
import { TEST_SESSION_SECRET } from '../test/constants.js';

function createApp(options?: RequireIdentityOptions, withSession = true): Application {
  const app = express();
  if (withSession) {
    app.use(session({ secret: TEST_SESSION_SECRET, resave: false, saveUninitialized: false }));
  }
  app.get('/sign-in', (req, res) => {
    req.session.identity = { username: 'alice', groups: ['g1', 'g2'] };
    res.sendStatus(204);
  });
  app.get('/me', requireIdentity(options), (req, res) => {
    res.json(req.identity);
  });
  return app;
}

describe('requireIdentity', () => {
  it('should expose the session identity as req.identity', async () => {
    const agent = request.agent(createApp());
    await agent.get('/sign-in').expect(204);

    const res = await agent.get('/me');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ username: 'alice', groups: ['g1', 'g2'] });
  });

  it('should answer 401 for anonymous requests', async () => {
    const res = await request(createApp()).get('/me');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'unauthorized', message: 'Login required' });
  });

  it('should redirect anonymous requests to the login URL when configured', async () => {
    const res = await request(createApp({ loginUrl: '/oauth/login' })).get('/me');

    expect(res.status).toBe(302);
    expect(res.get('Location')).toBe('/oauth/login');
  });

  it('should answer 401 when no session middleware is installed', async () => {
    const res = await request(createApp({}, false)).get('/me');

    expect(res.status).toBe(401);
  });
});
