/**
 * Bearer authentication hook tests
 */

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { createAuthenticate, requireIdentity } from '../../src/auth/authenticate';
import { toAppError, toResponseBody } from '../../src/utils/error-handler';
import { FakeTokenVerifier } from '../helpers/fakes';

describe('createAuthenticate', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = Fastify();
    app.setErrorHandler(async (error, _request, reply) => {
      const appError = toAppError(error);
      reply.code(appError.statusCode);
      return toResponseBody(appError);
    });
    app.get('/whoami', { preHandler: createAuthenticate(new FakeTokenVerifier()) }, async (request) => {
      return requireIdentity(request);
    });
    app.get('/open', async (request) => requireIdentity(request));
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should bind the token subject and client address', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { authorization: 'Bearer token-for:auth0|alice' },
      remoteAddress: '10.1.2.3',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ subject: 'auth0|alice', ip: '10.1.2.3' });
  });

  it('should require an authorization header', async () => {
    const response = await app.inject({ method: 'GET', url: '/whoami' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: { code: 'AUTH_REQUIRED', message: 'Authentication required' } });
  });

  it('should reject other schemes', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { authorization: 'Basic dXNlcjpwYXNz' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      error: { code: 'AUTH_FAILED', message: 'Authorization header must use the Bearer scheme' },
    });
  });

  it('should reject tokens the verifier refuses', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/whoami',
      headers: { authorization: 'Bearer forged' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: { code: 'AUTH_FAILED', message: 'Invalid or expired token' } });
  });

  it('should refuse identity lookups on routes without the hook', async () => {
    const response = await app.inject({ method: 'GET', url: '/open' });
    expect(response.statusCode).toBe(401);
  });
});
