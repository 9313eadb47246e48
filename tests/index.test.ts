/**
 * Entry point tests: boots the server from environment variables
 */

import type { FastifyInstance } from 'fastify';
import { ConfigurationManager } from '../src/config';
import { main } from '../src/index';

jest.mock('../src/utils/logger');

const SETTINGS: Record<string, string> = {
  HOST: '127.0.0.1',
  PORT: '0',
  AUTH_ISSUER: 'https://tenant.example.test/',
  AUTH_AUDIENCE: 'tasks-api',
  AUTH_JWKS_URI: 'https://tenant.example.test/.well-known/jwks.json',
  IDENTITY_DOMAIN: 'tenant.example.test',
  IDENTITY_MANAGEMENT_TOKEN: 'test-secret',
  S3_BUCKET: 'task-images',
};

describe('main', () => {
  let originalEnv: NodeJS.ProcessEnv;
  let app: FastifyInstance | undefined;

  beforeEach(() => {
    originalEnv = { ...process.env };
    Object.assign(process.env, SETTINGS);
    jest.spyOn(process, 'once').mockReturnValue(process);
    ConfigurationManager.reset();
  });

  afterEach(async () => {
    await app?.close();
    app = undefined;
    jest.restoreAllMocks();
    process.env = originalEnv;
    ConfigurationManager.reset();
  });

  it('should start listening with in-memory storage under test', async () => {
    app = await main();

    const response = await app.inject({ method: 'GET', url: '/status' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      results: {
        memory: { data: { minorCollections: expect.any(Number), majorCollections: expect.any(Number) } },
        storage: { data: { storageType: 'memory' } },
      },
    });
    expect(process.once).toHaveBeenCalledWith('SIGINT', expect.any(Function));
    expect(process.once).toHaveBeenCalledWith('SIGTERM', expect.any(Function));
  });

  it('should refuse to start without a blob bucket', async () => {
    delete process.env.S3_BUCKET;

    await expect(main()).rejects.toThrow('Configuration error in blobStore.bucket: is required');
  });
});
