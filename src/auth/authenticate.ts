/**
 * Fastify hooks binding the bearer token to the request identity
 */

import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { AppError, ErrorCode } from '../types/errors';
import type { RequestIdentity } from '../types/models';
import type { TokenVerifier } from './TokenVerifier';

declare module 'fastify' {
  interface FastifyRequest {
    identity?: RequestIdentity;
  }
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function createAuthenticate(verifier: TokenVerifier): preHandlerAsyncHookHandler {
  return async function authenticate(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const header = request.headers.authorization;
    if (!header) {
      throw new AppError(ErrorCode.AUTH_REQUIRED, 'Authentication required');
    }

    const match = BEARER_PATTERN.exec(header);
    const token = match?.[1];
    if (!token) {
      throw new AppError(ErrorCode.AUTH_FAILED, 'Authorization header must use the Bearer scheme');
    }

    const verified = await verifier.verify(token);
    request.identity = { subject: verified.subject, ip: request.ip };
  };
}

/**
 * The identity bound by `authenticate`
 * @throws AppError with AUTH_REQUIRED on routes registered without the hook
 */
export function requireIdentity(request: FastifyRequest): RequestIdentity {
  if (!request.identity) {
    throw new AppError(ErrorCode.AUTH_REQUIRED, 'Authentication required');
  }
  return request.identity;
}
