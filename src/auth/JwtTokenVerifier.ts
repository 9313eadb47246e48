/**
 * TokenVerifier for RS256 JWTs signed by the identity provider
 *
 * Signing keys are fetched from the provider's published JWKS and cached by
 * jose; issuer and audience must match the configuration.
 */

import { createRemoteJWKSet, jwtVerify } from 'jose';
import type { JWTVerifyGetKey } from 'jose';
import { AppError, ErrorCode } from '../types/errors';
import { logger } from '../utils/logger';
import type { TokenVerifier, VerifiedToken } from './TokenVerifier';

export interface JwtVerifierOptions {
  issuer: string;
  audience: string;
  jwksUri: string;
}

export function tokenFailure(reason: string): AppError {
  logger.error('Token verification failed: %s', reason);
  return new AppError(ErrorCode.AUTH_FAILED, 'Invalid or expired token');
}

export class JwtTokenVerifier implements TokenVerifier {
  private readonly keys: JWTVerifyGetKey;

  constructor(private readonly options: JwtVerifierOptions, keys?: JWTVerifyGetKey) {
    this.keys = keys ?? createRemoteJWKSet(new URL(options.jwksUri));
  }

  async verify(token: string): Promise<VerifiedToken> {
    let payload: Record<string, unknown>;
    try {
      const result = await jwtVerify(token, this.keys, {
        issuer: this.options.issuer,
        audience: this.options.audience,
        algorithms: ['RS256'],
      });
      payload = { ...result.payload };
    } catch (error) {
      throw tokenFailure(error instanceof Error ? error.message : String(error));
    }

    const subject = payload.sub;
    if (typeof subject !== 'string' || subject.length === 0) {
      throw tokenFailure('token has no subject claim');
    }

    return { subject, claims: payload };
  }
}
