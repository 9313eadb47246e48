/**
 * Bearer token verification
 */

export interface VerifiedToken {
  /** The `sub` claim; used as the owner identity of every task */
  subject: string;
  claims: Record<string, unknown>;
}

export interface TokenVerifier {
  /**
   * Verify a bearer token
   * @throws AppError with AUTH_FAILED when the token is invalid, expired or untrusted
   */
  verify(token: string): Promise<VerifiedToken>;
}
