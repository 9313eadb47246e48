/**
 * IdentityDirectory over the Auth0 Management API
 */

import { ManagementClient } from 'auth0';
import { dependencyError } from '../types/errors';
import { logger } from '../utils/logger';
import type { IdentityDirectory, UserProfile } from './IdentityDirectory';

export interface Auth0DirectoryOptions {
  domain: string;
  token: string;
}

/**
 * The part of the management client's users API this directory calls
 */
export interface ManagementUsersApi {
  get(params: { id: string }): Promise<{ data: Record<string, unknown> }>;
  update(params: { id: string }, body: { picture: string }): Promise<unknown>;
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 404;
}

export class Auth0IdentityDirectory implements IdentityDirectory {
  constructor(
    options: Auth0DirectoryOptions,
    private readonly users: ManagementUsersApi = new ManagementClient({
      domain: options.domain,
      token: options.token,
    }).users,
  ) {}

  async getUser(id: string): Promise<UserProfile | null> {
    try {
      const { data } = await this.users.get({ id });
      return {
        id: optionalString(data.user_id) ?? id,
        email: optionalString(data.email),
        name: optionalString(data.name),
        picture: optionalString(data.picture),
      };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      logger.error('Identity lookup failed for %s: %s', id, error instanceof Error ? error.message : String(error));
      throw dependencyError('identity-directory', 'getUser', error);
    }
  }

  async setUserPicture(id: string, url: string): Promise<void> {
    try {
      await this.users.update({ id }, { picture: url });
    } catch (error) {
      logger.error('Identity picture update failed for %s: %s', id, error instanceof Error ? error.message : String(error));
      throw dependencyError('identity-directory', 'setUserPicture', error);
    }
  }
}
