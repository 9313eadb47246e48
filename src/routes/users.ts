/**
 * Profile endpoints backed by the identity directory
 */

import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { requireIdentity } from '../auth/authenticate';
import { filesNamed, readMultipartForm } from '../http/multipart';
import type { UserService } from '../services/UserService';

export interface UserRoutesDeps {
  users: UserService;
  authenticate: preHandlerAsyncHookHandler;
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRoutesDeps): void {
  const { users, authenticate } = deps;

  app.get('/user', { preHandler: authenticate }, async (request) => {
    return users.getProfile(requireIdentity(request));
  });

  app.put('/user/picture', { preHandler: authenticate }, async (request) => {
    const identity = requireIdentity(request);
    const form = await readMultipartForm(request);
    return users.setPicture(identity, filesNamed(form, 'picture')[0]);
  });
}
