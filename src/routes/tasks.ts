/**
 * Task endpoints
 */

import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { requireIdentity } from '../auth/authenticate';
import { filesNamed, readMultipartForm } from '../http/multipart';
import type { TaskService } from '../services/TaskService';

export interface TaskRoutesDeps {
  tasks: TaskService;
  authenticate: preHandlerAsyncHookHandler;
}

export function registerTaskRoutes(app: FastifyInstance, deps: TaskRoutesDeps): void {
  const { tasks, authenticate } = deps;

  app.get('/task/getAll', { preHandler: authenticate }, async (request) => {
    return tasks.list(requireIdentity(request));
  });

  app.get<{ Params: { id: string } }>('/task/:id', { preHandler: authenticate }, async (request) => {
    return tasks.get(requireIdentity(request), request.params.id);
  });

  app.post('/task', { preHandler: authenticate }, async (request, reply) => {
    const identity = requireIdentity(request);
    const form = await readMultipartForm(request);
    const created = await tasks.create(identity, form.fields, filesNamed(form, 'images'));
    reply.code(201);
    return created;
  });

  app.put('/task', { preHandler: authenticate }, async (request) => {
    const identity = requireIdentity(request);
    const form = await readMultipartForm(request);
    return tasks.update(identity, form.fields, filesNamed(form, 'images'));
  });

  app.delete<{ Params: { id: string } }>('/task/:id', { preHandler: authenticate }, async (request, reply) => {
    await tasks.delete(requireIdentity(request), request.params.id);
    return reply.code(204).send();
  });
}
