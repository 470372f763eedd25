import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { AppContext } from './context.js';
import { ServiceError } from './errors.js';
import {
  addressParamSchema,
  createTaskRequestSchema,
  emergencyWithdrawRequestSchema,
  feeUpdateRequestSchema,
  fundAccountRequestSchema,
  taskActionRequestSchema,
  taskIdParamSchema
} from './schemas.js';
import {
  acceptTask,
  cancelTask,
  completeTask,
  createTask,
  emergencyWithdraw,
  fundAccount,
  getAccountBalance,
  getRegistrySummary,
  getUserStats,
  updatePlatformFee
} from './services/tasks.js';

export interface AppOptions {
  logger?: FastifyServerOptions['logger'];
}

const bodyOf = (request: FastifyRequest): Record<string, unknown> =>
  typeof request.body === 'object' && request.body !== null ? { ...request.body } : {};

export const buildApp = (ctx: AppContext, options: AppOptions = {}): FastifyInstance => {
  const app = Fastify({
    logger: options.logger ?? { level: ctx.config.logLevel }
  });

  app.register(cors, {
    origin: true
  });

  app.get('/health', async () => ({
    status: 'ok',
    owner: await ctx.registry.getOwner(),
    platformFeePercentage: await ctx.registry.getPlatformFee()
  }));

  app.get('/registry', async () => getRegistrySummary(ctx));

  app.get('/tasks/count', async () => ({ count: await ctx.registry.getTotalTasks() }));

  app.get('/tasks/:id', async (request) => {
    const { id } = taskIdParamSchema.parse(request.params);
    return { task: await ctx.registry.getTask(id) };
  });

  app.get('/users/:address/tasks', async (request) => {
    const { address } = addressParamSchema.parse(request.params);
    return { address, tasks: await ctx.registry.getUserTasks(address) };
  });

  app.get('/users/:address/stats', async (request) => {
    const { address } = addressParamSchema.parse(request.params);
    return getUserStats(ctx, address);
  });

  app.get('/accounts/:address/balance', async (request) => {
    const { address } = addressParamSchema.parse(request.params);
    return getAccountBalance(ctx, address);
  });

  app.post('/tasks', async (request, reply) => {
    const payload = createTaskRequestSchema.parse(request.body);
    const task = await createTask(ctx, payload);
    return reply.code(201).send({ task });
  });

  const taskActions = { accept: acceptTask, complete: completeTask, cancel: cancelTask } as const;
  for (const [action, handler] of Object.entries(taskActions)) {
    app.post(`/tasks/:id/${action}`, async (request) => {
      const { id } = taskIdParamSchema.parse(request.params);
      const payload = taskActionRequestSchema.parse({ ...bodyOf(request), taskId: id });
      return { task: await handler(ctx, payload) };
    });
  }

  app.post('/admin/fee', async (request) => updatePlatformFee(ctx, feeUpdateRequestSchema.parse(request.body)));

  app.post('/admin/emergency-withdraw', async (request) =>
    emergencyWithdraw(ctx, emergencyWithdrawRequestSchema.parse(request.body))
  );

  app.post('/admin/accounts/:address/fund', async (request) => {
    const { address } = addressParamSchema.parse(request.params);
    return fundAccount(ctx, fundAccountRequestSchema.parse({ ...bodyOf(request), account: address }));
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ServiceError) {
      request.log.info({ code: error.code, reason: error.message }, 'Request rejected');
      return reply.code(error.statusCode).send({ error: error.code, message: error.message });
    }
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'invalid_input', message: 'Request validation failed', details: error.issues });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: 'invalid_input', message: error.message });
    }
    request.log.error(error);
    return reply.code(500).send({ error: 'internal_error', message: 'Unexpected error' });
  });

  return app;
};
