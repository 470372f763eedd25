import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AppContext } from './context.js';
import { ServiceError } from './errors.js';
import {
  createTaskRequestSchema,
  emergencyWithdrawRequestSchema,
  feeUpdateRequestSchema,
  taskActionRequestSchema,
  taskLookupSchema,
  userLookupSchema
} from './schemas.js';
import {
  acceptTask,
  cancelTask,
  completeTask,
  createTask,
  emergencyWithdraw,
  getRegistrySummary,
  updatePlatformFee
} from './services/tasks.js';

const jsonResult = (data: unknown, isError = false): CallToolResult => ({
  content: [{ type: 'text', text: JSON.stringify(data) }],
  ...(isError ? { isError: true } : {})
});

/** Rejections become error results; anything else propagates to the SDK. */
const run = async (work: () => Promise<unknown>): Promise<CallToolResult> => {
  try {
    return jsonResult(await work());
  } catch (error) {
    if (error instanceof ServiceError) {
      return jsonResult({ error: error.code, message: error.message }, true);
    }
    throw error;
  }
};

export const createTaskMcpServer = (ctx: AppContext): McpServer => {
  const server = new McpServer({
    name: 'taskescrow-registry',
    version: '0.1.0'
  });

  server.tool(
    'registry.task.create',
    'Post a task and escrow its reward from the caller balance. Requires a signed envelope.',
    createTaskRequestSchema.shape,
    async (payload) => run(async () => ({ task: await createTask(ctx, payload) }))
  );

  server.tool(
    'registry.task.accept',
    'Accept an open task as freelancer.',
    taskActionRequestSchema.shape,
    async (payload) => run(async () => ({ task: await acceptTask(ctx, payload) }))
  );

  server.tool(
    'registry.task.complete',
    'Submit work as the freelancer or approve it as the client; the second confirmation pays out.',
    taskActionRequestSchema.shape,
    async (payload) => run(async () => ({ task: await completeTask(ctx, payload) }))
  );

  server.tool(
    'registry.task.cancel',
    'Cancel an open task and refund its reward to the client.',
    taskActionRequestSchema.shape,
    async (payload) => run(async () => ({ task: await cancelTask(ctx, payload) }))
  );

  server.tool('registry.task.get', 'Fetch a task by id.', taskLookupSchema.shape, async ({ taskId }) =>
    run(async () => ({ task: await ctx.registry.getTask(taskId) }))
  );

  server.tool('registry.user.tasks', 'List task ids an address created or accepted.', userLookupSchema.shape, async ({ address }) =>
    run(async () => ({
      address,
      tasks: await ctx.registry.getUserTasks(address),
      completedTasks: await ctx.registry.getCompletedTasksCount(address)
    }))
  );

  server.tool('registry.summary', 'Owner, platform fee, task count and escrow balance.', async () =>
    run(() => getRegistrySummary(ctx))
  );

  server.tool(
    'registry.fee.update',
    'Change the platform fee percentage (owner only).',
    feeUpdateRequestSchema.shape,
    async (payload) => run(() => updatePlatformFee(ctx, payload))
  );

  server.tool(
    'registry.emergency_withdraw',
    'Sweep the whole escrow balance to the owner (owner only).',
    emergencyWithdrawRequestSchema.shape,
    async (payload) => run(() => emergencyWithdraw(ctx, payload))
  );

  return server;
};
