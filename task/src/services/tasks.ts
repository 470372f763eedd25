import {
  createTaskSignaturePayload,
  emergencyWithdrawSignaturePayload,
  feeUpdateSignaturePayload,
  fundAccountSignaturePayload,
  taskActionSignaturePayload,
  type TaskActionKind,
  type TaskRecord
} from '@taskescrow/task-db';
import type { Address } from 'viem';
import type { AppContext } from '../context.js';
import { verifyDetachedSignature } from '../crypto.js';
import { unauthenticated } from '../errors.js';
import type {
  CreateTaskRequest,
  EmergencyWithdrawRequest,
  Envelope,
  FeeUpdateRequest,
  FundAccountRequest,
  TaskActionRequest
} from '../schemas.js';

export interface RegistrySummaryWire {
  owner: string;
  platformFeePercentage: number;
  totalTasks: number;
  escrowBalance: string;
}

/**
 * Establishes the caller of a signed request: the signature must recover to
 * `caller`, `issuedAt` must fall inside the signature window and the request
 * id must not have been used within it.
 */
const authenticate = async (ctx: AppContext, envelope: Envelope, canonicalPayload: string): Promise<Address> => {
  const now = ctx.clock.now();
  const window = ctx.config.signatureTtlMs;
  if (Math.abs(now - envelope.issuedAt) > window) {
    throw unauthenticated('Signed request is outside the accepted time window');
  }
  const verified = await verifyDetachedSignature(envelope.caller, canonicalPayload, envelope.signature);
  if (!verified) {
    throw unauthenticated('Signature validation failed');
  }
  if (!ctx.replayGuard.claim(envelope.requestId, envelope.issuedAt + window, now)) {
    throw unauthenticated(`Request ${envelope.requestId} has already been used`);
  }
  return envelope.caller;
};

export const createTask = async (ctx: AppContext, payload: CreateTaskRequest): Promise<TaskRecord> => {
  const caller = await authenticate(ctx, payload, createTaskSignaturePayload(payload));
  return ctx.registry.createTask(
    {
      title: payload.title,
      description: payload.description,
      deadline: payload.deadline,
      reward: BigInt(payload.reward)
    },
    caller
  );
};

const authenticateTaskAction = (ctx: AppContext, kind: TaskActionKind, payload: TaskActionRequest) =>
  authenticate(ctx, payload, taskActionSignaturePayload(kind, payload));

export const acceptTask = async (ctx: AppContext, payload: TaskActionRequest): Promise<TaskRecord> => {
  const caller = await authenticateTaskAction(ctx, 'task:accept', payload);
  return ctx.registry.acceptTask(payload.taskId, caller);
};

export const completeTask = async (ctx: AppContext, payload: TaskActionRequest): Promise<TaskRecord> => {
  const caller = await authenticateTaskAction(ctx, 'task:complete', payload);
  return ctx.registry.completeTask(payload.taskId, caller);
};

export const cancelTask = async (ctx: AppContext, payload: TaskActionRequest): Promise<TaskRecord> => {
  const caller = await authenticateTaskAction(ctx, 'task:cancel', payload);
  return ctx.registry.cancelTask(payload.taskId, caller);
};

export const updatePlatformFee = async (
  ctx: AppContext,
  payload: FeeUpdateRequest
): Promise<{ platformFeePercentage: number }> => {
  const caller = await authenticate(ctx, payload, feeUpdateSignaturePayload(payload));
  return { platformFeePercentage: await ctx.registry.updatePlatformFee(payload.platformFeePercentage, caller) };
};

export const emergencyWithdraw = async (
  ctx: AppContext,
  payload: EmergencyWithdrawRequest
): Promise<{ amount: string }> => {
  const caller = await authenticate(ctx, payload, emergencyWithdrawSignaturePayload(payload));
  const amount = await ctx.registry.emergencyWithdraw(caller);
  return { amount: amount.toString() };
};

export const fundAccount = async (
  ctx: AppContext,
  payload: FundAccountRequest
): Promise<{ account: string; balance: string }> => {
  const caller = await authenticate(ctx, payload, fundAccountSignaturePayload(payload));
  const balance = await ctx.ledger.fundAccount(payload.account, BigInt(payload.amount), caller);
  return { account: payload.account, balance: balance.toString() };
};

export const getRegistrySummary = async (ctx: AppContext): Promise<RegistrySummaryWire> => {
  const summary = await ctx.registry.getSummary();
  return { ...summary, escrowBalance: summary.escrowBalance.toString() };
};

export const getUserStats = async (
  ctx: AppContext,
  address: Address
): Promise<{ address: Address; completedTasks: number }> => ({
  address,
  completedTasks: await ctx.registry.getCompletedTasksCount(address)
});

export const getAccountBalance = async (
  ctx: AppContext,
  address: Address
): Promise<{ address: Address; balance: string }> => ({
  address,
  balance: (await ctx.ledger.getBalance(address)).toString()
});
