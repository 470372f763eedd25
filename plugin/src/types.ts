import { z } from 'zod';
import { amountStringSchema, taskRecordSchema } from '@taskescrow/task-db';
import { getAddress, isAddress } from 'viem';

const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), {
    message: 'Invalid address'
  })
  .transform((value) => getAddress(value));

const positiveAmountSchema = amountStringSchema.refine((value) => BigInt(value) > 0n, {
  message: 'amount must be greater than zero'
});

export const createTaskPayloadSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  /** Epoch milliseconds after which the task can no longer be accepted. */
  deadline: z.number().int().positive(),
  reward: positiveAmountSchema
});

export const taskIdPayloadSchema = z.object({
  taskId: z.number().int().positive()
});

export const feeUpdatePayloadSchema = z.object({
  platformFeePercentage: z.number().int().min(0).max(10)
});

export const fundAccountPayloadSchema = z.object({
  account: addressSchema,
  amount: positiveAmountSchema
});

export const addressPayloadSchema = z.object({
  address: addressSchema.optional()
});

export const emptyPayloadSchema = z.object({});

export const taskResponseSchema = z.object({ task: taskRecordSchema });

export const balanceResponseSchema = z.object({ address: z.string(), balance: amountStringSchema });

export const userTasksResponseSchema = z.object({ address: z.string(), tasks: z.array(z.number().int()) });

export const userStatsResponseSchema = z.object({ address: z.string(), completedTasks: z.number().int() });

export const feeResponseSchema = z.object({ platformFeePercentage: z.number().int() });

export const withdrawResponseSchema = z.object({ amount: amountStringSchema });

export const fundResponseSchema = z.object({ account: z.string(), balance: amountStringSchema });

export const registrySummarySchema = z.object({
  owner: z.string(),
  platformFeePercentage: z.number().int(),
  totalTasks: z.number().int(),
  escrowBalance: amountStringSchema
});

export const errorBodySchema = z.object({ error: z.string(), message: z.string() });

export type CreateTaskPayload = z.infer<typeof createTaskPayloadSchema>;
export type TaskIdPayload = z.infer<typeof taskIdPayloadSchema>;
export type FeeUpdatePayload = z.infer<typeof feeUpdatePayloadSchema>;
export type FundAccountPayload = z.infer<typeof fundAccountPayloadSchema>;
export type AddressPayload = z.infer<typeof addressPayloadSchema>;
export type RegistrySummary = z.infer<typeof registrySummarySchema>;
