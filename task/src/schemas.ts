import { z } from 'zod';
import { amountStringSchema } from '@taskescrow/task-db';
import { getAddress, isAddress } from 'viem';

export const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), {
    message: 'Invalid address'
  })
  .transform((value) => getAddress(value));

const signatureSchema = z.string().regex(/^0x[0-9a-fA-F]{130}$/, {
  message: 'Signature must be a 65-byte hex string'
});

export const envelopeSchema = z.object({
  caller: addressSchema,
  requestId: z.string().uuid(),
  issuedAt: z.number().int().nonnegative(),
  signature: signatureSchema
});

const taskIdSchema = z.number().int().positive();

export const createTaskRequestSchema = envelopeSchema.extend({
  title: z.string().min(1),
  description: z.string().max(10_000),
  deadline: z.number().int().positive(),
  reward: amountStringSchema
});

export const taskActionRequestSchema = envelopeSchema.extend({
  taskId: taskIdSchema
});

export const feeUpdateRequestSchema = envelopeSchema.extend({
  platformFeePercentage: z.number().int()
});

export const emergencyWithdrawRequestSchema = envelopeSchema;

export const fundAccountRequestSchema = envelopeSchema.extend({
  account: addressSchema,
  amount: amountStringSchema
});

export const taskIdParamSchema = z.object({ id: z.coerce.number().int().positive() });

export const addressParamSchema = z.object({ address: addressSchema });

export const taskLookupSchema = z.object({ taskId: taskIdSchema });

export const userLookupSchema = z.object({ address: addressSchema });

export type Envelope = z.infer<typeof envelopeSchema>;
export type CreateTaskRequest = z.infer<typeof createTaskRequestSchema>;
export type TaskActionRequest = z.infer<typeof taskActionRequestSchema>;
export type FeeUpdateRequest = z.infer<typeof feeUpdateRequestSchema>;
export type EmergencyWithdrawRequest = z.infer<typeof emergencyWithdrawRequestSchema>;
export type FundAccountRequest = z.infer<typeof fundAccountRequestSchema>;
export type AddressString = z.infer<typeof addressSchema>;
