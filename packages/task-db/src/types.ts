import { z } from 'zod';

export const taskStatusSchema = z.enum(['open', 'assigned', 'completed', 'disputed', 'cancelled']);
export type TaskStatus = z.infer<typeof taskStatusSchema>;

export const amountStringSchema = z.string().regex(/^[0-9]+$/, 'amount must be an integer string');

export const taskRecordSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string(),
  reward: amountStringSchema,
  client: z.string(),
  freelancer: z.string().nullable(),
  status: taskStatusSchema,
  deadline: z.number().int(),
  freelancer_submitted: z.boolean(),
  client_approved: z.boolean(),
  created_at: z.number().int()
});
export type TaskRecord = z.infer<typeof taskRecordSchema>;

export const registrySettingsSchema = z.object({
  owner: z.string(),
  platform_fee_percentage: z.number().int().min(0).max(10),
  task_counter: z.number().int().nonnegative()
});
export type RegistrySettings = z.infer<typeof registrySettingsSchema>;

export type TaskPatch = Partial<
  Pick<TaskRecord, 'freelancer' | 'status' | 'freelancer_submitted' | 'client_approved'>
>;

export type SettingsPatch = Partial<Pick<RegistrySettings, 'platform_fee_percentage' | 'task_counter'>>;

/** Ledger account holding every escrowed reward. */
export const ESCROW_ACCOUNT = 'escrow';

export interface RegistryReader {
  getSettings(): Promise<RegistrySettings>;
  getTask(id: number): Promise<TaskRecord | null>;
  listUserTasks(account: string): Promise<number[]>;
  getCompletedCount(account: string): Promise<number>;
  getBalance(account: string): Promise<bigint>;
}

export interface RegistryWriter extends RegistryReader {
  insertTask(task: TaskRecord): Promise<void>;
  updateTask(id: number, patch: TaskPatch): Promise<void>;
  appendUserTask(account: string, taskId: number): Promise<void>;
  incrementCompleted(account: string): Promise<void>;
  updateSettings(patch: SettingsPatch): Promise<void>;
  setBalance(account: string, amount: bigint): Promise<void>;
}

/**
 * Persistence for the registry. `transaction` runs one unit of work at a time
 * and commits all of its writes or none of them; `read` observes the last
 * committed state.
 */
export interface RegistryStore {
  /** Stores `defaults` on first use and returns the persisted settings. */
  initialize(defaults: RegistrySettings): Promise<RegistrySettings>;
  read<T>(work: (reader: RegistryReader) => Promise<T>): Promise<T>;
  transaction<T>(work: (writer: RegistryWriter) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export class StoreNotInitializedError extends Error {
  constructor() {
    super('Registry store is not initialized');
  }
}
