export { TaskRegistry, type CreateTaskInput, type RegistrySummary, type TaskRegistryOptions } from './task-registry.js';
export { AccountLedger } from './ledger.js';
export { LedgerTransfer, type ValueTransfer } from './transfer.js';
export { systemClock, type Clock } from './clock.js';
export type { RegistryEvent, RegistryEventListener, RegistryEventType } from './events.js';
export {
  MAX_PLATFORM_FEE_PERCENTAGE,
  TASK_TRANSITIONS,
  canTransition,
  isTerminalStatus,
  splitReward
} from './lifecycle.js';
