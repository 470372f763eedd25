import {
  ESCROW_ACCOUNT,
  type RegistryReader,
  type RegistryStore,
  type RegistryWriter,
  type TaskRecord
} from '@taskescrow/task-db';
import { ServiceError, forbidden, invalidInput, invalidState, notFound } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { systemClock, type Clock } from './clock.js';
import { RegistryEvents, type RegistryEvent, type RegistryEventListener } from './events.js';
import {
  MAX_PLATFORM_FEE_PERCENTAGE,
  assertTransition,
  confirmCompletion,
  isValidFeePercentage,
  splitReward
} from './lifecycle.js';
import { LedgerTransfer, type ValueTransfer } from './transfer.js';

export interface CreateTaskInput {
  title: string;
  description: string;
  /** Epoch milliseconds; must be later than the current time. */
  deadline: number;
  reward: bigint;
}

export interface RegistrySummary {
  owner: string;
  platformFeePercentage: number;
  totalTasks: number;
  escrowBalance: bigint;
}

export interface TaskRegistryOptions {
  store: RegistryStore;
  owner: string;
  /** Applied only when the store is initialized for the first time. */
  platformFeePercentage: number;
  transfers?: ValueTransfer;
  clock?: Clock;
  logger?: Logger;
}

interface UnitOfWork {
  ledger: RegistryWriter;
  emit(event: RegistryEvent): void;
}

const loadTask = async (reader: RegistryReader, taskId: number): Promise<TaskRecord> => {
  const task = await reader.getTask(taskId);
  if (!task) {
    throw notFound(`Task ${taskId} not found`);
  }
  return task;
};

/**
 * Escrowed task lifecycle. Every mutating call is one store transaction:
 * task, counter, settings and balance writes commit together, and events are
 * delivered only after the commit.
 */
export class TaskRegistry {
  private readonly events: RegistryEvents;

  private constructor(
    private readonly store: RegistryStore,
    private readonly transfers: ValueTransfer,
    private readonly clock: Clock,
    private readonly logger: Logger
  ) {
    this.events = new RegistryEvents(logger);
  }

  static async open(options: TaskRegistryOptions): Promise<TaskRegistry> {
    if (!isValidFeePercentage(options.platformFeePercentage)) {
      throw invalidInput(`Platform fee must be an integer between 0 and ${MAX_PLATFORM_FEE_PERCENTAGE}`);
    }
    const logger = options.logger ?? createLogger('task-registry');
    const settings = await options.store.initialize({
      owner: options.owner,
      platform_fee_percentage: options.platformFeePercentage,
      task_counter: 0
    });
    if (settings.owner !== options.owner) {
      throw new Error(`Registry owner is fixed to ${settings.owner}; refusing to open it for ${options.owner}`);
    }
    if (settings.platform_fee_percentage !== options.platformFeePercentage) {
      logger.info(
        { persisted: settings.platform_fee_percentage, configured: options.platformFeePercentage },
        'Using persisted platform fee'
      );
    }
    return new TaskRegistry(
      options.store,
      options.transfers ?? new LedgerTransfer(),
      options.clock ?? systemClock,
      logger
    );
  }

  onEvent(listener: RegistryEventListener): () => void {
    return this.events.subscribe(listener);
  }

  createTask(input: CreateTaskInput, caller: string): Promise<TaskRecord> {
    return this.mutate<TaskRecord>('createTask', caller, async ({ ledger, emit }) => {
      if (input.reward <= 0n) {
        throw invalidInput('Reward must be greater than zero');
      }
      if (input.title.length === 0) {
        throw invalidInput('Title must not be empty');
      }
      const now = this.clock.now();
      if (input.deadline <= now) {
        throw invalidInput('Deadline must be in the future');
      }

      const settings = await ledger.getSettings();
      const task: TaskRecord = {
        id: settings.task_counter + 1,
        title: input.title,
        description: input.description,
        reward: input.reward.toString(),
        client: caller,
        freelancer: null,
        status: 'open',
        deadline: input.deadline,
        freelancer_submitted: false,
        client_approved: false,
        created_at: now
      };

      await this.transfers.transfer(ledger, caller, ESCROW_ACCOUNT, input.reward);
      await ledger.insertTask(task);
      await ledger.updateSettings({ task_counter: task.id });
      await ledger.appendUserTask(caller, task.id);
      emit({ type: 'TaskCreated', taskId: task.id, client: caller, title: task.title, reward: input.reward });
      return task;
    });
  }

  acceptTask(taskId: number, caller: string): Promise<TaskRecord> {
    return this.mutate<TaskRecord>('acceptTask', caller, async ({ ledger, emit }) => {
      const task = await loadTask(ledger, taskId);
      if (task.status !== 'open') {
        throw invalidState(`Task ${taskId} is ${task.status}, not open`);
      }
      if (caller === task.client) {
        throw forbidden('A client cannot accept their own task');
      }
      if (this.clock.now() >= task.deadline) {
        throw invalidState(`Task ${taskId} deadline has passed`);
      }
      assertTransition(task, 'assigned');

      const updated: TaskRecord = { ...task, freelancer: caller, status: 'assigned' };
      await ledger.updateTask(taskId, { freelancer: caller, status: 'assigned' });
      await ledger.appendUserTask(caller, taskId);
      emit({ type: 'TaskAssigned', taskId, freelancer: caller });
      return updated;
    });
  }

  /**
   * Records the caller's half of the dual confirmation. Payout happens on the
   * call that completes the pair; the fee uses the percentage in effect now.
   */
  completeTask(taskId: number, caller: string): Promise<TaskRecord> {
    return this.mutate<TaskRecord>('completeTask', caller, async ({ ledger, emit }) => {
      const task = await loadTask(ledger, taskId);
      const confirmation = confirmCompletion(task, caller);
      const flags = {
        freelancer_submitted: confirmation.freelancer_submitted,
        client_approved: confirmation.client_approved
      };

      if (!confirmation.completes) {
        await ledger.updateTask(taskId, flags);
        return { ...task, ...flags };
      }

      assertTransition(task, 'completed');
      const { owner, platform_fee_percentage } = await ledger.getSettings();
      const split = splitReward(BigInt(task.reward), platform_fee_percentage);
      const freelancer = confirmation.freelancer;

      await ledger.updateTask(taskId, { ...flags, status: 'completed' });
      await this.transfers.transfer(ledger, ESCROW_ACCOUNT, freelancer, split.freelancerAmount);
      await this.transfers.transfer(ledger, ESCROW_ACCOUNT, owner, split.platformFee);
      await ledger.incrementCompleted(freelancer);
      await ledger.incrementCompleted(task.client);
      emit({ type: 'TaskCompleted', taskId, freelancer, client: task.client });
      emit({ type: 'PaymentReleased', taskId, freelancer, amount: split.freelancerAmount });
      return { ...task, ...flags, status: 'completed' };
    });
  }

  cancelTask(taskId: number, caller: string): Promise<TaskRecord> {
    return this.mutate<TaskRecord>('cancelTask', caller, async ({ ledger, emit }) => {
      const task = await loadTask(ledger, taskId);
      if (caller !== task.client) {
        throw forbidden('Only the client can cancel a task');
      }
      if (task.status !== 'open') {
        throw invalidState(`Task ${taskId} is ${task.status}, not open`);
      }
      assertTransition(task, 'cancelled');

      await ledger.updateTask(taskId, { status: 'cancelled' });
      await this.transfers.transfer(ledger, ESCROW_ACCOUNT, task.client, BigInt(task.reward));
      emit({ type: 'TaskCancelled', taskId, client: task.client });
      return { ...task, status: 'cancelled' };
    });
  }

  updatePlatformFee(newFee: number, caller: string): Promise<number> {
    return this.mutate('updatePlatformFee', caller, async ({ ledger }) => {
      const { owner } = await ledger.getSettings();
      if (caller !== owner) {
        throw forbidden('Only the owner can update the platform fee');
      }
      if (!isValidFeePercentage(newFee)) {
        throw invalidInput(`Platform fee must be an integer between 0 and ${MAX_PLATFORM_FEE_PERCENTAGE}`);
      }
      await ledger.updateSettings({ platform_fee_percentage: newFee });
      return newFee;
    });
  }

  /** Sweeps the whole escrow balance to the owner, whichever tasks it backs. */
  emergencyWithdraw(caller: string): Promise<bigint> {
    return this.mutate('emergencyWithdraw', caller, async ({ ledger }) => {
      const { owner } = await ledger.getSettings();
      if (caller !== owner) {
        throw forbidden('Only the owner can withdraw escrow');
      }
      const amount = await ledger.getBalance(ESCROW_ACCOUNT);
      await this.transfers.transfer(ledger, ESCROW_ACCOUNT, owner, amount);
      this.logger.warn({ owner, amount: amount.toString() }, 'Escrow swept by emergency withdrawal');
      return amount;
    });
  }

  getTask(taskId: number): Promise<TaskRecord> {
    return this.store.read((reader) => loadTask(reader, taskId));
  }

  getUserTasks(account: string): Promise<number[]> {
    return this.store.read((reader) => reader.listUserTasks(account));
  }

  getTotalTasks(): Promise<number> {
    return this.store.read(async (reader) => (await reader.getSettings()).task_counter);
  }

  getCompletedTasksCount(account: string): Promise<number> {
    return this.store.read((reader) => reader.getCompletedCount(account));
  }

  getPlatformFee(): Promise<number> {
    return this.store.read(async (reader) => (await reader.getSettings()).platform_fee_percentage);
  }

  getOwner(): Promise<string> {
    return this.store.read(async (reader) => (await reader.getSettings()).owner);
  }

  getEscrowBalance(): Promise<bigint> {
    return this.store.read((reader) => reader.getBalance(ESCROW_ACCOUNT));
  }

  getSummary(): Promise<RegistrySummary> {
    return this.store.read(async (reader) => {
      const settings = await reader.getSettings();
      return {
        owner: settings.owner,
        platformFeePercentage: settings.platform_fee_percentage,
        totalTasks: settings.task_counter,
        escrowBalance: await reader.getBalance(ESCROW_ACCOUNT)
      };
    });
  }

  private async mutate<T>(
    operation: string,
    caller: string,
    work: (unit: UnitOfWork) => Promise<T>
  ): Promise<T> {
    const pending: RegistryEvent[] = [];
    let result: T;
    try {
      result = await this.store.transaction((ledger) => work({ ledger, emit: (event) => pending.push(event) }));
    } catch (error) {
      if (error instanceof ServiceError) {
        this.logger.debug({ operation, caller, code: error.code, reason: error.message }, 'Registry operation rejected');
      } else {
        this.logger.error({ err: error, operation, caller }, 'Registry operation failed');
      }
      throw error;
    }
    this.logger.info({ operation, caller, events: pending.map((event) => event.type) }, 'Registry operation committed');
    this.events.publish(pending);
    return result;
  }
}
