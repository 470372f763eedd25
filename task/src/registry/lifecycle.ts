import type { TaskRecord, TaskStatus } from '@taskescrow/task-db';
import { forbidden, invalidState } from '../errors.js';

export const MAX_PLATFORM_FEE_PERCENTAGE = 10;

/**
 * Allowed status changes. `disputed` is reserved: nothing moves a task into or
 * out of it.
 */
export const TASK_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  open: ['assigned', 'cancelled'],
  assigned: ['completed'],
  completed: [],
  disputed: [],
  cancelled: []
};

export const isTerminalStatus = (status: TaskStatus): boolean => TASK_TRANSITIONS[status].length === 0;

export const canTransition = (from: TaskStatus, to: TaskStatus): boolean => TASK_TRANSITIONS[from].includes(to);

export const assertTransition = (task: TaskRecord, to: TaskStatus): void => {
  if (!canTransition(task.status, to)) {
    throw invalidState(`Task ${task.id} cannot move from ${task.status} to ${to}`);
  }
};

export const isValidFeePercentage = (value: number): boolean =>
  Number.isInteger(value) && value >= 0 && value <= MAX_PLATFORM_FEE_PERCENTAGE;

export interface PayoutSplit {
  freelancerAmount: bigint;
  platformFee: bigint;
}

/** Fee is rounded down; the freelancer receives the remainder. */
export const splitReward = (reward: bigint, feePercentage: number): PayoutSplit => {
  const platformFee = (reward * BigInt(feePercentage)) / 100n;
  return { freelancerAmount: reward - platformFee, platformFee };
};

export interface ConfirmationOutcome {
  role: 'freelancer' | 'client';
  freelancer: string;
  freelancer_submitted: boolean;
  client_approved: boolean;
  /** Set only on the call that flips the second of the two flags. */
  completes: boolean;
}

const outcome = (
  task: TaskRecord,
  role: ConfirmationOutcome['role'],
  freelancer: string,
  submitted: boolean,
  approved: boolean
): ConfirmationOutcome => ({
  role,
  freelancer,
  freelancer_submitted: submitted,
  client_approved: approved,
  completes: submitted && approved && !(task.freelancer_submitted && task.client_approved)
});

/**
 * Applies one side of the dual confirmation. The freelancer submits, the
 * client approves after submission; both are only accepted while the task is
 * assigned.
 */
export const confirmCompletion = (task: TaskRecord, caller: string): ConfirmationOutcome => {
  if (task.freelancer !== null && caller === task.freelancer) {
    if (task.status !== 'assigned') {
      throw invalidState(`Task ${task.id} is ${task.status}, not assigned`);
    }
    return outcome(task, 'freelancer', task.freelancer, true, task.client_approved);
  }

  if (caller === task.client) {
    if (!task.freelancer_submitted || task.freelancer === null) {
      throw invalidState(`Task ${task.id} has no submitted work to approve`);
    }
    if (task.status !== 'assigned') {
      throw invalidState(`Task ${task.id} is ${task.status}, not assigned`);
    }
    return outcome(task, 'client', task.freelancer, true, true);
  }

  throw forbidden('Only the client or the assigned freelancer can confirm completion');
};
