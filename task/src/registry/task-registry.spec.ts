import { describe, expect, it } from 'vitest';
import { MemoryTaskStore } from '@taskescrow/task-db';
import { silentLogger } from '../logger.js';
import { ManualClock } from '../testing.js';
import type { RegistryEvent } from './events.js';
import { AccountLedger } from './ledger.js';
import { TaskRegistry } from './task-registry.js';
import { LedgerTransfer, type ValueTransfer } from './transfer.js';

const OWNER = '0x00000000000000000000000000000000000000aa';
const CLIENT = '0x00000000000000000000000000000000000000bb';
const FREELANCER = '0x00000000000000000000000000000000000000cc';
const OTHER = '0x00000000000000000000000000000000000000dd';

const NOW = 1_700_000_000_000;
const DEADLINE = NOW + 60_000;

const setup = async (options: { fee?: number; transfers?: ValueTransfer } = {}) => {
  const store = new MemoryTaskStore();
  const clock = new ManualClock(NOW);
  const logger = silentLogger();
  const registry = await TaskRegistry.open({
    store,
    owner: OWNER,
    platformFeePercentage: options.fee ?? 5,
    transfers: options.transfers,
    clock,
    logger
  });
  const ledger = new AccountLedger(store, logger);
  await ledger.fundAccount(CLIENT, 1_000n, OWNER);
  const events: RegistryEvent[] = [];
  registry.onEvent((event) => events.push(event));
  return { store, clock, registry, ledger, events, logger };
};

const createTask = (registry: TaskRegistry, reward = 100n) =>
  registry.createTask({ title: 'Write tests', description: 'Cover the registry', deadline: DEADLINE, reward }, CLIENT);

/** Creates, assigns and submits a task, leaving it waiting for client approval. */
const submittedTask = async (registry: TaskRegistry, reward = 100n) => {
  const task = await createTask(registry, reward);
  await registry.acceptTask(task.id, FREELANCER);
  await registry.completeTask(task.id, FREELANCER);
  return task.id;
};

describe('TaskRegistry.open', () => {
  it('refuses a different owner for an initialized store', async () => {
    const { store, logger } = await setup();

    await expect(TaskRegistry.open({ store, owner: OTHER, platformFeePercentage: 5, logger })).rejects.toThrow(
      `Registry owner is fixed to ${OWNER}`
    );
  });

  it('keeps the persisted fee when reopened', async () => {
    const { store, logger } = await setup();

    const reopened = await TaskRegistry.open({ store, owner: OWNER, platformFeePercentage: 7, logger });

    expect(await reopened.getPlatformFee()).toBe(5);
  });

  it('rejects an out-of-range initial fee', async () => {
    await expect(
      TaskRegistry.open({ store: new MemoryTaskStore(), owner: OWNER, platformFeePercentage: 11, logger: silentLogger() })
    ).rejects.toMatchObject({ code: 'invalid_input' });
  });
});

describe('createTask', () => {
  it('allocates sequential ids and escrows each reward', async () => {
    const { registry, ledger, events } = await setup();

    const first = await createTask(registry, 100n);
    const second = await createTask(registry, 50n);

    expect([first.id, second.id]).toEqual([1, 2]);
    expect(first).toEqual({
      id: 1,
      title: 'Write tests',
      description: 'Cover the registry',
      reward: '100',
      client: CLIENT,
      freelancer: null,
      status: 'open',
      deadline: DEADLINE,
      freelancer_submitted: false,
      client_approved: false,
      created_at: NOW
    });
    expect(await registry.getTotalTasks()).toBe(2);
    expect(await registry.getUserTasks(CLIENT)).toEqual([1, 2]);
    expect(await ledger.getBalance(CLIENT)).toBe(850n);
    expect(await registry.getEscrowBalance()).toBe(150n);
    expect(events[0]).toEqual({ type: 'TaskCreated', taskId: 1, client: CLIENT, title: 'Write tests', reward: 100n });
  });

  it('rejects a zero reward without changing state', async () => {
    const { registry, ledger, events } = await setup();

    await expect(createTask(registry, 0n)).rejects.toMatchObject({ code: 'invalid_input' });

    expect(await registry.getTotalTasks()).toBe(0);
    expect(await ledger.getBalance(CLIENT)).toBe(1_000n);
    expect(events).toEqual([]);
  });

  it('rejects a deadline that is not in the future', async () => {
    const { registry } = await setup();

    await expect(
      registry.createTask({ title: 'Late', description: '', deadline: NOW, reward: 10n }, CLIENT)
    ).rejects.toMatchObject({ code: 'invalid_input', message: 'Deadline must be in the future' });
  });

  it('rejects an empty title', async () => {
    const { registry } = await setup();

    await expect(
      registry.createTask({ title: '', description: '', deadline: DEADLINE, reward: 10n }, CLIENT)
    ).rejects.toMatchObject({ code: 'invalid_input', message: 'Title must not be empty' });
  });

  it('stores any non-empty title as given', async () => {
    const { registry } = await setup();
    const longTitle = 'x'.repeat(256);

    const blank = await registry.createTask({ title: ' ', description: '', deadline: DEADLINE, reward: 10n }, CLIENT);
    const long = await registry.createTask({ title: longTitle, description: '', deadline: DEADLINE, reward: 10n }, CLIENT);

    expect(blank).toMatchObject({ id: 1, title: ' ' });
    expect(long).toMatchObject({ id: 2, title: longTitle });
  });

  it('fails the whole creation when the reward cannot be escrowed', async () => {
    const { registry, events } = await setup();

    await expect(createTask(registry, 5_000n)).rejects.toMatchObject({ code: 'transfer_failure' });

    expect(await registry.getTotalTasks()).toBe(0);
    expect(await registry.getUserTasks(CLIENT)).toEqual([]);
    expect(await registry.getEscrowBalance()).toBe(0n);
    expect(events).toEqual([]);
  });
});

describe('acceptTask', () => {
  it('assigns the caller as freelancer', async () => {
    const { registry, events } = await setup();
    const task = await createTask(registry);

    const assigned = await registry.acceptTask(task.id, FREELANCER);

    expect(assigned.status).toBe('assigned');
    expect(assigned.freelancer).toBe(FREELANCER);
    expect(await registry.getUserTasks(FREELANCER)).toEqual([task.id]);
    expect(events.at(-1)).toEqual({ type: 'TaskAssigned', taskId: task.id, freelancer: FREELANCER });
  });

  it('does not let the client accept their own task', async () => {
    const { registry } = await setup();
    const task = await createTask(registry);

    await expect(registry.acceptTask(task.id, CLIENT)).rejects.toMatchObject({ code: 'unauthorized' });
    expect((await registry.getTask(task.id)).status).toBe('open');
  });

  it('rejects tasks that are no longer open', async () => {
    const { registry } = await setup();
    const task = await createTask(registry);
    await registry.acceptTask(task.id, FREELANCER);

    await expect(registry.acceptTask(task.id, OTHER)).rejects.toMatchObject({ code: 'invalid_state' });
  });

  it('closes acceptance at the deadline', async () => {
    const { registry, clock } = await setup();
    const task = await createTask(registry);

    clock.current = DEADLINE;
    await expect(registry.acceptTask(task.id, FREELANCER)).rejects.toMatchObject({ code: 'invalid_state' });

    clock.current = DEADLINE - 1;
    await expect(registry.acceptTask(task.id, FREELANCER)).resolves.toMatchObject({ status: 'assigned' });
  });

  it('reports unknown tasks', async () => {
    const { registry } = await setup();

    await expect(registry.acceptTask(42, FREELANCER)).rejects.toMatchObject({ code: 'not_found' });
  });

  it('assigns exactly one of two concurrent freelancers', async () => {
    const { registry } = await setup();
    const task = await createTask(registry);

    const results = await Promise.allSettled([
      registry.acceptTask(task.id, FREELANCER),
      registry.acceptTask(task.id, OTHER)
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    expect((await registry.getTask(task.id)).freelancer).toBe(FREELANCER);
  });
});

describe('completeTask', () => {
  it('pays out only once both sides confirm', async () => {
    const { registry, ledger, events } = await setup();
    const task = await createTask(registry, 10n);
    await registry.acceptTask(task.id, FREELANCER);

    const submitted = await registry.completeTask(task.id, FREELANCER);
    expect(submitted).toMatchObject({ status: 'assigned', freelancer_submitted: true, client_approved: false });
    expect(await ledger.getBalance(FREELANCER)).toBe(0n);

    const completed = await registry.completeTask(task.id, CLIENT);
    expect(completed).toMatchObject({ status: 'completed', freelancer_submitted: true, client_approved: true });
    expect(await ledger.getBalance(FREELANCER)).toBe(10n);
    expect(await ledger.getBalance(OWNER)).toBe(0n);
    expect(await registry.getCompletedTasksCount(FREELANCER)).toBe(1);
    expect(await registry.getCompletedTasksCount(CLIENT)).toBe(1);
    expect(events.map((event) => event.type)).toEqual([
      'TaskCreated',
      'TaskAssigned',
      'TaskCompleted',
      'PaymentReleased'
    ]);
    expect(events[3]).toEqual({ type: 'PaymentReleased', taskId: task.id, freelancer: FREELANCER, amount: 10n });
  });

  it('splits the reward between freelancer and owner', async () => {
    const { registry, ledger } = await setup();
    const taskId = await submittedTask(registry, 100n);

    await registry.completeTask(taskId, CLIENT);

    expect(await ledger.getBalance(FREELANCER)).toBe(95n);
    expect(await ledger.getBalance(OWNER)).toBe(5n);
    expect(await registry.getEscrowBalance()).toBe(0n);
  });

  it('applies the fee in effect at payout', async () => {
    const { registry, ledger } = await setup();
    const taskId = await submittedTask(registry, 100n);

    await registry.updatePlatformFee(10, OWNER);
    await registry.completeTask(taskId, CLIENT);

    expect(await ledger.getBalance(FREELANCER)).toBe(90n);
    expect(await ledger.getBalance(OWNER)).toBe(10n);
  });

  it('conserves value across many payouts', async () => {
    const { registry, ledger } = await setup();

    for (const reward of [1n, 7n, 10n, 39n, 100n]) {
      const taskId = await submittedTask(registry, reward);
      await registry.completeTask(taskId, CLIENT);
    }

    expect(await ledger.getBalance(FREELANCER)).toBe(151n);
    expect(await ledger.getBalance(OWNER)).toBe(6n);
    expect(await ledger.getBalance(CLIENT)).toBe(843n);
    expect(await registry.getEscrowBalance()).toBe(0n);
    expect(await registry.getCompletedTasksCount(FREELANCER)).toBe(5);
  });

  it('rejects approval before the freelancer submits', async () => {
    const { registry } = await setup();
    const task = await createTask(registry);
    await registry.acceptTask(task.id, FREELANCER);

    await expect(registry.completeTask(task.id, CLIENT)).rejects.toMatchObject({ code: 'invalid_state' });
  });

  it('lets the freelancer resubmit without paying out', async () => {
    const { registry, ledger, events } = await setup();
    const taskId = await submittedTask(registry);

    const again = await registry.completeTask(taskId, FREELANCER);

    expect(again).toMatchObject({ status: 'assigned', freelancer_submitted: true, client_approved: false });
    expect(await ledger.getBalance(FREELANCER)).toBe(0n);
    expect(events.map((event) => event.type)).toEqual(['TaskCreated', 'TaskAssigned']);
  });

  it('rejects every confirmation after completion', async () => {
    const { registry, ledger } = await setup();
    const taskId = await submittedTask(registry);
    await registry.completeTask(taskId, CLIENT);

    await expect(registry.completeTask(taskId, FREELANCER)).rejects.toMatchObject({ code: 'invalid_state' });
    await expect(registry.completeTask(taskId, CLIENT)).rejects.toMatchObject({ code: 'invalid_state' });
    expect(await ledger.getBalance(FREELANCER)).toBe(95n);
  });

  it('pays out once under concurrent approvals', async () => {
    const { registry, ledger } = await setup();
    const taskId = await submittedTask(registry);

    const results = await Promise.allSettled([
      registry.completeTask(taskId, CLIENT),
      registry.completeTask(taskId, CLIENT)
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    expect(await ledger.getBalance(FREELANCER)).toBe(95n);
    expect(await ledger.getBalance(OWNER)).toBe(5n);
  });

  it('rejects callers outside the task', async () => {
    const { registry } = await setup();
    const taskId = await submittedTask(registry);

    await expect(registry.completeTask(taskId, OTHER)).rejects.toMatchObject({ code: 'unauthorized' });
  });

  it('leaves the task untouched when the payout fails', async () => {
    const { registry, events } = await setup({ transfers: new LedgerTransfer([FREELANCER]) });
    const taskId = await submittedTask(registry);

    await expect(registry.completeTask(taskId, CLIENT)).rejects.toMatchObject({ code: 'transfer_failure' });

    expect(await registry.getTask(taskId)).toMatchObject({
      status: 'assigned',
      freelancer_submitted: true,
      client_approved: false
    });
    expect(await registry.getEscrowBalance()).toBe(100n);
    expect(await registry.getCompletedTasksCount(FREELANCER)).toBe(0);
    expect(events.map((event) => event.type)).toEqual(['TaskCreated', 'TaskAssigned']);
  });
});

describe('cancelTask', () => {
  it('refunds the full reward to the client', async () => {
    const { registry, ledger, events } = await setup();
    const task = await createTask(registry, 100n);

    const cancelled = await registry.cancelTask(task.id, CLIENT);

    expect(cancelled.status).toBe('cancelled');
    expect(await ledger.getBalance(CLIENT)).toBe(1_000n);
    expect(await ledger.getBalance(OWNER)).toBe(0n);
    expect(await registry.getEscrowBalance()).toBe(0n);
    expect(events.at(-1)).toEqual({ type: 'TaskCancelled', taskId: task.id, client: CLIENT });
  });

  it('only lets the client cancel', async () => {
    const { registry } = await setup();
    const task = await createTask(registry);

    await expect(registry.cancelTask(task.id, OTHER)).rejects.toMatchObject({ code: 'unauthorized' });
  });

  it('rejects cancelling assigned or cancelled tasks', async () => {
    const { registry } = await setup();
    const assigned = await createTask(registry);
    await registry.acceptTask(assigned.id, FREELANCER);
    const cancelled = await createTask(registry);
    await registry.cancelTask(cancelled.id, CLIENT);

    await expect(registry.cancelTask(assigned.id, CLIENT)).rejects.toMatchObject({ code: 'invalid_state' });
    await expect(registry.cancelTask(cancelled.id, CLIENT)).rejects.toMatchObject({ code: 'invalid_state' });
  });
});

describe('updatePlatformFee', () => {
  it('lets the owner change the fee', async () => {
    const { registry } = await setup();

    await expect(registry.updatePlatformFee(10, OWNER)).resolves.toBe(10);
    expect(await registry.getPlatformFee()).toBe(10);
  });

  it('rejects other callers', async () => {
    const { registry } = await setup();

    await expect(registry.updatePlatformFee(3, CLIENT)).rejects.toMatchObject({ code: 'unauthorized' });
    expect(await registry.getPlatformFee()).toBe(5);
  });

  it('rejects fees outside 0 to 10', async () => {
    const { registry } = await setup();

    await expect(registry.updatePlatformFee(11, OWNER)).rejects.toMatchObject({ code: 'invalid_input' });
    await expect(registry.updatePlatformFee(2.5, OWNER)).rejects.toMatchObject({ code: 'invalid_input' });
  });
});

describe('emergencyWithdraw', () => {
  it('sweeps escrow backing open and assigned tasks', async () => {
    const { registry, ledger } = await setup();
    const assigned = await createTask(registry, 100n);
    await registry.acceptTask(assigned.id, FREELANCER);
    const open = await createTask(registry, 50n);

    await expect(registry.emergencyWithdraw(OWNER)).resolves.toBe(150n);

    expect(await ledger.getBalance(OWNER)).toBe(150n);
    expect(await registry.getEscrowBalance()).toBe(0n);
    await expect(registry.cancelTask(open.id, CLIENT)).rejects.toMatchObject({ code: 'transfer_failure' });
    expect((await registry.getTask(open.id)).status).toBe('open');
  });

  it('rejects other callers', async () => {
    const { registry } = await setup();
    await createTask(registry);

    await expect(registry.emergencyWithdraw(CLIENT)).rejects.toMatchObject({ code: 'unauthorized' });
    expect(await registry.getEscrowBalance()).toBe(100n);
  });
});

describe('events', () => {
  it('keeps delivering when a listener throws', async () => {
    const { registry, events } = await setup();
    registry.onEvent(() => {
      throw new Error('listener broke');
    });

    await expect(createTask(registry)).resolves.toMatchObject({ id: 1 });
    await registry.cancelTask(1, CLIENT);

    expect(events.map((event) => event.type)).toEqual(['TaskCreated', 'TaskCancelled']);
  });

  it('stops delivering after unsubscribe', async () => {
    const { registry } = await setup();
    const seen: string[] = [];
    const unsubscribe = registry.onEvent((event) => seen.push(event.type));

    await createTask(registry);
    unsubscribe();
    await createTask(registry);

    expect(seen).toEqual(['TaskCreated']);
  });
});

describe('getSummary', () => {
  it('reports owner, fee, counter and escrow', async () => {
    const { registry } = await setup();
    await createTask(registry, 40n);

    expect(await registry.getSummary()).toEqual({
      owner: OWNER,
      platformFeePercentage: 5,
      totalTasks: 1,
      escrowBalance: 40n
    });
  });

  it('reports a missing task as not found', async () => {
    const { registry } = await setup();

    await expect(registry.getTask(9)).rejects.toMatchObject({ code: 'not_found' });
  });
});
