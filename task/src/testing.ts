import {
  MemoryTaskStore,
  createTaskSignaturePayload,
  emergencyWithdrawSignaturePayload,
  feeUpdateSignaturePayload,
  fundAccountSignaturePayload,
  taskActionSignaturePayload,
  type TaskActionKind
} from '@taskescrow/task-db';
import { v4 as uuidv4 } from 'uuid';
import type { Address } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import type { ServiceConfig } from './config.js';
import type { AppContext } from './context.js';
import { silentLogger } from './logger.js';
import { AccountLedger, LedgerTransfer, TaskRegistry, type Clock } from './registry/index.js';
import { ReplayGuard } from './replay.js';

// Helpers shared by the service, HTTP and MCP tests.

export const NOW = 1_700_000_000_000;
export const DEADLINE = NOW + 60 * 60 * 1000;

export const ownerAccount = privateKeyToAccount(`0x${'0a'.repeat(32)}`);
export const clientAccount = privateKeyToAccount(`0x${'11'.repeat(32)}`);
export const freelancerAccount = privateKeyToAccount(`0x${'22'.repeat(32)}`);

export class ManualClock implements Clock {
  constructor(public current: number) {}

  now(): number {
    return this.current;
  }
}

export type TestContext = AppContext & { clock: ManualClock };

export const makeTestContext = async (overrides: Partial<ServiceConfig> = {}): Promise<TestContext> => {
  const config: ServiceConfig = {
    port: 0,
    host: '127.0.0.1',
    databaseUrl: null,
    ownerAddress: ownerAccount.address,
    platformFeePercentage: 5,
    signatureTtlMs: 300_000,
    blockedRecipients: [],
    logLevel: 'silent',
    enableMcp: false,
    ...overrides
  };
  const store = new MemoryTaskStore();
  const clock = new ManualClock(NOW);
  const registry = await TaskRegistry.open({
    store,
    owner: config.ownerAddress,
    platformFeePercentage: config.platformFeePercentage,
    transfers: new LedgerTransfer(config.blockedRecipients),
    clock,
    logger: silentLogger()
  });
  const ledger = new AccountLedger(store, silentLogger());
  return { config, registry, ledger, replayGuard: new ReplayGuard(), clock };
};

export const fund = (ctx: AppContext, account: Address, amount: bigint) =>
  ctx.ledger.fundAccount(account, amount, ctx.config.ownerAddress);

export const taskInput = (reward = '100') => ({
  title: 'Design a logo',
  description: 'Vector logo for the landing page',
  deadline: DEADLINE,
  reward
});

const envelopeFields = (issuedAt: number) => ({ requestId: uuidv4(), issuedAt });

export const signCreateTask = async (
  account: PrivateKeyAccount,
  input: ReturnType<typeof taskInput>,
  issuedAt = NOW
) => {
  const fields = { ...input, ...envelopeFields(issuedAt) };
  const signature = await account.signMessage({ message: createTaskSignaturePayload(fields) });
  return { ...fields, caller: account.address, signature };
};

export const signTaskAction = async (
  account: PrivateKeyAccount,
  kind: TaskActionKind,
  taskId: number,
  issuedAt = NOW
) => {
  const fields = { taskId, ...envelopeFields(issuedAt) };
  const signature = await account.signMessage({ message: taskActionSignaturePayload(kind, fields) });
  return { ...fields, caller: account.address, signature };
};

export const signFeeUpdate = async (account: PrivateKeyAccount, platformFeePercentage: number, issuedAt = NOW) => {
  const fields = { platformFeePercentage, ...envelopeFields(issuedAt) };
  const signature = await account.signMessage({ message: feeUpdateSignaturePayload(fields) });
  return { ...fields, caller: account.address, signature };
};

export const signEmergencyWithdraw = async (account: PrivateKeyAccount, issuedAt = NOW) => {
  const fields = envelopeFields(issuedAt);
  const signature = await account.signMessage({ message: emergencyWithdrawSignaturePayload(fields) });
  return { ...fields, caller: account.address, signature };
};

export const signFundAccount = async (
  account: PrivateKeyAccount,
  target: Address,
  amount: string,
  issuedAt = NOW
) => {
  const fields = { account: target, amount, ...envelopeFields(issuedAt) };
  const signature = await account.signMessage({ message: fundAccountSignaturePayload(fields) });
  return { ...fields, caller: account.address, signature };
};
