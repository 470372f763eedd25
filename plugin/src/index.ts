import { fetch } from 'undici';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  createTaskSignaturePayload,
  emergencyWithdrawSignaturePayload,
  feeUpdateSignaturePayload,
  fundAccountSignaturePayload,
  taskActionSignaturePayload,
  type EnvelopeFields,
  type TaskActionKind,
  type TaskRecord
} from '@taskescrow/task-db';
import type { Address } from 'viem';
import type { Signer } from './signers.js';
import {
  addressPayloadSchema,
  balanceResponseSchema,
  createTaskPayloadSchema,
  emptyPayloadSchema,
  errorBodySchema,
  feeResponseSchema,
  feeUpdatePayloadSchema,
  fundAccountPayloadSchema,
  fundResponseSchema,
  registrySummarySchema,
  taskIdPayloadSchema,
  taskResponseSchema,
  userStatsResponseSchema,
  userTasksResponseSchema,
  withdrawResponseSchema,
  type AddressPayload,
  type CreateTaskPayload,
  type FeeUpdatePayload,
  type FundAccountPayload,
  type RegistrySummary,
  type TaskIdPayload
} from './types.js';

export { PrivateKeySigner, type Signer } from './signers.js';
export * from './types.js';

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type HttpTransport = (
  url: string,
  init: { method: 'GET' | 'POST'; headers: Record<string, string>; body?: string }
) => Promise<HttpResponse>;

export interface TaskEscrowPluginOptions {
  serviceUrl: string;
  /** Defaults to undici's fetch. */
  transport?: HttpTransport;
  now?: () => number;
  requestId?: () => string;
}

export interface PluginTool {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  /** Validates the raw input against `inputSchema` before running. */
  execute: (input: unknown) => Promise<unknown>;
}

/** Non-2xx answer from the registry service. */
export class ServiceRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(`Service error: ${message}`);
    this.name = 'ServiceRequestError';
  }
}

const normalizeUrl = (url: string) => url.replace(/\/$/, '');

const defaultTransport: HttpTransport = (url, init) => fetch(url, init);

abstract class BaseTaskEscrowPlugin {
  protected readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly now: () => number;
  private readonly nextRequestId: () => string;
  private readonly tools: PluginTool[] = [];

  constructor(protected readonly signer: Signer, options: TaskEscrowPluginOptions) {
    this.baseUrl = normalizeUrl(options.serviceUrl);
    this.transport = options.transport ?? defaultTransport;
    this.now = options.now ?? Date.now;
    this.nextRequestId = options.requestId ?? uuidv4;
    this.registerTool(
      'taskescrow.account.balance',
      'Read the ledger balance of an address (defaults to this agent)',
      addressPayloadSchema,
      (input) => this.fetchBalance(input)
    );
  }

  get address(): Address {
    return this.signer.address;
  }

  getTools(): PluginTool[] {
    return this.tools;
  }

  async executeTool(name: string, input: unknown = {}): Promise<unknown> {
    const tool = this.tools.find((t) => t.name === name);
    if (!tool) {
      throw new Error(`Tool ${name} not found`);
    }
    return tool.execute(input);
  }

  protected registerTool<TInput>(
    name: string,
    description: string,
    schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
    executor: (input: TInput) => Promise<unknown>
  ) {
    const execute = (input: unknown) => executor(schema.parse(input));
    this.tools.push({ name, description, inputSchema: schema, execute });
  }

  protected async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
    method: 'GET' | 'POST' = 'POST'
  ): Promise<T> {
    const response = await this.transport(`${this.baseUrl}${path}`, {
      method,
      headers: {
        'content-type': 'application/json'
      },
      body: body === undefined ? undefined : JSON.stringify(body)
    });
    const payload = await response.text();
    const data: unknown = payload ? JSON.parse(payload) : {};
    if (!response.ok) {
      const parsed = errorBodySchema.safeParse(data);
      throw parsed.success
        ? new ServiceRequestError(response.status, parsed.data.error, parsed.data.message)
        : new ServiceRequestError(response.status, 'http_error', response.statusText);
    }
    return schema.parse(data);
  }

  /** Adds the replay-protection fields, signs the canonical payload and names the caller. */
  protected async signEnvelope<T extends object>(fields: T, canonicalize: (input: T & EnvelopeFields) => string) {
    const withEnvelope = { ...fields, requestId: this.nextRequestId(), issuedAt: this.now() };
    const signature = await this.signer.signMessage(canonicalize(withEnvelope));
    return { ...withEnvelope, caller: this.signer.address, signature };
  }

  protected async taskAction(kind: TaskActionKind, action: string, taskId: number): Promise<TaskRecord> {
    const body = await this.signEnvelope({ taskId }, (input) => taskActionSignaturePayload(kind, input));
    return (await this.request(`/tasks/${taskId}/${action}`, taskResponseSchema, body)).task;
  }

  protected async fetchTask({ taskId }: TaskIdPayload): Promise<TaskRecord> {
    return (await this.request(`/tasks/${taskId}`, taskResponseSchema, undefined, 'GET')).task;
  }

  private async fetchBalance({ address }: AddressPayload) {
    return this.request(`/accounts/${address ?? this.signer.address}/balance`, balanceResponseSchema, undefined, 'GET');
  }
}

/** Tools for an agent that posts tasks, approves submitted work and cancels open tasks. */
export class ClientAgentPlugin extends BaseTaskEscrowPlugin {
  constructor(signer: Signer, options: TaskEscrowPluginOptions) {
    super(signer, options);
    this.registerTool(
      'taskescrow.client.task.create',
      'Post a task; the reward is escrowed from this agent balance',
      createTaskPayloadSchema,
      (input) => this.createTask(input)
    );
    this.registerTool(
      'taskescrow.client.task.approve',
      'Approve submitted work; releases the reward to the freelancer',
      taskIdPayloadSchema,
      ({ taskId }) => this.taskAction('task:complete', 'complete', taskId)
    );
    this.registerTool(
      'taskescrow.client.task.cancel',
      'Cancel an open task and get the reward refunded',
      taskIdPayloadSchema,
      ({ taskId }) => this.taskAction('task:cancel', 'cancel', taskId)
    );
    this.registerTool('taskescrow.client.task.get', 'Fetch a task by id', taskIdPayloadSchema, (input) =>
      this.fetchTask(input)
    );
    this.registerTool('taskescrow.client.tasks', 'List the ids of tasks this agent posted or accepted', emptyPayloadSchema, () =>
      this.listTasks()
    );
  }

  private async createTask(input: CreateTaskPayload): Promise<TaskRecord> {
    const body = await this.signEnvelope(input, createTaskSignaturePayload);
    return (await this.request('/tasks', taskResponseSchema, body)).task;
  }

  private async listTasks(): Promise<number[]> {
    const response = await this.request(`/users/${this.signer.address}/tasks`, userTasksResponseSchema, undefined, 'GET');
    return response.tasks;
  }
}

export class FreelancerAgentPlugin extends BaseTaskEscrowPlugin {
  constructor(signer: Signer, options: TaskEscrowPluginOptions) {
    super(signer, options);
    this.registerTool(
      'taskescrow.freelancer.task.accept',
      'Accept an open task before its deadline',
      taskIdPayloadSchema,
      ({ taskId }) => this.taskAction('task:accept', 'accept', taskId)
    );
    this.registerTool(
      'taskescrow.freelancer.task.submit',
      'Mark the work on an assigned task as submitted',
      taskIdPayloadSchema,
      ({ taskId }) => this.taskAction('task:complete', 'complete', taskId)
    );
    this.registerTool('taskescrow.freelancer.task.get', 'Fetch a task by id', taskIdPayloadSchema, (input) =>
      this.fetchTask(input)
    );
    this.registerTool(
      'taskescrow.freelancer.stats',
      'Number of tasks this agent completed',
      emptyPayloadSchema,
      () => this.request(`/users/${this.signer.address}/stats`, userStatsResponseSchema, undefined, 'GET')
    );
  }
}

/** Tools reserved to the registry owner. */
export class OperatorPlugin extends BaseTaskEscrowPlugin {
  constructor(signer: Signer, options: TaskEscrowPluginOptions) {
    super(signer, options);
    this.registerTool(
      'taskescrow.operator.fee.update',
      'Change the platform fee percentage (0 to 10)',
      feeUpdatePayloadSchema,
      (input) => this.updateFee(input)
    );
    this.registerTool(
      'taskescrow.operator.emergency_withdraw',
      'Sweep every escrowed reward to the owner account',
      emptyPayloadSchema,
      () => this.emergencyWithdraw()
    );
    this.registerTool(
      'taskescrow.operator.account.fund',
      'Credit an account after an off-platform deposit',
      fundAccountPayloadSchema,
      (input) => this.fundAccount(input)
    );
    this.registerTool(
      'taskescrow.operator.registry.summary',
      'Owner, platform fee, task count and escrow balance',
      emptyPayloadSchema,
      () => this.summary()
    );
  }

  private async updateFee(input: FeeUpdatePayload): Promise<number> {
    const body = await this.signEnvelope(input, feeUpdateSignaturePayload);
    return (await this.request('/admin/fee', feeResponseSchema, body)).platformFeePercentage;
  }

  private async emergencyWithdraw(): Promise<string> {
    const body = await this.signEnvelope({}, emergencyWithdrawSignaturePayload);
    return (await this.request('/admin/emergency-withdraw', withdrawResponseSchema, body)).amount;
  }

  private async fundAccount(input: FundAccountPayload): Promise<string> {
    const body = await this.signEnvelope(input, fundAccountSignaturePayload);
    return (await this.request(`/admin/accounts/${input.account}/fund`, fundResponseSchema, body)).balance;
  }

  private summary(): Promise<RegistrySummary> {
    return this.request('/registry', registrySummarySchema, undefined, 'GET');
  }
}
