type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

type CanonicalInput =
  | string
  | number
  | boolean
  | null
  | undefined
  | CanonicalInput[]
  | { [key: string]: CanonicalInput };

const byKey = ([a]: [string, unknown], [b]: [string, unknown]): number => (a < b ? -1 : a > b ? 1 : 0);

const canonicalize = (value: CanonicalInput): JsonValue => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }

  const normalized: Record<string, JsonValue> = {};
  for (const [key, val] of Object.entries(value).filter(([, v]) => v !== undefined).sort(byKey)) {
    normalized[key] = canonicalize(val);
  }
  return normalized;
};

export const canonicalStringify = (payload: CanonicalInput): string => JSON.stringify(canonicalize(payload));

/** Replay-protection fields every signed request carries. */
export interface EnvelopeFields {
  requestId: string;
  issuedAt: number;
}

export type TaskActionKind = 'task:accept' | 'task:complete' | 'task:cancel';

export interface CreateTaskSigningInput extends EnvelopeFields {
  title: string;
  description: string;
  deadline: number;
  reward: string;
}

export const createTaskSignaturePayload = (input: CreateTaskSigningInput): string =>
  canonicalStringify({
    kind: 'task:create',
    title: input.title,
    description: input.description,
    deadline: input.deadline,
    reward: input.reward,
    requestId: input.requestId,
    issuedAt: input.issuedAt
  });

export const taskActionSignaturePayload = (
  kind: TaskActionKind,
  input: EnvelopeFields & { taskId: number }
): string =>
  canonicalStringify({
    kind,
    taskId: input.taskId,
    requestId: input.requestId,
    issuedAt: input.issuedAt
  });

export const feeUpdateSignaturePayload = (input: EnvelopeFields & { platformFeePercentage: number }): string =>
  canonicalStringify({
    kind: 'registry:fee',
    platformFeePercentage: input.platformFeePercentage,
    requestId: input.requestId,
    issuedAt: input.issuedAt
  });

export const emergencyWithdrawSignaturePayload = (input: EnvelopeFields): string =>
  canonicalStringify({
    kind: 'registry:emergency-withdraw',
    requestId: input.requestId,
    issuedAt: input.issuedAt
  });

export const fundAccountSignaturePayload = (input: EnvelopeFields & { account: string; amount: string }): string =>
  canonicalStringify({
    kind: 'ledger:fund',
    account: input.account,
    amount: input.amount,
    requestId: input.requestId,
    issuedAt: input.issuedAt
  });
