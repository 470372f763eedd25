import { config as loadEnv } from 'dotenv';
import { getAddress, isAddress, type Address } from 'viem';
import { MAX_PLATFORM_FEE_PERCENTAGE } from './registry/lifecycle.js';

loadEnv();

export interface ServiceConfig {
  port: number;
  host: string;
  /** Postgres connection string; the in-memory store is used when absent. */
  databaseUrl: string | null;
  ownerAddress: Address;
  platformFeePercentage: number;
  signatureTtlMs: number;
  blockedRecipients: Address[];
  logLevel: string;
  /** Serve the MCP tools over stdio next to HTTP; logs then go to stderr. */
  enableMcp: boolean;
}

type Env = Record<string, string | undefined>;

const requireEnv = (env: Env, key: string): string => {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable ${key}`);
  }
  return value;
};

const parseAddress = (key: string, value: string): Address => {
  const trimmed = value.trim();
  if (!isAddress(trimmed, { strict: false })) {
    throw new Error(`${key} must be an address, got "${value}"`);
  }
  return getAddress(trimmed);
};

const parseInteger = (env: Env, key: string, fallback: number, min: number, max: number): number => {
  const raw = env[key];
  const value = raw === undefined || raw === '' ? fallback : Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${key} must be an integer between ${min} and ${max}`);
  }
  return value;
};

export const loadConfig = (env: Env = process.env): ServiceConfig => {
  const blocked = env.BLOCKED_RECIPIENTS ?? '';
  return {
    port: parseInteger(env, 'PORT', 3000, 0, 65535),
    host: env.HOST ?? '0.0.0.0',
    databaseUrl: env.DATABASE_URL || null,
    ownerAddress: parseAddress('OWNER_ADDRESS', requireEnv(env, 'OWNER_ADDRESS')),
    platformFeePercentage: parseInteger(env, 'PLATFORM_FEE_PERCENTAGE', 5, 0, MAX_PLATFORM_FEE_PERCENTAGE),
    signatureTtlMs: parseInteger(env, 'SIGNATURE_TTL_MS', 5 * 60 * 1000, 1000, 24 * 60 * 60 * 1000),
    blockedRecipients: blocked
      .split(',')
      .filter((entry) => entry.trim().length > 0)
      .map((entry) => parseAddress('BLOCKED_RECIPIENTS', entry)),
    logLevel: env.LOG_LEVEL ?? 'info',
    enableMcp: env.ENABLE_MCP === 'true'
  };
};
