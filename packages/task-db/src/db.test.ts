import { describe, expect, it, vi } from 'vitest';
import pg from 'pg';
import { TaskDb } from './db.js';
import { balances, tasks } from './schema.js';

const recordingClient = () => {
  const statements: string[] = [];
  const client = {
    query: async (config: string | { text: string }) => {
      statements.push(typeof config === 'string' ? config : config.text);
      return { rows: [], rowCount: 0, fields: [] };
    },
    release: vi.fn()
  };
  return { client, statements };
};

describe('TaskDb', () => {
  it('runs a read inside one read-only snapshot', async () => {
    const pool = new pg.Pool();
    const { client, statements } = recordingClient();
    vi.spyOn(pool, 'connect').mockImplementation(async () => client);
    const db = new TaskDb(pool);

    const completed = await db.read((reader) => reader.getCompletedCount('0xabc'));

    expect(completed).toBe(0);
    expect(statements[0]).toBe('begin isolation level repeatable read read only');
    expect(statements[1]).toMatch(/from "completed_tasks"/);
    expect(statements.at(-1)).toBe('commit');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('keeps titles and amounts in unbounded columns', () => {
    expect(tasks.title.getSQLType()).toBe('text');
    expect(tasks.reward.getSQLType()).toBe('text');
    expect(balances.amount.getSQLType()).toBe('text');
  });
});
