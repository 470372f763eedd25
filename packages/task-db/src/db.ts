import pg from 'pg';
import type { Pool as PgPool, PoolConfig } from 'pg';
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { asc, eq, sql } from 'drizzle-orm';
import { SerialQueue } from './queue.js';
import { balances, completedTasks, registrySettings, schema, tasks, userTasks } from './schema.js';
import {
  StoreNotInitializedError,
  registrySettingsSchema,
  taskRecordSchema,
  type RegistryReader,
  type RegistrySettings,
  type RegistryStore,
  type RegistryWriter,
  type SettingsPatch,
  type TaskPatch,
  type TaskRecord
} from './types.js';

const { Pool } = pg;

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const SETTINGS_ROW_ID = 1;

const parseTaskRow = (row: unknown): TaskRecord => taskRecordSchema.parse(row);
const parseSettingsRow = (row: unknown): RegistrySettings => registrySettingsSchema.parse(row);

class PgRegistryAccess implements RegistryWriter {
  constructor(private readonly db: Executor) {}

  async getSettings(): Promise<RegistrySettings> {
    const [row] = await this.db
      .select({
        owner: registrySettings.owner,
        platform_fee_percentage: registrySettings.platform_fee_percentage,
        task_counter: registrySettings.task_counter
      })
      .from(registrySettings)
      .where(eq(registrySettings.id, SETTINGS_ROW_ID));
    if (!row) {
      throw new StoreNotInitializedError();
    }
    return parseSettingsRow(row);
  }

  async getTask(id: number): Promise<TaskRecord | null> {
    const [row] = await this.db.select().from(tasks).where(eq(tasks.id, id));
    return row ? parseTaskRow(row) : null;
  }

  async listUserTasks(account: string): Promise<number[]> {
    const rows = await this.db
      .select({ taskId: userTasks.task_id })
      .from(userTasks)
      .where(eq(userTasks.account, account))
      .orderBy(asc(userTasks.position));
    return rows.map((row) => row.taskId);
  }

  async getCompletedCount(account: string): Promise<number> {
    const [row] = await this.db
      .select({ completed: completedTasks.completed })
      .from(completedTasks)
      .where(eq(completedTasks.account, account));
    return row?.completed ?? 0;
  }

  async getBalance(account: string): Promise<bigint> {
    const [row] = await this.db
      .select({ amount: balances.amount })
      .from(balances)
      .where(eq(balances.account, account));
    return row ? BigInt(row.amount) : 0n;
  }

  async insertTask(task: TaskRecord): Promise<void> {
    await this.db.insert(tasks).values(task);
  }

  async updateTask(id: number, patch: TaskPatch): Promise<void> {
    if (Object.keys(patch).length === 0) {
      return;
    }
    await this.db.update(tasks).set(patch).where(eq(tasks.id, id));
  }

  async appendUserTask(account: string, taskId: number): Promise<void> {
    await this.db.insert(userTasks).values({ account, task_id: taskId });
  }

  async incrementCompleted(account: string): Promise<void> {
    await this.db
      .insert(completedTasks)
      .values({ account, completed: 1 })
      .onConflictDoUpdate({
        target: completedTasks.account,
        set: { completed: sql`${completedTasks.completed} + 1` }
      });
  }

  async updateSettings(patch: SettingsPatch): Promise<void> {
    if (Object.keys(patch).length === 0) {
      return;
    }
    await this.db.update(registrySettings).set(patch).where(eq(registrySettings.id, SETTINGS_ROW_ID));
  }

  async setBalance(account: string, amount: bigint): Promise<void> {
    const value = amount.toString();
    await this.db
      .insert(balances)
      .values({ account, amount: value })
      .onConflictDoUpdate({ target: balances.account, set: { amount: value } });
  }
}

export class TaskDb implements RegistryStore {
  private readonly db: NodePgDatabase<typeof schema>;
  private readonly queue = new SerialQueue();

  constructor(private readonly pool: PgPool) {
    this.db = drizzle(pool, { schema, logger: false });
  }

  static fromPoolConfig(config: PoolConfig): TaskDb {
    return new TaskDb(new Pool(config));
  }

  async migrate(): Promise<void> {
    await this.db.execute(sql`
      CREATE TABLE IF NOT EXISTS registry_settings (
        id INTEGER PRIMARY KEY,
        owner VARCHAR(64) NOT NULL,
        platform_fee_percentage INTEGER NOT NULL,
        task_counter BIGINT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tasks (
        id BIGINT PRIMARY KEY,
        title TEXT NOT NULL,
        description TEXT NOT NULL,
        reward TEXT NOT NULL,
        client VARCHAR(64) NOT NULL,
        freelancer VARCHAR(64),
        status VARCHAR(32) NOT NULL DEFAULT 'open',
        deadline BIGINT NOT NULL,
        freelancer_submitted BOOLEAN NOT NULL DEFAULT FALSE,
        client_approved BOOLEAN NOT NULL DEFAULT FALSE,
        created_at BIGINT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS tasks_client_idx ON tasks(client);

      CREATE TABLE IF NOT EXISTS user_tasks (
        position SERIAL PRIMARY KEY,
        account VARCHAR(64) NOT NULL,
        task_id BIGINT NOT NULL REFERENCES tasks(id)
      );
      CREATE INDEX IF NOT EXISTS user_tasks_account_idx ON user_tasks(account);

      CREATE TABLE IF NOT EXISTS completed_tasks (
        account VARCHAR(64) PRIMARY KEY,
        completed INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS balances (
        account VARCHAR(64) PRIMARY KEY,
        amount TEXT NOT NULL
      );
    `);
  }

  initialize(defaults: RegistrySettings): Promise<RegistrySettings> {
    return this.queue.run(async () => {
      await this.db
        .insert(registrySettings)
        .values({ id: SETTINGS_ROW_ID, ...defaults })
        .onConflictDoNothing({ target: registrySettings.id });
      return new PgRegistryAccess(this.db).getSettings();
    });
  }

  /** Every query in `work` sees the same committed snapshot. */
  read<T>(work: (reader: RegistryReader) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new PgRegistryAccess(tx)), {
      isolationLevel: 'repeatable read',
      accessMode: 'read only'
    });
  }

  transaction<T>(work: (writer: RegistryWriter) => Promise<T>): Promise<T> {
    return this.queue.run(() =>
      this.db.transaction((tx) => work(new PgRegistryAccess(tx)), { isolationLevel: 'serializable' })
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export type TaskDbPool = PgPool;
