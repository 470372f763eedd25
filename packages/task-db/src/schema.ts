import { bigint, boolean, index, integer, pgTable, serial, text, varchar } from 'drizzle-orm/pg-core';

export const registrySettings = pgTable('registry_settings', {
  id: integer('id').primaryKey(),
  owner: varchar('owner', { length: 64 }).notNull(),
  platform_fee_percentage: integer('platform_fee_percentage').notNull(),
  task_counter: bigint('task_counter', { mode: 'number' }).notNull()
});

export const tasks = pgTable(
  'tasks',
  {
    id: bigint('id', { mode: 'number' }).primaryKey(),
    title: text('title').notNull(),
    description: text('description').notNull(),
    reward: text('reward').notNull(),
    client: varchar('client', { length: 64 }).notNull(),
    freelancer: varchar('freelancer', { length: 64 }),
    status: varchar('status', { length: 32 }).notNull().default('open'),
    deadline: bigint('deadline', { mode: 'number' }).notNull(),
    freelancer_submitted: boolean('freelancer_submitted').notNull().default(false),
    client_approved: boolean('client_approved').notNull().default(false),
    created_at: bigint('created_at', { mode: 'number' }).notNull()
  },
  (table) => ({
    clientIdx: index('tasks_client_idx').on(table.client)
  })
);

export const userTasks = pgTable(
  'user_tasks',
  {
    position: serial('position').primaryKey(),
    account: varchar('account', { length: 64 }).notNull(),
    task_id: bigint('task_id', { mode: 'number' })
      .notNull()
      .references(() => tasks.id)
  },
  (table) => ({
    accountIdx: index('user_tasks_account_idx').on(table.account)
  })
);

export const completedTasks = pgTable('completed_tasks', {
  account: varchar('account', { length: 64 }).primaryKey(),
  completed: integer('completed').notNull().default(0)
});

export const balances = pgTable('balances', {
  account: varchar('account', { length: 64 }).primaryKey(),
  amount: text('amount').notNull()
});

export const schema = {
  registrySettings,
  tasks,
  userTasks,
  completedTasks,
  balances
};
