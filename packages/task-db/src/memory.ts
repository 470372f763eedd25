import { SerialQueue } from './queue.js';
import {
  StoreNotInitializedError,
  type RegistryReader,
  type RegistrySettings,
  type RegistryStore,
  type RegistryWriter,
  type SettingsPatch,
  type TaskPatch,
  type TaskRecord
} from './types.js';

interface MemoryState {
  settings: RegistrySettings | null;
  tasks: Map<number, TaskRecord>;
  userTasks: Map<string, number[]>;
  completed: Map<string, number>;
  balances: Map<string, bigint>;
}

const emptyState = (): MemoryState => ({
  settings: null,
  tasks: new Map(),
  userTasks: new Map(),
  completed: new Map(),
  balances: new Map()
});

class MemoryAccess implements RegistryWriter {
  constructor(private readonly state: MemoryState) {}

  async getSettings(): Promise<RegistrySettings> {
    if (!this.state.settings) {
      throw new StoreNotInitializedError();
    }
    return { ...this.state.settings };
  }

  async getTask(id: number): Promise<TaskRecord | null> {
    const task = this.state.tasks.get(id);
    return task ? { ...task } : null;
  }

  async listUserTasks(account: string): Promise<number[]> {
    return [...(this.state.userTasks.get(account) ?? [])];
  }

  async getCompletedCount(account: string): Promise<number> {
    return this.state.completed.get(account) ?? 0;
  }

  async getBalance(account: string): Promise<bigint> {
    return this.state.balances.get(account) ?? 0n;
  }

  async insertTask(task: TaskRecord): Promise<void> {
    if (this.state.tasks.has(task.id)) {
      throw new Error(`Task ${task.id} already exists`);
    }
    this.state.tasks.set(task.id, { ...task });
  }

  async updateTask(id: number, patch: TaskPatch): Promise<void> {
    const task = this.state.tasks.get(id);
    if (!task) {
      throw new Error(`Task ${id} does not exist`);
    }
    this.state.tasks.set(id, { ...task, ...patch });
  }

  async appendUserTask(account: string, taskId: number): Promise<void> {
    const ids = this.state.userTasks.get(account) ?? [];
    this.state.userTasks.set(account, [...ids, taskId]);
  }

  async incrementCompleted(account: string): Promise<void> {
    this.state.completed.set(account, (this.state.completed.get(account) ?? 0) + 1);
  }

  async updateSettings(patch: SettingsPatch): Promise<void> {
    const settings = await this.getSettings();
    this.state.settings = { ...settings, ...patch };
  }

  async setBalance(account: string, amount: bigint): Promise<void> {
    this.state.balances.set(account, amount);
  }
}

/**
 * Registry state kept in process memory. A transaction works on a copy of the
 * committed state and replaces it only when the unit of work resolves.
 */
export class MemoryTaskStore implements RegistryStore {
  private state: MemoryState = emptyState();
  private readonly queue = new SerialQueue();

  initialize(defaults: RegistrySettings): Promise<RegistrySettings> {
    return this.queue.run(async () => {
      if (!this.state.settings) {
        this.state = { ...this.state, settings: { ...defaults } };
      }
      return new MemoryAccess(this.state).getSettings();
    });
  }

  read<T>(work: (reader: RegistryReader) => Promise<T>): Promise<T> {
    return work(new MemoryAccess(this.state));
  }

  transaction<T>(work: (writer: RegistryWriter) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const draft = structuredClone(this.state);
      const result = await work(new MemoryAccess(draft));
      this.state = draft;
      return result;
    });
  }

  async close(): Promise<void> {
    this.state = emptyState();
  }
}
