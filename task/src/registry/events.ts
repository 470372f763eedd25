import type { Logger } from '../logger.js';

export type RegistryEvent =
  | { type: 'TaskCreated'; taskId: number; client: string; title: string; reward: bigint }
  | { type: 'TaskAssigned'; taskId: number; freelancer: string }
  | { type: 'TaskCompleted'; taskId: number; freelancer: string; client: string }
  | { type: 'TaskCancelled'; taskId: number; client: string }
  | { type: 'PaymentReleased'; taskId: number; freelancer: string; amount: bigint };

export type RegistryEventType = RegistryEvent['type'];

export type RegistryEventListener = (event: RegistryEvent) => void;

export class RegistryEvents {
  private readonly listeners = new Set<RegistryEventListener>();

  constructor(private readonly logger: Logger) {}

  subscribe(listener: RegistryEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Delivers events in order; a throwing listener does not stop the others. */
  publish(events: readonly RegistryEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          this.logger.error({ err: error, event: event.type, taskId: event.taskId }, 'Registry event listener failed');
        }
      }
    }
  }
}
