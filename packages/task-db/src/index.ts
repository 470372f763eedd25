export * from './types.js';
export * from './schema.js';
export * from './signing.js';
export { SerialQueue } from './queue.js';
export { MemoryTaskStore } from './memory.js';
export { TaskDb, type TaskDbPool } from './db.js';
