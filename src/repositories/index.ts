import { env } from '../config/env.js';
import { createMongoStore } from './mongo.repository.js';
import { createMemoryStore } from './memory.repository.js';
import type { Store } from './types.js';

export function createStore(driver = env.STORE_DRIVER): Store {
  return driver === 'mongo' ? createMongoStore() : createMemoryStore();
}

export { createMongoStore, createMemoryStore };
export type * from './types.js';
