export * from './split-layout/index.js';
export { createIdGenerator, CustomEventDispatcher } from './internal/index.js';
export type { IdGenerator, EventCallback } from './internal/index.js';
