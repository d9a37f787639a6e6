export type * from './broker/index.js';
export * from './config/index.js';
export { ConnectionManager, withConnection, Mutex } from './connection/index.js';
export type { ConnectionManagerOptions } from './connection/index.js';
export { EventMetrics, getDefaultMetrics } from './metrics/index.js';
export { InMemoryBroker } from './memory/index.js';
export type { InMemoryBrokerOptions, StoredMessage } from './memory/index.js';
export { connectNats, toBrokerError } from './nats/index.js';
export { createLogger } from './logger.js';
