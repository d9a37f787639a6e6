export { InMemoryBroker } from './in-memory-broker.js';
export type { InMemoryBrokerOptions, StoredMessage } from './in-memory-broker.js';
