export { ConnectionManager, withConnection } from './connection-manager.js';
export type { ConnectionManagerOptions } from './connection-manager.js';
export { Mutex } from './mutex.js';
