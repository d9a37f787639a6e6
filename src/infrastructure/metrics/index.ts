export { EventMetrics, getDefaultMetrics } from './metrics.js';
