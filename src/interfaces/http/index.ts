export { default as metricsRoutes } from './metrics-routes.js';
export type { MetricsRoutesOptions } from './metrics-routes.js';
export { createMetricsServer } from './server.js';
export type { MetricsServerOptions } from './server.js';
