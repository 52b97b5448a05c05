export { clientIp } from './client-ip.js';
export { deny, errorEnvelope, sendApiError, type ErrorEnvelope } from './errors.js';
export { registerServiceMetrics } from './metrics.js';
export { runService, runServiceAndExit, type ServiceBootstrapOptions } from './bootstrap.js';
