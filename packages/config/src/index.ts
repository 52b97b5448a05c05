export { loadRuntimeConfig, type RuntimeConfig } from './env.js';
export { loadTransferApiServiceEnv, type TransferApiServiceEnv } from './service-env.js';
