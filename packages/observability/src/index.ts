export { log, setLogSink, type LogEntry, type LogLevel, type LogSink } from './logger.js';
export {
  createServiceLogger,
  maskPhoneNumber,
  type ExtendedLogLevel,
  type ServiceLogger,
  type ServiceLoggerConfig
} from './service-logger.js';
export { createServiceMetrics, type ServiceMetrics } from './metrics.js';
