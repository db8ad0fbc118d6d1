export {
  formatLabel,
  getLogger,
  initLogger,
  setLoggerTransports,
  type Logger,
  type LoggerOverrides,
  type TransportMode,
} from './logger.js';
export { loggerEnvSchema, logLevels, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
