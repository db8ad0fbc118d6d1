export {
  envSchema,
  getClientSettings,
  parseEnv,
  resetEnvCache,
  type ClientSettings,
  type ValidatedEnv,
} from './config.js';
