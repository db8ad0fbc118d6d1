import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig, type LogLevel } from './env.schema.js';

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

export type Logger = pino.Logger;

export interface TransportMode {
  console: boolean;
  file: boolean;
}

export interface LoggerOverrides {
  level?: LogLevel | undefined;
  /** Write every record to this stream instead of the configured transports. */
  destination?: pino.DestinationStream | undefined;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;
let env: LoggerEnvConfig | undefined;
let transportMode: TransportMode | undefined;
let overrides: LoggerOverrides = {};

function loggerEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function currentTransportMode(): TransportMode {
  if (!transportMode) {
    const config = loggerEnv();
    transportMode = { console: config.LOGGER_CONSOLE_ENABLED, file: config.LOGGER_FILE_LOG_ENABLED };
  }
  return transportMode;
}

function currentLevel(): LogLevel {
  return overrides.level ?? loggerEnv().LOGGER_LOG_LEVEL;
}

function createRootLogger(): Logger {
  const config = loggerEnv();
  const mode = currentTransportMode();

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: currentLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (overrides.destination) {
    return pino.pino(pinoConfig, overrides.destination);
  }

  // vitest may set NODE_ENV after the schema defaults were read
  const isTestEnv =
    config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';

  if (isTestEnv) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  const transportTargets: pino.TransportTargetOptions[] = [];

  if (mode.console) {
    if (config.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      transportTargets.push({
        level: 'trace',
        options: { destination: 1 },
        target: 'pino/file',
      });
    }
  }

  if (mode.file) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: `./${config.LOGGER_FILE_LOG_DIRNAME}/${config.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (transportTargets.length > 0) {
    pinoConfig.transport = { targets: transportTargets };
    return pino.pino(pinoConfig);
  }

  // Nothing enabled: stay silent instead of falling back to stdout
  return pino.pino({ ...pinoConfig, enabled: false });
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child(
    {
      category,
      categoryLabel: formatLabel(category, 25),
    },
    { level: currentLevel() }
  );

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with reconfiguration.
 *
 * The proxy looks up the latest underlying pino logger on every property
 * access, so a logger captured at module load still follows later calls to
 * `setLoggerTransports` or `initLogger`.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy(getOrCreateCategoryLogger(category), {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

function resetLoggers(): void {
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Update transport mode at runtime. Resets cached loggers so the new
 * configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...currentTransportMode(), ...next };
  resetLoggers();
}

/**
 * Override the level or destination read from the environment. Passing an
 * empty object restores the environment configuration.
 */
export function initLogger(next: LoggerOverrides): void {
  overrides = { ...next };
  resetLoggers();
}
