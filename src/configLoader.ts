import './configEnv';
import config from 'config';
import { z } from 'zod';
import { log, LogLevel, parseLogLevel } from './logger';

// Environment variables arrive as strings, so levels and flags accept those too.
const logLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? parseLogLevel(value) ?? value : value),
  z.nativeEnum(LogLevel),
);

const booleanFlagSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toLowerCase() === 'true' : value),
  z.boolean(),
);

const loggingConfigSchema = z.object({
  consoleLogLevel: logLevelSchema.default(LogLevel.INFO),
  fileLogLevel: logLevelSchema.default(LogLevel.INFO),
  logFile: z.string().default(''),
  consoleQuietMode: booleanFlagSchema.default(false),
});

const appConfigSchema = z.object({
  env: z.string().default('development'),
  appName: z.string().default('todotxt-core'),
  version: z.string().default('1.0.0'),
  logging: loggingConfigSchema.default({}),
});

export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

let currentConfig: AppConfig | undefined;

/**
 * Loads the configuration through the 'config' package, which merges
 * config/default.json, the NODE_ENV file and the variables mapped in
 * custom-environment-variables.json. Every field has a default, so a host
 * without a config/ directory gets a working configuration.
 */
export function loadConfig(): AppConfig {
  const result = appConfigSchema.safeParse(config.util.toObject());
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  currentConfig = result.data;
  log(LogLevel.DEBUG, 'Application config loaded: %j', currentConfig);
  return currentConfig;
}

export function getConfig(): AppConfig {
  if (!currentConfig) {
    return loadConfig();
  }
  return currentConfig;
}

export function setConfig(newConfig: AppConfig): void {
  currentConfig = newConfig;
}

export function _resetConfigForTesting(): void {
  currentConfig = undefined;
}
