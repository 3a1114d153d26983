import { bootstrapLogger, applyLoggerConfig, log, LogLevel } from './logger';
import { loadConfig, AppConfig } from './configLoader';

export { TaskParser, parseTask, serializeTask } from './taskParser';
export { createTask, cloneTask, tasksEqual } from './taskUtils';
export { TaskSchema, TaskValidationError, validateTask, assertValidTask } from './taskValidator';
export type { TaskValidationIssue, TaskValidationResult } from './taskValidator';
export { isPriority } from './types/task';
export type { Task, TaskAttribute, Priority } from './types/task';
export { log, LogLevel, bootstrapLogger, applyLoggerConfig } from './logger';
export { loadConfig, getConfig, setConfig } from './configLoader';
export type { AppConfig, LoggingConfig } from './configLoader';

/**
 * Sets up logging from the environment and the config files. Parsing and
 * serializing work without it; call it once at startup when the host wants
 * the library's debug output.
 */
export function initialize(): AppConfig {
  bootstrapLogger();
  const appConfig = loadConfig();
  applyLoggerConfig(appConfig.logging);
  log(LogLevel.INFO, `${appConfig.appName} v${appConfig.version} initialized (${appConfig.env}).`);
  return appConfig;
}
