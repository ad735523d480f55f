/**
 * Logging system entry point that provides the default logger instance and
 * free functions bound to it.
 *
 * @module
 *
 * @example
 * ```typescript
 * import { configure, log, timed } from "@/log";
 *
 * configure({ enabledLevels: ["WARN", "ERROR"], output: "both" });
 * log("Disk almost full", { level: "WARN", tags: ["storage"] });
 * ```
 *
 * @see {@link Log} for main logging interface
 *
 * @private
 */

import type {
  LogCallback,
  LogFilterOptions,
  LogLevel,
  LogOptions,
  OutputMode,
} from "@/log/config";
import { Log, type LogCallOptions } from "@/log/log";

export { Log };
export type { LogCallOptions, LogDependencies } from "@/log/log";

let instance: Log | null = null;

/**
 * Gets or creates the process-wide default logger
 *
 * @param {LogOptions} [options] - Only applied when the instance is created
 * @returns {Log} Default logger instance
 *
 * @example
 * ```typescript
 * const log = getLogger({ output: "file", logFile: "app.log" });
 * ```
 */
export const getLogger = (options?: LogOptions): Log => {
  if (instance) {
    return instance;
  }
  instance = new Log(options);
  return instance;
};

export const log = (message: string, options?: LogCallOptions): void =>
  getLogger().log(message, options);

export const watch = (values: Record<string, unknown>): void =>
  getLogger().watch(values);

export function assertCheck(
  condition: unknown,
  message?: string,
): asserts condition {
  const logger: Log = getLogger();
  logger.assertCheck(condition, message);
}

export const timed = (label?: string) => getLogger().timed(label);

export const configure = (options: LogOptions): void =>
  getLogger().configure(options);
export const setTags = (...tags: string[]): void => getLogger().setTags(...tags);
export const clearTags = (): void => getLogger().clearTags();
export const enableLevel = (level: LogLevel): void =>
  getLogger().enableLevel(level);
export const disableLevel = (level: LogLevel): void =>
  getLogger().disableLevel(level);
export const enableStack = (): void => getLogger().enableStack();
export const disableStack = (): void => getLogger().disableStack();
export const enableColors = (): void => getLogger().enableColors();
export const disableColors = (): void => getLogger().disableColors();
export const enableJson = (): void => getLogger().enableJson();
export const disableJson = (): void => getLogger().disableJson();
export const enableRemote = (): void => getLogger().enableRemote();
export const disableRemote = (): void => getLogger().disableRemote();
export const setOutput = (mode: OutputMode, callback?: LogCallback): void =>
  getLogger().setOutput(mode, callback);
export const setFormat = (template: string): void =>
  getLogger().setFormat(template);
export const setLogFile = (path: string): void => getLogger().setLogFile(path);
export const setWhitelist = (...modules: string[]): void =>
  getLogger().setWhitelist(...modules);
export const setFilters = (filters: LogFilterOptions): void =>
  getLogger().setFilters(filters);
export const setRemoteUrl = (url?: string): void =>
  getLogger().setRemoteUrl(url);
