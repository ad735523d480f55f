import { z } from "zod";
import {
  createDefaultSettings,
  LogOptionsSchema,
  type LogCallback,
  type LogFilterOptions,
  type LogLevel,
  type LogOptions,
  type LogSettings,
  type OutputMode,
  type ParsedLogOptions,
} from "@/log/config";
import { ConfigError, formatZodError } from "@/utils/errors";

/**
 * Holds the mutable logger settings.
 *
 * Every update validates its input, builds a complete new snapshot and swaps
 * it in; sets are never mutated in place. A log call that already holds the
 * previous snapshot keeps seeing consistent values.
 *
 * @example
 * ```typescript
 * const store = new LogConfigStore({ output: "file", logFile: "app.log" });
 * store.setFilters({ tags: ["db"] });
 * store.settings.filters.tags; // Set { "db" }
 * ```
 *
 * @private
 */
export class LogConfigStore {
  private current: LogSettings;

  constructor(options: LogOptions = {}) {
    this.current = createDefaultSettings();
    this.configure(options);
  }

  get settings(): LogSettings {
    return this.current;
  }

  /**
   * Applies any subset of the recognized options at once.
   *
   * @throws {ConfigError} on unknown keys, ill-typed values, or callback
   * output without a callback
   */
  configure(options: LogOptions): void {
    const parsed = this.parse(options);
    const next = merge(this.current, parsed);
    if (next.output === "callback" && !next.callback) {
      throw new ConfigError(
        "missing-callback",
        'Output mode "callback" requires a callback function',
      );
    }
    this.current = Object.freeze(next);
  }

  setTags(...tags: string[]): void {
    this.configure({ tags });
  }

  clearTags(): void {
    this.configure({ tags: [] });
  }

  enableLevel(level: LogLevel): void {
    this.configure({
      enabledLevels: [...this.current.enabledLevels, level],
    });
  }

  disableLevel(level: LogLevel): void {
    this.configure({
      enabledLevels: [...this.current.enabledLevels].filter((l) => l !== level),
    });
  }

  enableStack(): void {
    this.configure({ includeStack: true });
  }

  disableStack(): void {
    this.configure({ includeStack: false });
  }

  enableColors(): void {
    this.configure({ useColors: true });
  }

  disableColors(): void {
    this.configure({ useColors: false });
  }

  enableJson(): void {
    this.configure({ jsonOutput: true });
  }

  disableJson(): void {
    this.configure({ jsonOutput: false });
  }

  enableRemote(): void {
    this.configure({ remoteEnabled: true });
  }

  disableRemote(): void {
    this.configure({ remoteEnabled: false });
  }

  /**
   * Selects the sink mode. The callback is replaced too, so switching away
   * from "callback" drops the previous one.
   */
  setOutput(mode: OutputMode, callback?: LogCallback): void {
    this.configure({ output: mode, callback });
  }

  setFormat(template: string): void {
    this.configure({ format: template });
  }

  setLogFile(path: string): void {
    this.configure({ logFile: path });
  }

  setWhitelist(...modules: string[]): void {
    this.configure({ whitelist: modules });
  }

  /**
   * Replaces the given filter axes; omitted axes keep their current values.
   */
  setFilters(filters: LogFilterOptions): void {
    this.configure({ filters });
  }

  /**
   * Sets the delivery endpoint. Calling it with no URL clears it, which stops
   * remote delivery even while it is enabled.
   */
  setRemoteUrl(url?: string): void {
    this.configure({ remoteUrl: url });
  }

  private parse(options: LogOptions): ParsedLogOptions {
    try {
      return LogOptionsSchema.parse(options);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new ConfigError(
          "invalid-config",
          formatZodError(error, "Invalid logger options"),
        );
      }
      throw error;
    }
  }
}

const merge = (
  current: LogSettings,
  options: ParsedLogOptions,
): LogSettings => {
  const filters: NonNullable<ParsedLogOptions["filters"]> =
    options.filters ?? {};
  return {
    enabledLevels: options.enabledLevels ?? current.enabledLevels,
    tags: options.tags ?? current.tags,
    filters: {
      levels: filters.levels ?? current.filters.levels,
      modules: filters.modules ?? current.filters.modules,
      functions: filters.functions ?? current.filters.functions,
      tags: filters.tags ?? current.filters.tags,
    },
    whitelist: options.whitelist ?? current.whitelist,
    output: options.output ?? current.output,
    // an explicit `undefined` clears `callback` and `remoteUrl`
    callback: "callback" in options ? options.callback : current.callback,
    logFile: options.logFile ?? current.logFile,
    useColors: options.useColors ?? current.useColors,
    includeStack: options.includeStack ?? current.includeStack,
    jsonOutput: options.jsonOutput ?? current.jsonOutput,
    format: options.format ?? current.format,
    remoteEnabled: options.remoteEnabled ?? current.remoteEnabled,
    remoteUrl: "remoteUrl" in options ? options.remoteUrl : current.remoteUrl,
    remoteTimeoutMs: options.remoteTimeoutMs ?? current.remoteTimeoutMs,
    stackDepth: options.stackDepth ?? current.stackDepth,
  };
};
