import { format, inspect } from "node:util";
import type {
  LogCallback,
  LogFilterOptions,
  LogLevel,
  LogOptions,
  LogSettings,
  OutputMode,
} from "@/log/config";
import { reportToStderr, type DiagnosticReporter } from "@/log/diagnostics";
import { LogDispatcher } from "@/log/dispatch";
import { LogEvent } from "@/log/event";
import { isLevelEnabled, passesFilters } from "@/log/filter";
import {
  StackLocationResolver,
  type CallSite,
  type LocationResolver,
} from "@/log/location";
import { LogOutput } from "@/log/output";
import { LogConfigStore } from "@/log/store";
import { FetchTransport, type RemoteTransport } from "@/log/transport";
import { LogAssertionError } from "@/utils/errors";

export interface LogCallOptions {
  /** printf-style arguments for the message; without them it is used verbatim */
  args?: readonly unknown[];
  level?: LogLevel;
  /** Added to the global tags for this record only */
  tags?: Iterable<string>;
  /** Overrides the `includeStack` setting for this record */
  includeStack?: boolean;
  /** Fields given here replace the automatically resolved ones */
  location?: Partial<CallSite>;
}

export interface LogDependencies {
  resolver?: LocationResolver;
  transport?: RemoteTransport;
  report?: DiagnosticReporter;
}

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === "object" &&
  value !== null &&
  "then" in value &&
  typeof value.then === "function";

/**
 * Core logging class: filters, formats and dispatches records, and exposes
 * the configuration setters.
 *
 * @class
 * @example
 * ```typescript
 * const log = new Log({ output: "both", logFile: "app.log" });
 * log.setTags("checkout");
 * log.info("Order %s placed", orderId);
 * log.log("Slow query", { level: "WARN", tags: ["db"], includeStack: true });
 *
 * const load = log.timed("load")(loadInventory);
 * ```
 *
 * @param {LogOptions} [options] - Initial settings
 * @param {LogDependencies} [dependencies] - Replaceable collaborators
 * @see {@link LogConfigStore} for settings
 * @see {@link LogOutput} for output formatting
 * @see {@link LogDispatcher} for sinks
 *
 * @private
 */
export class Log {
  readonly config: LogConfigStore;
  private readonly resolver: LocationResolver;
  private readonly dispatcher: LogDispatcher;

  constructor(options: LogOptions = {}, dependencies: LogDependencies = {}) {
    this.config = new LogConfigStore(options);
    this.resolver = dependencies.resolver ?? new StackLocationResolver();
    this.dispatcher = new LogDispatcher(
      dependencies.transport ?? new FetchTransport(),
      dependencies.report ?? reportToStderr,
    );
  }

  get settings(): LogSettings {
    return this.config.settings;
  }

  /**
   * Core logging method. Returns once the synchronous sinks are written.
   */
  log(message: string, options: LogCallOptions = {}): void {
    const settings = this.config.settings;
    const level = options.level ?? "INFO";
    if (!isLevelEnabled(settings, level)) {
      return;
    }

    const location = this.resolveLocation(options.location);
    const tags = new Set([...settings.tags, ...(options.tags ?? [])]);
    if (
      !passesFilters(settings, {
        level,
        module: location.module,
        functionName: location.functionName,
        tags,
      })
    ) {
      return;
    }

    const includeStack = options.includeStack ?? settings.includeStack;
    const event = new LogEvent({
      level,
      message: options.args?.length
        ? format(message, ...options.args)
        : message,
      tags,
      location,
      stack: includeStack ? this.resolver.captureStack(settings.stackDepth) : null,
    });
    this.dispatcher.write(LogOutput.render(event, settings), settings);
  }

  /**
   * Convenience methods for the known levels
   */
  info(message: string, ...args: unknown[]) {
    this.log(message, { level: "INFO", args });
  }

  warn(message: string, ...args: unknown[]) {
    this.log(message, { level: "WARN", args });
  }

  error(message: string, ...args: unknown[]) {
    this.log(message, { level: "ERROR", args });
  }

  debug(message: string, ...args: unknown[]) {
    this.log(message, { level: "DEBUG", args });
  }

  /**
   * Logs each name with its inspected value at DEBUG level
   *
   * @example
   * ```typescript
   * log.watch({ userId, cart }); // WATCH: userId=42, cart={ items: 3 }
   * ```
   */
  watch(values: Record<string, unknown>): void {
    const pairs = Object.entries(values)
      .map(([name, value]) => `${name}=${inspect(value)}`)
      .join(", ");
    this.log(`WATCH: ${pairs}`, { level: "DEBUG" });
  }

  /**
   * Logs an ERROR with a stack trace and throws when `condition` is falsy.
   *
   * @throws {LogAssertionError}
   */
  assertCheck(
    condition: unknown,
    message = "Assertion failed",
  ): asserts condition {
    if (!condition) {
      this.log(`ASSERT: ${message}`, { level: "ERROR", includeStack: true });
      throw new LogAssertionError(message);
    }
  }

  /**
   * Wraps `fn` so every call logs a TIMER record with its duration, also when
   * it throws or its promise rejects. The record is written before the error
   * reaches the caller.
   *
   * @example
   * ```typescript
   * const save = log.timed("save")(saveOrder);
   * await save(order); // save took 12.34ms
   * ```
   */
  timed(label?: string) {
    return <A extends unknown[], R>(fn: (...args: A) => R) => {
      const name = label ?? (fn.name || "<anonymous>");
      return (...args: A): R => {
        // resolved up front: a promise settles with no caller frames left
        const location = isLevelEnabled(this.config.settings, "TIMER")
          ? this.resolver.resolve()
          : undefined;
        const start = performance.now();
        const report = () => {
          const duration = (performance.now() - start).toFixed(2);
          this.log(`${name} took ${duration}ms`, { level: "TIMER", location });
        };

        let result: R;
        try {
          result = fn(...args);
        } catch (error) {
          report();
          throw error;
        }
        if (isPromiseLike(result)) {
          void result.then(report, report);
        } else {
          report();
        }
        return result;
      };
    };
  }

  /**
   * Configuration, delegated to {@link LogConfigStore}
   */
  configure(options: LogOptions): void {
    this.config.configure(options);
  }

  setTags(...tags: string[]): void {
    this.config.setTags(...tags);
  }

  clearTags(): void {
    this.config.clearTags();
  }

  enableLevel(level: LogLevel): void {
    this.config.enableLevel(level);
  }

  disableLevel(level: LogLevel): void {
    this.config.disableLevel(level);
  }

  enableStack(): void {
    this.config.enableStack();
  }

  disableStack(): void {
    this.config.disableStack();
  }

  enableColors(): void {
    this.config.enableColors();
  }

  disableColors(): void {
    this.config.disableColors();
  }

  enableJson(): void {
    this.config.enableJson();
  }

  disableJson(): void {
    this.config.disableJson();
  }

  enableRemote(): void {
    this.config.enableRemote();
  }

  disableRemote(): void {
    this.config.disableRemote();
  }

  setOutput(mode: OutputMode, callback?: LogCallback): void {
    this.config.setOutput(mode, callback);
  }

  setFormat(template: string): void {
    this.config.setFormat(template);
  }

  setLogFile(path: string): void {
    this.config.setLogFile(path);
  }

  setWhitelist(...modules: string[]): void {
    this.config.setWhitelist(...modules);
  }

  setFilters(filters: LogFilterOptions): void {
    this.config.setFilters(filters);
  }

  setRemoteUrl(url?: string): void {
    this.config.setRemoteUrl(url);
  }

  private resolveLocation(override?: Partial<CallSite>): CallSite {
    if (
      override?.module !== undefined &&
      override.file !== undefined &&
      override.line !== undefined &&
      override.functionName !== undefined
    ) {
      return {
        module: override.module,
        file: override.file,
        line: override.line,
        functionName: override.functionName,
      };
    }
    const resolved = this.resolver.resolve();
    return {
      module: override?.module ?? resolved.module,
      file: override?.file ?? resolved.file,
      line: override?.line ?? resolved.line,
      functionName: override?.functionName ?? resolved.functionName,
    };
  }
}
