import type { LogLevel } from "@/log/config";
import { formatCallSite, type CallSite } from "@/log/location";

/**
 * Structured form of a record, used for JSON output and remote delivery.
 */
export interface LogPayload {
  timestamp: string;
  level: string;
  location: string;
  tags: string[];
  message: string;
  stack: string[] | null;
}

const pad = (value: number, length = 2) => String(value).padStart(length, "0");

/**
 * Local time as `YYYY-MM-DD HH:MM:SS.mmm`
 */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
  `.${pad(date.getMilliseconds(), 3)}`;

/**
 * Represents a single log record. Created per call and discarded once
 * dispatched.
 *
 * @class
 * @example
 * ```typescript
 * const event = new LogEvent({
 *   level: "INFO",
 *   message: "User logged in",
 *   tags: new Set(["auth"]),
 *   location: { module: "auth", file: "auth.ts", line: 12, functionName: "login" },
 * });
 * event.payload.location; // "auth.ts:12 in login()"
 * ```
 *
 * @see {@link LogOutput.render} for rendering implementation
 *
 * @private
 */
export class LogEvent {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly message: string;
  /** Sorted, without duplicates */
  readonly tags: readonly string[];
  readonly location: CallSite;
  readonly stack: readonly string[] | null;

  private _payload: LogPayload | null = null;

  constructor(init: {
    level: LogLevel;
    message: string;
    tags?: Iterable<string>;
    location: CallSite;
    stack?: readonly string[] | null;
  }) {
    this.timestamp = new Date();
    this.level = init.level;
    this.message = init.message;
    this.tags = [...new Set(init.tags ?? [])].sort();
    this.location = init.location;
    this.stack = init.stack?.length ? init.stack : null;
  }

  get payload(): LogPayload {
    return (this._payload ??= {
      timestamp: formatTimestamp(this.timestamp),
      level: this.level,
      location: formatCallSite(this.location),
      tags: [...this.tags],
      message: this.message,
      stack: this.stack ? [...this.stack] : null,
    });
  }
}
