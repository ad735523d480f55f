import pc from "picocolors";
import {
  isKnownLevel,
  TEMPLATE_FIELDS,
  type KnownLogLevel,
  type LogSettings,
} from "@/log/config";
import type { LogEvent, LogPayload } from "@/log/event";

type Colors = ReturnType<typeof pc.createColors>;

export interface RenderedOutput {
  /** Line handed to the console, file and callback sinks */
  text: string;
  /** Structured form, always available for remote delivery */
  payload: LogPayload;
}

/**
 * Internal class for log output formatting and rendering.
 *
 * @class
 * @example
 * ```typescript
 * const { text } = LogOutput.render(event, settings);
 * // [2024-01-01 10:30:00.000] [INFO] app.ts:3 in main() [db] - Server started
 * ```
 *
 * @internal Used by {@link Log.log}
 * @see {@link LogEvent} for event structure
 *
 * @private
 */
export class LogOutput {
  static readonly LEVEL_COLORS = {
    INFO: "cyanBright",
    WARN: "yellowBright",
    ERROR: "redBright",
    DEBUG: "greenBright",
    TIMER: "magentaBright",
  } as const satisfies Record<KnownLogLevel, keyof Colors>;

  // Level colors apply whenever the settings ask for them, TTY or not.
  private static readonly COLORS: Colors = pc.createColors(true);

  private static readonly TEMPLATE_PATTERN = new RegExp(
    `\\{(${TEMPLATE_FIELDS.join("|")})\\}`,
    "g",
  );

  static render(event: LogEvent, settings: LogSettings): RenderedOutput {
    const { payload } = event;
    if (settings.jsonOutput) {
      return { text: JSON.stringify(payload), payload };
    }
    return { text: LogOutput.renderForTerminal(event, settings), payload };
  }

  /**
   * Fills the template in a single pass, so placeholders inside the message
   * are not expanded. Unknown `{tokens}` stay as written.
   */
  private static renderForTerminal(
    event: LogEvent,
    settings: LogSettings,
  ): string {
    const { payload } = event;
    const fields = new Map<string, string>([
      ["time", payload.timestamp],
      ["level", payload.level],
      ["location", payload.location],
      ["tags", payload.tags.length ? `[${payload.tags.join(",")}]` : ""],
      ["message", payload.message],
    ]);
    const line = settings.format.replace(
      LogOutput.TEMPLATE_PATTERN,
      (token: string, field: string) => fields.get(field) ?? token,
    );

    if (!settings.useColors || !isKnownLevel(event.level)) {
      return line;
    }
    return LogOutput.COLORS[LogOutput.LEVEL_COLORS[event.level]](line);
  }
}
