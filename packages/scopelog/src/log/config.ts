import { z } from "zod";

/**
 * Log configuration types, schema and defaults.
 *
 * @example
 * ```typescript
 * const options: LogOptions = {
 *   enabledLevels: ["WARN", "ERROR"],
 *   output: "both",
 *   logFile: "app.log",
 * };
 * ```
 *
 * @see {@link LogConfigStore} for how options are applied
 *
 * @private
 */
export const LOG_LEVELS = ["INFO", "WARN", "ERROR", "DEBUG", "TIMER"] as const;
// eslint-disable-next-line zod/require-zod-schema-types
export type KnownLogLevel = (typeof LOG_LEVELS)[number];
// Levels are an open set; the known ones only get autocompletion and colors.
export type LogLevel = KnownLogLevel | (string & {});

export const isKnownLevel = (level: string): level is KnownLogLevel =>
  LOG_LEVELS.some((known) => known === level);

export const OUTPUT_MODES = ["console", "file", "both", "callback"] as const;
// eslint-disable-next-line zod/require-zod-schema-types
export type OutputMode = (typeof OUTPUT_MODES)[number];

export const TEMPLATE_FIELDS = [
  "time",
  "level",
  "location",
  "tags",
  "message",
] as const;

export const DEFAULT_FORMAT = "[{time}] [{level}] {location} {tags} - {message}";
export const DEFAULT_LOG_FILE = "debug.log";
export const DEFAULT_REMOTE_TIMEOUT_MS = 5_000;
export const DEFAULT_STACK_DEPTH = 5;

export type LogCallback = (line: string) => void;

const StringSetSchema = z
  .union([z.array(z.string()), z.set(z.string())])
  .transform((values) => new Set(values));

const LevelSetSchema = z
  .union([z.array(z.string().min(1)), z.set(z.string().min(1))])
  .transform((values) => new Set(values));

export const LogFiltersSchema = z
  .object({
    levels: LevelSetSchema.optional(),
    modules: StringSetSchema.optional(),
    functions: StringSetSchema.optional(),
    tags: StringSetSchema.optional(),
  })
  .strict();

export const LogOptionsSchema = z
  .object({
    enabledLevels: LevelSetSchema.optional(),
    tags: StringSetSchema.optional(),
    filters: LogFiltersSchema.optional(),
    whitelist: StringSetSchema.optional(),
    output: z.enum(OUTPUT_MODES).optional(),
    callback: z
      .custom<LogCallback>((value) => typeof value === "function", {
        message: "Expected a function",
      })
      .optional(),
    logFile: z.string().min(1).optional(),
    useColors: z.boolean().optional(),
    includeStack: z.boolean().optional(),
    jsonOutput: z.boolean().optional(),
    format: z.string().optional(),
    remoteEnabled: z.boolean().optional(),
    remoteUrl: z.string().url().optional(),
    remoteTimeoutMs: z.number().int().positive().optional(),
    stackDepth: z.number().int().positive().optional(),
  })
  .strict();

/** Options accepted by `configure`; sets may be given as arrays. */
export type LogOptions = z.input<typeof LogOptionsSchema>;
export type ParsedLogOptions = z.output<typeof LogOptionsSchema>;
export type LogFilterOptions = z.input<typeof LogFiltersSchema>;

export interface LogFilters {
  readonly levels: ReadonlySet<string>;
  readonly modules: ReadonlySet<string>;
  readonly functions: ReadonlySet<string>;
  readonly tags: ReadonlySet<string>;
}

/**
 * One immutable snapshot of the logger settings. A log call reads a single
 * snapshot from start to finish.
 */
export interface LogSettings {
  readonly enabledLevels: ReadonlySet<string>;
  readonly tags: ReadonlySet<string>;
  readonly filters: LogFilters;
  readonly whitelist: ReadonlySet<string>;
  readonly output: OutputMode;
  readonly callback?: LogCallback;
  readonly logFile: string;
  readonly useColors: boolean;
  readonly includeStack: boolean;
  readonly jsonOutput: boolean;
  readonly format: string;
  readonly remoteEnabled: boolean;
  readonly remoteUrl?: string;
  readonly remoteTimeoutMs: number;
  readonly stackDepth: number;
}

export const createDefaultSettings = (): LogSettings => ({
  enabledLevels: new Set(LOG_LEVELS),
  tags: new Set(),
  filters: {
    levels: new Set(),
    modules: new Set(),
    functions: new Set(),
    tags: new Set(),
  },
  whitelist: new Set(),
  output: "console",
  callback: undefined,
  logFile: DEFAULT_LOG_FILE,
  useColors: true,
  includeStack: false,
  jsonOutput: false,
  format: DEFAULT_FORMAT,
  remoteEnabled: false,
  remoteUrl: undefined,
  remoteTimeoutMs: DEFAULT_REMOTE_TIMEOUT_MS,
  stackDepth: DEFAULT_STACK_DEPTH,
});
