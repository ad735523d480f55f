export * from "@/log";
export {
  DEFAULT_FORMAT,
  DEFAULT_LOG_FILE,
  LOG_LEVELS,
  OUTPUT_MODES,
  type KnownLogLevel,
  type LogCallback,
  type LogFilterOptions,
  type LogLevel,
  type LogOptions,
  type LogSettings,
  type OutputMode,
} from "@/log/config";
export type { DiagnosticReporter } from "@/log/diagnostics";
export type { LogPayload } from "@/log/event";
export {
  StackLocationResolver,
  formatCallSite,
  type CallSite,
  type LocationResolver,
} from "@/log/location";
export { FetchTransport, type RemoteTransport } from "@/log/transport";
export {
  ConfigError,
  DispatchError,
  LogAssertionError,
  ScopelogError,
} from "@/utils/errors";
