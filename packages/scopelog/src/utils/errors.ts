import pc from "picocolors";
import { z, ZodError } from "zod";

export class ScopelogError extends Error {
  type?: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

const ConfigErrorTypeSchema = z.enum(["invalid-config", "missing-callback"]);
export type ConfigErrorType = z.infer<typeof ConfigErrorTypeSchema>;

export class ConfigError extends ScopelogError {
  type: ConfigErrorType;

  constructor(type: ConfigErrorType, message: string) {
    super(message);
    this.type = ConfigErrorTypeSchema.parse(type);
  }
}

const DispatchErrorTypeSchema = z.enum([
  "file-write-failed",
  "callback-failed",
  "remote-delivery-failed",
]);
export type DispatchErrorType = z.infer<typeof DispatchErrorTypeSchema>;

/**
 * Failure of a single sink. Handed to the diagnostics reporter, never thrown
 * at the code that called the logger.
 */
export class DispatchError extends ScopelogError {
  type: DispatchErrorType;

  constructor(type: DispatchErrorType, message: string, cause?: unknown) {
    super(message, { cause });
    this.type = DispatchErrorTypeSchema.parse(type);
  }
}

const AssertionErrorTypeSchema = z.enum(["assertion-failed"]);
export type AssertionErrorType = z.infer<typeof AssertionErrorTypeSchema>;

export class LogAssertionError extends ScopelogError {
  type: AssertionErrorType;

  constructor(message: string) {
    super(message);
    this.type = AssertionErrorTypeSchema.parse("assertion-failed");
  }
}

export const getErrorDetails = (error: unknown) => {
  const metadata = {
    message: error instanceof Error ? error.message : String(error),
    name: error instanceof Error ? error.name : "Unknown",
    type: error instanceof ScopelogError ? error.type : undefined,
  };

  return Object.fromEntries(
    Object.entries(metadata).filter(
      ([_, value]) => value !== null && value !== undefined,
    ),
  );
};

export const formatZodError = <T>(
  error: ZodError<T>,
  label: string,
): string => {
  const errorsString = error.errors
    .map((err) => {
      const path = err.path.join(".");
      const prefix = path ? `${pc.cyan(path)}: ` : "";
      const receivedInfo =
        "received" in err ? ` (received: ${JSON.stringify(err.received)})` : "";
      return `${prefix}${err.message}${receivedInfo}`;
    })
    .join("\n");

  return `${label}\n${errorsString}`;
};
