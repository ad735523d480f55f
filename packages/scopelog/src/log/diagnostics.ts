import pc from "picocolors";
import { getErrorDetails, type DispatchError } from "@/utils/errors";

/**
 * Receives sink failures that are kept away from the caller. Must not log
 * through the engine that reported them.
 */
export type DiagnosticReporter = (error: DispatchError) => void;

export const reportToStderr: DiagnosticReporter = (error) => {
  const cause =
    error.cause === undefined ? undefined : getErrorDetails(error.cause).message;
  console.warn(
    pc.bgYellowBright(pc.black(" WARN ")),
    pc.yellow(cause ? `${error.message}: ${cause}` : error.message),
  );
};
