import { appendFileSync } from "node:fs";
import type { LogCallback, LogSettings } from "@/log/config";
import type { DiagnosticReporter } from "@/log/diagnostics";
import type { LogPayload } from "@/log/event";
import type { RenderedOutput } from "@/log/output";
import type { RemoteTransport } from "@/log/transport";
import { DispatchError } from "@/utils/errors";

/**
 * Writes rendered records to the configured sinks.
 *
 * Console, file and callback writes are synchronous: one `write` call runs to
 * completion before any other code, so lines from concurrent callers never
 * interleave. Each file write is one `appendFileSync` call. Remote delivery
 * is started afterwards and never awaited.
 *
 * @private
 */
export class LogDispatcher {
  constructor(
    private readonly transport: RemoteTransport,
    private readonly report: DiagnosticReporter,
  ) {}

  write(rendered: RenderedOutput, settings: LogSettings): void {
    const { output } = settings;

    if (output === "console" || output === "both") {
      process.stdout.write(`${rendered.text}\n`);
    }
    if (output === "file" || output === "both") {
      this.appendToFile(settings.logFile, rendered.text);
    }
    if (output === "callback") {
      this.invokeCallback(settings.callback, rendered.text);
    }

    if (settings.remoteEnabled && settings.remoteUrl) {
      this.sendRemote(
        settings.remoteUrl,
        rendered.payload,
        settings.remoteTimeoutMs,
      );
    }
  }

  /**
   * A failed append skips this record only.
   */
  private appendToFile(path: string, text: string): void {
    try {
      appendFileSync(path, `${text}\n`, "utf8");
    } catch (error) {
      this.safeReport(
        new DispatchError(
          "file-write-failed",
          `Could not append to log file ${path}`,
          error,
        ),
      );
    }
  }

  private invokeCallback(callback: LogCallback | undefined, text: string) {
    if (!callback) return;
    try {
      callback(text);
    } catch (error) {
      this.safeReport(
        new DispatchError("callback-failed", "Log callback threw", error),
      );
    }
  }

  private sendRemote(url: string, payload: LogPayload, timeoutMs: number) {
    void Promise.resolve()
      .then(() => this.transport.send(url, payload, timeoutMs))
      .catch((error: unknown) => {
        this.safeReport(
          new DispatchError(
            "remote-delivery-failed",
            `Remote delivery to ${url} failed`,
            error,
          ),
        );
      });
  }

  /**
   * A reporter that throws must not turn a suppressed failure into one the
   * caller sees; its own error is dropped.
   */
  private safeReport(error: DispatchError): void {
    try {
      this.report(error);
    } catch {
      return;
    }
  }
}
