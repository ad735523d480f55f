import { afterEach, describe, expect, it, vi } from "vitest";
import { reportToStderr } from "@/log/diagnostics";
import { DispatchError } from "@/utils/errors";

describe("reportToStderr", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints a warning with the cause", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    reportToStderr(
      new DispatchError(
        "file-write-failed",
        "Could not append to log file app.log",
        new Error("EACCES"),
      ),
    );

    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining("WARN"),
      expect.stringContaining("Could not append to log file app.log: EACCES"),
    );
  });

  it("prints the message alone without a cause", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    reportToStderr(new DispatchError("callback-failed", "Log callback threw"));

    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining("WARN"),
      expect.stringMatching(/Log callback threw(\u001b\[\d+m)?$/),
    );
  });
});
