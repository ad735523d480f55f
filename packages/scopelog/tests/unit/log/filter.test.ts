import { describe, expect, it } from "vitest";
import { createDefaultSettings, type LogSettings } from "@/log/config";
import { isLevelEnabled, passesFilters, type FilterSubject } from "@/log/filter";

const subject = (overrides: Partial<FilterSubject> = {}): FilterSubject => ({
  level: "INFO",
  module: "orders",
  functionName: "checkout",
  tags: new Set(),
  ...overrides,
});

const settingsWith = (overrides: Partial<LogSettings>): LogSettings => ({
  ...createDefaultSettings(),
  ...overrides,
});

const filters = (
  overrides: Partial<LogSettings["filters"]>,
): LogSettings["filters"] => ({
  ...createDefaultSettings().filters,
  ...overrides,
});

describe("isLevelEnabled", () => {
  it("accepts enabled levels only", () => {
    const settings = settingsWith({ enabledLevels: new Set(["ERROR"]) });

    expect(isLevelEnabled(settings, "ERROR")).toBe(true);
    expect(isLevelEnabled(settings, "INFO")).toBe(false);
    expect(isLevelEnabled(settings, "AUDIT")).toBe(false);
  });
});

describe("passesFilters", () => {
  it("passes everything when whitelist and filters are empty", () => {
    expect(passesFilters(createDefaultSettings(), subject())).toBe(true);
  });

  it("rejects modules outside a non-empty whitelist", () => {
    const settings = settingsWith({ whitelist: new Set(["billing"]) });

    expect(passesFilters(settings, subject())).toBe(false);
    expect(passesFilters(settings, subject({ module: "billing" }))).toBe(true);
  });

  it("applies the whitelist even when module filters allow the module", () => {
    const settings = settingsWith({
      whitelist: new Set(["billing"]),
      filters: filters({ modules: new Set(["orders"]) }),
    });

    expect(passesFilters(settings, subject())).toBe(false);
  });

  it("matches each axis by membership", () => {
    const settings = settingsWith({
      filters: filters({
        levels: new Set(["WARN"]),
        functions: new Set(["checkout"]),
      }),
    });

    expect(passesFilters(settings, subject({ level: "WARN" }))).toBe(true);
    expect(passesFilters(settings, subject({ level: "INFO" }))).toBe(false);
    expect(
      passesFilters(settings, subject({ level: "WARN", functionName: "refund" })),
    ).toBe(false);
  });

  it("matches tags on any overlap", () => {
    const settings = settingsWith({
      filters: filters({ tags: new Set(["db", "cache"]) }),
    });

    expect(passesFilters(settings, subject({ tags: new Set(["db"]) }))).toBe(
      true,
    );
    expect(
      passesFilters(settings, subject({ tags: new Set(["http", "cache"]) })),
    ).toBe(true);
    expect(passesFilters(settings, subject({ tags: new Set(["http"]) }))).toBe(
      false,
    );
    expect(passesFilters(settings, subject())).toBe(false);
  });

  it("passes again once all axes are cleared", () => {
    const restricted = settingsWith({
      filters: filters({
        levels: new Set(["ERROR"]),
        modules: new Set(["billing"]),
        functions: new Set(["refund"]),
        tags: new Set(["db"]),
      }),
    });
    const cleared = settingsWith({ filters: filters({}) });

    expect(passesFilters(restricted, subject())).toBe(false);
    expect(passesFilters(cleared, subject())).toBe(true);
  });
});
