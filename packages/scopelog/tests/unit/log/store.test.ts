import { describe, expect, it, vi } from "vitest";
import { LogConfigStore } from "@/log/store";
import { ConfigError } from "@/utils/errors";

const catchError = (fn: () => void): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe("LogConfigStore", () => {
  describe("configure", () => {
    it("applies initial options over the defaults", () => {
      const store = new LogConfigStore({ output: "file", logFile: "app.log" });

      expect(store.settings.output).toBe("file");
      expect(store.settings.logFile).toBe("app.log");
      expect(store.settings.useColors).toBe(true);
    });

    it("keeps options that are not mentioned", () => {
      const store = new LogConfigStore({ jsonOutput: true });
      store.configure({ useColors: false });

      expect(store.settings.jsonOutput).toBe(true);
      expect(store.settings.useColors).toBe(false);
    });

    it("throws ConfigError on unknown keys and leaves settings untouched", () => {
      const store = new LogConfigStore();
      const before = store.settings;

      const caught = catchError(() =>
        store.configure({ useColors: false, verbose: true } as never),
      );

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught).toMatchObject({ type: "invalid-config" });
      expect(store.settings).toBe(before);
      expect(store.settings.useColors).toBe(true);
    });

    it("rejects callback output without a callback", () => {
      const store = new LogConfigStore();

      const caught = catchError(() => store.configure({ output: "callback" }));

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught).toMatchObject({ type: "missing-callback" });
      expect(store.settings.output).toBe("console");
    });

    it("accepts callback output when a callback is given", () => {
      const callback = vi.fn();
      const store = new LogConfigStore({ output: "callback", callback });

      expect(store.settings.output).toBe("callback");
      expect(store.settings.callback).toBe(callback);
    });

    it("swaps in a new frozen snapshot on every update", () => {
      const store = new LogConfigStore();
      const before = store.settings;
      store.setTags("checkout");

      expect(store.settings).not.toBe(before);
      expect(before.tags.size).toBe(0);
      expect(Object.isFrozen(store.settings)).toBe(true);
    });
  });

  describe("setters", () => {
    it("sets and clears global tags", () => {
      const store = new LogConfigStore();
      store.setTags("a", "b");
      expect(store.settings.tags).toEqual(new Set(["a", "b"]));

      store.setTags("c");
      expect(store.settings.tags).toEqual(new Set(["c"]));

      store.clearTags();
      expect(store.settings.tags.size).toBe(0);
    });

    it("enables and disables levels, including custom ones", () => {
      const store = new LogConfigStore({ enabledLevels: ["ERROR"] });
      store.enableLevel("AUDIT");
      expect(store.settings.enabledLevels).toEqual(new Set(["ERROR", "AUDIT"]));

      store.disableLevel("ERROR");
      expect(store.settings.enabledLevels).toEqual(new Set(["AUDIT"]));

      store.disableLevel("NOT-THERE");
      expect(store.settings.enabledLevels).toEqual(new Set(["AUDIT"]));
    });

    it("toggles the boolean switches", () => {
      const store = new LogConfigStore();
      store.enableStack();
      store.disableColors();
      store.enableJson();
      store.enableRemote();
      expect(store.settings).toMatchObject({
        includeStack: true,
        useColors: false,
        jsonOutput: true,
        remoteEnabled: true,
      });

      store.disableStack();
      store.enableColors();
      store.disableJson();
      store.disableRemote();
      expect(store.settings).toMatchObject({
        includeStack: false,
        useColors: true,
        jsonOutput: false,
        remoteEnabled: false,
      });
    });

    it("setOutput replaces the callback", () => {
      const callback = vi.fn();
      const store = new LogConfigStore();
      store.setOutput("callback", callback);
      expect(store.settings.callback).toBe(callback);

      store.setOutput("both");
      expect(store.settings.output).toBe("both");
      expect(store.settings.callback).toBeUndefined();
    });

    it("setOutput to callback without a callback throws", () => {
      const store = new LogConfigStore();
      expect(() => store.setOutput("callback")).toThrow(ConfigError);
    });

    it("setFilters only replaces the given axes", () => {
      const store = new LogConfigStore();
      store.setFilters({ levels: ["ERROR"], tags: ["db"] });
      store.setFilters({ modules: ["orders"] });

      expect(store.settings.filters.levels).toEqual(new Set(["ERROR"]));
      expect(store.settings.filters.tags).toEqual(new Set(["db"]));
      expect(store.settings.filters.modules).toEqual(new Set(["orders"]));
      expect(store.settings.filters.functions.size).toBe(0);

      store.setFilters({ levels: [], tags: [] });
      expect(store.settings.filters.levels.size).toBe(0);
      expect(store.settings.filters.tags.size).toBe(0);
      expect(store.settings.filters.modules).toEqual(new Set(["orders"]));
    });

    it("sets whitelist, format, log file and remote url", () => {
      const store = new LogConfigStore();
      store.setWhitelist("orders", "billing");
      store.setFormat("{level}: {message}");
      store.setLogFile("logs/app.log");
      store.setRemoteUrl("http://127.0.0.1:9/logs");

      expect(store.settings.whitelist).toEqual(new Set(["orders", "billing"]));
      expect(store.settings.format).toBe("{level}: {message}");
      expect(store.settings.logFile).toBe("logs/app.log");
      expect(store.settings.remoteUrl).toBe("http://127.0.0.1:9/logs");
    });

    it("clears the remote url and stops treating it as set", () => {
      const store = new LogConfigStore({
        remoteEnabled: true,
        remoteUrl: "http://127.0.0.1:9/logs",
      });

      store.enableRemote();
      expect(store.settings.remoteUrl).toBe("http://127.0.0.1:9/logs");

      store.setRemoteUrl();
      expect(store.settings.remoteUrl).toBeUndefined();
      expect(store.settings.remoteEnabled).toBe(true);

      store.configure({ remoteUrl: "http://127.0.0.1:9/other" });
      store.configure({ remoteUrl: undefined });
      expect(store.settings.remoteUrl).toBeUndefined();
    });

    it("rejects an invalid remote url", () => {
      const store = new LogConfigStore();
      expect(() => store.setRemoteUrl("nowhere")).toThrow(ConfigError);
      expect(store.settings.remoteUrl).toBeUndefined();
    });
  });
});
