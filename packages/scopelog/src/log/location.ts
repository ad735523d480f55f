import { basename, dirname, extname, sep } from "node:path";
import { fileURLToPath } from "node:url";

export const UNKNOWN = "?";

/**
 * Where a log call came from. `module` is the file name without its
 * extension and is what whitelist and module filters match against.
 *
 * Files that share a name share a module: every `index.ts` is `index`, so a
 * whitelist entry of `index` admits all of them. Pass `location.module` on
 * the log call to give such a file a distinct name.
 */
export interface CallSite {
  module: string;
  file: string;
  line: number | typeof UNKNOWN;
  functionName: string;
}

export const UNKNOWN_CALL_SITE: Readonly<CallSite> = Object.freeze({
  module: UNKNOWN,
  file: UNKNOWN,
  line: UNKNOWN,
  functionName: UNKNOWN,
});

export interface LocationResolver {
  /** Returns the first call site outside the logging engine. Never throws. */
  resolve(): CallSite;
  /**
   * Returns up to `depth` rendered frames, most recent first: the call site,
   * then its caller, and so on outward.
   */
  captureStack(depth: number): string[];
}

/**
 * Renders a call site as `file:line in function()`
 */
export const formatCallSite = (site: CallSite): string =>
  `${site.file}:${site.line} in ${site.functionName}()`;

interface StackFrame {
  path: string;
  line: number;
  functionName: string;
}

// Frames below the call site: Log method, helpers, resolver. Leaves room for
// the facade wrappers and `timed`.
const ENGINE_FRAME_ALLOWANCE = 16;

const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

const ENGINE_DIR = dirname(fileURLToPath(import.meta.url));

/**
 * Resolves call sites from V8 stack traces.
 *
 * Frames from files under `engineDir` (the logging engine itself) and from
 * Node.js internals are skipped, so the reported location is the caller's
 * code however many engine frames sit in between.
 *
 * @example
 * ```typescript
 * function checkout() {
 *   return new StackLocationResolver().resolve();
 * }
 * checkout(); // { module: "orders", file: "orders.ts", line: 2, functionName: "checkout" }
 * ```
 */
export class StackLocationResolver implements LocationResolver {
  private readonly engineDir: string;

  constructor(engineDir: string = ENGINE_DIR) {
    this.engineDir = engineDir.endsWith(sep) ? engineDir : `${engineDir}${sep}`;
  }

  resolve(): CallSite {
    const [frame] = this.externalFrames(1);
    if (!frame) {
      return { ...UNKNOWN_CALL_SITE };
    }
    const file = basename(frame.path);
    return {
      module: basename(file, extname(file)) || UNKNOWN,
      file: file || UNKNOWN,
      line: frame.line,
      functionName: frame.functionName,
    };
  }

  captureStack(depth: number): string[] {
    return this.externalFrames(depth).map((frame) =>
      formatCallSite({
        module: UNKNOWN,
        file: basename(frame.path) || UNKNOWN,
        line: frame.line,
        functionName: frame.functionName,
      }),
    );
  }

  private externalFrames(limit: number): StackFrame[] {
    const stack = captureRawStack(ENGINE_FRAME_ALLOWANCE + limit);
    const frames: StackFrame[] = [];
    for (const line of stack.split("\n").slice(1)) {
      const frame = parseFrame(line);
      if (!frame || this.isInternal(frame.path)) continue;
      frames.push(frame);
      if (frames.length >= limit) break;
    }
    return frames;
  }

  private isInternal(path: string): boolean {
    return path.startsWith("node:") || path.startsWith(this.engineDir);
  }
}

const captureRawStack = (limit: number): string => {
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = limit;
  try {
    return new Error().stack ?? "";
  } finally {
    Error.stackTraceLimit = previousLimit;
  }
};

const parseFrame = (line: string): StackFrame | undefined => {
  const match = FRAME_PATTERN.exec(line);
  if (!match) return undefined;
  const [, rawName, rawPath, rawLine] = match;
  return {
    path: normalizePath(rawPath),
    line: Number(rawLine),
    functionName: normalizeFunctionName(rawName),
  };
};

const normalizePath = (path: string): string => {
  if (!path.startsWith("file://")) return path;
  try {
    return fileURLToPath(path);
  } catch {
    return path;
  }
};

/**
 * `async Service.checkout [as run]` becomes `checkout`; frames without a
 * name report `<anonymous>`.
 */
const normalizeFunctionName = (name: string | undefined): string => {
  if (!name) return "<anonymous>";
  const bare = name
    .replace(/^async /, "")
    .replace(/^new /, "")
    .replace(/ \[as [^\]]+\]$/, "");
  const dot = bare.lastIndexOf(".");
  const last = dot >= 0 ? bare.slice(dot + 1) : bare;
  return last || "<anonymous>";
};
