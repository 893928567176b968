// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API for all services with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 * - edge() is a first-class channel for ingress events (always enabled).
 * - debug() adds origin capture (file/method/line).
 *
 * Runtime Controls:
 * - LOG_LEVEL = debug | info | warn | error   (set via setLogLevel at boot)
 *
 * Notes:
 * - The root sink is pluggable (setRootLogger). Services install a pino root;
 *   tests and early boot fall back to a timestamped console writer.
 */

type Json = Record<string, unknown>;

type LogMethod = {
  (msg: string, ...rest: unknown[]): void;
  (obj: Json, msg?: string, ...rest: unknown[]): void;
};

/** Canonical root contract: what a sink (pino or console) must accept. */
export interface ILogger {
  edge(obj: Json, msg?: string, ...rest: unknown[]): void;
  info(obj: Json, msg?: string, ...rest: unknown[]): void;
  debug(obj: Json, msg?: string, ...rest: unknown[]): void;
  warn(obj: Json, msg?: string, ...rest: unknown[]): void;
  error(obj: Json, msg?: string, ...rest: unknown[]): void;
}

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  edge: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  };
}

export type LevelName = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LevelName, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// ────────────────────────────────────────────────────────────────────────────
// Root logger + level
// ────────────────────────────────────────────────────────────────────────────

let ROOT: ILogger | null = null;
let LEVEL: LevelName = "info";

export function parseLevel(raw: string): LevelName {
  const v = raw.toLowerCase().trim();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  throw new Error(
    `Logger: invalid LOG_LEVEL="${raw}". Use one of debug|info|warn|error.`
  );
}

/** Must be called once early (Bootstrap, after env is resolved). */
export function setLogLevel(level: LevelName): void {
  LEVEL = level;
}

function levelAllows(target: LevelName): boolean {
  return LEVEL_ORDER[target] >= LEVEL_ORDER[LEVEL];
}

/** Local-time timestamp "YYYY-MM-DD HH:mm:ss". */
function tsLocal(): string {
  const d = new Date();
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${p(d.getMonth() + 1)}-${p(d.getDate())} ${p(
    d.getHours()
  )}:${p(d.getMinutes())}:${p(d.getSeconds())}`;
}

type Tag = "EDGE" | "INFO" | "DEBUG" | "WARN" | "ERROR";

/** Create a prefixed console writer for a given level tag. */
function writer(tag: Tag) {
  const c =
    tag === "ERROR"
      ? console.error
      : tag === "WARN"
      ? console.warn
      : tag === "DEBUG"
      ? console.debug
      : console.log;

  const displayTag =
    tag === "ERROR" ? "***ERROR***" : tag === "WARN" ? "**WARN" : tag;

  return (obj: Json, msg?: string, ...rest: unknown[]) => {
    const prefix = `${displayTag} ${tsLocal()}`;
    if (msg !== undefined) c(prefix, msg, obj, ...rest);
    else c(prefix, obj, ...rest);
  };
}

const consoleRoot: ILogger = {
  edge: writer("EDGE"),
  info: writer("INFO"),
  debug: writer("DEBUG"),
  warn: writer("WARN"),
  error: writer("ERROR"),
};

/** Sinks may omit edge (pino has no such level); it then routes to info. */
export type RootLike = Omit<ILogger, "edge"> & Partial<Pick<ILogger, "edge">>;

export function setRootLogger(logger: RootLike): void {
  // pino methods depend on `this`; keep every call on the sink object.
  ROOT = {
    edge: (obj, msg, ...rest) =>
      logger.edge
        ? logger.edge(obj, msg, ...rest)
        : logger.info(obj, msg, ...rest),
    info: (obj, msg, ...rest) => logger.info(obj, msg, ...rest),
    debug: (obj, msg, ...rest) => logger.debug(obj, msg, ...rest),
    warn: (obj, msg, ...rest) => logger.warn(obj, msg, ...rest),
    error: (obj, msg, ...rest) => logger.error(obj, msg, ...rest),
  };
}

export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(initialCtx);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

class BoundLogger implements IBoundLogger {
  constructor(private readonly ctx: Json = {}) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  private root(): ILogger {
    return ROOT ?? consoleRoot;
  }

  // edge (always enabled)
  public edge = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    if (obj["category"] == null) obj["category"] = "edge";
    this.root().edge(obj, msg, ...tail);
  };

  public info = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    if (!levelAllows("info")) return;
    const [obj, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().info(obj, msg, ...tail);
  };

  // debug always includes origin
  public debug = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    if (!levelAllows("debug")) return;
    const [obj0, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    const obj = { ...obj0, origin: captureOrigin(2) };
    this.root().debug(obj, msg, ...tail);
  };

  public warn = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    if (!levelAllows("warn")) return;
    const [obj, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().warn(obj, msg, ...tail);
  };

  // error (always logs)
  public error = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg, tail] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().error(obj, msg, ...tail);
  };

  public serializeError(err: unknown) {
    if (err instanceof Error)
      return { name: err.name, message: err.message, stack: err.stack };
    return { message: String(err) };
  }
}

function isPlainObject(x: unknown): x is Json {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/** Normalize args for BoundLogger while merging in bound context. */
function normalizeForBound(
  boundCtx: Json,
  arg1: unknown,
  arg2?: unknown,
  rest: unknown[] = []
): [Json, string | undefined, unknown[]] {
  const meta: Json = {};
  const tail: unknown[] = [];
  let msg: string | undefined;

  if (typeof arg1 === "string") {
    msg = arg1;
    for (const x of [arg2, ...rest]) {
      if (isPlainObject(x)) Object.assign(meta, x);
      else if (x !== undefined) tail.push(x);
    }
  } else if (isPlainObject(arg1)) {
    Object.assign(meta, arg1);
    const more = typeof arg2 === "string" ? rest : [arg2, ...rest];
    if (typeof arg2 === "string") msg = arg2;
    for (const x of more) {
      if (isPlainObject(x)) Object.assign(meta, x);
      else if (x !== undefined) tail.push(x);
    }
  } else {
    meta["arg0"] = arg1;
    if (arg2 !== undefined) meta["arg1"] = arg2;
    tail.push(...rest);
  }

  return [{ ...boundCtx, ...meta }, msg, tail];
}

// ────────────────────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────────────────────

/** Capture file/method/line from the current stack frame. */
function captureOrigin(depth = 2): Record<string, string | number | undefined> {
  const e = new Error();
  const lines = (e.stack || "").split("\n");
  const line = lines[depth + 1] || "";
  const m =
    /at\s+(?<method>[^(\s]+)?\s*\(?((?<file>[^:()]+):(?<line>\d+):(?<col>\d+))\)?/i.exec(
      line
    );
  if (!m || !m.groups) return {};
  const file = shortenPath(m.groups.file || "");
  return { file, method: m.groups.method, line: Number(m.groups.line) };
}

/** Shorten absolute paths to repo-relative where possible (heuristic). */
function shortenPath(abs: string): string {
  const anchors = ["/backend/", "/src/"];
  for (const a of anchors) {
    const i = abs.indexOf(a);
    if (i >= 0) return abs.slice(i + 1);
  }
  return abs;
}
