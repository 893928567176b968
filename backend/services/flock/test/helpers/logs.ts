// backend/services/flock/test/helpers/logs.ts
/**
 * Swap the shared logger's root for an in-memory sink so specs can assert on
 * emitted lines. `restore()` puts back the quiet sink from setup.ts.
 */

import { setLogLevel, setRootLogger, type LevelName } from "@flock/shared/logger/Logger";

export type CapturedLine = {
  level: "edge" | LevelName;
  obj: Record<string, unknown>;
  msg?: string;
};

const noop = (): void => undefined;

export function captureLogs(level: LevelName = "debug") {
  const lines: CapturedLine[] = [];
  const push =
    (lvl: CapturedLine["level"]) =>
    (obj: Record<string, unknown>, msg?: string): void => {
      lines.push({ level: lvl, obj, msg });
    };

  setLogLevel(level);
  setRootLogger({
    edge: push("edge"),
    info: push("info"),
    debug: push("debug"),
    warn: push("warn"),
    error: push("error"),
  });

  return {
    lines,
    find(msg: string): CapturedLine | undefined {
      return lines.find((l) => l.msg === msg);
    },
    restore(): void {
      setLogLevel("error");
      setRootLogger({ info: noop, debug: noop, warn: noop, error: noop });
    },
  };
}
