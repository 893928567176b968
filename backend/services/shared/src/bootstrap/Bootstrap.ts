// backend/services/shared/src/bootstrap/Bootstrap.ts
/**
 * Purpose:
 * - Uniform, minimal service bootstrap: load envs, install the pino root
 *   logger, run preStart(), start HTTP server, graceful shutdown.
 *
 * Environment loading:
 * - Delegated to env.ts (service root, then repo root; first value wins).
 * - Fail-fast for required keys (LOG_LEVEL, the port var).
 */

import http, { type RequestListener } from "http";
import type { Logger as PinoLogger } from "pino";
import { loadEnvCascadeForService, requireEnv, requireNumber } from "../env";
import {
  getLogger,
  parseLevel,
  setLogLevel,
  setRootLogger,
  type IBoundLogger,
} from "../logger/Logger";
import { createPinoRoot } from "../logger/pinoRoot";

export interface BootstrapOptions {
  service: string;
  /** Absolute service directory; service-local .env files live here. */
  serviceRoot: string;
  portEnvName?: string;
  host?: string;
}

export interface RunHooks {
  /** Awaited before listen (DB connect, app boot, etc.). */
  preStart?: () => Promise<void>;
  onShutdown?: () => Promise<void>;
}

export type BootContext = {
  /** Raw pino instance, shared with pino-http. */
  pino: PinoLogger;
  log: IBoundLogger;
};

export class Bootstrap {
  private readonly opts: Required<BootstrapOptions>;
  private loggerHandle: IBoundLogger;

  public get logger(): IBoundLogger {
    return this.loggerHandle;
  }

  constructor(options: BootstrapOptions) {
    this.opts = {
      ...options,
      portEnvName: options.portEnvName ?? "PORT",
      host: options.host ?? "0.0.0.0",
    };
    this.loggerHandle = getLogger().bind({ service: options.service });
  }

  /**
   * Loads env and installs logging. Returns the boot context the caller
   * uses to compose its app before run().
   */
  public init(): BootContext {
    const loaded = loadEnvCascadeForService(this.opts.serviceRoot);

    const level = parseLevel(requireEnv("LOG_LEVEL"));
    setLogLevel(level);
    const root = createPinoRoot({ service: this.opts.service, level });
    setRootLogger(root.sink);
    this.loggerHandle = getLogger().bind({ service: this.opts.service });

    this.logger.debug(
      { files: loaded, mode: process.env.NODE_ENV ?? "dev" },
      "env_loaded"
    );
    return { pino: root.pino, log: this.logger };
  }

  /** buildHandler is called after preStart resolves. */
  public async run(
    buildHandler: () => RequestListener,
    hooks: RunHooks = {}
  ): Promise<http.Server> {
    const port = requireNumber(this.opts.portEnvName);

    if (hooks.preStart) {
      await this.safe("preStart", hooks.preStart);
    }

    const server = http.createServer(buildHandler());

    server.listen(port, this.opts.host, () => {
      this.logger.info(
        { port, host: this.opts.host, pid: process.pid },
        "listening"
      );
    });

    server.on("error", (err) => {
      this.logger.error({ err: String(err) }, "server_error");
      process.exitCode = 1;
    });

    const shutdown = (signal: NodeJS.Signals): void => {
      this.logger.info({ signal }, "shutdown_signal");
      const hook = hooks.onShutdown ?? (async () => undefined);
      void hook()
        .catch((err: unknown) => {
          this.logger.warn({ err: String(err) }, "shutdown_hook_error");
        })
        .finally(() => {
          server.close(() => process.exit(0));
          setTimeout(() => process.exit(0), 3000).unref();
        });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    return server;
  }

  private async safe(name: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.error({ err: String(err) }, `${name}_failed`);
      throw err;
    }
  }
}
