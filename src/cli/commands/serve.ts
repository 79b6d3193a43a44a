/**
 * Serve Command - Run the gateway in the foreground until interrupted
 */

import type { TaskboardConfig } from "../../config.js";
import { createBoardRuntime } from "../../runtime/board-runtime.js";
import { ValidationError } from "../error-handler.js";
import { OutputFormatter } from "../output-formatter.js";

export interface ServeOptions {
  port?: string;
  quiet?: boolean;
}

export async function serve(cfg: TaskboardConfig, options: ServeOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const port = options.port === undefined ? cfg.gateway.port : Number.parseInt(options.port, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ValidationError(`Invalid port: ${options.port}`, "Use a number between 0 and 65535");
  }
  const runtime = await createBoardRuntime({ ...cfg, gateway: { ...cfg.gateway, port } });
  await runtime.gateway.start();

  const addr = runtime.gateway.address();
  out.success(`taskboard listening on http://${addr?.host ?? cfg.gateway.host}:${addr?.port ?? port}`);

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      resolve();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });

  await runtime.gateway.stop();
  runtime.logger.flush();
}
