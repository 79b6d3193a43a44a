/**
 * Gateway Server - JSON HTTP surface over the board service
 *
 * Routes:
 * - POST   /api/tasks      advance (create or continue) a task
 * - GET    /api/tasks      list task ids
 * - GET    /api/tasks/:id  fetch one task
 * - DELETE /api/tasks/:id  delete one task
 * - GET    /api/health
 */

import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";

import express from "express";

import type { BoardError, BoardErrorCode } from "../board/errors.js";
import { TaskRequestSchema } from "../board/schema.js";
import type { BoardService } from "../board/service.js";
import type { Logger } from "../log.js";

export interface GatewayConfig {
  port: number;
  host?: string;
}

const STATUS_BY_CODE: Record<BoardErrorCode, number> = {
  invalid_request: 400,
  not_found: 404,
  conflict: 409,
  id_generation: 500,
  store_failure: 500,
};

export function errorBody(error: BoardError): { ok: false; error: { code: BoardErrorCode; message: string } } {
  return { ok: false, error: { code: error.code, message: error.message } };
}

export function createGatewayApp(service: BoardService, logger: Logger): express.Application {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/tasks", async (req, res) => {
    const parsed = TaskRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
      res.status(400).json({ ok: false, error: { code: "invalid_request", message } });
      return;
    }

    // a client that hangs up stops waiting on the backend
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const result = await service.advanceTask(parsed.data, { signal: controller.signal });
    if (!result.ok) {
      res.status(STATUS_BY_CODE[result.error.code]).json(errorBody(result.error));
      return;
    }
    res.json({ ok: true, task: result.value });
  });

  app.get("/api/tasks", async (_req, res) => {
    const result = await service.listTasks();
    if (!result.ok) {
      res.status(STATUS_BY_CODE[result.error.code]).json(errorBody(result.error));
      return;
    }
    res.json({ ok: true, ids: result.value });
  });

  app.get("/api/tasks/:id", async (req, res) => {
    const result = await service.getTask(req.params.id);
    if (!result.ok) {
      res.status(STATUS_BY_CODE[result.error.code]).json(errorBody(result.error));
      return;
    }
    res.json({ ok: true, task: result.value });
  });

  app.delete("/api/tasks/:id", async (req, res) => {
    const result = await service.deleteTask(req.params.id);
    if (!result.ok) {
      res.status(STATUS_BY_CODE[result.error.code]).json(errorBody(result.error));
      return;
    }
    res.json({ ok: true });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const malformed = err instanceof SyntaxError;
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, "gateway request failed");
    res.status(malformed ? 400 : 500).json({
      ok: false,
      error: {
        code: malformed ? "invalid_request" : "internal",
        message: malformed ? "Request body is not valid JSON" : "Internal error",
      },
    });
  });

  return app;
}

export class GatewayServer {
  private httpServer: Server | null = null;
  private readonly config: GatewayConfig;
  private readonly logger: Logger;
  private readonly service: BoardService;

  constructor(params: { config: GatewayConfig; service: BoardService; logger: Logger }) {
    this.config = params.config;
    this.service = params.service;
    this.logger = params.logger.child({ component: "gateway" });
  }

  /** Bound address, once started. Port 0 in config resolves to the real port here. */
  address(): { host: string; port: number } | null {
    const addr = this.httpServer?.address();
    if (!addr || typeof addr === "string") return null;
    const info: AddressInfo = addr;
    return { host: info.address, port: info.port };
  }

  async start(): Promise<void> {
    if (this.httpServer) {
      this.logger.warn("Gateway already running");
      return;
    }
    const server = createServer(createGatewayApp(this.service, this.logger));
    const host = this.config.host || "127.0.0.1";

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.httpServer = server;
    this.logger.info({ host, port: this.address()?.port }, "Gateway server started");
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeAllConnections();
    });
    this.httpServer = null;
    this.logger.info("Gateway server stopped");
  }
}
