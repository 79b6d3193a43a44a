import { z } from "zod";

import { TaskSchema } from "../board/schema.js";
import type { Task } from "../board/types.js";
import type { TaskboardConfig } from "../config.js";
import { ConnectionError } from "./error-handler.js";

const ErrorReplySchema = z.object({
  ok: z.literal(false),
  error: z.object({ code: z.string(), message: z.string() }),
});

const TaskReplySchema = z.object({ ok: z.literal(true), task: TaskSchema });
const IdsReplySchema = z.object({ ok: z.literal(true), ids: z.array(z.string()) });
const OkReplySchema = z.object({ ok: z.literal(true) });

/** Thin HTTP client for a running gateway. */
export class GatewayClient {
  private readonly base: string;

  constructor(base: string) {
    this.base = base.replace(/\/$/, "");
  }

  static fromConfig(cfg: TaskboardConfig): GatewayClient {
    return new GatewayClient(`http://${cfg.gateway.host}:${cfg.gateway.port}`);
  }

  async advance(message: string, taskId?: string): Promise<Task> {
    const body = { ...(taskId ? { id: taskId } : {}), messages: [{ type: "user", content: message }] };
    const data = await this.request("POST", "/api/tasks", body);
    return TaskReplySchema.parse(data).task;
  }

  async get(taskId: string): Promise<Task> {
    const data = await this.request("GET", `/api/tasks/${encodeURIComponent(taskId)}`);
    return TaskReplySchema.parse(data).task;
  }

  async list(): Promise<string[]> {
    const data = await this.request("GET", "/api/tasks");
    return IdsReplySchema.parse(data).ids;
  }

  async delete(taskId: string): Promise<void> {
    const data = await this.request("DELETE", `/api/tasks/${encodeURIComponent(taskId)}`);
    OkReplySchema.parse(data);
  }

  private async request(method: string, route: string, body?: unknown): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.base}${route}`, {
        method,
        headers: body === undefined ? undefined : { "content-type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err) {
      throw new ConnectionError(`Cannot reach gateway at ${this.base}`, {
        suggestion: "Start it with 'taskboard serve'",
        details: { error: err instanceof Error ? err.message : String(err) },
      });
    }
    const data: unknown = await res.json().catch(() => null);
    const failure = ErrorReplySchema.safeParse(data);
    if (failure.success) {
      throw new ConnectionError(failure.data.error.message, {
        details: { status: res.status, code: failure.data.error.code },
      });
    }
    if (!res.ok) {
      throw new ConnectionError(`Gateway request failed: ${res.status}`);
    }
    return data;
  }
}
