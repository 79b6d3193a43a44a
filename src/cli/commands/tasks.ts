/**
 * Task Commands - Inspect and delete tasks on a running gateway
 */

import type { TaskboardConfig } from "../../config.js";
import { GatewayClient } from "../gateway-client.js";
import { OutputFormatter } from "../output-formatter.js";

export interface TaskCommandOptions {
  json?: boolean;
  quiet?: boolean;
}

export async function showTask(cfg: TaskboardConfig, taskId: string, options: TaskCommandOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const task = await GatewayClient.fromConfig(cfg).get(taskId);
  if (options.json) {
    out.json(task);
    return;
  }
  out.task(task);
}

export async function listTasks(cfg: TaskboardConfig, options: TaskCommandOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const ids = await GatewayClient.fromConfig(cfg).list();
  if (options.json) {
    out.json(ids);
    return;
  }
  if (ids.length === 0) {
    out.print("No tasks.");
    return;
  }
  for (const id of ids) out.print(id);
}

export async function deleteTask(cfg: TaskboardConfig, taskId: string, options: TaskCommandOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  await GatewayClient.fromConfig(cfg).delete(taskId);
  if (options.json) {
    out.json({ ok: true, id: taskId });
    return;
  }
  out.success(`Deleted task ${taskId}`);
}
