/**
 * Send Command - Post one conversation turn to a running gateway
 */

import type { TaskboardConfig } from "../../config.js";
import { ValidationError } from "../error-handler.js";
import { GatewayClient } from "../gateway-client.js";
import { OutputFormatter } from "../output-formatter.js";

export interface SendOptions {
  task?: string;
  json?: boolean;
  quiet?: boolean;
}

export async function send(cfg: TaskboardConfig, message: string, options: SendOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  if (!message?.trim()) {
    throw new ValidationError("Message cannot be empty", 'Provide a message: taskboard send "hello"');
  }

  const task = await GatewayClient.fromConfig(cfg).advance(message.trim(), options.task?.trim() || undefined);

  if (options.json) {
    out.json(task);
    return;
  }
  const last = task.messages[task.messages.length - 1];
  if (task.status === "OK" && last?.type === "assistant") {
    out.print(last.content);
  } else {
    out.warn("Message recorded, but the assistant could not respond.");
  }
  out.keyValue("task", task.id);
}
