import { vi } from "vitest";

import type { Task } from "../../src/board/types.js";
import { GenerationError, type GenerationClient, type GenerationRequest } from "../../src/generation/index.js";
import { createLogger, type Logger } from "../../src/log.js";
import { LaneQueue } from "../../src/runtime/queue.js";

export function silentLogger(): Logger {
  return createLogger("silent");
}

export function createQueue(logger: Logger = silentLogger()): LaneQueue {
  return new LaneQueue(logger, 60_000);
}

export function exchange(id: string, question: string, answer: string): Task {
  return {
    id,
    messages: [
      { type: "user", content: question },
      { type: "assistant", content: answer },
    ],
    status: "OK",
  };
}

type Deferred = {
  request: GenerationRequest;
  resolve: (reply: string) => void;
  reject: (err: unknown) => void;
};

/**
 * Generation stand-in. By default it answers immediately via `reply`;
 * with `hold()` every call parks until the test settles it.
 */
export class ScriptedGeneration implements GenerationClient {
  readonly calls: GenerationRequest[] = [];
  readonly pending: Deferred[] = [];
  private holding = false;

  constructor(private reply: (request: GenerationRequest) => string | Promise<string> = (r) => `echo: ${r.message}`) {}

  respondWith(reply: (request: GenerationRequest) => string | Promise<string>): void {
    this.reply = reply;
  }

  failWith(message = "backend down"): void {
    this.reply = () => {
      throw new GenerationError("backend_error", message, { status: 502 });
    };
  }

  hold(): void {
    this.holding = true;
  }

  generate = vi.fn(async (request: GenerationRequest): Promise<string> => {
    this.calls.push(request);
    if (!this.holding) return this.reply(request);
    return new Promise<string>((resolve, reject) => {
      this.pending.push({ request, resolve, reject });
      request.signal?.addEventListener(
        "abort",
        () => reject(new GenerationError("aborted", "generation aborted", { cause: request.signal?.reason })),
        { once: true },
      );
    });
  });
}
