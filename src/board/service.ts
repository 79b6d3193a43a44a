import crypto from "node:crypto";

import type { Logger } from "../log.js";
import { GenerationError, type GenerationClient } from "../generation/index.js";
import { BoardError, isBoardError, toBoardError, type BoardResult } from "./errors.js";
import type { TaskRepository } from "./repository/index.js";
import type { MergeStrategy, Message, Task, TaskRequest, TaskStatus } from "./types.js";

export type AdvanceTaskOptions = {
  /** Aborts the generation call; an aborted turn is recorded as a failed one. */
  signal?: AbortSignal;
};

export type BoardServiceOptions = {
  repository: TaskRepository;
  generation: GenerationClient;
  logger: Logger;
  mergeStrategy?: MergeStrategy;
  /** Upper bound for one generation call. */
  generationTimeoutMs?: number;
  idFactory?: () => string;
};

type GenerationOutcome = { status: TaskStatus; reply?: Message };

export class BoardService {
  private readonly repository: TaskRepository;
  private readonly generation: GenerationClient;
  private readonly logger: Logger;
  private readonly mergeStrategy: MergeStrategy;
  private readonly generationTimeoutMs?: number;
  private readonly idFactory: () => string;

  constructor(options: BoardServiceOptions) {
    this.repository = options.repository;
    this.generation = options.generation;
    this.logger = options.logger.child({ component: "board-service" });
    this.mergeStrategy = options.mergeStrategy ?? "atomic";
    this.generationTimeoutMs = options.generationTimeoutMs;
    this.idFactory = options.idFactory ?? (() => crypto.randomUUID());
  }

  /**
   * Creates the task or appends the request's trailing message to it, asks the
   * generation backend for a reply and commits the result.
   *
   * A failed or aborted generation is not an error here: the turn is still
   * stored and the task comes back with status ERROR and no new assistant
   * message. Errors are reserved for bad input and store anomalies.
   */
  async advanceTask(request: TaskRequest, options: AdvanceTaskOptions = {}): Promise<BoardResult<Task>> {
    if (request.messages.length === 0) {
      return fail(new BoardError("invalid_request", "Task has no messages", { taskId: request.id }));
    }

    let id = request.id ?? "";
    if (!id) {
      try {
        id = this.idFactory();
      } catch (err) {
        this.logger.error({ error: String(err) }, "task id generation failed");
        return fail(new BoardError("id_generation", "Could not generate task ID", { cause: err }));
      }
    }
    const seed: Task = {
      id,
      messages: [...request.messages],
      ...(request.status ? { status: request.status } : {}),
    };
    const incoming = request.messages[request.messages.length - 1];

    let task: Task;
    try {
      task = await this.open(seed, incoming);
    } catch (err) {
      return fail(toBoardError(err, id));
    }

    const last = task.messages[task.messages.length - 1];
    if (!last) {
      return fail(new BoardError("invalid_request", "Task has no messages", { taskId: id }));
    }

    const outcome = await this.generate(task.id, last.content, options.signal);

    try {
      return { ok: true, value: await this.commit(task, outcome) };
    } catch (err) {
      const error = toBoardError(err, id);
      this.logger.error({ taskId: id, code: error.code, error: error.message }, "task commit failed");
      return fail(error);
    }
  }

  async getTask(id: string): Promise<BoardResult<Task>> {
    try {
      return { ok: true, value: await this.repository.get(id) };
    } catch (err) {
      return fail(toBoardError(err, id));
    }
  }

  async listTasks(): Promise<BoardResult<string[]>> {
    try {
      return { ok: true, value: await this.repository.list() };
    } catch (err) {
      return fail(toBoardError(err));
    }
  }

  async deleteTask(id: string): Promise<BoardResult<void>> {
    try {
      await this.repository.delete(id);
      this.logger.info({ taskId: id }, "task deleted");
      return { ok: true, value: undefined };
    } catch (err) {
      return fail(toBoardError(err, id));
    }
  }

  private async open(seed: Task, incoming: Message): Promise<Task> {
    const turn: Message = { type: "user", content: incoming.content };

    if (this.mergeStrategy === "atomic") {
      return this.repository.upsert(seed, (existing) => ({
        ...existing,
        messages: [...existing.messages, turn],
      }));
    }

    // fetch-append: create, and on conflict read the task and append locally.
    // Two concurrent turns on one id can both read the same history here and
    // the later update wins.
    try {
      return await this.repository.create(seed);
    } catch (err) {
      if (!isBoardError(err, "conflict")) throw err;
    }
    const existing = await this.repository.get(seed.id);
    existing.messages.push(turn);
    return existing;
  }

  private async generate(taskId: string, message: string, signal?: AbortSignal): Promise<GenerationOutcome> {
    const started = Date.now();
    try {
      const reply = await this.generation.generate({
        sessionKey: taskId,
        message,
        signal: this.withTimeout(signal),
      });
      this.logger.debug({ taskId, durationMs: Date.now() - started }, "generation succeeded");
      return { status: "OK", reply: { type: "assistant", content: reply } };
    } catch (err) {
      const aborted = (err instanceof GenerationError && err.code === "aborted") || Boolean(signal?.aborted);
      const fields = { taskId, durationMs: Date.now() - started, error: err instanceof Error ? err.message : String(err) };
      if (aborted) {
        this.logger.warn(fields, "generation aborted");
      } else {
        this.logger.error(fields, "error sending request to generation backend");
      }
      return { status: "ERROR" };
    }
  }

  private async commit(task: Task, outcome: GenerationOutcome): Promise<Task> {
    const apply = (current: Task): Task => ({
      ...current,
      messages: outcome.reply ? [...current.messages, outcome.reply] : current.messages,
      status: outcome.status,
    });

    if (this.mergeStrategy === "atomic") {
      return this.repository.modify(task.id, apply);
    }
    return this.repository.update(apply(task));
  }

  private withTimeout(signal?: AbortSignal): AbortSignal | undefined {
    if (!this.generationTimeoutMs) return signal;
    const timeout = AbortSignal.timeout(this.generationTimeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}

function fail<T>(error: BoardError): BoardResult<T> {
  return { ok: false, error };
}
