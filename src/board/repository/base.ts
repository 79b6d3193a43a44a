import type { Logger } from "../../log.js";
import type { LaneQueue } from "../../runtime/queue.js";
import { BoardError, conflictError, notFoundError, toBoardError } from "../errors.js";
import type { Task } from "../types.js";
import type { TaskMerge, TaskRepository } from "./types.js";

const STORE_LANE = "task-store";

/**
 * Implements the repository contract on top of three storage primitives.
 * Every operation runs as one job on a single queue lane, so the whole
 * keyspace sits behind one exclusion lock held only for the storage access.
 */
export abstract class LockedTaskRepository implements TaskRepository {
  protected readonly logger: Logger;
  private readonly queue: LaneQueue;
  private readonly lane: string;

  protected constructor(params: { queue: LaneQueue; logger: Logger; lane?: string }) {
    this.queue = params.queue;
    this.logger = params.logger;
    this.lane = params.lane ?? STORE_LANE;
    this.queue.setConcurrency(this.lane, 1);
  }

  protected abstract read(id: string): Promise<Task | undefined>;
  protected abstract write(task: Task): Promise<void>;
  protected abstract remove(id: string): Promise<void>;
  protected abstract ids(): Promise<string[]>;

  create(task: Task): Promise<Task> {
    return this.locked(task.id, async () => {
      this.assertId(task.id);
      if (await this.read(task.id)) throw conflictError(task.id);
      const stored = structuredClone(task);
      await this.write(stored);
      this.logger.debug({ taskId: task.id }, "task created");
      return structuredClone(stored);
    });
  }

  get(id: string): Promise<Task> {
    return this.locked(id, async () => structuredClone(await this.require(id)));
  }

  update(task: Task): Promise<Task> {
    return this.locked(task.id, async () => {
      await this.require(task.id);
      const stored = structuredClone(task);
      await this.write(stored);
      return structuredClone(stored);
    });
  }

  delete(id: string): Promise<void> {
    return this.locked(id, async () => {
      await this.require(id);
      await this.remove(id);
      this.logger.debug({ taskId: id }, "task deleted");
    });
  }

  upsert(task: Task, merge: TaskMerge): Promise<Task> {
    return this.locked(task.id, async () => {
      this.assertId(task.id);
      const existing = await this.read(task.id);
      const next = existing ? merge(structuredClone(existing)) : structuredClone(task);
      this.assertSameId(task.id, next);
      await this.write(next);
      return structuredClone(next);
    });
  }

  modify(id: string, mutate: TaskMerge): Promise<Task> {
    return this.locked(id, async () => {
      const current = await this.require(id);
      const next = mutate(structuredClone(current));
      this.assertSameId(id, next);
      await this.write(next);
      return structuredClone(next);
    });
  }

  list(): Promise<string[]> {
    return this.locked(undefined, async () => (await this.ids()).sort());
  }

  private async require(id: string): Promise<Task> {
    const task = await this.read(id);
    if (!task) throw notFoundError(id);
    return task;
  }

  private assertId(id: string): void {
    if (!id.trim()) {
      throw new BoardError("invalid_request", "Task ID is required");
    }
  }

  private assertSameId(id: string, task: Task): void {
    if (task.id !== id) {
      throw new BoardError("invalid_request", `Merge changed task ID from ${id} to ${task.id}`, { taskId: id });
    }
  }

  private async locked<T>(taskId: string | undefined, work: () => Promise<T>): Promise<T> {
    try {
      return await this.queue.run(this.lane, work);
    } catch (err) {
      throw toBoardError(err, taskId);
    }
  }
}
