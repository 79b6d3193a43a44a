import type { Logger } from "../../log.js";
import type { LaneQueue } from "../../runtime/queue.js";
import type { Task } from "../types.js";
import { LockedTaskRepository } from "./base.js";

export class InMemoryTaskRepository extends LockedTaskRepository {
  private readonly tasks = new Map<string, Task>();

  constructor(params: { queue: LaneQueue; logger: Logger }) {
    super({ ...params, logger: params.logger.child({ component: "memory-task-store" }) });
  }

  protected async read(id: string): Promise<Task | undefined> {
    return this.tasks.get(id);
  }

  protected async write(task: Task): Promise<void> {
    this.tasks.set(task.id, task);
  }

  protected async remove(id: string): Promise<void> {
    this.tasks.delete(id);
  }

  protected async ids(): Promise<string[]> {
    return Array.from(this.tasks.keys());
  }
}
