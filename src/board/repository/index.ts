import type { TaskboardConfig } from "../../config.js";
import type { Logger } from "../../log.js";
import type { LaneQueue } from "../../runtime/queue.js";
import { FileTaskRepository } from "./file.js";
import { InMemoryTaskRepository } from "./memory.js";
import type { TaskRepository } from "./types.js";

export { LockedTaskRepository } from "./base.js";
export { FileTaskRepository } from "./file.js";
export { InMemoryTaskRepository } from "./memory.js";
export type { TaskMerge, TaskRepository } from "./types.js";

export async function createTaskRepository(
  cfg: TaskboardConfig,
  deps: { queue: LaneQueue; logger: Logger },
): Promise<TaskRepository> {
  if (cfg.store.type === "file") {
    const repository = new FileTaskRepository({ dir: cfg.resolved.storeDir, ...deps });
    await repository.initialize();
    deps.logger.info({ dir: cfg.resolved.storeDir }, "using file task store");
    return repository;
  }
  deps.logger.info("using in-memory task store");
  return new InMemoryTaskRepository(deps);
}
