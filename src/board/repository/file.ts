import fs from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../../log.js";
import type { LaneQueue } from "../../runtime/queue.js";
import { BoardError } from "../errors.js";
import { TaskSchema } from "../schema.js";
import type { Task } from "../types.js";
import { LockedTaskRepository } from "./base.js";

const TASK_FILE_SUFFIX = ".json";

/**
 * One JSON document per task under `dir`. Writes land in a temp file first
 * and are renamed into place, so a reader never sees a half-written task.
 */
export class FileTaskRepository extends LockedTaskRepository {
  private readonly dir: string;

  constructor(params: { dir: string; queue: LaneQueue; logger: Logger }) {
    super({ queue: params.queue, logger: params.logger.child({ component: "file-task-store" }) });
    this.dir = params.dir;
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  taskFile(id: string): string {
    return path.join(this.dir, `${encodeURIComponent(id)}${TASK_FILE_SUFFIX}`);
  }

  protected async read(id: string): Promise<Task | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.taskFile(id), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
    const parsed = TaskSchema.safeParse(safeJson(raw));
    if (!parsed.success) {
      this.logger.warn({ taskId: id, issues: parsed.error.issues.length }, "invalid task document");
      throw new BoardError("store_failure", `Stored task ${id} is corrupt`, { taskId: id, cause: parsed.error });
    }
    return parsed.data;
  }

  protected async write(task: Task): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.taskFile(task.id);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(temp, JSON.stringify(task, null, 2), "utf-8");
    await fs.rename(temp, target);
  }

  protected async remove(id: string): Promise<void> {
    await fs.unlink(this.taskFile(id));
  }

  protected async ids(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return files
      .filter((file) => file.endsWith(TASK_FILE_SUFFIX))
      .map((file) => decodeURIComponent(file.slice(0, -TASK_FILE_SUFFIX.length)));
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
