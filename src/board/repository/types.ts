import type { Task } from "../types.js";

export type TaskMerge = (existing: Task) => Task;

/**
 * Keyed task persistence. Every operation is linearizable per id, and every
 * task handed out is a copy the caller may mutate freely.
 *
 * Failures reject with a BoardError: `conflict` for a duplicate create,
 * `not_found` for a missing id, `store_failure` for anything else.
 */
export interface TaskRepository {
  create(task: Task): Promise<Task>;
  get(id: string): Promise<Task>;
  update(task: Task): Promise<Task>;
  delete(id: string): Promise<void>;
  /** Inserts `task`, or stores `merge(existing)` when the id is taken, in one step. */
  upsert(task: Task, merge: TaskMerge): Promise<Task>;
  /** Stores `mutate(current)` in one step; `not_found` when the id is absent. */
  modify(id: string, mutate: TaskMerge): Promise<Task>;
  list(): Promise<string[]>;
}
