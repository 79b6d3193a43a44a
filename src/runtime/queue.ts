import type { Logger } from "../log.js";

type LaneJob = {
  enqueuedAt: number;
  // runs the work and hands back the call that settles the caller's promise
  execute: () => Promise<{ failed: boolean; settle: () => void }>;
};

type Lane = {
  name: string;
  pending: LaneJob[];
  running: number;
  maxConcurrent: number;
  pumping: boolean;
};

export type LaneSnapshot = {
  lane: string;
  pending: number;
  running: number;
  maxConcurrent: number;
};

/**
 * Named FIFO lanes with bounded concurrency. A lane left at the default
 * concurrency of 1 runs one job at a time, which makes it an exclusion lock
 * for whatever state its jobs touch.
 */
export class LaneQueue {
  private readonly lanes = new Map<string, Lane>();
  private readonly logger: Logger;
  private readonly warnAfterMs: number;

  constructor(logger: Logger, warnAfterMs: number) {
    this.logger = logger;
    this.warnAfterMs = warnAfterMs;
  }

  setConcurrency(lane: string, maxConcurrent: number): void {
    const state = this.lane(lane);
    state.maxConcurrent = Math.max(1, Math.floor(maxConcurrent));
    this.pump(state);
  }

  run<T>(lane: string, work: () => Promise<T> | T): Promise<T> {
    const state = this.lane(lane);
    return new Promise<T>((resolve, reject) => {
      state.pending.push({
        enqueuedAt: Date.now(),
        execute: async () => {
          try {
            const value = await work();
            return { failed: false, settle: () => resolve(value) };
          } catch (err) {
            return { failed: true, settle: () => reject(err) };
          }
        },
      });
      this.pump(state);
    });
  }

  size(lane: string): number {
    const state = this.lanes.get(lane);
    if (!state) return 0;
    return state.pending.length + state.running;
  }

  snapshot(): LaneSnapshot[] {
    return Array.from(this.lanes.values())
      .map((state) => ({
        lane: state.name,
        pending: state.pending.length,
        running: state.running,
        maxConcurrent: state.maxConcurrent,
      }))
      .sort((a, b) => a.lane.localeCompare(b.lane));
  }

  private lane(name: string): Lane {
    const key = name.trim() || "default";
    const existing = this.lanes.get(key);
    if (existing) return existing;
    const created: Lane = { name: key, pending: [], running: 0, maxConcurrent: 1, pumping: false };
    this.lanes.set(key, created);
    return created;
  }

  private pump(state: Lane): void {
    if (state.pumping) return;
    state.pumping = true;
    while (state.running < state.maxConcurrent) {
      const job = state.pending.shift();
      if (!job) break;
      const waitedMs = Date.now() - job.enqueuedAt;
      if (waitedMs >= this.warnAfterMs) {
        this.logger.warn({ lane: state.name, waitedMs }, "lane wait exceeded");
      }
      state.running += 1;
      void this.execute(state, job);
    }
    state.pumping = false;
  }

  private async execute(state: Lane, job: LaneJob): Promise<void> {
    const start = Date.now();
    const outcome = await job.execute();
    state.running -= 1;
    this.logger.debug(
      { lane: state.name, durationMs: Date.now() - start, failed: outcome.failed },
      "lane job finished",
    );
    this.pump(state);
    outcome.settle();
  }
}
