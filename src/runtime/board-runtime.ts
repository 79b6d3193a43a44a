import { createTaskRepository, type TaskRepository } from "../board/repository/index.js";
import { BoardService } from "../board/service.js";
import type { TaskboardConfig } from "../config.js";
import { GatewayServer } from "../gateway/server.js";
import { createGenerationClient, type GenerationClient } from "../generation/index.js";
import { createLogger, type Logger } from "../log.js";
import { LaneQueue } from "./queue.js";

export type BoardRuntime = {
  logger: Logger;
  queue: LaneQueue;
  repository: TaskRepository;
  service: BoardService;
  gateway: GatewayServer;
};

/** Builds the full object graph from config. Pass `generation` or `logger` to swap in stand-ins. */
export async function createBoardRuntime(
  cfg: TaskboardConfig,
  overrides: { generation?: GenerationClient; logger?: Logger } = {},
): Promise<BoardRuntime> {
  const logger =
    overrides.logger ?? createLogger(cfg.logging.level, cfg.resolved.logFilePath, cfg.logging.fileLevel);
  const queue = new LaneQueue(logger.child({ component: "queue" }), cfg.queue.warnAfterMs);
  const repository = await createTaskRepository(cfg, { queue, logger });
  const service = new BoardService({
    repository,
    generation: overrides.generation ?? createGenerationClient(cfg),
    logger,
    mergeStrategy: cfg.board.mergeStrategy,
    generationTimeoutMs: cfg.generation.timeoutMs,
  });
  const gateway = new GatewayServer({ config: cfg.gateway, service, logger });
  return { logger, queue, repository, service, gateway };
}
