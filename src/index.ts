export { BoardService, type AdvanceTaskOptions, type BoardServiceOptions } from "./board/service.js";
export { BoardError, isBoardError, type BoardErrorCode, type BoardResult } from "./board/errors.js";
export {
  createTaskRepository,
  FileTaskRepository,
  InMemoryTaskRepository,
  LockedTaskRepository,
  type TaskMerge,
  type TaskRepository,
} from "./board/repository/index.js";
export type { MergeStrategy, Message, MessageType, Task, TaskRequest, TaskStatus } from "./board/types.js";
export {
  createGenerationClient,
  FlowGenerationClient,
  GenerationError,
  OpenAIGenerationClient,
  type GenerationClient,
  type GenerationErrorCode,
  type GenerationRequest,
} from "./generation/index.js";
export { loadConfig, parseConfig, resolveConfigPath, type TaskboardConfig } from "./config.js";
export { createLogger, type Logger, type LogLevel } from "./log.js";
export { LaneQueue } from "./runtime/queue.js";
export { createBoardRuntime, type BoardRuntime } from "./runtime/board-runtime.js";
export { createGatewayApp, GatewayServer } from "./gateway/server.js";
