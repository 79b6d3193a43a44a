export type BoardErrorCode =
  | "id_generation"
  | "conflict"
  | "not_found"
  | "invalid_request"
  | "store_failure";

export class BoardError extends Error {
  readonly code: BoardErrorCode;
  readonly taskId?: string;

  constructor(code: BoardErrorCode, message: string, options: { taskId?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "BoardError";
    this.code = code;
    this.taskId = options.taskId;
  }
}

export function conflictError(taskId: string): BoardError {
  return new BoardError("conflict", `Task with ID ${taskId} already exists`, { taskId });
}

export function notFoundError(taskId: string): BoardError {
  return new BoardError("not_found", `Task with ID ${taskId} not found`, { taskId });
}

export function isBoardError(err: unknown, code?: BoardErrorCode): err is BoardError {
  if (!(err instanceof BoardError)) return false;
  return code === undefined || err.code === code;
}

/** Normalises anything a store throws into a BoardError. */
export function toBoardError(err: unknown, taskId?: string): BoardError {
  if (err instanceof BoardError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new BoardError("store_failure", `Task store failure: ${detail}`, { taskId, cause: err });
}

export type BoardResult<T> = { ok: true; value: T } | { ok: false; error: BoardError };
