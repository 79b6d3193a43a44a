export interface GenerationRequest {
  /** Task ID; lets the backend keep its own per-session context. */
  sessionKey: string;
  /** Text of the latest user message. */
  message: string;
  signal?: AbortSignal;
}

/**
 * Produces one reply per call. Implementations do not retry and reject with
 * a GenerationError when the backend is unreachable, refuses the request or
 * the signal fires.
 */
export interface GenerationClient {
  generate(request: GenerationRequest): Promise<string>;
}

export type GenerationErrorCode = "unreachable" | "backend_error" | "empty_reply" | "aborted";

export class GenerationError extends Error {
  readonly code: GenerationErrorCode;
  readonly status?: number;

  constructor(code: GenerationErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "GenerationError";
    this.code = code;
    this.status = options.status;
  }
}
