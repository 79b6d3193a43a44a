export type MessageType = "user" | "assistant";

export interface Message {
  readonly type: MessageType;
  readonly content: string;
}

/** Outcome of the most recent generation attempt. Absent until the first one. */
export type TaskStatus = "OK" | "ERROR";

export interface Task {
  id: string;
  /** Conversation order. Only ever appended to. */
  messages: Message[];
  status?: TaskStatus;
}

/**
 * Inbound turn: either a fresh task (no id, one seed message) or a
 * continuation (existing id, one new trailing message).
 */
export interface TaskRequest {
  id?: string;
  messages: Message[];
  status?: TaskStatus;
}

export type MergeStrategy = "atomic" | "fetch-append";
