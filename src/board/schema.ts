import { z } from "zod";

export const MessageSchema = z.object({
  type: z.enum(["user", "assistant"]),
  content: z.string(),
});

export const TaskStatusSchema = z.enum(["OK", "ERROR"]);

export const TaskSchema = z.object({
  id: z.string().min(1),
  messages: z.array(MessageSchema),
  status: TaskStatusSchema.optional(),
});

export const TaskRequestSchema = z.object({
  id: z.string().optional(),
  messages: z.array(MessageSchema).default([]),
  status: TaskStatusSchema.optional(),
});
