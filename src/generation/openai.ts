import { z } from "zod";

import { postJson } from "./http.js";
import { GenerationError, type GenerationClient, type GenerationRequest } from "./types.js";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string | null;
};

const ChatCompletionReplySchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() })),
});

/**
 * OpenAI-compatible `/chat/completions` backend. The session key is sent as
 * the `user` field; conversation memory stays on the backend side.
 */
export class OpenAIGenerationClient implements GenerationClient {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly systemPrompt?: string;

  constructor(params: {
    baseUrl: string;
    model: string;
    apiKey?: string;
    temperature?: number;
    systemPrompt?: string;
  }) {
    this.baseUrl = params.baseUrl.replace(/\/$/, "");
    this.apiKey = params.apiKey;
    this.model = params.model;
    this.temperature = params.temperature ?? 0.2;
    this.systemPrompt = params.systemPrompt?.trim() || undefined;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const messages: ChatMessage[] = [];
    if (this.systemPrompt) messages.push({ role: "system", content: this.systemPrompt });
    messages.push({ role: "user", content: request.message });

    const data = await postJson(
      `${this.baseUrl}/chat/completions`,
      {
        model: this.model,
        messages,
        temperature: this.temperature,
        user: request.sessionKey,
      },
      { apiKey: this.apiKey, signal: request.signal, label: "chat completion" },
    );

    const parsed = ChatCompletionReplySchema.safeParse(data);
    const content = parsed.success ? parsed.data.choices[0]?.message?.content : undefined;
    if (typeof content !== "string" || !content.trim()) {
      throw new GenerationError("empty_reply", "chat completion missing message");
    }
    return content;
  }
}
