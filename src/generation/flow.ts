import { z } from "zod";

import { postJson } from "./http.js";
import { GenerationError, type GenerationClient, type GenerationRequest } from "./types.js";

const FlowReplySchema = z.object({ result: z.string() });

/**
 * Client for a session-aware flow server: the server keys its conversation
 * memory on `sessionKey`, so only the newest message travels per call.
 *
 * Wire shape: `POST <baseUrl><flowPath>` with `{ data: { sessionKey, message } }`,
 * answered by `{ result: "<reply>" }`.
 */
export class FlowGenerationClient implements GenerationClient {
  private readonly url: string;
  private readonly apiKey?: string;

  constructor(params: { baseUrl: string; flowPath: string; apiKey?: string }) {
    this.url = `${params.baseUrl.replace(/\/$/, "")}${params.flowPath}`;
    this.apiKey = params.apiKey;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const data = await postJson(
      this.url,
      { data: { sessionKey: request.sessionKey, message: request.message } },
      { apiKey: this.apiKey, signal: request.signal, label: "flow request" },
    );
    const parsed = FlowReplySchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError("empty_reply", "flow reply missing result");
    }
    return parsed.data.result;
  }
}
