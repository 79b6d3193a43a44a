import type { TaskboardConfig } from "../config.js";
import { FlowGenerationClient } from "./flow.js";
import { OpenAIGenerationClient } from "./openai.js";
import type { GenerationClient } from "./types.js";

export { FlowGenerationClient } from "./flow.js";
export { OpenAIGenerationClient } from "./openai.js";
export { GenerationError } from "./types.js";
export type { GenerationClient, GenerationErrorCode, GenerationRequest } from "./types.js";

export function createGenerationClient(cfg: TaskboardConfig): GenerationClient {
  const gen = cfg.generation;
  if (gen.type === "openai") {
    return new OpenAIGenerationClient({
      baseUrl: gen.baseUrl,
      apiKey: gen.apiKey,
      model: gen.model,
      temperature: gen.temperature,
      systemPrompt: gen.systemPrompt,
    });
  }
  return new FlowGenerationClient({ baseUrl: gen.baseUrl, flowPath: gen.flowPath, apiKey: gen.apiKey });
}
