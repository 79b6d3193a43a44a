import { describe, it, expect, afterEach, vi } from "vitest";

import { OpenAIGenerationClient } from "../../../src/generation/index.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("OpenAIGenerationClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends a chat completion keyed by the session and returns the first choice", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ choices: [{ message: { role: "assistant", content: "hi there" } }] }),
    );
    vi.stubGlobal("fetch", fetchMock);
    const client = new OpenAIGenerationClient({
      baseUrl: "http://llm.test/v1/",
      model: "test-model",
      systemPrompt: "Be brief.",
      temperature: 0.5,
    });

    await expect(client.generate({ sessionKey: "t1", message: "hello" })).resolves.toBe("hi there");

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://llm.test/v1/chat/completions");
    expect(init?.headers).toEqual({ "content-type": "application/json" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "hello" },
      ],
      temperature: 0.5,
      user: "t1",
    });
  });

  it("omits the system message when none is configured", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ choices: [{ message: { role: "assistant", content: "ok" } }] }));
    vi.stubGlobal("fetch", fetchMock);
    const client = new OpenAIGenerationClient({ baseUrl: "http://llm.test/v1", model: "test-model" });

    await client.generate({ sessionKey: "t1", message: "hello" });

    const [, init] = fetchMock.mock.calls[0] ?? [];
    const body = JSON.parse(String(init?.body));
    expect(body.messages).toEqual([{ role: "user", content: "hello" }]);
    expect(body.temperature).toBe(0.2);
  });

  it("rejects a completion without content", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [] })));
    const client = new OpenAIGenerationClient({ baseUrl: "http://llm.test/v1", model: "test-model" });

    await expect(client.generate({ sessionKey: "t1", message: "hello" })).rejects.toMatchObject({
      code: "empty_reply",
      message: "chat completion missing message",
    });
  });

  it("maps an error status to backend_error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("bad key", { status: 401 })));
    const client = new OpenAIGenerationClient({ baseUrl: "http://llm.test/v1", model: "test-model", apiKey: "test-secret" });

    await expect(client.generate({ sessionKey: "t1", message: "hello" })).rejects.toMatchObject({
      code: "backend_error",
      status: 401,
    });
  });
});
