import { describe, it, expect, afterEach, vi } from "vitest";

import { FlowGenerationClient, GenerationError } from "../../../src/generation/index.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("FlowGenerationClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the session key and message and returns the result", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ result: "hi there" }));
    vi.stubGlobal("fetch", fetchMock);
    const client = new FlowGenerationClient({ baseUrl: "http://flow.test/", flowPath: "/chatFlow", apiKey: "test-secret" });

    await expect(client.generate({ sessionKey: "t1", message: "hello" })).resolves.toBe("hi there");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://flow.test/chatFlow");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({ data: { sessionKey: "t1", message: "hello" } });
  });

  it("maps a non-2xx reply to backend_error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("overloaded", { status: 503 })));
    const client = new FlowGenerationClient({ baseUrl: "http://flow.test", flowPath: "/chatFlow" });

    const err = await client.generate({ sessionKey: "t1", message: "hello" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toMatchObject({ code: "backend_error", status: 503, message: "flow request failed: 503 overloaded" });
  });

  it("maps a network failure to unreachable", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));
    const client = new FlowGenerationClient({ baseUrl: "http://flow.test", flowPath: "/chatFlow" });

    await expect(client.generate({ sessionKey: "t1", message: "hello" })).rejects.toMatchObject({
      code: "unreachable",
      message: "flow request unreachable: fetch failed",
    });
  });

  it("rejects a reply without a result", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ output: "hi" })));
    const client = new FlowGenerationClient({ baseUrl: "http://flow.test", flowPath: "/chatFlow" });

    await expect(client.generate({ sessionKey: "t1", message: "hello" })).rejects.toMatchObject({
      code: "empty_reply",
      message: "flow reply missing result",
    });
  });

  it("rejects a non-string result", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ result: 42 })));
    const client = new FlowGenerationClient({ baseUrl: "http://flow.test", flowPath: "/chatFlow" });

    await expect(client.generate({ sessionKey: "t1", message: "hello" })).rejects.toMatchObject({ code: "empty_reply" });
  });

  it("passes a blank result through as the reply", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ result: "" })));
    const client = new FlowGenerationClient({ baseUrl: "http://flow.test", flowPath: "/chatFlow" });

    await expect(client.generate({ sessionKey: "t1", message: "hello" })).resolves.toBe("");
  });

  it("does not call the backend once the signal has fired", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ result: "late" }));
    vi.stubGlobal("fetch", fetchMock);
    const client = new FlowGenerationClient({ baseUrl: "http://flow.test", flowPath: "/chatFlow" });
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.generate({ sessionKey: "t1", message: "hello", signal: controller.signal }),
    ).rejects.toMatchObject({ code: "aborted" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports an in-flight abort as aborted", async () => {
    const controller = new AbortController();
    vi.stubGlobal("fetch", vi.fn((_url: string, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
    })));
    const client = new FlowGenerationClient({ baseUrl: "http://flow.test", flowPath: "/chatFlow" });

    const pending = client.generate({ sessionKey: "t1", message: "hello", signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: "aborted", message: "flow request aborted" });
  });
});
