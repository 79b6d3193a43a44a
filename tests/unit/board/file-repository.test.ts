import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { FileTaskRepository } from "../../../src/board/repository/index.js";
import { createQueue, exchange, silentLogger } from "../../support/fixtures.js";

describe("FileTaskRepository", () => {
  let dir: string;
  let repo: FileTaskRepository;

  function open(): FileTaskRepository {
    const logger = silentLogger();
    return new FileTaskRepository({ dir, queue: createQueue(logger), logger });
  }

  beforeEach(async () => {
    dir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), "taskboard-store-")), "tasks");
    repo = open();
    await repo.initialize();
  });

  afterEach(async () => {
    await fs.rm(path.dirname(dir), { recursive: true, force: true });
  });

  it("persists tasks across instances", async () => {
    await repo.create(exchange("t1", "hi", "hello"));
    const reopened = open();
    await expect(reopened.get("t1")).resolves.toEqual(exchange("t1", "hi", "hello"));
  });

  it("writes one JSON document per task", async () => {
    await repo.create(exchange("team/42", "hi", "hello"));
    const file = repo.taskFile("team/42");
    expect(path.basename(file)).toBe("team%2F42.json");
    const stored = JSON.parse(await fs.readFile(file, "utf-8"));
    expect(stored).toEqual(exchange("team/42", "hi", "hello"));
    await expect(repo.list()).resolves.toEqual(["team/42"]);
  });

  it("follows the same conflict and not_found rules as the in-memory store", async () => {
    await repo.create(exchange("t1", "hi", "hello"));
    await expect(repo.create(exchange("t1", "x", "y"))).rejects.toMatchObject({ code: "conflict" });
    await expect(repo.get("missing")).rejects.toMatchObject({ code: "not_found" });
    await expect(repo.update({ id: "missing", messages: [] })).rejects.toMatchObject({ code: "not_found" });
    await expect(repo.delete("missing")).rejects.toMatchObject({ code: "not_found" });
  });

  it("update(), modify() and delete() act on the stored document", async () => {
    await repo.create(exchange("t1", "hi", "hello"));
    await repo.modify("t1", (task) => ({
      ...task,
      messages: [...task.messages, { type: "user", content: "more" }],
      status: "ERROR",
    }));
    const modified = await repo.get("t1");
    expect(modified.messages).toHaveLength(3);
    expect(modified.status).toBe("ERROR");

    await repo.update(exchange("t1", "reset", "done"));
    expect((await repo.get("t1")).messages[0]?.content).toBe("reset");

    await repo.delete("t1");
    await expect(fs.access(repo.taskFile("t1"))).rejects.toThrow();
  });

  it("reports a corrupt document as store_failure", async () => {
    await fs.writeFile(repo.taskFile("bad"), JSON.stringify({ id: "bad", messages: "nope" }), "utf-8");
    await expect(repo.get("bad")).rejects.toMatchObject({ code: "store_failure", taskId: "bad" });
  });

  it("list() is empty when the directory does not exist yet", async () => {
    await fs.rm(dir, { recursive: true, force: true });
    await expect(repo.list()).resolves.toEqual([]);
  });
});
