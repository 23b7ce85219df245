import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HistoryStore, MAX_HISTORY, type Turn } from "../src/history.js";

function turns(count: number): Turn[] {
  return Array.from({ length: count }, (_, i): Turn => {
    const role: Turn["role"] = i % 2 === 0 ? "user" : "assistant";
    return { role, content: `turn ${i}` };
  });
}

describe("HistoryStore", () => {
  let dir: string;
  let store: HistoryStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), "tell-history-"));
    store = new HistoryStore(join(dir, "nested", "history.json"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns an empty log when no file exists", async () => {
    expect(await store.load()).toEqual([]);
  });

  it.each([0, 1, 4, 10, 11, 25])(
    "keeps the last min(n, 10) turns in order for n = %i",
    async (n) => {
      const input = turns(n);
      await store.save(input);
      expect(await store.load()).toEqual(input.slice(Math.max(0, n - MAX_HISTORY)));
    }
  );

  it("writes a pretty-printed JSON array", async () => {
    await store.save([{ role: "user", content: "list files" }]);
    const raw = await fs.readFile(store.filePath, "utf-8");
    expect(raw).toBe('[\n  {\n    "role": "user",\n    "content": "list files"\n  }\n]');
  });

  it("leaves no temporary file behind", async () => {
    await store.save(turns(3));
    expect(await fs.readdir(join(dir, "nested"))).toEqual(["history.json"]);
  });

  it("treats invalid JSON as no history", async () => {
    await fs.mkdir(join(dir, "nested"), { recursive: true });
    await fs.writeFile(store.filePath, "{not json");
    expect(await store.load()).toEqual([]);
  });

  it("treats a wrongly shaped file as no history", async () => {
    await fs.mkdir(join(dir, "nested"), { recursive: true });
    await fs.writeFile(store.filePath, JSON.stringify([{ role: "robot", content: 1 }]));
    expect(await store.load()).toEqual([]);
  });

  it("clear removes an existing log", async () => {
    await store.save(turns(4));
    await store.clear();
    expect(await store.load()).toEqual([]);
  });

  it("clear is a no-op when nothing was saved", async () => {
    await expect(store.clear()).resolves.toBeUndefined();
    expect(await store.load()).toEqual([]);
  });

  it("honours a custom cap", async () => {
    const small = new HistoryStore(join(dir, "small.json"), 2);
    await small.save(turns(5));
    expect(await small.load()).toEqual([
      { role: "assistant", content: "turn 3" },
      { role: "user", content: "turn 4" },
    ]);
  });
});
