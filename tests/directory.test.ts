import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EMPTY_DIRECTORY, sampleDirectory } from "../src/directory.js";

describe("sampleDirectory", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), "tell-dir-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function touch(...names: string[]) {
    for (const name of names) await fs.writeFile(join(dir, name), "");
  }

  it("joins a few entries in sorted order", async () => {
    await touch("notes.txt", "app.log", "main.py");
    expect(await sampleDirectory(50, dir)).toBe("app.log, main.py, notes.txt");
  });

  it("skips hidden entries", async () => {
    await touch(".env", "README.md");
    await fs.mkdir(join(dir, ".git"));
    expect(await sampleDirectory(50, dir)).toBe("README.md");
  });

  it("truncates and counts the omitted entries", async () => {
    const names = Array.from({ length: 60 }, (_, i) => `f${String(i).padStart(2, "0")}`);
    await touch(...names);
    const expected = `${names.slice(0, 50).join(", ")}, ... (+10 more)`;
    expect(await sampleDirectory(50, dir)).toBe(expected);
  });

  it("only counts the entries when nothing may be shown", async () => {
    await touch("a", "b", "c");
    expect(await sampleDirectory(0, dir)).toBe("... (+3 more)");
  });

  it("returns the placeholder for an empty directory", async () => {
    expect(await sampleDirectory(50, dir)).toBe(EMPTY_DIRECTORY);
  });

  it("returns the placeholder when only hidden entries exist", async () => {
    await touch(".bashrc");
    expect(await sampleDirectory(50, dir)).toBe(EMPTY_DIRECTORY);
  });

  it("returns the placeholder when the directory cannot be read", async () => {
    expect(await sampleDirectory(50, join(dir, "missing"))).toBe(EMPTY_DIRECTORY);
  });
});
