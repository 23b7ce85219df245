import { describe, expect, it } from "vitest";
import { buildSystemPrompt } from "../src/prompt.js";

describe("buildSystemPrompt", () => {
  it("embeds the OS, shell and directory listing", () => {
    const prompt = buildSystemPrompt("Linux", "zsh", "a.txt, b.txt");
    expect(prompt).toContain("Target OS: Linux\n");
    expect(prompt).toContain("Shell: zsh\n");
    expect(prompt).toContain("Current directory contents: a.txt, b.txt\n");
    expect(prompt.startsWith("You are an expert zsh command generator for Linux.")).toBe(true);
  });

  it("is stable for the same inputs", () => {
    expect(buildSystemPrompt("Linux", "bash", "x")).toBe(buildSystemPrompt("Linux", "bash", "x"));
  });
});
