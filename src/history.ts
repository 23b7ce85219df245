import { promises as fs } from "fs";
import { dirname, join, basename } from "path";
import { z } from "zod";
import { logger } from "./logger.js";

/** Keep last 10 turns (5 user, 5 assistant). */
export const MAX_HISTORY = 10;

const turnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

export type Turn = Readonly<z.infer<typeof turnSchema>>;

const historySchema = z.array(turnSchema);

/**
 * The on-disk conversation log. There is no locking: two concurrent
 * invocations may race and the last writer wins.
 */
export class HistoryStore {
  constructor(
    readonly filePath: string,
    private readonly maxTurns: number = MAX_HISTORY
  ) {}

  async load(): Promise<Turn[]> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, "utf-8");
    } catch {
      return [];
    }

    try {
      const parsed = historySchema.safeParse(JSON.parse(data));
      if (parsed.success) return parsed.data;
      logger.debug(`History at ${this.filePath} has an unexpected shape; ignoring it`);
    } catch {
      logger.debug(`History at ${this.filePath} is not valid JSON; ignoring it`);
    }
    return [];
  }

  async save(turns: readonly Turn[]): Promise<void> {
    const trimmed = this.maxTurns > 0 ? turns.slice(-this.maxTurns) : [];
    const dir = dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });

    // Write beside the target and rename so a crash never leaves half a file.
    const tempPath = join(dir, `.${basename(this.filePath)}.${process.pid}.tmp`);
    await fs.writeFile(tempPath, JSON.stringify(trimmed, null, 2), "utf-8");
    await fs.rename(tempPath, this.filePath);
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
