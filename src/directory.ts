import { promises as fs } from "fs";

export const DEFAULT_MAX_ENTRIES = 50;
export const EMPTY_DIRECTORY = "(empty directory)";

/**
 * Lists the visible entries of `cwd` as a comma-separated string so the model
 * can resolve requests like "delete that log file".
 *
 * Any read error yields the empty-directory placeholder.
 */
export async function sampleDirectory(
  maxEntries: number = DEFAULT_MAX_ENTRIES,
  cwd: string = process.cwd()
): Promise<string> {
  let names: string[];
  try {
    names = await fs.readdir(cwd);
  } catch {
    return EMPTY_DIRECTORY;
  }

  const visible = names
    .filter((name) => !name.startsWith("."))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  if (visible.length === 0) return EMPTY_DIRECTORY;

  const limit = Math.max(0, maxEntries);
  if (visible.length <= limit) return visible.join(", ");

  const more = `... (+${visible.length - limit} more)`;
  if (limit === 0) return more;
  return `${visible.slice(0, limit).join(", ")}, ${more}`;
}
