import chalk from "chalk";

type Level = "DEBUG" | "WARN";

const silenced = process.env.NODE_ENV === "test";

const tags: Record<Level, string> = {
  DEBUG: chalk.magentaBright("[DEBUG]"),
  WARN: chalk.yellow("[WARN]"),
};

function pad(num: number, size = 2): string {
  return num.toString().padStart(size, "0");
}

function localTs(): string {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

// Diagnostics go to stderr so they never mix with the command's own output.
function write(level: Level, args: unknown[]): void {
  if (silenced) return;
  if (level === "DEBUG" && process.env.TELL_DEBUG !== "1") return;
  console.error(chalk.dim(`[${localTs()}]`), tags[level], ...args);
}

export const logger = {
  debug: (...args: unknown[]) => write("DEBUG", args),
  warn: (...args: unknown[]) => write("WARN", args),
};
