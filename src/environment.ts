import { basename } from "path";
import { UnsupportedPlatformError } from "./errors.js";

export const DEFAULT_SHELL = "/bin/bash";

export interface ShellInfo {
  /** Lower-cased base name, used to pick the highlighting grammar. */
  shellName: string;
  /** Full path, used to launch commands. */
  shellPath: string;
}

export interface SessionContext extends ShellInfo {
  osName: string;
}

export function detectOS(platform: NodeJS.Platform = process.platform): string {
  if (platform === "linux") return "Linux";
  throw new UnsupportedPlatformError(platform);
}

export function detectShell(env: NodeJS.ProcessEnv = process.env): ShellInfo {
  const shellPath = env.SHELL || DEFAULT_SHELL;
  return { shellName: basename(shellPath).toLowerCase(), shellPath };
}

export function detectSessionContext(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): Readonly<SessionContext> {
  const osName = detectOS(platform);
  return Object.freeze({ osName, ...detectShell(env) });
}
