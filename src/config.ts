import { promises as fs } from "fs";
import { join } from "path";
import { homedir } from "os";
import { z } from "zod";
import { MissingCredentialError } from "./errors.js";
import { logger } from "./logger.js";

export const DEFAULT_MODEL = "gemini-2.5-flash";

const fileConfigSchema = z.object({
  geminiApiKey: z.string().optional(),
  model: z.string().optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface Config {
  apiKey?: string;
  model: string;
  /** Directory holding config.json and history.json. */
  stateDir: string;
  historyPath: string;
}

export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  return env.TELL_HOME || join(home, ".tell");
}

export async function getFileConfig(stateDir: string): Promise<FileConfig> {
  const configPath = join(stateDir, "config.json");
  try {
    const data = await fs.readFile(configPath, "utf-8");
    const parsed = fileConfigSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      logger.warn(`Ignoring invalid config file ${configPath}`);
      return {};
    }
    return parsed.data;
  } catch {
    return {};
  }
}

// Environment wins over the config file.
export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): Promise<Config> {
  const stateDir = resolveStateDir(env, home);
  const file = await getFileConfig(stateDir);

  return {
    apiKey: env.GEMINI_API_KEY || file.geminiApiKey || undefined,
    model: env.TELL_MODEL || file.model || DEFAULT_MODEL,
    stateDir,
    historyPath: join(stateDir, "history.json"),
  };
}

export function requireApiKey(config: Config): string {
  if (!config.apiKey) throw new MissingCredentialError();
  return config.apiKey;
}
