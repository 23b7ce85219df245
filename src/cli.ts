import chalk from "chalk";
import { Command } from "commander";
import { CommandGenerator } from "./ai.js";
import { createChatClient } from "./client.js";
import { loadConfig } from "./config.js";
import { detectSessionContext } from "./environment.js";
import { TellError } from "./errors.js";
import { execute } from "./executor.js";
import { HistoryStore } from "./history.js";
import { logger } from "./logger.js";
import { TerminalPrompter } from "./prompter.js";
import { Session } from "./session.js";

interface CliOptions {
  interactive?: boolean;
  clear?: boolean;
}

async function main(
  promptWords: string[],
  options: CliOptions,
  env: NodeJS.ProcessEnv
): Promise<number> {
  const config = await loadConfig(env);
  const history = new HistoryStore(config.historyPath);

  // Clearing needs neither a supported platform nor a credential.
  if (options.clear) {
    await history.clear();
    console.log(chalk.yellow("History cleared."));
    return 0;
  }

  const context = detectSessionContext(env);
  const client = createChatClient(config);
  logger.debug(
    `OS ${context.osName}, shell ${context.shellPath}, model ${config.model}`
  );

  const session = new Session({
    context,
    generator: new CommandGenerator({ client, history, model: config.model }),
    history,
    prompter: new TerminalPrompter(),
    execute,
  });

  const prompt = promptWords.join(" ").trim();
  if (options.interactive || !prompt) {
    return session.runInteractive();
  }
  return session.runOnce(prompt);
}

export function reportError(error: unknown): number {
  if (error instanceof TellError) {
    console.error(chalk.red(error.message));
    return error.exitCode;
  }
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Unexpected error: ${message}`));
  logger.debug(error);
  return 1;
}

export async function run(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name("tell")
    .version("1.0.0")
    .description("Tell: natural language to shell command, confirmed before it runs.")
    .argument("[prompt...]", "Natural language description of the task.")
    .option("-i, --interactive", "Start interactive mode.")
    .option("--clear", "Delete the conversation history and exit.")
    .action(async (promptWords: string[], options: CliOptions) => {
      try {
        exitCode = await main(promptWords, options, env);
      } catch (error) {
        exitCode = reportError(error);
      }
    });

  await program.parseAsync(argv);
  return exitCode;
}
