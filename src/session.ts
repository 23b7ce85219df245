import chalk from "chalk";
import { present } from "./display.js";
import type { SessionContext } from "./environment.js";
import { ShellNotFoundError } from "./errors.js";
import type { Executor } from "./executor.js";
import type { Prompter } from "./prompter.js";

export interface CommandSource {
  generate(userPrompt: string, osName: string, shellName: string): Promise<string>;
}

export interface HistoryClearer {
  clear(): Promise<void>;
}

export type Confirm = (
  command: string,
  shellName: string,
  prompter: Prompter
) => Promise<boolean>;

export interface SessionOptions {
  context: Readonly<SessionContext>;
  generator: CommandSource;
  history: HistoryClearer;
  prompter: Prompter;
  execute: Executor;
  confirm?: Confirm;
}

const EXIT_WORDS = new Set(["exit", "quit"]);

/**
 * Drives generate → confirm → execute cycles.
 *
 * One-shot mode turns the outcome into the process exit status. Interactive
 * mode keeps going after a declined or failing command, but a generation
 * failure still ends the session.
 */
export class Session {
  private readonly context: Readonly<SessionContext>;
  private readonly generator: CommandSource;
  private readonly history: HistoryClearer;
  private readonly prompter: Prompter;
  private readonly execute: Executor;
  private readonly confirm: Confirm;

  constructor(options: SessionOptions) {
    this.context = options.context;
    this.generator = options.generator;
    this.history = options.history;
    this.prompter = options.prompter;
    this.execute = options.execute;
    this.confirm = options.confirm ?? present;
  }

  runOnce(prompt: string): Promise<number> {
    return this.handlePrompt(prompt, true);
  }

  async runInteractive(): Promise<number> {
    console.log(
      `${chalk.bold("Tell")} interactive mode. Type 'exit' or 'quit' to stop, 'clear' to forget history.`
    );

    for (;;) {
      const line = await this.prompter.ask("Describe a task: ");
      if (line === null) break;

      const input = line.trim();
      if (!input) continue;

      const keyword = input.toLowerCase();
      if (EXIT_WORDS.has(keyword)) break;
      if (keyword === "clear") {
        await this.history.clear();
        console.log(chalk.yellow("History cleared."));
        continue;
      }

      await this.handlePrompt(input, false);
    }
    return 0;
  }

  private async handlePrompt(prompt: string, exitOnAbort: boolean): Promise<number> {
    const { osName, shellName, shellPath } = this.context;
    const command = await this.generator.generate(prompt, osName, shellName);

    if (!(await this.confirm(command, shellName, this.prompter))) {
      console.log(chalk.yellow("Aborted."));
      return 0;
    }

    let exitCode: number;
    try {
      exitCode = await this.execute(command, shellPath);
    } catch (error) {
      if (exitOnAbort || !(error instanceof ShellNotFoundError)) throw error;
      console.error(chalk.red(error.message));
      return 1;
    }

    if (exitCode !== 0) {
      console.error(chalk.red(`Command exited with code ${exitCode}.`));
    }
    return exitCode;
  }
}
