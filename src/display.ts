import chalk from "chalk";
import { highlight, supportsLanguage } from "cli-highlight";
import type { Prompter } from "./prompter.js";

export function syntaxLanguage(shellName: string): "zsh" | "bash" {
  return shellName === "zsh" ? "zsh" : "bash";
}

export function renderCommand(command: string, shellName: string): string {
  const preferred = syntaxLanguage(shellName);
  const language = supportsLanguage(preferred) ? preferred : "bash";
  return highlight(command, { language, ignoreIllegals: true });
}

/** `undefined` means the answer was not understood. */
export function parseConfirmation(answer: string | null): boolean | undefined {
  if (answer === null) return false;
  const normalized = answer.trim().toLowerCase();
  if (normalized === "" || normalized === "n" || normalized === "no") return false;
  if (normalized === "y" || normalized === "yes") return true;
  return undefined;
}

/**
 * Shows the command and asks whether to run it. Enter alone means no; an
 * answer that is neither yes nor no is asked again.
 */
export async function present(
  command: string,
  shellName: string,
  prompter: Prompter
): Promise<boolean> {
  console.log(chalk.bold("Proposed command:"));
  console.log(`\n   ${renderCommand(command, shellName)}\n`);

  for (;;) {
    const answer = await prompter.ask(
      `Run this command? ${chalk.dim("[y/N]")} `
    );
    const decision = parseConfirmation(answer);
    if (decision !== undefined) return decision;
    console.log(chalk.yellow("Please enter y or n."));
  }
}
