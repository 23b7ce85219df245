import { spawn } from "child_process";
import { constants } from "os";
import { ShellNotFoundError } from "./errors.js";

export type Executor = (command: string, shellPath: string) => Promise<number>;

function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + constants.signals[signal];
}

/**
 * Runs `command` through `shellPath -c`, giving it the terminal, and resolves
 * with its exit status.
 */
export const execute: Executor = (command, shellPath) =>
  new Promise<number>((resolve, reject) => {
    const child = spawn(shellPath, ["-c", command], { stdio: "inherit" });

    child.on("error", (err: NodeJS.ErrnoException) => {
      reject(new ShellNotFoundError(shellPath, err.code ?? err.message));
    });
    child.on("close", (code, signal) => {
      if (code !== null) resolve(code);
      else resolve(signal ? signalExitCode(signal) : 1);
    });
  });
