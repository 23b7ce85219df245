import * as readline from "readline";

/** Reads one line of user input; `null` means end of input or an interrupt. */
export interface Prompter {
  ask(question: string): Promise<string | null>;
}

// A fresh interface per question leaves the terminal free for the command we run.
export class TerminalPrompter implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string): Promise<string | null> {
    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
    });

    return new Promise((resolve) => {
      let answered = false;
      rl.on("SIGINT", () => rl.close());
      rl.on("close", () => {
        if (!answered) {
          this.output.write("\n");
          resolve(null);
        }
      });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        resolve(answer);
      });
    });
  }
}
