// Errors the CLI reports as a short message and an exit status.
export class TellError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class UnsupportedPlatformError extends TellError {
  constructor(platform: string) {
    super(`This tool currently supports Linux only (detected: ${platform}).`);
  }
}

export class MissingCredentialError extends TellError {
  constructor() {
    super(
      "Missing GEMINI_API_KEY. Set it in your environment, a .env file, or ~/.tell/config.json."
    );
  }
}

export class TransportError extends TellError {
  constructor(cause: unknown) {
    super(
      `Gemini API error: ${cause instanceof Error ? cause.message : String(cause)}`
    );
  }
}

export class EmptyGenerationError extends TellError {
  constructor() {
    super("No command returned by model.");
  }
}

export class ShellNotFoundError extends TellError {
  constructor(shellPath: string, reason: string) {
    super(`Shell not found: ${shellPath} (${reason})`);
  }
}
