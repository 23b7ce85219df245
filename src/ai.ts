import type { ChatClient, ChatMessage } from "./client.js";
import { DEFAULT_MAX_ENTRIES, sampleDirectory } from "./directory.js";
import { EmptyGenerationError, TransportError } from "./errors.js";
import type { HistoryStore, Turn } from "./history.js";
import { logger } from "./logger.js";
import { buildSystemPrompt } from "./prompt.js";

const FENCE = "```";

/**
 * Removes a fenced code block or stray backticks the model may wrap the
 * command in despite being told not to.
 */
export function stripCommand(raw: string): string {
  let cleaned = raw;
  // One pass can expose a fence hidden behind stray backticks.
  for (let previous = ""; cleaned !== previous; ) {
    previous = cleaned;
    cleaned = stripOnce(cleaned);
  }
  return cleaned;
}

function stripOnce(raw: string): string {
  let cleaned = raw.trim();
  if (cleaned.startsWith(FENCE)) {
    cleaned = cleaned.split("\n").slice(1).join("\n");
  }
  if (cleaned.endsWith(FENCE)) {
    cleaned = cleaned.slice(0, cleaned.lastIndexOf(FENCE));
  }
  return cleaned.trim().replace(/^`+|`+$/g, "").trim();
}

export interface CommandGeneratorOptions {
  client: ChatClient;
  history: HistoryStore;
  model: string;
  maxEntries?: number;
  sampleDirectory?: (maxEntries: number) => Promise<string>;
}

export class CommandGenerator {
  private readonly client: ChatClient;
  private readonly history: HistoryStore;
  private readonly model: string;
  private readonly maxEntries: number;
  private readonly sample: (maxEntries: number) => Promise<string>;

  constructor(options: CommandGeneratorOptions) {
    this.client = options.client;
    this.history = options.history;
    this.model = options.model;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.sample = options.sampleDirectory ?? ((max) => sampleDirectory(max));
  }

  async generate(
    userPrompt: string,
    osName: string,
    shellName: string
  ): Promise<string> {
    const dirContext = await this.sample(this.maxEntries);
    const systemPrompt = buildSystemPrompt(osName, shellName, dirContext);
    const previous = await this.history.load();
    const userTurn: Turn = { role: "user", content: userPrompt.trim() };

    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      ...previous.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: userTurn.role, content: userTurn.content },
    ];

    logger.debug(
      `Requesting ${this.model} with ${previous.length} history turns`
    );

    let raw: string;
    try {
      raw = await this.client.complete({
        model: this.model,
        messages,
        temperature: 0,
      });
    } catch (error) {
      throw new TransportError(error);
    }

    const command = stripCommand(raw);
    if (!command) throw new EmptyGenerationError();

    // Saved before confirmation so a declined command still counts as a turn.
    await this.history.save([
      ...previous,
      userTurn,
      { role: "assistant", content: command },
    ]);

    return command;
  }
}
