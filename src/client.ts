import { GoogleGenAI, type Content } from "@google/genai";
import type { Config } from "./config.js";
import { requireApiKey } from "./config.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

/** The one capability the command generator needs from a model provider. */
export interface ChatClient {
  complete(request: ChatRequest): Promise<string>;
}

export class GeminiChatClient implements ChatClient {
  private readonly ai: GoogleGenAI;

  constructor(apiKey: string) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async complete(request: ChatRequest): Promise<string> {
    const systemInstruction = request.messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");

    // Gemini calls the assistant side of the conversation "model".
    const contents: Content[] = request.messages
      .filter((m) => m.role !== "system")
      .map((m) => ({
        role: m.role === "assistant" ? "model" : "user",
        parts: [{ text: m.content }],
      }));

    const response = await this.ai.models.generateContent({
      model: request.model,
      contents,
      config: {
        systemInstruction: systemInstruction || undefined,
        temperature: request.temperature,
      },
    });

    return response.text ?? "";
  }
}

// Fails at startup, before any request, when no credential is configured.
export function createChatClient(config: Config): ChatClient {
  return new GeminiChatClient(requireApiKey(config));
}
