import Groq from "groq-sdk";
import type {
  CompletionClient,
  CompletionRequest,
} from "./services/modelInvoker.js";
import config from "./config/env.js";

/**
 * CompletionClient backed by the Groq chat completions API.
 * The SDK client is created on first use so a missing key only fails calls.
 */
export class GroqCompletionClient implements CompletionClient {
  private client: Groq | null = null;

  constructor(
    private readonly apiKey: string = config.groqApiKey,
    private readonly timeoutMs: number = config.groqTimeoutMs
  ) {}

  get hasApiKey(): boolean {
    return !!this.apiKey;
  }

  private getClient(): Groq {
    if (!this.apiKey) {
      throw new Error(
        "GROQ_API_KEY is not configured. AI features are unavailable."
      );
    }
    if (!this.client) {
      // maxRetries: 0 keeps every request to a single call
      this.client = new Groq({
        apiKey: this.apiKey,
        timeout: this.timeoutMs,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<unknown> {
    return this.getClient().chat.completions.create({
      model: request.model,
      messages: request.messages.map((message) =>
        message.role === "system"
          ? { role: "system" as const, content: message.content }
          : { role: "user" as const, content: message.content }
      ),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });
  }
}

export const groqCompletionClient = new GroqCompletionClient();
