import type { PromptMessage } from "../types/actions.js";
import { ModelInvocationError, describeError } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import config from "../config/env.js";

export interface CompletionRequest {
  model: string;
  messages: PromptMessage[];
  temperature: number;
  maxTokens: number;
}

/**
 * One chat-completion call against a hosted model. Implementations return
 * the provider's completion object as-is; ModelInvoker validates its shape.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<unknown>;
}

export interface ModelInvokerOptions {
  model?: string;
  temperature?: number;
  timeoutMs?: number;
}

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readTokenUsage(completion: Record<string, unknown>): TokenUsage | null {
  const usage = completion.usage;
  if (!isRecord(usage)) return null;
  const count = (key: string): number => {
    const value = usage[key];
    return typeof value === "number" ? value : 0;
  };
  return {
    prompt_tokens: count("prompt_tokens"),
    completion_tokens: count("completion_tokens"),
    total_tokens: count("total_tokens"),
  };
}

/**
 * Extract `choices[0].message.content` from a completion object
 */
export function extractCompletionText(completion: unknown): string {
  if (isRecord(completion) && Array.isArray(completion.choices)) {
    const [choice] = completion.choices;
    if (isRecord(choice) && isRecord(choice.message)) {
      const { content } = choice.message;
      if (typeof content === "string") {
        return content;
      }
    }
  }
  throw new ModelInvocationError(
    "AI model invocation failed: completion is missing choices[0].message.content"
  );
}

/**
 * Wraps a single call to the completion endpoint with a fixed model,
 * a low temperature and a timeout. Failures are not retried.
 */
export class ModelInvoker {
  private readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly client: CompletionClient,
    options: ModelInvokerOptions = {}
  ) {
    this.model = options.model ?? config.groqModel;
    this.temperature = options.temperature ?? config.modelTemperature;
    this.timeoutMs = options.timeoutMs ?? config.groqTimeoutMs;
  }

  async invoke(messages: PromptMessage[], maxTokens: number): Promise<string> {
    let completion: unknown;
    try {
      completion = await withTimeout(
        () =>
          this.client.complete({
            model: this.model,
            messages,
            temperature: this.temperature,
            maxTokens,
          }),
        this.timeoutMs,
        "Model request timed out"
      );
    } catch (error) {
      throw new ModelInvocationError(
        `AI model invocation failed: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (isRecord(completion)) {
      const usage = readTokenUsage(completion);
      if (usage) {
        console.log(
          `[MODEL] Tokens used: ${usage.total_tokens} (prompt: ${usage.prompt_tokens}, completion: ${usage.completion_tokens})`
        );
      }
    }

    return extractCompletionText(completion);
  }
}
