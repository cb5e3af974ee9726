import OpenAI from "openai";
import type { LlmConfig } from "../config";
import { CompletionFailure, errorMessage } from "../errors";
import type { ChatMessage } from "../types";

export const DEFAULT_TEMPERATURE = 0.2;
const MAX_ERROR_CHARS = 500;

export interface OpenAiClientOptions {
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const truncate = (text: string, limit: number): string => (text.length > limit ? `${text.slice(0, limit)}...` : text);

/**
 * Chat-completion client for any OpenAI-compatible endpoint.
 *
 * The SDK's own retry loop is disabled; failed calls are retried here with a
 * linear backoff (`attempt * retryBackoffMs`) and end in a CompletionFailure.
 */
export class OpenAiClient {
  private readonly client: OpenAI;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: LlmConfig,
    options: OpenAiClientOptions = {}
  ) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutSeconds * 1000,
      maxRetries: 0
    });
    this.sleep = options.sleep ?? defaultSleep;
  }

  get model(): string {
    return this.config.model;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  private async requestOnce(conversation: ChatMessage[], temperature: number): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      messages: conversation.map((message) =>
        message.role === "system"
          ? { role: "system" as const, content: message.content }
          : { role: "user" as const, content: message.content }
      ),
      temperature
    });

    const text = response.choices[0]?.message?.content;
    if (!text || !text.trim()) {
      throw new Error("LLM returned empty output.");
    }
    return text;
  }

  async complete(conversation: ChatMessage[], temperature = DEFAULT_TEMPERATURE): Promise<string> {
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
      throw new RangeError(`temperature must be between 0 and 2, got ${temperature}`);
    }

    const attempts = this.config.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      if (attempt > 1) {
        await this.sleep((attempt - 1) * this.config.retryBackoffMs);
      }

      try {
        return await this.requestOnce(conversation, temperature);
      } catch (error: unknown) {
        lastError = error;
      }
    }

    throw new CompletionFailure(
      `Chat completion failed after ${attempts} attempt(s): ${truncate(errorMessage(lastError), MAX_ERROR_CHARS)}`,
      attempts,
      { cause: lastError }
    );
  }
}
