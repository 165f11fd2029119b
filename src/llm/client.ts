import OpenAI from "openai";
import { z } from "zod";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface JsonCompletion<T> {
  data: T;
  tokensUsed?: number;
}

export interface CompletionOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

/** A chat model that answers with one JSON object. */
export interface JsonChatModel {
  completeJson<T>(
    messages: ChatMessage[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CompletionOptions
  ): Promise<JsonCompletion<T>>;
}

export class OpenAIJsonModel implements JsonChatModel {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  static fromApiKey(apiKey: string, model: string): OpenAIJsonModel {
    return new OpenAIJsonModel(new OpenAI({ apiKey, maxRetries: 1 }), model);
  }

  async completeJson<T>(
    messages: ChatMessage[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CompletionOptions
  ): Promise<JsonCompletion<T>> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        response_format: { type: "json_object" },
        temperature: 0.2,
        messages,
        max_tokens: 800
      },
      { signal: options.signal, timeout: options.timeoutMs }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("Model returned empty response");
    }

    const parsed = schema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Model response did not match the expected shape: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return { data: parsed.data, tokensUsed: response.usage?.total_tokens };
  }
}
