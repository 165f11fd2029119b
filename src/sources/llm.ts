import { z } from "zod";
import { ChatMessage, JsonChatModel } from "../llm/client";
import { buildSystemPrompt, buildUserPrompt } from "../llm/prompt";
import { Query, SourceResult } from "../routing/types";
import { clamp } from "../utils";
import { certaintyFactor } from "./scoring";
import { InformationSource, SourceQueryOptions } from "./types";

const LlmAnswerSchema = z.object({
  answer: z.string().min(1),
  confidence: z.coerce.number().min(0).max(100),
  reasoning: z.string().default("")
});

export type LlmAnswer = z.infer<typeof LlmAnswerSchema>;

// 60% self-reported, 40% wording certainty.
export function blendLlmConfidence(reported: number, answer: string): number {
  return Math.round(0.6 * clamp(reported, 0, 100) + 0.4 * certaintyFactor(answer) * 100);
}

export class LlmSource implements InformationSource {
  readonly name = "llm";

  constructor(private readonly model: JsonChatModel | null) {}

  async query(query: Query, options: SourceQueryOptions): Promise<SourceResult> {
    if (!this.model) {
      throw new Error("OPENAI_API_KEY is not configured");
    }
    const startedAt = Date.now();
    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt() },
      { role: "user", content: buildUserPrompt(query) }
    ];
    const { data, tokensUsed } = await this.model.completeJson(messages, LlmAnswerSchema, options);
    const certainty = certaintyFactor(data.answer);

    return {
      source: this.name,
      confidence: blendLlmConfidence(data.confidence, data.answer),
      answer: data.answer,
      metadata: {
        latencyMs: Date.now() - startedAt,
        tokensUsed,
        details: { reportedConfidence: data.confidence, certainty }
      },
      reasoning: data.reasoning || "Generated by the language model from its training data."
    };
  }

  canHandle(_query: Query): boolean {
    return this.model !== null;
  }

  averageLatencyMs(): number {
    return 2000;
  }

  cost(): number {
    return 0.01;
  }
}
