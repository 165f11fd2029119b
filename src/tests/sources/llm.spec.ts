import { describe, expect, it } from "vitest";
import { z } from "zod";
import { ChatMessage, CompletionOptions, JsonChatModel, JsonCompletion } from "../../llm/client";
import { certaintyFactor } from "../../sources/scoring";
import { LlmSource, blendLlmConfidence } from "../../sources/llm";
import { neverAborted, query } from "../helpers/fakeSources";

class CannedModel implements JsonChatModel {
  messages: ChatMessage[] = [];

  constructor(private readonly payload: unknown) {}

  async completeJson<T>(
    messages: ChatMessage[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    _options: CompletionOptions
  ): Promise<JsonCompletion<T>> {
    this.messages = messages;
    return { data: schema.parse(this.payload), tokensUsed: 42 };
  }
}

const options = { timeoutMs: 1000, signal: neverAborted() };

describe("certaintyFactor", () => {
  it("drops with each hedging phrase", () => {
    expect(certaintyFactor("Restart the service.")).toBe(1);
    expect(certaintyFactor("It is probably the DNS cache.")).toBe(0.8);
    expect(certaintyFactor("It might work, possibly.")).toBe(0.6);
    expect(certaintyFactor("Maybe. I think so, but I'm not sure.")).toBe(0.4);
  });
});

describe("LlmSource", () => {
  it("blends the reported confidence with the certainty of the wording", async () => {
    const model = new CannedModel({ answer: "It is probably the DNS cache.", confidence: 90, reasoning: "Common cause." });
    const result = await new LlmSource(model).query(query("why does my vpn drop"), options);

    expect(result.confidence).toBe(86);
    expect(result.answer).toBe("It is probably the DNS cache.");
    expect(result.reasoning).toBe("Common cause.");
    expect(result.metadata.tokensUsed).toBe(42);
    expect(model.messages.map((message) => message.role)).toEqual(["system", "user"]);
    expect(model.messages[1]?.content).toContain("why does my vpn drop");
  });

  it("accepts a numeric string confidence from the model", async () => {
    const model = new CannedModel({ answer: "Restart the service.", confidence: "70" });
    const result = await new LlmSource(model).query(query("fix the print spooler"), options);

    expect(result.confidence).toBe(82);
    expect(result.reasoning).toBe("Generated by the language model from its training data.");
  });

  it("rejects a malformed model payload", async () => {
    const model = new CannedModel({ answer: "", confidence: 90 });
    await expect(new LlmSource(model).query(query("anything"), options)).rejects.toThrow();
  });

  it("is skipped when no model is configured", async () => {
    const source = new LlmSource(null);
    expect(source.canHandle(query("anything"))).toBe(false);
    await expect(source.query(query("anything"), options)).rejects.toThrow("OPENAI_API_KEY is not configured");
  });

  it("clamps the reported confidence before blending", () => {
    expect(blendLlmConfidence(150, "Restart the service.")).toBe(100);
  });
});
