import { Query } from "../routing/types";

export function buildSystemPrompt(): string {
  return "You are a technical support assistant. Answer factually and concisely. Do not reveal chain-of-thought. Say so plainly when you are unsure.";
}

export function buildUserPrompt(query: Query): string {
  const context = query.context ?? {};
  return [
    "Answer the question below and respond with a single JSON object using the schema:",
    "{",
    '  "answer": "string",',
    '  "confidence": 0,',
    '  "reasoning": "1-2 sentences explaining what the answer is based on"',
    "}",
    "confidence is an integer from 0 to 100 describing how likely the answer is correct.",
    "",
    "Question:",
    query.text,
    ...(context.domain ? ["", `Domain: ${context.domain}`] : []),
    ...(context.expertiseLevel ? [`Audience expertise: ${context.expertiseLevel}`] : []),
    ...(context.previousQueries && context.previousQueries.length > 0
      ? ["", "Earlier questions in this conversation:", ...context.previousQueries.map((previous) => `- ${previous}`)]
      : [])
  ].join("\n");
}
