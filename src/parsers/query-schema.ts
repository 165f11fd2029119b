import { z } from "zod";
import { EXPERTISE_LEVELS, Query, URGENCY_LEVELS } from "../routing/types";

export const QueryContextSchema = z.object({
  previousQueries: z.array(z.string()).max(20).optional(),
  urgency: z.enum(URGENCY_LEVELS).optional(),
  domain: z.string().trim().min(1).optional(),
  expertiseLevel: z.enum(EXPERTISE_LEVELS).optional()
});

export const RouteRequestSchema = z.object({
  text: z.string().trim().min(1).max(4000),
  requesterId: z.string().trim().min(1).default("anonymous"),
  context: QueryContextSchema.optional(),
  bypassCache: z.boolean().default(false)
});

export const FeedbackRequestSchema = z.object({
  requestId: z.string().min(1),
  correct: z.boolean()
});

export const InvalidateRequestSchema = z.object({
  pattern: z
    .string()
    .min(1)
    .max(200)
    .refine((value) => compilePattern(value) !== null, { message: "pattern must be a valid regular expression" })
});

export type RouteRequest = z.infer<typeof RouteRequestSchema>;

export function compilePattern(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern, "i");
  } catch (_error) {
    return null;
  }
}

export function toQuery(request: RouteRequest): Query {
  return {
    text: request.text,
    requesterId: request.requesterId,
    context: request.context
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}
