import { z } from "zod";
import defaultTableJson from "../../config/classifier.json";
import { clamp } from "../utils";
import { QUERY_TYPES, Query, QueryClassification, QueryType, Urgency } from "./types";

const ClassifierTableSchema = z.object({
  urgencyKeywords: z.array(z.string().min(1)),
  technicalTerms: z.array(z.string().min(1)),
  compoundMarkers: z.array(z.string().min(1)),
  domains: z.array(
    z.object({
      domain: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1)
    })
  ),
  queryTypes: z.array(
    z.object({
      type: z.enum(QUERY_TYPES),
      pattern: z.string().min(1)
    })
  )
});

export type ClassifierTable = z.infer<typeof ClassifierTableSchema>;

interface CompiledTable {
  table: ClassifierTable;
  typePatterns: Array<{ type: QueryType; regex: RegExp }>;
}

const BASE_COMPLEXITY = 5;

export function parseClassifierTable(input: unknown): ClassifierTable {
  return ClassifierTableSchema.parse(input);
}

export const DEFAULT_CLASSIFIER_TABLE: ClassifierTable = parseClassifierTable(defaultTableJson);

const compiledTables = new WeakMap<ClassifierTable, CompiledTable>();

function compile(table: ClassifierTable): CompiledTable {
  const cached = compiledTables.get(table);
  if (cached) {
    return cached;
  }
  const compiled: CompiledTable = {
    table,
    typePatterns: table.queryTypes.map((entry) => ({ type: entry.type, regex: new RegExp(entry.pattern, "i") }))
  };
  compiledTables.set(table, compiled);
  return compiled;
}

function detectUrgency(lower: string, query: Query, table: ClassifierTable): Urgency {
  if (table.urgencyKeywords.some((keyword) => lower.includes(keyword))) {
    return "critical";
  }
  return query.context?.urgency ?? "normal";
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function estimateComplexity(text: string, table: ClassifierTable = DEFAULT_CLASSIFIER_TABLE): number {
  const lower = text.toLowerCase();
  let complexity = BASE_COMPLEXITY;

  const words = countWords(text);
  if (words > 50) complexity += 2;
  else if (words > 20) complexity += 1;
  else if (words < 5) complexity -= 1;

  const questionMarks = (text.match(/\?/g) ?? []).length;
  if (questionMarks > 1) complexity += 1;

  if (table.technicalTerms.some((term) => lower.includes(term))) complexity += 1;
  if (table.compoundMarkers.some((marker) => lower.includes(marker))) complexity += 2;

  return clamp(complexity, 1, 10);
}

function detectDomain(lower: string, query: Query, table: ClassifierTable): string {
  const declared = query.context?.domain?.trim();
  if (declared) {
    return declared.toLowerCase();
  }
  const match = table.domains.find((entry) => entry.keywords.some((keyword) => lower.includes(keyword)));
  return match?.domain ?? "general";
}

function detectQueryType(text: string, compiled: CompiledTable): QueryType {
  const match = compiled.typePatterns.find((entry) => entry.regex.test(text));
  return match?.type ?? "general";
}

export function classifyQuery(query: Query, table: ClassifierTable = DEFAULT_CLASSIFIER_TABLE): QueryClassification {
  const compiled = compile(table);
  const text = query.text.trim();
  const lower = text.toLowerCase();

  return {
    urgency: detectUrgency(lower, query, table),
    complexity: estimateComplexity(text, table),
    domain: detectDomain(lower, query, table),
    type: detectQueryType(lower, compiled)
  } satisfies QueryClassification;
}
