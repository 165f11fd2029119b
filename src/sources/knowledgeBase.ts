import fs from "node:fs";
import { z } from "zod";
import { ConfigurationError, RouteCancelledError, describeError } from "../errors";
import { logWarning } from "../logger";
import { Query, SourceResult } from "../routing/types";
import { freshness, searchTerms } from "./scoring";
import { InformationSource, SourceQueryOptions } from "./types";

const KnowledgeDocumentSchema = z.object({
  id: z.string().optional(),
  title: z.string().min(1),
  content: z.string().min(1),
  updatedAt: z.string()
});

export type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>;

export function loadKnowledgeDocuments(filePath: string): KnowledgeDocument[] {
  if (!fs.existsSync(filePath)) {
    logWarning("Knowledge base file not found; kb source will skip every query", { filePath });
    return [];
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Unable to read knowledge base at ${filePath}`, [describeError(error)]);
  }
  const parsed = z.array(KnowledgeDocumentSchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid knowledge base at ${filePath}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

interface ScoredDocument {
  doc: KnowledgeDocument;
  score: number;
}

export function documentRelevance(queryText: string, doc: KnowledgeDocument): number {
  const words = searchTerms(queryText);
  if (words.length === 0) {
    return 0;
  }
  const text = `${doc.title} ${doc.content}`.toLowerCase();
  return words.filter((word) => text.includes(word)).length / words.length;
}

export function knowledgeConfidence(ranked: ScoredDocument[], now: Date): number {
  const [best, second] = ranked;
  if (!best) {
    return 0;
  }
  let confidence = best.score * 100;
  if (searchTerms(best.doc.title).length > 2) {
    confidence = Math.min(100, confidence * 1.3);
  }
  confidence *= 0.7 + 0.3 * freshness(best.doc.updatedAt, now);
  if (second && second.score > 0.7) {
    confidence = Math.min(100, confidence * 1.1);
  }
  return Math.round(confidence);
}

export interface KnowledgeBaseOptions {
  now?: () => Date;
}

export class KnowledgeBaseSource implements InformationSource {
  readonly name = "kb";

  private readonly now: () => Date;

  constructor(
    private readonly documents: KnowledgeDocument[],
    options: KnowledgeBaseOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async query(query: Query, options: SourceQueryOptions): Promise<SourceResult> {
    if (options.signal.aborted) {
      throw new RouteCancelledError();
    }
    const startedAt = Date.now();
    const ranked = this.documents
      .map((doc) => ({ doc, score: documentRelevance(query.text, doc) }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score);

    const best = ranked[0];
    if (!best) {
      return {
        source: this.name,
        confidence: 0,
        answer: "",
        metadata: { latencyMs: Date.now() - startedAt, documentsSearched: this.documents.length },
        reasoning: "No matching documents found in the knowledge base."
      };
    }

    return {
      source: this.name,
      confidence: knowledgeConfidence(ranked, this.now()),
      answer: best.doc.content,
      metadata: {
        latencyMs: Date.now() - startedAt,
        documentsSearched: this.documents.length,
        resultsFound: ranked.length,
        publishedAt: best.doc.updatedAt,
        details: { matchScore: best.score, documentId: best.doc.id ?? best.doc.title }
      },
      reasoning: `Found ${ranked.length} matching documents; best match "${best.doc.title}".`
    };
  }

  canHandle(_query: Query): boolean {
    return this.documents.length > 0;
  }

  averageLatencyMs(): number {
    return 100;
  }

  cost(): number {
    return 0;
  }
}
