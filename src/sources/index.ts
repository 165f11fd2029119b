import path from "node:path";
import { Env } from "../config/env";
import { OpenAIJsonModel } from "../llm/client";
import { DocsSearchSource } from "./docsSearch";
import { KnowledgeBaseSource, loadKnowledgeDocuments } from "./knowledgeBase";
import { LlmSource } from "./llm";
import { SourceRegistry } from "./registry";
import { WebSearchSource } from "./webSearch";

/**
 * Registers the four reference sources. Sources whose credentials are missing
 * stay registered but decline every query through `canHandle`.
 */
export function createSourcesFromEnv(env: Env, baseDir: string = process.cwd()): SourceRegistry {
  const documents = loadKnowledgeDocuments(path.resolve(baseDir, env.KB_DOCUMENTS_PATH));
  const model = env.OPENAI_API_KEY ? OpenAIJsonModel.fromApiKey(env.OPENAI_API_KEY, env.OPENAI_MODEL) : null;

  return new SourceRegistry([
    new KnowledgeBaseSource(documents),
    new LlmSource(model),
    new DocsSearchSource({ baseUrl: env.DOCS_SEARCH_BASE_URL, locale: env.DOCS_SEARCH_LOCALE }),
    new WebSearchSource(env.SERPAPI_KEY)
  ]);
}

export { SourceRegistry } from "./registry";
export type { InformationSource, SourceLookup, SourceQueryOptions } from "./types";
