import { readFile } from "fs/promises";
import { basename, dirname, isAbsolute, resolve } from "path";
import { z } from "zod";
import logger from "../../utils/logger";
import { errorMessage } from "../../utils/errors";
import type { Condition } from "../../types/article";
import { conditionTopic, slugify } from "./index";

export interface LocalDocumentRef {
  path: string;
  score: number;
}

export interface LocalDocument {
  path: string;
  content: string;
}

/** Condition key (slug of id, name or topic) to ranked local documents. */
export type RelevanceIndex = ReadonlyMap<string, readonly LocalDocumentRef[]>;

const RefSchema = z.object({ path: z.string().min(1), score: z.number() });

const RelevanceFileSchema = z.union([
  z.record(z.array(RefSchema)),
  z.array(z.object({ query: z.string(), results: z.array(RefSchema) })),
]);

export function parseRelevance(text: string, baseDir: string): RelevanceIndex {
  const parsed = RelevanceFileSchema.parse(JSON.parse(text));
  const entries: Array<[string, LocalDocumentRef[]]> = Array.isArray(parsed)
    ? parsed.map((item) => [item.query, item.results])
    : Object.entries(parsed);

  const index = new Map<string, LocalDocumentRef[]>();
  for (const [key, refs] of entries) {
    const resolved = refs.map((ref) => ({
      path: isAbsolute(ref.path) ? ref.path : resolve(baseDir, ref.path),
      score: ref.score,
    }));
    const slug = slugify(key);
    index.set(slug, [...(index.get(slug) ?? []), ...resolved]);
  }
  return index;
}

export async function loadRelevance(path: string): Promise<RelevanceIndex> {
  const index = parseRelevance(await readFile(path, "utf-8"), dirname(path));
  logger.info({ path, entries: index.size }, "relevance_loaded");
  return index;
}

export function relevanceFor(
  index: RelevanceIndex | undefined,
  condition: Condition,
): readonly LocalDocumentRef[] {
  if (!index) return [];
  for (const key of [condition.id, condition.name, conditionTopic(condition)]) {
    const refs = index.get(slugify(key));
    if (refs && refs.length > 0) return refs;
  }
  return [];
}

/**
 * Highest-scoring documents, unique by (file name, score).
 */
export function selectLocalDocuments(
  refs: readonly LocalDocumentRef[],
  limit: number,
): LocalDocumentRef[] {
  const seen = new Set<string>();
  const unique: LocalDocumentRef[] = [];
  for (const ref of [...refs].sort((a, b) => b.score - a.score)) {
    const key = `${basename(ref.path)}\u0000${ref.score}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(ref);
  }
  return unique.slice(0, limit);
}

export async function readLocalDocuments(
  refs: readonly LocalDocumentRef[],
  maxChars = 20000,
): Promise<LocalDocument[]> {
  const documents: LocalDocument[] = [];
  for (const ref of refs) {
    try {
      const content = (await readFile(ref.path, "utf-8")).trim();
      if (content) documents.push({ path: ref.path, content: content.slice(0, maxChars) });
    } catch (error) {
      logger.warn({ path: ref.path, error: errorMessage(error) }, "local_document_unreadable");
    }
  }
  return documents;
}
