import logger from "../../utils/logger";
import { DataIntegrityError } from "../../utils/errors";
import {
  checkArticleCitations,
  resolveReferences,
} from "../../services/references/resolver";
import type { Article, DocumentState } from "../../types/article";
import { advance } from "../shared/document";

/**
 * Final pass: resolve references once, assemble the Article and check its
 * invariants. No model call; a failure here is never retried.
 */
export function finalizeArticle(
  state: DocumentState,
  now: () => Date = () => new Date(),
): { state: DocumentState; article: Article } {
  const { outline } = state;

  if (
    outline.sections.length === 0 ||
    outline.sections.every((section) => section.content.trim().length === 0)
  ) {
    throw new DataIntegrityError(`Outline for ${state.conditionId} is empty`);
  }

  const { sections, references } = resolveReferences(outline);
  const next = advance(state, "FINALIZED", outline);

  const article: Article = {
    conditionId: state.conditionId,
    title: outline.title,
    subtitle: outline.subtitle,
    sections,
    references,
    stages: next.completed,
    generatedAt: now().toISOString(),
  };

  const problems = checkArticleCitations(article);
  if (problems.length > 0) {
    throw new DataIntegrityError("Article failed citation validation", problems);
  }

  logger.info(
    { conditionId: state.conditionId, references: references.length },
    "article_finalized",
  );

  return { state: next, article };
}
