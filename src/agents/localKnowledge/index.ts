import { basename } from "path";
import logger from "../../utils/logger";
import { fillTemplate } from "../../utils/prompt";
import { OutlineDraftSchema, type DocumentState } from "../../types/article";
import type { LocalDocument } from "../../services/catalog/relevance";
import {
  advance,
  applyDraft,
  draftIssues,
  knownRefs,
  toDraft,
  type StageContext,
} from "../shared/document";
import { localKnowledgePrompt } from "./prompts";

/**
 * Folds locally indexed reference documents into the drafted sections.
 * Only runs when the relevance file lists readable documents for the condition.
 */
export async function localKnowledgeAgent(
  state: DocumentState,
  documents: LocalDocument[],
  ctx: StageContext,
): Promise<DocumentState> {
  const documentText = documents
    .map((doc, index) => `--- Document ${index + 1}: ${basename(doc.path)} ---\n${doc.content}`)
    .join("\n\n");

  const draft = await ctx.model.generate(
    {
      name: "local_integration",
      schema: OutlineDraftSchema,
      prompt: fillTemplate(localKnowledgePrompt, {
        article: JSON.stringify(toDraft(state.outline), null, 2),
        documents: documentText,
      }),
      validate: (value) => draftIssues(state.outline, value, knownRefs(state.outline)),
    },
    ctx.stats,
  );

  logger.info(
    { conditionId: state.conditionId, documents: documents.length },
    "local_knowledge_integrated",
  );

  return advance(state, "LOCAL_INTEGRATED", applyDraft(state.outline, draft));
}
