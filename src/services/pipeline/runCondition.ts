import logger from "../../utils/logger";
import {
  DataIntegrityError,
  StageError,
  errorKindOf,
  errorMessage,
} from "../../utils/errors";
import { emptyStats } from "../../llm/retry";
import type { StructuredModel } from "../../llm/structured";
import { outlineAgent } from "../../agents/outline";
import { localKnowledgeAgent } from "../../agents/localKnowledge";
import { queryAgent } from "../../agents/queries";
import { paperAgent } from "../../agents/papers";
import { finalizeArticle } from "../../agents/finalize";
import type { StageContext, StageOptions } from "../../agents/shared/document";
import {
  readLocalDocuments,
  relevanceFor,
  selectLocalDocuments,
  type RelevanceIndex,
} from "../catalog/relevance";
import { renderArticleMarkdown } from "../render/markdown";
import type { BibliographicSearch } from "../search";
import type { Condition, DocumentState, Stage } from "../../types/article";
import type { ConditionOutcome } from "./report";
import { assertTransition, type StageOrStart } from "./stageMachine";
import type { ArticleStore } from "./store";

export interface ConditionDeps {
  model: StructuredModel;
  search: BibliographicSearch;
  store: ArticleStore;
  relevance?: RelevanceIndex;
  options: StageOptions;
  localDocsLimit: number;
  saveCheckpoints: boolean;
  shouldStop: () => boolean;
  headings?: readonly string[];
  now?: () => Date;
}

export interface RunConditionOptions {
  force?: boolean;
}

type StageStep = { stage: Stage; run: () => Promise<DocumentState> };

/**
 * Drives one condition from its last checkpoint (or from scratch) to a
 * persisted Article. Never throws: every failure becomes a "failed" outcome
 * carrying the stage it happened in.
 */
export async function runCondition(
  condition: Condition,
  deps: ConditionDeps,
  { force = false }: RunConditionOptions = {},
): Promise<ConditionOutcome> {
  const conditionId = condition.id;
  const { store } = deps;
  let stats = emptyStats();
  let attempting: StageOrStart = "START";

  try {
    if (force) {
      await store.clearCheckpoints(conditionId);
    } else if (await store.hasValidArticle(conditionId)) {
      logger.info({ conditionId }, "condition_skipped");
      return { status: "skipped", conditionId, reason: "valid article already exists" };
    }

    let state = force ? null : await store.loadCheckpoint(conditionId);
    if (state) {
      stats = { ...state.stats };
      logger.info({ conditionId, stage: state.stage }, "condition_resumed");
    }

    const ctx: StageContext = {
      condition,
      model: deps.model,
      search: deps.search,
      stats,
      options: deps.options,
    };

    const nextStep = async (current: DocumentState | null): Promise<StageStep | null> => {
      if (!current) {
        return { stage: "OUTLINED", run: () => outlineAgent(ctx, deps.headings) };
      }
      switch (current.stage) {
        case "OUTLINED": {
          const refs = selectLocalDocuments(
            relevanceFor(deps.relevance, condition),
            deps.localDocsLimit,
          );
          const documents = await readLocalDocuments(refs);
          if (documents.length > 0) {
            return {
              stage: "LOCAL_INTEGRATED",
              run: () => localKnowledgeAgent(current, documents, ctx),
            };
          }
          logger.info(
            {
              conditionId,
              stage: "LOCAL_INTEGRATED",
              reason: refs.length > 0 ? "no readable local documents" : "no local documents",
            },
            "stage_skipped",
          );
          return { stage: "QUERIES_GENERATED", run: () => queryAgent(current, ctx) };
        }
        case "LOCAL_INTEGRATED":
          return { stage: "QUERIES_GENERATED", run: () => queryAgent(current, ctx) };
        case "QUERIES_GENERATED":
          return { stage: "PAPERS_INTEGRATED", run: () => paperAgent(current, ctx) };
        default:
          return null;
      }
    };

    for (;;) {
      const from: StageOrStart = state?.stage ?? "START";
      if (deps.shouldStop()) {
        logger.info({ conditionId, stage: from }, "condition_stopped");
        return { status: "stopped", conditionId, stage: from };
      }

      const step = await nextStep(state);
      if (!step) break;

      assertTransition(from, step.stage);
      attempting = step.stage;
      logger.info({ conditionId, stage: step.stage }, "stage_started");
      const startedAt = Date.now();

      const result = await step.run();
      state = { ...result, stats: { ...stats } };

      logger.info(
        { conditionId, stage: step.stage, durationMs: Date.now() - startedAt },
        "stage_completed",
      );
      if (deps.saveCheckpoints) await store.saveCheckpoint(state);
    }

    if (!state) {
      throw new Error(`No document state for ${conditionId}`);
    }

    assertTransition(state.stage, "FINALIZED");
    attempting = "FINALIZED";
    logger.info({ conditionId, stage: "FINALIZED" }, "stage_started");

    const { article } = finalizeArticle(state, deps.now);
    const path = await store.saveArticle(article, renderArticleMarkdown(article));
    await store.clearCheckpoints(conditionId);

    logger.info({ conditionId, stage: "FINALIZED" }, "stage_completed");

    return {
      status: "succeeded",
      conditionId,
      path,
      references: article.references.length,
      stats: { ...stats },
      warnings: state.warnings,
    };
  } catch (error) {
    const details = error instanceof DataIntegrityError ? error.details.slice(0, 3) : [];
    const cause = [errorMessage(error), ...details].join("; ");
    const failure = new StageError(conditionId, attempting, errorKindOf(error), cause, {
      cause: error,
    });

    logger.error(
      { conditionId, stage: failure.stage, kind: failure.causeKind, error: failure.message },
      "condition_failed",
    );

    return {
      status: "failed",
      conditionId,
      stage: attempting,
      kind: failure.causeKind,
      cause: failure.message,
      stats: { ...stats },
    };
  }
}
