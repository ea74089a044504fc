import type { PipelineConfig } from "../../config";
import { LLM, createLLMProvider } from "../../llm/provider";
import { ResilientClient } from "../../llm/retry";
import { StructuredModel } from "../../llm/structured";
import type { ChatModel } from "../../llm/types";
import { ServicePools } from "../../utils/servicePools";
import type { FetchLike } from "../../utils/http";
import { DEFAULT_STAGE_OPTIONS } from "../../agents/shared/document";
import { loadRelevance } from "../catalog/relevance";
import {
  BibliographicSearch,
  PubMedClient,
  SemanticScholarClient,
  type SearchClient,
} from "../search";
import { PipelineController, type ControllerOptions } from "./controller";
import { ArticleStore } from "./store";

export interface PipelineOverrides {
  chatModel?: ChatModel;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface Pipeline {
  controller: PipelineController;
  options: ControllerOptions;
}

/**
 * Wires the configured model, search services, pools and store into a
 * controller. The config is the only input; nothing here reads the environment.
 */
export async function createPipeline(
  config: Readonly<PipelineConfig>,
  overrides: PipelineOverrides = {},
): Promise<Pipeline> {
  const pools = new ServicePools({
    model: config.concurrency.model,
    pubmed: config.concurrency.pubmed,
    semantic_scholar: config.concurrency.semantic_scholar,
  });

  const client = new ResilientClient({
    policy: {
      maxAttempts: config.retry.maxAttempts,
      repairAttempts: config.retry.repairAttempts,
      baseDelayMs: config.retry.baseDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      timeoutMs: config.retry.modelTimeoutMs,
    },
    timeouts: {
      model: config.retry.modelTimeoutMs,
      pubmed: config.retry.searchTimeoutMs,
      semantic_scholar: config.retry.searchTimeoutMs,
    },
    pools,
    seed: config.retry.seed,
    sleep: overrides.sleep,
  });

  const chatModel =
    overrides.chatModel ??
    new LLM(createLLMProvider(config.llm.provider, config.llm.apiKey, config.llm.baseUrl));

  const model = new StructuredModel(client, chatModel, {
    model: config.llm.model,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  });

  const clients: SearchClient[] = config.search.services.map((service) =>
    service === "pubmed"
      ? new PubMedClient({
          client,
          apiKey: config.search.pubmedApiKey,
          email: config.search.pubmedEmail,
          fetchImpl: overrides.fetchImpl,
        })
      : new SemanticScholarClient({
          client,
          apiKey: config.search.semanticScholarApiKey,
          minCitationCount: config.search.minCitationCount,
          fetchImpl: overrides.fetchImpl,
        }),
  );

  const relevance = config.paths.relevance
    ? await loadRelevance(config.paths.relevance)
    : undefined;

  const options: ControllerOptions = {
    model,
    search: new BibliographicSearch(clients, config.search.resultLimit),
    store: new ArticleStore(config.paths.output),
    relevance,
    options: { ...DEFAULT_STAGE_OPTIONS, resultLimit: config.search.resultLimit },
    localDocsLimit: config.localDocsLimit,
    saveCheckpoints: config.saveCheckpoints,
    conditionConcurrency: config.concurrency.conditions,
    now: overrides.now,
  };

  return { controller: new PipelineController(options), options };
}

export { PipelineController } from "./controller";
export { ArticleStore, atomicWrite } from "./store";
export { runCondition } from "./runCondition";
export * from "./report";
