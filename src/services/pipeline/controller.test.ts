import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import logger from "../../utils/logger";
import { RetryableError, TerminalError } from "../../utils/errors";
import { ResilientClient } from "../../llm/retry";
import { StructuredModel } from "../../llm/structured";
import { DEFAULT_STAGE_OPTIONS } from "../../agents/shared/document";
import { BibliographicSearch } from "../search";
import { parseRelevance, type RelevanceIndex } from "../catalog/relevance";
import { buildCatalog } from "../catalog";
import { ArticleSchema, type PaperRecord } from "../../types/article";
import type { ChatModel } from "../../llm/types";
import {
  FakeSearchClient,
  STAGE_PROMPTS,
  articleModel,
  articleTitle,
  condition,
  paper,
  type ArticleScript,
} from "../../testing/fakes";
import { PipelineController } from "./controller";
import { RunReportSchema } from "./report";
import { ArticleStore } from "./store";

/**
 * End-to-end runs of the controller against a scripted model, a fake
 * PubMed client and a temporary output directory.
 */

const HEADINGS = ["Overview", "Treatment"];
const QUERIES = {
  Overview: ["gout epidemiology"],
  Treatment: ["urate lowering therapy"],
};

const PAPERS: Record<string, PaperRecord[]> = {
  "gout epidemiology": [paper({ title: "Global burden of gout", externalId: "pmid:101" })],
  "urate lowering therapy": [
    paper({ title: "Urate lowering therapy outcomes", externalId: "pmid:202" }),
  ],
};

let outputDir: string;

beforeEach(async () => {
  outputDir = await mkdtemp(join(tmpdir(), "condition-kb-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(outputDir, { recursive: true, force: true });
});

interface SetupOptions {
  script?: Partial<ArticleScript>;
  search?: (query: string) => PaperRecord[] | Promise<PaperRecord[]>;
  relevance?: RelevanceIndex;
  conditionConcurrency?: number;
  wrapChat?: (chat: ChatModel) => ChatModel;
}

function setup(options: SetupOptions = {}) {
  const client = new ResilientClient({
    policy: { maxAttempts: 5, repairAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
    seed: 7,
    sleep: async () => {},
  });
  const chat = articleModel({ headings: HEADINGS, queries: QUERIES, ...options.script });
  const pubmed = new FakeSearchClient(
    "pubmed",
    options.search ?? ((query) => PAPERS[query] ?? []),
    client,
  );
  const store = new ArticleStore(outputDir);
  const controller = new PipelineController({
    model: new StructuredModel(client, options.wrapChat?.(chat) ?? chat, { model: "test-model" }),
    search: new BibliographicSearch([pubmed]),
    store,
    relevance: options.relevance,
    options: DEFAULT_STAGE_OPTIONS,
    localDocsLimit: 5,
    saveCheckpoints: true,
    headings: HEADINGS,
    conditionConcurrency: options.conditionConcurrency ?? 2,
  });
  return { chat, pubmed, store, controller };
}

async function readArticle(id: string) {
  return ArticleSchema.parse(JSON.parse(await readFile(join(outputDir, `${id}.json`), "utf-8")));
}

describe("PipelineController", () => {
  test("integrates a local document and persists without retries", async () => {
    await writeFile(join(outputDir, "gout-notes.txt"), "Uric acid crystals deposit in joints.");
    const relevance = parseRelevance(
      JSON.stringify({ gout: [{ path: "gout-notes.txt", score: 2.5 }] }),
      outputDir,
    );
    const warn = vi.spyOn(logger, "warn");
    const { controller, chat } = setup({ relevance });

    const report = await controller.run(buildCatalog([condition()]));

    expect(report.counts).toEqual({ succeeded: 1, failed: 0, skipped: 0, stopped: 0 });
    expect(report.outcomes[0]).toMatchObject({
      status: "succeeded",
      stats: { networkRetries: 0, repairs: 0 },
    });

    const article = await readArticle("gout");
    expect(article.stages).toEqual([
      "OUTLINED",
      "LOCAL_INTEGRATED",
      "QUERIES_GENERATED",
      "PAPERS_INTEGRATED",
      "FINALIZED",
    ]);
    expect(article.sections.map((section) => section.content)).toEqual([
      "Evidence for Overview [1].",
      "Evidence for Treatment [2].",
    ]);
    expect(article.references.map((reference) => reference.paper.title)).toEqual([
      "Global burden of gout",
      "Urate lowering therapy outcomes",
    ]);

    const localPrompt = chat.requests
      .map((request) => request.messages[0]?.content ?? "")
      .find((prompt) => STAGE_PROMPTS.local.test(prompt));
    expect(localPrompt).toContain("Uric acid crystals deposit in joints.");
    expect(warn).not.toHaveBeenCalledWith(expect.anything(), "llm_retry_attempt");
  });

  test("skips local integration when the condition has no local documents", async () => {
    const { controller } = setup();

    await controller.run(buildCatalog([condition()]));

    expect((await readArticle("gout")).stages).toEqual([
      "OUTLINED",
      "QUERIES_GENERATED",
      "PAPERS_INTEGRATED",
      "FINALIZED",
    ]);
  });

  test("a malformed outline costs one repair and no network retries", async () => {
    let outlineCalls = 0;
    const warn = vi.spyOn(logger, "warn");
    const { controller } = setup({
      script: {
        replies: {
          outline: () => {
            outlineCalls++;
            if (outlineCalls === 1) return '{"title": "Sleep Apnea", "sections": [';
            return JSON.stringify({
              title: "Sleep Apnea",
              subtitle: "Breathing pauses during sleep",
              sections: HEADINGS.map((heading) => ({ heading, content: `About ${heading}.` })),
            });
          },
        },
      },
    });

    const report = await controller.run(
      buildCatalog([condition({ id: "sleep-apnea", name: "Sleep Apnea" })]),
    );

    expect(report.counts.succeeded).toBe(1);
    expect(report.outcomes[0]).toMatchObject({
      status: "succeeded",
      stats: { networkRetries: 0, repairs: 1 },
    });
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ name: "outline", repair: 1 }),
      "structured_output_repair",
    );
    expect(warn).not.toHaveBeenCalledWith(expect.anything(), "llm_retry_attempt");
    expect((await readArticle("sleep-apnea")).title).toBe("Sleep Apnea");
  });

  test("a query that times out on every attempt only loses its own papers", async () => {
    const { controller, pubmed } = setup({
      search: (query) => {
        if (query === "urate lowering therapy") {
          throw new RetryableError("pubmed search timed out after 30000ms", 408);
        }
        return PAPERS[query] ?? [];
      },
    });

    const report = await controller.run(buildCatalog([condition()]));

    expect(pubmed.attempts.filter((query) => query === "urate lowering therapy")).toHaveLength(5);
    expect(report.outcomes[0]).toMatchObject({
      status: "succeeded",
      references: 1,
      stats: { networkRetries: 4, repairs: 0 },
    });

    const article = await readArticle("gout");
    expect(article.sections.map((section) => section.content)).toEqual([
      "Evidence for Overview [1].",
      "Evidence for Treatment.",
    ]);
    const outcome = report.outcomes[0];
    expect(outcome?.status === "succeeded" ? outcome.warnings : []).toEqual([
      'pubmed query "urate lowering therapy" for Treatment failed: pubmed search failed after 5 attempts: pubmed search timed out after 30000ms',
    ]);
  });

  test("produces an article without references when every query fails", async () => {
    const { controller, chat } = setup({
      search: () => {
        throw new RetryableError("service unavailable", 503);
      },
    });

    const report = await controller.run(buildCatalog([condition()]));

    expect(report.counts.succeeded).toBe(1);
    expect((await readArticle("gout")).references).toEqual([]);
    const prompts = chat.requests.map((request) => request.messages[0]?.content ?? "");
    expect(prompts.some((prompt) => STAGE_PROMPTS.papers.test(prompt))).toBe(false);
  });

  test("merges the same DOI retrieved for two sections into one citation", async () => {
    const { controller } = setup({
      search: (query) => [
        query === "gout epidemiology"
          ? paper({ title: "Serum urate and gout risk", doi: "10.1000/urate", externalId: "doi:10.1000/urate" })
          : paper({
              title: "Serum urate and incident gout",
              doi: "10.1000/URATE",
              externalId: "doi:10.1000/URATE",
              abstract: "Cohort study.",
            }),
      ],
    });

    await controller.run(buildCatalog([condition()]));

    const article = await readArticle("gout");
    expect(article.references).toHaveLength(1);
    expect(article.references[0]?.sections).toEqual(["Overview", "Treatment"]);
    expect(article.references[0]?.paper.abstract).toBe("Cohort study.");
    expect(article.sections.map((section) => section.citations)).toEqual([[1], [1]]);
  });

  test("a rerun skips every condition that already has a valid article", async () => {
    const catalog = buildCatalog([condition(), condition({ id: "asthma", name: "Asthma" })]);
    const first = setup();
    await first.controller.run(catalog);

    const second = setup();
    const report = await second.controller.run(catalog);

    expect(report.counts).toEqual({ succeeded: 0, failed: 0, skipped: 2, stopped: 0 });
    expect(second.chat.requests).toHaveLength(0);
  });

  test("force regenerates existing articles", async () => {
    const catalog = buildCatalog([condition()]);
    await setup().controller.run(catalog);

    const rerun = setup();
    const report = await rerun.controller.run(catalog, { force: true });

    expect(report.counts.succeeded).toBe(1);
    expect(rerun.chat.requests.length).toBeGreaterThan(0);
  });

  test("one condition's failure does not stop the others", async () => {
    const { controller } = setup({
      script: {
        replies: {
          outline: (prompt) => {
            if (prompt.includes("- Name: Asthma")) throw new TerminalError("invalid api key", 401);
            return JSON.stringify({
              title: "Gout",
              subtitle: "Joint pain",
              sections: HEADINGS.map((heading) => ({ heading, content: `About ${heading}.` })),
            });
          },
        },
      },
    });

    const report = await controller.run(
      buildCatalog([condition({ id: "asthma", name: "Asthma" }), condition()]),
    );

    expect(report.counts).toEqual({ succeeded: 1, failed: 1, skipped: 0, stopped: 0 });
    expect(report.failures).toEqual([
      { conditionId: "asthma", stage: "OUTLINED", kind: "terminal", cause: "invalid api key" },
    ]);
    expect((await readArticle("gout")).conditionId).toBe("gout");
  });

  test("invented citations fail the condition and leave a checkpoint to resume from", async () => {
    const catalog = buildCatalog([condition()]);
    const failing = setup({
      script: {
        replies: {
          papers: () =>
            JSON.stringify({
              title: "Gout",
              subtitle: "Joint pain",
              sections: HEADINGS.map((heading) => ({ heading, content: `Claim [99].` })),
            }),
        },
      },
    });

    const report = await failing.controller.run(catalog);

    expect(report.failures).toEqual([
      expect.objectContaining({
        conditionId: "gout",
        stage: "PAPERS_INTEGRATED",
        kind: "malformed_output",
      }),
    ]);
    expect(await failing.store.hasValidArticle("gout")).toBe(false);

    const resumed = setup();
    const rerun = await resumed.controller.run(catalog);

    expect(rerun.counts.succeeded).toBe(1);
    const prompts = resumed.chat.requests.map((request) => request.messages[0]?.content ?? "");
    expect(prompts.filter((prompt) => STAGE_PROMPTS.outline.test(prompt))).toHaveLength(0);
    expect(prompts.filter((prompt) => STAGE_PROMPTS.queries.test(prompt))).toHaveLength(0);
    expect(prompts.filter((prompt) => STAGE_PROMPTS.papers.test(prompt))).toHaveLength(1);
  });

  test("a stop request lets the current stage finish, then halts", async () => {
    let controller: PipelineController | undefined;
    const built = setup({
      conditionConcurrency: 1,
      script: {
        replies: {
          outline: () => {
            controller?.requestStop();
            return JSON.stringify({
              title: "Gout",
              subtitle: "Joint pain",
              sections: HEADINGS.map((heading) => ({ heading, content: `About ${heading}.` })),
            });
          },
        },
      },
    });
    controller = built.controller;

    const report = await controller.run(
      buildCatalog([condition(), condition({ id: "asthma", name: "Asthma" })]),
    );

    expect(report.counts).toEqual({ succeeded: 0, failed: 0, skipped: 0, stopped: 2 });
    expect(report.outcomes).toEqual([
      { status: "stopped", conditionId: "gout", stage: "OUTLINED" },
      { status: "stopped", conditionId: "asthma", stage: "START" },
    ]);
    expect(await built.store.loadCheckpoint("gout")).toMatchObject({ stage: "OUTLINED" });
  });

  test("leaves only committed files and a parseable report", async () => {
    const { controller } = setup();

    await controller.run(buildCatalog([condition()]));

    expect((await readdir(outputDir)).sort()).toEqual(["gout.json", "gout.md", "run-report.json"]);
    const report = RunReportSchema.parse(
      JSON.parse(await readFile(join(outputDir, "run-report.json"), "utf-8")),
    );
    expect(report.counts.succeeded).toBe(1);
  });

  test("runs at most conditionConcurrency conditions at once", async () => {
    const inFlight = new Set<string>();
    let peak = 0;
    const { controller } = setup({
      conditionConcurrency: 2,
      wrapChat: (chat) => ({
        async createChatCompletion(request) {
          const prompt = request.messages.map((message) => message.content).join("\n");
          if (STAGE_PROMPTS.outline.test(prompt)) {
            inFlight.add(/- Name: (.+)/.exec(prompt)?.[1] ?? "");
            peak = Math.max(peak, inFlight.size);
          }
          await new Promise((resolve) => setTimeout(resolve, 5));
          const response = await chat.createChatCompletion(request);
          if (STAGE_PROMPTS.papers.test(prompt)) inFlight.delete(articleTitle(prompt));
          return response;
        },
      }),
    });

    const report = await controller.run(
      buildCatalog([
        condition(),
        condition({ id: "asthma", name: "Asthma" }),
        condition({ id: "eczema", name: "Eczema" }),
        condition({ id: "migraine", name: "Migraine" }),
      ]),
    );

    expect(report.counts.succeeded).toBe(4);
    expect(peak).toBe(2);
    expect(inFlight.size).toBe(0);
  });
});
