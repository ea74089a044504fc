import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig } from "../../config";
import { buildCatalog } from "../catalog";
import { DEFAULT_SECTIONS } from "../../agents/outline/prompts";
import { articleModel, condition, jsonResponse } from "../../testing/fakes";
import { createPipeline } from "./index";

let outputDir: string;

beforeEach(async () => {
  outputDir = await mkdtemp(join(tmpdir(), "condition-kb-wiring-"));
});

afterEach(async () => {
  await rm(outputDir, { recursive: true, force: true });
});

describe("createPipeline", () => {
  test("runs a condition end to end against Semantic Scholar", async () => {
    const config = loadConfig({
      GOOGLE_API_KEY: "test-secret",
      SEARCH_SERVICES: "semantic_scholar",
      OUTPUT_DIR: outputDir,
      MAX_CONDITIONS_IN_FLIGHT: "1",
    });
    const requested: string[] = [];
    const { controller } = await createPipeline(config, {
      chatModel: articleModel({
        headings: [...DEFAULT_SECTIONS],
        queries: { Treatment: ["colchicine gout flares"] },
      }),
      fetchImpl: async (url) => {
        requested.push(String(url));
        return jsonResponse({
          total: 1,
          data: [
            {
              paperId: "s2-colchicine",
              title: "Colchicine for acute gout flares",
              authors: [{ name: "Lee H" }],
              year: 2021,
              venue: "Arthritis Care",
              externalIds: { DOI: "10.2000/COLCH" },
            },
          ],
        });
      },
      now: () => new Date("2024-05-01T00:00:00.000Z"),
    });

    const report = await controller.run(buildCatalog([condition()]));

    expect(report.counts.succeeded).toBe(1);
    expect(requested).toHaveLength(1);
    expect(requested[0]).toContain("/paper/search?query=colchicine+gout+flares&limit=3");

    const markdown = await readFile(join(outputDir, "gout.md"), "utf-8");
    expect(markdown).toContain("## Treatment\n\nEvidence for Treatment [1].");
    expect(markdown).toContain(
      "1. Lee H. Colchicine for acute gout flares. Arthritis Care. 2021. doi:10.2000/colch",
    );
  });
});
