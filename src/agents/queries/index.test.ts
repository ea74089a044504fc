import { describe, expect, test } from "vitest";
import { queryAgent } from "./index";
import { BibliographicSearch } from "../../services/search";
import {
  FakeSearchClient,
  ScriptedModel,
  documentState,
  stageContext,
} from "../../testing/fakes";

const search = new BibliographicSearch([
  new FakeSearchClient("pubmed", () => []),
  new FakeSearchClient("semantic_scholar", () => []),
]);

describe("queryAgent", () => {
  test("fans each query out to every configured service", async () => {
    const chat = new ScriptedModel([
      JSON.stringify({ queries: [{ section: "Treatment", query: "allopurinol gout" }] }),
    ]);

    const state = await queryAgent(documentState(), stageContext(chat, search));

    expect(state.stage).toBe("QUERIES_GENERATED");
    expect(state.completed).toEqual(["OUTLINED", "QUERIES_GENERATED"]);
    expect(state.queries).toEqual([
      { section: "Treatment", query: "allopurinol gout", service: "pubmed" },
      { section: "Treatment", query: "allopurinol gout", service: "semantic_scholar" },
    ]);
  });

  test("caps queries per section and drops duplicates", async () => {
    const chat = new ScriptedModel([
      JSON.stringify({
        queries: [
          { section: "Overview", query: "gout prevalence" },
          { section: "Overview", query: "gout prevalence " },
          { section: "Overview", query: "gout incidence" },
          { section: "Overview", query: "gout burden" },
        ],
      }),
    ]);
    const ctx = stageContext(chat, new BibliographicSearch([new FakeSearchClient("pubmed", () => [])]));

    const state = await queryAgent(documentState(), ctx);

    expect(state.queries.map((query) => query.query)).toEqual(["gout prevalence", "gout incidence"]);
  });

  test("asks for a repair when a query names an unknown section", async () => {
    const chat = new ScriptedModel([
      JSON.stringify({ queries: [{ section: "Diet", query: "gout diet" }] }),
      JSON.stringify({ queries: [{ section: "Treatment", query: "gout diet" }] }),
    ]);
    const ctx = stageContext(chat, new BibliographicSearch([new FakeSearchClient("pubmed", () => [])]));

    const state = await queryAgent(documentState(), ctx);

    expect(state.queries).toEqual([{ section: "Treatment", query: "gout diet", service: "pubmed" }]);
    expect(ctx.stats.repairs).toBe(1);
  });
});
