import { describe, expect, test } from "vitest";
import { localKnowledgeAgent } from "./index";
import { ScriptedModel, documentState, stageContext } from "../../testing/fakes";

describe("localKnowledgeAgent", () => {
  test("rewrites section text from local documents and keeps the shape", async () => {
    const chat = new ScriptedModel([
      JSON.stringify({
        title: "Gout",
        subtitle: "Joint pain",
        sections: [
          { heading: "Overview", content: "Urate crystals inflame joints." },
          { heading: "Treatment", content: "Colchicine eases flares." },
        ],
      }),
    ]);

    const state = await localKnowledgeAgent(
      documentState(),
      [{ path: "/corpus/gout-notes.txt", content: "Crystals form when urate is high." }],
      stageContext(chat),
    );

    expect(state.stage).toBe("LOCAL_INTEGRATED");
    expect(state.completed).toEqual(["OUTLINED", "LOCAL_INTEGRATED"]);
    expect(state.outline.sections.map((section) => section.content)).toEqual([
      "Urate crystals inflame joints.",
      "Colchicine eases flares.",
    ]);
    expect(chat.requests[0]?.messages[0]?.content).toContain(
      "--- Document 1: gout-notes.txt ---\nCrystals form when urate is high.",
    );
  });
});
