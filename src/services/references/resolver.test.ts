import { describe, test, expect } from "vitest";
import {
  checkArticleCitations,
  completeness,
  normalizeTitle,
  resolveReferences,
  sameReference,
} from "./resolver";
import { DataIntegrityError } from "../../utils/errors";
import { paper } from "../../testing/fakes";
import type { AttachedPaper, Outline, PaperRecord, Section } from "../../types/article";

/**
 * Reference resolution: dedup rules, first-use numbering, marker rewriting,
 * dropping unused papers and rejecting dangling markers.
 */

function section(heading: string, content: string, papers: Array<[number, PaperRecord]> = []): Section {
  const attached: AttachedPaper[] = papers.map(([ref, record]) => ({ ref, query: heading, paper: record }));
  return { heading, content, citations: [], papers: attached };
}

function outline(...sections: Section[]): Outline {
  return { title: "Gout", subtitle: "A common inflammatory arthritis", sections };
}

describe("normalizeTitle", () => {
  test("ignores case, punctuation and whitespace", () => {
    expect(normalizeTitle("Gout: A Review!")).toBe(normalizeTitle("gout a review"));
    expect(normalizeTitle("  ")).toBe("");
  });
});

describe("sameReference", () => {
  test("matches on identical external identifiers", () => {
    expect(
      sameReference(
        paper({ externalId: "doi:10.1/X", title: "One" }),
        paper({ externalId: "DOI:10.1/x", title: "Two" }),
      ),
    ).toBe(true);
  });

  test("matches on equivalent titles even when identifiers differ", () => {
    expect(
      sameReference(
        paper({ externalId: "pmid:1", title: "Urate-Lowering Therapy." }),
        paper({ externalId: "s2:abc", title: "urate lowering therapy" }),
      ),
    ).toBe(true);
  });

  test("different identifiers and titles stay distinct", () => {
    expect(
      sameReference(paper({ externalId: "pmid:1", title: "A" }), paper({ externalId: "pmid:2", title: "B" })),
    ).toBe(false);
  });
});

describe("completeness", () => {
  test("counts populated metadata fields", () => {
    expect(completeness(paper({ abstract: "x", url: "https://example.org", doi: "10.1/x" }))).toBe(5);
    expect(completeness({ title: "T", authors: ["A"], source: "pubmed" })).toBe(0);
  });
});

describe("resolveReferences", () => {
  test("merges one DOI retrieved for two sections into a single citation", () => {
    const fromPubMed = paper({ title: "Colchicine trial", externalId: "doi:10.1/colch", doi: "10.1/colch" });
    const fromS2 = paper({
      title: "Colchicine Trial",
      externalId: "doi:10.1/COLCH",
      doi: "10.1/colch",
      abstract: "Randomized trial.",
      url: "https://example.org/colch",
      source: "semantic_scholar",
    });

    const resolved = resolveReferences(
      outline(
        section("Treatment", "Colchicine shortens flares [4].", [[4, fromPubMed]]),
        section("Home-Care", "Start colchicine early [9].", [[9, fromS2]]),
      ),
    );

    expect(resolved.references).toEqual([
      { number: 1, paper: fromS2, sections: ["Treatment", "Home-Care"] },
    ]);
    expect(resolved.sections.map((s) => s.content)).toEqual([
      "Colchicine shortens flares [1].",
      "Start colchicine early [1].",
    ]);
    expect(resolved.sections.map((s) => s.citations)).toEqual([[1], [1]]);
  });

  test("numbers references by first use in document order", () => {
    const a = paper({ title: "Paper A", externalId: "pmid:1" });
    const b = paper({ title: "Paper B", externalId: "pmid:2" });
    const c = paper({ title: "Paper C", externalId: "pmid:3" });

    const resolved = resolveReferences(
      outline(
        section("Overview", "First [3], then [1, 2].", [
          [1, a],
          [2, b],
          [3, c],
        ]),
        section("Causes", "Again [2]."),
      ),
    );

    expect(resolved.references.map((r) => [r.number, r.paper.title])).toEqual([
      [1, "Paper C"],
      [2, "Paper A"],
      [3, "Paper B"],
    ]);
    expect(resolved.sections.map((s) => s.content)).toEqual(["First [1], then [2, 3].", "Again [3]."]);
    expect(resolved.references[2]?.sections).toEqual(["Overview", "Causes"]);
  });

  test("rewrites ranges and collapses duplicates inside one marker", () => {
    const a = paper({ title: "Same study", externalId: "pmid:10" });
    const b = paper({ title: "Same Study.", externalId: "pmid:11" });
    const c = paper({ title: "Other study", externalId: "pmid:12" });

    const resolved = resolveReferences(
      outline(section("Diagnosis", "Ultrasound helps [5-7].", [
        [5, a],
        [6, b],
        [7, c],
      ])),
    );

    expect(resolved.sections[0]?.content).toBe("Ultrasound helps [1, 2].");
    expect(resolved.references).toHaveLength(2);
  });

  test("drops attached papers that no marker cites", () => {
    const resolved = resolveReferences(
      outline(section("Symptoms", "Joint pain [2].", [
        [1, paper({ title: "Unused", externalId: "pmid:100" })],
        [2, paper({ title: "Used", externalId: "pmid:200" })],
      ])),
    );

    expect(resolved.references.map((r) => r.paper.title)).toEqual(["Used"]);
  });

  test("a marker with no attached paper is a data-integrity fault", () => {
    const run = () =>
      resolveReferences(outline(section("Treatment", "Diet matters [3].", [[1, paper()]])));

    expect(run).toThrow(DataIntegrityError);
    try {
      run();
    } catch (error) {
      expect(error instanceof DataIntegrityError && error.details).toEqual([
        'Section "Treatment": marker [3] has no matching paper',
      ]);
    }
  });

  test("sections without markers resolve to an empty reference list", () => {
    const resolved = resolveReferences(outline(section("Overview", "Plain text.")));
    expect(resolved.references).toEqual([]);
    expect(resolved.sections[0]?.citations).toEqual([]);
  });
});

describe("checkArticleCitations", () => {
  const ref = (number: number) => ({ number, paper: paper({ title: `P${number}` }), sections: ["Overview"] });

  test("accepts a consistent article", () => {
    expect(
      checkArticleCitations({
        sections: [{ heading: "Overview", content: "A [1] B [1, 2]", citations: [1, 2] }],
        references: [ref(1), ref(2)],
      }),
    ).toEqual([]);
  });

  test("flags dangling markers, unused references and out-of-order first use", () => {
    expect(
      checkArticleCitations({
        sections: [{ heading: "Overview", content: "A [2] B [1] C [4]", citations: [2, 1, 4] }],
        references: [ref(1), ref(2), ref(3)],
      }),
    ).toEqual([
      'Section "Overview": marker [4] has no reference entry',
      "Reference 3 is never cited",
      "Reference 2 is first cited out of order",
      "Reference 1 is first cited out of order",
    ]);
  });
});
