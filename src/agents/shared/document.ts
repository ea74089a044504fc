import { markerNumbers } from "../../services/references/markers";
import { DataIntegrityError } from "../../utils/errors";
import type {
  CallStats,
  Condition,
  DocumentState,
  Outline,
  OutlineDraft,
  Stage,
} from "../../types/article";
import type { StructuredModel } from "../../llm/structured";
import type { BibliographicSearch } from "../../services/search";

export interface StageOptions {
  resultLimit: number;
  queriesPerSection: number;
  papersPerSection: number;
  abstractChars: number;
}

export const DEFAULT_STAGE_OPTIONS: StageOptions = {
  resultLimit: 3,
  queriesPerSection: 2,
  papersPerSection: 8,
  abstractChars: 600,
};

export interface StageContext {
  condition: Condition;
  model: StructuredModel;
  search: BibliographicSearch;
  stats: CallStats;
  options: StageOptions;
}

/** Outline without attached papers, as shown to the model. */
export function toDraft(outline: Outline): OutlineDraft {
  return {
    title: outline.title,
    subtitle: outline.subtitle,
    sections: outline.sections.map(({ heading, content }) => ({ heading, content })),
  };
}

export function knownRefs(outline: Outline): Set<number> {
  return new Set(outline.sections.flatMap((section) => section.papers.map((p) => p.ref)));
}

/**
 * Issues that make a rewritten outline unusable: changed headings, or
 * markers pointing at papers that were never attached.
 */
export function draftIssues(
  previous: Outline,
  draft: OutlineDraft,
  allowedRefs: Set<number>,
): string[] {
  const issues: string[] = [];
  const expected = previous.sections.map((section) => section.heading);
  const actual = draft.sections.map((section) => section.heading);

  if (expected.length !== actual.length || expected.some((heading, i) => heading !== actual[i])) {
    issues.push(
      `sections must keep exactly these headings in this order: ${JSON.stringify(expected)}`,
    );
  }

  for (const section of draft.sections) {
    const unknown = markerNumbers(section.content).filter((ref) => !allowedRefs.has(ref));
    if (unknown.length > 0) {
      issues.push(
        allowedRefs.size === 0
          ? `section "${section.heading}" contains citation markers ${JSON.stringify(unknown)} but no papers are available to cite; remove them`
          : `section "${section.heading}" cites unknown papers ${JSON.stringify(unknown)}; only cite numbers from the PAPERS list`,
      );
    }
  }

  return issues;
}

/** Apply a validated draft: new text, same attachments, refreshed markers. */
export function applyDraft(previous: Outline, draft: OutlineDraft): Outline {
  if (draft.sections.length !== previous.sections.length) {
    throw new DataIntegrityError("Rewritten outline changed the number of sections");
  }
  return {
    title: draft.title,
    subtitle: draft.subtitle,
    sections: previous.sections.map((section, index) => {
      const content = draft.sections[index]?.content ?? section.content;
      return { ...section, content, citations: markerNumbers(content) };
    }),
  };
}

export function advance(state: DocumentState, stage: Stage, outline: Outline): DocumentState {
  return {
    ...state,
    stage,
    completed: [...state.completed, stage],
    outline,
  };
}
