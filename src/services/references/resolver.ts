import logger from "../../utils/logger";
import { DataIntegrityError } from "../../utils/errors";
import { normalizeExternalId } from "./doi";
import { extractMarkers, markerNumbers, rewriteMarkers } from "./markers";
import type {
  Article,
  ArticleSection,
  Citation,
  Outline,
  PaperRecord,
} from "../../types/article";

export interface ResolvedReferences {
  sections: ArticleSection[];
  references: Citation[];
}

/** Lowercase, strip everything that is not a letter or digit. */
export function normalizeTitle(title: string): string {
  return title
    .normalize("NFKD")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]/gu, "");
}

export function sameReference(a: PaperRecord, b: PaperRecord): boolean {
  const idA = normalizeExternalId(a.externalId);
  const idB = normalizeExternalId(b.externalId);
  if (idA && idB && idA === idB) return true;

  const titleA = normalizeTitle(a.title);
  return titleA.length > 0 && titleA === normalizeTitle(b.title);
}

/** Metadata completeness, one point per populated field. */
export function completeness(paper: PaperRecord): number {
  return [paper.abstract, paper.url, paper.doi, paper.venue, paper.year].filter(
    (value) => value !== undefined && value !== "",
  ).length;
}

interface Entry {
  ref: number;
  paper: PaperRecord;
  group: number;
}

/**
 * Merge duplicate papers, number them by first use and rewrite every inline
 * marker to its final number. Runs once per article, after the last stage
 * that touches citations.
 *
 * Throws DataIntegrityError when a marker points at no attached paper.
 */
export function resolveReferences(outline: Outline): ResolvedReferences {
  const entries = new Map<number, Entry>();

  // Group duplicates: first entry seen for an id or title owns the group
  const groupById = new Map<string, number>();
  const groupByTitle = new Map<string, number>();
  const parent: number[] = [];
  const find = (group: number): number => {
    let root = group;
    for (let next = parent[root]; next !== undefined && next !== root; next = parent[root]) {
      root = next;
    }
    parent[group] = root;
    return root;
  };
  const union = (a: number, b: number) => {
    const rootA = find(a);
    const rootB = find(b);
    if (rootA !== rootB) parent[Math.max(rootA, rootB)] = Math.min(rootA, rootB);
  };

  for (const section of outline.sections) {
    for (const attached of section.papers) {
      if (entries.has(attached.ref)) {
        throw new DataIntegrityError(`Provisional reference ${attached.ref} is attached twice`);
      }
      const group = parent.length;
      parent.push(group);
      entries.set(attached.ref, { ref: attached.ref, paper: attached.paper, group });

      const id = normalizeExternalId(attached.paper.externalId);
      if (id) {
        const existing = groupById.get(id);
        if (existing === undefined) groupById.set(id, group);
        else union(existing, group);
      }
      const title = normalizeTitle(attached.paper.title);
      if (title) {
        const existing = groupByTitle.get(title);
        if (existing === undefined) groupByTitle.set(title, group);
        else union(existing, group);
      }
    }
  }

  // Canonical copy per group: most complete, earliest on ties
  const canonical = new Map<number, PaperRecord>();
  for (const entry of entries.values()) {
    const root = find(entry.group);
    const current = canonical.get(root);
    if (!current || completeness(entry.paper) > completeness(current)) {
      canonical.set(root, entry.paper);
    }
  }

  const numberByGroup = new Map<number, number>();
  const citedFrom = new Map<number, string[]>();
  const problems: string[] = [];

  const sections = outline.sections.map((section): ArticleSection => {
    // First-use numbering follows reading order within the section
    for (const marker of extractMarkers(section.content)) {
      for (const ref of marker.numbers) {
        const entry = entries.get(ref);
        if (!entry) continue;
        const root = find(entry.group);
        if (!numberByGroup.has(root)) numberByGroup.set(root, numberByGroup.size + 1);
        const headings = citedFrom.get(root) ?? [];
        if (!headings.includes(section.heading)) headings.push(section.heading);
        citedFrom.set(root, headings);
      }
    }

    const rewritten = rewriteMarkers(section.content, (ref) => {
      const entry = entries.get(ref);
      return entry ? numberByGroup.get(find(entry.group)) : undefined;
    });
    for (const ref of rewritten.unresolved) {
      problems.push(`Section "${section.heading}": marker [${ref}] has no matching paper`);
    }

    return {
      heading: section.heading,
      content: rewritten.text,
      citations: markerNumbers(rewritten.text),
    };
  });

  if (problems.length > 0) {
    throw new DataIntegrityError("Unresolved citation markers", problems);
  }

  const references: Citation[] = [];
  for (const [root, number] of numberByGroup) {
    const paper = canonical.get(root);
    const headings = citedFrom.get(root);
    if (!paper || !headings) continue;
    references.push({ number, paper, sections: headings });
  }
  references.sort((a, b) => a.number - b.number);

  const citedEntries = [...entries.values()].filter((entry) =>
    numberByGroup.has(find(entry.group)),
  ).length;
  logger.debug(
    { attached: entries.size, cited: references.length, dropped: entries.size - citedEntries },
    "references_resolved",
  );

  return { sections, references };
}

/**
 * Check the citation invariants of a finished article. Returns a list of
 * problems; empty means every marker resolves and every reference is used.
 */
export function checkArticleCitations(article: Pick<Article, "sections" | "references">): string[] {
  const problems: string[] = [];
  const numbers = article.references.map((reference) => reference.number);

  numbers.forEach((number, index) => {
    if (number !== index + 1) {
      problems.push(`Reference list is not numbered contiguously at position ${index + 1}`);
    }
  });

  const known = new Set(numbers);
  const used = new Set<number>();
  const firstUse: number[] = [];

  for (const section of article.sections) {
    for (const value of markerNumbers(section.content)) {
      if (!known.has(value)) {
        problems.push(`Section "${section.heading}": marker [${value}] has no reference entry`);
      }
      if (!used.has(value)) firstUse.push(value);
      used.add(value);
    }
  }

  for (const number of numbers) {
    if (!used.has(number)) problems.push(`Reference ${number} is never cited`);
  }

  // Reference numbers must read low-to-high on first appearance
  firstUse
    .filter((value) => known.has(value))
    .forEach((value, index) => {
      if (value !== index + 1) {
        problems.push(`Reference ${value} is first cited out of order`);
      }
    });

  return [...new Set(problems)];
}
