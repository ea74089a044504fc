/**
 * Render a finalized Article as Markdown with YAML frontmatter, the input
 * format of the downstream document converter.
 */

import type { Article, Citation } from "../../types/article";

export function formatAuthors(authors: string[]): string {
  return authors.length > 3 ? `${authors.slice(0, 3).join(", ")} et al.` : authors.join(", ");
}

export function formatReference(citation: Citation): string {
  const { paper } = citation;
  const parts = [
    formatAuthors(paper.authors),
    paper.title,
    paper.venue,
    paper.year !== undefined ? String(paper.year) : undefined,
  ]
    .filter((part): part is string => Boolean(part))
    .map((part) => part.trim().replace(/\.+$/, ""));

  const link = paper.doi ? `doi:${paper.doi}` : paper.url;
  return `${citation.number}. ${parts.join(". ")}.${link ? ` ${link}` : ""}`;
}

function yamlBlock(value: string): string[] {
  return value.split("\n").map((line) => `  ${line}`);
}

export function renderArticleMarkdown(article: Article): string {
  const frontmatter = [
    "---",
    "title: |",
    ...yamlBlock(article.title),
    "subtitle: |",
    ...yamlBlock(article.subtitle),
    `condition: "${article.conditionId.replace(/"/g, '\\"')}"`,
    `generated: "${article.generatedAt}"`,
    "---",
  ].join("\n");

  const body: string[] = [`# ${article.title}`, "", `*${article.subtitle}*`];

  for (const section of article.sections) {
    body.push("", `## ${section.heading}`, "", section.content.trim());
  }

  if (article.references.length > 0) {
    body.push("", "## References", "", ...article.references.map(formatReference));
  }

  return `${frontmatter}\n\n${body.join("\n")}\n`;
}
