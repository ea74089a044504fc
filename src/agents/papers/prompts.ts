export const paperIntegrationPrompt = `ROLE
You add scientific evidence and inline citations to a medical knowledgebase article.

TASK
Revise the article below using the numbered PAPERS. Where a paper supports, refines or contradicts a claim, update the text and cite it inline with its number in square brackets, for example [12] or [3, 7].

RULES
- Keep every section heading exactly as it is, in the same order. Do not add or remove sections.
- Only cite numbers that appear in the PAPERS list. Never invent a citation.
- Papers are grouped under the section they were retrieved for, but any paper may be cited in any section.
- Not every paper has to be cited; skip papers that are not relevant.
- Do not add a references section; the reference list is generated automatically.

ARTICLE (JSON)
{{article}}

PAPERS
{{papers}}`;
