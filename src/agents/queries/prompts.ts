export const queryPrompt = `ROLE
You plan literature searches that will supply citations for a medical knowledgebase article.

TASK
For each section of the article below, write up to {{perSection}} short keyword queries for PubMed and Semantic Scholar that would find peer-reviewed evidence for the claims in that section.

RULES
- "section" must be one of the article's headings, copied exactly.
- Queries are 3 to 8 keywords, no boolean operators, no quotes.
- Skip sections that make no factual claims (for example "Specialist to Visit").

ARTICLE (JSON)
{{article}}`;
