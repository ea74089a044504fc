export const localKnowledgePrompt = `ROLE
You revise a medical knowledgebase article using trusted reference material.

TASK
Improve the article below using the REFERENCE MATERIAL. Add missing facts, correct inaccuracies and keep the tone plain and patient-facing.

RULES
- Keep every section heading exactly as it is, in the same order. Do not add or remove sections.
- Rewrite section content only. Keep the title and subtitle unless they are inaccurate.
- Do NOT copy long passages verbatim.
- Do NOT add citation markers such as [1], and do not mention the reference material itself.

ARTICLE (JSON)
{{article}}

REFERENCE MATERIAL
{{documents}}`;
