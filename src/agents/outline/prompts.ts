export const DEFAULT_SECTIONS = [
  "Overview",
  "Key Facts",
  "Symptoms",
  "Types",
  "Causes",
  "Risk Factors",
  "Diagnosis",
  "Prevention",
  "Specialist to Visit",
  "Treatment",
  "Home-Care",
  "Living With",
  "Complications",
  "Alternative Therapies",
  "FAQs",
] as const;

export const outlineSystemPrompt = `You are a medical writer producing patient-facing knowledgebase articles. Write accurate, plain-language content for an educated general audience.`;

export const outlinePrompt = `ROLE
You draft the first version of a knowledgebase article about a medical condition.

CONDITION
- Name: {{topic}}
- Category: {{category}}
- Tags: {{tags}}

TASK
Write a complete article with a title, a one-sentence subtitle and one section for each of these headings, in this order, using the headings exactly as written:
{{sections}}

RULES
- Write each section in Markdown. Use short paragraphs and bullet lists where they help.
- "Key Facts" is a bullet list of the most important facts.
- "FAQs" is a list of questions in bold, each followed by its answer.
- Do NOT add citation markers such as [1]; sources are attached in a later step.
- Do NOT add a references section.`;
