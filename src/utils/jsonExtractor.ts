import logger from "./logger";

export type JsonExtraction = {
  value: unknown;
  method: "direct" | "code_block" | "json_match";
};

/**
 * Pull a JSON value out of raw model output using multiple strategies.
 * Returns null when nothing parses; callers decide whether to repair.
 */
export function extractJson(rawContent: string): JsonExtraction | null {
  const trimmed = rawContent.trim();

  // Strategy 1: Direct parse
  const direct = tryParse(trimmed);
  if (direct.ok) return found(direct.value, "direct");

  // Strategy 2: Extract from markdown code block
  const codeBlockMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (codeBlockMatch?.[1]) {
    const block = tryParse(codeBlockMatch[1]);
    if (block.ok) return found(block.value, "code_block");
  }

  // Strategy 3: Outermost braces or brackets
  for (const [open, close] of [
    ["{", "}"],
    ["[", "]"],
  ] as const) {
    const start = trimmed.indexOf(open);
    const end = trimmed.lastIndexOf(close);
    if (start >= 0 && end > start) {
      const candidate = tryParse(trimmed.slice(start, end + 1));
      if (candidate.ok) return found(candidate.value, "json_match");
    }
  }

  logger.debug(
    { rawContentPreview: trimmed.substring(0, 200) },
    "json_extraction_failed",
  );
  return null;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function found(value: unknown, method: JsonExtraction["method"]): JsonExtraction {
  logger.debug({ method }, "json_extraction_result");
  return { value, method };
}
