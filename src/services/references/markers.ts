/**
 * Inline citation markers: [3], [1, 4], [2,23-25].
 * Bracket contents other than a numeric list are left alone, and so is
 * Markdown link text ("[1](https://...)").
 */

const MARKER_PATTERN = /\[(\d+(?:\s*[-–,]\s*\d+)*)\](?!\()/g;

// Wider ranges are read as two separate numbers
const MAX_RANGE_SPAN = 50;

export interface MarkerMatch {
  fullMatch: string;
  startIndex: number;
  numbers: number[];
}

export function expandMarker(body: string): number[] {
  const numbers: number[] = [];
  for (const part of body.split(",")) {
    const [startText, endText] = part.split(/[-–]/).map((value) => value.trim());
    const start = parseInt(startText ?? "", 10);
    if (Number.isNaN(start)) continue;
    const end = endText === undefined ? start : parseInt(endText, 10);

    if (Number.isNaN(end) || end < start || end - start > MAX_RANGE_SPAN) {
      numbers.push(start);
      if (!Number.isNaN(end) && end !== start) numbers.push(end);
      continue;
    }
    for (let value = start; value <= end; value++) numbers.push(value);
  }
  return numbers;
}

export function extractMarkers(text: string): MarkerMatch[] {
  const results: MarkerMatch[] = [];
  for (const match of text.matchAll(MARKER_PATTERN)) {
    const body = match[1];
    if (body === undefined || match.index === undefined) continue;
    results.push({
      fullMatch: match[0],
      startIndex: match.index,
      numbers: expandMarker(body),
    });
  }
  return results;
}

/** Distinct marker numbers in order of first appearance. */
export function markerNumbers(text: string): number[] {
  const seen = new Set<number>();
  for (const marker of extractMarkers(text)) {
    for (const value of marker.numbers) seen.add(value);
  }
  return [...seen];
}

export function formatMarker(numbers: number[]): string {
  const unique = [...new Set(numbers)].sort((a, b) => a - b);
  return `[${unique.join(", ")}]`;
}

/**
 * Replace every marker, working from the end of the string so earlier
 * offsets stay valid. A number the mapper cannot resolve is reported and
 * left as written.
 */
export function rewriteMarkers(
  text: string,
  mapNumber: (value: number) => number | undefined,
): { text: string; unresolved: number[] } {
  const markers = extractMarkers(text);
  const unresolved: number[] = [];
  let result = text;

  for (const marker of [...markers].sort((a, b) => b.startIndex - a.startIndex)) {
    const mapped = marker.numbers.map((value) => {
      const target = mapNumber(value);
      if (target === undefined) unresolved.push(value);
      return target ?? value;
    });
    result =
      result.substring(0, marker.startIndex) +
      formatMarker(mapped) +
      result.substring(marker.startIndex + marker.fullMatch.length);
  }

  return { text: result, unresolved: [...new Set(unresolved)].sort((a, b) => a - b) };
}
