import type { CallStats, PaperRecord, SearchService } from "../../types/article";

export interface SearchClient {
  readonly service: SearchService;
  search(query: string, limit: number, stats?: CallStats): Promise<PaperRecord[]>;
}

/** Records without a title or any author cannot be cited. */
export function isCitable(record: { title?: string; authors?: string[] }): boolean {
  return Boolean(record.title?.trim()) && (record.authors?.length ?? 0) > 0;
}

export function doiUrl(doi: string): string {
  return `https://doi.org/${doi}`;
}
