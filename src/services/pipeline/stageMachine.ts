import { DataIntegrityError } from "../../utils/errors";
import type { Stage } from "../../types/article";

export type StageOrStart = Stage | "START";

const TRANSITIONS: Record<StageOrStart, readonly Stage[]> = {
  START: ["OUTLINED"],
  OUTLINED: ["LOCAL_INTEGRATED", "QUERIES_GENERATED"],
  LOCAL_INTEGRATED: ["QUERIES_GENERATED"],
  QUERIES_GENERATED: ["PAPERS_INTEGRATED"],
  PAPERS_INTEGRATED: ["FINALIZED"],
  FINALIZED: [],
};

export function canTransition(from: StageOrStart, to: Stage): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Stages only move forward; LOCAL_INTEGRATED is the one that may be skipped. */
export function assertTransition(from: StageOrStart, to: Stage): void {
  if (!canTransition(from, to)) {
    throw new DataIntegrityError(`Illegal stage transition ${from} -> ${to}`);
  }
}
