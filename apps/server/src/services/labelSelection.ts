import type { Label } from "../types/pipeline.js";

export interface Candidate {
  name: string;
  confidence: number;
}

export interface ThresholdTable {
  thresholds: Record<string, number>;
  defaultThreshold: number;
}

export function thresholdFor(table: ThresholdTable, name: string): number {
  return table.thresholds[name] ?? table.defaultThreshold;
}

export function clearsThreshold(table: ThresholdTable, candidate: Candidate): boolean {
  return candidate.confidence > thresholdFor(table, candidate.name);
}

/**
 * Highest-confidence candidate whose confidence exceeds its own threshold.
 * Ties keep the earliest candidate.
 */
export function strongestAboveThreshold(candidates: Candidate[], table: ThresholdTable): Candidate | null {
  return strongest(candidates.filter((candidate) => clearsThreshold(table, candidate)));
}

/** Highest-confidence candidate regardless of threshold; `null` only when there are none. */
export function strongest(candidates: Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (!best || candidate.confidence > best.confidence) {
      best = candidate;
    }
  }
  return best;
}

export function toCandidate(label: Label, name: string = label.name): Candidate {
  return { name, confidence: label.confidence };
}
