import type { SubmittedVerdict } from "@/lib/server/verdict";

export type ScoreTier = "standard" | "bonus";

export interface ScoreRecord {
  finalScore: number;
  tier: ScoreTier;
  fieldScores: Record<string, number>;
  hallucinatedTechniques: string[];
  missingTechniques: string[];
}

/** Ground truth is opaque here; only the scorer knows its shape. */
export type GroundTruth = Record<string, unknown>;

export interface Scorer {
  score(groundTruth: GroundTruth, verdict: SubmittedVerdict | null): ScoreRecord | Promise<ScoreRecord>;
}

/** What a task without ground truth, or whose scoring failed, is recorded as. */
export function emptyScore(): ScoreRecord {
  return {
    finalScore: 0,
    tier: "standard",
    fieldScores: {},
    hallucinatedTechniques: [],
    missingTechniques: [],
  };
}
