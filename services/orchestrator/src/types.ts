export type Severity = "low" | "medium" | "high";

export type Verdict = "authentic" | "forged" | "inconclusive";

export type MediaKind = "image" | "video" | "audio" | "document";

export type SourceKind = "forensic_technical" | "physical" | "contextual" | "ai_generation";

/** Position of an anomaly, as percentages of image width and height. */
export interface AnomalyLocation {
  readonly x: number;
  readonly y: number;
}

export interface Anomaly {
  readonly type: string;
  readonly description: string;
  readonly severity: Severity;
  readonly location?: AnomalyLocation;
}

/**
 * Common contract for every opinion source. `confidence` is the source's own
 * probability that the media is authentic.
 */
export interface OpinionRecord {
  sourceKind: SourceKind | (string & {});
  confidence: number;
  findings: Record<string, unknown>;
  anomalies: Anomaly[];
}

export interface AnomalySummary {
  total: number;
  high: number;
  medium: number;
  low: number;
}

export interface CrossReferenceResult {
  combinedScore: number;
  preliminaryVerdict: Verdict;
  reasoning: string;
  anomalySummary: AnomalySummary;
}

export type ChallengeKind =
  | "false_positive_risk"
  | "consistency_gap"
  | "cross_disagreement"
  | "low_resolution"
  | "grayscale"
  | "parse_error"
  | "verdict_challenge";

export interface Challenge {
  kind: ChallengeKind;
  targetSource?: string;
  targetAnomaly?: string;
  challenge: string;
  severity: Severity;
  impact: string;
}

export type BlindSpotRisk = "false_negative" | "missing_capability" | "missing_agent";

export interface BlindSpot {
  source: string;
  issue: string;
  risk: BlindSpotRisk;
}

export interface CritiqueResult {
  challenges: Challenge[];
  blindSpots: BlindSpot[];
  recommendations: string[];
  confidenceAdjustment: number;
  threatLevel: Severity;
  summary: string;
  historySize: number;
}

export interface FinalVerdict {
  verdict: Verdict;
  confidence: number;
  hitlRequired: boolean;
}

export interface AnalysisResult extends FinalVerdict {
  opinions: OpinionRecord[];
  crossReference: CrossReferenceResult;
  critique: CritiqueResult;
}
