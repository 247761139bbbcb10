import type { OpinionRecord } from "../types.js";

/**
 * A source of one independent opinion about a media file. Implementations
 * must not reject for recoverable conditions (undecodable input, missing
 * credentials, network failures); they return a degraded opinion instead.
 * The analysis service drops any provider that rejects anyway.
 */
export interface OpinionProvider {
  readonly kind: string;
  analyze(fileBytes: Buffer, filename: string): Promise<OpinionRecord>;
}

export type VisionSourceKind = "physical" | "contextual" | "ai_generation";

/** Fixed opinions used when no vision model is reachable. */
export const PLACEHOLDER_OPINIONS: Record<VisionSourceKind, OpinionRecord> = {
  physical: {
    sourceKind: "physical",
    confidence: 0.68,
    findings: { summary: "Placeholder analysis; configure a vision model for a real assessment.", source: "placeholder" },
    anomalies: [
      {
        type: "shadows",
        description: "Shadow direction of the main subject conflicts with shadows in the background, a possible composite.",
        severity: "high",
        location: { x: 50, y: 60 },
      },
      {
        type: "perspective",
        description: "Vanishing lines of the background do not match the perspective of foreground objects.",
        severity: "medium",
        location: { x: 25, y: 75 },
      },
    ],
  },
  contextual: {
    sourceKind: "contextual",
    confidence: 0.65,
    findings: { summary: "Placeholder analysis; configure a vision model for a real assessment.", source: "placeholder" },
    anomalies: [
      {
        type: "period",
        description: "Some elements may not fit the apparent period. A vision model is needed for a closer look.",
        severity: "medium",
        location: { x: 60, y: 40 },
      },
    ],
  },
  ai_generation: {
    sourceKind: "ai_generation",
    confidence: 0.7,
    findings: {
      isAiGenerated: false,
      likelyTool: "unknown",
      summary: "Placeholder analysis; configure a vision model for a real assessment.",
      source: "placeholder",
    },
    anomalies: [
      {
        type: "ai_check",
        description: "Whether the image was generated by a model cannot be determined without a vision model.",
        severity: "low",
        location: { x: 50, y: 50 },
      },
    ],
  },
};

export function placeholderOpinion(kind: VisionSourceKind): OpinionRecord {
  const template = PLACEHOLDER_OPINIONS[kind];
  return {
    ...template,
    findings: { ...template.findings },
    anomalies: [...template.anomalies],
  };
}

export class PlaceholderOpinionProvider implements OpinionProvider {
  constructor(readonly kind: VisionSourceKind) {}

  async analyze(): Promise<OpinionRecord> {
    return placeholderOpinion(this.kind);
  }
}
