import { DEFAULT_SOURCE_WEIGHT, SOURCE_WEIGHTS, VERDICT } from "./thresholds.js";
import type { AnomalySummary, CrossReferenceResult, OpinionRecord, Verdict } from "./types.js";

const SOURCE_NAMES: Record<string, string> = {
  forensic_technical: "forensic-technical",
  physical: "physical",
  contextual: "contextual",
  ai_generation: "AI-generation",
};

export function sourceWeight(sourceKind: string): number {
  return Object.hasOwn(SOURCE_WEIGHTS, sourceKind) ? SOURCE_WEIGHTS[sourceKind] : DEFAULT_SOURCE_WEIGHT;
}

export function summarizeAnomalies(opinions: readonly OpinionRecord[]): AnomalySummary {
  const summary: AnomalySummary = { total: 0, high: 0, medium: 0, low: 0 };
  for (const opinion of opinions) {
    for (const anomaly of opinion.anomalies) {
      summary.total += 1;
      summary[anomaly.severity] += 1;
    }
  }
  return summary;
}

export function combineScores(opinions: readonly OpinionRecord[]): number {
  let weightedSum = 0;
  let totalWeight = 0;
  for (const opinion of opinions) {
    const weight = sourceWeight(opinion.sourceKind);
    weightedSum += opinion.confidence * weight;
    totalWeight += weight;
  }
  return totalWeight > 0 ? Number((weightedSum / totalWeight).toFixed(3)) : 0.5;
}

export function preliminaryVerdict(combinedScore: number, highCount: number): Verdict {
  if (
    highCount >= VERDICT.forgedHighCount
    || (highCount >= VERDICT.weakForgedHighCount && combinedScore < VERDICT.weakForgedScore)
  ) {
    return "forged";
  }
  if (combinedScore >= VERDICT.authenticScore && highCount === 0) {
    return "authentic";
  }
  return "inconclusive";
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function suspectedTools(opinions: readonly OpinionRecord[]): string[] {
  return opinions
    .filter((opinion) => opinion.sourceKind === "ai_generation" && opinion.findings.isAiGenerated === true)
    .map((opinion) => {
      const tool = opinion.findings.likelyTool;
      return typeof tool === "string" && tool.length > 0 ? tool : "unknown";
    });
}

/**
 * Weighted cross-reference of all opinions into one score and a preliminary
 * verdict. The result does not depend on the order of `opinions`.
 */
export function crossReference(opinions: readonly OpinionRecord[]): CrossReferenceResult {
  if (opinions.length === 0) {
    return {
      combinedScore: 0.5,
      preliminaryVerdict: "inconclusive",
      reasoning: "No opinions were received from any analysis source. Human review is recommended.",
      anomalySummary: { total: 0, high: 0, medium: 0, low: 0 },
    };
  }

  const combinedScore = combineScores(opinions);
  const anomalySummary = summarizeAnomalies(opinions);
  const verdict = preliminaryVerdict(combinedScore, anomalySummary.high);

  const reasoning = [
    `${opinions.length} analysis sources consulted. Weighted confidence score: ${percent(combinedScore)}.`,
    `${anomalySummary.total} anomalies found: ${anomalySummary.high} high, ${anomalySummary.medium} medium, `
      + `${anomalySummary.low} low severity.`,
  ];

  const lowConfidence = opinions
    .filter((opinion) => opinion.confidence < VERDICT.lowSourceConfidence)
    .map((opinion) => (Object.hasOwn(SOURCE_NAMES, opinion.sourceKind) ? SOURCE_NAMES[opinion.sourceKind] : opinion.sourceKind));
  if (lowConfidence.length > 0) {
    reasoning.push(`Low confidence from: ${lowConfidence.join(", ")}.`);
  }

  for (const tool of suspectedTools(opinions)) {
    reasoning.push(`The image was identified as AI-generated (tool: ${tool}).`);
  }

  if (verdict === "inconclusive") {
    reasoning.push("A human expert (HITL) review is recommended to confirm the findings.");
  }

  return {
    combinedScore,
    preliminaryVerdict: verdict,
    reasoning: reasoning.join(" "),
    anomalySummary,
  };
}
