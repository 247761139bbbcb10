import { createHash } from "node:crypto";

import { Inject, Injectable } from "@nestjs/common";

import { bytesPerPixel, isGrayscale, probeImage } from "../imaging/probe.js";
import { CRITIQUE } from "../thresholds.js";
import { CRITIQUE_HISTORY } from "../tokens.js";
import type {
  BlindSpot,
  Challenge,
  CritiqueResult,
  CrossReferenceResult,
  OpinionRecord,
  Severity,
} from "../types.js";
import { CritiqueHistory } from "./critique.history.js";

interface ModuleOutcome {
  challenges: Challenge[];
  blindSpots: BlindSpot[];
  recommendations: string[];
  adjustment?: number;
}

function outcome(partial: Partial<ModuleOutcome> = {}): ModuleOutcome {
  return { challenges: [], blindSpots: [], recommendations: [], ...partial };
}

function pct(value: number): string {
  return `${Math.round(value * 100)}%`;
}

const RESAVE_ANOMALY_TYPES = new Set(["ela_region", "ela_global"]);

export function checkFalsePositives(fileBytes: Buffer, opinions: readonly OpinionRecord[]): ModuleOutcome {
  const forensic = opinions.find((opinion) => opinion.sourceKind === "forensic_technical");
  if (!forensic) {
    return outcome();
  }

  const challenges: Challenge[] = [];
  let adjustment: number | undefined;

  if (forensic.anomalies.some((anomaly) => RESAVE_ANOMALY_TYPES.has(anomaly.type))) {
    const probe = probeImage(fileBytes);
    if (probe?.format === "JPEG" && bytesPerPixel(fileBytes.length, probe) < CRITIQUE.socialBytesPerPixel) {
      challenges.push({
        kind: "false_positive_risk",
        targetSource: "forensic_technical",
        targetAnomaly: "ela",
        challenge: "The error-level anomaly may come from legitimate repeated compression "
          + "(sharing through social networks or messaging apps). The compression ratio points to several saves.",
        severity: "medium",
        impact: "The forensic score may be too low (false positive).",
      });
      adjustment = CRITIQUE.socialAdjustment;
    }
  }

  if (forensic.anomalies.some((anomaly) => anomaly.type === "metadata")) {
    challenges.push({
      kind: "false_positive_risk",
      targetSource: "forensic_technical",
      targetAnomaly: "metadata",
      challenge: "Missing EXIF metadata does not by itself indicate forgery. "
        + "Many platforms strip EXIF automatically on upload.",
      severity: "low",
      impact: "Missing EXIF alone is not sufficient evidence.",
    });
  }

  return outcome({ challenges, adjustment });
}

export function checkFalseNegatives(opinions: readonly OpinionRecord[]): ModuleOutcome {
  const blindSpots: BlindSpot[] = [];

  for (const opinion of opinions) {
    if (opinion.anomalies.length === 0 && opinion.confidence > CRITIQUE.blindSpotConfidence) {
      blindSpots.push({
        source: opinion.sourceKind,
        issue: `${opinion.sourceKind} reported high confidence (${pct(opinion.confidence)}) with no findings. `
          + "Did it look closely enough?",
        risk: "false_negative",
      });
    }
  }

  const anomalyTypes = opinions
    .flatMap((opinion) => opinion.anomalies.map((anomaly) => anomaly.type))
    .join(" ")
    .toLowerCase();
  if (!anomalyTypes.includes("clone_detection")) {
    blindSpots.push({
      source: "system",
      issue: "No copy-move / clone detection was performed. It is a common forgery technique "
        + "that can slip past the current sources.",
      risk: "missing_capability",
    });
  }

  if (!opinions.some((opinion) => opinion.sourceKind === "ai_generation")) {
    blindSpots.push({
      source: "system",
      issue: "No AI-generation opinion was produced. GAN or diffusion images may pass undetected.",
      risk: "missing_agent",
    });
  }

  return outcome({ blindSpots });
}

export function checkCrossConsistency(opinions: readonly OpinionRecord[]): ModuleOutcome {
  const challenges: Challenge[] = [];
  let adjustment: number | undefined;

  const scores = new Map<string, number>();
  for (const opinion of opinions) {
    scores.set(opinion.sourceKind, opinion.confidence);
  }

  if (scores.size >= 2) {
    const entries = [...scores.entries()];
    const [highSource, highScore] = entries.reduce((acc, entry) => (entry[1] > acc[1] ? entry : acc));
    const [lowSource, lowScore] = entries.reduce((acc, entry) => (entry[1] < acc[1] ? entry : acc));
    const gap = highScore - lowScore;
    if (gap > CRITIQUE.spreadLimit) {
      challenges.push({
        kind: "consistency_gap",
        challenge: `Significant gap (${pct(gap)}) between ${highSource} (${pct(highScore)}) `
          + `and ${lowSource} (${pct(lowScore)}). One of them may be wrong.`,
        severity: "high",
        impact: "The weighted score may be misleading.",
      });
      adjustment = CRITIQUE.spreadAdjustment;
    }
  }

  // a missing source counts as neutral
  const forensic = scores.get("forensic_technical") ?? 0.5;
  const contextual = scores.get("contextual") ?? 0.5;
  if (Math.abs(forensic - contextual) > CRITIQUE.disagreementLimit) {
    challenges.push({
      kind: "cross_disagreement",
      challenge: "Forensic and contextual sources disagree. This may be a sophisticated forgery that "
        + "only one layer caught, or a false positive in the other.",
      severity: "medium",
      impact: "The overlapping findings need manual examination.",
    });
  }

  return outcome({ challenges, adjustment });
}

export function checkEdgeCases(fileBytes: Buffer): ModuleOutcome {
  const probe = probeImage(fileBytes);
  if (!probe) {
    return outcome({
      challenges: [{
        kind: "parse_error",
        challenge: "The file could not be parsed for edge-case checks.",
        severity: "low",
        impact: "Edge-case checks were skipped.",
      }],
    });
  }

  const challenges: Challenge[] = [];
  const recommendations: string[] = [];
  const { width, height } = probe;

  if (width < CRITIQUE.minDimension || height < CRITIQUE.minDimension) {
    challenges.push({
      kind: "low_resolution",
      challenge: `Low image resolution (${width}x${height}). Error-level and artifact analysis is less reliable on small images.`,
      severity: "high",
      impact: "All findings should be treated with caution.",
    });
  }

  if (width > CRITIQUE.maxDimension || height > CRITIQUE.maxDimension) {
    recommendations.push("Very high resolution image: consider checking whether it was cropped from a larger original.");
  }

  if (isGrayscale(probe.mode)) {
    challenges.push({
      kind: "grayscale",
      challenge: "Grayscale image. Color, lighting and some AI-generation checks are less reliable.",
      severity: "medium",
      impact: "Physical and contextual sources may miss anomalies.",
    });
  }

  return outcome({ challenges, recommendations });
}

export function challengeVerdict(
  crossReference: CrossReferenceResult,
  opinions: readonly OpinionRecord[],
): ModuleOutcome {
  const challenges: Challenge[] = [];
  const { preliminaryVerdict, combinedScore } = crossReference;

  if (preliminaryVerdict === "authentic") {
    const highCount = opinions
      .flatMap((opinion) => opinion.anomalies)
      .filter((anomaly) => anomaly.severity === "high").length;
    if (highCount > 0) {
      challenges.push({
        kind: "verdict_challenge",
        challenge: `Verdict 'authentic' despite ${highCount} high-severity anomalies. Are the weights miscalibrated?`,
        severity: "high",
        impact: "This may be a dangerous false negative.",
      });
    }
  }

  if (preliminaryVerdict === "forged" && combinedScore > CRITIQUE.contradictoryForgedScore) {
    challenges.push({
      kind: "verdict_challenge",
      challenge: `Verdict 'forged' but the confidence score is high (${pct(combinedScore)}). `
        + "A high score should point to authenticity.",
      severity: "medium",
      impact: "The score and the verdict contradict each other.",
    });
  }

  return outcome({ challenges });
}

export function threatLevel(challenges: readonly Challenge[], blindSpots: readonly BlindSpot[]): Severity {
  const high = challenges.filter((challenge) => challenge.severity === "high").length;
  const total = challenges.length + blindSpots.length;
  if (high >= 2 || total >= 5) {
    return "high";
  }
  if (high >= 1 || total >= 3) {
    return "medium";
  }
  return "low";
}

/**
 * Adversarial review of a preliminary verdict: looks for false positives,
 * blind spots, disagreement between sources and contradictions in the
 * verdict itself, and proposes a confidence adjustment.
 */
@Injectable()
export class CritiqueEngine {
  constructor(@Inject(CRITIQUE_HISTORY) private readonly history: CritiqueHistory) {}

  challenge(
    fileBytes: Buffer,
    filename: string,
    opinions: readonly OpinionRecord[],
    crossReference: CrossReferenceResult,
  ): CritiqueResult {
    const verdictCheck = challengeVerdict(crossReference, opinions);
    const modules = [
      checkFalsePositives(fileBytes, opinions),
      checkFalseNegatives(opinions),
      checkCrossConsistency(opinions),
      checkEdgeCases(fileBytes),
      verdictCheck,
    ];

    const challenges = modules.flatMap((module) => module.challenges);
    const blindSpots = modules.flatMap((module) => module.blindSpots);
    const recommendations = modules.flatMap((module) => module.recommendations);
    const proposed = modules.flatMap((module) => (module.adjustment === undefined ? [] : [module.adjustment]));
    const adjustment = proposed.length > 0
      ? Number((proposed.reduce((acc, value) => acc + value, 0) / proposed.length).toFixed(3))
      : 0;

    if (challenges.some((challenge) => challenge.severity === "high")) {
      recommendations.push("High-severity challenges found: involving a human expert (HITL) is recommended.");
    }
    if (blindSpots.length >= 2) {
      recommendations.push(
        "Several blind spots identified. Consider expanding the analysis sources (clone detection, frequency analysis).",
      );
    }

    // Read the trend window and append this run in one synchronous step.
    const recent = this.history.recent(CRITIQUE.trendWindow);
    if (recent.length === CRITIQUE.trendWindow) {
      const average = recent.reduce((acc, entry) => acc + entry.challengeCount, 0) / recent.length;
      if (average > CRITIQUE.trendChallengeAverage) {
        recommendations.push(
          `The last ${CRITIQUE.trendWindow} analyses averaged ${average.toFixed(1)} challenges: `
            + "the system may be over-sensitive.",
        );
      }
    }
    this.history.append({
      timestamp: new Date().toISOString(),
      fileHash: createHash("sha256").update(fileBytes).digest("hex").slice(0, 16),
      challengeCount: challenges.length,
      blindSpotCount: blindSpots.length,
      adjustment,
      verdictChallenged: verdictCheck.challenges.length > 0,
    });

    const threat = threatLevel(challenges, blindSpots);
    const summary = [
      `Critique raised ${challenges.length} challenges and ${blindSpots.length} blind spots for ${filename || "the file"}.`,
      `Threat level: ${threat}.`,
      ...(recommendations.length > 0 ? [`${recommendations.length} recommendations made.`] : []),
    ].join(" ");

    return {
      challenges,
      blindSpots,
      recommendations,
      confidenceAdjustment: adjustment,
      threatLevel: threat,
      summary,
      historySize: this.history.size,
    };
  }
}
