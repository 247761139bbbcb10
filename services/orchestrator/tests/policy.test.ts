import { describe, expect, it } from "vitest";

import { combineScores, crossReference, preliminaryVerdict, sourceWeight } from "../src/policy.js";
import type { Anomaly, OpinionRecord, Severity } from "../src/types.js";

const anomaly = (severity: Severity, type = "test"): Anomaly => ({ type, description: `${type} finding`, severity });

const opinion = (sourceKind: string, confidence: number, anomalies: Anomaly[] = [], findings = {}): OpinionRecord => ({
  sourceKind,
  confidence,
  findings,
  anomalies,
});

describe("crossReference", () => {
  it("falls back to a neutral result without opinions", () => {
    expect(crossReference([])).toEqual({
      combinedScore: 0.5,
      preliminaryVerdict: "inconclusive",
      reasoning: "No opinions were received from any analysis source. Human review is recommended.",
      anomalySummary: { total: 0, high: 0, medium: 0, low: 0 },
    });
  });

  it("marks a single clean forensic opinion authentic", () => {
    const result = crossReference([opinion("forensic_technical", 0.95)]);

    expect(result.combinedScore).toBe(0.95);
    expect(result.preliminaryVerdict).toBe("authentic");
    expect(result.reasoning).toBe(
      "1 analysis sources consulted. Weighted confidence score: 95.0%. "
        + "0 anomalies found: 0 high, 0 medium, 0 low severity.",
    );
  });

  it("weights sources by kind", () => {
    const result = crossReference([
      opinion("forensic_technical", 0.8),
      opinion("physical", 0.6),
      opinion("contextual", 0.4),
      opinion("ai_generation", 1),
    ]);

    // (0.28 + 0.15 + 0.08 + 0.2) / 1.0
    expect(result.combinedScore).toBe(0.71);
  });

  it("gives unknown kinds the default weight", () => {
    expect(sourceWeight("audio_spectrum")).toBe(0.1);
    expect(sourceWeight("constructor")).toBe(0.1);
    expect(combineScores([opinion("forensic_technical", 1), opinion("audio_spectrum", 0)])).toBe(0.778);
  });

  it("is forged with three high anomalies whatever the score", () => {
    const result = crossReference([
      opinion("forensic_technical", 0.95, [anomaly("high"), anomaly("high")]),
      opinion("physical", 0.95, [anomaly("high")]),
    ]);

    expect(result.combinedScore).toBe(0.95);
    expect(result.preliminaryVerdict).toBe("forged");
    expect(result.anomalySummary).toEqual({ total: 3, high: 3, medium: 0, low: 0 });
  });

  it("lists low-confidence sources and suspected generation tools", () => {
    const result = crossReference([
      opinion("forensic_technical", 0.5, [anomaly("medium")]),
      opinion("ai_generation", 0.2, [anomaly("high", "ai_generated")], { isAiGenerated: true, likelyTool: "Midjourney" }),
    ]);

    expect(result.preliminaryVerdict).toBe("inconclusive");
    expect(result.reasoning).toBe(
      "2 analysis sources consulted. Weighted confidence score: 39.1%. "
        + "2 anomalies found: 1 high, 1 medium, 0 low severity. "
        + "Low confidence from: forensic-technical, AI-generation. "
        + "The image was identified as AI-generated (tool: Midjourney). "
        + "A human expert (HITL) review is recommended to confirm the findings.",
    );
  });

  it("does not depend on opinion order", () => {
    const opinions = [
      opinion("forensic_technical", 0.83, [anomaly("low")]),
      opinion("physical", 0.41, [anomaly("high")]),
      opinion("contextual", 0.77),
      opinion("ai_generation", 0.12, [anomaly("high"), anomaly("medium")]),
      opinion("other", 0.5),
    ];
    const forward = crossReference(opinions);
    const reversed = crossReference([...opinions].reverse());

    expect(reversed.combinedScore).toBe(forward.combinedScore);
    expect(reversed.preliminaryVerdict).toBe(forward.preliminaryVerdict);
    expect(reversed.anomalySummary).toEqual(forward.anomalySummary);
  });

  it("keeps the combined score within bounds", () => {
    for (const confidence of [0, 0.25, 0.5, 1]) {
      const { combinedScore } = crossReference([opinion("physical", confidence), opinion("other", 1 - confidence)]);
      expect(combinedScore).toBeGreaterThanOrEqual(0);
      expect(combinedScore).toBeLessThanOrEqual(1);
    }
  });
});

describe("preliminaryVerdict", () => {
  it("applies the rules in order", () => {
    expect(preliminaryVerdict(0.9, 3)).toBe("forged");
    expect(preliminaryVerdict(0.49, 2)).toBe("forged");
    expect(preliminaryVerdict(0.5, 2)).toBe("inconclusive");
    expect(preliminaryVerdict(0.75, 0)).toBe("authentic");
    expect(preliminaryVerdict(0.9, 1)).toBe("inconclusive");
    expect(preliminaryVerdict(0.74, 0)).toBe("inconclusive");
  });
});
