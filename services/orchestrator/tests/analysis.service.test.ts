import { describe, expect, it, vi } from "vitest";

import { CritiqueEngine } from "../src/critique/critique.engine.js";
import { CritiqueHistory } from "../src/critique/critique.history.js";
import type { OpinionProvider } from "../src/providers/opinion-provider.js";
import { AnalysisService, finalVerdict, sourcesFor } from "../src/services/analysis.service.js";
import type { BlindSpot, Challenge, CritiqueResult, CrossReferenceResult, OpinionRecord, Severity, Verdict } from "../src/types.js";

const crossRef = (preliminaryVerdict: Verdict, combinedScore: number): CrossReferenceResult => ({
  combinedScore,
  preliminaryVerdict,
  reasoning: "",
  anomalySummary: { total: 0, high: 0, medium: 0, low: 0 },
});

const blindSpot: BlindSpot = { source: "system", issue: "", risk: "missing_capability" };

const critique = (overrides: Partial<CritiqueResult> = {}): CritiqueResult => ({
  challenges: [],
  blindSpots: [],
  recommendations: [],
  confidenceAdjustment: 0,
  threatLevel: "low",
  summary: "",
  historySize: 0,
  ...overrides,
});

const verdictChallenge = (severity: Severity): Challenge => ({
  kind: "verdict_challenge",
  challenge: "",
  severity,
  impact: "",
});

describe("finalVerdict", () => {
  it("keeps an unchallenged authentic verdict", () => {
    expect(finalVerdict(crossRef("authentic", 0.95), critique({ blindSpots: [blindSpot] }))).toEqual({
      verdict: "authentic",
      confidence: 0.95,
      hitlRequired: false,
    });
  });

  it("downgrades authentic when the adjusted score falls under the threshold", () => {
    expect(finalVerdict(crossRef("authentic", 0.78), critique({ confidenceAdjustment: -0.05 }))).toEqual({
      verdict: "inconclusive",
      confidence: 0.73,
      hitlRequired: true,
    });
  });

  it("turns a challenged verdict inconclusive", () => {
    const challenged = critique({ challenges: [verdictChallenge("high")], threatLevel: "medium" });

    expect(finalVerdict(crossRef("authentic", 0.9), challenged).verdict).toBe("inconclusive");
    expect(finalVerdict(crossRef("forged", 0.8), challenged).verdict).toBe("inconclusive");
  });

  it("keeps an unchallenged forged verdict", () => {
    expect(finalVerdict(crossRef("forged", 0.3), critique())).toEqual({
      verdict: "forged",
      confidence: 0.3,
      hitlRequired: false,
    });
  });

  it("clamps the adjusted score", () => {
    expect(finalVerdict(crossRef("authentic", 0.98), critique({ confidenceAdjustment: 0.05 })).confidence).toBe(0.99);
    expect(finalVerdict(crossRef("forged", 0.02), critique({ confidenceAdjustment: -0.03 })).confidence).toBe(0.05);
  });

  it("requires human review for elevated threat or several blind spots", () => {
    expect(finalVerdict(crossRef("authentic", 0.95), critique({ threatLevel: "medium" })).hitlRequired).toBe(true);
    expect(finalVerdict(crossRef("authentic", 0.95), critique({ blindSpots: [blindSpot, blindSpot] })).hitlRequired)
      .toBe(true);
  });
});

describe("sourcesFor", () => {
  it("maps media kinds to opinion sources", () => {
    expect(sourcesFor("image")).toEqual(["forensic_technical", "physical", "contextual", "ai_generation"]);
    expect(sourcesFor("video")).toEqual(["forensic_technical", "physical", "contextual"]);
    expect(sourcesFor("audio")).toEqual(["forensic_technical"]);
    expect(sourcesFor("document")).toEqual(["forensic_technical", "contextual"]);
    expect(sourcesFor("archive")).toEqual(["forensic_technical"]);
  });
});

describe("AnalysisService", () => {
  const opinion = (sourceKind: string, confidence: number): OpinionRecord => ({
    sourceKind,
    confidence,
    findings: {},
    anomalies: [{ type: `${sourceKind}_note`, description: "", severity: "low" }],
  });

  const provider = (kind: string, result: OpinionRecord | Error) => {
    const analyze = vi.fn<[Buffer, string], Promise<OpinionRecord>>();
    if (result instanceof Error) {
      analyze.mockRejectedValue(result);
    } else {
      analyze.mockResolvedValue(result);
    }
    return { kind, analyze } satisfies OpinionProvider;
  };

  const createService = (providers: OpinionProvider[]) =>
    new AnalysisService(providers, new CritiqueEngine(new CritiqueHistory()));

  it("drops providers that reject and keeps the rest", async () => {
    const forensic = provider("forensic_technical", opinion("forensic_technical", 0.7));
    const physical = provider("physical", new Error("vision backend down"));
    const contextual = provider("contextual", opinion("contextual", 0.6));
    const ai = provider("ai_generation", opinion("ai_generation", 0.8));
    const service = createService([forensic, physical, contextual, ai]);

    const result = await service.analyze(Buffer.from("bytes"), "photo.jpg", "image");

    expect(physical.analyze).toHaveBeenCalledWith(Buffer.from("bytes"), "photo.jpg");
    expect(result.opinions.map((item) => item.sourceKind)).toEqual(["forensic_technical", "contextual", "ai_generation"]);
    // (0.7*0.35 + 0.6*0.2 + 0.8*0.2) / 0.75
    expect(result.crossReference.combinedScore).toBe(0.70);
    expect(result.crossReference.preliminaryVerdict).toBe("inconclusive");
    expect(result).toMatchObject(finalVerdict(result.crossReference, result.critique));
    expect(result.hitlRequired).toBe(true);
  });

  it("only consults the sources that fit the media kind", async () => {
    const forensic = provider("forensic_technical", opinion("forensic_technical", 0.7));
    const physical = provider("physical", opinion("physical", 0.7));
    const contextual = provider("contextual", opinion("contextual", 0.7));
    const service = createService([forensic, physical, contextual]);

    const audio = await service.analyze(Buffer.from("bytes"), "clip.mp3", "audio");
    expect(audio.opinions.map((item) => item.sourceKind)).toEqual(["forensic_technical"]);

    const document = await service.analyze(Buffer.from("bytes"), "scan.pdf", "document");
    expect(document.opinions.map((item) => item.sourceKind)).toEqual(["forensic_technical", "contextual"]);
    expect(physical.analyze).not.toHaveBeenCalled();
  });

  it("returns a neutral result when every provider fails", async () => {
    const service = createService([provider("forensic_technical", new Error("boom"))]);

    const result = await service.analyze(Buffer.from("bytes"), "clip.wav", "audio");

    expect(result.opinions).toEqual([]);
    expect(result.crossReference.combinedScore).toBe(0.5);
    expect(result.verdict).toBe("inconclusive");
    expect(result.hitlRequired).toBe(true);
  });
});
