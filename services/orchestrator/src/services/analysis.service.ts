import { Inject, Injectable, Logger } from "@nestjs/common";

import { CritiqueEngine } from "../critique/critique.engine.js";
import { crossReference } from "../policy.js";
import type { OpinionProvider } from "../providers/opinion-provider.js";
import { ADJUSTED_SCORE_RANGE, VERDICT } from "../thresholds.js";
import { OPINION_PROVIDERS } from "../tokens.js";
import type {
  AnalysisResult,
  CritiqueResult,
  CrossReferenceResult,
  FinalVerdict,
  MediaKind,
  OpinionRecord,
  SourceKind,
} from "../types.js";

const SOURCES_BY_MEDIA: Record<MediaKind, readonly SourceKind[]> = {
  image: ["forensic_technical", "physical", "contextual", "ai_generation"],
  video: ["forensic_technical", "physical", "contextual"],
  audio: ["forensic_technical"],
  document: ["forensic_technical", "contextual"],
};

export function sourcesFor(mediaKind: string): readonly SourceKind[] {
  switch (mediaKind) {
    case "image":
    case "video":
    case "audio":
    case "document":
      return SOURCES_BY_MEDIA[mediaKind];
    default:
      return ["forensic_technical"];
  }
}

/** Combines the preliminary verdict with the critique into the verdict returned to clients. */
export function finalVerdict(crossRef: CrossReferenceResult, critique: CritiqueResult): FinalVerdict {
  const adjusted = Math.min(
    ADJUSTED_SCORE_RANGE.max,
    Math.max(ADJUSTED_SCORE_RANGE.min, crossRef.combinedScore + critique.confidenceAdjustment),
  );
  const base = crossRef.preliminaryVerdict;
  const verdictChallenged = critique.challenges.some((challenge) => challenge.kind === "verdict_challenge");

  let verdict: FinalVerdict["verdict"];
  if (verdictChallenged && base !== "inconclusive") {
    verdict = "inconclusive";
  } else if (base === "authentic" && adjusted >= VERDICT.authenticScore) {
    verdict = "authentic";
  } else if (base === "forged") {
    verdict = "forged";
  } else {
    verdict = "inconclusive";
  }

  const hitlRequired = verdict === "inconclusive"
    || critique.threatLevel !== "low"
    || critique.blindSpots.length >= 2;

  return { verdict, confidence: Number(adjusted.toFixed(3)), hitlRequired };
}

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    @Inject(OPINION_PROVIDERS) private readonly providers: OpinionProvider[],
    @Inject(CritiqueEngine) private readonly critiqueEngine: CritiqueEngine,
  ) {}

  async analyze(fileBytes: Buffer, filename: string, mediaKind: MediaKind): Promise<AnalysisResult> {
    const opinions = await this.collectOpinions(fileBytes, filename, mediaKind);
    const crossRef = crossReference(opinions);
    const critique = this.critiqueEngine.challenge(fileBytes, filename, opinions, crossRef);
    const verdict = finalVerdict(crossRef, critique);

    this.logger.log(
      `Analyzed ${filename} (${mediaKind}): ${verdict.verdict} at ${verdict.confidence}, `
        + `${opinions.length} opinions, threat ${critique.threatLevel}`,
    );

    return { opinions, crossReference: crossRef, critique, ...verdict };
  }

  private async collectOpinions(fileBytes: Buffer, filename: string, mediaKind: MediaKind): Promise<OpinionRecord[]> {
    const wanted = sourcesFor(mediaKind);
    const selected = this.providers.filter((provider) => wanted.some((kind) => kind === provider.kind));
    for (const kind of wanted) {
      if (!selected.some((provider) => provider.kind === kind)) {
        this.logger.warn(`No opinion provider registered for ${kind}; skipping`);
      }
    }

    const settled = await Promise.allSettled(selected.map((provider) => provider.analyze(fileBytes, filename)));
    const opinions: OpinionRecord[] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        opinions.push(result.value);
        return;
      }
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      this.logger.error(`Opinion provider ${selected[index].kind} failed for ${filename}: ${reason}`);
    });
    return opinions;
  }
}
