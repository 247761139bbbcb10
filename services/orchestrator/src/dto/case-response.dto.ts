import type { CaseRecord, CaseStatus } from "../repository/case.repository.js";
import type { AnalysisResult, MediaKind, Verdict } from "../types.js";

export class CaseResponseDto {
  caseId!: string;
  clientId!: string;
  status!: CaseStatus;
  mediaKind!: MediaKind;
  filename!: string;
  fileHash!: string;
  verdict!: Verdict;
  confidence!: number;
  hitlRequired!: boolean;
  hitlRecommendation?: string;
  context?: string;
  analysis!: AnalysisResult;
  createdAt!: string;
  updatedAt!: string;
}

export function toCaseResponse(record: CaseRecord): CaseResponseDto {
  return {
    caseId: record.caseId,
    clientId: record.clientId,
    status: record.status,
    mediaKind: record.mediaKind,
    filename: record.filename,
    fileHash: record.fileHash,
    verdict: record.verdict,
    confidence: record.confidence,
    hitlRequired: record.hitlRequired,
    hitlRecommendation: record.hitlRequired
      ? "Confidence is below the automatic threshold. A human expert review is recommended."
      : undefined,
    context: record.context,
    analysis: record.analysis,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
}
