import type { AnalysisResult, MediaKind, Verdict } from "../types.js";

export type CaseStatus = "completed" | "hitl_pending";

export interface CaseRecord {
  caseId: string;
  clientId: string;
  status: CaseStatus;
  mediaKind: MediaKind;
  filename: string;
  fileHash: string;
  verdict: Verdict;
  confidence: number;
  hitlRequired: boolean;
  analysis: AnalysisResult;
  context?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CaseRepository {
  save(record: CaseRecord): Promise<void>;
  find(caseId: string): Promise<CaseRecord | undefined>;
  updateStatus(caseId: string, status: CaseStatus, updatedAt: Date): Promise<CaseRecord | undefined>;
}
