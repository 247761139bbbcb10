export type Verdict = 'authentic' | 'forged' | 'inconclusive';

export type Severity = 'low' | 'medium' | 'high';

export type MediaKind = 'image' | 'video' | 'audio' | 'document';

export type CaseStatus = 'completed' | 'hitl_pending';

export interface Anomaly {
  type: string;
  description: string;
  severity: Severity;
  location?: { x: number; y: number };
}

export interface Opinion {
  sourceKind: string;
  confidence: number;
  findings: Record<string, unknown>;
  anomalies: Anomaly[];
}

export interface Challenge {
  kind: string;
  targetSource?: string;
  targetAnomaly?: string;
  challenge: string;
  severity: Severity;
  impact: string;
}

export interface BlindSpot {
  source: string;
  issue: string;
  risk: string;
}

export interface Analysis {
  opinions: Opinion[];
  crossReference: {
    combinedScore: number;
    preliminaryVerdict: Verdict;
    reasoning: string;
    anomalySummary: { total: number; high: number; medium: number; low: number };
  };
  critique: {
    challenges: Challenge[];
    blindSpots: BlindSpot[];
    recommendations: string[];
    confidenceAdjustment: number;
    threatLevel: Severity;
    summary: string;
    historySize: number;
  };
  verdict: Verdict;
  confidence: number;
  hitlRequired: boolean;
}

export interface VerifyRequest {
  file: Blob | Uint8Array;
  filename: string;
  clientId: string;
  context?: string;
  mediaKind?: MediaKind;
}

export interface VerifyResponse {
  caseId: string;
  status: CaseStatus;
  verdict: Verdict;
  confidence: number;
  hitlRequired: boolean;
  message: string;
}

export interface CaseResponse {
  caseId: string;
  clientId: string;
  status: CaseStatus;
  mediaKind: MediaKind;
  filename: string;
  fileHash: string;
  verdict: Verdict;
  confidence: number;
  hitlRequired: boolean;
  hitlRecommendation?: string;
  context?: string;
  analysis: Analysis;
  createdAt: string;
  updatedAt: string;
}

export interface ReviewResponse {
  caseId: string;
  status: 'hitl_pending';
  preferredDomain?: string;
  message: string;
}
