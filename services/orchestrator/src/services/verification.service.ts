import { createHash, randomUUID } from "node:crypto";

import { Inject, Injectable, Logger } from "@nestjs/common";

import type { CaseRecord, CaseRepository } from "../repository/case.repository.js";
import { CASE_REPOSITORY } from "../tokens.js";
import type { MediaKind } from "../types.js";
import { AnalysisService } from "./analysis.service.js";

export interface VerificationInput {
  fileBytes: Buffer;
  filename: string;
  clientId: string;
  mediaKind: MediaKind;
  context?: string;
}

export type ReviewOutcome =
  | { status: "not_found" }
  | { status: "not_required"; record: CaseRecord }
  | { status: "requested"; record: CaseRecord };

@Injectable()
export class VerificationService {
  private readonly logger = new Logger(VerificationService.name);

  constructor(
    @Inject(AnalysisService) private readonly analysisService: AnalysisService,
    @Inject(CASE_REPOSITORY) private readonly repository: CaseRepository,
  ) {}

  async verify(input: VerificationInput): Promise<CaseRecord> {
    const fileHash = createHash("sha256").update(input.fileBytes).digest("hex");
    const analysis = await this.analysisService.analyze(input.fileBytes, input.filename, input.mediaKind);
    const now = new Date();

    const record: CaseRecord = {
      caseId: randomUUID(),
      clientId: input.clientId,
      status: "completed",
      mediaKind: input.mediaKind,
      filename: input.filename,
      fileHash,
      verdict: analysis.verdict,
      confidence: analysis.confidence,
      hitlRequired: analysis.hitlRequired,
      analysis,
      context: input.context,
      createdAt: now,
      updatedAt: now,
    };
    await this.repository.save(record);
    this.logger.log(`Case ${record.caseId} stored for client ${record.clientId}`);
    return record;
  }

  async getCase(caseId: string): Promise<CaseRecord | undefined> {
    return this.repository.find(caseId);
  }

  async requestReview(caseId: string, preferredDomain?: string): Promise<ReviewOutcome> {
    const existing = await this.repository.find(caseId);
    if (!existing) {
      return { status: "not_found" };
    }
    if (!existing.hitlRequired) {
      return { status: "not_required", record: existing };
    }
    const record = await this.repository.updateStatus(caseId, "hitl_pending", new Date());
    if (!record) {
      return { status: "not_found" };
    }
    this.logger.log(`Human review requested for case ${caseId}${preferredDomain ? ` (${preferredDomain})` : ""}`);
    return { status: "requested", record };
  }
}
