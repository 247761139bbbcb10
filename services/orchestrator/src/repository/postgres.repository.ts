import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { Pool } from "pg";

import type { AnalysisResult, MediaKind, Verdict } from "../types.js";
import type { CaseRecord, CaseRepository, CaseStatus } from "./case.repository.js";

interface CaseRow {
  case_id: string;
  client_id: string;
  status: CaseStatus;
  media_kind: MediaKind;
  filename: string;
  file_hash: string;
  verdict: Verdict;
  confidence: number | string;
  hitl_required: boolean;
  analysis: AnalysisResult;
  context: string | null;
  created_at: Date;
  updated_at: Date;
}

const COLUMNS = `case_id, client_id, status, media_kind, filename, file_hash, verdict, confidence,
  hitl_required, analysis, context, created_at, updated_at`;

function toRecord(row: CaseRow): CaseRecord {
  return {
    caseId: row.case_id,
    clientId: row.client_id,
    status: row.status,
    mediaKind: row.media_kind,
    filename: row.filename,
    fileHash: row.file_hash,
    verdict: row.verdict,
    confidence: Number(row.confidence),
    hitlRequired: row.hitl_required,
    analysis: row.analysis,
    context: row.context ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

@Injectable()
export class PostgresCaseRepository implements CaseRepository, OnModuleDestroy {
  private readonly logger = new Logger(PostgresCaseRepository.name);
  private readonly pool: Pool;
  private initialized = false;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS cases (
        case_id TEXT PRIMARY KEY,
        client_id TEXT NOT NULL,
        status TEXT NOT NULL,
        media_kind TEXT NOT NULL,
        filename TEXT NOT NULL,
        file_hash TEXT NOT NULL,
        verdict TEXT NOT NULL,
        confidence DOUBLE PRECISION NOT NULL,
        hitl_required BOOLEAN NOT NULL,
        analysis JSONB NOT NULL,
        context TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    this.initialized = true;
    this.logger.log("Postgres case repository ready");
  }

  async save(record: CaseRecord): Promise<void> {
    if (!this.initialized) {
      await this.init();
    }
    await this.pool.query(
      `INSERT INTO cases (${COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10::jsonb, $11, $12, $13)
       ON CONFLICT (case_id) DO UPDATE SET
         status = EXCLUDED.status,
         verdict = EXCLUDED.verdict,
         confidence = EXCLUDED.confidence,
         hitl_required = EXCLUDED.hitl_required,
         analysis = EXCLUDED.analysis,
         context = EXCLUDED.context,
         updated_at = EXCLUDED.updated_at`,
      [
        record.caseId,
        record.clientId,
        record.status,
        record.mediaKind,
        record.filename,
        record.fileHash,
        record.verdict,
        record.confidence,
        record.hitlRequired,
        JSON.stringify(record.analysis),
        record.context ?? null,
        record.createdAt,
        record.updatedAt,
      ],
    );
  }

  async find(caseId: string): Promise<CaseRecord | undefined> {
    if (!this.initialized) {
      await this.init();
    }
    const result = await this.pool.query<CaseRow>(
      `SELECT ${COLUMNS} FROM cases WHERE case_id = $1`,
      [caseId],
    );
    const row = result.rows[0];
    return row ? toRecord(row) : undefined;
  }

  async updateStatus(caseId: string, status: CaseStatus, updatedAt: Date): Promise<CaseRecord | undefined> {
    if (!this.initialized) {
      await this.init();
    }
    const result = await this.pool.query<CaseRow>(
      `UPDATE cases SET status = $2, updated_at = $3 WHERE case_id = $1 RETURNING ${COLUMNS}`,
      [caseId, status, updatedAt],
    );
    const row = result.rows[0];
    return row ? toRecord(row) : undefined;
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
