import { Injectable } from "@nestjs/common";

import type { CaseRecord, CaseRepository, CaseStatus } from "./case.repository.js";

function copy(record: CaseRecord): CaseRecord {
  return { ...record, createdAt: new Date(record.createdAt), updatedAt: new Date(record.updatedAt) };
}

@Injectable()
export class InMemoryCaseRepository implements CaseRepository {
  private readonly store = new Map<string, CaseRecord>();

  async save(record: CaseRecord): Promise<void> {
    this.store.set(record.caseId, copy(record));
  }

  async find(caseId: string): Promise<CaseRecord | undefined> {
    const value = this.store.get(caseId);
    return value ? copy(value) : undefined;
  }

  async updateStatus(caseId: string, status: CaseStatus, updatedAt: Date): Promise<CaseRecord | undefined> {
    const value = this.store.get(caseId);
    if (!value) {
      return undefined;
    }
    const updated = { ...value, status, updatedAt: new Date(updatedAt) };
    this.store.set(caseId, updated);
    return copy(updated);
  }
}
