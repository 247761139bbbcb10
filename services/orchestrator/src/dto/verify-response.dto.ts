import type { CaseStatus } from "../repository/case.repository.js";
import type { Verdict } from "../types.js";

export class VerifyResponseDto {
  caseId!: string;
  status!: CaseStatus;
  verdict!: Verdict;
  confidence!: number;
  hitlRequired!: boolean;
  message!: string;
}
