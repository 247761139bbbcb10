import { IsOptional, IsString } from "class-validator";

export class HitlRequestDto {
  /** Area of expertise wanted for the reviewer, e.g. insurance, history or forensics. */
  @IsOptional()
  @IsString()
  preferredDomain?: string;
}

export class HitlResponseDto {
  caseId!: string;
  status!: "hitl_pending";
  preferredDomain?: string;
  message!: string;
}
