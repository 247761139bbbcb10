import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
  UploadedFile,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";

import { CaseResponseDto, toCaseResponse } from "../dto/case-response.dto.js";
import { HitlRequestDto, HitlResponseDto } from "../dto/hitl-request.dto.js";
import { VerifyRequestDto } from "../dto/verify-request.dto.js";
import { VerifyResponseDto } from "../dto/verify-response.dto.js";
import { validated } from "../dto/validation.js";
import { detectMediaKind } from "../media.js";
import { VerificationService } from "../services/verification.service.js";

/** The parts of a multer upload the controller reads; files are kept in memory. */
export interface UploadedMedia {
  originalname: string;
  buffer: Buffer;
  size: number;
}

@Controller("verify")
export class VerifyController {
  constructor(
    @Inject(VerificationService)
    private readonly verificationService: VerificationService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor("file"))
  async verify(
    @UploadedFile() file: UploadedMedia | undefined,
    @Body(validated(VerifyRequestDto)) body: VerifyRequestDto,
  ): Promise<VerifyResponseDto> {
    if (!file) {
      throw new BadRequestException("file is required");
    }
    if (file.size === 0 || file.buffer.length === 0) {
      throw new BadRequestException("file is empty");
    }
    const mediaKind = body.mediaKind ?? detectMediaKind(file.originalname);
    if (!mediaKind) {
      throw new BadRequestException(`unsupported file type: ${file.originalname}`);
    }

    const record = await this.verificationService.verify({
      fileBytes: file.buffer,
      filename: file.originalname,
      clientId: body.clientId,
      mediaKind,
      context: body.context,
    });
    return {
      caseId: record.caseId,
      status: record.status,
      verdict: record.verdict,
      confidence: record.confidence,
      hitlRequired: record.hitlRequired,
      message: `Analysis completed: ${record.verdict}`,
    };
  }

  @Get(":caseId")
  async getCase(@Param("caseId") caseId: string): Promise<CaseResponseDto> {
    const record = await this.verificationService.getCase(caseId);
    if (!record) {
      throw new NotFoundException(`case not found: ${caseId}`);
    }
    return toCaseResponse(record);
  }

  @Post(":caseId/hitl")
  @HttpCode(HttpStatus.OK)
  async requestReview(
    @Param("caseId") caseId: string,
    @Body(validated(HitlRequestDto)) body: HitlRequestDto,
  ): Promise<HitlResponseDto> {
    const outcome = await this.verificationService.requestReview(caseId, body.preferredDomain);
    switch (outcome.status) {
      case "not_found":
        throw new NotFoundException(`case not found: ${caseId}`);
      case "not_required":
        throw new BadRequestException(`case ${caseId} does not require human review`);
      case "requested":
        return {
          caseId,
          status: "hitl_pending",
          preferredDomain: body.preferredDomain,
          message: "Human review requested; an expert will be assigned shortly.",
        };
    }
  }
}
