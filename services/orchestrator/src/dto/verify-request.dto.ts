import { IsIn, IsNotEmpty, IsOptional, IsString } from "class-validator";

import { MEDIA_KINDS } from "../media.js";
import type { MediaKind } from "../types.js";

export class VerifyRequestDto {
  @IsString()
  @IsNotEmpty()
  clientId!: string;

  @IsOptional()
  @IsString()
  context?: string;

  @IsOptional()
  @IsIn(MEDIA_KINDS, {
    message: "mediaKind must be one of image, video, audio, document",
  })
  mediaKind?: MediaKind;
}
