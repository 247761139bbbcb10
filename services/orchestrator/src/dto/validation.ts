import { ValidationPipe } from "@nestjs/common";
import type { Type } from "@nestjs/common";

/**
 * Body pipe bound to an explicit DTO class, so validation does not depend on
 * emitted parameter type metadata.
 */
export function validated<T>(expectedType: Type<T>): ValidationPipe {
  return new ValidationPipe({ expectedType, whitelist: true, transform: true });
}
