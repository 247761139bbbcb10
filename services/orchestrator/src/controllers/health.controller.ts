import { Controller, Get } from "@nestjs/common";

export const SERVICE_VERSION = "0.1.0";

@Controller("health")
export class HealthController {
  @Get()
  health(): { status: "ok"; version: string } {
    return { status: "ok", version: SERVICE_VERSION };
  }
}
