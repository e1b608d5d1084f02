import { Body, Controller, Get, Put } from "@nestjs/common";
import type { DaemonConfig } from "@gammahedge/shared";

import { ConfigService } from "./config.service";

@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  getConfig(): DaemonConfig {
    return this.configService.publicConfig();
  }

  @Put()
  updateConfig(@Body() body: unknown): { ok: true; config: DaemonConfig } {
    this.configService.update(body);
    return { ok: true, config: this.configService.publicConfig() };
  }
}
