import { Module } from "@nestjs/common";

import { ConfigModule } from "./config/config.module";
import { DaemonModule } from "./daemon/daemon.module";
import { HealthModule } from "./health/health.module";
import { LoggingModule } from "./logging/logging.module";

@Module({
  imports: [LoggingModule, ConfigModule, DaemonModule, HealthModule]
})
export class AppModule {}
