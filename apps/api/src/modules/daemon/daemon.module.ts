import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";
import type { Logger } from "pino";

import { BROKER_PORT } from "../broker/broker.port";
import { PaperBroker } from "../broker/paper-broker";
import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { ControlChannelService } from "../control/control-channel.service";
import { ControlController } from "../control/control.controller";
import { PINO_LOGGER } from "../logging/pino-logger";
import { ApiKeyGuard } from "../security/api-key.guard";
import { FileStatusSink } from "../sink/file-status-sink";
import { STATUS_SINK } from "../sink/status-sink";
import { DaemonService } from "./daemon.service";

@Module({
  imports: [ConfigModule],
  controllers: [ControlController],
  providers: [
    DaemonService,
    ControlChannelService,
    {
      provide: BROKER_PORT,
      useFactory: (configService: ConfigService, logger: Logger) => {
        const config = configService.load();
        return new PaperBroker(config.eligibility.symbol, config.broker.paper, logger.child({ component: "paper-broker" }));
      },
      inject: [ConfigService, PINO_LOGGER]
    },
    {
      provide: STATUS_SINK,
      useFactory: (configService: ConfigService, logger: Logger) => new FileStatusSink(configService.dataDir, logger.child({ component: "status-sink" })),
      inject: [ConfigService, PINO_LOGGER]
    },
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard
    }
  ],
  exports: [DaemonService]
})
export class DaemonModule {}
