import { Global, Module } from "@nestjs/common";

import { createLogger, PINO_LOGGER } from "./pino-logger";

@Global()
@Module({
  providers: [{ provide: PINO_LOGGER, useFactory: createLogger }],
  exports: [PINO_LOGGER]
})
export class LoggingModule {}
