import { Global, Module } from "@nestjs/common";
import { createLoggerProvider } from "./logger.decorator";
import { LoggerService } from "./logger.service";

const rootLoggerProvider = createLoggerProvider();

@Global()
@Module({
  providers: [LoggerService, rootLoggerProvider],
  exports: [LoggerService, rootLoggerProvider.provide],
})
export class IoModule {}
