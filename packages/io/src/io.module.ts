import { Global, Module } from "@nestjs/common";
import type { Provider } from "@nestjs/common";
import { JsonlWriterService } from "./jsonl-writer.service";
import { LoggerService } from "./logger.service";
import { createLoggerProvider } from "./logger.decorator";

const rootLoggerProvider = createLoggerProvider();

const providers: Provider[] = [
  LoggerService,
  JsonlWriterService,
  rootLoggerProvider,
];

@Global()
@Module({
  providers,
  exports: providers,
})
export class IoModule {}
