import { Module } from "@nestjs/common";
import { createLoggerProvider } from "@agentmd/io";
import { ProvidersModule } from "@agentmd/providers";
import { SchemasModule } from "@agentmd/schemas";
import { TemplateModule } from "@agentmd/templates";
import { SPAN_SINK } from "./engine.tokens";
import { ExecutionOrchestratorService } from "./execution/execution-orchestrator.service";
import { PromptComposerService } from "./prompts/prompt-composer.service";
import { SPAN_LOGGER_SCOPE, spanSinkProviders } from "./span-sinks/span-sink.providers";
import { UsageSummarySink } from "./span-sinks/usage-summary.sink";

@Module({
  imports: [ProvidersModule, SchemasModule, TemplateModule],
  providers: [
    ...spanSinkProviders,
    PromptComposerService,
    ExecutionOrchestratorService,
    createLoggerProvider(SPAN_LOGGER_SCOPE),
    createLoggerProvider("engine:orchestrator"),
  ],
  exports: [
    ExecutionOrchestratorService,
    PromptComposerService,
    UsageSummarySink,
    SPAN_SINK,
    ProvidersModule,
    SchemasModule,
    TemplateModule,
  ],
})
export class EngineModule {}
