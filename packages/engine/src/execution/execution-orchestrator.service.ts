import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import { ConfigStore } from "@agentmd/config";
import { InjectLogger } from "@agentmd/io";
import {
  ProviderRouterService,
  type DispatchResult,
} from "@agentmd/providers";
import { SchemaHandleCache, type OutputSchemaHandle } from "@agentmd/schemas";
import {
  ProviderFatalError,
  type AgentDefinition,
  type ExecutionResult,
  type FragmentRegistry,
  type SpanSink,
  type TemplateContext,
} from "@agentmd/types";
import { SPAN_SINK } from "../engine.tokens";
import { PromptComposerService } from "../prompts/prompt-composer.service";
import { runWithDeadline } from "./deadline";
import { parseJsonOutput } from "./output-parsing";
import { buildSpanRecord } from "./span-record";

export interface ExecuteOptions {
  /** Overrides `execution.timeoutMs`; `0` disables the deadline. */
  timeoutMs?: number;
  model?: string;
  temperature?: number;
  /** Registry that `{% include %}` resolves against; nothing is read from disk. */
  fragments?: FragmentRegistry;
  signal?: AbortSignal;
  /** Receives the span instead of the configured sinks. */
  sink?: SpanSink;
}

interface ExecutionProgress {
  requestedModel: string | null;
  response?: DispatchResult;
}

/**
 * Runs one agent definition end to end: schema, prompts, provider dispatch
 * and output validation, all under a single deadline. Every call records
 * exactly one span, whether it succeeds or fails.
 */
@Injectable()
export class ExecutionOrchestratorService {
  constructor(
    @Inject(SchemaHandleCache) private readonly schemas: SchemaHandleCache,
    @Inject(PromptComposerService) private readonly composer: PromptComposerService,
    @Inject(ProviderRouterService) private readonly router: ProviderRouterService,
    @Inject(ConfigStore) private readonly configStore: ConfigStore,
    @Inject(SPAN_SINK) private readonly sink: SpanSink,
    @InjectLogger("engine:orchestrator") private readonly logger: Logger,
  ) {}

  async execute(
    definition: AgentDefinition,
    context: TemplateContext = {},
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const config = this.configStore.getSnapshot();
    const timeoutMs = options.timeoutMs ?? config.execution.timeoutMs;
    const progress: ExecutionProgress = {
      requestedModel:
        options.model ?? definition.modelId ?? config.router.defaultModel ?? null,
    };

    try {
      const result = await runWithDeadline(
        (signal) => this.run(definition, context, options, progress, startedAt, signal),
        { timeoutMs, signal: options.signal },
      );
      await this.emit(options.sink ?? this.sink, definition, progress, startedAt);
      return result;
    } catch (error) {
      this.logger.warn(
        { agent: definition.name, model: progress.requestedModel, err: error },
        "Agent execution failed",
      );
      await this.emit(options.sink ?? this.sink, definition, progress, startedAt, error);
      throw error;
    }
  }

  private async run(
    definition: AgentDefinition,
    context: TemplateContext,
    options: ExecuteOptions,
    progress: ExecutionProgress,
    startedAt: number,
    signal: AbortSignal,
  ): Promise<ExecutionResult> {
    const handle = definition.outputSchemaSource
      ? this.schemas.resolve(
          definition.sourceId ?? definition.name,
          definition.outputSchemaSource,
        )
      : null;

    const modelId = progress.requestedModel;
    if (!modelId) {
      throw new ProviderFatalError(
        `Agent "${definition.name}" names no model and no default model is configured.`,
        "unknown_model",
      );
    }

    const prompt = this.composer.compose({
      definition,
      context,
      modelName: modelId,
      fragments: options.fragments,
    });
    this.logger.debug(
      {
        agent: definition.name,
        model: modelId,
        systemChars: prompt.system.length,
        userChars: prompt.user.length,
      },
      "Rendered prompts",
    );

    const response = await this.router.dispatch(
      {
        modelId,
        prompt,
        temperature: options.temperature ?? definition.temperature,
        agent: definition.name,
        ...(handle
          ? { responseFormat: { name: handle.name, schema: handle.jsonSchema } }
          : {}),
      },
      { signal },
    );
    progress.response = response;

    const output = handle ? this.validateOutput(definition, handle, response.text) : response.text;
    const finishedAt = Date.now();

    return Object.freeze({
      agent: definition.name,
      output,
      rawOutput: response.text,
      usage: Object.freeze({ ...response.usage }),
      cost: Object.freeze({ ...response.cost }),
      durationMs: finishedAt - startedAt,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      model: response.model,
      requestedModel: response.requestedModel,
      attempts: Object.freeze(response.attempts.map((attempt) => Object.freeze({ ...attempt }))),
      prompt: Object.freeze({ ...prompt }),
    });
  }

  private validateOutput(
    definition: AgentDefinition,
    handle: OutputSchemaHandle,
    text: string,
  ): unknown {
    const outcome = handle.validate(parseJsonOutput(text, handle.name));
    if (!outcome.ok) {
      this.logger.warn(
        {
          agent: definition.name,
          schema: handle.name,
          problems: outcome.failure.problems.length,
        },
        "Output failed schema validation",
      );
      throw outcome.failure;
    }
    return outcome.value;
  }

  private async emit(
    sink: SpanSink,
    definition: AgentDefinition,
    progress: ExecutionProgress,
    startedAt: number,
    error?: unknown,
  ): Promise<void> {
    const span = buildSpanRecord({
      agent: definition.name,
      startedAt,
      finishedAt: Date.now(),
      requestedModel: progress.requestedModel,
      response: progress.response,
      error,
    });
    try {
      await sink.record(span);
    } catch (sinkError) {
      this.logger.error(
        { agent: definition.name, err: sinkError },
        "Failed to record execution span",
      );
    }
  }
}
