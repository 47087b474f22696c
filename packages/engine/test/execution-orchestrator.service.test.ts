import type { Logger } from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigStore, DEFAULT_CONFIG, type AgentmdConfig } from "@agentmd/config";
import {
  ProviderFactoryService,
  ProviderRegistryService,
  ProviderRouterService,
} from "@agentmd/providers";
import { SchemaCompilerService, SchemaHandleCache } from "@agentmd/schemas";
import { TemplateRendererService } from "@agentmd/templates";
import {
  ExecutionTimeoutError,
  ProviderExhaustedError,
  ProviderFatalError,
  ProviderTransientError,
  TemplateResolutionError,
  ValidationFailureError,
  type AgentDefinition,
  type CompletionRequest,
  type CompletionResponse,
  type SpanRecord,
  type SpanSink,
} from "@agentmd/types";
import { ExecutionOrchestratorService } from "../src/execution/execution-orchestrator.service";
import { PromptComposerService } from "../src/prompts/prompt-composer.service";

type Reply = (request: CompletionRequest) => Promise<CompletionResponse>;

const reply =
  (text: string, inputTokens = 1000, outputTokens = 500): Reply =>
  async () => ({
    text,
    usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
  });

const REVIEW_SCHEMA = `
Review:
  fields:
    verdict:
      type: string
      enum: [approve, reject]
    score:
      type: integer
      minimum: 0
      maximum: 10
`;

const createDefinition = (overrides: Partial<AgentDefinition> = {}): AgentDefinition => ({
  name: "reviewer",
  description: "Reviews pull requests",
  modelId: "alpha",
  temperature: 0.2,
  metadata: {},
  evolutionEntries: [],
  latestVersion: 1,
  systemPromptTemplate:
    'You review code for {{ team }} as {{ agent_name }} on {{ model_name }}.\n{% include "tone" %}',
  userPromptTemplate: "Review this diff:\n{{ diff }}",
  outputSchemaSource: { source: REVIEW_SCHEMA, format: "yaml", line: 1 },
  contextBuilderSource: null,
  extraSections: [],
  sourceId: "reviewer",
  sourceHash: "hash",
  warnings: [],
  ...overrides,
});

const createConfig = (): AgentmdConfig => {
  const config = structuredClone(DEFAULT_CONFIG);
  config.providers = {
    connections: [{ name: "test", adapter: "openai_compatible" }],
    models: [
      {
        id: "alpha",
        provider: "test",
        pricing: { inputPerMillion: 2, outputPerMillion: 10 },
        structuredOutput: true,
      },
      {
        id: "beta",
        provider: "test",
        pricing: { inputPerMillion: 1, outputPerMillion: 4 },
      },
    ],
  };
  config.router = {
    attemptsPerModel: 1,
    baseDelayMs: 0,
    maxDelayMs: 0,
    defaultModel: "beta",
  };
  config.execution = { timeoutMs: 1_000 };
  return config;
};

const createOrchestrator = (
  complete: (request: CompletionRequest) => Promise<CompletionResponse>,
  config: AgentmdConfig = createConfig(),
) => {
  const requests: CompletionRequest[] = [];
  const spans: SpanRecord[] = [];
  const sink: SpanSink = {
    record: (span) => {
      spans.push(span);
    },
  };
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const store = new ConfigStore(config);
  const router = new ProviderRouterService(
    new ProviderRegistryService(store),
    new ProviderFactoryService([
      {
        name: "openai_compatible",
        create: () => ({
          name: "scripted",
          complete: (request) => {
            requests.push(request);
            return complete(request);
          },
        }),
      },
    ]),
    store,
    logger as unknown as Logger,
  );
  const orchestrator = new ExecutionOrchestratorService(
    new SchemaHandleCache(new SchemaCompilerService()),
    new PromptComposerService(new TemplateRendererService()),
    router,
    store,
    sink,
    logger as unknown as Logger,
  );
  return { orchestrator, requests, spans, logger };
};

const CONTEXT = { team: "core", diff: "+ added line", agent_name: "spoofed" };
const FRAGMENTS = { tone: "Be direct." };

describe("ExecutionOrchestratorService", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("renders, dispatches and validates a structured response", async () => {
    const { orchestrator, requests, spans } = createOrchestrator(
      reply('```json\n{"verdict": "approve", "score": "7"}\n```'),
    );

    const result = await orchestrator.execute(createDefinition(), CONTEXT, {
      fragments: { tone: "Be kind." },
    });

    expect(result.output).toEqual({ verdict: "approve", score: 7 });
    expect(result.rawOutput).toBe('```json\n{"verdict": "approve", "score": "7"}\n```');
    expect(result.model).toBe("alpha");
    expect(result.requestedModel).toBe("alpha");
    expect(result.usage).toEqual({ inputTokens: 1000, outputTokens: 500, totalTokens: 1500 });
    expect(result.cost.totalUsd).toBeCloseTo(0.007, 10);
    expect(result.attempts).toEqual([{ model: "alpha", attempt: 1, outcome: "success" }]);
    expect(result.prompt).toEqual({
      system: "You review code for core as reviewer on alpha.\nBe kind.",
      user: "Review this diff:\n+ added line",
    });
    expect(Object.isFrozen(result)).toBe(true);

    expect(requests).toHaveLength(1);
    expect(requests[0]?.temperature).toBe(0.2);
    expect(requests[0]?.agent).toBe("reviewer");
    expect(requests[0]?.responseFormat?.name).toBe("Review");

    expect(spans).toHaveLength(1);
    expect(spans[0]).toMatchObject({
      agent: "reviewer",
      status: "success",
      requestedModel: "alpha",
      model: "alpha",
      inputTokens: 1000,
      outputTokens: 500,
      totalTokens: 1500,
      attempts: 1,
    });
    expect(spans[0]?.costUsd).toBeCloseTo(0.007, 10);
    expect(spans[0]?.errorCode).toBeUndefined();
  });

  it("renders without a registry when the caller supplies none", async () => {
    const { orchestrator, requests } = createOrchestrator(
      reply('{"verdict": "reject", "score": 2}'),
    );

    await orchestrator.execute(
      createDefinition({ systemPromptTemplate: "Review for {{ team }}." }),
      CONTEXT,
    );
    const failure = orchestrator.execute(createDefinition(), CONTEXT);

    expect(requests[0]?.messages[0]).toEqual({
      role: "system",
      content: "Review for core.",
    });
    await expect(failure).rejects.toBeInstanceOf(TemplateResolutionError);
    expect(requests).toHaveLength(1);
  });

  it("returns the raw text when the definition declares no schema", async () => {
    const { orchestrator, requests } = createOrchestrator(reply("Looks fine."));

    const result = await orchestrator.execute(
      createDefinition({ outputSchemaSource: null }),
      CONTEXT,
      { temperature: 0.9, fragments: FRAGMENTS },
    );

    expect(result.output).toBe("Looks fine.");
    expect(requests[0]?.responseFormat).toBeUndefined();
    expect(requests[0]?.temperature).toBe(0.9);
  });

  it("prefers the model option, then the definition, then the default model", async () => {
    const { orchestrator, requests } = createOrchestrator(reply("ok"));
    const definition = createDefinition({ outputSchemaSource: null });

    await orchestrator.execute(definition, CONTEXT, { model: "beta", fragments: FRAGMENTS });
    await orchestrator.execute(definition, CONTEXT, { fragments: FRAGMENTS });
    await orchestrator.execute(
      createDefinition({ outputSchemaSource: null, modelId: null }),
      CONTEXT,
      { fragments: FRAGMENTS },
    );

    expect(requests.map((request) => request.model)).toEqual(["beta", "alpha", "beta"]);
  });

  it("fails before dispatch when no model can be resolved", async () => {
    const config = createConfig();
    delete config.router.defaultModel;
    const { orchestrator, requests, spans } = createOrchestrator(reply("ok"), config);

    const failure = orchestrator.execute(createDefinition({ modelId: null }), CONTEXT);

    await expect(failure).rejects.toBeInstanceOf(ProviderFatalError);
    await expect(failure).rejects.toMatchObject({ reason: "unknown_model" });
    expect(requests).toHaveLength(0);
    expect(spans[0]).toMatchObject({
      status: "failure",
      requestedModel: null,
      model: null,
      errorCode: "provider_fatal",
    });
  });

  it("never calls the provider when a fragment is missing", async () => {
    const { orchestrator, requests, spans } = createOrchestrator(reply("{}"));

    await expect(
      orchestrator.execute(createDefinition(), CONTEXT, { fragments: {} }),
    ).rejects.toBeInstanceOf(TemplateResolutionError);

    expect(requests).toHaveLength(0);
    expect(spans).toHaveLength(1);
    expect(spans[0]).toMatchObject({
      status: "failure",
      model: null,
      attempts: 0,
      costUsd: 0,
      errorCode: "template_resolution",
      errorMessage: 'Template fragment "tone" could not be resolved.',
    });
  });

  it("reports unparseable output as a root validation failure with usage", async () => {
    const { orchestrator, spans } = createOrchestrator(reply("I approve."));

    const failure = orchestrator.execute(createDefinition(), CONTEXT, {
      fragments: { tone: "" },
    });

    await expect(failure).rejects.toBeInstanceOf(ValidationFailureError);
    await expect(failure).rejects.toMatchObject({
      schemaName: "Review",
      problems: [
        { field: "$", code: "unparseable", message: expect.stringContaining("is not valid JSON") },
      ],
    });
    expect(spans[0]).toMatchObject({
      status: "failure",
      model: "alpha",
      inputTokens: 1000,
      outputTokens: 500,
      attempts: 1,
      errorCode: "validation_failure",
    });
    expect(spans[0]?.costUsd).toBeCloseTo(0.007, 10);
  });

  it("surfaces field problems without retrying", async () => {
    const { orchestrator, requests } = createOrchestrator(
      reply('{"verdict": "maybe", "score": 3}'),
    );

    const failure = orchestrator.execute(createDefinition(), CONTEXT, {
      fragments: { tone: "" },
    });

    await expect(failure).rejects.toMatchObject({
      problems: [
        { field: "verdict", code: "enum", message: 'must be one of: "approve", "reject"' },
      ],
    });
    expect(requests).toHaveLength(1);
  });

  it("records the attempts of an exhausted dispatch", async () => {
    const { orchestrator, spans } = createOrchestrator(async () => {
      throw new ProviderTransientError("upstream busy", 503);
    });

    await expect(
      orchestrator.execute(createDefinition({ outputSchemaSource: null }), CONTEXT, {
        fragments: { tone: "" },
      }),
    ).rejects.toBeInstanceOf(ProviderExhaustedError);

    expect(spans[0]).toMatchObject({
      status: "failure",
      model: null,
      attempts: 1,
      errorCode: "provider_exhausted",
    });
  });

  it("aborts the provider call and rejects when the deadline passes", async () => {
    vi.useFakeTimers();
    let providerSignal: AbortSignal | undefined;
    const { orchestrator, spans } = createOrchestrator(
      (request) =>
        new Promise<CompletionResponse>(() => {
          providerSignal = request.signal;
        }),
    );

    const execution = orchestrator.execute(createDefinition(), CONTEXT, {
      timeoutMs: 50,
      fragments: { tone: "" },
    });
    const assertion = expect(execution).rejects.toBeInstanceOf(ExecutionTimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;

    expect(providerSignal?.aborted).toBe(true);
    expect(spans).toHaveLength(1);
    expect(spans[0]).toMatchObject({
      status: "failure",
      durationMs: 50,
      errorCode: "timeout",
      errorMessage: "Execution exceeded the 50ms deadline.",
    });
  });

  it("stops when the caller aborts", async () => {
    const controller = new AbortController();
    const { orchestrator, spans } = createOrchestrator(
      () =>
        new Promise<CompletionResponse>(() => {
          controller.abort();
        }),
    );

    const error = await orchestrator
      .execute(createDefinition(), CONTEXT, {
        fragments: { tone: "" },
        signal: controller.signal,
      })
      .catch((reason: unknown) => reason);

    expect(error instanceof Error && error.name).toBe("AbortError");
    expect(spans[0]).toMatchObject({ status: "failure", errorCode: "aborted" });
  });

  it("keeps the result when the span sink fails", async () => {
    const { orchestrator, logger } = createOrchestrator(reply("done"));
    const sink: SpanSink = {
      record: () => {
        throw new Error("disk full");
      },
    };

    const result = await orchestrator.execute(
      createDefinition({ outputSchemaSource: null }),
      CONTEXT,
      { fragments: { tone: "" }, sink },
    );

    expect(result.output).toBe("done");
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ agent: "reviewer" }),
      "Failed to record execution span",
    );
  });
});
