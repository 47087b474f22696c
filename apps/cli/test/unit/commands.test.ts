import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigStore, DEFAULT_CONFIG } from "@agentmd/config";
import type { DefinitionCatalogService } from "@agentmd/definitions";
import type { ExecutionOrchestratorService } from "@agentmd/engine";
import type { SchemaCompilerService } from "@agentmd/schemas";
import type { FragmentRegistryLoader } from "@agentmd/templates";
import {
  SchemaCompilationError,
  type AgentDefinition,
  type ExecutionResult,
} from "@agentmd/types";
import { CliOptionsService } from "../../src/cli/cli-options.service";
import { ExplainCommand } from "../../src/cli/commands/explain.command";
import { RunCommand, formatUsage } from "../../src/cli/commands/run.command";

const createDefinition = (overrides: Partial<AgentDefinition> = {}): AgentDefinition => ({
  name: "greeter",
  description: "Greets people",
  modelId: null,
  temperature: 0.2,
  metadata: { purpose: "Welcomes new users", capabilities: ["chat", "mail"] },
  evolutionEntries: [],
  latestVersion: 2,
  systemPromptTemplate: "Be friendly.",
  userPromptTemplate: "Say hi to {{ query }}",
  outputSchemaSource: { source: "Greeting:\n  fields: {}", format: "yaml", line: 9 },
  contextBuilderSource: null,
  extraSections: [],
  sourceId: "greeter",
  sourceHash: "hash",
  warnings: [],
  ...overrides,
});

const createStore = () => {
  const config = structuredClone(DEFAULT_CONFIG);
  config.router.defaultModel = "beta";
  return new ConfigStore(config);
};

const createResult = (output: unknown): ExecutionResult => ({
  agent: "greeter",
  output,
  rawOutput: typeof output === "string" ? output : JSON.stringify(output),
  usage: { inputTokens: 120, outputTokens: 30, totalTokens: 150 },
  cost: { inputUsd: 0.00024, outputUsd: 0.0003, totalUsd: 0.00054 },
  durationMs: 42,
  startedAt: "2025-01-01T00:00:00.000Z",
  finishedAt: "2025-01-01T00:00:00.042Z",
  model: "beta",
  requestedModel: "beta",
  attempts: [{ model: "beta", attempt: 1, outcome: "success" }],
  prompt: { system: "Be friendly.", user: "Say hi to Ada" },
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ExplainCommand", () => {
  const createCommand = (compile: SchemaCompilerService["compile"]) => {
    const catalog = { get: vi.fn(async () => createDefinition()) };
    const schemas = { compile: vi.fn(compile) };
    const command = new ExplainCommand(
      catalog as unknown as DefinitionCatalogService,
      schemas as unknown as SchemaCompilerService,
      createStore(),
    );
    return { command, catalog };
  };

  it("prints the configuration, prompt preview and schema", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { command, catalog } = createCommand(
      () => ({ jsonSchema: { type: "object" } }) as unknown as ReturnType<SchemaCompilerService["compile"]>,
    );

    const code = await command.execute({
      command: "explain",
      options: {},
      positionals: ["greeter"],
    });

    expect(code).toBe(0);
    expect(catalog.get).toHaveBeenCalledWith("greeter");
    expect(log).toHaveBeenCalledWith(
      [
        "greeter (v2): Greets people",
        "",
        "Configuration:",
        "  Model: beta (default)",
        "  Temperature: 0.2",
        "  Version: v2",
        "  Purpose: Welcomes new users",
        "  Capabilities: chat, mail",
        "",
        "System prompt (preview):",
        "Be friendly.",
        "",
        "Output schema:",
        '{\n  "type": "object"\n}',
      ].join("\n"),
    );
  });

  it("reports an invalid schema and exits non-zero", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { command } = createCommand(() => {
      throw new SchemaCompilationError([{ path: "Greeting", message: "has no fields" }]);
    });

    const code = await command.execute({
      command: "explain",
      options: {},
      positionals: ["greeter"],
    });

    expect(code).toBe(1);
    const output = String(log.mock.calls[0]?.[0]);
    expect(output.split("\n").slice(-2)).toEqual([
      "Output schema:",
      "Output schema is invalid: Greeting: has no fields",
    ]);
  });

  it("requires an agent name", async () => {
    const { command } = createCommand(() => {
      throw new Error("unreachable");
    });
    await expect(
      command.execute({ command: "explain", options: {}, positionals: [] }),
    ).rejects.toThrow("The explain command requires an agent name.");
  });
});

describe("RunCommand", () => {
  const createCommand = (output: unknown) => {
    const definition = createDefinition();
    const catalog = { get: vi.fn(async () => definition) };
    const orchestrator = { execute: vi.fn(async () => createResult(output)) };
    const fragments = new Map([["tone", "Be warm."]]);
    const fragmentLoader = { loadDirectories: vi.fn(async () => fragments) };
    const store = createStore();
    store.setSnapshot({
      ...store.getSnapshot(),
      agents: { directories: ["agents"], fragments: ["shared/fragments"] },
    });
    const command = new RunCommand(
      catalog as unknown as DefinitionCatalogService,
      orchestrator as unknown as ExecutionOrchestratorService,
      fragmentLoader as unknown as FragmentRegistryLoader,
      store,
      new CliOptionsService(),
    );
    return { command, orchestrator, definition, fragmentLoader, fragments };
  };

  it("executes with the query merged into the context", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { command, orchestrator, definition, fragmentLoader, fragments } = createCommand({
      greeting: "hi",
    });

    const code = await command.execute({
      command: "run",
      options: {
        query: "Ada",
        context: '{"team":"core"}',
        model: "alpha",
        temperature: "0.5",
      },
      positionals: ["greeter"],
    });

    expect(code).toBe(0);
    expect(orchestrator.execute).toHaveBeenCalledWith(
      definition,
      { query: "Ada", team: "core" },
      { model: "alpha", temperature: 0.5, timeoutMs: undefined, fragments },
    );
    expect(fragmentLoader.loadDirectories).toHaveBeenCalledWith(["shared/fragments"]);
    expect(log).toHaveBeenCalledWith('{\n  "greeting": "hi"\n}');
    expect(error).toHaveBeenCalledWith(
      [
        "Usage:",
        "  Model: beta",
        "  Input tokens: 120",
        "  Output tokens: 30",
        "  Cost: $0.0005",
        "  Duration: 42ms",
      ].join("\n"),
    );
  });

  it("prints text output as is", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { command } = createCommand("Hello, Ada!");

    await command.execute({ command: "run", options: { query: "Ada" }, positionals: ["greeter"] });

    expect(log).toHaveBeenCalledWith("Hello, Ada!");
  });

  it("requires a name and a query", async () => {
    const { command, orchestrator } = createCommand("unused");

    await expect(
      command.execute({ command: "run", options: { query: "Ada" }, positionals: [] }),
    ).rejects.toThrow("The run command requires an agent name.");
    await expect(
      command.execute({ command: "run", options: {}, positionals: ["greeter"] }),
    ).rejects.toThrow("The run command requires --query.");
    expect(orchestrator.execute).not.toHaveBeenCalled();
  });

  it("formats usage with four decimals of cost", () => {
    expect(formatUsage(createResult("x")).split("\n")[4]).toBe("  Cost: $0.0005");
  });
});
