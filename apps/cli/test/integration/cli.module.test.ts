import "reflect-metadata";

import { Test, type TestingModule } from "@nestjs/testing";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigModule } from "@agentmd/config";
import { IoModule, LoggerService } from "@agentmd/io";
import { CliRunnerService } from "../../src/cli/cli-runner.service";
import { CliModule } from "../../src/cli/cli.module";

const GREETER = [
  "---",
  "name: greeter",
  "description: Greets people",
  "model: anthropic/claude-sonnet-4.5",
  "---",
  "<!-- System Prompt -->",
  "Be friendly.",
  "<!-- User Prompt -->",
  "Say hi to {{ query }}",
  "",
].join("\n");

describe("CliModule", () => {
  let agentsDir: string;
  let moduleRef: TestingModule;

  beforeEach(async () => {
    agentsDir = await fs.mkdtemp(path.join(os.tmpdir(), "agentmd-cli-"));
    await fs.writeFile(path.join(agentsDir, "greeter.agent.md"), GREETER);
    moduleRef = await Test.createTestingModule({
      imports: [
        IoModule,
        ConfigModule.register({ agentsDir: [agentsDir], logLevel: "silent" }),
        CliModule,
      ],
    }).compile();
    moduleRef.get(LoggerService).configure({ level: "silent" });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await moduleRef.close();
    await fs.rm(agentsDir, { recursive: true, force: true });
  });

  it("lists the agents in the configured directory", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const code = await moduleRef.get(CliRunnerService).run(["ls"]);

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith(
      [
        `${"Name".padEnd(7)}  ${"Model".padEnd(27)}  Version  Description`,
        `greeter  anthropic/claude-sonnet-4.5  ${"v1".padEnd(7)}  Greets people`,
      ].join("\n"),
    );
  });

  it("fails validation when any definition has errors", async () => {
    await fs.writeFile(path.join(agentsDir, "broken.agent.md"), "# No frontmatter\n");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const code = await moduleRef.get(CliRunnerService).run(["validate"]);

    expect(code).toBe(1);
    const lines = String(log.mock.calls[0]?.[0]).split("\n");
    expect(lines).toContain(
      "  error [STRUCTURE] Line 1: File must start with YAML frontmatter delimiter '---'",
    );
    expect(lines).toContain(`${path.join(agentsDir, "greeter.agent.md")}: valid`);
    expect(lines).toContain("  Files: 1/2 valid");
  });

  it("reports unknown agents", async () => {
    await expect(
      moduleRef.get(CliRunnerService).run(["explain", "missing"]),
    ).rejects.toThrow('No agent definition named "missing"');
  });
});
