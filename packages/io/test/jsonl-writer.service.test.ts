import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { JsonlWriterService } from "../src/jsonl-writer.service";

describe("JsonlWriterService", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "agentmd-jsonl-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("appends one line per event, creating directories on demand", async () => {
    const writer = new JsonlWriterService();
    const filePath = path.join(tmpDir, "nested", "spans.jsonl");

    await writer.append(filePath, { agent: "a" });
    await writer.append(filePath, { agent: "b" });

    const content = await fs.readFile(filePath, "utf-8");
    expect(content).toBe('{"agent":"a"}\n{"agent":"b"}\n');
  });

  it("keeps concurrent appends in call order", async () => {
    const writer = new JsonlWriterService();
    const filePath = path.join(tmpDir, "spans.jsonl");

    await Promise.all(
      Array.from({ length: 5 }, (_, index) => writer.append(filePath, { index })),
    );

    expect(await writer.readAll(filePath)).toEqual([
      { index: 0 },
      { index: 1 },
      { index: 2 },
      { index: 3 },
      { index: 4 },
    ]);
  });

  it("notifies listeners after each write", async () => {
    const writer = new JsonlWriterService();
    const listener = vi.fn();
    writer.registerListener(listener);
    const filePath = path.join(tmpDir, "spans.jsonl");

    await writer.append(filePath, { ok: true });

    expect(listener).toHaveBeenCalledWith({
      filePath: path.resolve(filePath),
      event: { ok: true },
    });
  });
});
