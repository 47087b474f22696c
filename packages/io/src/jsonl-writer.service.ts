import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";

export interface JsonlWriterEvent {
  filePath: string;
  event: unknown;
}

export type JsonlWriterListener = (event: JsonlWriterEvent) => void;

/**
 * Appends JSON lines to trace files. Writes to the same file are chained so
 * lines never interleave.
 */
@Injectable()
export class JsonlWriterService {
  private readonly listeners = new Set<JsonlWriterListener>();
  private readonly pending = new Map<string, Promise<void>>();

  registerListener(listener: JsonlWriterListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  append(filePath: string, event: unknown): Promise<void> {
    const target = path.resolve(filePath);
    const previous = this.pending.get(target) ?? Promise.resolve();
    const next = previous
      .catch(() => undefined)
      .then(() => this.writeLine(target, event));

    this.pending.set(target, next);
    return next.finally(() => {
      if (this.pending.get(target) === next) {
        this.pending.delete(target);
      }
    });
  }

  async readAll(filePath: string): Promise<unknown[]> {
    const content = await fs.readFile(path.resolve(filePath), "utf-8");
    return content
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line): unknown => JSON.parse(line));
  }

  private async writeLine(filePath: string, event: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.appendFile(filePath, `${JSON.stringify(event)}\n`, "utf-8");
    this.notify({ filePath, event });
  }

  private notify(event: JsonlWriterEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
