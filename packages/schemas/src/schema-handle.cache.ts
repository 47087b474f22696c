import { Inject, Injectable } from "@nestjs/common";
import type { OutputSchemaSource } from "@agentmd/types";
import {
  SchemaCompilerService,
  hashSchemaSource,
  type OutputSchemaHandle,
} from "./schema-compiler.service";

type CacheEntry =
  | { ok: true; handle: OutputSchemaHandle }
  | { ok: false; error: unknown };

/**
 * Write-once cache of compiled output schemas keyed by definition identity and
 * schema source hash. Compilation failures are cached alongside successes.
 */
@Injectable()
export class SchemaHandleCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    @Inject(SchemaCompilerService)
    private readonly compiler: SchemaCompilerService,
  ) {}

  resolve(key: string, source: OutputSchemaSource): OutputSchemaHandle {
    const cacheKey = `${key}:${hashSchemaSource(source.source)}`;
    let entry = this.entries.get(cacheKey);
    if (!entry) {
      entry = this.compileEntry(source);
      this.entries.set(cacheKey, entry);
    }
    if (!entry.ok) {
      throw entry.error;
    }
    return entry.handle;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private compileEntry(source: OutputSchemaSource): CacheEntry {
    try {
      return { ok: true, handle: this.compiler.compile(source.source, source.format) };
    } catch (error) {
      return { ok: false, error };
    }
  }
}
