import { Inject, Injectable } from "@nestjs/common";
import {
  ConfigStore,
  type ModelConfig,
  type ProviderConnectionConfig,
} from "@agentmd/config";
import type { ProviderDescriptor } from "@agentmd/types";

const toDescriptor = (model: ModelConfig): ProviderDescriptor =>
  Object.freeze({
    id: model.id,
    provider: model.provider,
    pricing: Object.freeze({ ...model.pricing }),
    fallbacks: Object.freeze([...(model.fallbacks ?? [])]),
    capabilities: Object.freeze({
      structuredOutput: model.structuredOutput ?? false,
      promptCaching: model.promptCaching ?? false,
    }),
    ...(model.contextWindow !== undefined ? { contextWindow: model.contextWindow } : {}),
    ...(model.maxOutputTokens !== undefined ? { maxOutputTokens: model.maxOutputTokens } : {}),
  });

/**
 * Read-only view of `providers.models` and `providers.connections` from the
 * current configuration snapshot.
 */
@Injectable()
export class ProviderRegistryService {
  constructor(@Inject(ConfigStore) private readonly configStore: ConfigStore) {}

  list(): ProviderDescriptor[] {
    return this.configStore.section("providers").models.map(toDescriptor);
  }

  get(modelId: string): ProviderDescriptor | undefined {
    const model = this.configStore
      .section("providers")
      .models.find((candidate) => candidate.id === modelId);
    return model ? toDescriptor(model) : undefined;
  }

  has(modelId: string): boolean {
    return this.get(modelId) !== undefined;
  }

  connection(name: string): ProviderConnectionConfig | undefined {
    return this.configStore
      .section("providers")
      .connections.find((candidate) => candidate.name === name);
  }

  defaultModel(): string | undefined {
    return this.configStore.section("router").defaultModel;
  }
}
