import { Module } from "@nestjs/common";
import { createLoggerProvider } from "@agentmd/io";
import { AnthropicAdapterFactory } from "./anthropic";
import { OpenAICompatibleAdapterFactory } from "./openai_compatible";
import { ProviderFactoryService } from "./provider-factory.service";
import { ProviderRegistryService } from "./provider-registry.service";
import { ProviderRouterService } from "./provider-router.service";
import { PROVIDER_ADAPTER_FACTORIES } from "./provider.tokens";

const adapterFactoryProviders = [
  {
    provide: AnthropicAdapterFactory,
    useFactory: () => new AnthropicAdapterFactory(),
    inject: [],
  },
  {
    provide: OpenAICompatibleAdapterFactory,
    useFactory: () => new OpenAICompatibleAdapterFactory(),
    inject: [],
  },
];

/**
 * Exposes the model registry and the fallback-aware router. Adapter
 * factories are collected under {@link PROVIDER_ADAPTER_FACTORIES}.
 */
@Module({
  providers: [
    ...adapterFactoryProviders,
    {
      provide: PROVIDER_ADAPTER_FACTORIES,
      useFactory: (
        anthropic: AnthropicAdapterFactory,
        openaiCompatible: OpenAICompatibleAdapterFactory,
      ) => [anthropic, openaiCompatible],
      inject: adapterFactoryProviders.map((provider) => provider.provide),
    },
    ProviderFactoryService,
    ProviderRegistryService,
    ProviderRouterService,
    createLoggerProvider("providers:router"),
  ],
  exports: [ProviderFactoryService, ProviderRegistryService, ProviderRouterService],
})
export class ProvidersModule {}
