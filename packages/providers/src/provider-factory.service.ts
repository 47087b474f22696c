import { Inject, Injectable } from "@nestjs/common";
import type { ProviderConnectionConfig } from "@agentmd/config";
import { ProviderFatalError, type ProviderAdapter } from "@agentmd/types";
import {
  PROVIDER_ADAPTER_FACTORIES,
  type ProviderAdapterFactory,
} from "./provider.tokens";

/**
 * Creates the adapter for a configured connection. Adapters hold no state
 * between requests, so a fresh one per dispatch is cheap.
 */
@Injectable()
export class ProviderFactoryService {
  constructor(
    @Inject(PROVIDER_ADAPTER_FACTORIES)
    private readonly factories: ProviderAdapterFactory[],
  ) {}

  create(
    connection: ProviderConnectionConfig,
    env: NodeJS.ProcessEnv = process.env,
  ): ProviderAdapter {
    if (connection.adapter === "noop") {
      return {
        name: "noop",
        complete: async () => {
          throw new ProviderFatalError(
            `Connection "${connection.name}" has no provider configured.`,
            "unknown_provider",
          );
        },
      };
    }

    const factory = this.factories.find(
      (candidate) => candidate.name === connection.adapter,
    );
    if (!factory) {
      throw new ProviderFatalError(
        `Unknown provider adapter "${connection.adapter}" for connection "${connection.name}".`,
        "unknown_provider",
      );
    }

    return factory.create(connection, env);
  }
}
