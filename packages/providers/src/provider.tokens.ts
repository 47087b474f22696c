import type { ProviderConnectionConfig } from "@agentmd/config";
import type { ProviderAdapter } from "@agentmd/types";

export interface ProviderAdapterFactory {
  readonly name: string;
  create(connection: ProviderConnectionConfig, env?: NodeJS.ProcessEnv): ProviderAdapter;
}

/**
 * Injection token for the list of {@link ProviderAdapterFactory}
 * implementations, one per supported adapter name.
 */
export const PROVIDER_ADAPTER_FACTORIES = Symbol("PROVIDER_ADAPTER_FACTORIES");
