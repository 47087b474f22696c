import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import { ConfigStore } from "@agentmd/config";
import { InjectLogger } from "@agentmd/io";
import {
  ProviderExhaustedError,
  ProviderFatalError,
  ProviderTransientError,
  type ChatMessage,
  type CompletionResponse,
  type CostBreakdown,
  type ProviderAttempt,
  type ProviderDescriptor,
  type ProviderResponseFormat,
  type RenderedPrompt,
  type TokenUsage,
} from "@agentmd/types";
import { computeCost } from "./pricing";
import { ProviderFactoryService } from "./provider-factory.service";
import { ProviderRegistryService } from "./provider-registry.service";

export interface DispatchRequest {
  modelId: string;
  prompt: RenderedPrompt;
  /** Output schema, forwarded to models that support structured output. */
  responseFormat?: ProviderResponseFormat;
  temperature?: number;
  agent?: string;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface DispatchResult {
  text: string;
  usage: TokenUsage;
  cost: CostBreakdown;
  /** Model that served the request. */
  model: string;
  requestedModel: string;
  attempts: ProviderAttempt[];
  /** Model named by the upstream response, when it names one. */
  providerModel?: string;
}

export const buildMessages = (prompt: RenderedPrompt): ChatMessage[] => {
  const messages: ChatMessage[] = [];
  if (prompt.system.trim()) {
    messages.push({ role: "system", content: prompt.system });
  }
  if (prompt.user.trim()) {
    messages.push({ role: "user", content: prompt.user });
  }
  return messages;
};

export const backoffDelay = (
  retry: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number => Math.min(baseDelayMs * 2 ** retry, maxDelayMs);

const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Sends a prompt to the requested model and walks its fallback chain when the
 * model keeps failing with transient errors.
 */
@Injectable()
export class ProviderRouterService {
  constructor(
    @Inject(ProviderRegistryService)
    private readonly registry: ProviderRegistryService,
    @Inject(ProviderFactoryService)
    private readonly factory: ProviderFactoryService,
    @Inject(ConfigStore) private readonly configStore: ConfigStore,
    @InjectLogger("providers:router") private readonly logger: Logger,
  ) {}

  async dispatch(
    request: DispatchRequest,
    options: DispatchOptions = {},
  ): Promise<DispatchResult> {
    const { signal } = options;
    const requested = this.registry.get(request.modelId);
    if (!requested) {
      throw new ProviderFatalError(`Unknown model "${request.modelId}".`, "unknown_model");
    }

    const { attemptsPerModel, baseDelayMs, maxDelayMs } =
      this.configStore.section("router");
    const chain = this.buildChain(requested);
    const messages = buildMessages(request.prompt);
    const attempts: ProviderAttempt[] = [];

    for (const [index, descriptor] of chain.entries()) {
      if (index > 0) {
        this.logger.warn(
          {
            agent: request.agent,
            requestedModel: requested.id,
            model: descriptor.id,
          },
          "Falling back to the next model",
        );
      }

      const connection = this.registry.connection(descriptor.provider);
      if (!connection) {
        throw new ProviderFatalError(
          `Model "${descriptor.id}" names unknown connection "${descriptor.provider}".`,
          "unknown_provider",
        );
      }
      const adapter = this.factory.create(connection);

      for (let attempt = 1; attempt <= attemptsPerModel; attempt += 1) {
        signal?.throwIfAborted();
        let response: CompletionResponse;
        try {
          response = await adapter.complete({
            model: descriptor.id,
            messages,
            temperature: request.temperature,
            maxOutputTokens: descriptor.maxOutputTokens,
            promptCaching: descriptor.capabilities.promptCaching,
            agent: request.agent,
            signal,
            ...(request.responseFormat && descriptor.capabilities.structuredOutput
              ? { responseFormat: request.responseFormat }
              : {}),
          });
        } catch (error) {
          if (signal?.aborted) {
            throw error;
          }
          if (error instanceof ProviderTransientError) {
            attempts.push({
              model: descriptor.id,
              attempt,
              outcome: "transient",
              status: error.status,
              message: error.message,
            });
            this.logger.warn(
              { agent: request.agent, model: descriptor.id, attempt, status: error.status },
              error.message,
            );
            if (attempt < attemptsPerModel) {
              const delayMs = backoffDelay(attempt - 1, baseDelayMs, maxDelayMs);
              this.logger.debug(
                { model: descriptor.id, attempt, delayMs },
                "Retrying after backoff",
              );
              await sleep(delayMs, signal);
            }
            continue;
          }

          const fatal =
            error instanceof ProviderFatalError
              ? error
              : new ProviderFatalError(
                  `Unexpected failure from model "${descriptor.id}": ${describeError(error)}`,
                  "unexpected",
                  undefined,
                  { cause: error },
                );
          attempts.push({
            model: descriptor.id,
            attempt,
            outcome: "fatal",
            status: fatal.status,
            message: fatal.message,
          });
          this.logger.error(
            { agent: request.agent, model: descriptor.id, attempt, reason: fatal.reason },
            fatal.message,
          );
          throw fatal;
        }

        attempts.push({ model: descriptor.id, attempt, outcome: "success" });
        return this.toResult(request, requested, descriptor, response, attempts);
      }
    }

    const exhausted = new ProviderExhaustedError(requested.id, attempts);
    this.logger.error(
      { agent: request.agent, requestedModel: requested.id, attempts: attempts.length },
      exhausted.message,
    );
    throw exhausted;
  }

  private buildChain(requested: ProviderDescriptor): ProviderDescriptor[] {
    const chain = [requested];
    const seen = new Set([requested.id]);
    for (const fallbackId of requested.fallbacks) {
      if (seen.has(fallbackId)) {
        continue;
      }
      const fallback = this.registry.get(fallbackId);
      if (!fallback) {
        this.logger.warn(
          { model: requested.id, fallback: fallbackId },
          "Skipping unknown fallback model",
        );
        continue;
      }
      seen.add(fallbackId);
      chain.push(fallback);
    }
    return chain;
  }

  private toResult(
    request: DispatchRequest,
    requested: ProviderDescriptor,
    served: ProviderDescriptor,
    response: CompletionResponse,
    attempts: ProviderAttempt[],
  ): DispatchResult {
    if (response.model && response.model !== served.id) {
      this.logger.warn(
        { agent: request.agent, model: served.id, providerModel: response.model },
        "Upstream served a different model",
      );
    }

    const cost = computeCost(response.usage, served.pricing);
    this.logger.info(
      {
        agent: request.agent,
        requestedModel: requested.id,
        model: served.id,
        attempts: attempts.length,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        costUsd: cost.totalUsd,
      },
      "Provider call completed",
    );

    return {
      text: response.text,
      usage: response.usage,
      cost,
      model: served.id,
      requestedModel: requested.id,
      attempts,
      ...(response.model ? { providerModel: response.model } : {}),
    };
  }
}
