import { Injectable } from "@nestjs/common";
import { fetch } from "undici";
import { z } from "zod";
import {
  ProviderFatalError,
  ProviderTransientError,
  type CompletionRequest,
  type CompletionResponse,
  type ProviderAdapter,
} from "@agentmd/types";
import type { ProviderConnectionConfig } from "@agentmd/config";
import { classifyHttpFailure, readJsonBody, toNetworkFailure } from "./http-failures";
import type { ProviderAdapterFactory } from "./provider.tokens";
import { describeResponseFormat } from "./response-format";

export const ANTHROPIC_BASE_URL = "https://api.anthropic.com";
export const ANTHROPIC_VERSION = "2023-06-01";
export const ANTHROPIC_DEFAULT_MAX_TOKENS = 4096;

export interface AnthropicConfig {
  connection: string;
  baseUrl?: string;
  apiKey?: string;
  apiKeyEnv?: string;
  version?: string;
  headers?: Record<string, string>;
}

interface SystemBlock {
  type: "text";
  text: string;
  cache_control?: { type: "ephemeral" };
}

const messageSchema = z
  .object({
    model: z.string().optional(),
    content: z.array(
      z.object({ type: z.string(), text: z.string().optional() }).passthrough(),
    ),
    usage: z
      .object({
        input_tokens: z.number().optional(),
        output_tokens: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export class AnthropicAdapter implements ProviderAdapter {
  readonly name = "anthropic";

  constructor(private readonly config: AnthropicConfig) {}

  private endpoint(): string {
    return `${(this.config.baseUrl ?? ANTHROPIC_BASE_URL).replace(/\/$/, "")}/v1/messages`;
  }

  private buildBody(request: CompletionRequest): Record<string, unknown> {
    const systemText = request.messages
      .filter((message) => message.role === "system")
      .map((message) => message.content)
      .concat(request.responseFormat ? [describeResponseFormat(request.responseFormat)] : [])
      .join("\n\n");
    let messages = request.messages
      .filter((message) => message.role !== "system")
      .map((message) => ({ role: message.role, content: message.content }));

    let system: SystemBlock[] | undefined;
    if (messages.length === 0) {
      // The messages API needs at least one turn.
      messages = [{ role: "user", content: systemText }];
    } else if (systemText) {
      system = [
        {
          type: "text",
          text: systemText,
          ...(request.promptCaching ? { cache_control: { type: "ephemeral" } } : {}),
        },
      ];
    }

    return {
      model: request.model,
      max_tokens: request.maxOutputTokens ?? ANTHROPIC_DEFAULT_MAX_TOKENS,
      messages,
      ...(system ? { system } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    };
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new ProviderFatalError(
        `No API key configured for connection "${this.config.connection}"${
          this.config.apiKeyEnv ? `; set ${this.config.apiKeyEnv}` : ""
        }.`,
        "authentication",
      );
    }

    let payload: unknown;
    try {
      const response = await fetch(this.endpoint(), {
        method: "POST",
        headers: {
          "x-api-key": apiKey,
          "anthropic-version": this.config.version ?? ANTHROPIC_VERSION,
          "content-type": "application/json",
          ...this.config.headers,
        },
        body: JSON.stringify(this.buildBody(request)),
        signal: request.signal,
      });
      if (!response.ok) {
        throw await classifyHttpFailure("Anthropic", response, {
          structured: Boolean(request.responseFormat),
        });
      }
      payload = await readJsonBody("Anthropic", response);
    } catch (error) {
      if (error instanceof ProviderTransientError || error instanceof ProviderFatalError) {
        throw error;
      }
      throw toNetworkFailure("Anthropic", error, request.signal);
    }

    const parsed = messageSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderTransientError("Anthropic response has no content", undefined, {
        cause: parsed.error,
      });
    }

    const inputTokens = parsed.data.usage?.input_tokens ?? 0;
    const outputTokens = parsed.data.usage?.output_tokens ?? 0;
    return {
      text: parsed.data.content
        .filter((block) => block.type === "text")
        .map((block) => block.text ?? "")
        .join(""),
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      ...(parsed.data.model ? { model: parsed.data.model } : {}),
    };
  }
}

@Injectable()
export class AnthropicAdapterFactory implements ProviderAdapterFactory {
  readonly name = "anthropic";

  create(
    connection: ProviderConnectionConfig,
    env: NodeJS.ProcessEnv = process.env,
  ): ProviderAdapter {
    const apiKeyEnv = connection.apiKeyEnv ?? "ANTHROPIC_API_KEY";
    return new AnthropicAdapter({
      connection: connection.name,
      baseUrl: connection.baseUrl,
      apiKey: connection.apiKey ?? env[apiKeyEnv],
      apiKeyEnv,
      version: connection.anthropicVersion,
      headers: connection.headers,
    });
  }
}
