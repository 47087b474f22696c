import { Injectable } from "@nestjs/common";
import { fetch } from "undici";
import { z } from "zod";
import {
  ProviderFatalError,
  ProviderTransientError,
  type ChatMessage,
  type CompletionRequest,
  type CompletionResponse,
  type ProviderAdapter,
} from "@agentmd/types";
import type { ProviderConnectionConfig } from "@agentmd/config";
import { classifyHttpFailure, readJsonBody, toNetworkFailure } from "./http-failures";
import type { ProviderAdapterFactory } from "./provider.tokens";
import { toOpenAIResponseFormat } from "./response-format";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export interface OpenAICompatConfig {
  /** Connection name, used in messages. */
  connection: string;
  baseUrl?: string;
  apiKey?: string;
  apiKeyEnv?: string;
  headers?: Record<string, string>;
  appName?: string;
  referer?: string;
}

const contentPartSchema = z
  .object({ type: z.string().optional(), text: z.string().optional() })
  .passthrough();

const completionSchema = z
  .object({
    model: z.string().optional(),
    choices: z
      .array(
        z
          .object({
            message: z
              .object({
                content: z.union([z.string(), z.array(contentPartSchema), z.null()]).optional(),
              })
              .passthrough(),
          })
          .passthrough(),
      )
      .min(1),
    usage: z
      .object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type CompletionBody = z.infer<typeof completionSchema>;
type WireContent = string | Array<{ type: "text"; text: string; cache_control: { type: "ephemeral" } }>;

const joinContent = (content: CompletionBody["choices"][number]["message"]["content"]): string => {
  if (typeof content === "string") {
    return content;
  }
  return (content ?? []).map((part) => part.text ?? "").join("");
};

export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name = "openai_compatible";

  constructor(private readonly config: OpenAICompatConfig) {}

  private endpoint(): string {
    return `${(this.config.baseUrl ?? OPENROUTER_BASE_URL).replace(/\/$/, "")}/chat/completions`;
  }

  private headers(request: CompletionRequest): Record<string, string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new ProviderFatalError(
        `No API key configured for connection "${this.config.connection}"${
          this.config.apiKeyEnv ? `; set ${this.config.apiKeyEnv}` : ""
        }.`,
        "authentication",
      );
    }

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`,
    };
    if (this.config.referer) {
      headers["HTTP-Referer"] = this.config.referer;
    }
    if (this.config.appName) {
      headers["X-Title"] = request.agent
        ? `${this.config.appName} - ${request.agent}`
        : this.config.appName;
    }
    return { ...headers, ...this.config.headers };
  }

  private formatMessages(request: CompletionRequest): Array<{ role: string; content: WireContent }> {
    return request.messages.map((message: ChatMessage) => {
      if (message.role === "system" && request.promptCaching) {
        return {
          role: message.role,
          content: [
            { type: "text" as const, text: message.content, cache_control: { type: "ephemeral" as const } },
          ],
        };
      }
      return { role: message.role, content: message.content };
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const headers = this.headers(request);
    const body = {
      model: request.model,
      messages: this.formatMessages(request),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.maxOutputTokens !== undefined ? { max_tokens: request.maxOutputTokens } : {}),
      ...(request.responseFormat
        ? { response_format: toOpenAIResponseFormat(request.responseFormat) }
        : {}),
    };

    let payload: unknown;
    try {
      const response = await fetch(this.endpoint(), {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: request.signal,
      });
      if (!response.ok) {
        throw await classifyHttpFailure("OpenAI-compatible", response, {
          structured: Boolean(request.responseFormat),
        });
      }
      payload = await readJsonBody("OpenAI-compatible", response);
    } catch (error) {
      if (error instanceof ProviderTransientError || error instanceof ProviderFatalError) {
        throw error;
      }
      throw toNetworkFailure("OpenAI-compatible", error, request.signal);
    }

    const parsed = completionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderTransientError(
        "OpenAI-compatible response has no choices",
        undefined,
        { cause: parsed.error },
      );
    }

    const [choice] = parsed.data.choices;
    const inputTokens = parsed.data.usage?.prompt_tokens ?? 0;
    const outputTokens = parsed.data.usage?.completion_tokens ?? 0;
    return {
      text: joinContent(choice?.message.content),
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: parsed.data.usage?.total_tokens ?? inputTokens + outputTokens,
      },
      ...(parsed.data.model ? { model: parsed.data.model } : {}),
    };
  }
}

@Injectable()
export class OpenAICompatibleAdapterFactory implements ProviderAdapterFactory {
  readonly name = "openai_compatible";

  create(
    connection: ProviderConnectionConfig,
    env: NodeJS.ProcessEnv = process.env,
  ): ProviderAdapter {
    return new OpenAICompatibleAdapter({
      connection: connection.name,
      baseUrl: connection.baseUrl,
      apiKey: connection.apiKey ?? (connection.apiKeyEnv ? env[connection.apiKeyEnv] : undefined),
      apiKeyEnv: connection.apiKeyEnv,
      headers: connection.headers,
      appName: connection.appName,
      referer: connection.referer,
    });
  }
}
