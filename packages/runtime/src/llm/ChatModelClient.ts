import { z } from "zod";
import { OrchestratorError } from "../errors/OrchestratorError.js";

export type ChatModelProvider = "openai" | "deepseek" | "gemini";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatModelClientOptions {
  provider: ChatModelProvider;
  apiKey?: string | null;
  baseURL?: string;
  model?: string;
  requestTimeoutMs?: number;
  headers?: Record<string, string>;
}

export interface ChatCompletionOptions {
  temperature?: number;
  maxTokens?: number;
  responseFormat?: "json_object" | "text";
}

export interface ChatCompletionClient {
  isConfigured(): boolean;
  complete(
    messages: ChatMessage[],
    options?: ChatCompletionOptions
  ): Promise<string>;
}

interface ProviderDefaults {
  baseURL: string;
  model: string;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      })
    )
    .optional(),
});

export const PROVIDER_DEFAULTS: Record<ChatModelProvider, ProviderDefaults> = {
  openai: {
    baseURL: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
  },
  deepseek: {
    baseURL: "https://api.deepseek.com/v1",
    model: "deepseek-chat",
  },
  // Gemini 提供 OpenAI 兼容的 chat/completions 端点
  gemini: {
    baseURL: "https://generativelanguage.googleapis.com/v1beta/openai",
    model: "gemini-2.0-flash",
  },
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export class ChatModelClient implements ChatCompletionClient {
  private readonly provider: ChatModelProvider;

  private readonly apiKey: string | null;

  private readonly endpoint: string;

  private readonly model: string;

  private readonly requestTimeoutMs: number;

  private readonly headers: Record<string, string>;

  constructor(options: ChatModelClientOptions) {
    this.provider = options.provider;
    const defaults = PROVIDER_DEFAULTS[this.provider];

    this.apiKey =
      typeof options.apiKey === "string" && options.apiKey.length > 0
        ? options.apiKey
        : null;

    const baseURL = options.baseURL ?? defaults.baseURL;
    this.endpoint = `${stripTrailingSlash(baseURL)}/chat/completions`;
    this.model = options.model ?? defaults.model;
    this.requestTimeoutMs =
      typeof options.requestTimeoutMs === "number"
        ? options.requestTimeoutMs
        : DEFAULT_REQUEST_TIMEOUT_MS;

    this.headers = {
      "Content-Type": "application/json",
      ...(options.headers ?? {}),
    };

    console.info("[ChatModelClient] Initialized", {
      provider: this.provider,
      baseURL,
      model: this.model,
      requestTimeoutMs: this.requestTimeoutMs,
      hasApiKey: Boolean(this.apiKey),
    });
  }

  public isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  public async complete(
    messages: ChatMessage[],
    options?: ChatCompletionOptions
  ): Promise<string> {
    if (!this.apiKey) {
      throw new OrchestratorError(
        "OracleUnavailable",
        `ChatModelClient (${this.provider}) is not configured with an API key`
      );
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      const body: Record<string, unknown> = {
        model: this.model,
        temperature: options?.temperature ?? 0.2,
        max_tokens: options?.maxTokens ?? 800,
        messages,
      };

      if (options?.responseFormat === "json_object") {
        body.response_format = { type: "json_object" };
      }

      let response: Response;
      try {
        response = await fetch(this.endpoint, {
          method: "POST",
          headers: {
            ...this.headers,
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        throw this.toTransportError(error, controller.signal);
      }

      console.info("[ChatModelClient] Response received", {
        provider: this.provider,
        status: response.status,
        ok: response.ok,
      });

      if (!response.ok) {
        let errText: string | undefined;
        try {
          errText = await response.text();
        } catch (error) {
          console.warn("[ChatModelClient] Failed to read error body", error);
        }
        throw new OrchestratorError(
          "OracleUnavailable",
          `${capitalize(this.provider)} request failed with status ${
            response.status
          } ${response.statusText}${errText ? `: ${errText}` : ""}`,
          { details: { status: response.status } }
        );
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (error) {
        throw this.toTransportError(error, controller.signal);
      }
      const parsed = ChatCompletionResponseSchema.safeParse(json);
      const content = parsed.success
        ? parsed.data.choices?.[0]?.message?.content?.trim()
        : undefined;
      if (!content) {
        throw new OrchestratorError(
          "OracleUnavailable",
          `${capitalize(this.provider)} response did not contain any message content`
        );
      }
      return content;
    } finally {
      clearTimeout(timeout);
    }
  }

  private toTransportError(error: unknown, signal: AbortSignal): OrchestratorError {
    if (signal.aborted) {
      return new OrchestratorError(
        "OracleTimeout",
        `${capitalize(this.provider)} request timed out after ${this.requestTimeoutMs}ms`,
        { cause: error }
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new OrchestratorError(
      "OracleUnavailable",
      `${capitalize(this.provider)} request failed: ${message}`,
      { cause: error }
    );
  }
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

function capitalize(value: string): string {
  if (!value) return value;
  return value.charAt(0).toUpperCase() + value.slice(1);
}
