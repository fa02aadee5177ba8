import path from "path";
import { z } from "zod";
import type { ChatModelProvider } from "../llm/ChatModelClient.js";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

// 空白的数值变量与未设置同样处理，而不是被 coerce 成 0
function optionalNumber(schema: z.ZodNumber) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
    schema.optional()
  );
}

const optionalCount = optionalNumber(z.coerce.number().int().nonnegative());

const EnvSchema = z.object({
  LLM_PROVIDER: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: optionalString,
  DEEPSEEK_API_KEY: optionalString,
  DEEPSEEK_BASE_URL: optionalString,
  DEEPSEEK_MODEL: optionalString,
  GEMINI_API_KEY: optionalString,
  GEMINI_BASE_URL: optionalString,
  GEMINI_MODEL: optionalString,
  LLM_TIMEOUT_MS: optionalNumber(z.coerce.number().int().positive()),
  SLACK_BOT_TOKEN: optionalString,
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  GOOGLE_CREDENTIALS_PATH: optionalString,
  GOOGLE_TOKEN_PATH: optionalString,
  CALENDAR_TIME_ZONE: optionalString,
  KNOWLEDGE_DIR: optionalString,
  SEARCH_MAX_RESULTS: optionalNumber(z.coerce.number().int().positive()),
  STEP_DELAY_MS: optionalCount,
  SIMULATED_AGENT_DELAY_MS: optionalCount,
  PORT: optionalNumber(z.coerce.number().int().min(0).max(65_535)),
  ALLOW_ORIGIN: optionalString,
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export interface LlmConfig {
  provider: ChatModelProvider;
  apiKey: string | null;
  baseURL?: string;
  model?: string;
  requestTimeoutMs: number;
}

export interface OrchestratorConfig {
  llm: LlmConfig;
  slack: { botToken: string | null };
  twilio: {
    accountSid: string | null;
    authToken: string | null;
    phoneNumber: string | null;
  };
  google: { credentialsPath: string; tokenPath: string; timeZone: string };
  knowledge: { directory: string };
  search: { maxResults: number };
  runtime: { stepDelayMs: number; simulatedDelayMs: number };
  server: { port: number; allowOrigin: string };
}

const PROVIDERS: ChatModelProvider[] = ["openai", "deepseek", "gemini"];

/**
 * 从环境变量构建显式配置。只在入口处调用一次，之后各组件通过构造参数拿到各自的配置。
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd()
): OrchestratorConfig {
  const parsed = EnvSchema.parse(env);
  const provider = resolveProvider(parsed);

  return {
    llm: resolveLlmConfig(parsed, provider),
    slack: { botToken: parsed.SLACK_BOT_TOKEN ?? null },
    twilio: {
      accountSid: parsed.TWILIO_ACCOUNT_SID ?? null,
      authToken: parsed.TWILIO_AUTH_TOKEN ?? null,
      phoneNumber: parsed.TWILIO_PHONE_NUMBER ?? null,
    },
    google: {
      credentialsPath: path.resolve(cwd, parsed.GOOGLE_CREDENTIALS_PATH ?? "credentials.json"),
      tokenPath: path.resolve(cwd, parsed.GOOGLE_TOKEN_PATH ?? "token.json"),
      timeZone: parsed.CALENDAR_TIME_ZONE ?? "UTC",
    },
    knowledge: {
      directory: path.resolve(cwd, parsed.KNOWLEDGE_DIR ?? "knowledge_base"),
    },
    search: { maxResults: parsed.SEARCH_MAX_RESULTS ?? 3 },
    runtime: {
      stepDelayMs: parsed.STEP_DELAY_MS ?? 1_000,
      simulatedDelayMs: parsed.SIMULATED_AGENT_DELAY_MS ?? 2_000,
    },
    server: {
      port: parsed.PORT ?? 8000,
      allowOrigin: parsed.ALLOW_ORIGIN ?? "*",
    },
  };
}

function resolveProvider(env: ParsedEnv): ChatModelProvider {
  const requested = (env.LLM_PROVIDER ?? "").toLowerCase();
  const explicit = PROVIDERS.find((provider) => provider === requested);
  if (explicit) {
    return explicit;
  }

  for (const provider of PROVIDERS) {
    if (providerEnv(env, provider).apiKey) {
      return provider;
    }
  }

  return "openai";
}

function resolveLlmConfig(env: ParsedEnv, provider: ChatModelProvider): LlmConfig {
  const settings = providerEnv(env, provider);
  const config: LlmConfig = {
    provider,
    apiKey: settings.apiKey ?? null,
    requestTimeoutMs: env.LLM_TIMEOUT_MS ?? 60_000,
  };
  if (settings.baseURL) {
    config.baseURL = settings.baseURL;
  }
  if (settings.model) {
    config.model = settings.model;
  }
  return config;
}

function providerEnv(
  env: ParsedEnv,
  provider: ChatModelProvider
): { apiKey?: string; baseURL?: string; model?: string } {
  switch (provider) {
    case "openai":
      return { apiKey: env.OPENAI_API_KEY, baseURL: env.OPENAI_BASE_URL, model: env.OPENAI_MODEL };
    case "deepseek":
      return {
        apiKey: env.DEEPSEEK_API_KEY,
        baseURL: env.DEEPSEEK_BASE_URL,
        model: env.DEEPSEEK_MODEL,
      };
    case "gemini":
      return { apiKey: env.GEMINI_API_KEY, baseURL: env.GEMINI_BASE_URL, model: env.GEMINI_MODEL };
  }
}
