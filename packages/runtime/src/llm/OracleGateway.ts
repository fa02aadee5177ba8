import { OrchestratorError } from "../errors/OrchestratorError.js";
import type { Oracle, PromptTemplate, PromptVariables } from "../types/index.js";
import type {
  ChatCompletionClient,
  ChatCompletionOptions,
  ChatMessage,
} from "./ChatModelClient.js";

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface OracleGatewayOptions {
  client: ChatCompletionClient;
  temperature?: number;
  maxTokens?: number;
}

/**
 * 对 LLM 调用的统一封装：模板渲染、单次请求、代码块剥离与 JSON 解析。
 * 所有失败都以 OrchestratorError 抛出，不做重试。
 */
export class OracleGateway implements Oracle {
  private readonly client: ChatCompletionClient;

  private readonly completionOptions: ChatCompletionOptions;

  constructor(options: OracleGatewayOptions) {
    this.client = options.client;
    this.completionOptions = {
      temperature: options.temperature ?? 0.2,
      ...(typeof options.maxTokens === "number"
        ? { maxTokens: options.maxTokens }
        : {}),
    };
  }

  public isConfigured(): boolean {
    return this.client.isConfigured();
  }

  public render(template: PromptTemplate, variables: PromptVariables): string {
    return renderTemplate(template, variables);
  }

  public ask(
    template: PromptTemplate,
    variables: PromptVariables,
    expectStructured: true
  ): Promise<unknown>;
  public ask(
    template: PromptTemplate,
    variables: PromptVariables,
    expectStructured: false
  ): Promise<string>;
  public ask(
    template: PromptTemplate,
    variables: PromptVariables,
    expectStructured: boolean
  ): Promise<unknown>;
  public async ask(
    template: PromptTemplate,
    variables: PromptVariables,
    expectStructured: boolean
  ): Promise<unknown> {
    const prompt = renderTemplate(template, variables);
    const messages: ChatMessage[] = [];
    if (template.system) {
      messages.push({ role: "system", content: template.system });
    }
    messages.push({ role: "user", content: prompt });

    console.info(`[OracleGateway] Asking "${template.name}"`, {
      expectStructured,
      promptLength: prompt.length,
    });

    const raw = await this.client.complete(messages, this.completionOptions);
    if (!expectStructured) {
      return raw.trim();
    }
    return parseStructured(template.name, raw);
  }

  public askStructured(
    template: PromptTemplate,
    variables: PromptVariables
  ): Promise<unknown> {
    return this.ask(template, variables, true);
  }

  public askText(
    template: PromptTemplate,
    variables: PromptVariables
  ): Promise<string> {
    return this.ask(template, variables, false);
  }
}

/**
 * 用 variables 替换模板中的 {placeholder}；缺少变量属于调用方的编程错误。
 */
export function renderTemplate(
  template: PromptTemplate,
  variables: PromptVariables
): string {
  return template.text.replace(PLACEHOLDER_PATTERN, (_match, key: string) => {
    const value = variables[key];
    if (value === undefined) {
      throw new Error(
        `Prompt template "${template.name}" references missing variable "${key}"`
      );
    }
    return value;
  });
}

/**
 * 去掉首尾的 ``` 或 ```json 代码块标记（大小写不敏感）。
 */
export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?[ \t]*\r?\n?/i, "")
    .replace(/\r?\n?[ \t]*```$/, "")
    .trim();
}

function parseStructured(templateName: string, raw: string): unknown {
  const payload = stripCodeFences(raw);
  try {
    return JSON.parse(payload);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new OrchestratorError(
      "OraclePlanMalformed",
      `Oracle response for "${templateName}" is not valid JSON (${message})`,
      { details: { raw }, cause: error }
    );
  }
}
