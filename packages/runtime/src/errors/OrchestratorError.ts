export type OrchestratorErrorCode =
  | "OracleUnavailable" // LLM 传输失败或响应缺字段
  | "OracleTimeout" // LLM 调用超出时间预算
  | "OraclePlanMalformed" // LLM 输出无法解析成预期结构
  | "AgentNotConfigured" // 适配器缺少凭据
  | "ActionUnparseable" // 步骤 action 不符合代理语法
  | "AdapterCallFailed"; // 外部服务拒绝或出错

export class OrchestratorError extends Error {
  public readonly code: OrchestratorErrorCode;

  public readonly details?: Record<string, unknown>;

  constructor(
    code: OrchestratorErrorCode,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "OrchestratorError";
    this.code = code;
    this.details = options?.details;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}

export function agentNotConfigured(agent: string, missing: string): OrchestratorError {
  return new OrchestratorError(
    "AgentNotConfigured",
    `${agent} agent is not configured (${missing})`,
    { details: { agent } }
  );
}

/**
 * 生成给观察者看的错误文本：已分类的错误带上错误码前缀。
 */
export function describeError(error: unknown): string {
  if (isOrchestratorError(error)) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "Unknown failure");
}
