import { ErrorCode, WebClient, type WebAPIPlatformError } from "@slack/web-api";
import {
  OrchestratorError,
  agentNotConfigured,
} from "../errors/OrchestratorError.js";
import type { MessagingAdapter } from "../types/index.js";

export interface MessagePoster {
  /** 发送消息并返回服务端分配的消息标识 */
  postMessage(channel: string, text: string): Promise<string>;
}

export interface MessagingAgentOptions {
  botToken?: string | null;
  /** 测试或自定义传输时替换默认的 Slack WebClient */
  poster?: MessagePoster;
}

const ACTION_PATTERNS: Array<{
  pattern: RegExp;
  pick: (match: RegExpMatchArray) => { channel: string; message: string };
}> = [
  {
    // Post "hello world" to #general
    pattern: /^Post\s+"(.+)"\s+to\s+(#\S+)$/i,
    pick: (m) => ({ message: m[1] ?? "", channel: m[2] ?? "" }),
  },
  {
    // post_message(channel='#general', message='hello world')
    pattern: /^post_message\(\s*channel\s*=\s*'(#[^']+)'\s*,\s*message\s*=\s*'(.+)'\s*\)$/i,
    pick: (m) => ({ channel: m[1] ?? "", message: m[2] ?? "" }),
  },
  {
    // Post to #general: hello world
    pattern: /^Post\s+to\s+(#[^\s:]+)\s*:\s*(.+)$/i,
    pick: (m) => ({ channel: m[1] ?? "", message: m[2] ?? "" }),
  },
];

class SlackMessagePoster implements MessagePoster {
  private readonly client: WebClient;

  constructor(token: string) {
    this.client = new WebClient(token);
  }

  async postMessage(channel: string, text: string): Promise<string> {
    const response = await this.client.chat.postMessage({ channel, text });
    return response.ts ?? "ok";
  }
}

export class MessagingAgent implements MessagingAdapter {
  public readonly kind = "Messaging" as const;

  public readonly description =
    'Posts messages to a Slack channel. Action format: Post "<message>" to #<channel>';

  private readonly poster: MessagePoster | null;

  constructor(options: MessagingAgentOptions = {}) {
    if (options.poster) {
      this.poster = options.poster;
    } else if (options.botToken) {
      this.poster = new SlackMessagePoster(options.botToken);
    } else {
      this.poster = null;
      console.warn("[MessagingAgent] Slack bot token missing, messaging disabled.");
    }
  }

  public isAvailable(): boolean {
    return this.poster !== null;
  }

  public parseAction(action: string): { channel: string; message: string } | null {
    const trimmed = action.trim();
    for (const { pattern, pick } of ACTION_PATTERNS) {
      const match = trimmed.match(pattern);
      if (match) {
        return pick(match);
      }
    }
    return null;
  }

  public async run(action: string): Promise<string> {
    this.ensurePoster();
    const parsed = this.parseAction(action);
    if (!parsed) {
      throw new OrchestratorError(
        "ActionUnparseable",
        `Could not parse messaging action: ${JSON.stringify(action)}`
      );
    }
    return this.post(parsed.channel, parsed.message);
  }

  public async post(channel: string, message: string): Promise<string> {
    const poster = this.ensurePoster();
    try {
      return await poster.postMessage(channel, message);
    } catch (error) {
      if (isSlackPlatformError(error)) {
        throw new OrchestratorError(
          "AdapterCallFailed",
          `Slack API error: ${error.data.error}`,
          { details: { channel, reason: error.data.error }, cause: error }
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new OrchestratorError("AdapterCallFailed", `Slack request failed: ${reason}`, {
        details: { channel },
        cause: error,
      });
    }
  }

  private ensurePoster(): MessagePoster {
    if (!this.poster) {
      throw agentNotConfigured("Messaging", "missing Slack bot token");
    }
    return this.poster;
  }
}

function isSlackPlatformError(error: unknown): error is WebAPIPlatformError {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === ErrorCode.PlatformError &&
    "data" in error
  );
}
