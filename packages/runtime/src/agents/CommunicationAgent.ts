import twilio from "twilio";
import {
  OrchestratorError,
  agentNotConfigured,
} from "../errors/OrchestratorError.js";
import type { CommunicationAdapter } from "../types/index.js";

export interface TelephonyClient {
  sendMessage(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
  placeCall(params: { twiml: string; from: string; to: string }): Promise<{ sid: string }>;
}

export interface CommunicationAgentOptions {
  accountSid?: string | null;
  authToken?: string | null;
  fromNumber?: string | null;
  /** 测试时替换默认的 Twilio 客户端 */
  client?: TelephonyClient;
}

function createTwilioClient(accountSid: string, authToken: string): TelephonyClient {
  const client = twilio(accountSid, authToken);
  return {
    sendMessage: (params) => client.messages.create(params),
    placeCall: (params) => client.calls.create(params),
  };
}

/** 把要朗读的文本包装成 TwiML，内容由 SDK 负责转义 */
export function buildSayTwiml(message: string): string {
  const response = new twilio.twiml.VoiceResponse();
  response.say(message);
  return response.toString();
}

export class CommunicationAgent implements CommunicationAdapter {
  public readonly kind = "Communication" as const;

  public readonly description =
    "Makes phone calls or sends text messages. Action: who to call or text (E.164 number) and what to say.";

  private readonly client: TelephonyClient | null;

  private readonly fromNumber: string | null;

  constructor(options: CommunicationAgentOptions = {}) {
    this.fromNumber = options.fromNumber || null;
    if (!this.fromNumber) {
      this.client = null;
    } else if (options.client) {
      this.client = options.client;
    } else if (options.accountSid && options.authToken) {
      this.client = createTwilioClient(options.accountSid, options.authToken);
    } else {
      this.client = null;
    }
    if (!this.client) {
      console.warn("[CommunicationAgent] Twilio not configured, communication disabled.");
    }
  }

  public isAvailable(): boolean {
    return this.client !== null;
  }

  public async sendSms(recipient: string, message: string): Promise<string> {
    const { client, from } = this.ensureClient();
    try {
      const sent = await client.sendMessage({ body: message, from, to: recipient });
      return sent.sid;
    } catch (error) {
      throw toAdapterError("SMS", recipient, error);
    }
  }

  public async makeCall(recipient: string, message: string): Promise<string> {
    const { client, from } = this.ensureClient();
    try {
      const call = await client.placeCall({
        twiml: buildSayTwiml(message),
        from,
        to: recipient,
      });
      return call.sid;
    } catch (error) {
      throw toAdapterError("Call", recipient, error);
    }
  }

  private ensureClient(): { client: TelephonyClient; from: string } {
    if (!this.client || !this.fromNumber) {
      throw agentNotConfigured(
        "Communication",
        "missing Twilio account SID, auth token or phone number"
      );
    }
    return { client: this.client, from: this.fromNumber };
  }
}

function toAdapterError(kind: string, recipient: string, error: unknown): OrchestratorError {
  const reason = error instanceof Error ? error.message : String(error);
  return new OrchestratorError("AdapterCallFailed", `Twilio ${kind} request failed: ${reason}`, {
    details: { recipient },
    cause: error,
  });
}
