import { existsSync, promises as fs } from "fs";
import { authenticate } from "@google-cloud/local-auth";
import { google, type calendar_v3 } from "googleapis";
import { z } from "zod";
import {
  OrchestratorError,
  agentNotConfigured,
} from "../errors/OrchestratorError.js";
import type { CalendarAdapter, CalendarEventDetails } from "../types/index.js";

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar"];

type OAuthClient = InstanceType<typeof google.auth.OAuth2>;

export interface StoredCredentials {
  refresh_token?: string | null;
  access_token?: string | null;
  expiry_date?: number | null;
}

export type InteractiveAuthorizer = (
  keyfilePath: string,
  scopes: string[]
) => Promise<StoredCredentials>;

/** 用已有的 refresh token 换取新的 access token */
export type TokenRefresher = (client: OAuthClient) => Promise<void>;

export type EventInserter = (
  auth: OAuthClient,
  event: calendar_v3.Schema$Event
) => Promise<calendar_v3.Schema$Event>;

export interface CalendarProvider {
  insertEvent(event: CalendarEventDetails, timeZone: string): Promise<string>;
}

const ClientSecretSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

const ClientSecretFileSchema = z.union([
  z.object({ installed: ClientSecretSchema }).transform((file) => file.installed),
  z.object({ web: ClientSecretSchema }).transform((file) => file.web),
]);

const TokenFileSchema = z.object({
  type: z.literal("authorized_user").optional(),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().nullish(),
  access_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
});

type ClientSecret = z.infer<typeof ClientSecretSchema>;

const defaultRefresher: TokenRefresher = async (client) => {
  await client.getAccessToken();
};

const defaultInserter: EventInserter = async (auth, requestBody) => {
  const calendar = google.calendar({ version: "v3", auth });
  const created = await calendar.events.insert({ calendarId: "primary", requestBody });
  return created.data;
};

const defaultAuthorizer: InteractiveAuthorizer = async (keyfilePath, scopes) => {
  // 会在本机打开浏览器完成授权，只适合在工作站上运行
  const authorized = await authenticate({ keyfilePath, scopes });
  return authorized.credentials;
};

export interface GoogleCalendarProviderOptions {
  /** OAuth 客户端文件（credentials.json） */
  credentialsPath: string;
  /** 授权后保存的令牌文件（token.json） */
  tokenPath: string;
  authorize?: InteractiveAuthorizer;
  refresh?: TokenRefresher;
  insert?: EventInserter;
  now?: () => number;
}

/**
 * Google Calendar 访问：首次调用时才获取凭据并缓存，
 * 令牌过期且带 refresh token 时刷新，否则走交互式授权。
 */
export class GoogleCalendarProvider implements CalendarProvider {
  private readonly credentialsPath: string;

  private readonly tokenPath: string;

  private readonly authorize: InteractiveAuthorizer;

  private readonly refresh: TokenRefresher;

  private readonly insert: EventInserter;

  private readonly now: () => number;

  private client: OAuthClient | null = null;

  private secret: ClientSecret | null = null;

  constructor(options: GoogleCalendarProviderOptions) {
    this.credentialsPath = options.credentialsPath;
    this.tokenPath = options.tokenPath;
    this.authorize = options.authorize ?? defaultAuthorizer;
    this.refresh = options.refresh ?? defaultRefresher;
    this.insert = options.insert ?? defaultInserter;
    this.now = options.now ?? Date.now;
  }

  public hasCredentialMaterial(): boolean {
    return existsSync(this.tokenPath) || existsSync(this.credentialsPath);
  }

  public async getAuthClient(): Promise<OAuthClient> {
    if (this.client && !this.isExpired(this.client)) {
      return this.client;
    }

    if (!this.client && existsSync(this.tokenPath)) {
      this.client = await this.loadSavedClient();
    }

    if (this.client && this.isExpired(this.client)) {
      if (this.client.credentials.refresh_token) {
        const client = this.client;
        try {
          await this.refresh(client);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          throw new OrchestratorError(
            "AdapterCallFailed",
            `Google token refresh failed: ${reason}`,
            { cause: error }
          );
        }
        await this.saveToken(client);
        return client;
      }
      this.client = null;
    }

    if (this.client) {
      return this.client;
    }

    if (!existsSync(this.credentialsPath)) {
      throw agentNotConfigured("Calendar", "Google OAuth client file missing");
    }
    this.secret = await this.readClientSecret();
    const credentials = await this.authorize(this.credentialsPath, CALENDAR_SCOPES);
    const client = createOAuthClient(this.secret);
    client.setCredentials(credentials);
    await this.saveToken(client);
    this.client = client;
    return client;
  }

  public async insertEvent(event: CalendarEventDetails, timeZone: string): Promise<string> {
    const auth = await this.getAuthClient();
    try {
      const created = await this.insert(auth, {
        summary: event.title,
        start: { dateTime: event.startTime, timeZone },
        end: { dateTime: event.endTime, timeZone },
      });
      return created.htmlLink ?? created.id ?? "Created";
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OrchestratorError("AdapterCallFailed", `Google Calendar API error: ${reason}`, {
        details: { title: event.title },
        cause: error,
      });
    }
  }

  private isExpired(client: OAuthClient): boolean {
    const { access_token: accessToken, expiry_date: expiryDate } = client.credentials;
    if (!accessToken) {
      return true;
    }
    return typeof expiryDate === "number" && expiryDate <= this.now();
  }

  private async loadSavedClient(): Promise<OAuthClient> {
    const token = TokenFileSchema.parse(await readJsonFile(this.tokenPath));
    this.secret = {
      client_id: token.client_id,
      client_secret: token.client_secret,
    };
    const client = createOAuthClient(this.secret);
    client.setCredentials({
      refresh_token: token.refresh_token ?? null,
      access_token: token.access_token ?? null,
      expiry_date: token.expiry_date ?? null,
    });
    return client;
  }

  private async readClientSecret(): Promise<ClientSecret> {
    return ClientSecretFileSchema.parse(await readJsonFile(this.credentialsPath));
  }

  private async saveToken(client: OAuthClient): Promise<void> {
    const payload = {
      type: "authorized_user",
      client_id: this.secret?.client_id,
      client_secret: this.secret?.client_secret,
      refresh_token: client.credentials.refresh_token ?? null,
      access_token: client.credentials.access_token ?? null,
      expiry_date: client.credentials.expiry_date ?? null,
    };
    await fs.writeFile(this.tokenPath, JSON.stringify(payload, null, 2), "utf8");
  }
}

function createOAuthClient(secret: ClientSecret): OAuthClient {
  return new google.auth.OAuth2(
    secret.client_id,
    secret.client_secret,
    secret.redirect_uris?.[0]
  );
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export interface CalendarAgentOptions {
  provider?: CalendarProvider;
  credentialsPath?: string;
  tokenPath?: string;
  timeZone?: string;
}

export class CalendarAgent implements CalendarAdapter {
  public readonly kind = "Calendar" as const;

  public readonly description =
    "Creates events in the user's calendar. Action: what to schedule and when.";

  private readonly provider: CalendarProvider | null;

  private readonly timeZone: string;

  private readonly available: boolean;

  constructor(options: CalendarAgentOptions = {}) {
    this.timeZone = options.timeZone ?? "UTC";
    if (options.provider) {
      this.provider = options.provider;
      this.available = true;
    } else if (options.credentialsPath && options.tokenPath) {
      const googleProvider = new GoogleCalendarProvider({
        credentialsPath: options.credentialsPath,
        tokenPath: options.tokenPath,
      });
      this.provider = googleProvider;
      this.available = googleProvider.hasCredentialMaterial();
    } else {
      this.provider = null;
      this.available = false;
    }
    if (!this.available) {
      console.warn("[CalendarAgent] Google Calendar credentials missing, calendar disabled until configured.");
    }
  }

  public isAvailable(): boolean {
    return this.available;
  }

  public async run(event: CalendarEventDetails): Promise<string> {
    if (!this.provider) {
      throw agentNotConfigured("Calendar", "Google OAuth client file missing");
    }
    return this.provider.insertEvent(event, this.timeZone);
  }
}
