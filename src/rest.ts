import { httpErrorFor, InvalidDataError } from "./errors";
import type { MessageCreateOptions } from "./models/channel";
import { isRecord, sleep } from "./utils/helpers";
import { logger } from "./utils/logger";

export const DEFAULT_REST_URL = "https://www.guilded.gg/api/v1";

/** Seconds to wait on a 429 that carries no retry-after header */
const DEFAULT_RETRY_AFTER = 5;

/**
 * The few resource lookups the gateway needs when an event references an
 * entity that is not cached. Every method resolves with the decoded JSON of
 * the entity itself.
 */
export interface ResourceClient {
  fetchServer(serverId: string): Promise<unknown>;
  fetchChannel(channelId: string): Promise<unknown>;
  fetchMember(serverId: string, userId: string): Promise<unknown>;
  /** Every member of a server */
  fetchMembers(serverId: string): Promise<unknown>;
  fetchUser(userId: string): Promise<unknown>;
  /** Servers the client is a member of */
  fetchServers(): Promise<unknown>;
  fetchCalendarEvent(channelId: string, eventId: string): Promise<unknown>;
  createMessage(
    channelId: string,
    body: MessageCreateOptions
  ): Promise<unknown>;
}

type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type RestClientOptions = {
  /** Authentication headers, a bearer token for bots or a cookie for users */
  headers: Record<string, string>;
  baseUrl?: string;
  /** How often a rate limited request is retried */
  maxRetries?: number;
};

export const bearer = (token: string) => ({
  Authorization: `Bearer ${token}`,
});

const pluck = (data: unknown, key: string) => {
  if (isRecord(data) && key in data) {
    return data[key];
  }
  throw new InvalidDataError(`Response has no \`${key}\` field`);
};

export class RestClient implements ResourceClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly maxRetries: number;

  constructor({
    headers,
    baseUrl = DEFAULT_REST_URL,
    maxRetries = 3,
  }: RestClientOptions) {
    this.headers = headers;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.maxRetries = maxRetries;
  }

  async request(
    method: HttpMethod,
    path: string,
    body?: unknown,
    attempt = 0
  ): Promise<unknown> {
    logger.debug(`${method} ${path}`);
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        "Content-Type": "application/json",
        ...this.headers,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const text = await response.text();
    let data: unknown = text || null;
    if (text) {
      try {
        data = JSON.parse(text);
      } catch {
        logger.debug(`${method} ${path} returned a non-JSON body`);
      }
    }

    if (response.status === 429 && attempt < this.maxRetries) {
      const retryAfter =
        Number(response.headers.get("retry-after")) || DEFAULT_RETRY_AFTER;
      logger.warn(
        `Rate limited on ${method} ${path}, retrying in ${retryAfter}s`
      );
      await sleep(retryAfter * 1000);
      return this.request(method, path, body, attempt + 1);
    }

    if (!response.ok) {
      throw httpErrorFor(response.status, data);
    }

    return data;
  }

  async fetchServer(serverId: string) {
    return pluck(await this.request("GET", `/servers/${serverId}`), "server");
  }

  async fetchChannel(channelId: string) {
    return pluck(await this.request("GET", `/channels/${channelId}`), "channel");
  }

  async fetchMember(serverId: string, userId: string) {
    return pluck(
      await this.request("GET", `/servers/${serverId}/members/${userId}`),
      "member"
    );
  }

  async fetchMembers(serverId: string) {
    return pluck(
      await this.request("GET", `/servers/${serverId}/members`),
      "members"
    );
  }

  async fetchUser(userId: string) {
    return pluck(await this.request("GET", `/users/${userId}`), "user");
  }

  async fetchServers() {
    return pluck(await this.request("GET", "/users/@me/servers"), "servers");
  }

  async fetchCalendarEvent(channelId: string, eventId: string) {
    return pluck(
      await this.request("GET", `/channels/${channelId}/events/${eventId}`),
      "calendarEvent"
    );
  }

  async createMessage(channelId: string, body: MessageCreateOptions) {
    return pluck(
      await this.request("POST", `/channels/${channelId}/messages`, body),
      "message"
    );
  }
}
