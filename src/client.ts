import { EntityCache } from "./cache/entity-cache";
import { ClientError } from "./errors";
import { EventRegistry } from "./events";
import type { BackoffOptions } from "./gateway/backoff";
import {
  BotFrameCodec,
  FrameCodec,
  HelloData,
  UserbotFrameCodec,
} from "./gateway/codec";
import { FrameHandler, GatewayConnection } from "./gateway/connection";
import { EventDispatcher } from "./gateway/dispatcher";
import type { SocketFactory } from "./gateway/socket";
import { PartialMessageable } from "./models/channel";
import { Server } from "./models/server";
import { ClientUser } from "./models/user";
import { bearer, ResourceClient, RestClient } from "./rest";
import type { ClientState } from "./state";
import { parsePayload, serverPayload } from "./types/payloads";
import { Collection } from "./utils/collection";
import { logger } from "./utils/logger";
import { GatewayEvents } from "./utils/types";
import { v } from "./utils/validator";

export type ClientMode = "bot" | "userbot";

export type ClientOptions = {
  /** Bot token, or the session cookie of a user account */
  token: string;
  mode?: ClientMode;
  /** Defaults to 1000, `null` stops messages from being cached */
  maxMessages?: number | null;
  gatewayUrl?: string;
  restUrl?: string;
  reconnect?: boolean;
  maxConnectAttempts?: number;
  maxReconnectAttempts?: number;
  /** Milliseconds to wait for the hello frame */
  handshakeTimeout?: number;
  backoff?: BackoffOptions;
  heartbeat?: { maxMissedAcks?: number };
  resource?: ResourceClient;
  socketFactory?: SocketFactory;
  /** Server the bot is expected to be in, checked on start */
  internalServerId?: string;
};

export const GATEWAY_URLS: Record<ClientMode, string> = {
  bot: "wss://api.guilded.gg/v1/websocket",
  userbot: "wss://api.guilded.gg/socket.io/",
};

export const REST_URLS: Record<ClientMode, string> = {
  bot: "https://www.guilded.gg/api/v1",
  userbot: "https://www.guilded.gg/api",
};

/** Key of the account-wide connection among the per-server ones */
const GLOBAL_CONNECTION = "gateway";

export class Client extends EventRegistry implements ClientState {
  readonly mode: ClientMode;
  readonly cache: EntityCache;
  readonly resource: ResourceClient;

  private readonly options: ClientOptions;
  private readonly codec: FrameCodec;
  private readonly dispatcher: EventDispatcher;
  private readonly frameHandler: FrameHandler;
  private readonly connections = new Collection<string, GatewayConnection>();

  #user: ClientUser | null = null;
  #ready = false;

  constructor(options: ClientOptions) {
    super();
    this.options = options;
    this.mode = options.mode ?? "bot";
    this.cache = new EntityCache({ maxMessages: options.maxMessages });
    this.resource =
      options.resource ??
      new RestClient({
        headers:
          this.mode === "bot"
            ? bearer(options.token)
            : { "guilded-client-id": options.token },
        baseUrl: options.restUrl ?? REST_URLS[this.mode],
      });
    this.codec =
      this.mode === "bot" ? new BotFrameCodec() : new UserbotFrameCodec();
    this.dispatcher = new EventDispatcher(this, this);
    this.frameHandler = {
      hello: (data, connection) => this.onHello(data, connection),
      dispatch: (frame) => this.dispatcher.handle(frame),
    };
  }

  get user() {
    return this.#user;
  }

  /** Milliseconds, `Infinity` until a heartbeat has been acknowledged */
  get latency() {
    return this.gateway?.latency ?? Infinity;
  }

  get gateway() {
    return this.connections.get(GLOBAL_CONNECTION);
  }

  get closed() {
    return this.connections.size === 0;
  }

  get servers() {
    return this.cache.values("server");
  }

  get users() {
    return this.cache.values("user");
  }

  get cachedMessages() {
    return this.cache.values("message");
  }

  get dmChannels() {
    return this.cache.values("dm");
  }

  isReady() {
    return this.#ready;
  }

  async waitUntilReady() {
    if (this.#ready) return;
    await this.waitFor("ready");
  }

  getServer(serverId: string) {
    return this.cache.get("server", serverId);
  }

  getChannel(channelId: string) {
    return (
      this.cache.get("channel", channelId) ?? this.cache.get("dm", channelId)
    );
  }

  getUser(userId: string) {
    return this.cache.get("user", userId);
  }

  getMember(serverId: string, userId: string) {
    return this.cache.getMember(serverId, userId);
  }

  getMessage(messageId: string) {
    return this.cache.get("message", messageId);
  }

  getEmote(emoteId: string) {
    return this.cache.get("emote", emoteId);
  }

  /** A channel handle that can send without the channel being cached */
  getPartialMessageable(channelId: string, serverId?: string) {
    return new PartialMessageable(this, channelId, serverId);
  }

  /** Loads the client's servers and opens the gateway */
  async start() {
    if (!this.options.token) {
      throw new ClientError("A token is required to start the client");
    }

    // The gateway does not announce the servers a bot is already in
    if (this.mode === "bot") {
      await this.loadServers();
    }

    await this.connect();
  }

  async connect() {
    if (this.gateway) {
      throw new ClientError("The client is already connected");
    }
    await this.open(this.createConnection(null));
  }

  /** Opens the socket of one server, for user accounts only */
  async openServerConnection(serverId: string) {
    if (this.mode !== "userbot") {
      throw new ClientError("Per-server connections are only used by user accounts");
    }

    const existing = this.connections.get(serverId);
    if (existing) return existing;

    const connection = this.createConnection(serverId);
    await this.open(connection);
    return connection;
  }

  /** Emits an event on a user account socket */
  async sendEvent(event: string, data: unknown, serverId?: string) {
    if (!(this.codec instanceof UserbotFrameCodec)) {
      throw new ClientError("Only user account sockets accept client events");
    }

    const connection = this.connections.get(serverId ?? GLOBAL_CONNECTION);
    if (!connection) {
      throw new ClientError(
        serverId
          ? `No connection is open for server ${serverId}`
          : "The client is not connected"
      );
    }
    await connection.send(this.codec.encodeEvent(event, data));
  }

  async close() {
    const connections = this.connections.valuesArray;
    await Promise.all(connections.map((connection) => connection.close()));
    this.connections.clear();
    this.#ready = false;
  }

  private async loadServers() {
    const servers = parsePayload(
      v.array().of(serverPayload),
      await this.resource.fetchServers(),
      "server list"
    );
    for (const server of servers) {
      this.cache.upsert("server", new Server(this, server));
    }
    logger.info(`Loaded ${servers.length} servers`);

    const { internalServerId } = this.options;
    if (internalServerId && !this.cache.get("server", internalServerId)) {
      logger.warn(
        `Internal server ${internalServerId} is not among the client's servers`
      );
    }
  }

  private async open(connection: GatewayConnection) {
    try {
      await connection.open();
    } catch (err) {
      this.forget(connection);
      throw err;
    }
  }

  private forget(connection: GatewayConnection) {
    const key = connection.serverId ?? GLOBAL_CONNECTION;
    if (this.connections.get(key) === connection) {
      this.connections.delete(key);
    }
    if (key === GLOBAL_CONNECTION) {
      this.#ready = false;
    }
  }

  private async onHello(data: HelloData, connection: GatewayConnection) {
    if (connection.serverId) return;

    if (data.user) {
      const user = new ClientUser(this, data.user);
      this.#user = user;
      this.cache.upsert("user", user);
      logger.ready(`Logged in as ${user.displayName}`);
    }
    this.#ready = true;
    await this.dispatch("ready");
  }

  private gatewayUrl(serverId: string | null) {
    const base = this.options.gatewayUrl ?? GATEWAY_URLS[this.mode];
    if (this.mode === "bot") return base;

    const url = new URL(base);
    url.searchParams.set("jwt", "undefined");
    url.searchParams.set("EIO", "3");
    url.searchParams.set("transport", "websocket");
    url.searchParams.set("guildedClientId", this.options.token);
    if (serverId) {
      url.searchParams.set("teamId", serverId);
    }
    return url.toString();
  }

  private createConnection(serverId: string | null) {
    const { options } = this;
    const connection = new GatewayConnection({
      codec: this.codec,
      url: this.gatewayUrl(serverId),
      headers: this.mode === "bot" ? bearer(options.token) : {},
      handler: this.frameHandler,
      label: serverId ? `server:${serverId}` : GLOBAL_CONNECTION,
      serverId,
      socketFactory: options.socketFactory,
      reconnect: options.reconnect,
      handshakeTimeout: options.handshakeTimeout,
      maxConnectAttempts: options.maxConnectAttempts,
      maxReconnectAttempts: options.maxReconnectAttempts,
      backoff: options.backoff,
      maxMissedAcks: options.heartbeat?.maxMissedAcks,
    });

    connection.on(GatewayEvents.Connect, () => {
      void this.dispatch("connect");
      if (serverId) {
        void this.dispatch("team_connect", serverId);
      }
    });
    connection.on(GatewayEvents.Disconnect, ({ code }) => {
      void this.dispatch("disconnect", code);
    });
    connection.on(GatewayEvents.Reconnect, () => {
      void this.dispatch("reconnect");
    });
    connection.on(GatewayEvents.Error, ({ error }) => {
      void this.dispatch("error", error);
    });
    connection.on(GatewayEvents.RawSend, (payload) => {
      void this.dispatch("socket_raw_send", payload);
    });
    connection.on(GatewayEvents.RawReceive, (payload) => {
      void this.dispatch("socket_raw_receive", payload);
    });
    connection.on(GatewayEvents.Closed, () => {
      this.forget(connection);
    });

    this.connections.set(serverId ?? GLOBAL_CONNECTION, connection);
    return connection;
  }
}
