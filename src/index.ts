export { Client, GATEWAY_URLS, REST_URLS } from "./client";
export type { ClientMode, ClientOptions } from "./client";
export * from "./errors";
export { EventRegistry } from "./events";
export type {
  ClientEventHandler,
  ClientEventName,
  ClientEventsMap,
  MemberRolesUpdate,
  RawMessageDelete,
  WaitForOptions,
} from "./events";
export { EntityCache, DEFAULT_MAX_MESSAGES } from "./cache/entity-cache";
export type { CacheCategory, EntityMap } from "./cache/entity-cache";
export { ReconnectBackoff } from "./gateway/backoff";
export {
  BotFrameCodec,
  BotOpcodes,
  UserbotFrameCodec,
  UserbotPackets,
  stripPrefix,
} from "./gateway/codec";
export type { Frame, FrameCodec, HelloData, OutboundHeartbeat } from "./gateway/codec";
export { GatewayConnection } from "./gateway/connection";
export type { FrameHandler, GatewayConnectionOptions } from "./gateway/connection";
export { EventDispatcher } from "./gateway/dispatcher";
export { Heartbeater } from "./gateway/heartbeat";
export { createWebSocket } from "./gateway/socket";
export type { GatewaySocket, SocketFactory, SocketHandlers } from "./gateway/socket";
export {
  DMChannel,
  Messageable,
  PartialMessageable,
  ServerChannel,
} from "./models/channel";
export type { MessageContent, MessageCreateOptions, Sendable } from "./models/channel";
export { CalendarEvent, CalendarEventRsvp } from "./models/calendar";
export type { RsvpStatus } from "./models/calendar";
export { Emote } from "./models/emote";
export { ChatMessage } from "./models/message";
export { RawReaction, Reaction } from "./models/reaction";
export { Role } from "./models/role";
export { Server } from "./models/server";
export { ClientUser, Member, SYSTEM_USER_ID, User } from "./models/user";
export { Webhook } from "./models/webhook";
export { RestClient } from "./rest";
export type { ResourceClient } from "./rest";
export { clientOptionsFromEnv, loadEnv } from "./utils/env";
export { logger } from "./utils/logger";
export { ConnectionStatus, GatewayEvents } from "./utils/types";
