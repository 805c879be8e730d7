import { ClientError, HandlerError } from "./errors";
import type { CalendarEvent, CalendarEventRsvp } from "./models/calendar";
import type { ServerChannel } from "./models/channel";
import type { ChatMessage } from "./models/message";
import type { RawReaction, Reaction } from "./models/reaction";
import type { Server } from "./models/server";
import type { Member, User } from "./models/user";
import type { Webhook } from "./models/webhook";
import type {
  MemberRemovedEventPayload,
  MessageEventPayload,
} from "./types/payloads";
import { logger } from "./utils/logger";

export type RawMessageDelete = {
  messageId: string;
  channelId: string;
  serverId: string | null;
  deletedAt: Date;
  isPrivate?: boolean;
  /** The message as it was cached, if it was */
  cachedMessage: ChatMessage | null;
};

export type MemberRolesUpdate = {
  before: Member | null;
  after: Member;
};

export type ClientEventsMap = {
  ready: [];
  connect: [];
  disconnect: [code: number];
  reconnect: [];
  /** A per-server socket of a user account connected */
  team_connect: [serverId: string];
  error: [error: Error];
  socket_raw_send: [payload: string];
  socket_raw_receive: [payload: string];
  message: [message: ChatMessage];
  raw_message_update: [payload: MessageEventPayload];
  message_update: [before: ChatMessage, after: ChatMessage];
  raw_message_delete: [payload: RawMessageDelete];
  message_delete: [message: ChatMessage];
  message_pin: [message: ChatMessage, pinnedBy: User | null];
  message_unpin: [message: ChatMessage, unpinnedBy: User | null];
  member_join: [member: Member];
  raw_member_remove: [payload: MemberRemovedEventPayload];
  member_remove: [member: Member];
  member_ban: [member: Member];
  member_kick: [member: Member];
  member_leave: [member: Member];
  raw_member_update: [member: Member];
  member_update: [before: Member, after: Member];
  bulk_member_roles_update: [updates: MemberRolesUpdate[]];
  channel_create: [channel: ServerChannel];
  channel_update: [before: ServerChannel, after: ServerChannel];
  channel_delete: [channel: ServerChannel];
  raw_reaction_add: [reaction: RawReaction];
  reaction_add: [reaction: Reaction];
  raw_reaction_remove: [reaction: RawReaction];
  reaction_remove: [reaction: Reaction];
  webhook_create: [webhook: Webhook];
  webhook_update: [webhook: Webhook];
  server_join: [server: Server];
  server_remove: [server: Server];
  typing_start: [channelId: string, user: User | null, when: Date];
  calendar_event_create: [event: CalendarEvent];
  calendar_event_delete: [event: CalendarEvent];
  raw_calendar_event_rsvp_update: [rsvp: CalendarEventRsvp];
  calendar_event_rsvp_delete: [rsvp: CalendarEventRsvp];
};

export type ClientEventName = keyof ClientEventsMap;

export type ClientEventHandler<E extends ClientEventName> = (
  ...args: ClientEventsMap[E]
) => unknown;

type HandlerEntry<E extends ClientEventName> = {
  handler: ClientEventHandler<E>;
  once: boolean;
};

export type WaitForOptions<E extends ClientEventName> = {
  /** Only resolve for arguments this returns true for */
  check?: (...args: ClientEventsMap[E]) => boolean;
  /** Milliseconds before rejecting */
  timeout?: number;
};

/**
 * Typed table of user handlers. Handlers of one event run in registration
 * order, each awaited before the next.
 */
export class EventRegistry {
  private readonly handlers = new Map<
    ClientEventName,
    HandlerEntry<ClientEventName>[]
  >();

  on<E extends ClientEventName>(event: E, handler: ClientEventHandler<E>) {
    return this.add(event, { handler, once: false });
  }

  once<E extends ClientEventName>(event: E, handler: ClientEventHandler<E>) {
    return this.add(event, { handler, once: true });
  }

  off<E extends ClientEventName>(event: E, handler: ClientEventHandler<E>) {
    const entries = this.entries(event);
    for (let i = entries.length - 1; i >= 0; i--) {
      if (entries[i].handler === handler) entries.splice(i, 1);
    }
    return this;
  }

  listenerCount(event: ClientEventName) {
    return this.handlers.get(event)?.length ?? 0;
  }

  /** Resolves with the arguments of the next matching `event` */
  waitFor<E extends ClientEventName>(
    event: E,
    { check, timeout }: WaitForOptions<E> = {}
  ): Promise<ClientEventsMap[E]> {
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const handler: ClientEventHandler<E> = (...args) => {
        let matched: boolean;
        try {
          matched = !check || check(...args);
        } catch (err) {
          clearTimeout(timer);
          this.off(event, handler);
          reject(err);
          return;
        }
        if (!matched) return;
        clearTimeout(timer);
        this.off(event, handler);
        resolve(args);
      };

      this.on(event, handler);

      if (timeout !== undefined) {
        timer = setTimeout(() => {
          this.off(event, handler);
          reject(
            new ClientError(`Timed out after ${timeout}ms waiting for ${event}`)
          );
        }, timeout);
      }
    });
  }

  /** Runs every handler of `event`, routing their failures to `error` */
  async dispatch<E extends ClientEventName>(
    event: E,
    ...args: ClientEventsMap[E]
  ) {
    logger.debug(`Dispatching ${event}`);
    const entries = this.entries(event);
    if (!entries.length) return;

    const current = [...entries];
    for (let i = entries.length - 1; i >= 0; i--) {
      if (entries[i].once) entries.splice(i, 1);
    }

    for (const { handler } of current) {
      try {
        await handler(...args);
      } catch (err) {
        await this.handlerFailed(event, err);
      }
    }
  }

  private add<E extends ClientEventName>(event: E, entry: HandlerEntry<E>) {
    this.entries(event).push(entry);
    return this;
  }

  /** The live handler list of `event`, created on first use */
  private entries<E extends ClientEventName>(event: E): HandlerEntry<E>[];
  private entries(event: ClientEventName) {
    let entries = this.handlers.get(event);
    if (!entries) {
      entries = [];
      this.handlers.set(event, entries);
    }
    return entries;
  }

  private async handlerFailed(event: ClientEventName, err: unknown) {
    const error = new HandlerError(event, err);
    if (event === "error" || !this.listenerCount("error")) {
      logger.error(`Ignoring exception in ${event} handler:`, err);
      return;
    }
    await this.dispatch("error", error);
  }
}
