import { AsyncQueue } from "@sapphire/async-queue";
import { GuildedError, InvalidDataError } from "../errors";
import type { EventRegistry, MemberRolesUpdate } from "../events";
import { CalendarEvent, CalendarEventRsvp } from "../models/calendar";
import {
  DMChannel,
  MessageChannel,
  ServerChannel,
} from "../models/channel";
import { Emote } from "../models/emote";
import { ChatMessage } from "../models/message";
import { RawReaction, Reaction, ReactionAction } from "../models/reaction";
import { Role } from "../models/role";
import { Server } from "../models/server";
import { Member, SYSTEM_USER_ID, User } from "../models/user";
import { Webhook } from "../models/webhook";
import type { ClientState } from "../state";
import {
  calendarEventEvent,
  calendarEventPayload,
  calendarRsvpEvent,
  channelEvent,
  channelPayload,
  memberJoinedEvent,
  memberPayload,
  memberRemovedEvent,
  memberUpdatedEvent,
  MessageEventPayload,
  messageDeletedEvent,
  messageEvent,
  membershipEvent,
  parsePayload,
  pinEvent,
  reactionEvent,
  rolePayload,
  rolesUpdatedEvent,
  serverPayload,
  typingEvent,
  userPayload,
  webhookEvent,
} from "../types/payloads";
import { toError } from "../utils/helpers";
import { logger } from "../utils/logger";
import type { DispatchFrame } from "./codec";

type EventParser = (data: Record<string, unknown>) => Promise<void>;

type ServerScoped = { serverId?: string; teamId?: string };

/** Bot payloads say `serverId`, user account payloads still say `teamId` */
const serverIdOf = (payload: ServerScoped) =>
  payload.serverId ?? payload.teamId;

const requireServerId = (payload: ServerScoped, event: string) => {
  const serverId = serverIdOf(payload);
  if (!serverId) {
    throw new InvalidDataError(`${event} payload has no server id`);
  }
  return serverId;
};

const isRoleId = (key: string) => /^\d+$/.test(key);

/**
 * Turns dispatch frames into domain objects, applies them to the entity
 * cache and hands them to the user handlers. Cache writes of every
 * connection go through one lock.
 */
export class EventDispatcher {
  private readonly parsers = new Map<string, EventParser>();

  constructor(
    private readonly state: ClientState,
    private readonly events: EventRegistry,
    private readonly cacheLock = new AsyncQueue()
  ) {
    this.register(["ChatMessageCreated"], this.onMessageCreated);
    this.register(["ChatMessageUpdated"], this.onMessageUpdated);
    this.register(["ChatMessageDeleted"], this.onMessageDeleted);
    this.register(["ServerMemberJoined", "TeamMemberJoined"], this.onMemberJoined);
    this.register(
      ["ServerMemberRemoved", "TeamMemberRemoved"],
      this.onMemberRemoved
    );
    this.register(
      ["ServerMemberUpdated", "TeamMemberUpdated"],
      this.onMemberUpdated
    );
    this.register(["ServerRolesUpdated", "teamRolesUpdated"], this.onRolesUpdated);
    this.register(
      ["ServerChannelCreated", "TeamChannelCreated"],
      this.onChannelCreated
    );
    this.register(
      ["ServerChannelUpdated", "TeamChannelUpdated"],
      this.onChannelUpdated
    );
    this.register(
      ["ServerChannelDeleted", "TeamChannelDeleted"],
      this.onChannelDeleted
    );
    this.register(["ChannelMessageReactionCreated"], (data) =>
      this.onReaction(data, "add")
    );
    this.register(["ChannelMessageReactionDeleted"], (data) =>
      this.onReaction(data, "remove")
    );
    this.register(
      ["ServerWebhookCreated", "TeamWebhookCreated"],
      (data) => this.onWebhook(data, "webhook_create")
    );
    this.register(
      ["ServerWebhookUpdated", "TeamWebhookUpdated"],
      (data) => this.onWebhook(data, "webhook_update")
    );
    this.register(["BotServerMembershipCreated"], this.onMembershipCreated);
    this.register(["BotServerMembershipDeleted"], this.onMembershipDeleted);
    this.register(["ChatChannelTyping"], this.onTyping);
    this.register(["ChatPinnedMessageCreated"], (data) =>
      this.onPin(data, "message_pin")
    );
    this.register(["ChatPinnedMessageDeleted"], (data) =>
      this.onPin(data, "message_unpin")
    );
    this.register(["CalendarEventCreated"], (data) =>
      this.onCalendarEvent(data, "calendar_event_create")
    );
    this.register(["CalendarEventDeleted"], (data) =>
      this.onCalendarEvent(data, "calendar_event_delete")
    );
    this.register(["CalendarEventRsvpUpdated"], (data) =>
      this.onCalendarRsvp(data, "raw_calendar_event_rsvp_update")
    );
    this.register(["CalendarEventRsvpDeleted"], (data) =>
      this.onCalendarRsvp(data, "calendar_event_rsvp_delete")
    );
  }

  /** Wire event names this dispatcher understands */
  get handledEvents() {
    return [...this.parsers.keys()];
  }

  async handle(frame: DispatchFrame) {
    const parser = this.parsers.get(frame.event);
    if (!parser) {
      logger.debug(`Ignoring unhandled event ${frame.event}`);
      return;
    }

    try {
      await parser(frame.data);
    } catch (err) {
      if (err instanceof InvalidDataError) {
        logger.warn(`Dropping ${frame.event}: ${err.message}`);
        return;
      }
      const error = new GuildedError(
        `Failed to handle ${frame.event}: ${toError(err).message}`,
        { cause: err }
      );
      logger.error(error);
      await this.events.dispatch("error", error);
    }
  }

  private register(events: string[], parser: EventParser) {
    for (const event of events) {
      this.parsers.set(event, parser.bind(this));
    }
  }

  /** Runs one cache mutation under the lock shared by every connection */
  private async write<T>(mutate: () => T): Promise<T> {
    await this.cacheLock.wait();
    try {
      return mutate();
    } finally {
      this.cacheLock.shift();
    }
  }

  private async resolveServer(serverId: string): Promise<Server> {
    const cached = this.state.cache.get("server", serverId);
    if (cached) return cached;

    let server: Server;
    try {
      const data = await this.state.resource.fetchServer(serverId);
      server = new Server(this.state, parsePayload(serverPayload, data, "server"));
    } catch (err) {
      logger.warn(
        `Could not fetch server ${serverId} (${toError(err).message}), using a partial server`
      );
      server = new Server(this.state, { id: serverId }, true);
    }

    // First sight of a server: load its member list as well
    const members = server.partial ? [] : await this.fetchMembers(serverId);
    return this.write(() => {
      const stored = this.state.cache.upsert("server", server);
      for (const member of members) {
        this.state.cache.upsert("member", member);
      }
      return stored;
    });
  }

  private async fetchMembers(serverId: string): Promise<Member[]> {
    let data: unknown;
    try {
      data = await this.state.resource.fetchMembers(serverId);
    } catch (err) {
      logger.warn(
        `Could not fetch the members of ${serverId}: ${toError(err).message}`
      );
      return [];
    }
    if (!Array.isArray(data)) {
      logger.warn(`Member list of ${serverId} is not an array`);
      return [];
    }

    const members: Member[] = [];
    for (const item of data) {
      try {
        const member = parsePayload(memberPayload, item, "member");
        members.push(new Member(this.state, { ...member, serverId }));
      } catch (err) {
        logger.debug(`Skipping a member of ${serverId}: ${toError(err).message}`);
      }
    }
    return members;
  }

  private async resolveChannel(
    channelId: string,
    serverId: string
  ): Promise<ServerChannel> {
    const cached = this.state.cache.get("channel", channelId);
    if (cached) return cached;

    let channel: ServerChannel;
    try {
      const data = parsePayload(
        channelPayload,
        await this.state.resource.fetchChannel(channelId),
        "channel"
      );
      channel = new ServerChannel(this.state, {
        ...data,
        serverId: data.serverId ?? serverId,
      });
    } catch (err) {
      logger.warn(
        `Could not fetch channel ${channelId} (${toError(err).message}), using a partial channel`
      );
      channel = new ServerChannel(this.state, {
        id: channelId,
        serverId,
        type: "chat",
      });
    }
    return this.write(() => this.state.cache.upsert("channel", channel));
  }

  private async resolveDMChannel(channelId: string) {
    const cached = this.state.cache.get("dm", channelId);
    if (cached) return cached;
    return this.write(() =>
      this.state.cache.upsert("dm", new DMChannel(this.state, { id: channelId }))
    );
  }

  private async resolveUser(userId: string): Promise<User> {
    const cached = this.state.cache.get("user", userId);
    if (cached) return cached;

    let user: User;
    try {
      const data = await this.state.resource.fetchUser(userId);
      user = new User(this.state, parsePayload(userPayload, data, "user"));
    } catch (err) {
      logger.debug(`Could not fetch user ${userId}: ${toError(err).message}`);
      user = new User(this.state, { id: userId });
    }
    return this.write(() => this.state.cache.upsert("user", user));
  }

  /** Member when in a server, otherwise the bare user */
  private async resolveAuthor(
    userId: string | undefined,
    serverId: string | undefined
  ): Promise<User | null> {
    if (!userId || userId === SYSTEM_USER_ID) return null;

    if (serverId) {
      const cached = this.state.cache.getMember(serverId, userId);
      if (cached) return cached;

      try {
        const data = parsePayload(
          memberPayload,
          await this.state.resource.fetchMember(serverId, userId),
          "member"
        );
        const member = new Member(this.state, { ...data, serverId });
        return await this.write(() =>
          this.state.cache.upsert("member", member)
        );
      } catch (err) {
        logger.debug(
          `Could not fetch member ${userId} of ${serverId}: ${toError(err).message}`
        );
      }
    }

    return this.resolveUser(userId);
  }

  private async buildMessage(
    payload: MessageEventPayload
  ): Promise<ChatMessage> {
    const { message } = payload;
    const serverId = serverIdOf(payload) ?? message.serverId;
    const channelId = message.channelId ?? payload.channelId;
    if (!channelId) {
      throw new InvalidDataError(`Message ${message.id} has no channel id`);
    }
    const authorId = message.createdBy ?? payload.createdBy;

    let channel: MessageChannel;
    if (serverId) {
      await this.resolveServer(serverId);
      channel = await this.resolveChannel(channelId, serverId);
    } else {
      channel = await this.resolveDMChannel(channelId);
    }
    const author = message.createdByWebhookId
      ? null
      : await this.resolveAuthor(authorId, serverId);

    return new ChatMessage(
      this.state,
      { ...message, serverId, channelId, createdBy: authorId },
      { channel, author }
    );
  }

  private async onMessageCreated(data: Record<string, unknown>) {
    const payload = parsePayload(messageEvent, data, "ChatMessageCreated");
    const message = await this.buildMessage(payload);
    const stored = await this.write(() =>
      this.state.cache.insertMessage(message)
    );
    await this.events.dispatch("message", stored);
  }

  private async onMessageUpdated(data: Record<string, unknown>) {
    const payload = parsePayload(messageEvent, data, "ChatMessageUpdated");
    const serverId = serverIdOf(payload);
    if (serverId) {
      await this.resolveServer(serverId);
    }
    await this.events.dispatch("raw_message_update", payload);

    const cached = this.state.cache.get("message", payload.message.id);
    if (!cached) return;

    const { message } = payload;
    const before = cached.clone();
    const after = await this.write(() =>
      this.state.cache.insertMessage(
        new ChatMessage(
          this.state,
          {
            ...message,
            serverId: serverId ?? message.serverId ?? cached.serverId,
            channelId: message.channelId ?? payload.channelId ?? cached.channelId,
          },
          { channel: cached.channel, author: cached.author }
        )
      )
    );
    await this.events.dispatch("message_update", before, after);
  }

  private async onMessageDeleted(data: Record<string, unknown>) {
    const payload = parsePayload(messageDeletedEvent, data, "ChatMessageDeleted");
    const { message } = payload;
    const serverId = serverIdOf(payload) ?? message.serverId;
    if (serverId) {
      await this.resolveServer(serverId);
    }

    const cached = this.state.cache.get("message", message.id);
    const deletedAt = message.deletedAt ? new Date(message.deletedAt) : new Date();
    await this.events.dispatch("raw_message_delete", {
      messageId: message.id,
      channelId: message.channelId ?? payload.channelId ?? cached?.channelId ?? "",
      serverId: serverId ?? null,
      deletedAt,
      isPrivate: message.isPrivate,
      cachedMessage: cached ?? null,
    });
    if (!cached) return;

    await this.write(() => this.state.cache.remove("message", message.id));
    cached.markDeleted(deletedAt);
    await this.events.dispatch("message_delete", cached);
  }

  private async onMemberJoined(data: Record<string, unknown>) {
    const payload = parsePayload(memberJoinedEvent, data, "ServerMemberJoined");
    const serverId = requireServerId(payload, "ServerMemberJoined");
    const server = await this.resolveServer(serverId);

    const member = await this.write(() =>
      this.state.cache.upsert(
        "member",
        new Member(this.state, { ...payload.member, serverId })
      )
    );
    if (member.id === this.state.user?.id) {
      await this.events.dispatch("server_join", server);
    }
    await this.events.dispatch("member_join", member);
  }

  private async onMemberRemoved(data: Record<string, unknown>) {
    const payload = parsePayload(memberRemovedEvent, data, "ServerMemberRemoved");
    const serverId = requireServerId(payload, "ServerMemberRemoved");
    await this.resolveServer(serverId);
    await this.events.dispatch("raw_member_remove", payload);

    const member = this.state.cache.getMember(serverId, payload.userId);
    if (!member) return;

    await this.write(() => this.state.cache.remove("member", member.cacheKey));
    await this.events.dispatch("member_remove", member);
    if (payload.isBan) {
      await this.events.dispatch("member_ban", member);
    } else if (payload.isKick) {
      await this.events.dispatch("member_kick", member);
    } else {
      await this.events.dispatch("member_leave", member);
    }
  }

  /** Applies a partial member, firing raw and before/after updates */
  private async updateMember(patch: Member): Promise<MemberRolesUpdate> {
    await this.events.dispatch("raw_member_update", patch);

    const cached = this.state.cache.getMember(patch.serverId, patch.id);
    const before = cached ? cached.clone() : null;
    const after = await this.write(() =>
      this.state.cache.upsert("member", patch)
    );
    if (before) {
      await this.events.dispatch("member_update", before, after);
    }
    return { before, after };
  }

  private async onMemberUpdated(data: Record<string, unknown>) {
    const payload = parsePayload(memberUpdatedEvent, data, "ServerMemberUpdated");
    const serverId = requireServerId(payload, "ServerMemberUpdated");
    await this.resolveServer(serverId);

    const { userInfo } = payload;
    await this.updateMember(
      new Member(this.state, {
        serverId,
        user: { id: userInfo.id },
        nickname: userInfo.nickname,
      })
    );
  }

  private async onRolesUpdated(data: Record<string, unknown>) {
    const payload = parsePayload(rolesUpdatedEvent, data, "ServerRolesUpdated");
    const serverId = requireServerId(payload, "ServerRolesUpdated");
    await this.resolveServer(serverId);

    if (payload.rolesById) {
      const roles = Object.entries(payload.rolesById)
        .filter(([key]) => isRoleId(key))
        .map(([key, value]) => {
          const role = parsePayload(rolePayload, value, "role");
          return new Role(this.state, { ...role, id: role.id ?? key, serverId });
        });
      await this.write(() => {
        for (const stale of this.state.cache.rolesOf(serverId)) {
          this.state.cache.remove("role", stale.cacheKey);
        }
        for (const role of roles) {
          this.state.cache.upsert("role", role);
        }
      });
    }

    if (!payload.memberRoleIds) return;

    const updates: MemberRolesUpdate[] = [];
    for (const { userId, roleIds } of payload.memberRoleIds) {
      await this.write(() => {
        for (const roleId of roleIds) {
          if (!this.state.cache.getRole(serverId, roleId)) {
            this.state.cache.upsert(
              "role",
              new Role(this.state, { id: roleId, serverId })
            );
          }
        }
      });
      updates.push(
        await this.updateMember(
          new Member(this.state, { serverId, user: { id: userId }, roleIds })
        )
      );
    }
    await this.events.dispatch("bulk_member_roles_update", updates);
  }

  private async parseChannel(data: Record<string, unknown>, event: string) {
    const payload = parsePayload(channelEvent, data, event);
    const serverId = serverIdOf(payload) ?? payload.channel.serverId;
    if (!serverId) {
      throw new InvalidDataError(`${event} payload has no server id`);
    }
    await this.resolveServer(serverId);
    return new ServerChannel(this.state, { ...payload.channel, serverId });
  }

  private async onChannelCreated(data: Record<string, unknown>) {
    const channel = await this.parseChannel(data, "ServerChannelCreated");
    const stored = await this.write(() =>
      this.state.cache.upsert("channel", channel)
    );
    await this.events.dispatch("channel_create", stored);
  }

  private async onChannelUpdated(data: Record<string, unknown>) {
    const channel = await this.parseChannel(data, "ServerChannelUpdated");
    const cached = this.state.cache.get("channel", channel.id);
    const before = cached?.clone();
    const after = await this.write(() =>
      this.state.cache.upsert("channel", channel)
    );
    if (before) {
      await this.events.dispatch("channel_update", before, after);
    }
  }

  private async onChannelDeleted(data: Record<string, unknown>) {
    const channel = await this.parseChannel(data, "ServerChannelDeleted");
    const removed = await this.write(() =>
      this.state.cache.remove("channel", channel.id)
    );
    if (removed) {
      removed.assign(channel);
    }
    await this.events.dispatch("channel_delete", removed ?? channel);
  }

  private async onReaction(data: Record<string, unknown>, action: ReactionAction) {
    const payload = parsePayload(reactionEvent, data, "ChannelMessageReaction");
    const serverId = serverIdOf(payload);
    if (serverId) {
      await this.resolveServer(serverId);
    }

    const { reaction } = payload;
    const emote = await this.write(() =>
      this.state.cache.upsert("emote", new Emote(this.state, reaction.emote))
    );
    const raw = new RawReaction(this.state, {
      action,
      serverId: serverId ?? null,
      channelId: reaction.channelId,
      messageId: reaction.messageId,
      userId: reaction.createdBy,
      emote,
      deletedBy: payload.deletedBy,
    });

    const message = this.state.cache.get("message", reaction.messageId);
    if (action === "add") {
      await this.events.dispatch("raw_reaction_add", raw);
      if (message) {
        await this.events.dispatch("reaction_add", new Reaction(raw, message));
      }
    } else {
      await this.events.dispatch("raw_reaction_remove", raw);
      if (message) {
        await this.events.dispatch("reaction_remove", new Reaction(raw, message));
      }
    }
  }

  private async onWebhook(
    data: Record<string, unknown>,
    event: "webhook_create" | "webhook_update"
  ) {
    const payload = parsePayload(webhookEvent, data, "ServerWebhook");
    const serverId = serverIdOf(payload) ?? payload.webhook.serverId;
    if (!serverId) {
      throw new InvalidDataError("Webhook payload has no server id");
    }
    await this.resolveServer(serverId);
    await this.events.dispatch(event, new Webhook({ ...payload.webhook, serverId }));
  }

  private async onMembershipCreated(data: Record<string, unknown>) {
    const payload = parsePayload(
      membershipEvent,
      data,
      "BotServerMembershipCreated"
    );
    const server = await this.write(() =>
      this.state.cache.upsert("server", new Server(this.state, payload.server))
    );
    await this.events.dispatch("server_join", server);
  }

  private async onMembershipDeleted(data: Record<string, unknown>) {
    const payload = parsePayload(
      membershipEvent,
      data,
      "BotServerMembershipDeleted"
    );
    const server = new Server(this.state, payload.server);
    const removed = await this.write(() =>
      this.state.cache.purgeServer(server.id)
    );
    if (removed) {
      removed.assign(server);
    }
    await this.events.dispatch("server_remove", removed ?? server);
  }

  private async onTyping(data: Record<string, unknown>) {
    const payload = parsePayload(typingEvent, data, "ChatChannelTyping");
    const serverId = serverIdOf(payload);
    if (serverId) {
      await this.resolveServer(serverId);
    }
    const user = await this.resolveAuthor(payload.userId, serverId);
    await this.events.dispatch("typing_start", payload.channelId, user, new Date());
  }

  private async onPin(
    data: Record<string, unknown>,
    event: "message_pin" | "message_unpin"
  ) {
    const payload = parsePayload(pinEvent, data, "ChatPinnedMessage");
    const message =
      this.state.cache.get("message", payload.message.id) ??
      (await this.buildMessage({
        serverId: payload.serverId,
        teamId: payload.teamId,
        channelId: payload.channelId,
        message: payload.message,
      }));
    const by = await this.resolveAuthor(payload.updatedBy, serverIdOf(payload));
    await this.events.dispatch(event, message, by);
  }

  private async onCalendarEvent(
    data: Record<string, unknown>,
    event: "calendar_event_create" | "calendar_event_delete"
  ) {
    const payload = parsePayload(calendarEventEvent, data, "CalendarEvent");
    const { calendarEvent } = payload;
    const serverId = serverIdOf(payload) ?? calendarEvent.serverId;
    if (!serverId) {
      throw new InvalidDataError("Calendar event payload has no server id");
    }
    await this.resolveServer(serverId);
    const channel = await this.resolveChannel(calendarEvent.channelId, serverId);
    await this.events.dispatch(event, new CalendarEvent(calendarEvent, channel));
  }

  private async onCalendarRsvp(
    data: Record<string, unknown>,
    event: "raw_calendar_event_rsvp_update" | "calendar_event_rsvp_delete"
  ) {
    const payload = parsePayload(calendarRsvpEvent, data, "CalendarEventRsvp");
    const rsvp = payload.calendarEventRsvp;
    const serverId = serverIdOf(payload) ?? rsvp.serverId;
    if (!serverId || !rsvp.channelId) {
      throw new InvalidDataError("RSVP payload has no server or channel id");
    }
    await this.resolveServer(serverId);
    const channel = await this.resolveChannel(rsvp.channelId, serverId);

    let calendarEvent: CalendarEvent;
    try {
      const fetched = parsePayload(
        calendarEventPayload,
        await this.state.resource.fetchCalendarEvent(
          rsvp.channelId,
          rsvp.calendarEventId
        ),
        "calendar event"
      );
      calendarEvent = new CalendarEvent(fetched, channel);
    } catch (err) {
      logger.warn(
        `Dropping ${event}: could not fetch calendar event ${rsvp.calendarEventId} (${toError(err).message})`
      );
      return;
    }
    await this.events.dispatch(event, new CalendarEventRsvp(rsvp, calendarEvent));
  }
}
