import { ClientError } from "../errors";
import type { ClientState } from "../state";
import { ChannelPayload, messagePayload, parsePayload } from "../types/payloads";
import { Entity, toDate } from "./base";
import { ChatMessage } from "./message";

export type MessageCreateOptions = {
  content?: string;
  embeds?: Record<string, unknown>[];
  replyMessageIds?: string[];
  isPrivate?: boolean;
  isSilent?: boolean;
};

export type MessageContent = string | MessageCreateOptions;

/** Something messages can be sent to */
export interface Sendable {
  readonly id: string;
  send(content: MessageContent): Promise<ChatMessage>;
}

export type MessageChannel = ServerChannel | DMChannel | PartialMessageable;

export const toMessageOptions = (
  content: MessageContent
): MessageCreateOptions =>
  typeof content === "string" ? { content } : content;

/** Sends messages on behalf of a channel through the resource client */
export class Messageable {
  constructor(
    private readonly state: ClientState,
    private readonly channel: MessageChannel
  ) {}

  async send(content: MessageContent): Promise<ChatMessage> {
    const options = toMessageOptions(content);
    if (!options.content && !options.embeds?.length) {
      throw new ClientError("A message needs content or at least one embed");
    }

    const data = parsePayload(
      messagePayload,
      await this.state.resource.createMessage(this.channel.id, options),
      "message"
    );
    const message = new ChatMessage(
      this.state,
      { ...data, channelId: data.channelId ?? this.channel.id },
      { channel: this.channel, author: this.state.user }
    );
    return this.state.cache.insertMessage(message);
  }
}

export type ServerChannelInit = ChannelPayload & { serverId: string };

/** A channel or thread that belongs to a server */
export class ServerChannel extends Entity implements Sendable {
  readonly id: string;
  readonly serverId: string;
  type?: string;
  name?: string;
  topic?: string | null;
  parentId?: string | null;
  messageId?: string | null;
  categoryId?: string | null;
  groupId?: string;
  isPublic?: boolean;
  createdAt?: Date;
  createdBy?: string;
  updatedAt?: Date;
  archivedAt?: Date;
  archivedBy?: string;

  constructor(state: ClientState, data: ServerChannelInit) {
    super(state);
    this.id = data.id;
    this.serverId = data.serverId;
    this.type = data.type;
    this.name = data.name;
    this.topic = data.topic;
    this.parentId = data.parentId;
    this.messageId = data.messageId;
    this.categoryId = data.categoryId;
    this.groupId = data.groupId;
    this.isPublic = data.isPublic;
    this.createdAt = toDate(data.createdAt);
    this.createdBy = data.createdBy;
    this.updatedAt = toDate(data.updatedAt);
    this.archivedAt = toDate(data.archivedAt);
    this.archivedBy = data.archivedBy;
  }

  get cacheKey() {
    return this.id;
  }

  get server() {
    return this.state.cache.get("server", this.serverId);
  }

  get isThread() {
    return typeof this.parentId === "string";
  }

  get mention() {
    return `<#${this.id}>`;
  }

  send(content: MessageContent) {
    return new Messageable(this.state, this).send(content);
  }

  clone(): ServerChannel {
    return Object.assign(
      new ServerChannel(this.state, { id: this.id, serverId: this.serverId }),
      this
    );
  }
}

/** A private conversation, only seen by user accounts */
export class DMChannel extends Entity implements Sendable {
  readonly id: string;
  recipientIds?: string[];

  constructor(state: ClientState, data: { id: string; recipientIds?: string[] }) {
    super(state);
    this.id = data.id;
    this.recipientIds = data.recipientIds;
  }

  get cacheKey() {
    return this.id;
  }

  get recipients() {
    return (this.recipientIds ?? []).flatMap((userId) => {
      const user = this.state.cache.get("user", userId);
      return user ? [user] : [];
    });
  }

  send(content: MessageContent) {
    return new Messageable(this.state, this).send(content);
  }

  clone(): DMChannel {
    return Object.assign(new DMChannel(this.state, { id: this.id }), this);
  }
}

/** A channel known only by its id */
export class PartialMessageable implements Sendable {
  constructor(
    private readonly state: ClientState,
    readonly id: string,
    readonly serverId: string | null = null
  ) {}

  send(content: MessageContent) {
    return new Messageable(this.state, this).send(content);
  }
}
