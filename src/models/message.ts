import type { ClientState } from "../state";
import type { MessagePayload } from "../types/payloads";
import { Entity, toDate } from "./base";
import {
  MessageChannel,
  MessageContent,
  PartialMessageable,
  toMessageOptions,
} from "./channel";
import type { User } from "./user";

export type ChatMessageInit = MessagePayload & { channelId: string };

export type ChatMessageRefs = {
  channel: MessageChannel | null;
  author: User | null;
};

export class ChatMessage extends Entity {
  readonly id: string;
  readonly channelId: string;
  serverId?: string;
  groupId?: string;
  type?: string;
  content?: string;
  embeds?: unknown[];
  replyMessageIds?: string[];
  mentions?: unknown;
  isPrivate?: boolean;
  isSilent?: boolean;
  isPinned?: boolean;
  authorId?: string;
  webhookId?: string;
  createdAt?: Date;
  updatedAt?: Date;
  deletedAt?: Date;
  channel: MessageChannel | null;
  author: User | null;

  constructor(state: ClientState, data: ChatMessageInit, refs: ChatMessageRefs) {
    super(state);
    this.id = data.id;
    this.channelId = data.channelId;
    this.serverId = data.serverId;
    this.groupId = data.groupId;
    this.type = data.type;
    this.content = data.content;
    this.embeds = data.embeds;
    this.replyMessageIds = data.replyMessageIds;
    this.mentions = data.mentions;
    this.isPrivate = data.isPrivate;
    this.isSilent = data.isSilent;
    this.isPinned = data.isPinned;
    this.authorId = data.createdBy;
    this.webhookId = data.createdByWebhookId;
    this.createdAt = toDate(data.createdAt);
    this.updatedAt = toDate(data.updatedAt);
    this.deletedAt = toDate(data.deletedAt);
    this.channel = refs.channel;
    this.author = refs.author;
  }

  get cacheKey() {
    return this.id;
  }

  get server() {
    return this.serverId
      ? this.state.cache.get("server", this.serverId)
      : undefined;
  }

  get deleted() {
    return this.deletedAt !== undefined;
  }

  get edited() {
    return this.updatedAt !== undefined;
  }

  reply(content: MessageContent) {
    const channel =
      this.channel ??
      new PartialMessageable(this.state, this.channelId, this.serverId);
    return channel.send({
      ...toMessageOptions(content),
      replyMessageIds: [this.id],
    });
  }

  markDeleted(at = new Date()) {
    this.deletedAt = at;
  }

  clone(): ChatMessage {
    return Object.assign(
      new ChatMessage(
        this.state,
        { id: this.id, channelId: this.channelId },
        { channel: this.channel, author: this.author }
      ),
      this
    );
  }
}
