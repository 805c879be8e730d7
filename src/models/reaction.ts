import type { ClientState } from "../state";
import type { Emote } from "./emote";
import type { ChatMessage } from "./message";
import type { User } from "./user";

export type ReactionAction = "add" | "remove";

type RawReactionInit = {
  action: ReactionAction;
  serverId: string | null;
  channelId: string;
  messageId: string;
  userId: string;
  emote: Emote;
  deletedBy?: string;
};

/** A reaction change, delivered whether or not its message is cached */
export class RawReaction {
  readonly action: ReactionAction;
  readonly serverId: string | null;
  readonly channelId: string;
  readonly messageId: string;
  readonly userId: string;
  readonly emote: Emote;
  readonly deletedBy?: string;

  constructor(
    private readonly state: ClientState,
    data: RawReactionInit
  ) {
    this.action = data.action;
    this.serverId = data.serverId;
    this.channelId = data.channelId;
    this.messageId = data.messageId;
    this.userId = data.userId;
    this.emote = data.emote;
    this.deletedBy = data.deletedBy;
  }

  get user(): User | undefined {
    const member = this.serverId
      ? this.state.cache.getMember(this.serverId, this.userId)
      : undefined;
    return member ?? this.state.cache.get("user", this.userId);
  }

  get message(): ChatMessage | undefined {
    return this.state.cache.get("message", this.messageId);
  }
}

/** A reaction on a cached message */
export class Reaction {
  constructor(
    readonly raw: RawReaction,
    readonly message: ChatMessage
  ) {}

  get emote() {
    return this.raw.emote;
  }

  get user() {
    return this.raw.user;
  }

  get action() {
    return this.raw.action;
  }
}
