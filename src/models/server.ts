import type { ClientState } from "../state";
import type { ServerPayload } from "../types/payloads";
import { Entity, toDate } from "./base";

export class Server extends Entity {
  readonly id: string;
  name?: string;
  ownerId?: string;
  type?: string;
  url?: string | null;
  about?: string | null;
  avatar?: string | null;
  banner?: string | null;
  timezone?: string | null;
  isVerified?: boolean;
  defaultChannelId?: string | null;
  createdAt?: Date;
  /** Built from an id alone because the server could not be fetched */
  partial: boolean;

  constructor(state: ClientState, data: ServerPayload, partial = false) {
    super(state);
    this.id = data.id;
    this.name = data.name;
    this.ownerId = data.ownerId;
    this.type = data.type;
    this.url = data.url;
    this.about = data.about;
    this.avatar = data.avatar;
    this.banner = data.banner;
    this.timezone = data.timezone;
    this.isVerified = data.isVerified;
    this.defaultChannelId = data.defaultChannelId;
    this.createdAt = toDate(data.createdAt);
    this.partial = partial;
  }

  get cacheKey() {
    return this.id;
  }

  get members() {
    return this.state.cache.membersOf(this.id);
  }

  get channels() {
    return this.state.cache.channelsOf(this.id);
  }

  get roles() {
    return this.state.cache.rolesOf(this.id);
  }

  get owner() {
    return this.ownerId ? this.getMember(this.ownerId) : undefined;
  }

  get defaultChannel() {
    return this.defaultChannelId
      ? this.state.cache.get("channel", this.defaultChannelId)
      : undefined;
  }

  getMember(userId: string) {
    return this.state.cache.getMember(this.id, userId);
  }

  getChannel(channelId: string) {
    const channel = this.state.cache.get("channel", channelId);
    return channel?.serverId === this.id ? channel : undefined;
  }

  getRole(roleId: string) {
    return this.state.cache.getRole(this.id, roleId);
  }

  clone(): Server {
    return Object.assign(new Server(this.state, { id: this.id }), this);
  }
}
