import { memberKey } from "../cache/keys";
import type { ClientState } from "../state";
import type { MemberPayload, UserPayload } from "../types/payloads";
import { Entity, toDate } from "./base";
import type { Role } from "./role";
import type { Server } from "./server";

/** Posts system messages on Guilded, never resolved as an author */
export const SYSTEM_USER_ID = "Ann6LewA";

export class User extends Entity {
  readonly id: string;
  type?: "bot" | "user";
  name?: string;
  avatar?: string | null;
  banner?: string | null;
  createdAt?: Date;

  constructor(state: ClientState, data: UserPayload) {
    super(state);
    this.id = data.id;
    this.type = data.type;
    this.name = data.name;
    this.avatar = data.avatar;
    this.banner = data.banner;
    this.createdAt = toDate(data.createdAt);
  }

  get cacheKey() {
    return this.id;
  }

  get bot() {
    return this.type === "bot";
  }

  get mention() {
    return `<@${this.id}>`;
  }

  get displayName() {
    return this.name ?? this.id;
  }

  clone(): User {
    return Object.assign(new User(this.state, { id: this.id }), this);
  }
}

/** The account the client is logged in as */
export class ClientUser extends User {
  botId?: string;
  createdBy?: string;

  constructor(state: ClientState, data: UserPayload) {
    super(state, data);
    this.botId = data.botId;
    this.createdBy = data.createdBy;
  }

  clone(): ClientUser {
    return Object.assign(new ClientUser(this.state, { id: this.id }), this);
  }
}

export type MemberInit = Omit<MemberPayload, "user"> & {
  serverId: string;
  user: UserPayload;
};

/** A user in the context of one server */
export class Member extends User {
  readonly serverId: string;
  nickname?: string | null;
  /** `undefined` until the member's roles are known */
  roleIds?: string[];
  joinedAt?: Date;
  isOwner?: boolean;

  constructor(state: ClientState, data: MemberInit) {
    super(state, data.user);
    this.serverId = data.serverId;
    this.nickname = data.nickname;
    this.roleIds = data.roleIds;
    this.joinedAt = toDate(data.joinedAt);
    this.isOwner = data.isOwner;
  }

  get cacheKey() {
    return memberKey(this.serverId, this.id);
  }

  get displayName() {
    return this.nickname ?? super.displayName;
  }

  get server(): Server | undefined {
    return this.state.cache.get("server", this.serverId);
  }

  get roles(): Role[] {
    return (this.roleIds ?? []).flatMap((roleId) => {
      const role = this.state.cache.getRole(this.serverId, roleId);
      return role ? [role] : [];
    });
  }

  clone(): Member {
    return Object.assign(
      new Member(this.state, { serverId: this.serverId, user: { id: this.id } }),
      this,
      { roleIds: this.roleIds && [...this.roleIds] }
    );
  }
}
