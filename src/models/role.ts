import { roleKey } from "../cache/keys";
import type { ClientState } from "../state";
import type { RolePayload } from "../types/payloads";
import { Entity, toDate } from "./base";

export class Role extends Entity {
  readonly id: string;
  readonly serverId: string;
  name?: string;
  color?: unknown;
  permissions?: string[];
  position?: number;
  isBase?: boolean;
  isMentionable?: boolean;
  isSelfAssignable?: boolean;
  isDisplayedSeparately?: boolean;
  createdAt?: Date;
  updatedAt?: Date;

  constructor(
    state: ClientState,
    data: RolePayload & { id: string; serverId: string }
  ) {
    super(state);
    this.id = data.id;
    this.serverId = data.serverId;
    this.name = data.name;
    this.color = data.color;
    this.permissions = data.permissions;
    this.position = data.position ?? data.priority;
    this.isBase = data.isBase;
    this.isMentionable = data.isMentionable;
    this.isSelfAssignable = data.isSelfAssignable;
    this.isDisplayedSeparately = data.isDisplayedSeparately;
    this.createdAt = toDate(data.createdAt);
    this.updatedAt = toDate(data.updatedAt);
  }

  get cacheKey() {
    return roleKey(this.serverId, this.id);
  }

  get mention() {
    return `<@${this.id}>`;
  }

  clone(): Role {
    return Object.assign(
      new Role(this.state, { id: this.id, serverId: this.serverId }),
      this
    );
  }
}
