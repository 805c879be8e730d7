import type { DMChannel, ServerChannel } from "../models/channel";
import type { Emote } from "../models/emote";
import type { ChatMessage } from "../models/message";
import type { Role } from "../models/role";
import type { Server } from "../models/server";
import type { Member, User } from "../models/user";
import { Collection } from "../utils/collection";
import { memberKey, roleKey } from "./keys";

export type EntityMap = {
  server: Server;
  channel: ServerChannel;
  member: Member;
  user: User;
  role: Role;
  message: ChatMessage;
  emote: Emote;
  dm: DMChannel;
};

export type CacheCategory = keyof EntityMap;

type Stores = { [C in CacheCategory]: Collection<string, EntityMap[C]> };

export const DEFAULT_MAX_MESSAGES = 1000;

export type EntityCacheOptions = {
  /** Bound on cached messages, `null` stops messages from being cached */
  maxMessages?: number | null;
};

/**
 * Process-local store of every entity the client has seen, one collection
 * per category. Writers replace or merge whole entries through `upsert`,
 * `insertMessage` and `remove`; readers get the live instances.
 */
export class EntityCache {
  readonly maxMessages: number | null;

  private readonly stores: Stores = {
    server: new Collection(),
    channel: new Collection(),
    member: new Collection(),
    user: new Collection(),
    role: new Collection(),
    message: new Collection(),
    emote: new Collection(),
    dm: new Collection(),
  };

  constructor({ maxMessages = DEFAULT_MAX_MESSAGES }: EntityCacheOptions = {}) {
    this.maxMessages = maxMessages;
  }

  get<C extends CacheCategory>(
    category: C,
    key: string
  ): EntityMap[C] | undefined {
    return this.stores[category].get(key);
  }

  /**
   * Inserts the entity, or merges its defined fields into the entry already
   * stored under the same key. Returns the instance that is now cached.
   */
  upsert<C extends CacheCategory>(
    category: C,
    entity: EntityMap[C]
  ): EntityMap[C] {
    const store = this.stores[category];
    const existing = store.get(entity.cacheKey);
    if (existing) {
      existing.assign(entity);
      return existing;
    }
    store.set(entity.cacheKey, entity);
    return entity;
  }

  remove<C extends CacheCategory>(
    category: C,
    key: string
  ): EntityMap[C] | undefined {
    const store = this.stores[category];
    const existing = store.get(key);
    store.delete(key);
    return existing;
  }

  /** Upserts a message, evicting the oldest ones past `maxMessages` */
  insertMessage(message: ChatMessage): ChatMessage {
    if (this.maxMessages === null) return message;

    const stored = this.upsert("message", message);
    const store = this.stores.message;
    while (store.size > this.maxMessages) {
      const oldest = store.firstKey;
      if (oldest === undefined) break;
      store.delete(oldest);
    }
    return stored;
  }

  values<C extends CacheCategory>(category: C): EntityMap[C][] {
    return this.stores[category].valuesArray;
  }

  size(category: CacheCategory) {
    return this.stores[category].size;
  }

  getMember(serverId: string, userId: string) {
    return this.stores.member.get(memberKey(serverId, userId));
  }

  getRole(serverId: string, roleId: string) {
    return this.stores.role.get(roleKey(serverId, roleId));
  }

  membersOf(serverId: string) {
    return this.stores.member.filter((member) => member.serverId === serverId);
  }

  channelsOf(serverId: string) {
    return this.stores.channel.filter(
      (channel) => channel.serverId === serverId
    );
  }

  rolesOf(serverId: string) {
    return this.stores.role.filter((role) => role.serverId === serverId);
  }

  /** Drops a server together with its members, channels and roles */
  purgeServer(serverId: string) {
    const belongs = (entity: { serverId: string }) =>
      entity.serverId === serverId;
    this.stores.member.sweep(belongs);
    this.stores.channel.sweep(belongs);
    this.stores.role.sweep(belongs);
    return this.remove("server", serverId);
  }

  clear() {
    for (const store of Object.values(this.stores)) {
      store.clear();
    }
  }
}
