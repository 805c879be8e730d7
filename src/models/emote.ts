import type { ClientState } from "../state";
import type { EmotePayload } from "../types/payloads";
import { Entity } from "./base";

export class Emote extends Entity {
  readonly id: string;
  name?: string;
  url?: string;
  serverId?: string;

  constructor(state: ClientState, data: EmotePayload) {
    super(state);
    this.id = data.id;
    this.name = data.name;
    this.url = data.url;
    this.serverId = data.serverId;
  }

  get cacheKey() {
    return this.id;
  }

  clone(): Emote {
    return Object.assign(new Emote(this.state, { id: this.id }), this);
  }
}
