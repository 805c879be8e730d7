import type { WebhookPayload } from "../types/payloads";
import { toDate } from "./base";

/** Webhooks are delivered to handlers but never cached */
export class Webhook {
  readonly id: string;
  readonly serverId: string;
  readonly channelId: string;
  readonly name: string;
  readonly avatar: string | null;
  readonly token?: string;
  readonly createdAt?: Date;
  readonly createdBy?: string;
  readonly deletedAt?: Date;

  constructor(data: WebhookPayload & { serverId: string }) {
    this.id = data.id;
    this.serverId = data.serverId;
    this.channelId = data.channelId;
    this.name = data.name;
    this.avatar = data.avatar ?? null;
    this.token = data.token;
    this.createdAt = toDate(data.createdAt);
    this.createdBy = data.createdBy;
    this.deletedAt = toDate(data.deletedAt);
  }

  get deleted() {
    return this.deletedAt !== undefined;
  }
}
