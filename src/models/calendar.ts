import type {
  CalendarEventPayload,
  CalendarRsvpPayload,
} from "../types/payloads";
import { toDate } from "./base";
import type { ServerChannel } from "./channel";

export type RsvpStatus = CalendarRsvpPayload["status"];

export type CalendarEventCancellation = {
  description?: string;
  createdBy: string;
};

/** An event of a calendar channel; delivered to handlers, never cached */
export class CalendarEvent {
  readonly id: string;
  readonly serverId: string;
  readonly channelId: string;
  readonly channel: ServerChannel;
  readonly name?: string;
  readonly description?: string;
  readonly location?: string;
  readonly url?: string;
  readonly color?: number;
  readonly repeats: boolean;
  readonly rsvpLimit?: number;
  readonly startsAt?: Date;
  /** Minutes */
  readonly duration?: number;
  readonly isPrivate: boolean;
  readonly createdAt?: Date;
  readonly createdBy?: string;
  readonly cancellation: CalendarEventCancellation | null;

  constructor(data: CalendarEventPayload, channel: ServerChannel) {
    this.id = data.id;
    this.serverId = data.serverId ?? channel.serverId;
    this.channelId = data.channelId;
    this.channel = channel;
    this.name = data.name;
    this.description = data.description;
    this.location = data.location;
    this.url = data.url;
    this.color = data.color;
    this.repeats = data.repeats ?? false;
    this.rsvpLimit = data.rsvpLimit;
    this.startsAt = toDate(data.startsAt);
    this.duration = data.duration;
    this.isPrivate = data.isPrivate ?? false;
    this.createdAt = toDate(data.createdAt);
    this.createdBy = data.createdBy;
    this.cancellation = data.cancellation ?? null;
  }

  get cancelled() {
    return this.cancellation !== null;
  }

  get endsAt() {
    if (!this.startsAt || this.duration === undefined) return undefined;
    return new Date(this.startsAt.getTime() + this.duration * 60_000);
  }
}

export class CalendarEventRsvp {
  readonly event: CalendarEvent;
  readonly userId: string;
  readonly status: RsvpStatus;
  readonly createdBy?: string;
  readonly createdAt?: Date;
  readonly updatedBy?: string;
  readonly updatedAt?: Date;

  constructor(data: CalendarRsvpPayload, event: CalendarEvent) {
    this.event = event;
    this.userId = data.userId;
    this.status = data.status;
    this.createdBy = data.createdBy;
    this.createdAt = toDate(data.createdAt);
    this.updatedBy = data.updatedBy;
    this.updatedAt = toDate(data.updatedAt);
  }

  get serverId() {
    return this.event.serverId;
  }

  get channelId() {
    return this.event.channelId;
  }
}
