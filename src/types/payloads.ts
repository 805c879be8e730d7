import { v, Infer, Parser, ValidationError } from "../utils/validator";
import { InvalidDataError } from "../errors";
import { toError } from "../utils/helpers";

/** Guilded ids are strings, except for roles and emotes, which are integers */
export const id: Parser<string> = {
  parse(arg) {
    if (typeof arg === "number" && Number.isInteger(arg)) return String(arg);
    if (typeof arg === "string" && arg.length > 0) return arg;
    throw new ValidationError(`\`${String(arg)}\` is not an id`);
  },
};

const ids = v.array().of(id);
const timestamp = v.string().optional();

export const userPayload = v.object({
  id,
  type: v.enum(["bot", "user"] as const).optional(),
  name: v.string().optional(),
  avatar: v.string().optional().nullable(),
  banner: v.string().optional().nullable(),
  createdAt: timestamp,
  botId: v.string().optional(),
  createdBy: v.string().optional(),
});

export const memberPayload = v.object({
  user: userPayload,
  roleIds: ids.optional(),
  nickname: v.string().optional().nullable(),
  joinedAt: timestamp,
  isOwner: v.boolean().optional(),
});

export const serverPayload = v.object({
  id,
  ownerId: v.string().optional(),
  type: v.string().optional(),
  name: v.string().optional(),
  url: v.string().optional().nullable(),
  about: v.string().optional().nullable(),
  avatar: v.string().optional().nullable(),
  banner: v.string().optional().nullable(),
  timezone: v.string().optional().nullable(),
  isVerified: v.boolean().optional(),
  defaultChannelId: v.string().optional().nullable(),
  createdAt: timestamp,
});

export const channelPayload = v.object({
  id,
  type: v.string().optional(),
  name: v.string().optional(),
  topic: v.string().optional().nullable(),
  serverId: v.string().optional(),
  parentId: v.string().optional().nullable(),
  messageId: v.string().optional().nullable(),
  categoryId: v.optional(id).nullable(),
  groupId: v.string().optional(),
  isPublic: v.boolean().optional(),
  createdAt: timestamp,
  createdBy: v.string().optional(),
  updatedAt: timestamp,
  archivedAt: timestamp,
  archivedBy: v.string().optional(),
});

export const messagePayload = v.object({
  id,
  type: v.string().optional(),
  serverId: v.string().optional(),
  groupId: v.string().optional(),
  channelId: v.string().optional(),
  content: v.string().optional(),
  embeds: v.array().optional(),
  replyMessageIds: ids.optional(),
  isPrivate: v.boolean().optional(),
  isSilent: v.boolean().optional(),
  isPinned: v.boolean().optional(),
  mentions: v.unknown(),
  createdAt: timestamp,
  createdBy: v.string().optional(),
  createdByWebhookId: v.string().optional(),
  updatedAt: timestamp,
  deletedAt: timestamp,
});

export const rolePayload = v.object({
  id: v.optional(id),
  serverId: v.string().optional(),
  name: v.string().optional(),
  color: v.unknown(),
  permissions: v.array().of(v.string()).optional(),
  position: v.number().optional(),
  priority: v.number().optional(),
  isBase: v.boolean().optional(),
  isMentionable: v.boolean().optional(),
  isSelfAssignable: v.boolean().optional(),
  isDisplayedSeparately: v.boolean().optional(),
  createdAt: timestamp,
  updatedAt: timestamp,
});

export const emotePayload = v.object({
  id,
  name: v.string().optional(),
  url: v.string().optional(),
  serverId: v.string().optional(),
});

export const webhookPayload = v.object({
  id,
  serverId: v.string().optional(),
  channelId: v.string(),
  name: v.string(),
  avatar: v.string().optional().nullable(),
  token: v.string().optional(),
  createdAt: timestamp,
  createdBy: v.string().optional(),
  deletedAt: timestamp,
});

export const calendarEventPayload = v.object({
  id,
  serverId: v.string().optional(),
  channelId: v.string(),
  name: v.string().optional(),
  description: v.string().optional(),
  location: v.string().optional(),
  url: v.string().optional(),
  color: v.number().optional(),
  repeats: v.boolean().optional(),
  rsvpLimit: v.number().optional(),
  startsAt: timestamp,
  duration: v.number().optional(),
  isPrivate: v.boolean().optional(),
  mentions: v.unknown(),
  createdAt: timestamp,
  createdBy: v.string().optional(),
  cancellation: v
    .object({
      description: v.string().optional(),
      createdBy: v.string(),
    })
    .optional(),
});

export const rsvpStatuses = [
  "going",
  "maybe",
  "declined",
  "invited",
  "waitlisted",
  "not responded",
] as const;

export const calendarRsvpPayload = v.object({
  calendarEventId: id,
  channelId: v.string().optional(),
  serverId: v.string().optional(),
  userId: v.string(),
  status: v.enum(rsvpStatuses),
  createdBy: v.string().optional(),
  createdAt: timestamp,
  updatedBy: v.string().optional(),
  updatedAt: timestamp,
});

const serverScoped = {
  serverId: v.string().optional(),
  teamId: v.string().optional(),
};

export const messageEvent = v.object({
  ...serverScoped,
  channelId: v.string().optional(),
  createdBy: v.string().optional(),
  message: messagePayload,
});

export const messageDeletedEvent = v.object({
  ...serverScoped,
  channelId: v.string().optional(),
  message: v.object({
    id,
    serverId: v.string().optional(),
    channelId: v.string().optional(),
    deletedAt: timestamp,
    isPrivate: v.boolean().optional(),
  }),
});

export const memberJoinedEvent = v.object({
  ...serverScoped,
  member: memberPayload,
});

export const memberRemovedEvent = v.object({
  ...serverScoped,
  userId: v.string(),
  isKick: v.boolean().optional(),
  isBan: v.boolean().optional(),
});

export const memberUpdatedEvent = v.object({
  ...serverScoped,
  userInfo: v.object({
    id: v.string(),
    nickname: v.string().optional().nullable(),
  }),
});

export const rolesUpdatedEvent = v.object({
  ...serverScoped,
  memberRoleIds: v
    .array()
    .of(v.object({ userId: v.string(), roleIds: ids }))
    .optional(),
  rolesById: v.record(v.unknown()).optional(),
});

export const channelEvent = v.object({
  ...serverScoped,
  channel: channelPayload,
});

export const reactionEvent = v.object({
  ...serverScoped,
  deletedBy: v.string().optional(),
  reaction: v.object({
    channelId: v.string(),
    messageId: v.string(),
    createdBy: v.string(),
    emote: emotePayload,
  }),
});

export const webhookEvent = v.object({
  ...serverScoped,
  webhook: webhookPayload,
});

export const membershipEvent = v.object({
  server: serverPayload,
  createdBy: v.string().optional(),
  deletedBy: v.string().optional(),
});

export const calendarEventEvent = v.object({
  ...serverScoped,
  calendarEvent: calendarEventPayload,
});

export const calendarRsvpEvent = v.object({
  ...serverScoped,
  calendarEventRsvp: calendarRsvpPayload,
});

export const typingEvent = v.object({
  ...serverScoped,
  channelId: v.string(),
  userId: v.string(),
});

export const pinEvent = v.object({
  ...serverScoped,
  channelId: v.string(),
  updatedBy: v.string().optional(),
  message: messagePayload,
});

export type UserPayload = Infer<typeof userPayload>;
export type MemberPayload = Infer<typeof memberPayload>;
export type ServerPayload = Infer<typeof serverPayload>;
export type ChannelPayload = Infer<typeof channelPayload>;
export type MessagePayload = Infer<typeof messagePayload>;
export type RolePayload = Infer<typeof rolePayload>;
export type EmotePayload = Infer<typeof emotePayload>;
export type WebhookPayload = Infer<typeof webhookPayload>;
export type CalendarEventPayload = Infer<typeof calendarEventPayload>;
export type CalendarRsvpPayload = Infer<typeof calendarRsvpPayload>;
export type MessageEventPayload = Infer<typeof messageEvent>;
export type MessageDeletedEventPayload = Infer<typeof messageDeletedEvent>;
export type MemberRemovedEventPayload = Infer<typeof memberRemovedEvent>;
export type ReactionEventPayload = Infer<typeof reactionEvent>;

/** Parses a wire payload, reporting failures as {@link InvalidDataError} */
export const parsePayload = <T>(
  parser: Parser<T>,
  data: unknown,
  what: string
): T => {
  try {
    return parser.parse(data);
  } catch (err) {
    throw new InvalidDataError(
      `Invalid ${what} payload: ${toError(err).message}`,
      { cause: err }
    );
  }
};
