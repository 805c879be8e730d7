import { userPayload, id, UserPayload } from "../types/payloads";
import { isRecord, toError } from "../utils/helpers";
import { logger } from "../utils/logger";
import { v, Parser } from "../utils/validator";

export enum BotOpcodes {
  /** An event the client can catch up on after resuming */
  Missable = 0,
  Welcome = 1,
  Resumed = 2,
  InvalidCursor = 8,
  InternalError = 9,
}

export type HelloData = {
  /** Milliseconds between heartbeats */
  heartbeatInterval: number;
  lastMessageId: string | null;
  user?: UserPayload;
  sessionId?: string;
};

export type DispatchFrame = {
  kind: "dispatch";
  sequence: string | null;
  event: string;
  data: Record<string, unknown>;
};

export type Frame =
  | { kind: "hello"; sequence: string | null; data: HelloData }
  | DispatchFrame
  | { kind: "resumed"; sequence: string | null }
  | {
      kind: "error";
      sequence: string | null;
      reason: "invalid-cursor" | "internal";
      message: string;
    }
  | { kind: "noop"; sequence: string | null };

/** How a heartbeat goes out on the socket */
export type OutboundHeartbeat = { kind: "ping" } | { kind: "text"; data: string };

export type CodecVariant = "bot" | "userbot";

export interface FrameCodec {
  readonly variant: CodecVariant;
  /** Whether the server answers every heartbeat */
  readonly expectsAck: boolean;
  /** Returns `null` for input that is not a frame */
  decode(raw: string): Frame | null;
  heartbeat(): OutboundHeartbeat;
  /** Packet sent before a deliberate close, if the protocol has one */
  closeFrame(): string | null;
  /** Headers that ask the server to replay from `cursor` */
  resumeHeaders(cursor: string): Record<string, string>;
}

const parseJson = (raw: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    logger.warn(`Dropping unparseable gateway frame: ${toError(err).message}`);
    return { ok: false };
  }
};

const tryParse = <T>(parser: Parser<T>, value: unknown, what: string) => {
  try {
    return parser.parse(value);
  } catch (err) {
    logger.warn(`Dropping malformed ${what} frame: ${toError(err).message}`);
    return null;
  }
};

const botEnvelope = v.object({
  op: v.number().integer(),
  s: v.optional(id),
  t: v.string().optional(),
  d: v.unknown(),
});

const welcomeData = v.object({
  heartbeatIntervalMs: v.number().min(1),
  lastMessageId: v.string().optional().nullable(),
  user: userPayload.optional(),
});

const errorData = v.object({
  message: v.string().optional(),
});

/** Frames of the bot API: JSON envelopes of `{ op, s, t, d }` */
export class BotFrameCodec implements FrameCodec {
  readonly variant = "bot";
  readonly expectsAck = true;

  decode(raw: string): Frame | null {
    const json = parseJson(raw);
    if (!json.ok) return null;

    const envelope = tryParse(botEnvelope, json.value, "gateway");
    if (!envelope) return null;

    const sequence = envelope.s ?? null;
    switch (envelope.op) {
      case BotOpcodes.Welcome: {
        const welcome = tryParse(welcomeData, envelope.d, "welcome");
        if (!welcome) return null;
        return {
          kind: "hello",
          sequence,
          data: {
            heartbeatInterval: welcome.heartbeatIntervalMs,
            lastMessageId: welcome.lastMessageId ?? null,
            user: welcome.user,
          },
        };
      }
      case BotOpcodes.Missable: {
        if (!envelope.t) return { kind: "noop", sequence };
        return {
          kind: "dispatch",
          sequence,
          event: envelope.t,
          data: isRecord(envelope.d) ? envelope.d : {},
        };
      }
      case BotOpcodes.Resumed:
        return { kind: "resumed", sequence };
      case BotOpcodes.InvalidCursor:
      case BotOpcodes.InternalError: {
        const message = tryParse(errorData, envelope.d, "error")?.message;
        return {
          kind: "error",
          sequence,
          reason:
            envelope.op === BotOpcodes.InvalidCursor
              ? "invalid-cursor"
              : "internal",
          message: message ?? "No message provided",
        };
      }
      default:
        logger.warn(`Dropping gateway frame with unknown opcode ${envelope.op}`);
        return null;
    }
  }

  heartbeat(): OutboundHeartbeat {
    return { kind: "ping" };
  }

  closeFrame() {
    return null;
  }

  resumeHeaders(cursor: string) {
    return { "guilded-last-message-id": cursor };
  }
}

/** Removes the numeric packet-type prefix of a userbot frame */
export const stripPrefix = (raw: string) => raw.replace(/^\d+/, "");

export enum UserbotPackets {
  Heartbeat = "2",
  Close = "41",
  Event = "42",
}

const userbotHello = v.object({
  sid: v.string(),
  pingInterval: v.number().min(1),
  upgrades: v.array().optional(),
  pingTimeout: v.number().optional(),
});

/** Frames of the legacy user account socket, an Engine.IO style stream */
export class UserbotFrameCodec implements FrameCodec {
  readonly variant = "userbot";
  readonly expectsAck = false;

  decode(raw: string): Frame | null {
    const stripped = stripPrefix(raw);
    // Bare packet types such as the server's "3" carry nothing
    if (stripped.length === 0) return { kind: "noop", sequence: null };

    const json = parseJson(stripped);
    if (!json.ok) return null;
    const payload = json.value;

    if (Array.isArray(payload)) {
      const [tag, data] = payload;
      if (payload.length !== 2 || typeof tag !== "string") {
        return { kind: "noop", sequence: null };
      }
      return {
        kind: "dispatch",
        sequence: null,
        event: tag,
        data: isRecord(data) ? data : {},
      };
    }

    if (!isRecord(payload)) return { kind: "noop", sequence: null };

    if ("sid" in payload) {
      const hello = tryParse(userbotHello, payload, "hello");
      if (!hello) return null;
      return {
        kind: "hello",
        sequence: null,
        data: {
          heartbeatInterval: hello.pingInterval,
          lastMessageId: null,
          sessionId: hello.sid,
        },
      };
    }

    const { type, ...data } = payload;
    if (typeof type !== "string") return { kind: "noop", sequence: null };
    return { kind: "dispatch", sequence: null, event: type, data };
  }

  heartbeat(): OutboundHeartbeat {
    return { kind: "text", data: UserbotPackets.Heartbeat };
  }

  closeFrame() {
    return UserbotPackets.Close;
  }

  resumeHeaders(): Record<string, string> {
    return {};
  }

  encodeEvent(event: string, data: unknown) {
    return `${UserbotPackets.Event}${JSON.stringify([event, data])}`;
  }
}
