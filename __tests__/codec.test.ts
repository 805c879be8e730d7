import {
  BotFrameCodec,
  stripPrefix,
  UserbotFrameCodec,
} from "../src/gateway/codec";

describe("BotFrameCodec", () => {
  const codec = new BotFrameCodec();

  test("decodes the welcome frame into hello data", () => {
    const frame = codec.decode(
      '{"op":1,"d":{"heartbeatIntervalMs":25000,"lastMessageId":"abc"}}'
    );
    expect(frame).toEqual({
      kind: "hello",
      sequence: null,
      data: { heartbeatInterval: 25000, lastMessageId: "abc" },
    });
  });

  test("keeps the self profile of the welcome frame", () => {
    const frame = codec.decode(
      JSON.stringify({
        op: 1,
        d: {
          heartbeatIntervalMs: 22500,
          user: { id: "B1", name: "Helper", type: "bot" },
        },
      })
    );
    expect(frame?.kind).toBe("hello");
    if (frame?.kind !== "hello") return;
    expect(frame.data.lastMessageId).toBeNull();
    expect(frame.data.user).toEqual({ id: "B1", name: "Helper", type: "bot" });
  });

  test("decodes missable frames into dispatches", () => {
    const frame = codec.decode(
      '{"op":0,"s":"1","t":"ChatMessageCreated","d":{"serverId":"S1"}}'
    );
    expect(frame).toEqual({
      kind: "dispatch",
      sequence: "1",
      event: "ChatMessageCreated",
      data: { serverId: "S1" },
    });
  });

  test("turns numeric sequences into strings", () => {
    const frame = codec.decode('{"op":0,"s":5,"t":"ChatChannelTyping","d":{}}');
    expect(frame?.sequence).toBe("5");
  });

  test("treats a missable frame without an event name as a noop", () => {
    expect(codec.decode('{"op":0,"s":"9"}')).toEqual({
      kind: "noop",
      sequence: "9",
    });
  });

  test("decodes resumed and error frames", () => {
    expect(codec.decode('{"op":2}')).toEqual({ kind: "resumed", sequence: null });
    expect(codec.decode('{"op":8,"d":{"message":"bad cursor"}}')).toEqual({
      kind: "error",
      sequence: null,
      reason: "invalid-cursor",
      message: "bad cursor",
    });
    expect(codec.decode('{"op":9}')).toEqual({
      kind: "error",
      sequence: null,
      reason: "internal",
      message: "No message provided",
    });
  });

  test("drops malformed frames", () => {
    expect(codec.decode("not json")).toBeNull();
    expect(codec.decode('{"op":"one"}')).toBeNull();
    expect(codec.decode('{"op":42}')).toBeNull();
    expect(codec.decode('{"op":1,"d":{}}')).toBeNull();
  });

  test("heartbeats with ping control frames", () => {
    expect(codec.expectsAck).toBe(true);
    expect(codec.heartbeat()).toEqual({ kind: "ping" });
    expect(codec.closeFrame()).toBeNull();
  });

  test("asks to resume through the last message header", () => {
    expect(codec.resumeHeaders("42")).toEqual({
      "guilded-last-message-id": "42",
    });
  });
});

describe("stripPrefix", () => {
  test("removes the packet type", () => {
    expect(stripPrefix('42["ChatMessageCreated",{}]')).toBe(
      '["ChatMessageCreated",{}]'
    );
    expect(stripPrefix("3")).toBe("");
  });

  test("is idempotent", () => {
    const once = stripPrefix('0{"sid":"abc"}');
    expect(stripPrefix(once)).toBe(once);
  });
});

describe("UserbotFrameCodec", () => {
  const codec = new UserbotFrameCodec();

  test("decodes the open packet into hello data", () => {
    const frame = codec.decode(
      '0{"sid":"abc","upgrades":[],"pingInterval":25000,"pingTimeout":60000}'
    );
    expect(frame).toEqual({
      kind: "hello",
      sequence: null,
      data: { heartbeatInterval: 25000, lastMessageId: null, sessionId: "abc" },
    });
  });

  test("decodes tagged arrays into dispatches", () => {
    expect(codec.decode('42["ChatMessageCreated",{"channelId":"C1"}]')).toEqual({
      kind: "dispatch",
      sequence: null,
      event: "ChatMessageCreated",
      data: { channelId: "C1" },
    });
  });

  test("takes the event name of plain objects from their type", () => {
    expect(
      codec.decode('42{"type":"ChatChannelTyping","channelId":"C1","userId":"U1"}')
    ).toEqual({
      kind: "dispatch",
      sequence: null,
      event: "ChatChannelTyping",
      data: { channelId: "C1", userId: "U1" },
    });
  });

  test("treats bare packet types and odd arrays as noops", () => {
    expect(codec.decode("3")).toEqual({ kind: "noop", sequence: null });
    expect(codec.decode("40")).toEqual({ kind: "noop", sequence: null });
    expect(codec.decode('42["lonely"]')).toEqual({ kind: "noop", sequence: null });
    expect(codec.decode('42{"channelId":"C1"}')).toEqual({
      kind: "noop",
      sequence: null,
    });
  });

  test("drops unparseable frames", () => {
    expect(codec.decode("42[oops")).toBeNull();
  });

  test("decodes a stripped frame the same way every time", () => {
    const stripped = stripPrefix('42["ChatMessageDeleted",{"channelId":"C1"}]');
    expect(codec.decode(stripped)).toEqual(codec.decode(stripped));
    expect(codec.decode(stripped)).toEqual(
      codec.decode('42["ChatMessageDeleted",{"channelId":"C1"}]')
    );
  });

  test("encodes heartbeats, close packets and client events", () => {
    expect(codec.expectsAck).toBe(false);
    expect(codec.heartbeat()).toEqual({ kind: "text", data: "2" });
    expect(codec.closeFrame()).toBe("41");
    expect(codec.resumeHeaders()).toEqual({});
    expect(codec.encodeEvent("ping", { a: 1 })).toBe('42["ping",{"a":1}]');
  });
});
