import { once } from "node:events";
import { AuthenticationError, ClientError, GatewayError } from "../src/errors";
import { EventRegistry } from "../src/events";
import {
  BotFrameCodec,
  DispatchFrame,
  UserbotFrameCodec,
} from "../src/gateway/codec";
import {
  FrameHandler,
  GatewayConnection,
  GatewayConnectionOptions,
} from "../src/gateway/connection";
import { EventDispatcher } from "../src/gateway/dispatcher";
import type { ChatMessage } from "../src/models/message";
import { sleep } from "../src/utils/helpers";
import { ConnectionStatus, GatewayEvents } from "../src/utils/types";
import { createSocketFactory, createState, FakeSocket, waitUntil } from "./fakes";

const HELLO = '{"op":1,"d":{"heartbeatIntervalMs":25000,"lastMessageId":"abc"}}';

const noopHandler: FrameHandler = {
  hello: async () => undefined,
  dispatch: async () => undefined,
};

describe("GatewayConnection", () => {
  let connection: GatewayConnection | undefined;
  let sockets: FakeSocket[];

  const connect = (options: Partial<GatewayConnectionOptions> = {}) => {
    const fake = createSocketFactory();
    sockets = fake.sockets;
    connection = new GatewayConnection({
      codec: new BotFrameCodec(),
      url: "wss://gateway.test/v1/websocket",
      headers: { Authorization: "Bearer test-secret" },
      handler: noopHandler,
      socketFactory: fake.factory,
      backoff: { base: 5, increment: 5 },
      ...options,
    });
    return connection;
  };

  /** Opens the connection and answers the first socket with hello */
  const open = async (options: Partial<GatewayConnectionOptions> = {}) => {
    const conn = connect(options);
    const opening = conn.open();
    sockets[0].receive(HELLO);
    await opening;
    return conn;
  };

  afterEach(async () => {
    if (connection && connection.status !== ConnectionStatus.Closed) {
      await connection.close();
    }
    connection = undefined;
  });

  test("connects once the hello frame arrives", async () => {
    const conn = connect();
    const connected = jest.fn();
    conn.on(GatewayEvents.Connect, connected);

    const opening = conn.open();
    expect(conn.status).toBe(ConnectionStatus.Handshaking);
    expect(sockets[0].request.url).toBe("wss://gateway.test/v1/websocket");
    expect(sockets[0].request.headers).toEqual({
      Authorization: "Bearer test-secret",
    });

    sockets[0].receive(HELLO);
    await opening;

    expect(conn.status).toBe(ConnectionStatus.Connected);
    expect(conn.lastMessageId).toBe("abc");
    expect(conn.health.connected).toBe(true);
    expect(connected).toHaveBeenCalledTimes(1);
  });

  test("pings a new socket before hello arrives", async () => {
    const conn = connect();

    const opening = conn.open();
    await waitUntil(() => sockets[0].pings === 1);

    expect(conn.status).toBe(ConnectionStatus.Handshaking);
    sockets[0].receive(HELLO);
    await opening;
    expect(sockets[0].sent).toEqual([]);
  });

  test("caches and dispatches a message received after hello", async () => {
    const state = createState();
    const events = new EventRegistry();
    const dispatcher = new EventDispatcher(state, events);
    const onMessage = jest.fn<void, [ChatMessage]>();
    events.on("message", onMessage);
    const received = events.waitFor("message");

    const conn = await open({
      handler: {
        hello: async () => undefined,
        dispatch: (frame) => dispatcher.handle(frame),
      },
    });
    sockets[0].receive(
      '{"op":0,"s":"1","t":"ChatMessageCreated","d":{"serverId":"S1","message":{"id":"M1","channelId":"C1","createdBy":"U1","content":"hi"}}}'
    );
    await received;

    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage.mock.calls[0][0].id).toBe("M1");
    expect(state.cache.get("message", "M1")?.content).toBe("hi");
    expect(conn.lastMessageId).toBe("1");
  });

  test("processes frames strictly in arrival order", async () => {
    const order: string[] = [];
    const dispatch = async (frame: DispatchFrame) => {
      if (frame.event === "Slow") await sleep(20);
      order.push(frame.event);
    };
    await open({ handler: { hello: async () => undefined, dispatch } });

    sockets[0].receive('{"op":0,"s":"2","t":"Slow","d":{}}');
    sockets[0].receive('{"op":0,"s":"3","t":"Fast","d":{}}');
    await waitUntil(() => order.length === 2);

    expect(order).toEqual(["Slow", "Fast"]);
  });

  test("emits raw frames in both directions", async () => {
    const conn = connect({ codec: new UserbotFrameCodec() });
    const received: string[] = [];
    const sent: string[] = [];
    conn.on(GatewayEvents.RawReceive, (payload) => received.push(payload));
    conn.on(GatewayEvents.RawSend, (payload) => sent.push(payload));

    const opening = conn.open();
    sockets[0].receive('0{"sid":"s1","upgrades":[],"pingInterval":25000}');
    await opening;
    await conn.send('42["ping",{}]');

    expect(received).toEqual(['0{"sid":"s1","upgrades":[],"pingInterval":25000}']);
    expect(sent).toEqual(['42["ping",{}]']);
    expect(sockets[0].sent).toEqual(['42["ping",{}]']);
  });

  test("heartbeats with pings and measures latency from pongs", async () => {
    const conn = connect();
    const opening = conn.open();
    sockets[0].receive('{"op":1,"d":{"heartbeatIntervalMs":5}}');
    await opening;
    expect(conn.latency).toBe(Infinity);

    // the first ping greets the socket, the second is the first heartbeat
    await waitUntil(() => sockets[0].pings > 1);
    sockets[0].handlers.pong();

    expect(Number.isFinite(conn.latency)).toBe(true);
    expect(conn.latency).toBeGreaterThanOrEqual(0);
  });

  test("sends text heartbeats and a close packet for user accounts", async () => {
    const conn = connect({ codec: new UserbotFrameCodec() });
    const opening = conn.open();
    sockets[0].receive('0{"sid":"s1","upgrades":[],"pingInterval":5}');
    await opening;

    await waitUntil(() => sockets[0].sent.includes("2"));
    await conn.close();

    expect(sockets[0].sent[sockets[0].sent.length - 1]).toBe("41");
    expect(sockets[0].closedWith?.code).toBe(1000);
  });

  test("reconnects with the resume cursor after the socket drops", async () => {
    const conn = await open();
    const disconnected = once(conn, GatewayEvents.Disconnect);
    const reconnected = once(conn, GatewayEvents.Reconnect);

    sockets[0].drop(1006, "gone");
    expect(await disconnected).toEqual([{ code: 1006, reason: "gone" }]);
    expect(conn.status).toBe(ConnectionStatus.Reconnecting);

    await waitUntil(() => sockets.length === 2);
    expect(sockets[1].request.headers).toEqual({
      Authorization: "Bearer test-secret",
      "guilded-last-message-id": "abc",
    });
    sockets[1].receive('{"op":1,"d":{"heartbeatIntervalMs":25000}}');
    await reconnected;

    expect(conn.status).toBe(ConnectionStatus.Connected);
    expect(conn.lastMessageId).toBe("abc");
    expect(conn.health.totalReconnects).toBe(1);
  });

  test("reconnects when a heartbeat cannot be sent", async () => {
    const conn = connect();
    const opening = conn.open();
    sockets[0].receive('{"op":1,"d":{"heartbeatIntervalMs":5}}');
    await opening;
    const disconnected = once(conn, GatewayEvents.Disconnect);
    sockets[0].ping = async () => {
      throw new Error("EPIPE");
    };

    expect(await disconnected).toEqual([{ code: 1006, reason: "EPIPE" }]);
    expect(conn.status).toBe(ConnectionStatus.Reconnecting);
    expect(sockets[0].terminated).toBe(true);

    await waitUntil(() => sockets.length === 2);
    sockets[1].receive(HELLO);
    await once(conn, GatewayEvents.Reconnect);
    expect(conn.status).toBe(ConnectionStatus.Connected);
  });

  test("starts one reconnect when a heartbeat fails as the socket closes", async () => {
    const conn = connect();
    const disconnects = jest.fn();
    conn.on(GatewayEvents.Disconnect, disconnects);
    const opening = conn.open();
    sockets[0].receive('{"op":1,"d":{"heartbeatIntervalMs":5}}');
    await opening;
    const first = sockets[0];
    first.ping = async () => {
      first.drop(1006, "gone");
      throw new Error("EPIPE");
    };

    await waitUntil(() => sockets.length === 2);
    first.drop(1006, "gone again");
    await sleep(30);

    expect(disconnects).toHaveBeenCalledTimes(1);
    expect(disconnects).toHaveBeenCalledWith({ code: 1006, reason: "gone" });
    expect(sockets).toHaveLength(2);
    expect(conn.status).toBe(ConnectionStatus.Reconnecting);
  });

  test("ignores a late close of a socket a failed heartbeat dropped", async () => {
    const conn = connect();
    const disconnects = jest.fn();
    conn.on(GatewayEvents.Disconnect, disconnects);
    const opening = conn.open();
    sockets[0].receive('{"op":1,"d":{"heartbeatIntervalMs":5}}');
    await opening;
    sockets[0].ping = async () => {
      throw new Error("EPIPE");
    };

    await waitUntil(() => sockets.length === 2);
    sockets[0].drop(1006, "closed late");
    await sleep(30);

    expect(disconnects).toHaveBeenCalledTimes(1);
    expect(disconnects).toHaveBeenCalledWith({ code: 1006, reason: "EPIPE" });
    expect(sockets).toHaveLength(2);
  });

  test("keeps retrying reconnects that fail", async () => {
    const conn = await open();
    const reconnected = once(conn, GatewayEvents.Reconnect);

    sockets[0].drop();
    await waitUntil(() => sockets.length === 2);
    sockets[1].drop();
    await waitUntil(() => sockets.length === 3);
    sockets[2].receive(HELLO);
    await reconnected;

    expect(conn.status).toBe(ConnectionStatus.Connected);
    expect(conn.health.reconnectAttempts).toBe(0);
  });

  test("closes for good when reconnecting is disabled", async () => {
    const conn = await open({ reconnect: false });
    const closed = once(conn, GatewayEvents.Closed);

    sockets[0].drop();
    await closed;

    expect(conn.status).toBe(ConnectionStatus.Closed);
    expect(sockets).toHaveLength(1);
  });

  test("forgets the cursor the gateway rejects", async () => {
    const conn = await open();
    expect(conn.lastMessageId).toBe("abc");

    sockets[0].receive('{"op":8,"d":{"message":"Invalid cursor"}}');
    await waitUntil(() => conn.lastMessageId === null);

    sockets[0].drop();
    await waitUntil(() => sockets.length === 2);
    expect(sockets[1].request.headers).toEqual({
      Authorization: "Bearer test-secret",
    });
  });

  test("fails at once when the credentials are rejected", async () => {
    const conn = connect();
    const errors: Error[] = [];
    conn.on(GatewayEvents.Error, ({ error }) => errors.push(error));

    const opening = conn.open();
    sockets[0].handlers.rejected(401);

    await expect(opening).rejects.toThrow(AuthenticationError);
    expect(conn.status).toBe(ConnectionStatus.Closed);
    expect(sockets).toHaveLength(1);
    expect(errors).toHaveLength(1);
  });

  test("gives up after the configured number of attempts", async () => {
    const conn = connect({ handshakeTimeout: 10, maxConnectAttempts: 2 });

    const opening = conn.open();

    await expect(opening).rejects.toThrow(GatewayError);
    await expect(opening).rejects.toThrow("Could not connect gateway after 2 attempts");
    expect(sockets).toHaveLength(2);
    expect(sockets.every((socket) => socket.terminated)).toBe(true);
    expect(conn.status).toBe(ConnectionStatus.Disconnected);
  });

  test("retries when the factory cannot create a socket", async () => {
    let calls = 0;
    const fake = createSocketFactory();
    const conn = connect({
      socketFactory: (request, handlers) => {
        calls++;
        if (calls === 1) throw new Error("ECONNREFUSED");
        return fake.factory(request, handlers);
      },
    });
    sockets = fake.sockets;

    const opening = conn.open();
    await waitUntil(() => sockets.length === 1);
    sockets[0].receive(HELLO);
    await opening;

    expect(calls).toBe(2);
    expect(conn.status).toBe(ConnectionStatus.Connected);
  });

  test("closes the socket and refuses to reopen", async () => {
    const conn = await open();
    const closed = jest.fn();
    conn.on(GatewayEvents.Closed, closed);

    await conn.close();

    expect(conn.status).toBe(ConnectionStatus.Closed);
    expect(sockets[0].closedWith).toEqual({
      code: 1000,
      reason: "Client closed the connection",
    });
    expect(closed).toHaveBeenCalledTimes(1);
    await expect(conn.open()).rejects.toThrow(ClientError);
    await expect(conn.send("{}")).rejects.toThrow(GatewayError);
  });

  test("stops waiting for hello when closed while opening", async () => {
    const conn = connect();

    const opening = conn.open();
    await conn.close();

    await expect(opening).rejects.toThrow("Connection gateway closed while opening");
  });
});
