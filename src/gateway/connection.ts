import { EventEmitter, once } from "node:events";
import { AsyncQueue } from "@sapphire/async-queue";
import { AuthenticationError, ClientError, GatewayError } from "../errors";
import { sleep, toError } from "../utils/helpers";
import { Logger, logger } from "../utils/logger";
import {
  ConnectionStatus,
  GatewayEvents,
  GatewayEventsMap,
} from "../utils/types";
import { BackoffOptions, ReconnectBackoff } from "./backoff";
import { DispatchFrame, Frame, FrameCodec, HelloData } from "./codec";
import { Heartbeater } from "./heartbeat";
import {
  createWebSocket,
  GatewaySocket,
  SocketFactory,
  SocketHandlers,
} from "./socket";

enum CloseCodes {
  Normal = 1_000,
  Abnormal = 1_006,
}

const AuthFailureStatuses = new Set([401, 403]);

/** What a connection hands its frames to, awaited before the next frame */
export interface FrameHandler {
  hello(data: HelloData, connection: GatewayConnection): Promise<void>;
  dispatch(frame: DispatchFrame, connection: GatewayConnection): Promise<void>;
}

export type GatewayConnectionOptions = {
  codec: FrameCodec;
  url: string;
  /** Credentials sent with every upgrade request */
  headers: Record<string, string>;
  handler: FrameHandler;
  label?: string;
  /** Set for per-server sockets of user accounts */
  serverId?: string | null;
  socketFactory?: SocketFactory;
  /** Reconnect after an unexpected disconnect, defaults to true */
  reconnect?: boolean;
  handshakeTimeout?: number;
  maxConnectAttempts?: number;
  maxReconnectAttempts?: number;
  backoff?: BackoffOptions;
  maxMissedAcks?: number;
};

type AttemptResult = { ok: true } | { ok: false; error: Error };

/**
 * One gateway socket and everything that keeps it alive: the handshake,
 * heartbeats, reconnects with the resume cursor, and strictly ordered frame
 * processing.
 */
export class GatewayConnection extends EventEmitter<GatewayEventsMap> {
  readonly label: string;
  readonly serverId: string | null;

  private readonly log: Logger;
  private readonly codec: FrameCodec;
  private readonly handler: FrameHandler;
  private readonly socketFactory: SocketFactory;
  private readonly heartbeater: Heartbeater;
  private readonly backoff: ReconnectBackoff;
  private readonly receiveQueue = new AsyncQueue();
  private readonly closeController = new AbortController();

  private readonly shouldReconnect: boolean;
  private readonly handshakeTimeout: number;
  private readonly maxConnectAttempts: number;
  private readonly maxReconnectAttempts: number;

  private socket: GatewaySocket | null = null;

  /** Bumped whenever a socket is dropped so its late callbacks are ignored */
  private generation = 0;

  private cursor: string | null = null;

  /** HTTP status of the last refused upgrade request */
  private rejectedStatus: number | null = null;

  private lastClose: { code: number; reason: string } | null = null;

  private reconnectAttempts = 0;
  private totalReconnects = 0;
  private connectedAt = 0;

  #status = ConnectionStatus.Disconnected;

  constructor(private readonly options: GatewayConnectionOptions) {
    super();
    this.codec = options.codec;
    this.handler = options.handler;
    this.label = options.label ?? "gateway";
    this.log = logger.child(this.label);
    this.serverId = options.serverId ?? null;
    this.socketFactory = options.socketFactory ?? createWebSocket;
    this.shouldReconnect = options.reconnect ?? true;
    this.handshakeTimeout = options.handshakeTimeout ?? 60_000;
    this.maxConnectAttempts = options.maxConnectAttempts ?? 5;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? Infinity;
    this.backoff = new ReconnectBackoff(options.backoff);
    this.heartbeater = new Heartbeater({
      expectsAck: this.codec.expectsAck,
      maxMissedAcks: options.maxMissedAcks,
      log: this.log,
      send: () => this.heartbeat(),
      onFailure: (error) => {
        void this.reconnect(CloseCodes.Abnormal, error.message);
      },
    });
  }

  get status() {
    return this.#status;
  }

  /** Milliseconds, `Infinity` until the first heartbeat is acknowledged */
  get latency() {
    return this.heartbeater.latency;
  }

  /** Resume cursor: id of the last frame received */
  get lastMessageId() {
    return this.cursor;
  }

  get health() {
    return {
      status: this.#status,
      connected: this.#status === ConnectionStatus.Connected,
      uptime: this.connectedAt ? Date.now() - this.connectedAt : 0,
      latency: this.latency,
      reconnectAttempts: this.reconnectAttempts,
      totalReconnects: this.totalReconnects,
    };
  }

  /**
   * Connects and waits for the hello frame, retrying with backoff.
   * Rejects once every attempt failed or the credentials were refused.
   */
  async open() {
    if (this.#status !== ConnectionStatus.Disconnected) {
      throw new ClientError(
        `Connection ${this.label} must be disconnected to open, it is ${this.#status}`
      );
    }

    this.#status = ConnectionStatus.Handshaking;
    for (let attempt = 1; ; attempt++) {
      const result = await this.attempt();
      if (result.ok) return;

      // close() may have run while the attempt was pending
      if (this.status === ConnectionStatus.Closed) {
        throw new GatewayError(`Connection ${this.label} closed while opening`);
      }
      if (result.error instanceof AuthenticationError) {
        this.terminate(result.error);
        throw result.error;
      }
      if (attempt >= this.maxConnectAttempts) {
        this.#status = ConnectionStatus.Disconnected;
        this.backoff.reset();
        throw new GatewayError(
          `Could not connect ${this.label} after ${attempt} attempts`,
          { cause: result.error }
        );
      }

      const delay = this.backoff.next();
      this.log.warn(
        `Connect attempt ${attempt}/${this.maxConnectAttempts} failed (${result.error.message}), retrying in ${delay}ms`
      );
      if (!(await this.wait(delay))) {
        throw new GatewayError(`Connection ${this.label} closed while opening`);
      }
    }
  }

  /** Sends a raw frame on the socket */
  async send(payload: string) {
    const socket = this.socket;
    if (!socket?.isOpen) {
      throw new GatewayError(`Connection ${this.label} is not open`);
    }
    this.emit(GatewayEvents.RawSend, payload);
    await socket.send(payload);
  }

  /** Closes the connection for good */
  async close(code: number = CloseCodes.Normal) {
    if (this.#status === ConnectionStatus.Closed) {
      this.log.warn("Connection is already closed");
      return;
    }

    this.log.info(`Closing the connection with code ${code}`);
    this.#status = ConnectionStatus.Closed;
    this.closeController.abort();
    this.heartbeater.stop();

    const socket = this.socket;
    this.socket = null;
    this.generation++;

    if (socket?.isOpen) {
      const closeFrame = this.codec.closeFrame();
      if (closeFrame) {
        this.emit(GatewayEvents.RawSend, closeFrame);
        await socket.send(closeFrame).catch((err: unknown) => {
          this.log.warn(
            `Could not send the close packet: ${toError(err).message}`
          );
        });
      }
    }
    if (socket) {
      await socket.close(code, "Client closed the connection");
    }

    this.emit(GatewayEvents.Closed);
  }

  private async waitForEvent(
    event: GatewayEvents,
    timeoutDuration: number
  ): Promise<{ ok: boolean }> {
    this.log.debug(
      `Waiting for event ${event} for ${timeoutDuration}ms`
    );
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutDuration);
    const onClose = () => controller.abort();
    this.closeController.signal.addEventListener("abort", onClose);

    try {
      const closed = await Promise.race<boolean>([
        once(this, event, { signal: controller.signal }).then(() => false),
        once(this, GatewayEvents.SocketClosed, {
          signal: controller.signal,
        }).then(() => true),
      ]);
      return { ok: !closed };
    } catch {
      this.log.debug(`Gave up waiting for event ${event}`);
      return { ok: false };
    } finally {
      clearTimeout(timeout);
      this.closeController.signal.removeEventListener("abort", onClose);
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }
  }

  /** One socket: upgrade, then wait for hello */
  private async attempt(): Promise<AttemptResult> {
    const generation = ++this.generation;
    this.rejectedStatus = null;
    this.lastClose = null;

    const headers = { ...this.options.headers };
    if (this.cursor) {
      Object.assign(headers, this.codec.resumeHeaders(this.cursor));
    }
    this.log.init(
      `Connecting to the gateway${
        this.cursor ? ` from message ${this.cursor}` : ""
      }`
    );

    const hello = this.waitForEvent(GatewayEvents.Hello, this.handshakeTimeout);
    try {
      this.socket = this.socketFactory(
        {
          url: this.options.url,
          headers,
          handshakeTimeout: this.handshakeTimeout,
        },
        this.handlersFor(generation)
      );
    } catch (err) {
      this.emitSocketClosed();
      await hello;
      return { ok: false, error: toError(err) };
    }

    const { ok } = await hello;
    if (ok && this.socket && this.#status !== ConnectionStatus.Closed) {
      this.#status = ConnectionStatus.Connected;
      this.connectedAt = Date.now();
      this.reconnectAttempts = 0;
      this.backoff.reset();
      this.log.ready("Connected to the gateway");
      this.emit(GatewayEvents.Connect);
      return { ok: true };
    }

    this.dropSocket();
    return { ok: false, error: this.attemptError() };
  }

  private attemptError() {
    if (this.closeController.signal.aborted) {
      return new GatewayError(`Connection ${this.label} was closed`);
    }
    if (this.rejectedStatus !== null) {
      return AuthFailureStatuses.has(this.rejectedStatus)
        ? new AuthenticationError(this.rejectedStatus)
        : new GatewayError(
            `The gateway refused the upgrade with HTTP ${this.rejectedStatus}`
          );
    }
    if (this.lastClose) {
      return new GatewayError(
        `The socket closed with code ${this.lastClose.code} before hello`
      );
    }
    return new GatewayError(
      `No hello frame within ${this.handshakeTimeout}ms`
    );
  }

  private handlersFor(generation: number): SocketHandlers {
    const isCurrent = () => generation === this.generation;
    return {
      open: () => {
        if (isCurrent()) void this.greet();
      },
      message: (data) => {
        if (isCurrent()) void this.receive(data);
      },
      pong: () => {
        if (isCurrent()) this.heartbeater.recordAck();
      },
      error: (error) => {
        if (!isCurrent()) return;
        this.log.warn(`Socket error: ${error.message}`);
        this.emit(GatewayEvents.Error, { error });
      },
      rejected: (status) => {
        if (!isCurrent()) return;
        this.rejectedStatus = status;
        this.emitSocketClosed();
      },
      close: (code, reason) => {
        if (isCurrent()) this.onSocketClose(code, reason);
      },
    };
  }

  private emitSocketClosed(code: number = CloseCodes.Abnormal, reason = "") {
    this.lastClose = { code, reason };
    this.emit(GatewayEvents.SocketClosed, { code, reason });
  }

  private onSocketClose(code: number, reason: string) {
    this.socket = null;
    this.heartbeater.stop();
    this.emitSocketClosed(code, reason);

    if (this.#status === ConnectionStatus.Connected) {
      this.log.warn(
        `The gateway closed with code ${code}${reason ? `: ${reason}` : ""}`
      );
      void this.reconnect(code, reason);
    }
  }

  private async reconnect(code: number, reason: string) {
    // Only a live connection may start a reconnect, so concurrent triggers collapse
    if (this.#status !== ConnectionStatus.Connected) return;

    this.#status = ConnectionStatus.Reconnecting;
    this.heartbeater.stop();
    this.dropSocket();
    this.emit(GatewayEvents.Disconnect, { code, reason });

    if (!this.shouldReconnect) {
      this.log.warn("Disconnected and reconnecting is disabled");
      this.terminate();
      return;
    }

    while (this.#status === ConnectionStatus.Reconnecting) {
      this.reconnectAttempts++;
      if (this.reconnectAttempts > this.maxReconnectAttempts) {
        this.terminate(
          new GatewayError(
            `Exceeded the maximum of ${this.maxReconnectAttempts} reconnect attempts`
          )
        );
        return;
      }

      const delay = this.backoff.next();
      this.log.warn(
        `Reconnect attempt ${this.reconnectAttempts}, waiting ${delay}ms${
          this.cursor ? ` to resume from message ${this.cursor}` : ""
        }`
      );
      if (!(await this.wait(delay))) return;

      const result = await this.attempt();
      if (result.ok) {
        this.totalReconnects++;
        this.emit(GatewayEvents.Reconnect);
        return;
      }
      if (this.#status !== ConnectionStatus.Reconnecting) return;
      if (result.error instanceof AuthenticationError) {
        this.terminate(result.error);
        return;
      }
      this.log.warn(`Reconnect failed: ${result.error.message}`);
    }
  }

  /** Moves to the terminal state after a failure nothing can recover from */
  private terminate(error?: Error) {
    if (error) {
      this.log.error(error.message);
      this.emit(GatewayEvents.Error, { error });
    }
    this.#status = ConnectionStatus.Closed;
    this.closeController.abort();
    this.heartbeater.stop();
    this.dropSocket();
    this.emit(GatewayEvents.Closed);
  }

  private dropSocket() {
    this.generation++;
    const socket = this.socket;
    this.socket = null;
    socket?.terminate();
  }

  /** Resolves false when the connection was closed during the wait */
  private async wait(ms: number) {
    try {
      await sleep(ms, undefined, { signal: this.closeController.signal });
      return true;
    } catch {
      return false;
    }
  }

  /** Pings a freshly opened socket, then hello is awaited */
  private async greet() {
    const socket = this.socket;
    if (!socket?.isOpen) return;
    this.log.debug("Socket open, pinging and waiting for hello");
    try {
      await socket.ping();
    } catch (err) {
      this.log.warn(`Could not ping the new socket: ${toError(err).message}`);
    }
  }

  private async heartbeat() {
    const heartbeat = this.codec.heartbeat();
    if (heartbeat.kind === "text") {
      await this.send(heartbeat.data);
      return;
    }

    const socket = this.socket;
    if (!socket?.isOpen) {
      throw new GatewayError(`Connection ${this.label} is not open`);
    }
    await socket.ping();
  }

  private async receive(raw: string) {
    await this.receiveQueue.wait();
    try {
      if (this.#status === ConnectionStatus.Closed) return;
      await this.process(raw);
    } catch (err) {
      const error = toError(err);
      this.log.error("Failed to process a frame:", error);
      this.emit(GatewayEvents.Error, { error });
    } finally {
      this.receiveQueue.shift();
    }
  }

  private async process(raw: string) {
    this.log.debug("Received", raw);
    this.emit(GatewayEvents.RawReceive, raw);

    const frame = this.codec.decode(raw);
    if (!frame) return;
    this.advanceCursor(frame);

    switch (frame.kind) {
      case "hello": {
        if (frame.data.lastMessageId) {
          this.cursor = frame.data.lastMessageId;
        }
        this.heartbeater.start(frame.data.heartbeatInterval);
        this.emit(GatewayEvents.Hello, frame.data);
        await this.handler.hello(frame.data, this);
        break;
      }
      case "dispatch":
        await this.handler.dispatch(frame, this);
        break;
      case "resumed":
        this.log.ready("Caught up on missed events");
        break;
      case "error": {
        if (frame.reason === "invalid-cursor") {
          this.log.error(
            `The gateway rejected the resume cursor: ${frame.message}`
          );
          this.cursor = null;
        } else {
          this.log.error(
            `The gateway reported an internal error: ${frame.message}`
          );
        }
        break;
      }
      case "noop":
        break;
    }
  }

  private advanceCursor(frame: Frame) {
    if (frame.sequence !== null) {
      this.cursor = frame.sequence;
    }
  }
}
