import WebSocket from "ws";
import { toError } from "../utils/helpers";
import { logger } from "../utils/logger";

export type SocketRequest = {
  url: string;
  headers: Record<string, string>;
  handshakeTimeout: number;
};

export type SocketHandlers = {
  open(): void;
  message(data: string): void;
  close(code: number, reason: string): void;
  error(error: Error): void;
  /** A pong control frame arrived */
  pong(): void;
  /** The server answered the upgrade request with a plain HTTP response */
  rejected(status: number): void;
};

/** The transport a gateway connection runs on */
export interface GatewaySocket {
  readonly isOpen: boolean;
  send(data: string): Promise<void>;
  /** Sends a ping control frame */
  ping(): Promise<void>;
  close(code: number, reason?: string): Promise<void>;
  /** Drops the socket without a closing handshake */
  terminate(): void;
}

export type SocketFactory = (
  request: SocketRequest,
  handlers: SocketHandlers
) => GatewaySocket;

const settle =
  (resolve: () => void, reject: (err: Error) => void) => (err?: Error) => {
    if (err) {
      reject(err);
    } else {
      resolve();
    }
  };

export const createWebSocket: SocketFactory = (
  { url, headers, handshakeTimeout },
  handlers
) => {
  const ws = new WebSocket(url, { headers, handshakeTimeout });

  ws.onopen = () => {
    handlers.open();
  };

  ws.onmessage = ({ data }) => {
    if (typeof data !== "string") {
      logger.debug("Ignoring a binary gateway frame");
      return;
    }
    handlers.message(data);
  };

  ws.onerror = ({ error }) => {
    handlers.error(toError(error));
  };

  ws.onclose = ({ code, reason }) => {
    handlers.close(code, reason);
  };

  ws.on("pong", () => {
    handlers.pong();
  });

  ws.on("unexpected-response", (req, res) => {
    req.destroy();
    handlers.rejected(res.statusCode ?? 0);
  });

  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data) =>
      new Promise((resolve, reject) => {
        ws.send(data, settle(resolve, reject));
      }),
    ping: () =>
      new Promise((resolve, reject) => {
        ws.ping(undefined, undefined, settle(resolve, reject));
      }),
    close: (code, reason) =>
      new Promise((resolve) => {
        if (ws.readyState === WebSocket.CLOSED) {
          resolve();
          return;
        }
        ws.once("close", () => resolve());
        ws.close(code, reason);
      }),
    terminate: () => {
      ws.terminate();
    },
  };
};
