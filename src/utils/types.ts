import type { HelloData } from "../gateway/codec";

export enum ConnectionStatus {
  /** Never opened, or gave up opening */
  Disconnected = "disconnected",
  Handshaking = "handshaking",
  Connected = "connected",
  Reconnecting = "reconnecting",
  /** Closed on purpose or after a fatal error, never reopens */
  Closed = "closed",
}

export enum GatewayEvents {
  Hello = "hello",
  Connect = "connect",
  Disconnect = "disconnect",
  Reconnect = "reconnect",
  Error = "gatewayError",
  RawSend = "rawSend",
  RawReceive = "rawReceive",
  SocketClosed = "socketClosed",
  Closed = "closed",
}

export type GatewayEventsMap = {
  [GatewayEvents.Hello]: [data: HelloData];
  [GatewayEvents.Connect]: [];
  [GatewayEvents.Disconnect]: [payload: { code: number; reason: string }];
  [GatewayEvents.Reconnect]: [];
  [GatewayEvents.Error]: [payload: { error: Error }];
  [GatewayEvents.RawSend]: [payload: string];
  [GatewayEvents.RawReceive]: [payload: string];
  [GatewayEvents.SocketClosed]: [payload: { code: number; reason: string }];
  [GatewayEvents.Closed]: [];
};
