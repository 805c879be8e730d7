import { GatewayError } from "../errors";
import { sleep, toError } from "../utils/helpers";
import { Logger, logger } from "../utils/logger";

/** Latency above which the client is considered to lag behind */
const LAGGING_LATENCY = 10_000;

export type HeartbeaterOptions = {
  send: () => Promise<void>;
  /** Called once when a heartbeat cannot be sent or acks stop arriving */
  onFailure: (error: Error) => void;
  expectsAck: boolean;
  maxMissedAcks?: number;
  log?: Logger;
};

export class Heartbeater {
  private readonly send: () => Promise<void>;
  private readonly onFailure: (error: Error) => void;
  private readonly expectsAck: boolean;
  private readonly maxMissedAcks: number;
  private readonly log: Logger;

  private controller: AbortController | null = null;
  private lastHeartbeatAt = -1;
  private isAck = true;
  private missedAcks = 0;

  #interval = 0;
  #latency = Infinity;

  constructor(options: HeartbeaterOptions) {
    this.send = options.send;
    this.onFailure = options.onFailure;
    this.expectsAck = options.expectsAck;
    this.maxMissedAcks = options.maxMissedAcks ?? 3;
    this.log = options.log ?? logger.child("heartbeat");
  }

  /** Milliseconds between the last heartbeat and its ack */
  get latency() {
    return this.#latency;
  }

  get interval() {
    return this.#interval;
  }

  get running() {
    return this.controller !== null;
  }

  start(interval: number) {
    this.stop();
    this.#interval = interval;
    this.#latency = Infinity;
    this.lastHeartbeatAt = -1;
    this.isAck = true;
    this.missedAcks = 0;

    const controller = new AbortController();
    this.controller = controller;
    this.log.debug(`Heartbeating every ${interval}ms`);
    void this.beat(controller.signal);
  }

  stop() {
    this.controller?.abort();
    this.controller = null;
  }

  recordAck() {
    if (this.lastHeartbeatAt < 0) return;

    this.isAck = true;
    this.missedAcks = 0;
    this.#latency = Date.now() - this.lastHeartbeatAt;
    if (this.#latency > LAGGING_LATENCY) {
      this.log.warn(
        `Can't keep up, the gateway is ${(this.#latency / 1000).toFixed(1)}s behind`
      );
    }
  }

  private async beat(signal: AbortSignal) {
    while (!signal.aborted) {
      try {
        await sleep(this.#interval, undefined, { signal });
      } catch {
        return;
      }

      if (this.expectsAck && !this.isAck) {
        this.missedAcks++;
        this.log.warn(
          `Heartbeat was not acknowledged (${this.missedAcks}/${this.maxMissedAcks})`
        );
        if (this.missedAcks >= this.maxMissedAcks) {
          this.fail(
            new GatewayError(
              `No heartbeat ack after ${this.missedAcks} heartbeats, the connection looks dead`
            )
          );
          return;
        }
      }

      this.lastHeartbeatAt = Date.now();
      this.isAck = false;
      try {
        await this.send();
      } catch (err) {
        if (signal.aborted) return;
        this.fail(toError(err));
        return;
      }
    }
  }

  private fail(error: Error) {
    this.stop();
    this.log.warn(`Heartbeat failed: ${error.message}`);
    this.onFailure(error);
  }
}
