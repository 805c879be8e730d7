import { GatewayError } from "../src/errors";
import { Heartbeater } from "../src/gateway/heartbeat";
import { sleep } from "../src/utils/helpers";
import { waitUntil } from "./fakes";

describe("Heartbeater", () => {
  let heartbeater: Heartbeater | undefined;

  afterEach(() => {
    heartbeater?.stop();
    heartbeater = undefined;
  });

  test("reports infinite latency until a heartbeat is acknowledged", async () => {
    const send = jest.fn().mockResolvedValue(undefined);
    heartbeater = new Heartbeater({ send, onFailure: jest.fn(), expectsAck: true });
    expect(heartbeater.latency).toBe(Infinity);

    // An ack without a heartbeat in flight is ignored
    heartbeater.recordAck();
    expect(heartbeater.latency).toBe(Infinity);

    heartbeater.start(5);
    expect(heartbeater.interval).toBe(5);
    expect(heartbeater.running).toBe(true);
    await waitUntil(() => send.mock.calls.length > 0);
    expect(heartbeater.latency).toBe(Infinity);

    heartbeater.recordAck();
    expect(Number.isFinite(heartbeater.latency)).toBe(true);
    expect(heartbeater.latency).toBeGreaterThanOrEqual(0);
  });

  test("stops and reports once when a heartbeat cannot be sent", async () => {
    const failure = new Error("socket is gone");
    const send = jest.fn().mockRejectedValue(failure);
    const onFailure = jest.fn();
    heartbeater = new Heartbeater({ send, onFailure, expectsAck: false });

    heartbeater.start(5);
    await waitUntil(() => onFailure.mock.calls.length > 0);
    await sleep(20);

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure).toHaveBeenCalledWith(failure);
    expect(send).toHaveBeenCalledTimes(1);
    expect(heartbeater.running).toBe(false);
  });

  test("fails after too many unacknowledged heartbeats", async () => {
    const send = jest.fn().mockResolvedValue(undefined);
    const onFailure = jest.fn();
    heartbeater = new Heartbeater({
      send,
      onFailure,
      expectsAck: true,
      maxMissedAcks: 2,
    });

    heartbeater.start(5);
    await waitUntil(() => onFailure.mock.calls.length > 0);

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0][0]).toBeInstanceOf(GatewayError);
    expect(send).toHaveBeenCalledTimes(2);
  });

  test("keeps beating without acks when none are expected", async () => {
    const send = jest.fn().mockResolvedValue(undefined);
    const onFailure = jest.fn();
    heartbeater = new Heartbeater({ send, onFailure, expectsAck: false });

    heartbeater.start(2);
    await waitUntil(() => send.mock.calls.length >= 5);
    expect(onFailure).not.toHaveBeenCalled();
  });

  test("sends nothing after being stopped", async () => {
    const send = jest.fn().mockResolvedValue(undefined);
    heartbeater = new Heartbeater({ send, onFailure: jest.fn(), expectsAck: false });

    heartbeater.start(2);
    await waitUntil(() => send.mock.calls.length > 0);
    heartbeater.stop();
    const sent = send.mock.calls.length;
    await sleep(20);

    expect(send).toHaveBeenCalledTimes(sent);
    expect(heartbeater.running).toBe(false);
  });
});
