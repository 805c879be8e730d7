import { ClientError, HandlerError } from "../src/errors";
import { EventRegistry } from "../src/events";

describe("EventRegistry", () => {
  let events: EventRegistry;

  beforeEach(() => {
    events = new EventRegistry();
  });

  test("runs handlers in registration order, one after another", async () => {
    const order: string[] = [];
    events.on("disconnect", async (code) => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push(`first ${code}`);
    });
    events.on("disconnect", (code) => {
      order.push(`second ${code}`);
    });

    await events.dispatch("disconnect", 1006);

    expect(order).toEqual(["first 1006", "second 1006"]);
  });

  test("runs once handlers a single time", async () => {
    const handler = jest.fn();
    events.once("reconnect", handler);

    await events.dispatch("reconnect");
    await events.dispatch("reconnect");

    expect(handler).toHaveBeenCalledTimes(1);
    expect(events.listenerCount("reconnect")).toBe(0);
  });

  test("removes handlers", async () => {
    const handler = jest.fn();
    events.on("connect", handler);
    events.off("connect", handler);

    await events.dispatch("connect");

    expect(handler).not.toHaveBeenCalled();
  });

  test("keeps other handlers of the event when one is removed", async () => {
    const kept = jest.fn();
    const removed = jest.fn();
    events.on("disconnect", removed);
    events.on("disconnect", kept);
    events.once("disconnect", removed);

    events.off("disconnect", removed);
    await events.dispatch("disconnect", 1000);

    expect(removed).not.toHaveBeenCalled();
    expect(kept).toHaveBeenCalledWith(1000);
    expect(events.listenerCount("disconnect")).toBe(1);
  });

  test("runs handlers added during a dispatch from the next one", async () => {
    const late = jest.fn();
    events.on("connect", () => {
      events.on("connect", late);
    });

    await events.dispatch("connect");
    expect(late).not.toHaveBeenCalled();

    await events.dispatch("connect");
    expect(late).toHaveBeenCalledTimes(1);
  });

  test("routes handler failures to error handlers and keeps going", async () => {
    const failure = new Error("boom");
    const next = jest.fn();
    const onError = jest.fn();
    events.on("team_connect", () => {
      throw failure;
    });
    events.on("team_connect", next);
    events.on("error", onError);

    await events.dispatch("team_connect", "S1");

    expect(next).toHaveBeenCalledWith("S1");
    expect(onError).toHaveBeenCalledTimes(1);
    const error = onError.mock.calls[0][0];
    expect(error).toBeInstanceOf(HandlerError);
    expect(error.event).toBe("team_connect");
    expect(error.cause).toBe(failure);
    expect(error.message).toBe('Handler for "team_connect" threw: boom');
  });

  test("swallows handler failures when nothing listens for errors", async () => {
    events.on("ready", () => {
      throw new Error("boom");
    });

    await expect(events.dispatch("ready")).resolves.toBeUndefined();
  });

  test("does not loop when an error handler throws", async () => {
    const onError = jest.fn(() => {
      throw new Error("again");
    });
    events.on("error", onError);

    await expect(events.dispatch("error", new Error("first"))).resolves.toBeUndefined();
    expect(onError).toHaveBeenCalledTimes(1);
  });

  describe("waitFor", () => {
    test("resolves with the arguments of the first matching event", async () => {
      const waiting = events.waitFor("team_connect", {
        check: (serverId) => serverId === "S2",
      });

      await events.dispatch("team_connect", "S1");
      await events.dispatch("team_connect", "S2");

      await expect(waiting).resolves.toEqual(["S2"]);
      expect(events.listenerCount("team_connect")).toBe(0);
    });

    test("rejects after the timeout", async () => {
      const waiting = events.waitFor("ready", { timeout: 10 });

      await expect(waiting).rejects.toThrow(ClientError);
      await expect(waiting).rejects.toThrow("Timed out after 10ms waiting for ready");
      expect(events.listenerCount("ready")).toBe(0);
    });

    test("rejects when the check throws", async () => {
      const failure = new Error("bad check");
      const waiting = events.waitFor("disconnect", {
        check: () => {
          throw failure;
        },
      });

      await events.dispatch("disconnect", 1000);

      await expect(waiting).rejects.toBe(failure);
      expect(events.listenerCount("disconnect")).toBe(0);
    });
  });
});
