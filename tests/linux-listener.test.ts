import { describe, it, expect, vi } from "vitest";
import { BusConnectionError, BusReplyError } from "../src/errors.js";
import {
  createLinuxListener,
  NOTIFY_MATCH_RULE,
  normalizeHints,
  parseNotifyArguments,
} from "../src/listeners/linux.js";
import type { NotificationPayload } from "../src/types.js";
import { FakeBus, createMemoryLogger, flushDispatch, notifyCall } from "./fakes.js";

const RECEIVED_AT = new Date("2024-01-15T10:30:45.000Z");

function createListener(bus: FakeBus = new FakeBus()) {
  const logger = createMemoryLogger();
  const listener = createLinuxListener({
    connect: async () => bus,
    logger,
    now: () => RECEIVED_AT,
  });
  const received: NotificationPayload[] = [];
  const callback = async (payload: NotificationPayload) => {
    received.push(payload);
  };
  return { listener, bus, logger, received, callback };
}

describe("parseNotifyArguments", () => {
  it("should map the 8-tuple onto a payload", () => {
    const payload = parseNotifyArguments(
      ["TestApp", 0, "icon", "Summary", "Body", [], {}, -1],
      RECEIVED_AT,
    );
    expect(payload).toEqual({
      appName: "TestApp",
      summary: "Summary",
      body: "Body",
      icon: "icon",
      replacesId: 0,
      actions: [],
      hints: {},
      timeout: -1,
      receivedAt: "2024-01-15T10:30:45.000Z",
    });
  });

  it("should keep actions in order", () => {
    const payload = parseNotifyArguments(
      ["Mail", 3, "", "New mail", "", ["default", "Open", "archive", "Archive"], {}, 5000],
      RECEIVED_AT,
    );
    expect(payload?.actions).toEqual(["default", "Open", "archive", "Archive"]);
    expect(payload?.replacesId).toBe(3);
    expect(payload?.timeout).toBe(5000);
  });

  it("should return null when fewer than 8 arguments are present", () => {
    expect(parseNotifyArguments(["TestApp", 0, "icon"], RECEIVED_AT)).toBeNull();
  });

  it("should ignore arguments beyond the eighth", () => {
    const payload = parseNotifyArguments(
      ["TestApp", 0, "icon", "Summary", "Body", [], {}, -1, "extra"],
      RECEIVED_AT,
    );
    expect(payload?.appName).toBe("TestApp");
  });
});

describe("normalizeHints", () => {
  it("should unwrap variant values", () => {
    expect(
      normalizeHints({
        urgency: { signature: "y", value: 1 },
        category: { signature: "s", value: "email.arrived" },
        resident: { signature: "b", value: true },
      }),
    ).toEqual({ urgency: 1, category: "email.arrived", resident: true });
  });

  it("should keep values that are not wrapped", () => {
    expect(normalizeHints({ plain: "value" })).toEqual({ plain: "value" });
  });

  it("should coerce values outside the JSON model to strings", () => {
    expect(
      normalizeHints({
        big: { signature: "x", value: 9007199254740993n },
        image: { signature: "ay", value: Buffer.from([1, 2]) },
      }),
    ).toEqual({ big: "9007199254740993", image: "<Buffer 01 02>" });
  });

  it("should return an empty record for a non-object", () => {
    expect(normalizeHints(null)).toEqual({});
  });
});

describe("createLinuxListener", () => {
  it("should not be running before start", () => {
    const { listener } = createListener();
    expect(listener.isRunning).toBe(false);
  });

  it("should subscribe with the Notify match rule and register a handler", async () => {
    const { listener, bus, callback } = createListener();

    await listener.start(callback);

    expect(bus.matchRules).toEqual([
      "type='method_call',interface='org.freedesktop.Notifications',member='Notify',eavesdrop=true",
    ]);
    expect(bus.matchRules[0]).toBe(NOTIFY_MATCH_RULE);
    expect(bus.handlers).toHaveLength(1);
    expect(listener.isRunning).toBe(true);
  });

  it("should stop running and disconnect on stop", async () => {
    const { listener, bus, callback } = createListener();

    await listener.start(callback);
    await listener.stop();

    expect(listener.isRunning).toBe(false);
    expect(bus.disconnected).toBe(true);
  });

  it("should allow stop without a prior start", async () => {
    const { listener } = createListener();
    await expect(listener.stop()).resolves.toBeUndefined();
    expect(listener.isRunning).toBe(false);
  });

  it("should invoke the callback once per Notify call", async () => {
    const { listener, bus, received, callback } = createListener();
    await listener.start(callback);

    bus.deliver(notifyCall(["TestApp", 0, "icon", "Summary", "Body", [], {}, -1]));

    await vi.waitFor(() => {
      expect(received).toHaveLength(1);
    });
    expect(received[0]).toMatchObject({
      appName: "TestApp",
      summary: "Summary",
      body: "Body",
      replacesId: 0,
      timeout: -1,
      actions: [],
    });
  });

  it("should schedule processing instead of running the callback inside the handler", async () => {
    const { listener, bus, received, callback } = createListener();
    await listener.start(callback);

    const answers = bus.deliver(notifyCall(["TestApp", 0, "", "S", "B", [], {}, -1]));

    expect(answers).toEqual([false]);
    expect(received).toHaveLength(0);
    await flushDispatch();
    expect(received).toHaveLength(1);
  });

  it("should discard a message with fewer than 8 arguments without throwing", async () => {
    const { listener, bus, received, logger, callback } = createListener();
    await listener.start(callback);

    expect(() => bus.deliver(notifyCall(["TestApp", 0, "icon"]))).not.toThrow();
    await flushDispatch();

    expect(received).toHaveLength(0);
    expect(logger.entries.some((entry) => entry.level === "warn")).toBe(true);
    expect(listener.isRunning).toBe(true);
  });

  it("should ignore calls to other members and interfaces", async () => {
    const { listener, bus, received, callback } = createListener();
    await listener.start(callback);

    bus.deliver({
      kind: "method_call",
      interface: "org.freedesktop.Notifications",
      member: "CloseNotification",
      body: [4],
    });
    bus.deliver({
      kind: "method_call",
      interface: "org.example.Other",
      member: "Notify",
      body: ["TestApp", 0, "icon", "Summary", "Body", [], {}, -1],
    });
    bus.deliver({
      kind: "signal",
      interface: "org.freedesktop.Notifications",
      member: "Notify",
      body: ["TestApp", 0, "icon", "Summary", "Body", [], {}, -1],
    });
    await flushDispatch();

    expect(received).toHaveLength(0);
  });

  it("should keep running after the callback throws", async () => {
    const { listener, bus, logger } = createListener();
    const summaries: string[] = [];
    await listener.start(async (payload) => {
      summaries.push(payload.summary);
      if (payload.summary === "first") {
        throw new Error("callback exploded");
      }
    });

    bus.deliver(notifyCall(["App", 0, "", "first", "", [], {}, -1]));
    await flushDispatch();
    bus.deliver(notifyCall(["App", 0, "", "second", "", [], {}, -1]));
    await flushDispatch();

    expect(summaries).toEqual(["first", "second"]);
    expect(logger.entries).toContainEqual({
      level: "error",
      message: "Error processing notification: callback exploded",
    });
    expect(listener.isRunning).toBe(true);
  });

  it("should not invoke the callback for messages delivered after stop", async () => {
    const { listener, bus, received, callback } = createListener();
    await listener.start(callback);
    await listener.stop();

    bus.deliver(notifyCall(["TestApp", 0, "icon", "Summary", "Body", [], {}, -1]));
    await flushDispatch();

    expect(received).toHaveLength(0);
  });

  it("should stay stopped without throwing when the match rule is rejected", async () => {
    const bus = new FakeBus();
    bus.addMatchError = new BusReplyError("org.freedesktop.DBus.Error.AccessDenied", "eavesdropping not allowed");
    const { listener, logger, callback } = createListener(bus);

    await expect(listener.start(callback)).resolves.toBeUndefined();

    expect(listener.isRunning).toBe(false);
    expect(bus.handlers).toHaveLength(0);
    expect(bus.disconnected).toBe(true);
    expect(logger.entries).toContainEqual({
      level: "error",
      message:
        "Failed to add match rule: org.freedesktop.DBus.Error.AccessDenied: eavesdropping not allowed",
    });
  });

  it("should propagate a connection failure", async () => {
    const listener = createLinuxListener({
      connect: async () => {
        throw new BusConnectionError("Could not connect to the session bus: ENOENT");
      },
    });

    await expect(listener.start(async () => {})).rejects.toBeInstanceOf(BusConnectionError);
    expect(listener.isRunning).toBe(false);
  });

  it("should propagate a transport failure while adding the match rule", async () => {
    const bus = new FakeBus();
    bus.addMatchError = new Error("socket closed");
    const { listener, callback } = createListener(bus);

    await expect(listener.start(callback)).rejects.toThrow("socket closed");
    expect(listener.isRunning).toBe(false);
    expect(bus.disconnected).toBe(true);
  });

  it("should be startable again after stop", async () => {
    const first = new FakeBus();
    const second = new FakeBus();
    const buses = [first, second];
    const listener = createLinuxListener({
      connect: async () => {
        const next = buses.shift();
        if (!next) {
          throw new Error("no bus left");
        }
        return next;
      },
    });

    await listener.start(async () => {});
    await listener.stop();
    await listener.start(async () => {});

    expect(listener.isRunning).toBe(true);
    expect(second.handlers).toHaveLength(1);
  });
});
