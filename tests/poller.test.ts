import { describe, it, expect } from "vitest";
import { Poller, DeviceSnapshot, buildSnapshot, pollOnce } from "../src/poller.js";
import { RegisterMap, defineField } from "../src/registers.js";
import { Session, type ConnectionState } from "../src/session.js";
import {
  ConnectError,
  DecodeError,
  PollError,
  ProtocolError,
  TransportError,
} from "../src/errors.js";
import { ModbusError } from "../src/modbus.js";
import type { SessionOptions } from "../src/config.js";
import { FakeTransport } from "./fakes.js";

const FIELDS = [
  defineField("a", 0, "u16"),
  defineField("b", 1, "i16", { scale: { numerator: 1, denominator: 10 } }),
  defineField("e", 2, "u16"),
  defineField("c", 3, "u16"),
  defineField("f", 10, "u16"),
  defineField("g", 20, "u16"),
];

// Reads [0, 4) and [10, 11); "e" sits inside the first span, "g" outside.
const map = new RegisterMap(FIELDS, {
  model: "test",
  maxGap: 1,
  unavailable: ["e", "g"],
});

function device(options: SessionOptions = {}): { transport: FakeTransport; session: Session } {
  const transport = new FakeTransport();
  transport.setWords(0, [7, 0xfff6, 5, 9]);
  transport.setWords(10, [100]);
  transport.setWords(20, [3]);
  return { transport, session: new Session(transport, options) };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected a rejection");
}

describe("buildSnapshot", () => {
  it("decodes every field and marks unavailable ones invalid", () => {
    const snapshot = buildSnapshot(
      map,
      [
        { span: { address: 0, count: 4 }, words: [7, 0xfff6, 5, 9] },
        { span: { address: 10, count: 1 }, words: [100] },
      ],
      1000
    );
    expect(snapshot.timestamp).toBe(1000);
    expect(snapshot.model).toBe("test");
    expect(snapshot.get("a")).toEqual({ value: 7, valid: true });
    expect(snapshot.get("b")).toEqual({ value: -1, valid: true });
    expect(snapshot.get("e")).toEqual({ value: 5, valid: false });
    expect(snapshot.get("f")).toEqual({ value: 100, valid: true });
    expect(snapshot.get("g")).toEqual({ value: null, valid: false });
    expect(snapshot.names()).toEqual(["a", "b", "e", "c", "f", "g"]);
  });

  it("fails on words that do not decode", () => {
    expect(() =>
      buildSnapshot(map, [{ span: { address: 0, count: 4 }, words: [70000, 0, 0, 0] }])
    ).toThrow(DecodeError);
  });
});

describe("DeviceSnapshot", () => {
  const snapshot = new DeviceSnapshot(
    "test",
    1000,
    new Map([["a", { value: 7, valid: true }]])
  );

  it("is immutable", () => {
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it("reports missing fields as invalid", () => {
    expect(snapshot.get("zzz")).toEqual({ value: null, valid: false });
  });

  it("reports its age", () => {
    expect(snapshot.age(4000)).toBe(3000);
  });

  it("serializes with an ISO timestamp", () => {
    expect(JSON.parse(JSON.stringify(snapshot))).toEqual({
      timestamp: "1970-01-01T00:00:01.000Z",
      model: "test",
      fields: { a: { value: 7, valid: true } },
    });
  });
});

describe("pollOnce", () => {
  it("reads the coalesced spans in order", async () => {
    const { transport, session } = device();
    await session.connect();

    const snapshot = await pollOnce(map, session);
    expect(transport.requests).toEqual(["read 0+4", "read 10+1"]);
    expect(snapshot.get("c")).toEqual({ value: 9, valid: true });
    expect(snapshot.get("b").value).toBe(-1);
  });

  it("yields no snapshot when a later span fails", async () => {
    const { transport, session } = device();
    await session.connect();
    transport.failures.push(null, new Error("connection reset"));

    const err = await rejection(pollOnce(map, session, { retry: { retries: 2 } }));
    expect(err).toBeInstanceOf(PollError);
    if (err instanceof PollError) {
      expect(err.attempts).toBe(1);
      expect(err.cause).toBeInstanceOf(TransportError);
    }
    expect(transport.requests).toEqual(["read 0+4", "read 10+1"]);
    expect(session.state).toBe("disconnected");
  });

  it("retries soft failures with backoff", async () => {
    const { transport, session } = device();
    await session.connect();
    transport.failures.push(new ModbusError(6));

    const snapshot = await pollOnce(map, session, {
      retry: { retries: 2, initialDelay: 1 },
    });
    expect(snapshot.get("f").value).toBe(100);
    expect(transport.requests).toEqual(["read 0+4", "read 0+4", "read 10+1"]);
  });

  it("gives up after the configured retries", async () => {
    const { transport, session } = device();
    await session.connect();
    transport.failures.push(new ModbusError(6), new ModbusError(6));

    const err = await rejection(
      pollOnce(map, session, { retry: { retries: 1, initialDelay: 1 } })
    );
    expect(err).toBeInstanceOf(PollError);
    if (err instanceof PollError) {
      expect(err.attempts).toBe(2);
      expect(err.cause).toBeInstanceOf(ProtocolError);
      expect(err.message).toBe(
        "Poll cycle failed after 2 attempt(s): Modbus exception: ServerDeviceBusy"
      );
    }
  });

  it("does not retry decode errors", async () => {
    const { transport, session } = device();
    await session.connect();
    transport.setWords(3, [70000]);

    const err = await rejection(pollOnce(map, session));
    expect(err).toBeInstanceOf(PollError);
    if (err instanceof PollError) {
      expect(err.attempts).toBe(1);
      expect(err.cause).toBeInstanceOf(DecodeError);
    }
    expect(transport.requests).toHaveLength(2);
  });

  it("fails at once on a disconnected session", async () => {
    const { transport, session } = device();
    const err = await rejection(pollOnce(map, session));
    expect(err).toBeInstanceOf(PollError);
    expect(transport.requests).toEqual([]);
  });
});

describe("Poller", () => {
  it("keeps the latest snapshot", async () => {
    const { session } = device();
    await session.connect();
    const poller = new Poller(map, session);
    expect(poller.latest).toBeNull();

    const snapshot = await poller.pollOnce();
    expect(poller.latest).toBe(snapshot);
  });

  it("degrades after three timeouts and reports each transition once", async () => {
    const { transport, session } = device({ timeout: 20, degradedThreshold: 3 });
    await session.connect();
    transport.failures.push("hang", "hang", "hang");
    const poller = new Poller(map, session, { retry: { retries: 0 } });

    const changes: string[] = [];
    const statesAtError: ConnectionState[] = [];
    const snapshots: DeviceSnapshot[] = [];
    await poller.run({
      interval: 5,
      onStateChange: (state, previous) => changes.push(`${previous}->${state}`),
      onError: () => statesAtError.push(session.state),
      onSnapshot: (snapshot) => {
        snapshots.push(snapshot);
        poller.stop();
      },
    });

    expect(statesAtError).toEqual(["connected", "connected", "degraded"]);
    expect(changes).toEqual(["connected->degraded", "degraded->connected"]);
    expect(snapshots).toHaveLength(1);
    expect(session.state).toBe("connected");
    expect(poller.running).toBe(false);
  });

  it("reconnects a disconnected session before a cycle", async () => {
    const { transport, session } = device();
    const poller = new Poller(map, session);
    const changes: string[] = [];

    await poller.run({
      interval: 5,
      onStateChange: (state, previous) => changes.push(`${previous}->${state}`),
      onSnapshot: () => poller.stop(),
    });
    expect(transport.connects).toBe(1);
    expect(changes).toEqual(["disconnected->connecting", "connecting->connected"]);
  });

  it("reports failed reconnects and keeps polling", async () => {
    const { transport, session } = device();
    transport.connectError = new Error("connection refused");
    const poller = new Poller(map, session);
    const errors: Error[] = [];

    await poller.run({
      interval: 5,
      onError: (err) => {
        errors.push(err);
        if (errors.length === 2) transport.connectError = null;
      },
      onSnapshot: () => poller.stop(),
    });
    expect(errors).toHaveLength(2);
    expect(errors[0]).toBeInstanceOf(ConnectError);
    expect(transport.connects).toBe(3);
  });

  it("leaves a dropped session alone when reconnecting is disabled", async () => {
    const { transport, session } = device();
    const poller = new Poller(map, session, { reconnect: false });
    const errors: Error[] = [];

    await poller.run({
      interval: 5,
      onError: (err) => {
        errors.push(err);
        poller.stop();
      },
    });
    expect(transport.connects).toBe(0);
    expect(errors[0]).toBeInstanceOf(PollError);
  });

  it("does not start a cycle once cancelled", async () => {
    const { transport, session } = device();
    await session.connect();
    const poller = new Poller(map, session);
    const controller = new AbortController();
    controller.abort();

    await poller.run({ signal: controller.signal });
    expect(transport.requests).toEqual([]);
  });

  it("stops promptly while waiting for the next cycle", async () => {
    const { transport, session } = device();
    await session.connect();
    const poller = new Poller(map, session);
    const controller = new AbortController();

    const started = Date.now();
    await poller.run({
      interval: 60_000,
      signal: controller.signal,
      onSnapshot: () => {
        setTimeout(() => controller.abort(), 10);
      },
    });
    expect(Date.now() - started).toBeLessThan(5000);
    expect(transport.requests).toEqual(["read 0+4", "read 10+1"]);
  });

  it("drops the snapshot of a cycle that finishes after cancellation", async () => {
    const { transport, session } = device();
    await session.connect();
    const poller = new Poller(map, session);
    const controller = new AbortController();
    const release = transport.hold();
    const snapshots: DeviceSnapshot[] = [];

    const running = poller.run({
      signal: controller.signal,
      onSnapshot: (snapshot) => snapshots.push(snapshot),
    });
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();
    release();
    await running;

    expect(snapshots).toEqual([]);
    expect(transport.requests).toEqual(["read 0+4", "read 10+1"]);
  });

  it("refuses to run twice at once", async () => {
    const { session } = device();
    await session.connect();
    const poller = new Poller(map, session);

    const first = poller.run({ interval: 5 });
    expect(poller.running).toBe(true);
    await expect(poller.run()).rejects.toThrow("Poller is already running");
    poller.stop();
    await first;
    expect(poller.running).toBe(false);
  });

  it("queues exclusive work behind a running cycle", async () => {
    const { transport, session } = device();
    await session.connect();
    const poller = new Poller(map, session);
    const release = transport.hold();

    const cycle = poller.pollOnce();
    const write = poller.exclusive(() =>
      session.write(defineField("x", 5, "u16"), [1])
    );
    await new Promise((resolve) => setImmediate(resolve));
    expect(transport.requests).toEqual(["read 0+4"]);
    release();
    await Promise.all([cycle, write]);
    expect(transport.requests).toEqual(["read 0+4", "read 10+1", "write 5=1"]);
  });
});
