/**
 * Unit tests: HealthHeartbeat timer.
 */

import { HealthHeartbeat, buildHeartbeat } from "../heartbeat";
import { RecordingTransport, flushPromises } from "./fakes";

const INTERVAL_MS = 30 * 60 * 1000;

describe("HealthHeartbeat", () => {
  let transport: RecordingTransport;
  let heartbeat: HealthHeartbeat;

  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ["setImmediate"] });
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
    transport = new RecordingTransport();
    heartbeat = new HealthHeartbeat({
      transport,
      topic: "health",
      intervalMs: INTERVAL_MS,
      clock: () => new Date(2026, 0, 2, 3, 4, 5),
    });
  });

  afterEach(() => {
    heartbeat.stop();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it("beats once at start and then every interval", async () => {
    heartbeat.start();
    await flushPromises();
    expect(transport.sent).toHaveLength(1);

    jest.advanceTimersByTime(INTERVAL_MS - 1);
    await flushPromises();
    expect(transport.sent).toHaveLength(1);

    jest.advanceTimersByTime(1);
    await flushPromises();
    expect(transport.sent).toHaveLength(2);

    jest.advanceTimersByTime(INTERVAL_MS * 2);
    await flushPromises();
    expect(transport.sent).toHaveLength(4);
  });

  it("sends low priority on its own topic", async () => {
    heartbeat.start();
    await flushPromises();
    expect(transport.sent[0]).toEqual({
      topic: "health",
      title: "DogWatch Heartbeat",
      body: "DogWatch running as of 2026-01-02 03:04:05",
      priority: "low",
      tags: ["heartbeat"],
    });
  });

  it("stops beating after stop()", async () => {
    heartbeat.start();
    heartbeat.stop();
    expect(heartbeat.running).toBe(false);

    jest.advanceTimersByTime(INTERVAL_MS * 3);
    await flushPromises();
    expect(transport.sent).toHaveLength(1);
  });

  it("keeps beating after a failed send", async () => {
    transport.fail = true;
    heartbeat.start();
    await flushPromises();
    expect(console.error).toHaveBeenCalledWith("[HealthHeartbeat] error:", "network down");

    transport.fail = false;
    jest.advanceTimersByTime(INTERVAL_MS);
    await flushPromises();
    expect(transport.sent).toHaveLength(2);
  });
});

describe("buildHeartbeat", () => {
  it("stamps the local time", () => {
    expect(buildHeartbeat("health", new Date(2026, 5, 7, 8, 9, 10)).body).toBe(
      "DogWatch running as of 2026-06-07 08:09:10"
    );
  });
});
