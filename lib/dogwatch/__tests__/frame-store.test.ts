/**
 * Unit tests: FrameStore (rolling capacity, listing order, write failures, restart).
 */

import { readdir, rm, writeFile } from "fs/promises";
import path from "path";
import {
  FrameStore,
  displayTime,
  frameNameFor,
  listFrames,
  parseFrameLimit,
  parseFrameTime,
} from "../frame-store";
import type { DogOnlyDecision } from "../types";
import { makeTempDir } from "./fakes";

const DOG: DogOnlyDecision = { kind: "DOG_ONLY", count: 1, confidence: 0.9 };

/** 2026-01-02 03:04:<second> local time */
const at = (second: number) => new Date(2026, 0, 2, 3, 4, second);
const nameAt = (second: number) => `dog_20260102_0304${String(second).padStart(2, "0")}.jpg`;

describe("frame names", () => {
  it("encodes local capture time", () => {
    expect(frameNameFor(at(5))).toBe("dog_20260102_030405.jpg");
  });

  it("parses display time from the name", () => {
    expect(displayTime("dog_20260102_030405.jpg")).toBe("2026-01-02 03:04:05");
    expect(displayTime("cat_20260102_030405.jpg")).toBe("");
  });

  it("parses the capture time back", () => {
    expect(parseFrameTime("dog_20260102_030405.jpg")?.getTime()).toBe(at(5).getTime());
    expect(parseFrameTime("dog_latest.jpg")).toBeNull();
  });
});

describe("parseFrameLimit", () => {
  it("defaults to and caps at capacity", () => {
    expect(parseFrameLimit(null, 10)).toBe(10);
    expect(parseFrameLimit("", 10)).toBe(10);
    expect(parseFrameLimit("3", 10)).toBe(3);
    expect(parseFrameLimit("50", 10)).toBe(10);
    expect(parseFrameLimit("0", 10)).toBe(0);
  });

  it("falls back to capacity on junk", () => {
    expect(parseFrameLimit("abc", 10)).toBe(10);
    expect(parseFrameLimit("-1", 10)).toBe(10);
    expect(parseFrameLimit("2.5", 10)).toBe(10);
  });
});

describe("FrameStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    jest.spyOn(console, "error").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("keeps exactly the 10 most recent of 15 inserts", async () => {
    const store = new FrameStore({ dir, capacity: 10 });
    await store.init();
    for (let s = 0; s < 15; s++) {
      const record = await store.insert(DOG, Buffer.from(`frame-${s}`), at(s));
      expect(record?.name).toBe(nameAt(s));
      expect(store.size()).toBe(Math.min(s + 1, 10));
    }

    const listed = await store.list(10);
    expect(listed.map((r) => r.name)).toEqual(
      [14, 13, 12, 11, 10, 9, 8, 7, 6, 5].map(nameAt)
    );

    const onDisk = (await readdir(dir)).sort();
    expect(onDisk).toEqual([5, 6, 7, 8, 9, 10, 11, 12, 13, 14].map(nameAt));
  });

  it("never exceeds a capacity of one", async () => {
    const store = new FrameStore({ dir, capacity: 1 });
    await store.init();
    for (let s = 0; s < 3; s++) {
      await store.insert(DOG, Buffer.from("x"), at(s));
    }
    expect(store.size()).toBe(1);
    expect(await readdir(dir)).toEqual([nameAt(2)]);
  });

  it("lists newest first and honours the limit", async () => {
    const store = new FrameStore({ dir, capacity: 5 });
    await store.init();
    for (let s = 0; s < 5; s++) {
      await store.insert(DOG, Buffer.from("x"), at(s));
    }
    const listed = await store.list(3);
    expect(listed.map((r) => r.name)).toEqual([nameAt(4), nameAt(3), nameAt(2)]);
    expect(listed[0].path).toBe(path.join(dir, nameAt(4)));
    expect(listed[0].capturedAt.getTime()).toBe(at(4).getTime());
  });

  it("trims leftovers beyond capacity on init", async () => {
    for (let s = 0; s < 4; s++) {
      await writeFile(path.join(dir, nameAt(s)), "old");
    }
    const store = new FrameStore({ dir, capacity: 2 });
    await store.init();
    expect(store.size()).toBe(2);
    expect((await readdir(dir)).sort()).toEqual([nameAt(2), nameAt(3)]);
  });

  it("removes temp files of interrupted writes on init", async () => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    await writeFile(path.join(dir, `.${nameAt(5)}.123.0.tmp`), "partial");
    await writeFile(path.join(dir, nameAt(4)), "kept");
    await writeFile(path.join(dir, "notes.txt"), "unrelated");

    const store = new FrameStore({ dir, capacity: 1 });
    await store.init();

    expect((await readdir(dir)).sort()).toEqual([nameAt(4), "notes.txt"]);
    expect(store.size()).toBe(1);
  });

  it("returns null and keeps the count when the write fails", async () => {
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "not a directory");
    const store = new FrameStore({ dir: path.join(blocker, "frames"), capacity: 3 });

    expect(await store.insert(DOG, Buffer.from("x"), at(0))).toBeNull();
    expect(await store.insert(DOG, Buffer.from("x"), at(1))).toBeNull();
    expect(store.size()).toBe(0);
    expect(store.consecutiveWriteFailures).toBe(2);
    expect(console.error).toHaveBeenCalled();
  });

  it("resets the failure counter after a successful write", async () => {
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "not a directory");
    const store = new FrameStore({ dir: blocker, capacity: 3 });
    expect(await store.insert(DOG, Buffer.from("x"), at(0))).toBeNull();
    expect(store.consecutiveWriteFailures).toBe(1);

    await rm(blocker);
    expect(await store.insert(DOG, Buffer.from("x"), at(1))).not.toBeNull();
    expect(store.consecutiveWriteFailures).toBe(0);
    expect(store.size()).toBe(1);
  });

  it("rejects a capacity below one", () => {
    expect(() => new FrameStore({ dir, capacity: 0 })).toThrow("positive integer");
  });
});

describe("listFrames", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns name and display time, skipping other files", async () => {
    await writeFile(path.join(dir, nameAt(1)), "a");
    await writeFile(path.join(dir, nameAt(2)), "b");
    await writeFile(path.join(dir, "notes.txt"), "c");
    await writeFile(path.join(dir, `.${nameAt(3)}.1.0.tmp`), "partial");

    expect(await listFrames(dir, 10)).toEqual([
      { name: nameAt(2), time: "2026-01-02 03:04:02" },
      { name: nameAt(1), time: "2026-01-02 03:04:01" },
    ]);
  });

  it("returns an empty list for a missing directory", async () => {
    expect(await listFrames(path.join(dir, "missing"), 10)).toEqual([]);
  });
});
