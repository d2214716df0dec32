/**
 * FrameStore — rolling buffer of dog frames on disk
 *
 * Files: <frameDir>/dog_<YYYYMMDD>_<HHMMSS>.jpg (local time). Names sort
 * chronologically, so the directory listing is the index.
 *
 * Writes land in a dot-prefixed temp file and are renamed into place; listing
 * only matches the final pattern, so a half-written frame is never served.
 * Eviction runs after each successful insert. If the process dies mid-eviction
 * the next insert trims the excess.
 */

import { mkdir, readdir, rename, unlink, writeFile } from "fs/promises";
import path from "path";
import { errorMessage, isNotFoundError } from "./errors";
import { formatCompactDateTime } from "./time";
import type { DogOnlyDecision, FrameListing, FrameRecord } from "./types";

export const FRAME_NAME_PATTERN = /^dog_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})\.jpg$/;
const FRAME_TEMP_PATTERN = /^\.dog_.*\.tmp$/;

export interface FrameStoreOptions {
  dir: string;
  capacity: number;
}

export function frameNameFor(capturedAt: Date): string {
  return `dog_${formatCompactDateTime(capturedAt)}.jpg`;
}

export function isFrameName(name: string): boolean {
  return FRAME_NAME_PATTERN.test(name);
}

/** Parse the capture time out of a frame name, as local time. */
export function parseFrameTime(name: string): Date | null {
  const m = FRAME_NAME_PATTERN.exec(name);
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  return new Date(y, mo - 1, d, h, mi, s);
}

/** "dog_20260102_030405.jpg" → "2026-01-02 03:04:05" */
export function displayTime(name: string): string {
  const m = FRAME_NAME_PATTERN.exec(name);
  if (!m) return "";
  const [, y, mo, d, h, mi, s] = m;
  return `${y}-${mo}-${d} ${h}:${mi}:${s}`;
}

async function frameNamesAscending(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (e) {
    if (isNotFoundError(e)) return [];
    throw e;
  }
  return entries.filter(isFrameName).sort();
}

/** Requested listing limit, capped at capacity. Missing or invalid → capacity. */
export function parseFrameLimit(raw: string | null, capacity: number): number {
  if (raw === null || raw.trim() === "") return capacity;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) return capacity;
  return Math.min(n, capacity);
}

/**
 * Read-only listing for the serving routes. Newest first, at most `limit`.
 */
export async function listFrames(dir: string, limit: number): Promise<FrameListing[]> {
  if (limit <= 0) return [];
  const names = await frameNamesAscending(dir);
  return names
    .reverse()
    .slice(0, limit)
    .map((name) => ({ name, time: displayTime(name) }));
}

export class FrameStore {
  private readonly dir: string;
  private readonly capacity: number;
  private count = 0;
  private writeFailures = 0;
  private tmpCounter = 0;

  constructor(options: FrameStoreOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new Error(`Frame capacity must be a positive integer, got ${options.capacity}`);
    }
    this.dir = options.dir;
    this.capacity = options.capacity;
  }

  /**
   * Create the directory, drop temp files of writes interrupted by a crash and
   * trim anything left over beyond capacity.
   */
  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const stale = (await readdir(this.dir)).filter((name) => FRAME_TEMP_PATTERN.test(name));
    for (const name of stale) {
      try {
        await unlink(path.join(this.dir, name));
      } catch (e) {
        if (!isNotFoundError(e)) throw e;
      }
    }
    if (stale.length > 0) {
      console.log(`[FrameStore] removed ${stale.length} interrupted write(s)`);
    }
    this.count = await this.evict();
  }

  /** Frames on disk after the last completed insert or eviction. */
  size(): number {
    return this.count;
  }

  get consecutiveWriteFailures(): number {
    return this.writeFailures;
  }

  /**
   * Persist one frame. The decision is required so that only the DOG_ONLY branch
   * can reach this. Returns null (and logs) when the write fails.
   */
  async insert(
    decision: DogOnlyDecision,
    image: Buffer,
    capturedAt: Date
  ): Promise<FrameRecord | null> {
    const name = frameNameFor(capturedAt);
    const finalPath = path.join(this.dir, name);
    const tmpPath = path.join(this.dir, `.${name}.${process.pid}.${this.tmpCounter++}.tmp`);

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(tmpPath, image);
      await rename(tmpPath, finalPath);
    } catch (e) {
      this.writeFailures++;
      console.error(
        `[FrameStore] write failed for ${name} (${decision.count} dog(s)):`,
        errorMessage(e)
      );
      await unlink(tmpPath).catch((cleanupError: unknown) => {
        if (!isNotFoundError(cleanupError)) {
          console.warn("[FrameStore] temp cleanup failed:", errorMessage(cleanupError));
        }
      });
      return null;
    }

    this.writeFailures = 0;
    try {
      this.count = await this.evict();
    } catch (e) {
      console.error("[FrameStore] eviction failed:", errorMessage(e));
    }

    return { name, path: finalPath, capturedAt, createdAt: new Date() };
  }

  async list(limit: number = this.capacity): Promise<FrameRecord[]> {
    const names = await frameNamesAscending(this.dir);
    const records: FrameRecord[] = [];
    for (const name of names.reverse().slice(0, Math.max(0, limit))) {
      const capturedAt = parseFrameTime(name);
      if (!capturedAt) continue;
      records.push({ name, path: path.join(this.dir, name), capturedAt, createdAt: capturedAt });
    }
    return records;
  }

  /** Unlink oldest frames until at most `capacity` remain. Returns what is left. */
  private async evict(): Promise<number> {
    const names = await frameNamesAscending(this.dir);
    let remaining = names.length;
    for (const name of names) {
      if (remaining <= this.capacity) break;
      try {
        await unlink(path.join(this.dir, name));
      } catch (e) {
        if (!isNotFoundError(e)) throw e;
      }
      remaining--;
    }
    return remaining;
  }
}
