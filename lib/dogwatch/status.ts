/**
 * StatusPublisher — the single current SystemStatus
 *
 * In process: a frozen snapshot replaced by reference, so a reader holds either
 * the old or the new object, never a mix.
 * On disk: each snapshot is written to a temp file and renamed over the status
 * file. The route handlers (bundled separately from the pipeline) read that
 * file, and a restarted process reads it to restore `last_dog_seen`.
 * Writes are coalesced: while one is in flight only the newest pending
 * snapshot is kept.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from "fs/promises";
import path from "path";
import { errorMessage, isNotFoundError } from "./errors";
import { isSystemStatus } from "./types";
import type { GateDecision, SystemStatus } from "./types";

export function buildStatus(
  decision: GateDecision,
  lastDogSeen: string | null,
  now: Date
): SystemStatus {
  const dogCount =
    decision.kind === "DOG_ONLY"
      ? decision.count
      : decision.kind === "HUMAN_PRESENT"
        ? decision.dogCount
        : 0;
  const humanDetected = decision.kind === "HUMAN_PRESENT";
  const dogDetected = dogCount > 0;

  return {
    dog_detected: dogDetected,
    human_detected: humanDetected,
    recording_active: dogDetected && !humanDetected,
    privacy_mode: humanDetected,
    dog_count: dogCount,
    last_dog_seen: lastDogSeen,
    timestamp: now.toISOString(),
  };
}

export function idleStatus(lastDogSeen: string | null, now: Date): SystemStatus {
  return buildStatus({ kind: "IDLE" }, lastDogSeen, now);
}

export async function writeStatusFile(file: string, status: SystemStatus): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(status, null, 2), "utf-8");
  await rename(tmp, file);
}

/**
 * Remove `<file>.<pid>.tmp` siblings left by a process that died mid-write.
 * Returns how many were removed.
 */
export async function removeStaleStatusTemps(file: string): Promise<number> {
  const dir = path.dirname(file);
  const prefix = `${path.basename(file)}.`;
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (e) {
    if (isNotFoundError(e)) return 0;
    throw e;
  }
  let removed = 0;
  for (const name of entries) {
    if (!name.startsWith(prefix) || !name.endsWith(".tmp")) continue;
    try {
      await unlink(path.join(dir, name));
      removed++;
    } catch (e) {
      if (!isNotFoundError(e)) throw e;
    }
  }
  return removed;
}

/**
 * Reader side. Missing file → idle default; unparseable or wrong shape → throws.
 */
export async function readStatusSnapshot(
  file: string,
  now: Date = new Date()
): Promise<SystemStatus> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (e) {
    if (isNotFoundError(e)) {
      return idleStatus(null, now);
    }
    throw e;
  }
  const data: unknown = JSON.parse(raw);
  if (!isSystemStatus(data)) {
    throw new Error(`Malformed status file: ${file}`);
  }
  return data;
}

export interface StatusPublisherOptions {
  /** Mirror snapshots to this file. Omit for in-memory only. */
  statusFile?: string;
  initial?: SystemStatus;
}

export class StatusPublisher {
  private snapshot: Readonly<SystemStatus>;
  private readonly statusFile: string | undefined;
  private pending: SystemStatus | null = null;
  private writing: Promise<void> | null = null;

  constructor(options: StatusPublisherOptions = {}) {
    this.statusFile = options.statusFile;
    this.snapshot = Object.freeze({ ...(options.initial ?? idleStatus(null, new Date())) });
  }

  current(): Readonly<SystemStatus> {
    return this.snapshot;
  }

  publish(status: SystemStatus): void {
    const next = Object.freeze({ ...status });
    this.snapshot = next;
    if (this.statusFile === undefined) return;

    this.pending = next;
    if (!this.writing) {
      this.writing = this.drain(this.statusFile);
    }
  }

  /** Resolves once every published snapshot has reached the file (or failed). */
  async flush(): Promise<void> {
    while (this.writing) {
      await this.writing;
    }
  }

  private async drain(file: string): Promise<void> {
    while (this.pending) {
      const next = this.pending;
      this.pending = null;
      try {
        await writeStatusFile(file, next);
      } catch (e) {
        console.error("[StatusPublisher] status write failed:", errorMessage(e));
      }
    }
    this.writing = null;
  }
}
