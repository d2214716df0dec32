/**
 * In-process stand-ins for the camera sidecar and the push transport.
 */

import { mkdtemp } from "fs/promises";
import os from "os";
import path from "path";
import { SourceClosedError } from "../errors";
import type {
  Detection,
  InferenceSample,
  InferenceSource,
  NotificationMessage,
  NotificationTransport,
} from "../types";

export const FULL_BOX = { x1: 0.1, y1: 0.1, x2: 0.6, y2: 0.9 };

export function dog(score: number, bbox = FULL_BOX): Detection {
  return { label: "dog", score, bbox };
}

export function person(score: number, bbox = FULL_BOX): Detection {
  return { label: "person", score, bbox };
}

export function sample(detections: Detection[], capturedAt: Date): InferenceSample {
  return {
    capturedAt,
    result: { format: "detections", detections },
    image: Buffer.from(`jpeg@${capturedAt.getTime()}`),
  };
}

export class RecordingTransport implements NotificationTransport {
  readonly sent: NotificationMessage[] = [];
  fail = false;

  async send(message: NotificationMessage): Promise<void> {
    this.sent.push(message);
    if (this.fail) throw new Error("network down");
  }
}

/**
 * Hands out queued samples (or errors) in order; empty queue → source closed.
 * `onAcquire` runs before each hand-off with the 1-based call count.
 */
export class ScriptedSource implements InferenceSource {
  acquireCalls = 0;
  closed = false;
  onAcquire: ((call: number) => void) | null = null;

  constructor(private readonly queue: Array<InferenceSample | Error>) {}

  push(item: InferenceSample | Error): void {
    this.queue.push(item);
  }

  acquire(_signal: AbortSignal): Promise<InferenceSample> {
    this.acquireCalls++;
    this.onAcquire?.(this.acquireCalls);
    const next = this.queue.shift();
    if (next === undefined) return Promise.reject(new SourceClosedError());
    if (next instanceof Error) return Promise.reject(next);
    return Promise.resolve(next);
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Produces a fresh sample `delayMs` after each acquire, until closed.
 */
export class PacedSource implements InferenceSource {
  acquireCalls = 0;
  closed = false;

  constructor(
    private readonly next: () => InferenceSample,
    private readonly delayMs: number
  ) {}

  acquire(_signal: AbortSignal): Promise<InferenceSample> {
    this.acquireCalls++;
    if (this.closed) return Promise.reject(new SourceClosedError());
    return new Promise((resolve) => setTimeout(() => resolve(this.next()), this.delayMs));
  }

  close(): void {
    this.closed = true;
  }
}

/** Poll until `check` holds; rejects after `timeoutMs`. */
export async function waitUntil(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Let detached sends and their log handlers settle. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "dogwatch-test-"));
}
