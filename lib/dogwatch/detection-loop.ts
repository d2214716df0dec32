/**
 * DetectionLoop — source → analyzer → gate → store/notify → status, once per cycle
 *
 * The only writer of FrameStore and throttle state. Every cycle publishes a
 * status, including failed cycles (published as idle with the last known
 * `last_dog_seen`). Stop requests take effect between cycles; a cycle in
 * progress always finishes.
 */

import type { AlertSound } from "./alert-sound";
import type { DetectionAnalyzer } from "./analyzer";
import { FatalStorageError, SourceClosedError, errorMessage } from "./errors";
import type { FrameStore } from "./frame-store";
import { IDLE, decide } from "./privacy-gate";
import { buildStatus } from "./status";
import type { StatusPublisher } from "./status";
import type { NotificationThrottle } from "./throttle";
import { formatLocalDateTime } from "./time";
import type { GateDecision, InferenceSource } from "./types";

export type LoopState = "NEW" | "RUNNING" | "STOPPED";

export interface DetectionLoopDeps {
  source: InferenceSource;
  analyzer: DetectionAnalyzer;
  frameStore: FrameStore;
  throttle: NotificationThrottle;
  status: StatusPublisher;
  alertSound?: AlertSound;
  clock?: () => Date;
}

export interface DetectionLoopOptions {
  intervalMs: number;
  acquireTimeoutMs: number;
  maxConsecutiveWriteFailures: number;
  /** Restored from the previous run's status file. */
  lastDogSeen?: string | null;
}

export interface CycleResult {
  decision: GateDecision;
  frameSaved: boolean;
  notified: boolean;
  error?: string;
}

export class DetectionLoop {
  private readonly deps: DetectionLoopDeps;
  private readonly options: DetectionLoopOptions;
  private readonly clock: () => Date;
  private lastDogSeen: string | null;
  private state: LoopState = "NEW";
  private stopRequested = false;
  private wake: (() => void) | null = null;
  private sourceLost: SourceClosedError | null = null;

  constructor(deps: DetectionLoopDeps, options: DetectionLoopOptions) {
    this.deps = deps;
    this.options = options;
    this.clock = deps.clock ?? (() => new Date());
    this.lastDogSeen = options.lastDogSeen ?? null;
  }

  get loopState(): LoopState {
    return this.state;
  }

  /**
   * Run cycles at the configured cadence until stop(). Rejects with
   * FatalStorageError when frame writes keep failing, and with
   * SourceClosedError when the source goes away.
   */
  async run(): Promise<void> {
    if (this.state === "RUNNING") {
      throw new Error("DetectionLoop already running");
    }
    this.state = "RUNNING";
    console.log("[DogWatchLoop] running");

    try {
      while (!this.stopRequested) {
        const started = Date.now();
        await this.runCycle();

        if (this.sourceLost && !this.stopRequested) {
          throw this.sourceLost;
        }
        const failures = this.deps.frameStore.consecutiveWriteFailures;
        if (failures >= this.options.maxConsecutiveWriteFailures) {
          throw new FatalStorageError(failures);
        }

        const delay = Math.max(0, started + this.options.intervalMs - Date.now());
        await this.pause(delay);
      }
    } finally {
      this.state = "STOPPED";
      console.log("[DogWatchLoop] stopped");
    }
  }

  /** Request shutdown. The current cycle, if any, completes first. */
  stop(): void {
    this.stopRequested = true;
    const wake = this.wake;
    if (wake) {
      this.wake = null;
      wake();
    }
  }

  async runCycle(): Promise<CycleResult> {
    const { source, analyzer, status } = this.deps;
    let result: CycleResult;

    try {
      const sample = await source.acquire(AbortSignal.timeout(this.options.acquireTimeoutMs));
      const event = analyzer.analyze(sample);
      const decision = decide(event);
      result = await this.apply(decision, sample.image, sample.capturedAt);
    } catch (e) {
      const message = errorMessage(e);
      if (e instanceof SourceClosedError) {
        this.sourceLost = e;
      }
      console.error("[DogWatchLoop] cycle failed:", message);
      result = { decision: IDLE, frameSaved: false, notified: false, error: message };
    }

    status.publish(buildStatus(result.decision, this.lastDogSeen, this.clock()));
    return result;
  }

  private async apply(
    decision: GateDecision,
    image: Buffer,
    capturedAt: Date
  ): Promise<CycleResult> {
    switch (decision.kind) {
      case "HUMAN_PRESENT":
        // Frame dropped here: no write, no notification.
        console.debug("[DogWatchLoop] human detected, frame discarded (privacy mode)");
        return { decision, frameSaved: false, notified: false };

      case "IDLE":
        return { decision, frameSaved: false, notified: false };

      case "DOG_ONLY": {
        const { frameStore, throttle, alertSound } = this.deps;
        const now = this.clock();
        this.lastDogSeen = formatLocalDateTime(now);

        const record = await frameStore.insert(decision, image, capturedAt);
        const dogsWord = decision.count === 1 ? "dog" : "dogs";
        console.log(
          `[DogWatchLoop] ${decision.count} ${dogsWord} detected (${Math.round(decision.confidence * 100)}% confidence)` +
            (record ? `, frame saved: ${record.name}` : ", frame not saved")
        );

        const notified = throttle.maybeNotify(decision, now.getTime());
        if (notified && alertSound) {
          alertSound
            .play()
            .catch((e: unknown) => console.warn("[DogWatchLoop] alert sound error:", errorMessage(e)));
        }
        return { decision, frameSaved: record !== null, notified };
      }
    }
  }

  private pause(ms: number): Promise<void> {
    if (this.stopRequested || ms <= 0) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}
