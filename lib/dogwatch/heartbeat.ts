/**
 * HealthHeartbeat — low-priority "still alive" ping on its own topic
 *
 * Runs on its own timer, independent of detection cadence and of the alert
 * cooldown. One ping at start, then every interval.
 */

import { errorMessage } from "./errors";
import { formatLocalDateTime } from "./time";
import type { NotificationMessage, NotificationTransport } from "./types";

export interface HealthHeartbeatOptions {
  transport: NotificationTransport;
  topic: string;
  intervalMs: number;
  clock?: () => Date;
}

export function buildHeartbeat(topic: string, at: Date): NotificationMessage {
  return {
    topic,
    title: "DogWatch Heartbeat",
    body: `DogWatch running as of ${formatLocalDateTime(at)}`,
    priority: "low",
    tags: ["heartbeat"],
  };
}

export class HealthHeartbeat {
  private readonly options: HealthHeartbeatOptions;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: HealthHeartbeatOptions) {
    this.options = options;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.beat();
    this.timer = setInterval(() => this.beat(), this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  private beat(): void {
    const { transport, topic, clock } = this.options;
    const message = buildHeartbeat(topic, clock ? clock() : new Date());
    Promise.resolve()
      .then(() => transport.send(message))
      .then(() => console.log("[HealthHeartbeat] sent"))
      .catch((e: unknown) => console.error("[HealthHeartbeat] error:", errorMessage(e)));
  }
}
