/**
 * NotificationThrottle — cooldown-gated dog alerts
 *
 * One alert per cooldown window. `lastSentMs` moves only when a send is
 * attempted, so suppressed detections never extend the window. Dispatch is
 * detached from the caller; failures are logged and dropped (no retry, no queue).
 */

import { errorMessage } from "./errors";
import { formatLocalDateTime } from "./time";
import type { DogOnlyDecision, GateDecision, NotificationMessage, NotificationTransport } from "./types";

export interface NotificationThrottleOptions {
  transport: NotificationTransport;
  topic: string;
  cooldownMs: number;
}

export function buildDogAlert(
  topic: string,
  decision: DogOnlyDecision,
  at: Date
): NotificationMessage {
  const dogsWord = decision.count === 1 ? "dog" : "dogs";
  const pct = Math.round(decision.confidence * 100);
  return {
    topic,
    title: "Dog Alert!",
    body: `${decision.count} ${dogsWord} on couch detected at ${formatLocalDateTime(at)} (${pct}% confidence)`,
    priority: "default",
    tags: ["dog"],
  };
}

export class NotificationThrottle {
  private readonly transport: NotificationTransport;
  private readonly topic: string;
  private readonly cooldownMs: number;
  private lastSentMs: number | null = null;

  constructor(options: NotificationThrottleOptions) {
    this.transport = options.transport;
    this.topic = options.topic;
    this.cooldownMs = options.cooldownMs;
  }

  /**
   * Returns true when a send was dispatched. Only DOG_ONLY can send.
   */
  maybeNotify(decision: GateDecision, nowMs: number): boolean {
    if (decision.kind !== "DOG_ONLY") return false;
    if (this.lastSentMs !== null && nowMs - this.lastSentMs < this.cooldownMs) {
      return false;
    }

    this.lastSentMs = nowMs;
    const message = buildDogAlert(this.topic, decision, new Date(nowMs));
    Promise.resolve()
      .then(() => this.transport.send(message))
      .then(() => console.log("[NotificationThrottle] sent:", message.body))
      .catch((e: unknown) =>
        console.error("[NotificationThrottle] delivery failed:", errorMessage(e))
      );
    return true;
  }
}
