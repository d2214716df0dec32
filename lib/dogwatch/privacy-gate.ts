/**
 * Privacy gate. Human presence wins over any number of dogs.
 */

import type { DetectionEvent, GateDecision, IdleDecision } from "./types";

export function decide(event: DetectionEvent): GateDecision {
  if (event.humanPresent) {
    return { kind: "HUMAN_PRESENT", dogCount: event.dogCount };
  }
  if (event.dogCount > 0) {
    return { kind: "DOG_ONLY", count: event.dogCount, confidence: event.maxDogConfidence };
  }
  return { kind: "IDLE" };
}

export const IDLE: IdleDecision = { kind: "IDLE" };
