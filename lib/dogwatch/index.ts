/**
 * DogWatch — privacy-first dog detection pipeline
 *
 * Unified exports for the detection pipeline and the serving routes.
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export { DetectionAnalyzer, bboxOverlapFraction } from "./analyzer";
export type { AnalyzerConfig } from "./analyzer";
export { decide, IDLE } from "./privacy-gate";
export {
  FrameStore,
  listFrames,
  parseFrameLimit,
  frameNameFor,
  isFrameName,
  parseFrameTime,
  displayTime,
} from "./frame-store";
export { NotificationThrottle, buildDogAlert } from "./throttle";
export { StatusPublisher, buildStatus, idleStatus, readStatusSnapshot } from "./status";
export { HealthHeartbeat } from "./heartbeat";
export { DetectionLoop } from "./detection-loop";
export type { CycleResult, LoopState } from "./detection-loop";
export { NtfyTransport } from "./ntfy";
export { SidecarInferenceSource, parseSampleLine } from "./sidecar-source";
export { AlertSound } from "./alert-sound";
