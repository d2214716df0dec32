/**
 * DogWatch — Core types
 *
 * Shapes shared by the detection pipeline (source → analyzer → gate → store/notify → status)
 * and the read-only serving routes.
 */

/** Normalized to [0, 1] of frame width/height. */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Detection {
  label: string;
  score: number;
  bbox: BoundingBox;
}

/**
 * Post-processed SSD output: parallel arrays indexed by detection, plus the
 * number of valid entries. Class ids resolve through a label list.
 */
export interface SsdInferenceResult {
  format: "ssd";
  boxes: number[][];
  classes: number[];
  scores: number[];
  num: number;
}

export interface LabelledInferenceResult {
  format: "detections";
  detections: Detection[];
}

export type InferenceResult = SsdInferenceResult | LabelledInferenceResult;

/**
 * One atomic acquisition: the inference metadata and the JPEG bytes come from
 * the same sensor capture.
 */
export interface InferenceSample {
  capturedAt: Date;
  result: InferenceResult;
  image: Buffer;
}

export interface DetectionEvent {
  capturedAt: Date;
  detections: Detection[];
  dogCount: number;
  maxDogConfidence: number;
  humanPresent: boolean;
}

export interface IdleDecision {
  kind: "IDLE";
}

export interface DogOnlyDecision {
  kind: "DOG_ONLY";
  count: number;
  confidence: number;
}

/** Human alone or human + dog. `dogCount` is for status reporting only. */
export interface HumanPresentDecision {
  kind: "HUMAN_PRESENT";
  dogCount: number;
}

export type GateDecision = IdleDecision | DogOnlyDecision | HumanPresentDecision;

export interface FrameRecord {
  /** dog_<YYYYMMDD>_<HHMMSS>.jpg */
  name: string;
  path: string;
  capturedAt: Date;
  createdAt: Date;
}

export interface FrameListing {
  name: string;
  /** YYYY-MM-DD HH:MM:SS, or "" when the name does not carry a time */
  time: string;
}

/**
 * Status snapshot served at /api/status. Serialized as-is, so every field is
 * always present.
 */
export interface SystemStatus {
  dog_detected: boolean;
  human_detected: boolean;
  recording_active: boolean;
  privacy_mode: boolean;
  dog_count: number;
  last_dog_seen: string | null;
  timestamp: string;
}

export type NotificationPriority = "min" | "low" | "default" | "high" | "urgent";

export interface NotificationMessage {
  topic: string;
  title: string;
  body: string;
  priority: NotificationPriority;
  tags: string[];
}

export interface InferenceSource {
  /** Resolves with the next capture; rejects when `signal` aborts first. */
  acquire(signal: AbortSignal): Promise<InferenceSample>;
  close(): void;
}

/** Best-effort delivery. A rejected promise means the message was dropped. */
export interface NotificationTransport {
  send(message: NotificationMessage): Promise<void>;
}

export function isBoundingBox(value: unknown): value is BoundingBox {
  if (!value || typeof value !== "object") return false;
  const o = value as Record<string, unknown>;
  return (
    typeof o.x1 === "number" &&
    typeof o.y1 === "number" &&
    typeof o.x2 === "number" &&
    typeof o.y2 === "number"
  );
}

export function isSystemStatus(value: unknown): value is SystemStatus {
  if (!value || typeof value !== "object") return false;
  const o = value as Record<string, unknown>;
  return (
    typeof o.dog_detected === "boolean" &&
    typeof o.human_detected === "boolean" &&
    typeof o.recording_active === "boolean" &&
    typeof o.privacy_mode === "boolean" &&
    typeof o.dog_count === "number" &&
    Number.isInteger(o.dog_count) &&
    o.dog_count >= 0 &&
    (o.last_dog_seen === null || typeof o.last_dog_seen === "string") &&
    typeof o.timestamp === "string"
  );
}
