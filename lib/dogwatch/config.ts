/**
 * DogWatch — Configuration
 *
 * Every tunable comes from env with a default. Invalid values fall back to the
 * default rather than failing startup.
 *
 * Env: DOGWATCH_DOG_THRESHOLD (0.5), DOGWATCH_HUMAN_THRESHOLD (0.3),
 *      DOGWATCH_CAPTURE_INTERVAL_SECONDS (1), DOGWATCH_NOTIFY_COOLDOWN_SECONDS (60),
 *      DOGWATCH_MAX_KEPT_FRAMES (10), DOGWATCH_HEARTBEAT_INTERVAL_SECONDS (1800), ...
 */

import path from "path";
import type { BoundingBox } from "./types";

export const DEFAULT_DOG_THRESHOLD = 0.5;
/** Kept below the dog threshold. */
export const DEFAULT_HUMAN_THRESHOLD = 0.3;
export const DEFAULT_CAPTURE_INTERVAL_SECONDS = 1;
export const DEFAULT_ACQUIRE_TIMEOUT_MS = 5000;
export const DEFAULT_NOTIFY_COOLDOWN_SECONDS = 60;
export const DEFAULT_MAX_KEPT_FRAMES = 10;
export const DEFAULT_MAX_WRITE_FAILURES = 5;
export const DEFAULT_HEARTBEAT_INTERVAL_SECONDS = 1800;
export const DEFAULT_ROI_OVERLAP = 0.5;
export const FULL_FRAME_ROI: BoundingBox = { x1: 0, y1: 0, x2: 1, y2: 1 };

export interface DogWatchConfig {
  dogLabel: string;
  humanLabel: string;
  dogThreshold: number;
  humanThreshold: number;
  labelsPath: string;
  roi: BoundingBox;
  roiOverlapThreshold: number;
  captureIntervalMs: number;
  acquireTimeoutMs: number;
  notifyCooldownMs: number;
  maxKeptFrames: number;
  maxConsecutiveWriteFailures: number;
  heartbeatIntervalMs: number;
  frameDir: string;
  statusFile: string;
  ntfyServer: string;
  alertTopic: string;
  healthTopic: string;
  audioEnabled: boolean;
  audioDevice: string;
  alertSoundPath: string;
  /** Sidecar command line; the pipeline does not start without it. */
  sourceCommand: string | null;
}

type Env = Record<string, string | undefined>;

function readRaw(env: Env, name: string): string | undefined {
  const v = env[name];
  if (v === undefined) return undefined;
  const trimmed = v.trim();
  return trimmed === "" ? undefined : trimmed;
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  isValid: (n: number) => boolean
): number {
  const v = readRaw(env, name);
  if (v === undefined) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && isValid(n) ? n : fallback;
}

function readString(env: Env, name: string, fallback: string): string {
  return readRaw(env, name) ?? fallback;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const v = readRaw(env, name);
  if (v === undefined) return fallback;
  if (v === "1" || v.toLowerCase() === "true") return true;
  if (v === "0" || v.toLowerCase() === "false") return false;
  return fallback;
}

function resolvePath(p: string, cwd: string): string {
  return path.isAbsolute(p) ? p : path.join(cwd, p);
}

const isProbability = (n: number) => n >= 0 && n <= 1;
const isPositive = (n: number) => n > 0;
const isNonNegative = (n: number) => n >= 0;

/**
 * Parse "x1,y1,x2,y2" (fractions of the frame). Returns null when malformed,
 * out of range, or empty.
 */
export function parseRoi(value: string): BoundingBox | null {
  const parts = value.split(",").map((p) => Number(p.trim()));
  if (parts.length !== 4 || parts.some((n) => !Number.isFinite(n) || n < 0 || n > 1)) {
    return null;
  }
  const [x1, y1, x2, y2] = parts;
  if (x2 <= x1 || y2 <= y1) return null;
  return { x1, y1, x2, y2 };
}

export function loadDogWatchConfig(
  env: Env = process.env,
  cwd: string = process.cwd()
): DogWatchConfig {
  const roiRaw = readRaw(env, "DOGWATCH_ROI");
  const roi = (roiRaw !== undefined ? parseRoi(roiRaw) : null) ?? FULL_FRAME_ROI;

  return {
    dogLabel: readString(env, "DOGWATCH_DOG_LABEL", "dog"),
    humanLabel: readString(env, "DOGWATCH_HUMAN_LABEL", "person"),
    dogThreshold: readNumber(env, "DOGWATCH_DOG_THRESHOLD", DEFAULT_DOG_THRESHOLD, isProbability),
    humanThreshold: readNumber(
      env,
      "DOGWATCH_HUMAN_THRESHOLD",
      DEFAULT_HUMAN_THRESHOLD,
      isProbability
    ),
    labelsPath: resolvePath(readString(env, "DOGWATCH_LABELS_PATH", "config/coco_labels.txt"), cwd),
    roi,
    roiOverlapThreshold: readNumber(env, "DOGWATCH_ROI_OVERLAP", DEFAULT_ROI_OVERLAP, isProbability),
    captureIntervalMs:
      readNumber(
        env,
        "DOGWATCH_CAPTURE_INTERVAL_SECONDS",
        DEFAULT_CAPTURE_INTERVAL_SECONDS,
        isPositive
      ) * 1000,
    acquireTimeoutMs: readNumber(
      env,
      "DOGWATCH_ACQUIRE_TIMEOUT_MS",
      DEFAULT_ACQUIRE_TIMEOUT_MS,
      isPositive
    ),
    notifyCooldownMs:
      readNumber(
        env,
        "DOGWATCH_NOTIFY_COOLDOWN_SECONDS",
        DEFAULT_NOTIFY_COOLDOWN_SECONDS,
        isNonNegative
      ) * 1000,
    maxKeptFrames: readNumber(
      env,
      "DOGWATCH_MAX_KEPT_FRAMES",
      DEFAULT_MAX_KEPT_FRAMES,
      (n) => Number.isInteger(n) && n >= 1
    ),
    maxConsecutiveWriteFailures: readNumber(
      env,
      "DOGWATCH_MAX_WRITE_FAILURES",
      DEFAULT_MAX_WRITE_FAILURES,
      (n) => Number.isInteger(n) && n >= 1
    ),
    heartbeatIntervalMs:
      readNumber(
        env,
        "DOGWATCH_HEARTBEAT_INTERVAL_SECONDS",
        DEFAULT_HEARTBEAT_INTERVAL_SECONDS,
        isPositive
      ) * 1000,
    frameDir: resolvePath(readString(env, "DOGWATCH_FRAME_DIR", "captures/frames"), cwd),
    statusFile: resolvePath(readString(env, "DOGWATCH_STATUS_FILE", "captures/status.json"), cwd),
    ntfyServer: readString(env, "DOGWATCH_NTFY_SERVER", "https://ntfy.sh").replace(/\/+$/, ""),
    alertTopic: readString(env, "DOGWATCH_NTFY_TOPIC", "dogwatch-alerts"),
    healthTopic: readString(env, "DOGWATCH_NTFY_HEALTH_TOPIC", "dogwatch-health"),
    audioEnabled: readBoolean(env, "DOGWATCH_AUDIO_ENABLED", false),
    audioDevice: readString(env, "DOGWATCH_AUDIO_DEVICE", "plughw:0,0"),
    alertSoundPath: resolvePath(readString(env, "DOGWATCH_ALERT_SOUND", "config/alert.wav"), cwd),
    sourceCommand: readRaw(env, "DOGWATCH_SOURCE_COMMAND") ?? null,
  };
}

/**
 * Loggable view of the config (topics are treated as secrets: anyone who knows
 * an ntfy topic can read it).
 */
export function describeConfig(config: DogWatchConfig): Record<string, string | number | boolean> {
  return {
    dogThreshold: config.dogThreshold,
    humanThreshold: config.humanThreshold,
    captureIntervalMs: config.captureIntervalMs,
    notifyCooldownMs: config.notifyCooldownMs,
    maxKeptFrames: config.maxKeptFrames,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    roi: `${config.roi.x1},${config.roi.y1},${config.roi.x2},${config.roi.y2}`,
    frameDir: config.frameDir,
    audioEnabled: config.audioEnabled,
  };
}
