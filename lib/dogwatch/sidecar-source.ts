/**
 * Sidecar inference source
 *
 * Spawns the camera driver and reads one JSON object per line from its stdout.
 * Each line is one capture and carries both the inference output and the JPEG
 * of that same capture:
 *
 *   {"captured_at": "2026-01-02T03:04:05.000Z",
 *    "outputs": {"boxes": [[x1,y1,x2,y2], ...], "classes": [...], "scores": [...], "num": n},
 *    "image": "<base64 jpeg>"}
 *
 * `"detections": [{"label", "score", "bbox": {x1,y1,x2,y2}}]` may replace
 * `"outputs"` for drivers that label detections themselves.
 *
 * Only the newest unconsumed capture is kept; older ones are dropped.
 */

import { spawn } from "child_process";
import type { ChildProcess } from "child_process";
import { createInterface } from "readline";
import { InferenceTimeoutError, InvalidInferenceError, SourceClosedError, errorMessage } from "./errors";
import { isBoundingBox } from "./types";
import type { Detection, InferenceResult, InferenceSample, InferenceSource } from "./types";

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((n) => typeof n === "number");
}

function parseOutputs(v: unknown): InferenceResult {
  if (!v || typeof v !== "object") {
    throw new InvalidInferenceError("outputs must be an object");
  }
  const o = v as Record<string, unknown>;
  if (!Array.isArray(o.boxes) || !o.boxes.every(isNumberArray)) {
    throw new InvalidInferenceError("outputs.boxes must be an array of number arrays");
  }
  if (!isNumberArray(o.classes) || !isNumberArray(o.scores) || typeof o.num !== "number") {
    throw new InvalidInferenceError("outputs.classes/scores/num missing or malformed");
  }
  return { format: "ssd", boxes: o.boxes, classes: o.classes, scores: o.scores, num: o.num };
}

function parseDetections(v: unknown): InferenceResult {
  if (!Array.isArray(v)) {
    throw new InvalidInferenceError("detections must be an array");
  }
  const detections: Detection[] = v.map((d, i) => {
    if (!d || typeof d !== "object") {
      throw new InvalidInferenceError(`detection ${i} must be an object`);
    }
    const o = d as Record<string, unknown>;
    if (typeof o.label !== "string" || typeof o.score !== "number" || !isBoundingBox(o.bbox)) {
      throw new InvalidInferenceError(`detection ${i} missing label, score or bbox`);
    }
    return { label: o.label, score: o.score, bbox: o.bbox };
  });
  return { format: "detections", detections };
}

/**
 * Validate one sidecar line. Throws InvalidInferenceError on anything unexpected.
 */
export function parseSampleLine(line: string, now: Date = new Date()): InferenceSample {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (e) {
    throw new InvalidInferenceError(`not JSON: ${errorMessage(e)}`);
  }
  if (!data || typeof data !== "object") {
    throw new InvalidInferenceError("sample must be an object");
  }
  const o = data as Record<string, unknown>;

  if (typeof o.image !== "string" || o.image.length === 0) {
    throw new InvalidInferenceError("image missing");
  }

  let result: InferenceResult;
  if (o.outputs !== undefined) {
    result = parseOutputs(o.outputs);
  } else if (o.detections !== undefined) {
    result = parseDetections(o.detections);
  } else {
    throw new InvalidInferenceError("sample has neither outputs nor detections");
  }

  let capturedAt = now;
  if (typeof o.captured_at === "string") {
    const parsed = new Date(o.captured_at);
    if (isNaN(parsed.getTime())) {
      throw new InvalidInferenceError(`invalid captured_at: ${o.captured_at}`);
    }
    capturedAt = parsed;
  }

  return { capturedAt, result, image: Buffer.from(o.image, "base64") };
}

export function splitCommand(command: string): { cmd: string; args: string[] } {
  const parts = command.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) {
    throw new Error("Empty source command");
  }
  const [cmd, ...args] = parts;
  return { cmd, args };
}

interface Waiter {
  resolve: (sample: InferenceSample) => void;
  reject: (err: Error) => void;
}

export class SidecarInferenceSource implements InferenceSource {
  private child: ChildProcess | null = null;
  private latest: InferenceSample | null = null;
  private waiter: Waiter | null = null;
  private closed = false;

  constructor(private readonly command: string) {}

  start(): void {
    if (this.child) return;
    const { cmd, args } = splitCommand(this.command);
    const child = spawn(cmd, args, { stdio: ["ignore", "pipe", "inherit"] });
    this.child = child;
    console.log("[SidecarSource] started:", cmd, "pid:", child.pid ?? "unknown");

    if (child.stdout) {
      const lines = createInterface({ input: child.stdout });
      lines.on("line", (line) => this.handleLine(line));
    }

    child.on("error", (err) => {
      console.error("[SidecarSource] spawn error:", err.message);
      this.markClosed();
    });
    child.on("exit", (code, signal) => {
      console.warn("[SidecarSource] exited, code:", code ?? "none", "signal:", signal ?? "none");
      this.markClosed();
    });
  }

  /** Feed one raw line; exposed so the parser/hand-off can be driven without a child. */
  handleLine(line: string): void {
    if (line.trim() === "") return;
    let sample: InferenceSample;
    try {
      sample = parseSampleLine(line);
    } catch (e) {
      console.warn("[SidecarSource] skipping invalid line:", errorMessage(e));
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(sample);
    } else {
      this.latest = sample;
    }
  }

  acquire(signal: AbortSignal): Promise<InferenceSample> {
    if (this.latest) {
      const sample = this.latest;
      this.latest = null;
      return Promise.resolve(sample);
    }
    if (this.closed) {
      return Promise.reject(new SourceClosedError());
    }
    if (signal.aborted) {
      return Promise.reject(new InferenceTimeoutError());
    }
    if (this.waiter) {
      return Promise.reject(new Error("acquire() already pending"));
    }

    return new Promise<InferenceSample>((resolve, reject) => {
      const onAbort = () => {
        if (this.waiter === waiter) this.waiter = null;
        reject(new InferenceTimeoutError());
      };
      const waiter: Waiter = {
        resolve: (sample) => {
          signal.removeEventListener("abort", onAbort);
          resolve(sample);
        },
        reject: (err) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
      this.waiter = waiter;
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  close(): void {
    if (this.child && this.child.exitCode === null) {
      this.child.kill("SIGTERM");
    }
    this.markClosed();
  }

  private markClosed(): void {
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(new SourceClosedError());
    }
  }
}
