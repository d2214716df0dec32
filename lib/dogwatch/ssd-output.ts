/**
 * SSD output decoding
 *
 * Post-processed MobileNet SSD layout: boxes (normalized x1,y1,x2,y2), class ids,
 * scores, and a count of valid entries. Entries that do not match this layout
 * are rejected.
 */

import { readFileSync } from "fs";
import { InvalidInferenceError } from "./errors";
import type { Detection, SsdInferenceResult } from "./types";

export function loadLabels(labelsPath: string): string[] {
  const lines = readFileSync(labelsPath, "utf-8").split(/\r?\n/).map((l) => l.trim());
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function labelForClass(classId: number, labels: readonly string[]): string {
  return classId >= 0 && classId < labels.length ? labels[classId] : `unknown(${classId})`;
}

export function decodeSsdOutput(
  output: SsdInferenceResult,
  labels: readonly string[]
): Detection[] {
  if (!Number.isInteger(output.num) || output.num < 0) {
    throw new InvalidInferenceError(`Invalid detection count: ${output.num}`);
  }
  const n = Math.min(output.num, output.boxes.length, output.classes.length, output.scores.length);
  const detections: Detection[] = [];

  for (let i = 0; i < n; i++) {
    const box = output.boxes[i];
    if (box.length !== 4 || box.some((v) => !Number.isFinite(v))) {
      throw new InvalidInferenceError(`Malformed box at index ${i}`);
    }
    const score = output.scores[i];
    if (!Number.isFinite(score)) {
      throw new InvalidInferenceError(`Malformed score at index ${i}`);
    }
    const [x1, y1, x2, y2] = box;
    detections.push({
      label: labelForClass(Math.trunc(output.classes[i]), labels),
      score,
      bbox: { x1, y1, x2, y2 },
    });
  }

  return detections;
}
