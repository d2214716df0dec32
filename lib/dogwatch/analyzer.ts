/**
 * DetectionAnalyzer — one inference result → DetectionEvent
 *
 * Thresholds are inclusive. Every qualifying dog counts (multi-dog support);
 * a single qualifying human is enough to mark the frame as human-present.
 * Dogs must also sit inside the region of interest (the full frame by default,
 * which still drops zero-area and off-frame boxes); humans are never ROI-filtered.
 */

import { decodeSsdOutput } from "./ssd-output";
import type { BoundingBox, Detection, DetectionEvent, InferenceSample } from "./types";

export interface AnalyzerConfig {
  dogLabel: string;
  humanLabel: string;
  dogThreshold: number;
  humanThreshold: number;
  /** Class id → label, for SSD output. */
  labels: readonly string[];
  roi: BoundingBox;
  roiOverlapThreshold: number;
}

/**
 * Fraction of `box` that lies inside `roi`, in [0, 1]. Zero-area boxes → 0.
 */
export function bboxOverlapFraction(box: BoundingBox, roi: BoundingBox): number {
  const ix1 = Math.max(box.x1, roi.x1);
  const iy1 = Math.max(box.y1, roi.y1);
  const ix2 = Math.min(box.x2, roi.x2);
  const iy2 = Math.min(box.y2, roi.y2);
  if (ix1 >= ix2 || iy1 >= iy2) return 0;

  const area = (box.x2 - box.x1) * (box.y2 - box.y1);
  if (area <= 0) return 0;
  return ((ix2 - ix1) * (iy2 - iy1)) / area;
}

export class DetectionAnalyzer {
  private readonly config: AnalyzerConfig;
  constructor(config: AnalyzerConfig) {
    this.config = config;
  }

  analyze(sample: InferenceSample): DetectionEvent {
    const detections =
      sample.result.format === "ssd"
        ? decodeSsdOutput(sample.result, this.config.labels)
        : sample.result.detections;
    return this.summarize(detections, sample.capturedAt);
  }

  summarize(detections: Detection[], capturedAt: Date): DetectionEvent {
    const { dogLabel, humanLabel, dogThreshold, humanThreshold } = this.config;
    let dogCount = 0;
    let maxDogConfidence = 0;
    let humanPresent = false;

    for (const d of detections) {
      if (d.label === humanLabel && d.score >= humanThreshold) {
        humanPresent = true;
      }
      if (d.label === dogLabel && d.score >= dogThreshold && this.inRoi(d.bbox)) {
        dogCount++;
        maxDogConfidence = Math.max(maxDogConfidence, d.score);
      }
    }

    return { capturedAt, detections, dogCount, maxDogConfidence, humanPresent };
  }

  private inRoi(box: BoundingBox): boolean {
    return bboxOverlapFraction(box, this.config.roi) >= this.config.roiOverlapThreshold;
  }
}
