import { TaskStatus } from './task';

/** [xmin, ymin, xmax, ymax] in frame pixels. */
export type BoundingBox = [number, number, number, number];

/** One box as reported by the detector for a single frame. */
export interface RawDetection {
  box: BoundingBox;
  classId: number;
  confidence: number;
}

export interface Point {
  x: number;
  y: number;
}

/** An actionable status symbol: above threshold, not an annotation-only class. */
export interface Detection {
  class: TaskStatus;
  center: Point;
  confidence: number;
}

export interface Frame {
  index: number;
  width: number;
  height: number;
  /** Path of the captured frame on disk, handed to OCR when an action fires. */
  imagePath?: string;
  detections: RawDetection[];
}

export interface DetectionFilter {
  /** Class label per detector class id. */
  labels: string[];
  /** Detections at or below this confidence are ignored. */
  confidenceThreshold: number;
  /** Annotation-only label that never counts as a status symbol. */
  nonActionableLabel: string;
}
