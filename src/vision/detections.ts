import { Detection, DetectionFilter, RawDetection } from '../types/detection';
import { parseTaskStatus } from '../types/task';

/**
 * Keeps only status symbols: confidence strictly above the threshold, a known
 * status label, and never the annotation-only label.
 */
export function toActionableDetections(raw: readonly RawDetection[], filter: DetectionFilter): Detection[] {
  const actionable: Detection[] = [];
  for (const detection of raw) {
    const label = filter.labels[detection.classId];
    if (label === undefined || label === filter.nonActionableLabel) continue;
    if (detection.confidence <= filter.confidenceThreshold) continue;

    const status = parseTaskStatus(label);
    if (!status) continue;

    const [xmin, ymin, xmax, ymax] = detection.box;
    actionable.push({
      class: status,
      center: { x: (xmin + xmax) / 2, y: (ymin + ymax) / 2 },
      confidence: detection.confidence,
    });
  }
  return actionable;
}
