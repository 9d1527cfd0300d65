import { Detection } from '../types/detection';
import { TaskStatus } from '../types/task';

/** Status symbols read top to bottom. */
export type OrderFingerprint = TaskStatus[];

/**
 * Sorts symbols by vertical center. Ties fall back to horizontal center and
 * then label so the detector's array order never leaks into the result.
 */
export function extractOrderFingerprint(detections: readonly Detection[]): OrderFingerprint {
  return [...detections]
    .sort((a, b) =>
      a.center.y - b.center.y
      || a.center.x - b.center.x
      || a.class.localeCompare(b.class))
    .map((detection) => detection.class);
}

export function fingerprintsEqual(a: readonly TaskStatus[], b: readonly TaskStatus[]): boolean {
  return a.length === b.length && a.every((status, i) => status === b[i]);
}
