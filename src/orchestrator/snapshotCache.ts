import { DailyMeta, ExtractionResult } from '../types/task';
import { OrderFingerprint } from '../vision/orderFingerprint';

export interface SnapshotEntry {
  extraction: ExtractionResult;
  fingerprint: OrderFingerprint;
  dailyId: string;
  dailyMeta: DailyMeta;
}

/**
 * Last successful extraction with its order fingerprint and daily record.
 * Lives for the process only; the store is authoritative whenever they disagree.
 */
export class SnapshotCache {
  private entry: SnapshotEntry | null = null;

  get(): SnapshotEntry | null {
    return this.entry ? structuredClone(this.entry) : null;
  }

  has(): boolean {
    return this.entry !== null;
  }

  store(entry: SnapshotEntry): void {
    this.entry = structuredClone(entry);
  }

  /** Records a new order for the cached extraction (same length, different sequence). */
  updateOrder(fingerprint: OrderFingerprint): void {
    if (this.entry) {
      this.entry = { ...this.entry, fingerprint: [...fingerprint] };
    }
  }

  invalidate(): void {
    this.entry = null;
  }
}
