import { ActionKind, ActionOutcome, asCollaboratorFailure, ParseFailure, PipelineError } from '../errors';
import { log, LogLevel } from '../logger';
import { OcrClient } from '../ocr/ocrClient';
import { parseOcrPayload } from '../ocr/ocrPayloadParser';
import { compareTaskNames, mergeFreshNames } from '../reconciliation/nameDrift';
import { applyNarrowPatch, PatchSummary } from '../reconciliation/narrowPatch';
import { applyOrderToExtraction, ReconcileResult, TaskReconciler } from '../reconciliation/taskReconciler';
import { toLocalDateId } from '../reconciliation/timestamps';
import { DailyRepository } from '../store/dailyRepository';
import { DailyMeta, ExistingTasksMap, ExtractionResult } from '../types/task';
import { fingerprintsEqual, OrderFingerprint } from '../vision/orderFingerprint';
import { SnapshotCache, SnapshotEntry } from './snapshotCache';

export interface PipelineDependencies {
  ocr: OcrClient;
  repository: DailyRepository;
  reconciler: TaskReconciler;
  cache: SnapshotCache;
  clock?: () => Date;
}

export type TurboResult = ReconcileResult | PatchSummary;

export function dailyMetaFor(now: Date): DailyMeta {
  const timestamp = now.toISOString();
  return { date: toLocalDateId(now), createdAt: timestamp, updatedAt: timestamp, cardScannedAt: timestamp };
}

function failed<T>(action: ActionKind, message: string, error: PipelineError): ActionOutcome<T> {
  return { action, status: 'failed', message: `${message}: ${error.message}`, error };
}

/**
 * The background actions behind each trigger decision: OCR-only, the slow
 * path (full OCR, reconcile, cache) and the fast path (order application plus
 * a name-drift check).
 */
export class SheetPipeline {
  private readonly ocr: OcrClient;
  private readonly repository: DailyRepository;
  private readonly reconciler: TaskReconciler;
  private readonly cache: SnapshotCache;
  private readonly clock: () => Date;

  constructor(deps: PipelineDependencies) {
    this.ocr = deps.ocr;
    this.repository = deps.repository;
    this.reconciler = deps.reconciler;
    this.cache = deps.cache;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Runs OCR and logs the reply. Nothing is parsed, cached or written. */
  async runOcrOnly(imagePath: string): Promise<ActionOutcome<string>> {
    try {
      const text = await this.ocr.extract(imagePath, 'full');
      log(LogLevel.RESPONSE, `[OCR] Result:\n${text}`);
      return { action: 'ocr_only', status: 'success', message: `OCR returned ${text.length} characters`, data: text };
    } catch (error) {
      return failed('ocr_only', 'OCR failed', asCollaboratorFailure('ocr', error));
    }
  }

  private async extractTasks(imagePath: string, tier: 'full' | 'fast'): Promise<ExtractionResult> {
    let payload: string;
    try {
      payload = await this.ocr.extract(imagePath, tier);
    } catch (error) {
      throw asCollaboratorFailure('ocr', error);
    }
    return parseOcrPayload(payload);
  }

  /**
   * Slow path. On success the cache holds this extraction and its
   * fingerprint; on a parse failure cache and store are left as they were.
   */
  async runFullExtraction(
    action: 'initial_scan' | 'full_ocr',
    imagePath: string,
    fingerprint: OrderFingerprint,
  ): Promise<ActionOutcome<ReconcileResult>> {
    let extraction: ExtractionResult;
    try {
      extraction = await this.extractTasks(imagePath, 'full');
    } catch (error) {
      const pipelineError = asCollaboratorFailure('ocr', error);
      if (pipelineError instanceof ParseFailure) {
        log(LogLevel.DEBUG, `[OCR] Unparseable reply:\n${pipelineError.rawPayload}`);
      }
      return failed(action, 'Extraction failed', pipelineError);
    }

    this.cache.invalidate();
    const now = this.clock();
    const dailyId = toLocalDateId(now);

    try {
      const result = await this.reconciler.reconcile(extraction, dailyId, dailyMetaFor(now), now);
      this.cache.store({ extraction, fingerprint, dailyId, dailyMeta: result.daily });
      return {
        action,
        status: 'success',
        message: `Processed ${result.tasks.length} tasks for ${dailyId} and stored the snapshot`,
        data: result,
      };
    } catch (error) {
      return failed(action, 'Reconciliation failed', asCollaboratorFailure('store', error));
    }
  }

  /**
   * Fast path. A fingerprint of a different length means tasks were added or
   * removed, so the slow path runs instead; a reordered fingerprint of the same
   * length replaces the cached one.
   */
  async runTurbo(imagePath: string | undefined, fingerprint: OrderFingerprint): Promise<ActionOutcome<TurboResult>> {
    const snapshot = this.cache.get();
    if (!snapshot) {
      return { action: 'turbo', status: 'skipped', message: 'No cached extraction; run a full OCR first' };
    }

    if (!fingerprintsEqual(fingerprint, snapshot.fingerprint)) {
      if (fingerprint.length !== snapshot.fingerprint.length) {
        log(LogLevel.INFO, `[Turbo] Symbol count changed (${snapshot.fingerprint.length} -> ${fingerprint.length}); running full OCR`);
        if (!imagePath) {
          return { action: 'turbo', status: 'skipped', message: 'Symbol count changed but no frame image is available' };
        }
        const outcome = await this.runFullExtraction('full_ocr', imagePath, fingerprint);
        return {
          ...outcome,
          action: 'turbo',
          status: outcome.status === 'success' ? 'fallback' : outcome.status,
        };
      }
      log(LogLevel.INFO, '[Turbo] Order changed with the same task count; caching the new order');
      this.cache.updateOrder(fingerprint);
    }

    return this.fastPath(imagePath, { ...snapshot, fingerprint });
  }

  private async fastPath(imagePath: string | undefined, snapshot: SnapshotEntry): Promise<ActionOutcome<TurboResult>> {
    const now = this.clock();

    let existing: ExistingTasksMap | undefined;
    try {
      existing = await this.repository.loadExistingTasksMap(snapshot.dailyId);
    } catch (error) {
      log(LogLevel.WARN, `[Turbo] Could not load stored tasks: ${asCollaboratorFailure('store', error).message}`);
    }

    const pending = applyOrderToExtraction(snapshot.extraction, snapshot.fingerprint, existing, now);

    if (!imagePath) {
      return this.statusOnly(pending, snapshot, now, 'success', 'Status-only update (no frame image)');
    }

    let fresh: ExtractionResult;
    try {
      fresh = await this.extractTasks(imagePath, 'fast');
    } catch (error) {
      const cause = asCollaboratorFailure('ocr', error);
      log(LogLevel.WARN, `[Turbo] Name check failed (${cause.message}); status-only update`);
      return this.statusOnly(pending, snapshot, now, 'fallback', 'Status-only update after failed name check', cause);
    }

    const comparison = compareTaskNames(snapshot.extraction.tasks, fresh.tasks);
    if (!comparison.hasConsiderableChanges) {
      return this.statusOnly(pending, snapshot, now, 'success', 'No considerable name changes; status update');
    }

    for (const change of comparison.changes) {
      log(LogLevel.INFO, `[Turbo] Task ${change.index}: '${change.oldName ?? ''}' -> '${change.newName ?? ''}' (${change.changeType})`);
    }
    const merged = mergeFreshNames(pending, fresh, comparison.changes);

    try {
      const summary = await applyNarrowPatch(this.repository, snapshot.dailyId, comparison.changes, merged, now);
      this.cache.store({ ...snapshot, extraction: merged });
      return {
        action: 'turbo',
        status: 'success',
        message: `Patched ${summary.updated} updated, ${summary.created} created, ${summary.skipped} skipped, ${summary.failed} failed`,
        data: summary,
      };
    } catch (error) {
      const cause = asCollaboratorFailure('store', error);
      log(LogLevel.WARN, `[Turbo] Narrow patch failed (${cause.message}); falling back to a full update`);
      return this.statusOnly(merged, snapshot, now, 'fallback', 'Full update after failed narrow patch', cause);
    }
  }

  private async statusOnly(
    pending: ExtractionResult,
    snapshot: SnapshotEntry,
    now: Date,
    status: 'success' | 'fallback',
    message: string,
    cause?: PipelineError,
  ): Promise<ActionOutcome<TurboResult>> {
    const dailyMeta: DailyMeta = { ...snapshot.dailyMeta, updatedAt: now.toISOString(), cardScannedAt: now.toISOString() };
    try {
      const result = await this.reconciler.reconcile(pending, snapshot.dailyId, dailyMeta, now);
      this.cache.store({ ...snapshot, extraction: pending, dailyMeta: result.daily });
      return { action: 'turbo', status, message: `${message}: ${result.tasks.length} tasks`, data: result, error: cause };
    } catch (error) {
      return failed('turbo', message, asCollaboratorFailure('store', error));
    }
  }
}
