import { CollaboratorFailure, DocumentMissingError } from '../errors';
import { describeError, log, LogLevel } from '../logger';
import { DailyRepository } from '../store/dailyRepository';
import { ExtractionResult, serializeTaskStatus, StoredTask } from '../types/task';
import { NameChange } from './nameDrift';
import { orderDocId } from './taskKeys';

export interface PatchSummary {
  updated: number;
  created: number;
  skipped: number;
  failed: number;
}

/**
 * Writes only the tasks named in `changes`, addressed by their zero-padded
 * order. Removed tasks are reported and left in the store. A failing record
 * is logged and the rest of the batch continues.
 * @throws CollaboratorFailure when every attempted write failed.
 */
export async function applyNarrowPatch(
  repository: DailyRepository,
  dailyId: string,
  changes: readonly NameChange[],
  pending: ExtractionResult,
  now: Date,
): Promise<PatchSummary> {
  const summary: PatchSummary = { updated: 0, created: 0, skipped: 0, failed: 0 };
  log(LogLevel.INFO, `[Turbo] Patching ${changes.length} changed tasks in ${dailyId}`);

  for (const change of changes) {
    if (change.changeType === 'removed_task') {
      log(LogLevel.WARN, `[Turbo] Task ${change.index} '${change.oldName ?? ''}' is no longer on the sheet; leaving it in the store`);
      summary.skipped += 1;
      continue;
    }

    const task = pending.tasks[change.index];
    if (!task) {
      log(LogLevel.WARN, `[Turbo] Task index ${change.index} out of range; skipping`);
      summary.skipped += 1;
      continue;
    }

    const order = task.order ?? change.index + 1;
    const docId = orderDocId(order);
    const fields: StoredTask = { name: task.name, status: serializeTaskStatus(task.status), order, updatedAt: now.toISOString() };
    if (task.plannedAt) fields.plannedAt = task.plannedAt;
    if (task.startedAt) fields.startedAt = task.startedAt;
    if (task.completedAt) fields.completedAt = task.completedAt;
    if (task.projectRef) fields.projectRef = task.projectRef;

    try {
      if (change.changeType === 'added_task') {
        await repository.writeTask(dailyId, docId, fields, false);
        summary.created += 1;
        log(LogLevel.INFO, `[Turbo] Created task ${docId}: '${task.name}'`);
        continue;
      }
      try {
        await repository.patchTask(dailyId, docId, { ...fields });
        summary.updated += 1;
        log(LogLevel.INFO, `[Turbo] Updated task ${docId}: '${change.oldName ?? ''}' -> '${task.name}' (${change.changeType})`);
      } catch (error) {
        if (!(error instanceof DocumentMissingError)) throw error;
        await repository.writeTask(dailyId, docId, fields, false);
        summary.created += 1;
        log(LogLevel.INFO, `[Turbo] Created task ${docId}: '${task.name}' (was missing)`);
      }
    } catch (error) {
      summary.failed += 1;
      log(LogLevel.ERROR, `[Turbo] Error writing task ${docId}`, describeError(error));
    }
  }

  if (summary.failed > 0 && summary.updated + summary.created === 0) {
    throw new CollaboratorFailure('store', `All ${summary.failed} task writes failed in ${dailyId}`);
  }
  return summary;
}
