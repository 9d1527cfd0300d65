import { asCollaboratorFailure } from '../errors';
import { log, LogLevel } from '../logger';
import { DailyRepository } from '../store/dailyRepository';
import {
  DailyMeta,
  ExistingTasksMap,
  ExtractedTask,
  ExtractionResult,
  ReconciledTask,
  serializeTaskStatus,
  StoredTask,
  TaskStatus,
} from '../types/task';
import { buildExistingTasksMap, encodeTaskDocId, taskKey } from './taskKeys';
import { processTaskTimestamps, toIsoOrNull } from './timestamps';

export interface ReconcileResult {
  dailyId: string;
  daily: DailyMeta;
  tasks: StoredTask[];
  /** Top-level task documents written. */
  written: number;
  /** Top-level task documents left alone because nothing changed. */
  unchanged: number;
  snapshotId: string;
}

/**
 * Applies the timestamp rule to one task and, for a top-level task, to its
 * immediate subtasks. Deeper nesting is not kept.
 */
export function reconcileTask(
  task: ExtractedTask,
  existing: ExistingTasksMap,
  now: Date,
  index: number,
  parentName?: string,
): ReconciledTask {
  const prevTask = existing.get(taskKey(task.name, parentName));
  const timestamps = processTaskTimestamps(task, prevTask, now);

  const subtasks: ReconciledTask[] = [];
  if (task.subtasks && task.subtasks.length > 0) {
    if (parentName === undefined) {
      task.subtasks.forEach((subtask, i) => subtasks.push(reconcileTask(subtask, existing, now, i, task.name)));
    } else {
      log(LogLevel.DEBUG, `[Reconcile] Dropping ${task.subtasks.length} nested subtasks under '${taskKey(task.name, parentName)}'`);
    }
  }

  return {
    name: task.name,
    status: task.status,
    ...timestamps,
    order: task.order ?? index + 1,
    projectRef: task.projectRef || prevTask?.projectRef || null,
    subtasks,
  };
}

export function serializeTask(task: ReconciledTask): StoredTask {
  return {
    name: task.name,
    status: serializeTaskStatus(task.status),
    plannedAt: task.plannedAt.toISOString(),
    startedAt: toIsoOrNull(task.startedAt),
    completedAt: toIsoOrNull(task.completedAt),
    order: task.order,
    projectRef: task.projectRef,
    subtasks: task.subtasks.map(serializeTask),
  };
}

function comparable(task: StoredTask): unknown {
  return [
    task.name,
    task.status,
    task.plannedAt ?? null,
    task.startedAt ?? null,
    task.completedAt ?? null,
    task.order ?? null,
    task.projectRef ?? null,
    (task.subtasks ?? []).map(comparable),
  ];
}

/** True when writing `next` would change a stored document (updatedAt aside). */
export function needsWrite(next: StoredTask, stored: StoredTask | undefined): boolean {
  if (!stored) return true;
  return JSON.stringify(comparable(next)) !== JSON.stringify(comparable(stored));
}

/**
 * Fast-path order application: top-level task i takes status order[i] and
 * the timestamp rule runs again against the stored records. Entries beyond
 * either list are ignored.
 */
export function applyOrderToExtraction(
  extraction: ExtractionResult,
  order: readonly TaskStatus[],
  existing: ExistingTasksMap | undefined,
  now: Date,
): ExtractionResult {
  const tasks = extraction.tasks.map((task, i): ExtractedTask => {
    const status = order[i];
    if (status === undefined) return { ...task };

    const prevTask = existing?.get(taskKey(task.name));
    const timestamps = processTaskTimestamps({ ...task, status }, prevTask, now);
    if (task.status !== status) {
      log(LogLevel.DEBUG, `[Turbo] Task ${i} '${task.name}': ${task.status} -> ${status}`);
    }
    return {
      ...task,
      status,
      plannedAt: timestamps.plannedAt.toISOString(),
      startedAt: toIsoOrNull(timestamps.startedAt),
      completedAt: toIsoOrNull(timestamps.completedAt),
    };
  });
  return { tasks };
}

/**
 * Merges an extraction into the stored daily record: upserts the daily
 * metadata, merge-writes every changed top-level task (subtasks embedded),
 * then appends a full-tree audit snapshot.
 */
export class TaskReconciler {
  constructor(private readonly repository: DailyRepository) {}

  async reconcile(extraction: ExtractionResult, dailyId: string, dailyMeta: DailyMeta, now: Date): Promise<ReconcileResult> {
    try {
      const daily = await this.repository.upsertDaily(dailyId, dailyMeta);
      const storedById = await this.repository.loadTasksById(dailyId);
      const existing = buildExistingTasksMap([...storedById.values()]);

      const tasks: StoredTask[] = [];
      let written = 0;
      let unchanged = 0;

      for (const [index, task] of extraction.tasks.entries()) {
        const docId = encodeTaskDocId(taskKey(task.name));
        const stored = serializeTask(reconcileTask(task, existing, now, index));
        tasks.push(stored);

        // Compare against the document at the target id; a same-named record elsewhere does not count.
        if (!needsWrite(stored, storedById.get(docId))) {
          unchanged += 1;
          continue;
        }
        await this.repository.writeTask(dailyId, docId, { ...stored, updatedAt: now.toISOString() });
        written += 1;
      }

      const snapshotId = await this.repository.appendSnapshot(dailyId, now.toISOString(), {
        savedAt: now.toISOString(),
        dailyJSON: { daily, tasks },
      });

      log(LogLevel.INFO, `[Reconcile] ${dailyId}: ${tasks.length} tasks, ${written} written, ${unchanged} unchanged, snapshot ${snapshotId}`);
      return { dailyId, daily, tasks, written, unchanged, snapshotId };
    } catch (error) {
      throw asCollaboratorFailure('store', error);
    }
  }
}
