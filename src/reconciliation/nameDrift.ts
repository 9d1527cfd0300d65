import * as Diff from 'diff';
import { ExtractedTask, ExtractionResult, TaskStatus } from '../types/task';

export type NameChangeType =
  | 'major_change'
  | 'moderate_change'
  | 'word_changes'
  | 'added_task'
  | 'removed_task';

export interface NameChange {
  index: number;
  oldName: string | null;
  newName: string | null;
  changeType: NameChangeType;
  similarity: number;
}

export interface NameComparison {
  hasConsiderableChanges: boolean;
  changes: NameChange[];
}

const MAJOR_BELOW = 0.3;
const MODERATE_BELOW = 0.7;

/**
 * Matching-character ratio of two strings, 2·M / (|a| + |b|), where M is the
 * number of characters the character diff keeps in common. 1 for two empty strings.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const matched = Diff.diffChars(a, b)
    .filter((part) => !part.added && !part.removed)
    .reduce((sum, part) => sum + part.value.length, 0);
  return (2 * matched) / total;
}

function words(name: string): Set<string> {
  return new Set(name.toLowerCase().split(/\s+/).filter((word) => word.length > 0));
}

function difference(a: Set<string>, b: Set<string>): string[] {
  return [...a].filter((word) => !b.has(word));
}

/** Near-identical names still count as changed when whole words came or went. */
function hasConsiderableWordChanges(oldName: string, newName: string): boolean {
  const oldWords = words(oldName);
  const newWords = words(newName);
  const added = difference(newWords, oldWords);
  const removed = difference(oldWords, newWords);

  const manyWords = (changed: string[]) => changed.length >= 2 && changed.some((word) => word.length >= 4);
  const longWord = (changed: string[]) => changed.some((word) => word.length >= 7);

  return manyWords(added)
    || manyWords(removed)
    || longWord(added)
    || longWord(removed)
    || Math.abs(oldName.length - newName.length) > 3;
}

function classify(oldName: string, newName: string): { changeType: NameChangeType; similarity: number } | null {
  const similarity = similarityRatio(oldName.toLowerCase(), newName.toLowerCase());
  if (similarity < MAJOR_BELOW) return { changeType: 'major_change', similarity };
  if (similarity < MODERATE_BELOW) return { changeType: 'moderate_change', similarity };
  if (hasConsiderableWordChanges(oldName, newName)) return { changeType: 'word_changes', similarity };
  return null;
}

/**
 * Compares cached task names with a fresh extraction, position by position.
 * Extra fresh entries are reported as `added_task`, missing ones as `removed_task`.
 */
export function compareTaskNames(
  storedTasks: readonly Pick<ExtractedTask, 'name'>[],
  freshTasks: readonly Pick<ExtractedTask, 'name'>[],
): NameComparison {
  const changes: NameChange[] = [];
  const shared = Math.min(storedTasks.length, freshTasks.length);

  for (let index = 0; index < shared; index += 1) {
    const oldName = storedTasks[index].name.trim();
    const newName = freshTasks[index].name.trim();
    if (oldName === newName) continue;

    const change = classify(oldName, newName);
    if (change) changes.push({ index, oldName, newName, ...change });
  }

  for (let index = shared; index < freshTasks.length; index += 1) {
    changes.push({ index, oldName: null, newName: freshTasks[index].name.trim(), changeType: 'added_task', similarity: 0 });
  }
  for (let index = shared; index < storedTasks.length; index += 1) {
    changes.push({ index, oldName: storedTasks[index].name.trim(), newName: null, changeType: 'removed_task', similarity: 0 });
  }

  return { hasConsiderableChanges: changes.length > 0, changes };
}

/**
 * Carries the fresh names (and a fresh projectRef, when present) of changed
 * tasks into the pending update, keeping statuses and timestamps. Added tasks
 * are appended as NOT_STARTED with no timestamps.
 */
export function mergeFreshNames(
  pending: ExtractionResult,
  fresh: ExtractionResult,
  changes: readonly NameChange[],
): ExtractionResult {
  const tasks = pending.tasks.map((task) => ({ ...task }));

  for (const change of changes) {
    const freshTask = fresh.tasks[change.index];
    if (!freshTask) continue;

    if (change.changeType === 'added_task') {
      if (change.index < tasks.length) continue;
      tasks.push({
        ...freshTask,
        status: TaskStatus.NOT_STARTED,
        order: tasks.length + 1,
        plannedAt: null,
        startedAt: null,
        completedAt: null,
      });
      continue;
    }

    if (change.changeType === 'removed_task' || change.index >= tasks.length) continue;
    const target = tasks[change.index];
    target.name = freshTask.name;
    if (freshTask.projectRef) target.projectRef = freshTask.projectRef;
  }

  return { tasks };
}
