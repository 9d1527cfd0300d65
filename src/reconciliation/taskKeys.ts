import { ExistingTasksMap, StoredTask } from '../types/task';

const KEY_SEPARATOR = '::';

/** Deterministic identity of a task within a day: `name` or `parentName::name`. */
export function taskKey(name: string, parentName?: string | null): string {
  return parentName ? `${parentName}${KEY_SEPARATOR}${name}` : name;
}

// encodeURIComponent leaves these unescaped; document ids keep only [A-Za-z0-9_.~-].
const EXTRA_RESERVED = /[!'()*]/g;

/**
 * Encodes a composite key into a document id. Spaces, separators and slashes
 * are percent-encoded so the id never splits a store path.
 */
export function encodeTaskDocId(key: string): string {
  return encodeURIComponent(key).replace(
    EXTRA_RESERVED,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export function decodeTaskDocId(docId: string): string {
  return decodeURIComponent(docId);
}

/** Document id used by the narrow patch path: zero-padded order, e.g. "007". */
export function orderDocId(order: number): string {
  return String(order).padStart(3, '0');
}

/**
 * Flattens stored task documents one level deep: every top-level task under
 * its name, every immediate subtask under `parentName::name`.
 */
export function buildExistingTasksMap(documents: readonly StoredTask[]): ExistingTasksMap {
  const map: ExistingTasksMap = new Map();
  for (const doc of documents) {
    map.set(taskKey(doc.name), doc);
    for (const subtask of doc.subtasks ?? []) {
      map.set(taskKey(subtask.name, doc.name), subtask);
    }
  }
  return map;
}
