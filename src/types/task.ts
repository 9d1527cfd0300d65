/**
 * Status written next to each line of the task sheet.
 * The enum values double as the wire form stored in documents and returned by OCR.
 */
export enum TaskStatus {
  NOT_STARTED = 'NOT_STARTED',
  IN_PROGRESS = 'IN_PROGRESS',
  MEETING = 'MEETING',
  COMPLETED = 'COMPLETED',
}

const statusByWireName: ReadonlyMap<string, TaskStatus> = new Map(
  Object.values(TaskStatus).map((status) => [status, status]),
);

export function parseTaskStatus(raw: unknown): TaskStatus | null {
  if (typeof raw !== 'string') return null;
  return statusByWireName.get(raw.trim().toUpperCase()) ?? null;
}

export function serializeTaskStatus(status: TaskStatus): string {
  return status;
}

/**
 * A task as extracted from the sheet by OCR, or as carried in the snapshot cache.
 * Timestamps are whatever the extraction (or a previous fast-path pass) put there.
 */
export interface ExtractedTask {
  name: string;
  status: TaskStatus;
  plannedAt?: string | null;
  startedAt?: string | null;
  completedAt?: string | null;
  order?: number;
  projectRef?: string | null;
  subtasks?: ExtractedTask[];
}

export interface ExtractionResult {
  tasks: ExtractedTask[];
}

/**
 * A task document as persisted under dailies/{dailyId}/tasks.
 * Timestamps are ISO strings; older documents may carry other textual forms.
 */
export interface StoredTask {
  name: string;
  status: string;
  plannedAt?: string | null;
  startedAt?: string | null;
  completedAt?: string | null;
  order?: number;
  projectRef?: string | null;
  subtasks?: StoredTask[];
  updatedAt?: string;
}

/** A task after the timestamp rule ran, before serialization. */
export interface ReconciledTask {
  name: string;
  status: TaskStatus;
  plannedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  order: number;
  projectRef: string | null;
  subtasks: ReconciledTask[];
}

export interface TaskTimestamps {
  plannedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

/** Flattened lookup of previously stored tasks, keyed by composite task key. */
export type ExistingTasksMap = Map<string, StoredTask>;

export interface DailyMeta {
  date: string;
  createdAt: string;
  updatedAt: string;
  cardScannedAt: string | null;
}

export interface DailySnapshotDocument {
  savedAt: string;
  dailyJSON: {
    daily: DailyMeta;
    tasks: StoredTask[];
  };
}

export interface ProjectSummary {
  id: string;
  name: string;
  description: string;
}
