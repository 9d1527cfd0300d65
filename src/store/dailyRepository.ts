import { z } from 'zod';
import { log, LogLevel } from '../logger';
import { buildExistingTasksMap } from '../reconciliation/taskKeys';
import { toIsoOrNull, toTimestamp } from '../reconciliation/timestamps';
import {
  DailyMeta,
  DailySnapshotDocument,
  ExistingTasksMap,
  ProjectSummary,
  StoredTask,
} from '../types/task';
import { DocumentData, DocumentStore } from './documentStore';

const nullableText = z.string().nullable().optional().catch(null);

const StoredTaskSchema: z.ZodType<StoredTask, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string(),
    status: z.string(),
    plannedAt: nullableText,
    startedAt: nullableText,
    completedAt: nullableText,
    order: z.number().optional().catch(undefined),
    projectRef: nullableText,
    subtasks: z.array(StoredTaskSchema).optional().catch(undefined),
    updatedAt: z.string().optional().catch(undefined),
  }),
);

const ProjectSchema = z.object({
  name: z.string(),
  description: z.string().optional().catch(undefined),
});

export function dailyPath(dailyId: string): string {
  return `dailies/${dailyId}`;
}

export function taskPath(dailyId: string, docId: string): string {
  return `dailies/${dailyId}/tasks/${docId}`;
}

export function snapshotPath(dailyId: string, snapshotId: string): string {
  return `dailies/${dailyId}/snapshots/${snapshotId}`;
}

/**
 * Reads and writes the per-day documents: the daily record, its task
 * documents, its append-only snapshot log, and the shared project list.
 */
export class DailyRepository {
  constructor(private readonly store: DocumentStore) {}

  /**
   * Creates or merges the daily record. createdAt is kept from an existing
   * record; every other field is normalized to ISO text.
   */
  async upsertDaily(dailyId: string, meta: DailyMeta): Promise<DailyMeta> {
    const existing = await this.store.getDocument(dailyPath(dailyId));
    const existingCreatedAt = existing ? toTimestamp(existing.createdAt) : null;

    const normalized: DailyMeta = {
      date: meta.date,
      createdAt: toIsoOrNull(existingCreatedAt ?? toTimestamp(meta.createdAt)) ?? meta.createdAt,
      updatedAt: toIsoOrNull(toTimestamp(meta.updatedAt)) ?? meta.updatedAt,
      cardScannedAt: toIsoOrNull(toTimestamp(meta.cardScannedAt)),
    };
    await this.store.setDocument(dailyPath(dailyId), { ...normalized }, { merge: true });
    return normalized;
  }

  /** Valid task documents keyed by document id. */
  async loadTasksById(dailyId: string): Promise<Map<string, StoredTask>> {
    const documents = await this.store.listDocuments(`${dailyPath(dailyId)}/tasks`);
    const tasks = new Map<string, StoredTask>();
    for (const doc of documents) {
      const parsed = StoredTaskSchema.safeParse(doc.data);
      if (parsed.success) {
        tasks.set(doc.id, parsed.data);
      } else {
        log(LogLevel.WARN, `[DailyRepository] Skipping malformed task document ${dailyId}/${doc.id}`);
      }
    }
    return tasks;
  }

  async loadTasks(dailyId: string): Promise<StoredTask[]> {
    return [...(await this.loadTasksById(dailyId)).values()];
  }

  async loadExistingTasksMap(dailyId: string): Promise<ExistingTasksMap> {
    return buildExistingTasksMap(await this.loadTasks(dailyId));
  }

  async getTask(dailyId: string, docId: string): Promise<StoredTask | null> {
    const data = await this.store.getDocument(taskPath(dailyId, docId));
    if (!data) return null;
    const parsed = StoredTaskSchema.safeParse(data);
    return parsed.success ? parsed.data : null;
  }

  async writeTask(dailyId: string, docId: string, task: StoredTask, merge = true): Promise<void> {
    await this.store.setDocument(taskPath(dailyId, docId), { ...task }, { merge });
  }

  /** Field-level update; throws DocumentMissingError when the task document is absent. */
  async patchTask(dailyId: string, docId: string, fields: DocumentData): Promise<void> {
    await this.store.updateDocument(taskPath(dailyId, docId), fields);
  }

  /**
   * Appends an audit snapshot. An id already taken gets a numeric suffix so
   * existing entries are never overwritten. Returns the id used.
   */
  async appendSnapshot(dailyId: string, snapshotId: string, snapshot: DailySnapshotDocument): Promise<string> {
    let id = snapshotId;
    for (let suffix = 1; await this.store.getDocument(snapshotPath(dailyId, id)); suffix += 1) {
      id = `${snapshotId}-${suffix}`;
    }
    await this.store.setDocument(snapshotPath(dailyId, id), { ...snapshot });
    return id;
  }

  async listSnapshots(dailyId: string): Promise<DocumentData[]> {
    const documents = await this.store.listDocuments(`${dailyPath(dailyId)}/snapshots`);
    return documents.map((doc) => doc.data);
  }

  async listProjects(): Promise<ProjectSummary[]> {
    const documents = await this.store.listDocuments('projects');
    const projects: ProjectSummary[] = [];
    for (const doc of documents) {
      const parsed = ProjectSchema.safeParse(doc.data);
      if (parsed.success) {
        projects.push({ id: doc.id, name: parsed.data.name, description: parsed.data.description ?? '' });
      }
    }
    return projects;
  }
}
