import { DailyRepository } from '../store/dailyRepository';
import { SqliteDocumentStore } from '../store/sqliteDocumentStore';
import { DailyMeta, ExistingTasksMap, ExtractionResult, TaskStatus } from '../types/task';
import { applyOrderToExtraction, needsWrite, reconcileTask, TaskReconciler } from './taskReconciler';

jest.mock('../logger');

const dailyId = '2025-01-15';
const nineAm = new Date(2025, 0, 15, 9, 0, 0);
const tenAm = new Date(2025, 0, 15, 10, 0, 0);

function meta(now: Date): DailyMeta {
  const iso = now.toISOString();
  return { date: dailyId, createdAt: iso, updatedAt: iso, cardScannedAt: iso };
}

const morningSheet: ExtractionResult = {
  tasks: [
    { name: 'Write report', status: TaskStatus.IN_PROGRESS, order: 1, projectRef: 'work' },
    {
      name: 'Team sync',
      status: TaskStatus.MEETING,
      order: 2,
      projectRef: null,
      subtasks: [{ name: 'Prep slides', status: TaskStatus.COMPLETED, projectRef: null }],
    },
  ],
};

describe('TaskReconciler', () => {
  let store: SqliteDocumentStore;
  let repository: DailyRepository;
  let reconciler: TaskReconciler;

  beforeEach(() => {
    store = SqliteDocumentStore.open(':memory:');
    repository = new DailyRepository(store);
    reconciler = new TaskReconciler(repository);
  });

  afterEach(() => store.close());

  it('writes each top-level task with its subtasks embedded', async () => {
    const result = await reconciler.reconcile(morningSheet, dailyId, meta(nineAm), nineAm);

    expect(result.written).toBe(2);
    expect(result.unchanged).toBe(0);
    expect(await repository.getTask(dailyId, 'Write%20report')).toEqual({
      name: 'Write report',
      status: 'IN_PROGRESS',
      plannedAt: nineAm.toISOString(),
      startedAt: nineAm.toISOString(),
      completedAt: null,
      order: 1,
      projectRef: 'work',
      subtasks: [],
      updatedAt: nineAm.toISOString(),
    });

    const sync = await repository.getTask(dailyId, 'Team%20sync');
    expect(sync?.subtasks).toEqual([
      {
        name: 'Prep slides',
        status: 'COMPLETED',
        plannedAt: nineAm.toISOString(),
        startedAt: nineAm.toISOString(),
        completedAt: nineAm.toISOString(),
        order: 1,
        projectRef: null,
        subtasks: [],
      },
    ]);
  });

  it('keeps first-seen timestamps across later merges and skips unchanged tasks', async () => {
    await reconciler.reconcile(morningSheet, dailyId, meta(nineAm), nineAm);

    const later: ExtractionResult = {
      tasks: [{ ...morningSheet.tasks[0], status: TaskStatus.COMPLETED, projectRef: null }, morningSheet.tasks[1]],
    };
    const result = await reconciler.reconcile(later, dailyId, meta(tenAm), tenAm);

    expect(result.written).toBe(1);
    expect(result.unchanged).toBe(1);
    expect(await repository.getTask(dailyId, 'Write%20report')).toMatchObject({
      status: 'COMPLETED',
      plannedAt: nineAm.toISOString(),
      startedAt: nineAm.toISOString(),
      completedAt: tenAm.toISOString(),
      projectRef: 'work',
      updatedAt: tenAm.toISOString(),
    });
    expect((await repository.getTask(dailyId, 'Team%20sync'))?.updatedAt).toBe(nineAm.toISOString());
  });

  it('appends an audit snapshot per reconciliation and keeps the first createdAt', async () => {
    await reconciler.reconcile(morningSheet, dailyId, meta(nineAm), nineAm);
    const second = await reconciler.reconcile(morningSheet, dailyId, meta(tenAm), tenAm);

    const snapshots = await repository.listSnapshots(dailyId);
    expect(snapshots).toHaveLength(2);
    expect(second.snapshotId).toBe(tenAm.toISOString());
    expect(await store.getDocument(`dailies/${dailyId}`)).toEqual({
      date: dailyId,
      createdAt: nineAm.toISOString(),
      updatedAt: tenAm.toISOString(),
      cardScannedAt: tenAm.toISOString(),
    });
    expect(second.daily.createdAt).toBe(nineAm.toISOString());
  });

  it('writes the name-keyed document even when an order-keyed one holds the same task', async () => {
    await store.setDocument(`dailies/${dailyId}/tasks/001`, {
      name: 'Write report',
      status: 'IN_PROGRESS',
      plannedAt: nineAm.toISOString(),
      startedAt: nineAm.toISOString(),
      completedAt: null,
      order: 1,
      projectRef: 'work',
      subtasks: [],
    });

    const result = await reconciler.reconcile(morningSheet, dailyId, meta(nineAm), nineAm);

    expect(result.written).toBe(2);
    expect(result.unchanged).toBe(0);
    expect(await repository.getTask(dailyId, 'Write%20report')).toMatchObject({ name: 'Write report', order: 1 });
  });

  it('never overwrites an existing snapshot', async () => {
    await reconciler.reconcile(morningSheet, dailyId, meta(nineAm), nineAm);
    const again = await reconciler.reconcile(morningSheet, dailyId, meta(nineAm), nineAm);

    expect(again.snapshotId).toBe(`${nineAm.toISOString()}-1`);
    expect(await repository.listSnapshots(dailyId)).toHaveLength(2);
  });
});

describe('reconcileTask', () => {
  it('drops subtasks nested deeper than one level', () => {
    const task = {
      name: 'Plan trip',
      status: TaskStatus.NOT_STARTED,
      subtasks: [
        {
          name: 'Book flights',
          status: TaskStatus.NOT_STARTED,
          subtasks: [{ name: 'Compare prices', status: TaskStatus.NOT_STARTED }],
        },
      ],
    };

    const reconciled = reconcileTask(task, new Map(), nineAm, 0);

    expect(reconciled.order).toBe(1);
    expect(reconciled.subtasks).toHaveLength(1);
    expect(reconciled.subtasks[0].subtasks).toEqual([]);
  });

  it('looks subtasks up under their parent key', () => {
    const existing: ExistingTasksMap = new Map([
      ['Team sync::Prep slides', { name: 'Prep slides', status: 'IN_PROGRESS', plannedAt: '2025-01-14T22:00:00.000Z', startedAt: '2025-01-14T23:00:00.000Z' }],
    ]);

    const reconciled = reconcileTask(morningSheet.tasks[1], existing, nineAm, 1);

    expect(reconciled.subtasks[0]).toMatchObject({
      plannedAt: new Date('2025-01-14T22:00:00.000Z'),
      startedAt: new Date('2025-01-14T23:00:00.000Z'),
      completedAt: nineAm,
    });
  });
});

describe('needsWrite', () => {
  it('ignores updatedAt when comparing with the stored document', () => {
    const task = { name: 'Write report', status: 'NOT_STARTED', plannedAt: 'x', startedAt: null, completedAt: null, order: 1, projectRef: null, subtasks: [] };

    expect(needsWrite(task, { ...task, updatedAt: 'earlier' })).toBe(false);
    expect(needsWrite(task, { ...task, order: 2 })).toBe(true);
    expect(needsWrite(task, undefined)).toBe(true);
  });
});

describe('applyOrderToExtraction', () => {
  it('assigns statuses by position and re-runs the timestamp rule', () => {
    const planned = '2025-01-15T00:00:00.000Z';
    const started = '2025-01-15T01:00:00.000Z';
    const cached: ExtractionResult = {
      tasks: [
        { name: 'Write report', status: TaskStatus.NOT_STARTED, order: 1 },
        { name: 'Call mom', status: TaskStatus.IN_PROGRESS, order: 2 },
      ],
    };
    const existing: ExistingTasksMap = new Map([
      ['Write report', { name: 'Write report', status: 'NOT_STARTED', plannedAt: planned }],
      ['Call mom', { name: 'Call mom', status: 'IN_PROGRESS', plannedAt: planned, startedAt: started }],
    ]);

    const updated = applyOrderToExtraction(cached, [TaskStatus.IN_PROGRESS, TaskStatus.COMPLETED], existing, tenAm);

    expect(updated.tasks).toEqual([
      { name: 'Write report', status: TaskStatus.IN_PROGRESS, order: 1, plannedAt: planned, startedAt: tenAm.toISOString(), completedAt: null },
      { name: 'Call mom', status: TaskStatus.COMPLETED, order: 2, plannedAt: planned, startedAt: started, completedAt: tenAm.toISOString() },
    ]);
    expect(cached.tasks[0].status).toBe(TaskStatus.NOT_STARTED);
  });

  it('leaves tasks beyond the fingerprint untouched', () => {
    const cached: ExtractionResult = { tasks: [{ name: 'A', status: TaskStatus.NOT_STARTED }, { name: 'B', status: TaskStatus.MEETING }] };

    const updated = applyOrderToExtraction(cached, [TaskStatus.COMPLETED], undefined, tenAm);

    expect(updated.tasks[1]).toEqual({ name: 'B', status: TaskStatus.MEETING });
    expect(updated.tasks[0]).toMatchObject({ status: TaskStatus.COMPLETED, startedAt: tenAm.toISOString(), completedAt: tenAm.toISOString() });
  });
});
