import { DocumentMissingError } from '../errors';
import { SqliteDocumentStore } from './sqliteDocumentStore';

jest.mock('../logger');

describe('SqliteDocumentStore', () => {
  let store: SqliteDocumentStore;

  beforeEach(() => {
    store = SqliteDocumentStore.open(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('returns null for a missing document', async () => {
    await expect(store.getDocument('dailies/2025-01-15')).resolves.toBeNull();
  });

  it('replaces a document unless asked to merge', async () => {
    await store.setDocument('projects/home', { name: 'Home', description: 'Chores' });
    await store.setDocument('projects/home', { name: 'House' });
    expect(await store.getDocument('projects/home')).toEqual({ name: 'House' });

    await store.setDocument('projects/home', { description: 'Repairs' }, { merge: true });
    expect(await store.getDocument('projects/home')).toEqual({ name: 'House', description: 'Repairs' });
  });

  it('updates fields of an existing document', async () => {
    await store.setDocument('dailies/2025-01-15/tasks/001', { name: 'Write report', status: 'NOT_STARTED' });
    await store.updateDocument('dailies/2025-01-15/tasks/001', { status: 'IN_PROGRESS' });

    expect(await store.getDocument('dailies/2025-01-15/tasks/001')).toEqual({ name: 'Write report', status: 'IN_PROGRESS' });
  });

  it('refuses to update a document that does not exist', async () => {
    await expect(store.updateDocument('dailies/2025-01-15/tasks/002', { status: 'COMPLETED' }))
      .rejects.toBeInstanceOf(DocumentMissingError);
    await expect(store.getDocument('dailies/2025-01-15/tasks/002')).resolves.toBeNull();
  });

  it('lists only the documents directly in a collection', async () => {
    await store.setDocument('dailies/2025-01-15', { date: '2025-01-15' });
    await store.setDocument('dailies/2025-01-15/tasks/b', { name: 'B' });
    await store.setDocument('dailies/2025-01-15/tasks/a', { name: 'A' });
    await store.setDocument('dailies/2025-01-16/tasks/c', { name: 'C' });

    expect(await store.listDocuments('dailies/2025-01-15/tasks')).toEqual([
      { id: 'a', data: { name: 'A' } },
      { id: 'b', data: { name: 'B' } },
    ]);
    expect(await store.listDocuments('dailies')).toEqual([{ id: '2025-01-15', data: { date: '2025-01-15' } }]);
  });

  it('rejects paths that do not name a document', async () => {
    await expect(store.getDocument('dailies')).rejects.toThrow("Invalid document path 'dailies'");
    await expect(store.setDocument('dailies/2025-01-15/tasks', {})).rejects.toThrow('Invalid document path');
  });
});
