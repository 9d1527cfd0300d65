import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { DocumentMissingError } from '../errors';
import { log, LogLevel } from '../logger';
import {
  DocumentData,
  DocumentStore,
  isDocumentData,
  SetOptions,
  splitDocumentPath,
  StoredDocument,
} from './documentStore';

const IN_MEMORY = ':memory:';

interface DocumentRow {
  id: string;
  data: string;
}

function isDocumentRow(row: unknown): row is DocumentRow {
  return isDocumentData(row) && typeof row.id === 'string' && typeof row.data === 'string';
}

function parseData(text: string, documentPath: string): DocumentData {
  const parsed: unknown = JSON.parse(text);
  if (!isDocumentData(parsed)) {
    throw new Error(`Stored document ${documentPath} is not a JSON object`);
  }
  return parsed;
}

/**
 * DocumentStore on a single better-sqlite3 table. Each document is one row
 * holding its JSON body; collections are the path prefix.
 */
export class SqliteDocumentStore implements DocumentStore {
  private db: Database.Database;

  private constructor(db: Database.Database) {
    this.db = db;
  }

  public static open(dbPath: string): SqliteDocumentStore {
    let db: Database.Database;
    if (dbPath === IN_MEMORY) {
      db = new Database(IN_MEMORY);
    } else {
      const resolved = path.resolve(process.cwd(), dbPath);
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
      db = new Database(resolved);
      db.pragma('journal_mode = WAL');
    }

    const store = new SqliteDocumentStore(db);
    store.initDatabase();
    return store;
  }

  private initDatabase(): void {
    const createDocumentsTable = `
      CREATE TABLE IF NOT EXISTS documents (
        collection TEXT NOT NULL,
        id TEXT NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        updated_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        PRIMARY KEY (collection, id)
      );
    `;
    this.db.exec(createDocumentsTable);
    log(LogLevel.DEBUG, 'Document store initialized with better-sqlite3.');
  }

  private readRow(collection: string, id: string): DocumentData | null {
    const row: unknown = this.db
      .prepare('SELECT id, data FROM documents WHERE collection = ? AND id = ?')
      .get(collection, id);
    if (!isDocumentRow(row)) return null;
    return parseData(row.data, `${collection}/${id}`);
  }

  private writeRow(collection: string, id: string, data: DocumentData): void {
    const sql = `INSERT INTO documents (collection, id, data) VALUES (?, ?, ?)
                 ON CONFLICT(collection, id) DO UPDATE SET
                   data = excluded.data,
                   updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`;
    this.db.prepare(sql).run(collection, id, JSON.stringify(data));
  }

  async getDocument(documentPath: string): Promise<DocumentData | null> {
    const { collection, id } = splitDocumentPath(documentPath);
    return this.readRow(collection, id);
  }

  async listDocuments(collectionPath: string): Promise<StoredDocument[]> {
    const collection = collectionPath.replace(/^\/+|\/+$/g, '');
    const rows: unknown[] = this.db
      .prepare('SELECT id, data FROM documents WHERE collection = ? ORDER BY id')
      .all(collection);
    return rows.filter(isDocumentRow).map((row) => ({
      id: row.id,
      data: parseData(row.data, `${collection}/${row.id}`),
    }));
  }

  async setDocument(documentPath: string, data: DocumentData, options: SetOptions = {}): Promise<void> {
    const { collection, id } = splitDocumentPath(documentPath);
    const write = this.db.transaction(() => {
      const existing = options.merge ? this.readRow(collection, id) : null;
      this.writeRow(collection, id, existing ? { ...existing, ...data } : data);
    });
    write();
  }

  async updateDocument(documentPath: string, data: DocumentData): Promise<void> {
    const { collection, id } = splitDocumentPath(documentPath);
    const update = this.db.transaction(() => {
      const existing = this.readRow(collection, id);
      if (!existing) {
        throw new DocumentMissingError(documentPath);
      }
      this.writeRow(collection, id, { ...existing, ...data });
    });
    update();
  }

  close(): void {
    this.db.close();
  }
}
