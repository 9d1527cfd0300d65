/** A JSON object as held by the store. */
export type DocumentData = Record<string, unknown>;

export interface StoredDocument {
  id: string;
  data: DocumentData;
}

export interface SetOptions {
  /** Merge top-level fields into an existing document instead of replacing it. */
  merge?: boolean;
}

/**
 * Hierarchical document store addressed by slash-separated paths, where the
 * last segment is the document id and the rest names its collection:
 * `dailies/2025-01-15/tasks/Write%20report`.
 */
export interface DocumentStore {
  getDocument(path: string): Promise<DocumentData | null>;
  listDocuments(collectionPath: string): Promise<StoredDocument[]>;
  setDocument(path: string, data: DocumentData, options?: SetOptions): Promise<void>;
  /**
   * Merges fields into an existing document.
   * @throws DocumentMissingError when nothing is stored at `path`.
   */
  updateDocument(path: string, data: DocumentData): Promise<void>;
  close(): void;
}

export function splitDocumentPath(path: string): { collection: string; id: string } {
  const segments = path.split('/').filter((segment) => segment.length > 0);
  if (segments.length < 2 || segments.length % 2 !== 0) {
    throw new Error(`Invalid document path '${path}'`);
  }
  const id = segments.pop() ?? '';
  return { collection: segments.join('/'), id };
}

export function isDocumentData(value: unknown): value is DocumentData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
