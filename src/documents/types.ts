export interface DocumentMetadata {
  id: string;
  title: string;
  word_count: number;
  character_count: number;
  /** ISO-8601, UTC. */
  created_at: string;
}

export interface StoredDocument extends DocumentMetadata {
  content: string;
}

export interface DocumentList {
  documents: DocumentMetadata[];
  total_count: number;
}

export interface CreateDocumentInput {
  title: string;
  content: string;
}

export interface CreateDocumentOptions {
  /** The create is rejected when the store already holds this many documents. */
  maxDocuments: number;
}

export interface DocumentRepository {
  create(input: CreateDocumentInput, options: CreateDocumentOptions): Promise<StoredDocument>;
  get(id: string): StoredDocument | undefined;
  list(): DocumentMetadata[];
  delete(id: string): Promise<boolean>;
  count(): number;
}
