import { randomUUID } from "node:crypto";
import { DocumentLimitError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { codePointLength } from "../shared/text.js";
import type {
  CreateDocumentInput,
  CreateDocumentOptions,
  DocumentMetadata,
  DocumentRepository,
  StoredDocument,
} from "./types.js";

const ID_LENGTH = 8;
const MAX_ID_ATTEMPTS = 5;

const log = createLogger("repository");

export function countWords(content: string): number {
  const trimmed = content.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}

function toMetadata(doc: StoredDocument): DocumentMetadata {
  return {
    id: doc.id,
    title: doc.title,
    word_count: doc.word_count,
    character_count: doc.character_count,
    created_at: doc.created_at,
  };
}

export interface InMemoryDocumentRepositoryOptions {
  /** Called inside the write lock; may resolve asynchronously. */
  generateId?: () => string | Promise<string>;
  now?: () => Date;
}

/**
 * Process-local document store. Data is lost on restart.
 *
 * Reads go straight to the map. `create` and `delete` are chained through a
 * single write lock so the count check and the insert behave as one step
 * under concurrent uploads.
 */
export class InMemoryDocumentRepository implements DocumentRepository {
  private readonly documents = new Map<string, StoredDocument>();
  private readonly generateId: () => string | Promise<string>;
  private readonly now: () => Date;
  private writeLock: Promise<void> = Promise.resolve();

  constructor(options?: InMemoryDocumentRepositoryOptions) {
    this.generateId = options?.generateId ?? (() => randomUUID().slice(0, ID_LENGTH));
    this.now = options?.now ?? (() => new Date());
    log.debug("Document store initialized (in-memory)");
  }

  async create(input: CreateDocumentInput, options: CreateDocumentOptions): Promise<StoredDocument> {
    return this.withWriteLock(async () => {
      if (this.documents.size >= options.maxDocuments) {
        log.warn("Document limit reached, upload rejected", {
          limit: options.maxDocuments,
          title: input.title,
        });
        throw new DocumentLimitError(options.maxDocuments);
      }

      const doc: StoredDocument = {
        id: await this.nextId(),
        title: input.title,
        content: input.content,
        word_count: countWords(input.content),
        character_count: codePointLength(input.content),
        created_at: this.now().toISOString(),
      };
      this.documents.set(doc.id, doc);

      log.info("Document stored", { id: doc.id, title: doc.title, chars: doc.character_count });
      return { ...doc };
    });
  }

  get(id: string): StoredDocument | undefined {
    const doc = this.documents.get(id);
    if (!doc) {
      log.warn("Document not found", { id });
      return undefined;
    }
    log.debug("Document retrieved", { id });
    return { ...doc };
  }

  list(): DocumentMetadata[] {
    return [...this.documents.values()].map(toMetadata);
  }

  async delete(id: string): Promise<boolean> {
    return this.withWriteLock(async () => {
      const doc = this.documents.get(id);
      if (!doc) {
        log.warn("Delete failed, document not found", { id });
        return false;
      }
      this.documents.delete(id);
      log.info("Document deleted", { id, title: doc.title });
      return true;
    });
  }

  count(): number {
    return this.documents.size;
  }

  private async nextId(): Promise<string> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = await this.generateId();
      if (!this.documents.has(id)) return id;
    }
    throw new Error(`Could not generate a unique document id after ${MAX_ID_ATTEMPTS} attempts.`);
  }

  private async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.writeLock;
    let release: () => void = () => undefined;
    this.writeLock = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
