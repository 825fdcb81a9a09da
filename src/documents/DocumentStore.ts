/**
 * In-memory registry of ingestion documents, for polling by id
 *
 * @module documents/DocumentStore
 */

import type { IngestionDocument } from "./IngestionDocument.js";
import type { DocumentStatus } from "./types.js";

/**
 * Where the orchestrator keeps documents between creation and polling
 */
export interface DocumentStore {
  /** Add or replace a document by id */
  save(document: IngestionDocument): void;
  get(id: string): IngestionDocument | undefined;
  /**
   * Documents in insertion order
   *
   * @param filter - Keep only documents with this status
   */
  list(filter?: { status?: DocumentStatus }): IngestionDocument[];
  /**
   * Forget a document
   *
   * @returns true if the document was stored
   */
  delete(id: string): boolean;
}

export interface InMemoryDocumentStoreOptions {
  /**
   * Documents kept before the oldest finished ones are evicted. Running
   * documents are never evicted, so the store may exceed this while many
   * runs are in flight.
   * @default 1000
   */
  maxDocuments?: number;
}

/**
 * Map-backed store. Documents are held by reference, so a caller polling
 * `get(id)` sees status and progress as the executor writes them.
 *
 * @example
 * ```typescript
 * const store = new InMemoryDocumentStore({ maxDocuments: 100 });
 * const orchestrator = new IngestionOrchestrator({ factory, documents: store });
 * ```
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, IngestionDocument>();
  private readonly maxDocuments: number;

  /**
   * @param options - Store limits
   * @throws {RangeError} If `maxDocuments` is not a positive integer
   */
  constructor(options: InMemoryDocumentStoreOptions = {}) {
    const maxDocuments = options.maxDocuments ?? 1000;
    if (!Number.isInteger(maxDocuments) || maxDocuments < 1) {
      throw new RangeError(`maxDocuments must be a positive integer, got ${maxDocuments}`);
    }
    this.maxDocuments = maxDocuments;
  }

  /**
   * Store a document, evicting the oldest completed or failed documents
   * while the store is over its limit
   */
  save(document: IngestionDocument): void {
    this.documents.set(document.id, document);
    this.evictFinished();
  }

  delete(id: string): boolean {
    return this.documents.delete(id);
  }

  /** Number of documents currently held */
  get size(): number {
    return this.documents.size;
  }

  get(id: string): IngestionDocument | undefined {
    return this.documents.get(id);
  }

  list(filter?: { status?: DocumentStatus }): IngestionDocument[] {
    const all = [...this.documents.values()];
    if (filter?.status === undefined) {
      return all;
    }
    return all.filter((document) => document.status === filter.status);
  }

  private evictFinished(): void {
    // Map iteration is insertion order: oldest first
    for (const [id, document] of this.documents) {
      if (this.documents.size <= this.maxDocuments) {
        return;
      }
      if (document.isTerminal) {
        this.documents.delete(id);
      }
    }
  }
}
