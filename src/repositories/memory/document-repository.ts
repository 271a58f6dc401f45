// =============================================================================
// PDF SCAN — In-Memory Document Repository
//
// Reference implementation of IDocumentRepository backed by a Map.
// Map iteration follows first-insertion order (re-setting a key keeps its
// slot), and Array.prototype.sort is stable, so ties in upload time come
// back in insertion order.
//
// No method awaits between reading and writing the map; the event loop
// serialises every access without a lock.
// =============================================================================

import { Document, DocumentStatus, withStatus } from '../../types/entities';
import { NotFoundError } from '../../types/errors';
import { IDocumentRepository } from '../../types/repositories';

export class InMemoryDocumentRepository implements IDocumentRepository {
  readonly backendName = 'memory';
  private documents = new Map<string, Document>();

  async store(document: Document): Promise<void> {
    this.documents.set(document.id, document);
  }

  async get(id: string): Promise<Document | null> {
    return this.documents.get(id) ?? null;
  }

  async updateStatus(
    id: string,
    status: DocumentStatus,
    errorMessage?: string | null
  ): Promise<void> {
    const existing = this.documents.get(id);
    if (!existing) {
      throw new NotFoundError(`Document not found: ${id}`);
    }
    this.documents.set(id, withStatus(existing, status, errorMessage));
  }

  async list(limit: number, offset: number): Promise<Document[]> {
    return [...this.documents.values()]
      .sort((a, b) => b.uploadTime.getTime() - a.uploadTime.getTime())
      .slice(offset, offset + limit);
  }
}
