import type { ArchitectureDocument, ArchitectureSink } from '../../types/architecture.js';

/**
 * Process-local sink, used for dry runs and tests. Upserts replace by `id`.
 */
export class InMemoryArchitectureSink implements ArchitectureSink {
  private readonly documents = new Map<string, ArchitectureDocument>();

  async upsert(document: ArchitectureDocument): Promise<void> {
    this.documents.set(document.id, { ...document });
  }

  get size(): number {
    return this.documents.size;
  }

  get(id: string): ArchitectureDocument | undefined {
    return this.documents.get(id);
  }

  list(): ArchitectureDocument[] {
    return Array.from(this.documents.values());
  }
}
