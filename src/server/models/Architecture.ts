import type { Collection, Db, Filter, Sort } from 'mongodb';
import type { ArchitectureDocument, ArchitectureSink } from '../types/architecture.js';
import { handleDatabaseOperation } from '../utils/databaseErrorHandler.js';

export const DEFAULT_COLLECTION_NAME = 'architectures';

export type ArchitectureSortField = 'name' | 'resourceCount';

export interface ArchitectureQueryOptions {
  skip?: number;
  limit?: number;
  /** Case-insensitive substring match on name, displayName or resource type */
  q?: string;
  minResources?: number;
  sortBy?: ArchitectureSortField;
  sortDir?: 'asc' | 'desc';
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the filter shared by find and count
 */
export function buildArchitectureFilter(options: Pick<ArchitectureQueryOptions, 'q' | 'minResources'>): Filter<ArchitectureDocument> {
  const filter: Filter<ArchitectureDocument> = {};
  if (options.q) {
    const pattern = new RegExp(escapeRegex(options.q), 'i');
    filter.$or = [{ name: pattern }, { displayName: pattern }, { resourceTypes: pattern }];
  }
  if (options.minResources !== undefined && options.minResources > 0) {
    filter.resourceCount = { $gte: options.minResources };
  }
  return filter;
}

/**
 * Read side used by the listing API, on top of the scrape sink
 */
export interface ArchitectureStore extends ArchitectureSink {
  findAll(options?: ArchitectureQueryOptions): Promise<ArchitectureDocument[]>;
  count(options?: Pick<ArchitectureQueryOptions, 'q' | 'minResources'>): Promise<number>;
}

/**
 * MongoDB-backed architecture store. Documents are keyed by their deterministic `id`.
 */
export class Architecture implements ArchitectureStore {
  private readonly collection: Collection<ArchitectureDocument>;

  constructor(db: Db, collectionName: string = DEFAULT_COLLECTION_NAME) {
    this.collection = db.collection<ArchitectureDocument>(collectionName);
  }

  /**
   * Ensure indexes exist for the collection
   */
  async ensureIndexes(): Promise<void> {
    await handleDatabaseOperation(async () => {
      // Upsert key
      await this.collection.createIndex({ id: 1 }, { unique: true });
      // Listing sorts
      await this.collection.createIndex({ name: 1 });
      await this.collection.createIndex({ resourceCount: -1 });
    }, 'Architecture.ensureIndexes');
  }

  /**
   * Insert or replace the whole document with the same `id`
   */
  async upsert(document: ArchitectureDocument): Promise<void> {
    await handleDatabaseOperation(
      () => this.collection.replaceOne({ id: document.id }, document, { upsert: true }),
      'Architecture.upsert'
    );
  }

  async findAll(options: ArchitectureQueryOptions = {}): Promise<ArchitectureDocument[]> {
    return handleDatabaseOperation(async () => {
      const sortField = options.sortBy ?? 'name';
      const sort: Sort = { [sortField]: options.sortDir === 'desc' ? -1 : 1, id: 1 };
      return this.collection
        .find(buildArchitectureFilter(options), { projection: { _id: 0 } })
        .sort(sort)
        .skip(options.skip ?? 0)
        .limit(options.limit ?? 50)
        .toArray();
    }, 'Architecture.findAll');
  }

  async count(options: Pick<ArchitectureQueryOptions, 'q' | 'minResources'> = {}): Promise<number> {
    return handleDatabaseOperation(
      () => this.collection.countDocuments(buildArchitectureFilter(options)),
      'Architecture.count'
    );
  }
}
