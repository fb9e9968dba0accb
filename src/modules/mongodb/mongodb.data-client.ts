import { Logger } from '@nestjs/common';
import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';
import type { Collection, Document, Filter, SortDirection } from 'mongodb';
import {
  success,
  type AggregateParams,
  type AggregateResult,
  type CountParams,
  type CreateParams,
  type DataClient,
  type DataFilter,
  type DeleteParams,
  type EntityType,
  type PaginatedResponse,
  type ReadAllParams,
  type ReadParams,
  type SortOption,
  type SuccessApiResponse,
  type UpdateParams,
} from '../../lib/data-client';
import {
  BadRequestError,
  DataFormatError,
  NotFoundError,
  type DataErrorContext,
  type DataOperation,
  type FormatIssue,
} from '../../lib/errors/DataClientError';
import { toTransportError } from './internal';
import { MongodbService } from './mongodb.service';

export interface MongoDataClientOptions<T> {
  entityType: EntityType;
  collection: string;
  /** Defaults to the database configured on MongodbService. */
  dbName?: string;
  getId: (item: T) => string;
  toDocument: (item: T) => Document;
  /** Receives the stored document without `_id`. May throw on bad data. */
  fromDocument: (doc: Document) => T;
  /** JSON schema every document read back must satisfy. */
  schema?: SchemaObject;
  /** Document field holding the owning user id. Default: "userId". */
  scopeField?: string;
  defaultLimit?: number;
  maxLimit?: number;
}

const DEFAULT_SCOPE_FIELD = 'userId';
const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

/**
 * DataClient backed by a single MongoDB collection.
 * Filters and aggregate pipelines are handed to the driver as given.
 */
export class MongoDataClient<T> implements DataClient<T> {
  private readonly logger: Logger;
  private readonly ajv = new Ajv({ strict: true, allErrors: true });
  private readonly validateDocument?: ValidateFunction;
  private readonly scopeField: string;
  private readonly defaultLimit: number;
  private readonly maxLimit: number;

  constructor(
    private readonly mongo: MongodbService,
    private readonly options: MongoDataClientOptions<T>,
  ) {
    this.logger = new Logger(`MongoDataClient<${options.entityType}>`);
    this.validateDocument = options.schema
      ? this.ajv.compile(options.schema)
      : undefined;
    this.scopeField = options.scopeField ?? DEFAULT_SCOPE_FIELD;
    this.maxLimit = options.maxLimit ?? MAX_LIMIT;
    this.defaultLimit = Math.min(
      options.defaultLimit ?? DEFAULT_LIMIT,
      this.maxLimit,
    );
  }

  public async create({
    item,
    userId,
  }: CreateParams<T>): Promise<SuccessApiResponse<T>> {
    return this.run('create', async (col) => {
      const doc: Document = {
        ...this.toBody(item, userId),
        _id: this.options.getId(item),
      };
      await col.insertOne(doc);
      return success(this.decode(doc, 'create'));
    });
  }

  public async read({ id, userId }: ReadParams): Promise<SuccessApiResponse<T>> {
    return this.run('read', async (col) => {
      const doc = await col.findOne(this.scoped({ _id: id }, userId));
      if (!doc) throw this.notFound('read', id);
      return success(this.decode(doc, 'read'));
    });
  }

  public async readAll({
    userId,
    filter,
    pagination,
    sort,
  }: ReadAllParams): Promise<SuccessApiResponse<PaginatedResponse<T>>> {
    return this.run('readAll', async (col) => {
      const limit = this.resolveLimit(pagination?.limit);
      const offset = this.parseCursor(pagination?.cursor);

      // One extra document tells us whether another page exists.
      const docs = await col
        .find(this.scoped(filter, userId))
        .sort(toMongoSort(sort))
        .skip(offset)
        .limit(limit + 1)
        .toArray();

      const hasMore = docs.length > limit;
      const page = hasMore ? docs.slice(0, limit) : docs;
      return success({
        items: page.map((d) => this.decode(d, 'readAll')),
        cursor: hasMore ? String(offset + limit) : null,
        hasMore,
      });
    });
  }

  public async update({
    id,
    item,
    userId,
  }: UpdateParams<T>): Promise<SuccessApiResponse<T>> {
    return this.run('update', async (col) => {
      const doc = await col.findOneAndReplace(
        this.scoped({ _id: id }, userId),
        this.toBody(item, userId),
        { returnDocument: 'after' },
      );
      if (!doc) throw this.notFound('update', id);
      return success(this.decode(doc, 'update'));
    });
  }

  public async delete({ id, userId }: DeleteParams): Promise<void> {
    return this.run('delete', async (col) => {
      const res = await col.deleteOne(this.scoped({ _id: id }, userId));
      if (res.deletedCount === 0) throw this.notFound('delete', id);
    });
  }

  public async count({
    userId,
    filter,
  }: CountParams): Promise<SuccessApiResponse<number>> {
    return this.run('count', async (col) => {
      const total = await col.countDocuments(this.scoped(filter, userId));
      return success(total);
    });
  }

  public async aggregate({
    pipeline,
    userId,
  }: AggregateParams): Promise<SuccessApiResponse<AggregateResult>> {
    return this.run('aggregate', async (col) => {
      const stages: Document[] =
        userId === undefined
          ? pipeline
          : [{ $match: { [this.scopeField]: userId } }, ...pipeline];
      const docs = await col.aggregate<Document>(stages).toArray();
      return success(docs);
    });
  }

  /* ---------------------------
     Internals
     --------------------------- */

  private async run<R>(
    operation: DataOperation,
    action: (col: Collection<Document>) => Promise<R>,
  ): Promise<R> {
    try {
      const col = await this.mongo.getCollection<Document>(
        this.options.collection,
        this.options.dbName,
      );
      return await action(col);
    } catch (err) {
      const mapped = toTransportError(err, this.context(operation));
      this.logger.debug(mapped.summary());
      throw mapped;
    }
  }

  private context(operation: DataOperation): DataErrorContext {
    return {
      operation,
      entityType: this.options.entityType,
      collection: this.options.collection,
    };
  }

  private toBody(item: T, userId: string | undefined): Document {
    const body: Document = { ...this.options.toDocument(item) };
    delete body._id;
    if (userId !== undefined) body[this.scopeField] = userId;
    return body;
  }

  private scoped(
    filter: DataFilter | undefined,
    userId: string | undefined,
  ): Filter<Document> {
    const query: Filter<Document> = {};
    Object.assign(query, filter);
    if (userId !== undefined) query[this.scopeField] = userId;
    return query;
  }

  private decode(stored: Document, operation: DataOperation): T {
    const doc: Document = { ...stored };
    delete doc._id;

    const validate = this.validateDocument;
    if (validate && !validate(doc)) {
      const issues: FormatIssue[] = (validate.errors ?? []).map((e) => ({
        path: e.instancePath || '/',
        message: e.message ?? 'invalid value',
        keyword: e.keyword,
      }));
      throw new DataFormatError(
        `Stored ${this.options.entityType} does not match its schema`,
        issues,
        this.context(operation),
      );
    }

    try {
      return this.options.fromDocument(doc);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DataFormatError(
        `Cannot decode ${this.options.entityType}: ${reason}`,
        [],
        this.context(operation),
        err,
      );
    }
  }

  private notFound(operation: DataOperation, id: string): NotFoundError {
    return new NotFoundError(
      `${this.options.entityType} not found: ${id}`,
      this.context(operation),
    );
  }

  private resolveLimit(n: number | undefined): number {
    if (typeof n === 'number' && Number.isFinite(n) && n >= 1) {
      return Math.min(Math.floor(n), this.maxLimit);
    }
    return this.defaultLimit;
  }

  /** Cursors are the decimal offset of the next page. */
  private parseCursor(cursor: string | undefined): number {
    if (cursor === undefined) return 0;
    if (!/^\d+$/.test(cursor)) {
      throw new BadRequestError(
        `Invalid pagination cursor: ${cursor}`,
        this.context('readAll'),
      );
    }
    return Number.parseInt(cursor, 10);
  }
}

/** Sort options in order, with _id appended so pages are stable. */
export function toMongoSort(
  sort: SortOption[] | undefined,
): [string, SortDirection][] {
  const pairs = (sort ?? []).map(
    (o): [string, SortDirection] => [o.field, o.order === 'asc' ? 1 : -1],
  );
  if (!pairs.some(([field]) => field === '_id')) pairs.push(['_id', 1]);
  return pairs;
}
