import { Logger, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import {
  unwrap,
  type AggregateParams,
  type AggregateResult,
  type CountParams,
  type CreateParams,
  type DataClient,
  type DeleteParams,
  type EntityType,
  type PaginatedResponse,
  type ReadAllParams,
  type ReadParams,
  type UpdateParams,
} from '../../lib/data-client';
import { isDataClientError } from '../../lib/errors/DataClientError';

export interface DataRepositoryOptions<T> {
  dataClient: DataClient<T>;
  /** Type name announced on entityUpdated after each successful mutation. */
  entityType: EntityType;
}

/**
 * Generic repository over a DataClient<T>.
 *
 * Every method makes one call to the matching client method, unwraps the
 * response envelope and returns its payload. Client errors are rethrown
 * unchanged (same instance); nothing is retried or translated.
 *
 * After a successful create, update or delete the repository emits its
 * entity type on {@link entityUpdated}. The stream is hot: only current
 * subscribers see an emission, nothing is replayed.
 *
 * @example
 * ```ts
 * headlines.entityUpdated
 *   .pipe(filter((type) => type === 'headline'))
 *   .subscribe(() => refreshHeadlines());
 * ```
 */
export class DataRepository<T> implements OnModuleDestroy {
  private readonly dataClient: DataClient<T>;
  private readonly entityUpdatedSubject = new Subject<EntityType>();
  private readonly logger: Logger;

  public readonly entityType: EntityType;

  /** Emits the entity type whenever an item is created, updated or deleted. */
  public readonly entityUpdated: Observable<EntityType> =
    this.entityUpdatedSubject.asObservable();

  constructor({ dataClient, entityType }: DataRepositoryOptions<T>) {
    this.dataClient = dataClient;
    this.entityType = entityType;
    this.logger = new Logger(`DataRepository<${entityType}>`);
  }

  /** Completes entityUpdated. Later emissions are dropped. */
  public dispose(): void {
    this.entityUpdatedSubject.complete();
  }

  public onModuleDestroy(): void {
    this.dispose();
  }

  public async create({ item, userId }: CreateParams<T>): Promise<T> {
    try {
      const response = await this.dataClient.create({ item, userId });
      this.notifyUpdated('create');
      return unwrap(response);
    } catch (err) {
      throw this.rethrown('create', err);
    }
  }

  /** Rejects with the client's NotFoundError when the item does not exist. */
  public async read({ id, userId }: ReadParams): Promise<T> {
    try {
      const response = await this.dataClient.read({ id, userId });
      return unwrap(response);
    } catch (err) {
      throw this.rethrown('read', err);
    }
  }

  public async readAll({
    userId,
    filter,
    pagination,
    sort,
  }: ReadAllParams = {}): Promise<PaginatedResponse<T>> {
    try {
      const response = await this.dataClient.readAll({
        userId,
        filter,
        pagination,
        sort,
      });
      return unwrap(response);
    } catch (err) {
      throw this.rethrown('readAll', err);
    }
  }

  public async update({ id, item, userId }: UpdateParams<T>): Promise<T> {
    try {
      const response = await this.dataClient.update({ id, item, userId });
      this.notifyUpdated('update');
      return unwrap(response);
    } catch (err) {
      throw this.rethrown('update', err);
    }
  }

  public async delete({ id, userId }: DeleteParams): Promise<void> {
    try {
      await this.dataClient.delete({ id, userId });
      this.notifyUpdated('delete');
    } catch (err) {
      throw this.rethrown('delete', err);
    }
  }

  public async count({ userId, filter }: CountParams = {}): Promise<number> {
    try {
      const response = await this.dataClient.count({ userId, filter });
      return unwrap(response);
    } catch (err) {
      throw this.rethrown('count', err);
    }
  }

  public async aggregate({
    pipeline,
    userId,
  }: AggregateParams): Promise<AggregateResult> {
    try {
      const response = await this.dataClient.aggregate({ pipeline, userId });
      return unwrap(response);
    } catch (err) {
      throw this.rethrown('aggregate', err);
    }
  }

  private notifyUpdated(operation: 'create' | 'update' | 'delete'): void {
    this.logger.debug(`${operation} succeeded; emitting ${this.entityType}`);
    this.entityUpdatedSubject.next(this.entityType);
  }

  /** Returns the client's error untouched so callers can `throw` it. */
  private rethrown(operation: string, err: unknown): unknown {
    if (isDataClientError(err)) {
      this.logger.debug(`${operation} failed: ${err.summary()}`);
    } else {
      this.logger.debug(`${operation} failed with unclassified error`);
    }
    return err;
  }
}
