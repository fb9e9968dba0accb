import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Collection, Db, Document, MongoClient } from 'mongodb';
import { buildMongoUri, loadMongoConfig } from '../../infra/mongo/mongo.config';
import { BadRequestError } from '../../lib/errors/DataClientError';
import {
  LazyMongoClient,
  isNonEmptyString,
  toTransportError,
} from './internal';

@Injectable()
export class MongodbService implements OnModuleDestroy {
  private readonly logger = new Logger(MongodbService.name);
  private readonly lazyClient: LazyMongoClient;
  private readonly defaultDbName: string;

  public constructor(config: ConfigService) {
    const cfg = loadMongoConfig((key) => config.get<string>(key));
    this.defaultDbName = cfg.dbName;
    this.lazyClient = new LazyMongoClient(buildMongoUri(cfg), cfg.dbName);
  }

  /**
   * Returns a connected native driver Db handle.
   * Defaults to the configured DB when not provided.
   */
  public async getDb(dbName?: string): Promise<Db> {
    const name: string = dbName ?? this.defaultDbName;
    try {
      return await this.lazyClient.getDb(name);
    } catch (err) {
      throw toTransportError(err, { operation: 'connect' });
    }
  }

  /**
   * Returns a native driver Collection<T> for direct use by callers.
   * No schema enforcement here; data clients validate what they read.
   */
  public async getCollection<T extends Document = Document>(
    collection: string,
    dbName?: string,
  ): Promise<Collection<T>> {
    if (!isNonEmptyString(collection)) {
      throw new BadRequestError('Collection name must be a non-empty string', {
        operation: 'getCollection',
      });
    }
    const db: Db = await this.getDb(dbName);
    return db.collection<T>(collection);
  }

  /** Expose underlying client if ever needed by internal modules. */
  public async getClient(): Promise<MongoClient> {
    try {
      return await this.lazyClient.getClient();
    } catch (err) {
      throw toTransportError(err, { operation: 'connect' });
    }
  }

  /** Graceful shutdown. */
  public async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing Mongo client');
    await this.lazyClient.close();
  }
}
