import {
  Module,
  type DynamicModule,
  type FactoryProvider,
  type ModuleMetadata,
  type Provider,
} from '@nestjs/common';
import type { DataClient, EntityType } from '../../lib/data-client';
import { AppError } from '../../lib/errors/AppError';
import { DataRepository } from './data-repository';
import {
  getDataClientToken,
  getDataRepositoryToken,
} from './data-repository.tokens';

/** Client built by a Nest factory (may inject other providers). */
export interface DataRepositoryFactoryFeature<T> {
  entityType: EntityType;
  useFactory: FactoryProvider<DataClient<T>>['useFactory'];
  inject?: FactoryProvider['inject'];
}

/** Ready-made client instance. */
export interface DataRepositoryValueFeature<T> {
  entityType: EntityType;
  useValue: DataClient<T>;
}

export type DataRepositoryFeature<T = unknown> =
  | DataRepositoryFactoryFeature<T>
  | DataRepositoryValueFeature<T>;

export interface DataRepositoryModuleOptions {
  /** Modules whose providers the client factories inject. */
  imports?: ModuleMetadata['imports'];
}

function clientProvider<T>(feature: DataRepositoryFeature<T>): Provider {
  const provide = getDataClientToken(feature.entityType);
  if ('useValue' in feature) {
    return { provide, useValue: feature.useValue };
  }
  return {
    provide,
    useFactory: feature.useFactory,
    inject: feature.inject ?? [],
  };
}

function repositoryProvider(entityType: EntityType): Provider {
  return {
    provide: getDataRepositoryToken(entityType),
    useFactory: <T>(dataClient: DataClient<T>): DataRepository<T> =>
      new DataRepository<T>({ dataClient, entityType }),
    inject: [getDataClientToken(entityType)],
  };
}

/**
 * Registers one DataClient + DataRepository pair per entity type.
 * Repositories are disposed when the application shuts down.
 */
@Module({})
export class DataRepositoryModule {
  static forFeature(
    features: DataRepositoryFeature[],
    options: DataRepositoryModuleOptions = {},
  ): DynamicModule {
    const seen = new Set<EntityType>();
    const providers: Provider[] = [];
    const exportsList: string[] = [];

    for (const feature of features) {
      const { entityType } = feature;
      if (seen.has(entityType)) {
        throw new AppError(
          `Data repository already registered for entity type: ${entityType}`,
          'DATA_REPOSITORY_DUPLICATE_FEATURE',
        );
      }
      seen.add(entityType);
      providers.push(clientProvider(feature), repositoryProvider(entityType));
      exportsList.push(
        getDataClientToken(entityType),
        getDataRepositoryToken(entityType),
      );
    }

    return {
      module: DataRepositoryModule,
      imports: options.imports ?? [],
      providers,
      exports: exportsList,
    };
  }
}
