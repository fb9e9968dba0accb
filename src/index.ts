import 'reflect-metadata';

export * from './lib/data-client';
export * from './lib/errors/AppError';
export * from './lib/errors/DataClientError';
export * from './modules/data-repository/data-repository';
export * from './modules/data-repository/data-repository.module';
export * from './modules/data-repository/data-repository.tokens';
export * from './modules/data-repository/data-client-exception.filter';
export * from './modules/mongodb/mongodb.module';
export * from './modules/mongodb/mongodb.service';
export * from './modules/mongodb/mongodb.data-client';
export {
  loadMongoConfig,
  buildMongoUri,
  type MongoConfig,
  type ConfigReader,
} from './infra/mongo/mongo.config';
