import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MongodbService } from './mongodb.service';

/**
 * Internal-only MongoDB module.
 * - Provides a thin, typed bridge to the native MongoDB driver.
 * - Connection settings come from ConfigService (MONGO_* keys).
 * - Exports the service for MongoDataClient factories.
 */
@Module({
  imports: [ConfigModule],
  providers: [MongodbService],
  exports: [MongodbService],
})
export class MongodbModule {}
