import { Inject } from '@nestjs/common';
import type { EntityType } from '../../lib/data-client';

export function getDataClientToken(entityType: EntityType): string {
  return `DataClient<${entityType}>`;
}

export function getDataRepositoryToken(entityType: EntityType): string {
  return `DataRepository<${entityType}>`;
}

/** Injects the DataRepository registered for `entityType` via forFeature. */
export function InjectDataRepository(
  entityType: EntityType,
): ParameterDecorator & PropertyDecorator {
  return Inject(getDataRepositoryToken(entityType));
}
