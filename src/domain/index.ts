/**
 * Domain Layer Barrel Export
 *
 * This file provides a convenient way to import domain objects.
 * The domain layer is the core of the application and has no external dependencies.
 */

// Entities
export { FetchRunEntity, type FetchRunEntityData, type FetchRunProps } from './entities/fetch-run.entity';
export {
  CollectionTaskEntity,
  type CollectionTaskEntityData,
  type CollectionFileSource,
} from './entities/collection-task.entity';

// Value Objects
export { CollectionIdVO } from './value-objects/collection-id.vo';
export { TaxonSelectionVO, type TaxonSelectionProps } from './value-objects/taxon-selection.vo';
export { RunModeVO, type RunModeProps } from './value-objects/run-mode.vo';
export { RetryScheduleVO } from './value-objects/retry-schedule.vo';

// Errors
export * from './errors/pipeline.errors';

// Events
export * from './events';
