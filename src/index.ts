export { createInMemoryAdapter } from "./createInMemoryAdapter";
export type { InMemoryAdapter } from "./createInMemoryAdapter";
export { createInMemoryRepository } from "./createInMemoryRepository";
export { createRepository } from "./createRepository";
export type { RepositoryOptions, StagingPolicy } from "./createRepository";
export { defineAdapter } from "./defineAdapter";
export { AUTO_INCREMENT_PLACEHOLDER, defineSchema } from "./defineSchema";
export { Entity } from "./Entity";
export { entityKey } from "./entityKey";
export {
  AutoIncrementError,
  CommitFailedError,
  EntityNotFoundError,
  InvalidAttributeError,
  InvalidEntityError,
  RepositoryError,
  StagingConflictError,
} from "./errors";
export { identifierOf, isEntityId } from "./identifierOf";
export { isEqual } from "./isEqual";
export { createLogger, LOG_LEVELS } from "./logger";
export type { Logger, LogLevel } from "./logger";
export type {
  Adapter,
  BaseAttributes,
  Criteria,
  EntityId,
  EntityInput,
  EntityInstance,
  EntityModel,
  EntityRecord,
  EntityState,
  InferAttributesFromSchema,
  InferEntityNameFromSchema,
  Plugin,
  Repository,
  Schema,
  SchemaInput,
  StagedChange,
} from "./types";
