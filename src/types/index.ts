export type { Adapter } from "./Adapter";
export type { EntityInput, EntityInstance } from "./EntityInstance";
export type { Criteria, EntityModel } from "./EntityModel";
export type { Plugin } from "./Plugin";
export type { Repository } from "./Repository";
export type {
  BaseAttributes,
  EntityId,
  InferAttributesFromSchema,
  InferEntityNameFromSchema,
  Schema,
} from "./Schema";
export type { SchemaInput } from "./SchemaInput";
export type { EntityRecord, EntityState, StagedChange } from "./StagedChange";
