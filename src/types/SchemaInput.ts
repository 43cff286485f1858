/**
 * Schema provider function signature for pluggable validation libraries.
 *
 * @typeParam $$Attributes - The validated attribute record
 * @typeParam $$Input - What the parser accepts, when a schema transforms values
 *
 * @param context - Schema context
 * @param context.entityName - The entity name, used in validation messages
 * @returns The declared attribute names and an attribute parser
 *
 * @remarks
 * `parseAttributes` must throw `InvalidEntityError` when the input does not
 * satisfy the schema. `attributeNames` lists every declared attribute,
 * optional ones included; search criteria are checked against it.
 *
 * @internal
 */
export type SchemaInput<$$Attributes, $$Input = $$Attributes> = (context: {
  entityName: string;
}) => {
  attributeNames: readonly string[];
  parseAttributes(input: unknown): $$Attributes;
  /** Type-level only; never set at run time. */
  readonly " $$input"?: $$Input;
};
