import type { StandardSchemaV1 } from "@standard-schema/spec";
import { InvalidEntityError } from "./errors";
import type { SchemaInput } from "./types";

/**
 * Creates a Standard Schema provider.
 *
 * This is a generic provider that lets any Standard Schema-compliant
 * validation library describe an entity's attributes.
 *
 * @param args.schema - A Standard Schema instance for the attribute record
 * @param args.attributeNames - Every declared attribute name, `id` included
 *
 * @remarks
 * Standard Schema does not expose an object's keys, so the declared attribute
 * names are passed alongside the schema. Async validation is not supported.
 *
 * @example
 * ```typescript
 * import { defineSchema } from 'repokit';
 * import { standard } from 'repokit/standard';
 * import * as v from 'valibot';
 *
 * const genreSchema = defineSchema("genre", {
 *   schema: standard({
 *     schema: v.object({ id: v.number(), name: v.string() }),
 *     attributeNames: ["id", "name"],
 *   }),
 * });
 * ```
 *
 * @see {@link https://standardschema.dev} for Standard Schema specification
 */
export function standard<$$Attributes>(args: {
  schema: StandardSchemaV1<unknown, $$Attributes>;
  attributeNames: readonly string[];
}): SchemaInput<$$Attributes> {
  const attributeNames = [...args.attributeNames];

  return (context) => ({
    attributeNames,
    parseAttributes(input) {
      return standardValidate(args.schema, input, context.entityName);
    },
  });
}

/**
 * Validates input against a Standard Schema.
 *
 * @throws {InvalidEntityError} If validation fails
 * @throws {Error} If the schema validates asynchronously
 *
 * @internal
 */
function standardValidate<$$Output>(
  schema: StandardSchemaV1<unknown, $$Output>,
  input: unknown,
  entityName: string,
): $$Output {
  const result = schema["~standard"].validate(input);

  if (result instanceof Promise) {
    throw new Error("Promise validation result is not supported");
  }
  if (result.issues !== undefined) {
    throw invalidAttributes(
      entityName,
      result.issues.map((issue) =>
        formatIssue(
          issue.path?.map((segment) =>
            typeof segment === "object" ? segment.key : segment,
          ),
          issue.message,
        ),
      ),
    );
  }

  return result.value;
}

/**
 * @internal
 */
export function formatIssue(
  path: readonly PropertyKey[] | null | undefined,
  message: string,
): string {
  if (!path || path.length === 0) {
    return message;
  }

  return `${path.map(String).join(".")}: ${message}`;
}

/**
 * @internal
 */
export function invalidAttributes(
  entityName: string,
  issues: readonly string[],
): InvalidEntityError {
  return new InvalidEntityError(
    `Invalid ${entityName} attributes: ${issues.join("; ")}`,
    { entityName, issues },
  );
}
