import { InvalidEntityError } from "./errors";
import { isEntityId } from "./identifierOf";
import { isEqual } from "./isEqual";
import type {
  BaseAttributes,
  EntityInput,
  EntityInstance,
  EntityState,
  Schema,
} from "./types";

/**
 * Creates an Entity class for a schema.
 *
 * @param schema - The schema instance created with `defineSchema()`
 * @returns A base class for the entity type
 *
 * @remarks
 * Instances are value objects: the constructor validates the attributes
 * against the schema and `equals` compares entity name and attributes. An
 * omitted `id` is filled in by the schema's `generateId`. `state` holds the
 * schema's output, so a transforming schema runs once per construction.
 *
 * The class itself is what repositories take to name an entity type in
 * `get`, `all`, `search`, `first` and `last`.
 *
 * @example
 * ```typescript
 * class Author extends Entity(authorSchema) {
 *   get fullName() {
 *     return `${this.state.firstName} ${this.state.lastName}`;
 *   }
 * }
 *
 * const author = new Author({
 *   id: "0",
 *   firstName: "Brandon",
 *   lastName: "Sanderson",
 *   country: "US",
 * });
 *
 * await repository.add(author);
 * await repository.commit();
 * ```
 */
export function Entity<
  $$EntityName extends string,
  $$Attributes extends BaseAttributes,
  $$Input extends Partial<BaseAttributes> = $$Attributes,
>(schema: Schema<$$EntityName, $$Attributes, $$Input>) {
  const entityName = schema[" $$entityName"];
  const generateId = schema[" $$generateId"];

  // set by `" $$load"` for the duration of one constructor call
  let loadedState: Readonly<$$Attributes> | null = null;

  return class BaseEntity implements EntityInstance<$$EntityName, $$Attributes> {
    // ----------------------
    // static properties
    // ----------------------
    static readonly schema: Schema<$$EntityName, $$Attributes, $$Input> = schema;

    // ----------------------
    // public properties
    // ----------------------
    readonly entityName: $$EntityName = entityName;
    readonly state: Readonly<$$Attributes>;

    get entityId(): $$Attributes["id"] {
      return this.state.id;
    }

    // ----------------------
    // private properties
    // ----------------------
    readonly " $$schema": Schema<$$EntityName, $$Attributes, $$Input> = schema;

    // ----------------------
    // constructor
    // ----------------------
    /**
     * @throws {InvalidEntityError} If the attributes fail the schema or the
     * `id` is not a non-empty string or a safe integer
     */
    constructor(attributes: EntityInput<$$Input>) {
      if (loadedState !== null) {
        this.state = loadedState;
        loadedState = null;
        return;
      }

      const state = schema.parseAttributes({
        ...attributes,
        id: attributes.id ?? generateId(),
      });

      if (!isEntityId(state.id)) {
        throw new InvalidEntityError(
          `Invalid ${entityName} identifier: ${String(state.id)}`,
          {
            entityName,
            issues: ["id must be a non-empty string or a safe integer"],
          },
        );
      }

      this.state = state;
    }

    /**
     * Creates a new entity instance with the given attributes.
     */
    static create<T>(
      this: new (
        attributes: EntityInput<$$Input>,
      ) => T,
      attributes: EntityInput<$$Input>,
    ): T {
      // biome-ignore lint/complexity/noThisInStatic: inheritance
      return new this(attributes);
    }

    /**
     * Rebuilds an entity from state a repository read back from its adapter.
     *
     * @internal
     * @remarks
     * The state is schema output and is adopted without parsing.
     */
    static " $$load"(state: EntityState): BaseEntity {
      const record: unknown = state;
      const adopted = record as Readonly<$$Attributes> & EntityInput<$$Input>;
      loadedState = adopted;

      try {
        // biome-ignore lint/complexity/noThisInStatic: inheritance
        return new this(adopted);
      } finally {
        loadedState = null;
      }
    }

    // ----------------------
    // public methods
    // ----------------------
    equals(other: unknown): boolean {
      if (typeof other !== "object" || other === null) {
        return false;
      }
      if (!("entityName" in other) || !("state" in other)) {
        return false;
      }

      return (
        other.entityName === this.entityName && isEqual(other.state, this.state)
      );
    }
  };
}
