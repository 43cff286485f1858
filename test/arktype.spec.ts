import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type Adapter, createRepository, InvalidEntityError } from "../src";
import { getAllAdapterFactories } from "./adapters";
import { Publisher, publisherSchema } from "./entities";

describe("ArkType Schema Provider", () => {
  test("should read attribute names from the type", () => {
    expect([...publisherSchema.attributeNames].sort()).toEqual([
      "city",
      "id",
      "name",
    ]);
  });

  test("should report issues by key", () => {
    let error: unknown;
    try {
      publisherSchema.parseAttributes({ id: "p-1", name: "Northwind", city: 7 });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(InvalidEntityError);
    expect(error).toHaveProperty("entityName", "publisher");
    expect(error).toHaveProperty("issues", [expect.stringMatching(/^city: /)]);
  });
});

getAllAdapterFactories().forEach((factory) => {
  describe(`ArkType Integration with ${factory.type.toUpperCase()} Adapter`, () => {
    let adapter: Adapter;

    beforeEach(async () => {
      adapter = await factory.create();
    });

    afterEach(async () => {
      if (factory.cleanup) {
        await factory.cleanup();
      }
    });

    test("should store and search publishers", async () => {
      const repository = createRepository({ adapter });

      await repository.add(new Publisher({ id: "p-1", name: "Northwind", city: "Oslo" }));
      await repository.add(new Publisher({ id: "p-2", name: "Harbor", city: "Lyon" }));
      await repository.commit();

      const publishers = await repository.search(Publisher, { city: "Lyon" });

      expect(publishers.map((publisher) => publisher.entityId)).toEqual(["p-2"]);
    });
  });
});
