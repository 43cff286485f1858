import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type Adapter, createRepository, InvalidEntityError } from "../src";
import { getAllAdapterFactories } from "./adapters";
import { Genre, genreSchema } from "./entities";

describe("TypeBox Schema Provider", () => {
  test("should declare the object's properties as attributes", () => {
    expect(genreSchema.attributeNames).toEqual(["id", "name", "description"]);
  });

  test("should report issues by property", () => {
    let error: unknown;
    try {
      genreSchema.parseAttributes({ id: "one", name: "Fantasy", description: "" });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(InvalidEntityError);
    expect(error).toHaveProperty("entityName", "genre");
    expect(error).toHaveProperty(
      "message",
      expect.stringMatching(/^Invalid genre attributes: id: /),
    );
  });
});

getAllAdapterFactories().forEach((factory) => {
  describe(`TypeBox Integration with ${factory.type.toUpperCase()} Adapter`, () => {
    let adapter: Adapter;

    beforeEach(async () => {
      adapter = await factory.create();
    });

    afterEach(async () => {
      if (factory.cleanup) {
        await factory.cleanup();
      }
    });

    test("should store and retrieve genres", async () => {
      const repository = createRepository({ adapter });

      await repository.add(new Genre({ id: 1, name: "Fantasy", description: "Magic" }));
      await repository.add(new Genre({ id: 2, name: "Mystery", description: "Clues" }));
      await repository.commit();

      const genre = await repository.get(Genre, 2);
      expect(genre.state).toEqual({ id: 2, name: "Mystery", description: "Clues" });
      expect((await repository.last(Genre)).state.name).toBe("Mystery");
    });
  });
});
