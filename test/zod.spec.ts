import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type Adapter, createRepository, InvalidEntityError } from "../src";
import { getAllAdapterFactories } from "./adapters";
import { Book, bookSchema } from "./entities";

describe("Zod Schema Provider", () => {
  test("should declare the object's shape as attributes", () => {
    expect(bookSchema.attributeNames).toEqual([
      "id",
      "title",
      "summary",
      "releasedYear",
      "authorId",
    ]);
  });

  test("should accept missing optional attributes", () => {
    expect(
      bookSchema.parseAttributes({
        id: 1,
        title: "Tide",
        summary: "",
        releasedYear: 2010,
      }),
    ).toEqual({ id: 1, title: "Tide", summary: "", releasedYear: 2010 });
  });

  test("should report each issue with its path", () => {
    let error: unknown;
    try {
      bookSchema.parseAttributes({ id: 1, title: "", summary: "", releasedYear: 2010 });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(InvalidEntityError);
    expect(error).toHaveProperty("entityName", "book");
    expect(error).toHaveProperty("issues", [expect.stringMatching(/^title: /)]);
  });
});

getAllAdapterFactories().forEach((factory) => {
  describe(`Zod Integration with ${factory.type.toUpperCase()} Adapter`, () => {
    let adapter: Adapter;

    beforeEach(async () => {
      adapter = await factory.create();
    });

    afterEach(async () => {
      if (factory.cleanup) {
        await factory.cleanup();
      }
    });

    test("should store and search books", async () => {
      const repository = createRepository({ adapter });

      await repository.add(
        new Book({ id: 1, title: "Tide", summary: "", releasedYear: 2010, authorId: "0" }),
      );
      await repository.add(
        new Book({ id: 2, title: "Ebb", summary: "", releasedYear: 2012, authorId: "1" }),
      );
      await repository.add(
        new Book({ id: 3, title: "Flood", summary: "", releasedYear: 2015, authorId: "0" }),
      );
      await repository.commit();

      const books = await repository.search(Book, { authorId: "0" });

      expect(books.map((book) => book.state.title)).toEqual(["Tide", "Flood"]);
      expect(books.every((book) => book instanceof Book)).toBe(true);
    });
  });
});
