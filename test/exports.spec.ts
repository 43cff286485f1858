import { describe, expect, test } from "vitest";

describe("Package Exports", () => {
  test("should export all public APIs from main index", async () => {
    const mainExports = await import("../src/index");

    // Core functions
    expect(mainExports.Entity).toBeDefined();
    expect(mainExports.defineSchema).toBeDefined();
    expect(mainExports.createRepository).toBeDefined();
    expect(mainExports.createInMemoryRepository).toBeDefined();
    expect(mainExports.createInMemoryAdapter).toBeDefined();
    expect(mainExports.defineAdapter).toBeDefined();
    expect(mainExports.identifierOf).toBeDefined();
    expect(mainExports.isEqual).toBeDefined();
    expect(mainExports.createLogger).toBeDefined();
    expect(mainExports.AUTO_INCREMENT_PLACEHOLDER).toBe(-1);

    // Errors
    expect(new mainExports.EntityNotFoundError("x", { entityName: "x" })).toBeInstanceOf(
      mainExports.RepositoryError,
    );
    expect(new mainExports.InvalidAttributeError("x", "y").code).toBe(
      "INVALID_ATTRIBUTE",
    );
    expect(new mainExports.AutoIncrementError("x", "y").code).toBe(
      "AUTO_INCREMENT_FAILED",
    );
  });

  test("should export the schema providers separately", async () => {
    const valibot = await import("../src/valibot");
    const zod = await import("../src/zod");
    const typebox = await import("../src/typebox");
    const arktype = await import("../src/arktype");

    expect(valibot.valibot).toBeTypeOf("function");
    expect(valibot.v).toBeDefined();
    expect(zod.zod).toBeTypeOf("function");
    expect(zod.z).toBeDefined();
    expect(typebox.typebox).toBeTypeOf("function");
    expect(typebox.Type).toBeDefined();
    expect(arktype.arktype).toBeTypeOf("function");
    expect(arktype.type).toBeDefined();
  });

  test("should export the standard schema provider separately", async () => {
    const provider = await import("../src/standard");

    expect(provider.standard).toBeTypeOf("function");
  });
});
