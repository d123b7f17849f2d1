import * as z from "zod";
import { describe, expect, it } from "vitest";

import { jsonSchemaToZod, toolParametersToShape } from "./tool_schema.ts";

describe("toolParametersToShape", () => {
  const shape = toolParametersToShape({
    type: "object",
    properties: {
      city: { type: "string", description: "City name" },
      days: { type: "integer" },
      units: { type: "string", enum: ["metric", "imperial"] },
      tags: { type: "array", items: { type: "string" } },
      filters: {
        type: "object",
        properties: { minimum: { type: "number" } },
        required: ["minimum"],
      },
    },
    required: ["city"],
  });
  const schema = z.object(shape);

  it("makes properties outside required optional", () => {
    expect(Object.keys(shape)).toEqual([
      "city",
      "days",
      "units",
      "tags",
      "filters",
    ]);
    expect(schema.safeParse({ city: "Paris" }).success).toBe(true);
    expect(schema.safeParse({ days: 2 }).success).toBe(false);
  });

  it("maps JSON Schema types", () => {
    expect(schema.safeParse({ city: "Paris", days: 1.5 }).success).toBe(false);
    expect(schema.safeParse({ city: "Paris", units: "kelvin" }).success).toBe(
      false,
    );
    expect(schema.safeParse({ city: "Paris", tags: ["a", 1] }).success).toBe(
      false,
    );
    expect(
      schema.safeParse({ city: "Paris", filters: { minimum: 3, extra: true } })
        .success,
    ).toBe(true);
    expect(schema.safeParse({ city: "Paris", filters: {} }).success).toBe(false);
  });

  it("yields an empty shape for anything but an object schema", () => {
    expect(toolParametersToShape(undefined)).toEqual({});
    expect(toolParametersToShape("object")).toEqual({});
    expect(toolParametersToShape({ type: "object" })).toEqual({});
  });
});

describe("jsonSchemaToZod", () => {
  it("keeps descriptions", () => {
    expect(jsonSchemaToZod({ type: "string", description: "City name" })
      .description).toBe("City name");
  });

  it("uses the first non-null type of a type list", () => {
    const schema = jsonSchemaToZod({ type: ["null", "boolean"] });
    expect(schema.safeParse(true).success).toBe(true);
    expect(schema.safeParse("yes").success).toBe(false);
  });

  it("accepts any record for an object without properties", () => {
    const schema = jsonSchemaToZod({ type: "object" });
    expect(schema.safeParse({ a: 1 }).success).toBe(true);
    expect(schema.safeParse([1]).success).toBe(false);
  });

  it("accepts anything for unknown types", () => {
    expect(jsonSchemaToZod({}).safeParse(42).success).toBe(true);
  });
});
