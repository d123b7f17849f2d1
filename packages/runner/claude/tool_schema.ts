import * as z from "zod";

/** The subset of JSON Schema that frontend tool parameters use. */
export interface JsonSchema {
  type?: string | string[];
  description?: string;
  enum?: unknown[];
  items?: JsonSchema;
  properties?: Record<string, JsonSchema>;
  required?: string[];
}

const JsonSchema: z.ZodType<JsonSchema> = z.lazy(() =>
  z.object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    enum: z.array(z.unknown()).optional(),
    items: JsonSchema.optional(),
    properties: z.record(z.string(), JsonSchema).optional(),
    required: z.array(z.string()).optional(),
  })
);

export type ZodShape = Record<string, z.ZodType>;

function primaryType(schema: JsonSchema): string | undefined {
  if (Array.isArray(schema.type)) {
    return schema.type.find((type) => type !== "null");
  }
  return schema.type;
}

/** Convert one JSON Schema node to the closest zod type. */
export function jsonSchemaToZod(schema: JsonSchema): z.ZodType {
  const converted = convert(schema);
  return schema.description ? converted.describe(schema.description) : converted;
}

function convert(schema: JsonSchema): z.ZodType {
  const values = schema.enum;
  if (values && values.length > 0) {
    const strings = values.filter((v): v is string => typeof v === "string");
    if (strings.length === values.length) {
      return z.enum(strings);
    }
  }

  switch (primaryType(schema)) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "integer":
      return z.number().int();
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(schema.items ? jsonSchemaToZod(schema.items) : z.unknown());
    case "object":
      return schema.properties
        ? z.looseObject(jsonSchemaToShape(schema))
        : z.record(z.string(), z.unknown());
    default:
      return z.unknown();
  }
}

/**
 * Convert an object schema's properties to a zod raw shape. Properties not
 * listed in `required` become optional.
 */
export function jsonSchemaToShape(schema: JsonSchema): ZodShape {
  const required = new Set(schema.required ?? []);
  const shape: ZodShape = {};
  for (const [name, property] of Object.entries(schema.properties ?? {})) {
    const type = jsonSchemaToZod(property);
    shape[name] = required.has(name) ? type : type.optional();
  }
  return shape;
}

/**
 * Parse the `parameters` of an AG-UI tool. Anything that is not an object
 * schema yields an empty shape.
 */
export function toolParametersToShape(parameters: unknown): ZodShape {
  const parsed = JsonSchema.safeParse(parameters);
  if (!parsed.success) return {};
  return jsonSchemaToShape(parsed.data);
}
