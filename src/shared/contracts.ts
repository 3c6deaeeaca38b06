export type JsonSchemaProperty = {
  type: "string" | "boolean" | "number" | "integer" | "array" | "object";
  description?: string;
  default?: unknown;
  items?: JsonSchemaProperty;
};

// Tool input shapes are always objects; the model fills in the properties.
export type JsonObjectSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
  additionalProperties: false;
};

/** What the model is told about a tool. Independent of any provider format. */
export type ToolDeclaration = {
  name: string;
  description: string;
  schema: JsonObjectSchema;
};
