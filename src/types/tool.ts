/**
 * Tool declaration types.
 *
 * A tool declaration names an action, describes it for the assistant, and
 * carries the JSON Schema its arguments are validated against before the
 * handler runs.
 */

// ---------------------------------------------------------------------------
// JSON Schema subset used inside tool argument schemas
// ---------------------------------------------------------------------------

export interface JsonSchemaProperty {
  type: string;
  description?: string;
  default?: unknown;
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  items?: JsonSchemaProperty;
  minItems?: number;
  maxItems?: number;
  examples?: unknown[];
}

/** Type alias, not interface: ajv's `SchemaObject` takes an index signature. */
export type JsonSchema = {
  type: 'object';
  required?: string[];
  additionalProperties: false;
  properties: Record<string, JsonSchemaProperty>;
};

// ---------------------------------------------------------------------------
// Tool declaration
// ---------------------------------------------------------------------------

export interface ToolDeclaration {
  name: string;
  description: string;
  arguments_schema: JsonSchema;
}
