import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export type ScalarParameterType = 'string' | 'integer' | 'boolean';

export interface FieldSpec {
  type: ScalarParameterType;
  description: string;
  required?: boolean;
  default?: string | number | boolean;
  enum?: readonly string[];
  minimum?: number;
  maximum?: number;
}

/**
 * One row of a tool's parameter table. Arrays hold either strings or flat
 * records described by `items`.
 */
export interface ParameterSpec extends Omit<FieldSpec, 'type'> {
  type: ScalarParameterType | 'string-array' | 'object-array';
  minItems?: number;
  maxItems?: number;
  items?: Readonly<Record<string, FieldSpec>>;
}

export type ParameterTable = Readonly<Record<string, ParameterSpec>>;

type JsonSchemaProperty = Record<string, unknown>;

export const missingParameterMessage = (name: string): string =>
  `Missing required parameter: ${name}`;

function scalarSchema(name: string, spec: FieldSpec): z.ZodTypeAny {
  const errors = {
    required_error: missingParameterMessage(name),
    invalid_type_error: `Expected ${spec.type}`,
  };

  switch (spec.type) {
    case 'string': {
      let schema = z.string(errors);
      if (spec.required) {
        schema = schema.min(1, missingParameterMessage(name));
      }
      const allowed = spec.enum;
      if (allowed) {
        return schema.refine((value) => allowed.includes(value), {
          message: `Expected one of: ${allowed.join(', ')}`,
        });
      }
      return schema;
    }
    case 'integer': {
      let schema = z.number(errors).int(`Expected integer`);
      if (spec.minimum !== undefined) {
        schema = schema.min(spec.minimum);
      }
      if (spec.maximum !== undefined) {
        schema = schema.max(spec.maximum);
      }
      return schema;
    }
    case 'boolean':
      return z.boolean(errors);
    default: {
      const unreachable: never = spec.type;
      throw new Error(`Unsupported parameter type: ${String(unreachable)}`);
    }
  }
}

function withPresence(schema: z.ZodTypeAny, spec: FieldSpec | ParameterSpec): z.ZodTypeAny {
  if (spec.required) {
    return schema;
  }
  return spec.default !== undefined ? schema.default(spec.default) : schema.optional();
}

function recordSchema(fields: Readonly<Record<string, FieldSpec>>): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, field] of Object.entries(fields)) {
    shape[name] = withPresence(scalarSchema(name, field), field);
  }
  return z.object(shape, { invalid_type_error: 'Expected object' });
}

function parameterSchema(name: string, spec: ParameterSpec): z.ZodTypeAny {
  if (spec.type !== 'string-array' && spec.type !== 'object-array') {
    return scalarSchema(name, { ...spec, type: spec.type });
  }

  let schema = z.array(
    spec.type === 'string-array'
      ? z.string({ invalid_type_error: 'Expected string' }).min(1, 'Expected a non-empty string')
      : recordSchema(spec.items ?? {}),
    { required_error: missingParameterMessage(name), invalid_type_error: 'Expected array' },
  );
  if (spec.minItems !== undefined) {
    schema = schema.min(spec.minItems, `Expected at least ${spec.minItems} item(s)`);
  }
  if (spec.maxItems !== undefined) {
    schema = schema.max(spec.maxItems, `Expected at most ${spec.maxItems} item(s)`);
  }
  return schema;
}

/**
 * Builds the validator the dispatcher runs before a handler. Unknown keys
 * are dropped.
 */
export function buildParamsSchema(table: ParameterTable): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(table)) {
    shape[name] = withPresence(parameterSchema(name, spec), spec);
  }
  return z.object(shape, { invalid_type_error: 'Expected an object of parameters' });
}

function jsonSchemaFor(spec: FieldSpec | ParameterSpec): JsonSchemaProperty {
  const property: JsonSchemaProperty = { description: spec.description };

  switch (spec.type) {
    case 'string-array':
      property.type = 'array';
      property.items = { type: 'string' };
      break;
    case 'object-array': {
      const fields = 'items' in spec && spec.items ? spec.items : {};
      property.type = 'array';
      property.items = objectSchema(fields);
      break;
    }
    default:
      property.type = spec.type;
  }

  if (spec.enum) property.enum = [...spec.enum];
  if (spec.minimum !== undefined) property.minimum = spec.minimum;
  if (spec.maximum !== undefined) property.maximum = spec.maximum;
  if (spec.default !== undefined) property.default = spec.default;
  if ('minItems' in spec && spec.minItems !== undefined) property.minItems = spec.minItems;
  if ('maxItems' in spec && spec.maxItems !== undefined) property.maxItems = spec.maxItems;
  return property;
}

function objectSchema(
  table: Readonly<Record<string, FieldSpec | ParameterSpec>>,
): Tool['inputSchema'] {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];
  for (const [name, spec] of Object.entries(table)) {
    properties[name] = jsonSchemaFor(spec);
    if (spec.required) {
      required.push(name);
    }
  }
  return required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

/**
 * JSON Schema advertised in tool listings.
 */
export function buildInputSchema(table: ParameterTable): Tool['inputSchema'] {
  return objectSchema(table);
}
