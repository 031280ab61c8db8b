import type { OpenAPIV3 } from 'openapi-types';

export type SchemaNode = OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject;

/** `read` hides writeOnly properties, `write` hides readOnly ones. */
export type SchemaMode = 'read' | 'write';

const MAX_DEPTH = 12;

export function isReference(
  node: object,
): node is OpenAPIV3.ReferenceObject {
  return '$ref' in node && typeof node.$ref === 'string';
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/** Declared types, accepting both the 3.0 string and the 3.1 list forms. */
export function schemaTypes(schema: OpenAPIV3.SchemaObject): string[] {
  const declared: unknown = schema.type;
  if (typeof declared === 'string') {
    return [declared];
  }
  if (Array.isArray(declared)) {
    return declared.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

function refName(ref: string): string {
  return ref.slice(ref.lastIndexOf('/') + 1);
}

function isHidden(node: SchemaNode, mode: SchemaMode): boolean {
  if (isReference(node)) {
    return false;
  }
  return mode === 'write' ? node.readOnly === true : node.writeOnly === true;
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}

function scalarTags(schema: OpenAPIV3.SchemaObject): string[] {
  const tags: string[] = [];
  if (schema.nullable) {
    tags.push('nullable:true');
  }
  if (schema.format) {
    tags.push(`format:${schema.format}`);
  }
  if (schema.enum && schema.enum.length > 0) {
    tags.push(`enum:${schema.enum.map((item) => String(item)).join(',')}`);
  }
  if (schema.minimum !== undefined) {
    tags.push(`min:${schema.minimum}`);
  }
  if (schema.maximum !== undefined) {
    tags.push(`max:${schema.maximum}`);
  }
  if (schema.minLength !== undefined) {
    tags.push(`minLen:${schema.minLength}`);
  }
  if (schema.maxLength !== undefined) {
    tags.push(`maxLen:${schema.maxLength}`);
  }
  if (schema.pattern) {
    tags.push(`pattern:${schema.pattern}`);
  }
  if (schema.default !== undefined) {
    tags.push(`default:${JSON.stringify(schema.default)}`);
  }
  return tags;
}

export function isScalarSchema(schema: SchemaNode): boolean {
  if (isReference(schema)) {
    return false;
  }
  const types = schemaTypes(schema);
  return (
    !schema.properties &&
    !schema.oneOf &&
    !schema.anyOf &&
    !schema.allOf &&
    !types.includes('object') &&
    !types.includes('array')
  );
}

/**
 * Renders a schema in a compact, human-readable outline. Required properties
 * carry a `*`, scalars read as `(type tag:value) description`.
 */
export function renderSchema(
  schema: SchemaNode,
  indent: string,
  mode: SchemaMode,
  depth = 0,
): string {
  if (isReference(schema)) {
    return `<${refName(schema.$ref)}>`;
  }
  if (depth > MAX_DEPTH) {
    return '<...>';
  }

  const inner = `${indent}  `;

  for (const [kind, variants] of [
    ['oneOf', schema.oneOf],
    ['anyOf', schema.anyOf],
    ['allOf', schema.allOf],
  ] as const) {
    if (variants && variants.length > 0) {
      const lines = variants.map(
        (variant) => `${inner}${renderSchema(variant, inner, mode, depth + 1)}`,
      );
      return `${kind}{\n${lines.join('\n')}\n${indent}}`;
    }
  }

  const types = schemaTypes(schema);

  if (types.includes('array')) {
    const items = 'items' in schema ? schema.items : undefined;
    if (!items) {
      return '(array)';
    }
    return `[\n${inner}${renderSchema(items, inner, mode, depth + 1)}\n${indent}]`;
  }

  const additional =
    typeof schema.additionalProperties === 'object'
      ? schema.additionalProperties
      : undefined;

  if (types.includes('object') || schema.properties || additional) {
    if (!schema.properties && !additional) {
      return '(object)';
    }

    const required = new Set(schema.required ?? []);
    const lines = ['{'];
    for (const name of Object.keys(schema.properties ?? {}).sort()) {
      const property = schema.properties?.[name];
      if (!property || isHidden(property, mode)) {
        continue;
      }
      const marker = required.has(name) ? '*' : '';
      lines.push(
        `${inner}${name}${marker}: ${renderSchema(property, inner, mode, depth + 1)}`,
      );
    }
    if (additional) {
      lines.push(
        `${inner}<any>: ${renderSchema(additional, inner, mode, depth + 1)}`,
      );
    }
    lines.push(`${indent}}`);
    return lines.join('\n');
  }

  const head = `(${[types[0] ?? 'any', ...scalarTags(schema)].join(' ')})`;
  return schema.description ? `${head} ${firstLine(schema.description)}` : head;
}

function exampleForString(schema: OpenAPIV3.SchemaObject): string {
  switch (schema.format) {
    case 'date-time':
      return '2024-01-01T00:00:00Z';
    case 'date':
      return '2024-01-01';
    case 'email':
      return 'user@example.com';
    case 'uri':
    case 'url':
      return 'https://example.com/';
    case 'uuid':
      return '00000000-0000-0000-0000-000000000000';
    default:
      return 'string';
  }
}

/**
 * Builds an example value from a schema, preferring declared examples,
 * defaults and the first enum value. Returns undefined when nothing useful
 * can be generated.
 */
export function exampleFromSchema(
  schema: SchemaNode,
  mode: SchemaMode,
  depth = 0,
): unknown {
  if (isReference(schema) || depth > MAX_DEPTH) {
    return undefined;
  }

  if (schema.example !== undefined) {
    return schema.example;
  }
  if (schema.default !== undefined) {
    return schema.default;
  }
  if (schema.enum && schema.enum.length > 0) {
    return schema.enum[0];
  }

  const variant = schema.oneOf?.[0] ?? schema.anyOf?.[0];
  if (variant) {
    return exampleFromSchema(variant, mode, depth + 1);
  }

  if (schema.allOf) {
    const merged: Record<string, unknown> = {};
    for (const part of schema.allOf) {
      const value = exampleFromSchema(part, mode, depth + 1);
      if (isPlainObject(value)) {
        Object.assign(merged, value);
      }
    }
    return merged;
  }

  const types = schemaTypes(schema);

  if (types.includes('object') || schema.properties) {
    const result: Record<string, unknown> = {};
    for (const [name, property] of Object.entries(schema.properties ?? {})) {
      if (isHidden(property, mode)) {
        continue;
      }
      const value = exampleFromSchema(property, mode, depth + 1);
      if (value !== undefined) {
        result[name] = value;
      }
    }
    return result;
  }

  if (types.includes('array')) {
    const items = 'items' in schema ? schema.items : undefined;
    if (!items) {
      return [];
    }
    const item = exampleFromSchema(items, mode, depth + 1);
    return item === undefined ? [] : [item];
  }

  switch (types[0]) {
    case 'string':
      return exampleForString(schema);
    case 'integer':
    case 'number':
      return 1;
    case 'boolean':
      return true;
    case 'null':
      return null;
    default:
      return undefined;
  }
}
