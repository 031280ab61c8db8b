import type { OpenAPIV3 } from 'openapi-types';
import type { Param } from '../types.js';
import {
  EXT_DESCRIPTION,
  EXT_IGNORE,
  EXT_NAME,
  extFlag,
  extString,
} from './extensions.js';
import { kebabCase } from './naming.js';
import {
  isReference,
  isScalarSchema,
  renderSchema,
  schemaTypes,
  type SchemaNode,
} from './schema.js';

export type ParamLocation = 'path' | 'query' | 'header';

export interface CompiledParam {
  location: ParamLocation;
  param: Param;
  schema?: SchemaNode;
}

type ParameterList = Array<OpenAPIV3.ReferenceObject | OpenAPIV3.ParameterObject>;

/**
 * Operation parameters first, then path-item parameters whose names are not
 * already taken. References that survived dereferencing are reported in
 * `errors` and dropped.
 */
export function mergeParameters(
  operationParams: ParameterList | undefined,
  pathParams: ParameterList | undefined,
  errors: string[],
): OpenAPIV3.ParameterObject[] {
  const merged: OpenAPIV3.ParameterObject[] = [];
  const seen = new Set<string>();

  for (const [index, list] of [operationParams ?? [], pathParams ?? []].entries()) {
    for (const parameter of list) {
      if (isReference(parameter)) {
        errors.push(`Unresolved parameter reference: ${parameter.$ref}`);
        continue;
      }
      if (index === 1 && seen.has(parameter.name)) {
        continue;
      }
      seen.add(parameter.name);
      merged.push(parameter);
    }
  }

  return merged;
}

function paramType(schema: SchemaNode | undefined): string {
  if (!schema || isReference(schema)) {
    return 'string';
  }
  const type = schemaTypes(schema)[0] ?? 'string';
  if (type !== 'array' || !('items' in schema) || isReference(schema.items)) {
    return type;
  }
  const itemType = schemaTypes(schema.items)[0];
  return itemType ? `array[${itemType}]` : type;
}

function isParamLocation(value: string): value is ParamLocation {
  return value === 'path' || value === 'query' || value === 'header';
}

export function compileParam(
  parameter: OpenAPIV3.ParameterObject,
): CompiledParam | undefined {
  if (extFlag(parameter, EXT_IGNORE) || !isParamLocation(parameter.in)) {
    return undefined;
  }

  const schema = parameter.schema;
  const resolved = schema && !isReference(schema) ? schema : undefined;

  let example: unknown = resolved?.example;
  if (parameter.example !== undefined) {
    example = parameter.example;
  }

  const param: Param = {
    name: parameter.name,
    displayName: extString(parameter, EXT_NAME),
    description: extString(parameter, EXT_DESCRIPTION) ?? parameter.description,
    type: paramType(schema),
    style: parameter.style === 'form' ? 'form' : 'simple',
    explode: parameter.explode ?? false,
    default: resolved?.default,
    example,
  };

  return { location: parameter.in, param, schema };
}

export function optionName(param: Param): string {
  return param.displayName ?? kebabCase(param.name);
}

/** One documentation line body for a parameter. */
export function paramSchemaLine({ param, schema }: CompiledParam): string {
  if (!schema) {
    return `(${param.type}): ${param.description ?? ''}`;
  }
  const rendered = renderSchema(schema, '  ', 'write');
  if (
    isScalarSchema(schema) &&
    !isReference(schema) &&
    !schema.description &&
    param.description
  ) {
    return `${rendered} ${param.description.trim().split('\n')[0]}`;
  }
  return rendered;
}
