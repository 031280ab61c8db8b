import SwaggerParser from '@apidevtools/swagger-parser';
import type { OpenAPI, OpenAPIV3 } from 'openapi-types';
import { ApiWalkError, errorMessage } from '../errors.js';

function collectCauses(error: unknown): string[] {
  // Reference resolution may report a group of errors at once.
  if (
    error instanceof Error &&
    'errors' in error &&
    Array.isArray(error.errors) &&
    error.errors.length > 0
  ) {
    return error.errors.map((item: unknown) => errorMessage(item));
  }
  return [errorMessage(error)];
}

/**
 * Reads an API description from a local path or URL and resolves its
 * references. Circular references are left in place as `$ref` objects.
 */
export async function loadApiDocument(
  source: string,
  apiName: string,
): Promise<unknown> {
  let parsed: OpenAPI.Document;
  try {
    parsed = await SwaggerParser.parse(source);
  } catch (error) {
    throw new ApiWalkError(
      'SPEC_ERROR',
      `Failed to parse API description for '${apiName}'`,
      { apiName, source, cause: errorMessage(error) },
    );
  }

  try {
    return await SwaggerParser.dereference(source, parsed, {
      dereference: { circular: 'ignore' },
    });
  } catch (error) {
    throw new ApiWalkError(
      'SPEC_ERROR',
      `Failed to resolve references in API description for '${apiName}'`,
      { apiName, source, errors: collectCauses(error) },
    );
  }
}

export function isOpenApi3Document(
  document: unknown,
): document is OpenAPIV3.Document {
  if (!document || typeof document !== 'object') {
    return false;
  }
  const version: unknown = Reflect.get(document, 'openapi');
  return typeof version === 'string' && /^3\.\d+/.test(version);
}

export function documentVersion(document: unknown): string | undefined {
  if (!document || typeof document !== 'object') {
    return undefined;
  }
  const openapi: unknown = Reflect.get(document, 'openapi');
  const swagger: unknown = Reflect.get(document, 'swagger');
  if (typeof openapi === 'string') {
    return `openapi ${openapi}`;
  }
  return typeof swagger === 'string' ? `swagger ${swagger}` : undefined;
}
