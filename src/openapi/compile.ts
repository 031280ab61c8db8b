import type { OpenAPIV3 } from 'openapi-types';
import { ApiWalkError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { CompiledApi, HttpMethod, Operation } from '../types.js';
import { resolveBasePath } from './basePath.js';
import {
  EXT_DESCRIPTION,
  EXT_IGNORE,
  EXT_NAME,
  extFlag,
  extString,
} from './extensions.js';
import { documentVersion, isOpenApi3Document } from './loadSpec.js';
import { compileOperation } from './operation.js';
import { loadAutoConfig, mapSecuritySchemes } from './security.js';

const log = createLogger('openapi');

const HTTP_METHODS: ReadonlySet<string> = new Set<HttpMethod>([
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
]);

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.has(value);
}

export interface CompileOptions {
  apiName: string;
  base: string;
  operationBase?: string;
}

function entryPointFor({ apiName, base, operationBase }: CompileOptions): URL {
  try {
    const baseUrl = new URL(base);
    return operationBase ? new URL(operationBase, baseUrl) : baseUrl;
  } catch {
    throw new ApiWalkError(
      'CONFIG_ERROR',
      `Invalid base URL for API '${apiName}': ${base}`,
      { apiName, base, operationBase },
    );
  }
}

// Keeps `{param}` readable; malformed escapes such as a bare `%` stay encoded.
function unescapeTemplate(uri: string): string {
  try {
    return decodeURI(uri);
  } catch {
    return uri;
  }
}

function operationsOf(
  pathItem: OpenAPIV3.PathItemObject,
): Array<[HttpMethod, OpenAPIV3.OperationObject]> {
  const result: Array<[HttpMethod, OpenAPIV3.OperationObject]> = [];
  for (const key of Object.keys(pathItem)) {
    if (!isHttpMethod(key)) {
      continue;
    }
    const operation = pathItem[key];
    if (operation) {
      result.push([key, operation]);
    }
  }
  return result;
}

/**
 * Compiles a dereferenced OpenAPI 3 document into the API model used by the
 * command layer. Reference problems found along the way are collected and
 * reported together.
 */
export function compileApi(
  document: unknown,
  options: CompileOptions,
): CompiledApi {
  const { apiName } = options;

  if (!isOpenApi3Document(document)) {
    throw new ApiWalkError(
      'SPEC_ERROR',
      `Unsupported API description for '${apiName}': expected an OpenAPI 3.x document`,
      { apiName, version: documentVersion(document) },
    );
  }

  const entryPoint = entryPointFor(options);
  const basePath = resolveBasePath(entryPoint, document.servers).replace(/\/+$/, '');

  const errors: string[] = [];
  const operations: Operation[] = [];

  for (const [path, pathItem] of Object.entries(document.paths ?? {})) {
    if (!pathItem || extFlag(pathItem, EXT_IGNORE)) {
      continue;
    }

    const uriTemplate = unescapeTemplate(new URL(basePath + path, entryPoint).toString());

    for (const [method, operation] of operationsOf(pathItem)) {
      if (extFlag(operation, EXT_IGNORE)) {
        continue;
      }
      operations.push(
        compileOperation({ method, path, uriTemplate, pathItem, operation }, errors),
      );
    }
  }

  if (errors.length > 0) {
    throw new ApiWalkError(
      'SPEC_ERROR',
      `Failed to compile API description for '${apiName}'`,
      { apiName, errors },
    );
  }

  const info = document.info;
  const api: CompiledApi = {
    short: extString(info, EXT_NAME) ?? info.title,
    long: extString(info, EXT_DESCRIPTION) ?? info.description,
    operations,
    auth: mapSecuritySchemes(document.components?.securitySchemes),
  };

  const autoConfig = loadAutoConfig(document);
  if (autoConfig) {
    api.autoConfig = autoConfig;
  }

  log.debug({ apiName, operations: operations.length }, 'Compiled API description');
  return api;
}
