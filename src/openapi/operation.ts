import type { OpenAPIV3 } from 'openapi-types';
import type { HttpMethod, Operation, Param } from '../types.js';
import { EXT_DESCRIPTION, EXT_HIDDEN, extFlag, extString } from './extensions.js';
import { operationName } from './naming.js';
import {
  compileParam,
  mergeParameters,
  optionName,
  paramSchemaLine,
  type CompiledParam,
} from './params.js';
import { getRequestInfo } from './requestInfo.js';
import { renderResponses } from './responses.js';
import { isPlainObject, isReference, renderSchema } from './schema.js';
import { toShorthand } from './shorthand.js';

/** Examples at least this long are replaced by a file placeholder. */
export const INLINE_EXAMPLE_LIMIT = 150;
export const INPUT_FILE_PLACEHOLDER = '<input.json';

export interface OperationSource {
  method: HttpMethod;
  /** Raw path key from the document. */
  path: string;
  uriTemplate: string;
  pathItem: OpenAPIV3.PathItemObject;
  operation: OpenAPIV3.OperationObject;
}

function trimNewlines(text: string): string {
  return text.replace(/^\n+|\n+$/g, '');
}

function schemaBlock(title: string, lines: string[]): string {
  return `\n## ${title}\n\`\`\`schema\n{\n${lines.join('\n')}\n}\n\`\`\`\n`;
}

function addPlaceholder(examples: string[]): void {
  if (!examples.includes(INPUT_FILE_PLACEHOLDER)) {
    examples.push(INPUT_FILE_PLACEHOLDER);
  }
}

function renderExamples(payloads: unknown[], examples: string[]): string {
  let text = '';

  for (const payload of payloads) {
    let content: string;
    if (typeof payload === 'string') {
      if (payload === INPUT_FILE_PLACEHOLDER) {
        continue;
      }
      if (payload.length >= INLINE_EXAMPLE_LIMIT) {
        addPlaceholder(examples);
        continue;
      }
      content = `\n\`\`\`\n${trimNewlines(payload)}\n\`\`\`\n`;
    } else {
      if (isPlainObject(payload)) {
        const shorthand = toShorthand(payload);
        if (shorthand.length < INLINE_EXAMPLE_LIMIT) {
          examples.push(shorthand);
        } else {
          addPlaceholder(examples);
        }
      }
      content = `\n\`\`\`json\n${JSON.stringify(payload, null, 2)}\n\`\`\`\n`;
    }

    if (text === '') {
      text += '\n## Input Example\n';
    }
    text += content;
  }

  return text;
}

function paramsOf(params: CompiledParam[], location: CompiledParam['location']) {
  return params.filter((item) => item.location === location);
}

/**
 * Compiles one path + method pair into a frozen Operation. Unresolved
 * references are appended to `errors`.
 */
export function compileOperation(
  source: OperationSource,
  errors: string[],
): Operation {
  const { method, path, uriTemplate, pathItem, operation } = source;

  const compiled = mergeParameters(operation.parameters, pathItem.parameters, errors)
    .map((parameter) => compileParam(parameter))
    .filter((item): item is CompiledParam => item !== undefined);

  const pathParams = paramsOf(compiled, 'path');
  const queryParams = paramsOf(compiled, 'query');
  const headerParams = paramsOf(compiled, 'header');

  const { name, aliases } = operationName(method, path, operation);

  let long = extString(operation, EXT_DESCRIPTION) ?? operation.description ?? '';

  if (pathParams.length > 0) {
    long += schemaBlock(
      'Argument Schema:',
      pathParams.map((item) => `  ${optionName(item.param)}: ${paramSchemaLine(item)}`),
    );
  }

  if (queryParams.length > 0 || headerParams.length > 0) {
    long += schemaBlock(
      'Option Schema:',
      [...queryParams, ...headerParams].map(
        (item) => `  --${optionName(item.param)}: ${paramSchemaLine(item)}`,
      ),
    );
  }

  let bodyMediaType: string | undefined;
  const examples: string[] = [];
  const requestBody = operation.requestBody;

  if (requestBody && isReference(requestBody)) {
    errors.push(`Unresolved request body reference: ${requestBody.$ref}`);
  } else if (requestBody) {
    const info = getRequestInfo(requestBody);
    if (info) {
      bodyMediaType = info.mediaType;
      long += renderExamples(info.examples, examples);
      if (info.schema) {
        long += `\n## Request Schema (${info.mediaType})\n\n\`\`\`schema\n${renderSchema(info.schema, '', 'write')}\n\`\`\`\n`;
      }
    }
  }

  long += renderResponses(operation.responses, errors);

  const unwrap = (items: CompiledParam[]): Param[] => items.map((item) => item.param);

  return Object.freeze({
    name,
    group: operation.tags?.[0],
    aliases: Object.freeze(aliases),
    short: operation.summary,
    long: `${trimNewlines(long)}\n`,
    method: method.toUpperCase(),
    uriTemplate,
    pathParams: Object.freeze(unwrap(pathParams)),
    queryParams: Object.freeze(unwrap(queryParams)),
    headerParams: Object.freeze(unwrap(headerParams)),
    bodyMediaType,
    examples: Object.freeze(examples),
    hidden: extFlag(operation, EXT_HIDDEN),
    deprecated: operation.deprecated ? 'do not use' : undefined,
  });
}
