import { createHash } from 'node:crypto';
import type { OpenAPIV3 } from 'openapi-types';
import { EXT_DESCRIPTION, extString } from './extensions.js';
import { isPlainObject, isReference, renderSchema, type SchemaNode } from './schema.js';

interface ResponseEntry {
  code: string;
  contentType?: string;
  schema?: SchemaNode;
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, current: unknown) => {
    if (!isPlainObject(current)) {
      return current;
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(current).sort()) {
      sorted[key] = current[key];
    }
    return sorted;
  });
}

export function schemaHash(schema: SchemaNode): string {
  return createHash('sha256').update(canonicalJson(schema)).digest('hex');
}

function groupResponses(
  codes: string[],
  responses: Map<string, OpenAPIV3.ResponseObject>,
): Map<string, ResponseEntry[]> {
  // The empty key collects responses without a body schema.
  const groups = new Map<string, ResponseEntry[]>();
  const add = (key: string, entry: ResponseEntry) => {
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  };

  for (const code of codes) {
    const content = responses.get(code)?.content ?? {};
    const contentTypes = Object.keys(content);
    if (contentTypes.length === 0) {
      add('', { code });
      continue;
    }
    for (const contentType of contentTypes) {
      const schema = content[contentType]?.schema;
      add(schema ? schemaHash(schema) : '', { code, contentType, schema });
    }
  }

  return groups;
}

/**
 * Renders the response sections of an operation's documentation. Status
 * codes whose schemas are identical share one section.
 */
export function renderResponses(
  responses: OpenAPIV3.ResponsesObject | undefined,
  errors: string[],
): string {
  const resolved = new Map<string, OpenAPIV3.ResponseObject>();
  for (const [code, response] of Object.entries(responses ?? {})) {
    if (isReference(response)) {
      errors.push(`Unresolved response reference: ${response.$ref}`);
      continue;
    }
    resolved.set(code, response);
  }

  const codes = [...resolved.keys()].sort();
  let text = '';

  for (const [key, entries] of groupResponses(codes, resolved)) {
    const [first] = entries;
    if (!first) {
      continue;
    }
    const hasSchema = key !== '';
    const contentType = hasSchema ? ` (${first.contentType ?? ''})` : '';
    const representative = resolved.get(first.code);
    const groupCodes = [...new Set(entries.map((entry) => entry.code))];

    if (groupCodes.length === 1) {
      text += `\n## Response ${first.code}${contentType}\n`;
      const description = representative
        ? extString(representative, EXT_DESCRIPTION) ?? representative.description
        : '';
      if (description) {
        text += `\n${description}\n`;
      } else if (!hasSchema) {
        text += '\nResponse has no body\n';
      }
    } else {
      text += `\n## Responses ${groupCodes.join('/')}${contentType}\n`;
      if (!hasSchema) {
        text += '\nResponse has no body\n';
      }
    }

    const headers = Object.keys(representative?.headers ?? {}).sort();
    if (headers.length > 0) {
      text += `\nHeaders: ${headers.join(', ')}\n`;
    }

    if (hasSchema && first.schema) {
      text += `\n\`\`\`schema\n${renderSchema(first.schema, '', 'read')}\n\`\`\`\n`;
    }
  }

  return text;
}
