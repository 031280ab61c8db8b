import type { OpenAPIV3 } from 'openapi-types';
import { EXT_ALIASES, EXT_NAME, extString, extStringList } from './extensions.js';

/**
 * Dash-cases an identifier: `getWidget` becomes `get-widget` and
 * `get-/widgets/{id}` becomes `get-widgets-id`.
 */
export function kebabCase(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1-$2')
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean)
    .map((part) => part.toLowerCase())
    .join('-');
}

/** Older naming scheme, kept as an alias: `getWidget` becomes `getwidget`. */
export function legacySlug(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '');
}

export function operationName(
  method: string,
  path: string,
  operation: OpenAPIV3.OperationObject,
): { name: string; aliases: string[] } {
  const aliases = extStringList(operation, EXT_ALIASES);
  const operationId = operation.operationId ?? '';

  const override = extString(operation, EXT_NAME);
  if (override) {
    return { name: override, aliases };
  }

  const name =
    kebabCase(operationId) ||
    kebabCase(`${method}-${path.replace(/^\/+|\/+$/g, '')}`);

  const legacy = legacySlug(operationId);
  if (legacy && legacy !== name && !aliases.includes(legacy)) {
    aliases.push(legacy);
  }

  return { name, aliases };
}
