import type { OpenAPIV3 } from 'openapi-types';
import { exampleFromSchema, isReference, type SchemaNode } from './schema.js';

export interface RequestInfo {
  mediaType: string;
  schema?: SchemaNode;
  examples: unknown[];
}

const MEDIA_TYPE_PREFERENCE = ['json', 'yaml'];

function mediaTypeExamples(media: OpenAPIV3.MediaTypeObject): unknown[] {
  const examples: unknown[] = [];
  if (media.example !== undefined) {
    examples.push(media.example);
  }
  for (const key of Object.keys(media.examples ?? {}).sort()) {
    const example = media.examples?.[key];
    if (example && !isReference(example) && example.value !== undefined) {
      examples.push(example.value);
    }
  }
  if (examples.length === 0 && media.schema) {
    const generated = exampleFromSchema(media.schema, 'write');
    if (generated !== undefined) {
      examples.push(generated);
    }
  }
  return examples;
}

/**
 * Picks the request media type (JSON, then YAML, then whatever is declared
 * first) and gathers its schema and example payloads.
 */
export function getRequestInfo(
  body: OpenAPIV3.RequestBodyObject,
): RequestInfo | undefined {
  const mediaTypes = Object.keys(body.content);
  const chosen =
    MEDIA_TYPE_PREFERENCE.map((short) =>
      mediaTypes.find((mediaType) => mediaType.includes(short)),
    ).find((mediaType) => mediaType !== undefined) ?? mediaTypes[0];

  if (chosen === undefined) {
    return undefined;
  }

  const media = body.content[chosen] ?? {};
  return {
    mediaType: chosen,
    schema: media.schema,
    examples: mediaTypeExamples(media),
  };
}
