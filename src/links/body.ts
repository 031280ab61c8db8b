/** Mapping keys may be non-string scalars when decoded from binary formats. */
export type BodyKey = string | number | boolean;

export type Body =
  | { kind: 'null' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'sequence'; items: Body[] }
  | { kind: 'mapping'; entries: Array<[BodyKey, Body]> };

export type Mapping = Extract<Body, { kind: 'mapping' }>;
export type Sequence = Extract<Body, { kind: 'sequence' }>;

export const NULL_BODY: Body = { kind: 'null' };

function toKey(key: unknown): BodyKey {
  if (typeof key === 'string' || typeof key === 'number' || typeof key === 'boolean') {
    return key;
  }
  return String(key);
}

/**
 * Converts a decoded value into a Body. Plain objects and Maps become
 * mappings in insertion order; values with no counterpart become null.
 */
export function toBody(value: unknown): Body {
  if (value === null || value === undefined) {
    return NULL_BODY;
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'number') {
    return { kind: 'number', value };
  }
  if (typeof value === 'bigint') {
    return { kind: 'number', value: Number(value) };
  }
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value.map((item: unknown) => toBody(item)) };
  }
  if (value instanceof Map) {
    const entries: Array<[BodyKey, Body]> = [];
    for (const [key, item] of value) {
      entries.push([toKey(key), toBody(item)]);
    }
    return { kind: 'mapping', entries };
  }
  if (typeof value === 'object') {
    return {
      kind: 'mapping',
      entries: Object.entries(value).map(
        ([key, item]: [string, unknown]): [BodyKey, Body] => [key, toBody(item)],
      ),
    };
  }
  return NULL_BODY;
}

export function keyName(key: BodyKey): string {
  return String(key);
}

/** First entry whose key, as a string, equals `name`. */
export function field(body: Body, name: string): Body | undefined {
  if (body.kind !== 'mapping') {
    return undefined;
  }
  return body.entries.find(([key]) => keyName(key) === name)?.[1];
}

export function stringValue(body: Body | undefined): string | undefined {
  return body?.kind === 'string' ? body.value : undefined;
}
