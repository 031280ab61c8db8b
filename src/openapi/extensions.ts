/** Vendor extensions understood by the compiler. */
export const EXT_NAME = 'x-cli-name';
export const EXT_ALIASES = 'x-cli-aliases';
export const EXT_DESCRIPTION = 'x-cli-description';
export const EXT_IGNORE = 'x-cli-ignore';
export const EXT_HIDDEN = 'x-cli-hidden';
export const EXT_CONFIG = 'x-cli-config';

export function getExtension(node: object | undefined, key: string): unknown {
  if (!node) {
    return undefined;
  }
  const value: unknown = Reflect.get(node, key);
  return value;
}

export function extString(
  node: object | undefined,
  key: string,
): string | undefined {
  const value = getExtension(node, key);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function extFlag(node: object | undefined, key: string): boolean {
  return getExtension(node, key) === true;
}

export function extStringList(node: object | undefined, key: string): string[] {
  const value = getExtension(node, key);
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}
