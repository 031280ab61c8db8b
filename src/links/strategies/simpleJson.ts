import { keyName, type Body } from '../body.js';
import { defineStrategy, type LinkEntry } from '../strategy.js';

function walk(rel: string, body: Body, links: LinkEntry[]): void {
  if (body.kind === 'sequence') {
    for (const item of body.items) {
      walk(`${rel}-item`, item, links);
    }
    return;
  }
  if (body.kind !== 'mapping') {
    return;
  }
  for (const [key, value] of body.entries) {
    const name = keyName(key);
    if (name === 'self' && value.kind === 'string') {
      links.push({ rel, uri: value.value });
    } else {
      walk(name, value, links);
    }
  }
}

/**
 * Heuristic for plain JSON: any `self` string is a link for the key that
 * holds it, and list items take the relation `<key>-item`.
 */
export const simpleJsonStrategy = defineStrategy('simple-json', (body) => {
  const links: LinkEntry[] = [];
  walk('self', body, links);
  return links;
});
