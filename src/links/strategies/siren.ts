import { field, stringValue } from '../body.js';
import { defineStrategy, linkError, type LinkEntry } from '../strategy.js';

const NAME = 'siren';

export const sirenStrategy = defineStrategy(NAME, (body) => {
  const sirenLinks = field(body, 'links');
  if (sirenLinks?.kind !== 'sequence') {
    return [];
  }

  const links: LinkEntry[] = [];
  for (const [index, entry] of sirenLinks.items.entries()) {
    if (entry.kind !== 'mapping') {
      throw linkError(NAME, `Link entry ${index} must be an object`, { index });
    }
    const href = stringValue(field(entry, 'href'));
    if (href === undefined) {
      continue;
    }
    const rels = field(entry, 'rel');
    if (rels?.kind !== 'sequence') {
      throw linkError(NAME, `Link entry ${index} must have a rel list`, { index });
    }
    for (const rel of rels.items) {
      const name = stringValue(rel);
      if (name !== undefined) {
        links.push({ rel: name, uri: href });
      }
    }
  }
  return links;
});
