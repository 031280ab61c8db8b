import { field, keyName, stringValue, type Body } from '../body.js';
import { defineStrategy, linkError, type LinkEntry } from '../strategy.js';

const NAME = 'hal';

function hrefOf(rel: string, target: Body): string {
  const href = stringValue(field(target, 'href'));
  if (href === undefined) {
    throw linkError(NAME, `Link '${rel}' has no string href`, { rel });
  }
  return href;
}

function collect(body: Body, links: LinkEntry[]): void {
  if (body.kind === 'sequence') {
    for (const item of body.items) {
      collect(item, links);
    }
    return;
  }

  const halLinks = field(body, '_links');
  if (halLinks === undefined) {
    return;
  }
  if (halLinks.kind !== 'mapping') {
    throw linkError(NAME, '_links must be an object', { kind: halLinks.kind });
  }

  for (const [key, target] of halLinks.entries) {
    const rel = keyName(key);
    if (rel === 'curies' || target.kind === 'null') {
      continue;
    }
    const targets = target.kind === 'sequence' ? target.items : [target];
    for (const item of targets) {
      links.push({ rel, uri: hrefOf(rel, item) });
    }
  }
}

/** HAL `_links`; a list body is processed element by element. */
export const halStrategy = defineStrategy(NAME, (body) => {
  const links: LinkEntry[] = [];
  collect(body, links);
  return links;
});
