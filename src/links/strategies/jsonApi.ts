import { field, stringValue, type Body } from '../body.js';
import { defineStrategy, linkError, type LinkEntry } from '../strategy.js';

const NAME = 'jsonapi';

/** `links.self` as a string or `{ href }`; anything else is malformed. */
function selfLink(resource: Body): string | undefined {
  const resourceLinks = field(resource, 'links');
  const self = resourceLinks && field(resourceLinks, 'self');
  if (self === undefined) {
    return undefined;
  }
  const direct = stringValue(self);
  if (direct !== undefined) {
    return direct;
  }
  const href = stringValue(field(self, 'href'));
  if (href === undefined) {
    throw linkError(NAME, 'links.self must be a string or an object with href');
  }
  return href;
}

export const jsonApiStrategy = defineStrategy(NAME, (body) => {
  const links: LinkEntry[] = [];

  const self = selfLink(body);
  if (self !== undefined) {
    links.push({ rel: 'self', uri: self });
  }

  const data = field(body, 'data');
  if (data?.kind === 'sequence') {
    for (const item of data.items) {
      const uri = selfLink(item);
      if (uri !== undefined) {
        links.push({ rel: 'item', uri });
      }
    }
  }

  return links;
});
