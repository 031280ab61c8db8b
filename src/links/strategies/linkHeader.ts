import { defineStrategy, linkError, type LinkEntry, type ResponseHeaders } from '../strategy.js';

const NAME = 'link-header';

function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== name || value === undefined) {
      continue;
    }
    return Array.isArray(value) ? value.join(', ') : value;
  }
  return undefined;
}

/** Splits on commas that are outside `<...>` and quoted strings. */
function splitEntries(value: string): string[] {
  const entries: string[] = [];
  let current = '';
  let inUri = false;
  let inQuotes = false;

  for (const char of value) {
    if (char === '<' && !inQuotes) {
      inUri = true;
    } else if (char === '>' && !inQuotes) {
      inUri = false;
    } else if (char === '"' && !inUri) {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inUri && !inQuotes) {
      entries.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  entries.push(current);

  return entries.map((entry) => entry.trim()).filter(Boolean);
}

function relOf(params: string[]): string[] {
  for (const param of params) {
    const match = /^rel\s*=\s*(?:"([^"]*)"|([^\s;]+))$/i.exec(param.trim());
    if (match) {
      return (match[1] ?? match[2] ?? '').split(/\s+/).filter(Boolean);
    }
  }
  return [];
}

/** RFC 8288 `Link` header: `<uri>; rel="name", ...`. */
export const linkHeaderStrategy = defineStrategy(NAME, (_body, headers) => {
  const value = headerValue(headers, 'link');
  if (value === undefined) {
    return [];
  }

  const links: LinkEntry[] = [];
  for (const entry of splitEntries(value)) {
    const match = /^<([^>]*)>(.*)$/s.exec(entry);
    if (!match) {
      throw linkError(NAME, `Malformed Link header entry: ${entry}`, { entry });
    }
    const [, uri = '', rest = ''] = match;
    for (const rel of relOf(rest.split(';'))) {
      links.push({ rel, uri: uri.trim() });
    }
  }
  return links;
});
