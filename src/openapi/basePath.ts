import type { OpenAPIV3 } from 'openapi-types';
import { ApiWalkError } from '../errors.js';

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

/** Expands server variables; enumerated variables fan out into every value. */
export function expandServerUrl(server: OpenAPIV3.ServerObject): string[] {
  let candidates = [server.url];

  for (const [name, variable] of Object.entries(server.variables ?? {})) {
    const placeholder = `{${name}}`;
    const values =
      variable.enum && variable.enum.length > 0
        ? variable.enum.map(String)
        : [String(variable.default)];

    const next: string[] = [];
    for (const value of values) {
      for (const candidate of candidates) {
        next.push(candidate.replaceAll(placeholder, value));
      }
    }
    candidates = next;
  }

  return candidates;
}

/**
 * Returns the path prefix that operation paths are appended to.
 *
 * A relative server URL is used as-is. Otherwise the first expanded server URL
 * on the same scheme and host as `entryPoint` provides the path; when none
 * matches, the entry point's own path is used.
 */
export function resolveBasePath(
  entryPoint: URL,
  servers: OpenAPIV3.ServerObject[] | undefined,
): string {
  const origin = `${entryPoint.protocol}//${entryPoint.host}`;

  for (const server of servers ?? []) {
    if (server.url.startsWith('/')) {
      return server.url;
    }

    for (const candidate of expandServerUrl(server)) {
      if (!candidate.startsWith(origin)) {
        continue;
      }

      let parsed: URL;
      try {
        parsed = new URL(candidate);
      } catch {
        throw new ApiWalkError(
          'SPEC_ERROR',
          `Invalid server URL in API description: ${candidate}`,
          { server: server.url },
        );
      }
      return trimTrailingSlash(parsed.pathname);
    }
  }

  return trimTrailingSlash(entryPoint.pathname);
}
