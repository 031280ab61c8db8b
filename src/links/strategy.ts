import { ApiWalkError } from '../errors.js';
import type { Body } from './body.js';

export interface LinkEntry {
  rel: string;
  uri: string;
}

/** Header values keyed by name; names are matched case-insensitively. */
export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface LinkExtraction {
  links: LinkEntry[];
  error?: ApiWalkError;
}

export interface LinkStrategy {
  readonly name: string;
  extract(body: Body, headers: ResponseHeaders): LinkExtraction;
}

export function linkError(
  strategy: string,
  message: string,
  details: Record<string, unknown> = {},
): ApiWalkError {
  return new ApiWalkError('LINK_ERROR', `${strategy}: ${message}`, {
    strategy,
    ...details,
  });
}

/**
 * Wraps a collector into a strategy. A collector reports a malformed shape by
 * throwing a LINK_ERROR; the links gathered so far are then discarded.
 */
export function defineStrategy(
  name: string,
  collect: (body: Body, headers: ResponseHeaders) => LinkEntry[],
): LinkStrategy {
  return {
    name,
    extract(body, headers) {
      try {
        return { links: collect(body, headers) };
      } catch (error) {
        if (error instanceof ApiWalkError && error.code === 'LINK_ERROR') {
          return { links: [], error };
        }
        throw error;
      }
    },
  };
}
