import { ApiWalkError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Links } from '../types.js';
import { toBody, type Body } from './body.js';
import { DEFAULT_STRATEGIES } from './strategies/index.js';
import type {
  LinkEntry,
  LinkExtraction,
  LinkStrategy,
  ResponseHeaders,
} from './strategy.js';

const log = createLogger('links');

export interface ResolveOptions {
  /** Relative URIs are resolved against this when set. */
  base?: string | URL;
}

export interface ResolvedLinks {
  links: Links;
  errors: ApiWalkError[];
}

function absolute(uri: string, base: URL | undefined): string {
  if (!base) {
    return uri;
  }
  try {
    return new URL(uri, base).toString();
  } catch {
    return uri;
  }
}

export class LinkResolver {
  private readonly strategies: LinkStrategy[] = [];

  constructor(strategies: Iterable<LinkStrategy> = []) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  register(strategy: LinkStrategy): this {
    if (this.strategies.some((existing) => existing.name === strategy.name)) {
      throw new ApiWalkError(
        'LINK_ERROR',
        `Link strategy '${strategy.name}' is already registered`,
        { strategy: strategy.name },
      );
    }
    this.strategies.push(strategy);
    return this;
  }

  names(): string[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  /**
   * Runs every strategy in registration order. A failing strategy contributes
   * no links and its error is returned next to the links of the others.
   */
  resolve(
    headers: ResponseHeaders,
    body: unknown,
    options: ResolveOptions = {},
  ): ResolvedLinks {
    const decoded: Body = toBody(body);
    const base = options.base === undefined ? undefined : new URL(options.base);

    const links: Links = new Map();
    const errors: ApiWalkError[] = [];

    const add = ({ rel, uri }: LinkEntry) => {
      const resolved = absolute(uri, base);
      const existing = links.get(rel);
      if (existing) {
        existing.push(resolved);
      } else {
        links.set(rel, [resolved]);
      }
    };

    for (const strategy of this.strategies) {
      let extraction: LinkExtraction;
      try {
        extraction = strategy.extract(decoded, headers);
      } catch (error) {
        extraction = {
          links: [],
          error: new ApiWalkError('LINK_ERROR', `${strategy.name}: ${errorMessage(error)}`, {
            strategy: strategy.name,
          }),
        };
      }

      if (extraction.error) {
        log.warn(
          { strategy: strategy.name, err: extraction.error },
          'Link strategy failed',
        );
        errors.push(extraction.error);
      }
      extraction.links.forEach(add);
    }

    return { links, errors };
  }
}

export function createDefaultLinkResolver(): LinkResolver {
  return new LinkResolver(DEFAULT_STRATEGIES);
}
