import type { LinkStrategy } from '../strategy.js';
import { halStrategy } from './hal.js';
import { jsonApiStrategy } from './jsonApi.js';
import { linkHeaderStrategy } from './linkHeader.js';
import { simpleJsonStrategy } from './simpleJson.js';
import { sirenStrategy } from './siren.js';

export { halStrategy, jsonApiStrategy, linkHeaderStrategy, simpleJsonStrategy, sirenStrategy };

export const DEFAULT_STRATEGIES: readonly LinkStrategy[] = [
  linkHeaderStrategy,
  halStrategy,
  sirenStrategy,
  jsonApiStrategy,
  simpleJsonStrategy,
];
