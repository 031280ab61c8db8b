export { runCommand, type CommandContext } from './commands.js';
export {
  ConfigStore,
  GLOBAL_TARGET_LABEL,
  type ConfigStoreOptions,
  type FindApiOptions,
  type SaveOptions,
  type SaveTargetChooser,
} from './config/configStore.js';
export { readRuntimeSettings, type RuntimeSettings } from './config/env.js';
export { mergeApiConfig, mergeProfile } from './config/merge.js';
export { ApiWalkError, asErrorResponse, type ErrorCode } from './errors.js';
export { toBody, type Body, type BodyKey } from './links/body.js';
export {
  LinkResolver,
  createDefaultLinkResolver,
  type ResolveOptions,
  type ResolvedLinks,
} from './links/resolver.js';
export {
  halStrategy,
  jsonApiStrategy,
  linkHeaderStrategy,
  simpleJsonStrategy,
  sirenStrategy,
} from './links/strategies/index.js';
export {
  defineStrategy,
  linkError,
  type LinkEntry,
  type LinkStrategy,
  type ResponseHeaders,
} from './links/strategy.js';
export { compileApi, type CompileOptions } from './openapi/compile.js';
export { loadApiDocument } from './openapi/loadSpec.js';
export { optionName } from './openapi/params.js';
export {
  ApiRegistry,
  type ApiRegistryOptions,
  type DocumentLoader,
} from './registry.js';
export * from './types.js';
