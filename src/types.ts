export interface ApiAuth {
  name: string;
  params?: Record<string, string>;
}

export interface Pkcs11Config {
  path?: string;
  label?: string;
}

export interface TlsConfig {
  insecure?: boolean;
  cert?: string;
  key?: string;
  caCert?: string;
  pkcs11?: Pkcs11Config;
}

export interface ApiProfile {
  base?: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  auth?: ApiAuth;
}

export interface ApiConfig {
  name: string;
  base: string;
  operationBase?: string;
  specFiles?: string[];
  profiles?: Record<string, ApiProfile>;
  tls?: TlsConfig;
}

export const DEFAULT_PROFILE = 'default';

export type HttpMethod =
  | 'get'
  | 'put'
  | 'post'
  | 'delete'
  | 'options'
  | 'head'
  | 'patch'
  | 'trace';

export type ParamStyle = 'simple' | 'form';

export interface Param {
  readonly name: string;
  readonly displayName?: string;
  readonly description?: string;
  /** Scalar type name, or `array[item]` for one level of typed arrays. */
  readonly type: string;
  readonly style: ParamStyle;
  readonly explode: boolean;
  readonly default?: unknown;
  readonly example?: unknown;
}

export interface Operation {
  readonly name: string;
  readonly group?: string;
  readonly aliases: readonly string[];
  readonly short?: string;
  readonly long: string;
  /** Upper-cased HTTP method. */
  readonly method: string;
  readonly uriTemplate: string;
  readonly pathParams: readonly Param[];
  readonly queryParams: readonly Param[];
  readonly headerParams: readonly Param[];
  readonly bodyMediaType?: string;
  readonly examples: readonly string[];
  readonly hidden: boolean;
  readonly deprecated?: string;
}

export interface AutoConfigVar {
  description?: string;
  example?: string;
  default?: unknown;
  enum?: unknown[];
  exclude?: boolean;
}

export interface AutoConfig {
  headers?: Record<string, string>;
  prompt?: Record<string, AutoConfigVar>;
  auth: ApiAuth;
}

export interface CompiledApi {
  short?: string;
  long?: string;
  operations: Operation[];
  auth: ApiAuth[];
  autoConfig?: AutoConfig;
}

export type Links = Map<string, string[]>;
