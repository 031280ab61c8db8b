import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ApiWalkError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ApiConfig, ApiProfile } from '../types.js';
import { DEFAULT_PROFILE } from '../types.js';
import {
  type ConfigDocument,
  GLOBAL_CONFIG_NAME,
  fileExists,
  findLocalConfigs,
  readConfigDocument,
  writeConfigDocument,
} from './configFiles.js';
import { mergeApiConfig } from './merge.js';
import {
  SCHEMA_KEY,
  apiEntrySchema,
  configToEntry,
  entryToConfig,
} from './schema.js';

const log = createLogger('config');

export const GLOBAL_TARGET_LABEL = 'Global config';

export interface ConfigStoreOptions {
  /** Directory holding the global `apis.json` registry. */
  configDir: string;
  cwd?: string;
  /** Explicit local config file; replaces the directory walk when it exists. */
  overridePath?: string;
}

export interface FindApiOptions {
  apiName?: string;
  profile?: string;
}

/** Picks one of the offered save targets, e.g. by prompting the user. */
export type SaveTargetChooser = (options: string[]) => Promise<string>;

export interface SaveOptions {
  chooseTarget?: SaveTargetChooser;
}

function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

function parseEntries(
  document: ConfigDocument,
  filePath: string,
): ApiConfig[] {
  const configs: ApiConfig[] = [];

  for (const [name, value] of Object.entries(document)) {
    if (name === SCHEMA_KEY) {
      continue;
    }

    const parsed = apiEntrySchema.safeParse(value ?? {});
    if (!parsed.success) {
      throw new ApiWalkError(
        'CONFIG_ERROR',
        `Invalid configuration for API '${name}' in ${filePath}`,
        { apiName: name, path: filePath, issues: parsed.error.issues },
      );
    }
    configs.push(entryToConfig(name, parsed.data));
  }

  return configs;
}

/** Own profiles only; inherited object keys such as `constructor` never match. */
function declaredProfile(api: ApiConfig, profile: string): ApiProfile | undefined {
  const profiles = api.profiles ?? {};
  return Object.hasOwn(profiles, profile) ? profiles[profile] : undefined;
}

export class ConfigStore {
  private constructor(
    readonly globalPath: string,
    readonly cwd: string,
    private readonly apis: Map<string, ApiConfig>,
    private readonly localSources: Map<string, string[]>,
  ) {}

  static async load(options: ConfigStoreOptions): Promise<ConfigStore> {
    const cwd = path.resolve(options.cwd ?? process.cwd());
    const globalPath = path.join(options.configDir, GLOBAL_CONFIG_NAME);

    if (!(await fileExists(globalPath))) {
      try {
        await mkdir(options.configDir, { recursive: true });
        await writeFile(globalPath, '{}', { mode: 0o600 });
      } catch (error) {
        throw new ApiWalkError(
          'CONFIG_ERROR',
          `Cannot create config file: ${globalPath}`,
          { path: globalPath, cause: errorMessage(error) },
        );
      }
    }

    const apis = new Map<string, ApiConfig>();
    const localSources = new Map<string, string[]>();

    for (const config of parseEntries(
      await readConfigDocument(globalPath),
      globalPath,
    )) {
      apis.set(config.name, config);
    }

    const localPaths = await findLocalConfigs(cwd, options.overridePath);
    log.debug({ count: localPaths.length }, 'found local configs');

    for (const localPath of localPaths) {
      log.debug({ path: localPath }, 'loading local config');
      const configDir = path.dirname(localPath);

      for (const config of parseEntries(
        await readConfigDocument(localPath),
        localPath,
      )) {
        config.specFiles = config.specFiles?.map((specFile) =>
          isUrl(specFile) || path.isAbsolute(specFile)
            ? specFile
            : path.join(configDir, specFile),
        );

        const existing = apis.get(config.name);
        if (existing) {
          mergeApiConfig(existing, config);
        } else {
          apis.set(config.name, config);
        }

        const sources = localSources.get(config.name) ?? [];
        sources.push(localPath);
        localSources.set(config.name, sources);
      }
    }

    const store = new ConfigStore(globalPath, cwd, apis, localSources);
    store.assertValid();
    return store;
  }

  private assertValid(): void {
    const seen = new Map<string, string>();
    for (const api of this.apis.values()) {
      if (!api.base) {
        throw new ApiWalkError(
          'CONFIG_ERROR',
          `API '${api.name}' has no base URL configured`,
          { apiName: api.name, sources: this.sources(api.name) },
        );
      }

      const other = seen.get(api.base);
      if (other !== undefined) {
        throw new ApiWalkError(
          'CONFIG_ERROR',
          `Multiple APIs configured with the same base URL: ${api.base}`,
          { base: api.base, apiNames: [other, api.name] },
        );
      }
      seen.set(api.base, api.name);
    }
  }

  /** API names in registration order. */
  names(): string[] {
    return [...this.apis.keys()];
  }

  list(): ApiConfig[] {
    return [...this.apis.values()];
  }

  get(name: string): ApiConfig | undefined {
    return this.apis.get(name);
  }

  require(name: string): ApiConfig {
    const api = this.apis.get(name);
    if (!api) {
      const available = this.names().sort();
      throw new ApiWalkError(
        'API_NOT_FOUND',
        available.length > 0
          ? `Unknown API '${name}'. Available APIs: ${available.join(', ')}`
          : `Unknown API '${name}' (no APIs configured)`,
        { apiName: name, available },
      );
    }
    return api;
  }

  /** Local files that contributed to an API, root first. */
  sources(name: string): string[] {
    return [...(this.localSources.get(name) ?? [])];
  }

  /**
   * Returns the first API, in registration order, whose effective base is a
   * prefix of `uri`. Overlapping bases are not disambiguated by length.
   */
  findApi(uri: string, options: FindApiOptions = {}): ApiConfig | undefined {
    const profile = options.profile ?? DEFAULT_PROFILE;

    for (const api of this.apis.values()) {
      if (options.apiName && api.name !== options.apiName) {
        continue;
      }

      if (profile !== DEFAULT_PROFILE && !declaredProfile(api, profile)) {
        continue;
      }

      if (uri.startsWith(this.effectiveBase(api, profile))) {
        return api;
      }
    }

    return undefined;
  }

  effectiveBase(api: ApiConfig, profile: string = DEFAULT_PROFILE): string {
    return declaredProfile(api, profile)?.base || api.base;
  }

  validateProfile(api: ApiConfig, profile: string): void {
    if (declaredProfile(api, profile)) {
      return;
    }

    if (profile === DEFAULT_PROFILE) {
      return;
    }

    const available = Object.keys(api.profiles ?? {}).sort();
    if (available.length === 0) {
      throw new ApiWalkError(
        'PROFILE_NOT_FOUND',
        `Profile '${profile}' not found for API '${api.name}' (no profiles defined)`,
        { apiName: api.name, profile, available },
      );
    }

    throw new ApiWalkError(
      'PROFILE_NOT_FOUND',
      `Profile '${profile}' not found for API '${api.name}'. Available profiles: ${available.join(', ')}`,
      { apiName: api.name, profile, available },
    );
  }

  /** Validated profile settings; an undeclared default profile is empty. */
  profile(api: ApiConfig, profile: string = DEFAULT_PROFILE): ApiProfile {
    this.validateProfile(api, profile);
    return declaredProfile(api, profile) ?? {};
  }

  /** Inserts or replaces an API in memory. Call `save` to persist it. */
  set(config: ApiConfig): void {
    for (const api of this.apis.values()) {
      if (api.name !== config.name && api.base === config.base) {
        throw new ApiWalkError(
          'CONFIG_ERROR',
          `Multiple APIs configured with the same base URL: ${config.base}`,
          { base: config.base, apiNames: [api.name, config.name] },
        );
      }
    }
    this.apis.set(config.name, config);
  }

  /**
   * Writes one API's configuration back to disk and returns the file used.
   *
   * APIs from local files go to the closest file unless a chooser is given
   * and several files contributed; other APIs go to the global registry.
   */
  async save(name: string, options: SaveOptions = {}): Promise<string> {
    const config = this.require(name);
    const target = await this.chooseSaveTarget(name, options.chooseTarget);

    const document = (await fileExists(target))
      ? await readConfigDocument(target)
      : {};
    document[name] = configToEntry(config);
    await writeConfigDocument(target, document);

    log.debug({ apiName: name, path: target }, 'saved api config');
    return target;
  }

  private async chooseSaveTarget(
    name: string,
    chooseTarget: SaveTargetChooser | undefined,
  ): Promise<string> {
    const sources = this.localSources.get(name) ?? [];
    if (sources.length === 0) {
      return this.globalPath;
    }

    const closest = sources[sources.length - 1];
    if (sources.length === 1 || !chooseTarget) {
      return closest;
    }

    const labels = sources.map(
      (source) => path.relative(this.cwd, source) || source,
    );
    const choice = await chooseTarget([...labels, GLOBAL_TARGET_LABEL]);
    if (choice === GLOBAL_TARGET_LABEL) {
      return this.globalPath;
    }

    const index = labels.indexOf(choice);
    return index >= 0 ? sources[index] : closest;
  }
}
