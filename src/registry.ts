import { ConfigStore, type ConfigStoreOptions } from './config/configStore.js';
import { ApiWalkError } from './errors.js';
import { createLogger } from './logger.js';
import { compileApi } from './openapi/compile.js';
import { loadApiDocument } from './openapi/loadSpec.js';
import type { ApiConfig, CompiledApi, Operation } from './types.js';

const log = createLogger('openapi');

/** Reads one API description and resolves its references. */
export type DocumentLoader = (source: string, apiName: string) => Promise<unknown>;

export interface ApiRegistryOptions extends ConfigStoreOptions {
  loadDocument?: DocumentLoader;
}

export interface OperationListOptions {
  includeHidden?: boolean;
}

/**
 * Registry of configured APIs. Each API description is compiled on first use
 * and cached; a failed compile is retried on the next request.
 */
export class ApiRegistry {
  private readonly compiled = new Map<string, Promise<CompiledApi>>();

  constructor(
    readonly config: ConfigStore,
    private readonly loadDocument: DocumentLoader = loadApiDocument,
  ) {}

  static async create(options: ApiRegistryOptions): Promise<ApiRegistry> {
    const { loadDocument, ...storeOptions } = options;
    const config = await ConfigStore.load(storeOptions);
    return new ApiRegistry(config, loadDocument);
  }

  async compile(name: string): Promise<CompiledApi> {
    const api = this.config.require(name);

    const cached = this.compiled.get(name);
    if (cached) {
      return cached;
    }

    const pending = this.compileUncached(api);
    this.compiled.set(name, pending);
    pending.catch(() => {
      this.compiled.delete(name);
    });
    return pending;
  }

  async operations(
    name: string,
    options: OperationListOptions = {},
  ): Promise<Operation[]> {
    const { operations } = await this.compile(name);
    return options.includeHidden
      ? operations
      : operations.filter((operation) => !operation.hidden);
  }

  async findOperation(
    name: string,
    operationName: string,
  ): Promise<Operation | undefined> {
    const { operations } = await this.compile(name);
    return operations.find(
      (operation) =>
        operation.name === operationName ||
        operation.aliases.includes(operationName),
    );
  }

  private async compileUncached(api: ApiConfig): Promise<CompiledApi> {
    const specFiles = api.specFiles ?? [];
    if (specFiles.length === 0) {
      throw new ApiWalkError(
        'SPEC_ERROR',
        `API '${api.name}' has no spec files configured`,
        { apiName: api.name },
      );
    }

    const result: CompiledApi = { operations: [], auth: [] };

    for (const specFile of specFiles) {
      const document = await this.loadDocument(specFile, api.name);
      const compiled = compileApi(document, {
        apiName: api.name,
        base: api.base,
        operationBase: api.operationBase,
      });

      result.short = result.short ?? compiled.short;
      result.long = result.long ?? compiled.long;
      result.autoConfig = result.autoConfig ?? compiled.autoConfig;
      result.operations.push(...compiled.operations);
      result.auth.push(...compiled.auth);
    }

    log.debug(
      { apiName: api.name, specFiles: specFiles.length, operations: result.operations.length },
      'API ready',
    );
    return result;
  }
}
