import { readRuntimeSettings } from './config/env.js';
import { ApiWalkError } from './errors.js';
import { createLogger } from './logger.js';
import { ApiRegistry, type DocumentLoader } from './registry.js';

const log = createLogger('cli');

export const USAGE =
  'Usage: apiwalk [--config <file>] [--profile <name>] [--api <name>] <list|show <api>|operations <api>|find <uri>>';

export interface CommandContext {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  write: (text: string) => void;
  loadDocument?: DocumentLoader;
}

interface ParsedArgs {
  config?: string;
  profile?: string;
  api?: string;
  all: boolean;
  positionals: string[];
}

const VALUE_FLAGS = {
  '--config': 'config',
  '--profile': 'profile',
  '--api': 'api',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(value: string): value is ValueFlag {
  return Object.hasOwn(VALUE_FLAGS, value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { all: false, positionals: [] };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '--all') {
      parsed.all = true;
      continue;
    }
    if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (!value) {
        throw new ApiWalkError('CONFIG_ERROR', `Missing value for ${arg}`);
      }
      parsed[VALUE_FLAGS[arg]] = value;
      i += 1;
      continue;
    }
    if (arg.startsWith('--')) {
      throw new ApiWalkError('CONFIG_ERROR', `Unknown option ${arg}`, {
        usage: USAGE,
      });
    }
    parsed.positionals.push(arg);
  }

  return parsed;
}

function requireArgument(value: string | undefined, name: string): string {
  if (!value) {
    throw new ApiWalkError('CONFIG_ERROR', `Missing required argument <${name}>`, {
      usage: USAGE,
    });
  }
  return value;
}

function printJson(context: CommandContext, value: unknown): void {
  context.write(`${JSON.stringify(value, null, 2)}\n`);
}

/** Runs one inspection command and writes its JSON result. */
export async function runCommand(
  argv: string[],
  context: CommandContext,
): Promise<void> {
  const args = parseArgs(argv);
  const settings = readRuntimeSettings(context.env ?? process.env);
  const profile = args.profile ?? settings.profile;
  const apiName = args.api ?? settings.apiName;

  const registry = await ApiRegistry.create({
    configDir: settings.configDir,
    cwd: context.cwd,
    overridePath: args.config ?? settings.configOverride,
    loadDocument: context.loadDocument,
  });
  const store = registry.config;

  const [command, argument] = args.positionals;
  log.debug({ command, profile }, 'running command');

  switch (command) {
    case 'list': {
      printJson(
        context,
        store.list().map((api) => ({
          name: api.name,
          base: api.base,
          profiles: Object.keys(api.profiles ?? {}),
          specFiles: api.specFiles ?? [],
        })),
      );
      return;
    }

    case 'show': {
      const api = store.require(requireArgument(argument ?? apiName, 'api'));
      printJson(context, {
        ...api,
        profile,
        effectiveBase: store.effectiveBase(api, profile),
        profileSettings: store.profile(api, profile),
        sources: store.sources(api.name),
      });
      return;
    }

    case 'operations': {
      const name = requireArgument(argument ?? apiName, 'api');
      const operations = await registry.operations(name, {
        includeHidden: args.all,
      });
      printJson(
        context,
        operations.map((operation) => ({
          name: operation.name,
          aliases: operation.aliases,
          group: operation.group,
          method: operation.method,
          uriTemplate: operation.uriTemplate,
          short: operation.short,
          deprecated: operation.deprecated,
        })),
      );
      return;
    }

    case 'find': {
      const uri = requireArgument(argument, 'uri');
      const api = store.findApi(uri, { apiName, profile });
      if (!api) {
        throw new ApiWalkError(
          'API_NOT_FOUND',
          `No configured API matches ${uri}`,
          { uri, profile, apiName },
        );
      }
      store.validateProfile(api, profile);
      printJson(context, {
        name: api.name,
        profile,
        base: store.effectiveBase(api, profile),
      });
      return;
    }

    default:
      throw new ApiWalkError(
        'CONFIG_ERROR',
        command ? `Unknown command '${command}'` : 'Missing command',
        { usage: USAGE },
      );
  }
}
