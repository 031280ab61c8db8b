import { access, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ApiWalkError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { configFileSchema } from './schema.js';

const log = createLogger('config');

/** Local config file names, most preferred first. */
export const LOCAL_CONFIG_NAMES = ['.apiwalk.json', '.apiwalk.yaml'] as const;

export const GLOBAL_CONFIG_NAME = 'apis.json';

export type ConfigDocument = Record<string, unknown>;

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isJsonFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.json';
}

/**
 * Finds local config files from `cwd` up to the filesystem root.
 *
 * Returns them root first so that files closer to `cwd` are merged last. An
 * existing `override` path replaces the directory walk.
 */
export async function findLocalConfigs(
  cwd: string,
  override?: string,
): Promise<string[]> {
  if (override) {
    const resolved = path.resolve(cwd, override);
    if (await fileExists(resolved)) {
      return [resolved];
    }
    log.debug({ path: resolved }, 'specified config file does not exist');
  }

  const found: string[] = [];
  let dir = path.resolve(cwd);
  for (;;) {
    for (const name of LOCAL_CONFIG_NAMES) {
      const candidate = path.join(dir, name);
      if (await fileExists(candidate)) {
        found.push(candidate);
        break;
      }
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  return found.reverse();
}

export async function readConfigDocument(
  filePath: string,
): Promise<ConfigDocument> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ApiWalkError(
      'CONFIG_ERROR',
      `Cannot read config file: ${filePath}`,
      { path: filePath, cause: errorMessage(error) },
    );
  }

  let parsed: unknown;
  try {
    parsed = isJsonFile(filePath) ? JSON.parse(raw) : parseYaml(raw);
  } catch (error) {
    throw new ApiWalkError(
      'CONFIG_ERROR',
      `Invalid ${isJsonFile(filePath) ? 'JSON' : 'YAML'} in config: ${filePath}`,
      { path: filePath, cause: errorMessage(error) },
    );
  }

  // An empty YAML file parses to null.
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ApiWalkError(
      'CONFIG_ERROR',
      `Config file must contain an object keyed by API name: ${filePath}`,
      { path: filePath },
    );
  }
  return result.data;
}

export async function writeConfigDocument(
  filePath: string,
  document: ConfigDocument,
): Promise<void> {
  const serialized = isJsonFile(filePath)
    ? `${JSON.stringify(document, null, 2)}\n`
    : stringifyYaml(document);

  try {
    await writeFile(filePath, serialized, { encoding: 'utf8', mode: 0o600 });
  } catch (error) {
    throw new ApiWalkError(
      'CONFIG_ERROR',
      `Cannot write config file: ${filePath}`,
      { path: filePath, cause: errorMessage(error) },
    );
  }
}
