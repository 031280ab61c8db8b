import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_PROFILE } from '../types.js';

export interface RuntimeSettings {
  configDir: string;
  configOverride?: string;
  profile: string;
  apiName?: string;
}

// Blank variables count as unset.
const optionalSetting = z.preprocess(
  (value) =>
    typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined,
  z.string().optional(),
);

const envSchema = z.object({
  APIWALK_CONFIG_DIR: optionalSetting,
  APIWALK_CONFIG: optionalSetting,
  APIWALK_PROFILE: optionalSetting,
  APIWALK_API: optionalSetting,
});

export function defaultConfigDir(): string {
  return path.join(os.homedir(), '.config', 'apiwalk');
}

export function readRuntimeSettings(
  env: NodeJS.ProcessEnv = process.env,
): RuntimeSettings {
  const parsed = envSchema.parse(env);

  return {
    configDir: parsed.APIWALK_CONFIG_DIR ?? defaultConfigDir(),
    configOverride: parsed.APIWALK_CONFIG,
    profile: parsed.APIWALK_PROFILE ?? DEFAULT_PROFILE,
    apiName: parsed.APIWALK_API,
  };
}
