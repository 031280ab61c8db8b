import { z } from 'zod';
import type { ApiConfig, ApiProfile, TlsConfig } from '../types.js';

export const SCHEMA_KEY = '$schema';

const authSchema = z.object({
  name: z.string(),
  params: z.record(z.string()).optional(),
});

const profileSchema = z.object({
  base: z.string().optional(),
  headers: z.record(z.string()).optional(),
  query: z.record(z.string()).optional(),
  auth: authSchema.optional(),
});

const tlsSchema = z.object({
  insecure: z.boolean().optional(),
  cert: z.string().optional(),
  key: z.string().optional(),
  ca_cert: z.string().optional(),
  pkcs11: z
    .object({
      path: z.string().optional(),
      label: z.string().optional(),
    })
    .optional(),
});

// Local layers may carry partial entries, so `base` is optional here and
// checked once all layers are merged.
export const apiEntrySchema = z.object({
  base: z.string().optional(),
  operation_base: z.string().optional(),
  spec_files: z.array(z.string()).optional(),
  profiles: z.record(profileSchema.nullable()).optional(),
  tls: tlsSchema.optional(),
});

export type ApiEntry = z.infer<typeof apiEntrySchema>;

export const configFileSchema = z.record(z.unknown());

export function entryToConfig(name: string, entry: ApiEntry): ApiConfig {
  const config: ApiConfig = { name, base: entry.base ?? '' };

  if (entry.operation_base) {
    config.operationBase = entry.operation_base;
  }
  if (entry.spec_files) {
    config.specFiles = [...entry.spec_files];
  }
  if (entry.profiles) {
    const profiles: Record<string, ApiProfile> = {};
    for (const [profileName, profile] of Object.entries(entry.profiles)) {
      if (profile) {
        profiles[profileName] = structuredClone(profile);
      }
    }
    config.profiles = profiles;
  }
  if (entry.tls) {
    const { ca_cert: caCert, ...rest } = entry.tls;
    const tls: TlsConfig = { ...rest };
    if (caCert !== undefined) {
      tls.caCert = caCert;
    }
    config.tls = tls;
  }

  return config;
}

export function configToEntry(config: ApiConfig): ApiEntry {
  const entry: ApiEntry = { base: config.base };

  if (config.operationBase) {
    entry.operation_base = config.operationBase;
  }
  if (config.specFiles && config.specFiles.length > 0) {
    entry.spec_files = [...config.specFiles];
  }
  if (config.profiles && Object.keys(config.profiles).length > 0) {
    entry.profiles = structuredClone(config.profiles);
  }
  if (config.tls) {
    const { caCert, ...rest } = config.tls;
    entry.tls = { ...rest };
    if (caCert !== undefined) {
      entry.tls.ca_cert = caCert;
    }
  }

  return entry;
}
