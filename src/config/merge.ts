import type { ApiConfig, ApiProfile, TlsConfig } from '../types.js';

function mergeStringMap(
  dest: Record<string, string> | undefined,
  source: Record<string, string> | undefined,
): Record<string, string> | undefined {
  if (!source || Object.keys(source).length === 0) {
    return dest;
  }
  return { ...(dest ?? {}), ...source };
}

export function mergeProfile(dest: ApiProfile, source: ApiProfile): void {
  if (source.base) {
    dest.base = source.base;
  }

  dest.headers = mergeStringMap(dest.headers, source.headers);
  dest.query = mergeStringMap(dest.query, source.query);

  if (source.auth) {
    const params = source.auth.params
      ? { ...(dest.auth?.params ?? {}), ...source.auth.params }
      : dest.auth?.params;
    dest.auth = { name: source.auth.name };
    if (params) {
      dest.auth.params = params;
    }
  }
}

function mergeTls(dest: TlsConfig, source: TlsConfig): void {
  // The insecure flag can only be switched on by a later layer.
  if (source.insecure) {
    dest.insecure = true;
  }
  if (source.cert) {
    dest.cert = source.cert;
  }
  if (source.key) {
    dest.key = source.key;
  }
  if (source.caCert) {
    dest.caCert = source.caCert;
  }
  if (source.pkcs11) {
    dest.pkcs11 ??= {};
    if (source.pkcs11.path) {
      dest.pkcs11.path = source.pkcs11.path;
    }
    if (source.pkcs11.label) {
      dest.pkcs11.label = source.pkcs11.label;
    }
  }
}

/**
 * Merges a later configuration layer into an earlier one, in place.
 *
 * Scalars are overwritten when the later layer sets them, spec files are
 * appended without duplicates, and profile and TLS structures merge key by key.
 */
export function mergeApiConfig(dest: ApiConfig, source: ApiConfig): void {
  if (source.base) {
    dest.base = source.base;
  }

  if (source.operationBase) {
    dest.operationBase = source.operationBase;
  }

  if (source.specFiles && source.specFiles.length > 0) {
    const specFiles = dest.specFiles ?? [];
    for (const specFile of source.specFiles) {
      if (!specFiles.includes(specFile)) {
        specFiles.push(specFile);
      }
    }
    dest.specFiles = specFiles;
  }

  if (source.profiles) {
    dest.profiles ??= {};
    for (const [name, profile] of Object.entries(source.profiles)) {
      const existing = dest.profiles[name] ?? {};
      mergeProfile(existing, profile);
      dest.profiles[name] = existing;
    }
  }

  if (source.tls) {
    dest.tls ??= {};
    mergeTls(dest.tls, source.tls);
  }
}
