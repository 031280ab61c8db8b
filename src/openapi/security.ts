import type { OpenAPIV3 } from 'openapi-types';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import type { ApiAuth, AutoConfig } from '../types.js';
import { EXT_CONFIG, getExtension } from './extensions.js';
import { isReference } from './schema.js';

const log = createLogger('openapi');

type SecuritySchemes = OpenAPIV3.ComponentsObject['securitySchemes'];

const autoConfigVarSchema = z.object({
  description: z.string().optional(),
  example: z.string().optional(),
  default: z.unknown().optional(),
  enum: z.array(z.unknown()).optional(),
  exclude: z.boolean().optional(),
});

const autoConfigSchema = z.object({
  security: z.string(),
  headers: z.record(z.string()).optional(),
  prompt: z.record(autoConfigVarSchema).optional(),
  params: z.record(z.string()).optional(),
});

function isBasic(scheme: OpenAPIV3.HttpSecurityScheme): boolean {
  return scheme.scheme.toLowerCase() === 'basic';
}

/**
 * Maps declared security schemes, visited by name, to auth descriptors.
 * Scheme types without a counterpart are skipped.
 */
export function mapSecuritySchemes(schemes: SecuritySchemes): ApiAuth[] {
  const auth: ApiAuth[] = [];

  for (const name of Object.keys(schemes ?? {}).sort()) {
    const scheme = schemes?.[name];
    if (!scheme || isReference(scheme)) {
      continue;
    }

    if (scheme.type === 'http' && isBasic(scheme)) {
      auth.push({ name: 'http-basic', params: { username: '', password: '' } });
    }

    if (scheme.type === 'oauth2') {
      const { clientCredentials, authorizationCode } = scheme.flows;
      if (clientCredentials) {
        auth.push({
          name: 'oauth-client-credentials',
          params: {
            client_id: '',
            client_secret: '',
            token_url: clientCredentials.tokenUrl,
          },
        });
      }
      if (authorizationCode) {
        auth.push({
          name: 'oauth-authorization-code',
          params: {
            client_id: '',
            authorize_url: authorizationCode.authorizationUrl,
            token_url: authorizationCode.tokenUrl,
          },
        });
      }
    }
  }

  return auth;
}

function defaultAuth(
  security: string,
  schemes: SecuritySchemes,
): ApiAuth & { params: Record<string, string> } {
  const scheme = schemes?.[security];
  if (!scheme || isReference(scheme)) {
    return { name: security, params: {} };
  }

  if (scheme.type === 'http' && isBasic(scheme)) {
    return { name: 'http-basic', params: {} };
  }

  if (scheme.type === 'oauth2') {
    const { clientCredentials, authorizationCode } = scheme.flows;
    if (authorizationCode) {
      return {
        name: 'oauth-authorization-code',
        params: {
          client_id: '',
          authorize_url: authorizationCode.authorizationUrl,
          token_url: authorizationCode.tokenUrl,
        },
      };
    }
    if (clientCredentials) {
      return {
        name: 'oauth-client-credentials',
        params: {
          client_id: '',
          client_secret: '',
          token_url: clientCredentials.tokenUrl,
        },
      };
    }
  }

  return { name: security, params: {} };
}

/**
 * Reads the document-level `x-cli-config` block. A malformed block is logged
 * and ignored.
 */
export function loadAutoConfig(
  document: OpenAPIV3.Document,
): AutoConfig | undefined {
  const raw = getExtension(document, EXT_CONFIG);
  if (raw === undefined) {
    return undefined;
  }

  const parsed = autoConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(
      { issues: parsed.error.issues },
      `Ignoring malformed ${EXT_CONFIG} block`,
    );
    return undefined;
  }

  const { security, headers, prompt, params } = parsed.data;
  const auth = defaultAuth(security, document.components?.securitySchemes);

  const autoConfig: AutoConfig = {
    auth: { name: auth.name, params: { ...auth.params, ...params } },
  };
  if (headers) {
    autoConfig.headers = headers;
  }
  if (prompt) {
    autoConfig.prompt = prompt;
  }
  return autoConfig;
}
