import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ApiWalkError } from '../src/errors.js';
import { ApiRegistry, type DocumentLoader } from '../src/registry.js';

const documents: Record<string, unknown> = {
  'main.yaml': {
    openapi: '3.0.3',
    info: { title: 'Main', description: 'Main API', version: '1' },
    paths: {
      '/items': {
        get: { operationId: 'listItems', responses: {} },
        post: { operationId: 'createItem', 'x-cli-hidden': true, responses: {} },
      },
    },
    components: {
      securitySchemes: { basic: { type: 'http', scheme: 'basic' } },
    },
  },
  'extra.yaml': {
    openapi: '3.1.0',
    info: { title: 'Extra', version: '1' },
    paths: {
      '/reports': {
        get: { operationId: 'getReports', 'x-cli-aliases': ['rep'], responses: {} },
      },
    },
  },
};

let root: string;

beforeEach(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), 'apiwalk-registry-'));
  await mkdir(path.join(root, 'config'));
  await writeFile(
    path.join(root, 'config', 'apis.json'),
    JSON.stringify({
      shop: { base: 'https://shop.test', spec_files: ['main.yaml', 'extra.yaml'] },
      bare: { base: 'https://bare.test' },
    }),
  );
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function stubLoader() {
  return vi.fn<DocumentLoader>(async (source) => documents[source]);
}

async function createRegistry(loadDocument: DocumentLoader) {
  return ApiRegistry.create({
    configDir: path.join(root, 'config'),
    cwd: root,
    loadDocument,
  });
}

describe('ApiRegistry', () => {
  it('concatenates operations from every spec file', async () => {
    const registry = await createRegistry(stubLoader());
    const api = await registry.compile('shop');

    expect(api.operations.map((operation) => operation.name)).toEqual([
      'list-items',
      'create-item',
      'get-reports',
    ]);
    expect(api.short).toBe('Main');
    expect(api.long).toBe('Main API');
    expect(api.auth).toEqual([
      { name: 'http-basic', params: { username: '', password: '' } },
    ]);
  });

  it('compiles each API once', async () => {
    const loader = stubLoader();
    const registry = await createRegistry(loader);

    await Promise.all([registry.compile('shop'), registry.compile('shop')]);
    await registry.operations('shop');

    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('hides hidden operations unless asked', async () => {
    const registry = await createRegistry(stubLoader());

    expect((await registry.operations('shop')).map((operation) => operation.name)).toEqual([
      'list-items',
      'get-reports',
    ]);
    expect(await registry.operations('shop', { includeHidden: true })).toHaveLength(3);
  });

  it('finds operations by name or alias', async () => {
    const registry = await createRegistry(stubLoader());

    expect((await registry.findOperation('shop', 'rep'))?.name).toBe('get-reports');
    expect((await registry.findOperation('shop', 'listitems'))?.name).toBe('list-items');
    expect(await registry.findOperation('shop', 'missing')).toBeUndefined();
  });

  it('fails for APIs without spec files', async () => {
    const registry = await createRegistry(stubLoader());

    await expect(registry.compile('bare')).rejects.toMatchObject({
      code: 'SPEC_ERROR',
      message: "API 'bare' has no spec files configured",
    } satisfies Partial<ApiWalkError>);
  });

  it('retries after a failed compile', async () => {
    const loader = vi
      .fn<DocumentLoader>()
      .mockRejectedValueOnce(new Error('offline'))
      .mockImplementation(async (source) => documents[source]);
    const registry = await createRegistry(loader);

    await expect(registry.compile('shop')).rejects.toThrow('offline');
    expect((await registry.compile('shop')).operations).toHaveLength(3);
  });

  it('rejects unknown APIs', async () => {
    const registry = await createRegistry(stubLoader());

    await expect(registry.compile('nope')).rejects.toMatchObject({
      code: 'API_NOT_FOUND',
    } satisfies Partial<ApiWalkError>);
    await expect(registry.operations('nope')).rejects.toThrow("Unknown API 'nope'");
  });
});
