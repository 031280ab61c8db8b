import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseArgs, runCommand } from '../src/commands.js';
import type { ApiWalkError } from '../src/errors.js';

let root: string;
let output: string[];

const document = {
  openapi: '3.0.3',
  info: { title: 'Pets', version: '1' },
  paths: {
    '/pets': {
      get: { operationId: 'listPets', summary: 'List pets', tags: ['pets'], responses: {} },
      delete: { operationId: 'purgePets', 'x-cli-hidden': true, responses: {} },
    },
  },
};

async function run(argv: string[]): Promise<unknown> {
  output = [];
  await runCommand(argv, {
    env: { APIWALK_CONFIG_DIR: path.join(root, 'config') },
    cwd: root,
    write: (text) => {
      output.push(text);
    },
    loadDocument: async () => document,
  });
  return JSON.parse(output.join(''));
}

beforeEach(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), 'apiwalk-cli-'));
  await mkdir(path.join(root, 'config'));
  await writeFile(
    path.join(root, 'config', 'apis.json'),
    JSON.stringify({
      pets: {
        base: 'https://pets.test',
        spec_files: ['pets.yaml'],
        profiles: { prod: { base: 'https://prod.pets.test' } },
      },
    }),
  );
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('parseArgs', () => {
  it('separates flags from positionals', () => {
    expect(parseArgs(['--profile', 'prod', 'find', 'https://x.test', '--all'])).toEqual({
      profile: 'prod',
      all: true,
      positionals: ['find', 'https://x.test'],
    });
  });

  it('rejects a flag without a value', () => {
    expect(() => parseArgs(['--config'])).toThrow('Missing value for --config');
  });
});

describe('runCommand', () => {
  it('lists configured APIs', async () => {
    expect(await run(['list'])).toEqual([
      {
        name: 'pets',
        base: 'https://pets.test',
        profiles: ['prod'],
        specFiles: ['pets.yaml'],
      },
    ]);
  });

  it('shows one API with its profile', async () => {
    expect(await run(['--profile', 'prod', 'show', 'pets'])).toMatchObject({
      name: 'pets',
      profile: 'prod',
      effectiveBase: 'https://prod.pets.test',
      profileSettings: { base: 'https://prod.pets.test' },
      sources: [],
    });
  });

  it('lists visible operations', async () => {
    expect(await run(['operations', 'pets'])).toEqual([
      {
        name: 'list-pets',
        aliases: ['listpets'],
        group: 'pets',
        method: 'GET',
        uriTemplate: 'https://pets.test/pets',
        short: 'List pets',
      },
    ]);
    expect(await run(['operations', 'pets', '--all'])).toHaveLength(2);
  });

  it('finds the API for a URI', async () => {
    expect(await run(['--profile', 'prod', 'find', 'https://prod.pets.test/pets/1'])).toEqual({
      name: 'pets',
      profile: 'prod',
      base: 'https://prod.pets.test',
    });
  });

  it('reports URIs that match no API', async () => {
    await expect(run(['find', 'https://unknown.test/'])).rejects.toMatchObject({
      code: 'API_NOT_FOUND',
      message: 'No configured API matches https://unknown.test/',
    } satisfies Partial<ApiWalkError>);
  });

  it('reports unknown profiles', async () => {
    await expect(run(['--profile', 'staging', 'show', 'pets'])).rejects.toMatchObject({
      code: 'PROFILE_NOT_FOUND',
      message: "Profile 'staging' not found for API 'pets'. Available profiles: prod",
    } satisfies Partial<ApiWalkError>);
  });

  it('rejects unknown commands', async () => {
    await expect(run(['frobnicate'])).rejects.toMatchObject({
      code: 'CONFIG_ERROR',
      message: "Unknown command 'frobnicate'",
    } satisfies Partial<ApiWalkError>);
  });
});
