/**
 * Scope Composer Tests
 */

import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  compileComposition,
  createLoadContext,
  IOError,
  RuntimeError,
  toPlain,
  type PlainValue,
} from '../src/index.js';
import { makeTempDir, removeTempDir, writeTree } from './helpers/fixtures.js';

describe('composeApplication', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  async function compose(
    environment: string,
    overlay: string,
    fragments: Record<string, string> = {}
  ): Promise<PlainValue> {
    const files: Record<string, string> = {
      'environments/prod.conf': environment,
      'apps/web/prod.conf': overlay,
    };
    for (const [name, content] of Object.entries(fragments)) {
      files[`vars/${name}.conf`] = content;
    }
    await writeTree(tempDir, files);

    const value = compileComposition(
      {
        app: 'web',
        env: 'prod',
        environmentFile: path.join(tempDir, 'environments', 'prod.conf'),
        overlayFile: path.join(tempDir, 'apps', 'web', 'prod.conf'),
      },
      createLoadContext({ varsDir: path.join(tempDir, 'vars') })
    );
    return toPlain(value);
  }

  it('exposes the environment to the overlay as env', async () => {
    const result = await compose(
      'REGION = "eu"\nENDPOINT = "api-" .. REGION',
      'ENDPOINT = env.ENDPOINT\nREPLICAS = 3'
    );
    expect(result).toEqual({ ENDPOINT: 'api-eu', REPLICAS: 3 });
  });

  it('derives overlay values from the environment', async () => {
    const result = await compose(
      'HOST = "a.example.com"',
      'ENDPOINT = env.HOST .. "/api"\nif env.name ~= "prod" then error("wrong env") end'
    );
    expect(result).toEqual({ ENDPOINT: 'a.example.com/api' });
  });

  it('emits an imported fragment as a nested object', async () => {
    const result = await compose('', 'COMMON = vars("shared")', {
      shared: 'TIMEOUT = 30',
    });
    expect(result).toEqual({ COMMON: { TIMEOUT: 30 } });
  });

  it('emits only the overlay bindings', async () => {
    const result = await compose(
      'REGION = "eu"',
      'DIRECT = REGION\nVIA_ENV = env.REGION'
    );
    expect(result).toEqual({ VIA_ENV: 'eu' });
  });

  it('sets env.name to the environment name', async () => {
    const result = await compose('REGION = "eu"', 'ENV_NAME = env.name');
    expect(result).toEqual({ ENV_NAME: 'prod' });
  });

  it('overrides a name the environment script set itself', async () => {
    const result = await compose('name = "custom"', 'ENV_NAME = env.name');
    expect(result).toEqual({ ENV_NAME: 'prod' });
  });

  it('gives environment and overlay their own imports', async () => {
    const result = await compose(
      'local common = vars("common")\nTIMEOUT = common.TIMEOUT',
      'local common = vars("common")\nTIMEOUT = common.TIMEOUT * 2\nENV_TIMEOUT = env.TIMEOUT',
      { common: 'TIMEOUT = 30' }
    );
    expect(result).toEqual({ TIMEOUT: 60, ENV_TIMEOUT: 30 });
  });

  it('builds nested documents from the environment', async () => {
    const result = await compose(
      'HOSTS = { "db1", "db2" }',
      'DATABASE = { hosts = env.HOSTS, primary = env.HOSTS[1] }'
    );
    expect(result).toEqual({
      DATABASE: { hosts: ['db1', 'db2'], primary: 'db1' },
    });
  });

  it('fails when the environment script fails', async () => {
    await expect(compose('error("env broke")', 'A = 1')).rejects.toThrow(
      RuntimeError
    );
  });

  it('fails when the environment file is missing', async () => {
    await writeTree(tempDir, { 'apps/web/prod.conf': 'A = 1' });
    expect(() =>
      compileComposition(
        {
          app: 'web',
          env: 'prod',
          environmentFile: path.join(tempDir, 'environments', 'prod.conf'),
          overlayFile: path.join(tempDir, 'apps', 'web', 'prod.conf'),
        },
        createLoadContext({ varsDir: path.join(tempDir, 'vars') })
      )
    ).toThrow(IOError);
  });
});
