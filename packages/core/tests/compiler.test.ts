/**
 * Batch Compiler Tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  compile,
  ConversionError,
  IOError,
  LoadError,
  RuntimeError,
  type CompositionEvent,
  type CompositionSkipEvent,
  type DocumentEvent,
  type ImportEvent,
} from '../src/index.js';
import { makeTempDir, removeTempDir, writeTree } from './helpers/fixtures.js';

describe('compile', () => {
  let tempDir: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    inputDir = path.join(tempDir, 'input');
    outputDir = path.join(tempDir, 'output');
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  async function readOutput(name: string): Promise<string> {
    return fs.readFile(path.join(outputDir, name), 'utf-8');
  }

  async function outputFiles(): Promise<string[]> {
    return (await fs.readdir(outputDir)).sort();
  }

  it('writes one YAML document per pair', async () => {
    await writeTree(inputDir, {
      'environments/prod.conf': 'REGION = "eu"',
      'apps/web/prod.conf':
        'REGION = env.REGION\nSERVERS = { "a", "b" }\nhelper = 1',
    });

    const result = await compile({ inputDir, outputDir });

    expect(result.documents).toEqual([
      { app: 'web', env: 'prod', file: path.join(outputDir, 'web_prod.yaml') },
    ]);
    expect(await readOutput('web_prod.yaml')).toBe(
      'REGION: eu\nSERVERS:\n  - a\n  - b\n'
    );
  });

  it('sorts keys in the written document', async () => {
    await writeTree(inputDir, {
      'environments/prod.conf': '',
      'apps/web/prod.conf': 'ZED = 1\nALPHA = { b = 2, a = 1 }',
    });

    await compile({ inputDir, outputDir });

    expect(await readOutput('web_prod.yaml')).toBe(
      'ALPHA:\n  a: 1\n  b: 2\nZED: 1\n'
    );
  });

  it('writes JSON when asked to', async () => {
    await writeTree(inputDir, {
      'environments/prod.conf': '',
      'apps/web/prod.conf': 'B = { "x" }\nA = 1',
    });

    const result = await compile({ inputDir, outputDir, format: 'json' });

    expect(result.documents[0]?.file).toBe(path.join(outputDir, 'web_prod.json'));
    expect(await readOutput('web_prod.json')).toBe(
      '{\n  "A": 1,\n  "B": [\n    "x"\n  ]\n}\n'
    );
  });

  it('processes environments in order, then applications', async () => {
    await writeTree(inputDir, {
      'environments/prod.conf': '',
      'environments/dev.conf': '',
      'apps/web/dev.conf': 'A = 1',
      'apps/web/prod.conf': 'A = 1',
      'apps/api/dev.conf': 'A = 1',
      'apps/api/prod.conf': 'A = 1',
    });

    const result = await compile({ inputDir, outputDir });

    expect(result.documents.map(({ app, env }) => `${app}_${env}`)).toEqual([
      'api_dev',
      'web_dev',
      'api_prod',
      'web_prod',
    ]);
  });

  it('skips pairs without an overlay', async () => {
    await writeTree(inputDir, {
      'environments/dev.conf': '',
      'environments/prod.conf': '',
      'apps/web/prod.conf': 'A = 1',
    });
    const skips: CompositionSkipEvent[] = [];

    const result = await compile({
      inputDir,
      outputDir,
      callbacks: { onCompositionSkip: (event) => skips.push(event) },
    });

    expect(result.skipped).toEqual([{ app: 'web', env: 'dev' }]);
    expect(skips).toEqual([
      {
        app: 'web',
        env: 'dev',
        reason: `no overlay at ${path.join(inputDir, 'apps', 'web', 'dev.conf')}`,
      },
    ]);
    expect(await outputFiles()).toEqual(['web_prod.yaml']);
  });

  it('ignores files that are not environments or applications', async () => {
    await writeTree(inputDir, {
      'environments/prod.conf': '',
      'environments/README.md': 'notes',
      'apps/notes.txt': 'notes',
      'apps/web/prod.conf': 'A = 1',
    });

    const result = await compile({ inputDir, outputDir });

    expect(result.documents).toHaveLength(1);
  });

  it('reports progress through callbacks', async () => {
    await writeTree(inputDir, {
      'environments/prod.conf': 'local c = vars("common")',
      'apps/web/prod.conf': 'A = vars("common").A',
      'vars/common.conf': 'A = 1',
    });
    const starts: CompositionEvent[] = [];
    const imports: ImportEvent[] = [];
    const written: DocumentEvent[] = [];

    await compile({
      inputDir,
      outputDir,
      callbacks: {
        onCompositionStart: (event) => starts.push(event),
        onImport: (event) => imports.push(event),
        onDocumentWritten: (event) => written.push(event),
      },
    });

    expect(starts).toEqual([{ app: 'web', env: 'prod' }]);
    expect(imports.map((event) => event.name)).toEqual(['common', 'common']);
    expect(written).toEqual([
      { app: 'web', env: 'prod', file: path.join(outputDir, 'web_prod.yaml') },
    ]);
  });

  it('reads fragments from a custom directory', async () => {
    const varsDir = path.join(tempDir, 'shared');
    await writeTree(tempDir, { 'shared/common.conf': 'A = "shared"' });
    await writeTree(inputDir, {
      'environments/prod.conf': '',
      'apps/web/prod.conf': 'A = vars("common").A',
    });

    await compile({ inputDir, outputDir, varsDir });

    expect(await readOutput('web_prod.yaml')).toBe('A: shared\n');
  });

  it('creates a missing output directory', async () => {
    outputDir = path.join(tempDir, 'out', 'nested');
    await writeTree(inputDir, {
      'environments/prod.conf': '',
      'apps/web/prod.conf': 'A = 1',
    });

    await compile({ inputDir, outputDir });

    expect(await outputFiles()).toEqual(['web_prod.yaml']);
  });

  describe('failures', () => {
    it('stops at the first failing pair and keeps earlier documents', async () => {
      await writeTree(inputDir, {
        'environments/a.conf': '',
        'environments/b.conf': '',
        'environments/c.conf': '',
        'apps/web/a.conf': 'A = 1',
        'apps/web/b.conf': 'error("bad overlay")',
        'apps/web/c.conf': 'A = 1',
      });

      await expect(compile({ inputDir, outputDir })).rejects.toThrow(
        RuntimeError
      );
      expect(await outputFiles()).toEqual(['web_a.yaml']);
    });

    it('reports a syntax error in the environment script', async () => {
      const envFile = path.join(inputDir, 'environments', 'prod.conf');
      await writeTree(inputDir, {
        'environments/prod.conf': 'REGION = = "eu"',
        'apps/web/prod.conf': 'A = 1',
      });

      await expect(compile({ inputDir, outputDir })).rejects.toMatchObject({
        errorId: 'CONF-L001',
        context: { file: envFile },
      });
      await expect(compile({ inputDir, outputDir })).rejects.toThrow(LoadError);
    });

    it('reports the path of an unconvertible value', async () => {
      await writeTree(inputDir, {
        'environments/prod.conf': '',
        'apps/web/prod.conf': 'HANDLER = print',
      });

      await expect(compile({ inputDir, outputDir })).rejects.toThrow(
        new ConversionError('CONF-C002', {
          path: 'web.prod.HANDLER',
          type: 'function',
        })
      );
    });

    it('keeps the bytes of a script file', async () => {
      await writeTree(inputDir, { 'environments/prod.conf': '' });
      const overlay = path.join(inputDir, 'apps', 'web', 'prod.conf');
      await fs.mkdir(path.dirname(overlay), { recursive: true });
      // Latin-1 "é", which is not valid UTF-8
      await fs.writeFile(overlay, Buffer.from([0x41, 0x3d, 0x22, 0xe9, 0x22]));

      await expect(compile({ inputDir, outputDir })).rejects.toThrow(
        new ConversionError('CONF-C004', { path: 'web.prod.A' })
      );
    });

    it('refuses to write non-finite numbers as JSON', async () => {
      await writeTree(inputDir, {
        'environments/prod.conf': '',
        'apps/web/prod.conf': 'BIG = math.huge',
      });

      await expect(
        compile({ inputDir, outputDir, format: 'json' })
      ).rejects.toThrow(
        'Failed to extract web.prod.BIG: Infinity cannot be written as JSON'
      );
      expect(await outputFiles()).toEqual([]);
    });

    it('fails with IOError when the input tree is missing', async () => {
      await expect(compile({ inputDir, outputDir })).rejects.toMatchObject({
        errorId: 'CONF-I003',
        context: { dir: path.join(inputDir, 'environments') },
      });
      await expect(compile({ inputDir, outputDir })).rejects.toThrow(IOError);
    });
  });
});
