import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  ConfigError,
  ErrorCode,
  SchemaError,
  ValidationError,
  buildModel,
  deriveKeyMappings,
  formatMappingTable,
  parseModel,
} from '@varimodel/core';
import { checkReportShape } from '@varimodel/reporter';

import { createProgram } from '../index.js';

const ref = (name: string): { $ref: string } => ({ $ref: `#/definitions/${name}` });

function podSchema(containerProperties: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    definitions: {
      Pod: { properties: { spec: ref('PodSpec') }, required: ['spec'] },
      PodSpec: {
        properties: { containers: { type: 'array', items: ref('Container') } },
        required: ['containers'],
      },
      Container: {
        properties: { name: { type: 'string' }, image: { type: 'string' }, ...containerProperties },
        required: ['name'],
      },
    },
  };
}

const VALID_POD = 'apiVersion: v1\nkind: Pod\nspec:\n  containers:\n    - name: web\n';
const EMPTY_SPEC_POD = 'apiVersion: v1\nkind: Pod\nspec: {}\n';

interface Captured {
  stdout: string;
  stderr: string;
}

async function run(args: string[]): Promise<Captured> {
  const out: string[] = [];
  const errs: string[] = [];
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    out.push(String(chunk));
    return true;
  });
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    errs.push(String(chunk));
    return true;
  });
  try {
    await createProgram().parseAsync(args, { from: 'user' });
  } finally {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
  }
  return { stdout: out.join(''), stderr: errs.join('') };
}

function expectedModelText(schema: Record<string, unknown>): string {
  const built = buildModel(schema);
  if (built.isErr()) throw built.error;
  return built.value.text;
}

describe('varimodel CLI', () => {
  let dir: string;
  let schemaPath: string;
  let modelPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'varimodel-cli-'));
    schemaPath = join(dir, 'schema.json');
    modelPath = join(dir, 'model.uvl');
    await writeFile(schemaPath, JSON.stringify(podSchema()), 'utf8');
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  describe('build', () => {
    it('writes the model and the descriptions side file', async () => {
      const descriptionsPath = join(dir, 'out', 'descriptions.json');
      const { stdout, stderr } = await run([
        'build',
        schemaPath,
        '-o',
        modelPath,
        '--descriptions',
        descriptionsPath,
      ]);
      expect(stdout).toBe('');
      expect(stderr).toBe('');
      expect(await readFile(modelPath, 'utf8')).toBe(expectedModelText(podSchema()));

      const built = buildModel(podSchema());
      if (built.isErr()) throw built.error;
      expect(await readFile(descriptionsPath, 'utf8')).toBe(built.value.descriptions);
    });

    it('prints to stdout and honours the namespace', async () => {
      const { stdout } = await run(['build', schemaPath, '--namespace', 'Cluster']);
      expect(stdout.startsWith('namespace Cluster\n\nfeatures\n\tCluster {abstract}\n')).toBe(true);
    });

    it('logs kinds under --verbose', async () => {
      const { stderr } = await run(['build', schemaPath, '-o', modelPath, '--verbose']);
      expect(stderr.split('\n')[0]).toBe('[varimodel] build: kinds Pod');
    });

    it('fails under --strict when a reference does not resolve', async () => {
      await writeFile(schemaPath, JSON.stringify(podSchema({ extra: ref('Missing') })), 'utf8');
      const lenient = await run(['build', schemaPath]);
      expect(lenient.stdout.startsWith('namespace Model\n')).toBe(true);

      const strict = run(['build', schemaPath, '-o', modelPath, '--strict']);
      await expect(strict).rejects.toBeInstanceOf(SchemaError);
      await expect(strict).rejects.toMatchObject({ errorCode: ErrorCode.UNRESOLVED_REFERENCE });
      await expect(readFile(modelPath, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('rejects a missing schema file', async () => {
      await expect(run(['build', join(dir, 'missing.json')])).rejects.toMatchObject({
        errorCode: ErrorCode.SCHEMA_LOAD_FAILED,
      });
    });
  });

  describe('mapping', () => {
    it('derives the table from the model', async () => {
      await run(['build', schemaPath, '-o', modelPath]);
      const { stdout } = await run(['mapping', modelPath]);
      const model = parseModel(expectedModelText(podSchema()));
      expect(stdout).toBe(formatMappingTable(deriveKeyMappings(model).mapper.entries()));
      expect(stdout.split('\n')).toContain(
        'Pod:spec.containers[*].name\tPod.spec.containers.element.name\tverbatim'
      );
    });

    it('checks a curated table and warns about unknown features', async () => {
      await run(['build', schemaPath, '-o', modelPath]);
      const tablePath = join(dir, 'curated.tsv');
      await writeFile(
        tablePath,
        'Pod:spec.nodeName\tPod.spec.nodeName\tverbatim\nPod:spec\tPod.spec\tboolean-presence\n',
        'utf8'
      );
      const { stdout, stderr } = await run(['mapping', modelPath, '--check', tablePath]);
      expect(stdout).toBe(
        '# key-path\tfeature-id\tvalue-kind\nPod:spec.nodeName\tPod.spec.nodeName\tverbatim\nPod:spec\tPod.spec\tboolean-presence\n'
      );
      expect(stderr).toBe(
        `[varimodel] mapping: ${tablePath} maps onto unknown feature Pod.spec.nodeName\n`
      );
    });

    it('refuses overlapping curated patterns', async () => {
      await run(['build', schemaPath, '-o', modelPath]);
      const tablePath = join(dir, 'overlap.tsv');
      await writeFile(tablePath, 'Pod:spec\tPod.spec\tboolean-presence\nPod:*\tPod\tboolean-presence\n', 'utf8');
      await expect(run(['mapping', modelPath, '--check', tablePath])).rejects.toMatchObject({
        errorCode: ErrorCode.AMBIGUOUS_KEY_PATH,
      });
    });
  });

  describe('translate', () => {
    it('prints one selection per document, with violations under --check', async () => {
      await run(['build', schemaPath, '-o', modelPath]);
      const docPath = join(dir, 'pods.yaml');
      await writeFile(docPath, `${VALID_POD}---\n${EMPTY_SPEC_POD}`, 'utf8');

      const { stdout } = await run(['translate', modelPath, docPath, '--check']);
      expect(JSON.parse(stdout)).toEqual([
        {
          documentId: `${docPath}#0`,
          status: 'ok',
          selection: {
            selectedFeatureIds: [
              'Model',
              'Pod',
              'Pod.spec',
              'Pod.spec.containers',
              'Pod.spec.containers.element',
              'Pod.spec.containers.element.name',
            ],
            attributeValues: { 'Pod.spec.containers.element.name': ['web'] },
            unmappedKeys: [],
          },
          violations: [],
        },
        {
          documentId: `${docPath}#1`,
          status: 'ok',
          selection: {
            selectedFeatureIds: ['Model', 'Pod', 'Pod.spec', 'Pod.spec.isEmpty'],
            attributeValues: {},
            unmappedKeys: [],
          },
          violations: ['mandatory:Pod.spec.containers'],
        },
      ]);
    });

    it('reports skipped documents by status', async () => {
      await run(['build', schemaPath, '-o', modelPath]);
      const docPath = join(dir, 'chart.yaml');
      await writeFile(docPath, 'kind: {{ .Values.kind }}\n', 'utf8');
      const { stdout } = await run(['translate', modelPath, docPath]);
      expect(JSON.parse(stdout)).toEqual([{ documentId: `${docPath}#0`, status: 'templated' }]);
    });
  });

  describe('validate', () => {
    let docsDir: string;

    beforeEach(async () => {
      await run(['build', schemaPath, '-o', modelPath]);
      docsDir = join(dir, 'docs');
      await mkdir(docsDir);
      await writeFile(join(docsDir, 'a.yaml'), VALID_POD, 'utf8');
      await writeFile(join(docsDir, 'b.yaml'), EMPTY_SPEC_POD, 'utf8');
    });

    it('stops at the first invalid document under --fail-fast', async () => {
      const failing = run(['validate', modelPath, docsDir, '--fail-fast']);
      await expect(failing).rejects.toBeInstanceOf(ValidationError);
      await expect(failing).rejects.toMatchObject({
        errorCode: ErrorCode.CONSTRAINT_VIOLATION,
        violations: ['mandatory:Pod.spec.containers'],
        message: `${join(docsDir, 'b.yaml')}#0 violates the model: mandatory:Pod.spec.containers`,
      });
    });

    it('writes every requested report format and fails on invalid documents', async () => {
      const reportDir = join(dir, 'reports');
      const { stdout, stderr } = await run([
        'validate',
        modelPath,
        docsDir,
        '--format',
        'json,csv',
        '--report-dir',
        reportDir,
      ]);
      expect(stdout).toBe(
        `Wrote ${join(reportDir, 'report.json')}\nWrote ${join(reportDir, 'report.csv')}\n`
      );
      expect(stderr).toBe(
        '[varimodel] validated 2 document(s): 1 valid, 1 invalid, 0 skipped, 0 failed\n'
      );
      expect(process.exitCode).toBe(1);

      const report: unknown = JSON.parse(await readFile(join(reportDir, 'report.json'), 'utf8'));
      expect(checkReportShape(report)).toEqual([]);
      expect(report).toMatchObject({
        meta: { modelPath },
        summary: {
          documents: 2,
          valid: 1,
          invalid: 1,
          skipped: 0,
          failed: 0,
          batchesCompleted: 1,
          batchesSkipped: 0,
          cancelled: false,
          diagnostics: {},
        },
        documents: [
          { documentId: `${join(docsDir, 'a.yaml')}#0`, valid: true, violations: [] },
          {
            documentId: `${join(docsDir, 'b.yaml')}#0`,
            valid: false,
            violations: ['mandatory:Pod.spec.containers'],
          },
        ],
      });

      const csv = (await readFile(join(reportDir, 'report.csv'), 'utf8')).split('\n');
      expect(csv[0]).toBe('filename,source,result,time');
      expect(csv[1]?.startsWith(`${join(docsDir, 'a.yaml')}#0,varimodel,true,`)).toBe(true);
      expect(csv[2]?.startsWith(`${join(docsDir, 'b.yaml')}#0,varimodel,false,`)).toBe(true);
    });

    it('prints a single format to stdout', async () => {
      const { stdout } = await run(['validate', modelPath, join(docsDir, 'a.yaml'), '--format', 'markdown']);
      expect(stdout.startsWith('# Validation Report\n')).toBe(true);
      expect(stdout).toContain('| 1 | 1 | 0 | 0 | 0 |');
      expect(process.exitCode).toBeUndefined();
    });

    it('needs a report directory for several formats', async () => {
      const attempt = run(['validate', modelPath, docsDir, '--format', 'json,markdown']);
      await expect(attempt).rejects.toThrow(ConfigError);
      await expect(attempt).rejects.toThrow(
        'Printing to stdout takes exactly one format; pass --report-dir to write several'
      );
    });

    it('rejects non-numeric limits', async () => {
      await expect(run(['validate', modelPath, docsDir, '--concurrency', 'many'])).rejects.toThrow(
        "--concurrency must be an integer, got 'many'"
      );
    });
  });

  describe('diff', () => {
    it('lists features added between model versions', async () => {
      const nextSchemaPath = join(dir, 'schema-next.json');
      const nextModelPath = join(dir, 'model-next.uvl');
      await writeFile(nextSchemaPath, JSON.stringify(podSchema({ tag: { type: 'string' } })), 'utf8');
      await run(['build', schemaPath, '-o', modelPath]);
      await run(['build', nextSchemaPath, '-o', nextModelPath]);

      const json = await run(['diff', modelPath, nextModelPath, '--format', 'json']);
      expect(JSON.parse(json.stdout)).toMatchObject({
        beforePath: modelPath,
        afterPath: nextModelPath,
        diff: {
          addedFeatures: ['Pod.spec.containers.element.tag'],
          removedFeatures: [],
          changedFeatures: [],
          addedConstraints: [],
          removedConstraints: [],
        },
      });

      const markdown = await run(['diff', modelPath, nextModelPath]);
      expect(markdown.stdout).toContain('## Added features\n\n- `Pod.spec.containers.element.tag`\n');
      expect(markdown.stdout).not.toContain('## Removed features');
    });

    it('rejects unknown formats', async () => {
      await run(['build', schemaPath, '-o', modelPath]);
      await expect(run(['diff', modelPath, modelPath, '--format', 'html'])).rejects.toThrow(
        "Unsupported diff format 'html'. Expected markdown or json."
      );
    });
  });
});
