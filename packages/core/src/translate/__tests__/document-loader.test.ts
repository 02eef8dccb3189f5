import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { describe, expect, it } from 'vitest';
import { ErrorCode } from '../../errors/codes.js';
import { isTemplated, loadDocuments, readDocumentFile } from '../document-loader.js';

const onlyPods = (_apiVersion: string, kind: string): boolean => kind === 'Pod';

describe('loadDocuments', () => {
  it('splits a multi-document stream and classifies each document', () => {
    const text = 'apiVersion: v1\nkind: Pod\nmetadata:\n  name: a\n---\napiVersion: v1\nkind: Service\n';
    const docs = loadDocuments(text, 'all.yaml', { knownKinds: onlyPods });
    expect(docs.map((d) => [d.id, d.status, d.kind])).toEqual([
      ['all.yaml#0', 'ok', 'Pod'],
      ['all.yaml#1', 'custom-resource', 'Service'],
    ]);
    expect(docs[0]?.content).toEqual({ apiVersion: 'v1', kind: 'Pod', metadata: { name: 'a' } });
  });

  it('rejects templated text as a whole', () => {
    expect(loadDocuments('name: {{ .Values.name }}\n', 'chart.yaml')).toEqual([
      { id: 'chart.yaml#0', source: 'chart.yaml', index: 0, status: 'templated' },
    ]);
    expect(isTemplated('#@ load("@ytt:data", "data")\nkind: Pod\n')).toBe(true);
  });

  it('marks documents without apiVersion and kind', () => {
    expect(loadDocuments('foo: 1\n', 'a.yaml')[0]?.status).toBe('no-kind');
    expect(loadDocuments('apiVersion: v1\nkind: N/A\n', 'a.yaml')[0]?.status).toBe('no-kind');
    expect(loadDocuments('- 1\n- 2\n', 'a.yaml')[0]?.status).toBe('no-kind');
  });

  it('treats definitions of custom resources as custom resources', () => {
    const text = 'apiVersion: apiextensions.k8s.io/v1\nkind: CustomResourceDefinition\n';
    expect(loadDocuments(text, 'crd.yaml')[0]?.status).toBe('custom-resource');
  });

  it('keeps a syntax error on its document', () => {
    const [doc] = loadDocuments('a: [1, 2\n', 'bad.yaml');
    expect(doc?.status).toBe('parse-error');
    expect(doc?.error).toBeDefined();
  });

  it('skips empty documents without consuming an index', () => {
    const docs = loadDocuments('---\n---\napiVersion: v1\nkind: Pod\n', 'a.yaml');
    expect(docs.map((d) => d.id)).toEqual(['a.yaml#0']);
  });

  it('reads .json sources as one document', () => {
    expect(loadDocuments('{"apiVersion":"v1","kind":"Pod"}', 'pod.json')[0]?.status).toBe('ok');
    expect(loadDocuments('{bad', 'pod.json')[0]?.status).toBe('parse-error');
  });
});

describe('readDocumentFile', () => {
  it('fails on a missing file', async () => {
    const result = await readDocumentFile(join(tmpdir(), 'varimodel-absent', 'x.yaml'));
    expect(result.isErr() && result.error.errorCode).toBe(ErrorCode.DOCUMENT_UNREADABLE);
  });
});
