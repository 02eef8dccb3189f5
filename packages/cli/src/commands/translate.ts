import type { Command } from 'commander';

import {
  type ConfigurationSelection,
  type DocumentStatus,
  findKindFeature,
  indexModel,
  readDocumentFile,
  translateDocument,
  validateSelection,
} from '@varimodel/core';

import type { CommonFlags } from '../flags.js';
import { parseIntegerFlag } from '../flags.js';
import { readMapper, readModel, writeOutput } from '../io.js';
import { createLogger } from '../log.js';

export interface TranslateFlags extends CommonFlags {
  mapping?: string;
  out?: string;
  timeBudget?: string;
  check?: boolean;
}

export interface TranslatedDocument {
  documentId: string;
  status: DocumentStatus;
  selection?: ConfigurationSelection;
  violations?: string[];
}

/** Prints the feature selection of every document in a file */
export async function runTranslate(
  modelPath: string,
  documentPath: string,
  flags: TranslateFlags
): Promise<void> {
  const logger = createLogger(flags.verbose === true);
  const model = await readModel(modelPath);
  const index = indexModel(model);
  const mapper = await readMapper(model, flags.mapping, logger);
  const budget = parseIntegerFlag('time-budget', flags.timeBudget);

  const loaded = await readDocumentFile(documentPath, {
    knownKinds: (apiVersion, kind) => findKindFeature(index, apiVersion, kind) !== undefined,
  });
  if (loaded.isErr()) throw loaded.error;

  const out: TranslatedDocument[] = [];
  for (const doc of loaded.value) {
    if (doc.status !== 'ok') {
      logger.debug(`translate: ${doc.id} skipped (${doc.status})`);
      out.push({ documentId: doc.id, status: doc.status });
      continue;
    }
    const translated = translateDocument(doc.content, index, mapper, {
      ...(budget !== undefined ? { deadline: Date.now() + budget } : {}),
    });
    if (translated.isErr()) throw translated.error;
    const selection = translated.value;
    selection.unmappedKeys.forEach((key) => logger.debug(`translate: ${doc.id} unmapped ${key}`));
    out.push({
      documentId: doc.id,
      status: doc.status,
      selection,
      ...(flags.check ? { violations: validateSelection(index, selection).violations } : {}),
    });
  }
  await writeOutput(flags.out, `${JSON.stringify(out, null, 2)}\n`);
}

export function registerTranslateCommand(program: Command): void {
  program
    .command('translate')
    .description('Translate configuration documents into feature selections')
    .argument('<model>', 'Model file written by `varimodel build`')
    .argument('<document>', 'JSON or multi-document YAML file')
    .option('--mapping <table>', 'Curated mapping table (default: derived from the model)')
    .option('-o, --out <file>', 'Selections as JSON (default: stdout)')
    .option('--time-budget <ms>', 'Give up on a document after this many milliseconds')
    .option('--check', 'Also validate each selection against the model', false)
    .option('-v, --verbose', 'Log skipped documents and unmapped keys to stderr', false)
    .action(async (model: string, document: string, flags: TranslateFlags) => {
      await runTranslate(model, document, flags);
    });
}
