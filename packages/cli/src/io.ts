import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import {
  type FeatureModel,
  KeyMapper,
  deriveKeyMappings,
  indexModel,
  loadMappingTable,
  loadModel,
} from '@varimodel/core';

import type { Logger } from './log.js';

export async function readModel(path: string): Promise<FeatureModel> {
  const loaded = await loadModel(path);
  if (loaded.isErr()) throw loaded.error;
  return loaded.value;
}

/**
 * Curated table when a path is given, otherwise the table derived from the
 * model. Curated rows naming features the model lacks are reported, not
 * dropped.
 */
export async function readMapper(
  model: FeatureModel,
  mappingPath: string | undefined,
  logger: Logger
): Promise<KeyMapper> {
  if (mappingPath === undefined) {
    const derived = deriveKeyMappings(model);
    derived.diagnostics.forEach((d) =>
      logger.debug(`mapping: ambiguous ${d.canonPath} excluded`)
    );
    logger.debug(`mapping: derived ${derived.mapper.size} key path(s)`);
    return derived.mapper;
  }
  const loaded = await loadMappingTable(mappingPath);
  if (loaded.isErr()) throw loaded.error;
  const mapper = KeyMapper.fromEntries(loaded.value);
  const index = indexModel(model);
  for (const entry of mapper.entries()) {
    if (!index.nodes.has(entry.featureId)) {
      logger.warn(`mapping: ${mappingPath} maps onto unknown feature ${entry.featureId}`);
    }
  }
  logger.debug(`mapping: loaded ${mapper.size} key path(s) from ${mappingPath}`);
  return mapper;
}

/** File when a path is given, stdout otherwise */
export async function writeOutput(path: string | undefined, text: string): Promise<void> {
  if (path === undefined) {
    process.stdout.write(text);
    return;
  }
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, 'utf8');
}
